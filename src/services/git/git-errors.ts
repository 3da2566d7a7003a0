// 로그 컨텍스트로도 넘기므로 interface가 아닌 type (암묵적 index signature)
export type GitResourceContext = {
  readonly repositoryId?: string | undefined;
  readonly branch?: string | undefined;
  readonly file?: string | undefined;
  readonly name?: string | undefined;
};

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 리소스 연산 실패. 원인 에러와 진단용 컨텍스트를 함께 보존
 */
export class GitResourceError extends Error {
  constructor(
    message: string,
    public readonly context: GitResourceContext = {},
    public readonly cause?: unknown
  ) {
    super(cause === undefined ? message : `${message}: ${describeError(cause)}`);
    this.name = 'GitResourceError';
  }
}

export class RefUpdateError extends Error {
  constructor(
    public readonly updateStatus: string,
    public readonly refName?: string
  ) {
    super(`Error got invalid GitRefUpdate.UpdateStatus: ${updateStatus}`);
    this.name = 'RefUpdateError';
  }
}

export class SourceRefNotFoundError extends Error {
  constructor(
    public readonly ref: string,
    public readonly closestMatch?: string
  ) {
    super(closestMatch === undefined
      ? `No refs found that match "${ref}".`
      : `Ref "${ref}" not found, closest match is "${closestMatch}".`);
    this.name = 'SourceRefNotFoundError';
  }
}

export class ResourceIdFormatError extends Error {
  constructor(
    public readonly id: string,
    public readonly expected: string
  ) {
    super(`Invalid ID "${id}" specified. Supplied ID must be written as ${expected}`);
    this.name = 'ResourceIdFormatError';
  }
}

export class FileOverwriteRefusedError extends Error {
  constructor(
    public readonly repositoryId: string,
    public readonly branch: string,
    public readonly file: string
  ) {
    super('Refusing to overwrite existing file. Configure "overwrite_on_create" to true to override.');
    this.name = 'FileOverwriteRefusedError';
  }
}

export class ResourceValidationError extends Error {
  constructor(public readonly errors: ReadonlyArray<string>) {
    super(`Resource validation failed:\n${errors.join('\n')}`);
    this.name = 'ResourceValidationError';
  }
}
