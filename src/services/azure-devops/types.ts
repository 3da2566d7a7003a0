export const CONCURRENT_UPDATE_MARKER = 'has already been updated by another client';

/**
 * Azure DevOps REST 호출 실패. statusCode가 0이면 응답 없이 실패한 경우
 */
export class AzureDevOpsApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly typeKey?: string,
    public readonly serverMessage?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'AzureDevOpsApiError';
  }
}

// Azure DevOps 에러 응답 본문 (WrappedException)
export interface AzureDevOpsErrorBody {
  readonly message?: string;
  readonly typeKey?: string;
  readonly typeName?: string;
  readonly errorCode?: number;
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof AzureDevOpsApiError && error.statusCode === 404;
}

/**
 * 다른 클라이언트가 먼저 ref를 갱신해서 compare-and-swap에 실패한 경우
 * 서비스가 별도 상태 코드를 주지 않으므로 서버 메시지로 판별
 */
export function isConcurrentUpdateError(error: unknown): boolean {
  if (!(error instanceof AzureDevOpsApiError)) {
    return false;
  }
  const text = error.serverMessage ?? error.message;
  return text.includes(CONCURRENT_UPDATE_MARKER);
}
