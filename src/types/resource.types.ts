export interface ResourceTimeouts {
  readonly create: number;
  readonly update?: number;
  readonly delete?: number;
}

export const DEFAULT_RESOURCE_TIMEOUTS: ResourceTimeouts = {
  create: 60000
};

// 브랜치 리소스 (생성 후 변경 불가 - 모든 입력 변경은 재생성)
export interface BranchResourceConfig {
  readonly repositoryId: string;
  readonly name: string;
  readonly ref?: string | undefined;
  // ref 대신 특정 commit에서 생성 (ref와 함께 지정 불가)
  readonly sourceSha?: string | undefined;
}

export interface BranchResourceState {
  readonly id: string;
  readonly repositoryId: string;
  readonly name: string;
  readonly ref?: string | undefined;
  readonly sourceSha?: string | undefined;
  readonly isDefault: boolean;
}

export interface FileResourceConfig {
  readonly repositoryId: string;
  readonly file: string;
  readonly content: string;
  readonly branch?: string | undefined;
  readonly commitMessage?: string | undefined;
  readonly overwriteOnCreate?: boolean | undefined;
}

export interface FileResourceState {
  readonly id: string;
  readonly repositoryId: string;
  readonly file: string;
  readonly content: string;
  readonly branch: string;
  readonly commitMessage?: string | undefined;
  readonly overwriteOnCreate: boolean;
}

/**
 * Read 결과: null이면 원격에서 삭제된 리소스 (identity 제거 신호)
 */
export type ReadResult<T> = T | null;
