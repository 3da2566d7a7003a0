/**
 * Azure DevOps Git REST 모델 (사용하는 필드만 정의)
 */

// 존재하지 않는 ref를 나타내는 object id (40자리 0)
export const EMPTY_OBJECT_ID = '0000000000000000000000000000000000000000';

export const REFS_HEADS_PREFIX = 'refs/heads/';

export const DEFAULT_FILE_BRANCH = 'refs/heads/master';

export enum GitRefUpdateStatus {
  SUCCEEDED = 'succeeded',
  FORCE_PUSH_REQUIRED = 'forcePushRequired',
  STALE_OLD_OBJECT_ID = 'staleOldObjectId',
  INVALID_REF_NAME = 'invalidRefName',
  UNPROCESSED = 'unprocessed',
  UNRESOLVABLE_TO_COMMIT = 'unresolvableToCommit',
  WRITE_PERMISSION_REQUIRED = 'writePermissionRequired',
  MANAGE_NOTE_PERMISSION_REQUIRED = 'manageNotePermissionRequired',
  CREATE_BRANCH_PERMISSION_REQUIRED = 'createBranchPermissionRequired',
  CREATE_TAG_PERMISSION_REQUIRED = 'createTagPermissionRequired',
  REJECTED_BY_PLUGIN = 'rejectedByPlugin',
  LOCKED = 'locked',
  REF_NAME_CONFLICT = 'refNameConflict',
  REJECTED_BY_POLICY = 'rejectedByPolicy',
  SUCCEEDED_NON_EXISTENT_REF = 'succeededNonExistentRef',
  SUCCEEDED_CORRUPT_REF = 'succeededCorruptRef'
}

export enum VersionControlChangeType {
  ADD = 'add',
  EDIT = 'edit',
  DELETE = 'delete'
}

export enum ItemContentType {
  RAW_TEXT = 'rawText',
  BASE64_ENCODED = 'base64Encoded'
}

export enum GitVersionType {
  BRANCH = 'branch',
  TAG = 'tag',
  COMMIT = 'commit'
}

export interface GitVersionDescriptor {
  readonly version: string;
  readonly versionType?: GitVersionType;
}

export interface GitRef {
  readonly name?: string;
  readonly objectId?: string;
  // annotated tag이 가리키는 commit id
  readonly peeledObjectId?: string;
}

export interface GitRefUpdate {
  readonly name: string;
  readonly oldObjectId: string;
  readonly newObjectId?: string;
}

export interface GitRefUpdateResult {
  readonly name?: string;
  readonly oldObjectId?: string;
  readonly newObjectId?: string;
  readonly success?: boolean;
  readonly updateStatus?: GitRefUpdateStatus | string;
}

export interface GitCommitRef {
  readonly commitId?: string;
  readonly comment?: string;
}

export interface GitBranchStats {
  readonly name?: string;
  readonly commit?: GitCommitRef;
  readonly isBaseVersion?: boolean;
  readonly aheadCount?: number;
  readonly behindCount?: number;
}

export interface GitItem {
  readonly path?: string;
  readonly objectId?: string;
  readonly commitId?: string;
  readonly content?: string;
}

export interface ItemContent {
  readonly content: string;
  readonly contentType: ItemContentType;
}

export interface GitChange {
  readonly changeType: VersionControlChangeType;
  readonly item: { readonly path: string };
  readonly newContent?: ItemContent;
}

export interface GitPushCommit {
  readonly comment: string;
  readonly changes: ReadonlyArray<GitChange>;
}

export interface GitPush {
  readonly refUpdates: ReadonlyArray<GitRefUpdate>;
  readonly commits: ReadonlyArray<GitPushCommit>;
}

export interface GitPushResult {
  readonly pushId?: number;
  readonly refUpdates?: ReadonlyArray<GitRefUpdate>;
  readonly commits?: ReadonlyArray<GitCommitRef>;
}

export interface GetRefsOptions {
  readonly filter?: string;
  readonly top?: number;
  readonly peelTags?: boolean;
}

export interface GetItemOptions {
  readonly path: string;
  readonly includeContent?: boolean;
  readonly versionDescriptor?: GitVersionDescriptor;
}

export interface GetCommitsOptions {
  readonly top?: number;
  readonly itemVersion?: GitVersionDescriptor;
}

/**
 * Azure DevOps Git API 중 리소스 관리에 필요한 연산만 노출하는 클라이언트
 */
export interface GitClient {
  getBranch(repositoryId: string, name: string): Promise<GitBranchStats>;
  getRefs(repositoryId: string, options: GetRefsOptions): Promise<ReadonlyArray<GitRef>>;
  updateRefs(repositoryId: string, refUpdates: ReadonlyArray<GitRefUpdate>): Promise<ReadonlyArray<GitRefUpdateResult>>;
  getItem(repositoryId: string, options: GetItemOptions): Promise<GitItem>;
  getCommits(repositoryId: string, options: GetCommitsOptions): Promise<ReadonlyArray<GitCommitRef>>;
  getCommit(repositoryId: string, commitId: string): Promise<GitCommitRef>;
  createPush(repositoryId: string, push: GitPush): Promise<GitPushResult>;
}
