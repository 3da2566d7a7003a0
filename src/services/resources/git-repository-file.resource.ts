import {
  DEFAULT_FILE_BRANCH,
  DEFAULT_RESOURCE_TIMEOUTS,
  FileResourceConfig,
  FileResourceState,
  GitChange,
  GitClient,
  GitVersionDescriptor,
  GitVersionType,
  ItemContentType,
  ReadResult,
  ResourceTimeouts,
  VersionControlChangeType
} from '../../types';
import { ResourceIdentifier } from '../../utils/ResourceIdentifier';
import { isNotFoundError } from '../azure-devops/types';
import { FileOverwriteRefusedError, GitResourceContext, GitResourceError, ResourceValidationError } from '../git/git-errors';
import { ConditionalPusher, PushRetryOptions } from '../git/push-retry';
import { Logger } from '../logger';
import { isUuid } from './validation';

export interface GitRepositoryFileResourceDependencies {
  readonly client: GitClient;
  readonly logger?: Logger;
  readonly timeouts?: ResourceTimeouts;
  readonly retryOptions?: PushRetryOptions;
}

export interface FileReadRequest {
  readonly id: string;
  readonly branch?: string | undefined;
  readonly overwriteOnCreate?: boolean | undefined;
}

export interface FileDeleteRequest {
  readonly repositoryId: string;
  readonly file: string;
  readonly branch: string;
}

export const addMessage = (file: string): string => `Add ${file}`;
export const updateMessage = (file: string): string => `Update ${file}`;
export const deleteMessage = (file: string): string => `Delete ${file}`;

/**
 * Git 저장소 파일 리소스
 * 모든 변경은 브랜치 head 기준 push로 수행하고, 동시 push 충돌은 timeout까지 재시도
 */
export class GitRepositoryFileResource {
  private readonly client: GitClient;
  private readonly logger: Logger;
  private readonly timeouts: ResourceTimeouts;
  private readonly pusher: ConditionalPusher;

  constructor(dependencies: GitRepositoryFileResourceDependencies) {
    this.client = dependencies.client;
    this.logger = (dependencies.logger || Logger.createConsoleLogger()).withContext({ resource: 'git_repository_file' });
    this.timeouts = dependencies.timeouts ?? DEFAULT_RESOURCE_TIMEOUTS;
    this.pusher = new ConditionalPusher(this.client, this.logger, dependencies.retryOptions);
  }

  static validate(config: FileResourceConfig): void {
    const errors: string[] = [];

    if (!isUuid(config.repositoryId)) {
      errors.push(`repository_id must be a UUID, got "${config.repositoryId}"`);
    }

    if (!config.file) {
      errors.push('file must not be empty');
    }

    if (config.branch !== undefined && config.branch.length === 0) {
      errors.push('branch must not be empty when set');
    }

    if (errors.length > 0) {
      throw new ResourceValidationError(errors);
    }
  }

  async create(config: FileResourceConfig): Promise<FileResourceState> {
    GitRepositoryFileResource.validate(config);

    const { repositoryId, file } = config;
    const branch = config.branch ?? DEFAULT_FILE_BRANCH;
    const overwriteOnCreate = config.overwriteOnCreate ?? false;
    const context: GitResourceContext = { repositoryId, branch, file };

    await this.ensureBranchExists(repositoryId, branch);

    const exists = await this.fileExists(repositoryId, file, branch);
    // 파일이 이미 있으면 명시적으로 허용한 경우에만 edit로 덮어씀
    if (exists && !overwriteOnCreate) {
      throw new FileOverwriteRefusedError(repositoryId, branch, file);
    }
    const changeType = exists ? VersionControlChangeType.EDIT : VersionControlChangeType.ADD;

    this.logger.info('Creating repository file', { ...context, changeType });
    try {
      await this.pusher.push({
        repositoryId,
        branch,
        timeoutMs: this.timeouts.create,
        commit: {
          // 빈 메시지는 설정하지 않은 것으로 취급
          comment: config.commitMessage || addMessage(file),
          changes: [this.contentChange(file, config.content, changeType)]
        }
      });
    } catch (error) {
      this.logger.error('Failed to create repository file', { ...context, error });
      throw new GitResourceError(
        `Create repository file failed, repositoryID: ${repositoryId}, branch: ${branch}, file: ${file}`,
        context,
        error
      );
    }

    return this.readAfterWrite({
      id: ResourceIdentifier.formatFileId(repositoryId, file),
      branch,
      overwriteOnCreate
    });
  }

  /**
   * 브랜치 head의 파일 내용과 마지막 커밋 메시지를 조회. 파일이 없으면 null
   */
  async read(request: FileReadRequest): Promise<ReadResult<FileResourceState>> {
    const { repositoryId, file } = ResourceIdentifier.parseFileId(request.id);
    const branch = request.branch ?? DEFAULT_FILE_BRANCH;
    const context: GitResourceContext = { repositoryId, branch, file };

    await this.ensureBranchExists(repositoryId, branch);

    let content: string;
    let commitId: string | undefined;
    try {
      const item = await this.client.getItem(repositoryId, {
        path: file,
        includeContent: true,
        versionDescriptor: this.versionDescriptor(branch)
      });
      content = item.content ?? '';
      commitId = item.commitId;
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.info('Repository file no longer exists, removing from state', context);
        return null;
      }
      throw new GitResourceError(
        `Query repository item failed, repositoryID: ${repositoryId}, branch: ${branch}, file: ${file}`,
        context,
        error
      );
    }

    let commitMessage: string | undefined;
    if (commitId) {
      try {
        const commit = await this.client.getCommit(repositoryId, commitId);
        commitMessage = commit.comment;
      } catch (error) {
        throw new GitResourceError(
          `Get repository file commit failed, repositoryID: ${repositoryId}, branch: ${branch}, file: ${file}`,
          context,
          error
        );
      }
    }

    return {
      id: ResourceIdentifier.formatFileId(repositoryId, file),
      repositoryId,
      file,
      content,
      branch,
      commitMessage,
      overwriteOnCreate: request.overwriteOnCreate ?? false
    };
  }

  async update(prior: FileResourceState, config: FileResourceConfig): Promise<FileResourceState> {
    GitRepositoryFileResource.validate(config);

    const { repositoryId, file } = prior;
    const branch = prior.branch;
    const context: GitResourceContext = { repositoryId, branch, file };

    await this.ensureBranchExists(repositoryId, branch);

    // 자동 생성된 "Add" 메시지가 남아 있으면 "Update" 메시지로 교체
    const message = config.commitMessage || prior.commitMessage;
    const comment = !message || message === addMessage(file) ? updateMessage(file) : message;

    this.logger.info('Updating repository file', context);
    try {
      await this.pusher.push({
        repositoryId,
        branch,
        timeoutMs: this.timeouts.update ?? this.timeouts.create,
        commit: {
          comment,
          changes: [this.contentChange(file, config.content, VersionControlChangeType.EDIT)]
        }
      });
    } catch (error) {
      this.logger.error('Failed to update repository file', { ...context, error });
      throw new GitResourceError(
        `Update repository file failed, repositoryID: ${repositoryId}, branch: ${branch}, file: ${file}`,
        context,
        error
      );
    }

    return this.readAfterWrite({
      id: prior.id,
      branch,
      overwriteOnCreate: config.overwriteOnCreate ?? prior.overwriteOnCreate
    });
  }

  async delete(request: FileDeleteRequest): Promise<void> {
    const { repositoryId, file, branch } = request;
    const context: GitResourceContext = { repositoryId, branch, file };

    this.logger.info('Deleting repository file', context);
    try {
      await this.pusher.push({
        repositoryId,
        branch,
        timeoutMs: this.timeouts.delete ?? this.timeouts.create,
        commit: {
          comment: deleteMessage(file),
          changes: [{
            changeType: VersionControlChangeType.DELETE,
            item: { path: file }
          }]
        }
      });
    } catch (error) {
      this.logger.error('Failed to delete repository file', { ...context, error });
      throw new GitResourceError(
        `Failed to destroy the repository file, repositoryID: ${repositoryId}, branch: ${branch}, file: ${file}`,
        context,
        error
      );
    }
  }

  async importState(id: string): Promise<FileResourceState> {
    const { repositoryId, file, branch } = ResourceIdentifier.parseFileImportId(id);
    const context: GitResourceContext = { repositoryId, branch, file };

    try {
      await this.client.getItem(repositoryId, {
        path: file,
        versionDescriptor: this.versionDescriptor(branch)
      });
    } catch (error) {
      throw new GitResourceError(
        `Repository file not found, repositoryID: ${repositoryId}, branch: ${branch}, file: ${file}`,
        context,
        error
      );
    }

    return this.readAfterWrite({
      id: ResourceIdentifier.formatFileId(repositoryId, file),
      branch,
      overwriteOnCreate: false
    });
  }

  private async readAfterWrite(request: FileReadRequest): Promise<FileResourceState> {
    const state = await this.read(request);
    if (!state) {
      const { repositoryId, file } = ResourceIdentifier.parseFileId(request.id);
      throw new GitResourceError(
        `Repository file "${file}" was not found on branch "${request.branch ?? DEFAULT_FILE_BRANCH}"`,
        { repositoryId, branch: request.branch, file }
      );
    }
    return state;
  }

  private async ensureBranchExists(repositoryId: string, branch: string): Promise<void> {
    try {
      await this.client.getBranch(repositoryId, ResourceIdentifier.shortBranchName(branch));
    } catch (error) {
      throw new GitResourceError(
        `Repository branch not found, repositoryID: ${repositoryId}, branch: ${branch}`,
        { repositoryId, branch },
        error
      );
    }
  }

  private async fileExists(repositoryId: string, file: string, branch: string): Promise<boolean> {
    try {
      await this.client.getItem(repositoryId, {
        path: file,
        versionDescriptor: this.versionDescriptor(branch)
      });
      return true;
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw new GitResourceError(
        `Query repository item failed, repositoryID: ${repositoryId}, branch: ${branch}, file: ${file}`,
        { repositoryId, branch, file },
        error
      );
    }
  }

  private versionDescriptor(branch: string): GitVersionDescriptor {
    return {
      version: ResourceIdentifier.shortBranchName(branch),
      versionType: GitVersionType.BRANCH
    };
  }

  private contentChange(file: string, content: string, changeType: VersionControlChangeType): GitChange {
    return {
      changeType,
      item: { path: file },
      newContent: {
        content,
        contentType: ItemContentType.RAW_TEXT
      }
    };
  }
}
