import {
  BranchResourceConfig,
  BranchResourceState,
  EMPTY_OBJECT_ID,
  GitClient,
  GitPush,
  ItemContentType,
  ReadResult,
  VersionControlChangeType
} from '../../types';
import { ResourceIdentifier } from '../../utils/ResourceIdentifier';
import { isNotFoundError } from '../azure-devops/types';
import { GitResourceError, ResourceValidationError } from '../git/git-errors';
import { RefUpdater } from '../git/ref-updater';
import { SourceResolver } from '../git/source-resolver';
import { Logger } from '../logger';
import { isUuid } from './validation';

export const INITIAL_COMMIT_MESSAGE = 'Initial commit.';
export const INITIAL_FILE_PATH = '/readme.md';
export const INITIAL_FILE_CONTENT = 'Branch initialized with azdo-git-resources';

const COMMIT_SHA_PATTERN = /^[0-9a-f]{40}$/i;

export interface GitRepositoryBranchResourceDependencies {
  readonly client: GitClient;
  readonly logger?: Logger;
}

/**
 * Git 저장소 브랜치 리소스 (create / read / delete / import)
 * 모든 입력은 변경 시 재생성 대상이므로 update는 없음
 */
export class GitRepositoryBranchResource {
  private readonly client: GitClient;
  private readonly logger: Logger;
  private readonly sourceResolver: SourceResolver;
  private readonly refUpdater: RefUpdater;

  constructor(dependencies: GitRepositoryBranchResourceDependencies) {
    this.client = dependencies.client;
    this.logger = (dependencies.logger || Logger.createConsoleLogger()).withContext({ resource: 'git_repository_branch' });
    this.sourceResolver = new SourceResolver(this.client, this.logger);
    this.refUpdater = new RefUpdater(this.client, this.logger);
  }

  static validate(config: BranchResourceConfig): void {
    const errors: string[] = [];

    if (!config.name) {
      errors.push('name must not be empty');
    }

    if (!isUuid(config.repositoryId)) {
      errors.push(`repository_id must be a UUID, got "${config.repositoryId}"`);
    }

    if (config.ref !== undefined && config.ref.length === 0) {
      errors.push('ref must not be empty when set');
    }

    if (config.sourceSha !== undefined && !COMMIT_SHA_PATTERN.test(config.sourceSha)) {
      errors.push(`source_sha must be a 40 character hex commit id, got "${config.sourceSha}"`);
    }

    if (config.ref !== undefined && config.sourceSha !== undefined) {
      errors.push('only one of ref or source_sha can be set');
    }

    if (errors.length > 0) {
      throw new ResourceValidationError(errors);
    }
  }

  /**
   * 고아 브랜치 초기화용 push: 빈 ref에서 readme 하나를 추가하는 커밋
   */
  static buildInitialPush(refName: string): GitPush {
    return {
      refUpdates: [{
        name: refName,
        oldObjectId: EMPTY_OBJECT_ID
      }],
      commits: [{
        comment: INITIAL_COMMIT_MESSAGE,
        changes: [{
          changeType: VersionControlChangeType.ADD,
          item: { path: INITIAL_FILE_PATH },
          newContent: {
            content: INITIAL_FILE_CONTENT,
            contentType: ItemContentType.RAW_TEXT
          }
        }]
      }]
    };
  }

  async create(config: BranchResourceConfig): Promise<BranchResourceState> {
    GitRepositoryBranchResource.validate(config);

    const { repositoryId, name, ref, sourceSha } = config;
    const refName = ResourceIdentifier.withRefsHeadsPrefix(name);
    const context = { repositoryId, name };

    if (sourceSha !== undefined) {
      this.logger.info('Creating branch from commit', { ...context, sourceSha });
      try {
        await this.refUpdater.update(repositoryId, [{
          name: refName,
          oldObjectId: EMPTY_OBJECT_ID,
          newObjectId: sourceSha
        }]);
      } catch (error) {
        this.logger.error('Failed to create branch', { ...context, sourceSha, error });
        throw new GitResourceError(`Error creating branch "${name}" against commit "${sourceSha}"`, context, error);
      }
    } else if (ref === undefined) {
      this.logger.info('Initialising orphan branch', context);
      try {
        await this.client.createPush(repositoryId, GitRepositoryBranchResource.buildInitialPush(refName));
      } catch (error) {
        this.logger.error('Failed to initialise branch', { ...context, error });
        throw new GitResourceError(`Error initialising new branch "${name}"`, context, error);
      }
    } else {
      this.logger.info('Creating branch from ref', { ...context, ref });
      try {
        const commitId = await this.sourceResolver.resolveCommit(repositoryId, ref);
        await this.refUpdater.update(repositoryId, [{
          name: refName,
          oldObjectId: EMPTY_OBJECT_ID,
          newObjectId: commitId
        }]);
      } catch (error) {
        this.logger.error('Failed to create branch', { ...context, ref, error });
        throw new GitResourceError(`Error creating branch "${name}" against ref "${ref}"`, context, error);
      }
    }

    const state = await this.read({ id: ResourceIdentifier.formatBranchId(repositoryId, name), ref, sourceSha });
    if (!state) {
      throw new GitResourceError(`Branch "${name}" was not found after creation`, context);
    }
    return state;
  }

  /**
   * 원격 브랜치를 조회. 존재하지 않으면 null (상태에서 제거 신호)
   */
  async read(state: {
    readonly id: string;
    readonly ref?: string | undefined;
    readonly sourceSha?: string | undefined;
  }): Promise<ReadResult<BranchResourceState>> {
    const { repositoryId, branchName } = ResourceIdentifier.parseBranchId(state.id);

    try {
      const stats = await this.client.getBranch(repositoryId, ResourceIdentifier.shortBranchName(branchName));
      return {
        id: ResourceIdentifier.formatBranchId(repositoryId, branchName),
        repositoryId,
        name: branchName,
        ref: state.ref,
        sourceSha: state.sourceSha,
        isDefault: stats.isBaseVersion === true
      };
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.info('Branch no longer exists, removing from state', { repositoryId, name: branchName });
        return null;
      }
      throw new GitResourceError(`Error reading branch "${branchName}"`, { repositoryId, name: branchName }, error);
    }
  }

  async delete(state: { readonly id: string }): Promise<void> {
    const { repositoryId, branchName } = ResourceIdentifier.parseBranchId(state.id);
    const context = { repositoryId, name: branchName };

    let headCommitId: string | undefined;
    try {
      const stats = await this.client.getBranch(repositoryId, ResourceIdentifier.shortBranchName(branchName));
      headCommitId = stats.commit?.commitId;
    } catch (error) {
      throw new GitResourceError(`Error getting latest commit of "${branchName}"`, context, error);
    }

    if (!headCommitId) {
      throw new GitResourceError(`Error getting latest commit of "${branchName}": branch has no head commit`, context);
    }

    this.logger.info('Deleting branch', { ...context, headCommitId });
    try {
      // 조회한 head와 다르면 서비스가 staleOldObjectId로 거부
      await this.refUpdater.update(repositoryId, [{
        name: ResourceIdentifier.withRefsHeadsPrefix(branchName),
        oldObjectId: headCommitId,
        newObjectId: EMPTY_OBJECT_ID
      }]);
    } catch (error) {
      this.logger.error('Failed to delete branch', { ...context, error });
      throw new GitResourceError(`Error deleting branch "${branchName}"`, context, error);
    }
  }

  async importState(id: string): Promise<BranchResourceState> {
    const { repositoryId, branchName } = ResourceIdentifier.parseBranchId(id);

    try {
      const stats = await this.client.getBranch(repositoryId, ResourceIdentifier.shortBranchName(branchName));
      return {
        id: ResourceIdentifier.formatBranchId(repositoryId, branchName),
        repositoryId,
        name: branchName,
        isDefault: stats.isBaseVersion === true
      };
    } catch (error) {
      throw new GitResourceError(`Error checking if branch "${branchName}" exists`, { repositoryId, name: branchName }, error);
    }
  }
}
