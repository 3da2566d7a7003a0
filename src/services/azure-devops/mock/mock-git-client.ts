import {
  EMPTY_OBJECT_ID,
  GetCommitsOptions,
  GetItemOptions,
  GetRefsOptions,
  GitBranchStats,
  GitClient,
  GitCommitRef,
  GitItem,
  GitPush,
  GitPushResult,
  GitRef,
  GitRefUpdate,
  GitRefUpdateResult,
  GitRefUpdateStatus,
  VersionControlChangeType
} from '../../../types';
import { ResourceIdentifier } from '../../../utils/ResourceIdentifier';
import { Logger } from '../../logger';
import { AzureDevOpsApiError, CONCURRENT_UPDATE_MARKER } from '../types';

interface MockCommit {
  readonly commitId: string;
  readonly comment: string;
  readonly parentId?: string | undefined;
  readonly files: ReadonlyMap<string, string>;
  readonly changedPaths: ReadonlySet<string>;
}

interface MockAnnotatedTag {
  readonly objectId: string;
  readonly commitId: string;
}

interface MockRepository {
  readonly refs: Map<string, string>;
  readonly commits: Map<string, MockCommit>;
  readonly annotatedTags: Map<string, MockAnnotatedTag>;
  defaultBranch: string;
  // 다음 push 전에 다른 클라이언트의 push를 끼워 넣을 횟수 (브랜치별)
  readonly pendingConcurrentPushes: Map<string, number>;
}

export interface MockRepositoryOptions {
  readonly defaultBranch?: string;
  readonly files?: Record<string, string>;
}

/**
 * 메모리 기반 Azure DevOps Git 저장소
 * compare-and-swap 규칙과 에러 응답을 실제 서비스와 같은 형태로 재현
 */
export class MockGitClient implements GitClient {
  private readonly repositories = new Map<string, MockRepository>();
  private sequence = 0;

  constructor(private readonly logger: Logger = Logger.createSilentLogger()) {}

  addRepository(repositoryId: string, options: MockRepositoryOptions = {}): string {
    const defaultBranch = ResourceIdentifier.withRefsHeadsPrefix(options.defaultBranch ?? 'master');
    const repository: MockRepository = {
      refs: new Map(),
      commits: new Map(),
      annotatedTags: new Map(),
      defaultBranch,
      pendingConcurrentPushes: new Map()
    };
    this.repositories.set(repositoryId, repository);

    const files = new Map(Object.entries(options.files ?? { '/README.md': `# ${repositoryId}` }).map(
      ([filePath, content]) => [normalizePath(filePath), content] as const
    ));
    const commit = this.storeCommit(repository, 'Initial commit', undefined, files, new Set(files.keys()));
    repository.refs.set(defaultBranch, commit.commitId);

    this.logger.debug('Mock: Repository created', { repositoryId, defaultBranch, commitId: commit.commitId });
    return commit.commitId;
  }

  setDefaultBranch(repositoryId: string, branch: string): void {
    this.getRepository(repositoryId).defaultBranch = ResourceIdentifier.withRefsHeadsPrefix(branch);
  }

  addLightweightTag(repositoryId: string, tagName: string, commitId: string): void {
    this.getRepository(repositoryId).refs.set(`refs/tags/${tagName}`, commitId);
  }

  addAnnotatedTag(repositoryId: string, tagName: string, commitId: string): string {
    const repository = this.getRepository(repositoryId);
    const objectId = this.nextObjectId();
    const name = `refs/tags/${tagName}`;
    repository.refs.set(name, objectId);
    repository.annotatedTags.set(name, { objectId, commitId });
    return objectId;
  }

  /**
   * 다음 count번의 push 직전에 다른 클라이언트가 같은 브랜치에 먼저 push한 상황을 재현
   */
  simulateConcurrentPushes(repositoryId: string, branch: string, count: number): void {
    const refName = ResourceIdentifier.withRefsHeadsPrefix(branch);
    this.getRepository(repositoryId).pendingConcurrentPushes.set(refName, count);
  }

  /**
   * 다른 클라이언트의 커밋을 브랜치에 추가
   */
  commitExternally(repositoryId: string, branch: string, filePath: string, content: string): string {
    const repository = this.getRepository(repositoryId);
    const refName = ResourceIdentifier.withRefsHeadsPrefix(branch);
    const parent = this.resolveCommit(repository, refName);
    const files = new Map(parent.files);
    files.set(normalizePath(filePath), content);
    const commit = this.storeCommit(repository, `External change to ${filePath}`, parent.commitId, files, new Set([normalizePath(filePath)]));
    repository.refs.set(refName, commit.commitId);
    return commit.commitId;
  }

  getRefObjectId(repositoryId: string, refName: string): string | undefined {
    return this.getRepository(repositoryId).refs.get(refName);
  }

  readFile(repositoryId: string, branch: string, filePath: string): string | undefined {
    const repository = this.getRepository(repositoryId);
    const commitId = repository.refs.get(ResourceIdentifier.withRefsHeadsPrefix(branch));
    if (!commitId) {
      return undefined;
    }
    return repository.commits.get(commitId)?.files.get(normalizePath(filePath));
  }

  async getBranch(repositoryId: string, name: string): Promise<GitBranchStats> {
    const repository = this.getRepository(repositoryId);
    const refName = ResourceIdentifier.withRefsHeadsPrefix(name);
    const commitId = repository.refs.get(refName);
    if (!commitId) {
      throw branchNotFound(name);
    }

    const commit = repository.commits.get(commitId);
    return {
      name: ResourceIdentifier.shortBranchName(refName),
      commit: { commitId, comment: commit?.comment },
      isBaseVersion: refName === repository.defaultBranch,
      aheadCount: 0,
      behindCount: 0
    };
  }

  async getRefs(repositoryId: string, options: GetRefsOptions): Promise<ReadonlyArray<GitRef>> {
    const repository = this.getRepository(repositoryId);
    const filter = options.filter ?? '';

    // 실제 서비스처럼 짧은 이름부터 정렬
    const matches = Array.from(repository.refs.entries())
      .filter(([name]) => name.slice('refs/'.length).startsWith(filter))
      .sort(([a], [b]) => a.length - b.length || a.localeCompare(b))
      .slice(0, options.top ?? Number.MAX_SAFE_INTEGER);

    return matches.map(([name, objectId]) => {
      const tag = repository.annotatedTags.get(name);
      if (options.peelTags && tag) {
        return { name, objectId, peeledObjectId: tag.commitId };
      }
      return { name, objectId };
    });
  }

  async updateRefs(repositoryId: string, refUpdates: ReadonlyArray<GitRefUpdate>): Promise<ReadonlyArray<GitRefUpdateResult>> {
    const repository = this.getRepository(repositoryId);
    return refUpdates.map(update => {
      const status = this.applyRefUpdate(repository, update);
      return {
        name: update.name,
        oldObjectId: update.oldObjectId,
        newObjectId: update.newObjectId,
        success: status === GitRefUpdateStatus.SUCCEEDED,
        updateStatus: status
      };
    });
  }

  async getItem(repositoryId: string, options: GetItemOptions): Promise<GitItem> {
    const repository = this.getRepository(repositoryId);
    const version = options.versionDescriptor?.version ?? ResourceIdentifier.shortBranchName(repository.defaultBranch);
    const head = this.resolveCommit(repository, ResourceIdentifier.withRefsHeadsPrefix(version));
    const filePath = normalizePath(options.path);

    const content = head.files.get(filePath);
    if (content === undefined) {
      throw new AzureDevOpsApiError(
        `Failed to get item: TF401174: The item '${filePath}' could not be found in the repository.`,
        404,
        'GitItemNotFoundException',
        `TF401174: The item '${filePath}' could not be found in the repository.`
      );
    }

    return {
      path: filePath,
      commitId: this.lastCommitTouching(repository, head, filePath),
      ...(options.includeContent ? { content } : {})
    };
  }

  async getCommits(repositoryId: string, options: GetCommitsOptions): Promise<ReadonlyArray<GitCommitRef>> {
    const repository = this.getRepository(repositoryId);
    const version = options.itemVersion?.version ?? ResourceIdentifier.shortBranchName(repository.defaultBranch);
    const top = options.top ?? 100;

    const commits: GitCommitRef[] = [];
    let current: MockCommit | undefined = this.resolveCommit(repository, ResourceIdentifier.withRefsHeadsPrefix(version));
    while (current && commits.length < top) {
      commits.push({ commitId: current.commitId, comment: current.comment });
      current = current.parentId ? repository.commits.get(current.parentId) : undefined;
    }
    return commits;
  }

  async getCommit(repositoryId: string, commitId: string): Promise<GitCommitRef> {
    const commit = this.getRepository(repositoryId).commits.get(commitId);
    if (!commit) {
      throw new AzureDevOpsApiError(`Failed to get commit: commit ${commitId} not found`, 404, 'GitCommitDoesNotExistException');
    }
    return { commitId: commit.commitId, comment: commit.comment };
  }

  async createPush(repositoryId: string, push: GitPush): Promise<GitPushResult> {
    const repository = this.getRepository(repositoryId);
    const [refUpdate] = push.refUpdates;
    if (!refUpdate || push.refUpdates.length !== 1) {
      throw badRequest('A push must contain exactly one ref update.');
    }

    this.runPendingConcurrentPush(repositoryId, repository, refUpdate.name);

    const current = repository.refs.get(refUpdate.name) ?? EMPTY_OBJECT_ID;
    if (current !== refUpdate.oldObjectId) {
      const serverMessage = `TF401028: The reference '${refUpdate.name}' ${CONCURRENT_UPDATE_MARKER}, so you cannot update it.`;
      throw new AzureDevOpsApiError(`Failed to create push: ${serverMessage}`, 409, 'GitReferenceStaleException', serverMessage);
    }

    let parent: MockCommit | undefined = current === EMPTY_OBJECT_ID ? undefined : repository.commits.get(current);
    const commits: GitCommitRef[] = [];
    for (const pushCommit of push.commits) {
      const files = new Map<string, string>(parent ? parent.files : []);
      const changedPaths = new Set<string>();
      for (const change of pushCommit.changes) {
        const filePath = normalizePath(change.item.path);
        const exists = files.has(filePath);
        if (change.changeType === VersionControlChangeType.ADD && exists) {
          throw badRequest(`The path '${filePath}' specified in the add operation already exists. Please specify a new path.`);
        }
        if (change.changeType !== VersionControlChangeType.ADD && !exists) {
          throw badRequest(`The path '${filePath}' does not exist at commit '${current}'.`);
        }
        if (change.changeType === VersionControlChangeType.DELETE) {
          files.delete(filePath);
        } else {
          files.set(filePath, change.newContent?.content ?? '');
        }
        changedPaths.add(filePath);
      }
      parent = this.storeCommit(repository, pushCommit.comment, parent?.commitId, files, changedPaths);
      commits.push({ commitId: parent.commitId, comment: parent.comment });
    }

    if (parent) {
      repository.refs.set(refUpdate.name, parent.commitId);
    }

    this.logger.debug('Mock: Push accepted', { repositoryId, ref: refUpdate.name, head: parent?.commitId });
    return {
      pushId: this.sequence,
      refUpdates: [{ name: refUpdate.name, oldObjectId: refUpdate.oldObjectId, newObjectId: parent?.commitId }],
      commits
    };
  }

  private applyRefUpdate(repository: MockRepository, update: GitRefUpdate): GitRefUpdateStatus {
    if (!isValidRefName(update.name)) {
      return GitRefUpdateStatus.INVALID_REF_NAME;
    }

    const current = repository.refs.get(update.name) ?? EMPTY_OBJECT_ID;
    if (current !== update.oldObjectId) {
      return GitRefUpdateStatus.STALE_OLD_OBJECT_ID;
    }

    const newObjectId = update.newObjectId ?? EMPTY_OBJECT_ID;
    if (newObjectId === EMPTY_OBJECT_ID) {
      repository.refs.delete(update.name);
      return GitRefUpdateStatus.SUCCEEDED;
    }

    if (!repository.commits.has(newObjectId)) {
      return GitRefUpdateStatus.UNRESOLVABLE_TO_COMMIT;
    }

    repository.refs.set(update.name, newObjectId);
    return GitRefUpdateStatus.SUCCEEDED;
  }

  private runPendingConcurrentPush(repositoryId: string, repository: MockRepository, refName: string): void {
    const pending = repository.pendingConcurrentPushes.get(refName) ?? 0;
    if (pending <= 0 || !repository.refs.has(refName)) {
      return;
    }
    repository.pendingConcurrentPushes.set(refName, pending - 1);
    this.commitExternally(repositoryId, refName, `/concurrent-${this.sequence + 1}.txt`, 'concurrent change');
  }

  private lastCommitTouching(repository: MockRepository, head: MockCommit, filePath: string): string {
    let current: MockCommit | undefined = head;
    while (current) {
      if (current.changedPaths.has(filePath)) {
        return current.commitId;
      }
      current = current.parentId ? repository.commits.get(current.parentId) : undefined;
    }
    return head.commitId;
  }

  private resolveCommit(repository: MockRepository, refName: string): MockCommit {
    const commitId = repository.refs.get(refName);
    const commit = commitId ? repository.commits.get(commitId) : undefined;
    if (!commit) {
      throw branchNotFound(ResourceIdentifier.shortBranchName(refName));
    }
    return commit;
  }

  private storeCommit(
    repository: MockRepository,
    comment: string,
    parentId: string | undefined,
    files: ReadonlyMap<string, string>,
    changedPaths: ReadonlySet<string>
  ): MockCommit {
    const commit: MockCommit = { commitId: this.nextObjectId(), comment, parentId, files, changedPaths };
    repository.commits.set(commit.commitId, commit);
    return commit;
  }

  // 결정적인 40자리 object id (0번은 EMPTY_OBJECT_ID와 겹치므로 1부터)
  private nextObjectId(): string {
    this.sequence += 1;
    return this.sequence.toString(16).padStart(40, '0');
  }

  private getRepository(repositoryId: string): MockRepository {
    const repository = this.repositories.get(repositoryId);
    if (!repository) {
      throw new AzureDevOpsApiError(
        `TF401019: The Git repository with name or identifier ${repositoryId} does not exist or you do not have permissions for the operation you are attempting.`,
        404,
        'GitRepositoryNotFoundException'
      );
    }
    return repository;
  }
}

function normalizePath(filePath: string): string {
  return filePath.startsWith('/') ? filePath : `/${filePath}`;
}

function isValidRefName(name: string): boolean {
  return name.startsWith('refs/')
    && !name.endsWith('/')
    && !name.includes('..')
    && !/[\s~^:?*[\\]/.test(name);
}

function branchNotFound(name: string): AzureDevOpsApiError {
  const serverMessage = `TF401175:The version descriptor <Branch: ${name} > could not be resolved to a version in the repository`;
  return new AzureDevOpsApiError(`Failed to get branch: ${serverMessage}`, 404, 'GitUnresolvableToCommitException', serverMessage);
}

function badRequest(serverMessage: string): AzureDevOpsApiError {
  return new AzureDevOpsApiError(`Failed to create push: ${serverMessage}`, 400, 'InvalidArgumentValueException', serverMessage);
}
