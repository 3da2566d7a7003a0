import { GitClient, GitPushCommit, GitPushResult, GitVersionType } from '../../types';
import { ResourceIdentifier } from '../../utils/ResourceIdentifier';
import { DeadlineRetryOptions, retryUntilDeadline } from '../../utils/retry';
import { isConcurrentUpdateError } from '../azure-devops/types';
import { Logger } from '../logger';

export type PushRetryOptions = Omit<DeadlineRetryOptions, 'timeoutMs' | 'isRetryable' | 'onRetry'>;

export interface ConditionalPushRequest {
  readonly repositoryId: string;
  readonly branch: string;
  readonly timeoutMs: number;
  readonly commit: GitPushCommit;
}

/**
 * 브랜치 head 기준 push. 동시에 다른 클라이언트가 push하면 head를 다시 읽고 재시도
 */
export class ConditionalPusher {
  constructor(
    private readonly client: GitClient,
    private readonly logger: Logger,
    private readonly retryOptions: PushRetryOptions = {}
  ) {}

  async getHeadCommitId(repositoryId: string, branch: string): Promise<string> {
    const commits = await this.client.getCommits(repositoryId, {
      top: 1,
      itemVersion: {
        version: ResourceIdentifier.shortBranchName(branch),
        versionType: GitVersionType.BRANCH
      }
    });

    const commitId = commits[0]?.commitId;
    if (!commitId) {
      throw new Error(`No commits found on branch "${branch}"`);
    }
    return commitId;
  }

  async push(request: ConditionalPushRequest): Promise<GitPushResult> {
    const { repositoryId, branch, commit } = request;
    const refName = ResourceIdentifier.withRefsHeadsPrefix(branch);

    return retryUntilDeadline(async (attempt) => {
      // 매 시도마다 현재 head를 다시 조회 (오래된 oldObjectId는 항상 실패)
      const oldObjectId = await this.getHeadCommitId(repositoryId, branch);

      this.logger.debug('Pushing commit', { repositoryId, branch: refName, oldObjectId, attempt });
      return this.client.createPush(repositoryId, {
        refUpdates: [{ name: refName, oldObjectId }],
        commits: [commit]
      });
    }, {
      ...this.retryOptions,
      timeoutMs: request.timeoutMs,
      isRetryable: isConcurrentUpdateError,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn('Branch was updated concurrently, retrying push', {
          repositoryId,
          branch: refName,
          attempt,
          delayMs,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    });
  }
}
