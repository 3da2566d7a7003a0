import { GitClient, GitRefUpdate, GitRefUpdateResult, GitRefUpdateStatus } from '../../types';
import { Logger } from '../logger';
import { RefUpdateError } from './git-errors';

/**
 * 모든 결과가 success일 때만 통과. 첫 번째 실패 결과의 상태를 에러로 변환
 */
export function assertRefUpdatesSucceeded(results: ReadonlyArray<GitRefUpdateResult>): void {
  for (const result of results) {
    if (result.success !== true) {
      throw new RefUpdateError(result.updateStatus ?? GitRefUpdateStatus.UNPROCESSED, result.name);
    }
  }
}

export class RefUpdater {
  constructor(
    private readonly client: GitClient,
    private readonly logger: Logger
  ) {}

  /**
   * oldObjectId 기준 compare-and-swap ref 갱신
   */
  async update(repositoryId: string, refUpdates: ReadonlyArray<GitRefUpdate>): Promise<ReadonlyArray<GitRefUpdateResult>> {
    this.logger.debug('Updating refs', { repositoryId, refUpdates });

    const results = await this.client.updateRefs(repositoryId, refUpdates);
    try {
      assertRefUpdatesSucceeded(results);
    } catch (error) {
      this.logger.warn('Ref update rejected', { repositoryId, results });
      throw error;
    }

    return results;
  }
}
