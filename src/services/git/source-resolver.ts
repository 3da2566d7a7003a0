import { GitClient } from '../../types';
import { Logger } from '../logger';
import { SourceRefNotFoundError } from './git-errors';

/**
 * 심볼릭 ref(refs/heads/..., refs/tags/...)를 브랜치 생성에 쓸 commit id로 변환
 */
export class SourceResolver {
  constructor(
    private readonly client: GitClient,
    private readonly logger: Logger
  ) {}

  async resolveCommit(repositoryId: string, ref: string): Promise<string> {
    // getRefs는 filter와 prefix가 일치하는 ref를 짧은 순으로 정렬해서 반환하므로 top 1이 최선의 후보
    const filter = ref.startsWith('refs/') ? ref.slice('refs/'.length) : ref;
    this.logger.debug('Resolving source ref', { repositoryId, ref, filter });

    const refs = await this.client.getRefs(repositoryId, {
      filter,
      top: 1,
      peelTags: true
    });

    const candidate = refs[0];
    if (!candidate) {
      throw new SourceRefNotFoundError(ref);
    }

    if (candidate.name === undefined) {
      throw new Error('Got unexpected GetRefs response, a ref without a name was returned.');
    }

    // prefix만 같은 다른 ref (예: refs/heads/foo vs refs/heads/foobar) 배제
    if (candidate.name !== ref) {
      throw new SourceRefNotFoundError(ref, candidate.name);
    }

    // annotated tag는 peeledObjectId가 실제 commit
    const commitId = candidate.peeledObjectId ?? candidate.objectId;
    if (!commitId) {
      throw new Error(`GetRefs response for "${ref}" doesn't have a valid commit id.`);
    }

    this.logger.debug('Resolved source ref', { repositoryId, ref, commitId, peeled: candidate.peeledObjectId !== undefined });
    return commitId;
  }
}
