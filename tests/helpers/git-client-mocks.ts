import { GitClient } from '@/types';
import { PushRetryOptions } from '@/services/git/push-retry';

export const TEST_REPOSITORY_ID = '2b6a6b9e-3c7c-4a3b-9a7c-6f1f3c8a4d21';

// MockGitClient가 저장소 생성 시 만드는 첫 커밋 id
export const INITIAL_COMMIT_ID = '0000000000000000000000000000000000000001';

export function createMockGitClient(): jest.Mocked<GitClient> {
  return {
    getBranch: jest.fn(),
    getRefs: jest.fn(),
    updateRefs: jest.fn(),
    getItem: jest.fn(),
    getCommits: jest.fn(),
    getCommit: jest.fn(),
    createPush: jest.fn()
  };
}

export interface FakeClock extends PushRetryOptions {
  readonly elapsed: () => number;
  readonly delays: number[];
}

/**
 * 실제로 기다리지 않는 재시도 시계. sleep 호출 시 시간만 앞으로 이동
 */
export function createFakeClock(): FakeClock {
  let current = 0;
  const delays: number[] = [];
  return {
    now: () => current,
    sleep: async (ms: number) => {
      delays.push(ms);
      current += ms;
    },
    elapsed: () => current,
    delays
  };
}
