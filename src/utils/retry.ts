export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export interface BackoffOptions {
  initialDelayMs?: number;
  backoffMultiplier?: number;
  maxDelayMs?: number;
}

export interface DeadlineRetryOptions extends BackoffOptions {
  // 이 시간이 지나면 마지막 에러를 그대로 던짐
  timeoutMs: number;
  isRetryable: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export function calculateBackoffDelay(attempt: number, options: BackoffOptions = {}): number {
  const {
    initialDelayMs = 500,
    backoffMultiplier = 2,
    maxDelayMs = 10000
  } = options;

  return Math.min(initialDelayMs * Math.pow(backoffMultiplier, attempt), maxDelayMs);
}

/**
 * 재시도 가능한 에러인 동안 deadline까지 fn을 반복 실행
 * 재시도 불가 에러는 즉시 던지고, deadline 초과 시 마지막 에러를 던짐
 */
export async function retryUntilDeadline<T>(
  fn: (attempt: number) => Promise<T>,
  options: DeadlineRetryOptions
): Promise<T> {
  const now = options.now ?? Date.now;
  const wait = options.sleep ?? sleep;
  const deadline = now() + options.timeoutMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!options.isRetryable(error)) {
        throw error;
      }

      const remaining = deadline - now();
      if (remaining <= 0) {
        throw error;
      }

      const delay = Math.min(calculateBackoffDelay(attempt, options), remaining);
      options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}
