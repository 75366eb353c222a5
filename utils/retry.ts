export interface RetryOptions {
  retries: number;
  initialDelayMs: number;
  shouldRetry: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * Runs `operation`, retrying with exponential backoff while `shouldRetry`
 * accepts the failure and attempts remain. The last error is rethrown as is.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  let attempt = 0;
  for (;;) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= options.retries || !options.shouldRetry(error)) {
        throw error;
      }
      const delay = options.initialDelayMs * Math.pow(2, attempt);
      attempt++;
      options.onRetry?.(error, attempt, delay);
      if (delay > 0) {
        await sleep(delay);
      }
    }
  }
}
