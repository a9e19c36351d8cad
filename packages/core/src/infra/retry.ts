/**
 * Retry utility with exponential backoff.
 */

export interface RetryOptions {
  /** Total number of attempts, including the first one. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  shouldRetry: (err: Error, attempt: number) => boolean;
  onRetry?: (err: Error, attempt: number, delayMs: number) => void;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  shouldRetry: () => true,
};

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: Error,
  ) {
    super(`Gave up after ${attempts} attempts: ${lastError.message}`);
    this.name = "RetryExhaustedError";
  }
}

export function getRetryDelay(
  attempt: number,
  options: Pick<RetryOptions, "initialDelayMs" | "backoffMultiplier" | "maxDelayMs">,
): number {
  const delay = options.initialDelayMs * options.backoffMultiplier ** attempt;
  return Math.min(delay, options.maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry and exponential backoff.
 * The delay after attempt `n` (0-based) is `initialDelayMs * multiplier^n`.
 * Errors rejected by `shouldRetry` propagate immediately; once every attempt
 * has failed a RetryExhaustedError wraps the last failure.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: Partial<RetryOptions>,
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const maxAttempts = Math.max(1, opts.maxAttempts);

  let lastError: Error | undefined;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));

      if (!opts.shouldRetry(error, attempt)) {
        throw error;
      }

      lastError = error;
      if (attempt === maxAttempts - 1) break;

      const delay = getRetryDelay(attempt, opts);
      opts.onRetry?.(error, attempt, delay);
      await sleep(delay);
    }
  }

  throw new RetryExhaustedError(
    maxAttempts,
    lastError ?? new Error("Retry exhausted with no error"),
  );
}
