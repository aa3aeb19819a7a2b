import { BackendCallError } from './aiClient.js';
import * as logger from './logger.js';

export type RetryPolicyOptions = {
  /** Total attempts, including the first */
  maxAttempts: number;
  /** Delay before retry n is `baseDelayMs * n` */
  baseDelayMs: number;
  /** Multiplier applied when the backend reports a quota / rate limit */
  quotaMultiplier?: number;
  /** Upper bound for a single delay */
  maxDelayMs?: number;
  /** Injectable for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export class RetryExhaustedError extends Error {
  constructor(readonly attempts: number, readonly lastError: unknown) {
    super(`Failed after ${attempts} attempts: ${describeError(lastError)}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Retry/backoff schedule around backend calls.
 *
 * Every failure is retried until `maxAttempts`; quota errors wait longer.
 * An aborted signal stops the loop immediately and rethrows the abort reason.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly quotaMultiplier: number;
  private readonly maxDelayMs: number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.baseDelayMs = Math.max(0, options.baseDelayMs);
    this.quotaMultiplier = options.quotaMultiplier ?? 5;
    this.maxDelayMs = options.maxDelayMs ?? 60000;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Delay before the retry that follows failed attempt `attempt` (1-based).
   */
  delayFor(attempt: number, error: unknown): number {
    const quota = error instanceof BackendCallError && error.quota;
    const delay = this.baseDelayMs * attempt * (quota ? this.quotaMultiplier : 1);
    return Math.min(delay, this.maxDelayMs);
  }

  async execute<T>(
    fn: (attempt: number) => Promise<T>,
    options: { signal?: AbortSignal; label?: string } = {}
  ): Promise<T> {
    const { signal, label = 'backend call' } = options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      signal?.throwIfAborted();
      try {
        return await fn(attempt);
      } catch (error) {
        if (signal?.aborted) {
          throw signal.reason;
        }
        lastError = error;
        logger.warn(`${label} attempt ${attempt}/${this.maxAttempts} failed`, {
          error: describeError(error),
        });
        if (attempt < this.maxAttempts) {
          await this.sleep(this.delayFor(attempt, error), signal);
        }
      }
    }

    throw new RetryExhaustedError(this.maxAttempts, lastError);
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
