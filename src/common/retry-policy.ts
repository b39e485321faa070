import { BackoffShape, CallPolicyConfig } from '../config/app-config';
import { sleep, throwIfCancelled } from './abort';

export interface RetryPolicyOptions {
  maxAttempts: number;
  backoff: BackoffShape;
  baseDelayMs: number;
  maxDelayMs: number;
  isRetryable: (error: unknown) => boolean;
}

export interface RetryHooks {
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export type Wait = (ms: number, signal?: AbortSignal) => Promise<void>;

export class RetryPolicy {
  constructor(
    private readonly options: RetryPolicyOptions,
    private readonly wait: Wait = sleep,
  ) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
  }

  static fromConfig(config: CallPolicyConfig, isRetryable: (error: unknown) => boolean): RetryPolicy {
    return new RetryPolicy({
      maxAttempts: config.maxAttempts,
      backoff: config.backoff,
      baseDelayMs: config.baseDelayMs,
      maxDelayMs: config.maxDelayMs,
      isRetryable,
    });
  }

  get maxAttempts(): number {
    return this.options.maxAttempts;
  }

  /** Delay before the `retryNumber`-th retry (1-based). */
  delayBeforeRetry(retryNumber: number): number {
    const { backoff, baseDelayMs, maxDelayMs } = this.options;
    const delay = backoff === 'exponential' ? baseDelayMs * 2 ** (retryNumber - 1) : baseDelayMs;
    return Math.min(delay, maxDelayMs);
  }

  async execute<T>(operation: (attempt: number) => Promise<T>, hooks: RetryHooks = {}): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      throwIfCancelled(hooks.signal);
      try {
        return await operation(attempt);
      } catch (error) {
        if (attempt >= this.options.maxAttempts || !this.options.isRetryable(error)) {
          throw error;
        }
        const delayMs = this.delayBeforeRetry(attempt);
        hooks.onRetry?.(error, attempt, delayMs);
        await this.wait(delayMs, hooks.signal);
      }
    }
  }
}
