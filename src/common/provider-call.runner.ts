import { Logger } from '@nestjs/common';
import { CallPolicyConfig } from '../config/app-config';
import { OperationCancelledError, withTimeout } from './abort';
import { classifyProviderError, ProviderError, ProviderKind } from './provider-error';
import { RetryPolicy } from './retry-policy';

/**
 * Timeout, classification and retry for one provider. Each attempt gets its own
 * deadline; only {@link ProviderError}s marked retryable are attempted again.
 */
export class ProviderCallRunner {
  private readonly policy: RetryPolicy;

  constructor(
    private readonly provider: ProviderKind,
    private readonly config: CallPolicyConfig,
    private readonly logger: Logger,
  ) {
    this.policy = RetryPolicy.fromConfig(config, (error) => error instanceof ProviderError && error.retryable);
  }

  run<T>(label: string, operation: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.policy.execute(
      async (attempt) => {
        try {
          return await withTimeout(operation, this.config.timeoutMs, signal);
        } catch (error) {
          if (error instanceof OperationCancelledError || signal?.aborted) {
            throw error instanceof OperationCancelledError ? error : new OperationCancelledError();
          }
          throw this.classify(label, attempt, error);
        }
      },
      {
        signal,
        onRetry: (error, attempt, delayMs) => {
          const kind = error instanceof ProviderError ? error.kind : 'unknown';
          this.logger.warn(
            `${this.provider} ${label} attempt ${attempt}/${this.policy.maxAttempts} failed (${kind}); retrying in ${delayMs}ms`,
          );
        },
      },
    );
  }

  private classify(label: string, attempt: number, error: unknown): ProviderError {
    const classified = classifyProviderError(this.provider, error);
    if (classified.kind === 'unknown') {
      const stack = error instanceof Error ? error.stack : undefined;
      this.logger.error(
        `${this.provider} ${label} failed with an unrecognised error on attempt ${attempt}: ` +
          `status=${classified.status ?? 'n/a'} code=${classified.code ?? 'n/a'} message=${classified.message}`,
        stack,
      );
    }
    return classified;
  }
}
