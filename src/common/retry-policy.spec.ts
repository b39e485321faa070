import { OperationCancelledError } from './abort';
import { RetryPolicy, RetryPolicyOptions } from './retry-policy';

class TransientError extends Error {}

function createPolicy(overrides: Partial<RetryPolicyOptions> = {}) {
  const waits: number[] = [];
  const policy = new RetryPolicy(
    {
      maxAttempts: 2,
      backoff: 'exponential',
      baseDelayMs: 100,
      maxDelayMs: 1000,
      isRetryable: (error) => error instanceof TransientError,
      ...overrides,
    },
    async (ms) => {
      waits.push(ms);
    },
  );
  return { policy, waits };
}

describe('RetryPolicy', () => {
  describe('delayBeforeRetry', () => {
    it('doubles the delay for exponential backoff and caps it at the ceiling', () => {
      const { policy } = createPolicy({ maxDelayMs: 500 });
      expect([1, 2, 3, 4, 5].map((n) => policy.delayBeforeRetry(n))).toEqual([100, 200, 400, 500, 500]);
    });

    it('keeps the base delay for fixed backoff', () => {
      const { policy } = createPolicy({ backoff: 'fixed', baseDelayMs: 300 });
      expect([1, 2, 3].map((n) => policy.delayBeforeRetry(n))).toEqual([300, 300, 300]);
    });
  });

  it('returns the first successful result without waiting', async () => {
    const { policy, waits } = createPolicy();
    const operation = jest.fn().mockResolvedValue('ok');

    await expect(policy.execute(operation)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(waits).toEqual([]);
  });

  it('retries a retryable failure once and then succeeds', async () => {
    const { policy, waits } = createPolicy();
    const operation = jest.fn().mockRejectedValueOnce(new TransientError('slow')).mockResolvedValueOnce('second time');
    const onRetry = jest.fn();

    await expect(policy.execute(operation, { onRetry })).resolves.toBe('second time');
    expect(operation).toHaveBeenNthCalledWith(1, 1);
    expect(operation).toHaveBeenNthCalledWith(2, 2);
    expect(waits).toEqual([100]);
    expect(onRetry).toHaveBeenCalledWith(expect.any(TransientError), 1, 100);
  });

  it('surfaces the last error once attempts are exhausted', async () => {
    const { policy } = createPolicy({ maxAttempts: 3 });
    const operation = jest.fn().mockRejectedValue(new TransientError('still slow'));

    await expect(policy.execute(operation)).rejects.toThrow('still slow');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('never retries an error the predicate rejects', async () => {
    const { policy, waits } = createPolicy({ maxAttempts: 5 });
    const operation = jest.fn().mockRejectedValue(new Error('fatal'));

    await expect(policy.execute(operation)).rejects.toThrow('fatal');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(waits).toEqual([]);
  });

  it('stops before the next attempt when the signal has aborted', async () => {
    const controller = new AbortController();
    const { policy } = createPolicy();
    const operation = jest.fn().mockImplementation(async () => {
      controller.abort();
      throw new TransientError('slow');
    });

    await expect(policy.execute(operation, { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError,
    );
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('rejects a non-positive attempt budget', () => {
    expect(() => createPolicy({ maxAttempts: 0 })).toThrow(RangeError);
  });
});
