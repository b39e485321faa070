export class TimeoutError extends Error {
  override readonly name = 'TimeoutError';

  constructor(readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
  }
}

export class OperationCancelledError extends Error {
  override readonly name = 'OperationCancelledError';

  constructor(message = 'Operation cancelled by caller') {
    super(message);
  }
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCancelledError();
  }
}

/**
 * Runs `operation` with a child signal that aborts when `timeoutMs` elapses or
 * when `parentSignal` aborts. The returned promise settles on whichever comes
 * first, so an operation that ignores its signal still cannot outlive the
 * deadline.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal,
): Promise<T> {
  throwIfCancelled(parentSignal);

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const interrupted = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(timeoutMs);
      reject(error);
      controller.abort(error);
    }, timeoutMs);
    onParentAbort = () => {
      const error = new OperationCancelledError();
      reject(error);
      controller.abort(error);
    };
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });
  });

  try {
    return await Promise.race([operation(controller.signal), interrupted]);
  } finally {
    clearTimeout(timer);
    if (onParentAbort) {
      parentSignal?.removeEventListener('abort', onParentAbort);
    }
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new OperationCancelledError());
  }
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
