import { OperationCancelledError } from '../errors/OperationCancelledError';

/**
 * Promise-based delay that rejects with OperationCancelledError when the
 * signal aborts before the delay elapses.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationCancelledError());
      return;
    }

    const onAbort = (): void => {
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
