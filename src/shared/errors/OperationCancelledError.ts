/**
 * Raised when a caller aborts an in-flight wait (rate-limit permit,
 * model call or retry backoff), e.g. because the session was closed.
 */
export class OperationCancelledError extends Error {
  public readonly code = 'CANCELLED';

  public constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'OperationCancelledError';
  }
}

/**
 * Throw if the signal has already been aborted.
 */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new OperationCancelledError();
  }
}
