/**
 * Errors raised by the dispatch bridge and the model client.
 *
 * Unlike component errors, these abort the current turn.
 */

export type ModelTransportErrorOptions = {
  transient: boolean;
  status?: number;
  cause?: unknown;
};

/**
 * One failed model call. Only surfaced to callers wrapped in
 * ModelUnavailableError.
 */
export class ModelTransportError extends Error {
  public readonly code = 'MODEL_TRANSPORT_ERROR';
  public readonly transient: boolean;
  public readonly status: number | undefined;

  public constructor(message: string, options: ModelTransportErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'ModelTransportError';
    this.transient = options.transient;
    this.status = options.status;
  }
}

export class ModelUnavailableError extends Error {
  public readonly code = 'MODEL_UNAVAILABLE';
  public readonly attempts: number;

  public constructor(attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Model call failed after ${attempts} attempt(s): ${reason}`, { cause });
    this.name = 'ModelUnavailableError';
    this.attempts = attempts;
  }
}

export class ToolLoopExceededError extends Error {
  public readonly code = 'TOOL_LOOP_EXCEEDED';
  public readonly maxToolRounds: number;

  public constructor(maxToolRounds: number) {
    super(`Model kept requesting tools after ${maxToolRounds} round(s)`);
    this.name = 'ToolLoopExceededError';
    this.maxToolRounds = maxToolRounds;
  }
}

export class TurnInProgressError extends Error {
  public readonly code = 'TURN_IN_PROGRESS';
  public readonly sessionId: string;

  public constructor(sessionId: string) {
    super(`Session ${sessionId} is already processing a message`);
    this.name = 'TurnInProgressError';
    this.sessionId = sessionId;
  }
}

export class SessionNotFoundError extends Error {
  public readonly code = 'SESSION_NOT_FOUND';
  public readonly sessionId: string;

  public constructor(sessionId: string) {
    super(`Session ${sessionId} does not exist`);
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

/**
 * Every open session is mid-turn, so none can be evicted for a new one.
 */
export class SessionLimitError extends Error {
  public readonly code = 'SESSION_LIMIT_REACHED';
  public readonly maxSessions: number;

  public constructor(maxSessions: number) {
    super(`All ${maxSessions} sessions are busy; try again later`);
    this.name = 'SessionLimitError';
    this.maxSessions = maxSessions;
  }
}
