// src/http/middleware/errorHandler.ts

/**
 * Global error handler
 *
 * - Maps the runtime's error taxonomy onto HTTP statuses
 * - Converts unknown errors into HTTP 500
 * - Always returns the standard error envelope with the correlationId
 */

import type { NextFunction, Request, Response } from 'express';

import { buildErrorEnvelope } from '../../shared/errors/errorEnvelope';
import { OperationCancelledError } from '../../shared/errors/OperationCancelledError';
import { logger } from '../../shared/logging/Logger';
import { ChatMessageDtoValidationError } from '../../dispatch/dto/ChatMessageDto';
import {
  ModelUnavailableError,
  SessionLimitError,
  SessionNotFoundError,
  ToolLoopExceededError,
  TurnInProgressError,
} from '../../dispatch/domain/DispatchErrors';
import { RateLimitTimeoutError } from '../../ratelimit/domain/RateLimitErrors';
import { getCorrelationId } from './correlationId';

type KnownError = {
  status: number;
  code: string;
  message: string;
  issues?: string[];
};

function mapKnownError(err: unknown): KnownError | undefined {
  if (err instanceof ChatMessageDtoValidationError) {
    return { status: 400, code: 'VALIDATION_ERROR', message: err.message, issues: err.issues };
  }
  // express.json() rejects unparseable bodies with a 4xx `status`.
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return { status: 400, code: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' };
  }
  if (err instanceof SessionNotFoundError) {
    return { status: 404, code: err.code, message: err.message };
  }
  if (err instanceof TurnInProgressError) {
    return { status: 409, code: err.code, message: err.message };
  }
  if (err instanceof ToolLoopExceededError) {
    return { status: 422, code: err.code, message: err.message };
  }
  if (err instanceof RateLimitTimeoutError) {
    return { status: 429, code: err.code, message: err.message };
  }
  if (err instanceof ModelUnavailableError) {
    return { status: 502, code: err.code, message: err.message };
  }
  if (err instanceof SessionLimitError) {
    return { status: 503, code: err.code, message: err.message };
  }
  if (err instanceof OperationCancelledError) {
    return { status: 503, code: err.code, message: err.message };
  }
  return undefined;
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): Response {
  const correlationId = getCorrelationId(req);
  const known = mapKnownError(err);

  if (known) {
    logger.debug({ correlationId, code: known.code, status: known.status }, 'Request failed');

    return res.status(known.status).json(
      buildErrorEnvelope({
        code: known.code,
        message: known.message,
        correlationId,
        ...(known.issues ? { issues: known.issues } : {}),
      }),
    );
  }

  logger.error({ correlationId, err }, 'Unhandled error in request pipeline');

  return res.status(500).json(
    buildErrorEnvelope({
      code: 'INTERNAL_SERVER_ERROR',
      message: 'An unexpected error occurred.',
      correlationId,
    }),
  );
}
