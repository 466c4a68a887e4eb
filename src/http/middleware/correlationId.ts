// src/http/middleware/correlationId.ts

/**
 * Correlation ID middleware
 *
 * Rules:
 * 1) Prefer header: x-correlation-id
 * 2) Otherwise generate a UUID
 *
 * Outputs:
 * - req.correlationId (typed via the global augmentation below)
 * - response header x-correlation-id
 */

import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';

declare global {
  namespace Express {
    interface Request {
      correlationId?: string;
    }
  }
}

export const CORRELATION_HEADER = 'x-correlation-id';

export function correlationIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const headerId = req.header(CORRELATION_HEADER);

  const correlationId =
    typeof headerId === 'string' && headerId.trim().length > 0 ? headerId.trim() : randomUUID();

  req.correlationId = correlationId;
  res.setHeader(CORRELATION_HEADER, correlationId);

  next();
}

export function getCorrelationId(req: Request): string | undefined {
  return req.correlationId;
}
