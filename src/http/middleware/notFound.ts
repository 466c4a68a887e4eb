// src/http/middleware/notFound.ts

import type { Request, Response } from 'express';
import { buildErrorEnvelope } from '../../shared/errors/errorEnvelope';
import { getCorrelationId } from './correlationId';

export function notFound(req: Request, res: Response): Response {
  return res.status(404).json(
    buildErrorEnvelope({
      code: 'NOT_FOUND',
      message: `Route ${req.method} ${req.path} not found`,
      correlationId: getCorrelationId(req),
    }),
  );
}
