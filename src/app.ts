/**
 * Express application setup for the agent runtime.
 *
 * This module:
 * - Creates and configures the Express 5 app instance.
 * - Registers global middleware (correlation id, JSON parsing, request logging).
 * - Exposes a healthcheck endpoint for monitoring.
 * - Mounts capability and session routes when a runtime is supplied.
 */
import express, { Application, NextFunction, Request, Response } from 'express';

import { config } from './shared/config/Config';
import { logger } from './shared/logging/Logger';
import { correlationIdMiddleware, getCorrelationId } from './http/middleware/correlationId';
import { errorHandler } from './http/middleware/errorHandler';
import { notFound } from './http/middleware/notFound';
import { createCapabilityRoutes, type CapabilityCatalogPort } from './http/routes/capabilityRoutes';
import { createSessionRoutes, type SessionRuntimePort } from './http/routes/sessionRoutes';

export type AppRuntimePort = CapabilityCatalogPort & SessionRuntimePort;

export type AppDeps = {
  runtime?: AppRuntimePort;
};

export function createApp(deps: AppDeps = {}): Application {
  const app = express();

  // Before body parsing so JSON parse errors still get an id
  app.use(correlationIdMiddleware);
  app.use(express.json());

  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.debug(
      { method: req.method, path: req.path, correlationId: getCorrelationId(req) },
      'Incoming request',
    );
    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      service: config.serviceName,
      timestamp: new Date().toISOString(),
    });
  });

  if (deps.runtime) {
    app.use(createCapabilityRoutes(deps.runtime));
    app.use(createSessionRoutes(deps.runtime));
  }

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
