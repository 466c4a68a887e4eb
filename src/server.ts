/**
 * HTTP server entrypoint for the agent runtime.
 *
 * This file:
 * - Builds the runtime (fails fast on configuration errors)
 * - Creates the Express app and starts listening
 * - Shuts down gracefully: stop accepting requests, then tear the runtime down
 */
import { createServer } from 'http';

import { createApp } from './app';
import { buildRuntimeDeps } from './bootstrap/buildDeps';
import { config } from './shared/config/Config';
import { ConfigurationError } from './shared/config/ConfigurationError';
import { logger } from './shared/logging/Logger';

async function main(): Promise<void> {
  const deps = await buildRuntimeDeps();
  const app = createApp({ runtime: deps.runtime });
  const server = createServer(app);

  server.listen(config.port, () => {
    logger.info({ port: config.port, env: config.env }, 'Agent runtime started');
  });

  let stopping = false;
  const stop = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down gracefully...');

    server.close(() => {
      logger.info('HTTP server closed');
      deps
        .shutdown()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Runtime shutdown failed');
          process.exit(1);
        });
    });
    // Unblock server.close() by ending in-flight turns.
    deps.runtime.cancelAllTurns();
  };

  process.on('SIGTERM', () => stop('SIGTERM'));
  process.on('SIGINT', () => stop('SIGINT'));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    logger.fatal({ variable: err.variable }, err.message);
  } else {
    logger.fatal({ err }, 'Agent runtime failed to start');
  }
  process.exit(1);
});
