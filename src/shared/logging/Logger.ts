/**
 * Shared pino logger for the runtime.
 *
 * Modules log a context object first and a message second. Sessions and
 * components work with child loggers bound to their id or capability name.
 * Development output goes through pino-pretty; tests stay silent unless
 * LOG_LEVEL asks otherwise.
 */
import pino, { type Logger as PinoLogger } from 'pino';

import { config, type AppEnv } from '../config/Config';

export type AppLogger = PinoLogger;

export function resolveLogLevel(env: AppEnv, override?: string): string {
  const requested = override?.trim();
  if (requested) return requested;
  if (env === 'test') return 'silent';
  return env === 'production' ? 'info' : 'debug';
}

export const logger: AppLogger = pino({
  level: resolveLogLevel(config.env, process.env.LOG_LEVEL),
  base: {
    service: config.serviceName,
    version: config.serviceVersion,
    env: config.env,
  },
  ...(config.env === 'development'
    ? {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l', ignore: 'pid,hostname' },
        },
      }
    : {}),
});
