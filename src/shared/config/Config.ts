/**
 * Runtime configuration for the agent runtime service.
 *
 * This centralises environment variables and provides
 * typed access throughout the codebase.
 */
import dotenv from 'dotenv';

import { ConfigurationError } from './ConfigurationError';

dotenv.config();

export type AppEnv = 'development' | 'test' | 'production';

export interface ModelConfig {
  name: string;
  /**
   * Optional override for OpenAI-compatible endpoints.
   */
  baseUrl?: string;
  timeoutMs: number;
  systemPrompt: string;
}

export interface RateLimitConfig {
  maxRequests: number;
  windowMs: number;
  /**
   * Upper bound on how long a turn waits for a permit. Unset means wait forever.
   */
  maxWaitMs?: number;
}

export interface RetryConfig {
  maxAttempts: number;
  initialMs: number;
  factor: number;
  maxMs: number;
  jitter: boolean;
}

export interface DispatchConfig {
  maxToolRounds: number;
  /**
   * Open sessions kept in memory; the least recently used idle one is
   * evicted when a new session would exceed it.
   */
  maxSessions: number;
  toolTimeoutMs?: number;
  retry: RetryConfig;
}

export interface ShellConfig {
  /**
   * Registers the run_shell_command built-in. Off unless explicitly enabled.
   */
  enabled: boolean;
  timeoutMs: number;
}

export interface AppConfig {
  env: AppEnv;
  port: number;
  serviceName: string;
  serviceVersion: string;
  model: ModelConfig;
  rateLimit: RateLimitConfig;
  dispatch: DispatchConfig;
  shell: ShellConfig;
  /**
   * Extra directory scanned for component modules at startup.
   */
  componentsDir?: string;
}

const DEFAULT_PORT = 4000;

export const DEFAULT_SYSTEM_PROMPT =
  'You are an assistant running inside a component runtime. ' +
  'Use the available tools when they help you answer, and explain tool failures plainly.';

function parseEnv(raw: string | undefined): AppEnv {
  return raw === 'production' || raw === 'test' ? raw : 'development';
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const value = raw ? Number(raw) : fallback;
  if (!Number.isInteger(value) || value <= 0) {
    return fallback;
  }
  return value;
}

function parseOptionalPositiveInt(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim().length === 0) return undefined;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : undefined;
}

function parsePositiveNumber(raw: string | undefined, fallback: number): number {
  const value = raw ? Number(raw) : fallback;
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return value;
}

function parseFlag(raw: string | undefined): boolean {
  const value = raw?.trim().toLowerCase();
  return value === 'true' || value === '1' || value === 'yes';
}

function readOptionalString(raw: string | undefined): string | undefined {
  return raw !== undefined && raw.trim().length > 0 ? raw.trim() : undefined;
}

/**
 * Build configuration from environment variables with sane defaults.
 * Invalid numbers fall back to their default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const baseUrl = readOptionalString(env.MODEL_BASE_URL);
  const maxWaitMs = parseOptionalPositiveInt(env.RATE_LIMIT_MAX_WAIT_MS);
  const toolTimeoutMs = parseOptionalPositiveInt(env.TOOL_TIMEOUT_MS);
  const componentsDir = readOptionalString(env.COMPONENTS_DIR);

  return {
    env: parseEnv(env.NODE_ENV),
    port: parsePositiveInt(env.PORT, DEFAULT_PORT),
    serviceName: env.SERVICE_NAME || 'agent-runtime',
    serviceVersion: env.SERVICE_VERSION || '0.1.0',
    model: {
      name: env.MODEL_NAME || 'gpt-4o-mini',
      ...(baseUrl ? { baseUrl } : {}),
      timeoutMs: parsePositiveInt(env.MODEL_TIMEOUT_MS, 60_000),
      systemPrompt: readOptionalString(env.SYSTEM_PROMPT) ?? DEFAULT_SYSTEM_PROMPT,
    },
    rateLimit: {
      maxRequests: parsePositiveInt(env.RATE_LIMIT_MAX_REQUESTS, 15),
      windowMs: parsePositiveInt(env.RATE_LIMIT_WINDOW_MS, 60_000),
      ...(maxWaitMs !== undefined ? { maxWaitMs } : {}),
    },
    dispatch: {
      maxToolRounds: parsePositiveInt(env.MAX_TOOL_ROUNDS, 5),
      maxSessions: parsePositiveInt(env.MAX_SESSIONS, 1_000),
      ...(toolTimeoutMs !== undefined ? { toolTimeoutMs } : {}),
      retry: {
        maxAttempts: parsePositiveInt(env.MODEL_RETRY_MAX_ATTEMPTS, 3),
        initialMs: parsePositiveInt(env.MODEL_RETRY_INITIAL_MS, 500),
        factor: parsePositiveNumber(env.MODEL_RETRY_FACTOR, 2),
        maxMs: parsePositiveInt(env.MODEL_RETRY_MAX_MS, 8_000),
        jitter: true,
      },
    },
    shell: {
      enabled: parseFlag(env.SHELL_COMMANDS_ENABLED),
      timeoutMs: parsePositiveInt(env.SHELL_COMMAND_TIMEOUT_MS, 10_000),
    },
    ...(componentsDir ? { componentsDir } : {}),
  };
}

export const config: AppConfig = loadConfig();

/**
 * API credential for the model provider.
 * Throws if not configured to fail fast on startup.
 */
export function getModelApiKey(env: NodeJS.ProcessEnv = process.env): string {
  const key = env.OPENAI_API_KEY;

  if (!key || key.trim().length === 0) {
    throw new ConfigurationError('OPENAI_API_KEY is not configured', 'OPENAI_API_KEY');
  }

  return key;
}
