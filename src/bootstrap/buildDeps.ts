// src/bootstrap/buildDeps.ts

/**
 * Composition Root
 * ----------------
 * The only place that wires infrastructure and application services.
 *
 * - Reads the model credential first, so a missing key fails before any
 *   component is initialized.
 * - Builds ONE rate limiter and ONE registry, shared by every session.
 * - Loads built-in components (plus run_shell_command when enabled), then
 *   the optional components directory.
 */

import { config as defaultConfig, getModelApiKey, type AppConfig } from '../shared/config/Config';
import { logger } from '../shared/logging/Logger';

import { ComponentRegistry } from '../components/application/ComponentRegistry';
import { ToolSchemaTranslator } from '../components/application/ToolSchemaTranslator';
import { builtinComponents } from '../components/builtin';
import { createShellCommandComponent } from '../components/builtin/ShellCommandComponent';
import type { IComponentSource } from '../components/domain/ComponentSource';
import { DirectoryComponentSource } from '../components/infrastructure/DirectoryComponentSource';
import { ManifestComponentSource } from '../components/infrastructure/ManifestComponentSource';

import { RateLimiter } from '../ratelimit/application/RateLimiter';

import { Runtime } from '../dispatch/application/Runtime';
import type { IModelClient } from '../dispatch/domain/ModelClient';
import {
  OpenAIModelClient,
  createOpenAIClient,
} from '../dispatch/infrastructure/OpenAIModelClient';

export type RuntimeDeps = {
  runtime: Runtime;

  /**
   * Called during graceful shutdown: cancels sessions, terminates components.
   */
  shutdown: () => Promise<void>;
};

export type BuildRuntimeOptions = {
  config?: AppConfig;
  env?: NodeJS.ProcessEnv;
  /**
   * Replaces the OpenAI-backed client (tests, alternative providers).
   */
  modelClient?: IModelClient;
  /**
   * Replaces the default component sources.
   */
  sources?: IComponentSource[];
};

export async function buildRuntimeDeps(options: BuildRuntimeOptions = {}): Promise<RuntimeDeps> {
  const appConfig = options.config ?? defaultConfig;

  const modelClient =
    options.modelClient ??
    new OpenAIModelClient(
      createOpenAIClient({
        apiKey: getModelApiKey(options.env),
        timeoutMs: appConfig.model.timeoutMs,
        ...(appConfig.model.baseUrl ? { baseUrl: appConfig.model.baseUrl } : {}),
      }),
      { model: appConfig.model.name },
    );

  const translator = new ToolSchemaTranslator();
  const rateLimiter = new RateLimiter({
    maxRequests: appConfig.rateLimit.maxRequests,
    windowMs: appConfig.rateLimit.windowMs,
  });
  const registry = new ComponentRegistry({
    translator,
    ...(appConfig.dispatch.toolTimeoutMs !== undefined
      ? { invokeTimeoutMs: appConfig.dispatch.toolTimeoutMs }
      : {}),
  });

  const runtime = new Runtime({
    registry,
    rateLimiter,
    modelClient,
    translator,
    maxToolRounds: appConfig.dispatch.maxToolRounds,
    maxSessions: appConfig.dispatch.maxSessions,
    retry: appConfig.dispatch.retry,
    systemPrompt: appConfig.model.systemPrompt,
    ...(appConfig.rateLimit.maxWaitMs !== undefined
      ? { maxPermitWaitMs: appConfig.rateLimit.maxWaitMs }
      : {}),
  });

  const sources = options.sources ?? defaultSources(appConfig);
  const registered = await runtime.discover(sources);

  logger.info(
    {
      capabilities: registered.map((descriptor) => descriptor.name),
      model: appConfig.model.name,
      rateLimit: appConfig.rateLimit,
    },
    'Runtime ready',
  );

  return {
    runtime,
    shutdown: () => runtime.shutdown(),
  };
}

function defaultSources(appConfig: AppConfig): IComponentSource[] {
  const builtins = appConfig.shell.enabled
    ? [...builtinComponents, createShellCommandComponent({ timeoutMs: appConfig.shell.timeoutMs })]
    : builtinComponents;

  const sources: IComponentSource[] = [new ManifestComponentSource(builtins, 'builtin')];
  if (appConfig.componentsDir) {
    sources.push(new DirectoryComponentSource(appConfig.componentsDir));
  }
  return sources;
}
