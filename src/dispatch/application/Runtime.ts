// src/dispatch/application/Runtime.ts

/**
 * Runtime
 * -------
 * The one context object built at startup. It owns the component registry
 * and the rate limiter, and hands out conversation sessions that share both.
 *
 * Open sessions are capped at `maxSessions`. Creating one past the cap
 * evicts the least recently used idle session; if every session is
 * mid-turn, creation fails with SessionLimitError.
 *
 * shutdown() cancels every session and waits for in-flight turns to
 * settle, then releases queued permit waiters and terminates every
 * component. It is idempotent.
 */

import { randomUUID } from 'crypto';

import { logger as rootLogger, type AppLogger } from '../../shared/logging/Logger';
import type { RetryPolicy } from './backoff';
import type { CapabilityDescriptor } from '../../components/domain/Capability';
import type { IComponentSource } from '../../components/domain/ComponentSource';
import type { ComponentRegistry } from '../../components/application/ComponentRegistry';
import {
  ToolSchemaTranslator,
  type ToolDeclaration,
} from '../../components/application/ToolSchemaTranslator';
import type { RateLimiter } from '../../ratelimit/application/RateLimiter';
import type { IModelClient } from '../domain/ModelClient';
import { SessionLimitError, SessionNotFoundError } from '../domain/DispatchErrors';
import { DispatchBridge } from './DispatchBridge';

export const DEFAULT_MAX_SESSIONS = 1_000;

export type RuntimeOptions = {
  registry: ComponentRegistry;
  rateLimiter: Pick<RateLimiter, 'acquire' | 'dispose'>;
  modelClient: IModelClient;
  maxToolRounds: number;
  retry: RetryPolicy;
  systemPrompt?: string;
  maxPermitWaitMs?: number;
  translator?: ToolSchemaTranslator;
  logger?: AppLogger;
  createSessionId?: () => string;
  maxSessions?: number;
  /**
   * Test hooks forwarded to every session.
   */
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export type ConversationSession = DispatchBridge;

export class Runtime {
  private readonly sessions = new Map<string, DispatchBridge>();
  private readonly translator: ToolSchemaTranslator;
  private readonly logger: AppLogger;
  private readonly createSessionId: () => string;
  private readonly maxSessions: number;
  private shuttingDown: Promise<void> | undefined;

  public constructor(private readonly options: RuntimeOptions) {
    this.translator = options.translator ?? new ToolSchemaTranslator();
    this.logger = options.logger ?? rootLogger;
    this.createSessionId = options.createSessionId ?? (() => `sess_${randomUUID().replace(/-/g, '')}`);
    this.maxSessions = options.maxSessions ?? DEFAULT_MAX_SESSIONS;

    if (!Number.isInteger(this.maxSessions) || this.maxSessions <= 0) {
      throw new Error('Runtime: maxSessions must be a positive integer');
    }
  }

  /**
   * Load components from each source in order. Sources listed first win
   * name collisions.
   */
  public async discover(sources: readonly IComponentSource[]): Promise<CapabilityDescriptor[]> {
    const registered: CapabilityDescriptor[] = [];
    for (const source of sources) {
      registered.push(...(await this.options.registry.discover(source)));
    }
    return registered;
  }

  public listCapabilities(): CapabilityDescriptor[] {
    return this.options.registry.list();
  }

  public listTools(): ToolDeclaration[] {
    return this.translator.toToolSet(this.options.registry.list());
  }

  public createSession(): ConversationSession {
    if (this.shuttingDown) {
      throw new Error('Runtime is shutting down');
    }

    if (this.sessions.size >= this.maxSessions) {
      this.evictIdleSession();
    }

    const sessionId = this.createSessionId();
    const { options } = this;

    const session = new DispatchBridge({
      sessionId,
      catalog: options.registry,
      modelClient: options.modelClient,
      rateLimiter: options.rateLimiter,
      maxToolRounds: options.maxToolRounds,
      retry: options.retry,
      translator: this.translator,
      logger: this.logger,
      ...(options.systemPrompt !== undefined ? { systemPrompt: options.systemPrompt } : {}),
      ...(options.maxPermitWaitMs !== undefined ? { maxPermitWaitMs: options.maxPermitWaitMs } : {}),
      ...(options.random ? { random: options.random } : {}),
      ...(options.sleep ? { sleep: options.sleep } : {}),
    });

    this.sessions.set(sessionId, session);
    this.logger.info({ sessionId }, 'Session created');
    return session;
  }

  /**
   * Look a session up and mark it as recently used.
   */
  public getSession(sessionId: string): ConversationSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    // Map iteration order doubles as least-recently-used order.
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, session);
    return session;
  }

  /**
   * Cancel the session's running turn and forget it.
   */
  public closeSession(sessionId: string): void {
    const session = this.getSession(sessionId);
    session.close();
    this.sessions.delete(sessionId);
    this.logger.info({ sessionId }, 'Session closed');
  }

  /**
   * Abort every running turn but keep the sessions open.
   */
  public cancelAllTurns(): number {
    let cancelled = 0;
    for (const session of this.sessions.values()) {
      if (session.cancel()) cancelled += 1;
    }
    return cancelled;
  }

  public get sessionCount(): number {
    return this.sessions.size;
  }

  public shutdown(): Promise<void> {
    if (!this.shuttingDown) {
      this.shuttingDown = this.doShutdown();
    }
    return this.shuttingDown;
  }

  private evictIdleSession(): void {
    for (const [sessionId, session] of this.sessions) {
      if (session.isBusy()) continue;

      session.close();
      this.sessions.delete(sessionId);
      this.logger.info({ sessionId, maxSessions: this.maxSessions }, 'Idle session evicted');
      return;
    }
    throw new SessionLimitError(this.maxSessions);
  }

  private async doShutdown(): Promise<void> {
    const sessions = Array.from(this.sessions.values());
    for (const session of sessions) {
      session.close();
    }
    this.sessions.clear();

    // Components stay Ready until every running tool call has returned.
    await Promise.allSettled(sessions.map((session) => session.settled()));

    this.options.rateLimiter.dispose();
    await this.options.registry.teardown();

    this.logger.info({ sessions: sessions.length }, 'Runtime shut down');
  }
}
