// src/dispatch/application/DispatchBridge.ts

/**
 * DispatchBridge
 * --------------
 * Owns one conversation and runs the tool loop as an explicit state machine:
 *
 *   AwaitingUserInput -> SendingToModel -> AwaitingModelResponse
 *     -> ProducingTextReply -> AwaitingUserInput
 *     -> ExecutingToolCalls -> SendingToModel (next round)
 *
 * Rules:
 * - Every model attempt (retries included) first takes a rate-limit permit.
 * - Tool failures become error results for the model; they never end the turn.
 * - A reply that still requests tools after `maxToolRounds` executed rounds
 *   ends the turn with ToolLoopExceededError.
 * - Transient transport failures are retried with backoff; anything else, or
 *   running out of attempts, ends the turn with ModelUnavailableError.
 * - One turn at a time per session.
 * - Once cancelled, no further tool call of the round is started.
 */

import { logger as rootLogger, type AppLogger } from '../../shared/logging/Logger';
import { envelopeFromError } from '../../shared/errors/errorEnvelope';
import {
  OperationCancelledError,
  throwIfAborted,
} from '../../shared/errors/OperationCancelledError';
import { sleep as defaultSleep } from '../../shared/async/sleep';

import type { CapabilityDescriptor } from '../../components/domain/Capability';
import { CapabilityExecutionError } from '../../components/domain/CapabilityErrors';
import { parseToolCallArguments } from '../../components/dto/CapabilityArgumentsDto';
import {
  ToolSchemaTranslator,
  type ToolDeclaration,
} from '../../components/application/ToolSchemaTranslator';
import type { IRateLimiter } from '../../ratelimit/domain/Permit';

import {
  ConversationHistory,
  type ConversationTurn,
  type ToolCallRequest,
  type ToolTurn,
} from '../domain/Conversation';
import type { IModelClient, ModelResponse } from '../domain/ModelClient';
import {
  ModelTransportError,
  ModelUnavailableError,
  ToolLoopExceededError,
  TurnInProgressError,
} from '../domain/DispatchErrors';
import { computeBackoffDelay, type RetryPolicy } from './backoff';

export type DispatchState =
  | 'AwaitingUserInput'
  | 'SendingToModel'
  | 'AwaitingModelResponse'
  | 'ProducingTextReply'
  | 'ExecutingToolCalls';

/**
 * What the bridge needs from the registry.
 */
export interface CapabilityCatalog {
  list(): CapabilityDescriptor[];
  lookup(name: string): { invoke(args: unknown): Promise<unknown> };
}

export type DispatchBridgeDeps = {
  sessionId: string;
  catalog: CapabilityCatalog;
  modelClient: IModelClient;
  rateLimiter: IRateLimiter;
  maxToolRounds: number;
  retry: RetryPolicy;
  systemPrompt?: string;
  /**
   * Bound on each permit wait; unset waits as long as it takes.
   */
  maxPermitWaitMs?: number;
  translator?: ToolSchemaTranslator;
  logger?: AppLogger;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export class DispatchBridge {
  public readonly sessionId: string;

  private readonly history = new ConversationHistory();
  private readonly translator: ToolSchemaTranslator;
  private readonly logger: AppLogger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  private state: DispatchState = 'AwaitingUserInput';
  private controller: AbortController | undefined;
  private currentTurn: Promise<string> | undefined;
  private closed = false;

  public constructor(private readonly deps: DispatchBridgeDeps) {
    if (!Number.isInteger(deps.maxToolRounds) || deps.maxToolRounds < 0) {
      throw new Error('DispatchBridge: maxToolRounds must be a non-negative integer');
    }
    if (!Number.isInteger(deps.retry.maxAttempts) || deps.retry.maxAttempts <= 0) {
      throw new Error('DispatchBridge: retry.maxAttempts must be a positive integer');
    }

    this.sessionId = deps.sessionId;
    this.translator = deps.translator ?? new ToolSchemaTranslator();
    this.logger = (deps.logger ?? rootLogger).child({ sessionId: deps.sessionId });
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  public getState(): DispatchState {
    return this.state;
  }

  public getHistory(): readonly ConversationTurn[] {
    return this.history.toArray();
  }

  public isBusy(): boolean {
    return this.controller !== undefined;
  }

  /**
   * Run one turn: send the message, execute any requested tools, and
   * resolve with the model's final text reply.
   */
  public async submitUserMessage(text: string): Promise<string> {
    if (this.closed) {
      throw new OperationCancelledError(`Session ${this.sessionId} is closed`);
    }
    if (this.controller) {
      throw new TurnInProgressError(this.sessionId);
    }

    const controller = new AbortController();
    this.controller = controller;
    this.history.append({ role: 'user', content: text });

    const turn = this.runTurn(controller.signal);
    this.currentTurn = turn;

    try {
      return await turn;
    } catch (err) {
      this.logger.warn({ err }, 'Turn failed');
      throw err;
    } finally {
      this.controller = undefined;
      this.currentTurn = undefined;
      this.state = 'AwaitingUserInput';
    }
  }

  /**
   * Resolves once the running turn, if any, has finished, including any
   * tool invocation still in progress. The turn's outcome is reported to
   * the caller of submitUserMessage, not here.
   */
  public settled(): Promise<void> {
    const turn = this.currentTurn;
    if (!turn) return Promise.resolve();
    return turn.then(
      () => undefined,
      () => undefined,
    );
  }

  /**
   * Abort the running turn, if any. Returns whether one was running.
   */
  public cancel(): boolean {
    const controller = this.controller;
    if (!controller) return false;

    controller.abort();
    this.logger.info('Turn cancelled');
    return true;
  }

  /**
   * Cancel the running turn and refuse further messages.
   */
  public close(): void {
    this.closed = true;
    this.cancel();
  }

  private async runTurn(signal: AbortSignal): Promise<string> {
    let roundsExecuted = 0;

    for (;;) {
      const response = await this.callModel(signal);

      if (response.toolCalls.length === 0) {
        this.state = 'ProducingTextReply';
        const reply = response.text ?? '';
        this.history.append({ role: 'assistant', content: reply, toolCalls: [] });
        this.logger.debug({ rounds: roundsExecuted }, 'Turn completed with text reply');
        return reply;
      }

      if (roundsExecuted >= this.deps.maxToolRounds) {
        throw new ToolLoopExceededError(this.deps.maxToolRounds);
      }

      this.state = 'ExecutingToolCalls';
      const results: ToolTurn[] = [];
      for (const call of response.toolCalls) {
        throwIfAborted(signal);
        results.push(await this.executeToolCall(call));
      }
      throwIfAborted(signal);

      // The tool-call message and its results land together so the history
      // never holds a call without an answer.
      this.history.append(
        { role: 'assistant', content: response.text, toolCalls: response.toolCalls },
        ...results,
      );
      roundsExecuted += 1;
    }
  }

  private async callModel(signal: AbortSignal): Promise<ModelResponse> {
    const { retry } = this.deps;

    for (let attempt = 1; ; attempt += 1) {
      this.state = 'SendingToModel';
      const permit = await this.deps.rateLimiter.acquire({
        signal,
        ...(this.deps.maxPermitWaitMs !== undefined ? { maxWaitMs: this.deps.maxPermitWaitMs } : {}),
      });
      if (permit.waitedMs > 0) {
        this.logger.debug({ waitedMs: permit.waitedMs }, 'Rate-limit permit granted after wait');
      }

      this.state = 'AwaitingModelResponse';
      try {
        return await this.deps.modelClient.complete(
          {
            ...(this.deps.systemPrompt !== undefined ? { systemPrompt: this.deps.systemPrompt } : {}),
            turns: this.history.toArray(),
            tools: this.currentToolSet(),
          },
          signal,
        );
      } catch (err) {
        if (err instanceof OperationCancelledError) throw err;
        throwIfAborted(signal);

        const transient = err instanceof ModelTransportError && err.transient;
        if (!transient || attempt >= retry.maxAttempts) {
          throw new ModelUnavailableError(attempt, err);
        }

        const delayMs = computeBackoffDelay(retry, attempt, this.random);
        this.logger.warn(
          { attempt, maxAttempts: retry.maxAttempts, delayMs, err },
          'Model call failed; retrying',
        );
        await this.sleep(delayMs, signal);
      }
    }
  }

  private currentToolSet(): ToolDeclaration[] {
    return this.translator.toToolSet(this.deps.catalog.list());
  }

  private async executeToolCall(call: ToolCallRequest): Promise<ToolTurn> {
    const base = { role: 'tool' as const, toolCallId: call.id, name: call.name };

    try {
      const component = this.deps.catalog.lookup(call.name);
      const args = parseToolCallArguments(call.name, call.arguments);
      const result = await component.invoke(args);
      const content = serializeToolResult(call.name, result);

      this.logger.info({ capability: call.name }, 'Tool call succeeded');
      return { ...base, content, isError: false };
    } catch (err) {
      this.logger.warn({ capability: call.name, err }, 'Tool call failed');
      return { ...base, content: serializeToolError(err), isError: true };
    }
  }
}

/**
 * Strings go to the model verbatim; everything else as JSON.
 */
export function serializeToolResult(capability: string, result: unknown): string {
  if (typeof result === 'string') return result;

  let json: string | undefined;
  try {
    json = JSON.stringify(result ?? null);
  } catch (err) {
    throw new CapabilityExecutionError(capability, 'result is not JSON-serializable', err);
  }
  if (json === undefined) {
    throw new CapabilityExecutionError(capability, 'result is not JSON-serializable');
  }
  return json;
}

export function serializeToolError(err: unknown): string {
  return JSON.stringify(envelopeFromError(err, 'CAPABILITY_EXECUTION_FAILED'));
}
