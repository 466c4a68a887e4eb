// src/dispatch/domain/ModelClient.ts

import type { ToolDeclaration } from '../../components/application/ToolSchemaTranslator';
import type { ConversationTurn, ToolCallRequest } from './Conversation';

export type ModelRequest = {
  systemPrompt?: string;
  turns: readonly ConversationTurn[];
  tools: readonly ToolDeclaration[];
};

/**
 * A model reply is either text, tool-call requests, or (rarely) both.
 * An empty `toolCalls` list means the reply is final.
 */
export type ModelResponse = {
  text: string | null;
  toolCalls: ToolCallRequest[];
};

/**
 * Port to the language model provider.
 *
 * Implementations must:
 * - reject with ModelTransportError for provider/transport failures,
 *   flagging the ones worth retrying as transient
 * - reject with OperationCancelledError when the signal aborts
 * - never retry on their own (the dispatch bridge owns retries, so that
 *   every attempt goes through the rate limiter)
 */
export interface IModelClient {
  complete(request: ModelRequest, signal?: AbortSignal): Promise<ModelResponse>;
}
