// src/dispatch/infrastructure/OpenAIModelClient.ts

/**
 * OpenAIModelClient
 * -----------------
 * IModelClient over the OpenAI Chat Completions API (or any compatible
 * endpoint via baseURL).
 *
 * The SDK's own retries are disabled; DispatchBridge retries through the
 * rate limiter instead. SDK errors are mapped to ModelTransportError with a
 * transient flag, and user aborts to OperationCancelledError.
 */

import OpenAI, { APIConnectionError, APIError, APIUserAbortError } from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';

import { OperationCancelledError } from '../../shared/errors/OperationCancelledError';
import type { ConversationTurn } from '../domain/Conversation';
import type { IModelClient, ModelRequest, ModelResponse } from '../domain/ModelClient';
import { ModelTransportError } from '../domain/DispatchErrors';

/**
 * The slice of the SDK this client calls. Tests inject a fake.
 */
export type ChatCompletionsClient = {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<ChatCompletion>;
    };
  };
};

export type OpenAIModelClientOptions = {
  model: string;
  temperature?: number;
};

const TRANSIENT_STATUSES = new Set([408, 409, 429]);

export function createOpenAIClient(params: {
  apiKey: string;
  baseUrl?: string;
  timeoutMs: number;
}): OpenAI {
  return new OpenAI({
    apiKey: params.apiKey,
    ...(params.baseUrl ? { baseURL: params.baseUrl } : {}),
    timeout: params.timeoutMs,
    maxRetries: 0,
  });
}

export class OpenAIModelClient implements IModelClient {
  public constructor(
    private readonly client: ChatCompletionsClient,
    private readonly options: OpenAIModelClientOptions,
  ) {}

  public async complete(request: ModelRequest, signal?: AbortSignal): Promise<ModelResponse> {
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.options.model,
      messages: toMessages(request),
      ...(request.tools.length > 0 ? { tools: [...request.tools] } : {}),
      ...(this.options.temperature !== undefined ? { temperature: this.options.temperature } : {}),
    };

    let completion: ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(body, signal ? { signal } : undefined);
    } catch (err) {
      throw classifyError(err, signal);
    }

    const choice = completion.choices[0];
    if (!choice) {
      throw new ModelTransportError('Model returned no choices', { transient: false });
    }

    const toolCalls = (choice.message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    }));

    return { text: choice.message.content, toolCalls };
  }
}

export function toMessages(request: ModelRequest): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [];

  if (request.systemPrompt) {
    messages.push({ role: 'system', content: request.systemPrompt });
  }

  for (const turn of request.turns) {
    messages.push(toMessage(turn));
  }

  return messages;
}

function toMessage(turn: ConversationTurn): ChatCompletionMessageParam {
  switch (turn.role) {
    case 'user':
      return { role: 'user', content: turn.content };
    case 'tool':
      return { role: 'tool', tool_call_id: turn.toolCallId, content: turn.content };
    case 'assistant':
      if (turn.toolCalls.length === 0) {
        return { role: 'assistant', content: turn.content };
      }
      return {
        role: 'assistant',
        content: turn.content,
        tool_calls: turn.toolCalls.map((call) => ({
          id: call.id,
          type: 'function' as const,
          function: { name: call.name, arguments: call.arguments },
        })),
      };
  }
}

/**
 * Map an SDK failure to the error taxonomy the dispatch bridge understands.
 */
export function classifyError(err: unknown, signal?: AbortSignal): Error {
  if (err instanceof APIUserAbortError || signal?.aborted) {
    return new OperationCancelledError();
  }

  // Connection failures and client-side timeouts carry no status.
  if (err instanceof APIConnectionError) {
    return new ModelTransportError(err.message, { transient: true, cause: err });
  }

  if (err instanceof APIError) {
    const status = err.status;
    const transient =
      status === undefined || TRANSIENT_STATUSES.has(status) || status >= 500;
    return new ModelTransportError(err.message, {
      transient,
      ...(status !== undefined ? { status } : {}),
      cause: err,
    });
  }

  const message = err instanceof Error ? err.message : String(err);
  return new ModelTransportError(message, { transient: false, cause: err });
}
