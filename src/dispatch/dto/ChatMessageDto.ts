/**
 * ChatMessageDto
 *
 * Body of POST /v1/sessions/:sessionId/messages.
 */
export interface ChatMessageDto {
  text: string;
}

export const MAX_MESSAGE_LENGTH = 32_000;

export class ChatMessageDtoValidationError extends Error {
  public readonly issues: string[];

  public constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'ChatMessageDtoValidationError';
    this.issues = issues;
  }
}

/**
 * Returns a trimmed DTO or throws ChatMessageDtoValidationError.
 */
export function parseChatMessageDto(payload: unknown): ChatMessageDto {
  if (payload === null || typeof payload !== 'object' || Array.isArray(payload)) {
    throw new ChatMessageDtoValidationError('Invalid chat message payload', [
      'Payload must be a JSON object.',
    ]);
  }

  const issues: string[] = [];
  const text: unknown = 'text' in payload ? payload.text : undefined;

  if (typeof text !== 'string' || text.trim().length === 0) {
    issues.push('"text" must be a non-empty string.');
  } else if (text.length > MAX_MESSAGE_LENGTH) {
    issues.push(`"text" must be at most ${MAX_MESSAGE_LENGTH} characters.`);
  }

  if (issues.length > 0 || typeof text !== 'string') {
    throw new ChatMessageDtoValidationError('Invalid chat message payload', issues);
  }

  return { text: text.trim() };
}
