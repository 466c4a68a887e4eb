// src/dispatch/domain/Conversation.ts

/**
 * Conversation model
 * ------------------
 * A conversation is an ordered, append-only sequence of turns. The model
 * sees the whole sequence (after the system prompt) on every call.
 */

export type ToolCallRequest = {
  /**
   * Provider-assigned id; the matching tool turn echoes it back.
   */
  id: string;
  name: string;

  /**
   * Raw JSON text exactly as the model produced it.
   */
  arguments: string;
};

export type UserTurn = {
  role: 'user';
  content: string;
};

export type AssistantTurn = {
  role: 'assistant';
  content: string | null;
  toolCalls: ToolCallRequest[];
};

export type ToolTurn = {
  role: 'tool';
  toolCallId: string;
  name: string;
  content: string;
  isError: boolean;
};

export type ConversationTurn = UserTurn | AssistantTurn | ToolTurn;

export class ConversationHistory {
  private readonly turns: ConversationTurn[] = [];

  public append(...turns: ConversationTurn[]): void {
    for (const turn of turns) {
      this.turns.push(freezeTurn(turn));
    }
  }

  /**
   * Snapshot of the turns so far. Later appends do not show up in it.
   */
  public toArray(): readonly ConversationTurn[] {
    return [...this.turns];
  }

  public get length(): number {
    return this.turns.length;
  }
}

function freezeTurn(turn: ConversationTurn): ConversationTurn {
  if (turn.role === 'assistant') {
    return Object.freeze({
      ...turn,
      toolCalls: turn.toolCalls.map((call) => Object.freeze({ ...call })),
    });
  }
  return Object.freeze({ ...turn });
}
