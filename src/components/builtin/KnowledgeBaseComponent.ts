// src/components/builtin/KnowledgeBaseComponent.ts

import type {
  CapabilityArguments,
  Component,
  ComponentContext,
  ComponentDefinition,
} from '../domain/Capability';
import { InvalidArgumentsError } from '../domain/CapabilityErrors';

const ACTIONS = ['add', 'get', 'update', 'delete', 'list'] as const;

/**
 * In-memory key/value store the model can use as scratch memory.
 * Contents live as long as the process.
 */
export class KnowledgeBaseComponent implements Component {
  private readonly data = new Map<string, string>();

  public constructor(private readonly context: ComponentContext) {}

  public initialize(): void {
    this.data.clear();
  }

  public invoke(args: CapabilityArguments): unknown {
    const key = typeof args.key === 'string' ? args.key : undefined;
    const value = typeof args.value === 'string' ? args.value : undefined;

    switch (args.action) {
      case 'add':
        this.data.set(requireKey('add', key), requireValue('add', value));
        return true;
      case 'update':
        this.data.set(requireKey('update', key), requireValue('update', value));
        return true;
      case 'get':
        return this.data.get(requireKey('get', key)) ?? null;
      case 'delete':
        return this.data.delete(requireKey('delete', key));
      case 'list':
        return Array.from(this.data.keys());
      default:
        throw new InvalidArgumentsError('Invalid arguments for "knowledge_base"', [
          `"action" must be one of: ${ACTIONS.join(', ')}.`,
        ]);
    }
  }

  public terminate(): void {
    this.context.logger.debug({ keys: this.data.size }, 'Knowledge base shutting down');
    this.data.clear();
  }
}

function requireKey(action: string, key: string | undefined): string {
  if (!key) {
    throw new InvalidArgumentsError('Invalid arguments for "knowledge_base"', [
      `"key" is required for action "${action}".`,
    ]);
  }
  return key;
}

function requireValue(action: string, value: string | undefined): string {
  if (value === undefined) {
    throw new InvalidArgumentsError('Invalid arguments for "knowledge_base"', [
      `"value" is required for action "${action}".`,
    ]);
  }
  return value;
}

export const knowledgeBaseComponent: ComponentDefinition = {
  descriptor: {
    name: 'knowledge_base',
    description:
      'Stores and retrieves text by key. "get" returns the value or null, "delete" returns ' +
      'whether the key existed, "list" returns all keys.',
    parameters: [
      { name: 'action', type: 'string', required: true, enum: [...ACTIONS] },
      { name: 'key', type: 'string', required: false, description: 'Required except for "list".' },
      { name: 'value', type: 'string', required: false, description: 'Required for "add" and "update".' },
    ],
  },
  create: (context) => new KnowledgeBaseComponent(context),
};
