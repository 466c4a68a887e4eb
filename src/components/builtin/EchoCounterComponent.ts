// src/components/builtin/EchoCounterComponent.ts

import type {
  CapabilityArguments,
  Component,
  ComponentContext,
  ComponentDefinition,
} from '../domain/Capability';

const INITIAL_COUNT = 100;

/**
 * Minimal stateful component: echoes a message and counts invocations.
 */
export class EchoCounterComponent implements Component {
  private counter = 0;

  public constructor(private readonly context: ComponentContext) {}

  public initialize(): void {
    this.counter = INITIAL_COUNT;
  }

  public invoke(args: CapabilityArguments): string {
    this.counter += 1;
    return `Processed: '${String(args.message)}' with count ${this.counter}`;
  }

  public terminate(): void {
    this.context.logger.debug({ counter: this.counter }, 'Echo counter shutting down');
  }
}

export const echoCounterComponent: ComponentDefinition = {
  descriptor: {
    name: 'echo_counter',
    description: 'Processes a message and reports how many messages have been processed.',
    parameters: [{ name: 'message', type: 'string', required: true }],
  },
  create: (context) => new EchoCounterComponent(context),
};
