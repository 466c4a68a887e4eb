import { ManagedComponent } from '../../src/components/application/ManagedComponent';
import type { Component, ComponentDefinition } from '../../src/components/domain/Capability';
import {
  CapabilityExecutionError,
  InitializationError,
  InvalidArgumentsError,
  LifecycleStateError,
} from '../../src/components/domain/CapabilityErrors';
import { logger } from '../../src/shared/logging/Logger';

type Hooks = {
  events: string[];
  initialize?: () => Promise<void>;
  invoke?: (args: Record<string, unknown>) => Promise<unknown>;
  terminate?: () => Promise<void>;
};

function build(hooks: Hooks, invokeTimeoutMs?: number): ManagedComponent {
  const definition: ComponentDefinition = {
    descriptor: {
      name: 'echo_counter',
      description: 'Echoes.',
      parameters: [{ name: 'message', type: 'string', required: true }],
    },
    create: () => instance,
  };

  const instance: Component = {
    initialize: async () => {
      hooks.events.push('initialize');
      await hooks.initialize?.();
    },
    invoke: async (args) => {
      hooks.events.push('invoke');
      return hooks.invoke ? hooks.invoke(args) : `echo ${String(args.message)}`;
    },
    terminate: async () => {
      hooks.events.push('terminate');
      await hooks.terminate?.();
    },
  };

  return new ManagedComponent(definition, instance, {
    logger,
    ...(invokeTimeoutMs !== undefined ? { invokeTimeoutMs } : {}),
  });
}

describe('ManagedComponent lifecycle', () => {
  it('moves Unloaded -> Ready -> Destroyed', async () => {
    const events: string[] = [];
    const component = build({ events });

    expect(component.getState()).toBe('Unloaded');
    await component.initialize();
    expect(component.getState()).toBe('Ready');
    await expect(component.invoke({ message: 'hi' })).resolves.toBe('echo hi');
    await expect(component.terminate()).resolves.toBe(true);
    expect(component.getState()).toBe('Destroyed');
    expect(events).toEqual(['initialize', 'invoke', 'terminate']);
  });

  it('never invokes before initialize or after terminate', async () => {
    const events: string[] = [];
    const component = build({ events });

    await expect(component.invoke({ message: 'early' })).rejects.toBeInstanceOf(LifecycleStateError);

    await component.initialize();
    await component.terminate();

    await expect(component.invoke({ message: 'late' })).rejects.toThrow(
      'Cannot invoke capability "echo_counter" in state Destroyed',
    );
    expect(events).toEqual(['initialize', 'terminate']);
  });

  it('refuses a second initialize', async () => {
    const component = build({ events: [] });

    await component.initialize();
    await expect(component.initialize()).rejects.toBeInstanceOf(LifecycleStateError);
  });

  it('stays Unloaded when initialize fails and can still be terminated once', async () => {
    const events: string[] = [];
    const component = build({
      events,
      initialize: async () => {
        throw new Error('port in use');
      },
    });

    await expect(component.initialize()).rejects.toThrow(
      'Component "echo_counter" failed to initialize: port in use',
    );
    await expect(component.initialize()).rejects.toBeInstanceOf(LifecycleStateError);
    expect(component.getState()).toBe('Unloaded');

    await component.terminate();
    await component.terminate();
    expect(events).toEqual(['initialize', 'terminate']);
  });

  it('wraps initialize failures in InitializationError', async () => {
    const component = build({
      events: [],
      initialize: async () => {
        throw new Error('nope');
      },
    });

    await expect(component.initialize()).rejects.toBeInstanceOf(InitializationError);
  });

  it('reports terminate failures without throwing', async () => {
    const component = build({
      events: [],
      terminate: async () => {
        throw new Error('flush failed');
      },
    });

    await component.initialize();
    await expect(component.terminate()).resolves.toBe(false);
    expect(component.getState()).toBe('Destroyed');
  });
});

describe('ManagedComponent.invoke', () => {
  it('validates arguments before running component logic', async () => {
    const events: string[] = [];
    const component = build({ events });
    await component.initialize();

    await expect(component.invoke({})).rejects.toBeInstanceOf(InvalidArgumentsError);
    expect(events).toEqual(['initialize']);
  });

  it('wraps component failures in CapabilityExecutionError', async () => {
    const component = build({
      events: [],
      invoke: async () => {
        throw new TypeError('bad state');
      },
    });
    await component.initialize();

    await expect(component.invoke({ message: 'x' })).rejects.toThrow(
      new CapabilityExecutionError('echo_counter', 'bad state'),
    );
  });

  it('passes InvalidArgumentsError raised by the component through unchanged', async () => {
    const own = new InvalidArgumentsError('Invalid arguments for "echo_counter"', ['nope']);
    const component = build({
      events: [],
      invoke: async () => {
        throw own;
      },
    });
    await component.initialize();

    await expect(component.invoke({ message: 'x' })).rejects.toBe(own);
  });

  it('fails invocations that exceed the deadline', async () => {
    jest.useFakeTimers();
    const component = build(
      {
        events: [],
        invoke: () => new Promise((resolve) => setTimeout(() => resolve('late'), 5_000)),
      },
      1_000,
    );
    await component.initialize();

    const result = component.invoke({ message: 'x' });
    const assertion = expect(result).rejects.toThrow(
      'Capability "echo_counter" failed: timed out after 1000ms',
    );
    await jest.advanceTimersByTimeAsync(1_000);
    await assertion;
  });
});
