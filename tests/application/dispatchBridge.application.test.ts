import { ComponentRegistry } from '../../src/components/application/ComponentRegistry';
import { ManifestComponentSource } from '../../src/components/infrastructure/ManifestComponentSource';
import { DispatchBridge, type DispatchBridgeDeps } from '../../src/dispatch/application/DispatchBridge';
import {
  ModelTransportError,
  ModelUnavailableError,
  ToolLoopExceededError,
  TurnInProgressError,
} from '../../src/dispatch/domain/DispatchErrors';
import type { ToolTurn } from '../../src/dispatch/domain/Conversation';
import { OperationCancelledError } from '../../src/shared/errors/OperationCancelledError';
import {
  NO_JITTER_RETRY,
  ScriptedModelClient,
  UnlimitedRateLimiter,
  defineComponent,
  deferred,
  flushPromises,
  textReply,
  toolCallReply,
  waitForAbort,
  type ScriptStep,
} from '../support/fakes';

type Harness = {
  bridge: DispatchBridge;
  model: ScriptedModelClient;
  limiter: UnlimitedRateLimiter;
  events: string[];
  sleeps: number[];
};

async function createHarness(
  steps: ScriptStep[],
  overrides: Partial<DispatchBridgeDeps> = {},
): Promise<Harness> {
  const events: string[] = [];
  const sleeps: number[] = [];

  const registry = new ComponentRegistry();
  await registry.discover(
    new ManifestComponentSource([
      defineComponent('echo', {
        events,
        parameters: [{ name: 'message', type: 'string', required: true }],
        invoke: (args) => `echo: ${String(args.message)}`,
      }),
      defineComponent('stats', { events, invoke: () => ({ count: 2, tags: ['a'] }) }),
      defineComponent('explode', {
        events,
        invoke: () => {
          throw new Error('kaput');
        },
      }),
    ]),
  );

  const model = new ScriptedModelClient(steps);
  const limiter = new UnlimitedRateLimiter();

  const bridge = new DispatchBridge({
    sessionId: 'sess_test',
    catalog: registry,
    modelClient: model,
    rateLimiter: limiter,
    maxToolRounds: 5,
    retry: NO_JITTER_RETRY,
    systemPrompt: 'Be brief.',
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    ...overrides,
  });

  return { bridge, model, limiter, events, sleeps };
}

function toolTurns(bridge: DispatchBridge): ToolTurn[] {
  return bridge.getHistory().filter((turn): turn is ToolTurn => turn.role === 'tool');
}

describe('DispatchBridge: text replies', () => {
  it('returns plain text and records the exchange', async () => {
    const { bridge, model, limiter } = await createHarness([textReply('Hello there.')]);

    await expect(bridge.submitUserMessage('Hi')).resolves.toBe('Hello there.');

    expect(bridge.getHistory()).toEqual([
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello there.', toolCalls: [] },
    ]);
    expect(bridge.getState()).toBe('AwaitingUserInput');
    expect(limiter.calls).toHaveLength(1);
    expect(model.requests[0].systemPrompt).toBe('Be brief.');
    expect(model.requests[0].tools.map((tool) => tool.function.name)).toEqual([
      'echo',
      'stats',
      'explode',
    ]);
  });

  it('treats an empty model reply as an empty string', async () => {
    const { bridge } = await createHarness([{ text: null, toolCalls: [] }]);
    await expect(bridge.submitUserMessage('Hi')).resolves.toBe('');
  });
});

describe('DispatchBridge: tool calls', () => {
  it('executes a tool call and feeds the result back', async () => {
    const { bridge, model, events } = await createHarness([
      toolCallReply('echo', { message: 'ping' }, 'call_1'),
      textReply('The tool said pong-ish.'),
    ]);

    await expect(bridge.submitUserMessage('Use echo')).resolves.toBe('The tool said pong-ish.');

    expect(bridge.getHistory()).toEqual([
      { role: 'user', content: 'Use echo' },
      {
        role: 'assistant',
        content: null,
        toolCalls: [{ id: 'call_1', name: 'echo', arguments: '{"message":"ping"}' }],
      },
      { role: 'tool', toolCallId: 'call_1', name: 'echo', content: 'echo: ping', isError: false },
      { role: 'assistant', content: 'The tool said pong-ish.', toolCalls: [] },
    ]);
    expect(model.requests).toHaveLength(2);
    expect(model.requests[1].turns).toHaveLength(3);
    expect(events).toContain('echo:invoke');
  });

  it('serializes non-string results as JSON', async () => {
    const { bridge } = await createHarness([toolCallReply('stats', {}), textReply('done')]);

    await bridge.submitUserMessage('stats please');

    expect(toolTurns(bridge)[0].content).toBe('{"count":2,"tags":["a"]}');
  });

  it('executes several calls from one reply in request order', async () => {
    const { bridge } = await createHarness([
      {
        text: 'Working on it.',
        toolCalls: [
          { id: 'c1', name: 'echo', arguments: '{"message":"one"}' },
          { id: 'c2', name: 'echo', arguments: '{"message":"two"}' },
        ],
      },
      textReply('done'),
    ]);

    await bridge.submitUserMessage('twice');

    expect(toolTurns(bridge).map((turn) => [turn.toolCallId, turn.content])).toEqual([
      ['c1', 'echo: one'],
      ['c2', 'echo: two'],
    ]);
  });

  it('answers an unknown capability with a NOT_FOUND result and continues', async () => {
    const { bridge } = await createHarness([
      toolCallReply('summon_dragon', {}),
      textReply('I cannot do that.'),
    ]);

    await expect(bridge.submitUserMessage('Summon a dragon')).resolves.toBe('I cannot do that.');

    const [result] = toolTurns(bridge);
    expect(result.isError).toBe(true);
    expect(JSON.parse(result.content)).toEqual({
      error: { code: 'NOT_FOUND', message: 'Capability "summon_dragon" is not registered' },
    });
  });

  it('answers malformed JSON arguments with INVALID_ARGUMENTS without invoking', async () => {
    const { bridge, events } = await createHarness([
      toolCallReply('echo', '{"message": '),
      textReply('Sorry.'),
    ]);

    await bridge.submitUserMessage('broken');

    const parsed = JSON.parse(toolTurns(bridge)[0].content);
    expect(parsed.error.code).toBe('INVALID_ARGUMENTS');
    expect(parsed.error.message).toBe('Invalid arguments for "echo"');
    expect(events).not.toContain('echo:invoke');
  });

  it('reports argument validation issues to the model', async () => {
    const { bridge } = await createHarness([toolCallReply('echo', {}), textReply('Sorry.')]);

    await bridge.submitUserMessage('missing');

    expect(JSON.parse(toolTurns(bridge)[0].content)).toEqual({
      error: {
        code: 'INVALID_ARGUMENTS',
        message: 'Invalid arguments for "echo"',
        issues: ['"message" is required.'],
      },
    });
  });

  it('reports component failures and keeps the turn alive', async () => {
    const { bridge } = await createHarness([
      toolCallReply('explode', {}),
      textReply('That tool failed.'),
    ]);

    await expect(bridge.submitUserMessage('boom')).resolves.toBe('That tool failed.');

    expect(JSON.parse(toolTurns(bridge)[0].content)).toEqual({
      error: { code: 'CAPABILITY_EXECUTION_FAILED', message: 'Capability "explode" failed: kaput' },
    });
  });
});

describe('DispatchBridge: tool loop bound', () => {
  it('aborts a turn that keeps requesting tools', async () => {
    const loop = Array.from({ length: 10 }, (_v, i) =>
      toolCallReply('echo', { message: `round ${i}` }, `call_${i}`),
    );
    const { bridge, model, events } = await createHarness(loop, { maxToolRounds: 2 });

    const turn = bridge.submitUserMessage('loop forever');
    await expect(turn).rejects.toBeInstanceOf(ToolLoopExceededError);
    await expect(turn).rejects.toThrow('Model kept requesting tools after 2 round(s)');

    expect(model.requests).toHaveLength(3);
    expect(events.filter((event) => event === 'echo:invoke')).toHaveLength(2);
    // user + two rounds of (assistant tool call + tool result); the third request is dropped
    expect(bridge.getHistory().map((turn) => turn.role)).toEqual([
      'user',
      'assistant',
      'tool',
      'assistant',
      'tool',
    ]);
    expect(bridge.getState()).toBe('AwaitingUserInput');
  });

  it('with maxToolRounds 0 accepts text but no tool calls', async () => {
    const { bridge } = await createHarness([toolCallReply('echo', { message: 'x' })], {
      maxToolRounds: 0,
    });

    await expect(bridge.submitUserMessage('go')).rejects.toBeInstanceOf(ToolLoopExceededError);
  });
});

describe('DispatchBridge: transport failures', () => {
  const transient = (): ModelTransportError =>
    new ModelTransportError('503 Service Unavailable', { transient: true, status: 503 });

  it('retries transient failures with backoff, taking a permit per attempt', async () => {
    const { bridge, limiter, sleeps } = await createHarness([
      transient(),
      transient(),
      textReply('Finally.'),
    ]);

    await expect(bridge.submitUserMessage('hello')).resolves.toBe('Finally.');

    expect(sleeps).toEqual([100, 200]);
    expect(limiter.calls).toHaveLength(3);
  });

  it('gives up with ModelUnavailableError once attempts are exhausted', async () => {
    const { bridge, sleeps } = await createHarness([transient(), transient(), transient()]);

    const turn = bridge.submitUserMessage('hello');
    await expect(turn).rejects.toBeInstanceOf(ModelUnavailableError);
    await expect(turn).rejects.toMatchObject({ attempts: 3, code: 'MODEL_UNAVAILABLE' });
    expect(sleeps).toEqual([100, 200]);
  });

  it('does not retry non-transient failures', async () => {
    const { bridge, sleeps, model } = await createHarness([
      new ModelTransportError('401 Unauthorized', { transient: false, status: 401 }),
      textReply('unreachable'),
    ]);

    await expect(bridge.submitUserMessage('hello')).rejects.toMatchObject({ attempts: 1 });
    expect(sleeps).toEqual([]);
    expect(model.remaining).toBe(1);
  });

  it('treats unexpected errors as non-transient', async () => {
    const { bridge } = await createHarness([new TypeError('undefined is not a function')]);

    await expect(bridge.submitUserMessage('hello')).rejects.toThrow(
      'Model call failed after 1 attempt(s): undefined is not a function',
    );
  });

  it('keeps the user message in history when the turn fails', async () => {
    const { bridge } = await createHarness([
      new ModelTransportError('bad request', { transient: false, status: 400 }),
      textReply('Second try works.'),
    ]);

    await expect(bridge.submitUserMessage('first')).rejects.toBeInstanceOf(ModelUnavailableError);
    await expect(bridge.submitUserMessage('second')).resolves.toBe('Second try works.');

    expect(bridge.getHistory().map((turn) => turn.role)).toEqual(['user', 'user', 'assistant']);
  });
});

describe('DispatchBridge: concurrency and cancellation', () => {
  it('rejects a second message while a turn is running', async () => {
    const gate = deferred<void>();
    const { bridge } = await createHarness([
      async () => {
        await gate.promise;
        return textReply('first done');
      },
    ]);

    const first = bridge.submitUserMessage('first');
    expect(bridge.isBusy()).toBe(true);
    await expect(bridge.submitUserMessage('second')).rejects.toBeInstanceOf(TurnInProgressError);

    gate.resolve();
    await expect(first).resolves.toBe('first done');
    expect(bridge.isBusy()).toBe(false);
  });

  it('cancel() aborts an in-flight model call', async () => {
    const { bridge } = await createHarness([waitForAbort, textReply('after cancel')]);

    const turn = bridge.submitUserMessage('slow');
    await flushPromises();
    expect(bridge.getState()).toBe('AwaitingModelResponse');

    expect(bridge.cancel()).toBe(true);
    await expect(turn).rejects.toBeInstanceOf(OperationCancelledError);
    expect(bridge.getState()).toBe('AwaitingUserInput');

    await expect(bridge.submitUserMessage('again')).resolves.toBe('after cancel');
  });

  it('cancel() aborts a retry backoff', async () => {
    const { bridge } = await createHarness(
      [new ModelTransportError('timeout', { transient: true })],
      {
        sleep: (_ms, signal) =>
          new Promise<void>((_resolve, reject) => {
            signal?.addEventListener('abort', () => reject(new OperationCancelledError()));
          }),
      },
    );

    const turn = bridge.submitUserMessage('slow');
    await flushPromises();
    bridge.cancel();

    await expect(turn).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('starts no further tool call of the round once cancelled', async () => {
    const events: string[] = [];
    const gate = deferred<void>();
    const registry = new ComponentRegistry();
    await registry.discover(
      new ManifestComponentSource([
        defineComponent('slow', {
          events,
          invoke: async () => {
            await gate.promise;
            return 'slow done';
          },
        }),
        defineComponent('side_effect', { events }),
      ]),
    );

    const bridge = new DispatchBridge({
      sessionId: 'sess_cancel',
      catalog: registry,
      modelClient: new ScriptedModelClient([
        {
          text: null,
          toolCalls: [
            { id: 'c1', name: 'slow', arguments: '{}' },
            { id: 'c2', name: 'side_effect', arguments: '{}' },
          ],
        },
      ]),
      rateLimiter: new UnlimitedRateLimiter(),
      maxToolRounds: 5,
      retry: NO_JITTER_RETRY,
    });

    const turn = bridge.submitUserMessage('do both');
    const cancelled = expect(turn).rejects.toBeInstanceOf(OperationCancelledError);
    await flushPromises();
    expect(bridge.getState()).toBe('ExecutingToolCalls');

    bridge.cancel();
    gate.resolve();
    await cancelled;

    expect(events).toEqual(['slow:initialize', 'side_effect:initialize', 'slow:invoke']);
    expect(bridge.getHistory().map((entry) => entry.role)).toEqual(['user']);
  });

  it('settled() resolves once the running turn has finished', async () => {
    const gate = deferred<void>();
    const { bridge } = await createHarness([
      async () => {
        await gate.promise;
        return textReply('finished');
      },
    ]);

    await expect(bridge.settled()).resolves.toBeUndefined();

    const turn = bridge.submitUserMessage('wait');
    let settled = false;
    const done = bridge.settled().then(() => {
      settled = true;
    });
    await flushPromises();
    expect(settled).toBe(false);

    gate.resolve();
    await done;
    await expect(turn).resolves.toBe('finished');
  });

  it('returns false from cancel() when idle', async () => {
    const { bridge } = await createHarness([]);
    expect(bridge.cancel()).toBe(false);
  });

  it('refuses messages after close()', async () => {
    const { bridge } = await createHarness([textReply('unused')]);
    bridge.close();

    await expect(bridge.submitUserMessage('hi')).rejects.toThrow('Session sess_test is closed');
  });

  it('passes the permit wait bound to the rate limiter', async () => {
    const { bridge, limiter } = await createHarness([textReply('ok')], { maxPermitWaitMs: 250 });

    await bridge.submitUserMessage('hi');

    expect(limiter.calls[0].maxWaitMs).toBe(250);
    expect(limiter.calls[0].signal).toBeInstanceOf(AbortSignal);
  });
});
