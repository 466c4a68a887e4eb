import { ConversationHistory } from '../../src/dispatch/domain/Conversation';
import { computeBackoffDelay } from '../../src/dispatch/application/backoff';

describe('ConversationHistory', () => {
  it('keeps turns in append order', () => {
    const history = new ConversationHistory();

    history.append({ role: 'user', content: 'hi' });
    history.append(
      {
        role: 'assistant',
        content: null,
        toolCalls: [{ id: 'c1', name: 'echo_counter', arguments: '{}' }],
      },
      { role: 'tool', toolCallId: 'c1', name: 'echo_counter', content: 'ok', isError: false },
    );

    expect(history.length).toBe(3);
    expect(history.toArray().map((turn) => turn.role)).toEqual(['user', 'assistant', 'tool']);
  });

  it('hands out snapshots that later appends do not change', () => {
    const history = new ConversationHistory();
    history.append({ role: 'user', content: 'first' });

    const snapshot = history.toArray();
    history.append({ role: 'user', content: 'second' });

    expect(snapshot).toHaveLength(1);
    expect(history.length).toBe(2);
  });

  it('stores frozen copies of turns', () => {
    const history = new ConversationHistory();
    const toolCalls = [{ id: 'c1', name: 'get_weather', arguments: '{"city":"Paris"}' }];

    history.append({ role: 'assistant', content: null, toolCalls });
    toolCalls.push({ id: 'c2', name: 'get_weather', arguments: '{}' });

    const [turn] = history.toArray();
    expect(Object.isFrozen(turn)).toBe(true);
    expect(turn).toEqual({
      role: 'assistant',
      content: null,
      toolCalls: [{ id: 'c1', name: 'get_weather', arguments: '{"city":"Paris"}' }],
    });
  });
});

describe('computeBackoffDelay', () => {
  const policy = { maxAttempts: 5, initialMs: 100, factor: 2, maxMs: 1_000, jitter: false };

  it('grows exponentially and caps at maxMs', () => {
    expect([1, 2, 3, 4, 5].map((attempt) => computeBackoffDelay(policy, attempt))).toEqual([
      100, 200, 400, 800, 1_000,
    ]);
  });

  it('adds up to 20% jitter', () => {
    const jittered = { ...policy, jitter: true };

    expect(computeBackoffDelay(jittered, 1, () => 0)).toBe(100);
    expect(computeBackoffDelay(jittered, 1, () => 0.5)).toBe(110);
    expect(computeBackoffDelay(jittered, 2, () => 1)).toBe(240);
  });
});
