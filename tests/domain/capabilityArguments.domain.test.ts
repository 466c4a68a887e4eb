import {
  parseToolCallArguments,
  validateCapabilityArguments,
} from '../../src/components/dto/CapabilityArgumentsDto';
import type { CapabilityDescriptor } from '../../src/components/domain/Capability';
import { InvalidArgumentsError } from '../../src/components/domain/CapabilityErrors';

const descriptor: CapabilityDescriptor = {
  name: 'log_message',
  description: 'Logs a message.',
  parameters: [
    { name: 'message', type: 'string', required: true },
    { name: 'level', type: 'string', required: false, enum: ['info', 'critical'] },
    { name: 'repeat', type: 'integer', required: false },
    { name: 'tags', type: 'array', required: false },
  ],
};

function issuesOf(payload: unknown): string[] {
  try {
    validateCapabilityArguments(descriptor, payload);
  } catch (err) {
    if (err instanceof InvalidArgumentsError) return err.issues;
    throw err;
  }
  throw new Error('expected InvalidArgumentsError');
}

describe('validateCapabilityArguments', () => {
  it('returns declared arguments in parameter order', () => {
    const args = validateCapabilityArguments(descriptor, {
      tags: ['a'],
      message: 'X',
      level: 'critical',
    });

    expect(args).toEqual({ message: 'X', level: 'critical', tags: ['a'] });
    expect(Object.keys(args)).toEqual(['message', 'level', 'tags']);
  });

  it('treats null optionals as absent', () => {
    expect(validateCapabilityArguments(descriptor, { message: 'X', level: null })).toEqual({
      message: 'X',
    });
  });

  it('reports missing, unknown, mistyped and out-of-enum values together', () => {
    expect(issuesOf({ level: 'loud', repeat: 1.5, colour: 'red' })).toEqual([
      '"colour" is not a parameter of "log_message".',
      '"message" is required.',
      '"level" must be one of: info, critical.',
      '"repeat" must be an integer.',
    ]);
  });

  it('rejects non-object arguments', () => {
    expect(issuesOf(['X'])).toEqual(['Arguments must be a JSON object.']);
  });

  it('accepts no arguments for a capability without required parameters', () => {
    const ping: CapabilityDescriptor = { name: 'ping', description: 'Ping.', parameters: [] };
    expect(validateCapabilityArguments(ping, undefined)).toEqual({});
  });
});

describe('parseToolCallArguments', () => {
  it('parses JSON text', () => {
    expect(parseToolCallArguments('log_message', '{"message":"X"}')).toEqual({ message: 'X' });
  });

  it('treats blank text as no arguments', () => {
    expect(parseToolCallArguments('ping', '  ')).toEqual({});
  });

  it('raises InvalidArgumentsError for malformed JSON', () => {
    expect(() => parseToolCallArguments('log_message', '{"message":')).toThrow(
      InvalidArgumentsError,
    );
  });
});
