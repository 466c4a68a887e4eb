// src/shared/errors/errorEnvelope.ts

/**
 * The one failure shape this runtime emits.
 *
 * HTTP error responses carry it as the body. Failed tool calls carry it,
 * serialized, as the tool result content, so the model sees the same
 * `code` / `message` / `issues` fields a client would.
 */

export type ErrorEnvelopeFields = {
  code: string;
  message: string;
  correlationId?: string;
  issues?: string[];
  details?: unknown;
};

export type ErrorEnvelope = {
  error: ErrorEnvelopeFields;
};

export function buildErrorEnvelope(fields: ErrorEnvelopeFields): ErrorEnvelope {
  return {
    error: {
      code: fields.code,
      message: fields.message,
      ...(fields.correlationId ? { correlationId: fields.correlationId } : {}),
      ...(fields.issues ? { issues: fields.issues } : {}),
      ...(fields.details !== undefined ? { details: fields.details } : {}),
    },
  };
}

/**
 * Envelope for an arbitrary thrown value. Reads the `code` and `issues`
 * our error classes carry; anything without a string code gets
 * `fallbackCode`.
 */
export function envelopeFromError(err: unknown, fallbackCode: string): ErrorEnvelope {
  if (!(err instanceof Error)) {
    return buildErrorEnvelope({ code: fallbackCode, message: String(err) });
  }

  const code = 'code' in err && typeof err.code === 'string' ? err.code : fallbackCode;
  const issues =
    'issues' in err && Array.isArray(err.issues)
      ? err.issues.filter((issue: unknown): issue is string => typeof issue === 'string')
      : [];

  return buildErrorEnvelope({
    code,
    message: err.message,
    ...(issues.length > 0 ? { issues } : {}),
  });
}
