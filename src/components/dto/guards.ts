// src/components/dto/guards.ts

/**
 * Small runtime type-guards shared by the component DTO parsers.
 */

export type Callable = (...args: unknown[]) => unknown;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isCallable(value: unknown): value is Callable {
  return typeof value === 'function';
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}
