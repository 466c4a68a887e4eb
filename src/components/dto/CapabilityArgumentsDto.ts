// src/components/dto/CapabilityArgumentsDto.ts

/**
 * Capability arguments validator
 *
 * Boundary check between the model's tool-call arguments and component code.
 * Component logic never runs with arguments that fail this check.
 *
 * - Missing required parameters, unknown parameters, type mismatches and
 *   values outside a declared enum are all reported together.
 * - Optional parameters sent as null are treated as absent.
 */

import type {
  CapabilityArguments,
  CapabilityDescriptor,
  ParameterDescriptor,
} from '../domain/Capability';
import { InvalidArgumentsError } from '../domain/CapabilityErrors';
import { isRecord } from './guards';

export function validateCapabilityArguments(
  descriptor: CapabilityDescriptor,
  payload: unknown,
): CapabilityArguments {
  const issues: string[] = [];
  const message = `Invalid arguments for "${descriptor.name}"`;

  const input = payload === undefined || payload === null ? {} : payload;

  if (!isRecord(input)) {
    throw new InvalidArgumentsError(message, ['Arguments must be a JSON object.']);
  }

  const declared = new Set(descriptor.parameters.map((p) => p.name));
  for (const key of Object.keys(input)) {
    if (!declared.has(key)) {
      issues.push(`"${key}" is not a parameter of "${descriptor.name}".`);
    }
  }

  const args: CapabilityArguments = {};

  for (const parameter of descriptor.parameters) {
    const value = input[parameter.name];

    if (value === undefined || value === null) {
      if (parameter.required) {
        issues.push(`"${parameter.name}" is required.`);
      }
      continue;
    }

    const typeIssue = checkType(parameter, value);
    if (typeIssue) {
      issues.push(typeIssue);
      continue;
    }

    if (parameter.enum && !(typeof value === 'string' && parameter.enum.includes(value))) {
      issues.push(`"${parameter.name}" must be one of: ${parameter.enum.join(', ')}.`);
      continue;
    }

    args[parameter.name] = value;
  }

  if (issues.length > 0) {
    throw new InvalidArgumentsError(message, issues);
  }

  return args;
}

/**
 * Parse the raw JSON argument string a model sends with a tool call.
 */
export function parseToolCallArguments(capability: string, raw: string): unknown {
  if (raw.trim().length === 0) return {};

  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new InvalidArgumentsError(`Invalid arguments for "${capability}"`, [
      `Arguments are not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }
}

function checkType(parameter: ParameterDescriptor, value: unknown): string | undefined {
  switch (parameter.type) {
    case 'string':
      return typeof value === 'string' ? undefined : `"${parameter.name}" must be a string.`;
    case 'number':
      return typeof value === 'number' && Number.isFinite(value)
        ? undefined
        : `"${parameter.name}" must be a number.`;
    case 'integer':
      return Number.isInteger(value) ? undefined : `"${parameter.name}" must be an integer.`;
    case 'boolean':
      return typeof value === 'boolean' ? undefined : `"${parameter.name}" must be a boolean.`;
    case 'object':
      return isRecord(value) ? undefined : `"${parameter.name}" must be an object.`;
    case 'array':
      return Array.isArray(value) ? undefined : `"${parameter.name}" must be an array.`;
    default:
      return undefined;
  }
}
