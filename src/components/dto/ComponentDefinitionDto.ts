// src/components/dto/ComponentDefinitionDto.ts

/**
 * Component definition parser/validator
 *
 * Component modules are authored independently, so whatever a source hands
 * the registry is validated here before anything is instantiated.
 *
 * - Return a strongly typed, frozen definition or throw a structured error.
 * - Instances produced by the definition's factory are checked too, and
 *   wrapped so the rest of the runtime only ever sees async lifecycle hooks.
 */

import type {
  CapabilityArguments,
  CapabilityDescriptor,
  Component,
  ComponentContext,
  ComponentDefinition,
  ParameterDescriptor,
} from '../domain/Capability';
import { ComponentConformanceError } from '../domain/CapabilityErrors';
import { isCallable, isNonEmptyString, isRecord } from './guards';

export function parseComponentDefinition(origin: string, payload: unknown): ComponentDefinition {
  const issues: string[] = [];

  if (!isRecord(payload)) {
    throw new ComponentConformanceError(origin, ['Definition must be an object.']);
  }

  const descriptor = parseCapabilityDescriptor(payload.descriptor, issues);
  const factory = payload.create;

  if (!isCallable(factory)) {
    issues.push('"create" must be a function.');
  }

  if (issues.length > 0 || !isCallable(factory)) {
    throw new ComponentConformanceError(origin, issues);
  }

  return Object.freeze({
    descriptor,
    create(context: ComponentContext): Component {
      const instance = factory.call(payload, context);
      return parseComponentInstance(`${origin}#${descriptor.name}`, instance);
    },
  });
}

/**
 * Validate a descriptor and return a deep-frozen copy.
 */
export function parseCapabilityDescriptor(
  payload: unknown,
  issues: string[],
): CapabilityDescriptor {
  if (!isRecord(payload)) {
    issues.push('"descriptor" must be an object.');
    return Object.freeze({ name: '', description: '', parameters: Object.freeze([]) });
  }

  const name = payload.name;
  if (!isNonEmptyString(name)) {
    issues.push('"descriptor.name" must be a non-empty string.');
  }

  const description = payload.description;
  if (!isNonEmptyString(description)) {
    issues.push('"descriptor.description" must be a non-empty string.');
  }

  const parameters = parseParameters(payload.parameters, issues);

  return Object.freeze({
    name: isNonEmptyString(name) ? name : '',
    description: isNonEmptyString(description) ? description : '',
    parameters,
  });
}

function parseParameters(payload: unknown, issues: string[]): readonly ParameterDescriptor[] {
  if (payload === undefined) return Object.freeze([]);

  if (!Array.isArray(payload)) {
    issues.push('"descriptor.parameters" must be an array when provided.');
    return Object.freeze([]);
  }

  const seen = new Set<string>();
  const parameters: ParameterDescriptor[] = [];

  payload.forEach((item: unknown, index) => {
    const parameter = parseParameter(item, `descriptor.parameters[${index}]`, issues);
    if (!parameter) return;

    if (seen.has(parameter.name)) {
      issues.push(`Parameter "${parameter.name}" is declared more than once.`);
      return;
    }

    seen.add(parameter.name);
    parameters.push(parameter);
  });

  return Object.freeze(parameters);
}

function parseParameter(
  item: unknown,
  path: string,
  issues: string[],
): ParameterDescriptor | undefined {
  if (!isRecord(item)) {
    issues.push(`"${path}" must be an object.`);
    return undefined;
  }

  const { name, type, required, description } = item;
  const before = issues.length;

  if (!isNonEmptyString(name)) {
    issues.push(`"${path}.name" must be a non-empty string.`);
  }
  if (!isNonEmptyString(type)) {
    issues.push(`"${path}.type" must be a non-empty string.`);
  }
  if (required !== undefined && typeof required !== 'boolean') {
    issues.push(`"${path}.required" must be a boolean when provided.`);
  }
  if (description !== undefined && typeof description !== 'string') {
    issues.push(`"${path}.description" must be a string when provided.`);
  }

  const allowed = parseEnum(item.enum, path, issues);

  if (issues.length > before || !isNonEmptyString(name) || !isNonEmptyString(type)) {
    return undefined;
  }

  return Object.freeze({
    name,
    type,
    required: required === true,
    ...(typeof description === 'string' && description.length > 0 ? { description } : {}),
    ...(allowed ? { enum: allowed } : {}),
  });
}

function parseEnum(payload: unknown, path: string, issues: string[]): readonly string[] | undefined {
  if (payload === undefined) return undefined;

  if (!Array.isArray(payload) || payload.length === 0) {
    issues.push(`"${path}.enum" must be a non-empty array of strings when provided.`);
    return undefined;
  }

  const values: string[] = [];
  for (const value of payload) {
    if (typeof value !== 'string') {
      issues.push(`"${path}.enum" must be a non-empty array of strings when provided.`);
      return undefined;
    }
    values.push(value);
  }

  return Object.freeze(values);
}

/**
 * Check that a factory produced something with the three lifecycle hooks and
 * adapt it to the Component contract.
 */
export function parseComponentInstance(origin: string, instance: unknown): Component {
  if (!isRecord(instance)) {
    throw new ComponentConformanceError(origin, ['Factory must return an object.']);
  }

  const { initialize, invoke, terminate } = instance;
  const issues: string[] = [];

  if (!isCallable(initialize)) issues.push('"initialize" must be a function.');
  if (!isCallable(invoke)) issues.push('"invoke" must be a function.');
  if (!isCallable(terminate)) issues.push('"terminate" must be a function.');

  if (!isCallable(initialize) || !isCallable(invoke) || !isCallable(terminate)) {
    throw new ComponentConformanceError(origin, issues);
  }

  return {
    async initialize(): Promise<void> {
      await initialize.call(instance);
    },
    async invoke(args: CapabilityArguments): Promise<unknown> {
      return invoke.call(instance, args);
    },
    async terminate(): Promise<void> {
      await terminate.call(instance);
    },
  };
}
