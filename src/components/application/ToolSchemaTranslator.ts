// src/components/application/ToolSchemaTranslator.ts

/**
 * ToolSchemaTranslator
 * --------------------
 * Pure application-layer mapping from capability descriptors to the tool
 * declarations the model provider expects (Chat Completions "function" tools).
 *
 * - Deterministic: the same descriptor always yields the same declaration.
 * - No state and no side effects, so the tool set can be rebuilt every turn.
 * - Unsupported parameter types fail fast with SchemaTranslationError.
 */

import type { ChatCompletionTool } from 'openai/resources/chat/completions';

import type { CapabilityDescriptor, ParameterDescriptor } from '../domain/Capability';
import { SchemaTranslationError } from '../domain/CapabilityErrors';
import { isRecord } from '../dto/guards';

export type ToolDeclaration = ChatCompletionTool;

export const SUPPORTED_PARAMETER_TYPES = [
  'string',
  'number',
  'integer',
  'boolean',
  'object',
  'array',
] as const;

export type SupportedParameterType = (typeof SUPPORTED_PARAMETER_TYPES)[number];

/**
 * Function names accepted by the provider.
 */
const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;

type JsonSchemaProperty = {
  type: SupportedParameterType;
  description?: string;
  enum?: string[];
};

export function isSupportedParameterType(type: string): type is SupportedParameterType {
  return SUPPORTED_PARAMETER_TYPES.some((supported) => supported === type);
}

export class ToolSchemaTranslator {
  /**
   * Translate one descriptor into a provider tool declaration.
   */
  public toToolDeclaration(descriptor: CapabilityDescriptor): ToolDeclaration {
    if (!TOOL_NAME_PATTERN.test(descriptor.name)) {
      throw new SchemaTranslationError(
        descriptor.name,
        'name must be 1-64 characters of letters, digits, "_" or "-"',
      );
    }

    const properties: Record<string, JsonSchemaProperty> = {};
    const required: string[] = [];

    for (const parameter of descriptor.parameters) {
      properties[parameter.name] = this.toProperty(descriptor.name, parameter);
      if (parameter.required) {
        required.push(parameter.name);
      }
    }

    return {
      type: 'function',
      function: {
        name: descriptor.name,
        description: descriptor.description,
        parameters: {
          type: 'object',
          properties,
          required,
          additionalProperties: false,
        },
      },
    };
  }

  /**
   * Translate a whole registry snapshot, preserving order.
   */
  public toToolSet(descriptors: readonly CapabilityDescriptor[]): ToolDeclaration[] {
    return descriptors.map((descriptor) => this.toToolDeclaration(descriptor));
  }

  /**
   * Inverse mapping: recover a descriptor from a declaration this class produced.
   */
  public toDescriptor(tool: ToolDeclaration): CapabilityDescriptor {
    const name = tool.function.name;
    const schema = tool.function.parameters ?? {};
    const properties = isRecord(schema.properties) ? schema.properties : {};
    const required = Array.isArray(schema.required)
      ? schema.required.filter((value: unknown): value is string => typeof value === 'string')
      : [];

    const parameters: ParameterDescriptor[] = Object.entries(properties).map(([key, raw]) => {
      const property = isRecord(raw) ? raw : {};

      if (typeof property.type !== 'string' || !isSupportedParameterType(property.type)) {
        throw new SchemaTranslationError(name, `property "${key}" has no supported type`);
      }

      const allowed = Array.isArray(property.enum)
        ? property.enum.filter((value: unknown): value is string => typeof value === 'string')
        : undefined;

      return {
        name: key,
        type: property.type,
        required: required.includes(key),
        ...(typeof property.description === 'string' ? { description: property.description } : {}),
        ...(allowed && allowed.length > 0 ? { enum: allowed } : {}),
      };
    });

    return {
      name,
      description: tool.function.description ?? '',
      parameters,
    };
  }

  private toProperty(capability: string, parameter: ParameterDescriptor): JsonSchemaProperty {
    if (!isSupportedParameterType(parameter.type)) {
      throw new SchemaTranslationError(
        capability,
        `parameter "${parameter.name}" has unsupported type "${parameter.type}"`,
      );
    }

    if (parameter.enum && parameter.type !== 'string') {
      throw new SchemaTranslationError(
        capability,
        `parameter "${parameter.name}" declares an enum but is not a string`,
      );
    }

    return {
      type: parameter.type,
      ...(parameter.description ? { description: parameter.description } : {}),
      ...(parameter.enum ? { enum: [...parameter.enum] } : {}),
    };
  }
}

