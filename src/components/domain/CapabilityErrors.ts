/**
 * Errors raised by the component registry and the capability lifecycle.
 *
 * Discovery-time errors (initialization, schema translation, conformance,
 * duplicates) exclude one component and never abort the process.
 * Invocation-time errors are reported back to the model as tool results.
 */

export class InitializationError extends Error {
  public readonly code = 'INITIALIZATION_FAILED';
  public readonly capability: string;

  public constructor(capability: string, cause: unknown) {
    super(`Component "${capability}" failed to initialize: ${describeCause(cause)}`, { cause });
    this.name = 'InitializationError';
    this.capability = capability;
  }
}

export class SchemaTranslationError extends Error {
  public readonly code = 'SCHEMA_TRANSLATION_FAILED';
  public readonly capability: string;

  public constructor(capability: string, message: string) {
    super(`Capability "${capability}" cannot be translated to a tool schema: ${message}`);
    this.name = 'SchemaTranslationError';
    this.capability = capability;
  }
}

export class ComponentConformanceError extends Error {
  public readonly code = 'NOT_A_COMPONENT';
  public readonly origin: string;
  public readonly issues: string[];

  public constructor(origin: string, issues: string[]) {
    super(`Entry "${origin}" does not define a conforming component`);
    this.name = 'ComponentConformanceError';
    this.origin = origin;
    this.issues = issues;
  }
}

export class DuplicateCapabilityError extends Error {
  public readonly code = 'DUPLICATE_CAPABILITY';
  public readonly capability: string;

  public constructor(capability: string) {
    super(`Capability "${capability}" is already registered`);
    this.name = 'DuplicateCapabilityError';
    this.capability = capability;
  }
}

export class CapabilityNotFoundError extends Error {
  public readonly code = 'NOT_FOUND';
  public readonly capability: string;

  public constructor(capability: string) {
    super(`Capability "${capability}" is not registered`);
    this.name = 'CapabilityNotFoundError';
    this.capability = capability;
  }
}

export class InvalidArgumentsError extends Error {
  public readonly code = 'INVALID_ARGUMENTS';
  public readonly issues: string[];

  public constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'InvalidArgumentsError';
    this.issues = issues;
  }
}

export class CapabilityExecutionError extends Error {
  public readonly code = 'CAPABILITY_EXECUTION_FAILED';
  public readonly capability: string;

  public constructor(capability: string, message: string, cause?: unknown) {
    super(`Capability "${capability}" failed: ${message}`, { cause });
    this.name = 'CapabilityExecutionError';
    this.capability = capability;
  }
}

/**
 * Invocation attempted outside the Ready state.
 */
export class LifecycleStateError extends Error {
  public readonly code = 'LIFECYCLE_VIOLATION';
  public readonly capability: string;
  public readonly state: string;

  public constructor(capability: string, state: string, operation: string) {
    super(`Cannot ${operation} capability "${capability}" in state ${state}`);
    this.name = 'LifecycleStateError';
    this.capability = capability;
    this.state = state;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
