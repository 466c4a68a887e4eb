/**
 * Capability domain models.
 *
 * A capability is a self-contained unit of agent functionality that the
 * runtime exposes to the model as a callable tool.
 */

/**
 * Semantic type of a capability parameter, e.g. "string" or "integer".
 *
 * Kept as a plain string in the domain: descriptors coming from component
 * modules are untrusted, and the ToolSchemaTranslator decides which types
 * the provider can express.
 */
export type ParameterType = string;

/**
 * One named parameter accepted by a capability.
 */
export interface ParameterDescriptor {
  /**
   * Parameter name as the model must send it, e.g. "message".
   */
  readonly name: string;

  readonly type: ParameterType;

  readonly required: boolean;

  /**
   * Optional human-readable hint sent to the model.
   */
  readonly description?: string;

  /**
   * Optional closed set of allowed string values.
   * Example: ["debug", "info", "warning"].
   */
  readonly enum?: readonly string[];
}

/**
 * Immutable metadata describing a capability.
 */
export interface CapabilityDescriptor {
  /**
   * Unique capability name across the registry, e.g. "log_message".
   */
  readonly name: string;

  readonly description: string;

  /**
   * Ordered list of parameters.
   */
  readonly parameters: readonly ParameterDescriptor[];
}

/**
 * Arguments supplied to a capability invocation, keyed by parameter name.
 */
export type CapabilityArguments = Record<string, unknown>;

/**
 * The live, stateful side of a capability.
 *
 * The runtime guarantees that `initialize` runs once before any `invoke`,
 * that `invoke` only receives arguments validated against the descriptor,
 * and that `terminate` runs at most once.
 */
export interface Component {
  initialize(): void | Promise<void>;
  invoke(args: CapabilityArguments): unknown | Promise<unknown>;
  terminate(): void | Promise<void>;
}

/**
 * Collaborators handed to a component factory.
 */
export interface ComponentContext {
  /**
   * Logger bound to the capability name.
   */
  logger: {
    debug(obj: object, msg?: string): void;
    info(obj: object, msg?: string): void;
    warn(obj: object, msg?: string): void;
    error(obj: object, msg?: string): void;
  };
}

/**
 * What a component module registers: its static descriptor plus a factory
 * for the live instance.
 */
export interface ComponentDefinition {
  readonly descriptor: CapabilityDescriptor;
  create(context: ComponentContext): Component;
}

/**
 * Lifecycle states of a component instance. Transitions are strictly linear:
 * Unloaded -> Ready (initialize) -> Destroyed (terminate).
 */
export type LifecycleState = 'Unloaded' | 'Ready' | 'Destroyed';
