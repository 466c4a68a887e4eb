// src/components/application/ComponentRegistry.ts

/**
 * ComponentRegistry
 * -----------------
 * Holds every live component keyed by capability name.
 *
 * - discover() pulls candidates from a source, validates them, translates
 *   their schema, initializes them and registers the survivors. A failure in
 *   one entry is logged and skipped; it never aborts discovery.
 * - Name collisions keep the first registration.
 * - teardown() gives every initialized component exactly one terminate attempt.
 * - discover() and teardown() are serialized so concurrent sessions can share
 *   one registry.
 */

import { logger as rootLogger, type AppLogger } from '../../shared/logging/Logger';
import type { CapabilityDescriptor, Component, ComponentDefinition } from '../domain/Capability';
import {
  CapabilityNotFoundError,
  DuplicateCapabilityError,
  InitializationError,
  describeCause,
} from '../domain/CapabilityErrors';
import type { ComponentSourceEntry, IComponentSource } from '../domain/ComponentSource';
import { parseComponentDefinition } from '../dto/ComponentDefinitionDto';
import { ManagedComponent } from './ManagedComponent';
import { ToolSchemaTranslator } from './ToolSchemaTranslator';

export type ComponentRegistryDeps = {
  translator?: ToolSchemaTranslator;
  logger?: AppLogger;
  invokeTimeoutMs?: number;
};

/**
 * A candidate that did not make it into the registry.
 */
export type SkippedComponent = {
  source: string;
  origin: string;
  code: string;
  reason: string;
};

export class ComponentRegistry {
  private readonly components = new Map<string, ManagedComponent>();
  private readonly skipped: SkippedComponent[] = [];
  private readonly translator: ToolSchemaTranslator;
  private readonly logger: AppLogger;
  private tail: Promise<unknown> = Promise.resolve();
  private tornDown = false;

  public constructor(private readonly deps: ComponentRegistryDeps = {}) {
    this.translator = deps.translator ?? new ToolSchemaTranslator();
    this.logger = deps.logger ?? rootLogger;
  }

  /**
   * Register every conforming component the source yields.
   * Returns the descriptors registered by this call, in source order.
   */
  public discover(source: IComponentSource): Promise<CapabilityDescriptor[]> {
    return this.serialize(async () => {
      if (this.tornDown) {
        throw new Error('ComponentRegistry: cannot discover after teardown');
      }

      const registered: CapabilityDescriptor[] = [];

      let entries: ComponentSourceEntry[];
      try {
        entries = await source.loadEntries();
      } catch (err) {
        this.logger.error({ source: source.label, err }, 'Component source failed to load');
        return registered;
      }

      for (const entry of entries) {
        if ('error' in entry) {
          this.skip(source.label, entry.origin, entry.error);
          continue;
        }

        try {
          const definition = parseComponentDefinition(entry.origin, entry.definition);
          registered.push(await this.register(definition));
        } catch (err) {
          this.skip(source.label, entry.origin, err);
        }
      }

      this.logger.info(
        {
          source: source.label,
          registered: registered.map((d) => d.name),
          total: this.components.size,
        },
        'Component discovery finished',
      );

      return registered;
    });
  }

  public lookup(name: string): ManagedComponent {
    const component = this.components.get(name);
    if (!component) {
      throw new CapabilityNotFoundError(name);
    }
    return component;
  }

  public has(name: string): boolean {
    return this.components.has(name);
  }

  /**
   * Descriptors of every registered component, in registration order.
   */
  public list(): CapabilityDescriptor[] {
    return Array.from(this.components.values(), (component) => component.descriptor);
  }

  public listSkipped(): readonly SkippedComponent[] {
    return [...this.skipped];
  }

  public get size(): number {
    return this.components.size;
  }

  /**
   * Terminate every registered component (most recent first), continuing past
   * failures. Safe to call more than once.
   */
  public teardown(): Promise<void> {
    return this.serialize(async () => {
      if (this.tornDown) return;
      this.tornDown = true;

      const components = Array.from(this.components.values()).reverse();
      this.components.clear();

      let failures = 0;
      for (const component of components) {
        const ok = await component.terminate();
        if (!ok) failures += 1;
      }

      this.logger.info(
        { terminated: components.length, failures },
        'Component registry torn down',
      );
    });
  }

  private async register(definition: ComponentDefinition): Promise<CapabilityDescriptor> {
    const { descriptor } = definition;

    if (this.components.has(descriptor.name)) {
      throw new DuplicateCapabilityError(descriptor.name);
    }

    // Fails fast with SchemaTranslationError before anything is instantiated.
    this.translator.toToolDeclaration(descriptor);

    const componentLogger = this.logger.child({ capability: descriptor.name });

    let instance: Component;
    try {
      instance = definition.create({ logger: componentLogger });
    } catch (err) {
      throw new InitializationError(descriptor.name, err);
    }

    const managed = new ManagedComponent(definition, instance, {
      logger: componentLogger,
      ...(this.deps.invokeTimeoutMs !== undefined
        ? { invokeTimeoutMs: this.deps.invokeTimeoutMs }
        : {}),
    });

    try {
      await managed.initialize();
    } catch (err) {
      // Partial setup may have acquired resources.
      await managed.terminate();
      throw err;
    }

    this.components.set(descriptor.name, managed);
    this.logger.info({ capability: descriptor.name }, 'Component registered');

    return descriptor;
  }

  private skip(source: string, origin: string, err: unknown): void {
    const code = readErrorCode(err);
    const reason = describeIssues(err);

    this.skipped.push({ source, origin, code, reason });
    this.logger.warn({ source, origin, code, reason }, 'Component skipped');
  }

  /**
   * Chain tasks so they run one at a time. The returned promise carries the
   * task's own outcome; the chain itself only waits for settlement.
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

function readErrorCode(err: unknown): string {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return 'LOAD_FAILED';
}

function describeIssues(err: unknown): string {
  const message = describeCause(err);
  if (err instanceof Error && 'issues' in err && Array.isArray(err.issues) && err.issues.length > 0) {
    return `${message}: ${err.issues.join(' ')}`;
  }
  return message;
}
