// src/components/application/ManagedComponent.ts

/**
 * ManagedComponent
 * ----------------
 * Lifecycle manager for one component instance.
 *
 * State machine (strictly linear):
 *   Unloaded --initialize()--> Ready --terminate()--> Destroyed
 *
 * - initialize() runs at most once; on failure the component stays Unloaded.
 * - invoke() is only legal in Ready; arguments are validated first.
 * - terminate() runs at most once, never throws, and is safe after a failed
 *   initialize (the component may hold partially acquired resources).
 */

import type { AppLogger } from '../../shared/logging/Logger';
import type {
  CapabilityDescriptor,
  Component,
  ComponentDefinition,
  LifecycleState,
} from '../domain/Capability';
import {
  CapabilityExecutionError,
  InitializationError,
  InvalidArgumentsError,
  LifecycleStateError,
  describeCause,
} from '../domain/CapabilityErrors';
import { validateCapabilityArguments } from '../dto/CapabilityArgumentsDto';

export type ManagedComponentOptions = {
  logger: AppLogger;

  /**
   * Optional wall-clock bound on a single invocation.
   */
  invokeTimeoutMs?: number;
};

export class ManagedComponent {
  private state: LifecycleState = 'Unloaded';
  private initializeAttempted = false;
  private terminateAttempted = false;

  public constructor(
    private readonly definition: ComponentDefinition,
    private readonly instance: Component,
    private readonly options: ManagedComponentOptions,
  ) {}

  public get name(): string {
    return this.definition.descriptor.name;
  }

  public get descriptor(): CapabilityDescriptor {
    return this.definition.descriptor;
  }

  public getState(): LifecycleState {
    return this.state;
  }

  /**
   * Unloaded -> Ready. Throws InitializationError when the component's own
   * setup fails, LifecycleStateError when called a second time.
   */
  public async initialize(): Promise<void> {
    if (this.initializeAttempted) {
      throw new LifecycleStateError(this.name, this.state, 'initialize');
    }
    this.initializeAttempted = true;

    try {
      await this.instance.initialize();
    } catch (err) {
      throw new InitializationError(this.name, err);
    }

    this.state = 'Ready';
    this.options.logger.debug({ capability: this.name }, 'Component initialized');
  }

  /**
   * Validate arguments against the descriptor, then run the component.
   *
   * Throws:
   * - LifecycleStateError outside Ready
   * - InvalidArgumentsError before any component logic runs
   * - CapabilityExecutionError for anything the component itself raises
   */
  public async invoke(rawArgs: unknown): Promise<unknown> {
    if (this.state !== 'Ready') {
      throw new LifecycleStateError(this.name, this.state, 'invoke');
    }

    const args = validateCapabilityArguments(this.descriptor, rawArgs);

    try {
      return await this.withDeadline(Promise.resolve(this.instance.invoke(args)));
    } catch (err) {
      if (err instanceof InvalidArgumentsError || err instanceof CapabilityExecutionError) {
        throw err;
      }
      throw new CapabilityExecutionError(this.name, describeCause(err), err);
    }
  }

  /**
   * Ready (or Unloaded after a failed initialize) -> Destroyed.
   * Returns false when the component's cleanup failed; never throws.
   */
  public async terminate(): Promise<boolean> {
    if (this.terminateAttempted) {
      return true;
    }
    this.terminateAttempted = true;

    const previous = this.state;
    this.state = 'Destroyed';

    try {
      await this.instance.terminate();
      this.options.logger.debug({ capability: this.name, previous }, 'Component terminated');
      return true;
    } catch (err) {
      this.options.logger.warn(
        { capability: this.name, previous, err },
        'Component failed to terminate cleanly',
      );
      return false;
    }
  }

  private withDeadline<T>(work: Promise<T>): Promise<T> {
    const timeoutMs = this.options.invokeTimeoutMs;
    if (timeoutMs === undefined) return work;

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        reject(new CapabilityExecutionError(this.name, `timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
  }
}
