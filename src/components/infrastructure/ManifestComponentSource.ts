// src/components/infrastructure/ManifestComponentSource.ts

/**
 * ManifestComponentSource
 *
 * Component source backed by an explicit registration list compiled into the
 * program. This is the default way components reach the registry.
 */

import type { ComponentSourceEntry, IComponentSource } from '../domain/ComponentSource';

export class ManifestComponentSource implements IComponentSource {
  public readonly label: string;
  private readonly definitions: readonly unknown[];

  /**
   * @param definitions Component definitions in registration order.
   * @param label       Name used in logs and skip reports.
   */
  public constructor(definitions: readonly unknown[], label = 'manifest') {
    this.definitions = definitions;
    this.label = label;
  }

  public async loadEntries(): Promise<ComponentSourceEntry[]> {
    return this.definitions.map((definition, index) => ({
      origin: `${this.label}[${index}]`,
      definition,
    }));
  }
}
