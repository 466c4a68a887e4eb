/**
 * ComponentSource
 * ---------------
 * Domain contract for anything that can enumerate candidate component
 * definitions: a compiled-in manifest, a directory of modules, a test stub.
 *
 * Entries are untrusted. The registry validates each one before use.
 */

/**
 * One candidate produced by a source.
 *
 * - `origin` identifies the entry in logs (module path, manifest index).
 * - `definition` is whatever the entry exported, if loading succeeded.
 * - `error` is set instead when the entry could not be loaded at all.
 */
export type ComponentSourceEntry =
  | { origin: string; definition: unknown }
  | { origin: string; error: unknown };

export interface IComponentSource {
  /**
   * Short label for logs, e.g. "manifest" or "directory:/opt/components".
   */
  readonly label: string;

  /**
   * Enumerate every candidate. Must not throw for a single bad entry;
   * per-entry failures are reported as `{ origin, error }`.
   */
  loadEntries(): Promise<ComponentSourceEntry[]>;
}
