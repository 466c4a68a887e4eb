// src/components/infrastructure/DirectoryComponentSource.ts

/**
 * DirectoryComponentSource
 *
 * Scans a directory once and loads every component module in it.
 *
 * Each module must export exactly one component definition, either as its
 * default export or as a named export called `component`. Declaration files,
 * test files and source maps are ignored. Modules that fail to load are
 * reported as error entries so the registry can skip them.
 */

import { readdir } from 'fs/promises';
import path from 'path';

import type { ComponentSourceEntry, IComponentSource } from '../domain/ComponentSource';
import { isRecord } from '../dto/guards';

const MODULE_EXTENSIONS = ['.js', '.cjs', '.ts', '.cts'];
const IGNORED_SUFFIXES = ['.d.ts', '.d.cts', '.test.ts', '.spec.ts', '.test.js', '.spec.js'];

/**
 * Injected for testing; defaults to the runtime's module loader.
 */
export type ModuleLoader = (modulePath: string) => Promise<unknown>;

const defaultLoader: ModuleLoader = (modulePath) => import(modulePath);

export class DirectoryComponentSource implements IComponentSource {
  public readonly label: string;
  private readonly directory: string;

  public constructor(
    directory: string,
    private readonly loadModule: ModuleLoader = defaultLoader,
  ) {
    this.directory = path.resolve(directory);
    this.label = `directory:${this.directory}`;
  }

  /**
   * Rejects when the directory itself cannot be read; individual modules
   * never cause a rejection.
   */
  public async loadEntries(): Promise<ComponentSourceEntry[]> {
    const dirents = await readdir(this.directory, { withFileTypes: true });

    const files = dirents
      .filter((dirent) => dirent.isFile() && isComponentModule(dirent.name))
      .map((dirent) => dirent.name)
      .sort();

    const entries: ComponentSourceEntry[] = [];

    for (const file of files) {
      const origin = path.join(this.directory, file);

      try {
        const mod = await this.loadModule(origin);
        entries.push({ origin, definition: pickDefinition(origin, mod) });
      } catch (error) {
        entries.push({ origin, error });
      }
    }

    return entries;
  }
}

function isComponentModule(fileName: string): boolean {
  if (IGNORED_SUFFIXES.some((suffix) => fileName.endsWith(suffix))) return false;
  return MODULE_EXTENSIONS.includes(path.extname(fileName));
}

function pickDefinition(origin: string, mod: unknown): unknown {
  if (!isRecord(mod)) {
    throw new Error(`Module ${origin} did not evaluate to an object`);
  }

  if (mod.default !== undefined) return mod.default;
  if (mod.component !== undefined) return mod.component;

  throw new Error(`Module ${origin} exports no component definition`);
}
