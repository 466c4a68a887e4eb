// src/components/builtin/FileSystemComponents.ts

/**
 * Filesystem helpers exposed to the model.
 *
 * Components are trusted, same-process code: these run with the service's
 * own filesystem permissions. I/O errors propagate and are reported to the
 * model as execution failures.
 */

import { appendFile, readFile, readdir, writeFile } from 'fs/promises';

import type { CapabilityArguments, Component, ComponentDefinition } from '../domain/Capability';

class StatelessComponent implements Component {
  public constructor(private readonly run: (args: CapabilityArguments) => Promise<unknown>) {}

  public initialize(): void {}

  public invoke(args: CapabilityArguments): Promise<unknown> {
    return this.run(args);
  }

  public terminate(): void {}
}

export async function readTextFile(args: CapabilityArguments): Promise<string> {
  return readFile(String(args.file_path), 'utf8');
}

export async function writeTextFile(args: CapabilityArguments): Promise<string> {
  const filePath = String(args.file_path);
  const content = String(args.content);

  if (args.mode === 'overwrite') {
    await writeFile(filePath, content, 'utf8');
  } else {
    await appendFile(filePath, content, 'utf8');
  }

  return `Successfully wrote content to '${filePath}'`;
}

export async function listDirectory(args: CapabilityArguments): Promise<string> {
  const directory = String(args.directory_path);
  const dirents = await readdir(directory, { withFileTypes: true });

  const lines = dirents
    .map((dirent) => (dirent.isDirectory() ? `${dirent.name}/` : dirent.name))
    .sort();

  return [`Contents of '${directory}':`, ...lines].join('\n');
}

export const readFileComponent: ComponentDefinition = {
  descriptor: {
    name: 'read_file',
    description: 'Reads and returns the text content of a file.',
    parameters: [{ name: 'file_path', type: 'string', required: true }],
  },
  create: () => new StatelessComponent(readTextFile),
};

export const writeFileComponent: ComponentDefinition = {
  descriptor: {
    name: 'write_file',
    description: 'Writes text to a file, appending by default.',
    parameters: [
      { name: 'file_path', type: 'string', required: true },
      { name: 'content', type: 'string', required: true },
      {
        name: 'mode',
        type: 'string',
        required: false,
        description: 'Defaults to "append".',
        enum: ['append', 'overwrite'],
      },
    ],
  },
  create: () => new StatelessComponent(writeTextFile),
};

export const listDirectoryComponent: ComponentDefinition = {
  descriptor: {
    name: 'list_directory',
    description: 'Lists the files and subdirectories of a directory.',
    parameters: [{ name: 'directory_path', type: 'string', required: true }],
  },
  create: () => new StatelessComponent(listDirectory),
};
