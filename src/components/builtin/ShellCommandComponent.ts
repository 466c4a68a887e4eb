// src/components/builtin/ShellCommandComponent.ts

/**
 * run_shell_command: runs one program with arguments and returns its stdout.
 *
 * Registered only when SHELL_COMMANDS_ENABLED is set. Components are trusted
 * code, but the command line comes from the model, so this hands the model
 * whatever the service account can do on the host.
 *
 * The command line is split into argv with shell-style quoting and executed
 * without a shell: no pipes, redirects, globbing or variable expansion.
 */

import { execFile } from 'child_process';

import type {
  CapabilityArguments,
  Component,
  ComponentContext,
  ComponentDefinition,
} from '../domain/Capability';
import { CapabilityExecutionError, InvalidArgumentsError } from '../domain/CapabilityErrors';

export const SHELL_COMMAND_CAPABILITY = 'run_shell_command';

const MAX_OUTPUT_BYTES = 1024 * 1024;

export type CommandResult = {
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  file: string,
  args: readonly string[],
  timeoutMs: number,
) => Promise<CommandResult>;

/**
 * The parts of a child_process failure used to describe it.
 */
export type CommandFailure = {
  message: string;
  code?: string | number | null;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
};

export function describeCommandFailure(
  file: string,
  timeoutMs: number,
  failure: CommandFailure,
  stderr: string,
): string {
  if (failure.code === 'ENOENT') {
    return `command not found: ${file}`;
  }
  if (failure.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
    return `output exceeded ${MAX_OUTPUT_BYTES} bytes`;
  }
  if (failure.killed) {
    return `timed out after ${timeoutMs}ms`;
  }
  if (typeof failure.code === 'number') {
    const detail = stderr.trim();
    return `exited with code ${failure.code}${detail ? `: ${detail}` : ''}`;
  }
  if (failure.signal) {
    return `terminated by ${failure.signal}`;
  }
  return failure.message;
}

export const runCommand: CommandRunner = (file, args, timeoutMs) =>
  new Promise<CommandResult>((resolve, reject) => {
    execFile(
      file,
      [...args],
      { timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES, encoding: 'utf8', windowsHide: true },
      (error, stdout, stderr) => {
        if (error) {
          reject(new Error(describeCommandFailure(file, timeoutMs, error, stderr)));
          return;
        }
        resolve({ stdout, stderr });
      },
    );
  });

/**
 * Split a command line into argv the way a POSIX shell tokenizes words:
 * whitespace separates, single quotes are literal, double quotes allow
 * backslash escapes of `"`, `\`, `$` and backquote.
 */
export function splitCommandLine(command: string): string[] {
  const argv: string[] = [];
  let current = '';
  let inWord = false;
  let quote: '"' | "'" | undefined;

  for (let i = 0; i < command.length; i += 1) {
    const ch = command.charAt(i);

    if (quote === "'") {
      if (ch === "'") quote = undefined;
      else current += ch;
      continue;
    }

    if (quote === '"') {
      const next = command.charAt(i + 1);
      if (ch === '"') {
        quote = undefined;
      } else if (ch === '\\' && next !== '' && '"\\$`'.includes(next)) {
        current += next;
        i += 1;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (ch === '\\') {
      if (i + 1 >= command.length) {
        throw invalidCommand('Command ends with an unescaped backslash.');
      }
      current += command.charAt(i + 1);
      i += 1;
      inWord = true;
    } else if (/\s/.test(ch)) {
      if (inWord) {
        argv.push(current);
        current = '';
        inWord = false;
      }
    } else {
      current += ch;
      inWord = true;
    }
  }

  if (quote) {
    throw invalidCommand('Command has an unterminated quote.');
  }
  if (inWord) {
    argv.push(current);
  }
  return argv;
}

function invalidCommand(issue: string): InvalidArgumentsError {
  return new InvalidArgumentsError(`Invalid arguments for "${SHELL_COMMAND_CAPABILITY}"`, [issue]);
}

export class ShellCommandComponent implements Component {
  public constructor(
    private readonly context: ComponentContext,
    private readonly timeoutMs: number,
    private readonly run: CommandRunner,
  ) {}

  public initialize(): void {
    this.context.logger.warn({ timeoutMs: this.timeoutMs }, 'Shell command execution is enabled');
  }

  public async invoke(args: CapabilityArguments): Promise<string> {
    const argv = splitCommandLine(String(args.command));
    if (argv.length === 0) {
      throw invalidCommand('"command" names no program.');
    }
    const [file, ...rest] = argv;

    this.context.logger.info({ file, argc: rest.length }, 'Running shell command');

    try {
      const { stdout } = await this.run(file, rest, this.timeoutMs);
      return stdout;
    } catch (err) {
      throw new CapabilityExecutionError(
        SHELL_COMMAND_CAPABILITY,
        err instanceof Error ? err.message : String(err),
        err,
      );
    }
  }

  public terminate(): void {}
}

export type ShellCommandOptions = {
  timeoutMs: number;
  /**
   * Replaces process execution (tests).
   */
  run?: CommandRunner;
};

export function createShellCommandComponent(options: ShellCommandOptions): ComponentDefinition {
  const run = options.run ?? runCommand;

  return {
    descriptor: {
      name: SHELL_COMMAND_CAPABILITY,
      description:
        'Runs a program on the host and returns its standard output. ' +
        'Quoting works as in a shell; pipes, redirects and variables do not.',
      parameters: [
        {
          name: 'command',
          type: 'string',
          required: true,
          description: 'Program and arguments, e.g. "ls -la /tmp".',
        },
      ],
    },
    create: (context) => new ShellCommandComponent(context, options.timeoutMs, run),
  };
}
