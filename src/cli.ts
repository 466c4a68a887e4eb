#!/usr/bin/env node
/**
 * Interactive chat over a single runtime session.
 *
 * Type a message and press enter; `exit` or `quit` (or Ctrl+C) tears the
 * runtime down and terminates every component.
 */
import * as readline from 'readline';

import { buildRuntimeDeps } from './bootstrap/buildDeps';
import { ConfigurationError } from './shared/config/ConfigurationError';
import { logger } from './shared/logging/Logger';

const EXIT_COMMANDS = new Set(['exit', 'quit']);

function describeFailure(err: unknown): string {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return `[${err.code}] ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}

async function main(): Promise<void> {
  const deps = await buildRuntimeDeps();
  const session = deps.runtime.createSession();

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  let closed = false;
  let pending: ((answer: string | undefined) => void) | undefined;
  rl.on('close', () => {
    closed = true;
    pending?.(undefined);
    pending = undefined;
  });

  const ask = (question: string): Promise<string | undefined> => {
    if (closed) return Promise.resolve(undefined);
    return new Promise((resolve) => {
      pending = resolve;
      rl.question(question, (answer) => {
        pending = undefined;
        resolve(answer);
      });
    });
  };

  // First Ctrl+C cancels a running turn; otherwise it quits.
  rl.on('SIGINT', () => {
    if (session.cancel()) {
      process.stdout.write('\n(cancelled)\n');
      return;
    }
    rl.close();
  });

  const capabilities = deps.runtime.listCapabilities().map((descriptor) => descriptor.name);
  process.stdout.write(`Loaded capabilities: ${capabilities.join(', ') || '(none)'}\n`);
  process.stdout.write("Type a message, or 'exit' to quit.\n\n");

  while (!closed) {
    const line = await ask('You > ');
    if (line === undefined) break;

    const text = line.trim();
    if (EXIT_COMMANDS.has(text.toLowerCase())) break;
    if (text.length === 0) continue;

    try {
      const reply = await session.submitUserMessage(text);
      process.stdout.write(`AI > ${reply}\n\n`);
    } catch (err) {
      process.stdout.write(`Error > ${describeFailure(err)}\n\n`);
    }
  }

  if (!closed) rl.close();
  await deps.shutdown();
  process.stdout.write('Goodbye.\n');
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    logger.fatal({ variable: err.variable }, err.message);
  } else {
    logger.fatal({ err }, 'Chat session failed');
  }
  process.exit(1);
});
