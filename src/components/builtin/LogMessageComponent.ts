// src/components/builtin/LogMessageComponent.ts

import type {
  CapabilityArguments,
  Component,
  ComponentContext,
  ComponentDefinition,
} from '../domain/Capability';

export const LOG_LEVELS = ['debug', 'info', 'warning', 'error', 'critical'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Records messages on behalf of the model, both in memory and in the
 * service log.
 */
export class LogMessageComponent implements Component {
  private entries: string[] = [];

  public constructor(private readonly context: ComponentContext) {}

  public initialize(): void {
    this.entries = [];
    this.context.logger.info({}, 'Log component ready');
  }

  public invoke(args: CapabilityArguments): string {
    const message = String(args.message);
    const requested = args.level;
    const level: LogLevel = isLogLevel(requested) ? requested : 'info';
    const entry = `[${level.toUpperCase()}] ${message}`;

    this.entries.push(entry);
    this.write(level, message);

    return `Successfully logged: ${entry}`;
  }

  public terminate(): void {
    this.context.logger.info({ entries: this.entries.length }, 'Log component shutting down');
    this.entries = [];
  }

  public getEntries(): readonly string[] {
    return [...this.entries];
  }

  private write(level: LogLevel, message: string): void {
    const fields = { level, message };

    switch (level) {
      case 'debug':
        this.context.logger.debug(fields, 'Model log entry');
        break;
      case 'info':
        this.context.logger.info(fields, 'Model log entry');
        break;
      case 'warning':
        this.context.logger.warn(fields, 'Model log entry');
        break;
      default:
        this.context.logger.error(fields, 'Model log entry');
    }
  }
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

export const logMessageComponent: ComponentDefinition = {
  descriptor: {
    name: 'log_message',
    description: 'Logs a message with a severity level and confirms what was logged.',
    parameters: [
      { name: 'message', type: 'string', required: true, description: 'The message to log.' },
      {
        name: 'level',
        type: 'string',
        required: false,
        description: 'Severity of the message. Defaults to "info".',
        enum: [...LOG_LEVELS],
      },
    ],
  },
  create: (context) => new LogMessageComponent(context),
};
