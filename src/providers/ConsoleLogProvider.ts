/**
 * Console-based log provider.
 * Keeps accepted events in memory (inspectable from tests) unless
 * `bufferEvents` is off, and optionally writes a one-line rendering to
 * stdout. Events below `minLevel` are dropped before either.
 */

import {
  LOG_LEVEL_RANK,
  type ILogProvider,
  type LogEvent,
  type LogLevel,
} from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to console.log as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Default: 'debug' (keep everything). */
  minLevel?: LogLevel;
  /** Append accepted events to `events`. Long-lived processes turn this off. Default: true. */
  bufferEvents?: boolean;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Accepted events, most recent last. Shared with child providers. */
  readonly events: LogEvent[];

  private readonly outputToConsole: boolean;
  private readonly minLevel: LogLevel;
  private readonly bufferEvents: boolean;
  private readonly baseFields: Record<string, unknown>;

  constructor(
    options?: ConsoleLogProviderOptions,
    shared?: { events: LogEvent[]; baseFields: Record<string, unknown> }
  ) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minLevel = options?.minLevel ?? 'debug';
    this.bufferEvents = options?.bufferEvents ?? true;
    this.events = shared?.events ?? [];
    this.baseFields = shared?.baseFields ?? {};
  }

  log(event: LogEvent): void {
    if (LOG_LEVEL_RANK[event.level] < LOG_LEVEL_RANK[this.minLevel]) return;

    const hasBase = Object.keys(this.baseFields).length > 0;
    const fields = hasBase || event.fields
      ? { ...this.baseFields, ...event.fields }
      : undefined;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
      ...(fields && { fields }),
    };
    if (this.bufferEvents) this.events.push(stamped);

    if (this.outputToConsole) {
      const prefix = `${stamped.timestamp} [${stamped.level.toUpperCase()}]`;
      const fieldsStr = stamped.fields ? ` ${JSON.stringify(stamped.fields)}` : '';
      console.log(`${prefix} ${stamped.message}${fieldsStr}`);
    }
  }

  async flush(): Promise<void> {
    // Synchronous sink.
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log({ level: 'debug', message, fields });
  }

  child(fields: Record<string, unknown>): ConsoleLogProvider {
    return new ConsoleLogProvider(
      { outputToConsole: this.outputToConsole, minLevel: this.minLevel, bufferEvents: this.bufferEvents },
      { events: this.events, baseFields: { ...this.baseFields, ...fields } }
    );
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }
}
