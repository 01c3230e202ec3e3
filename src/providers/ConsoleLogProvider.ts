/**
 * Console-based log provider.
 * Keeps every accepted event in memory (tests inspect `events`) and
 * optionally writes one line per event to stdout/stderr.
 */

import { LOG_LEVELS, type ILogProvider, type LogEvent, type LogLevel } from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Write events to the console as they arrive. Default: false. */
  outputToConsole?: boolean;
  /** Events below this level are dropped. Default: 'debug'. */
  minLevel?: LogLevel;
  /** Cap on the in-memory buffer; oldest events are discarded first. Default: 1000. */
  maxBufferedEvents?: number;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Accepted events, most recent last. */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minRank: number;
  private readonly maxBufferedEvents: number;

  constructor(options?: ConsoleLogProviderOptions) {
    this.outputToConsole = options?.outputToConsole ?? false;
    this.minRank = LOG_LEVELS.indexOf(options?.minLevel ?? 'debug');
    this.maxBufferedEvents = options?.maxBufferedEvents ?? 1000;
  }

  log(event: LogEvent): void {
    if (LOG_LEVELS.indexOf(event.level) < this.minRank) return;

    const stamped: LogEvent = {
      ...event,
      timestamp: event.timestamp ?? new Date().toISOString(),
    };
    this.events.push(stamped);
    if (this.events.length > this.maxBufferedEvents) {
      this.events.splice(0, this.events.length - this.maxBufferedEvents);
    }

    if (this.outputToConsole) {
      const line = formatLine(stamped);
      if (stamped.level === 'error' || stamped.level === 'warn') {
        console.error(line);
      } else {
        console.log(line);
      }
    }
  }

  async flush(): Promise<void> {
    // Events are written synchronously.
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

  clear(): void {
    this.events.length = 0;
  }
}

export function formatLine(event: LogEvent): string {
  const prefix = `${event.timestamp ?? ''} [${event.level.toUpperCase()}]`.trim();
  const fieldsStr = event.fields ? ` ${JSON.stringify(event.fields)}` : '';
  return `${prefix} ${event.message}${fieldsStr}`;
}
