/**
 * Logging provider interface.
 * Every service logs through this so tests can inspect events and production
 * can route them wherever the deployment wants.
 */

/** Log severity levels, lowest first. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** A structured log event. */
export interface LogEvent {
  level: LogLevel;
  message: string;
  /** ISO-8601 timestamp (auto-set if omitted). */
  timestamp?: string;
  /** Arbitrary structured metadata. */
  fields?: Record<string, unknown>;
}

/** One line per HTTP request, written by the logging middleware. */
export interface RequestLogEvent extends LogEvent {
  method: string;
  path: string;
  status: number;
  durationMs: number;
  requestId: string;
}

export interface ILogProvider {
  log(event: LogEvent): void;

  /** Flush any buffered events. */
  flush(): Promise<void>;

  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
