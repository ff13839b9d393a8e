/**
 * Structured logging contract.
 * Every engine component logs through this; the host decides where events go.
 */

/** Severity levels, lowest first. */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFields = Record<string, unknown>;

export const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEvent {
  level: LogLevel;
  message: string;
  /** ISO-8601; stamped by the provider when omitted. */
  timestamp?: string;
  /** Structured context, e.g. { projectId, stage }. */
  fields?: LogFields;
}

export interface ILogProvider {
  log(event: LogEvent): void;

  /** Resolves once buffered events have been handed off. */
  flush(): Promise<void>;

  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
