/**
 * In-process log provider.
 * Keeps events in memory for inspection and, when asked, echoes them to the
 * console: errors to console.error, warnings to console.warn, the rest to console.log.
 */

import {
  LOG_LEVEL_RANK,
  type ILogProvider,
  type LogEvent,
  type LogFields,
  type LogLevel,
} from './ILogProvider.js';

export interface ConsoleLogProviderOptions {
  /** Echo each retained event to the console. Default: false. */
  outputToConsole?: boolean;
  /** Events below this level are dropped. Default: 'debug'. */
  minLevel?: LogLevel;
  /** Oldest events are discarded beyond this many. Default: unbounded. */
  maxBufferedEvents?: number;
}

export class ConsoleLogProvider implements ILogProvider {
  /** Retained events, oldest first. */
  readonly events: LogEvent[] = [];

  private readonly outputToConsole: boolean;
  private readonly minRank: number;
  private readonly maxBufferedEvents: number;

  constructor(options: ConsoleLogProviderOptions = {}) {
    this.outputToConsole = options.outputToConsole ?? false;
    this.minRank = LOG_LEVEL_RANK[options.minLevel ?? 'debug'];
    this.maxBufferedEvents = options.maxBufferedEvents ?? Number.POSITIVE_INFINITY;
  }

  log(event: LogEvent): void {
    if (LOG_LEVEL_RANK[event.level] < this.minRank) return;

    const stamped: LogEvent = { ...event, timestamp: event.timestamp ?? new Date().toISOString() };
    this.events.push(stamped);
    if (this.events.length > this.maxBufferedEvents) {
      this.events.splice(0, this.events.length - this.maxBufferedEvents);
    }

    if (!this.outputToConsole) return;
    const line = formatLogLine(stamped);
    if (stamped.level === 'error') console.error(line);
    else if (stamped.level === 'warn') console.warn(line);
    else console.log(line);
  }

  async flush(): Promise<void> {
    // Console writes are synchronous.
  }

  info(message: string, fields?: LogFields): void {
    this.log({ level: 'info', message, fields });
  }

  warn(message: string, fields?: LogFields): void {
    this.log({ level: 'warn', message, fields });
  }

  error(message: string, fields?: LogFields): void {
    this.log({ level: 'error', message, fields });
  }

  debug(message: string, fields?: LogFields): void {
    this.log({ level: 'debug', message, fields });
  }

  eventsAt(level: LogLevel): LogEvent[] {
    return this.events.filter((e) => e.level === level);
  }

  clear(): void {
    this.events.length = 0;
  }
}

/** `[LEVEL] message {"field":"value"}`; the JSON part is omitted when there are no fields. */
export function formatLogLine(event: LogEvent): string {
  const fields = event.fields && Object.keys(event.fields).length > 0 ? ` ${JSON.stringify(event.fields)}` : '';
  return `[${event.level.toUpperCase()}] ${event.message}${fields}`;
}
