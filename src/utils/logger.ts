/**
 * Structured logging for argpanel.
 *
 * Every entry is one JSON line on stderr, so log output never mixes with a
 * wrapped program's own stdout.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: diagnostic detail, only written in debug mode
 * - `info`: normal lifecycle events (spawn, exit)
 * - `warn`: recoverable problems (unreadable config file, kill on a dead process)
 * - `error`: failures the caller will see as a failed result
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  readonly level: LogLevel;

  /**
   * Subsystem that wrote the entry.
   * @example "ChildProcessHandle"
   */
  readonly component: string;

  /**
   * Short snake_case event name.
   * @example "child_spawned"
   */
  readonly event: string;

  readonly data?: Record<string, unknown>;
}

/**
 * Options for creating a Logger.
 */
export interface LoggerOptions {
  /** Name of the subsystem using this logger. */
  readonly component: string;

  /**
   * Whether debug-level entries are written.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /** Clock, injectable for tests. */
  readonly now?: () => Date;

  /** Line sink. Defaults to `process.stderr`. */
  readonly write?: (line: string) => void;
}

function writeToStderr(line: string): void {
  process.stderr.write(line);
}

/**
 * Structured logger writing JSON lines.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'Session', debugMode: true });
 * logger.info('run_started', { argv: ['echo', 'hi'] });
 * logger.child('ChildProcessHandle').warn('kill_ignored', { state: 'exited' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly now: () => Date;
  private readonly write: (line: string) => void;

  /**
   * Creates a new Logger.
   * @param options - Logger options.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.now = options.now ?? ((): Date => new Date());
    this.write = options.write ?? writeToStderr;
  }

  /**
   * Whether debug entries are written.
   */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Creates a logger for another component sharing this logger's settings.
   *
   * @param component - Name of the other component.
   * @returns The new logger.
   */
  child(component: string): Logger {
    return new Logger({
      component,
      debugMode: this.debugMode,
      now: this.now,
      write: this.write,
    });
  }

  /**
   * Logs a debug-level entry. No-op unless debug mode is on.
   *
   * @param event - Event name.
   * @param data - Optional structured context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level entry.
   *
   * @param event - Event name.
   * @param data - Optional structured context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level entry.
   *
   * @param event - Event name.
   * @param data - Optional structured context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level entry.
   *
   * @param event - Event name.
   * @param data - Optional structured context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry =
      data !== undefined
        ? { timestamp: this.now().toISOString(), level, component: this.component, event, data }
        : { timestamp: this.now().toISOString(), level, component: this.component, event };

    this.write(serializeEntry(entry) + '\n');
  }
}

/**
 * Serializes an entry, falling back to an entry without `data` when the data
 * cannot be represented as JSON (cycles, BigInt, throwing getters).
 */
function serializeEntry(entry: LogEntry): string {
  try {
    return JSON.stringify(entry);
  } catch (error) {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      component: entry.component,
      event: entry.event,
      serializationError: error instanceof Error ? error.message : String(error),
      originalData: '[unserializable]',
    });
  }
}

/**
 * Creates a logger for a component.
 *
 * @param component - Name of the subsystem.
 * @param debugMode - Whether debug entries are written.
 * @returns The logger.
 */
export function createLogger(component: string, debugMode = false): Logger {
  return new Logger({ component, debugMode });
}
