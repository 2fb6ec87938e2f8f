/**
 * Structured logging for devprompt.
 *
 * Every entry is one JSON line on stderr so that interview output on stdout
 * stays clean for the user.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: diagnostic detail, only written when debug mode is enabled
 * - `info`: normal operation
 * - `warn`: degraded operation (e.g. adaptive selection fell back)
 * - `error`: failures surfaced to the caller
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /** ISO 8601 timestamp when the entry was created. */
  readonly timestamp: string;
  /** Severity level of the entry. */
  readonly level: LogLevel;
  /**
   * Name of the component that produced the entry.
   * @example "Planner"
   */
  readonly component: string;
  /**
   * Short snake_case event name.
   * @example "adaptive_selection_failed"
   */
  readonly event: string;
  /** Additional JSON-serializable context. */
  readonly data?: Record<string, unknown>;
}

/**
 * Options for creating a Logger.
 */
export interface LoggerOptions {
  /** Name of the component using this logger. */
  readonly component: string;
  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;
  /**
   * Sink receiving each serialized line.
   * @defaultValue writes to process.stderr
   */
  readonly sink?: (line: string) => void;
}

function defaultSink(line: string): void {
  process.stderr.write(line);
}

/**
 * Structured logger that writes JSON lines.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'Planner', debugMode: true });
 * logger.info('question_selected', { questionId: 'languages', source: 'fallback' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly sink: (line: string) => void;

  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.sink = options.sink ?? defaultSink;
  }

  /**
   * Creates a logger for another component sharing this logger's settings.
   *
   * @param component - Name of the child component.
   * @returns A new Logger.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, sink: this.sink });
  }

  /** Whether debug entries are written. */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const base = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
    };
    const entry: LogEntry = data !== undefined ? { ...base, data } : base;

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Circular structures and BigInt values cannot be serialized
      line = JSON.stringify({
        ...base,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    this.sink(line + '\n');
  }
}

/**
 * Logger that discards every entry. Used as the default collaborator in
 * library code so that only the CLI decides where logs go.
 */
export const silentLogger = new Logger({
  component: 'silent',
  sink: () => undefined,
});
