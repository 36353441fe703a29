/**
 * Structured logging utility.
 *
 * Writes one JSON object per line to stderr so stdout stays free for command
 * output.
 *
 * @packageDocumentation
 */

/**
 * Severity level for log entries.
 *
 * - `debug`: Detailed diagnostic information, only written in debug mode
 * - `info`: General informational messages about normal operation
 * - `warn`: Conditions that don't prevent operation but may need attention
 * - `error`: Failures
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Represents a structured log entry with timestamp and metadata.
 */
export interface LogEntry {
  /**
   * ISO 8601 timestamp when the log entry was created.
   * @example "2024-01-15T10:30:00.000Z"
   */
  readonly timestamp: string;

  /**
   * Severity level of the log entry.
   */
  readonly level: LogLevel;

  /**
   * Name of the component that generated this log entry.
   * @example "Implementor"
   */
  readonly component: string;

  /**
   * Short snake_case name of the logged event.
   * @example "source_written"
   */
  readonly event: string;

  /**
   * Additional structured data associated with the log entry.
   * @example { type: "com.example.Shape", obligations: 3 }
   */
  readonly data?: Record<string, unknown>;
}

/**
 * Configuration options for creating a Logger instance.
 */
export interface LoggerOptions {
  /**
   * Name of the component using this logger.
   */
  readonly component: string;

  /**
   * Whether debug-level logging is enabled.
   * @defaultValue false
   */
  readonly debugMode?: boolean;

  /**
   * Destination for serialized lines.
   * @defaultValue writes to process.stderr
   */
  readonly write?: (line: string) => void;
}

/**
 * Structured logger that outputs JSON-formatted log entries to stderr.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ component: 'Implementor', debugMode: true });
 * logger.debug('obligations_resolved', { type: 'com.example.Shape', count: 2 });
 * logger.warn('temp_cleanup_failed', { directory: '/tmp/implgen-x1' });
 * ```
 */
export class Logger {
  private readonly component: string;
  private readonly debugMode: boolean;
  private readonly write: (line: string) => void;

  /**
   * Creates a new Logger instance.
   * @param options - Configuration options for the logger.
   */
  constructor(options: LoggerOptions) {
    this.component = options.component;
    this.debugMode = options.debugMode ?? false;
    this.write =
      options.write ??
      ((line: string): void => {
        process.stderr.write(line);
      });
  }

  /**
   * Returns a logger for another component sharing this logger's settings.
   */
  child(component: string): Logger {
    return new Logger({ component, debugMode: this.debugMode, write: this.write });
  }

  /**
   * Whether debug entries are written.
   */
  get isDebugEnabled(): boolean {
    return this.debugMode;
  }

  /**
   * Logs a debug-level message. No-op unless debugMode is enabled.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  debug(event: string, data?: Record<string, unknown>): void {
    if (!this.debugMode) {
      return;
    }
    this.log('debug', event, data);
  }

  /**
   * Logs an info-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data);
  }

  /**
   * Logs a warning-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data);
  }

  /**
   * Logs an error-level message.
   *
   * @param event - Brief description of the event.
   * @param data - Optional structured data for additional context.
   */
  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.component,
      event,
      ...(data !== undefined ? { data } : {}),
    };

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch (error) {
      // Cycles and BigInt values cannot be serialized; keep the envelope.
      line = JSON.stringify({
        timestamp: entry.timestamp,
        level,
        component: this.component,
        event,
        serializationError: error instanceof Error ? error.message : String(error),
        originalData: '[unserializable]',
      });
    }

    this.write(line + '\n');
  }
}

/**
 * Creates a logger that discards every entry.
 */
export function createSilentLogger(component = 'silent'): Logger {
  return new Logger({
    component,
    write: (): void => {
      // discarded
    },
  });
}
