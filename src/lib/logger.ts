/**
 * Structured logging system with configurable levels
 *
 * Provides consistent, structured logging across the proxy with
 * configurable log levels, output formatting, and context enrichment.
 *
 * Every entry is written to stderr: when ssh runs the proxy, stdout carries
 * the forwarded session and a single stray byte corrupts the connection.
 *
 */

/**
 * Available log levels in order of severity
 *
 * @public
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

/**
 * Log entry structure for consistent formatting
 *
 * @public
 */
export interface LogEntry {
  /**
   * Timestamp when the log entry was created
   */
  timestamp: string;

  /**
   * Log level for this entry
   */
  level: LogLevel;

  /**
   * Human-readable log level name
   */
  levelName: string;

  /**
   * Primary log message
   */
  message: string;

  /**
   * Additional context data
   */
  context?: Record<string, unknown>;

  /**
   * Error object if logging an error
   */
  error?: Error;

  /**
   * Component or module that generated this log
   */
  component?: string;
}

/**
 * Logger configuration options
 *
 * @public
 */
export interface LoggerOptions {
  /**
   * Minimum log level to output
   */
  level?: LogLevel;

  /**
   * Component name for log entries
   */
  component?: string;

  /**
   * Enable pretty formatting for interactive use
   */
  prettyPrint?: boolean;

  /**
   * Custom output function (defaults to writing a line to stderr)
   */
  output?: (entry: LogEntry) => void;
}

/**
 * Structured logger with configurable levels and formatting
 *
 * @public
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly component?: string;
  private readonly prettyPrint: boolean;
  private readonly output: (entry: LogEntry) => void;

  /**
   * Create a new logger instance
   *
   * @param options - Logger configuration options
   */
  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? getDefaultLogLevel();
    if (options.component !== undefined) {
      this.component = options.component;
    }
    this.prettyPrint = options.prettyPrint ?? process.env.NODE_ENV !== "production";
    this.output = options.output ?? this.defaultOutput.bind(this);
  }

  debug(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.DEBUG, message, context, error);
  }

  info(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.INFO, message, context, error);
  }

  warn(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.WARN, message, context, error);
  }

  error(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Create a child logger with additional context
   *
   * @param childContext - Context to add to all child log entries
   * @param childComponent - Optional component name override
   * @returns New logger instance with enriched context
   *
   * @example
   * ```typescript
   * const baseLogger = new Logger({ component: "proxy" });
   * const ssmLogger = baseLogger.child({ instanceId: "i-0123456789abcdef0" }, "ssm");
   * ssmLogger.debug("Starting session"); // Will include instanceId
   * ```
   */
  child(childContext: Record<string, unknown>, childComponent?: string): Logger {
    const loggerOptions: LoggerOptions = {
      level: this.level,
      prettyPrint: this.prettyPrint,
      output: (entry: LogEntry) => {
        this.output({
          ...entry,
          context: { ...childContext, ...entry.context },
        });
      },
    };

    const resolvedComponent = childComponent ?? this.component;
    if (resolvedComponent) {
      loggerOptions.component = resolvedComponent;
    }

    return new Logger(loggerOptions);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (level < this.level) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      levelName: LogLevel[level],
      message,
      ...(context && { context }),
      ...(error && { error }),
      ...(this.component && { component: this.component }),
    };

    this.output(entry);
  }

  private defaultOutput(entry: LogEntry): void {
    const line = this.prettyPrint ? formatPretty(entry) : formatJson(entry);
    process.stderr.write(`${line}\n`);
  }
}

/**
 * Pretty-printed line for interactive terminals
 *
 * @param entry - Log entry to format
 * @returns Formatted log line
 *
 * @public
 */
export function formatPretty(entry: LogEntry): string {
  const timestamp = entry.timestamp.replace(/T/, " ").replace(/\..+/, "");
  const component = entry.component ? `[${entry.component}]` : "";
  const level = entry.levelName.padEnd(5);

  let output = `${timestamp} ${level} ${component} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    output += `\n  Context: ${JSON.stringify(entry.context, undefined, 2)}`;
  }

  if (entry.error) {
    output += `\n  Error: ${entry.error.stack ?? entry.error.message}`;
  }

  return output;
}

/**
 * Single-line JSON for log collectors
 *
 * @param entry - Log entry to format
 * @returns JSON encoded log line
 *
 * @public
 */
export function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    ...entry,
    error: entry.error
      ? {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack,
        }
      : undefined,
  });
}

/**
 * Get default log level from environment
 *
 * A proxy runs under ssh for every connection, so only warnings and
 * errors are written unless LOG_LEVEL asks for more.
 *
 * @returns Default log level based on environment
 * @internal
 */
function getDefaultLogLevel(): LogLevel {
  const environmentLevel = process.env.LOG_LEVEL?.toUpperCase();

  switch (environmentLevel) {
    case "DEBUG": {
      return LogLevel.DEBUG;
    }
    case "INFO": {
      return LogLevel.INFO;
    }
    case "WARN": {
      return LogLevel.WARN;
    }
    case "ERROR": {
      return LogLevel.ERROR;
    }
    case "SILENT": {
      return LogLevel.SILENT;
    }
    default: {
      return LogLevel.WARN;
    }
  }
}

/**
 * Default logger instance for convenient access
 *
 * @public
 */
export const logger = new Logger({ component: "ec2-ssh-proxy" });
