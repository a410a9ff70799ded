/**
 * Structured Logger
 *
 * Diagnostics for the verifier. Every entry goes to stderr so that stdout stays
 * reserved for the human-readable verification report.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
export const LOG_FORMATS: readonly LogFormat[] = ['text', 'json'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogContext {
  endpoint?: string;
  status?: number;
  step?: string;
  owner?: string;
  repo?: string;
  [key: string]: string | number | boolean | undefined;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  component?: string;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  durationMs?: number;
}

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: 'info',
  format: 'text',
};

function isLogLevel(value: string): value is LogLevel {
  const levels: readonly string[] = LOG_LEVELS;
  return levels.includes(value);
}

function isLogFormat(value: string): value is LogFormat {
  const formats: readonly string[] = LOG_FORMATS;
  return formats.includes(value);
}

/**
 * Read LOG_LEVEL / LOG_FORMAT from an environment map. Unknown values fall back
 * to the defaults: logging must be usable before the rest of the configuration
 * has been validated.
 */
export function resolveLoggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const level = env.LOG_LEVEL?.trim().toLowerCase() ?? '';
  const format = env.LOG_FORMAT?.trim().toLowerCase() ?? '';

  return {
    level: isLogLevel(level) ? level : DEFAULT_OPTIONS.level,
    format: isLogFormat(format) ? format : DEFAULT_OPTIONS.format,
  };
}

function toErrorShape(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'NonError', message: String(error) };
}

function formatText(entry: LogEntry): string {
  const scope = entry.component ? `${entry.service}:${entry.component}` : entry.service;
  let line = `[${entry.level}] ${scope} ${entry.message}`;

  if (entry.durationMs !== undefined) {
    line += ` (${entry.durationMs}ms)`;
  }
  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += ` - ${entry.error.name}: ${entry.error.message}`;
  }
  return line;
}

class Logger {
  private options: LoggerOptions;

  constructor(
    private readonly serviceName: string = 'label-verifier',
    options: Partial<LoggerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Apply level/format settings; child loggers created earlier pick them up too.
   */
  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  debug(message: string, context?: LogContext, component?: string): void {
    this.write({ level: 'debug', message, context, component });
  }

  info(message: string, context?: LogContext, component?: string): void {
    this.write({ level: 'info', message, context, component });
  }

  warn(message: string, context?: LogContext, component?: string): void {
    this.write({ level: 'warn', message, context, component });
  }

  /**
   * Log errors with the serialized cause
   */
  error(message: string, error?: unknown, context?: LogContext, component?: string): void {
    this.write({
      level: 'error',
      message,
      context,
      component,
      error: error === undefined ? undefined : toErrorShape(error),
    });
  }

  /**
   * Log with execution timing
   */
  timed(
    message: string,
    durationMs: number,
    context?: LogContext,
    component?: string,
    level: LogLevel = 'info'
  ): void {
    this.write({ level, message, context, component, durationMs });
  }

  /**
   * Create a child logger with a component name
   */
  withComponent(component: string): ComponentLogger {
    return new ComponentLogger(this, component);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.options.level];
  }

  private write(entry: Omit<LogEntry, 'timestamp' | 'service'>): void {
    if (!this.isEnabled(entry.level)) {
      return;
    }

    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      service: this.serviceName,
      ...entry,
    };

    console.error(this.options.format === 'json' ? JSON.stringify(logEntry) : formatText(logEntry));
  }
}

/**
 * Component-specific logger that includes component name in all logs
 */
class ComponentLogger {
  constructor(
    private readonly parent: Logger,
    readonly component: string
  ) {}

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, context, this.component);
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, context, this.component);
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, context, this.component);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.parent.error(message, error, context, this.component);
  }

  timed(message: string, durationMs: number, context?: LogContext, level: LogLevel = 'info'): void {
    this.parent.timed(message, durationMs, context, this.component, level);
  }
}

// Export singleton instance
export const logger = new Logger();

// Export classes for testing
export { Logger, ComponentLogger };
