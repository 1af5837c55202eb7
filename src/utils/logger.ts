/**
 * Console-based logging utility with environment-aware formatting.
 * - Development (NODE_ENV !== 'production'): Pretty, colored output
 * - Production: JSON structured output, one line per entry
 */

import { LogConfig } from '../config';

// ANSI color codes for terminal output
const colors = {
  cyan: '\u001B[36m',
  dim: '\u001B[2m',
  gray: '\u001B[90m',
  red: '\u001B[31m',
  reset: '\u001B[0m',
  yellow: '\u001B[33m',
} as const;

export type LogContext = Record<string, unknown>;

export type LogLevel = 'debug' | 'error' | 'info' | 'warn';

export interface LoggerOptions {
  bindings?: LogContext;
  json?: boolean;
  minLevel?: LogLevel;
  write?: (level: LogLevel, line: string) => void;
}

export interface TimerResult {
  end: (level: LogLevel, message: string, context?: LogContext) => void;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  bindings?: LogContext;
  context?: LogContext;
  durationMs?: number;
  error?: {
    message: string;
    name: string;
    cause?: string;
    stack?: string;
  };
}

// Log level priority for filtering
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  error: 3,
  info: 1,
  warn: 2,
};

/**
 * Narrow an arbitrary string (usually LOG_LEVEL) to a level, falling back to 'debug'.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'error':
    case 'info':
    case 'warn': {
      return value;
    }
    default: {
      return 'debug';
    }
  }
}

function writeToConsole(level: LogLevel, line: string): void {
  switch (level) {
    case 'error': {
      console.error(line);
      break;
    }
    case 'warn': {
      console.warn(line);
      break;
    }
    default: {
      console.log(line);
    }
  }
}

export class Logger {
  private bindings: LogContext;
  private json: boolean;
  private minLevel: LogLevel;
  private write: (level: LogLevel, line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.bindings = options.bindings ?? {};
    this.json = options.json ?? LogConfig.json;
    this.minLevel = options.minLevel ?? parseLogLevel(LogConfig.level);
    this.write = options.write ?? writeToConsole;
  }

  /**
   * Create a child logger whose entries carry extra bound context
   * (correlation ID, workout ID) on top of this logger's own.
   */
  child(bindings: LogContext): Logger {
    return new Logger({
      bindings: { ...this.bindings, ...bindings },
      json: this.json,
      minLevel: this.minLevel,
      write: this.write,
    });
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.log('error', message, context, error);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  /**
   * Start a timer for measuring operation duration.
   * Returns an object with an `end` method to log the completion.
   */
  startTimer(operation: string): TimerResult {
    const startTime = Date.now();
    this.debug(`Starting: ${operation}`);

    return {
      end: (level: LogLevel, message: string, context?: LogContext) => {
        const durationMs = Date.now() - startTime;
        this.log(level, message, context, undefined, durationMs);
      },
    };
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  private formatError(error: unknown): LogEntry['error'] | undefined {
    if (error === undefined || error === null) return undefined;
    if (error instanceof Error) {
      return {
        cause: error.cause instanceof Error ? error.cause.message : undefined,
        message: error.message,
        name: error.name,
        stack: error.stack,
      };
    }
    return {
      message: typeof error === 'string' ? error : JSON.stringify(error),
      name: 'UnknownError',
    };
  }

  private formatPretty(entry: LogEntry): string {
    const levelColors: Record<LogLevel, string> = {
      debug: colors.gray,
      error: colors.red,
      info: colors.cyan,
      warn: colors.yellow,
    };

    const color = levelColors[entry.level];
    const timestamp = `${colors.dim}${entry.timestamp}${colors.reset}`;
    const level = `${color}${entry.level.toUpperCase().padEnd(5)}${colors.reset}`;
    const correlationId =
      typeof entry.bindings?.correlationId === 'string'
        ? `${colors.dim}[${entry.bindings.correlationId}]${colors.reset} `
        : '';
    const duration =
      entry.durationMs === undefined
        ? ''
        : ` ${colors.dim}(${String(entry.durationMs)}ms)${colors.reset}`;

    let output = `${timestamp} ${level} ${correlationId}${entry.message}${duration}`;

    const context = { ...entry.bindings, ...entry.context };
    delete context.correlationId;
    if (Object.keys(context).length > 0) {
      output += `\n  ${colors.dim}${JSON.stringify(context)}${colors.reset}`;
    }

    if (entry.error) {
      output += `\n  ${colors.red}${entry.error.name}: ${entry.error.message}${colors.reset}`;
      if (entry.error.cause) {
        output += `\n  ${colors.red}caused by: ${entry.error.cause}${colors.reset}`;
      }
      if (entry.error.stack) {
        output += `\n${colors.dim}${entry.error.stack}${colors.reset}`;
      }
    }

    return output;
  }

  private log(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: unknown,
    durationMs?: number,
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.minLevel]) return;

    const entry: LogEntry = {
      bindings: Object.keys(this.bindings).length > 0 ? this.bindings : undefined,
      context,
      durationMs,
      error: this.formatError(error),
      level,
      message,
      timestamp: new Date().toISOString(),
    };

    this.write(level, this.json ? JSON.stringify(entry) : this.formatPretty(entry));
  }
}

// Export singleton instance for general use (non-request contexts)
export const logger = new Logger();
