/**
 * Structured logger for classifiers
 * Provides consistent logging with context and levels
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export interface LogContext {
  component?: string;
  trainingSize?: number;
  testSize?: number;
  error?: Error;
  [key: string]: unknown;
}

export type LogLevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Console sink, replaceable so tests can capture output
 */
export type LogSink = (level: LogLevelName, message: string) => void;

const consoleSink: LogSink = (level, message) => {
  switch (level) {
    case 'DEBUG':
    case 'INFO':
      console.log(message);
      break;
    case 'WARN':
      console.warn(message);
      break;
    case 'ERROR':
      console.error(message);
      break;
  }
};

export class ClassifierLogger {
  private level: LogLevel;
  private prefix: string;
  private sink: LogSink;
  private baseContext: LogContext;

  constructor(
    level: LogLevel = LogLevel.INFO,
    prefix: string = '[Classify]',
    sink: LogSink = consoleSink,
    baseContext: LogContext = {}
  ) {
    this.level = level;
    this.prefix = prefix;
    this.sink = sink;
    this.baseContext = baseContext;
  }

  debug(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.DEBUG) {
      this.log('DEBUG', message, context);
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.INFO) {
      this.log('INFO', message, context);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.WARN) {
      this.log('WARN', message, context);
    }
  }

  error(message: string, context?: LogContext): void {
    if (this.level <= LogLevel.ERROR) {
      this.log('ERROR', message, context);
    }
  }

  private log(level: LogLevelName, message: string, context?: LogContext): void {
    const merged: LogContext = { ...this.baseContext, ...context };
    const component = merged.component ? `[${merged.component}]` : '';
    const logMessage = `${this.prefix} ${component} ${level}: ${message}`;

    // Extract error for separate logging
    const { error, component: _component, ...cleanContext } = merged;

    const contextStr = Object.keys(cleanContext).length > 0
      ? `\n  Context: ${JSON.stringify(cleanContext, null, 2)}`
      : '';

    const errorStr = error
      ? `\n  Error: ${error.message}\n  Stack: ${error.stack}`
      : '';

    this.sink(level, `${logMessage}${contextStr}${errorStr}`);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): ClassifierLogger {
    return new ClassifierLogger(this.level, this.prefix, this.sink, {
      ...this.baseContext,
      ...context,
    });
  }

  /**
   * Set log level
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Get current log level
   */
  getLevel(): LogLevel {
    return this.level;
  }
}

/**
 * Create logger from environment/config
 */
export function createLogger(debug?: boolean): ClassifierLogger {
  const level = debug ? LogLevel.DEBUG : LogLevel.INFO;
  return new ClassifierLogger(level);
}

/**
 * Logger that discards everything
 */
export const silentLogger = new ClassifierLogger(LogLevel.NONE);
