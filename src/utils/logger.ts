import { performance } from 'perf_hooks';
import * as fs from 'fs';
import * as path from 'path';

/**
 * Structured JSON logger shared by every component.
 * Under NODE_ENV=test the lines go to a file in test-logs/ so suites stay quiet.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

export type LogValue = string | number | boolean | null | undefined | readonly string[];

export interface LogContext {
  correlationId?: string;
  workerId?: string;
  taskId?: string;
  updateId?: string;
  operation?: string;
  duration?: number;
  [key: string]: LogValue;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string;
  };
  metrics?: Record<string, number>;
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

class Logger {
  private logLevel: LogLevel;
  private serviceName: string;
  private environment: string;
  private version: string;
  private baseContext: LogContext;
  private testLogFile?: string;

  constructor(
    serviceName: string = 'warden',
    logLevel: LogLevel = 'info',
    environment: string = process.env.NODE_ENV || 'development',
    version: string = process.env.npm_package_version || '0.1.0',
    baseContext: LogContext = {},
    testLogFile?: string
  ) {
    this.serviceName = serviceName;
    this.logLevel = logLevel;
    this.environment = environment;
    this.version = version;
    this.baseContext = baseContext;
    this.testLogFile = testLogFile;

    if (!this.testLogFile && this.environment === 'test' && process.env.TEST_LOG_FILE !== 'false') {
      const logDir = path.join(process.cwd(), 'test-logs');
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      this.testLogFile = path.join(logDir, `test-${Date.now()}-${process.pid}.log`);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.logLevel);
  }

  private formatLogEntry(
    level: LogLevel,
    message: string,
    context?: LogContext,
    error?: Error,
    metrics?: Record<string, number>
  ): LogEntry {
    const logEntry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: {
        ...this.baseContext,
        ...context,
        service: this.serviceName,
        environment: this.environment,
        version: this.version,
      },
    };

    if (error) {
      logEntry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
        code: errorCode(error),
      };
    }

    if (metrics) {
      logEntry.metrics = metrics;
    }

    return logEntry;
  }

  private writeLog(logEntry: LogEntry): void {
    const output = JSON.stringify(logEntry);

    if (this.testLogFile) {
      try {
        fs.appendFileSync(this.testLogFile, output + '\n');
        return;
      } catch (error) {
        console.error('Failed to write to test log file:', error);
      }
    }

    if (logEntry.level === 'error' || logEntry.level === 'warn') {
      console.error(output);
    } else {
      console.log(output);
    }
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog('error')) return;
    this.writeLog(this.formatLogEntry('error', message, context, error));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.shouldLog('warn')) return;
    this.writeLog(this.formatLogEntry('warn', message, context));
  }

  info(message: string, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.writeLog(this.formatLogEntry('info', message, context));
  }

  debug(message: string, context?: LogContext): void {
    if (!this.shouldLog('debug')) return;
    this.writeLog(this.formatLogEntry('debug', message, context));
  }

  trace(message: string, context?: LogContext): void {
    if (!this.shouldLog('trace')) return;
    this.writeLog(this.formatLogEntry('trace', message, context));
  }

  metric(message: string, metrics: Record<string, number>, context?: LogContext): void {
    if (!this.shouldLog('info')) return;
    this.writeLog(this.formatLogEntry('info', message, context, undefined, metrics));
  }

  /**
   * Time an async operation, logging its duration and rethrowing failures.
   */
  async timeAsync<T>(operation: string, fn: () => Promise<T>, context?: LogContext): Promise<T> {
    const startTime = performance.now();
    const operationContext = { ...context, operation };

    this.debug(`Starting operation: ${operation}`, operationContext);

    try {
      const result = await fn();
      const duration = performance.now() - startTime;
      this.metric(`Operation completed: ${operation}`, { duration, success: 1 }, { ...operationContext, duration });
      return result;
    } catch (error) {
      const duration = performance.now() - startTime;
      this.error(
        `Operation failed: ${operation}`,
        { ...operationContext, duration },
        error instanceof Error ? error : new Error(String(error))
      );
      throw error;
    }
  }

  /**
   * Child loggers share the parent's sink and level; their context is merged under each call's.
   */
  child(additionalContext: LogContext): Logger {
    return new Logger(
      this.serviceName,
      this.logLevel,
      this.environment,
      this.version,
      { ...this.baseContext, ...additionalContext },
      this.testLogFile
    );
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }
}

export const logger = new Logger();

export { Logger };
