import pino, { type Logger, type LoggerOptions } from 'pino';
import type { LoggerPort, LogLevel } from './logger.port';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  prettyPrint?: boolean;
  traceErrors?: boolean;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

export class PinoLogger implements LoggerPort {
  private logger: Logger;
  private name: string;
  private traceErrors: boolean;

  constructor(config: LoggerConfig, existingLogger?: Logger) {
    this.name = config.name;
    this.traceErrors = config.traceErrors ?? false;

    if (existingLogger) {
      this.logger = existingLogger;
      return;
    }

    const options: LoggerOptions = {
      name: config.name,
      level: config.level,
    };

    if (config.prettyPrint) {
      options.transport = {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      };
    }

    this.logger = pino(options);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.logger.trace(context, message);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context, message);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context, message);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context, message);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.logger.error(this.withError(error, context), message);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.logger.fatal(this.withError(error, context), message);
  }

  child(bindings: Record<string, unknown>): LoggerPort {
    const childLogger = this.logger.child(bindings);
    return new PinoLogger({ name: this.name, level: this.getLevel(), traceErrors: this.traceErrors }, childLogger);
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  getLevel(): LogLevel {
    const level = this.logger.level;
    return isLogLevel(level) ? level : 'info';
  }

  private withError(error: Error | undefined, context?: Record<string, unknown>): Record<string, unknown> | undefined {
    if (!error) {
      return context;
    }
    return {
      ...context,
      err: this.traceErrors ? { message: error.message, stack: error.stack } : { message: error.message },
    };
  }
}

let globalRootLogger: LoggerPort | null = null;

/**
 * Replaces the process-wide root logger. Child loggers created before the call
 * keep writing through the previous root, so call this before building modules.
 */
export function createPinoLogger(config: { name: string; logLevel?: LogLevel; traceErrors?: boolean }): LoggerPort {
  const envLevel = process.env.LOG_LEVEL;
  const level = config.logLevel ?? (isLogLevel(envLevel) ? envLevel : 'info');

  globalRootLogger = new PinoLogger({
    name: config.name,
    level,
    traceErrors: config.traceErrors,
    prettyPrint: process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test',
  });
  return globalRootLogger;
}

function getRootLogger(): LoggerPort {
  if (!globalRootLogger) {
    const envLevel = process.env.LOG_LEVEL;
    return createPinoLogger({
      name: 'ces',
      logLevel: isLogLevel(envLevel) ? envLevel : process.env.NODE_ENV === 'test' ? 'fatal' : 'info',
    });
  }
  return globalRootLogger;
}

/**
 * Module-scoped logger that always resolves through the current root, so a
 * logger created at import time still honours the level configured later.
 */
export function createChildLogger(name: string): LoggerPort {
  return new DeferredLogger(name);
}

class DeferredLogger implements LoggerPort {
  private cachedRoot: LoggerPort | null = null;
  private cachedChild: LoggerPort | null = null;

  constructor(private readonly name: string) {}

  trace(message: string, context?: Record<string, unknown>): void {
    this.resolve().trace(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.resolve().debug(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.resolve().info(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.resolve().warn(message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.resolve().error(message, error, context);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.resolve().fatal(message, error, context);
  }

  child(bindings: Record<string, unknown>): LoggerPort {
    return this.resolve().child(bindings);
  }

  setLevel(level: LogLevel): void {
    this.resolve().setLevel(level);
  }

  getLevel(): LogLevel {
    return this.resolve().getLevel();
  }

  private resolve(): LoggerPort {
    const root = getRootLogger();
    if (root !== this.cachedRoot || !this.cachedChild) {
      this.cachedRoot = root;
      this.cachedChild = root.child({ name: this.name });
    }
    return this.cachedChild;
  }
}
