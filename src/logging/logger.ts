/**
 * Logging
 *
 * Thin wrapper over pino. Components take a Logger in their options and
 * derive children carrying `component` and `ownerId`. Output goes to stderr
 * so the CLI's replies on stdout stay clean.
 */

import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
}

export interface LogContext {
  component?: string;
  ownerId?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function createPinoLogger(options: LoggerOptions): pino.Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (envLevel && isLogLevel(envLevel) ? envLevel : 'info');
  const pretty = options.pretty ?? process.env.LOG_PRETTY === '1';

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'sandbox-sessions',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(pinoOptions, pino.destination(2));
}

export class Logger {
  private constructor(private readonly pino: pino.Logger) {}

  static create(options: LoggerOptions = {}): Logger {
    return new Logger(createPinoLogger(options));
  }

  /**
   * Create a child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger(this.pino.child(context));
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.pino.trace(data ?? {}, msg);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(data ?? {}, msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(data ?? {}, msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(data ?? {}, msg);
  }

  error(msg: string, error?: unknown): void {
    if (error instanceof Error) {
      this.pino.error({ err: error }, msg);
    } else if (error !== undefined) {
      this.pino.error({ detail: error }, msg);
    } else {
      this.pino.error(msg);
    }
  }

  /**
   * Log how long an async operation took, at debug level.
   */
  async timed<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      return await fn();
    } finally {
      this.debug(`${label} finished`, { durationMs: Number((performance.now() - start).toFixed(2)) });
    }
  }
}

let defaultLogger: Logger | null = null;

/**
 * Get the process-wide fallback logger, used when a component is not
 * handed one explicitly.
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = Logger.create();
  }
  return defaultLogger;
}

/**
 * Create a component-specific logger
 */
export function createLogger(component: string, context?: LogContext): Logger {
  return getLogger().child({ component, ...context });
}
