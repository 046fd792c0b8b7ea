/**
 * Logger for Audioshelf
 *
 * - Structured JSON format for machine parsing
 * - Human-readable pretty output for the terminal
 * - No console.log - all output through pino
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import type { LoggingConfig } from '@audioshelf/shared';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LogContext {
  component?: string;
  path?: string;
  plugin?: string;
  [key: string]: unknown;
}

export interface Logger {
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(context: LogContext): Logger;
  level: LogLevel;
}

/**
 * Create pino logger options from config
 */
function createPinoOptions(config: LoggingConfig): LoggerOptions {
  return {
    level: config.level,

    serializers: {
      err: pino.stdSerializers.err,
    },

    // Add timestamp in ISO format
    timestamp: pino.stdTimeFunctions.isoTime,

    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings.pid,
        hostname: bindings.hostname,
        name: 'audioshelf',
      }),
    },
  };
}

/**
 * Create transport configuration based on output settings.
 *
 * JSON stdout is not routed through a transport: pino(options) already
 * writes JSON to fd 1 without a worker thread.
 */
function createTransport(
  config: LoggingConfig
): pino.TransportMultiOptions | pino.TransportSingleOptions | undefined {
  const targets: pino.TransportTargetOptions[] = [];

  for (const output of config.output) {
    if (output.type === 'stdout') {
      if (output.format === 'pretty') {
        targets.push({
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
          },
          level: config.level,
        });
      }
    } else {
      targets.push({
        target: 'pino/file',
        options: {
          destination: output.path,
          mkdir: true,
        },
        level: config.level,
      });
    }
  }

  if (targets.length === 0) {
    return undefined;
  }

  if (targets.length === 1) {
    return targets[0];
  }

  return { targets };
}

/**
 * Wrapper around pino with a fixed default context per child
 */
class LoggerImpl implements Logger {
  private readonly pino: PinoLogger;
  private readonly defaultContext: LogContext;

  constructor(pino: PinoLogger, defaultContext: LogContext = {}) {
    this.pino = pino;
    this.defaultContext = defaultContext;
  }

  get level(): LogLevel {
    return this.pino.level as LogLevel;
  }

  private withContext(context?: LogContext): Record<string, unknown> {
    return { ...this.defaultContext, ...context };
  }

  trace(msg: string, context?: LogContext): void {
    this.pino.trace(this.withContext(context), msg);
  }

  debug(msg: string, context?: LogContext): void {
    this.pino.debug(this.withContext(context), msg);
  }

  info(msg: string, context?: LogContext): void {
    this.pino.info(this.withContext(context), msg);
  }

  warn(msg: string, context?: LogContext): void {
    this.pino.warn(this.withContext(context), msg);
  }

  error(msg: string, context?: LogContext): void {
    this.pino.error(this.withContext(context), msg);
  }

  fatal(msg: string, context?: LogContext): void {
    this.pino.fatal(this.withContext(context), msg);
  }

  child(context: LogContext): Logger {
    const mergedContext = { ...this.defaultContext, ...context };
    return new LoggerImpl(this.pino.child({}), mergedContext);
  }
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggingConfig): Logger {
  const options = createPinoOptions(config);
  // A silent logger needs no transport worker
  const transport = config.level === 'silent' ? undefined : createTransport(config);

  let pinoLogger: PinoLogger;

  if (transport) {
    pinoLogger = pino(options, pino.transport(transport));
  } else {
    pinoLogger = pino(options);
  }

  return new LoggerImpl(pinoLogger);
}

/**
 * Create a no-op logger that silently discards all messages.
 * Used wherever a component is given no logger.
 */
export function createNoopLogger(): Logger {
  const noop: Logger = {
    trace: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    fatal: () => {},
    child: () => noop,
    level: 'info',
  };
  return noop;
}
