/**
 * Engine Logger
 *
 * Structured logging for the engine on top of pino. Lines are JSON and go to
 * stderr (or a file) so command output on stdout stays clean.
 *
 * Loggers are passed explicitly to the components that need them; use
 * `child()` to attach a source and category.
 *
 * @module core
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import type { EngineLoggerConfig, LogCategory, LogLevel } from '../types/log-types.js';

export class EngineLogger {
  private readonly config: EngineLoggerConfig;
  private readonly logger: Logger;

  constructor(config: EngineLoggerConfig, instance?: Logger) {
    this.config = { ...config };
    this.logger = instance ?? EngineLogger.createPino(config);
  }

  private static createPino(config: EngineLoggerConfig): Logger {
    const options: LoggerOptions = {
      level: config.level,
      name: config.name ?? 'toolweave',
      timestamp: config.timestamp === false ? false : pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
    };

    if (config.file) {
      return pino(options, pino.destination({ dest: config.file, sync: true }));
    }
    return pino(options, pino.destination({ dest: 2, sync: true }));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context ?? {}, message);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context ?? {}, message);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context ?? {}, message);
  }

  /**
   * Log an error; the error is serialized under `err`
   */
  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.logger.error({ ...context, err: error }, message);
  }

  /**
   * Derive a logger that tags every line with a source component and phase
   */
  child(source: string, category?: LogCategory): EngineLogger {
    const bindings: Record<string, string> = { source };
    if (category) {
      bindings.category = category;
    }
    return new EngineLogger(this.config, this.logger.child(bindings));
  }

  willLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return this.logger.isLevelEnabled(level);
  }

  get level(): LogLevel {
    return this.config.level;
  }
}

/**
 * Create an engine logger for the given level
 */
export function createEngineLogger(level: LogLevel, options: Omit<EngineLoggerConfig, 'level'> = {}): EngineLogger {
  return new EngineLogger({ ...options, level });
}

/**
 * Logger that discards everything; the default for library callers and tests
 */
export function createSilentLogger(): EngineLogger {
  return new EngineLogger({ level: 'silent' }, pino({ level: 'silent' }));
}
