/**
 * Log categories (phase-based, not feature-based)
 *
 * - 'system': engine lifecycle, configuration, tool registration
 * - 'analysis': definition loading, validation, plan building
 * - 'runtime': run execution (dispatch, retries, cache, completion)
 */
export type LogCategory = 'system' | 'analysis' | 'runtime';

/**
 * Levels accepted by EngineLogger. 'silent' disables output.
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Engine logger configuration
 */
export interface EngineLoggerConfig {
  /** Minimum level to output */
  level: LogLevel;

  /** Write to this file instead of stderr */
  file?: string;

  /** Include ISO timestamps (default: true) */
  timestamp?: boolean;

  /** Logger name, emitted on every line */
  name?: string;
}
