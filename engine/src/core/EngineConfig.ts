/**
 * Engine Configuration
 *
 * User-facing configuration for WorkflowEngine, with defaults and
 * validation.
 *
 * @module core
 */

import { z } from 'zod';
import type { ToolAdapter } from '../adapters/ToolAdapter.js';
import { failurePolicySchema, type FailurePolicyConfig } from '../automation/FailurePolicy.js';
import { MAX_TIMEOUT_MS } from '../automation/TimeoutManager.js';
import { MemoryResultCache, type MemoryResultCacheConfig } from '../cache/MemoryResultCache.js';
import type { ResultCache } from '../cache/ResultCache.js';
import { ConfigError } from '../errors/ConfigErrors.js';
import { DEFAULT_NODE_TIMEOUT_MS } from '../execution/RunConfig.js';
import { LOG_LEVELS, type LogLevel } from '../types/log-types.js';
import type { EngineLogger } from './EngineLogger.js';

/**
 * Engine configuration options
 *
 * @example
 * ```ts
 * const engine = new WorkflowEngine({
 *   logLevel: 'info',
 *   concurrency: 4,
 *   cache: { maxEntries: 1000, ttlMs: 600_000 },
 *   failurePolicy: { tools: { fetcher: { maxAttempts: 3 } } },
 *   tools: [fetcher, transformer],
 * });
 * ```
 */
export interface WorkflowEngineConfig {
  // === Execution ===

  /**
   * Default worker pool size per run
   * @default os.availableParallelism()
   */
  concurrency?: number;

  /**
   * Per-attempt timeout for tools that declare none (milliseconds)
   * @default 30000
   */
  defaultTimeoutMs?: number;

  /** Retry and criticality rules */
  failurePolicy?: FailurePolicyConfig;

  /**
   * Result cache shared by every run of this engine. Pass options for the
   * built-in in-memory cache, your own implementation, or false to disable.
   * @default in-memory cache with default limits
   */
  cache?: false | ResultCache | MemoryResultCacheConfig;

  /** Tools registered at construction */
  tools?: ToolAdapter[];

  // === Logging ===

  /** @default 'info' */
  logLevel?: LogLevel;

  /** Shortcut for logLevel 'debug' */
  verbose?: boolean;

  /** Write logs to this file instead of stderr */
  logFile?: string;

  /** Use this logger instead of creating one */
  logger?: EngineLogger;
}

export interface ResolvedEngineConfig {
  readonly concurrency?: number;
  readonly defaultTimeoutMs: number;
  readonly failurePolicy: FailurePolicyConfig;
  readonly cache?: ResultCache;
  readonly tools: readonly ToolAdapter[];
  readonly logLevel: LogLevel;
  readonly logFile?: string;
  readonly logger?: EngineLogger;
}

const engineConfigSchema = z
  .object({
    concurrency: z.number().int().min(1).optional(),
    defaultTimeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
    failurePolicy: failurePolicySchema.optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    verbose: z.boolean().optional(),
    logFile: z.string().min(1).optional(),
  })
  .passthrough();

/**
 * Validate engine configuration
 *
 * @throws {ConfigError} Listing every invalid option
 */
export function validateConfig(config: WorkflowEngineConfig): void {
  const parsed = engineConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigError(
      'engine configuration',
      parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
}

function resolveCache(cache: WorkflowEngineConfig['cache']): ResultCache | undefined {
  if (cache === false) {
    return undefined;
  }
  if (cache && 'get' in cache) {
    return cache;
  }
  return new MemoryResultCache(cache);
}

/**
 * Apply default values to engine configuration
 */
export function applyConfigDefaults(config: WorkflowEngineConfig = {}): ResolvedEngineConfig {
  return {
    concurrency: config.concurrency,
    defaultTimeoutMs: config.defaultTimeoutMs ?? DEFAULT_NODE_TIMEOUT_MS,
    failurePolicy: config.failurePolicy ?? {},
    cache: resolveCache(config.cache),
    tools: config.tools ?? [],
    logLevel: config.verbose ? 'debug' : (config.logLevel ?? 'info'),
    logFile: config.logFile,
    logger: config.logger,
  };
}
