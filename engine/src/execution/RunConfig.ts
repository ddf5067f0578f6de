/**
 * Run Configuration
 *
 * Per-run options accepted by ExecutionScheduler.run/start, validated with
 * zod and resolved against the plan.
 *
 * @module execution
 */

import { availableParallelism } from 'node:os';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { MAX_TIMEOUT_MS } from '../automation/TimeoutManager.js';
import { ConfigError } from '../errors/ConfigErrors.js';
import type { ExecutionPlan } from './ExecutionPlan.js';

export interface RunConfig {
  /** Generated when omitted */
  runId?: string;

  /** Worker pool size (default: available parallelism, capped by plan.maxParallel) */
  concurrency?: number;

  /** Per-attempt timeout for nodes that set none (default: 30000) */
  defaultTimeoutMs?: number;

  /** Whole-run budget; expiry cancels the run (default: plan.timeoutMs) */
  timeoutMs?: number;

  /** External cancellation */
  signal?: AbortSignal;

  /** Consult and fill the ResultCache (default: true) */
  useCache?: boolean;
}

export interface ResolvedRunConfig {
  readonly runId: string;
  readonly concurrency: number;
  readonly defaultTimeoutMs: number;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
  readonly useCache: boolean;
}

export const DEFAULT_NODE_TIMEOUT_MS = 30_000;

const runConfigSchema = z
  .object({
    runId: z.string().min(1),
    concurrency: z.number().int().min(1),
    defaultTimeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS),
    timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS),
    signal: z.instanceof(AbortSignal),
    useCache: z.boolean(),
  })
  .partial()
  .strict();

/**
 * Validate a run configuration and fill in defaults
 *
 * @throws {ConfigError}
 */
export function resolveRunConfig(plan: ExecutionPlan, config: RunConfig = {}): ResolvedRunConfig {
  const parsed = runConfigSchema.safeParse(config);
  if (!parsed.success) {
    throw new ConfigError(
      'run configuration',
      parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }

  let concurrency = config.concurrency ?? availableParallelism();
  if (plan.maxParallel !== undefined) {
    concurrency = Math.min(concurrency, plan.maxParallel);
  }

  return Object.freeze({
    runId: config.runId ?? randomUUID(),
    concurrency: Math.max(1, concurrency),
    defaultTimeoutMs: config.defaultTimeoutMs ?? DEFAULT_NODE_TIMEOUT_MS,
    timeoutMs: config.timeoutMs ?? plan.timeoutMs,
    signal: config.signal,
    useCache: config.useCache ?? true,
  });
}
