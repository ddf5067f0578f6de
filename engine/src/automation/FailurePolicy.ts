/**
 * Failure Policy
 *
 * Per-tool failure rules: how many attempts a node gets, how long to back
 * off between them, and what a final failure means for the rest of the run.
 *
 * Resolution order (later wins):
 *   built-in defaults → policy defaults → policy.tools[toolName] → invocation overrides
 *
 * @module automation
 */

import { z } from 'zod';
import type { Criticality } from '../types/core-types.js';
import type { ToolNode } from '../execution/ToolNode.js';
import { ConfigError } from '../errors/ConfigErrors.js';
import type { BackoffType } from './BackoffStrategy.js';
import { MAX_TIMEOUT_MS } from './TimeoutManager.js';

export interface BackoffSettings {
  type: BackoffType;
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Fraction 0-1; 0 disables jitter */
  jitter: number;
}

/**
 * Fully resolved rule for one node
 */
export interface ToolFailureRule {
  /** Total attempts including the first; 1 means no retries */
  maxAttempts: number;
  criticality: Criticality;
  backoff: BackoffSettings;
}

export interface FailureRuleInput {
  maxAttempts?: number;
  criticality?: Criticality;
  backoff?: Partial<BackoffSettings>;
}

export interface FailurePolicyConfig {
  /** Applies to every tool */
  defaults?: FailureRuleInput;
  /** Overrides keyed by tool name */
  tools?: Record<string, FailureRuleInput>;
}

export const DEFAULT_FAILURE_RULE: Readonly<ToolFailureRule> = Object.freeze({
  maxAttempts: 2,
  criticality: 'required',
  backoff: Object.freeze({
    type: 'exponential',
    baseDelayMs: 1000,
    maxDelayMs: 30000,
    multiplier: 2,
    jitter: 0.1,
  }),
});

const backoffSchema = z
  .object({
    type: z.enum(['fixed', 'linear', 'exponential']),
    baseDelayMs: z.number().min(0).max(MAX_TIMEOUT_MS),
    maxDelayMs: z.number().min(0).max(MAX_TIMEOUT_MS),
    multiplier: z.number().positive(),
    jitter: z.number().min(0).max(1),
  })
  .partial()
  .strict();

export const failureRuleSchema = z
  .object({
    maxAttempts: z.number().int().min(1),
    criticality: z.enum(['optional', 'required', 'critical']),
    backoff: backoffSchema,
  })
  .partial()
  .strict();

export const failurePolicySchema = z
  .object({
    defaults: failureRuleSchema.optional(),
    tools: z.record(failureRuleSchema).optional(),
  })
  .strict();

function mergeRule(base: ToolFailureRule, override: FailureRuleInput | undefined): ToolFailureRule {
  if (!override) {
    return base;
  }
  return {
    maxAttempts: override.maxAttempts ?? base.maxAttempts,
    criticality: override.criticality ?? base.criticality,
    backoff: { ...base.backoff, ...override.backoff },
  };
}

export class FailurePolicy {
  private readonly config: FailurePolicyConfig;
  private readonly base: ToolFailureRule;

  /**
   * @throws {ConfigError} If the configuration is malformed
   */
  constructor(config: FailurePolicyConfig = {}) {
    const parsed = failurePolicySchema.safeParse(config);
    if (!parsed.success) {
      throw new ConfigError(
        'failure policy',
        parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
      );
    }
    this.config = config;
    this.base = mergeRule(
      { ...DEFAULT_FAILURE_RULE, backoff: { ...DEFAULT_FAILURE_RULE.backoff } },
      config.defaults,
    );
  }

  /**
   * Effective rule for a node
   */
  ruleFor(node: ToolNode): ToolFailureRule {
    const toolRule = mergeRule(this.base, this.config.tools?.[node.spec.name]);
    return mergeRule(toolRule, {
      maxAttempts: node.invocation.retry?.maxAttempts,
      criticality: node.invocation.criticality,
    });
  }
}
