/**
 * Failure Handler
 *
 * Decides what happens after a node attempt fails: retry after a delay,
 * give up on the node (dependents are skipped unless the node is optional),
 * or abort the run. Each decision looks only at the node, its error and its
 * attempt count; there is no memory across nodes.
 *
 * @module automation/runtime
 */

import type { ToolNode } from '../../execution/ToolNode.js';
import type { NodeExecutionError } from '../../errors/NodeErrors.js';
import { FailurePolicy, type FailurePolicyConfig, type ToolFailureRule } from '../FailurePolicy.js';
import { RetryPolicy } from '../RetryPolicy.js';

export type FailureDecision =
  | { readonly action: 'retry'; readonly delayMs: number }
  | { readonly action: 'skip' }
  | { readonly action: 'abort' };

export interface FailureHandlerOptions {
  /** Random source for backoff jitter */
  random?: () => number;
}

export class FailureHandler {
  private readonly policy: FailurePolicy;
  private readonly random?: () => number;

  constructor(config: FailurePolicyConfig | FailurePolicy = {}, options: FailureHandlerOptions = {}) {
    this.policy = config instanceof FailurePolicy ? config : new FailurePolicy(config);
    this.random = options.random;
  }

  /**
   * @param attempt - The attempt that just failed (1-indexed)
   */
  decide(node: ToolNode, error: NodeExecutionError, attempt: number): FailureDecision {
    if (error.kind === 'Cancelled') {
      return { action: 'skip' };
    }

    const rule = this.policy.ruleFor(node);
    const retry = RetryPolicy.fromRule(rule, this.random);

    if (retry.shouldRetry(error, attempt)) {
      return { action: 'retry', delayMs: retry.getDelay(attempt) };
    }

    return rule.criticality === 'critical' ? { action: 'abort' } : { action: 'skip' };
  }

  /**
   * Whether dependents may run without this node's output
   */
  isTolerable(node: ToolNode): boolean {
    return this.policy.ruleFor(node).criticality === 'optional';
  }

  ruleFor(node: ToolNode): ToolFailureRule {
    return this.policy.ruleFor(node);
  }
}
