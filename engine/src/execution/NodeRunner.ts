/**
 * Node Runner
 *
 * Drives one dispatched node from READY to its final outcome: cache lookup,
 * attempts under a timeout, output validation, and retries as the
 * FailureHandler decides. Statuses are written to the WorkflowRun; the
 * outcome tells the scheduler what the failure means for the rest of the run.
 *
 * @module execution
 */

import type { FailureHandler } from '../automation/runtime/FailureHandler.js';
import { BackoffTimer } from '../automation/runtime/BackoffTimer.js';
import { TimeoutManager } from '../automation/TimeoutManager.js';
import { copyRecord } from '../cache/DataCopy.js';
import { computeFingerprint } from '../cache/Fingerprint.js';
import type { ResultCache } from '../cache/ResultCache.js';
import type { EngineLogger } from '../core/EngineLogger.js';
import { ToolweaveErrorCode } from '../errors/ErrorCodes.js';
import {
  NodeCancelledError,
  NodeTimeoutError,
  ToolError,
  toNodeError,
  type NodeExecutionError,
} from '../errors/NodeErrors.js';
import { createEvent, EngineEventType } from '../events/EngineEvents.js';
import type { EventBus } from '../events/EventBus.js';
import type { WorkflowRun } from '../state/WorkflowRun.js';
import { describeValueType, matchesFieldType, type ToolInput, type ToolOutput } from '../types/core-types.js';
import type { ResolvedRunConfig } from './RunConfig.js';
import { InputResolver } from './InputResolver.js';
import { resolveNodeTimeout, type ToolNode } from './ToolNode.js';

export type NodeOutcome =
  | { readonly nodeId: string; readonly status: 'succeeded' }
  | { readonly nodeId: string; readonly status: 'failed'; readonly action: 'skip' | 'abort' }
  /** Run stopped before the first attempt started; node is still READY */
  | { readonly nodeId: string; readonly status: 'interrupted' };

type AttemptResult =
  | { readonly ok: true; readonly output: ToolOutput }
  | { readonly ok: false; readonly error: NodeExecutionError };

export interface NodeRunnerContext {
  readonly run: WorkflowRun;
  readonly config: ResolvedRunConfig;
  /** Aborted when the run is cancelled or aborted */
  readonly signal: AbortSignal;
  readonly failureHandler: FailureHandler;
  readonly events: EventBus;
  readonly logger: EngineLogger;
  readonly cache?: ResultCache;
}

/**
 * Human-readable text for an AbortSignal reason
 */
export function describeAbortReason(reason: unknown): string {
  if (typeof reason === 'string') return reason;
  if (reason instanceof Error) return reason.message;
  return 'aborted';
}

function isToolOutput(value: unknown): value is ToolOutput {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class NodeRunner {
  private readonly context: NodeRunnerContext;

  constructor(context: NodeRunnerContext) {
    this.context = context;
  }

  /**
   * Run a READY node to completion. Never rejects for tool failures.
   */
  async execute(node: ToolNode): Promise<NodeOutcome> {
    const { run, signal } = this.context;
    const input = InputResolver.resolve(node, run);
    const fingerprint = computeFingerprint(node.spec.name, input);

    const cached = await this.lookup(node, fingerprint);
    if (signal.aborted) {
      return { nodeId: node.id, status: 'interrupted' };
    }
    if (cached && fingerprint !== undefined) {
      run.markSucceeded(node.id, copyRecord(cached), { cached: true, fingerprint });
      this.context.events.emit(
        createEvent(EngineEventType.NODE_CACHE_HIT, run.runId, { nodeId: node.id, tool: node.spec.name, fingerprint }),
      );
      return { nodeId: node.id, status: 'succeeded' };
    }

    for (;;) {
      const attempt = run.markRunning(node.id);
      const result = await this.attempt(node, input, attempt).then(
        (output): AttemptResult => ({ ok: true, output }),
        (thrown: unknown): AttemptResult => ({ ok: false, error: toNodeError(thrown, node.id, attempt) }),
      );

      if (result.ok) {
        const output = copyRecord(result.output);
        run.markSucceeded(node.id, output, { fingerprint });
        await this.store(node, fingerprint, output);
        return { nodeId: node.id, status: 'succeeded' };
      }

      const { error } = result;
      run.markFailed(node.id, error.toInfo());
      const decision = this.context.failureHandler.decide(node, error, attempt);

      if (decision.action !== 'retry') {
        this.context.logger.warn(`Node "${node.id}" failed`, {
          nodeId: node.id,
          attempt,
          kind: error.kind,
          action: decision.action,
          error: error.message,
        });
        return { nodeId: node.id, status: 'failed', action: decision.action };
      }

      this.context.logger.info(`Retrying node "${node.id}" in ${BackoffTimer.formatDelay(decision.delayMs)}`, {
        nodeId: node.id,
        attempt,
        kind: error.kind,
      });
      this.context.events.emit(
        createEvent(EngineEventType.NODE_RETRY_SCHEDULED, run.runId, {
          nodeId: node.id,
          attempt,
          delayMs: decision.delayMs,
          error: error.toInfo(),
        }),
      );

      try {
        await BackoffTimer.wait(decision.delayMs, signal);
      } catch (reason) {
        this.context.logger.debug(`Retry of node "${node.id}" abandoned: ${describeAbortReason(reason)}`);
        return { nodeId: node.id, status: 'failed', action: 'skip' };
      }

      if (signal.aborted) {
        return { nodeId: node.id, status: 'failed', action: 'skip' };
      }
    }
  }

  /**
   * One attempt: invoke under the node timeout, then validate the output.
   * Each attempt gets its own copy of the input.
   */
  private async attempt(node: ToolNode, resolved: ToolInput, attempt: number): Promise<ToolOutput> {
    const { run, config, logger } = this.context;
    const timeoutMs = resolveNodeTimeout(node, config.defaultTimeoutMs);

    logger.debug(`Invoking "${node.spec.name}" for node "${node.id}"`, { nodeId: node.id, attempt, timeoutMs });
    const input = copyRecord(resolved);

    const raw: unknown = await TimeoutManager.execute(
      signal =>
        node.adapter.invoke(input, {
          signal,
          runId: run.runId,
          nodeId: node.id,
          attempt,
          logger: logger.child(`tool:${node.spec.name}`, 'runtime'),
        }),
      {
        timeoutMs,
        signal: this.context.signal,
        onTimeout: () => new NodeTimeoutError(node.id, attempt, timeoutMs),
        onAbort: reason => new NodeCancelledError(node.id, attempt, describeAbortReason(reason)),
      },
    );

    return NodeRunner.validateOutput(node, raw, attempt);
  }

  /**
   * Check a raw tool result against the declared outputs
   *
   * @throws {ToolError} With code NODE_INVALID_OUTPUT
   */
  static validateOutput(node: ToolNode, raw: unknown, attempt: number): ToolOutput {
    const invalid = (message: string): ToolError =>
      new ToolError(message, { nodeId: node.id, attempt, code: ToolweaveErrorCode.NODE_INVALID_OUTPUT });

    if (!isToolOutput(raw)) {
      throw invalid(`Tool "${node.spec.name}" returned ${describeValueType(raw)}, expected an object`);
    }

    for (const field of node.spec.outputs) {
      const present = Object.hasOwn(raw, field.name) && raw[field.name] !== undefined;
      if (!present) {
        if (field.optional) continue;
        throw invalid(`Tool "${node.spec.name}" did not return declared output "${field.name}"`);
      }
      if (!matchesFieldType(field.type, raw[field.name])) {
        throw invalid(
          `Output "${field.name}" of tool "${node.spec.name}" should be ${field.type}, got ${describeValueType(raw[field.name])}`,
        );
      }
    }

    return raw;
  }

  private cacheEnabled(node: ToolNode): boolean {
    return this.context.cache !== undefined && this.context.config.useCache && node.spec.cacheable !== false;
  }

  private async lookup(node: ToolNode, fingerprint: string | undefined): Promise<ToolOutput | undefined> {
    if (!this.context.cache || fingerprint === undefined || !this.cacheEnabled(node)) {
      return undefined;
    }
    try {
      return await this.context.cache.get(node.spec.name, fingerprint);
    } catch (error) {
      this.context.logger.warn(`Cache lookup failed for node "${node.id}", treating as miss`, {
        nodeId: node.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  private async store(node: ToolNode, fingerprint: string | undefined, output: ToolOutput): Promise<void> {
    if (!this.context.cache || fingerprint === undefined || !this.cacheEnabled(node)) {
      return;
    }
    try {
      await this.context.cache.put(node.spec.name, fingerprint, output);
    } catch (error) {
      this.context.logger.warn(`Cache write failed for node "${node.id}"`, {
        nodeId: node.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
