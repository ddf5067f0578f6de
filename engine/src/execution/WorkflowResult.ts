/**
 * Workflow Result
 *
 * Final, serializable outcome of a run, built from the WorkflowRun once it
 * reaches a terminal status.
 *
 * @module execution
 */

import type { NodeErrorInfo } from '../errors/NodeErrors.js';
import type { NodeRecord, RunSnapshot } from '../state/WorkflowRun.js';
import { NodeStatus, RunStatus, type SkipCause, type ToolOutput } from '../types/core-types.js';

export type NodeResult =
  | {
      readonly status: NodeStatus.SUCCEEDED;
      readonly tool: string;
      readonly output: ToolOutput;
      readonly attempts: number;
      readonly cached: boolean;
    }
  | {
      readonly status: NodeStatus.FAILED;
      readonly tool: string;
      readonly error: NodeErrorInfo;
      readonly attempts: number;
    }
  | {
      readonly status: NodeStatus.SKIPPED;
      readonly tool: string;
      readonly cause: SkipCause;
    };

export interface WorkflowResultMetadata {
  /** Nodes whose tool was invoked at least once */
  readonly toolsExecuted: number;
  readonly toolsSucceeded: number;
  readonly toolsFailed: number;
  readonly toolsSkipped: number;
  readonly cacheHits: number;
  readonly totalAttempts: number;
}

export interface WorkflowResult {
  readonly runId: string;
  readonly workflowName: string;
  readonly status: RunStatus;
  readonly startedAt: number;
  readonly completedAt: number;
  readonly durationMs: number;
  /** Every node of the plan, in declaration order */
  readonly nodes: Readonly<Record<string, NodeResult>>;
  /** `<nodeId>: <message>` for each failed node */
  readonly errors: readonly string[];
  readonly cancelReason?: string;
  readonly metadata: WorkflowResultMetadata;
}

function toNodeResult(record: NodeRecord): NodeResult {
  switch (record.status) {
    case NodeStatus.SUCCEEDED:
      return {
        status: NodeStatus.SUCCEEDED,
        tool: record.tool,
        output: record.output ?? {},
        attempts: record.attempts,
        cached: record.cached,
      };
    case NodeStatus.FAILED:
      if (record.error) {
        return { status: NodeStatus.FAILED, tool: record.tool, error: record.error, attempts: record.attempts };
      }
      break;
    case NodeStatus.SKIPPED:
      if (record.skipCause) {
        return { status: NodeStatus.SKIPPED, tool: record.tool, cause: record.skipCause };
      }
      break;
  }
  throw new Error(`Node "${record.nodeId}" ended in non-final status "${record.status}"`);
}

/**
 * Build the result of a finished run
 */
export function buildWorkflowResult(snapshot: RunSnapshot): WorkflowResult {
  const nodes: Record<string, NodeResult> = {};
  const errors: string[] = [];
  const metadata = {
    toolsExecuted: 0,
    toolsSucceeded: 0,
    toolsFailed: 0,
    toolsSkipped: 0,
    cacheHits: 0,
    totalAttempts: 0,
  };

  for (const record of snapshot.nodes) {
    const result = toNodeResult(record);
    nodes[record.nodeId] = result;
    metadata.totalAttempts += record.attempts;
    if (record.attempts > 0) metadata.toolsExecuted++;

    switch (result.status) {
      case NodeStatus.SUCCEEDED:
        metadata.toolsSucceeded++;
        if (result.cached) metadata.cacheHits++;
        break;
      case NodeStatus.FAILED:
        metadata.toolsFailed++;
        errors.push(`${record.nodeId}: ${result.error.message}`);
        break;
      case NodeStatus.SKIPPED:
        metadata.toolsSkipped++;
        break;
    }
  }

  const completedAt = snapshot.completedAt ?? Date.now();
  return {
    runId: snapshot.runId,
    workflowName: snapshot.workflowName,
    status: snapshot.status,
    startedAt: snapshot.startedAt,
    completedAt,
    durationMs: completedAt - snapshot.startedAt,
    nodes,
    errors,
    cancelReason: snapshot.cancelReason,
    metadata,
  };
}

function describeSkip(cause: SkipCause): string {
  switch (cause.reason) {
    case 'dependency_failed':
      return `dependency "${cause.nodeId}" did not succeed`;
    case 'run_aborted':
      return `run aborted after "${cause.nodeId}" failed`;
    case 'cancelled':
      return 'run cancelled';
  }
}

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Plain-text summary of a result, one line per node, for agents and logs.
 *
 * @example
 * ```
 * Workflow "report" succeeded in 12ms
 *   ✓ fetch [fetcher] 1 attempt
 *   ✓ transform [transformer] cached
 *   - summarize [summarizer] skipped: run cancelled
 * ```
 */
export function formatResult(result: WorkflowResult): string {
  const status = result.status.replace('_', ' ');
  const lines = [`Workflow "${result.workflowName}" ${status} in ${result.durationMs}ms`];

  if (result.cancelReason) {
    lines.push(`Cancelled: ${result.cancelReason}`);
  }

  for (const [nodeId, node] of Object.entries(result.nodes)) {
    switch (node.status) {
      case NodeStatus.SUCCEEDED:
        lines.push(`  ✓ ${nodeId} [${node.tool}] ${node.cached ? 'cached' : plural(node.attempts, 'attempt')}`);
        break;
      case NodeStatus.FAILED:
        lines.push(
          `  ✗ ${nodeId} [${node.tool}] ${node.error.kind} after ${plural(node.attempts, 'attempt')}: ${node.error.message}`,
        );
        break;
      case NodeStatus.SKIPPED:
        lines.push(`  - ${nodeId} [${node.tool}] skipped: ${describeSkip(node.cause)}`);
        break;
    }
  }

  const { toolsSucceeded, toolsFailed, toolsSkipped, cacheHits } = result.metadata;
  lines.push(`Succeeded: ${toolsSucceeded}, failed: ${toolsFailed}, skipped: ${toolsSkipped}, cache hits: ${cacheHits}`);

  if (result.errors.length > 0) {
    lines.push('Errors:');
    for (const error of result.errors) {
      lines.push(`  ${error}`);
    }
  }

  return lines.join('\n');
}
