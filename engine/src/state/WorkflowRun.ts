/**
 * WorkflowRun
 *
 * Mutable state of one execution of a plan: per-node status, attempts,
 * outputs and errors, plus the run status. The scheduler is the only
 * writer; everyone else reads snapshots.
 *
 * Every status change goes through a StateMachine, so an illegal
 * transition throws instead of corrupting the record.
 *
 * @module state
 */

import type { NodeErrorInfo } from '../errors/NodeErrors.js';
import type { ExecutionPlan } from '../execution/ExecutionPlan.js';
import { NodeStatus, RunStatus, type SkipCause, type ToolOutput } from '../types/core-types.js';
import { createNodeStateMachine, createRunStateMachine, type StateMachine } from './StateMachine.js';

export interface NodeRecord {
  readonly nodeId: string;
  readonly tool: string;
  readonly status: NodeStatus;
  /** Attempts started so far; 0 for skipped and cached nodes */
  readonly attempts: number;
  readonly output?: ToolOutput;
  /** Error of the latest failed attempt */
  readonly error?: NodeErrorInfo;
  readonly skipCause?: SkipCause;
  /** Output came from the ResultCache */
  readonly cached: boolean;
  readonly fingerprint?: string;
  readonly startedAt?: number;
  readonly completedAt?: number;
}

export interface RunSnapshot {
  readonly runId: string;
  readonly workflowName: string;
  readonly status: RunStatus;
  readonly cancelReason?: string;
  readonly startedAt: number;
  readonly completedAt?: number;
  /** Declaration order */
  readonly nodes: readonly NodeRecord[];
}

export interface NodeTransition {
  readonly nodeId: string;
  readonly from: NodeStatus;
  readonly to: NodeStatus;
  readonly attempt: number;
}

export interface RunTransition {
  readonly from: RunStatus;
  readonly to: RunStatus;
  readonly reason?: string;
}

/**
 * Notified synchronously after each applied transition
 */
export interface RunObserver {
  onNodeTransition?(transition: NodeTransition): void;
  onRunTransition?(transition: RunTransition): void;
}

type MutableNodeRecord = { -readonly [K in keyof NodeRecord]: NodeRecord[K] };

export class WorkflowRun {
  readonly runId: string;
  readonly workflowName: string;
  readonly startedAt: number;

  private completedAt?: number;
  private reason?: string;
  private readonly machine: StateMachine<RunStatus>;
  private readonly records: Map<string, MutableNodeRecord> = new Map();
  private readonly nodeMachines: Map<string, StateMachine<NodeStatus>> = new Map();
  private readonly observer: RunObserver;

  constructor(runId: string, plan: ExecutionPlan, observer: RunObserver = {}) {
    this.runId = runId;
    this.workflowName = plan.workflowName;
    this.startedAt = Date.now();
    this.observer = observer;
    this.machine = createRunStateMachine(runId);

    for (const id of plan.order) {
      const node = plan.nodes.get(id);
      this.records.set(id, {
        nodeId: id,
        tool: node?.spec.name ?? '',
        status: NodeStatus.PENDING,
        attempts: 0,
        cached: false,
      });
      this.nodeMachines.set(id, createNodeStateMachine(id));
    }
  }

  get status(): RunStatus {
    return this.machine.getState();
  }

  get cancelReason(): string | undefined {
    return this.reason;
  }

  isFinished(): boolean {
    return this.machine.isTerminal();
  }

  nodeStatus(nodeId: string): NodeStatus {
    return this.record(nodeId).status;
  }

  getNode(nodeId: string): NodeRecord | undefined {
    const record = this.records.get(nodeId);
    return record ? { ...record } : undefined;
  }

  getOutput(nodeId: string): ToolOutput | undefined {
    return this.records.get(nodeId)?.output;
  }

  /**
   * Node ids currently in `status`, in declaration order
   */
  nodesIn(status: NodeStatus): string[] {
    return [...this.records.values()].filter(record => record.status === status).map(record => record.nodeId);
  }

  markReady(nodeId: string): void {
    this.moveNode(nodeId, NodeStatus.READY);
  }

  /**
   * Start the next attempt
   *
   * @returns The 1-indexed attempt number
   */
  markRunning(nodeId: string): number {
    const record = this.record(nodeId);
    record.attempts += 1;
    record.startedAt ??= Date.now();
    this.moveNode(nodeId, NodeStatus.RUNNING);
    return record.attempts;
  }

  markSucceeded(nodeId: string, output: ToolOutput, options: { cached?: boolean; fingerprint?: string } = {}): void {
    const record = this.record(nodeId);
    record.output = output;
    record.cached = options.cached ?? false;
    record.fingerprint = options.fingerprint;
    record.error = undefined;
    record.completedAt = Date.now();
    this.moveNode(nodeId, NodeStatus.SUCCEEDED);
  }

  markFailed(nodeId: string, error: NodeErrorInfo): void {
    const record = this.record(nodeId);
    record.error = error;
    record.completedAt = Date.now();
    this.moveNode(nodeId, NodeStatus.FAILED);
  }

  markSkipped(nodeId: string, cause: SkipCause): void {
    const record = this.record(nodeId);
    record.skipCause = cause;
    record.completedAt = Date.now();
    this.moveNode(nodeId, NodeStatus.SKIPPED);
  }

  /**
   * @param reason - Recorded as the cancel reason when entering CANCELLING
   */
  transitionRun(to: RunStatus, reason?: string): void {
    const from = this.machine.getState();
    this.machine.transition(to, reason);
    if (to === RunStatus.CANCELLING) {
      this.reason = reason;
    }
    if (this.machine.isTerminal()) {
      this.completedAt = Date.now();
    }
    this.observer.onRunTransition?.({ from, to, reason });
  }

  snapshot(): RunSnapshot {
    return {
      runId: this.runId,
      workflowName: this.workflowName,
      status: this.status,
      cancelReason: this.reason,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
      nodes: [...this.records.values()].map(record => ({ ...record })),
    };
  }

  private record(nodeId: string): MutableNodeRecord {
    const record = this.records.get(nodeId);
    if (!record) {
      throw new Error(`Run "${this.runId}" has no node "${nodeId}"`);
    }
    return record;
  }

  private moveNode(nodeId: string, to: NodeStatus): void {
    const record = this.record(nodeId);
    const machine = this.nodeMachines.get(nodeId);
    if (!machine) {
      throw new Error(`Run "${this.runId}" has no node "${nodeId}"`);
    }
    const from = machine.getState();
    machine.transition(to);
    record.status = to;
    this.observer.onNodeTransition?.({ nodeId, from, to, attempt: record.attempts });
  }
}
