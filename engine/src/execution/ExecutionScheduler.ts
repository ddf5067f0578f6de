/**
 * Execution Scheduler
 *
 * Runs an ExecutionPlan: a single coordinator keeps a ready queue, dispatches
 * up to `concurrency` nodes at once, and reacts to each node's final outcome
 * by readying, skipping or aborting what depends on it.
 *
 * Only the coordinator mutates the WorkflowRun's graph-level state; workers
 * (NodeRunner) touch nothing but their own node.
 *
 * @example
 * ```ts
 * const scheduler = new ExecutionScheduler({ cache: new MemoryResultCache() });
 * const result = await scheduler.run(plan, { concurrency: 4 });
 * ```
 *
 * @module execution
 */

import { FailureHandler } from '../automation/runtime/FailureHandler.js';
import type { ResultCache } from '../cache/ResultCache.js';
import { createSilentLogger, type EngineLogger } from '../core/EngineLogger.js';
import { createEvent, EngineEventType } from '../events/EngineEvents.js';
import { EventBus } from '../events/EventBus.js';
import { WorkflowRun, type RunSnapshot } from '../state/WorkflowRun.js';
import { NodeStatus, RunStatus, type SkipCause } from '../types/core-types.js';
import type { ExecutionPlan } from './ExecutionPlan.js';
import { describeAbortReason, NodeRunner, type NodeOutcome } from './NodeRunner.js';
import { resolveRunConfig, type ResolvedRunConfig, type RunConfig } from './RunConfig.js';
import type { ToolNode } from './ToolNode.js';
import { buildWorkflowResult, type WorkflowResult } from './WorkflowResult.js';

export interface ExecutionSchedulerOptions {
  /** Consulted before the first attempt of cacheable nodes */
  cache?: ResultCache;
  failureHandler?: FailureHandler;
  events?: EventBus;
  logger?: EngineLogger;
}

/**
 * Live handle on a started run
 */
export interface RunHandle {
  readonly runId: string;
  /** Settles when the run reaches a terminal status; never rejects for node failures */
  readonly result: Promise<WorkflowResult>;
  /** Point-in-time view of the run */
  snapshot(): RunSnapshot;
  /**
   * Request cancellation
   *
   * @returns false when the run is already stopping or finished
   */
  cancel(reason?: string): boolean;
}

type StopMode =
  | { readonly kind: 'cancel'; readonly reason: string }
  | { readonly kind: 'abort'; readonly nodeId: string };

/**
 * State of one run while the coordinator loop is active
 */
class RunCoordinator {
  private readonly ready: string[] = [];
  private readonly inFlight: Map<string, Promise<NodeOutcome>> = new Map();
  private readonly settled: Set<string> = new Set();
  private readonly controller = new AbortController();
  private readonly runner: NodeRunner;
  private stop?: StopMode;

  constructor(
    private readonly plan: ExecutionPlan,
    readonly run: WorkflowRun,
    private readonly config: ResolvedRunConfig,
    private readonly failureHandler: FailureHandler,
    private readonly logger: EngineLogger,
    events: EventBus,
    cache?: ResultCache,
  ) {
    this.runner = new NodeRunner({
      run,
      config,
      signal: this.controller.signal,
      failureHandler,
      events,
      logger,
      cache,
    });
  }

  async execute(): Promise<void> {
    const { signal, timeoutMs } = this.config;

    const onExternalAbort = (): void => {
      this.cancel(describeAbortReason(signal?.reason));
    };
    signal?.addEventListener('abort', onExternalAbort, { once: true });
    const timer = timeoutMs !== undefined ? setTimeout(() => this.cancel('timeout'), timeoutMs) : undefined;

    try {
      if (signal?.aborted) {
        this.cancel(describeAbortReason(signal.reason));
      } else {
        for (const id of this.plan.entryPoints) {
          this.enqueue(id);
        }
      }

      for (;;) {
        this.dispatch();
        if (this.inFlight.size === 0) break;

        const outcome = await Promise.race(this.inFlight.values());
        this.inFlight.delete(outcome.nodeId);
        this.handleOutcome(outcome);
      }
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onExternalAbort);
    }

    this.finish();
  }

  /**
   * Stop dispatching and cancel everything in flight
   */
  cancel(reason: string): boolean {
    if (this.stop || this.run.isFinished()) {
      return false;
    }

    this.logger.info(`Cancelling run "${this.run.runId}"`, { reason });
    this.stop = { kind: 'cancel', reason };
    this.run.transitionRun(RunStatus.CANCELLING, reason);
    this.halt({ reason: 'cancelled' }, reason);
    return true;
  }

  private abort(nodeId: string): void {
    if (this.stop) {
      return;
    }

    this.logger.error(`Critical node "${nodeId}" failed, aborting run "${this.run.runId}"`, undefined, { nodeId });
    this.stop = { kind: 'abort', nodeId };
    this.halt({ reason: 'run_aborted', nodeId }, `run aborted: critical node "${nodeId}" failed`);
  }

  private halt(cause: SkipCause, reason: string): void {
    this.ready.length = 0;
    this.controller.abort(reason);

    for (const id of this.plan.order) {
      const status = this.run.nodeStatus(id);
      const waiting = status === NodeStatus.PENDING || (status === NodeStatus.READY && !this.inFlight.has(id));
      if (waiting) {
        this.skip(id, cause);
      }
    }
  }

  private dispatch(): void {
    while (!this.stop && this.ready.length > 0 && this.inFlight.size < this.config.concurrency) {
      const id = this.ready.shift();
      const node = id === undefined ? undefined : this.plan.nodes.get(id);
      if (!node) continue;

      this.logger.debug(`Dispatching node "${node.id}"`, { nodeId: node.id, inFlight: this.inFlight.size + 1 });
      this.inFlight.set(node.id, this.runner.execute(node));
    }
  }

  private handleOutcome(outcome: NodeOutcome): void {
    const node = this.plan.nodes.get(outcome.nodeId);
    if (!node) return;

    switch (outcome.status) {
      case 'interrupted':
        this.skip(node.id, this.stopCause());
        return;
      case 'failed':
        if (outcome.action === 'abort') {
          this.settled.add(node.id);
          this.abort(node.id);
          return;
        }
        break;
      case 'succeeded':
        break;
    }

    this.settled.add(node.id);
    this.releaseSuccessors(node);
  }

  private releaseSuccessors(node: ToolNode): void {
    if (this.stop) return;
    for (const successor of node.successors) {
      this.evaluate(successor);
    }
  }

  /**
   * Ready a pending node once all predecessors have settled, or skip it when
   * one of them failed without being tolerable.
   */
  private evaluate(nodeId: string): void {
    const node = this.plan.nodes.get(nodeId);
    if (!node || this.run.nodeStatus(nodeId) !== NodeStatus.PENDING) return;
    if (!node.predecessors.every(id => this.settled.has(id))) return;

    const blocking = node.predecessors.find(id => {
      if (this.run.nodeStatus(id) === NodeStatus.SUCCEEDED) return false;
      const predecessor = this.plan.nodes.get(id);
      return !predecessor || !this.failureHandler.isTolerable(predecessor);
    });

    if (blocking !== undefined) {
      this.skip(nodeId, { reason: 'dependency_failed', nodeId: blocking });
      this.releaseSuccessors(node);
      return;
    }

    this.enqueue(nodeId);
  }

  private enqueue(nodeId: string): void {
    this.run.markReady(nodeId);
    this.ready.push(nodeId);
  }

  private skip(nodeId: string, cause: SkipCause): void {
    this.run.markSkipped(nodeId, cause);
    this.settled.add(nodeId);
  }

  private stopCause(): SkipCause {
    if (this.stop?.kind === 'abort') {
      return { reason: 'run_aborted', nodeId: this.stop.nodeId };
    }
    return { reason: 'cancelled' };
  }

  private finish(): void {
    if (this.stop?.kind === 'cancel') {
      this.run.transitionRun(RunStatus.CANCELLED, this.stop.reason);
      return;
    }
    if (this.stop?.kind === 'abort') {
      this.run.transitionRun(RunStatus.FAILED, `critical node "${this.stop.nodeId}" failed`);
      return;
    }

    const succeeded = this.run.nodesIn(NodeStatus.SUCCEEDED).length;
    if (succeeded === this.plan.order.length) {
      this.run.transitionRun(RunStatus.SUCCEEDED);
    } else if (succeeded === 0) {
      this.run.transitionRun(RunStatus.FAILED, 'no node succeeded');
    } else {
      this.run.transitionRun(RunStatus.PARTIALLY_FAILED);
    }
  }
}

export class ExecutionScheduler {
  private readonly cache?: ResultCache;
  private readonly failureHandler: FailureHandler;
  private readonly events: EventBus;
  private readonly logger: EngineLogger;

  constructor(options: ExecutionSchedulerOptions = {}) {
    this.cache = options.cache;
    this.failureHandler = options.failureHandler ?? new FailureHandler();
    this.logger = (options.logger ?? createSilentLogger()).child('ExecutionScheduler', 'runtime');
    this.events = options.events ?? new EventBus(this.logger);
  }

  /**
   * Execute a plan to completion
   *
   * @throws {ConfigError} If the run configuration is invalid
   */
  async run(plan: ExecutionPlan, config?: RunConfig): Promise<WorkflowResult> {
    return this.start(plan, config).result;
  }

  /**
   * Start executing a plan and return immediately
   *
   * @throws {ConfigError} If the run configuration is invalid
   */
  start(plan: ExecutionPlan, config?: RunConfig): RunHandle {
    const resolved = resolveRunConfig(plan, config);
    const { runId } = resolved;
    const events = this.events;

    const run = new WorkflowRun(runId, plan, {
      onNodeTransition: transition => events.emit(createEvent(EngineEventType.NODE_STATUS_CHANGED, runId, transition)),
      onRunTransition: transition => events.emit(createEvent(EngineEventType.RUN_STATUS_CHANGED, runId, transition)),
    });

    const coordinator = new RunCoordinator(
      plan,
      run,
      resolved,
      this.failureHandler,
      this.logger,
      events,
      this.cache,
    );

    this.logger.info(`Starting run "${runId}" of workflow "${plan.workflowName}"`, {
      runId,
      nodes: plan.nodes.size,
      layers: plan.layers.length,
      concurrency: resolved.concurrency,
    });
    events.emit(
      createEvent(EngineEventType.RUN_STARTED, runId, {
        workflowName: plan.workflowName,
        nodeCount: plan.nodes.size,
        concurrency: resolved.concurrency,
      }),
    );

    const result = coordinator.execute().then(() => {
      const workflowResult = buildWorkflowResult(run.snapshot());
      this.logger.info(`Run "${runId}" finished: ${workflowResult.status}`, {
        runId,
        status: workflowResult.status,
        durationMs: workflowResult.durationMs,
      });
      events.emit(
        createEvent(EngineEventType.RUN_COMPLETED, runId, {
          status: workflowResult.status,
          durationMs: workflowResult.durationMs,
        }),
      );
      return workflowResult;
    });

    return {
      runId,
      result,
      snapshot: () => run.snapshot(),
      cancel: (reason = 'cancelled') => coordinator.cancel(reason),
    };
  }
}
