/**
 * State Machine
 *
 * Enforces valid status transitions for nodes and runs. This is about
 * RULES, not execution: which transitions exist, which statuses are
 * terminal, and what happened so far.
 *
 * @module state
 */

import { InvalidTransitionError } from '../errors/RunErrors.js';
import { NodeStatus, RunStatus } from '../types/core-types.js';

/**
 * State transition record for audit trail
 */
export interface StateTransition<T> {
  readonly from: T;
  readonly to: T;
  /** ms since epoch */
  readonly timestamp: number;
  readonly reason?: string;
}

export interface StateMachineConfig<T> {
  /** Used in error messages, e.g. `node "fetch"` */
  readonly subject: string;
  readonly initialState: T;
  /** Valid transitions map: from → allowed to states */
  readonly transitions: ReadonlyMap<T, readonly T[]>;
  readonly terminalStates: ReadonlySet<T>;
}

/**
 * Generic state machine for enforcing valid transitions
 */
export class StateMachine<T extends string> {
  private currentState: T;
  private readonly config: StateMachineConfig<T>;
  private readonly history: StateTransition<T>[] = [];

  constructor(config: StateMachineConfig<T>) {
    this.config = config;
    this.currentState = config.initialState;
  }

  getState(): T {
    return this.currentState;
  }

  canTransition(to: T): boolean {
    if (this.config.terminalStates.has(this.currentState)) {
      return false;
    }
    return this.config.transitions.get(this.currentState)?.includes(to) ?? false;
  }

  /**
   * @throws {InvalidTransitionError} If the lifecycle does not allow `to`
   */
  transition(to: T, reason?: string): StateTransition<T> {
    if (!this.canTransition(to)) {
      throw new InvalidTransitionError(this.config.subject, this.currentState, to);
    }

    const record: StateTransition<T> = { from: this.currentState, to, timestamp: Date.now(), reason };
    this.currentState = to;
    this.history.push(record);
    return record;
  }

  isTerminal(): boolean {
    return this.config.terminalStates.has(this.currentState);
  }

  getAllowedTransitions(): readonly T[] {
    return this.config.transitions.get(this.currentState) ?? [];
  }

  getHistory(): readonly StateTransition<T>[] {
    return [...this.history];
  }
}

/**
 * Node lifecycle
 *
 * PENDING → READY → RUNNING → SUCCEEDED
 * RUNNING → FAILED → RUNNING (retry)
 * READY → SUCCEEDED (cache hit)
 * PENDING | READY → SKIPPED
 */
export const NODE_TRANSITIONS: ReadonlyMap<NodeStatus, readonly NodeStatus[]> = new Map([
  [NodeStatus.PENDING, [NodeStatus.READY, NodeStatus.SKIPPED]],
  [NodeStatus.READY, [NodeStatus.RUNNING, NodeStatus.SUCCEEDED, NodeStatus.SKIPPED]],
  [NodeStatus.RUNNING, [NodeStatus.SUCCEEDED, NodeStatus.FAILED]],
  [NodeStatus.FAILED, [NodeStatus.RUNNING]],
]);

export const NODE_TERMINAL_STATES: ReadonlySet<NodeStatus> = new Set([NodeStatus.SUCCEEDED, NodeStatus.SKIPPED]);

/**
 * Run lifecycle
 *
 * RUNNING → SUCCEEDED | PARTIALLY_FAILED | FAILED
 * RUNNING → CANCELLING → CANCELLED
 */
export const RUN_TRANSITIONS: ReadonlyMap<RunStatus, readonly RunStatus[]> = new Map([
  [
    RunStatus.RUNNING,
    [RunStatus.SUCCEEDED, RunStatus.PARTIALLY_FAILED, RunStatus.FAILED, RunStatus.CANCELLING],
  ],
  [RunStatus.CANCELLING, [RunStatus.CANCELLED]],
]);

export const RUN_TERMINAL_STATES: ReadonlySet<RunStatus> = new Set([
  RunStatus.SUCCEEDED,
  RunStatus.PARTIALLY_FAILED,
  RunStatus.FAILED,
  RunStatus.CANCELLED,
]);

export function createNodeStateMachine(nodeId: string): StateMachine<NodeStatus> {
  return new StateMachine({
    subject: `node "${nodeId}"`,
    initialState: NodeStatus.PENDING,
    transitions: NODE_TRANSITIONS,
    terminalStates: NODE_TERMINAL_STATES,
  });
}

export function createRunStateMachine(runId: string): StateMachine<RunStatus> {
  return new StateMachine({
    subject: `run "${runId}"`,
    initialState: RunStatus.RUNNING,
    transitions: RUN_TRANSITIONS,
    terminalStates: RUN_TERMINAL_STATES,
  });
}

/**
 * Stateless check of a single node transition
 *
 * @throws {InvalidTransitionError}
 */
export function validateNodeTransition(nodeId: string, from: NodeStatus, to: NodeStatus): void {
  if (NODE_TERMINAL_STATES.has(from) || !NODE_TRANSITIONS.get(from)?.includes(to)) {
    throw new InvalidTransitionError(`node "${nodeId}"`, from, to);
  }
}

/**
 * @throws {InvalidTransitionError}
 */
export function validateRunTransition(runId: string, from: RunStatus, to: RunStatus): void {
  if (RUN_TERMINAL_STATES.has(from) || !RUN_TRANSITIONS.get(from)?.includes(to)) {
    throw new InvalidTransitionError(`run "${runId}"`, from, to);
  }
}
