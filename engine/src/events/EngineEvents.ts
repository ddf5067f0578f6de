/**
 * Event types emitted by the engine while a run progresses.
 *
 * Consumers (loggers, progress UIs, streaming APIs) subscribe through the
 * EventBus; delivery beyond that is theirs to arrange.
 */

import type { NodeErrorInfo } from '../errors/NodeErrors.js';
import type { NodeStatus, RunStatus } from '../types/core-types.js';

export enum EngineEventType {
  RUN_STARTED = 'run.started',
  RUN_STATUS_CHANGED = 'run.status.changed',
  RUN_COMPLETED = 'run.completed',
  NODE_STATUS_CHANGED = 'node.status.changed',
  NODE_RETRY_SCHEDULED = 'node.retry.scheduled',
  NODE_CACHE_HIT = 'node.cache.hit',
}

export interface RunStartedPayload {
  workflowName: string;
  nodeCount: number;
  concurrency: number;
}

export interface RunStatusChangedPayload {
  from: RunStatus;
  to: RunStatus;
  reason?: string;
}

export interface RunCompletedPayload {
  status: RunStatus;
  durationMs: number;
}

export interface NodeStatusChangedPayload {
  nodeId: string;
  from: NodeStatus;
  to: NodeStatus;
  attempt: number;
}

export interface NodeRetryScheduledPayload {
  nodeId: string;
  /** The attempt that failed */
  attempt: number;
  delayMs: number;
  error: NodeErrorInfo;
}

export interface NodeCacheHitPayload {
  nodeId: string;
  tool: string;
  fingerprint: string;
}

export interface EngineEventPayloads {
  [EngineEventType.RUN_STARTED]: RunStartedPayload;
  [EngineEventType.RUN_STATUS_CHANGED]: RunStatusChangedPayload;
  [EngineEventType.RUN_COMPLETED]: RunCompletedPayload;
  [EngineEventType.NODE_STATUS_CHANGED]: NodeStatusChangedPayload;
  [EngineEventType.NODE_RETRY_SCHEDULED]: NodeRetryScheduledPayload;
  [EngineEventType.NODE_CACHE_HIT]: NodeCacheHitPayload;
}

export interface EngineEvent<K extends EngineEventType = EngineEventType> {
  readonly type: K;
  /** Unix timestamp in milliseconds */
  readonly timestamp: number;
  readonly runId: string;
  readonly payload: EngineEventPayloads[K];
}

export function createEvent<K extends EngineEventType>(
  type: K,
  runId: string,
  payload: EngineEventPayloads[K],
): EngineEvent<K> {
  return { type, timestamp: Date.now(), runId, payload };
}

export function isEventOfType<K extends EngineEventType>(event: EngineEvent, type: K): event is EngineEvent<K> {
  return event.type === type;
}
