/**
 * Toolweave Engine - dependency-aware orchestration of pluggable tools
 *
 * @example
 * ```ts
 * import { WorkflowEngine, defineTool, ref } from '@toolweave/engine';
 *
 * const engine = new WorkflowEngine({ tools: [fetcher, summarizer] });
 * const result = await engine.run({
 *   name: 'report',
 *   invocations: [
 *     { id: 'fetch', tool: 'fetcher', inputs: {} },
 *     { id: 'summarize', tool: 'summarizer', inputs: { text: ref('fetch', 'data') } },
 *   ],
 * });
 * ```
 */

// ============================================================================
// PRIMARY EXPORT - Start here!
// ============================================================================

export { WorkflowEngine } from './core/WorkflowEngine.js';
export type { WorkflowRunOptions } from './core/WorkflowEngine.js';
export * from './core/EngineConfig.js';
export * from './core/EngineLogger.js';

// ============================================================================
// TYPES - Tool schemas, definitions, statuses
// ============================================================================

export * from './types/core-types.js';
export * from './types/log-types.js';
export * from './types/frozen-map.js';

// ============================================================================
// ADVANCED - Building blocks for custom hosts and adapter authors
// ============================================================================

export * from './adapters/index.js';
export * from './graph/index.js';
export * from './execution/index.js';
export * from './automation/index.js';
export * from './cache/index.js';
export * from './state/index.js';
export * from './events/index.js';
export * from './errors/index.js';
export * from './loader/index.js';
export * from './parser/index.js';
export * from './testing/index.js';
