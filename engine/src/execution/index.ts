/**
 * Execution Layer
 *
 * - ToolNode / ExecutionPlan: validated, layered DAG (pure data)
 * - ExecutionScheduler: runs a plan with bounded concurrency
 * - NodeRunner: attempts, timeouts, retries and caching for one node
 * - InputResolver: binds literal and referenced inputs
 * - WorkflowResult: final outcome and its text summary
 */

export * from './ToolNode.js';
export * from './ExecutionPlan.js';
export * from './RunConfig.js';
export * from './InputResolver.js';
export * from './NodeRunner.js';
export * from './WorkflowResult.js';
export * from './ExecutionScheduler.js';
