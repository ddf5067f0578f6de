/**
 * State Management
 *
 * - StateMachine: node and run lifecycles, enforced on every change
 * - WorkflowRun: live state of one execution, read through snapshots
 */

export * from './StateMachine.js';
export * from './WorkflowRun.js';
