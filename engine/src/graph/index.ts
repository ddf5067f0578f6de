/**
 * Graph Analysis Utilities
 *
 * - DependencyResolver: definition → validated, layered ExecutionPlan
 * - BindingValidator: input bindings against tool schemas
 * - CycleDetector: reject circular dependencies
 * - TopologicalSorter: layers of independent nodes
 */

export * from './DependencyGraph.js';
export * from './BindingValidator.js';
export * from './DependencyResolver.js';
export * from './CycleDetector.js';
export * from './TopologicalSorter.js';
