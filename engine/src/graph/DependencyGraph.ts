/**
 * Dependency graph structures shared by the graph utilities.
 *
 * Edges point from a dependent invocation to the invocation it needs.
 */

/**
 * Why one invocation depends on another
 * - data: an input references the other invocation's output
 * - order: listed in `dependsOn`
 */
export type DependencyKind = 'data' | 'order';

export interface DependencyEdge {
  /** The invocation that depends on another */
  readonly from: string;
  /** The invocation that must finish first */
  readonly to: string;
  readonly kind: DependencyKind;
  /** Input parameter carrying the reference (data edges) */
  readonly param?: string;
  /** Referenced output field (data edges) */
  readonly field?: string;
}

export interface DependencyGraph {
  /** Invocation ids in declaration order */
  readonly ids: readonly string[];
  readonly edges: readonly DependencyEdge[];
  /** id → predecessors (deduplicated, declaration order) */
  readonly adjacencyList: ReadonlyMap<string, readonly string[]>;
  /** id → successors (deduplicated, declaration order) */
  readonly reverseDependencies: ReadonlyMap<string, readonly string[]>;
}

/**
 * DFS visit state
 */
export enum VisitState {
  WHITE = 0,
  GRAY = 1,
  BLACK = 2,
}

export interface CycleDetectionResult {
  readonly hasCycle: boolean;
  /** Cycle path with the first id repeated at the end */
  readonly cyclePath?: readonly string[];
}
