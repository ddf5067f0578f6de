/**
 * Execution Plan
 *
 * The validated, layered DAG produced by DependencyResolver, plus read-only
 * planning utilities (estimates, dependency chains, batching, text view).
 * Nothing here executes anything.
 *
 * @module execution
 */

import type { DependencyGraph } from '../graph/DependencyGraph.js';
import { resolveNodeTimeout, type ToolNode } from './ToolNode.js';

export interface ExecutionPlan {
  readonly workflowName: string;

  readonly description?: string;

  /** Nodes keyed by invocation id, in declaration order */
  readonly nodes: ReadonlyMap<string, ToolNode>;

  /** Invocation ids in declaration order */
  readonly order: readonly string[];

  /** Topological layers; ties broken by declaration order */
  readonly layers: readonly (readonly string[])[];

  readonly graph: DependencyGraph;

  /** Nodes with no predecessors */
  readonly entryPoints: readonly string[];

  /** Nodes with no successors */
  readonly exitPoints: readonly string[];

  /** Run-level timeout declared by the workflow */
  readonly timeoutMs?: number;

  /** Concurrency cap declared by the workflow */
  readonly maxParallel?: number;
}

/**
 * Planning utilities over a built ExecutionPlan
 */
export class ExecutionPlanner {
  /**
   * Rough wall-clock upper bound: the slowest node of each layer, summed.
   * Assumes enough workers for every layer and ignores retries.
   */
  static estimateDuration(plan: ExecutionPlan, defaultTimeoutMs: number): number {
    let total = 0;
    for (const layer of plan.layers) {
      let slowest = 0;
      for (const id of layer) {
        const node = plan.nodes.get(id);
        if (node) {
          slowest = Math.max(slowest, resolveNodeTimeout(node, defaultTimeoutMs));
        }
      }
      total += slowest;
    }
    return total;
  }

  /**
   * All transitive predecessors of a node, then the node itself, in an order
   * that respects dependencies. Empty for an unknown id.
   */
  static getDependencyChain(plan: ExecutionPlan, nodeId: string): string[] {
    if (!plan.nodes.has(nodeId)) {
      return [];
    }

    const chain: string[] = [];
    const visited = new Set<string>();
    const stack: Array<{ id: string; expanded: boolean }> = [{ id: nodeId, expanded: false }];

    while (stack.length > 0) {
      const entry = stack.pop();
      if (!entry) break;

      if (entry.expanded) {
        chain.push(entry.id);
        continue;
      }
      if (visited.has(entry.id)) {
        continue;
      }
      visited.add(entry.id);
      stack.push({ id: entry.id, expanded: true });

      const predecessors = plan.nodes.get(entry.id)?.predecessors ?? [];
      for (let i = predecessors.length - 1; i >= 0; i--) {
        if (!visited.has(predecessors[i])) {
          stack.push({ id: predecessors[i], expanded: false });
        }
      }
    }

    return chain;
  }

  /**
   * Split each layer into batches of at most `maxParallel` nodes.
   */
  static toBatches(plan: ExecutionPlan, maxParallel: number): string[][] {
    const size = Math.max(1, Math.floor(maxParallel));
    const batches: string[][] = [];
    for (const layer of plan.layers) {
      for (let i = 0; i < layer.length; i += size) {
        batches.push(layer.slice(i, i + size));
      }
    }
    return batches;
  }

  /**
   * Largest layer: the most nodes that could ever run at once
   */
  static maxParallelism(plan: ExecutionPlan): number {
    return plan.layers.reduce((max, layer) => Math.max(max, layer.length), 0);
  }

  /**
   * Text rendering of the plan, one block per layer.
   */
  static visualize(plan: ExecutionPlan, defaultTimeoutMs: number): string {
    const lines: string[] = [
      `Execution Plan: ${plan.workflowName}`,
      `Nodes: ${plan.nodes.size}`,
      `Layers: ${plan.layers.length}`,
      `Max Parallelism: ${this.maxParallelism(plan)}`,
      `Estimated Duration: ${this.estimateDuration(plan, defaultTimeoutMs)}ms`,
      '',
    ];

    plan.layers.forEach((layer, index) => {
      lines.push(`Layer ${index}: [${layer.join(', ')}]`);
      for (const id of layer) {
        const node = plan.nodes.get(id);
        if (!node) continue;
        const needs = node.predecessors.length > 0 ? ` ← ${node.predecessors.join(', ')}` : '';
        lines.push(`  └─ ${id}: ${node.spec.name}${needs}`);
      }
    });

    return lines.join('\n');
  }
}
