/**
 * CycleDetector
 *
 * Detects cycles in the dependency graph with an iterative depth-first search
 * and three-colour marking:
 * - WHITE: not yet explored
 * - GRAY: on the current DFS path
 * - BLACK: fully explored
 *
 * Reaching a GRAY node closes a cycle. A node that references itself is a
 * cycle of length one.
 */

import { CyclicDependencyError } from '../errors/PlanErrors.js';
import { VisitState, type CycleDetectionResult, type DependencyGraph } from './DependencyGraph.js';

interface Frame {
  readonly id: string;
  next: number;
}

export class CycleDetector {
  /**
   * Check whether the graph contains a cycle.
   * Roots are tried in declaration order, so the reported cycle is stable.
   */
  static detect(graph: DependencyGraph): CycleDetectionResult {
    const visitState = new Map<string, VisitState>();
    for (const id of graph.ids) {
      visitState.set(id, VisitState.WHITE);
    }

    for (const root of graph.ids) {
      if (visitState.get(root) !== VisitState.WHITE) {
        continue;
      }

      const stack: Frame[] = [{ id: root, next: 0 }];
      visitState.set(root, VisitState.GRAY);

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        const dependencies = graph.adjacencyList.get(frame.id) ?? [];

        if (frame.next >= dependencies.length) {
          visitState.set(frame.id, VisitState.BLACK);
          stack.pop();
          continue;
        }

        const dependency = dependencies[frame.next];
        frame.next++;
        const state = visitState.get(dependency);

        if (state === VisitState.GRAY) {
          const path = stack.map(f => f.id);
          const start = path.indexOf(dependency);
          return {
            hasCycle: true,
            cyclePath: Object.freeze([...path.slice(start), dependency]),
          };
        }

        if (state === VisitState.WHITE) {
          visitState.set(dependency, VisitState.GRAY);
          stack.push({ id: dependency, next: 0 });
        }
      }
    }

    return { hasCycle: false };
  }

  /**
   * @throws {CyclicDependencyError} If a cycle is found
   */
  static detectAndThrow(graph: DependencyGraph): void {
    const result = this.detect(graph);
    if (result.hasCycle && result.cyclePath) {
      throw new CyclicDependencyError(result.cyclePath);
    }
  }
}
