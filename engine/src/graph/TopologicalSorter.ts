/**
 * TopologicalSorter
 *
 * Layers an acyclic dependency graph with Kahn's algorithm: each round
 * collects every node whose predecessors are all placed. Nodes within a layer
 * keep declaration order.
 *
 * Result: [['fetch'], ['parse', 'lint'], ['report']]
 */

import { CyclicDependencyError } from '../errors/PlanErrors.js';
import type { DependencyGraph } from './DependencyGraph.js';

export interface TopologicalSortResult {
  /** Layers in dependency order; members of a layer are independent */
  readonly layers: readonly (readonly string[])[];

  readonly layerCount: number;

  /** id → layer index (0-indexed) */
  readonly nodeLayers: ReadonlyMap<string, number>;
}

export class TopologicalSorter {
  /**
   * @throws {CyclicDependencyError} If the graph is not acyclic
   */
  static sort(graph: DependencyGraph): TopologicalSortResult {
    const inDegrees = new Map<string, number>();
    for (const id of graph.ids) {
      inDegrees.set(id, graph.adjacencyList.get(id)?.length ?? 0);
    }

    const placed = new Set<string>();
    const layers: (readonly string[])[] = [];
    const nodeLayers = new Map<string, number>();

    while (placed.size < graph.ids.length) {
      const layer = graph.ids.filter(id => !placed.has(id) && inDegrees.get(id) === 0);

      if (layer.length === 0) {
        const remaining = graph.ids.filter(id => !placed.has(id));
        throw new CyclicDependencyError(remaining);
      }

      for (const id of layer) {
        placed.add(id);
        nodeLayers.set(id, layers.length);
        for (const dependent of graph.reverseDependencies.get(id) ?? []) {
          inDegrees.set(dependent, (inDegrees.get(dependent) ?? 0) - 1);
        }
      }

      layers.push(Object.freeze(layer));
    }

    return {
      layers: Object.freeze(layers),
      layerCount: layers.length,
      nodeLayers,
    };
  }
}
