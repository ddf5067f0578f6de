/**
 * DependencyResolver
 *
 * Turns a WorkflowDefinition into an ExecutionPlan. Pure: no execution and
 * no I/O, and the tool registry is passed in explicitly.
 *
 * Steps:
 * 1. Structural checks (non-empty, unique ids)
 * 2. Resolve every tool in the registry and check every timeout
 * 3. Validate input bindings against tool schemas (BindingValidator)
 * 4. Build edges from references and `dependsOn`
 * 5. Reject cycles (CycleDetector)
 * 6. Layer the graph (TopologicalSorter)
 *
 * Any failure throws a PlanError before a plan object exists.
 */

import type { ToolAdapter } from '../adapters/ToolAdapter.js';
import { MAX_TIMEOUT_MS } from '../automation/TimeoutManager.js';
import type { ToolRegistry } from '../adapters/ToolRegistry.js';
import { InvalidDefinitionError } from '../errors/PlanErrors.js';
import type { ExecutionPlan } from '../execution/ExecutionPlan.js';
import { createToolNode, type ToolNode } from '../execution/ToolNode.js';
import type { ToolSpec, WorkflowDefinition } from '../types/core-types.js';
import { FrozenMap } from '../types/frozen-map.js';
import { BindingValidator } from './BindingValidator.js';
import { CycleDetector } from './CycleDetector.js';
import type { DependencyEdge, DependencyGraph } from './DependencyGraph.js';
import { TopologicalSorter } from './TopologicalSorter.js';

export class DependencyResolver {
  /**
   * Build and validate the execution plan for a definition.
   *
   * @throws {InvalidDefinitionError} Empty workflow, duplicate ids or an unusable timeout
   * @throws {UnknownToolError} A referenced tool is not registered
   * @throws {SchemaMismatchError} A binding disagrees with a tool schema
   * @throws {CyclicDependencyError} The graph has a cycle
   */
  static build(definition: WorkflowDefinition, registry: ToolRegistry): ExecutionPlan {
    const { invocations } = definition;

    if (invocations.length === 0) {
      throw InvalidDefinitionError.empty(definition.name);
    }

    const positions = new Map<string, number>();
    invocations.forEach((invocation, index) => {
      const first = positions.get(invocation.id);
      if (first !== undefined) {
        throw InvalidDefinitionError.duplicateId(invocation.id, first, index);
      }
      positions.set(invocation.id, index);
    });

    const adapters = new Map<string, ToolAdapter>();
    const specs = new Map<string, ToolSpec>();
    for (const invocation of invocations) {
      const adapter = registry.resolve(invocation.tool, invocation.id);
      adapters.set(invocation.id, adapter);
      specs.set(invocation.id, adapter.spec());
    }

    this.checkTimeout('timeoutMs', definition.timeoutMs);
    for (const invocation of invocations) {
      this.checkTimeout(`invocations.${invocation.id}.timeoutMs`, invocation.timeoutMs);
      const spec = specs.get(invocation.id);
      if (spec) {
        this.checkTimeout(`tools.${spec.name}.timeoutMs`, spec.timeoutMs);
      }
    }

    for (const invocation of invocations) {
      const spec = specs.get(invocation.id);
      if (spec) {
        BindingValidator.validate(invocation, spec, specs);
      }
    }

    const graph = this.resolve(definition);
    CycleDetector.detectAndThrow(graph);
    const sorted = TopologicalSorter.sort(graph);

    const nodes = new Map<string, ToolNode>();
    invocations.forEach((invocation, index) => {
      const adapter = adapters.get(invocation.id);
      const spec = specs.get(invocation.id);
      const layer = sorted.nodeLayers.get(invocation.id);
      if (!adapter || !spec || layer === undefined) {
        return;
      }
      nodes.set(
        invocation.id,
        createToolNode({
          id: invocation.id,
          index,
          layer,
          invocation,
          spec,
          adapter,
          predecessors: graph.adjacencyList.get(invocation.id) ?? [],
          successors: graph.reverseDependencies.get(invocation.id) ?? [],
        }),
      );
    });

    return Object.freeze({
      workflowName: definition.name,
      description: definition.description,
      nodes: new FrozenMap(nodes),
      order: graph.ids,
      layers: sorted.layers,
      graph,
      entryPoints: this.getEntryPoints(graph),
      exitPoints: this.getExitPoints(graph),
      timeoutMs: definition.timeoutMs,
      maxParallel: definition.maxParallel,
    });
  }

  /**
   * Build the dependency graph from references and `dependsOn`.
   * Assumes ids are unique and every referenced id exists.
   */
  static resolve(definition: WorkflowDefinition): DependencyGraph {
    const ids = definition.invocations.map(invocation => invocation.id);
    const position = new Map(ids.map((id, index) => [id, index] as const));
    const byPosition = (a: string, b: string): number => (position.get(a) ?? 0) - (position.get(b) ?? 0);

    const edges: DependencyEdge[] = [];
    const predecessors = new Map<string, Set<string>>();
    const successors = new Map<string, Set<string>>();
    for (const id of ids) {
      predecessors.set(id, new Set());
      successors.set(id, new Set());
    }

    const link = (edge: DependencyEdge): void => {
      edges.push(Object.freeze(edge));
      predecessors.get(edge.from)?.add(edge.to);
      successors.get(edge.to)?.add(edge.from);
    };

    for (const invocation of definition.invocations) {
      for (const [param, binding] of Object.entries(invocation.inputs)) {
        if (binding.kind === 'ref') {
          link({ from: invocation.id, to: binding.invocationId, kind: 'data', param, field: binding.field });
        }
      }
      for (const dependency of invocation.dependsOn ?? []) {
        link({ from: invocation.id, to: dependency, kind: 'order' });
      }
    }

    const freeze = (lists: Map<string, Set<string>>): ReadonlyMap<string, readonly string[]> => {
      return new FrozenMap([...lists].map(([id, set]) => [id, Object.freeze([...set].sort(byPosition))] as const));
    };

    return Object.freeze({
      ids: Object.freeze(ids),
      edges: Object.freeze(edges),
      adjacencyList: freeze(predecessors),
      reverseDependencies: freeze(successors),
    });
  }

  /**
   * Timers take whole milliseconds up to MAX_TIMEOUT_MS
   */
  private static checkTimeout(path: string, value: number | undefined): void {
    if (value === undefined) {
      return;
    }
    if (!Number.isInteger(value) || value < 1 || value > MAX_TIMEOUT_MS) {
      throw InvalidDefinitionError.invalidTimeout(path, value, MAX_TIMEOUT_MS);
    }
  }

  /**
   * Nodes with no dependencies; runnable immediately
   */
  static getEntryPoints(graph: DependencyGraph): string[] {
    return graph.ids.filter(id => (graph.adjacencyList.get(id)?.length ?? 0) === 0);
  }

  /**
   * Nodes nothing depends on; the workflow's final results
   */
  static getExitPoints(graph: DependencyGraph): string[] {
    return graph.ids.filter(id => (graph.reverseDependencies.get(id)?.length ?? 0) === 0);
  }
}
