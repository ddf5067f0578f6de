/**
 * ToolNode
 *
 * Resolved graph vertex: an invocation, the spec and adapter of its tool,
 * and its place in the graph. Pure data, frozen once the plan is built.
 */

import { freezeToolSpec, type ToolAdapter } from '../adapters/ToolAdapter.js';
import { frozenCopy } from '../cache/DataCopy.js';
import type { InputBinding, ToolInvocation, ToolSpec } from '../types/core-types.js';

export interface ToolNode {
  /** Invocation id */
  readonly id: string;

  /** Position in the workflow definition */
  readonly index: number;

  /** Topological layer (0-indexed) */
  readonly layer: number;

  readonly invocation: ToolInvocation;

  readonly spec: ToolSpec;

  readonly adapter: ToolAdapter;

  /** Nodes that must reach a terminal status first */
  readonly predecessors: readonly string[];

  /** Nodes waiting on this one */
  readonly successors: readonly string[];
}

function freezeBinding(binding: InputBinding): InputBinding {
  let copy: InputBinding;
  if (binding.kind === 'literal') {
    copy = { kind: 'literal', value: frozenCopy(binding.value) };
  } else if (Object.hasOwn(binding, 'default')) {
    copy = { ...binding, default: frozenCopy(binding.default) };
  } else {
    copy = { ...binding };
  }
  return Object.freeze(copy);
}

/**
 * Detached, frozen copy of an invocation; later edits to the definition it
 * came from do not reach the plan
 */
export function freezeInvocation(invocation: ToolInvocation): ToolInvocation {
  const inputs = Object.fromEntries(
    Object.entries(invocation.inputs).map(([param, binding]) => [param, freezeBinding(binding)]),
  );
  return Object.freeze({
    ...invocation,
    inputs: Object.freeze(inputs),
    ...(invocation.dependsOn && { dependsOn: Object.freeze([...invocation.dependsOn]) }),
    ...(invocation.retry && { retry: Object.freeze({ ...invocation.retry }) }),
  });
}

export function createToolNode(node: ToolNode): ToolNode {
  return Object.freeze({
    ...node,
    invocation: freezeInvocation(node.invocation),
    spec: freezeToolSpec(node.spec),
    predecessors: Object.freeze([...node.predecessors]),
    successors: Object.freeze([...node.successors]),
  });
}

/**
 * Effective per-attempt timeout: invocation, then tool spec, then fallback
 */
export function resolveNodeTimeout(node: ToolNode, fallbackMs: number): number {
  return node.invocation.timeoutMs ?? node.spec.timeoutMs ?? fallbackMs;
}
