/**
 * Input Resolver
 *
 * Builds the concrete input of a node from its bindings and the outputs
 * recorded so far on the run.
 *
 * @module execution
 */

import type { WorkflowRun } from '../state/WorkflowRun.js';
import { NodeStatus, type ToolInput } from '../types/core-types.js';
import type { ToolNode } from './ToolNode.js';

export class InputResolver {
  /**
   * Resolve every binding of `node`.
   *
   * - literal: the value as declared
   * - ref to a succeeded node: the referenced output field
   * - ref to a failed or skipped node (only reachable when that failure is
   *   tolerated), or to an absent optional field: the binding default, or
   *   nothing when there is none
   */
  static resolve(node: ToolNode, run: WorkflowRun): ToolInput {
    const input: ToolInput = {};

    for (const [param, binding] of Object.entries(node.invocation.inputs)) {
      if (binding.kind === 'literal') {
        input[param] = binding.value;
        continue;
      }

      const output = run.nodeStatus(binding.invocationId) === NodeStatus.SUCCEEDED
        ? run.getOutput(binding.invocationId)
        : undefined;

      if (output && Object.hasOwn(output, binding.field)) {
        input[param] = output[binding.field];
      } else if (binding.default !== undefined) {
        input[param] = binding.default;
      }
    }

    return input;
  }
}
