/**
 * BindingValidator
 *
 * Checks one invocation's input bindings against its tool spec and the
 * specs of the invocations it references.
 */

import { SchemaMismatchError } from '../errors/PlanErrors.js';
import {
  describeValueType,
  matchesFieldType,
  type FieldType,
  type ToolInvocation,
  type ToolSpec,
} from '../types/core-types.js';

function compatible(expected: FieldType, actual: FieldType): boolean {
  return expected === 'any' || actual === 'any' || expected === actual;
}

export class BindingValidator {
  /**
   * @param specs - Tool spec of every invocation in the workflow, by invocation id
   * @throws {SchemaMismatchError} On the first problem found
   */
  static validate(
    invocation: ToolInvocation,
    spec: ToolSpec,
    specs: ReadonlyMap<string, ToolSpec>,
  ): void {
    const declaredInputs = new Map(spec.inputs.map(field => [field.name, field] as const));

    for (const field of spec.inputs) {
      if (!field.optional && !Object.hasOwn(invocation.inputs, field.name)) {
        throw SchemaMismatchError.missingInput(invocation.id, field.name, spec.name);
      }
    }

    for (const [param, binding] of Object.entries(invocation.inputs)) {
      const input = declaredInputs.get(param);
      if (!input) {
        throw SchemaMismatchError.unexpectedInput(invocation.id, param, spec.name, [...declaredInputs.keys()]);
      }

      if (binding.kind === 'literal') {
        if (!matchesFieldType(input.type, binding.value)) {
          throw SchemaMismatchError.typeMismatch(invocation.id, param, input.type, describeValueType(binding.value));
        }
        continue;
      }

      const sourceSpec = specs.get(binding.invocationId);
      if (!sourceSpec) {
        throw SchemaMismatchError.unknownInvocation(
          invocation.id,
          binding.invocationId,
          `invocations.${invocation.id}.inputs.${param}`,
        );
      }

      const output = sourceSpec.outputs.find(field => field.name === binding.field);
      if (!output) {
        throw SchemaMismatchError.missingOutputField(
          invocation.id,
          binding.invocationId,
          binding.field,
          sourceSpec.name,
          sourceSpec.outputs.map(field => field.name),
        );
      }

      if (!compatible(input.type, output.type)) {
        throw SchemaMismatchError.typeMismatch(
          invocation.id,
          param,
          input.type,
          `${binding.invocationId}.${binding.field} (${output.type})`,
        );
      }

      if (binding.default !== undefined && !matchesFieldType(input.type, binding.default)) {
        throw SchemaMismatchError.typeMismatch(
          invocation.id,
          param,
          input.type,
          `default ${describeValueType(binding.default)}`,
        );
      }
    }

    for (const dependency of invocation.dependsOn ?? []) {
      if (!specs.has(dependency)) {
        throw SchemaMismatchError.unknownInvocation(
          invocation.id,
          dependency,
          `invocations.${invocation.id}.dependsOn`,
        );
      }
    }
  }
}
