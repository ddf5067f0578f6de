/**
 * Plan Construction Errors
 *
 * Raised synchronously by DependencyResolver before anything is scheduled.
 * None of these are retried.
 *
 * Use the factory methods rather than constructing diagnostics by hand:
 *
 * ```typescript
 * throw SchemaMismatchError.missingOutputField('transform', 'fetch', 'data', 'fetcher');
 * ```
 *
 * @module errors
 */

import { ToolweaveError, type ToolweaveErrorDiagnostic } from './ToolweaveError.js';
import { ToolweaveErrorCode, ErrorSeverity } from './ErrorCodes.js';

type PlanDiagnostic = Omit<ToolweaveErrorDiagnostic, 'severity'>;

/**
 * Base class for every error raised while building an ExecutionPlan
 */
export class PlanError extends ToolweaveError {
  constructor(diagnostic: PlanDiagnostic) {
    super({ ...diagnostic, severity: ErrorSeverity.ERROR });
  }
}

/**
 * An input binding or reference disagrees with a tool's declared schema.
 */
export class SchemaMismatchError extends PlanError {
  /** Invocation whose binding is wrong */
  readonly invocationId: string;

  /** Field (input parameter or referenced output) involved, when there is one */
  readonly field?: string;

  constructor(diagnostic: PlanDiagnostic & { invocationId: string; field?: string }) {
    const { invocationId, field, ...rest } = diagnostic;
    super({ ...rest, context: { invocationId, field, ...rest.context } });
    this.invocationId = invocationId;
    this.field = field;
  }

  /**
   * A reference names an output field the referenced tool does not declare
   */
  static missingOutputField(
    invocationId: string,
    sourceId: string,
    field: string,
    sourceTool: string,
    declared: readonly string[],
  ): SchemaMismatchError {
    return new SchemaMismatchError({
      code: ToolweaveErrorCode.PLAN_SCHEMA_MISMATCH,
      message: `Invocation "${invocationId}" references field "${field}" of "${sourceId}", but tool "${sourceTool}" declares no such output`,
      path: `invocations.${invocationId}.inputs`,
      hint: declared.length > 0
        ? `Declared outputs of "${sourceTool}": ${declared.join(', ')}`
        : `Tool "${sourceTool}" declares no outputs`,
      invocationId,
      field,
      context: { sourceId, sourceTool },
    });
  }

  static missingInput(invocationId: string, param: string, tool: string): SchemaMismatchError {
    return new SchemaMismatchError({
      code: ToolweaveErrorCode.PLAN_SCHEMA_MISMATCH,
      message: `Invocation "${invocationId}" does not bind required input "${param}" of tool "${tool}"`,
      path: `invocations.${invocationId}.inputs.${param}`,
      invocationId,
      field: param,
    });
  }

  static unexpectedInput(
    invocationId: string,
    param: string,
    tool: string,
    declared: readonly string[],
  ): SchemaMismatchError {
    return new SchemaMismatchError({
      code: ToolweaveErrorCode.PLAN_SCHEMA_MISMATCH,
      message: `Invocation "${invocationId}" binds "${param}", which tool "${tool}" does not declare as an input`,
      path: `invocations.${invocationId}.inputs.${param}`,
      hint: declared.length > 0 ? `Declared inputs: ${declared.join(', ')}` : `Tool "${tool}" takes no inputs`,
      invocationId,
      field: param,
    });
  }

  static typeMismatch(
    invocationId: string,
    param: string,
    expected: string,
    actual: string,
  ): SchemaMismatchError {
    return new SchemaMismatchError({
      code: ToolweaveErrorCode.PLAN_SCHEMA_MISMATCH,
      message: `Input "${param}" of invocation "${invocationId}" expects ${expected} but is bound to ${actual}`,
      path: `invocations.${invocationId}.inputs.${param}`,
      invocationId,
      field: param,
      context: { expected, actual },
    });
  }

  static unknownInvocation(invocationId: string, referenced: string, path: string): SchemaMismatchError {
    return new SchemaMismatchError({
      code: ToolweaveErrorCode.PLAN_UNKNOWN_INVOCATION,
      message: `Invocation "${invocationId}" depends on unknown invocation "${referenced}"`,
      path,
      invocationId,
      context: { referenced },
    });
  }
}

/**
 * The invocation names a tool the registry does not know.
 */
export class UnknownToolError extends SchemaMismatchError {
  readonly tool: string;

  constructor(invocationId: string, tool: string, available: readonly string[]) {
    super({
      code: ToolweaveErrorCode.PLAN_UNKNOWN_TOOL,
      message: `Invocation "${invocationId}" uses unregistered tool "${tool}"`,
      path: `invocations.${invocationId}.tool`,
      hint: available.length > 0
        ? `Registered tools: ${available.join(', ')}`
        : 'No tools are registered',
      invocationId,
      context: { tool },
    });
    this.tool = tool;
  }
}

/**
 * The dependency graph has a cycle.
 */
export class CyclicDependencyError extends PlanError {
  /** Invocation ids along the cycle, first id repeated at the end */
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super({
      code: ToolweaveErrorCode.PLAN_CYCLIC_DEPENDENCY,
      message: `Circular dependency detected: ${cycle.join(' → ')}`,
      path: 'invocations',
      context: { cycle: [...cycle] },
    });
    this.cycle = Object.freeze([...cycle]);
  }
}

/**
 * Structural problems with the definition that are not about tool schemas.
 */
export class InvalidDefinitionError extends PlanError {
  static empty(workflowName: string): InvalidDefinitionError {
    return new InvalidDefinitionError({
      code: ToolweaveErrorCode.PLAN_EMPTY_WORKFLOW,
      message: `Workflow "${workflowName}" has no invocations`,
      path: 'invocations',
    });
  }

  static invalidTimeout(path: string, value: number, max: number): InvalidDefinitionError {
    return new InvalidDefinitionError({
      code: ToolweaveErrorCode.PLAN_INVALID_TIMEOUT,
      message: `Timeout ${value} at ${path} must be a whole number of milliseconds between 1 and ${max}`,
      path,
      context: { value, max },
    });
  }

  static duplicateId(invocationId: string, firstIndex: number, secondIndex: number): InvalidDefinitionError {
    return new InvalidDefinitionError({
      code: ToolweaveErrorCode.PLAN_DUPLICATE_ID,
      message: `Invocation id "${invocationId}" is declared twice (positions ${firstIndex} and ${secondIndex})`,
      path: `invocations[${secondIndex}].id`,
      context: { invocationId, firstIndex, secondIndex },
    });
  }
}
