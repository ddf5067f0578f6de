/**
 * Tool Adapter Interface
 *
 * Uniform boundary around an analysis tool: a static spec plus
 * `invoke(input) -> output`. Adapters own no engine state.
 *
 * @module adapters
 */

import type { EngineLogger } from '../core/EngineLogger.js';
import type { FieldSpec, ToolInput, ToolOutput, ToolSpec } from '../types/core-types.js';

/**
 * Per-attempt context handed to an adapter
 */
export interface ToolInvocationContext {
  /** Aborted on timeout, run cancellation or abort; adapters must honour it */
  readonly signal: AbortSignal;

  readonly runId: string;

  readonly nodeId: string;

  /** 1-indexed attempt number */
  readonly attempt: number;

  readonly logger: EngineLogger;
}

export interface ToolAdapter {
  /**
   * Static declaration of the tool's schema
   */
  spec(): ToolSpec;

  /**
   * Run the tool once.
   *
   * Throw `TransientError` for retryable failures and `ToolError` for fatal
   * ones; other exceptions are classified by the engine.
   */
  invoke(input: ToolInput, context: ToolInvocationContext): Promise<ToolOutput>;
}

function freezeFields(fields: readonly FieldSpec[]): readonly FieldSpec[] {
  return Object.freeze(fields.map(field => Object.freeze({ ...field })));
}

/**
 * Deep-freeze a ToolSpec so it cannot change after registration
 */
export function freezeToolSpec(spec: ToolSpec): ToolSpec {
  return Object.freeze({
    ...spec,
    inputs: freezeFields(spec.inputs),
    outputs: freezeFields(spec.outputs),
  });
}

/**
 * Base adapter with a frozen spec
 */
export abstract class BaseToolAdapter implements ToolAdapter {
  private readonly toolSpec: ToolSpec;

  constructor(spec: ToolSpec) {
    this.toolSpec = freezeToolSpec(spec);
  }

  get name(): string {
    return this.toolSpec.name;
  }

  spec(): ToolSpec {
    return this.toolSpec;
  }

  abstract invoke(input: ToolInput, context: ToolInvocationContext): Promise<ToolOutput>;
}
