/**
 * Workflow loading for commands that plan without executing.
 *
 * Tools a file declares under `tools:` are registered as placeholders: they
 * carry the declared schema, so plans validate, but refuse to run.
 */

import {
  DependencyResolver,
  ToolError,
  ToolRegistry,
  WorkflowLoader,
  defineTool,
  type ExecutionPlan,
  type LoadedWorkflow,
} from '@toolweave/engine';
import { InvalidArgumentError } from 'commander';

export interface PlannedWorkflow {
  readonly loaded: LoadedWorkflow;
  readonly plan: ExecutionPlan;
}

export function createDeclaredToolRegistry(loaded: LoadedWorkflow): ToolRegistry {
  const registry = new ToolRegistry();
  for (const spec of loaded.tools) {
    registry.register(
      defineTool(spec, () => {
        throw new ToolError(`Tool "${spec.name}" is only declared in ${loaded.source} and cannot run`);
      }),
    );
  }
  return registry;
}

/**
 * Load a workflow file and build its plan against the tools it declares
 *
 * @throws {DefinitionSchemaError} If the file cannot be loaded
 * @throws {PlanError} If the definition cannot be planned
 */
export async function loadPlan(file: string, options: { maxParallel?: number } = {}): Promise<PlannedWorkflow> {
  const loaded = await WorkflowLoader.fromFile(file);
  const definition = options.maxParallel === undefined
    ? loaded.definition
    : { ...loaded.definition, maxParallel: options.maxParallel };

  return { loaded, plan: DependencyResolver.build(definition, createDeclaredToolRegistry(loaded)) };
}

/**
 * Commander argument parser for positive integers
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
