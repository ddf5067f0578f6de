import { FailureHandler } from '../src/automation/runtime/FailureHandler.js';
import type { FailureRuleInput } from '../src/automation/FailurePolicy.js';
import { defineTool } from '../src/adapters/FunctionToolAdapter.js';
import { computeFingerprint } from '../src/cache/Fingerprint.js';
import { ToolRegistry } from '../src/adapters/ToolRegistry.js';
import type { ToolAdapter } from '../src/adapters/ToolAdapter.js';
import { DependencyResolver } from '../src/graph/DependencyResolver.js';
import type { ExecutionPlan } from '../src/execution/ExecutionPlan.js';
import {
  literal,
  ref,
  type ToolInput,
  type ToolInvocation,
  type ToolSpec,
  type WorkflowDefinition,
} from '../src/types/core-types.js';

export const fetcherSpec: ToolSpec = {
  name: 'fetcher',
  inputs: [{ name: 'source', type: 'string' }],
  outputs: [{ name: 'data', type: 'string' }],
};

export const transformerSpec: ToolSpec = {
  name: 'transformer',
  inputs: [{ name: 'data', type: 'string' }],
  outputs: [{ name: 'result', type: 'string' }],
};

export const summarizerSpec: ToolSpec = {
  name: 'summarizer',
  inputs: [{ name: 'result', type: 'string' }],
  outputs: [{ name: 'summary', type: 'string' }],
};

/**
 * Generic tool taking any number of optional string inputs and returning `value`
 */
export const stepSpec: ToolSpec = {
  name: 'step',
  inputs: [
    { name: 'a', type: 'string', optional: true },
    { name: 'b', type: 'string', optional: true },
    { name: 'label', type: 'string', optional: true },
  ],
  outputs: [{ name: 'value', type: 'string' }],
};

export const fetcher = (): ToolAdapter => defineTool(fetcherSpec, ({ source }) => ({ data: String(source) }));

export const transformer = (): ToolAdapter => defineTool(transformerSpec, ({ data }) => ({ result: `${String(data)}!` }));

export const summarizer = (): ToolAdapter =>
  defineTool(summarizerSpec, ({ result }) => ({ summary: `${String(result)} (done)` }));

/**
 * fetch → transform → summarize
 */
export const pipelineDefinition: WorkflowDefinition = {
  name: 'pipeline',
  invocations: [
    { id: 'fetch', tool: 'fetcher', inputs: { source: literal('x') } },
    { id: 'transform', tool: 'transformer', inputs: { data: ref('fetch', 'data') } },
    { id: 'summarize', tool: 'summarizer', inputs: { result: ref('transform', 'result') } },
  ],
};

export function step(id: string, inputs: ToolInvocation['inputs'] = {}, extra: Partial<ToolInvocation> = {}): ToolInvocation {
  return { id, tool: 'step', inputs, ...extra };
}

export function registryOf(...adapters: ToolAdapter[]): ToolRegistry {
  return new ToolRegistry(adapters);
}

export function planOf(definition: WorkflowDefinition, ...adapters: ToolAdapter[]): ExecutionPlan {
  return DependencyResolver.build(definition, registryOf(...adapters));
}

/**
 * Failure handler without backoff delays or jitter
 */
export function immediateFailureHandler(defaults: FailureRuleInput = {}, tools?: Record<string, FailureRuleInput>): FailureHandler {
  return new FailureHandler({
    defaults: { ...defaults, backoff: { baseDelayMs: 0, jitter: 0, ...defaults.backoff } },
    tools,
  });
}

/**
 * Fingerprint of an input the test knows to be encodable
 */
export function fingerprintOf(toolId: string, input: ToolInput): string {
  const fingerprint = computeFingerprint(toolId, input);
  if (fingerprint === undefined) {
    throw new Error(`No fingerprint for ${toolId} input`);
  }
  return fingerprint;
}
