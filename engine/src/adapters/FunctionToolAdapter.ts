/**
 * Function Tool Adapter
 *
 * Wraps a plain async function as a ToolAdapter.
 *
 * @example
 * ```ts
 * const summarize = defineTool(
 *   { name: 'summarize', inputs: [{ name: 'result', type: 'string' }], outputs: [{ name: 'summary', type: 'string' }] },
 *   async ({ result }) => ({ summary: `${String(result)} (done)` }),
 * );
 * ```
 *
 * @module adapters
 */

import type { ToolInput, ToolOutput, ToolSpec } from '../types/core-types.js';
import { BaseToolAdapter, type ToolInvocationContext } from './ToolAdapter.js';

export type ToolHandler = (input: ToolInput, context: ToolInvocationContext) => Promise<ToolOutput> | ToolOutput;

export class FunctionToolAdapter extends BaseToolAdapter {
  private readonly handler: ToolHandler;

  constructor(spec: ToolSpec, handler: ToolHandler) {
    super(spec);
    this.handler = handler;
  }

  async invoke(input: ToolInput, context: ToolInvocationContext): Promise<ToolOutput> {
    return this.handler(input, context);
  }
}

export function defineTool(spec: ToolSpec, handler: ToolHandler): FunctionToolAdapter {
  return new FunctionToolAdapter(spec, handler);
}
