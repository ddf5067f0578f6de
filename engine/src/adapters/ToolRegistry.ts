/**
 * Tool Registry
 *
 * Lookup table from tool name to adapter. Each engine (or caller) owns its
 * own registry and passes it explicitly to plan construction.
 *
 * @module adapters
 */

import { DuplicateToolError } from '../errors/RunErrors.js';
import { UnknownToolError } from '../errors/PlanErrors.js';
import type { ToolSpec } from '../types/core-types.js';
import type { ToolAdapter } from './ToolAdapter.js';

export class ToolRegistry {
  private tools: Map<string, ToolAdapter> = new Map();

  constructor(adapters: readonly ToolAdapter[] = []) {
    this.registerAll(adapters);
  }

  /**
   * Register an adapter under its spec name
   *
   * @throws {DuplicateToolError} If the name is taken
   */
  register(adapter: ToolAdapter): this {
    const name = adapter.spec().name;
    if (this.tools.has(name)) {
      throw new DuplicateToolError(name);
    }
    this.tools.set(name, adapter);
    return this;
  }

  registerAll(adapters: readonly ToolAdapter[]): this {
    for (const adapter of adapters) {
      this.register(adapter);
    }
    return this;
  }

  unregister(name: string): boolean {
    return this.tools.delete(name);
  }

  /**
   * Resolve the adapter for an invocation
   *
   * @throws {UnknownToolError} If no tool has this name
   */
  resolve(name: string, invocationId: string): ToolAdapter {
    const adapter = this.tools.get(name);
    if (!adapter) {
      throw new UnknownToolError(invocationId, name, this.getNames());
    }
    return adapter;
  }

  get(name: string): ToolAdapter | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getNames(): string[] {
    return Array.from(this.tools.keys()).sort();
  }

  getSpecs(): ToolSpec[] {
    return Array.from(this.tools.values(), adapter => adapter.spec());
  }

  get size(): number {
    return this.tools.size;
  }

  clear(): void {
    this.tools.clear();
  }
}
