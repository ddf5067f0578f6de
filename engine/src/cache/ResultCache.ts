/**
 * Result cache contract consumed by the scheduler.
 *
 * Entries are advisory: a miss never blocks execution, and a lost race
 * between two writers just leaves whichever output was written last.
 */

import type { ToolOutput } from '../types/core-types.js';

export interface CacheEntry {
  readonly output: ToolOutput;
  readonly createdAt: number;
}

export interface ResultCache {
  /**
   * Cached output for (tool, fingerprint), or undefined on a miss
   */
  get(toolId: string, fingerprint: string): Promise<ToolOutput | undefined>;

  put(toolId: string, fingerprint: string, output: ToolOutput): Promise<void>;
}
