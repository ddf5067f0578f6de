/**
 * Tool adapters and registry
 *
 * @module adapters
 */

export * from './ToolAdapter.js';
export * from './FunctionToolAdapter.js';
export * from './ToolRegistry.js';
