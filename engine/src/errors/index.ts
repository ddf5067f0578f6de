/**
 * Toolweave Error Infrastructure
 *
 * @module errors
 */

export * from './ErrorCodes.js';
export * from './ToolweaveError.js';
export * from './PlanErrors.js';
export * from './NodeErrors.js';
export * from './ConfigErrors.js';
export * from './RunErrors.js';
