/**
 * Registry and run-state errors
 *
 * @module errors
 */

import { ToolweaveError } from './ToolweaveError.js';
import { ToolweaveErrorCode, ErrorSeverity } from './ErrorCodes.js';

export class DuplicateToolError extends ToolweaveError {
  readonly tool: string;

  constructor(tool: string) {
    super({
      code: ToolweaveErrorCode.RUN_DUPLICATE_TOOL,
      message: `Tool "${tool}" is already registered`,
      hint: 'Unregister the existing tool first or pick a different name',
      severity: ErrorSeverity.ERROR,
      context: { tool },
    });
    this.tool = tool;
  }
}

/**
 * A node or run status change that its lifecycle does not allow.
 * Indicates a scheduler bug, never a tool failure.
 */
export class InvalidTransitionError extends ToolweaveError {
  constructor(subject: string, from: string, to: string) {
    super({
      code: ToolweaveErrorCode.RUN_INVALID_TRANSITION,
      message: `Invalid transition for ${subject}: ${from} → ${to}`,
      severity: ErrorSeverity.ERROR,
      context: { subject, from, to },
    });
  }
}
