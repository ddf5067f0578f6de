/**
 * Base Toolweave Error Class
 *
 * Foundation for all engine errors. Carries a structured diagnostic
 * (code, path, hint, severity, context) for CLI and structured logging.
 *
 * @module errors
 */

import {
  ToolweaveErrorCode,
  ErrorSeverity,
  getErrorCategory,
  getErrorDescription,
  getSuggestedAction,
  isRetryable,
  isUserError,
} from './ErrorCodes.js';

/**
 * Diagnostic error information
 */
export interface ToolweaveErrorDiagnostic {
  /** Structured error code (e.g., TW-P-003) */
  code: ToolweaveErrorCode;

  /** Human-readable error message */
  message: string;

  /** Location of the problem (e.g., "invocations.transform.inputs.data") */
  path?: string;

  /** Suggestion for fixing the error */
  hint?: string;

  severity: ErrorSeverity;

  /** Additional context data for debugging */
  context?: Record<string, unknown>;
}

/**
 * Base error class for all Toolweave errors
 *
 * @example
 * ```typescript
 * throw new ToolweaveError({
 *   code: ToolweaveErrorCode.PLAN_EMPTY_WORKFLOW,
 *   message: 'Workflow "report" has no invocations',
 *   severity: ErrorSeverity.ERROR,
 * });
 * ```
 */
export class ToolweaveError extends Error {
  public readonly diagnostic: ToolweaveErrorDiagnostic;

  /** Timestamp when error occurred */
  public readonly timestamp: Date;

  constructor(diagnostic: ToolweaveErrorDiagnostic, options?: { cause?: unknown }) {
    super(diagnostic.message, options);
    this.name = getErrorCategory(diagnostic.code);
    this.diagnostic = {
      ...diagnostic,
      hint: diagnostic.hint ?? getSuggestedAction(diagnostic.code),
    };
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get code(): ToolweaveErrorCode {
    return this.diagnostic.code;
  }

  get path(): string | undefined {
    return this.diagnostic.path;
  }

  get hint(): string | undefined {
    return this.diagnostic.hint;
  }

  get severity(): ErrorSeverity {
    return this.diagnostic.severity;
  }

  get description(): string {
    return getErrorDescription(this.code);
  }

  /**
   * True if the user can fix this by changing the workflow or config
   */
  get isUserError(): boolean {
    return isUserError(this.code);
  }

  /**
   * True if a retry might succeed
   */
  get isRetryable(): boolean {
    return isRetryable(this.code);
  }

  /**
   * Format error for logging/display
   */
  toString(): string {
    let msg = `${this.name} [${this.code}]`;

    if (this.path) {
      msg += ` at ${this.path}`;
    }

    msg += `\n\n${this.message}`;

    if (this.hint) {
      msg += `\n\nHint: ${this.hint}`;
    }

    if (this.diagnostic.context && Object.keys(this.diagnostic.context).length > 0) {
      msg += `\n\nContext: ${JSON.stringify(this.diagnostic.context, null, 2)}`;
    }

    return msg;
  }

  /**
   * Convert to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      description: this.description,
      path: this.path,
      hint: this.hint,
      severity: this.severity,
      context: this.diagnostic.context,
      timestamp: this.timestamp.toISOString(),
      isUserError: this.isUserError,
      isRetryable: this.isRetryable,
    };
  }

  /**
   * Essential fields only, for CLI output
   */
  toSimpleObject(): { code: string; message: string; hint?: string; path?: string } {
    return {
      code: this.code,
      message: this.message,
      hint: this.hint,
      path: this.path,
    };
  }
}
