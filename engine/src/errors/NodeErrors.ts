/**
 * Node Execution Errors
 *
 * Failures of a single attempt of a single node. They are recorded on the
 * WorkflowRun and fed to the FailureHandler; the scheduler never rethrows them.
 *
 * @module errors
 */

import { ToolweaveError } from './ToolweaveError.js';
import { ToolweaveErrorCode, ErrorSeverity } from './ErrorCodes.js';

/**
 * Error kinds recorded on a failed node
 */
export type NodeErrorKind = 'Timeout' | 'ToolError' | 'TransientError' | 'Cancelled';

/**
 * Serializable view of a node error, as stored on the run and in results
 */
export interface NodeErrorInfo {
  readonly kind: NodeErrorKind;
  readonly code: ToolweaveErrorCode;
  readonly message: string;
  readonly nodeId: string;
  readonly attempt: number;
}

/**
 * Base class for node execution errors
 */
export class NodeExecutionError extends ToolweaveError {
  readonly kind: NodeErrorKind;
  readonly nodeId: string;
  readonly attempt: number;

  constructor(params: {
    kind: NodeErrorKind;
    code: ToolweaveErrorCode;
    message: string;
    nodeId: string;
    attempt: number;
    hint?: string;
    context?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(
      {
        code: params.code,
        message: params.message,
        path: `nodes.${params.nodeId}`,
        hint: params.hint,
        severity: ErrorSeverity.ERROR,
        context: { nodeId: params.nodeId, attempt: params.attempt, ...params.context },
      },
      { cause: params.cause },
    );
    this.kind = params.kind;
    this.nodeId = params.nodeId;
    this.attempt = params.attempt;
  }

  toInfo(): NodeErrorInfo {
    return {
      kind: this.kind,
      code: this.code,
      message: this.message,
      nodeId: this.nodeId,
      attempt: this.attempt,
    };
  }
}

/**
 * Attempt exceeded its time budget.
 */
export class NodeTimeoutError extends NodeExecutionError {
  readonly timeoutMs: number;

  constructor(nodeId: string, attempt: number, timeoutMs: number) {
    super({
      kind: 'Timeout',
      code: ToolweaveErrorCode.NODE_TIMEOUT,
      message: `Node "${nodeId}" timed out after ${timeoutMs}ms (attempt ${attempt})`,
      nodeId,
      attempt,
      context: { timeoutMs },
    });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The wrapped tool reported a failure that a retry will not fix.
 *
 * Adapters throw this for explicit, fatal tool errors; the scheduler also uses
 * it for unclassified exceptions and invalid outputs.
 */
export class ToolError extends NodeExecutionError {
  constructor(
    message: string,
    options: { nodeId?: string; attempt?: number; code?: ToolweaveErrorCode; cause?: unknown } = {},
  ) {
    super({
      kind: 'ToolError',
      code: options.code ?? ToolweaveErrorCode.NODE_TOOL_FAILED,
      message,
      nodeId: options.nodeId ?? '',
      attempt: options.attempt ?? 0,
      cause: options.cause,
    });
  }
}

/**
 * Retryable failure, e.g. resource exhaustion signalled by an adapter.
 */
export class TransientError extends NodeExecutionError {
  constructor(message: string, options: { nodeId?: string; attempt?: number; cause?: unknown } = {}) {
    super({
      kind: 'TransientError',
      code: ToolweaveErrorCode.NODE_TRANSIENT,
      message,
      nodeId: options.nodeId ?? '',
      attempt: options.attempt ?? 0,
      cause: options.cause,
    });
  }
}

export class NodeCancelledError extends NodeExecutionError {
  /** Why the run stopped, e.g. "timeout" or a caller-supplied reason */
  readonly reason: string;

  constructor(nodeId: string, attempt: number, reason: string) {
    super({
      kind: 'Cancelled',
      code: ToolweaveErrorCode.NODE_CANCELLED,
      message: `Node "${nodeId}" was cancelled (${reason})`,
      nodeId,
      attempt,
      context: { reason },
    });
    this.reason = reason;
  }
}

/**
 * Message patterns of network failures that are worth retrying
 */
export const TRANSIENT_MESSAGE_PATTERNS: readonly RegExp[] = [
  /ECONNREFUSED/,
  /ENOTFOUND/,
  /ETIMEDOUT/,
  /ECONNRESET/,
  /EAI_AGAIN/,
  /socket hang up/i,
  /network timeout/i,
];

function hasStringCode(error: Error): error is Error & { code: string } {
  return 'code' in error && typeof error.code === 'string';
}

/**
 * Normalize anything an adapter throws into a NodeExecutionError stamped with
 * the node id and attempt number.
 *
 * Errors thrown without a node id (adapters rarely know it) are re-created
 * with one; plain errors are classified as transient when they look like
 * network failures and as ToolError otherwise.
 */
export function toNodeError(error: unknown, nodeId: string, attempt: number): NodeExecutionError {
  if (error instanceof NodeExecutionError) {
    if (error.nodeId === nodeId && error.attempt === attempt) {
      return error;
    }
    if (error instanceof TransientError) {
      return new TransientError(error.message, { nodeId, attempt, cause: error });
    }
    if (error instanceof NodeTimeoutError) {
      return new NodeTimeoutError(nodeId, attempt, error.timeoutMs);
    }
    if (error instanceof NodeCancelledError) {
      return new NodeCancelledError(nodeId, attempt, error.reason);
    }
    return new ToolError(error.message, { nodeId, attempt, code: error.code, cause: error });
  }

  if (error instanceof Error) {
    const codeText = hasStringCode(error) ? error.code : '';
    const transient = TRANSIENT_MESSAGE_PATTERNS.some(
      pattern => pattern.test(error.message) || pattern.test(codeText),
    );
    return transient
      ? new TransientError(error.message, { nodeId, attempt, cause: error })
      : new ToolError(error.message, { nodeId, attempt, cause: error });
  }

  return new ToolError(String(error), { nodeId, attempt });
}
