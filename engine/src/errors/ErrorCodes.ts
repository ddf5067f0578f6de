/**
 * Toolweave Error Codes
 *
 * Structured diagnostic codes for the orchestration engine.
 *
 * Format: TW-[Category]-[Number]
 *
 * Categories:
 * - P: Plan construction (unknown tools, schema mismatches, cycles)
 * - N: Node execution (tool failures, timeouts, cancellation)
 * - R: Run / registry / state bookkeeping
 * - C: Configuration and definition loading
 *
 * ADDING NEW ERRORS:
 * 1. Add the enum value below
 * 2. Add a description in getErrorDescription()
 * 3. Add it to isRetryable() when a retry can plausibly succeed
 *
 * @module errors
 */

export enum ToolweaveErrorCode {
  // ============================================================================
  // PLAN ERRORS (P) - fatal at build time, never retried
  // ============================================================================

  /** Invocation references a tool that is not registered */
  PLAN_UNKNOWN_TOOL = 'TW-P-001',

  /** Referenced output field or bound input does not match the tool schema */
  PLAN_SCHEMA_MISMATCH = 'TW-P-002',

  /** Dependency graph contains a cycle */
  PLAN_CYCLIC_DEPENDENCY = 'TW-P-003',

  /** Two invocations share an id */
  PLAN_DUPLICATE_ID = 'TW-P-004',

  /** Workflow declares no invocations */
  PLAN_EMPTY_WORKFLOW = 'TW-P-005',

  /** Reference or dependsOn names an invocation that does not exist */
  PLAN_UNKNOWN_INVOCATION = 'TW-P-006',

  /** Invocation, tool or workflow timeout outside what a timer can wait */
  PLAN_INVALID_TIMEOUT = 'TW-P-007',

  // ============================================================================
  // NODE ERRORS (N) - recorded on the run, handled by the failure policy
  // ============================================================================

  /** Wrapped tool reported a failure */
  NODE_TOOL_FAILED = 'TW-N-001',

  /** Attempt exceeded its timeout */
  NODE_TIMEOUT = 'TW-N-002',

  /** Retryable failure (network, resource exhaustion) */
  NODE_TRANSIENT = 'TW-N-003',

  /** Attempt was cancelled cooperatively */
  NODE_CANCELLED = 'TW-N-004',

  /** Tool output does not satisfy its declared outputs */
  NODE_INVALID_OUTPUT = 'TW-N-005',

  // ============================================================================
  // RUN / REGISTRY ERRORS (R)
  // ============================================================================

  /** Illegal node or run status transition */
  RUN_INVALID_TRANSITION = 'TW-R-001',

  /** Tool registered twice under the same name */
  RUN_DUPLICATE_TOOL = 'TW-R-002',

  // ============================================================================
  // CONFIG / DEFINITION ERRORS (C)
  // ============================================================================

  /** Engine, run or failure-policy configuration is invalid */
  CONFIG_INVALID = 'TW-C-001',

  /** Workflow definition document failed schema validation */
  CONFIG_DEFINITION_INVALID = 'TW-C-002',

  /** Workflow definition document could not be parsed */
  CONFIG_PARSE_ERROR = 'TW-C-003',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Stops the current operation */
  ERROR = 'error',

  /** Reported, operation continues */
  WARNING = 'warning',

  /** Informational */
  INFO = 'info',
}

/**
 * Get the human-readable category for an error code.
 */
export function getErrorCategory(code: ToolweaveErrorCode): string {
  const category = code.split('-')[1];
  switch (category) {
    case 'P':
      return 'PlanError';
    case 'N':
      return 'NodeExecutionError';
    case 'R':
      return 'RunError';
    case 'C':
      return 'ConfigError';
    default:
      return 'ToolweaveError';
  }
}

export function getErrorDescription(code: ToolweaveErrorCode): string {
  const descriptions: Record<ToolweaveErrorCode, string> = {
    [ToolweaveErrorCode.PLAN_UNKNOWN_TOOL]: 'The workflow uses a tool that is not in the registry',
    [ToolweaveErrorCode.PLAN_SCHEMA_MISMATCH]: 'An input binding does not match the declared tool schema',
    [ToolweaveErrorCode.PLAN_CYCLIC_DEPENDENCY]: 'Invocations depend on each other in a cycle',
    [ToolweaveErrorCode.PLAN_DUPLICATE_ID]: 'Invocation ids must be unique within a workflow',
    [ToolweaveErrorCode.PLAN_EMPTY_WORKFLOW]: 'A workflow needs at least one invocation',
    [ToolweaveErrorCode.PLAN_UNKNOWN_INVOCATION]: 'A reference names an invocation that does not exist',
    [ToolweaveErrorCode.PLAN_INVALID_TIMEOUT]: 'A timeout is not a usable number of milliseconds',
    [ToolweaveErrorCode.NODE_TOOL_FAILED]: 'The tool reported a failure',
    [ToolweaveErrorCode.NODE_TIMEOUT]: 'The tool did not finish within its timeout',
    [ToolweaveErrorCode.NODE_TRANSIENT]: 'The tool failed with a retryable error',
    [ToolweaveErrorCode.NODE_CANCELLED]: 'The invocation was cancelled',
    [ToolweaveErrorCode.NODE_INVALID_OUTPUT]: 'The tool output is missing declared fields',
    [ToolweaveErrorCode.RUN_INVALID_TRANSITION]: 'A status change violated the node or run lifecycle',
    [ToolweaveErrorCode.RUN_DUPLICATE_TOOL]: 'A tool with this name is already registered',
    [ToolweaveErrorCode.CONFIG_INVALID]: 'Configuration values are invalid',
    [ToolweaveErrorCode.CONFIG_DEFINITION_INVALID]: 'The workflow document does not match the expected shape',
    [ToolweaveErrorCode.CONFIG_PARSE_ERROR]: 'The workflow document is not valid YAML or JSON',
  };
  return descriptions[code];
}

/**
 * Whether an error with this code may succeed on retry.
 */
export function isRetryable(code: ToolweaveErrorCode): boolean {
  return code === ToolweaveErrorCode.NODE_TIMEOUT || code === ToolweaveErrorCode.NODE_TRANSIENT;
}

/**
 * Whether the user can fix the error by editing the workflow or config.
 */
export function isUserError(code: ToolweaveErrorCode): boolean {
  const category = code.split('-')[1];
  return category === 'P' || category === 'C';
}

export function getSuggestedAction(code: ToolweaveErrorCode): string | undefined {
  switch (code) {
    case ToolweaveErrorCode.PLAN_UNKNOWN_TOOL:
      return 'Register the tool before building the plan, or fix the tool name';
    case ToolweaveErrorCode.PLAN_SCHEMA_MISMATCH:
      return 'Compare the invocation inputs with the tool spec inputs and outputs';
    case ToolweaveErrorCode.PLAN_CYCLIC_DEPENDENCY:
      return 'Remove one of the references that closes the cycle';
    case ToolweaveErrorCode.PLAN_DUPLICATE_ID:
      return 'Rename one of the invocations';
    case ToolweaveErrorCode.PLAN_EMPTY_WORKFLOW:
      return 'Add at least one invocation';
    case ToolweaveErrorCode.PLAN_UNKNOWN_INVOCATION:
      return 'Check the invocation id for typos';
    case ToolweaveErrorCode.PLAN_INVALID_TIMEOUT:
      return 'Use a timeout of at most 2147483647ms (about 24.8 days)';
    case ToolweaveErrorCode.NODE_TIMEOUT:
      return 'Increase timeoutMs for the invocation or the tool';
    default:
      return undefined;
  }
}
