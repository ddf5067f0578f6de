/**
 * Core data model shared across the engine: tool schemas, workflow
 * definitions, node and run statuses.
 */

/**
 * Value types a tool can declare for its inputs and outputs
 */
export const FIELD_TYPES = ['string', 'number', 'boolean', 'object', 'array', 'any'] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/**
 * A declared input parameter or output field
 */
export interface FieldSpec {
  readonly name: string;
  readonly type: FieldType;
  /** Inputs: may be left unbound. Outputs: may be absent from the result. */
  readonly optional?: boolean;
  readonly description?: string;
}

/**
 * Static declaration of a tool: identity plus input/output schema
 */
export interface ToolSpec {
  /** Unique tool name used by invocations */
  readonly name: string;
  readonly description?: string;
  readonly inputs: readonly FieldSpec[];
  readonly outputs: readonly FieldSpec[];
  /** Per-attempt timeout; falls back to the run default */
  readonly timeoutMs?: number;
  /** Whether results may be served from the ResultCache (default: true) */
  readonly cacheable?: boolean;
}

/**
 * Resolved input passed to a tool
 */
export type ToolInput = Record<string, unknown>;

/**
 * Output produced by a tool, keyed by declared output field
 */
export type ToolOutput = Record<string, unknown>;

/**
 * Literal value bound to an input parameter
 */
export interface LiteralBinding {
  readonly kind: 'literal';
  readonly value: unknown;
}

/**
 * Reference to another invocation's output field
 */
export interface RefBinding {
  readonly kind: 'ref';
  readonly invocationId: string;
  readonly field: string;
  /** Used when the referenced invocation failed but its failure is tolerated */
  readonly default?: unknown;
}

export type InputBinding = LiteralBinding | RefBinding;

/**
 * How a node's failure affects the rest of the run
 *
 * - optional: dependents still run, using binding defaults
 * - required: dependents are skipped, the run continues
 * - critical: the whole run is aborted
 */
export type Criticality = 'optional' | 'required' | 'critical';

/**
 * One concrete, parameterized use of a tool within a workflow
 */
export interface ToolInvocation {
  /** Unique within the workflow */
  readonly id: string;
  /** Registered tool name */
  readonly tool: string;
  readonly inputs: Readonly<Record<string, InputBinding>>;
  /** Ordering-only dependencies, in addition to those implied by refs */
  readonly dependsOn?: readonly string[];
  readonly timeoutMs?: number;
  readonly retry?: { readonly maxAttempts?: number };
  readonly criticality?: Criticality;
}

/**
 * Ordered collection of invocations; declaration order breaks layer ties
 */
export interface WorkflowDefinition {
  readonly name: string;
  readonly description?: string;
  readonly invocations: readonly ToolInvocation[];
  /** Run-level timeout */
  readonly timeoutMs?: number;
  /** Upper bound on concurrently running nodes */
  readonly maxParallel?: number;
}

/**
 * Node lifecycle
 *
 * pending → ready → running → succeeded | failed
 * failed → running (retry, same node id, next attempt)
 * pending | ready → skipped
 * ready → succeeded (cache hit)
 */
export enum NodeStatus {
  PENDING = 'pending',
  READY = 'ready',
  RUNNING = 'running',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
  SKIPPED = 'skipped',
}

/**
 * Run lifecycle
 *
 * running → succeeded | partially_failed | failed | cancelling
 * cancelling → cancelled
 */
export enum RunStatus {
  RUNNING = 'running',
  CANCELLING = 'cancelling',
  SUCCEEDED = 'succeeded',
  PARTIALLY_FAILED = 'partially_failed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

/**
 * Why a node was skipped
 */
export type SkipCause =
  | { readonly reason: 'dependency_failed'; readonly nodeId: string }
  | { readonly reason: 'run_aborted'; readonly nodeId: string }
  | { readonly reason: 'cancelled' };

/**
 * Create a literal input binding
 */
export function literal(value: unknown): LiteralBinding {
  return { kind: 'literal', value };
}

/**
 * Create a reference to `invocationId`'s output `field`
 */
export function ref(invocationId: string, field: string, options: { default?: unknown } = {}): RefBinding {
  return Object.hasOwn(options, 'default')
    ? { kind: 'ref', invocationId, field, default: options.default }
    : { kind: 'ref', invocationId, field };
}

/**
 * Whether `value` conforms to a declared field type
 */
export function matchesFieldType(type: FieldType, value: unknown): boolean {
  switch (type) {
    case 'any':
      return true;
    case 'array':
      return Array.isArray(value);
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'string':
    case 'number':
    case 'boolean':
      return typeof value === type;
  }
}

/**
 * Type name used in mismatch messages
 */
export function describeValueType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
