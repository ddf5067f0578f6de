import { describe, it, expect } from 'vitest';
import { ErrorSeverity, getErrorCategory, isRetryable, isUserError, ToolweaveErrorCode } from '../../src/errors/ErrorCodes.js';
import {
  NodeCancelledError,
  NodeTimeoutError,
  ToolError,
  toNodeError,
  TransientError,
} from '../../src/errors/NodeErrors.js';
import { CyclicDependencyError, InvalidDefinitionError, UnknownToolError } from '../../src/errors/PlanErrors.js';
import { ConfigError } from '../../src/errors/ConfigErrors.js';

describe('ToolweaveError', () => {
  it('should derive name, hint and flags from the code', () => {
    const error = InvalidDefinitionError.empty('report');

    expect(error.name).toBe('PlanError');
    expect(error.code).toBe(ToolweaveErrorCode.PLAN_EMPTY_WORKFLOW);
    expect(error.hint).toBe('Add at least one invocation');
    expect(error.severity).toBe(ErrorSeverity.ERROR);
    expect(error.isUserError).toBe(true);
    expect(error.isRetryable).toBe(false);
    expect(error).toBeInstanceOf(Error);
  });

  it('should render a readable string with location and hint', () => {
    const error = new UnknownToolError('fetch', 'scraper', []);

    expect(error.toString()).toBe(
      [
        'PlanError [TW-P-001] at invocations.fetch.tool',
        '',
        'Invocation "fetch" uses unregistered tool "scraper"',
        '',
        'Hint: No tools are registered',
        '',
        `Context: ${JSON.stringify({ invocationId: 'fetch', tool: 'scraper' }, null, 2)}`,
      ].join('\n'),
    );
  });

  it('should reduce to essential fields for CLI output', () => {
    const error = new CyclicDependencyError(['a', 'b', 'a']);

    expect(error.toSimpleObject()).toEqual({
      code: 'TW-P-003',
      message: 'Circular dependency detected: a → b → a',
      hint: 'Remove one of the references that closes the cycle',
      path: 'invocations',
    });
    expect(error.toJSON()).toMatchObject({ name: 'PlanError', context: { cycle: ['a', 'b', 'a'] } });
  });

  it('should summarise config issues in the message', () => {
    const error = new ConfigError('run configuration', [
      { path: 'concurrency', message: 'must be positive' },
      { path: '', message: 'unknown option' },
    ]);

    expect(error.message).toBe('Invalid run configuration: concurrency: must be positive; unknown option');
    expect(error.path).toBe('concurrency');
  });
});

describe('error codes', () => {
  it('should categorise codes by their letter', () => {
    expect(getErrorCategory(ToolweaveErrorCode.NODE_TIMEOUT)).toBe('NodeExecutionError');
    expect(getErrorCategory(ToolweaveErrorCode.RUN_DUPLICATE_TOOL)).toBe('RunError');
    expect(getErrorCategory(ToolweaveErrorCode.CONFIG_PARSE_ERROR)).toBe('ConfigError');
  });

  it('should mark only timeouts and transient failures as retryable', () => {
    expect(isRetryable(ToolweaveErrorCode.NODE_TIMEOUT)).toBe(true);
    expect(isRetryable(ToolweaveErrorCode.NODE_TRANSIENT)).toBe(true);
    expect(isRetryable(ToolweaveErrorCode.NODE_TOOL_FAILED)).toBe(false);
    expect(isUserError(ToolweaveErrorCode.NODE_TOOL_FAILED)).toBe(false);
  });
});

describe('toNodeError', () => {
  it('should stamp node id and attempt onto adapter errors', () => {
    const error = toNodeError(new TransientError('rate limited'), 'fetch', 2);

    expect(error).toBeInstanceOf(TransientError);
    expect(error.toInfo()).toEqual({
      kind: 'TransientError',
      code: ToolweaveErrorCode.NODE_TRANSIENT,
      message: 'rate limited',
      nodeId: 'fetch',
      attempt: 2,
    });
  });

  it('should return already-stamped errors unchanged', () => {
    const timeout = new NodeTimeoutError('fetch', 1, 100);

    expect(toNodeError(timeout, 'fetch', 1)).toBe(timeout);
    expect(toNodeError(new NodeCancelledError('other', 1, 'stop'), 'fetch', 1).kind).toBe('Cancelled');
  });

  it('should restamp a cancellation without nesting its message', () => {
    const restamped = toNodeError(new NodeCancelledError('other', 1, 'stop'), 'fetch', 2);

    expect(restamped).toBeInstanceOf(NodeCancelledError);
    expect(restamped.message).toBe('Node "fetch" was cancelled (stop)');
    expect(restamped.toInfo()).toMatchObject({ nodeId: 'fetch', attempt: 2 });
  });

  it('should classify network failures as transient', () => {
    const refused = Object.assign(new Error('connect failed'), { code: 'ECONNREFUSED' });

    expect(toNodeError(refused, 'fetch', 1).kind).toBe('TransientError');
    expect(toNodeError(new Error('socket hang up'), 'fetch', 1).kind).toBe('TransientError');
  });

  it('should classify other failures as tool errors', () => {
    const error = toNodeError(new TypeError('undefined is not a function'), 'fetch', 1);

    expect(error).toBeInstanceOf(ToolError);
    expect(error.message).toBe('undefined is not a function');
    expect(error.cause).toBeInstanceOf(TypeError);
    expect(toNodeError('plain string', 'fetch', 1).message).toBe('plain string');
  });

  it('should keep the code of a tool error', () => {
    const invalid = new ToolError('bad output', { code: ToolweaveErrorCode.NODE_INVALID_OUTPUT });

    expect(toNodeError(invalid, 'fetch', 3).toInfo()).toMatchObject({
      kind: 'ToolError',
      code: ToolweaveErrorCode.NODE_INVALID_OUTPUT,
      attempt: 3,
    });
  });
});
