import { describe, it, expect } from 'vitest';
import { defineTool } from '../../src/adapters/FunctionToolAdapter.js';
import { ToolRegistry } from '../../src/adapters/ToolRegistry.js';
import { UnknownToolError } from '../../src/errors/PlanErrors.js';
import { DuplicateToolError } from '../../src/errors/RunErrors.js';
import { createSilentLogger } from '../../src/core/EngineLogger.js';
import { fetcher, fetcherSpec, summarizer, transformer } from '../helpers.js';

describe('ToolRegistry', () => {
  it('should register and resolve tools by name', () => {
    const registry = new ToolRegistry([fetcher(), transformer()]).register(summarizer());

    expect(registry.size).toBe(3);
    expect(registry.has('fetcher')).toBe(true);
    expect(registry.resolve('summarizer', 'summarize').spec().name).toBe('summarizer');
    expect(registry.getNames()).toEqual(['fetcher', 'summarizer', 'transformer']);
    expect(registry.getSpecs().map(spec => spec.name)).toEqual(['fetcher', 'transformer', 'summarizer']);
  });

  it('should reject a second tool with the same name', () => {
    const registry = new ToolRegistry([fetcher()]);

    expect(() => registry.register(fetcher())).toThrow(DuplicateToolError);
    expect(() => registry.register(fetcher())).toThrow('Tool "fetcher" is already registered');
  });

  it('should throw UnknownToolError naming the invocation', () => {
    const registry = new ToolRegistry([fetcher()]);

    expect(() => registry.resolve('scraper', 'fetch')).toThrow(
      new UnknownToolError('fetch', 'scraper', ['fetcher']).message,
    );
    expect(registry.get('scraper')).toBeUndefined();
  });

  it('should unregister and clear', () => {
    const registry = new ToolRegistry([fetcher(), transformer()]);

    expect(registry.unregister('fetcher')).toBe(true);
    expect(registry.unregister('fetcher')).toBe(false);
    registry.clear();
    expect(registry.size).toBe(0);
  });
});

describe('FunctionToolAdapter', () => {
  it('should freeze the declared spec', () => {
    const adapter = defineTool({ ...fetcherSpec }, () => ({ data: 'x' }));
    const spec = adapter.spec();

    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec.inputs[0])).toBe(true);
    expect(adapter.name).toBe('fetcher');
  });

  it('should pass input and context to the handler', async () => {
    const adapter = defineTool(fetcherSpec, ({ source }, { nodeId, attempt }) => ({ data: `${String(source)}@${nodeId}#${attempt}` }));

    const output = await adapter.invoke(
      { source: 'x' },
      { signal: new AbortController().signal, runId: 'run-1', nodeId: 'fetch', attempt: 2, logger: createSilentLogger() },
    );

    expect(output).toEqual({ data: 'x@fetch#2' });
  });
});
