import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ToolweaveErrorCode } from '../../src/errors/ErrorCodes.js';
import { DefinitionSchemaError } from '../../src/errors/ConfigErrors.js';
import { WorkflowLoader } from '../../src/loader/WorkflowLoader.js';
import { normalizeInput } from '../../src/parser/DefinitionSchema.js';
import { literal, ref } from '../../src/types/core-types.js';

const REPORT_YAML = `
name: report
description: Fetch and summarize
timeoutMs: 2m
maxParallel: 2
tools:
  - name: fetcher
    inputs: [{ name: source, type: string }]
    outputs: [{ name: data, type: string }]
    timeoutMs: 5s
invocations:
  - id: fetch
    tool: fetcher
    inputs:
      source: x
    retry: { maxAttempts: 3 }
  - id: transform
    tool: transformer
    inputs:
      data: { ref: fetch, field: data }
      options: { literal: { ref: not-a-reference } }
    timeoutMs: 500ms
    criticality: optional
  - id: summarize
    tool: summarizer
    inputs:
      result: { ref: transform, field: result, default: "n/a" }
    dependsOn: [fetch]
`;

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('WorkflowLoader', () => {
  describe('fromYAML', () => {
    it('should normalise a document into a definition', () => {
      const { definition, tools, source } = WorkflowLoader.fromYAML(REPORT_YAML);

      expect(source).toBe('YAML content');
      expect(definition.name).toBe('report');
      expect(definition.description).toBe('Fetch and summarize');
      expect(definition.timeoutMs).toBe(120_000);
      expect(definition.maxParallel).toBe(2);
      expect(definition.invocations.map(invocation => invocation.id)).toEqual(['fetch', 'transform', 'summarize']);

      const [fetch, transform, summarize] = definition.invocations;
      expect(fetch).toEqual({
        id: 'fetch',
        tool: 'fetcher',
        inputs: { source: literal('x') },
        retry: { maxAttempts: 3 },
      });
      expect(transform?.inputs).toEqual({
        data: ref('fetch', 'data'),
        options: literal({ ref: 'not-a-reference' }),
      });
      expect(transform?.timeoutMs).toBe(500);
      expect(transform?.criticality).toBe('optional');
      expect(summarize?.inputs.result).toEqual({ kind: 'ref', invocationId: 'transform', field: 'result', default: 'n/a' });
      expect(summarize?.dependsOn).toEqual(['fetch']);

      expect(tools).toEqual([
        {
          name: 'fetcher',
          inputs: [{ name: 'source', type: 'string' }],
          outputs: [{ name: 'data', type: 'string' }],
          timeoutMs: 5000,
        },
      ]);
    });

    it('should report a missing name with its path', () => {
      const error = catchError(() => WorkflowLoader.fromYAML('invocations: []'));

      expect(error).toBeInstanceOf(DefinitionSchemaError);
      if (error instanceof DefinitionSchemaError) {
        expect(error.code).toBe(ToolweaveErrorCode.CONFIG_DEFINITION_INVALID);
        expect(error.issues).toEqual([{ path: 'name', message: 'Required' }]);
        expect(error.message).toBe('Invalid workflow definition in YAML content: name: Required');
      }
    });

    it('should reject unknown invocation keys', () => {
      const error = catchError(() =>
        WorkflowLoader.fromYAML('name: w\ninvocations:\n  - id: a\n    tool: t\n    timeout: 5\n'),
      );

      expect(error).toBeInstanceOf(DefinitionSchemaError);
      if (error instanceof DefinitionSchemaError) {
        expect(error.issues).toEqual([{ path: 'invocations.0', message: "Unrecognized key(s) in object: 'timeout'" }]);
      }
    });

    it('should reject a malformed duration', () => {
      const error = catchError(() => WorkflowLoader.fromYAML('name: w\ntimeoutMs: soon\ninvocations: []\n'));

      expect(error).toBeInstanceOf(DefinitionSchemaError);
      if (error instanceof DefinitionSchemaError) {
        expect(error.issues.map(issue => issue.path)).toEqual(['timeoutMs']);
      }
    });

    it('should reject a duration longer than a timer can wait', () => {
      const error = catchError(() =>
        WorkflowLoader.fromYAML('name: w\ninvocations:\n  - id: a\n    tool: t\n    timeoutMs: 600h\n'),
      );

      expect(error).toBeInstanceOf(DefinitionSchemaError);
      if (error instanceof DefinitionSchemaError) {
        expect(error.issues).toEqual([
          { path: 'invocations.0.timeoutMs', message: 'must be between 1ms and 2147483647ms (about 24.8 days)' },
        ]);
      }
    });

    it('should report YAML syntax errors as parse errors', () => {
      const error = catchError(() => WorkflowLoader.fromYAML('name: [unclosed', 'broken.yaml'));

      expect(error).toBeInstanceOf(DefinitionSchemaError);
      if (error instanceof DefinitionSchemaError) {
        expect(error.code).toBe(ToolweaveErrorCode.CONFIG_PARSE_ERROR);
        expect(error.message.startsWith('Failed to parse workflow definition broken.yaml: ')).toBe(true);
      }
    });
  });

  describe('fromJSON', () => {
    it('should accept the same document shape', () => {
      const { definition } = WorkflowLoader.fromJSON(
        JSON.stringify({ name: 'json', invocations: [{ id: 'a', tool: 't', inputs: { n: 3 } }] }),
      );

      expect(definition.invocations[0]?.inputs).toEqual({ n: literal(3) });
    });

    it('should report invalid JSON as a parse error', () => {
      expect(() => WorkflowLoader.fromJSON('{')).toThrow(DefinitionSchemaError);
    });
  });

  describe('fromFile', () => {
    let dir = '';

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'toolweave-loader-'));
      await writeFile(join(dir, 'report.yaml'), REPORT_YAML);
      await writeFile(join(dir, 'report.json'), JSON.stringify({ name: 'from-json', invocations: [] }));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should load YAML files', async () => {
      const path = join(dir, 'report.yaml');
      const loaded = await WorkflowLoader.fromFile(path);

      expect(loaded.definition.name).toBe('report');
      expect(loaded.source).toBe(path);
    });

    it('should parse .json files as JSON', async () => {
      const loaded = await WorkflowLoader.fromFile(join(dir, 'report.json'));

      expect(loaded.definition.name).toBe('from-json');
    });

    it('should report unreadable files', async () => {
      await expect(WorkflowLoader.fromFile(join(dir, 'missing.yaml'))).rejects.toThrow('cannot read file');
    });
  });
});

describe('normalizeInput', () => {
  it('should read ref objects as references', () => {
    expect(normalizeInput({ ref: 'fetch', field: 'data' })).toEqual(ref('fetch', 'data'));
    expect(normalizeInput({ ref: 'fetch', field: 'data', default: 0 })).toEqual(ref('fetch', 'data', { default: 0 }));
  });

  it('should read everything else as literals', () => {
    expect(normalizeInput('text')).toEqual(literal('text'));
    expect(normalizeInput({ ref: 'fetch' })).toEqual(literal({ ref: 'fetch' }));
    expect(normalizeInput({ literal: { ref: 'fetch', field: 'data' } })).toEqual(literal({ ref: 'fetch', field: 'data' }));
    expect(normalizeInput(null)).toEqual(literal(null));
    expect(normalizeInput({})).toEqual(literal({}));
  });
});
