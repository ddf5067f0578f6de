import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';
import { EngineLogger, ToolError } from '@toolweave/engine';
import { InvalidArgumentError } from 'commander';
import { createProgram } from '../src/program.js';
import type { CliContext } from '../src/types/CliOutput.js';
import { loadPlan, parsePositiveInt } from '../src/utils/workflow.js';

const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const VALID = fixture('valid.yaml');
const CYCLIC = fixture('cyclic.yaml');
const BROKEN = fixture('broken.yaml');
const UNKNOWN_TOOL = fixture('unknown-tool.yaml');

interface CapturedRun {
  stdout: string[];
  stderr: string[];
  exitCode: number;
}

async function runCli(args: string[]): Promise<CapturedRun> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const context: CliContext = {
    output: {
      stdout: text => stdout.push(text),
      stderr: text => stderr.push(text),
    },
    exitCode: 0,
  };

  await createProgram(context).parseAsync(args, { from: 'user' });
  return { stdout, stderr, exitCode: context.exitCode };
}

describe('toolweave validate', () => {
  it('should summarize a valid workflow', async () => {
    const result = await runCli(['validate', VALID, '--no-color']);

    expect(result.exitCode).toBe(0);
    expect(result.stderr).toEqual([]);
    expect(result.stdout).toEqual([
      [`✔ ${VALID} is valid`, '  Workflow: report', '  Invocations: 4', '  Layers: 2'].join('\n'),
    ]);
  });

  it('should report a cycle with its code and path', async () => {
    const result = await runCli(['validate', CYCLIC, '--no-color']);

    expect(result.exitCode).toBe(1);
    expect(result.stdout).toEqual([]);
    expect(result.stderr).toEqual([
      [
        `✖ ${CYCLIC} is invalid`,
        '  [TW-P-003] Circular dependency detected: a → b → a',
        '  at invocations',
      ].join('\n'),
    ]);
  });

  it('should report document schema problems', async () => {
    const result = await runCli(['validate', BROKEN, '--no-color']);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toEqual([
      [
        `✖ ${BROKEN} is invalid`,
        `  [TW-C-002] Invalid workflow definition in ${BROKEN}: name: Required`,
        '  at name',
      ].join('\n'),
    ]);
  });

  it('should show the registered tools when a tool is not declared', async () => {
    const result = await runCli(['validate', UNKNOWN_TOOL, '--no-color']);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toEqual([
      [
        `✖ ${UNKNOWN_TOOL} is invalid`,
        '  [TW-P-001] Invocation "scan" uses unregistered tool "scanner"',
        '  at invocations.scan.tool',
        '  hint: Registered tools: fetcher',
      ].join('\n'),
    ]);
  });

  it('should check every file and fail if any is invalid', async () => {
    const result = await runCli(['validate', VALID, CYCLIC, '--no-color']);

    expect(result.exitCode).toBe(1);
    expect(result.stdout).toHaveLength(1);
    expect(result.stderr).toHaveLength(1);
    expect(result.stdout[0].split('\n')[0]).toBe(`✔ ${VALID} is valid`);
    expect(result.stderr[0].split('\n')[0]).toBe(`✖ ${CYCLIC} is invalid`);
  });

  it('should print one JSON document per file', async () => {
    const result = await runCli(['validate', VALID, BROKEN, '--format', 'json']);

    expect(result.exitCode).toBe(1);
    expect(result.stdout.map(text => JSON.parse(text))).toEqual([
      {
        file: VALID,
        valid: true,
        workflow: 'report',
        invocations: 4,
        layers: [['fetch-a', 'fetch-b', 'fetch-c'], ['summarize']],
      },
      {
        file: BROKEN,
        valid: false,
        error: {
          code: 'TW-C-002',
          message: `Invalid workflow definition in ${BROKEN}: name: Required`,
          path: 'name',
        },
      },
    ]);
  });
});

describe('toolweave plan', () => {
  const planText = [
    'Execution Plan: report',
    'Nodes: 4',
    'Layers: 2',
    'Max Parallelism: 3',
    'Estimated Duration: 60000ms',
    '',
    'Layer 0: [fetch-a, fetch-b, fetch-c]',
    '  └─ fetch-a: fetcher',
    '  └─ fetch-b: fetcher',
    '  └─ fetch-c: fetcher',
    'Layer 1: [summarize]',
    '  └─ summarize: summarizer ← fetch-a, fetch-b, fetch-c',
  ];

  it('should print the layers of the plan', async () => {
    const result = await runCli(['plan', VALID, '--no-color']);

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toEqual([planText.join('\n')]);
  });

  it('should split layers into batches with --max-parallel', async () => {
    const result = await runCli(['plan', VALID, '--max-parallel', '2', '--no-color']);

    expect(result.stdout).toEqual([
      [
        ...planText,
        '',
        'Batches (max 2 parallel):',
        '  1. [fetch-a, fetch-b]',
        '  2. [fetch-c]',
        '  3. [summarize]',
      ].join('\n'),
    ]);
  });

  it('should describe nodes and batches as JSON', async () => {
    const result = await runCli(['plan', VALID, '-p', '2', '-f', 'json']);
    const body: unknown = JSON.parse(result.stdout[0]);

    expect(body).toEqual({
      file: VALID,
      workflow: 'report',
      invocations: 4,
      layers: [['fetch-a', 'fetch-b', 'fetch-c'], ['summarize']],
      maxParallelism: 3,
      estimatedDurationMs: 60000,
      nodes: [
        { id: 'fetch-a', tool: 'fetcher', layer: 0, dependsOn: [] },
        { id: 'fetch-b', tool: 'fetcher', layer: 0, dependsOn: [] },
        { id: 'fetch-c', tool: 'fetcher', layer: 0, dependsOn: [] },
        { id: 'summarize', tool: 'summarizer', layer: 1, dependsOn: ['fetch-a', 'fetch-b', 'fetch-c'] },
      ],
      batches: [['fetch-a', 'fetch-b'], ['fetch-c'], ['summarize']],
    });
  });

  it('should fail for an invalid workflow', async () => {
    const result = await runCli(['plan', CYCLIC, '--no-color']);

    expect(result.exitCode).toBe(1);
    expect(result.stdout).toEqual([]);
    expect(result.stderr[0].split('\n')[1]).toBe('  [TW-P-003] Circular dependency detected: a → b → a');
  });
});

describe('loadPlan', () => {
  it('should register declared tools as placeholders that refuse to run', async () => {
    const { loaded, plan } = await loadPlan(VALID);
    const node = plan.nodes.get('fetch-a');

    expect(loaded.tools.map(tool => tool.name)).toEqual(['fetcher', 'summarizer']);
    expect(node?.spec.inputs).toEqual([{ name: 'url', type: 'string' }]);

    const invocation = node?.adapter.invoke(
      { url: 'https://example.test/a' },
      {
        signal: new AbortController().signal,
        runId: 'run-1',
        nodeId: 'fetch-a',
        attempt: 1,
        logger: new EngineLogger({ level: 'silent' }),
      },
    );

    await expect(invocation).rejects.toThrow(ToolError);
    await expect(invocation).rejects.toThrow(`Tool "fetcher" is only declared in ${VALID} and cannot run`);
  });

  it('should override maxParallel', async () => {
    const { plan } = await loadPlan(VALID, { maxParallel: 2 });

    expect(plan.maxParallel).toBe(2);
  });
});

describe('parsePositiveInt', () => {
  it('should accept positive integers', () => {
    expect(parsePositiveInt('3')).toBe(3);
  });

  it.each(['0', '-1', '1.5', 'many'])('should reject %s', value => {
    expect(() => parsePositiveInt(value)).toThrow(InvalidArgumentError);
  });
});
