/**
 * JSON Formatter
 *
 * One JSON document per command result on stdout, errors included, for
 * CI pipelines and other tools.
 */

import { DEFAULT_NODE_TIMEOUT_MS, ExecutionPlanner, ToolweaveError, type ExecutionPlan } from '@toolweave/engine';
import type { CliOutput } from '../types/CliOutput.js';
import type { Formatter, PlanView, ValidationReport } from './Formatter.js';

function describeError(error: Error): Record<string, unknown> {
  return error instanceof ToolweaveError ? error.toSimpleObject() : { message: error.message };
}

function summarize(plan: ExecutionPlan): Record<string, unknown> {
  return {
    workflow: plan.workflowName,
    invocations: plan.nodes.size,
    layers: plan.layers.map(layer => [...layer]),
  };
}

export class JsonFormatter implements Formatter {
  private readonly output: CliOutput;

  constructor(output: CliOutput) {
    this.output = output;
  }

  showValidation(report: ValidationReport): void {
    const body = report.valid
      ? { file: report.file, valid: true, ...summarize(report.plan) }
      : { file: report.file, valid: false, error: describeError(report.error) };
    this.output.stdout(JSON.stringify(body, null, 2));
  }

  showPlan(view: PlanView): void {
    const { plan } = view;
    const body = {
      file: view.file,
      ...summarize(plan),
      maxParallelism: ExecutionPlanner.maxParallelism(plan),
      estimatedDurationMs: ExecutionPlanner.estimateDuration(plan, DEFAULT_NODE_TIMEOUT_MS),
      nodes: Array.from(plan.nodes.values(), node => ({
        id: node.id,
        tool: node.spec.name,
        layer: node.layer,
        dependsOn: [...node.predecessors],
      })),
      batches: view.maxParallel === undefined ? undefined : ExecutionPlanner.toBatches(plan, view.maxParallel),
    };
    this.output.stdout(JSON.stringify(body, null, 2));
  }

  showError(error: Error, file: string): void {
    this.output.stdout(JSON.stringify({ file, valid: false, error: describeError(error) }, null, 2));
  }
}
