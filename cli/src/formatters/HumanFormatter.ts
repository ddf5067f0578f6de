/**
 * Human-Readable Formatter
 *
 * Symbols:
 * - ✔ Valid
 * - ✖ Invalid
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { DEFAULT_NODE_TIMEOUT_MS, ExecutionPlanner, ToolweaveError } from '@toolweave/engine';
import type { CliOutput } from '../types/CliOutput.js';
import type { Formatter, PlanView, ValidationReport } from './Formatter.js';

export class HumanFormatter implements Formatter {
  private readonly output: CliOutput;
  private readonly chalk: ChalkInstance;

  constructor(output: CliOutput, options: { color: boolean }) {
    this.output = output;
    this.chalk = new Chalk(options.color ? {} : { level: 0 });
  }

  showValidation(report: ValidationReport): void {
    if (!report.valid) {
      this.showError(report.error, report.file);
      return;
    }

    const { plan } = report;
    this.output.stdout(
      [
        `${this.chalk.green('✔')} ${report.file} is valid`,
        `  Workflow: ${this.chalk.bold(plan.workflowName)}`,
        `  Invocations: ${plan.nodes.size}`,
        `  Layers: ${plan.layers.length}`,
      ].join('\n'),
    );
  }

  showPlan(view: PlanView): void {
    const lines = [ExecutionPlanner.visualize(view.plan, DEFAULT_NODE_TIMEOUT_MS)];

    if (view.maxParallel !== undefined) {
      lines.push('', this.chalk.bold(`Batches (max ${view.maxParallel} parallel):`));
      ExecutionPlanner.toBatches(view.plan, view.maxParallel).forEach((batch, index) => {
        lines.push(`  ${index + 1}. [${batch.join(', ')}]`);
      });
    }

    this.output.stdout(lines.join('\n'));
  }

  showError(error: Error, file: string): void {
    const lines = [`${this.chalk.red('✖')} ${file} is invalid`];

    if (error instanceof ToolweaveError) {
      lines.push(`  ${this.chalk.dim(`[${error.code}]`)} ${error.message}`);
      if (error.path) {
        lines.push(`  at ${error.path}`);
      }
      if (error.hint) {
        lines.push(`  ${this.chalk.yellow('hint:')} ${error.hint}`);
      }
    } else {
      lines.push(`  ${error.message}`);
    }

    this.output.stderr(lines.join('\n'));
  }
}
