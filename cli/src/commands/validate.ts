/**
 * Validate Command
 *
 * Loads one or more workflow files and builds their plans without executing
 * anything: document schema, tool references, bindings and cycles.
 *
 * Usage:
 *   toolweave validate report.yaml
 *   toolweave validate a.yaml b.yaml --format json
 *
 * Exit codes:
 *   0 - All workflows valid
 *   1 - One or more workflows invalid
 */

import { Option, type Command } from 'commander';
import { createFormatter, OUTPUT_FORMATS } from '../formatters/createFormatter.js';
import type { ValidationReport } from '../formatters/Formatter.js';
import type { CliValidateOptions } from '../types/CliOptions.js';
import type { CliContext } from '../types/CliOutput.js';
import { loadPlan, toError } from '../utils/workflow.js';

export async function validateFile(file: string): Promise<ValidationReport> {
  try {
    const { plan } = await loadPlan(file);
    return { file, valid: true, plan };
  } catch (error) {
    return { file, valid: false, error: toError(error) };
  }
}

export function registerValidateCommand(program: Command, context: CliContext): void {
  program
    .command('validate')
    .description('Validate workflow files without executing them')
    .argument('<files...>', 'Workflow files (YAML or JSON)')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text'))
    .option('--no-color', 'Disable colored output')
    .action(async (files: string[], options: CliValidateOptions) => {
      const formatter = createFormatter(options.format, context.output, { color: options.color });

      for (const file of files) {
        const report = await validateFile(file);
        formatter.showValidation(report);
        if (!report.valid) {
          context.exitCode = 1;
        }
      }
    });
}
