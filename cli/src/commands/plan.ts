/**
 * Plan Command
 *
 * Prints the execution plan of a workflow: layers, dependencies and, with
 * `--max-parallel`, how each layer splits into batches.
 *
 * Usage:
 *   toolweave plan report.yaml
 *   toolweave plan report.yaml --max-parallel 2 --format json
 */

import { Option, type Command } from 'commander';
import { createFormatter, OUTPUT_FORMATS } from '../formatters/createFormatter.js';
import type { CliPlanOptions } from '../types/CliOptions.js';
import type { CliContext } from '../types/CliOutput.js';
import { loadPlan, parsePositiveInt, toError } from '../utils/workflow.js';

export function registerPlanCommand(program: Command, context: CliContext): void {
  program
    .command('plan')
    .description('Show the execution plan of a workflow')
    .argument('<file>', 'Workflow file (YAML or JSON)')
    .option('-p, --max-parallel <n>', 'Cap on concurrently running invocations', parsePositiveInt)
    .addOption(new Option('-f, --format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text'))
    .option('--no-color', 'Disable colored output')
    .action(async (file: string, options: CliPlanOptions) => {
      const formatter = createFormatter(options.format, context.output, { color: options.color });

      try {
        const { plan } = await loadPlan(file, { maxParallel: options.maxParallel });
        formatter.showPlan({ file, plan, maxParallel: options.maxParallel });
      } catch (error) {
        formatter.showError(toError(error), file);
        context.exitCode = 1;
      }
    });
}
