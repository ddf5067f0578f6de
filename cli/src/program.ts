/**
 * Builds the `toolweave` command-line program.
 */

import { Command } from 'commander';
import { registerPlanCommand } from './commands/plan.js';
import { registerValidateCommand } from './commands/validate.js';
import type { CliContext } from './types/CliOutput.js';

export const VERSION = '0.1.0';

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name('toolweave')
    .description('Plan and validate dependency-aware tool workflows')
    .version(VERSION, '-v, --version', 'Show version number')
    .helpOption('-h, --help', 'Show help');

  registerValidateCommand(program, context);
  registerPlanCommand(program, context);

  return program;
}
