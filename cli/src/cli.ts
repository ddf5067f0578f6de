#!/usr/bin/env node
/**
 * Toolweave CLI
 *
 * Usage:
 *   toolweave validate <files...>   Validate workflow files
 *   toolweave plan <file>           Show the execution plan
 *   toolweave --version             Show version
 */

import { createProgram } from './program.js';
import { consoleOutput, type CliContext } from './types/CliOutput.js';

async function main(): Promise<void> {
  const context: CliContext = { output: consoleOutput, exitCode: 0 };
  await createProgram(context).parseAsync(process.argv);
  process.exitCode = context.exitCode;
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  if (process.env.DEBUG && error instanceof Error) {
    console.error(error.stack);
  }
  process.exit(4);
});
