/**
 * Formatter Factory
 *
 * The single point where formatters are instantiated.
 */

import type { CliOutput } from '../types/CliOutput.js';
import type { OutputFormat } from '../types/CliOptions.js';
import type { Formatter } from './Formatter.js';
import { HumanFormatter } from './HumanFormatter.js';
import { JsonFormatter } from './JsonFormatter.js';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

export function createFormatter(format: OutputFormat, output: CliOutput, options: { color: boolean }): Formatter {
  switch (format) {
    case 'json':
      return new JsonFormatter(output);
    case 'text':
      return new HumanFormatter(output, options);
  }
}
