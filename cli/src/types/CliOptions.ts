/**
 * Command-line options of the `toolweave` commands
 */

export type OutputFormat = 'text' | 'json';

export interface CliValidateOptions {
  format: OutputFormat;
  /** False when `--no-color` is given */
  color: boolean;
}

export interface CliPlanOptions {
  format: OutputFormat;
  color: boolean;
  /** Overrides the workflow's maxParallel */
  maxParallel?: number;
}
