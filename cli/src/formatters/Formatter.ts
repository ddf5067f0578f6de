/**
 * Base Formatter Interface
 *
 * Formatters decide WHAT to print for a command result; they are the only
 * place that writes to the CLI output.
 */

import type { ExecutionPlan } from '@toolweave/engine';

export type ValidationReport =
  | { readonly file: string; readonly valid: true; readonly plan: ExecutionPlan }
  | { readonly file: string; readonly valid: false; readonly error: Error };

export interface PlanView {
  readonly file: string;
  readonly plan: ExecutionPlan;
  /** Set when the user asked for a concurrency cap */
  readonly maxParallel?: number;
}

export interface Formatter {
  showValidation(report: ValidationReport): void;

  showPlan(view: PlanView): void;

  /**
   * A failure that stopped the command (unreadable file, invalid plan)
   */
  showError(error: Error, file: string): void;
}
