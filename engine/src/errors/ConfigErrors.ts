/**
 * Configuration and Definition Errors
 *
 * @module errors
 */

import { ToolweaveError } from './ToolweaveError.js';
import { ToolweaveErrorCode, ErrorSeverity } from './ErrorCodes.js';

/**
 * One validation problem, located by a dotted path
 */
export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

function describeIssues(issues: readonly ValidationIssue[]): string {
  return issues.map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
}

/**
 * Invalid engine, run or failure-policy configuration
 */
export class ConfigError extends ToolweaveError {
  readonly issues: readonly ValidationIssue[];

  constructor(subject: string, issues: readonly ValidationIssue[]) {
    super({
      code: ToolweaveErrorCode.CONFIG_INVALID,
      message: `Invalid ${subject}: ${describeIssues(issues)}`,
      path: issues[0]?.path,
      severity: ErrorSeverity.ERROR,
      context: { subject, issues: issues.map(issue => ({ ...issue })) },
    });
    this.issues = issues;
  }
}

/**
 * A workflow document that could not be parsed or does not have the expected shape
 */
export class DefinitionSchemaError extends ToolweaveError {
  readonly issues: readonly ValidationIssue[];

  constructor(
    code: ToolweaveErrorCode.CONFIG_DEFINITION_INVALID | ToolweaveErrorCode.CONFIG_PARSE_ERROR,
    message: string,
    issues: readonly ValidationIssue[],
    source?: string,
  ) {
    super({
      code,
      message,
      path: issues[0]?.path,
      severity: ErrorSeverity.ERROR,
      context: { source, issues: issues.map(issue => ({ ...issue })) },
    });
    this.issues = issues;
  }

  static invalid(issues: readonly ValidationIssue[], source?: string): DefinitionSchemaError {
    const where = source ? ` in ${source}` : '';
    return new DefinitionSchemaError(
      ToolweaveErrorCode.CONFIG_DEFINITION_INVALID,
      `Invalid workflow definition${where}: ${describeIssues(issues)}`,
      issues,
      source,
    );
  }

  static parseError(reason: string, source?: string): DefinitionSchemaError {
    const where = source ? ` ${source}` : '';
    return new DefinitionSchemaError(
      ToolweaveErrorCode.CONFIG_PARSE_ERROR,
      `Failed to parse workflow definition${where}: ${reason}`,
      [],
      source,
    );
  }
}
