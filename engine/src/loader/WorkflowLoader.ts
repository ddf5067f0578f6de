/**
 * Workflow Loader
 *
 * Converts files, YAML/JSON text or plain objects into validated
 * WorkflowDefinitions. I/O-aware but execution-agnostic: nothing here
 * touches a registry or runs a tool.
 *
 * PIPELINE:
 * 1. Loading: read the file and parse YAML/JSON to a plain object (syntax only)
 * 2. Validation: check the object against the document schema
 * 3. Normalisation: raw inputs become literal or reference bindings
 *
 * @example
 * ```ts
 * const { definition, tools } = await WorkflowLoader.fromFile('./report.yaml');
 * await engine.run(definition);
 * ```
 *
 * @module loader
 */

import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import YAML from 'yaml';
import { DefinitionSchemaError } from '../errors/ConfigErrors.js';
import {
  toToolSpecs,
  toWorkflowDefinition,
  workflowDocumentSchema,
} from '../parser/DefinitionSchema.js';
import type { ToolSpec, WorkflowDefinition } from '../types/core-types.js';

export interface LoadedWorkflow {
  readonly definition: WorkflowDefinition;
  /** Tool declarations from the document's `tools:` section */
  readonly tools: readonly ToolSpec[];
  /** File path, or a description of where the text came from */
  readonly source: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class WorkflowLoader {
  /**
   * Load a workflow file. `.yaml`/`.yml` and `.json` are parsed as such;
   * other extensions are tried as YAML, which also accepts JSON.
   *
   * @throws {DefinitionSchemaError} If the file cannot be read, parsed or validated
   */
  static async fromFile(filePath: string): Promise<LoadedWorkflow> {
    const resolvedPath = resolve(filePath);

    let content: string;
    try {
      content = await readFile(resolvedPath, 'utf-8');
    } catch (error) {
      throw DefinitionSchemaError.parseError(`cannot read file (${describe(error)})`, filePath);
    }

    return extname(resolvedPath).toLowerCase() === '.json'
      ? this.fromJSON(content, filePath)
      : this.fromYAML(content, filePath);
  }

  /**
   * @throws {DefinitionSchemaError}
   */
  static fromYAML(content: string, source = 'YAML content'): LoadedWorkflow {
    let document: unknown;
    try {
      document = YAML.parse(content);
    } catch (error) {
      throw DefinitionSchemaError.parseError(describe(error), source);
    }
    return this.fromObject(document, source);
  }

  /**
   * @throws {DefinitionSchemaError}
   */
  static fromJSON(content: string, source = 'JSON content'): LoadedWorkflow {
    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      throw DefinitionSchemaError.parseError(describe(error), source);
    }
    return this.fromObject(document, source);
  }

  /**
   * Validate an already-parsed document, e.g. an API request body
   *
   * @throws {DefinitionSchemaError}
   */
  static fromObject(document: unknown, source = 'workflow object'): LoadedWorkflow {
    const parsed = workflowDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw DefinitionSchemaError.invalid(
        parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
        source,
      );
    }

    return {
      definition: toWorkflowDefinition(parsed.data),
      tools: toToolSpecs(parsed.data),
      source,
    };
  }
}
