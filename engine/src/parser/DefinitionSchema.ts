/**
 * Definition Schema
 *
 * Zod schema for workflow documents (YAML or JSON) and the normalisation
 * of raw invocation inputs into bindings.
 *
 * Raw input values:
 * - `{ ref: <invocationId>, field: <output>, default?: <value> }` → reference
 * - `{ literal: <value> }` → literal, for objects that would otherwise read as a reference
 * - anything else → literal
 *
 * @module parser
 */

import { z } from 'zod';
import { MAX_TIMEOUT_MS, TimeoutManager } from '../automation/TimeoutManager.js';
import {
  FIELD_TYPES,
  literal,
  ref,
  type InputBinding,
  type ToolInvocation,
  type ToolSpec,
  type WorkflowDefinition,
} from '../types/core-types.js';

const DURATION = /^\d+$|^\d+(?:\.\d+)?(?:ms|s|m|h)$/;

/**
 * Milliseconds as a positive integer, or a duration string such as "30s"
 */
export const durationSchema = z
  .union([
    z.number().int().positive(),
    z
      .string()
      .regex(DURATION, 'expected a duration such as "500ms", "30s", "5m" or "2h"')
      .transform(value => TimeoutManager.parseTimeout(value)),
  ])
  .refine(ms => Number.isInteger(ms) && ms >= 1 && ms <= MAX_TIMEOUT_MS, {
    message: `must be between 1ms and ${MAX_TIMEOUT_MS}ms (about 24.8 days)`,
  });

export const fieldSpecSchema = z
  .object({
    name: z.string().min(1),
    type: z.enum(FIELD_TYPES),
    optional: z.boolean().optional(),
    description: z.string().optional(),
  })
  .strict();

export const toolSpecSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    inputs: z.array(fieldSpecSchema).default([]),
    outputs: z.array(fieldSpecSchema).default([]),
    timeoutMs: durationSchema.optional(),
    cacheable: z.boolean().optional(),
  })
  .strict();

export const invocationSchema = z
  .object({
    id: z.string().min(1),
    tool: z.string().min(1),
    inputs: z.record(z.unknown()).default({}),
    dependsOn: z.array(z.string().min(1)).optional(),
    timeoutMs: durationSchema.optional(),
    retry: z.object({ maxAttempts: z.number().int().min(1).optional() }).strict().optional(),
    criticality: z.enum(['optional', 'required', 'critical']).optional(),
  })
  .strict();

export const workflowDocumentSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().optional(),
    timeoutMs: durationSchema.optional(),
    maxParallel: z.number().int().min(1).optional(),
    tools: z.array(toolSpecSchema).optional(),
    invocations: z.array(invocationSchema),
  })
  .strict();

export type WorkflowDocument = z.infer<typeof workflowDocumentSchema>;

const refInputSchema = z
  .object({
    ref: z.string().min(1),
    field: z.string().min(1),
    default: z.unknown().optional(),
  })
  .strict();

const literalInputSchema = z
  .object({ literal: z.unknown() })
  .strict()
  .refine(input => 'literal' in input);

/**
 * Turn one raw input value into a binding
 */
export function normalizeInput(value: unknown): InputBinding {
  const reference = refInputSchema.safeParse(value);
  if (reference.success) {
    const { ref: invocationId, field } = reference.data;
    return reference.data.default === undefined
      ? ref(invocationId, field)
      : ref(invocationId, field, { default: reference.data.default });
  }

  const escaped = literalInputSchema.safeParse(value);
  if (escaped.success) {
    return literal(escaped.data.literal);
  }

  return literal(value);
}

export function toWorkflowDefinition(document: WorkflowDocument): WorkflowDefinition {
  const invocations: ToolInvocation[] = document.invocations.map(invocation => ({
    id: invocation.id,
    tool: invocation.tool,
    inputs: Object.fromEntries(
      Object.entries(invocation.inputs).map(([param, value]) => [param, normalizeInput(value)]),
    ),
    dependsOn: invocation.dependsOn,
    timeoutMs: invocation.timeoutMs,
    retry: invocation.retry,
    criticality: invocation.criticality,
  }));

  return {
    name: document.name,
    description: document.description,
    invocations,
    timeoutMs: document.timeoutMs,
    maxParallel: document.maxParallel,
  };
}

export function toToolSpecs(document: WorkflowDocument): ToolSpec[] {
  return (document.tools ?? []).map(tool => ({ ...tool }));
}
