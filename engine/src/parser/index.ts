/**
 * Workflow document schema and input normalisation
 *
 * @module parser
 */

export * from './DefinitionSchema.js';
