/**
 * Workflow Loader Module
 *
 * @module loader
 */

export * from './WorkflowLoader.js';
