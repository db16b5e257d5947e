/**
 * Rewrite module - identity rewrite workflow
 */

export * from './types.js';
export * from './request.js';
export * from './validator.js';
export * from './inspector.js';
export * from './strategies.js';
export * from './reconciler.js';
export * from './workflow.js';
