/**
 * Git module - parsing and execution layer
 */

export * from './types.js';
export * from './executor.js';
export * from './parser.js';
export * from './repository.js';
