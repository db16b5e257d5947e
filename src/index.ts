export * from './git/index.js';
export * from './rewrite/index.js';
