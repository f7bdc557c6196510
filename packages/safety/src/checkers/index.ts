/**
 * Export all checkers
 */

export * from './checker.js';
export * from './dangerous-command.js';
export * from './protected-path.js';
export * from './secret.js';
export * from './branch.js';
export * from './lint.js';
