/**
 * @hook-gate/common - Shared types, utilities, and validation
 */

export * from './types.js';
export * from './validation.js';
export * from './utils.js';
export * from './errors.js';
export * from './log.js';
export * from './process.js';
