/**
 * @hook-gate/safety - Rule-based gate for assistant tool calls
 *
 * Provides:
 * - Rule tables with first-match-wins evaluation
 * - Deny and warn policies mapped to allow/deny/ask decisions
 * - A bounded parallel runner for commit checks
 * - Dangerous command, protected path, secret, branch and lint checkers
 */

export * from './types.js';
export * from './rules.js';
export * from './matcher.js';
export * from './decision.js';
export * from './dispatcher.js';
export * from './checkers/index.js';
export * from './git.js';
export * from './redact.js';
export * from './config.js';
export * from './gate.js';
export * from './commit-check.js';
