/**
 * Protected Path Guard
 *
 * Blocks writes and edits to environment files, repository internals,
 * production configuration and key material.
 */

import type { CheckerDefinition, Rule } from '../types.js';

export const PROTECTED_PATH_RULES: readonly Rule[] = [
  { pattern: String.raw`(?:^|\/)\.env(?:\.(?!example$|sample$)[^\/]+)?$`, label: '.env file' },
  { pattern: String.raw`(?:^|\/)\.git\/`, label: '.git/' },
  { pattern: String.raw`(?:^|\/)production\/`, label: 'production/' },
  { pattern: String.raw`(?:^|\/)secrets\/`, label: 'secrets/' },
  { pattern: String.raw`\.(?:pem|key)$`, label: 'private key file' },
  { pattern: String.raw`(?:^|\/)node_modules\/`, label: 'node_modules/' },
];

/** Tools that write to the path in `file_path` / `notebook_path` */
export const WRITE_TOOLS: readonly string[] = ['Write', 'Edit', 'MultiEdit', 'NotebookEdit'];

/**
 * Forward slashes only, so one table serves every platform
 */
export function normalizePath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

export function protectedPathChecker(extraRules: readonly Rule[] = []): CheckerDefinition {
  return {
    id: 'protected-path',
    name: 'Protected Path Guard',
    description: 'Blocks modification of protected files and directories',
    policy: 'deny-on-match',
    rules: [...PROTECTED_PATH_RULES, ...extraRules],
    formatReason: (rule, subject) => `Protected path ${rule.label}: ${subject} cannot be modified`,
  };
}
