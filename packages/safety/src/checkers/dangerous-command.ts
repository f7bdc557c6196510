/**
 * Dangerous Command Blocker
 *
 * Blocks shell commands that could cause system damage or data loss.
 */

import type { CheckerDefinition, Rule } from '../types.js';

// rm with both a recursive (-r, -R, --recursive) and a force (-f, --force)
// flag among the options before the target, split or clustered
const RM_RF = String.raw`\brm\s+` +
  String.raw`(?=(?:-\S+\s+)*?(?:-[a-z]*r[a-z]*|--recursive)\s)` +
  String.raw`(?=(?:-\S+\s+)*?(?:-[a-z]*f[a-z]*|--force)\s)` +
  String.raw`(?:-\S+\s+)+`;

/** Target, optionally quoted, ending the argument list or the command */
function rmTarget(target: string): string {
  return RM_RF + String.raw`(["']?)` + target + String.raw`\1(?=$|[\s;&|)])`;
}

export const DANGEROUS_COMMAND_RULES: readonly Rule[] = [
  { pattern: rmTarget(String.raw`\/\*?`), label: 'rm -rf / (root deletion)' },
  { pattern: rmTarget(String.raw`(?:~|\$HOME|\$\{HOME\})(?:\/\*?)?`), label: 'rm -rf ~ (home directory deletion)' },
  { pattern: rmTarget(String.raw`\*`), label: 'rm -rf * (wildcard deletion)' },
  { pattern: String.raw`\bmkfs(?:\.[a-z0-9]+)?\s`, label: 'mkfs (filesystem format)' },
  { pattern: String.raw`\bdd\s+.*\bof=\/dev\/(?:sd|hd|nvme|disk|mmcblk)`, label: 'dd onto a disk device' },
  { pattern: String.raw`>\s*\/dev\/(?:sd|hd|nvme|disk|mmcblk)`, label: 'redirect onto a disk device' },
  { pattern: String.raw`:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:`, label: 'fork bomb' },
  { pattern: String.raw`\bchmod\s+(?:-[a-z]+\s+)*777\s+\/(?:\s|$)`, label: 'chmod 777 / (world-writable root)' },
  { pattern: String.raw`\b(?:curl|wget)\b[^|]*\|\s*(?:sudo\s+)?(?:ba|z|k|da)?sh\b`, label: 'remote script piped to a shell' },
  { pattern: String.raw`\bgit\s+push\b.*\s(?:--force|-f)(?:\s|$)`, label: 'git push --force (use --force-with-lease)' },
  { pattern: String.raw`\bgit\s+reset\s+--hard\b`, label: 'git reset --hard' },
  { pattern: String.raw`(?:^|[;&|]\s*)(?:sudo\s+)?(?:shutdown|reboot|halt|poweroff)\b`, label: 'system shutdown or reboot' },
];

export function dangerousCommandChecker(extraRules: readonly Rule[] = []): CheckerDefinition {
  return {
    id: 'dangerous-command',
    name: 'Dangerous Command Blocker',
    description: 'Blocks known destructive shell commands',
    policy: 'deny-on-match',
    rules: [...DANGEROUS_COMMAND_RULES, ...extraRules],
    formatReason: rule => `Blocked dangerous command: ${rule.label}`,
  };
}
