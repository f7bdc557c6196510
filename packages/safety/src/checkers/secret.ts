/**
 * Secret scanner for staged changes
 *
 * Findings are advisory: the commit check asks for confirmation instead of
 * blocking.
 */

import { evaluate } from '../matcher.js';
import type { CheckerDefinition, Rule, RuleTable } from '../types.js';

export const SECRET_RULES: readonly Rule[] = [
  { pattern: 'AKIA[0-9A-Z]{16}', label: 'AWS access key id' },
  { pattern: '-----BEGIN (?:RSA |EC |DSA |OPENSSH |PGP )?PRIVATE KEY', label: 'private key block' },
  { pattern: String.raw`\bgh[pousr]_[a-z0-9]{36}\b`, label: 'GitHub token' },
  { pattern: String.raw`\bxox[abposr]-[a-z0-9-]{10,}`, label: 'Slack token' },
  { pattern: String.raw`api[_-]?key['"]?\s*[:=]\s*['"]?[a-z0-9_\-]{16,}`, label: 'API key' },
  { pattern: String.raw`(?:password|passwd|secret|token)['"]?\s*[:=]\s*['"][^'"\s]{8,}['"]`, label: 'hard-coded password or secret' },
];

export interface SecretFinding {
  file: string;
  /** Line in the new version of the file; absent when the diff has no hunk headers */
  line?: number;
  rule: string;
}

export function secretChecker(extraRules: readonly Rule[] = []): CheckerDefinition {
  return {
    id: 'secret',
    name: 'Secret Scanner',
    description: 'Flags credentials in staged changes',
    policy: 'warn-on-match',
    rules: [...SECRET_RULES, ...extraRules],
    formatReason: rule => `Possible ${rule.label} detected`,
  };
}

interface Hunk {
  oldLeft: number;
  newLeft: number;
  nextLine: number;
}

function parseHunkHeader(line: string): Hunk | undefined {
  const match = /^@@ -\d+(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/.exec(line);
  if (!match?.[2]) return undefined;
  return {
    oldLeft: match[1] === undefined ? 1 : Number(match[1]),
    newLeft: match[3] === undefined ? 1 : Number(match[3]),
    nextLine: Number(match[2]),
  };
}

/**
 * Evaluate every added line of a unified diff against the secret table.
 * Findings come back in diff order.
 *
 * `+++ ` names the file only directly after a `--- ` line outside a hunk;
 * inside a hunk it is an added line like any other.
 */
export function scanDiff(diff: string, rules: RuleTable): SecretFinding[] {
  const findings: SecretFinding[] = [];
  let file = '(unknown)';
  let hunk: Hunk | undefined;
  let afterOldHeader = false;

  const scan = (content: string, line: number | undefined): void => {
    const match = evaluate(content, rules);
    if (match) {
      findings.push({ file, ...(line !== undefined && { line }), rule: match.label });
    }
  };

  for (const line of diff.split(/\r?\n/)) {
    if (hunk && !/^[ +\-\\]/.test(line)) {
      hunk = undefined;
    }

    if (hunk) {
      if (line.startsWith('+')) {
        scan(line.slice(1), hunk.nextLine);
        hunk.nextLine++;
        hunk.newLeft--;
      } else if (line.startsWith('-')) {
        hunk.oldLeft--;
      } else if (line.startsWith(' ')) {
        hunk.nextLine++;
        hunk.newLeft--;
        hunk.oldLeft--;
      }
      if (hunk.oldLeft <= 0 && hunk.newLeft <= 0) {
        hunk = undefined;
      }
      continue;
    }

    const wasAfterOldHeader = afterOldHeader;
    afterOldHeader = line.startsWith('--- ');

    if (wasAfterOldHeader && line.startsWith('+++ ')) {
      const target = line.slice(4).trim();
      file = target.startsWith('b/') ? target.slice(2) : target;
      continue;
    }

    if (line.startsWith('@@')) {
      hunk = parseHunkHeader(line);
      continue;
    }

    if (line.startsWith('+')) {
      scan(line.slice(1), undefined);
    }
  }

  return findings;
}

/**
 * `path:line (rule)` for reports
 */
export function formatFinding(finding: SecretFinding): string {
  const location = finding.line !== undefined
    ? `${finding.file}:${finding.line}`
    : finding.file;
  return `${location} (${finding.rule})`;
}
