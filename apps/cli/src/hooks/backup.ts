/**
 * PreToolUse/Write|Edit: copy the file about to change into the backup dir
 */

import { chmodSync, copyFileSync, mkdirSync, statSync, utimesSync, type Stats } from 'node:fs';
import { join, resolve } from 'node:path';
import { compactTimestamp, errorMessage } from '@hook-gate/common';
import { silent } from './output.js';
import type { HookHandler } from './types.js';

const BACKUP_TOOLS: readonly string[] = ['Write', 'Edit', 'MultiEdit'];

export interface BackupOutcome {
  ok: boolean;
  message: string;
  backupPath?: string;
}

/**
 * File name for a backup: the absolute path flattened into one segment
 */
export function backupName(filePath: string, date: Date): string {
  const flattened = filePath
    .replace(/\\/g, '/')
    .replace(/^[a-zA-Z]:/, '')
    .replace(/^\/+/, '')
    .replace(/\//g, '_');
  return `${flattened}.${compactTimestamp(date)}.bak`;
}

/**
 * Copy `filePath` into `backupDir`, keeping mode and timestamps.
 * Never throws; every failure is described in the outcome.
 */
export function backupFile(filePath: string, backupDir: string, now: Date): BackupOutcome {
  let stats: Stats;
  try {
    stats = statSync(filePath);
  } catch (error) {
    return { ok: false, message: `Nothing to back up: ${filePath} (${errorMessage(error)})` };
  }

  if (!stats.isFile()) {
    return { ok: false, message: `Not a regular file: ${filePath}` };
  }

  const backupPath = join(backupDir, backupName(filePath, now));
  try {
    mkdirSync(backupDir, { recursive: true });
    copyFileSync(filePath, backupPath);
    chmodSync(backupPath, stats.mode);
    utimesSync(backupPath, stats.atime, stats.mtime);
  } catch (error) {
    return { ok: false, message: `Backup of ${filePath} failed: ${errorMessage(error)}` };
  }

  return { ok: true, message: `Backed up ${filePath} to ${backupPath}`, backupPath };
}

export const backupHook: HookHandler = async (input, { gate, log, now }) => {
  const toolName = input.tool_name ?? 'unknown tool';
  const filePath = input.tool_input?.file_path;

  if (!BACKUP_TOOLS.includes(toolName) || !filePath) {
    log.info(`Skipped ${toolName}`);
    return silent();
  }

  const target = resolve(input.cwd ?? process.cwd(), filePath);
  const outcome = backupFile(target, gate.config.backupDir, now());

  if (outcome.ok) {
    log.info(outcome.message);
  } else {
    log.warn(outcome.message);
  }
  return silent();
};
