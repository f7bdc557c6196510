/**
 * Append-only per-hook log files
 *
 * One file per hook, one line per entry, no rotation. Every entry is a
 * single append call, so concurrent hook processes interleave whole lines.
 */

import fs from 'node:fs';
import path from 'node:path';
import { errorMessage } from './errors.js';
import { formatTimestamp, singleLine } from './utils.js';

export type LogLevel = 'INFO' | 'ALLOW' | 'DENY' | 'ASK' | 'WARN' | 'ERROR';

export class HookLog {
  readonly filePath: string;

  constructor(
    logDir: string,
    readonly hookName: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.filePath = path.join(logDir, `${hookName}.log`);
  }

  /**
   * Format a single log line (newline included)
   */
  static formatLine(date: Date, level: LogLevel, hookName: string, message: string): string {
    return `[${formatTimestamp(date)}] ${level} ${hookName}: ${singleLine(message)}\n`;
  }

  /**
   * Append an entry. Returns false when the log could not be written.
   */
  append(level: LogLevel, message: string): boolean {
    const line = HookLog.formatLine(this.now(), level, this.hookName, message);
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.appendFileSync(this.filePath, line, 'utf-8');
      return true;
    } catch (error) {
      console.error(`[hook-gate] Failed to write ${this.filePath}: ${errorMessage(error)}`);
      return false;
    }
  }

  info(message: string): boolean {
    return this.append('INFO', message);
  }

  warn(message: string): boolean {
    return this.append('WARN', message);
  }

  error(message: string): boolean {
    return this.append('ERROR', message);
  }
}
