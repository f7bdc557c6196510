/**
 * Shared utility functions
 */

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, maxLength: number, suffix = '...'): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * Format a timestamp as ISO string
 */
export function formatTimestamp(date?: Date | number | string): string {
  if (!date) return new Date().toISOString();
  if (typeof date === 'string') return date;
  if (typeof date === 'number') return new Date(date).toISOString();
  return date.toISOString();
}

/**
 * Filesystem-safe form of a timestamp (no colons or dots)
 */
export function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[:.]/g, '-');
}

/**
 * Split a comma-separated list, dropping blanks
 */
export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Recursively freeze an object graph
 */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
  }
  return value;
}

/**
 * Collapse line breaks so a value fits on one log line
 */
export function singleLine(str: string): string {
  return str.replace(/\r?\n/g, '\\n');
}
