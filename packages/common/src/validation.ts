/**
 * Zod schemas for hook input
 */

import { z } from 'zod';
import type { HookInput } from './types.js';

// ============================================================================
// Hook Envelope Schemas
// ============================================================================

export const toolInputSchema = z.object({
  command: z.string().optional(),
  file_path: z.string().optional(),
  notebook_path: z.string().optional(),
  content: z.string().optional(),
}).passthrough();

export const hookInputSchema = z.object({
  hook_event_name: z.string().min(1).default('PreToolUse'),
  session_id: z.string().optional(),
  transcript_path: z.string().optional(),
  cwd: z.string().optional(),
  tool_name: z.string().optional(),
  tool_input: toolInputSchema.optional(),
  message: z.string().optional(),
  title: z.string().optional(),
}).passthrough();

// ============================================================================
// Utility Functions
// ============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', '),
  };
}

/**
 * Parse the raw stdin payload. Returns undefined for anything that is not
 * a JSON object matching the envelope; callers treat that as "allow".
 */
export function parseHookInput(raw: string): HookInput | undefined {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return undefined;
  }

  const result = validate(hookInputSchema, data);
  return result.success ? result.data : undefined;
}
