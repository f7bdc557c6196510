/**
 * Hook envelope types shared across all packages
 */

// ============================================================================
// Input
// ============================================================================

/**
 * Events the assistant fires hooks for. Unknown event names are passed
 * through as plain strings.
 */
export type HookEventName =
  | 'PreToolUse'
  | 'PostToolUse'
  | 'Notification'
  | 'UserPromptSubmit'
  | 'Stop'
  | 'SubagentStop'
  | 'PreCompact'
  | 'SessionStart'
  | 'SessionEnd';

export interface ToolInput {
  command?: string;
  file_path?: string;
  notebook_path?: string;
  content?: string;
  [key: string]: unknown;
}

export interface HookInput {
  hook_event_name: HookEventName | (string & {});
  session_id?: string;
  transcript_path?: string;
  cwd?: string;
  tool_name?: string;
  tool_input?: ToolInput;
  message?: string;
  title?: string;
}

// ============================================================================
// Output
// ============================================================================

export type PermissionDecision = 'allow' | 'deny' | 'ask';

export interface HookOutput {
  hookSpecificOutput: {
    hookEventName: string;
    permissionDecision: PermissionDecision;
    permissionDecisionReason: string;
  };
}

/**
 * What a hook hands back to the CLI: at most one decision object for
 * stdout, plus report lines for stderr.
 */
export interface HookResult {
  output?: HookOutput;
  messages: string[];
}
