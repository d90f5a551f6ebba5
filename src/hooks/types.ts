/**
 * Claude Code Hook Types
 * Stdin payload and stdout directive shapes
 */

import { z } from 'zod';

/**
 * Hook events the classifier knows about
 */
export type HookEventType =
  | 'UserPromptSubmit'
  | 'PreToolUse'
  | 'PostToolUse'
  | 'PermissionRequest'
  | 'Notification'
  | 'Stop'
  | 'SubagentStop'
  | 'SessionStart'
  | 'SessionEnd'
  | 'PreCompact';

export const HOOK_EVENT_TYPES: readonly HookEventType[] = [
  'UserPromptSubmit',
  'PreToolUse',
  'PostToolUse',
  'PermissionRequest',
  'Notification',
  'Stop',
  'SubagentStop',
  'SessionStart',
  'SessionEnd',
  'PreCompact'
];

// A field of the wrong type is treated as missing rather than failing the event
const optionalString = z.string().optional().catch(undefined);

/**
 * Stdin payload. Claude Code sends more keys than these; extras are ignored.
 */
export const hookInputSchema = z.object({
  session_id: optionalString,
  hook_event_name: optionalString,
  cwd: optionalString,
  tool_name: optionalString,
  tool_input: z.unknown(),
  tool_use_id: optionalString,
  notification_type: optionalString,
  message: optionalString
});

export type HookInput = z.infer<typeof hookInputSchema>;

/**
 * Stdout directive for PermissionRequest
 */
export interface PermissionHookOutput {
  hookSpecificOutput: {
    hookEventName: 'PermissionRequest';
    decision:
      | { behavior: 'allow' }
      | { behavior: 'deny'; message: string };
  };
}
