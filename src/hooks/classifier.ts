/**
 * Event Classifier
 * Maps a hook event onto the session status the app displays
 */

import type { AmbientContext } from '../context/index.js';
import type { SessionStatusRecord, StatusRecordBase } from '../bridge/types.js';
import type { HookEventType, HookInput } from './types.js';
import { HOOK_EVENT_TYPES } from './types.js';

function isKnownEvent(name: string): name is HookEventType {
  return HOOK_EVENT_TYPES.some(type => type === name);
}

function baseRecord(input: HookInput, context: AmbientContext): StatusRecordBase {
  const base: StatusRecordBase = {
    session_id: input.session_id ?? 'unknown',
    cwd: input.cwd ?? '',
    event: input.hook_event_name ?? '',
    pid: context.pid
  };
  if (context.tty) base.tty = context.tty;
  if (context.remoteHost) base.remote_host = context.remoteHost;
  if (context.tmuxTarget) base.tmux_target = context.tmuxTarget;
  return base;
}

function toolFields(input: HookInput): { tool?: string; tool_input: unknown } {
  const fields: { tool?: string; tool_input: unknown } = { tool_input: input.tool_input ?? {} };
  if (input.tool_name !== undefined) fields.tool = input.tool_name;
  return fields;
}

function toolUseId(input: HookInput): { tool_use_id?: string } {
  return input.tool_use_id ? { tool_use_id: input.tool_use_id } : {};
}

function notificationFields(input: HookInput): { notification_type?: string; message?: string } {
  const fields: { notification_type?: string; message?: string } = {};
  if (input.notification_type !== undefined) fields.notification_type = input.notification_type;
  if (input.message !== undefined) fields.message = input.message;
  return fields;
}

/**
 * Build the record for one event. Returns null when the event is suppressed:
 * permission_prompt notifications duplicate the PermissionRequest hook.
 */
export function classifyEvent(input: HookInput, context: AmbientContext): SessionStatusRecord | null {
  const base = baseRecord(input, context);
  const event = base.event;

  if (!isKnownEvent(event)) {
    return { ...base, status: 'unknown' };
  }

  switch (event) {
    case 'UserPromptSubmit':
      return { ...base, status: 'processing' };

    case 'PreToolUse':
      return { ...base, status: 'running_tool', ...toolFields(input), ...toolUseId(input) };

    case 'PostToolUse':
      return { ...base, status: 'processing', ...toolFields(input), ...toolUseId(input) };

    case 'PermissionRequest':
      // tool_use_id is matched app-side from the preceding PreToolUse
      return { ...base, status: 'waiting_for_approval', ...toolFields(input) };

    case 'Notification':
      if (input.notification_type === 'permission_prompt') {
        return null;
      }
      if (input.notification_type === 'idle_prompt') {
        return { ...base, status: 'waiting_for_input', ...notificationFields(input) };
      }
      return { ...base, status: 'notification', ...notificationFields(input) };

    case 'Stop':
    case 'SubagentStop':
    case 'SessionStart':
      return { ...base, status: 'waiting_for_input' };

    case 'SessionEnd':
      return { ...base, status: 'ended' };

    case 'PreCompact':
      return { ...base, status: 'compacting' };
  }
}
