/**
 * Decision Translator
 * Turns the app's reply into Claude Code's PermissionRequest output
 */

import type { DecisionReply, SessionStatus } from '../bridge/types.js';
import type { PermissionHookOutput } from './types.js';

export const DEFAULT_DENY_REASON = 'Denied by user via ClaudeIsland';

export type ControlSignal =
  | { kind: 'allow' }
  | { kind: 'deny'; reason: string }
  | { kind: 'defer' };   // let Claude Code show its own prompt

export function translateDecision(status: SessionStatus, reply: DecisionReply | null): ControlSignal {
  if (status !== 'waiting_for_approval' || !reply) {
    return { kind: 'defer' };
  }

  switch (reply.decision) {
    case 'allow':
      return { kind: 'allow' };
    case 'deny':
      return { kind: 'deny', reason: reply.reason || DEFAULT_DENY_REASON };
    case 'ask':
      return { kind: 'defer' };
  }
}

/**
 * JSON for stdout, or null when Claude Code should fall back to its prompt
 */
export function renderControlSignal(signal: ControlSignal): string | null {
  if (signal.kind === 'defer') {
    return null;
  }

  const output: PermissionHookOutput = {
    hookSpecificOutput: {
      hookEventName: 'PermissionRequest',
      decision: signal.kind === 'allow'
        ? { behavior: 'allow' }
        : { behavior: 'deny', message: signal.reason }
    }
  };

  return JSON.stringify(output);
}
