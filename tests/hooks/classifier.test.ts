/**
 * Event Classifier Tests
 */

import { describe, it, expect } from 'vitest';
import { classifyEvent } from '../../src/hooks/classifier.js';
import type { AmbientContext } from '../../src/context/index.js';

const context: AmbientContext = { pid: 4242 };

const base = {
  session_id: 'session-1',
  cwd: '/work/project',
  pid: 4242
};

describe('classifyEvent', () => {
  it('should map UserPromptSubmit to processing', () => {
    const record = classifyEvent(
      { session_id: 'session-1', cwd: '/work/project', hook_event_name: 'UserPromptSubmit' },
      context
    );

    expect(record).toEqual({ ...base, event: 'UserPromptSubmit', status: 'processing' });
  });

  it('should map PreToolUse to running_tool with tool fields', () => {
    const record = classifyEvent({
      session_id: 'session-1',
      cwd: '/work/project',
      hook_event_name: 'PreToolUse',
      tool_name: 'Bash',
      tool_input: { command: 'npm test' },
      tool_use_id: 'toolu_01'
    }, context);

    expect(record).toEqual({
      ...base,
      event: 'PreToolUse',
      status: 'running_tool',
      tool: 'Bash',
      tool_input: { command: 'npm test' },
      tool_use_id: 'toolu_01'
    });
  });

  it('should omit tool_use_id when the event has none', () => {
    const record = classifyEvent({
      session_id: 'session-1',
      cwd: '/work/project',
      hook_event_name: 'PreToolUse',
      tool_name: 'Read',
      tool_input: { file_path: '/work/project/a.ts' }
    }, context);

    expect(record).toEqual({
      ...base,
      event: 'PreToolUse',
      status: 'running_tool',
      tool: 'Read',
      tool_input: { file_path: '/work/project/a.ts' }
    });
  });

  it('should map PostToolUse to processing with tool fields', () => {
    const record = classifyEvent({
      session_id: 'session-1',
      cwd: '/work/project',
      hook_event_name: 'PostToolUse',
      tool_name: 'Edit',
      tool_input: { file_path: 'a.ts' },
      tool_use_id: 'toolu_02'
    }, context);

    expect(record).toEqual({
      ...base,
      event: 'PostToolUse',
      status: 'processing',
      tool: 'Edit',
      tool_input: { file_path: 'a.ts' },
      tool_use_id: 'toolu_02'
    });
  });

  it('should map PermissionRequest to waiting_for_approval without tool_use_id', () => {
    const record = classifyEvent({
      session_id: 'session-1',
      cwd: '/work/project',
      hook_event_name: 'PermissionRequest',
      tool_name: 'Bash',
      tool_input: { command: 'rm -rf build' },
      tool_use_id: 'toolu_03'
    }, context);

    expect(record).toEqual({
      ...base,
      event: 'PermissionRequest',
      status: 'waiting_for_approval',
      tool: 'Bash',
      tool_input: { command: 'rm -rf build' }
    });
  });

  it('should default tool_input to an empty object', () => {
    const record = classifyEvent({ hook_event_name: 'PermissionRequest', tool_name: 'Bash' }, context);

    expect(record).toEqual({
      session_id: 'unknown',
      cwd: '',
      event: 'PermissionRequest',
      pid: 4242,
      status: 'waiting_for_approval',
      tool: 'Bash',
      tool_input: {}
    });
  });

  it('should suppress permission_prompt notifications', () => {
    const record = classifyEvent({
      hook_event_name: 'Notification',
      notification_type: 'permission_prompt',
      message: 'Claude needs your permission to use Bash'
    }, context);

    expect(record).toBeNull();
  });

  it('should map idle_prompt notifications to waiting_for_input', () => {
    const record = classifyEvent({
      session_id: 'session-1',
      cwd: '/work/project',
      hook_event_name: 'Notification',
      notification_type: 'idle_prompt',
      message: 'Claude is waiting for your input'
    }, context);

    expect(record).toEqual({
      ...base,
      event: 'Notification',
      status: 'waiting_for_input',
      notification_type: 'idle_prompt',
      message: 'Claude is waiting for your input'
    });
  });

  it('should map other notifications to notification', () => {
    const record = classifyEvent({
      session_id: 'session-1',
      cwd: '/work/project',
      hook_event_name: 'Notification',
      notification_type: 'auth_success',
      message: 'Signed in'
    }, context);

    expect(record).toEqual({
      ...base,
      event: 'Notification',
      status: 'notification',
      notification_type: 'auth_success',
      message: 'Signed in'
    });
  });

  it.each([
    ['Stop', 'waiting_for_input'],
    ['SubagentStop', 'waiting_for_input'],
    ['SessionStart', 'waiting_for_input'],
    ['SessionEnd', 'ended'],
    ['PreCompact', 'compacting'],
    ['SomethingNew', 'unknown']
  ])('should map %s to %s with no extra fields', (event, status) => {
    const record = classifyEvent({
      session_id: 'session-1',
      cwd: '/work/project',
      hook_event_name: event,
      tool_name: 'Bash',
      message: 'ignored'
    }, context);

    expect(record).toEqual({ ...base, event, status });
  });

  it('should classify a missing event name as unknown', () => {
    expect(classifyEvent({}, context)).toEqual({
      session_id: 'unknown',
      cwd: '',
      event: '',
      pid: 4242,
      status: 'unknown'
    });
  });

  it('should attach ambient context', () => {
    const record = classifyEvent(
      { session_id: 'session-1', cwd: '/work/project', hook_event_name: 'Stop' },
      { pid: 4242, tty: '/dev/ttys001', remoteHost: 'cluster', tmuxTarget: 'main:1.0' }
    );

    expect(record).toEqual({
      ...base,
      event: 'Stop',
      status: 'waiting_for_input',
      tty: '/dev/ttys001',
      remote_host: 'cluster',
      tmux_target: 'main:1.0'
    });
  });
});
