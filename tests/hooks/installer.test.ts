/**
 * Hook Installer Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, writeFileSync, existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { installHooks, uninstallHooks, checkHookStatus } from '../../src/hooks/installer.js';

const ALL_EVENTS = [
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

describe('hook installer', () => {
  let dir: string;
  let settingsPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'island-settings-'));
    settingsPath = join(dir, '.claude', 'settings.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function readSettings(): Record<string, unknown> {
    return JSON.parse(readFileSync(settingsPath, 'utf8'));
  }

  it('should install every event into a new settings file', () => {
    const result = installHooks({ settingsPath });

    expect(result.success).toBe(true);
    expect(result.installed).toEqual(ALL_EVENTS);
    expect(result.skipped).toEqual([]);

    const settings = readSettings();
    expect(settings.hooks).toMatchObject({
      Stop: [{ matcher: '', hooks: [{ type: 'command', command: 'claude-island-hook run' }] }],
      PreToolUse: [{ matcher: '*', hooks: [{ type: 'command', command: 'claude-island-hook run' }] }],
      PermissionRequest: [{ matcher: '*', hooks: [{ type: 'command', command: 'claude-island-hook run', timeout: 310 }] }]
    });
  });

  it('should skip events that are already installed', () => {
    installHooks({ settingsPath });
    const second = installHooks({ settingsPath });

    expect(second.installed).toEqual([]);
    expect(second.skipped).toEqual(ALL_EVENTS);
  });

  it('should replace its own entry when forced', () => {
    installHooks({ settingsPath });
    const forced = installHooks({ settingsPath, force: true });

    expect(forced.installed).toEqual(ALL_EVENTS);
    const settings = readSettings();
    expect(settings.hooks).toMatchObject({
      Stop: [{ matcher: '', hooks: [{ command: 'claude-island-hook run' }] }]
    });
    expect(JSON.stringify(settings).match(/claude-island-hook run/g)).toHaveLength(ALL_EVENTS.length);
  });

  it('should keep foreign hooks and other settings', () => {
    installHooks({ settingsPath });
    writeFileSync(settingsPath, JSON.stringify({
      model: 'opus',
      hooks: {
        Stop: [{ matcher: '', hooks: [{ type: 'command', command: 'afplay done.aiff' }] }]
      }
    }));

    installHooks({ settingsPath });
    const settings = readSettings();

    expect(settings.model).toBe('opus');
    expect(settings.hooks).toMatchObject({
      Stop: [
        { matcher: '', hooks: [{ type: 'command', command: 'afplay done.aiff' }] },
        { matcher: '', hooks: [{ type: 'command', command: 'claude-island-hook run' }] }
      ]
    });
  });

  it('should uninstall only its own hooks', () => {
    installHooks({ settingsPath });
    const settings = readSettings();
    const hooks = settings.hooks;
    writeFileSync(settingsPath, JSON.stringify({
      hooks: {
        ...(typeof hooks === 'object' && hooks !== null ? hooks : {}),
        Stop: [
          { matcher: '', hooks: [{ type: 'command', command: 'afplay done.aiff' }] },
          { matcher: '', hooks: [{ type: 'command', command: 'claude-island-hook run' }] }
        ]
      }
    }));

    const result = uninstallHooks({ settingsPath });

    expect(result.success).toBe(true);
    expect(result.removed).toEqual(ALL_EVENTS);
    expect(readSettings()).toEqual({
      hooks: {
        Stop: [{ matcher: '', hooks: [{ type: 'command', command: 'afplay done.aiff' }] }]
      }
    });
  });

  it('should drop the hooks object when nothing is left', () => {
    installHooks({ settingsPath });
    uninstallHooks({ settingsPath });

    expect(readSettings()).toEqual({});
  });

  it('should report status', () => {
    expect(existsSync(settingsPath)).toBe(false);
    expect(checkHookStatus({ settingsPath })).toEqual({
      installed: false,
      hooks: [],
      missing: ALL_EVENTS,
      settingsPath
    });

    installHooks({ settingsPath });
    const status = checkHookStatus({ settingsPath });

    expect(status.installed).toBe(true);
    expect(status.hooks).toEqual(ALL_EVENTS);
    expect(status.missing).toEqual([]);
  });

  it('should recognize a custom command', () => {
    installHooks({ settingsPath, command: 'node /opt/island/dist/cli.js' });

    expect(checkHookStatus({ settingsPath, command: 'node /opt/island/dist/cli.js' }).hooks).toEqual(ALL_EVENTS);
    expect(checkHookStatus({ settingsPath }).hooks).toEqual([]);
  });
});
