/**
 * Hook Installer
 * Registers the hook command in Claude Code's settings.json
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { join, dirname } from 'path';
import { homedir } from 'os';
import logger from '../utils/logger.js';
import { HOOK_EVENT_TYPES } from './types.js';
import type { HookEventType } from './types.js';

const log = logger.child('installer');

/**
 * Claude Code settings paths
 */
const CLAUDE_CONFIG_DIR = join(homedir(), '.claude');
const CLAUDE_SETTINGS_FILE = join(CLAUDE_CONFIG_DIR, 'settings.json');

/**
 * Bin name; also how our entries are recognized in settings.json
 */
export const HOOK_MARKER = 'claude-island-hook';
export const DEFAULT_HOOK_COMMAND = `${HOOK_MARKER} run`;

/**
 * PermissionRequest waits up to 300s for the app, plus a buffer
 */
const PERMISSION_HOOK_TIMEOUT = 310;

const TOOL_EVENTS: readonly HookEventType[] = ['PreToolUse', 'PostToolUse', 'PermissionRequest'];

/**
 * Hook configuration for Claude Code (old format)
 */
interface ClaudeHookConfig {
  type: 'command';
  command: string;
  timeout?: number;
}

/**
 * Hook entry with matcher wrapper (required format for Claude Code)
 */
interface ClaudeHookEntry {
  matcher: string;
  hooks: ClaudeHookConfig[];
}

// Union type for hooks (can be old or new format)
type ClaudeHookItem = ClaudeHookConfig | ClaudeHookEntry;

interface ClaudeSettings {
  hooks?: Record<string, ClaudeHookItem[] | undefined>;
  [key: string]: unknown;
}

export interface InstallerOptions {
  settingsPath?: string;
  command?: string;
}

function isSettings(value: unknown): value is ClaudeSettings {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load Claude settings
 */
function loadSettings(settingsPath: string): ClaudeSettings {
  if (!existsSync(settingsPath)) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(readFileSync(settingsPath, 'utf8'));
    if (isSettings(parsed)) {
      return parsed;
    }
    log.warn('Claude settings is not an object, starting fresh', { path: settingsPath });
  } catch (error) {
    log.warn('Failed to parse Claude settings, starting fresh', { error, path: settingsPath });
  }
  return {};
}

/**
 * Save Claude settings
 */
function saveSettings(settings: ClaudeSettings, settingsPath: string): void {
  const configDir = dirname(settingsPath);
  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
  }

  writeFileSync(settingsPath, JSON.stringify(settings, null, 2) + '\n');
}

function isOwnCommand(command: string | undefined, ownCommand: string): boolean {
  return !!command && (command.includes(HOOK_MARKER) || command === ownCommand);
}

function isOwnHook(item: ClaudeHookItem, ownCommand: string): boolean {
  if (typeof item !== 'object' || item === null) {
    return false;
  }
  if ('hooks' in item && Array.isArray(item.hooks)) {
    return item.hooks.some(h => typeof h === 'object' && h !== null && isOwnCommand(h.command, ownCommand));
  }
  if ('command' in item) {
    return isOwnCommand(item.command, ownCommand);
  }
  return false;
}

/**
 * Create hook configuration with required matcher wrapper
 * Tool events take a "*" matcher; lifecycle events ignore it
 */
function createHookEntry(hookType: HookEventType, command: string): ClaudeHookEntry {
  const hook: ClaudeHookConfig = { type: 'command', command };
  if (hookType === 'PermissionRequest') {
    hook.timeout = PERMISSION_HOOK_TIMEOUT;
  }
  return {
    matcher: TOOL_EVENTS.includes(hookType) ? '*' : '',
    hooks: [hook]
  };
}

/**
 * Install hooks for every event the app tracks
 */
export function installHooks(options: InstallerOptions & { force?: boolean } = {}): {
  success: boolean;
  installed: string[];
  skipped: string[];
  settingsPath: string;
  error?: string;
} {
  const settingsPath = options.settingsPath ?? CLAUDE_SETTINGS_FILE;
  const command = options.command ?? DEFAULT_HOOK_COMMAND;
  const installed: string[] = [];
  const skipped: string[] = [];

  try {
    const settings = loadSettings(settingsPath);
    const hooks = settings.hooks ?? {};

    for (const hookType of HOOK_EVENT_TYPES) {
      const existing = hooks[hookType] ?? [];
      const isInstalled = existing.some(h => isOwnHook(h, command));

      if (isInstalled && !options.force) {
        skipped.push(hookType);
        continue;
      }

      // Replace our previous entry, keep everyone else's
      const others = existing.filter(h => !isOwnHook(h, command));
      hooks[hookType] = [...others, createHookEntry(hookType, command)];
      installed.push(hookType);
    }

    settings.hooks = hooks;
    saveSettings(settings, settingsPath);

    log.info('Hooks installed', { installed, skipped, settingsPath });
    return { success: true, installed, skipped, settingsPath };

  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    log.error('Failed to install hooks', { error: errorMessage });
    return { success: false, installed, skipped, settingsPath, error: errorMessage };
  }
}

/**
 * Remove our hooks, leaving any others in place
 */
export function uninstallHooks(options: InstallerOptions = {}): {
  success: boolean;
  removed: string[];
  error?: string;
} {
  const settingsPath = options.settingsPath ?? CLAUDE_SETTINGS_FILE;
  const command = options.command ?? DEFAULT_HOOK_COMMAND;
  const removed: string[] = [];

  try {
    const settings = loadSettings(settingsPath);

    if (!settings.hooks) {
      return { success: true, removed };
    }

    for (const [hookType, items] of Object.entries(settings.hooks)) {
      if (!items) continue;

      const kept = items.filter(h => !isOwnHook(h, command));
      if (kept.length < items.length) {
        removed.push(hookType);
      }

      if (kept.length === 0) {
        delete settings.hooks[hookType];
      } else {
        settings.hooks[hookType] = kept;
      }
    }

    // Remove empty hooks object
    if (Object.keys(settings.hooks).length === 0) {
      delete settings.hooks;
    }

    saveSettings(settings, settingsPath);

    log.info('Hooks uninstalled', { removed });
    return { success: true, removed };

  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    log.error('Failed to uninstall hooks', { error: errorMessage });
    return { success: false, removed, error: errorMessage };
  }
}

/**
 * Check hook installation status
 */
export function checkHookStatus(options: InstallerOptions = {}): {
  installed: boolean;
  hooks: string[];
  missing: string[];
  settingsPath: string;
} {
  const settingsPath = options.settingsPath ?? CLAUDE_SETTINGS_FILE;
  const command = options.command ?? DEFAULT_HOOK_COMMAND;
  const settings = loadSettings(settingsPath);

  const hooks = HOOK_EVENT_TYPES.filter(hookType =>
    (settings.hooks?.[hookType] ?? []).some(h => isOwnHook(h, command))
  );
  const missing = HOOK_EVENT_TYPES.filter(hookType => !hooks.includes(hookType));

  return {
    installed: hooks.length > 0,
    hooks,
    missing,
    settingsPath
  };
}

/**
 * Print hook status
 */
export function printHookStatus(options: InstallerOptions = {}): void {
  const status = checkHookStatus(options);

  console.log('\n📌 Claude Island Hook Status\n');
  console.log(`Settings: ${status.settingsPath}\n`);

  if (status.installed) {
    console.log('✅ Hooks installed\n');
    console.log('Active hooks:');
    status.hooks.forEach(hook => {
      console.log(`  • ${hook}`);
    });
    if (status.missing.length > 0) {
      console.log('\nMissing hooks:');
      status.missing.forEach(hook => {
        console.log(`  • ${hook}`);
      });
    }
  } else {
    console.log('❌ Hooks not installed\n');
    console.log(`Run: ${HOOK_MARKER} install-hooks`);
  }

  console.log('');
}
