#!/usr/bin/env node
/**
 * Claude Island Hook CLI
 * Main command-line interface
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { main as runHook } from './hooks/handler.js';
import { installHooks, uninstallHooks, printHookStatus, DEFAULT_HOOK_COMMAND } from './hooks/installer.js';
import { resolveTransportTarget, describeTransportTarget } from './bridge/transport.js';
import { loadConfig } from './utils/config.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: { version: string } = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8'));

const program = new Command();

program
  .name('claude-island-hook')
  .description('Report Claude Code sessions to the Claude Island app')
  .version(packageJson.version);

/**
 * Run command - what Claude Code invokes for each hook event
 */
program
  .command('run', { isDefault: true })
  .description('Process one hook event from stdin')
  .action(async () => {
    process.exitCode = await runHook();
  });

/**
 * Install hooks command
 */
program
  .command('install-hooks')
  .description('Install Claude Code hooks')
  .option('-s, --settings <path>', 'Claude settings file (default: ~/.claude/settings.json)')
  .option('-c, --command <command>', 'Command Claude Code should run', DEFAULT_HOOK_COMMAND)
  .option('-f, --force', 'Replace hooks that are already installed')
  .action((options: { settings?: string; command: string; force?: boolean }) => {
    console.log('📌 Configuring Claude Code hooks...\n');

    const result = installHooks({
      settingsPath: options.settings,
      command: options.command,
      force: options.force
    });

    if (!result.success) {
      console.error('❌ Failed to install hooks:', result.error);
      process.exitCode = 1;
      return;
    }

    if (result.installed.length > 0) {
      console.log('✅ Added hooks:');
      result.installed.forEach(hook => console.log(`   • ${hook}`));
    }
    if (result.skipped.length > 0) {
      console.log('\n⚪ Already installed:');
      result.skipped.forEach(hook => console.log(`   • ${hook}`));
    }
    console.log(`\nSettings: ${result.settingsPath}\n`);
  });

/**
 * Uninstall hooks command
 */
program
  .command('uninstall-hooks')
  .description('Remove Claude Code hooks')
  .option('-s, --settings <path>', 'Claude settings file (default: ~/.claude/settings.json)')
  .action((options: { settings?: string }) => {
    console.log('🗑️  Removing Claude Code hooks...\n');

    const result = uninstallHooks({ settingsPath: options.settings });

    if (!result.success) {
      console.error('❌ Failed to remove hooks:', result.error);
      process.exitCode = 1;
      return;
    }

    if (result.removed.length > 0) {
      console.log('✅ Removed hooks:');
      result.removed.forEach(hook => console.log(`   • ${hook}`));
    } else {
      console.log('⚪ No hooks were installed');
    }
    console.log('');
  });

/**
 * Hook status command
 */
program
  .command('hooks')
  .description('Show hook installation status')
  .option('-s, --settings <path>', 'Claude settings file (default: ~/.claude/settings.json)')
  .action((options: { settings?: string }) => {
    printHookStatus({ settingsPath: options.settings });
  });

/**
 * Config command - show where events will be sent
 */
program
  .command('config')
  .description('Show the resolved configuration')
  .action(() => {
    const config = loadConfig();

    console.log('\n⚙️  Claude Island Hook Configuration\n');
    try {
      console.log(`Transport:   ${describeTransportTarget(resolveTransportTarget(config))}`);
    } catch (error) {
      console.log(`Transport:   ❌ ${error instanceof Error ? error.message : String(error)}`);
    }
    console.log(`Remote host: ${config.remoteHost ?? '(not set)'}`);
    console.log(`Log level:   ${config.logLevel}`);
    console.log('');
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
