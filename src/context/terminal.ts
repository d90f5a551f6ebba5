/**
 * Terminal Discovery
 * Finds the tty of the Claude process so the app can focus the right window
 */

import { isatty } from 'tty';
import logger from '../utils/logger.js';
import { runCommand, type CommandRunner } from '../utils/exec.js';

const log = logger.child('tty');

const NO_TERMINAL = new Set(['?', '??', '-']);

export interface TerminalResolver {
  /** Controlling terminal for pid, or undefined. Never throws. */
  resolve(pid: number): string | undefined;
}

/**
 * Turn `ps` output into a device path.
 * "ttys001" → "/dev/ttys001". Empty output, "?" (Linux), "??" (macOS)
 * and "-" mean no terminal.
 */
export function normalizeTtyName(raw: string): string | undefined {
  const name = raw.trim();
  if (!name || NO_TERMINAL.has(name)) {
    return undefined;
  }
  return name.startsWith('/dev/') ? name : `/dev/${name}`;
}

/**
 * First probe that yields a value wins; probes that throw are skipped
 */
export function firstAvailable(probes: Array<() => string | undefined>): string | undefined {
  for (const probe of probes) {
    try {
      const value = probe();
      if (value) return value;
    } catch (error) {
      log.debug('Terminal probe failed', { error });
    }
  }
  return undefined;
}

export interface TerminalResolverOptions {
  run?: CommandRunner;
  isTerminal?: (fd: number) => boolean;
}

/**
 * ps for the parent process, then our own stdin, then stdout
 */
export class ProcessTerminalResolver implements TerminalResolver {
  private run: CommandRunner;
  private isTerminal: (fd: number) => boolean;

  constructor(options: TerminalResolverOptions = {}) {
    this.run = options.run ?? runCommand;
    this.isTerminal = options.isTerminal ?? isatty;
  }

  resolve(pid: number): string | undefined {
    return firstAvailable([
      () => normalizeTtyName(this.run('ps', ['-p', String(pid), '-o', 'tty='])),
      () => this.fromDescriptor(0),
      () => this.fromDescriptor(1)
    ]);
  }

  /**
   * `tty` prints the terminal attached to its stdin
   */
  private fromDescriptor(fd: number): string | undefined {
    if (!this.isTerminal(fd)) {
      return undefined;
    }
    const name = this.run('tty', [], { stdinFd: fd }).trim();
    return name.startsWith('/dev/') ? name : undefined;
  }
}
