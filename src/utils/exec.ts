/**
 * Command execution for best-effort context discovery
 */

import { execFileSync } from 'child_process';

export interface RunOptions {
  timeoutMs?: number;
  /** File descriptor to hand the child as its stdin */
  stdinFd?: number;
}

/**
 * Runs a command and returns its stdout. Throws on non-zero exit or timeout.
 */
export type CommandRunner = (command: string, args: string[], options?: RunOptions) => string;

const DEFAULT_TIMEOUT_MS = 2000;

export const runCommand: CommandRunner = (command, args, options = {}) => {
  return execFileSync(command, args, {
    encoding: 'utf8',
    timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    stdio: [options.stdinFd ?? 'ignore', 'pipe', 'ignore']
  });
};
