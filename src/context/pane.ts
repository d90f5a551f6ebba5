/**
 * tmux Pane Discovery
 * Lets the app send keystrokes to a remote session's pane
 */

import logger from '../utils/logger.js';
import { runCommand, type CommandRunner } from '../utils/exec.js';

const log = logger.child('tmux');

export interface PaneResolver {
  /** "session:window.pane", the raw pane id, or undefined. Never throws. */
  resolve(): string | undefined;
}

const TARGET_FORMAT = '#{session_name}:#{window_index}.#{pane_index}';

export interface PaneResolverOptions {
  run?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

export class TmuxPaneResolver implements PaneResolver {
  private run: CommandRunner;
  private env: NodeJS.ProcessEnv;

  constructor(options: PaneResolverOptions = {}) {
    this.run = options.run ?? runCommand;
    this.env = options.env ?? process.env;
  }

  resolve(): string | undefined {
    // Set by tmux, e.g. "%42"
    const pane = this.env.TMUX_PANE;
    if (!pane) {
      return undefined;
    }

    try {
      const target = this.run('tmux', ['display-message', '-p', '-t', pane, TARGET_FORMAT], {
        timeoutMs: 2000
      }).trim();
      if (target) {
        return target;
      }
    } catch (error) {
      log.debug('tmux query failed, using pane id', { pane, error });
    }

    return pane;
  }
}
