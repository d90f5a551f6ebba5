/**
 * Ambient Context
 * Process facts attached to every status record
 */

import type { ClaudeIslandConfig } from '../utils/config.js';
import { ProcessTerminalResolver, type TerminalResolver } from './terminal.js';
import { TmuxPaneResolver, type PaneResolver } from './pane.js';

export interface AmbientContext {
  pid: number;
  tty?: string;
  remoteHost?: string;
  tmuxTarget?: string;
}

export interface ContextResolvers {
  terminal: TerminalResolver;
  pane: PaneResolver;
}

export function createDefaultResolvers(): ContextResolvers {
  return {
    terminal: new ProcessTerminalResolver(),
    pane: new TmuxPaneResolver()
  };
}

/**
 * The pane is only looked up for remote sessions
 */
export function collectAmbientContext(
  config: Pick<ClaudeIslandConfig, 'remoteHost'>,
  resolvers: ContextResolvers,
  pid: number = process.ppid
): AmbientContext {
  const context: AmbientContext = { pid };

  const tty = resolvers.terminal.resolve(pid);
  if (tty) context.tty = tty;

  if (config.remoteHost) {
    context.remoteHost = config.remoteHost;
    const tmuxTarget = resolvers.pane.resolve();
    if (tmuxTarget) context.tmuxTarget = tmuxTarget;
  }

  return context;
}

export { ProcessTerminalResolver, normalizeTtyName, firstAvailable } from './terminal.js';
export { TmuxPaneResolver } from './pane.js';
export type { TerminalResolver } from './terminal.js';
export type { PaneResolver } from './pane.js';
