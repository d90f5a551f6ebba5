/**
 * Claude Island Hook
 * Claude Code hook bridge for the Claude Island app
 */

// Hook exports
export {
  HookHandler,
  parseHookInput,
  processHook,
  classifyEvent,
  translateDecision,
  renderControlSignal,
  installHooks,
  uninstallHooks,
  checkHookStatus
} from './hooks/index.js';

// Bridge exports
export { SocketClient, parseDecisionReply, resolveTransportTarget, parseTcpTarget, openTransport } from './bridge/index.js';

// Context exports
export { collectAmbientContext, ProcessTerminalResolver, TmuxPaneResolver } from './context/index.js';

// Config exports
export { loadConfig, DEFAULT_SOCKET_PATH } from './utils/config.js';
export { InputParseError, ConfigurationError, TransportError, ReplyParseError } from './utils/errors.js';

// Type exports
export type { ClaudeIslandConfig } from './utils/config.js';
export type { SessionStatusRecord, DecisionReply, TransportTarget, StatusSender } from './bridge/index.js';
export type { AmbientContext, TerminalResolver, PaneResolver } from './context/index.js';
export type { HookInput, HookEventType, ControlSignal } from './hooks/index.js';
