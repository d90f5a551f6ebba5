/**
 * Hooks Module
 * Exports all hook-related functionality
 */

export { HookHandler, parseHookInput, main as processHook } from './handler.js';
export { classifyEvent } from './classifier.js';
export { translateDecision, renderControlSignal, DEFAULT_DENY_REASON } from './decision.js';
export { installHooks, uninstallHooks, checkHookStatus, printHookStatus } from './installer.js';
export { hookInputSchema, HOOK_EVENT_TYPES } from './types.js';
export type { ControlSignal } from './decision.js';
export type { HookEventType, HookInput, PermissionHookOutput } from './types.js';
