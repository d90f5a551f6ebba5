/**
 * Logger
 * Leveled logging to stderr (stdout is reserved for hook output)
 */

import { LOG_LEVEL_ORDER, resolveLogLevel, type LogLevel } from './config.js';

export type { LogLevel } from './config.js';

function formatMeta(meta: Record<string, unknown>): string {
  return JSON.stringify(meta, (_key, value: unknown) => {
    if (value instanceof Error) {
      const code = 'code' in value && typeof value.code === 'string' ? value.code : undefined;
      return code ? `${value.name}: ${value.message} (${code})` : `${value.name}: ${value.message}`;
    }
    return value;
  });
}

export class Logger {
  constructor(private readonly namespace: string = 'claude-island') {}

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    // Re-resolved per call so tests and the CLI can change it after import
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[resolveLogLevel()]) return;

    const timestamp = new Date().toISOString();
    let line = `[${timestamp}] [${this.namespace}] [${level.toUpperCase()}] ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      line += ` ${formatMeta(meta)}`;
    }
    console.error(line);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log('error', message, meta);
  }

  child(namespace: string): Logger {
    return new Logger(`${this.namespace}:${namespace}`);
  }
}

const logger = new Logger();

export default logger;
