/**
 * Configuration Management
 * Loads hook configuration from environment variables
 */

/**
 * Socket the Claude Island app listens on
 */
export const DEFAULT_SOCKET_PATH = '/tmp/claude-island.sock';

export interface ClaudeIslandConfig {
  // Transport
  tcpTarget?: string;   // "host:port" or "port"; selects TCP over the Unix socket
  socketPath: string;

  // Remote sessions (SSH tunnel to the app)
  remoteHost?: string;

  // Logging threshold (CLAUDE_ISLAND_LOG_LEVEL, or debug when CLAUDE_ISLAND_VERBOSE)
  logLevel: LogLevel;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVEL_ORDER, value);
}

/**
 * Parse boolean from environment variable
 */
function parseEnvBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Read a string env var, treating empty as unset
 */
function parseEnvString(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * Resolve the logging threshold. An unknown CLAUDE_ISLAND_LOG_LEVEL is ignored.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const explicit = parseEnvString(env.CLAUDE_ISLAND_LOG_LEVEL)?.toLowerCase();
  if (explicit && isLogLevel(explicit)) {
    return explicit;
  }
  return parseEnvBool(env.CLAUDE_ISLAND_VERBOSE, false) ? 'debug' : 'warn';
}

/**
 * Load configuration
 */
export function loadConfig(): ClaudeIslandConfig {
  return {
    tcpTarget: parseEnvString(process.env.CLAUDE_ISLAND_TCP),
    socketPath: parseEnvString(process.env.CLAUDE_ISLAND_SOCKET) ?? DEFAULT_SOCKET_PATH,
    remoteHost: parseEnvString(process.env.CLAUDE_ISLAND_REMOTE_HOST),
    logLevel: resolveLogLevel()
  };
}
