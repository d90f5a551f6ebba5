/**
 * Error Types
 * Only InputParseError is fatal; the rest are absorbed by the socket client
 */

/**
 * Hook stdin is not a JSON object
 */
export class InputParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InputParseError';
  }
}

/**
 * Malformed transport target (e.g. CLAUDE_ISLAND_TCP="host:abc")
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Connect, send or receive failure
 */
export class TransportError extends Error {
  readonly code?: string;

  constructor(message: string, options?: { code?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'TransportError';
    this.code = options?.code;
  }
}

/**
 * Reply bytes from the app are not a decision object
 */
export class ReplyParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReplyParseError';
  }
}
