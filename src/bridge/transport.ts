/**
 * Transport Selection
 * Unix socket by default, TCP when CLAUDE_ISLAND_TCP is set
 */

import { connect, Socket } from 'net';
import { ConfigurationError, TransportError } from '../utils/errors.js';
import type { ClaudeIslandConfig } from '../utils/config.js';
import type { TransportTarget } from './types.js';

/**
 * Connect and reply timeout (5 minutes for permission decisions)
 */
export const TRANSPORT_TIMEOUT_MS = 300_000;

const DEFAULT_TCP_HOST = 'localhost';

/**
 * Parse "host:port" or "port". Splits on the last colon.
 */
export function parseTcpTarget(value: string): { host: string; port: number } {
  const separator = value.lastIndexOf(':');
  const host = separator === -1 ? '' : value.slice(0, separator);
  const portText = separator === -1 ? value : value.slice(separator + 1);

  if (!/^\d+$/.test(portText)) {
    throw new ConfigurationError(`Invalid port in CLAUDE_ISLAND_TCP: "${value}"`);
  }
  const port = parseInt(portText, 10);
  if (port < 1 || port > 65535) {
    throw new ConfigurationError(`Port out of range in CLAUDE_ISLAND_TCP: "${value}"`);
  }

  return { host: host || DEFAULT_TCP_HOST, port };
}

export function resolveTransportTarget(
  config: Pick<ClaudeIslandConfig, 'tcpTarget' | 'socketPath'>
): TransportTarget {
  if (config.tcpTarget) {
    return { kind: 'tcp', ...parseTcpTarget(config.tcpTarget) };
  }
  return { kind: 'unix', path: config.socketPath };
}

export function describeTransportTarget(target: TransportTarget): string {
  return target.kind === 'unix' ? `unix:${target.path}` : `tcp:${target.host}:${target.port}`;
}

/**
 * Open a connection to the app.
 * The idle timeout stays armed on the returned socket and bounds later reads.
 */
export function openTransport(
  target: TransportTarget,
  timeoutMs: number = TRANSPORT_TIMEOUT_MS
): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = target.kind === 'unix'
      ? connect({ path: target.path })
      : connect({ host: target.host, port: target.port });
    const description = describeTransportTarget(target);

    socket.setTimeout(timeoutMs);

    // onError stays attached after connect; a late error then destroys
    // the socket instead of going unhandled
    const onConnect = () => {
      socket.off('timeout', onTimeout);
      resolve(socket);
    };

    const onError = (error: NodeJS.ErrnoException) => {
      socket.off('timeout', onTimeout);
      socket.destroy();
      reject(new TransportError(`Cannot connect to ${description}: ${error.message}`, {
        code: error.code,
        cause: error
      }));
    };

    const onTimeout = () => {
      socket.off('error', onError);
      socket.destroy();
      reject(new TransportError(`Timed out connecting to ${description}`, { code: 'ETIMEDOUT' }));
    };

    socket.once('connect', onConnect);
    socket.once('error', onError);
    socket.once('timeout', onTimeout);
  });
}
