/**
 * Socket Client
 * Delivers status records to the Claude Island app and, for permission
 * requests, waits for the app's decision on the same connection.
 *
 * Wire format: one compact JSON document per connection, no framing.
 * Fire-and-forget records end at the half-close; the reply to a permission
 * request is whatever arrives in the first read.
 */

import type { Socket } from 'net';
import { z } from 'zod';
import logger from '../utils/logger.js';
import { ConfigurationError, ReplyParseError, TransportError } from '../utils/errors.js';
import type { ClaudeIslandConfig } from '../utils/config.js';
import {
  openTransport,
  resolveTransportTarget,
  describeTransportTarget,
  TRANSPORT_TIMEOUT_MS
} from './transport.js';
import type { DecisionReply, SessionStatusRecord, StatusSender, TransportTarget } from './types.js';

const log = logger.child('socket');

const decisionReplySchema = z.object({
  decision: z.enum(['allow', 'deny', 'ask']).catch('ask'),
  reason: z.string().optional().catch(undefined)
});

/**
 * Parse the app's reply. Unknown or missing decisions become "ask".
 */
export function parseDecisionReply(raw: string): DecisionReply {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new ReplyParseError('Reply is not valid JSON', { cause: error });
  }

  const result = decisionReplySchema.safeParse(data);
  if (!result.success) {
    throw new ReplyParseError('Reply is not a decision object', { cause: result.error });
  }

  const reply: DecisionReply = { decision: result.data.decision };
  if (result.data.reason !== undefined) {
    reply.reason = result.data.reason;
  }
  return reply;
}

export interface SocketClientOptions {
  timeoutMs?: number;
  connect?: (target: TransportTarget, timeoutMs: number) => Promise<Socket>;
}

/**
 * One connection per record, closed before send() settles
 */
export class SocketClient implements StatusSender {
  private config: Pick<ClaudeIslandConfig, 'tcpTarget' | 'socketPath'>;
  private timeoutMs: number;
  private connect: (target: TransportTarget, timeoutMs: number) => Promise<Socket>;

  constructor(
    config: Pick<ClaudeIslandConfig, 'tcpTarget' | 'socketPath'>,
    options: SocketClientOptions = {}
  ) {
    this.config = config;
    this.timeoutMs = options.timeoutMs ?? TRANSPORT_TIMEOUT_MS;
    this.connect = options.connect ?? openTransport;
  }

  /**
   * Send a record. Resolves with the app's decision for waiting_for_approval
   * records, null otherwise. Never rejects.
   */
  async send(record: SessionStatusRecord): Promise<DecisionReply | null> {
    let socket: Socket | null = null;

    try {
      const target = resolveTransportTarget(this.config);
      socket = await this.connect(target, this.timeoutMs);
      log.debug('Connected to app', { target: describeTransportTarget(target), status: record.status });

      const payload = JSON.stringify(record);

      if (record.status !== 'waiting_for_approval') {
        await this.deliver(socket, payload);
        return null;
      }

      const raw = await this.exchange(socket, payload);
      if (raw === null || raw.length === 0) {
        log.info('No decision received from app', { sessionId: record.session_id });
        return null;
      }
      return parseDecisionReply(raw);
    } catch (error) {
      this.reportFailure(error, record);
      return null;
    } finally {
      socket?.destroy();
    }
  }

  /**
   * Write the payload and half-close
   */
  private deliver(socket: Socket, payload: string): Promise<void> {
    return new Promise((resolve, reject) => {
      socket.once('error', (error: NodeJS.ErrnoException) => {
        reject(new TransportError(`Send failed: ${error.message}`, { code: error.code, cause: error }));
      });
      socket.end(payload, () => resolve());
    });
  }

  /**
   * Write the payload, then take a single read bounded by the socket timeout.
   * Resolves null on timeout or when the app closes without replying.
   */
  private exchange(socket: Socket, payload: string): Promise<string | null> {
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        socket.off('data', onData);
        socket.off('end', onClosed);
        socket.off('close', onClosed);
        socket.off('timeout', onTimeout);
        socket.off('error', onError);
      };

      const onData = (chunk: Buffer) => {
        cleanup();
        resolve(chunk.toString('utf8'));
      };

      const onClosed = () => {
        cleanup();
        resolve(null);
      };

      const onTimeout = () => {
        cleanup();
        log.warn('Timed out waiting for decision', { timeoutMs: this.timeoutMs });
        resolve(null);
      };

      const onError = (error: NodeJS.ErrnoException) => {
        cleanup();
        reject(new TransportError(`Exchange failed: ${error.message}`, { code: error.code, cause: error }));
      };

      socket.on('data', onData);
      socket.on('end', onClosed);
      socket.on('close', onClosed);
      socket.on('timeout', onTimeout);
      socket.on('error', onError);

      socket.write(payload);
    });
  }

  private reportFailure(error: unknown, record: SessionStatusRecord): void {
    const meta = { status: record.status, sessionId: record.session_id, error };

    if (error instanceof TransportError && (error.code === 'ENOENT' || error.code === 'ECONNREFUSED')) {
      log.debug('App not running, skipping delivery', meta);
    } else if (error instanceof ConfigurationError) {
      log.warn('Invalid transport configuration', meta);
    } else if (error instanceof ReplyParseError) {
      log.warn('Ignoring malformed reply', meta);
    } else {
      log.warn('Delivery failed', meta);
    }
  }
}

export { DEFAULT_SOCKET_PATH } from '../utils/config.js';
