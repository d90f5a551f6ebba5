/**
 * Bridge Module
 * Exports all bridge-related functionality
 */

export { SocketClient, parseDecisionReply, DEFAULT_SOCKET_PATH } from './socket.js';
export {
  parseTcpTarget,
  resolveTransportTarget,
  describeTransportTarget,
  openTransport,
  TRANSPORT_TIMEOUT_MS
} from './transport.js';
export type {
  SessionStatus,
  SessionStatusRecord,
  DecisionReply,
  Decision,
  TransportTarget,
  StatusSender
} from './types.js';
