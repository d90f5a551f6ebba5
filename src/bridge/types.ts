/**
 * Bridge Types
 * Wire shapes exchanged with the Claude Island app
 */

export type SessionStatus =
  | 'processing'
  | 'running_tool'
  | 'waiting_for_approval'
  | 'waiting_for_input'
  | 'ended'
  | 'compacting'
  | 'notification'
  | 'unknown';

/**
 * Fields every record carries. Keys are snake_case on the wire.
 */
export interface StatusRecordBase {
  session_id: string;
  cwd: string;
  event: string;
  pid: number;
  tty?: string;
  remote_host?: string;
  tmux_target?: string;
}

export interface ToolFields {
  tool?: string;
  tool_input: unknown;
}

export interface ProcessingRecord extends StatusRecordBase, Partial<ToolFields> {
  status: 'processing';
  tool_use_id?: string;
}

export interface RunningToolRecord extends StatusRecordBase, ToolFields {
  status: 'running_tool';
  tool_use_id?: string;
}

export interface WaitingForApprovalRecord extends StatusRecordBase, ToolFields {
  status: 'waiting_for_approval';
}

export interface WaitingForInputRecord extends StatusRecordBase {
  status: 'waiting_for_input';
  notification_type?: string;
  message?: string;
}

export interface NotificationRecord extends StatusRecordBase {
  status: 'notification';
  notification_type?: string;
  message?: string;
}

export interface LifecycleRecord extends StatusRecordBase {
  status: 'ended' | 'compacting' | 'unknown';
}

export type SessionStatusRecord =
  | ProcessingRecord
  | RunningToolRecord
  | WaitingForApprovalRecord
  | WaitingForInputRecord
  | NotificationRecord
  | LifecycleRecord;

export type Decision = 'allow' | 'deny' | 'ask';

/**
 * Reply to a waiting_for_approval record
 */
export interface DecisionReply {
  decision: Decision;
  reason?: string;
}

/**
 * Where the app listens
 */
export type TransportTarget =
  | { kind: 'unix'; path: string }
  | { kind: 'tcp'; host: string; port: number };

/**
 * Anything that can deliver a record and hand back the app's reply
 */
export interface StatusSender {
  send(record: SessionStatusRecord): Promise<DecisionReply | null>;
}
