/**
 * Claude Code Hook Handler
 * Reads one hook event, reports it to the Claude Island app and, for
 * permission requests, prints the app's decision for Claude Code
 */

import type { Readable, Writable } from 'stream';
import { SocketClient } from '../bridge/socket.js';
import type { StatusSender } from '../bridge/types.js';
import { collectAmbientContext, createDefaultResolvers } from '../context/index.js';
import type { ContextResolvers } from '../context/index.js';
import { loadConfig } from '../utils/config.js';
import type { ClaudeIslandConfig } from '../utils/config.js';
import { InputParseError } from '../utils/errors.js';
import logger from '../utils/logger.js';
import { classifyEvent } from './classifier.js';
import { renderControlSignal, translateDecision } from './decision.js';
import { hookInputSchema } from './types.js';
import type { HookInput } from './types.js';

const log = logger.child('hook');

/**
 * Parse hook stdin. Anything but a JSON object is rejected.
 */
export function parseHookInput(raw: string): HookInput {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new InputParseError('Hook input is not valid JSON', { cause: error });
  }

  const result = hookInputSchema.safeParse(data);
  if (!result.success) {
    throw new InputParseError('Hook input is not a JSON object', { cause: result.error });
  }
  return result.data;
}

export interface HookHandlerOptions {
  config?: ClaudeIslandConfig;
  sender?: StatusSender;
  resolvers?: ContextResolvers;
  /** Claude Code's pid; defaults to our parent */
  pid?: number;
}

/**
 * Hook Handler Class
 * One instance handles exactly one event
 */
export class HookHandler {
  private config: ClaudeIslandConfig;
  private sender: StatusSender;
  private resolvers: ContextResolvers;
  private pid: number;

  constructor(options: HookHandlerOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.sender = options.sender ?? new SocketClient(this.config);
    this.resolvers = options.resolvers ?? createDefaultResolvers();
    this.pid = options.pid ?? process.ppid;
  }

  /**
   * Classify, deliver and (for permission requests) translate the reply.
   * Returns the text Claude Code should read from stdout, if any.
   */
  async processEvent(input: HookInput): Promise<string | null> {
    const context = collectAmbientContext(this.config, this.resolvers, this.pid);
    const record = classifyEvent(input, context);

    if (!record) {
      log.debug('Event suppressed', { event: input.hook_event_name, notificationType: input.notification_type });
      return null;
    }

    log.debug('Sending status', { event: record.event, status: record.status, sessionId: record.session_id });
    const reply = await this.sender.send(record);

    if (record.status !== 'waiting_for_approval') {
      return null;
    }

    const signal = translateDecision(record.status, reply);
    log.debug('Permission decision', { signal: signal.kind, tool: record.tool });
    return renderControlSignal(signal);
  }
}

async function readStream(stream: Readable): Promise<string> {
  let input = '';
  stream.setEncoding('utf8');
  for await (const chunk of stream) {
    input += chunk;
  }
  return input;
}

export interface MainOptions extends HookHandlerOptions {
  stdin?: Readable;
  stdout?: Writable;
}

/**
 * Main entry point for hook processing. Resolves with the exit code.
 */
export async function main(options: MainOptions = {}): Promise<number> {
  const { stdin = process.stdin, stdout = process.stdout, ...handlerOptions } = options;
  const raw = await readStream(stdin);

  // Parse before anything touches the network
  let input: HookInput;
  try {
    input = parseHookInput(raw);
  } catch (error) {
    log.error('Cannot parse hook input', { error });
    return 1;
  }

  const handler = new HookHandler(handlerOptions);
  const output = await handler.processEvent(input);

  if (output) {
    stdout.write(output + '\n');
  }
  return 0;
}

export default HookHandler;
