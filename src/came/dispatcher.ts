import type { Logger } from 'pino';

import { CameDomoticError, formatAckError } from '../errors.js';
import type { CommandChannel } from './channel.js';
import type { AckResult, CommandPayload } from './codec.js';
import { classifyAck, DEFAULT_AUTH_ACK_CODES } from './constants.js';
import type { AuthSession } from './session.js';
import { untilAborted } from './transport.js';

export interface SendOptions {
  /** Abandons this call only; a login it is waiting on keeps running for other callers. */
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface CommandDispatcherOptions {
  channel: CommandChannel;
  auth: AuthSession;
  logger: Logger;
  authAckCodes?: readonly number[];
  timeoutMs?: number;
}

export class CommandDispatcher {
  private readonly authAckCodes: readonly number[];

  constructor(private readonly options: CommandDispatcherOptions) {
    this.authAckCodes = options.authAckCodes ?? DEFAULT_AUTH_ACK_CODES;
  }

  private exchange(command: string, payload: CommandPayload, token: string, options: SendOptions): Promise<AckResult> {
    return this.options.channel.exchange(command, payload, {
      token,
      signal: options.signal,
      timeoutMs: options.timeoutMs ?? this.options.timeoutMs
    });
  }

  /**
   * Sends an authenticated command and returns the controller's payload.
   * A session-expired ack triggers exactly one re-login and one retry; any
   * other failure goes straight back to the caller.
   */
  async send(command: string, payload: CommandPayload = {}, options: SendOptions = {}): Promise<Record<string, unknown>> {
    const { auth, logger } = this.options;

    let token = await untilAborted(auth.acquireToken(), options.signal);
    let ack = await this.exchange(command, payload, token, options);

    if (classifyAck(ack.code, 'command', this.authAckCodes) === 'session_expired') {
      logger.info({ command, ackCode: ack.code }, 'Session expired, logging in again before retrying');
      token = await untilAborted(auth.renew(token), options.signal);
      ack = await this.exchange(command, payload, token, options);

      if (classifyAck(ack.code, 'command', this.authAckCodes) === 'session_expired') {
        auth.invalidate(token);
        throw new CameDomoticError('AUTH', `Session rejected again after re-login (${ack.message})`, {
          ackCode: ack.code,
          details: { command }
        });
      }
    }

    if (classifyAck(ack.code, 'command', this.authAckCodes) !== 'success') {
      throw new CameDomoticError('SERVER_COMMAND', formatAckError(ack.code, ack.message), {
        ackCode: ack.code,
        details: { command }
      });
    }

    auth.touch(token);
    return ack.payload;
  }
}
