import type { Logger } from 'pino';

import { buildEnvelope, decodeAck, encodeEnvelope, frameEnvelope, type AckResult, type CommandPayload } from './codec.js';
import { sanitizeForLog } from './redact.js';
import type { CommandTransport, PostOptions } from './transport.js';

export interface ExchangeOptions extends PostOptions {
  token: string | null;
}

/**
 * Lowest layer under the dispatcher: one envelope out, one ack back. Knows
 * nothing about sessions; the token is whatever the caller hands in.
 */
export class CommandChannel {
  private lastSeq = 0;

  constructor(
    private readonly transport: CommandTransport,
    private readonly logger: Logger
  ) {}

  /** Last sequence number handed out; 0 before the first command. */
  get sequence(): number {
    return this.lastSeq;
  }

  // Synchronous, so two concurrent callers can never share a number.
  private nextSequence(): number {
    this.lastSeq += 1;
    return this.lastSeq;
  }

  async exchange(command: string, payload: CommandPayload, options: ExchangeOptions): Promise<AckResult> {
    const envelope = buildEnvelope(command, payload, this.nextSequence(), options.token);
    const body = encodeEnvelope(envelope);

    this.logger.debug({ command, seq: envelope.seq, envelope: sanitizeForLog(frameEnvelope(envelope)) }, 'Sending command');

    const raw = await this.transport.post(body, { signal: options.signal, timeoutMs: options.timeoutMs });
    const ack = decodeAck(raw);

    this.logger.debug({ command, seq: envelope.seq, ack: ack.code }, 'Command acknowledged');
    return ack;
  }
}
