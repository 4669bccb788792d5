import { z } from 'zod/v4';

import { CameDomoticError } from '../errors.js';
import { ACK_SUCCESS, getAckErrorMessage, isSessionCommand } from './constants.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type CommandPayload = Record<string, JsonValue | undefined>;

export interface CommandEnvelope {
  readonly command: string;
  readonly payload: Readonly<CommandPayload>;
  readonly seq: number;
  readonly token: string | null;
}

export interface AckResult {
  code: number;
  message?: string;
  payload: Record<string, unknown>;
}

const ackSchema = z.looseObject({
  sl_data_ack_reason: z.number().int()
});

export function buildEnvelope(
  command: string,
  payload: CommandPayload,
  seq: number,
  token: string | null
): CommandEnvelope {
  return Object.freeze({
    command,
    payload: Object.freeze({ ...payload }),
    seq,
    token
  });
}

/**
 * Lays the envelope out on the wire. Session-layer commands (`sl_*`) carry their
 * payload next to `sl_cmd`; everything else travels as a `domo` application
 * message wrapped in `sl_data_req`, which is where the sequence number lives.
 */
export function frameEnvelope(envelope: CommandEnvelope): Record<string, unknown> {
  if (isSessionCommand(envelope.command)) {
    return {
      ...envelope.payload,
      ...(envelope.token ? { sl_client_id: envelope.token } : {}),
      sl_cmd: envelope.command
    };
  }

  return {
    sl_appl_msg: {
      ...(envelope.token ? { client: envelope.token } : {}),
      cmd_name: envelope.command,
      cseq: envelope.seq,
      ...envelope.payload
    },
    sl_appl_msg_type: 'domo',
    ...(envelope.token ? { sl_client_id: envelope.token } : {}),
    sl_cmd: 'sl_data_req'
  };
}

function assertSerializable(value: unknown, path: string, seen: WeakSet<object>): void {
  if (value === null || value === undefined) {
    return;
  }

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new CameDomoticError('ENCODING', `Non-finite number at ${path}`);
      }
      return;
    case 'object':
      break;
    default:
      throw new CameDomoticError('ENCODING', `Value of type ${typeof value} at ${path} is not JSON-serializable`);
  }

  if (seen.has(value)) {
    throw new CameDomoticError('ENCODING', `Circular reference at ${path}`);
  }
  seen.add(value);

  const entries = Array.isArray(value) ? value.map((item, index) => [String(index), item] as const) : Object.entries(value);
  for (const [key, nested] of entries) {
    assertSerializable(nested, `${path}.${key}`, seen);
  }
  seen.delete(value);
}

export function encodeEnvelope(envelope: CommandEnvelope): string {
  assertSerializable(envelope.payload, 'payload', new WeakSet<object>());
  return JSON.stringify(frameEnvelope(envelope));
}

export function decodeAck(raw: string): AckResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CameDomoticError('PROTOCOL', 'Response body is not valid JSON', {
      cause: error,
      details: { body: raw.slice(0, 200) }
    });
  }

  const result = ackSchema.safeParse(parsed);
  if (!result.success) {
    throw new CameDomoticError('PROTOCOL', 'Response has no acknowledgement code', {
      cause: result.error,
      details: { body: raw.slice(0, 200) }
    });
  }

  const payload: Record<string, unknown> = result.data;
  const code = result.data.sl_data_ack_reason;
  return code === ACK_SUCCESS ? { code, payload } : { code, message: getAckErrorMessage(code), payload };
}
