import { z } from 'zod/v4';

import { parsePayload } from './parse.js';

export type StatusUpdate = Record<string, unknown>;

const statusUpdateSchema = z.looseObject({
  result: z.array(z.record(z.string(), z.unknown())).optional()
});

/** Status changes in the order the controller reported them. */
export function parseUpdates(payload: unknown): StatusUpdate[] {
  const data = parsePayload(statusUpdateSchema, payload, 'status_update_resp');
  return data.result ?? [];
}

export function updatesOfKind(updates: readonly StatusUpdate[], cmdName: string): StatusUpdate[] {
  return updates.filter((update) => update.cmd_name === cmdName);
}
