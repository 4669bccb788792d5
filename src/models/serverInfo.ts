import { z } from 'zod/v4';

import { parsePayload } from './parse.js';

/**
 * Identity and capabilities of a controller, from `feature_list_resp`.
 *
 * Known feature names: `lights`, `openings`, `thermoregulation`, `scenarios`,
 * `digitalin`, `energy`, `loadsctrl`.
 */
export interface ServerInfo {
  /** Controller keycode, i.e. its MAC address as `001122AABBCC`. */
  keycode: string;
  serial: string;
  features: readonly string[];
  swver?: string;
  type?: string;
  board?: string;
}

const featureListSchema = z.looseObject({
  keycode: z.string(),
  serial: z.string(),
  list: z.array(z.string()),
  swver: z.string().optional(),
  type: z.string().optional(),
  board: z.string().optional()
});

export function parseServerInfo(payload: unknown): ServerInfo {
  const data = parsePayload(featureListSchema, payload, 'feature_list_resp');
  return {
    keycode: data.keycode,
    serial: data.serial,
    features: Object.freeze([...data.list]),
    swver: data.swver,
    type: data.type,
    board: data.board
  };
}
