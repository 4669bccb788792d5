import type { Logger } from 'pino';
import { z } from 'zod/v4';

import type { SendOptions } from '../came/dispatcher.js';
import { APP_COMMANDS } from '../came/constants.js';
import type { CommandSender } from './sender.js';
import { parsePayload } from './parse.js';

export const LightStatus = {
  OFF: 0,
  ON: 1
} as const;
export type LightStatus = (typeof LightStatus)[keyof typeof LightStatus];

export const LightType = {
  STEP_STEP: 'STEP_STEP',
  DIMMER: 'DIMMER',
  UNKNOWN: 'UNKNOWN_LIGHT_TYPE'
} as const;
export type LightType = (typeof LightType)[keyof typeof LightType];

const lightSchema = z.looseObject({
  act_id: z.number().int(),
  name: z.string(),
  floor_ind: z.number().int().optional(),
  room_ind: z.number().int().optional(),
  status: z.union([z.literal(0), z.literal(1)]).catch(LightStatus.OFF),
  type: z.string().optional(),
  perc: z.number().optional()
});

type LightData = z.output<typeof lightSchema>;

function clampBrightness(value: number): number {
  return Math.max(0, Math.min(Math.round(value), 100));
}

export class Light {
  private readonly data: LightData;

  constructor(
    raw: unknown,
    private readonly sender: CommandSender,
    private readonly logger: Logger
  ) {
    this.data = parsePayload(lightSchema, raw, 'light');
  }

  get actId(): number {
    return this.data.act_id;
  }

  get name(): string {
    return this.data.name;
  }

  get floorInd(): number | undefined {
    return this.data.floor_ind;
  }

  get roomInd(): number | undefined {
    return this.data.room_ind;
  }

  get status(): LightStatus {
    return this.data.status;
  }

  get type(): LightType {
    const raw = this.data.type;
    if (raw === LightType.STEP_STEP || raw === LightType.DIMMER) {
      return raw;
    }
    this.logger.warn({ type: raw, light: this.name, actId: this.actId }, 'Unknown light type');
    return LightType.UNKNOWN;
  }

  /** Brightness 0-100; lights that are not dimmable always report 100. */
  get perc(): number {
    return this.data.perc ?? 100;
  }

  /**
   * Switches the light. `brightness` is clamped to 0-100 and ignored for lights
   * that are not dimmers; when omitted the brightness stays as it is.
   */
  async setStatus(status: LightStatus, brightness?: number, options?: SendOptions): Promise<void> {
    const type = this.type;
    let perc = brightness === undefined ? undefined : clampBrightness(brightness);
    if (type !== LightType.DIMMER && perc !== undefined) {
      this.logger.debug({ light: this.name, type }, 'Light is not dimmable, ignoring brightness');
      perc = undefined;
    }
    if (type === LightType.UNKNOWN) {
      this.logger.warn({ light: this.name, actId: this.actId }, 'Switching a light of unknown type');
    }

    await this.sender.send(
      APP_COMMANDS.lightSwitch,
      {
        act_id: this.actId,
        wanted_status: status,
        ...(perc !== undefined ? { perc } : {})
      },
      options
    );

    this.data.status = status;
    if (perc !== undefined) {
      this.data.perc = perc;
    }
  }
}
