import type { Logger } from 'pino';
import { z } from 'zod/v4';

import type { SendOptions } from '../came/dispatcher.js';
import { APP_COMMANDS } from '../came/constants.js';
import type { CommandSender } from './sender.js';
import { parsePayload } from './parse.js';

export const OpeningStatus = {
  STOPPED: 0,
  OPENING: 1,
  CLOSING: 2,
  UNKNOWN: -1
} as const;
export type OpeningStatus = (typeof OpeningStatus)[keyof typeof OpeningStatus];

export const OpeningType = {
  SHUTTER: 0,
  UNKNOWN: -1
} as const;
export type OpeningType = (typeof OpeningType)[keyof typeof OpeningType];

const openingSchema = z.looseObject({
  open_act_id: z.number().int(),
  close_act_id: z.number().int(),
  name: z.string(),
  floor_ind: z.number().int().optional(),
  room_ind: z.number().int().optional(),
  status: z.number().int().optional(),
  type: z.number().int().optional(),
  partial: z.array(z.unknown()).optional()
});

type OpeningData = z.output<typeof openingSchema>;

function statusName(status: OpeningStatus): string {
  const entry = Object.entries(OpeningStatus).find(([, value]) => value === status);
  return entry ? entry[0] : String(status);
}

/** Shutters and other motorised openings; each direction has its own actuator. */
export class Opening {
  private readonly data: OpeningData;

  constructor(
    raw: unknown,
    private readonly sender: CommandSender,
    private readonly logger: Logger
  ) {
    this.data = parsePayload(openingSchema, raw, 'opening');
  }

  get name(): string {
    return this.data.name;
  }

  get openActId(): number {
    return this.data.open_act_id;
  }

  get closeActId(): number {
    return this.data.close_act_id;
  }

  get floorInd(): number | undefined {
    return this.data.floor_ind;
  }

  get roomInd(): number | undefined {
    return this.data.room_ind;
  }

  get status(): OpeningStatus {
    const raw = this.data.status;
    if (raw === OpeningStatus.STOPPED || raw === OpeningStatus.OPENING || raw === OpeningStatus.CLOSING) {
      return raw;
    }
    this.logger.warn({ status: raw, opening: this.name, actId: this.openActId }, 'Unknown opening status');
    return OpeningStatus.UNKNOWN;
  }

  get type(): OpeningType {
    const raw = this.data.type;
    if (raw === OpeningType.SHUTTER) {
      return raw;
    }
    this.logger.warn({ type: raw, opening: this.name, actId: this.openActId }, 'Unknown opening type');
    return OpeningType.UNKNOWN;
  }

  get partialPositions(): readonly unknown[] {
    return this.data.partial ?? [];
  }

  async setStatus(status: Exclude<OpeningStatus, typeof OpeningStatus.UNKNOWN>, options?: SendOptions): Promise<void> {
    const actId = status === OpeningStatus.CLOSING ? this.closeActId : this.openActId;
    this.logger.debug({ opening: this.name, actId, status: statusName(status) }, 'Moving opening');

    await this.sender.send(APP_COMMANDS.openingMove, { act_id: actId, wanted_status: status }, options);

    this.data.status = status;
    this.logger.info({ opening: this.name, actId: this.openActId, status: statusName(status) }, 'Opening moved');
  }
}
