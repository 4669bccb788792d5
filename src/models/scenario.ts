import { z } from 'zod/v4';

import type { SendOptions } from '../came/dispatcher.js';
import { APP_COMMANDS } from '../came/constants.js';
import type { CommandSender } from './sender.js';
import { parsePayload } from './parse.js';

const scenarioSchema = z.looseObject({
  id: z.number().int(),
  name: z.string(),
  status: z.number().int().optional(),
  scenario_status: z.number().int().optional(),
  icon_id: z.number().int().optional(),
  'user-defined': z.number().int().optional()
});

type ScenarioData = z.output<typeof scenarioSchema>;

export class Scenario {
  private readonly data: ScenarioData;

  constructor(
    raw: unknown,
    private readonly sender: CommandSender
  ) {
    this.data = parsePayload(scenarioSchema, raw, 'scenario');
  }

  get id(): number {
    return this.data.id;
  }

  get name(): string {
    return this.data.name;
  }

  get status(): number {
    return this.data.scenario_status ?? this.data.status ?? 0;
  }

  get userDefined(): boolean {
    return this.data['user-defined'] === 1;
  }

  async activate(options?: SendOptions): Promise<void> {
    await this.sender.send(APP_COMMANDS.scenarioActivation, { id: this.id }, options);
  }
}
