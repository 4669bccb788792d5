import type { SendOptions } from '../came/dispatcher.js';
import type { CommandPayload } from '../came/codec.js';

/** What entity models need from the dispatcher. */
export interface CommandSender {
  send(command: string, payload?: CommandPayload, options?: SendOptions): Promise<Record<string, unknown>>;
}
