import type { Logger } from 'pino';

import { parseServerInfo, type ServerInfo } from '../models/serverInfo.js';
import { APP_COMMANDS } from './constants.js';
import type { CommandDispatcher, SendOptions } from './dispatcher.js';
import type { AuthSession } from './session.js';
import { untilAborted } from './transport.js';

interface CachedServerInfo {
  epoch: number;
  info: ServerInfo;
}

/**
 * Discovers the controller's feature blocks once per session. A new login
 * (new epoch) or an invalid session means the next call asks the controller
 * again.
 */
export class FeatureCache {
  private cached: CachedServerInfo | null = null;
  private pending: Promise<ServerInfo> | null = null;

  constructor(
    private readonly dispatcher: CommandDispatcher,
    private readonly auth: AuthSession,
    private readonly logger: Logger
  ) {}

  private isFresh(cached: CachedServerInfo | null): cached is CachedServerInfo {
    return cached !== null && cached.epoch === this.auth.epoch && this.auth.isValid();
  }

  async getServerInfo(options: SendOptions = {}): Promise<ServerInfo> {
    if (this.isFresh(this.cached)) {
      return this.cached.info;
    }
    if (!this.pending) {
      this.cached = null;
      this.pending = this.discover(options).finally(() => {
        this.pending = null;
      });
    }
    return untilAborted(this.pending, options.signal);
  }

  async getFeatures(options: SendOptions = {}): Promise<readonly string[]> {
    const info = await this.getServerInfo(options);
    return info.features;
  }

  clear(): void {
    this.cached = null;
  }

  private async discover(options: SendOptions): Promise<ServerInfo> {
    const payload = await this.dispatcher.send(APP_COMMANDS.featureList, {}, { timeoutMs: options.timeoutMs });
    const info = parseServerInfo(payload);
    this.auth.recordKeycode(info.keycode);
    this.cached = { epoch: this.auth.epoch, info };
    this.logger.debug({ features: info.features, keycode: info.keycode }, 'Discovered controller features');
    return info;
  }
}
