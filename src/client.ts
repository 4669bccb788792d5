import type { Logger } from 'pino';

import { CommandChannel } from './came/channel.js';
import type { CommandPayload } from './came/codec.js';
import { APP_COMMANDS, SESSION_COMMANDS } from './came/constants.js';
import { CommandDispatcher, type SendOptions } from './came/dispatcher.js';
import { FeatureCache } from './came/featureCache.js';
import { AuthSession } from './came/session.js';
import { HttpTransport, type CommandTransport } from './came/transport.js';
import { getDefaultLogger } from './logger.js';
import { Light } from './models/light.js';
import { Opening } from './models/opening.js';
import { listItems } from './models/parse.js';
import { Scenario } from './models/scenario.js';
import type { ServerInfo } from './models/serverInfo.js';
import { parseUpdates, type StatusUpdate } from './models/updates.js';
import { parseUsers, type User } from './models/user.js';

export interface CameDomoticClientOptions {
  host: string;
  username: string;
  password: string;
  timeoutMs?: number;
  sessionSafeZoneSec?: number;
  /** Ack codes reserved for authentication failures on this controller model. */
  authAckCodes?: readonly number[];
  logger?: Logger;
  fetchImpl?: typeof fetch;
  /** Replaces the HTTP transport entirely; `fetchImpl` is then unused. */
  transport?: CommandTransport;
  now?: () => number;
}

const PLANT_SCOPE = { topologic_scope: 'plant', value: 0 } as const;

/**
 * Client for one CAME Domotic controller. Constructing or opening it does no
 * network I/O; the first command logs in.
 */
export class CameDomoticClient {
  private readonly logger: Logger;
  private readonly transport: CommandTransport;
  private readonly channel: CommandChannel;
  private readonly auth: AuthSession;
  private readonly dispatcher: CommandDispatcher;
  private readonly features: FeatureCache;

  constructor(options: CameDomoticClientOptions) {
    this.logger = options.logger ?? getDefaultLogger();
    this.transport =
      options.transport ??
      new HttpTransport({
        host: options.host,
        timeoutMs: options.timeoutMs,
        logger: this.logger,
        fetchImpl: options.fetchImpl
      });
    this.channel = new CommandChannel(this.transport, this.logger);
    this.auth = new AuthSession({
      credentials: { host: options.host, username: options.username, password: options.password },
      channel: this.channel,
      logger: this.logger,
      authAckCodes: options.authAckCodes,
      safeZoneSec: options.sessionSafeZoneSec,
      timeoutMs: options.timeoutMs,
      now: options.now
    });
    this.dispatcher = new CommandDispatcher({
      channel: this.channel,
      auth: this.auth,
      logger: this.logger,
      authAckCodes: options.authAckCodes,
      timeoutMs: options.timeoutMs
    });
    this.features = new FeatureCache(this.dispatcher, this.auth, this.logger);
  }

  /** Kept for symmetry with `close()`; the session is established lazily. */
  async open(): Promise<this> {
    return this;
  }

  async close(): Promise<void> {
    try {
      await this.auth.logout();
    } finally {
      this.features.clear();
    }
  }

  isSessionValid(): boolean {
    return this.auth.isValid();
  }

  /** Last sequence number sent to the controller. */
  get sequence(): number {
    return this.channel.sequence;
  }

  get keycode(): string | null {
    return this.auth.keycode;
  }

  send(command: string, payload: CommandPayload = {}, options?: SendOptions): Promise<Record<string, unknown>> {
    return this.dispatcher.send(command, payload, options);
  }

  getFeatures(options?: SendOptions): Promise<readonly string[]> {
    return this.features.getFeatures(options);
  }

  getServerInfo(options?: SendOptions): Promise<ServerInfo> {
    return this.features.getServerInfo(options);
  }

  /** Checks that the host answers on the controller endpoint; sends no command. */
  validateHost(options?: SendOptions): Promise<void> {
    return this.transport.probe(options);
  }

  /** Refreshes the session when it is still valid, logs in otherwise. */
  async keepAlive(options?: SendOptions): Promise<void> {
    if (this.auth.isValid()) {
      await this.dispatcher.send(SESSION_COMMANDS.keepAlive, {}, options);
      return;
    }
    await this.auth.login();
  }

  async getUsers(options?: SendOptions): Promise<User[]> {
    const payload = await this.dispatcher.send(SESSION_COMMANDS.usersList, {}, options);
    return parseUsers(payload);
  }

  async getLights(options?: SendOptions): Promise<Light[]> {
    const payload = await this.dispatcher.send(APP_COMMANDS.lightList, { ...PLANT_SCOPE }, options);
    return listItems(payload, 'light_list_resp').map((raw) => new Light(raw, this.dispatcher, this.logger));
  }

  async getOpenings(options?: SendOptions): Promise<Opening[]> {
    const payload = await this.dispatcher.send(APP_COMMANDS.openingsList, { ...PLANT_SCOPE }, options);
    return listItems(payload, 'openings_list_resp').map((raw) => new Opening(raw, this.dispatcher, this.logger));
  }

  async getScenarios(options?: SendOptions): Promise<Scenario[]> {
    const payload = await this.dispatcher.send(APP_COMMANDS.scenariosList, {}, options);
    return listItems(payload, 'scenarios_list_resp').map((raw) => new Scenario(raw, this.dispatcher));
  }

  async getUpdates(options?: SendOptions): Promise<StatusUpdate[]> {
    const payload = await this.dispatcher.send(APP_COMMANDS.statusUpdate, {}, options);
    return parseUpdates(payload);
  }
}

/** Runs `fn` with an open client and always closes it, whatever `fn` does. */
export async function withClient<T>(
  options: CameDomoticClientOptions,
  fn: (client: CameDomoticClient) => Promise<T>
): Promise<T> {
  const client = await new CameDomoticClient(options).open();
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
