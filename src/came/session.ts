import type { Logger } from 'pino';
import { z } from 'zod/v4';

import { CameDomoticError, formatAckError } from '../errors.js';
import type { CommandChannel } from './channel.js';
import {
  classifyAck,
  DEFAULT_AUTH_ACK_CODES,
  DEFAULT_SESSION_SAFE_ZONE_SEC,
  SESSION_COMMANDS
} from './constants.js';

export interface Credentials {
  readonly host: string;
  readonly username: string;
  readonly password: string;
}

export interface SessionState {
  token: string | null;
  keycode: string | null;
  valid: boolean;
  /** Monotonic deadline in ms; `Infinity` when the controller reports no keep-alive timeout. */
  expiresAt: number;
  keepAliveTimeoutSec: number;
}

export interface AuthSessionOptions {
  credentials: Credentials;
  channel: CommandChannel;
  logger: Logger;
  authAckCodes?: readonly number[];
  safeZoneSec?: number;
  timeoutMs?: number;
  now?: () => number;
}

const loginAckSchema = z.looseObject({
  sl_client_id: z.string().min(1),
  sl_keep_alive_timeout_sec: z.number().optional(),
  keycode: z.string().optional()
});

function emptySessionState(): SessionState {
  return {
    token: null,
    keycode: null,
    valid: false,
    expiresAt: 0,
    keepAliveTimeoutSec: 0
  };
}

/**
 * Owns the controller session. Every state change goes through here, and at
 * most one login handshake runs at a time: concurrent callers that find the
 * session invalid all wait on the same pending login.
 */
export class AuthSession {
  private state: SessionState = emptySessionState();
  private pendingLogin: Promise<string> | null = null;
  // Bumped by logout; a login that started before it is discarded on completion.
  private logoutGeneration = 0;
  private sessionEpoch = 0;
  private readonly now: () => number;
  private readonly authAckCodes: readonly number[];
  private readonly safeZoneSec: number;

  constructor(private readonly options: AuthSessionOptions) {
    this.now = options.now ?? (() => performance.now());
    this.authAckCodes = options.authAckCodes ?? DEFAULT_AUTH_ACK_CODES;
    this.safeZoneSec = options.safeZoneSec ?? DEFAULT_SESSION_SAFE_ZONE_SEC;
  }

  get host(): string {
    return this.options.credentials.host;
  }

  get username(): string {
    return this.options.credentials.username;
  }

  /** Increments on every successful login; cached session data is keyed on it. */
  get epoch(): number {
    return this.sessionEpoch;
  }

  get keycode(): string | null {
    return this.state.keycode;
  }

  get loginInFlight(): boolean {
    return this.pendingLogin !== null;
  }

  snapshot(): Readonly<SessionState> {
    return { ...this.state };
  }

  isValid(): boolean {
    return this.state.valid && this.state.token !== null && this.now() < this.state.expiresAt;
  }

  async acquireToken(): Promise<string> {
    if (this.isValid() && this.state.token) {
      return this.state.token;
    }
    return this.login();
  }

  login(): Promise<string> {
    if (!this.pendingLogin) {
      this.pendingLogin = this.performLogin().finally(() => {
        this.pendingLogin = null;
      });
    }
    return this.pendingLogin;
  }

  /**
   * Called after a command using `staleToken` came back with a session-expired
   * ack. If another caller already replaced that token, the fresh session is
   * reused instead of logging in again.
   */
  async renew(staleToken: string): Promise<string> {
    this.invalidate(staleToken);
    return this.acquireToken();
  }

  invalidate(token?: string): void {
    if (token !== undefined && this.state.token !== token) {
      return;
    }
    if (this.state.valid) {
      this.options.logger.info({ host: this.host }, 'Session invalidated');
    }
    this.state.valid = false;
    this.state.token = null;
    this.state.expiresAt = 0;
  }

  /** Pushes the expiry forward after the controller accepted a command on `token`. */
  touch(token: string): void {
    if (this.state.token !== token || !this.state.valid) {
      return;
    }
    this.state.expiresAt = this.computeExpiry(this.state.keepAliveTimeoutSec);
  }

  recordKeycode(keycode: string): void {
    this.state.keycode = keycode;
  }

  /**
   * Best effort: a login still in flight is allowed to finish and is then
   * logged out by its own handshake, so nothing it produced outlives the call.
   */
  async logout(): Promise<void> {
    this.logoutGeneration += 1;
    if (this.pendingLogin) {
      await Promise.allSettled([this.pendingLogin]);
    }

    const token = this.state.token;
    try {
      if (token && this.isValid()) {
        await this.sendLogout(token);
      }
    } finally {
      this.invalidate();
      this.state.keycode = null;
    }
  }

  private async sendLogout(token: string): Promise<void> {
    try {
      const ack = await this.options.channel.exchange(SESSION_COMMANDS.logout, {}, {
        token,
        timeoutMs: this.options.timeoutMs
      });
      if (classifyAck(ack.code, 'command', this.authAckCodes) !== 'success') {
        this.options.logger.warn({ host: this.host, ackCode: ack.code }, 'Logout not acknowledged by the controller');
      }
    } catch (error) {
      this.options.logger.warn({ host: this.host, err: error }, 'Logout request failed; clearing local session anyway');
    }
  }

  private computeExpiry(keepAliveTimeoutSec: number): number {
    if (keepAliveTimeoutSec <= 0) {
      return Number.POSITIVE_INFINITY;
    }
    return this.now() + Math.max(0, keepAliveTimeoutSec - this.safeZoneSec) * 1000;
  }

  private async performLogin(): Promise<string> {
    const { credentials, logger } = this.options;
    const generation = this.logoutGeneration;
    this.invalidate();
    logger.debug({ host: credentials.host, user: credentials.username }, 'Logging in');

    const ack = await this.options.channel.exchange(
      SESSION_COMMANDS.login,
      { sl_login: credentials.username, sl_pwd: credentials.password },
      { token: null, timeoutMs: this.options.timeoutMs }
    );

    switch (classifyAck(ack.code, 'login', this.authAckCodes)) {
      case 'bad_credentials':
        throw new CameDomoticError('AUTH', ack.code === 1 ? 'Bad credentials.' : `Authentication failed (${ack.message})`, {
          ackCode: ack.code
        });
      case 'server_error':
        throw new CameDomoticError('SERVER_COMMAND', formatAckError(ack.code, ack.message), {
          ackCode: ack.code,
          details: { command: SESSION_COMMANDS.login }
        });
      default:
        break;
    }

    const parsed = loginAckSchema.safeParse(ack.payload);
    if (!parsed.success) {
      throw new CameDomoticError('PROTOCOL', 'Login acknowledged without a client id', { cause: parsed.error });
    }

    if (generation !== this.logoutGeneration) {
      await this.sendLogout(parsed.data.sl_client_id);
      throw new CameDomoticError('ABORTED', 'Session closed while the login was in flight');
    }

    const keepAliveTimeoutSec = parsed.data.sl_keep_alive_timeout_sec ?? 0;
    this.state = {
      token: parsed.data.sl_client_id,
      keycode: parsed.data.keycode ?? this.state.keycode,
      valid: true,
      keepAliveTimeoutSec,
      expiresAt: this.computeExpiry(keepAliveTimeoutSec)
    };
    this.sessionEpoch += 1;

    logger.info({ host: credentials.host, user: credentials.username, keepAliveTimeoutSec }, 'Logged in');
    return parsed.data.sl_client_id;
  }
}
