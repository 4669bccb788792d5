import { CameDomoticClient, type CameDomoticClientOptions } from './client.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';

export { CameDomoticClient, withClient, type CameDomoticClientOptions } from './client.js';
export { loadConfig, type AppConfig } from './config.js';
export { createLogger, getDefaultLogger } from './logger.js';
export {
  CameDomoticError,
  asCameDomoticError,
  errorTraits,
  isCameDomoticError,
  type ErrorCode,
  type ErrorTraits
} from './errors.js';
export {
  ACK_ERROR_MESSAGES,
  DEFAULT_AUTH_ACK_CODES,
  classifyAck,
  getAckErrorMessage,
  type AckClass,
  type AckContext
} from './came/constants.js';
export { decodeAck, encodeEnvelope, type AckResult, type CommandEnvelope, type CommandPayload } from './came/codec.js';
export type { SendOptions } from './came/dispatcher.js';
export { HttpTransport, type CommandTransport, type PostOptions } from './came/transport.js';
export { Light, LightStatus, LightType } from './models/light.js';
export { Opening, OpeningStatus, OpeningType } from './models/opening.js';
export { Scenario } from './models/scenario.js';
export type { ServerInfo } from './models/serverInfo.js';
export type { StatusUpdate } from './models/updates.js';
export { updatesOfKind } from './models/updates.js';
export type { User } from './models/user.js';

/** Builds a client from `CAMEDOMOTIC_*` environment variables. */
export function createClientFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<CameDomoticClientOptions> = {}
): CameDomoticClient {
  const config = loadConfig(env);
  return new CameDomoticClient({
    host: config.host,
    username: config.username,
    password: config.password,
    timeoutMs: config.timeoutMs,
    sessionSafeZoneSec: config.sessionSafeZoneSec,
    authAckCodes: config.authAckCodes,
    logger: createLogger(config.logLevel),
    ...overrides
  });
}
