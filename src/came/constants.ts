export const ENDPOINT_PATH = '/domo/';

export const PROTOCOL_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'application/x-www-form-urlencoded',
  Connection: 'Keep-Alive',
  Accept: 'application/json,text/plain,*/*'
};

export const ACK_SUCCESS = 0;

export const ACK_ERROR_MESSAGES: Readonly<Record<number, string>> = {
  1: 'Invalid user.',
  3: 'Too many sessions during login.',
  4: 'Error occurred in JSON Syntax.',
  5: 'No session layer command tag.',
  6: 'Unrecognized session layer command.',
  7: 'No client ID in request.',
  8: 'Wrong client ID in request.',
  9: 'Wrong application command.',
  10: 'No reply to application command, maybe service down.',
  11: 'Wrong application data.'
};

/**
 * Ack codes the controller reserves for authentication problems. The same
 * values mean "bad credentials" during login and "session expired" on any
 * other command. Controller-specific; clients can override them.
 */
export const DEFAULT_AUTH_ACK_CODES: readonly number[] = [1, 3];

/** Seconds subtracted from the controller's keep-alive timeout before a session counts as expired. */
export const DEFAULT_SESSION_SAFE_ZONE_SEC = 30;

export const DEFAULT_TIMEOUT_MS = 10_000;

export const SESSION_COMMANDS = {
  login: 'sl_registration_req',
  logout: 'sl_logout_req',
  keepAlive: 'sl_keep_alive_req',
  usersList: 'sl_users_list_req'
} as const;

export const APP_COMMANDS = {
  featureList: 'feature_list_req',
  statusUpdate: 'status_update_req',
  lightList: 'light_list_req',
  lightSwitch: 'light_switch_req',
  openingsList: 'openings_list_req',
  openingMove: 'opening_move_req',
  scenariosList: 'scenarios_list_req',
  scenarioActivation: 'scenario_activation_req'
} as const;

export type AckContext = 'login' | 'command';

export type AckClass = 'success' | 'bad_credentials' | 'session_expired' | 'server_error';

export function getAckErrorMessage(ackCode: number): string {
  return ACK_ERROR_MESSAGES[ackCode] ?? `Unknown error code: ${ackCode}`;
}

export function isSessionCommand(command: string): boolean {
  return command.startsWith('sl_');
}

export function classifyAck(
  ackCode: number,
  context: AckContext,
  authCodes: readonly number[] = DEFAULT_AUTH_ACK_CODES
): AckClass {
  if (ackCode === ACK_SUCCESS) {
    return 'success';
  }
  if (authCodes.includes(ackCode)) {
    return context === 'login' ? 'bad_credentials' : 'session_expired';
  }
  return 'server_error';
}
