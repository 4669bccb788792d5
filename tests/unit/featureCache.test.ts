import { describe, expect, test } from 'vitest';

import { CameDomoticClient, withClient } from '../../src/client.js';
import { CameDomoticError } from '../../src/errors.js';
import {
  ack,
  asLogger,
  deferred,
  FakeController,
  flushMicrotasks,
  loginAck,
  makeLogger,
  sequentialLogins,
  type Handler
} from '../helpers/fakeController.js';

const FEATURE_LIST = {
  cmd_name: 'feature_list_resp',
  cseq: 1,
  keycode: '0000FFFF9999AAAA',
  swver: '1.2.3',
  type: '0',
  board: '3',
  serial: '0011ffee',
  list: ['lights', 'openings', 'scenarios']
};

function makeClient(handler: Handler) {
  const controller = new FakeController(handler);
  const client = new CameDomoticClient({
    host: 'controller.test',
    username: 'user',
    password: 'test-secret',
    transport: controller,
    logger: asLogger(makeLogger())
  });
  return { client, controller };
}

function controllerHandler(options: { expireOnce?: { value: boolean }; logoutFails?: boolean } = {}): Handler {
  const nextLogin = sequentialLogins();
  return (_request, name) => {
    switch (name) {
      case 'sl_registration_req':
        return nextLogin();
      case 'sl_logout_req':
        return options.logoutFails ? new CameDomoticError('SERVER_UNREACHABLE', 'connection reset') : ack(0);
      case 'feature_list_req':
        return ack(0, FEATURE_LIST);
      default:
        if (options.expireOnce?.value) {
          options.expireOnce.value = false;
          return ack(1);
        }
        return ack(0);
    }
  };
}

describe('FeatureCache', () => {
  test('discovers features once per session', async () => {
    const { client, controller } = makeClient(controllerHandler());

    const first = await client.getFeatures();
    const second = await client.getFeatures();

    expect(first).toEqual(['lights', 'openings', 'scenarios']);
    expect(second).toBe(first);
    expect(controller.count('feature_list_req')).toBe(1);
  });

  test('records the controller keycode and server details', async () => {
    const { client } = makeClient(controllerHandler());

    await expect(client.getServerInfo()).resolves.toEqual({
      keycode: '0000FFFF9999AAAA',
      serial: '0011ffee',
      features: ['lights', 'openings', 'scenarios'],
      swver: '1.2.3',
      type: '0',
      board: '3'
    });
    expect(client.keycode).toBe('0000FFFF9999AAAA');
  });

  test('coalesces concurrent discoveries', async () => {
    const { client, controller } = makeClient(controllerHandler());

    await Promise.all([client.getFeatures(), client.getFeatures(), client.getServerInfo()]);
    expect(controller.count('feature_list_req')).toBe(1);
  });

  test('rediscovers exactly once after a forced re-login', async () => {
    const expireOnce = { value: false };
    const { client, controller } = makeClient(controllerHandler({ expireOnce }));

    await client.getFeatures();
    expireOnce.value = true;
    await client.send('status_update_req');
    expect(controller.count('sl_registration_req')).toBe(2);

    await client.getFeatures();
    await client.getFeatures();
    expect(controller.count('feature_list_req')).toBe(2);
  });

  test('rediscovers after close and a new session', async () => {
    const { client, controller } = makeClient(controllerHandler());

    await client.getFeatures();
    await client.close();
    await client.getFeatures();

    expect(controller.count('feature_list_req')).toBe(2);
    expect(controller.count('sl_registration_req')).toBe(2);
  });

  test('rejects a malformed feature list as a protocol error', async () => {
    const { client } = makeClient((_request, name) =>
      name === 'sl_registration_req' ? loginAck() : ack(0, { cmd_name: 'feature_list_resp', list: ['lights'] })
    );

    await expect(client.getFeatures()).rejects.toMatchObject({
      code: 'PROTOCOL',
      message: 'Unexpected feature_list_resp payload (keycode, serial)'
    });
  });
});

describe('client lifecycle', () => {
  test('close logs out and leaves the session invalid', async () => {
    const { client, controller } = makeClient(controllerHandler());

    await client.send('status_update_req');
    await client.close();

    expect(controller.count('sl_logout_req')).toBe(1);
    expect(client.isSessionValid()).toBe(false);
  });

  test('close clears the session even when logout cannot reach the controller', async () => {
    const { client, controller } = makeClient(controllerHandler({ logoutFails: true }));

    await client.send('status_update_req');
    await expect(client.close()).resolves.toBeUndefined();

    expect(controller.count('sl_logout_req')).toBe(1);
    expect(client.isSessionValid()).toBe(false);
  });

  test('close without a session sends nothing', async () => {
    const { client, controller } = makeClient(controllerHandler());

    await client.close();
    await client.close();
    expect(controller.requests).toHaveLength(0);
  });

  test('close during a pending login logs that session out and drops the queued command', async () => {
    const gate = deferred<void>();
    const nextLogin = sequentialLogins();
    const { client, controller } = makeClient(async (_request, name) => {
      if (name === 'sl_registration_req') {
        await gate.promise;
        return nextLogin();
      }
      return ack(0);
    });

    const queued = client.send('status_update_req').catch((error: unknown) => error);
    await flushMicrotasks();
    const closing = client.close();
    gate.resolve();
    await closing;

    await expect(queued).resolves.toMatchObject({ code: 'ABORTED' });
    expect(controller.named('sl_logout_req')).toEqual([{ sl_client_id: 'session-1', sl_cmd: 'sl_logout_req' }]);
    expect(controller.count('status_update_req')).toBe(0);
    expect(client.isSessionValid()).toBe(false);

    await client.send('status_update_req');
    expect(controller.named('status_update_req')[0]?.sl_client_id).toBe('session-2');
  });

  test('withClient closes the client when the callback throws', async () => {
    const controller = new FakeController(controllerHandler());
    const options = {
      host: 'controller.test',
      username: 'user',
      password: 'test-secret',
      transport: controller,
      logger: asLogger(makeLogger())
    };

    const seen: { client?: CameDomoticClient } = {};
    await expect(
      withClient(options, async (client) => {
        seen.client = client;
        await client.send('status_update_req');
        throw new Error('caller failure');
      })
    ).rejects.toThrow('caller failure');

    expect(controller.count('sl_logout_req')).toBe(1);
    expect(seen.client?.isSessionValid()).toBe(false);
  });

  test('keepAlive logs in without a session and pings with one', async () => {
    const { client, controller } = makeClient(controllerHandler());

    await client.keepAlive();
    await client.keepAlive();

    expect(controller.count('sl_registration_req')).toBe(1);
    expect(controller.named('sl_keep_alive_req')).toEqual([{ sl_client_id: 'session-1', sl_cmd: 'sl_keep_alive_req' }]);
  });

  test('validateHost probes the transport without logging in', async () => {
    const { client, controller } = makeClient(controllerHandler());

    await client.validateHost();
    expect(controller.probes).toBe(1);
    expect(controller.requests).toHaveLength(0);
  });
});
