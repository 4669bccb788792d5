import type { Logger } from 'pino';

import { CameDomoticError, isCameDomoticError } from '../errors.js';
import { DEFAULT_TIMEOUT_MS, ENDPOINT_PATH, PROTOCOL_HEADERS } from './constants.js';

export interface PostOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/** Posts one encoded command and returns the raw response body. */
export interface CommandTransport {
  post(body: string, options?: PostOptions): Promise<string>;
  probe(options?: PostOptions): Promise<void>;
}

export interface HttpTransportOptions {
  host: string;
  timeoutMs?: number;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

export function buildEndpointUrl(host: string): URL {
  const trimmed = host.trim().replace(/\/+$/, '');
  if (!trimmed) {
    throw new Error('Controller host must not be empty');
  }
  const base = /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  try {
    const url = new URL(ENDPOINT_PATH, base);
    url.username = '';
    url.password = '';
    return url;
  } catch {
    throw new Error(`Invalid controller host: ${host}`);
  }
}

export function abortedError(signal: AbortSignal): CameDomoticError {
  return new CameDomoticError('ABORTED', 'Request abandoned by the caller', { cause: signal.reason });
}

/**
 * Lets one waiter stop waiting on a shared promise without cancelling it: the
 * underlying work keeps running for everyone else.
 */
export function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(abortedError(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(abortedError(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export class HttpTransport implements CommandTransport {
  private readonly fetchImpl: typeof fetch;
  private readonly endpoint: URL;

  constructor(private readonly options: HttpTransportOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.endpoint = buildEndpointUrl(options.host);
  }

  /**
   * Runs the request and `read` under one timeout and abort scope, so a
   * controller that stalls the body fails the same way as one that never answers.
   */
  private async executeFetch<T>(init: RequestInit, options: PostOptions, read: (response: Response) => Promise<T>): Promise<T> {
    if (options.signal?.aborted) {
      throw abortedError(options.signal);
    }

    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });

    const exchange = async (): Promise<T> =>
      read(await this.fetchImpl(this.endpoint, { ...init, signal: controller.signal }));

    try {
      return await untilAborted(exchange(), controller.signal);
    } catch (error) {
      if (options.signal?.aborted && !timedOut) {
        throw abortedError(options.signal);
      }
      if (timedOut) {
        throw new CameDomoticError('SERVER_UNREACHABLE', `Request to ${this.endpoint.host} timed out after ${timeoutMs}ms`, {
          cause: error
        });
      }
      if (isCameDomoticError(error)) {
        throw error;
      }
      throw new CameDomoticError('SERVER_UNREACHABLE', `Network failure reaching ${this.endpoint.host}`, { cause: error });
    } finally {
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private assertOk(response: Response, method: string): void {
    if (!response.ok) {
      throw new CameDomoticError(
        'SERVER_UNREACHABLE',
        `HTTP ${method} of ${this.endpoint.toString()} resulted in HTTP ${response.status} ${response.statusText}`,
        { statusCode: response.status }
      );
    }
  }

  post(body: string, options: PostOptions = {}): Promise<string> {
    const form = new URLSearchParams();
    form.set('command', body);

    return this.executeFetch(
      {
        method: 'POST',
        headers: { ...PROTOCOL_HEADERS },
        body: form.toString()
      },
      options,
      async (response) => {
        this.assertOk(response, 'POST');
        return response.text();
      }
    );
  }

  async probe(options: PostOptions = {}): Promise<void> {
    this.options.logger.debug({ url: this.endpoint.toString() }, 'Probing controller endpoint');
    await this.executeFetch({ method: 'GET' }, options, async (response) => {
      this.assertOk(response, 'GET');
    });
  }
}
