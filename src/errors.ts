export type ErrorCode =
  | 'AUTH'
  | 'SERVER_UNREACHABLE'
  | 'SERVER_COMMAND'
  | 'PROTOCOL'
  | 'ENCODING'
  | 'ABORTED'
  | 'INTERNAL';

export interface ErrorTraits {
  retryable: boolean;
  fixHint: string;
}

const ERROR_TRAITS: Record<ErrorCode, ErrorTraits> = {
  AUTH: {
    retryable: false,
    fixHint: 'Verify the controller username and password, or free a session slot on the controller.'
  },
  SERVER_UNREACHABLE: {
    retryable: true,
    fixHint: 'Check that the controller host is reachable and exposes the /domo/ endpoint, then retry.'
  },
  SERVER_COMMAND: {
    retryable: false,
    fixHint: 'Inspect the ack code; the controller rejected the command or its data.'
  },
  PROTOCOL: {
    retryable: false,
    fixHint: 'The controller answered with an unexpected body; check the firmware version and the proxy in between.'
  },
  ENCODING: {
    retryable: false,
    fixHint: 'Pass only JSON-compatible values in the command payload.'
  },
  ABORTED: {
    retryable: true,
    fixHint: 'The caller abandoned the request; retry when needed.'
  },
  INTERNAL: {
    retryable: true,
    fixHint: 'Retry once; if it fails again, inspect the logs.'
  }
};

export function errorTraits(code: ErrorCode): ErrorTraits {
  const traits = ERROR_TRAITS[code] ?? ERROR_TRAITS.INTERNAL;
  return { retryable: traits.retryable, fixHint: traits.fixHint };
}

export class CameDomoticError extends Error {
  public readonly code: ErrorCode;
  public readonly ackCode?: number;
  public readonly statusCode?: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: unknown;
      ackCode?: number;
      statusCode?: number;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = 'CameDomoticError';
    this.code = code;
    this.ackCode = options?.ackCode;
    this.statusCode = options?.statusCode;
    this.details = options?.details;
  }
}

export function isCameDomoticError(value: unknown, code?: ErrorCode): value is CameDomoticError {
  return value instanceof CameDomoticError && (code === undefined || value.code === code);
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

export function asCameDomoticError(value: unknown): CameDomoticError {
  if (value instanceof CameDomoticError) {
    return value;
  }

  const err = ensureError(value);

  if (err.name === 'AbortError') {
    return new CameDomoticError('ABORTED', err.message, { cause: err });
  }

  return new CameDomoticError('INTERNAL', err.message, { cause: err });
}

/** Formats an ack code and its reason the way every command failure reports it. */
export function formatAckError(ackCode: number | string = 'N/A', reason = 'N/A'): string {
  return `Bad ack code: ${String(ackCode)} - Reason: ${String(reason)}`;
}
