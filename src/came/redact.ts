const SENSITIVE_LOG_KEYS = new Set(['sl_login', 'sl_pwd', 'sl_client_id', 'client', 'password', 'token', 'authorization', 'secret']);

// Envelopes nest two levels deep; anything past this is cut.
const MAX_LOG_DEPTH = 4;

/** Copy of `value` with credentials and session ids replaced, for debug logs. */
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (!value || typeof value !== 'object') {
    return value;
  }
  if (depth >= MAX_LOG_DEPTH) {
    return '[TRUNCATED]';
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeForLog(item, depth + 1));
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, nested]) => [
      key,
      SENSITIVE_LOG_KEYS.has(key.toLowerCase()) ? '[REDACTED]' : sanitizeForLog(nested, depth + 1)
    ])
  );
}
