import { z } from 'zod/v4';

import { DEFAULT_AUTH_ACK_CODES, DEFAULT_SESSION_SAFE_ZONE_SEC, DEFAULT_TIMEOUT_MS } from './came/constants.js';

export interface AppConfig {
  host: string;
  username: string;
  password: string;
  timeoutMs: number;
  sessionSafeZoneSec: number;
  authAckCodes: number[];
  logLevel: string;
}

const envSchema = z.object({
  CAMEDOMOTIC_HOST: z.string().optional(),
  CAMEDOMOTIC_USERNAME: z.string().optional(),
  CAMEDOMOTIC_PASSWORD: z.string().optional(),
  CAMEDOMOTIC_TIMEOUT_MS: z.string().optional(),
  CAMEDOMOTIC_SESSION_SAFE_ZONE_SEC: z.string().optional(),
  CAMEDOMOTIC_AUTH_ACK_CODES: z.string().optional(),
  CAMEDOMOTIC_LOG_LEVEL: z.string().optional()
});

function parseNumber(raw: string | undefined, defaultValue: number, min: number, max: number): number {
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const n = Number(raw);
  if (!Number.isFinite(n)) {
    return defaultValue;
  }
  return Math.min(max, Math.max(min, Math.floor(n)));
}

function parseCodeList(raw: string | undefined, defaultValue: readonly number[]): number[] {
  if (!raw || !raw.trim()) {
    return [...defaultValue];
  }

  const codes = raw
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean)
    .map(Number)
    .filter((value) => Number.isInteger(value) && value > 0);

  return codes.length ? [...new Set(codes)] : [...defaultValue];
}

function requireValue(raw: string | undefined, name: string): string {
  const trimmed = raw?.trim();
  if (!trimmed) {
    throw new Error(`Missing required environment variable ${name}`);
  }
  return trimmed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    host: requireValue(parsed.CAMEDOMOTIC_HOST, 'CAMEDOMOTIC_HOST'),
    username: requireValue(parsed.CAMEDOMOTIC_USERNAME, 'CAMEDOMOTIC_USERNAME'),
    // Passwords may legitimately contain leading or trailing spaces.
    password: parsed.CAMEDOMOTIC_PASSWORD || requireValue(undefined, 'CAMEDOMOTIC_PASSWORD'),
    timeoutMs: parseNumber(parsed.CAMEDOMOTIC_TIMEOUT_MS, DEFAULT_TIMEOUT_MS, 500, 120_000),
    sessionSafeZoneSec: parseNumber(parsed.CAMEDOMOTIC_SESSION_SAFE_ZONE_SEC, DEFAULT_SESSION_SAFE_ZONE_SEC, 0, 600),
    authAckCodes: parseCodeList(parsed.CAMEDOMOTIC_AUTH_ACK_CODES, DEFAULT_AUTH_ACK_CODES),
    logLevel: parsed.CAMEDOMOTIC_LOG_LEVEL?.trim() || 'warn'
  };
}
