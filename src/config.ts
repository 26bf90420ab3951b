import { z } from 'zod/v4';

import { OpenDtuError } from './errors.js';

export interface AppConfig {
  readonly opendtuBaseUrl: string;
  readonly opendtuUser: string;
  readonly opendtuPassword: string;
  readonly requestTimeoutMs: number;
  readonly readRetries: number;
  readonly readRetryBackoffMs: number;
  readonly enforceMaxPower: boolean;
  readonly persistentWriteWindowSec: number;
  readonly persistentWriteAdvisoryThreshold: number;

  readonly logLevel: string;
  readonly logPretty: boolean;

  readonly auditMaxEntries: number;
}

const envSchema = z.object({
  OPENDTU_HOST: z.string().optional(),
  OPENDTU_USER: z.string().optional(),
  OPENDTU_PASSWORD: z.string().optional(),
  OPENDTU_TIMEOUT_MS: z.string().optional(),
  OPENDTU_READ_RETRIES: z.string().optional(),
  OPENDTU_READ_RETRY_BACKOFF_MS: z.string().optional(),
  OPENDTU_ENFORCE_MAX_POWER: z.string().optional(),
  OPENDTU_PERSISTENT_WRITE_WINDOW_SEC: z.string().optional(),
  OPENDTU_PERSISTENT_WRITE_ADVISORY_THRESHOLD: z.string().optional(),

  MCP_LOG_LEVEL: z.string().optional(),
  MCP_LOG_PRETTY: z.string().optional(),

  MCP_AUDIT_MAX_ENTRIES: z.string().optional()
});

export type ConfigEnv = Record<string, string | undefined>;

function normalizeBaseUrl(raw: string | undefined): string {
  const trimmed = raw?.trim().replace(/\/+$/, '');
  if (!trimmed) {
    throw new OpenDtuError(
      'ConfigurationError',
      'OPENDTU_HOST is not set. Set it to the IP address or hostname of the OpenDTU appliance (e.g. 192.168.1.100).'
    );
  }

  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
  try {
    const parsed = new URL(withScheme);
    // Credentials come from OPENDTU_USER / OPENDTU_PASSWORD only.
    parsed.username = '';
    parsed.password = '';
    return parsed.toString().replace(/\/+$/, '');
  } catch (error) {
    throw new OpenDtuError('ConfigurationError', `Invalid OPENDTU_HOST: ${raw}`, { cause: error });
  }
}

function parseBoolean(raw: string | undefined, defaultValue: boolean): boolean {
  if (raw === undefined) {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

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

export function loadConfig(env: ConfigEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return Object.freeze({
    opendtuBaseUrl: normalizeBaseUrl(parsed.OPENDTU_HOST),
    opendtuUser: parsed.OPENDTU_USER?.trim() || 'admin',
    opendtuPassword: parsed.OPENDTU_PASSWORD || 'openDTU42',
    requestTimeoutMs: parseNumber(parsed.OPENDTU_TIMEOUT_MS, 5_000, 500, 30_000),
    readRetries: parseNumber(parsed.OPENDTU_READ_RETRIES, 1, 0, 1),
    readRetryBackoffMs: parseNumber(parsed.OPENDTU_READ_RETRY_BACKOFF_MS, 250, 10, 5_000),
    enforceMaxPower: parseBoolean(parsed.OPENDTU_ENFORCE_MAX_POWER, false),
    persistentWriteWindowSec: parseNumber(parsed.OPENDTU_PERSISTENT_WRITE_WINDOW_SEC, 86_400, 60, 30 * 86_400),
    persistentWriteAdvisoryThreshold: parseNumber(parsed.OPENDTU_PERSISTENT_WRITE_ADVISORY_THRESHOLD, 3, 1, 1_000),

    logLevel: parsed.MCP_LOG_LEVEL?.trim() || 'info',
    logPretty: parseBoolean(parsed.MCP_LOG_PRETTY, false),

    auditMaxEntries: parseNumber(parsed.MCP_AUDIT_MAX_ENTRIES, 1_000, 10, 100_000)
  });
}
