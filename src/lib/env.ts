import os from 'node:os';
import path from 'node:path';

import { IANAZone } from 'luxon';
import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

const envSchema = z.object({
  CONFSCHED_DATA_DIR: z.string().min(1).optional(),
  CONFSCHED_EXPORT_DIR: z.string().min(1).optional(),
  CONFSCHED_RATINGS_FILE: z.string().min(1).optional(),
  CONFSCHED_SCHEDULE_URL: z
    .string()
    .url()
    .default('https://confoo.ca/en/2026/schedule'),
  CONFSCHED_TIMEZONE: z
    .string()
    .refine((zone) => IANAZone.isValidZone(zone), 'Unknown IANA timezone')
    .default('America/Toronto'),
  CONFSCHED_YEAR: z.coerce.number().int().min(2000).max(2100).optional(),
  CONFSCHED_SESSION_MINUTES: positiveInt.default(45),
  CONFSCHED_CONCURRENCY: positiveInt.max(16).default(4),
  CONFSCHED_MAX_ATTEMPTS: positiveInt.max(10).default(3),
  CONFSCHED_RETRY_BASE_MS: nonNegativeInt.default(500),
  CONFSCHED_REQUEST_DELAY_MS: nonNegativeInt.default(500),
  CONFSCHED_REQUEST_TIMEOUT_MS: positiveInt.default(15_000),
  CONFSCHED_USER_AGENT: z
    .string()
    .min(1)
    .default('confsched/0.1 (personal schedule tool)'),
  CONFSCHED_DEBUG: z.enum(['0', '1']).optional(),
});

export type Config = {
  dataDir: string;
  exportDir: string;
  ratingsFile: string;
  scheduleUrl: string;
  timezone: string;
  year: number | null;
  sessionMinutes: number;
  concurrency: number;
  maxAttempts: number;
  retryBaseMs: number;
  requestDelayMs: number;
  requestTimeoutMs: number;
  userAgent: string;
  debug: boolean;
};

type RawEnv = Record<string, string | undefined>;

function getRawEnv(env: RawEnv): RawEnv {
  const raw: RawEnv = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]?.trim();
    // blank variables count as unset
    raw[key] = value && value.length > 0 ? value : undefined;
  }
  return raw;
}

function expandHome(value: string): string {
  if (value === '~') return os.homedir();
  if (value.startsWith('~/')) return path.join(os.homedir(), value.slice(2));
  return path.resolve(value);
}

export function getConfig(env: RawEnv = process.env): Config {
  const parsed = envSchema.safeParse(getRawEnv(env));
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Missing/invalid environment variables: ${message}`);
  }

  const vars = parsed.data;
  const dataDir = expandHome(
    vars.CONFSCHED_DATA_DIR ??
      path.join(os.homedir(), '.local', 'share', 'confsched'),
  );

  return {
    dataDir,
    exportDir: expandHome(
      vars.CONFSCHED_EXPORT_DIR ?? path.join(os.homedir(), 'Downloads'),
    ),
    ratingsFile: expandHome(
      vars.CONFSCHED_RATINGS_FILE ??
        path.join(dataDir, 'speaker-ratings.json'),
    ),
    scheduleUrl: vars.CONFSCHED_SCHEDULE_URL,
    timezone: vars.CONFSCHED_TIMEZONE,
    year: vars.CONFSCHED_YEAR ?? null,
    sessionMinutes: vars.CONFSCHED_SESSION_MINUTES,
    concurrency: vars.CONFSCHED_CONCURRENCY,
    maxAttempts: vars.CONFSCHED_MAX_ATTEMPTS,
    retryBaseMs: vars.CONFSCHED_RETRY_BASE_MS,
    requestDelayMs: vars.CONFSCHED_REQUEST_DELAY_MS,
    requestTimeoutMs: vars.CONFSCHED_REQUEST_TIMEOUT_MS,
    userAgent: vars.CONFSCHED_USER_AGENT,
    debug: vars.CONFSCHED_DEBUG === '1',
  };
}
