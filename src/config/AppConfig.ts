import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../core/Errors';
import { formatIssues } from '../topics/Schemas';

export interface AppConfig {
  engineBaseUrl: string;
  engineApiKey: string | null;
  topicsDir: string;
  maxWorkers: number;
  perTopicLimit: number;
  /** Zero or negative disables the per-requester cap. */
  perRequesterPending: number;
  eventTimeoutMs: number;
  runTimeoutMs: number;
  logLevel: LogLevel;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const intVar = (fallback: number, min?: number) => {
  const base = z.coerce.number().int();
  return z.preprocess(blankToUndefined, (min === undefined ? base : base.min(min)).default(fallback));
};

const EnvSchema = z.object({
  ENGINE_BASE_URL: z.string().trim().url(),
  ENGINE_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  TOPICS_DIR: z.preprocess(blankToUndefined, z.string().default('./topics')),
  LIMITS_MAX_WORKERS: intVar(2, 1),
  LIMITS_PER_TOPIC: intVar(1, 1),
  LIMITS_PER_USER_PENDING: intVar(3),
  /** Seconds. */
  TIMEOUT_WS: intVar(120, 1),
  TIMEOUT_RUN: intVar(300, 1),
  LOG_LEVEL: z.preprocess(
    (v) => (typeof v === 'string' ? blankToUndefined(v.toLowerCase()) : v),
    z.enum(LOG_LEVELS).default('info'),
  ),
});

/** Load `.env` into process.env. Variables already set are left alone. */
export function loadDotenv(path?: string): void {
  dotenv.config(path ? { path } : {});
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;
  return {
    engineBaseUrl: e.ENGINE_BASE_URL.replace(/\/+$/, ''),
    engineApiKey: e.ENGINE_API_KEY ?? null,
    topicsDir: e.TOPICS_DIR,
    maxWorkers: e.LIMITS_MAX_WORKERS,
    perTopicLimit: e.LIMITS_PER_TOPIC,
    perRequesterPending: e.LIMITS_PER_USER_PENDING,
    eventTimeoutMs: e.TIMEOUT_WS * 1000,
    runTimeoutMs: e.TIMEOUT_RUN * 1000,
    logLevel: e.LOG_LEVEL,
  };
}
