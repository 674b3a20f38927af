/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting (port, DB, upstream endpoints, retry policy, chunking) goes
 * through this file; other modules import `config` instead of reading
 * process.env directly.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * ("5" → 5) at startup. Anything missing or invalid and the process exits
 * immediately with the validation tree printed. The result is a nested
 * `config` object exported `as const`.
 *
 * The retry and chunk-span numbers are upstream-specific tuning knobs, not
 * facts about the remote API: override them per deployment.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

const DEFAULT_ENDPOINT_URL = 'https://diavgeia.gov.gr/luminapi/api/search/export';

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  WEB_CONCURRENCY: z.coerce.number().default(1),

  /** Full PostgreSQL connection URL for the record cache. */
  DATABASE_URL: z.string().min(1).default('postgres://postgres:@localhost:5432/disclosures'),
  DB_SSL: z.stringbool().default(false),
  DB_POOL_MIN: z.coerce.number().default(2),
  DB_POOL_MAX: z.coerce.number().default(10),

  /** Primary JSON search endpoint. */
  PRIMARY_ENDPOINT_URL: z.url().default(DEFAULT_ENDPOINT_URL),
  PRIMARY_SAFE_SPAN_MONTHS: z.coerce.number().int().min(0).default(1),
  PRIMARY_SAFE_SPAN_DAYS: z.coerce.number().int().min(0).default(0),

  /** Fallback XML export endpoint. Empty string disables it. */
  FALLBACK_ENDPOINT_URL: z.union([z.url(), z.literal('')]).default(DEFAULT_ENDPOINT_URL),
  FALLBACK_SAFE_SPAN_MONTHS: z.coerce.number().int().min(0).default(0),
  FALLBACK_SAFE_SPAN_DAYS: z.coerce.number().int().min(0).default(7),

  HTTP_TIMEOUT_MS: z.coerce.number().min(1).default(60_000),
  HTTP_USER_AGENT: z.string().default('disclosure-ingest/1.0'),

  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(4),
  RETRY_BASE_DELAY_MS: z.coerce.number().min(0).default(700),
  RETRY_MULTIPLIER: z.coerce.number().min(1).default(2),
  RETRY_MAX_DELAY_MS: z.coerce.number().min(0).default(30_000),
  RETRY_JITTER_RATIO: z.coerce.number().min(0).max(1).default(0.25),
  /** Seed for backoff jitter; unset means a time-based seed per run. */
  RETRY_SEED: z.coerce.number().int().optional(),

  INGEST_PAGE_SIZE: z.coerce.number().int().min(1).max(1000).default(500),
  INGEST_MAX_PAGES_PER_CHUNK: z.coerce.number().int().min(1).default(10),
  INGEST_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(2),
  INGEST_DATE_FIELD: z
    .enum(['issueDate', 'submissionTimestamp', 'publishTimestamp'])
    .default('issueDate'),
  INGEST_OUTPUT_DIR: z.string().default('./output'),

  /** Per-decision metadata, fetched as `${METADATA_URL}/${ada}` when a run asks for enrichment. */
  METADATA_URL: z.url().default('https://diavgeia.gov.gr/opendata/decisions'),
  ENRICH_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(4),

  /** IANA zone the upstream renders local timestamps in; also used for month boundaries. */
  SOURCE_TIMEZONE: z.string().default('Europe/Athens'),

  /** Exception identifier the upstream embeds in every response while in maintenance. */
  MAINTENANCE_SIGNATURE: z.string().min(1).default('org.apache.solr.search.SyntaxError'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  database: {
    url: env.DATABASE_URL,
    ssl: env.DB_SSL,
    pool: {
      min: env.DB_POOL_MIN,
      max: env.DB_POOL_MAX,
    },
  },

  cluster: {
    workers: env.WEB_CONCURRENCY,
  },

  log: {
    level: env.LOG_LEVEL,
  },

  upstream: {
    primary: {
      url: env.PRIMARY_ENDPOINT_URL,
      safeSpan: { months: env.PRIMARY_SAFE_SPAN_MONTHS, days: env.PRIMARY_SAFE_SPAN_DAYS },
    },
    fallback: {
      url: env.FALLBACK_ENDPOINT_URL,
      safeSpan: { months: env.FALLBACK_SAFE_SPAN_MONTHS, days: env.FALLBACK_SAFE_SPAN_DAYS },
    },
    timeoutMs: env.HTTP_TIMEOUT_MS,
    userAgent: env.HTTP_USER_AGENT,
    maintenanceSignature: env.MAINTENANCE_SIGNATURE,
    timezone: env.SOURCE_TIMEZONE,
  },

  retry: {
    maxAttempts: env.RETRY_MAX_ATTEMPTS,
    baseDelayMs: env.RETRY_BASE_DELAY_MS,
    multiplier: env.RETRY_MULTIPLIER,
    maxDelayMs: env.RETRY_MAX_DELAY_MS,
    jitterRatio: env.RETRY_JITTER_RATIO,
    seed: env.RETRY_SEED,
  },

  ingest: {
    pageSize: env.INGEST_PAGE_SIZE,
    maxPagesPerChunk: env.INGEST_MAX_PAGES_PER_CHUNK,
    concurrency: env.INGEST_CONCURRENCY,
    dateField: env.INGEST_DATE_FIELD,
    outputDir: env.INGEST_OUTPUT_DIR,
  },

  enrichment: {
    metadataUrl: env.METADATA_URL,
    concurrency: env.ENRICH_CONCURRENCY,
  },
} as const;

export type AppConfig = typeof config;
