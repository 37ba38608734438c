/**
 * @file Process configuration read from the environment.
 */

import { z } from 'zod';

/** Largest delay setTimeout and setInterval honour; longer ones fire after 1ms */
const MAX_TIMER_MS = 2_147_483_647;
const timerMs = () => z.coerce.number().int().positive().max(MAX_TIMER_MS);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  MONGODB_URI: z.string().min(1).default('mongodb://localhost:27017'),
  MONGODB_DB: z.string().min(1).default('partner_core'),

  EMBEDDING_SERVICE_URL: z.string().url().default('http://localhost:3003'),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(768),
  EMBEDDING_TIMEOUT_MS: timerMs().default(10_000),

  PUSH_GATEWAY_URL: z.string().url().default('http://localhost:3010'),
  PUSH_TIMEOUT_MS: timerMs().default(10_000),

  NOTIFICATION_SEND_HOUR: z.coerce.number().int().min(0).max(23).default(9),
  DEFAULT_TIMEZONE: z.string().min(1).default('America/New_York'),
  DELIVERY_TICK_MS: timerMs().default(60_000),
  SCHEDULING_PASS_MS: timerMs().default(3_600_000),
  DELIVERY_CONCURRENCY: z.coerce.number().int().positive().default(4),
  CLAIM_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),

  LEARNER_INTERVAL_MS: timerMs().default(7 * 24 * 60 * 60 * 1000),
  LEARNER_SENSITIVITY: z.coerce.number().positive().default(1.0),
  LEARNER_SMOOTHING: z.coerce.number().nonnegative().default(3),

  ANN_LINEAR_SCAN_THRESHOLD: z.coerce.number().int().nonnegative().default(256),
  ANN_TABLES: z.coerce.number().int().positive().default(8),
  ANN_HYPERPLANES: z.coerce.number().int().min(1).max(30).default(12),
  ANN_PROBE_RADIUS: z.coerce.number().int().min(0).max(2).default(1),
  ANN_SEED: z.coerce.number().int().default(42),
  ANN_MAX_CACHED_PARTITIONS: z.coerce.number().int().positive().default(128),

  HINT_SIMILARITY_THRESHOLD: z.coerce.number().min(0).max(1).default(0.75),
  CONTEXTUAL_BONUS: z.coerce.number().min(0).max(1).default(0.1),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  env: Env['NODE_ENV'];
  port: number;
  mongo: { uri: string; dbName: string };
  embedding: { serviceUrl: string; dimension: number; timeoutMs: number };
  push: { gatewayUrl: string; timeoutMs: number };
  scheduler: {
    sendHour: number;
    defaultTimezone: string;
    deliveryTickMs: number;
    schedulingPassMs: number;
    deliveryConcurrency: number;
    claimTimeoutMs: number;
  };
  learner: { intervalMs: number; sensitivity: number; smoothing: number };
  ann: {
    linearScanThreshold: number;
    tables: number;
    hyperplanes: number;
    probeRadius: number;
    seed: number;
    maxCachedPartitions: number;
  };
  scorer: { hintSimilarityThreshold: number; contextualBonus: number };
}

/**
 * Parse and validate configuration. Throws on the first invalid variable set.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`[Config] Invalid environment: ${details}`);
  }

  const env = parsed.data;
  return {
    env: env.NODE_ENV,
    port: env.PORT,
    mongo: { uri: env.MONGODB_URI, dbName: env.MONGODB_DB },
    embedding: {
      serviceUrl: env.EMBEDDING_SERVICE_URL,
      dimension: env.EMBEDDING_DIMENSION,
      timeoutMs: env.EMBEDDING_TIMEOUT_MS,
    },
    push: { gatewayUrl: env.PUSH_GATEWAY_URL, timeoutMs: env.PUSH_TIMEOUT_MS },
    scheduler: {
      sendHour: env.NOTIFICATION_SEND_HOUR,
      defaultTimezone: env.DEFAULT_TIMEZONE,
      deliveryTickMs: env.DELIVERY_TICK_MS,
      schedulingPassMs: env.SCHEDULING_PASS_MS,
      deliveryConcurrency: env.DELIVERY_CONCURRENCY,
      claimTimeoutMs: env.CLAIM_TIMEOUT_MS,
    },
    learner: {
      intervalMs: env.LEARNER_INTERVAL_MS,
      sensitivity: env.LEARNER_SENSITIVITY,
      smoothing: env.LEARNER_SMOOTHING,
    },
    ann: {
      linearScanThreshold: env.ANN_LINEAR_SCAN_THRESHOLD,
      tables: env.ANN_TABLES,
      hyperplanes: env.ANN_HYPERPLANES,
      probeRadius: env.ANN_PROBE_RADIUS,
      seed: env.ANN_SEED,
      maxCachedPartitions: env.ANN_MAX_CACHED_PARTITIONS,
    },
    scorer: {
      hintSimilarityThreshold: env.HINT_SIMILARITY_THRESHOLD,
      contextualBonus: env.CONTEXTUAL_BONUS,
    },
  };
}
