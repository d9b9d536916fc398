/**
 * Zod schemas for YAML config file validation.
 * These schemas are the single source of truth for config structure.
 * TypeScript types are inferred from these schemas in types.ts.
 */

import { z } from 'zod';

/** Closed set of credential rotation strategies. */
export const RotationStrategySchema = z.enum(['round_robin', 'least_used', 'random']);

/** Schema for a single upstream credential. Exactly one of secret / secretEnv. */
export const CredentialSchema = z
  .object({
    id: z.string().min(1, { message: 'Credential id must not be empty' }),
    secret: z.string().min(1, { message: 'Credential secret must not be empty' }).optional(),
    secretEnv: z.string().min(1, { message: 'Credential secretEnv must not be empty' }).optional(),
  })
  .refine((cred) => (cred.secret === undefined) !== (cred.secretEnv === undefined), {
    message: 'Credential must set exactly one of secret or secretEnv',
  });

/** Schema for credential rotation and quota ceilings. */
export const RotationSchema = z.object({
  strategy: RotationStrategySchema.default('round_robin'),
  dailyQuota: z.number().int().positive().default(10_000),
  hourlyQuota: z.number().int().positive().default(1_000),
  quotaResetUtcHour: z.number().int().min(0).max(23).default(0),
});

/** Schema for the global throttle and retry policy. */
export const RateLimitSchema = z.object({
  minIntervalSeconds: z.number().nonnegative().default(0.1),
  maxAttempts: z.number().int().min(1).max(10).default(3),
  baseDelaySeconds: z.number().positive().default(1),
  backoffMultiplier: z.number().min(1).default(2),
  jitter: z.number().min(0).max(1).default(0),
});

/** Schema for response cache TTLs. */
export const CacheSchema = z.object({
  ttlSeconds: z.record(z.string().min(1), z.number().int().positive()).default({
    channel: 1800,
    video: 600,
    feed: 300,
  }),
  defaultTtlSeconds: z.number().int().positive().default(3600),
  sweepIntervalSeconds: z.number().int().positive().optional(),
});

/** Schema for dispatcher batch and deadline settings. */
export const DispatchSchema = z.object({
  maxBatchSize: z.number().int().positive().default(20),
  concurrency: z.number().int().min(1).max(64).default(5),
  timeoutMs: z.number().int().min(100).default(30_000),
});

/** Schema for one named upstream operation. */
export const OperationSchema = z.object({
  name: z
    .string()
    .regex(/^[a-z][a-z0-9_]*$/, { message: 'Operation name must be snake_case' }),
  path: z.string().startsWith('/', { message: 'Operation path must start with /' }),
  resourceClass: z.string().min(1).default('default'),
  requiredParams: z.array(z.string().min(1)).default([]),
  unorderedParams: z.array(z.string().min(1)).default([]),
});

/** Schema for the upstream HTTP endpoint. */
export const UpstreamSchema = z.object({
  baseUrl: z.url({ message: 'upstream.baseUrl must be a valid URL' }),
  credentialParam: z.string().min(1).default('key'),
  requestTimeoutMs: z.number().int().min(100).default(10_000),
});

/** Schema for relay server settings. */
export const SettingsSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3000),
  apiKeys: z
    .array(z.string().min(1, { message: 'API key must not be empty' }))
    .min(1, { message: 'At least one API key is required' }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  dbPath: z.string().default('./data/dispatch-log.db'),
  logRetentionDays: z.number().int().positive().default(30),
});

/** Top-level config schema with cross-reference validation. */
export const ConfigSchema = z
  .object({
    version: z.literal(1),
    settings: SettingsSchema,
    upstream: UpstreamSchema,
    credentials: z
      .array(CredentialSchema)
      .min(1, { message: 'At least one credential is required' }),
    rotation: RotationSchema.default({
      strategy: 'round_robin',
      dailyQuota: 10_000,
      hourlyQuota: 1_000,
      quotaResetUtcHour: 0,
    }),
    rateLimit: RateLimitSchema.default({
      minIntervalSeconds: 0.1,
      maxAttempts: 3,
      baseDelaySeconds: 1,
      backoffMultiplier: 2,
      jitter: 0,
    }),
    cache: CacheSchema.default({
      ttlSeconds: { channel: 1800, video: 600, feed: 300 },
      defaultTtlSeconds: 3600,
    }),
    dispatch: DispatchSchema.default({
      maxBatchSize: 20,
      concurrency: 5,
      timeoutMs: 30_000,
    }),
    operations: z
      .array(OperationSchema)
      .min(1, { message: 'At least one operation is required' }),
  })
  .refine(
    (config) => new Set(config.credentials.map((c) => c.id)).size === config.credentials.length,
    { message: 'Credential ids must be unique' },
  )
  .refine(
    (config) => new Set(config.operations.map((o) => o.name)).size === config.operations.length,
    { message: 'Operation names must be unique' },
  );
