/**
 * TypeScript types inferred from Zod schemas.
 * These types are the compile-time companions to the runtime validation schemas.
 */

import { z } from 'zod';
import {
  ConfigSchema,
  CredentialSchema,
  RotationSchema,
  RotationStrategySchema,
  RateLimitSchema,
  CacheSchema,
  DispatchSchema,
  OperationSchema,
  UpstreamSchema,
  SettingsSchema,
} from './schema.js';

/** Validated config as written in YAML (credential secrets may still be env references). */
export type RawConfig = z.infer<typeof ConfigSchema>;

/** A credential as written in config. */
export type CredentialConfig = z.infer<typeof CredentialSchema>;

/** A credential with its secret resolved. */
export interface ResolvedCredential {
  id: string;
  secret: string;
}

/** Fully validated relay configuration with every secret resolved. */
export type Config = Omit<RawConfig, 'credentials'> & { credentials: ResolvedCredential[] };

/** Rotation strategy name. */
export type RotationStrategyName = z.infer<typeof RotationStrategySchema>;

/** Rotation and quota settings. */
export type RotationConfig = z.infer<typeof RotationSchema>;

/** Throttle and retry settings. */
export type RateLimitConfig = z.infer<typeof RateLimitSchema>;

/** Cache TTL settings. */
export type CacheConfig = z.infer<typeof CacheSchema>;

/** Batch and deadline settings. */
export type DispatchConfig = z.infer<typeof DispatchSchema>;

/** A single configured upstream operation. */
export type OperationConfig = z.infer<typeof OperationSchema>;

/** Upstream endpoint settings. */
export type UpstreamConfig = z.infer<typeof UpstreamSchema>;

/** Relay-level settings. */
export type Settings = z.infer<typeof SettingsSchema>;

// Re-export schemas for convenience
export {
  ConfigSchema,
  CredentialSchema,
  RotationSchema,
  RotationStrategySchema,
  RateLimitSchema,
  CacheSchema,
  DispatchSchema,
  OperationSchema,
  UpstreamSchema,
  SettingsSchema,
} from './schema.js';
