/**
 * YAML config loading and Zod validation.
 * Reads a YAML file, validates it against the config schema, resolves
 * credential secrets, and returns a fully typed Config or throws a ConfigError.
 */

import { readFileSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigSchema } from './schema.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { Config, RawConfig, ResolvedCredential } from './types.js';

/**
 * Load and validate a YAML config file.
 *
 * @param path - Absolute or relative path to the YAML config file
 * @param env - Environment used for `secretEnv` lookups and the PORT override
 * @returns A fully validated Config object
 * @throws ConfigError if the file cannot be read, parsed, validated, or a secret is unset
 */
export function loadConfig(path: string, env: NodeJS.ProcessEnv = process.env): Config {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read config file at "${path}": ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to parse YAML in config file "${path}": ${message}`);
  }

  const result = ConfigSchema.safeParse(parsed);

  if (!result.success) {
    const prettyError = z.prettifyError(result.error);
    logger.error({ configPath: path }, 'Config validation failed');
    throw new ConfigError(`Config validation failed for "${path}":\n${prettyError}`);
  }

  const config = resolveConfig(result.data, env);

  logger.info(
    {
      configPath: path,
      credentials: config.credentials.length,
      operations: config.operations.length,
      strategy: config.rotation.strategy,
    },
    'Config loaded successfully',
  );

  return config;
}

/**
 * Resolve env-backed secrets and apply environment overrides.
 * @throws ConfigError if a referenced environment variable is unset or empty
 */
export function resolveConfig(raw: RawConfig, env: NodeJS.ProcessEnv = process.env): Config {
  const credentials: ResolvedCredential[] = raw.credentials.map((cred) => {
    if (cred.secret !== undefined) {
      return { id: cred.id, secret: cred.secret };
    }
    const name = cred.secretEnv ?? '';
    const value = env[name];
    if (!value) {
      throw new ConfigError(
        `Credential "${cred.id}" references environment variable ${name}, which is not set`,
      );
    }
    return { id: cred.id, secret: value };
  });

  const settings = { ...raw.settings };
  const portOverride = env['PORT'];
  if (portOverride) {
    const port = Number(portOverride);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigError(`PORT must be an integer between 1 and 65535, got "${portOverride}"`);
    }
    settings.port = port;
  }

  return { ...raw, settings, credentials };
}

/**
 * Resolve the config file path from CLI args, env var, or default.
 *
 * Priority:
 * 1. --config CLI argument
 * 2. CONFIG_PATH environment variable
 * 3. ./config/config.yaml (default)
 */
export function resolveConfigPath(
  args: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const configArgIndex = args.indexOf('--config');
  const fromArgs = configArgIndex === -1 ? undefined : args[configArgIndex + 1];
  if (fromArgs) {
    return fromArgs;
  }

  const envPath = env['CONFIG_PATH'];
  if (envPath) {
    return envPath;
  }

  return './config/config.yaml';
}
