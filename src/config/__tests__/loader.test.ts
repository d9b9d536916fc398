import { describe, it, expect, afterEach } from 'vitest';
import { loadConfig, resolveConfigPath } from '../loader.js';
import { ConfigError } from '../../shared/errors.js';
import { writeFileSync, mkdtempSync, rmSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { tmpdir } from 'node:os';

const VALID_CONFIG = `
version: 1

settings:
  port: 3100
  apiKeys:
    - "test-key-123"
  logLevel: info

upstream:
  baseUrl: "https://upstream.test/v3"

credentials:
  - id: primary
    secret: "test-secret-1"
  - id: backup
    secretEnv: BACKUP_SECRET

rotation:
  strategy: least_used
  dailyQuota: 500

rateLimit:
  minIntervalSeconds: 0.25

operations:
  - name: get_video
    path: /videos
    resourceClass: video
    requiredParams: [id]
  - name: get_videos
    path: /videos
    resourceClass: video
    requiredParams: [ids]
    unorderedParams: [ids]
`;

const ENV = { BACKUP_SECRET: 'test-secret-2' };

const tempDirs: string[] = [];

function writeTempConfig(content: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'quota-relay-test-'));
  tempDirs.push(dir);
  const path = join(dir, 'config.yaml');
  writeFileSync(path, content, 'utf-8');
  return path;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe('loadConfig', () => {
  it('loads and validates a correct config file', () => {
    const config = loadConfig(writeTempConfig(VALID_CONFIG), ENV);

    expect(config.version).toBe(1);
    expect(config.settings.port).toBe(3100);
    expect(config.settings.apiKeys).toEqual(['test-key-123']);
    expect(config.upstream.baseUrl).toBe('https://upstream.test/v3');
    expect(config.rotation.strategy).toBe('least_used');
    expect(config.rotation.dailyQuota).toBe(500);
    expect(config.rateLimit.minIntervalSeconds).toBe(0.25);
    expect(config.operations.map((op) => op.name)).toEqual(['get_video', 'get_videos']);
    expect(config.operations[1]!.unorderedParams).toEqual(['ids']);
  });

  it('resolves inline and environment-backed secrets', () => {
    const config = loadConfig(writeTempConfig(VALID_CONFIG), ENV);

    expect(config.credentials).toEqual([
      { id: 'primary', secret: 'test-secret-1' },
      { id: 'backup', secret: 'test-secret-2' },
    ]);
  });

  it('applies defaults for optional sections and fields', () => {
    const minimalConfig = `
version: 1
settings:
  apiKeys: ["test-key"]
upstream:
  baseUrl: "https://upstream.test"
credentials:
  - id: only
    secret: "test-secret"
operations:
  - name: search
    path: /search
`;
    const config = loadConfig(writeTempConfig(minimalConfig), {});

    expect(config.settings.port).toBe(3000);
    expect(config.settings.logLevel).toBe('info');
    expect(config.settings.dbPath).toBe('./data/dispatch-log.db');
    expect(config.settings.logRetentionDays).toBe(30);
    expect(config.upstream.credentialParam).toBe('key');
    expect(config.rotation).toEqual({
      strategy: 'round_robin',
      dailyQuota: 10_000,
      hourlyQuota: 1_000,
      quotaResetUtcHour: 0,
    });
    expect(config.rateLimit).toEqual({
      minIntervalSeconds: 0.1,
      maxAttempts: 3,
      baseDelaySeconds: 1,
      backoffMultiplier: 2,
      jitter: 0,
    });
    expect(config.cache.ttlSeconds).toEqual({ channel: 1800, video: 600, feed: 300 });
    expect(config.cache.defaultTtlSeconds).toBe(3600);
    expect(config.dispatch).toEqual({ maxBatchSize: 20, concurrency: 5, timeoutMs: 30_000 });
    expect(config.operations[0]).toEqual({
      name: 'search',
      path: '/search',
      resourceClass: 'default',
      requiredParams: [],
      unorderedParams: [],
    });
  });

  it('lets PORT override the configured port', () => {
    const config = loadConfig(writeTempConfig(VALID_CONFIG), { ...ENV, PORT: '8080' });
    expect(config.settings.port).toBe(8080);
  });

  it('rejects a PORT that is not a valid port number', () => {
    const path = writeTempConfig(VALID_CONFIG);
    expect(() => loadConfig(path, { ...ENV, PORT: 'eighty' })).toThrow(
      'PORT must be an integer between 1 and 65535, got "eighty"',
    );
  });

  it('accepts the bundled example config', () => {
    const examplePath = join(
      dirname(fileURLToPath(import.meta.url)),
      '..', '..', '..', 'config', 'config.example.yaml',
    );

    const config = loadConfig(examplePath, {
      UPSTREAM_KEY_PRIMARY: 'test-secret-1',
      UPSTREAM_KEY_SECONDARY: 'test-secret-2',
    });

    expect(config.credentials.map((c) => c.id)).toEqual(['primary', 'secondary']);
    expect(config.operations.map((o) => o.name)).toEqual(['get_channel', 'get_videos', 'search']);
    expect(config.cache.sweepIntervalSeconds).toBe(300);
  });

  it('throws ConfigError when a secretEnv variable is unset', () => {
    const path = writeTempConfig(VALID_CONFIG);
    expect(() => loadConfig(path, {})).toThrow(ConfigError);
    expect(() => loadConfig(path, {})).toThrow(
      'Credential "backup" references environment variable BACKUP_SECRET, which is not set',
    );
  });

  it('throws ConfigError for invalid YAML', () => {
    const path = writeTempConfig('{ invalid yaml: [}');
    expect(() => loadConfig(path)).toThrow(ConfigError);
    expect(() => loadConfig(path)).toThrow('Failed to parse YAML');
  });

  it('throws ConfigError when file does not exist', () => {
    expect(() => loadConfig('/nonexistent/path/config.yaml')).toThrow(ConfigError);
    expect(() => loadConfig('/nonexistent/path/config.yaml')).toThrow('Failed to read config file');
  });

  it('throws ConfigError when version is wrong', () => {
    const path = writeTempConfig(VALID_CONFIG.replace('version: 1', 'version: 2'));
    expect(() => loadConfig(path, ENV)).toThrow('Config validation failed');
  });

  it('rejects a credential with both secret and secretEnv', () => {
    const path = writeTempConfig(
      VALID_CONFIG.replace('secret: "test-secret-1"', 'secret: "test-secret-1"\n    secretEnv: OTHER'),
    );
    expect(() => loadConfig(path, ENV)).toThrow('exactly one of secret or secretEnv');
  });

  it('rejects duplicate credential ids', () => {
    const path = writeTempConfig(VALID_CONFIG.replace('id: backup', 'id: primary'));
    expect(() => loadConfig(path, ENV)).toThrow('Credential ids must be unique');
  });

  it('rejects duplicate operation names', () => {
    const path = writeTempConfig(VALID_CONFIG.replace('name: get_videos', 'name: get_video'));
    expect(() => loadConfig(path, ENV)).toThrow('Operation names must be unique');
  });

  it('rejects an unknown rotation strategy', () => {
    const path = writeTempConfig(VALID_CONFIG.replace('strategy: least_used', 'strategy: busiest'));
    expect(() => loadConfig(path, ENV)).toThrow(ConfigError);
  });

  it('rejects a config without credentials', () => {
    const config = VALID_CONFIG.replace(
      /credentials:[\s\S]*?rotation:/,
      'credentials: []\n\nrotation:',
    );
    const path = writeTempConfig(config);
    expect(() => loadConfig(path, ENV)).toThrow('At least one credential is required');
  });
});

describe('resolveConfigPath', () => {
  it('prefers the --config argument', () => {
    expect(resolveConfigPath(['node', 'index.js', '--config', '/etc/relay.yaml'], {
      CONFIG_PATH: '/env/relay.yaml',
    })).toBe('/etc/relay.yaml');
  });

  it('falls back to CONFIG_PATH, then the default path', () => {
    expect(resolveConfigPath(['node', 'index.js'], { CONFIG_PATH: '/env/relay.yaml' })).toBe(
      '/env/relay.yaml',
    );
    expect(resolveConfigPath(['node', 'index.js'], {})).toBe('./config/config.yaml');
  });
});
