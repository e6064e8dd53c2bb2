import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { configSchema, type ValidatedConfig } from './schema';

const ENV_PREFIX = 'ALERT_BUCKETS_';

type RawConfig = Record<string, unknown>;

interface EnvBinding {
  section: string;
  key: string;
  parse?: (value: string) => unknown;
}

const int = (value: string) => parseInt(value, 10);
const bool = (value: string) => value === 'true';

const ENV_MAP: Record<string, EnvBinding> = {
  REDIS_URL: { section: 'redis', key: 'url' },
  STORE_DRIVER: { section: 'store', key: 'driver' },
  STORE_KEY_PREFIX: { section: 'store', key: 'keyPrefix' },
  STORE_TIMEOUT_MS: { section: 'store', key: 'timeoutMs', parse: int },
  MONGODB_URI: { section: 'mongodb', key: 'uri' },
  MONGODB_COLLECTION: { section: 'mongodb', key: 'collectionName' },
  STREAM_KEY: { section: 'stream', key: 'key' },
  STREAM_CONSUMER_GROUP: { section: 'stream', key: 'consumerGroup' },
  STREAM_CONSUMER_ID: { section: 'stream', key: 'consumerId' },
  STREAM_BATCH_SIZE: { section: 'stream', key: 'batchSize', parse: int },
  STREAM_BLOCK_MS: { section: 'stream', key: 'blockMs', parse: int },
  STREAM_PENDING_RETRY_MS: { section: 'stream', key: 'pendingRetryMs', parse: int },
  GEOCODER_API_KEY: { section: 'geocoder', key: 'apiKey' },
  GEOCODER_TIMEOUT_MS: { section: 'geocoder', key: 'timeoutMs', parse: int },
  GEOCODER_LANGUAGE: { section: 'geocoder', key: 'language' },
  RETENTION_WINDOW_MS: { section: 'retention', key: 'windowMs', parse: int },
  RETENTION_SWEEP_INTERVAL_MS: { section: 'retention', key: 'sweepIntervalMs', parse: int },
  DISPLAY_TIME_ZONE: { section: 'display', key: 'timeZone' },
  LOG_LEVEL: { section: 'logging', key: 'level' },
  HTTP_ENABLED: { section: 'http', key: 'enabled', parse: bool },
  HTTP_PORT: { section: 'http', key: 'port', parse: int },
};

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setValue(raw: RawConfig, { section, key, parse }: EnvBinding, value: string): void {
  const current = raw[section];
  const target = isRecord(current) ? current : {};
  target[key] = parse ? parse(value) : value;
  raw[section] = target;
}

/**
 * Read the YAML file (if present), apply `ALERT_BUCKETS_*` overrides and
 * validate. Throws a ZodError on invalid configuration.
 */
export function loadConfig(configPath?: string): ValidatedConfig {
  const filePath = configPath ?? process.env.CONFIG_PATH ?? '/etc/alert-buckets/config.yaml';

  let raw: RawConfig = {};

  if (fs.existsSync(filePath)) {
    const parsed: unknown = parseYaml(fs.readFileSync(filePath, 'utf-8'));
    if (isRecord(parsed)) raw = parsed;
  }

  for (const [name, binding] of Object.entries(ENV_MAP)) {
    const value = process.env[`${ENV_PREFIX}${name}`];
    if (value !== undefined) {
      setValue(raw, binding, value);
    }
  }

  return configSchema.parse(raw);
}
