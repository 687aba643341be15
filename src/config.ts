/**
 * Runtime configuration, read from environment variables.
 */

import { validationError } from './domain/errors';
import { LogLevel, parseLogLevel } from './logger';
import { RetryPolicy } from './engine/retry';
import { VerifyMode } from './engine/retrieval-resolver';

export interface RegistryConfig {
  port: number;
  storagePath: string;
  /** SQLite file, or ":memory:". */
  databasePath: string;
  maxArtifactBytes: number;
  pendingTimeoutMs: number;
  gcGracePeriodMs: number;
  deletedRetentionMs: number;
  maintenanceIntervalMs: number;
  retry: RetryPolicy;
  allowDeletedVersionReuse: boolean;
  verifyMode: VerifyMode;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: RegistryConfig = {
  port: 8000,
  storagePath: './storage',
  databasePath: './registry.sqlite3',
  maxArtifactBytes: 512 * 1024 * 1024,
  pendingTimeoutMs: 10 * 60 * 1000,
  gcGracePeriodMs: 60 * 60 * 1000,
  deletedRetentionMs: 7 * 24 * 60 * 60 * 1000,
  maintenanceIntervalMs: 5 * 60 * 1000,
  retry: { maxAttempts: 3, baseDelayMs: 50, maxDelayMs: 2000 },
  allowDeletedVersionReuse: true,
  verifyMode: 'streaming',
  logLevel: LogLevel.Info,
};

type Env = Record<string, string | undefined>;

/** Build a frozen configuration; every invalid variable is reported at once. */
export function loadConfig(env: Env = process.env): Readonly<RegistryConfig> {
  const problems: string[] = [];

  const int = (key: string, fallback: number, min: number): number => {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isSafeInteger(value) || value < min) {
      problems.push(`${key} must be an integer >= ${min} (got "${raw}")`);
      return fallback;
    }
    return value;
  };

  const bool = (key: string, fallback: boolean): boolean => {
    const raw = env[key]?.trim().toLowerCase();
    if (!raw) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
    if (['0', 'false', 'no', 'off'].includes(raw)) return false;
    problems.push(`${key} must be a boolean (got "${raw}")`);
    return fallback;
  };

  const str = (key: string, fallback: string): string => env[key]?.trim() || fallback;

  let verifyMode = DEFAULT_CONFIG.verifyMode;
  const rawVerify = env.REGISTRY_VERIFY_MODE?.trim().toLowerCase();
  if (rawVerify === 'streaming' || rawVerify === 'eager') {
    verifyMode = rawVerify;
  } else if (rawVerify) {
    problems.push(`REGISTRY_VERIFY_MODE must be "streaming" or "eager" (got "${rawVerify}")`);
  }

  let logLevel = DEFAULT_CONFIG.logLevel;
  if (env.LOG_LEVEL?.trim()) {
    const parsed = parseLogLevel(env.LOG_LEVEL);
    if (parsed) logLevel = parsed;
    else problems.push(`LOG_LEVEL must be one of ${Object.values(LogLevel).join(', ')} (got "${env.LOG_LEVEL}")`);
  }

  const config: RegistryConfig = {
    port: int('PORT', DEFAULT_CONFIG.port, 0),
    storagePath: str('REGISTRY_STORAGE_PATH', DEFAULT_CONFIG.storagePath),
    databasePath: str('REGISTRY_DATABASE_PATH', DEFAULT_CONFIG.databasePath),
    maxArtifactBytes: int('REGISTRY_MAX_ARTIFACT_BYTES', DEFAULT_CONFIG.maxArtifactBytes, 1),
    pendingTimeoutMs: int('REGISTRY_PENDING_TIMEOUT_MS', DEFAULT_CONFIG.pendingTimeoutMs, 0),
    gcGracePeriodMs: int('REGISTRY_GC_GRACE_PERIOD_MS', DEFAULT_CONFIG.gcGracePeriodMs, 0),
    deletedRetentionMs: int('REGISTRY_DELETED_RETENTION_MS', DEFAULT_CONFIG.deletedRetentionMs, 0),
    maintenanceIntervalMs: int('REGISTRY_MAINTENANCE_INTERVAL_MS', DEFAULT_CONFIG.maintenanceIntervalMs, 1000),
    retry: {
      maxAttempts: int('REGISTRY_RETRY_MAX_ATTEMPTS', DEFAULT_CONFIG.retry.maxAttempts, 1),
      baseDelayMs: int('REGISTRY_RETRY_BASE_DELAY_MS', DEFAULT_CONFIG.retry.baseDelayMs, 0),
      maxDelayMs: int('REGISTRY_RETRY_MAX_DELAY_MS', DEFAULT_CONFIG.retry.maxDelayMs, 0),
    },
    allowDeletedVersionReuse: bool('REGISTRY_ALLOW_DELETED_REUSE', DEFAULT_CONFIG.allowDeletedVersionReuse),
    verifyMode,
    logLevel,
  };

  if (config.port > 65535) problems.push(`PORT must be at most 65535 (got "${config.port}")`);

  if (problems.length > 0) {
    throw validationError(`Invalid configuration: ${problems.join('; ')}`, { problems });
  }
  return Object.freeze({ ...config, retry: Object.freeze(config.retry) });
}
