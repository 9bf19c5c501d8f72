import {
  defaultMigrationConfig,
  migrationCaps,
  validateMigrationConfig,
  type MigrationConfig
} from "../../application/migration/migration.config";

export const runtimeCaps = {
  progressMs: { min: 1000, max: 3_600_000 }
} as const;

export const runtimeDefaults = {
  tableSpecPath: "config/table-spec.json",
  retryOut: "retry.json",
  progressMs: 10_000
} as const;

export type RuntimeConfig = {
  migrationConfig: MigrationConfig;
  tableSpecPath: string;
  /** Retry list of an earlier run to resume from instead of the full job. */
  retryFile?: string;
  retryOut: string;
  progressMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalPath = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name];
  return raw == null || raw.trim() === "" ? undefined : raw.trim();
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const migrationConfig = validateMigrationConfig({
    ...defaultMigrationConfig,
    workers: parseOptionalIntInRange(env, "MIGRATE_WORKERS", migrationCaps.workers) ?? defaultMigrationConfig.workers,
    timeoutMs: parseOptionalIntInRange(env, "MIGRATE_TIMEOUT_MS", migrationCaps.timeoutMs) ?? defaultMigrationConfig.timeoutMs,
    timeoutIncrementMs:
      parseOptionalIntInRange(env, "MIGRATE_TIMEOUT_INCREMENT_MS", migrationCaps.timeoutIncrementMs) ??
      defaultMigrationConfig.timeoutIncrementMs,
    maxTimeoutMs: parseOptionalIntInRange(env, "MIGRATE_MAX_TIMEOUT_MS", migrationCaps.maxTimeoutMs),
    retries: parseOptionalIntInRange(env, "MIGRATE_RETRIES", migrationCaps.retries) ?? defaultMigrationConfig.retries,
    batchSize: parseOptionalIntInRange(env, "MIGRATE_BATCH_SIZE", migrationCaps.batchSize) ?? defaultMigrationConfig.batchSize
  });

  const config: RuntimeConfig = {
    migrationConfig,
    tableSpecPath: parseOptionalPath(env, "MIGRATE_TABLE_SPEC") ?? runtimeDefaults.tableSpecPath,
    retryOut: parseOptionalPath(env, "MIGRATE_RETRY_OUT") ?? runtimeDefaults.retryOut,
    progressMs: parseOptionalIntInRange(env, "MIGRATE_PROGRESS_MS", runtimeCaps.progressMs) ?? runtimeDefaults.progressMs
  };

  const retryFile = parseOptionalPath(env, "MIGRATE_RETRY_FILE");
  if (retryFile) config.retryFile = retryFile;

  return config;
};
