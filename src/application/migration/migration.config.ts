import type { DeadlineEscalation } from "../../core/policies/retryPolicies";
import type { WorkItem } from "../../core/work/workItem";

export type MigrationConfig = {
  workers: number;
  timeoutMs: number;
  timeoutIncrementMs: number;
  maxTimeoutMs?: number;
  retries: number;
  batchSize: number;
};

export type MigrationConfigInput = Partial<MigrationConfig>;

export const defaultMigrationConfig: MigrationConfig = {
  workers: 20,
  timeoutMs: 60_000,
  timeoutIncrementMs: 60_000,
  retries: 3,
  batchSize: 100_000
};

export const migrationCaps = {
  workers: { min: 1, max: 200 },
  timeoutMs: { min: 1000, max: 3_600_000 },
  timeoutIncrementMs: { min: 0, max: 3_600_000 },
  maxTimeoutMs: { min: 1000, max: 86_400_000 },
  retries: { min: 0, max: 100 },
  batchSize: { min: 1, max: 100_000_000 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateMigrationConfig = (config: MigrationConfig): MigrationConfig => {
  assertIntegerInRange("workers", config.workers, migrationCaps.workers.min, migrationCaps.workers.max);
  assertIntegerInRange("timeoutMs", config.timeoutMs, migrationCaps.timeoutMs.min, migrationCaps.timeoutMs.max);
  assertIntegerInRange(
    "timeoutIncrementMs",
    config.timeoutIncrementMs,
    migrationCaps.timeoutIncrementMs.min,
    migrationCaps.timeoutIncrementMs.max
  );
  if (config.maxTimeoutMs != null) {
    assertIntegerInRange("maxTimeoutMs", config.maxTimeoutMs, config.timeoutMs, migrationCaps.maxTimeoutMs.max);
  }
  assertIntegerInRange("retries", config.retries, migrationCaps.retries.min, migrationCaps.retries.max);
  assertIntegerInRange("batchSize", config.batchSize, migrationCaps.batchSize.min, migrationCaps.batchSize.max);
  return config;
};

export const resolveMigrationConfig = (input: MigrationConfigInput = {}): MigrationConfig =>
  validateMigrationConfig({ ...defaultMigrationConfig, ...input });

export const toEscalation = (config: MigrationConfig): DeadlineEscalation => ({
  incrementMs: config.timeoutIncrementMs,
  maxTimeoutMs: config.maxTimeoutMs
});

/** Fresh orchestration metadata for a newly created unit of work. */
export const freshBudget = (config: MigrationConfig) => ({
  retries: config.retries,
  timeoutMs: config.timeoutMs
});

/**
 * Gives work carried over from an earlier run a fresh budget. Items land in
 * the retry file with their retries spent or their deadline at the ceiling.
 */
export const renewBudget = <T extends WorkItem>(items: readonly T[], config: MigrationConfig): T[] =>
  items.map((item) => ({ ...item, ...freshBudget(config) }));
