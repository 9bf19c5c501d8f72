import {
  freshBudget,
  renewBudget,
  resolveMigrationConfig,
  toEscalation,
  validateMigrationConfig
} from "../../src/application/migration/migration.config";

describe("migration config", () => {
  it("merges overrides onto the defaults", () => {
    expect(resolveMigrationConfig({ workers: 4, batchSize: 10 })).toEqual({
      workers: 4,
      timeoutMs: 60000,
      timeoutIncrementMs: 60000,
      retries: 3,
      batchSize: 10
    });
  });

  it("validates every field", () => {
    expect(() => resolveMigrationConfig({ workers: 0 })).toThrow("workers=0 is out of allowed range [1..200]");
    expect(() => resolveMigrationConfig({ batchSize: 0.5 })).toThrow("batchSize=0.5 is out of allowed range [1..100000000]");
    expect(() =>
      validateMigrationConfig({ workers: 1, timeoutMs: 1000, timeoutIncrementMs: 0, retries: 101, batchSize: 1 })
    ).toThrow("retries=101 is out of allowed range [0..100]");
  });

  it("derives the escalation and the budget of new work", () => {
    const config = resolveMigrationConfig({ timeoutMs: 2000, timeoutIncrementMs: 500, maxTimeoutMs: 4000, retries: 1 });

    expect(toEscalation(config)).toEqual({ incrementMs: 500, maxTimeoutMs: 4000 });
    expect(freshBudget(config)).toEqual({ retries: 1, timeoutMs: 2000 });
  });

  it("renews the spent budget of carried-over work and keeps the rest", () => {
    const config = resolveMigrationConfig({ timeoutMs: 2000, retries: 2 });

    expect(renewBudget([{ label: "events[0, 10)", lo: 0, hi: 10, retries: 0, timeoutMs: 9000 }], config)).toEqual([
      { label: "events[0, 10)", lo: 0, hi: 10, retries: 2, timeoutMs: 2000 }
    ]);
  });
});
