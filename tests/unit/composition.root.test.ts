import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { Partition } from "../../src/core/partition/partition";

const tableSpecPath = join(__dirname, "../../config/table-spec.json");

const makeFakeDb = () => ({
  indexCount: 4,
  parentTable: "events",
  partitionTable: (partition: Partition) => `events_partition_${partition.id}`,
  createParent: jest.fn().mockResolvedValue(undefined),
  createPartition: jest.fn().mockResolvedValue(undefined),
  dropTable: jest.fn().mockResolvedValue(undefined),
  copyRows: jest.fn().mockResolvedValue(10),
  close: jest.fn().mockResolvedValue(undefined)
});

describe("composition root", () => {
  const envSnapshot = { ...process.env };
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "migrate-root-"));
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  const load = async (db: ReturnType<typeof makeFakeDb>) => {
    const dbCtor = jest.fn().mockImplementation(() => db);
    const createPgPool = jest.fn();
    jest.doMock("../../src/infrastructure/postgres/PostgresMigrationDatabase", () => ({
      PostgresMigrationDatabase: dbCtor
    }));
    jest.doMock("../../src/infrastructure/postgres/PostgresPoolFactory", () => ({ createPgPool }));

    const root = await import("../../src/composition/root");
    return { ...root, dbCtor, createPgPool };
  };

  const baseEnv = () => ({
    MIGRATE_TABLE_SPEC: tableSpecPath,
    MIGRATE_RETRY_OUT: join(dir, "retry.json"),
    MIGRATE_PROGRESS_MS: "60000"
  });

  it("wires the table spec into the database and closes it after creating tables", async () => {
    const db = makeFakeDb();
    const { runMigration, dbCtor, createPgPool } = await load(db);

    await runMigration("create", baseEnv());

    expect(dbCtor).toHaveBeenCalledWith(expect.objectContaining({ parent: "events", key: "event_seq" }), expect.any(Function));
    expect(createPgPool).not.toHaveBeenCalled();
    expect(db.createParent).toHaveBeenCalledTimes(1);
    expect(db.createPartition).toHaveBeenCalledTimes(10);
    expect(db.createPartition).toHaveBeenCalledWith({ id: 9, lo: 9000000, hi: 10000000 }, 60000);
    expect(db.close).toHaveBeenCalledTimes(1);
    await expect(readFile(join(dir, "retry.json"), "utf8")).rejects.toThrow();
  });

  it("removes a stale retry file after a clean run", async () => {
    const db = makeFakeDb();
    const { runMigration } = await load(db);
    const retryOut = join(dir, "retry.json");
    await writeFile(retryOut, JSON.stringify({ pool: "create-tables", items: [] }));

    await runMigration("create", baseEnv());

    await expect(readFile(retryOut, "utf8")).rejects.toMatchObject({ code: "ENOENT" });
  });

  it("writes a retry file and fails when work is left over", async () => {
    const db = makeFakeDb();
    db.createPartition.mockImplementation(async (partition: Partition) => {
      if (partition.id === 3) throw new Error("relation already exists");
    });
    const { runMigration } = await load(db);
    const retryOut = join(dir, "retry.json");

    await expect(runMigration("create", { ...baseEnv(), MIGRATE_RETRIES: "0" })).rejects.toMatchObject({
      name: "MigrationIncompleteError",
      code: "work_failed",
      context: { pool: "create-tables", failed: 1, cancelled: 0, retryFile: retryOut }
    });

    const written = JSON.parse(await readFile(retryOut, "utf8"));
    expect(written.pool).toBe("create-tables");
    expect(written.items).toEqual([
      {
        job: "create-partition",
        partition: { id: 3, lo: 3000000, hi: 4000000 },
        label: "events_partition_3",
        retries: 0,
        timeoutMs: 60000
      }
    ]);
    expect(db.close).toHaveBeenCalledTimes(1);
  });

  it("resumes a copy from a retry file with the configured budget", async () => {
    const db = makeFakeDb();
    const { runMigration } = await load(db);
    const retryFile = join(dir, "retry-in.json");
    const table = { from: "event_senders_legacy", to: "event_senders", key: "event_seq" };
    await writeFile(
      retryFile,
      JSON.stringify({
        pool: "bulk-copy",
        items: [{ job: "copy", table, lo: 500, hi: 600, label: "event_senders[500, 600)", retries: 1, timeoutMs: 2000 }]
      })
    );

    await runMigration("copy", { ...baseEnv(), MIGRATE_RETRY_FILE: retryFile });

    expect(db.copyRows).toHaveBeenCalledTimes(1);
    expect(db.copyRows).toHaveBeenCalledWith(table, { lo: 500, hi: 600 }, 60000);
  });

  it("closes the database when the retry file is invalid", async () => {
    const db = makeFakeDb();
    const { runMigration } = await load(db);
    const retryFile = join(dir, "retry-in.json");
    await writeFile(retryFile, JSON.stringify({ pool: "create-tables", items: [] }));

    await expect(runMigration("drop", { ...baseEnv(), MIGRATE_RETRY_FILE: retryFile })).rejects.toMatchObject({
      code: "invalid_retry_file"
    });
    expect(db.dropTable).not.toHaveBeenCalled();
    expect(db.close).toHaveBeenCalledTimes(1);
  });

  it("recognises the supported commands", async () => {
    const { isMigrationCommand } = await load(makeFakeDb());

    expect(["create", "lifecycle", "copy", "drop"].every(isMigrationCommand)).toBe(true);
    expect(isMigrationCommand("vacuum")).toBe(false);
  });
});
