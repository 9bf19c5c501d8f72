import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  RetryFileError,
  isCopyBatch,
  isPartitionTask,
  isTableSetupTask,
  readRetryList,
  writeRetryList
} from "../../src/application/migration/retryFile";
import type { PartitionTask } from "../../src/application/partition-lifecycle/partitionLifecycle.usecase";

const partition = { id: 2, lo: 200, hi: 300 };

const copyTask: PartitionTask = {
  job: "bulk-copy",
  partition,
  lo: 200,
  hi: 250,
  label: "partition-2:bulk-copy[200, 250)",
  retries: 0,
  timeoutMs: 1000
};

const indexTask: PartitionTask = {
  job: "build-index",
  partition,
  index: 1,
  label: "partition-2:build-index#1",
  retries: 3,
  timeoutMs: 60000
};

describe("retry files", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "retry-file-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes a list that reads back for the same pool", async () => {
    const path = join(dir, "retry.json");
    await writeRetryList(path, { pool: "partition-lifecycle", items: [copyTask, indexTask] });

    expect(JSON.parse(await readFile(path, "utf8"))).toEqual({ pool: "partition-lifecycle", items: [copyTask, indexTask] });
    await expect(readRetryList(path, "partition-lifecycle", isPartitionTask)).resolves.toEqual([copyTask, indexTask]);
  });

  it("refuses a list written by another pool", async () => {
    const path = join(dir, "retry.json");
    await writeRetryList(path, { pool: "bulk-copy", items: [] });

    await expect(readRetryList(path, "drop-tables", isTableSetupTask)).rejects.toThrow(
      `Invalid retry file ${path}: written by pool bulk-copy, not drop-tables`
    );
  });

  it("points at the first malformed item", async () => {
    const path = join(dir, "retry.json");
    await writeFile(path, JSON.stringify({ pool: "partition-lifecycle", items: [copyTask, { ...indexTask, index: -1 }] }));

    const result = readRetryList(path, "partition-lifecycle", isPartitionTask);
    await expect(result).rejects.toBeInstanceOf(RetryFileError);
    await expect(result).rejects.toMatchObject({ code: "invalid_retry_file", context: { path, index: 1 } });
  });

  it("reports unreadable files", async () => {
    const path = join(dir, "missing.json");

    await expect(readRetryList(path, "bulk-copy", isCopyBatch)).rejects.toBeInstanceOf(RetryFileError);
  });
});

describe("retry item guards", () => {
  it("checks job specific fields", () => {
    expect(isPartitionTask(copyTask)).toBe(true);
    expect(isPartitionTask({ ...copyTask, hi: 200 })).toBe(false);
    expect(isPartitionTask({ ...copyTask, job: "reindex" })).toBe(false);
    expect(isPartitionTask({ ...copyTask, retries: -1 })).toBe(false);

    expect(isTableSetupTask({ job: "create-parent", label: "events", retries: 0, timeoutMs: 1000 })).toBe(true);
    expect(isTableSetupTask({ job: "drop-table", table: "", label: "x", retries: 0, timeoutMs: 1000 })).toBe(false);

    expect(
      isCopyBatch({
        job: "copy",
        table: { from: "a_legacy", to: "a", key: "seq" },
        lo: 0,
        hi: 10,
        label: "a[0, 10)",
        retries: 1,
        timeoutMs: 1000
      })
    ).toBe(true);
    expect(isCopyBatch({ job: "copy", table: "a", lo: 0, hi: 10, label: "a", retries: 1, timeoutMs: 1000 })).toBe(false);
  });
});
