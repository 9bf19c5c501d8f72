import { nextPhase, partitionBounds, partitionPhases, rangeBatches } from "../../src/core/partition/partition";

describe("rangeBatches", () => {
  it("covers the range with contiguous batches", () => {
    expect(rangeBatches(0, 10, 4)).toEqual([
      { lo: 0, hi: 4 },
      { lo: 4, hi: 8 },
      { lo: 8, hi: 10 }
    ]);
  });

  it("returns nothing for an empty range", () => {
    expect(rangeBatches(5, 5, 3)).toEqual([]);
  });

  it.each([
    { args: [0, 10, 0], message: "size must be an integer >= 1. Received: 0" },
    { args: [0.5, 10, 1], message: "lo must be a safe integer. Received: 0.5" },
    { args: [10, 5, 1], message: "hi must not be below lo. Received: [10, 5)" }
  ])("rejects $args", ({ args, message }) => {
    const [lo = 0, hi = 0, size = 0] = args;
    expect(() => rangeBatches(lo, hi, size)).toThrow(message);
  });
});

describe("partitionBounds", () => {
  it("numbers partitions from the first id", () => {
    expect(partitionBounds(100, 250, 100, 3)).toEqual([
      { id: 3, lo: 100, hi: 200 },
      { id: 4, lo: 200, hi: 250 }
    ]);
  });
});

describe("nextPhase", () => {
  it("walks the lifecycle in order and ends after analyze", () => {
    const walked: string[] = [];
    for (let phase: (typeof partitionPhases)[number] | undefined = "autovacuum-disable"; phase; phase = nextPhase(phase)) {
      walked.push(phase);
    }

    expect(walked).toEqual([...partitionPhases]);
    expect(nextPhase("analyze")).toBeUndefined();
  });
});
