import { describe, test, expect } from "vitest";
import { ReplayFile, SnapshotSchema } from "./schema";

const snapshot = {
  turn: 3,
  army: [
    [2, 0],
    [0, 4],
  ],
  owner: [
    [0, null],
    [null, 1],
  ],
  alive: ["a", "b"],
};

const file = {
  version: 1,
  createdAt: "2026-01-01T00:00:00.000Z",
  grid: { rows: 2, cols: 2, layout: "A.\n.B" },
  agents: [
    { id: "a", name: "Alpha", color: [255, 0, 0] },
    { id: "b", name: "Beta", color: [0, 0, 255] },
  ],
  landGrowthInterval: 50,
  snapshots: [snapshot],
};

describe("SnapshotSchema", () => {
  test("accepts a well-formed snapshot", () => {
    expect(SnapshotSchema.safeParse(snapshot).success).toBe(true);
  });

  test("rejects negative armies", () => {
    expect(SnapshotSchema.safeParse({ ...snapshot, army: [[-1, 0]] }).success).toBe(false);
  });

  test("rejects fractional owner indices", () => {
    expect(SnapshotSchema.safeParse({ ...snapshot, owner: [[0.5, null]] }).success).toBe(false);
  });
});

describe("ReplayFile", () => {
  test("accepts a well-formed file", () => {
    expect(ReplayFile.safeParse(file).success).toBe(true);
  });

  test("rejects colour channels above 255", () => {
    const agents = [{ id: "a", name: "Alpha", color: [256, 0, 0] }, file.agents[1]];
    expect(ReplayFile.safeParse({ ...file, agents }).success).toBe(false);
  });

  test("rejects a file without agents", () => {
    expect(ReplayFile.safeParse({ ...file, agents: [] }).success).toBe(false);
  });

  test("rejects a zero growth interval", () => {
    expect(ReplayFile.safeParse({ ...file, landGrowthInterval: 0 }).success).toBe(false);
  });
});
