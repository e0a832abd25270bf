import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { ConfigError, loadMatchConfig, parseMatchConfig } from "./config";

const AGENTS = [
  { id: "a", kind: "random" },
  { id: "b", kind: "expander" },
];

describe("parseMatchConfig", () => {
  test("fills defaults", () => {
    const config = parseMatchConfig({ agents: AGENTS });
    expect(config.seed).toBe(0);
    expect(config.maxTurns).toBe(500);
    expect(config.landGrowthInterval).toBe(50);
    expect(config.grid).toEqual({ rows: 10, cols: 10, mountainDensity: 0.2, cityDensity: 0.05 });
    expect(config.replayFile).toBeUndefined();
  });

  test("fills generator defaults around given fields", () => {
    const config = parseMatchConfig({ agents: AGENTS, grid: { rows: 6 } });
    expect(config.grid).toEqual({ rows: 6, cols: 10, mountainDensity: 0.2, cityDensity: 0.05 });
  });

  test("accepts a fixed layout and scripted actions", () => {
    const config = parseMatchConfig({
      seed: "fixed",
      grid: { layout: "A.B" },
      agents: [
        { id: "a", kind: "scripted", actions: [{ type: "move", row: 0, col: 0, direction: "right", split: false }] },
        { id: "b", kind: "scripted", actions: [] },
      ],
    });
    expect(config.seed).toBe("fixed");
    expect(config.grid).toEqual({ layout: "A.B" });
    expect(config.agents[0]).toMatchObject({ kind: "scripted", actions: [{ type: "move", direction: "right" }] });
  });

  test("rejects duplicate agent ids", () => {
    const raw = { agents: [{ id: "a", kind: "random" }, { id: "a", kind: "expander" }] };
    expect(() => parseMatchConfig(raw)).toThrow(ConfigError);
    expect(() => parseMatchConfig(raw)).toThrow("Invalid match config: agents: Agent ids must be unique");
  });

  test("rejects unknown agent kinds", () => {
    expect(() => parseMatchConfig({ agents: [{ id: "a", kind: "oracle" }] })).toThrow(ConfigError);
  });

  test("rejects an empty agent list", () => {
    expect(() => parseMatchConfig({ agents: [] })).toThrow(ConfigError);
  });

  test("rejects out-of-range probabilities", () => {
    expect(() => parseMatchConfig({ agents: [{ id: "a", kind: "random", idleProbability: 2 }] })).toThrow(
      ConfigError,
    );
  });
});

describe("loadMatchConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("reads a JSON file", () => {
    const path = join(dir, "match.json");
    writeFileSync(path, JSON.stringify({ seed: 4, maxTurns: 20, agents: AGENTS }));
    const config = loadMatchConfig(path);
    expect(config.seed).toBe(4);
    expect(config.maxTurns).toBe(20);
    expect(config.agents.map((a) => a.id)).toEqual(["a", "b"]);
  });

  test("reports unreadable files", () => {
    const path = join(dir, "missing.json");
    expect(() => loadMatchConfig(path)).toThrow(`Cannot read match config ${path}`);
  });

  test("reports invalid JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ seed: ");
    expect(() => loadMatchConfig(path)).toThrow(ConfigError);
  });
});
