import { closeSync, mkdirSync, openSync, readFileSync, writeSync } from "fs";
import { dirname } from "path";
import type { AgentMeta, GameState, Grid } from "../types";
import { RULES } from "../types";
import { InvalidGridError, ReplayCorruptionError } from "../engine/errors";
import { parseGrid, serializeGrid } from "../engine/grid";
import { visibleCells } from "../engine/observation";
import { REPLAY_VERSION, ReplayFile } from "./schema";
import type { Snapshot } from "./schema";

export interface ReplayInit {
  grid: Grid;
  agents: AgentMeta[];
  landGrowthInterval?: number;
}

/**
 * Append-only list of game snapshots plus the grid and agent metadata needed to
 * play them back without re-running the simulation.
 */
export class Replay {
  readonly grid: Grid;
  readonly agents: readonly AgentMeta[];
  readonly landGrowthInterval: number;
  private states: Snapshot[] = [];

  constructor(init: ReplayInit) {
    if (init.agents.length !== init.grid.generals.length) {
      throw new InvalidGridError(
        `Replay has ${init.agents.length} agents for ${init.grid.generals.length} generals`,
      );
    }
    this.grid = init.grid;
    this.agents = init.agents.map((a) => ({ ...a, color: [...a.color] }));
    this.landGrowthInterval = init.landGrowthInterval ?? RULES.landGrowthInterval;
  }

  /** Copy the current state onto the end of the log */
  addState(state: GameState): void {
    if (state.grid.rows !== this.grid.rows || state.grid.cols !== this.grid.cols) {
      throw new InvalidGridError("Snapshot dimensions do not match the replay grid");
    }
    const index = new Map(this.agents.map((a, i) => [a.id, i]));
    const agentIndex = (id: string): number => {
      const i = index.get(id);
      if (i === undefined) throw new InvalidGridError(`Snapshot references unknown agent "${id}"`);
      return i;
    };
    const owner = state.owner.map((row) => row.map((id) => (id === null ? null : agentIndex(id))));
    for (const id of state.alive) agentIndex(id);
    this.states.push({
      turn: state.turn,
      army: state.army.map((row) => [...row]),
      owner,
      alive: [...state.alive],
    });
  }

  get snapshots(): readonly Snapshot[] {
    return this.states;
  }

  get length(): number {
    return this.states.length;
  }

  /** Rebuild the GameState at a snapshot index from stored data alone */
  stateAt(index: number): GameState {
    const snapshot = this.states[index];
    if (!snapshot) throw new RangeError(`No snapshot at index ${index} (have ${this.states.length})`);

    const ids = this.agents.map((a) => a.id);
    const ended = snapshot.alive.length <= 1;
    const state: GameState = {
      grid: this.grid,
      agents: ids,
      army: snapshot.army.map((row) => [...row]),
      owner: snapshot.owner.map((row) => row.map((i) => (i === null ? null : ids[i]))),
      terrain: this.grid.terrain.map((row) => [...row]),
      alive: [...snapshot.alive],
      turn: snapshot.turn,
      phase: ended ? "ended" : "play",
      winner: ended ? (snapshot.alive[0] ?? null) : undefined,
      discovered: {},
      landGrowthInterval: this.landGrowthInterval,
    };
    state.discovered = this.discoveredUpTo(index, state);
    return state;
  }

  private discoveredUpTo(index: number, target: GameState): GameState["discovered"] {
    const { rows, cols } = this.grid;
    const discovered: GameState["discovered"] = Object.fromEntries(
      target.agents.map((id) => [
        id,
        Array.from({ length: rows }, () => new Array<boolean>(cols).fill(false)),
      ]),
    );
    for (let i = 0; i <= index; i++) {
      const snapshot = this.states[i];
      const view = {
        ...target,
        owner: snapshot.owner.map((row) => row.map((o) => (o === null ? null : target.agents[o]))),
      };
      for (const agent of snapshot.alive) {
        visibleCells(view, agent).forEach((row, r) =>
          row.forEach((v, c) => {
            if (v) discovered[agent][r][c] = true;
          }),
        );
      }
    }
    return discovered;
  }

  toJSON(): ReplayFile {
    return {
      version: REPLAY_VERSION,
      createdAt: new Date().toISOString(),
      grid: { rows: this.grid.rows, cols: this.grid.cols, layout: serializeGrid(this.grid) },
      agents: this.agents.map((a) => ({ ...a, color: [...a.color] })),
      landGrowthInterval: this.landGrowthInterval,
      snapshots: this.states,
    };
  }

  /** Write the whole log; the file handle is closed on every exit path */
  store(path: string): void {
    mkdirSync(dirname(path), { recursive: true });
    const body = JSON.stringify(this.toJSON());
    const fd = openSync(path, "w");
    try {
      writeSync(fd, body);
    } finally {
      closeSync(fd);
    }
    console.error(`  [replay] Saved ${this.states.length} snapshots to ${path}`);
  }

  static load(path: string): Replay {
    let text: string;
    try {
      text = readFileSync(path, "utf-8");
    } catch (e) {
      throw new ReplayCorruptionError(`Cannot read replay file ${path}`, { cause: e });
    }
    return Replay.fromJSON(text);
  }

  static fromJSON(text: string): Replay {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      throw new ReplayCorruptionError("Replay is not valid JSON", { cause: e });
    }

    const result = ReplayFile.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
      throw new ReplayCorruptionError(`Replay does not match schema: ${issues.join("; ")}`);
    }
    const file = result.data;
    if (file.version !== REPLAY_VERSION) {
      throw new ReplayCorruptionError(`Unsupported replay version ${file.version}`);
    }

    let grid: Grid;
    try {
      grid = parseGrid(file.grid.layout, file.agents.length);
    } catch (e) {
      if (e instanceof InvalidGridError) {
        throw new ReplayCorruptionError(`Replay grid is invalid: ${e.message}`, { cause: e });
      }
      throw e;
    }
    if (grid.rows !== file.grid.rows || grid.cols !== file.grid.cols) {
      throw new ReplayCorruptionError(
        `Replay declares ${file.grid.rows}x${file.grid.cols} but layout is ${grid.rows}x${grid.cols}`,
      );
    }

    const ids = new Set(file.agents.map((a) => a.id));
    if (ids.size !== file.agents.length) throw new ReplayCorruptionError("Replay agent ids are not unique");

    file.snapshots.forEach((s, i) => {
      const fits = (channel: unknown[][]) =>
        channel.length === grid.rows && channel.every((row) => row.length === grid.cols);
      if (!fits(s.army) || !fits(s.owner)) {
        throw new ReplayCorruptionError(`Snapshot ${i} does not match grid dimensions`);
      }
      if (s.owner.some((row) => row.some((o) => o !== null && o >= file.agents.length))) {
        throw new ReplayCorruptionError(`Snapshot ${i} references an unknown agent index`);
      }
      if (s.alive.some((id) => !ids.has(id))) {
        throw new ReplayCorruptionError(`Snapshot ${i} lists an unknown living agent`);
      }
    });

    const replay = new Replay({
      grid,
      agents: file.agents,
      landGrowthInterval: file.landGrowthInterval,
    });
    replay.states = file.snapshots;
    return replay;
  }
}
