import type { Action, ActionSet, AgentId, GameState, Grid, Position, StepResult } from "../types";
import { RULES } from "../types";
import { InvalidActionError, InvalidGridError } from "./errors";
import type { GameEventListener } from "./events";
import { ActionSchema } from "./events";
import { offset, samePosition } from "./grid";
import { agentInfo, observe, visibleCells } from "./observation";
import { growthAt, moveBlocker, movedArmy } from "./rules";

export interface GameOptions {
  landGrowthInterval?: number;
}

/** Anything that keeps per-turn snapshots, e.g. a Replay */
export interface SnapshotSink {
  addState(state: GameState): void;
}

export interface StepOptions {
  onEvent?: GameEventListener;
  replay?: SnapshotSink;
}

// === Factory ===

export function createGame(grid: Grid, agentIds: AgentId[], options: GameOptions = {}): GameState {
  if (agentIds.length !== grid.generals.length) {
    throw new InvalidGridError(
      `Grid has ${grid.generals.length} generals but ${agentIds.length} agents were given`,
    );
  }
  if (new Set(agentIds).size !== agentIds.length || agentIds.some((id) => id === "")) {
    throw new InvalidGridError("Agent ids must be unique and non-empty");
  }
  const landGrowthInterval = options.landGrowthInterval ?? RULES.landGrowthInterval;
  if (!Number.isInteger(landGrowthInterval) || landGrowthInterval < 1) {
    throw new InvalidGridError("Land growth interval must be a positive integer");
  }

  const army = grid.cityArmy.map((row) => [...row]);
  const owner: (AgentId | null)[][] = grid.terrain.map((row) => row.map(() => null));
  grid.generals.forEach((g, i) => {
    army[g.row][g.col] = RULES.generalStartArmy;
    owner[g.row][g.col] = agentIds[i];
  });

  const state: GameState = {
    grid,
    agents: [...agentIds],
    army,
    owner,
    terrain: grid.terrain.map((row) => [...row]),
    alive: [...agentIds],
    turn: 0,
    phase: "play",
    discovered: Object.fromEntries(
      agentIds.map((id) => [id, grid.terrain.map((row) => row.map(() => false))]),
    ),
    landGrowthInterval,
  };
  updateDiscovered(state);
  return state;
}

// === Queries ===

export function generalOf(state: GameState, agent: AgentId): Position | undefined {
  const index = state.agents.indexOf(agent);
  return index < 0 ? undefined : state.grid.generals[index];
}

export function isDone(state: GameState): boolean {
  return state.phase === "ended";
}

// === Step ===

/** Structural checks only; throws before anything is mutated */
function parseActions(state: GameState, actions: Record<AgentId, unknown>): Map<AgentId, Action> {
  if (state.phase === "ended") throw new InvalidActionError("Game is already over");
  if (typeof actions !== "object" || actions === null) {
    throw new InvalidActionError("Actions must be a mapping from agent id to action");
  }

  const parsed = new Map<AgentId, Action>();
  for (const [agent, raw] of Object.entries(actions)) {
    if (!state.agents.includes(agent)) throw new InvalidActionError(`Unknown agent "${agent}"`);
    const result = ActionSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join(".") || "action"}: ${i.message}`);
      throw new InvalidActionError(`Malformed action for "${agent}": ${issues.join("; ")}`);
    }
    parsed.set(agent, result.data);
  }
  for (const agent of state.alive) {
    if (!parsed.has(agent)) throw new InvalidActionError(`Missing action for "${agent}"`);
  }
  return parsed;
}

function applyGrowth(state: GameState, turn: number): void {
  for (let r = 0; r < state.grid.rows; r++) {
    for (let c = 0; c < state.grid.cols; c++) {
      state.army[r][c] += growthAt(state, { row: r, col: c }, turn);
    }
  }
}

function eliminate(
  state: GameState,
  defeated: AgentId,
  capturer: AgentId,
  turn: number,
  onEvent?: GameEventListener,
): void {
  let transferred = 0;
  for (let r = 0; r < state.grid.rows; r++) {
    for (let c = 0; c < state.grid.cols; c++) {
      if (state.owner[r][c] !== defeated) continue;
      const halved = Math.floor(state.army[r][c] / 2);
      state.army[r][c] = halved;
      // an emptied cell is left neutral, like a tie; owned cities never sit at 0
      if (halved === 0) {
        state.owner[r][c] = null;
      } else {
        state.owner[r][c] = capturer;
        transferred++;
      }
    }
  }
  state.alive = state.alive.filter((id) => id !== defeated);
  onEvent?.({ type: "agent_eliminated", turn, agent: defeated, by: capturer, cellsTransferred: transferred });
}

function resolveMove(
  state: GameState,
  agent: AgentId,
  action: Extract<Action, { type: "move" }>,
  turn: number,
  onEvent?: GameEventListener,
): void {
  const from = { row: action.row, col: action.col };
  const to = offset(from, action.direction);
  const moved = movedArmy(state.army[from.row][from.col], action.split);
  state.army[from.row][from.col] -= moved;

  const defender = state.owner[to.row][to.col];
  const emit = (outcome: "merged" | "repelled" | "neutralized" | "captured") =>
    onEvent?.({
      type: "move_resolved",
      turn,
      agent,
      from,
      to,
      moved,
      outcome,
      defender,
      armyAfter: state.army[to.row][to.col],
    });

  if (defender === agent) {
    state.army[to.row][to.col] += moved;
    emit("merged");
    return;
  }

  const result = state.army[to.row][to.col] - moved;
  const isGeneral = state.terrain[to.row][to.col] === "general";
  if (result < 0) {
    state.owner[to.row][to.col] = agent;
    state.army[to.row][to.col] = -result;
    emit("captured");
    const general = defender === null ? undefined : generalOf(state, defender);
    if (defender !== null && general && samePosition(general, to) && state.alive.includes(defender)) {
      eliminate(state, defender, agent, turn, onEvent);
    }
  } else if (result === 0 && !(isGeneral && defender !== null)) {
    // nothing left over to occupy the cell with
    state.owner[to.row][to.col] = null;
    state.army[to.row][to.col] = 0;
    emit("neutralized");
  } else {
    // an owned general tied to 0 keeps its owner: only a capture eliminates
    state.army[to.row][to.col] = result;
    emit("repelled");
  }
}

function updateDiscovered(state: GameState): void {
  for (const agent of state.alive) {
    const visible = visibleCells(state, agent);
    const seen = state.discovered[agent];
    visible.forEach((row, r) =>
      row.forEach((v, c) => {
        if (v) seen[r][c] = true;
      }),
    );
  }
}

function ascending(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Resolve one simultaneous turn. Structural problems throw InvalidActionError and
 * leave the state as it was; illegal moves are downgraded to idle.
 */
export function step(
  state: GameState,
  actions: ActionSet,
  options: StepOptions = {},
): StepResult {
  const parsed = parseActions(state, actions);
  const { onEvent } = options;
  const turn = state.turn + 1;
  const downgraded = new Set<AgentId>();

  applyGrowth(state, turn);

  const order = [...state.alive].sort(ascending);
  for (const agent of order) {
    // captured earlier this turn
    if (!state.alive.includes(agent)) continue;
    const action = parsed.get(agent);
    if (!action || action.type === "idle") continue;

    const source = { row: action.row, col: action.col };
    const reason = moveBlocker(state, agent, source, action.direction);
    if (reason) {
      downgraded.add(agent);
      onEvent?.({
        type: "action_downgraded",
        turn,
        agent,
        from: source,
        direction: action.direction,
        reason,
      });
      continue;
    }
    resolveMove(state, agent, action, turn, onEvent);
  }

  if (state.alive.length <= 1) {
    state.phase = "ended";
    state.winner = state.alive[0] ?? null;
    onEvent?.({ type: "game_end", turn, winner: state.winner });
  }

  state.turn = turn;
  updateDiscovered(state);
  options.replay?.addState(state);

  const observations: StepResult["observations"] = {};
  const infos: StepResult["infos"] = {};
  for (const agent of state.agents) {
    observations[agent] = observe(state, agent);
    infos[agent] = agentInfo(state, agent, downgraded.has(agent));
  }
  return { observations, infos };
}

/** Observations for every agent without advancing the game, e.g. right after createGame */
export function observeAll(state: GameState): StepResult["observations"] {
  return Object.fromEntries(state.agents.map((agent) => [agent, observe(state, agent)]));
}
