import type { AgentId, CellView, GameState, Info, Observation, OwnerClass } from "../types";
import { DIRECTIONS } from "../types";
import { growthAt, moveBlocker } from "./rules";

// === Visibility ===

/** Own cells plus their eight neighbours */
export function visibleCells(state: GameState, agent: AgentId): boolean[][] {
  const { rows, cols } = state.grid;
  const visible = Array.from({ length: rows }, () => new Array<boolean>(cols).fill(false));
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      if (state.owner[r][c] !== agent) continue;
      for (let dr = -1; dr <= 1; dr++) {
        for (let dc = -1; dc <= 1; dc++) {
          const nr = r + dr;
          const nc = c + dc;
          if (nr >= 0 && nr < rows && nc >= 0 && nc < cols) visible[nr][nc] = true;
        }
      }
    }
  }
  return visible;
}

// === Action Mask ===

/**
 * mask[row][col][d] is true iff a move from (row, col) in DIRECTIONS[d] would not
 * be downgraded by the next step, taking that step's growth into account.
 */
export function actionMask(state: GameState, agent: AgentId): boolean[][][] {
  const { rows, cols } = state.grid;
  const mask = Array.from({ length: rows }, () =>
    Array.from({ length: cols }, () => DIRECTIONS.map(() => false)),
  );
  if (state.phase === "ended" || !state.alive.includes(agent)) return mask;

  const nextTurn = state.turn + 1;
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      if (state.owner[r][c] !== agent) continue;
      const source = { row: r, col: c };
      const pending = growthAt(state, source, nextTurn);
      DIRECTIONS.forEach((direction, d) => {
        mask[r][c][d] = moveBlocker(state, agent, source, direction, pending) === null;
      });
    }
  }
  return mask;
}

// === Observation ===

function ownerClass(owner: AgentId | null, agent: AgentId): OwnerClass {
  if (owner === null) return "neutral";
  return owner === agent ? "self" : "opponent";
}

export function observe(state: GameState, agent: AgentId): Observation {
  const visible = visibleCells(state, agent);
  const discovered = state.discovered[agent];

  const cells: CellView[][] = state.terrain.map((row, r) =>
    row.map((terrain, c): CellView => {
      if (visible[r][c]) {
        return { terrain, owner: ownerClass(state.owner[r][c], agent), army: state.army[r][c] };
      }
      // mountains are static map knowledge
      const known = terrain === "mountain" || (discovered?.[r][c] ?? false);
      return { terrain: known ? terrain : "unknown", owner: "hidden", army: null };
    }),
  );

  return {
    agent,
    turn: state.turn,
    rows: state.grid.rows,
    cols: state.grid.cols,
    cells,
    actionMask: actionMask(state, agent),
    alive: [...state.alive],
    isDone: state.phase === "ended",
    isWinner: state.phase === "ended" && state.winner === agent,
  };
}

export function agentInfo(state: GameState, agent: AgentId, downgraded = false): Info {
  let army = 0;
  let land = 0;
  for (let r = 0; r < state.grid.rows; r++) {
    for (let c = 0; c < state.grid.cols; c++) {
      if (state.owner[r][c] !== agent) continue;
      army += state.army[r][c];
      land++;
    }
  }
  return {
    turn: state.turn,
    army,
    land,
    isDone: state.phase === "ended",
    isWinner: state.phase === "ended" && state.winner === agent,
    downgraded,
  };
}
