import type { AgentId, Direction, GameState, Position } from "../types";
import type { DowngradeReason } from "./events";
import { inBounds, offset } from "./grid";

/** Army a cell gains when `turn` is resolved */
export function growthAt(state: GameState, pos: Position, turn: number): number {
  const owner = state.owner[pos.row][pos.col];
  if (owner === null || !state.alive.includes(owner)) return 0;
  const terrain = state.terrain[pos.row][pos.col];
  if (terrain === "general" || terrain === "city") return 1;
  return turn % state.landGrowthInterval === 0 ? 1 : 0;
}

/**
 * Why a move would be turned into idle, or null when it goes through.
 * `pendingArmy` is growth not yet applied to the source.
 */
export function moveBlocker(
  state: GameState,
  agent: AgentId,
  source: Position,
  direction: Direction,
  pendingArmy = 0,
): DowngradeReason | null {
  if (!inBounds(state.grid, source) || state.owner[source.row][source.col] !== agent) {
    return "not_owned";
  }
  if (state.army[source.row][source.col] + pendingArmy <= 1) return "insufficient_army";
  const dest = offset(source, direction);
  if (!inBounds(state.grid, dest)) return "off_grid";
  if (state.terrain[dest.row][dest.col] === "mountain") return "mountain";
  return null;
}

/** Half rounded down when splitting, else all but one */
export function movedArmy(sourceArmy: number, split: boolean): number {
  return split ? Math.floor(sourceArmy / 2) : sourceArmy - 1;
}
