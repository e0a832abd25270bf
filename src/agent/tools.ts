/**
 * Observation queries shared by the built-in agents, so none of them has to
 * decode the action mask by hand.
 */

import type { CellView, Direction, Observation, Position } from "../types";
import { DIRECTIONS } from "../types";
import { offset } from "../engine/grid";

export interface LegalMove {
  from: Position;
  to: Position;
  direction: Direction;
}

/** Every (source, direction) the mask allows, row-major then DIRECTIONS order */
export function legalMoves(obs: Observation): LegalMove[] {
  const moves: LegalMove[] = [];
  obs.actionMask.forEach((row, r) =>
    row.forEach((dirs, c) =>
      dirs.forEach((allowed, d) => {
        if (!allowed) return;
        const direction = DIRECTIONS[d];
        const from = { row: r, col: c };
        moves.push({ from, to: offset(from, direction), direction });
      }),
    ),
  );
  return moves;
}

export function cellAt(obs: Observation, pos: Position): CellView {
  return obs.cells[pos.row][pos.col];
}

/** Whether moving all but one from `move.from` would take `move.to` */
export function canCapture(obs: Observation, move: LegalMove): boolean {
  const source = cellAt(obs, move.from).army ?? 0;
  const target = cellAt(obs, move.to).army;
  return target !== null && source > target + 1;
}
