import { describe, test, expect } from "vitest";
import { canCapture, cellAt, legalMoves } from "./tools";
import { createGame } from "../engine/game";
import { parseGrid } from "../engine/grid";
import { observe } from "../engine/observation";

function state() {
  return createGame(parseGrid("A...\n....\n....\n...B"), ["a", "b"]);
}

describe("legalMoves", () => {
  test("lists mask entries row-major in direction order", () => {
    const s = state();
    s.owner[1][1] = "a";
    s.army[1][1] = 3;
    const moves = legalMoves(observe(s, "a"));
    expect(moves.map((m) => `${m.from.row},${m.from.col} ${m.direction}`)).toEqual([
      "0,0 down",
      "0,0 right",
      "1,1 up",
      "1,1 down",
      "1,1 left",
      "1,1 right",
    ]);
    expect(moves[1].to).toEqual({ row: 0, col: 1 });
  });

  test("empty for an agent with no cells", () => {
    expect(legalMoves(observe(state(), "z"))).toEqual([]);
  });
});

describe("canCapture", () => {
  test("needs more than the target plus one", () => {
    const s = state();
    s.owner[1][1] = "a";
    s.army[1][1] = 4;
    s.army[1][2] = 2;
    s.army[2][1] = 3;
    const obs = observe(s, "a");
    const from = { row: 1, col: 1 };
    expect(canCapture(obs, { from, to: { row: 1, col: 2 }, direction: "right" })).toBe(true);
    expect(canCapture(obs, { from, to: { row: 2, col: 1 }, direction: "down" })).toBe(false);
  });

  test("never for a hidden target", () => {
    const s = state();
    s.owner[1][1] = "a";
    s.army[1][1] = 9;
    const obs = observe(s, "a");
    expect(cellAt(obs, { row: 2, col: 3 }).army).toBeNull();
    expect(
      canCapture(obs, { from: { row: 1, col: 2 }, to: { row: 2, col: 3 }, direction: "down" }),
    ).toBe(false);
  });
});
