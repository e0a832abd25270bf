import type { Action, Agent, AgentId, Color, Observation, PRNG } from "../types";
import type { AgentSpec } from "../config";
import { createPRNG, pick } from "../engine/prng";
import { canCapture, cellAt, legalMoves } from "./tools";
import type { LegalMove } from "./tools";

export const DEFAULT_COLORS: Color[] = [
  [255, 107, 108],
  [67, 99, 216],
  [60, 180, 75],
  [245, 130, 48],
];

const IDLE: Action = { type: "idle" };

function toAction(move: LegalMove, split: boolean): Action {
  return { type: "move", row: move.from.row, col: move.from.col, direction: move.direction, split };
}

// === Random ===

export interface RandomAgentOptions {
  color?: Color;
  idleProbability?: number;
  splitProbability?: number;
  seed?: number | string;
}

/** Uniform over legal moves; idles now and then */
export class RandomAgent implements Agent {
  readonly color: Color;
  private readonly idleProbability: number;
  private readonly splitProbability: number;
  private readonly seed: number | string;
  private prng: PRNG;

  constructor(
    readonly id: AgentId,
    options: RandomAgentOptions = {},
  ) {
    this.color = options.color ?? DEFAULT_COLORS[0];
    this.idleProbability = options.idleProbability ?? 0.1;
    this.splitProbability = options.splitProbability ?? 0.25;
    this.seed = options.seed ?? id;
    this.prng = createPRNG(this.seed);
  }

  play(observation: Observation): Action {
    const moves = legalMoves(observation);
    if (moves.length === 0 || this.prng.next() < this.idleProbability) return IDLE;
    const move = pick(moves, this.prng);
    return toAction(move, this.prng.next() < this.splitProbability);
  }

  reset(): void {
    this.prng = createPRNG(this.seed);
  }
}

// === Expander ===

/** Captures an opponent cell if it can, else a neutral one, else wanders */
export class ExpanderAgent implements Agent {
  readonly color: Color;
  private readonly seed: number | string;
  private prng: PRNG;

  constructor(
    readonly id: AgentId,
    options: { color?: Color; seed?: number | string } = {},
  ) {
    this.color = options.color ?? DEFAULT_COLORS[1];
    this.seed = options.seed ?? id;
    this.prng = createPRNG(this.seed);
  }

  play(observation: Observation): Action {
    const moves = legalMoves(observation);
    if (moves.length === 0) return IDLE;

    const capturing = moves.filter((m) => canCapture(observation, m));
    const toOpponent = capturing.filter((m) => cellAt(observation, m.to).owner === "opponent");
    const toNeutral = capturing.filter((m) => cellAt(observation, m.to).owner === "neutral");

    const pool = toOpponent.length > 0 ? toOpponent : toNeutral.length > 0 ? toNeutral : moves;
    return toAction(pick(pool, this.prng), false);
  }

  reset(): void {
    this.prng = createPRNG(this.seed);
  }
}

// === Scripted ===

/** Plays a fixed sequence, then idles */
export class ScriptedAgent implements Agent {
  readonly color: Color;
  private cursor = 0;

  constructor(
    readonly id: AgentId,
    private readonly script: Action[],
    color?: Color,
  ) {
    this.color = color ?? DEFAULT_COLORS[2];
  }

  play(_observation: Observation): Action {
    const action = this.script[this.cursor];
    if (!action) return IDLE;
    this.cursor++;
    return action;
  }

  reset(): void {
    this.cursor = 0;
  }
}

// === Factory ===

export function createAgent(spec: AgentSpec, index = 0): Agent {
  const color = spec.color ?? DEFAULT_COLORS[index % DEFAULT_COLORS.length];
  switch (spec.kind) {
    case "random":
      return new RandomAgent(spec.id, {
        color,
        idleProbability: spec.idleProbability,
        splitProbability: spec.splitProbability,
        seed: spec.seed,
      });
    case "expander":
      return new ExpanderAgent(spec.id, { color, seed: spec.seed });
    case "scripted":
      return new ScriptedAgent(spec.id, spec.actions, color);
  }
}
