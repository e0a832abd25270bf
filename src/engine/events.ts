import { z } from "zod/v4";

// === Primitives ===

export const PositionSchema = z.object({ row: z.int().min(0), col: z.int().min(0) });
export const DirectionSchema = z.enum(["up", "down", "left", "right"]);

export const ActionSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("move"),
    row: z.int(),
    col: z.int(),
    direction: DirectionSchema,
    split: z.boolean(),
  }),
  z.object({ type: z.literal("idle") }),
]);

// === Engine Events (all carry the turn being resolved) ===

const ActionDowngradedEvent = z.object({
  type: z.literal("action_downgraded"),
  turn: z.int(),
  agent: z.string(),
  // may lie off-grid
  from: z.object({ row: z.int(), col: z.int() }),
  direction: DirectionSchema,
  reason: z.enum(["not_owned", "insufficient_army", "off_grid", "mountain"]),
});

const MoveResolvedEvent = z.object({
  type: z.literal("move_resolved"),
  turn: z.int(),
  agent: z.string(),
  from: PositionSchema,
  to: PositionSchema,
  moved: z.int(),
  outcome: z.enum(["merged", "repelled", "neutralized", "captured"]),
  /** Owner of the destination before the move, null = neutral */
  defender: z.string().nullable(),
  armyAfter: z.int(),
});

const AgentEliminatedEvent = z.object({
  type: z.literal("agent_eliminated"),
  turn: z.int(),
  agent: z.string(),
  by: z.string(),
  cellsTransferred: z.int(),
});

const GameEndEvent = z.object({
  type: z.literal("game_end"),
  turn: z.int(),
  winner: z.string().nullable(),
});

export const GameEvent = z.discriminatedUnion("type", [
  ActionDowngradedEvent,
  MoveResolvedEvent,
  AgentEliminatedEvent,
  GameEndEvent,
]);

export type GameEvent = z.infer<typeof GameEvent>;
export type DowngradeReason = z.infer<typeof ActionDowngradedEvent>["reason"];

export type GameEventListener = (event: GameEvent) => void;
