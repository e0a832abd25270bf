// === Rules Config (all tunable simulation parameters) ===
// Snapshotted into every match log for reproducibility.

export interface RulesConfig {
  /** Non-general, non-city owned cells grow by 1 on turns divisible by this */
  landGrowthInterval: number;
  /** A city encoded as digit d starts with cityBaseArmy + d */
  cityBaseArmy: number;
  generalStartArmy: number;
  maxGenerationAttempts: number;
  generator: {
    rows: number;
    cols: number;
    mountainDensity: number;
    cityDensity: number;
  };
}

export const RULES: RulesConfig = {
  landGrowthInterval: 50,
  cityBaseArmy: 40,
  generalStartArmy: 1,
  maxGenerationAttempts: 100,
  generator: {
    rows: 10,
    cols: 10,
    mountainDensity: 0.2,
    cityDensity: 0.05,
  },
};

// === Core Types ===

export type AgentId = string;
export type Position = { row: number; col: number };
export type Direction = "up" | "down" | "left" | "right";
export type Terrain = "passable" | "mountain" | "city" | "general";

/** Mask and observation index order */
export const DIRECTIONS: readonly Direction[] = ["up", "down", "left", "right"];

export const DIRECTION_OFFSETS: Record<Direction, Position> = {
  up: { row: -1, col: 0 },
  down: { row: 1, col: 0 },
  left: { row: 0, col: -1 },
  right: { row: 0, col: 1 },
};

// === Grid ===

export interface Grid {
  rows: number;
  cols: number;
  terrain: Terrain[][];
  /** Starting army of city cells, 0 elsewhere */
  cityArmy: number[][];
  /** General position of each agent, by agent index */
  generals: Position[];
}

// === Actions ===

export type Action =
  | { type: "move"; row: number; col: number; direction: Direction; split: boolean }
  | { type: "idle" };

export type ActionSet = Record<AgentId, Action>;

// === Game State ===

export interface GameState {
  grid: Grid;
  /** Agent ids by agent index */
  agents: AgentId[];
  army: number[][];
  /** null = neutral */
  owner: (AgentId | null)[][];
  terrain: Terrain[][];
  /** Living agents, agent-index order */
  alive: AgentId[];
  turn: number;
  phase: "play" | "ended";
  /** Set when phase is "ended"; null means nobody survived */
  winner?: AgentId | null;
  /** Cells each agent has seen at least once */
  discovered: Record<AgentId, boolean[][]>;
  landGrowthInterval: number;
}

// === Observation ===

export type OwnerClass = "self" | "opponent" | "neutral" | "hidden";

export interface CellView {
  terrain: Terrain | "unknown";
  owner: OwnerClass;
  /** null when hidden by fog, never 0 as a stand-in */
  army: number | null;
}

export interface Observation {
  agent: AgentId;
  turn: number;
  rows: number;
  cols: number;
  cells: CellView[][];
  /** [row][col][direction index], see DIRECTIONS */
  actionMask: boolean[][][];
  alive: AgentId[];
  isDone: boolean;
  isWinner: boolean;
}

export interface Info {
  turn: number;
  /** Total army on owned cells */
  army: number;
  /** Owned cell count */
  land: number;
  isDone: boolean;
  isWinner: boolean;
  /** The submitted move was turned into idle */
  downgraded: boolean;
}

export interface StepResult {
  observations: Record<AgentId, Observation>;
  infos: Record<AgentId, Info>;
}

// === Agent Interface ===

export type Color = [number, number, number];

export interface Agent {
  id: AgentId;
  color: Color;
  play(observation: Observation): Action;
  reset(): void;
}

/** Display metadata carried into replays */
export interface AgentMeta {
  id: AgentId;
  name: string;
  color: Color;
}

export interface PRNG {
  /** Float in [0, 1) */
  next(): number;
  /** Inclusive on both ends */
  nextInt(min: number, max: number): number;
}
