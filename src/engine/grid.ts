import type { Direction, Grid, Position, Terrain } from "../types";
import { DIRECTION_OFFSETS, RULES } from "../types";
import { InvalidGridError } from "./errors";
import { createPRNG } from "./prng";

// === Text Encoding ===
//   .      passable
//   #      mountain
//   0-9    city, starting army RULES.cityBaseArmy + digit
//   A-Z    general of agent index 0-25

const PASSABLE_CHAR = ".";
const MOUNTAIN_CHAR = "#";
const MAX_AGENTS = 26;

export interface GridLayout {
  terrain: Terrain[][];
  cityArmy?: number[][];
  generals: Position[];
}

export interface GeneratorOptions {
  rows: number;
  cols: number;
  agentCount: number;
  mountainDensity: number;
  cityDensity: number;
  /** Fixed general placement, by agent index */
  generals?: Position[];
}

// === Geometry ===

export function inBounds(dims: { rows: number; cols: number }, pos: Position): boolean {
  return pos.row >= 0 && pos.row < dims.rows && pos.col >= 0 && pos.col < dims.cols;
}

export function offset(pos: Position, direction: Direction): Position {
  const d = DIRECTION_OFFSETS[direction];
  return { row: pos.row + d.row, col: pos.col + d.col };
}

export function neighbors4(dims: { rows: number; cols: number }, pos: Position): Position[] {
  return (["up", "down", "left", "right"] as const)
    .map((d) => offset(pos, d))
    .filter((p) => inBounds(dims, p));
}

export function samePosition(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col;
}

function key(pos: Position): string {
  return `${pos.row},${pos.col}`;
}

// === Validation ===

function isConnected(terrain: Terrain[][], generals: Position[]): boolean {
  const dims = { rows: terrain.length, cols: terrain[0]?.length ?? 0 };
  const start = generals[0];
  if (!start) return true;

  const seen = new Set<string>([key(start)]);
  const queue: Position[] = [start];
  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) break;
    for (const next of neighbors4(dims, current)) {
      if (terrain[next.row][next.col] === "mountain" || seen.has(key(next))) continue;
      seen.add(key(next));
      queue.push(next);
    }
  }
  return generals.every((g) => seen.has(key(g)));
}

/** Returns null when the layout is a valid grid for agentCount agents, else the reason */
export function validateLayout(layout: GridLayout, agentCount: number): string | null {
  const { terrain, generals } = layout;
  const rows = terrain.length;
  const cols = terrain[0]?.length ?? 0;
  if (rows === 0 || cols === 0) return "Grid must have at least one row and one column";

  for (let r = 0; r < rows; r++) {
    if (terrain[r].length !== cols) {
      return `Row ${r} has ${terrain[r].length} cells, expected ${cols}`;
    }
  }

  const cityArmy = layout.cityArmy;
  if (cityArmy && (cityArmy.length !== rows || cityArmy.some((row) => row.length !== cols))) {
    return "City army layout does not match grid dimensions";
  }

  if (agentCount < 1 || agentCount > MAX_AGENTS) {
    return `Agent count must be between 1 and ${MAX_AGENTS}`;
  }
  if (generals.length !== agentCount) {
    return `Expected ${agentCount} generals, found ${generals.length}`;
  }

  const generalKeys = new Set<string>();
  for (const [i, g] of generals.entries()) {
    if (!inBounds({ rows, cols }, g)) return `General ${i} is out of bounds`;
    if (generalKeys.has(key(g))) return `General ${i} shares a cell with another general`;
    generalKeys.add(key(g));
    if (terrain[g.row][g.col] !== "general") {
      return `General ${i} sits on ${terrain[g.row][g.col]} terrain`;
    }
  }

  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const t = terrain[r][c];
      if (t === "general" && !generalKeys.has(key({ row: r, col: c }))) {
        return `General cell at (${r}, ${c}) has no owning agent`;
      }
      const strength = cityArmy?.[r][c] ?? 0;
      if (t === "city") {
        const max = RULES.cityBaseArmy + 9;
        if (!Number.isInteger(strength) || strength < RULES.cityBaseArmy || strength > max) {
          return `City at (${r}, ${c}) has strength ${strength}, expected ${RULES.cityBaseArmy}-${max}`;
        }
      } else if (strength !== 0) {
        return `Non-city cell at (${r}, ${c}) has a starting army`;
      }
    }
  }

  if (!isConnected(terrain, generals)) return "Generals are not connected";
  return null;
}

// === Construction ===

export function createGrid(layout: GridLayout, agentCount: number): Grid {
  const error = validateLayout(layout, agentCount);
  if (error) throw new InvalidGridError(error);

  const rows = layout.terrain.length;
  const cols = layout.terrain[0].length;
  return {
    rows,
    cols,
    terrain: layout.terrain.map((row) => [...row]),
    cityArmy: layout.cityArmy
      ? layout.cityArmy.map((row) => [...row])
      : Array.from({ length: rows }, () => new Array<number>(cols).fill(0)),
    generals: layout.generals.map((g) => ({ ...g })),
  };
}

export function parseGrid(text: string, agentCount = 2): Grid {
  const lines = text.replace(/\r/g, "").split("\n");
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();

  const terrain: Terrain[][] = [];
  const cityArmy: number[][] = [];
  const generalsByIndex = new Map<number, Position>();

  lines.forEach((line, row) => {
    const terrainRow: Terrain[] = [];
    const armyRow: number[] = [];
    [...line].forEach((ch, col) => {
      if (ch === PASSABLE_CHAR) {
        terrainRow.push("passable");
        armyRow.push(0);
      } else if (ch === MOUNTAIN_CHAR) {
        terrainRow.push("mountain");
        armyRow.push(0);
      } else if (ch >= "0" && ch <= "9") {
        terrainRow.push("city");
        armyRow.push(RULES.cityBaseArmy + Number(ch));
      } else if (ch >= "A" && ch <= "Z") {
        const index = ch.charCodeAt(0) - 65;
        if (generalsByIndex.has(index)) {
          throw new InvalidGridError(`Agent ${ch} has more than one general`);
        }
        generalsByIndex.set(index, { row, col });
        terrainRow.push("general");
        armyRow.push(0);
      } else {
        throw new InvalidGridError(`Unknown grid symbol "${ch}" at (${row}, ${col})`);
      }
    });
    terrain.push(terrainRow);
    cityArmy.push(armyRow);
  });

  const generals: Position[] = [];
  for (let i = 0; i < generalsByIndex.size; i++) {
    const g = generalsByIndex.get(i);
    if (!g) {
      throw new InvalidGridError(`General ${String.fromCharCode(65 + i)} is missing`);
    }
    generals.push(g);
  }

  return createGrid({ terrain, cityArmy, generals }, agentCount);
}

export function serializeGrid(grid: Grid): string {
  const generalAt = new Map(grid.generals.map((g, i) => [key(g), i]));
  return grid.terrain
    .map((row, r) =>
      row
        .map((t, c) => {
          switch (t) {
            case "passable":
              return PASSABLE_CHAR;
            case "mountain":
              return MOUNTAIN_CHAR;
            case "city":
              return String(grid.cityArmy[r][c] - RULES.cityBaseArmy);
            case "general":
              return String.fromCharCode(65 + (generalAt.get(key({ row: r, col: c })) ?? 0));
          }
        })
        .join(""),
    )
    .join("\n");
}

// === Procedural Generation ===

function randomGenerals(
  rows: number,
  cols: number,
  count: number,
  next: () => number,
): Position[] {
  const taken = new Set<string>();
  const generals: Position[] = [];
  while (generals.length < count) {
    const pos = { row: Math.floor(next() * rows), col: Math.floor(next() * cols) };
    if (taken.has(key(pos))) continue;
    taken.add(key(pos));
    generals.push(pos);
  }
  return generals;
}

/** Seeded generator: same options and seed, same grid */
export function generateGrid(options: Partial<GeneratorOptions> = {}, seed: number | string = 0): Grid {
  const opts: GeneratorOptions = { ...RULES.generator, agentCount: 2, ...options };
  const { rows, cols, agentCount, mountainDensity, cityDensity } = opts;

  if (rows < 1 || cols < 1) throw new InvalidGridError("Grid must have at least one row and one column");
  if (agentCount < 1 || agentCount > Math.min(MAX_AGENTS, rows * cols)) {
    throw new InvalidGridError(`Cannot place ${agentCount} generals on a ${rows}x${cols} grid`);
  }
  if (opts.generals) {
    const fixed = opts.generals;
    if (fixed.length !== agentCount) {
      throw new InvalidGridError(`Expected ${agentCount} generals, found ${fixed.length}`);
    }
    if (fixed.some((g) => !inBounds({ rows, cols }, g))) {
      throw new InvalidGridError("Fixed general position is out of bounds");
    }
    if (new Set(fixed.map(key)).size !== fixed.length) {
      throw new InvalidGridError("Fixed general positions must be distinct");
    }
  }

  const prng = createPRNG(seed);
  for (let attempt = 0; attempt < RULES.maxGenerationAttempts; attempt++) {
    const terrain: Terrain[][] = [];
    const cityArmy: number[][] = [];
    for (let r = 0; r < rows; r++) {
      const terrainRow: Terrain[] = [];
      const armyRow: number[] = [];
      for (let c = 0; c < cols; c++) {
        const roll = prng.next();
        if (roll < mountainDensity) {
          terrainRow.push("mountain");
          armyRow.push(0);
        } else if (roll < mountainDensity + cityDensity) {
          terrainRow.push("city");
          armyRow.push(RULES.cityBaseArmy + prng.nextInt(0, 9));
        } else {
          terrainRow.push("passable");
          armyRow.push(0);
        }
      }
      terrain.push(terrainRow);
      cityArmy.push(armyRow);
    }

    const generals = opts.generals
      ? opts.generals.map((g) => ({ ...g }))
      : randomGenerals(rows, cols, agentCount, () => prng.next());
    for (const g of generals) {
      terrain[g.row][g.col] = "general";
      cityArmy[g.row][g.col] = 0;
    }

    const layout = { terrain, cityArmy, generals };
    if (validateLayout(layout, agentCount) === null) return createGrid(layout, agentCount);
  }

  throw new InvalidGridError(
    `Could not generate a connected ${rows}x${cols} grid in ${RULES.maxGenerationAttempts} attempts`,
  );
}
