// Mulberry32 seeded PRNG. Map generation and random agents draw from this,
// never from Math.random, so a seed fully determines a match.

import type { PRNG } from "../types";

/** FNV-1a: string seed to uint32 */
export function hashSeed(seed: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    hash ^= seed.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

function mulberry32Step(state: number): [number, number] {
  const nextState = (state + 0x6d2b79f5) >>> 0;
  let t = nextState;
  t = Math.imul(t ^ (t >>> 15), t | 1);
  t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
  const value = ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  return [value, nextState];
}

export function createPRNG(seed: number | string): PRNG {
  let current = typeof seed === "string" ? hashSeed(seed) : seed >>> 0;

  return {
    next(): number {
      const [value, nextState] = mulberry32Step(current);
      current = nextState;
      return value;
    },

    nextInt(min: number, max: number): number {
      return min + Math.floor(this.next() * (max - min + 1));
    },
  };
}

/** Uniform pick; throws on an empty list */
export function pick<T>(items: readonly T[], prng: PRNG): T {
  const item = items[prng.nextInt(0, items.length - 1)];
  if (item === undefined) throw new Error("pick: items must not be empty");
  return item;
}

