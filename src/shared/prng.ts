import { randomInt } from "node:crypto";

/** Seedable random source for rollouts. */
export type Rng = {
  /** Uniform in [0, 1). */
  next(): number;
  /** Uniform integer in [0, n); 0 when n < 1. */
  below(n: number): number;
  pick<T>(items: readonly T[]): T;
  readonly seed: number;
};

function hashSeed(s: string): number {
  // FNV-1a
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

// Mulberry32
function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function normalizeSeed(seed: number | string): number {
  if (typeof seed === "string") {
    const trimmed = seed.trim();
    if (/^\d+$/.test(trimmed)) return Number(trimmed) >>> 0;
    return hashSeed(trimmed);
  }
  return Number.isFinite(seed) ? Math.trunc(seed) >>> 0 : 0;
}

export function randomSeed(): number {
  return randomInt(0, 0x1_0000_0000);
}

export function createRng(seed: number | string = randomSeed()): Rng {
  const seed32 = normalizeSeed(seed);
  const next = mulberry32(seed32);
  const below = (n: number): number => {
    const k = Math.floor(n);
    if (!Number.isFinite(k) || k < 1) return 0;
    return Math.floor(next() * k);
  };
  return {
    seed: seed32,
    next,
    below,
    pick: <T,>(items: readonly T[]): T => {
      if (items.length === 0) throw new Error("pick() from empty array");
      return items[below(items.length)];
    },
  };
}
