/**
 * Seeded generator whose whole state is one unsigned 32-bit integer, so it
 * can travel inside a game state and keep transitions pure (mulberry32).
 */
export interface RandomDraw {
  /** Uniform in [0, 1). */
  value: number;
  /** Seed to carry forward for the next draw. */
  seed: number;
}

export function nextRandom(seed: number): RandomDraw {
  const next = (seed + 0x6d2b79f5) >>> 0;
  let t = next;
  t = Math.imul(t ^ (t >>> 15), t | 1);
  t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
  return { value: ((t ^ (t >>> 14)) >>> 0) / 4294967296, seed: next };
}

export function normalizeSeed(seed: number): number {
  if (!Number.isFinite(seed)) throw new Error(`Seed must be a finite number, got ${seed}`);
  return Math.trunc(seed) >>> 0;
}
