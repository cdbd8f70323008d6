/**
 * Seeded randomness for event rolls and crop growth. Two runs with the same
 * CALENDAR_SEED make the same random-event and growth decisions.
 */

export interface Random {
  next(): number; // [0,1)
  int(maxExclusive: number): number;
  chance(probability: number): boolean; // 0-1
}

/** Uniform draw in [0,100) compared against a whole-number percentage. */
export function rollPercent(rng: Random, percent: number): boolean {
  return rng.int(100) < percent;
}

function hashSeed(seed: string): number {
  let h = 1779033703 ^ seed.length;
  for (let i = 0; i < seed.length; i += 1) {
    h = Math.imul(h ^ seed.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  return (h >>> 0) || 1;
}

// Mulberry32
function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a |= 0;
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function makeRandom(seed: string): Random {
  const rng = mulberry32(hashSeed(seed));
  console.log(`🎲 Seed: ${seed}`);

  return {
    next: rng,
    int(maxExclusive: number) {
      if (maxExclusive <= 1) return 0;
      return Math.floor(rng() * maxExclusive);
    },
    chance(probability: number): boolean {
      if (probability <= 0) return false;
      if (probability >= 1) return true;
      return rng() < probability;
    },
  };
}
