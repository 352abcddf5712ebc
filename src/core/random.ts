/**
 * Seedable random source and the draws the sampler needs.
 */

/** Returns a float in [0, 1). */
export type Rng = () => number;

export function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seeded generator when a seed is given, Math.random otherwise.
 */
export function createRng(seed?: number): Rng {
  return seed === undefined ? Math.random : mulberry32(seed);
}

/**
 * Normal draw (Box-Muller). A zero standard deviation returns the mean.
 */
export function randomNormal(rng: Rng, mean: number, stdDev: number): number {
  if (stdDev <= 0) return mean;
  // 1 - rng() keeps u1 in (0, 1] so log() stays finite
  const u1 = 1 - rng();
  const u2 = rng();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + z * stdDev;
}

/**
 * Uniform integer in [min, max], both inclusive.
 */
export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

export function pickOne<T>(rng: Rng, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[Math.min(Math.floor(rng() * items.length), items.length - 1)];
}
