const INTEGER = /^[+-]?\d+$/;

/** Parses a base-10 integer with an optional sign; anything else is null. */
export function parseInteger(value: string): number | null {
  return INTEGER.test(value) ? parseInt(value, 10) : null;
}

export type RandomSource = () => number;

/**
 * Deterministic PRNG (mulberry32). Returns floats in [0, 1).
 */
export function createRng(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r = (r + Math.imul(r ^ (r >>> 7), 61 | r)) ^ r;
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function shuffle<T>(array: T[], random: RandomSource = Math.random): T[] {
  const a = [...array];
  for (let i = a.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}
