export interface RandomSource {
  /** Uniform draw in [0, 1). */
  next(): number;
  /** Standard normal draw. */
  gaussian(): number;
}

export function hashStringToSeed(str: string): number {
  let h = 2166136261;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

export function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a |= 0;
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandomSource(seed: number): RandomSource {
  const draw = mulberry32(seed);
  return {
    next: draw,
    gaussian: () => {
      // Box-Muller; 1 - u keeps the log argument in (0, 1].
      const u1 = 1 - draw();
      const u2 = draw();
      return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    }
  };
}

export function deriveSeed(seed: number, stream: string | number): number {
  return hashStringToSeed(`${seed >>> 0}:${stream}`);
}

export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + (max - min) * rng.next();
}

export function normal(rng: RandomSource, mean: number, std: number): number {
  return mean + std * rng.gaussian();
}

export function randomInt(rng: RandomSource, min: number, max: number): number {
  const span = max - min + 1;
  return min + Math.min(span - 1, Math.floor(rng.next() * span));
}
