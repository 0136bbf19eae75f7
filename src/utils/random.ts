/**
 * Injectable random source. Selection code never calls Math.random directly
 * so tests can script or seed the draws.
 */
export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

export const mathRandom: RandomSource = { next: () => Math.random() };

/**
 * mulberry32: small, fast, and good enough for content variety
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

export function pickUniform<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
  return items[index];
}

export function pickWeighted<T>(items: readonly { value: T; weight: number }[], random: RandomSource): T | undefined {
  const total = items.reduce((sum, item) => sum + Math.max(0, item.weight), 0);
  if (total <= 0) return undefined;
  let roll = random.next() * total;
  for (const item of items) {
    const w = Math.max(0, item.weight);
    if (roll < w) return item.value;
    roll -= w;
  }
  // Float rounding can leave a sliver past the last bucket
  for (let i = items.length - 1; i >= 0; i--) {
    if (items[i].weight > 0) return items[i].value;
  }
  return undefined;
}
