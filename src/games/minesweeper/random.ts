/** Returns a float in [0, 1), like `Math.random`. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

// mulberry32
export const createSeededRandom = (seed: number): RandomSource => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export const randomIndex = (random: RandomSource, length: number): number =>
  Math.min(Math.floor(random() * length), length - 1);

export const shuffle = <T>(items: readonly T[], random: RandomSource): T[] => {
  const next = [...items];
  for (let i = next.length - 1; i > 0; i--) {
    const j = randomIndex(random, i + 1);
    const tmp = next[i];
    next[i] = next[j];
    next[j] = tmp;
  }
  return next;
};
