// Uniform draw in [0, 1)
export type RandomSource = () => number;

// Number of vehicles arriving in one tick for the given mean
export type ArrivalSampler = (rate: number) => number;

// exp(-lambda) stays well above the smallest double up to here
const MAX_CHUNK = 500;

// Knuth's multiplication method; cost grows linearly with `lambda`
function knuthPoisson(lambda: number, random: RandomSource): number {
  const L = Math.exp(-lambda);
  let k = 0;
  let p = 1;
  do {
    k++;
    p *= random();
  } while (p > L);
  return k - 1;
}

/**
 * Large means are drawn as a sum of chunks of at most MAX_CHUNK, since a
 * sum of independent Poisson draws is Poisson with the summed mean.
 */
export function samplePoisson(lambda: number, random: RandomSource = Math.random): number {
  let total = 0;
  let remaining = lambda;
  while (remaining > MAX_CHUNK) {
    total += knuthPoisson(MAX_CHUNK, random);
    remaining -= MAX_CHUNK;
  }
  return total + knuthPoisson(remaining, random);
}

// mulberry32
export function createSeededRandom(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export const poissonSampler = (random: RandomSource = Math.random): ArrivalSampler =>
  (rate) => samplePoisson(rate, random);
