import type { Rng } from './types';

/**
 * Deterministic xorshift32 source. Not cryptographically secure; meant for
 * gameplay and tests.
 */
export function makeRng(seed: number): Rng {
  let x = seed >>> 0 || 0x9e3779b9;
  return () => {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    return (x >>> 0) / 4294967296;
  };
}

export const defaultRng: Rng = () => Math.random();

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

export function pick(rng: Rng, source: string): string {
  if (source.length === 0) {
    return '';
  }
  return source.charAt(Math.floor(rng() * source.length));
}

export function shuffle<T>(rng: Rng, items: readonly T[]): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i -= 1) {
    const j = Math.floor(rng() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
