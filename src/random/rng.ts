/**
 * Random source
 *
 * Classifiers draw randomness through an injected `Rng` so training can be
 * replayed: pass a seed (or your own generator) for deterministic results,
 * omit it for a time-seeded generator.
 *
 * @module random
 */

import { Point } from '../math/point';

/** Uniform generator over `[0, 1)` */
export type Rng = () => number;

/**
 * Mulberry32 - fast deterministic PRNG
 */
export function mulberry32(seed: number): Rng {
  let state = seed >>> 0;
  return function() {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seed derived from the clock and `Math.random`
 */
export function timeSeed(): number {
  return (Date.now() ^ Math.floor(Math.random() * 0x100000000)) >>> 0;
}

/**
 * Create a generator, seeded when `seed` is given
 */
export function createRng(seed?: number): Rng {
  return mulberry32(seed ?? timeSeed());
}

/**
 * Uniform draw from `[min, max)`
 */
export function uniform(rng: Rng, min: number, max: number): number {
  return min + rng() * (max - min);
}

/**
 * In-place Fisher-Yates shuffle
 */
export function shuffle<T>(items: T[], rng: Rng): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

/**
 * Real point with every component uniform in `[-1, 1)`
 */
export function randomWeights(size: number, rng: Rng): Point {
  return Point.of(...Array.from({ length: size }, () => uniform(rng, -1, 1)));
}
