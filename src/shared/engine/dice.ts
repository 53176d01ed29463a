import { DIE_FACES } from './constants';
import type { DiceRng, DiceRoll } from './types';

// ═══════════════════════════════════════════════════════════════════════════
// RNG UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Create a deterministic dice RNG from a seed.
 *
 * Two games created with the same seed see the same sequence of rolls for
 * the same sequence of operations.
 */
export function createSeededRng(seed: number): DiceRng {
  // mulberry32
  let state = seed;

  return (): number => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export const defaultDiceRng: DiceRng = Math.random;

// ═══════════════════════════════════════════════════════════════════════════
// ROLLING
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Draw one face uniformly from 1..6.
 */
export function rollDie(rng: DiceRng): number {
  return Math.min(DIE_FACES, Math.floor(rng() * DIE_FACES) + 1);
}

/**
 * Roll two independent dice. The total follows the triangular 2..12
 * distribution (7 most likely, 2 and 12 least likely); it is never a single
 * uniform draw over 2..12.
 */
export function rollTwoDice(rng: DiceRng): DiceRoll {
  const first = rollDie(rng);
  const second = rollDie(rng);
  return { faces: [first, second], total: first + second };
}
