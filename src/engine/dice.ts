import type { Dice } from "./types";

const UINT32 = 0x1_0000_0000;

/** Folds a seed of up to 53 bits into a 32-bit starting state. */
function seedState(seed: number): number {
  const lo = seed >>> 0;
  const hi = Math.floor(seed / UINT32) >>> 0;
  return (lo ^ Math.imul(hi, 0x9e3779b9)) >>> 0;
}

/** Builds a fresh dice for values in [min, max]. */
export function createDice(min: number, max: number, seed: number): Dice {
  return { min, max, seed, state: seedState(seed) };
}

/** Advances the generator (mulberry32) and returns the next raw 32-bit value. */
export function nextUint32(dice: Dice): number {
  dice.state = (dice.state + 0x6d2b79f5) >>> 0;
  let t = Math.imul(dice.state ^ (dice.state >>> 15), 1 | dice.state);
  t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
  return (t ^ (t >>> 14)) >>> 0;
}

/** Rolls a value in [min, max], advancing the dice. */
export function roll(dice: Dice): number {
  const span = dice.max - dice.min + 1;
  return dice.min + (nextUint32(dice) % span);
}

/** Fisher-Yates shuffle driven by the dice stream. Mutates `items`. */
export function shuffleInPlace<T>(dice: Dice, items: T[]): void {
  for (let i = items.length - 1; i > 0; i--) {
    const j = nextUint32(dice) % (i + 1);
    [items[i], items[j]] = [items[j], items[i]];
  }
}
