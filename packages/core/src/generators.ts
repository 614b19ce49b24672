// src/generators.ts
// Lazily computed field defaults

import { MAX_SAFE_DECIMAL, MAX_SAFE_INTEGER } from './constants.js';
import { GeneratorType } from './types.js';

export type RandomSource = () => number;

export interface GeneratorRange {
  lo: number;
  hi: number;
}

/**
 * Range a generator draws from, or `null` when it holds no value. Integer
 * ranges are narrowed to the integers inside the bounds.
 */
export function generatorRange(type: GeneratorType, lower?: number, upper?: number): GeneratorRange | null {
  const range =
    type === GeneratorType.RANDOM_INTEGER
      ? { lo: Math.ceil(lower ?? 0), hi: Math.floor(upper ?? MAX_SAFE_INTEGER) }
      : { lo: lower ?? 0, hi: upper ?? MAX_SAFE_DECIMAL };
  return range.lo > range.hi ? null : range;
}

/**
 * Draw a fresh value for a default generator.
 *
 * Integers are uniform over `[lower ?? 0, upper ?? MAX_SAFE_INTEGER]`, both
 * ends included. Decimals are uniform over `[lower ?? 0, upper ?? MAX_SAFE_DECIMAL)`.
 */
export function generate(
  type: GeneratorType,
  lower?: number,
  upper?: number,
  random: RandomSource = Math.random,
): number {
  const range = generatorRange(type, lower, upper);
  if (!range) {
    throw new RangeError(`No ${type} value between ${lower ?? 0} and ${upper ?? 'the safe maximum'}`);
  }
  const { lo, hi } = range;
  switch (type) {
    case GeneratorType.RANDOM_INTEGER:
      return lo + Math.floor(random() * (hi - lo + 1));
    case GeneratorType.RANDOM_DECIMAL:
      return lo + random() * (hi - lo);
  }
}
