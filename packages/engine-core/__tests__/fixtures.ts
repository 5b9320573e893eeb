import { Bid } from '../src/domain/bid.js';
import { Domain } from '../src/domain/domain.js';
import type { RandomSource, UtilityFunction } from '../src/types.js';

/** 2 issues × 2 values. */
export function makeDomain(): Domain {
  return new Domain('paint', {
    color: ['red', 'blue'],
    size: ['small', 'large'],
  });
}

export const RED_SMALL = Bid.of({ color: 'red', size: 'small' });
export const RED_LARGE = Bid.of({ color: 'red', size: 'large' });
export const BLUE_SMALL = Bid.of({ color: 'blue', size: 'small' });
export const BLUE_LARGE = Bid.of({ color: 'blue', size: 'large' });

/**
 * Linear additive: color weighs 0.6 (red=1, blue=0), size weighs 0.4
 * (large=1, small=0).
 *   red-large 1.0, red-small 0.6, blue-large 0.4, blue-small 0.0
 */
export const paintUtility: UtilityFunction = (bid) =>
  (bid.getValue('color') === 'red' ? 0.6 : 0) + (bid.getValue('size') === 'large' ? 0.4 : 0);

/** Deterministic random source cycling through `values`. */
export function cycle(values: number[]): RandomSource {
  let i = 0;
  return () => values[i++ % values.length];
}
