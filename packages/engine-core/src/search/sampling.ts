import type { RandomSource } from '../types.js';

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);
const CHUNK_BITS = 32;
const CHUNK = 2 ** CHUNK_BITS;

/** Uniform index in [0, n). n must be positive. */
export function randomIndex(n: bigint, random: RandomSource): bigint {
  if (n <= MAX_SAFE) {
    return BigInt(Math.floor(random() * Number(n)));
  }
  // rejection sampling over the smallest power of two covering n
  const bits = n.toString(2).length;
  const mask = (1n << BigInt(bits)) - 1n;
  for (;;) {
    let candidate = 0n;
    for (let b = 0; b < bits; b += CHUNK_BITS) {
      candidate = (candidate << BigInt(CHUNK_BITS)) | BigInt(Math.floor(random() * CHUNK));
    }
    candidate &= mask;
    if (candidate < n) return candidate;
  }
}

/**
 * `min(k, n)` distinct indices drawn uniformly from [0, n) (Floyd's
 * algorithm, so exactly one draw per returned index).
 */
export function sampleDistinctIndices(n: bigint, k: number, random: RandomSource): bigint[] {
  const count = BigInt(Math.max(0, Math.min(k, Number(n > MAX_SAFE ? MAX_SAFE : n))));
  const chosen = new Set<bigint>();
  for (let j = n - count; j < n; j++) {
    const t = randomIndex(j + 1n, random);
    chosen.add(chosen.has(t) ? j : t);
  }
  return [...chosen];
}

/** Uniformly random element of a non-empty list. */
export function randomChoice<T>(items: readonly T[], random: RandomSource): T {
  return items[Math.floor(random() * items.length)];
}
