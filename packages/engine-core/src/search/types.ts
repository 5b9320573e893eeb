import type { Bid } from '../domain/bid.js';
import type { BidSpace } from '../domain/bid-space.js';
import type { RandomSource, UtilityFunction } from '../types.js';

/** How the filtered candidates are narrowed to one bid. */
export type Selection =
  | { mode: 'random' }
  | { mode: 'score'; score: (bid: Bid) => number };

export interface SearchInput {
  space: BidSpace;
  utility: UtilityFunction;
  /** Opponent's last offer; null before the first one. */
  receivedBid: Bid | null;
  sampleSize: number;
  concessionMargin: number;
  random: RandomSource;
  selection?: Selection;
}

export type SearchPath = 'unfiltered-sample' | 'filtered-sample' | 'full-space-fallback';

export interface SearchResult {
  bid: Bid;
  path: SearchPath;
  /** Bids drawn from the space. */
  sampled: number;
  /** Sampled bids that passed the concession filter. */
  candidates: number;
}
