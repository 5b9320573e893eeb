import type { Bid } from '../domain/bid.js';
import { randomChoice, randomIndex, sampleDistinctIndices } from './sampling.js';
import type { RandomSource } from '../types.js';
import type { SearchInput, SearchResult, Selection } from './types.js';

function select(candidates: Bid[], selection: Selection, random: RandomSource): Bid {
  if (selection.mode === 'random') {
    return randomChoice(candidates, random);
  }
  let best = candidates[0];
  let bestScore = selection.score(best);
  for (const bid of candidates.slice(1)) {
    const s = selection.score(bid);
    if (s > bestScore) {
      best = bid;
      bestScore = s;
    }
  }
  return best;
}

/**
 * Pick the next bid to offer.
 *
 * 1. Sample up to sampleSize distinct bids from the whole space
 * 2. No received offer yet → random bid from the sample
 * 3. Keep bids with U(bid) > U(received) - concessionMargin
 * 4. Pick one of them (random, or best score)
 * 5. None left → random bid from the whole space
 */
export function findBid(input: SearchInput): SearchResult {
  const { space, utility, receivedBid, sampleSize, concessionMargin, random } = input;
  const selection = input.selection ?? { mode: 'random' };

  const sample = sampleDistinctIndices(space.size(), sampleSize, random).map((i) => space.get(i));

  if (receivedBid === null) {
    return {
      bid: randomChoice(sample, random),
      path: 'unfiltered-sample',
      sampled: sample.length,
      candidates: sample.length,
    };
  }

  const floor = utility(receivedBid) - concessionMargin;
  const candidates = sample.filter((bid) => utility(bid) > floor);

  if (candidates.length === 0) {
    return {
      bid: space.get(randomIndex(space.size(), random)),
      path: 'full-space-fallback',
      sampled: sample.length,
      candidates: 0,
    };
  }

  return {
    bid: select(candidates, selection, random),
    path: 'filtered-sample',
    sampled: sample.length,
    candidates: candidates.length,
  };
}
