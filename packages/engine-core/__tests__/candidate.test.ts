import { describe, expect, it } from 'vitest';
import { BidSpace } from '../src/domain/bid-space.js';
import { Domain } from '../src/domain/domain.js';
import type { Bid } from '../src/domain/bid.js';
import { findBid } from '../src/search/candidate.js';
import type { SearchInput } from '../src/search/types.js';
import { BLUE_SMALL, RED_LARGE, RED_SMALL, cycle, makeDomain, paintUtility } from './fixtures.js';

function makeInput(overrides?: Partial<SearchInput>): SearchInput {
  return {
    space: new BidSpace(makeDomain()),
    utility: paintUtility,
    receivedBid: null,
    sampleSize: 500,
    concessionMargin: 0.9,
    random: Math.random,
    ...overrides,
  };
}

describe('findBid', () => {
  it('draws from an unfiltered sample before any opponent offer', () => {
    const result = findBid(makeInput());
    expect(result.path).toBe('unfiltered-sample');
    expect(result.sampled).toBe(4);
    expect(result.candidates).toBe(4);
  });

  it('always returns a member of the bid space', () => {
    for (const sampleSize of [1, 2, 3, 4, 10, 500]) {
      for (const receivedBid of [null, RED_LARGE, BLUE_SMALL]) {
        const input = makeInput({ sampleSize, receivedBid, concessionMargin: 0 });
        const result = findBid(input);
        expect(input.space.contains(result.bid)).toBe(true);
        expect(result.sampled).toBe(Math.min(sampleSize, 4));
      }
    }
  });

  it('lets every sampled bid through with the default 0.9 margin', () => {
    // U(received) = 0.5 → floor = -0.4, below any utility in [0, 1]
    const received = RED_SMALL;
    const utility = (bid: Bid) => (bid.equals(received) ? 0.5 : 0);
    const result = findBid(makeInput({ receivedBid: received, utility }));

    expect(result.path).toBe('filtered-sample');
    expect(result.candidates).toBe(result.sampled);
    expect(result.candidates).toBe(4);
  });

  it('keeps only bids strictly above U(received) - margin', () => {
    // margin 0, received blue-small (0.0): red-small, red-large, blue-large pass
    const result = findBid(makeInput({ receivedBid: BLUE_SMALL, concessionMargin: 0 }));
    expect(result.path).toBe('filtered-sample');
    expect(result.candidates).toBe(3);
    expect(paintUtility(result.bid)).toBeGreaterThan(0);
  });

  it('falls back to the whole space when nothing passes the filter', () => {
    // margin 0, received red-large (1.0): nothing is strictly better
    const result = findBid(makeInput({ receivedBid: RED_LARGE, concessionMargin: 0, sampleSize: 2 }));
    expect(result.path).toBe('full-space-fallback');
    expect(result.candidates).toBe(0);
    expect(result.sampled).toBe(2);
  });

  it('draws the fallback bid from the full space, not the sample', () => {
    // sample of 1 draws index 3 (0.75 * 4); the fallback draw 0.0 gives index 0
    const result = findBid(
      makeInput({
        receivedBid: RED_LARGE,
        concessionMargin: 0,
        sampleSize: 1,
        random: cycle([0.75, 0]),
      }),
    );
    expect(result.path).toBe('full-space-fallback');
    expect(result.bid.equals(RED_SMALL)).toBe(true);
  });

  it('picks the best-scoring candidate in score mode', () => {
    const result = findBid(
      makeInput({
        receivedBid: BLUE_SMALL,
        concessionMargin: 0,
        selection: { mode: 'score', score: paintUtility },
      }),
    );
    expect(result.bid.equals(RED_LARGE)).toBe(true);
  });

  it('samples a bounded number of bids from an astronomically large space', () => {
    const issues: Record<string, number[]> = {};
    for (let i = 0; i < 30; i++) {
      issues[`i${i}`] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];
    }
    const space = new BidSpace(new Domain('big', issues));
    const utility = (bid: Bid) => Number(bid.getValue('i0')) / 9;
    const received = space.get(9n);

    const result = findBid(makeInput({ space, utility, receivedBid: received, concessionMargin: 0.5 }));
    expect(result.sampled).toBe(500);
    expect(space.contains(result.bid)).toBe(true);
    if (result.path === 'filtered-sample') {
      expect(utility(result.bid)).toBeGreaterThan(0.5);
    }
  });
});
