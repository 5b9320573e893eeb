import { pino } from 'pino';
import { Bid, Domain } from '@counterpoint/engine-core';
import type { Profile } from '../src/session/types.js';

export const silentLogger = pino({ level: 'silent' });

/** 2 brands × 3 memory sizes × 2 warranties = 12 bids. */
export function makeDomain(): Domain {
  return new Domain('laptop', {
    brand: ['acme', 'zenith'],
    memory: [8, 16, 32],
    warranty: ['1y', '2y'],
  });
}

const MEMORY_SCALE: Record<string, number> = { '8': 0, '16': 0.5, '32': 1 };

/** Wants acme, lots of memory and a long warranty. */
export function buyerProfile(domain: Domain = makeDomain()): Profile {
  return {
    domain,
    getUtility: (bid) =>
      0.2 * (bid.getValue('brand') === 'acme' ? 1 : 0) +
      0.5 * (MEMORY_SCALE[String(bid.getValue('memory'))] ?? 0) +
      0.3 * (bid.getValue('warranty') === '2y' ? 1 : 0),
  };
}

/** Opposite preferences on every issue. */
export function sellerProfile(domain: Domain = makeDomain()): Profile {
  const buyer = buyerProfile(domain);
  return { domain, getUtility: (bid) => 1 - buyer.getUtility(bid) };
}

/** Buyer utility 1.0 */
export const BUYER_BEST = Bid.of({ brand: 'acme', memory: 32, warranty: '2y' });
/** Buyer utility 0.0 */
export const BUYER_WORST = Bid.of({ brand: 'zenith', memory: 8, warranty: '1y' });
