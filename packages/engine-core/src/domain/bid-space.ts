import { Bid, type Value } from './bid.js';
import type { Domain } from './domain.js';

/**
 * The cross product of a domain's value sets, addressed by index and never
 * materialised. The first issue is the least significant digit.
 */
export class BidSpace {
  readonly domain: Domain;
  private readonly issues: string[];
  private readonly total: bigint;

  constructor(domain: Domain) {
    this.domain = domain;
    this.issues = domain.getIssues();
    this.total = this.issues.reduce((acc, issue) => acc * BigInt(domain.getValues(issue).length), 1n);
  }

  size(): bigint {
    return this.total;
  }

  /** Bid at `index`, 0 <= index < size(). */
  get(index: bigint): Bid {
    if (index < 0n || index >= this.total) {
      throw new RangeError(`bid index ${index} out of range [0, ${this.total})`);
    }
    const assignment = new Map<string, Value>();
    let rest = index;
    for (const issue of this.issues) {
      const values = this.domain.getValues(issue);
      const radix = BigInt(values.length);
      assignment.set(issue, values[Number(rest % radix)]);
      rest /= radix;
    }
    return new Bid(assignment);
  }

  contains(bid: Bid): boolean {
    return this.domain.isFitting(bid) === null;
  }
}
