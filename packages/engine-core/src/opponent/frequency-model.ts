import type { Bid, Value } from '../domain/bid.js';
import type { Domain } from '../domain/domain.js';

/**
 * Frequency-based opponent model.
 *
 * Values the opponent offers more often are assumed to be preferred by it.
 * Every issue weighs the same; an issue with no observations contributes
 * 1 / |values|.
 */
export class FrequencyOpponentModel {
  readonly domain: Domain;
  private readonly counts = new Map<string, Map<Value, number>>();
  private readonly totals = new Map<string, number>();
  private seen = 0;

  constructor(domain: Domain) {
    this.domain = domain;
  }

  /** Number of bids observed so far. */
  get observations(): number {
    return this.seen;
  }

  update(bid: Bid): void {
    for (const issue of bid.getIssues()) {
      const value = bid.getValue(issue);
      if (value === undefined) continue;
      let perValue = this.counts.get(issue);
      if (!perValue) {
        perValue = new Map();
        this.counts.set(issue, perValue);
      }
      perValue.set(value, (perValue.get(value) ?? 0) + 1);
      this.totals.set(issue, (this.totals.get(issue) ?? 0) + 1);
    }
    this.seen++;
  }

  getCount(issue: string, value: Value): number {
    return this.counts.get(issue)?.get(value) ?? 0;
  }

  getIssueTotal(issue: string): number {
    return this.totals.get(issue) ?? 0;
  }

  /** Mean over issues of the observed frequency of the bid's value. In [0, 1]. */
  getPredictedUtility(bid: Bid): number {
    const issues = this.domain.getIssues();
    if (issues.length === 0) return 0;

    let sum = 0;
    for (const issue of issues) {
      const total = this.getIssueTotal(issue);
      if (total === 0) {
        sum += 1 / this.domain.getValues(issue).length;
        continue;
      }
      const value = bid.getValue(issue);
      sum += value === undefined ? 0 : this.getCount(issue, value) / total;
    }
    return sum / issues.length;
  }
}
