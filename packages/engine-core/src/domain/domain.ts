import type { Bid, Value } from './bid.js';

/**
 * Static description of the negotiable issues and their value sets.
 * Issues are kept in sorted order so bid indexing is deterministic.
 */
export class Domain {
  readonly name: string;
  private readonly issues: ReadonlyMap<string, readonly Value[]>;

  constructor(name: string, issues: Record<string, readonly Value[]>) {
    this.name = name;
    const sorted = Object.keys(issues).sort();
    this.issues = new Map(sorted.map((issue) => [issue, Object.freeze([...issues[issue]])]));
  }

  getIssues(): string[] {
    return [...this.issues.keys()];
  }

  /** Values of `issue`, or an empty list for an unknown issue. */
  getValues(issue: string): readonly Value[] {
    return this.issues.get(issue) ?? [];
  }

  /** Returns null if `bid` assigns a known value to every issue, else the reason it does not. */
  isFitting(bid: Bid): string | null {
    for (const issue of bid.getIssues()) {
      if (!this.issues.has(issue)) {
        return `unknown issue "${issue}"`;
      }
    }
    for (const [issue, values] of this.issues) {
      const value = bid.getValue(issue);
      if (value === undefined) {
        return `missing issue "${issue}"`;
      }
      if (!values.includes(value)) {
        return `value ${JSON.stringify(value)} not in issue "${issue}"`;
      }
    }
    return null;
  }
}
