/** A discrete issue value. */
export type Value = string | number;

/**
 * A complete assignment of one value per issue. Immutable; equality is
 * structural.
 */
export class Bid {
  private readonly values: ReadonlyMap<string, Value>;

  constructor(values: ReadonlyMap<string, Value>) {
    this.values = new Map([...values].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  }

  static of(values: Record<string, Value>): Bid {
    return new Bid(new Map(Object.entries(values)));
  }

  getIssues(): string[] {
    return [...this.values.keys()];
  }

  getValue(issue: string): Value | undefined {
    return this.values.get(issue);
  }

  equals(other: Bid): boolean {
    if (other.values.size !== this.values.size) return false;
    for (const [issue, value] of this.values) {
      if (other.values.get(issue) !== value) return false;
    }
    return true;
  }

  toString(): string {
    const parts = [...this.values].map(([issue, value]) => `${issue}=${String(value)}`);
    return `Bid{${parts.join(', ')}}`;
  }
}
