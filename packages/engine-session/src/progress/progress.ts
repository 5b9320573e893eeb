import { clamp } from '@counterpoint/engine-core';

/** Elapsed share of the negotiation's budget: 0 at start, 1 at the deadline. */
export interface Progress {
  get(nowMs: number): number;
  /** Called once after each of the agent's own turns. */
  advance?(): void;
}

/** Progress measured against a wall-clock deadline. */
export class ProgressTime implements Progress {
  readonly durationMs: number;
  readonly startMs: number;

  constructor(durationMs: number, startMs: number) {
    if (!(durationMs > 0)) {
      throw new RangeError(`duration must be positive, got ${durationMs}`);
    }
    this.durationMs = durationMs;
    this.startMs = startMs;
  }

  get(nowMs: number): number {
    return clamp((nowMs - this.startMs) / this.durationMs, 0, 1);
  }
}

/** Progress measured in rounds; ignores the clock. */
export class ProgressRounds implements Progress {
  readonly totalRounds: number;
  private round = 0;

  constructor(totalRounds: number) {
    if (!Number.isInteger(totalRounds) || totalRounds < 1) {
      throw new RangeError(`total rounds must be a positive integer, got ${totalRounds}`);
    }
    this.totalRounds = totalRounds;
  }

  get currentRound(): number {
    return this.round;
  }

  get(): number {
    return this.round / this.totalRounds;
  }

  advance(): void {
    if (this.round < this.totalRounds) this.round++;
  }
}
