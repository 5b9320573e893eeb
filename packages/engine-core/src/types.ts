import type { Bid } from './domain/bid.js';

/** Source of uniform random numbers in [0, 1). `Math.random` satisfies it. */
export type RandomSource = () => number;

/** Own utility of a bid, in [0, 1]. Pure. */
export type UtilityFunction = (bid: Bid) => number;

/** How Candidate Search picks among the bids that pass the concession filter. */
export type SelectionMode = 'random' | 'score';

/** Tunable strategy parameters. */
export interface StrategyParams {
  /** Self-interest weight in the score. */
  alpha: number;
  /** Time-pressure shape; smaller concedes later and more abruptly. */
  eps: number;
  /** Progress after which any received offer is accepted. */
  acceptance_time: number;
  /** Upper bound on bids sampled per search. */
  sample_size: number;
  /** Concession margin below the opponent's last offer utility. */
  concession_margin: number;
  selection: SelectionMode;
}

export const DEFAULT_STRATEGY: Readonly<StrategyParams> = {
  alpha: 0.95,
  eps: 0.1,
  acceptance_time: 0.95,
  sample_size: 500,
  concession_margin: 0.9,
  selection: 'random',
};

/** Engine validation errors. */
export enum EngineError {
  INVALID_ALPHA = 'INVALID_ALPHA',
  INVALID_EPS = 'INVALID_EPS',
  INVALID_ACCEPTANCE_TIME = 'INVALID_ACCEPTANCE_TIME',
  INVALID_SAMPLE_SIZE = 'INVALID_SAMPLE_SIZE',
  INVALID_CONCESSION_MARGIN = 'INVALID_CONCESSION_MARGIN',
}
