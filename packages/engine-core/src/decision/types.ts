import type { Bid } from '../domain/bid.js';
import type { FrequencyOpponentModel } from '../opponent/frequency-model.js';
import type { UtilityFunction } from '../types.js';

export type DecisionAction = 'ACCEPT' | 'COUNTER';

/** Why the acceptance rule decided the way it did. */
export type AcceptanceReason = 'NO_OFFER' | 'NEXT_BID_BEATEN' | 'TIME_EXCEEDED' | 'BELOW_NEXT_BID';

export interface Decision {
  action: DecisionAction;
  reason: AcceptanceReason;
}

export interface AcceptanceInput {
  upcomingBid: Bid;
  receivedBid: Bid | null;
  progress: number;
  utility: UtilityFunction;
  /** Progress after which any received offer is accepted. */
  threshold: number;
}

export interface ScoreParams {
  progress: number;
  utility: UtilityFunction;
  opponentModel: FrequencyOpponentModel | null;
  alpha: number;
  eps: number;
}
