import type { Bid } from '../domain/bid.js';
import type { ScoreParams } from './types.js';

/**
 * Boulware-style time pressure.
 * TP(t) = 1 - t^(1/eps)
 *
 * Stays near 1 for most of the session and collapses near the deadline; the
 * smaller eps, the later and sharper the drop.
 */
export function timePressure(progress: number, eps: number): number {
  return 1 - progress ** (1 / eps);
}

/**
 * score = alpha * TP * U_own(bid) + (1 - alpha * TP) * U_opp(bid)
 *
 * The opponent term is only present once an opponent model exists.
 */
export function scoreBid(bid: Bid, params: ScoreParams): number {
  const { progress, utility, opponentModel, alpha, eps } = params;
  const tp = timePressure(progress, eps);
  let score = alpha * tp * utility(bid);

  if (opponentModel) {
    score += (1 - alpha * tp) * opponentModel.getPredictedUtility(bid);
  }
  return score;
}
