import type { AcceptanceInput, Decision } from './types.js';

/**
 * Acceptance rule: accept when the opponent's last offer beats the bid we are
 * about to make, or when progress is past the threshold.
 *
 * Priority order:
 * 1. no received offer               → COUNTER (NO_OFFER)
 * 2. U(received) > U(upcoming)       → ACCEPT  (NEXT_BID_BEATEN)
 * 3. progress > threshold            → ACCEPT  (TIME_EXCEEDED)
 * 4. else                            → COUNTER (BELOW_NEXT_BID)
 *
 * Stateless: both conditions are evaluated fresh each turn.
 */
export function decideAcceptance(input: AcceptanceInput): Decision {
  const { upcomingBid, receivedBid, progress, utility, threshold } = input;

  if (receivedBid === null) {
    return { action: 'COUNTER', reason: 'NO_OFFER' };
  }
  if (utility(receivedBid) > utility(upcomingBid)) {
    return { action: 'ACCEPT', reason: 'NEXT_BID_BEATEN' };
  }
  if (progress > threshold) {
    return { action: 'ACCEPT', reason: 'TIME_EXCEEDED' };
  }
  return { action: 'COUNTER', reason: 'BELOW_NEXT_BID' };
}
