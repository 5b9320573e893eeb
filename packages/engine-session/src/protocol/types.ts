import type { Bid } from '@counterpoint/engine-core';

/** Party identifier as assigned by the negotiation environment, e.g. `buyer_1`. */
export type PartyId = string;

export interface OfferAction {
  type: 'offer';
  actor: PartyId;
  bid: Bid;
}

export interface AcceptAction {
  type: 'accept';
  actor: PartyId;
  bid: Bid;
}

/** An action performed by a party in a stacked alternating offers session. */
export type Action = OfferAction | AcceptAction;

/** Turn-protocol events delivered to the agent. */
export type AgentEvent =
  /** Some party (possibly this agent) performed an action. */
  | { type: 'action_done'; action: Action }
  /** The agent must reply with exactly one action. */
  | { type: 'your_turn' }
  /** The session ended, by agreement or deadline. No reply expected. */
  | { type: 'finished' };

export type AgentEventType = AgentEvent['type'];

/** What the agent declares it can take part in. */
export interface Capabilities {
  behaviours: readonly string[];
  profiles: readonly string[];
}

export function offer(actor: PartyId, bid: Bid): OfferAction {
  return { type: 'offer', actor, bid };
}

export function accept(actor: PartyId, bid: Bid): AcceptAction {
  return { type: 'accept', actor, bid };
}
