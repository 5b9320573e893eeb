import seedrandom from 'seedrandom';
import {
  BidSpace,
  FrequencyOpponentModel,
  decideAcceptance,
  findBid,
  scoreBid,
  type Bid,
  type RandomSource,
  type Selection,
  type UtilityFunction,
} from '@counterpoint/engine-core';
import { parseParameters, type AgentParameters } from '../config.js';
import { createLogger, type Logger } from '../logger.js';
import { accept, offer } from '../protocol/types.js';
import type { Action, AgentEvent, Capabilities, PartyId } from '../protocol/types.js';
import { transition } from '../session/state-machine.js';
import type { AgentSettings, AgentStatus } from '../session/types.js';
import { writeSessionNote } from '../storage/session-note.js';

export const CAPABILITIES: Capabilities = {
  behaviours: ['SAOP'],
  profiles: ['LinearAdditive'],
};

export interface AgentOptions {
  logger?: Logger;
  /** Milliseconds since the epoch. Defaults to Date.now. */
  clock?: () => number;
  /** Overrides the `seed` parameter and Math.random. */
  random?: RandomSource;
}

/** Strip the position suffix the environment appends to party ids (`buyer_2` → `buyer`). */
export function opponentName(actor: PartyId): string {
  return actor.replace(/_\d+$/, '');
}

/**
 * Bilateral negotiation agent.
 *
 * Per turn:
 * 1. Candidate search picks the bid we would offer
 * 2. The acceptance rule compares it with the opponent's last offer
 * 3. Reply with accept(last offer) or offer(bid)
 *
 * Opponent offers update the frequency model before they become the last
 * received bid.
 */
export class NegotiationAgent {
  readonly id: PartyId;
  private readonly settings: AgentSettings;
  private readonly params: AgentParameters;
  private readonly space: BidSpace;
  private readonly utility: UtilityFunction;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly random: RandomSource;

  private status: AgentStatus = 'READY';
  private lastReceivedBid: Bid | null = null;
  private opponentModel: FrequencyOpponentModel | null = null;
  private opponent: string | null = null;

  constructor(settings: AgentSettings, options: AgentOptions = {}) {
    this.id = settings.id;
    this.settings = settings;
    this.params = parseParameters(settings.parameters);
    this.space = new BidSpace(settings.profile.domain);
    this.utility = (bid) => settings.profile.getUtility(bid);
    this.logger = options.logger ?? createLogger('negotiation-agent');
    this.clock = options.clock ?? Date.now;
    this.random =
      options.random ?? (this.params.seed !== undefined ? seedrandom(String(this.params.seed)) : Math.random);

    this.logger.info(
      { id: this.id, domain: settings.profile.domain.name, bids: this.space.size().toString() },
      'party is initialized',
    );
  }

  getCapabilities(): Capabilities {
    return CAPABILITIES;
  }

  getDescription(): string {
    return 'Samples bids that concede little from the opponent\'s last offer and accepts when that offer beats its own next bid or time runs out.';
  }

  getStatus(): AgentStatus {
    return this.status;
  }

  getParameters(): Readonly<AgentParameters> {
    return this.params;
  }

  getLastReceivedBid(): Bid | null {
    return this.lastReceivedBid;
  }

  getOpponentModel(): FrequencyOpponentModel | null {
    return this.opponentModel;
  }

  /** Opponent name without its position suffix; null until the opponent acts. */
  getOpponentName(): string | null {
    return this.opponent;
  }

  /**
   * Handle one turn-protocol event. Returns the reply for `your_turn`, null
   * otherwise and for any event after the session finished.
   */
  handle(event: AgentEvent): Action | null {
    const next = transition(this.status, event.type);
    if (next === null) {
      this.logger.warn({ event: event.type, status: this.status }, 'ignoring event');
      return null;
    }
    this.status = next;

    switch (event.type) {
      case 'action_done':
        this.onActionDone(event.action);
        return null;
      case 'your_turn':
        return this.myTurn();
      case 'finished':
        this.onFinished();
        return null;
    }
  }

  private onActionDone(action: Action): void {
    if (action.actor === this.id) return;
    this.opponent = opponentName(action.actor);

    if (action.type !== 'offer') {
      this.logger.debug({ actor: action.actor, type: action.type }, 'opponent action');
      return;
    }

    const problem = this.space.domain.isFitting(action.bid);
    if (problem) {
      this.logger.warn({ actor: action.actor, problem }, 'ignoring opponent offer outside the domain');
      return;
    }

    if (!this.opponentModel) {
      this.opponentModel = new FrequencyOpponentModel(this.space.domain);
    }
    this.opponentModel.update(action.bid);
    this.lastReceivedBid = action.bid;

    this.logger.debug(
      { actor: action.actor, bid: action.bid.toString(), utility: this.utility(action.bid) },
      'received offer',
    );
  }

  private myTurn(): Action {
    const received = this.lastReceivedBid;
    const progress = this.settings.progress.get(this.clock());

    const search = findBid({
      space: this.space,
      utility: this.utility,
      receivedBid: received,
      sampleSize: this.params.sample_size,
      concessionMargin: this.params.concession_margin,
      random: this.random,
      selection: this.selection(progress),
    });

    const decision = decideAcceptance({
      upcomingBid: search.bid,
      receivedBid: received,
      progress,
      utility: this.utility,
      threshold: this.params.acceptance_time,
    });

    this.settings.progress.advance?.();

    this.logger.info(
      {
        progress,
        action: decision.action,
        reason: decision.reason,
        path: search.path,
        sampled: search.sampled,
        candidates: search.candidates,
      },
      'turn decided',
    );

    if (decision.action === 'ACCEPT' && received !== null) {
      return accept(this.id, received);
    }
    return offer(this.id, search.bid);
  }

  private selection(progress: number): Selection {
    if (this.params.selection === 'random') {
      return { mode: 'random' };
    }
    const { alpha, eps } = this.params;
    return {
      mode: 'score',
      score: (bid) =>
        scoreBid(bid, { progress, utility: this.utility, opponentModel: this.opponentModel, alpha, eps }),
    };
  }

  private onFinished(): void {
    writeSessionNote(this.params.storage_dir, this.logger);
    this.logger.info({ opponent: this.opponent }, 'party is terminating');
  }
}
