import type { Bid, Domain } from '@counterpoint/engine-core';
import type { PartyId } from '../protocol/types.js';
import type { Progress } from '../progress/progress.js';

/** Agent lifecycle status. */
export type AgentStatus = 'READY' | 'NEGOTIATING' | 'FINISHED';

/** The agent's private preferences, supplied fully formed by the environment. */
export interface Profile {
  readonly domain: Domain;
  /** Utility in [0, 1]. Pure. */
  getUtility(bid: Bid): number;
}

/** Everything the environment hands the agent at session start. */
export interface AgentSettings {
  id: PartyId;
  profile: Profile;
  progress: Progress;
  /** Raw session parameters; parsed by `parseParameters`. */
  parameters?: Record<string, unknown>;
}
