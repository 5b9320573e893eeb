// Types
export type {
  RandomSource,
  UtilityFunction,
  SelectionMode,
  StrategyParams,
} from './types.js';
export { EngineError, DEFAULT_STRATEGY } from './types.js';

// Domain model
export { Bid } from './domain/bid.js';
export type { Value } from './domain/bid.js';
export { Domain } from './domain/domain.js';
export { BidSpace } from './domain/bid-space.js';

// Opponent model
export { FrequencyOpponentModel } from './opponent/frequency-model.js';

// Decision types
export type {
  DecisionAction,
  AcceptanceReason,
  Decision,
  AcceptanceInput,
  ScoreParams,
} from './decision/types.js';

// Search types
export type {
  Selection,
  SearchInput,
  SearchPath,
  SearchResult,
} from './search/types.js';

// Decision functions
export { decideAcceptance } from './decision/acceptance.js';
export { scoreBid, timePressure } from './decision/scoring.js';

// Search functions
export { findBid } from './search/candidate.js';
export { randomIndex, sampleDistinctIndices, randomChoice } from './search/sampling.js';

// Validation
export { validateStrategy } from './validation.js';

// Utils
export { clamp } from './utils.js';
