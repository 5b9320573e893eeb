// Protocol types
export type {
  PartyId,
  OfferAction,
  AcceptAction,
  Action,
  AgentEvent,
  AgentEventType,
  Capabilities,
} from './protocol/types.js';
export { offer, accept } from './protocol/types.js';

// Session types + state machine
export type { AgentStatus, Profile, AgentSettings } from './session/types.js';
export { transition } from './session/state-machine.js';

// Progress
export type { Progress } from './progress/progress.js';
export { ProgressTime, ProgressRounds } from './progress/progress.js';

// Configuration + errors
export type { AgentParameters } from './config.js';
export { agentParametersSchema, parseParameters } from './config.js';
export type { ConfigErrorCode } from './errors.js';
export { AgentConfigError } from './errors.js';

// Logging + storage
export type { Logger } from './logger.js';
export { createLogger } from './logger.js';
export { writeSessionNote, SESSION_NOTE, SESSION_NOTE_FILE } from './storage/session-note.js';

// Agent
export type { AgentOptions } from './agent/negotiation-agent.js';
export { NegotiationAgent, CAPABILITIES, opponentName } from './agent/negotiation-agent.js';
