import type { AgentEventType } from '../protocol/types.js';
import type { AgentStatus } from './types.js';

/** Terminal states that do not accept any transitions. */
const TERMINAL_STATES: ReadonlySet<AgentStatus> = new Set(['FINISHED']);

/**
 * Valid state transitions map.
 * Key: current status → Map of event → next status.
 */
const TRANSITIONS: Record<AgentStatus, Partial<Record<AgentEventType, AgentStatus>>> = {
  READY: {
    action_done: 'NEGOTIATING',
    your_turn: 'NEGOTIATING',
    finished: 'FINISHED',
  },
  NEGOTIATING: {
    action_done: 'NEGOTIATING',
    your_turn: 'NEGOTIATING',
    finished: 'FINISHED',
  },
  FINISHED: {},
};

/**
 * Attempt a state transition. Returns the new status if valid, or null if the
 * transition is not allowed.
 */
export function transition(current: AgentStatus, event: AgentEventType): AgentStatus | null {
  if (TERMINAL_STATES.has(current)) {
    return null;
  }
  return TRANSITIONS[current][event] ?? null;
}
