import type { EngineError } from '@counterpoint/engine-core';

export type ConfigErrorCode = EngineError | 'INVALID_PARAMETERS';

/** Raised when the session parameters cannot drive the agent. */
export class AgentConfigError extends Error {
  readonly code: ConfigErrorCode;
  readonly detail: string;

  constructor(code: ConfigErrorCode, detail: string) {
    super(`${code}: ${detail}`);
    this.name = 'AgentConfigError';
    this.code = code;
    this.detail = detail;
  }
}
