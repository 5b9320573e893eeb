import type { StrategyParams } from './types.js';
import { EngineError } from './types.js';

function inUnitInterval(x: number): boolean {
  return Number.isFinite(x) && x >= 0 && x <= 1;
}

export function validateAlpha(alpha: number): EngineError | null {
  return inUnitInterval(alpha) ? null : EngineError.INVALID_ALPHA;
}

export function validateEps(eps: number): EngineError | null {
  if (!Number.isFinite(eps) || eps <= 0) {
    return EngineError.INVALID_EPS;
  }
  return null;
}

export function validateAcceptanceTime(t: number): EngineError | null {
  return inUnitInterval(t) ? null : EngineError.INVALID_ACCEPTANCE_TIME;
}

export function validateSampleSize(k: number): EngineError | null {
  if (!Number.isInteger(k) || k < 1) {
    return EngineError.INVALID_SAMPLE_SIZE;
  }
  return null;
}

export function validateConcessionMargin(margin: number): EngineError | null {
  if (!Number.isFinite(margin) || margin < 0) {
    return EngineError.INVALID_CONCESSION_MARGIN;
  }
  return null;
}

/** Validate the full StrategyParams. Returns first error found, or null. */
export function validateStrategy(params: StrategyParams): { error: EngineError; detail: string } | null {
  const checks: [EngineError | null, string][] = [
    [validateAlpha(params.alpha), `alpha=${params.alpha}`],
    [validateEps(params.eps), `eps=${params.eps}`],
    [validateAcceptanceTime(params.acceptance_time), `acceptance_time=${params.acceptance_time}`],
    [validateSampleSize(params.sample_size), `sample_size=${params.sample_size}`],
    [validateConcessionMargin(params.concession_margin), `concession_margin=${params.concession_margin}`],
  ];
  for (const [error, detail] of checks) {
    if (error) return { error, detail };
  }
  return null;
}
