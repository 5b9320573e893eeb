import { describe, expect, it } from 'vitest';
import { scoreBid, timePressure } from '../src/decision/scoring.js';
import { FrequencyOpponentModel } from '../src/opponent/frequency-model.js';
import { BLUE_SMALL, RED_LARGE, RED_SMALL, makeDomain, paintUtility } from './fixtures.js';

const TOL = 1e-9;

describe('timePressure', () => {
  it('is 1 at the start and 0 at the deadline', () => {
    expect(timePressure(0, 0.1)).toBe(1);
    expect(timePressure(1, 0.1)).toBe(0);
  });

  it('follows 1 - t^(1/eps)', () => {
    // 0.5^10 = 0.0009765625
    expect(timePressure(0.5, 0.1)).toBe(0.9990234375);
    // 0.9^10 = 0.3486784401
    expect(Math.abs(timePressure(0.9, 0.1) - 0.6513215599)).toBeLessThanOrEqual(TOL);
  });

  it('stays near 1 longer as eps shrinks', () => {
    const at = (t: number) => [0.1, 0.05, 0.01].map((eps) => timePressure(t, eps));
    const [p10, p05, p01] = at(0.9);
    expect(p05).toBeGreaterThan(p10);
    expect(p01).toBeGreaterThan(p05);
    expect(p01).toBeGreaterThan(0.9999);
  });

  it('drops sharply only very near the deadline for small eps', () => {
    const eps = 0.01;
    expect(timePressure(0.5, eps)).toBeGreaterThan(0.999999);
    expect(timePressure(0.9, eps)).toBeGreaterThan(0.9999);
    // 0.99^100 ≈ 0.366
    expect(timePressure(0.99, eps)).toBeCloseTo(0.634, 3);
    // 0.999^100 ≈ 0.905
    expect(timePressure(0.999, eps)).toBeCloseTo(0.095, 3);
    expect(timePressure(1, eps)).toBe(0);
  });
});

describe('scoreBid', () => {
  const base = { utility: paintUtility, alpha: 0.95, eps: 0.1 };

  it('is alpha * TP * U without an opponent model', () => {
    expect(scoreBid(RED_LARGE, { ...base, progress: 0, opponentModel: null })).toBeCloseTo(0.95, 12);
    expect(scoreBid(RED_SMALL, { ...base, progress: 0, opponentModel: null })).toBeCloseTo(0.57, 12);
    expect(scoreBid(RED_LARGE, { ...base, progress: 1, opponentModel: null })).toBe(0);
  });

  it('adds (1 - alpha * TP) * U_opp with an opponent model', () => {
    const model = new FrequencyOpponentModel(makeDomain());
    // neutral model predicts 0.5 for every bid
    expect(scoreBid(RED_LARGE, { ...base, progress: 0, opponentModel: model })).toBeCloseTo(0.975, 12);
  });

  it('weighs the opponent prediction fully at the deadline', () => {
    const model = new FrequencyOpponentModel(makeDomain());
    model.update(BLUE_SMALL);
    // TP = 0 → score = U_opp(blue-small) = 1
    expect(scoreBid(BLUE_SMALL, { ...base, progress: 1, opponentModel: model })).toBe(1);
    expect(scoreBid(RED_LARGE, { ...base, progress: 1, opponentModel: model })).toBe(0);
  });
});
