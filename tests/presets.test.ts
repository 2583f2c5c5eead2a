import { describe, it, expect } from 'vitest';
import { DEFAULT_PRESETS, NEGATE_EARNED_STARS, parseGameRules, parseProcessingPresets } from '../src/presets.js';

describe('processing presets', () => {
  it('fills every field with its default', () => {
    expect(DEFAULT_PRESETS.pxMargin).toBe(10);
    expect(DEFAULT_PRESETS.fallbackTolerance).toBe(0.2);
    expect(DEFAULT_PRESETS.samplers.rowMenuMin).toEqual({ repCharTol: 0.001, filterScale: 0.97 });
    expect(DEFAULT_PRESETS.recognition.backgroundThresholds).toHaveLength(5);
  });

  it('merges stored values over the defaults', () => {
    const presets = parseProcessingPresets({ samplers: { newLine: { filterScale: 0.9 } }, starMargin: 2 });
    expect(presets.samplers.newLine).toEqual({ repCharTol: 0.01, filterScale: 0.9 });
    expect(presets.samplers.noStar).toEqual({ repCharTol: 0.01, filterScale: 1 });
    expect(presets.starMargin).toBe(2);
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseProcessingPresets({ pxMargin: 'ten' })).toThrow();
  });
});

describe('game rules', () => {
  it('defaults to the stealing penalty negating earned stars', () => {
    const rules = parseGameRules();
    expect(rules.droppingForFirstAttackPenalty).toBe(NEGATE_EARNED_STARS);
    expect(rules.noThreeStarDroppingPenalty).toBe(-1);
    expect(rules.successfulJumpBonus).toBe(1);
  });

  it('accepts the sentinel in any case', () => {
    expect(parseGameRules({ noThreeStarDroppingPenalty: 'negate EARNED stars' }).noThreeStarDroppingPenalty)
      .toBe(NEGATE_EARNED_STARS);
  });

  it('rejects any other penalty text', () => {
    expect(() => parseGameRules({ noThreeStarDroppingPenalty: 'half' })).toThrow();
    expect(() => parseGameRules({ successfulJumpBonus: 1.5 })).toThrow();
  });
});
