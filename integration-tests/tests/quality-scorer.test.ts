/**
 * Quality scorer: bounds, structural checks, dictionary sampling and
 * escalation reasons.
 */

import {
  classifyWord,
  escalationReasons,
  piecewiseLinear,
  scoreQuality,
  type EscalationSettings,
} from '@advice-corpus/shared';
import { DENSITY_CURVE } from '../../packages/shared/src/quality/curves';

const SETTINGS: EscalationSettings = {
  yearThreshold: 1990,
  qualityFloor: 0.5,
  minWordsPerPage: 80,
  minAlphaRatio: 0.7,
  maxGarbageWords: 5,
};

const DICTIONARY = new Set([
  'commission', 'staff', 'advised', 'the', 'council', 'member', 'about',
  'conflict', 'rules', 'before', 'vote', 'today',
]);

const CLEAN = 'commission staff advised the council member about the conflict rules before the vote today';
const MISREAD = 'commissiom staff advlsed the councii member about the confiict rules before the vote today';

describe('Quality scorer', () => {
  it('scores empty text and non-positive page counts as zero', () => {
    expect(scoreQuality('', 3).final_score).toBe(0);
    expect(scoreQuality('Some letter text', 0).final_score).toBe(0);
    expect(scoreQuality('Some letter text', -1).final_score).toBe(0);
  });

  it('keeps the score within [0, 1]', () => {
    const samples = [CLEAN, MISREAD, 'xxxx zzzz qqqq', `${CLEAN} `.repeat(80)];
    for (const text of samples) {
      const { final_score } = scoreQuality(text, 1, { dictionary: DICTIONARY });
      expect(final_score).toBeGreaterThanOrEqual(0);
      expect(final_score).toBeLessThanOrEqual(1);
    }
  });

  it('penalizes plausible character substitutions through the dictionary check only', () => {
    const clean = scoreQuality(CLEAN, 1, { dictionary: DICTIONARY });
    const misread = scoreQuality(MISREAD, 1, { dictionary: DICTIONARY });

    expect(clean.dict_score).toBe(1);
    expect(misread.word_quality_score).toBe(1);
    expect(misread.dict_miss_ratio).toBeCloseTo(4 / 14, 5);
    expect(misread.dict_score).toBeLessThan(clean.dict_score);
    expect(misread.final_score).toBeLessThan(clean.final_score);
  });

  it('flags structurally broken tokens', () => {
    expect(classifyWord('of')).toBe('ok');
    expect(classifyWord('Califomia')).toBe('ok');
    expect(classifyWord('xkcdfgh')).toBe('garbage');
    expect(classifyWord('aaaaah')).toBe('garbage');
    expect(classifyWord('Привет')).toBe('non_latin');
    expect(classifyWord('87103')).toBe('ok');
  });

  it('interpolates calibration curves and clamps outside them', () => {
    expect(piecewiseLinear(150, DENSITY_CURVE)).toBeCloseTo(0.775, 10);
    expect(piecewiseLinear(-5, DENSITY_CURVE)).toBe(0);
    expect(piecewiseLinear(5000, DENSITY_CURVE)).toBe(0.6);
  });

  describe('escalation', () => {
    it('reports every failed check for an empty text layer', () => {
      const reasons = escalationReasons(1985, scoreQuality('', 0), SETTINGS);
      expect(reasons).toEqual(['pre_threshold_year', 'low_quality', 'low_density', 'low_alpha_ratio']);
    });

    it('ignores the year check when the year is unknown', () => {
      const reasons = escalationReasons(null, scoreQuality('', 0), SETTINGS);
      expect(reasons).not.toContain('pre_threshold_year');
    });

    it('escalates on garbage words when every other check passes', () => {
      const lenient: EscalationSettings = {
        yearThreshold: 0,
        qualityFloor: 0,
        minWordsPerPage: 0,
        minAlphaRatio: 0,
        maxGarbageWords: 5,
      };
      const metrics = scoreQuality(CLEAN, 1);
      expect(escalationReasons(2003, { ...metrics, garbage_word_count: 6 }, lenient)).toEqual(['garbage_words']);
      expect(escalationReasons(2003, { ...metrics, garbage_word_count: 5 }, lenient)).toEqual([]);
    });
  });
});
