import { describe, expect, it } from 'vitest';
import {
  MAX_MIND_AGE,
  MIN_MIND_AGE,
  assessMindAge,
  classifyEmotionalIntelligence,
  computeMaturityScore
} from './MindAgeScorer';
import { EMOTION_LABELS } from '../models/Emotion';

const HAPPY_SESSION = { happy: 80, neutral: 10, sad: 2, angry: 1, fear: 1, surprise: 5, disgust: 1 };

describe('computeMaturityScore', () => {
  it('weights each share by its emotion', () => {
    expect(computeMaturityScore(HAPPY_SESSION)).toBeCloseTo(0.1382, 10);
  });

  it('ignores labels outside the supported set', () => {
    expect(computeMaturityScore({ happy: 50, joy: 100 })).toBeCloseTo(0.075, 10);
  });

  it('is zero for an empty distribution', () => {
    expect(computeMaturityScore({})).toBe(0);
  });
});

describe('classifyEmotionalIntelligence', () => {
  it('uses strict thresholds', () => {
    expect(classifyEmotionalIntelligence(0.1001)).toBe('High');
    expect(classifyEmotionalIntelligence(0.1)).toBe('Moderate');
    expect(classifyEmotionalIntelligence(-0.0499)).toBe('Moderate');
    expect(classifyEmotionalIntelligence(-0.05)).toBe('Developing');
  });
});

describe('assessMindAge', () => {
  it('scores a mostly happy session', () => {
    expect(assessMindAge(HAPPY_SESSION, 'happy')).toEqual({
      mindAge: 29,
      ageRange: [20, 35],
      personalityType: 'Optimistic Young Adult',
      emotionalIntelligence: 'High',
      eiDescription: 'Shows strong emotional regulation and balance',
      maturityScore: 0.138
    });
  });

  it('uses the neutral profile for an unknown dominant label', () => {
    const result = assessMindAge({}, 'bored');

    expect(result.mindAge).toBe(35);
    expect(result.ageRange).toEqual([30, 45]);
    expect(result.personalityType).toBe('Mature Adult');
    expect(result.emotionalIntelligence).toBe('Moderate');
  });

  it('adjusts the base age by the maturity score', () => {
    // 22 - 0.15 * 30 = 17.5
    const result = assessMindAge({ angry: 100 }, 'angry');

    expect(result.mindAge).toBe(18);
    expect(result.maturityScore).toBe(-0.15);
    expect(result.emotionalIntelligence).toBe('Developing');
  });

  it('rounds an exact half age to the even year', () => {
    // 25 + 0.05 * 30 = 26.5
    expect(assessMindAge({ surprise: 100 }, 'happy').mindAge).toBe(26);
    // 23 + 0.05 * 30 = 24.5
    expect(assessMindAge({ surprise: 100 }, 'surprise').mindAge).toBe(24);
  });

  it('clamps the age to 16-50', () => {
    expect(assessMindAge({ angry: 300 }, 'angry').mindAge).toBe(MIN_MIND_AGE);
    expect(assessMindAge({ neutral: 500 }, 'neutral').mindAge).toBe(MAX_MIND_AGE);
  });

  it('returns the same output for the same input', () => {
    expect(assessMindAge(HAPPY_SESSION, 'happy')).toEqual(assessMindAge(HAPPY_SESSION, 'happy'));
  });

  it('stays within range for every profile', () => {
    const distributions: Record<string, number>[] = [
      {},
      HAPPY_SESSION,
      { angry: 100 },
      { neutral: 100 },
      { fear: 50, disgust: 50 },
      { surprise: 100 }
    ];

    for (const label of EMOTION_LABELS) {
      for (const emotions of distributions) {
        const { mindAge } = assessMindAge(emotions, label);
        expect(mindAge).toBeGreaterThanOrEqual(MIN_MIND_AGE);
        expect(mindAge).toBeLessThanOrEqual(MAX_MIND_AGE);
      }
    }
  });
});
