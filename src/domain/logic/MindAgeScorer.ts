/**
 * MindAgeScorer - The "psychological age" heuristic
 *
 * Pure function over an emotion distribution and its dominant label.
 * The output is a narrative aid, not an assessment.
 */

import { FALLBACK_EMOTION, isEmotionLabel, roundHalfEven, roundTo } from '../models/Emotion';
import type { EmotionLabel } from '../models/Emotion';
import type { EmotionalIntelligenceTier, MindAgeAssessment, MindAgeProfile } from '../models/MindAge';

/**
 * Contribution of each emotion (as a 0-1 share) to the maturity score
 */
export const MATURITY_WEIGHTS: Record<EmotionLabel, number> = {
  happy: 0.15,
  neutral: 0.2,
  sad: -0.05,
  angry: -0.15,
  fear: -0.1,
  surprise: 0.05,
  disgust: -0.08
};

export const MIND_AGE_PROFILES: Record<EmotionLabel, MindAgeProfile> = {
  happy: { baseAge: 25, ageRange: [20, 35], personalityType: 'Optimistic Young Adult' },
  neutral: { baseAge: 35, ageRange: [30, 45], personalityType: 'Mature Adult' },
  sad: { baseAge: 28, ageRange: [18, 40], personalityType: 'Reflective Individual' },
  angry: { baseAge: 22, ageRange: [16, 30], personalityType: 'Reactive Young Adult' },
  fear: { baseAge: 26, ageRange: [20, 35], personalityType: 'Cautious Individual' },
  surprise: { baseAge: 23, ageRange: [18, 32], personalityType: 'Curious Young Adult' },
  disgust: { baseAge: 30, ageRange: [25, 40], personalityType: 'Critical Adult' }
};

const EI_DESCRIPTIONS: Record<EmotionalIntelligenceTier, string> = {
  High: 'Shows strong emotional regulation and balance',
  Moderate: 'Demonstrates average emotional awareness',
  Developing: 'Has room for growth in emotional regulation'
};

export const MIN_MIND_AGE = 16;
export const MAX_MIND_AGE = 50;

/** Years added per point of maturity score */
const AGE_SCALE = 30;

/**
 * Weighted maturity score: Σ (score / 100) * weight
 *
 * Labels outside the supported set and non-finite values are ignored.
 */
export function computeMaturityScore(emotions: Readonly<Record<string, number>>): number {
  let score = 0;
  for (const [label, percentage] of Object.entries(emotions)) {
    if (!isEmotionLabel(label) || !Number.isFinite(percentage)) continue;
    score += (percentage / 100) * MATURITY_WEIGHTS[label];
  }
  return score;
}

export function classifyEmotionalIntelligence(maturityScore: number): EmotionalIntelligenceTier {
  if (maturityScore > 0.1) return 'High';
  if (maturityScore > -0.05) return 'Moderate';
  return 'Developing';
}

/**
 * Profile for a dominant label; anything unrecognised uses the neutral profile
 */
export function resolveProfile(dominantEmotion: string): MindAgeProfile {
  return isEmotionLabel(dominantEmotion)
    ? MIND_AGE_PROFILES[dominantEmotion]
    : MIND_AGE_PROFILES[FALLBACK_EMOTION];
}

export function assessMindAge(
  emotions: Readonly<Record<string, number>>,
  dominantEmotion: string
): MindAgeAssessment {
  const maturityScore = computeMaturityScore(emotions);
  const profile = resolveProfile(dominantEmotion);

  const rawAge = profile.baseAge + maturityScore * AGE_SCALE;
  const mindAge = roundHalfEven(Math.max(MIN_MIND_AGE, Math.min(MAX_MIND_AGE, rawAge)));
  const tier = classifyEmotionalIntelligence(maturityScore);

  return {
    mindAge,
    ageRange: [profile.ageRange[0], profile.ageRange[1]],
    personalityType: profile.personalityType,
    emotionalIntelligence: tier,
    eiDescription: EI_DESCRIPTIONS[tier],
    maturityScore: roundTo(maturityScore, 3)
  };
}
