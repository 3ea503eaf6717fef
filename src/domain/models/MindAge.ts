/**
 * MindAge - Heuristic psychological-age profile derived from emotions
 *
 * Not persisted; recomputed for every recommendation request.
 */

export type EmotionalIntelligenceTier = 'High' | 'Moderate' | 'Developing';

/**
 * Descriptive profile selected by the dominant emotion
 */
export interface MindAgeProfile {
  baseAge: number;
  ageRange: [number, number];
  personalityType: string;
}

export interface MindAgeAssessment {
  /** Estimated age, clamped to 16-50 */
  mindAge: number;
  ageRange: [number, number];
  personalityType: string;
  emotionalIntelligence: EmotionalIntelligenceTier;
  eiDescription: string;

  /** Weighted maturity score, 3 decimals */
  maturityScore: number;
}

/**
 * Format an age range for display, e.g. "20-35 years"
 */
export function formatAgeRange([min, max]: [number, number]): string {
  return `${min}-${max} years`;
}
