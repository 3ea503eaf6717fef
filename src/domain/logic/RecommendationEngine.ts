/**
 * RecommendationEngine - Canned advice keyed by the dominant emotion
 *
 * Combines the recommendation table with the mind-age heuristic into the
 * report returned to clients.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { FALLBACK_EMOTION, isEmotionLabel } from '../models/Emotion';
import type { EmotionLabel } from '../models/Emotion';
import { formatAgeRange } from '../models/MindAge';
import type { MindAgeAssessment } from '../models/MindAge';
import { assessMindAge } from './MindAgeScorer';

/** Placeholder replaced with the lower-cased personality type */
export const PERSONALITY_PLACEHOLDER = '{personality}';

const Lines = z.array(z.string()).min(1);

const RecommendationTableSchema = z.object({
  generalTip: z.string(),
  byEmotion: z.object({
    angry: Lines,
    disgust: Lines,
    fear: Lines,
    happy: Lines,
    sad: Lines,
    surprise: Lines,
    neutral: Lines
  })
});

export type RecommendationTable = z.infer<typeof RecommendationTableSchema>;

/**
 * Load and validate the recommendation table shipped with the package
 */
export function loadRecommendationTable(
  url: URL = new URL('../data/recommendations.json', import.meta.url)
): RecommendationTable {
  return RecommendationTableSchema.parse(JSON.parse(readFileSync(url, 'utf8')));
}

const DEFAULT_TABLE = loadRecommendationTable();

/**
 * Mind-age section of the recommendation report
 */
export interface MindAgeAnalysis {
  estimatedMindAge: number;
  ageRange: string;
  personalityType: string;
  emotionalIntelligence: MindAgeAssessment['emotionalIntelligence'];
  eiDescription: string;
  interpretation: string;
  maturityScore: number;
}

export interface RecommendationReport {
  dominantEmotion: EmotionLabel;
  recommendations: string[];
  mindAgeAnalysis: MindAgeAnalysis;
  generalTip: string;
}

/**
 * Recommendation list for a dominant label, with the personality filled in
 */
export function selectRecommendations(
  dominantEmotion: EmotionLabel,
  assessment: MindAgeAssessment,
  table: RecommendationTable = DEFAULT_TABLE
): string[] {
  const personality = assessment.personalityType.toLowerCase();
  return table.byEmotion[dominantEmotion].map(line => line.split(PERSONALITY_PLACEHOLDER).join(personality));
}

export function describeMindAge(assessment: MindAgeAssessment): MindAgeAnalysis {
  return {
    estimatedMindAge: assessment.mindAge,
    ageRange: formatAgeRange(assessment.ageRange),
    personalityType: assessment.personalityType,
    emotionalIntelligence: assessment.emotionalIntelligence,
    eiDescription: assessment.eiDescription,
    interpretation:
      `Based on your emotional patterns, your psychological age appears to be around ${assessment.mindAge} years, ` +
      `suggesting a ${assessment.personalityType.toLowerCase()} emotional profile.`,
    maturityScore: assessment.maturityScore
  };
}

/**
 * Build the full report. Unknown dominant labels fall back to neutral.
 */
export function buildRecommendationReport(
  emotions: Readonly<Record<string, number>>,
  dominantEmotion: string,
  table: RecommendationTable = DEFAULT_TABLE
): RecommendationReport {
  const dominant = isEmotionLabel(dominantEmotion) ? dominantEmotion : FALLBACK_EMOTION;
  const assessment = assessMindAge(emotions, dominant);

  return {
    dominantEmotion: dominant,
    recommendations: selectRecommendations(dominant, assessment, table),
    mindAgeAnalysis: describeMindAge(assessment),
    generalTip: table.generalTip
  };
}
