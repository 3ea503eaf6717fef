/**
 * EmotionAggregator - Dominant-emotion selection and per-session averages
 *
 * Pure functions, no side effects. The same argmax rule is used for single
 * frames and for session averages.
 */

import { EMOTION_LABELS, FALLBACK_EMOTION, createEmptyEmotionMap, roundTo } from '../models/Emotion';
import type { EmotionLabel, EmotionScoreMap } from '../models/Emotion';
import type { FrameAnalysis } from '../models/FrameAnalysis';

/**
 * Session-level statistics over a set of frame analyses
 */
export interface AggregateResult {
  averageEmotions: EmotionScoreMap;
  dominantEmotion: EmotionLabel;
  totalFrames: number;
  successfulAnalyses: number;
}

/**
 * Label with the strictly highest score
 *
 * Labels are walked in canonical order and only a strictly greater score
 * replaces the current leader, so the first of several equal maxima wins.
 * A map with no positive score has no dominant emotion and yields neutral.
 */
export function selectDominantEmotion(emotions: EmotionScoreMap): EmotionLabel {
  let best: EmotionLabel = FALLBACK_EMOTION;
  let bestScore = 0;

  for (const label of EMOTION_LABELS) {
    if (emotions[label] > bestScore) {
      best = label;
      bestScore = emotions[label];
    }
  }

  return best;
}

/**
 * Average each label over the successful analyses only (2 decimals)
 */
export function aggregateAnalyses(analyses: FrameAnalysis[]): AggregateResult {
  const successful = analyses.filter(a => a.success);
  const averageEmotions = createEmptyEmotionMap();

  if (successful.length === 0) {
    return {
      averageEmotions,
      dominantEmotion: FALLBACK_EMOTION,
      totalFrames: analyses.length,
      successfulAnalyses: 0
    };
  }

  for (const label of EMOTION_LABELS) {
    const total = successful.reduce((sum, analysis) => sum + analysis.emotions[label], 0);
    averageEmotions[label] = roundTo(total / successful.length, 2);
  }

  return {
    averageEmotions,
    dominantEmotion: selectDominantEmotion(averageEmotions),
    totalFrames: analyses.length,
    successfulAnalyses: successful.length
  };
}
