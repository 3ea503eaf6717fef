/**
 * FrameAnalysis - Result of classifying one stored frame
 *
 * Output of the classifier stage and input to the aggregator.
 */

import { FALLBACK_EMOTION, createEmptyEmotionMap } from './Emotion';
import type { EmotionLabel, EmotionScoreMap } from './Emotion';
import type { FrameRecord } from './Session';

/**
 * What a classifier returns for a single image
 */
export interface ClassificationResult {
  success: boolean;
  emotions: EmotionScoreMap;
  dominantEmotion: EmotionLabel;

  /** Present only when success is false */
  error?: string;
}

export interface FrameAnalysis extends ClassificationResult {
  frameId: number;
  capturedAt: string;
  filename: string;
}

/**
 * Classification failure with an all-zero score map
 */
export function failedClassification(error: string): ClassificationResult {
  return {
    success: false,
    emotions: createEmptyEmotionMap(),
    dominantEmotion: FALLBACK_EMOTION,
    error
  };
}

/**
 * Attach a classification result to the frame it came from
 */
export function createFrameAnalysis(frame: FrameRecord, result: ClassificationResult): FrameAnalysis {
  const analysis: FrameAnalysis = {
    frameId: frame.frameId,
    capturedAt: frame.capturedAt,
    filename: frame.filename,
    emotions: result.emotions,
    dominantEmotion: result.dominantEmotion,
    success: result.success
  };
  if (!result.success) {
    analysis.error = result.error ?? 'Unknown error';
  }
  return analysis;
}
