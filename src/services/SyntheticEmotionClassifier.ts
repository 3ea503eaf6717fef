/**
 * SyntheticEmotionClassifier - Fallback used when no emotion model loads
 *
 * Produces plausible-looking scores from the frame's mean brightness plus
 * Gaussian noise. Brighter frames lean happy, darker frames lean sad.
 */

import * as tf from '@tensorflow/tfjs';
import { EMOTION_LABELS, createEmptyEmotionMap, roundTo } from '../domain/models/Emotion';
import type { EmotionLabel, EmotionScoreMap } from '../domain/models/Emotion';
import { failedClassification } from '../domain/models/FrameAnalysis';
import type { ClassificationResult } from '../domain/models/FrameAnalysis';
import { selectDominantEmotion } from '../domain/logic/EmotionAggregator';
import { errorMessage } from '../domain/errors';
import { meanBrightness } from './ImageCodec';
import type { EmotionClassifier } from './EmotionAnalyst';
import { createLogger } from '../utils/logger';

const log = createLogger('SyntheticClassifier');

/**
 * Returns `count` independent standard-normal samples
 */
export type GaussianSampler = (count: number) => number[];

interface ScoreProfile {
  mean: (brightness: number) => number;
  stddev: number;
}

export const SYNTHETIC_PROFILES: Record<EmotionLabel, ScoreProfile> = {
  angry: { mean: () => 15, stddev: 12 },
  disgust: { mean: () => 8, stddev: 6 },
  fear: { mean: () => 10, stddev: 8 },
  happy: { mean: brightness => brightness / 2.55, stddev: 10 },
  sad: { mean: brightness => (255 - brightness) / 3, stddev: 8 },
  surprise: { mean: () => 20, stddev: 10 },
  neutral: { mean: () => 50, stddev: 15 }
};

/**
 * Default sampler backed by tf.randomNormal
 */
export const tfGaussianSampler: GaussianSampler = count =>
  tf.tidy(() => Array.from(tf.randomNormal([count]).dataSync()));

function clampPercent(value: number): number {
  return Math.max(0, Math.min(100, value));
}

/**
 * Score map for a brightness value and one standard-normal sample per label
 * (canonical label order). Values are clamped to 0-100, rescaled to sum to
 * 100 and rounded to 2 decimals.
 */
export function synthesizeEmotions(brightness: number, noise: number[]): EmotionScoreMap {
  const raw = createEmptyEmotionMap();
  EMOTION_LABELS.forEach((label, i) => {
    const profile = SYNTHETIC_PROFILES[label];
    raw[label] = clampPercent(profile.mean(brightness) + (noise[i] ?? 0) * profile.stddev);
  });

  const total = EMOTION_LABELS.reduce((sum, label) => sum + raw[label], 0);
  const scores = createEmptyEmotionMap();

  if (total === 0) {
    // every sample clamped to zero: report a flat neutral reading
    scores.neutral = 100;
    return scores;
  }

  for (const label of EMOTION_LABELS) {
    scores[label] = roundTo((raw[label] / total) * 100, 2);
  }
  return scores;
}

export class SyntheticEmotionClassifier implements EmotionClassifier {
  readonly kind = 'synthetic';
  private readonly sample: GaussianSampler;

  constructor(sampler: GaussianSampler = tfGaussianSampler) {
    this.sample = sampler;
  }

  async classify(image: Buffer): Promise<ClassificationResult> {
    try {
      const brightness = await meanBrightness(image);
      const emotions = synthesizeEmotions(brightness, this.sample(EMOTION_LABELS.length));
      return {
        success: true,
        emotions,
        dominantEmotion: selectDominantEmotion(emotions)
      };
    } catch (error) {
      log.error(`Synthetic analysis error: ${errorMessage(error)}`);
      return failedClassification(errorMessage(error));
    }
  }
}
