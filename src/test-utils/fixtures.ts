/**
 * Shared helpers for tests: generated images and throwaway directories
 */

import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import sharp from 'sharp';
import { createEmptyEmotionMap } from '../domain/models/Emotion';
import type { EmotionScoreMap } from '../domain/models/Emotion';
import type { ClassificationResult } from '../domain/models/FrameAnalysis';
import type { ClassifierKind, EmotionClassifier } from '../services/EmotionAnalyst';
import { selectDominantEmotion } from '../domain/logic/EmotionAggregator';

/** Payload that is not valid base64 */
export const CORRUPT_DATA_URL = 'data:image/jpeg;base64,@@not-base64@@';

/**
 * Uniform grey JPEG with every channel set to `value`
 */
export function solidJpeg(value: number, size = 8): Promise<Buffer> {
  return sharp({
    create: { width: size, height: size, channels: 3, background: { r: value, g: value, b: value } }
  })
    .jpeg()
    .toBuffer();
}

export async function solidDataUrl(value: number, size = 8): Promise<string> {
  const jpeg = await solidJpeg(value, size);
  return `data:image/jpeg;base64,${jpeg.toString('base64')}`;
}

export function makeTempDir(prefix = 'emotion-sessions-'): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): Promise<void> {
  return rm(dir, { recursive: true, force: true });
}

export function scores(partial: Partial<EmotionScoreMap>): EmotionScoreMap {
  return { ...createEmptyEmotionMap(), ...partial };
}

/**
 * Classifier that returns the same scores for every image
 */
export class FixedClassifier implements EmotionClassifier {
  readonly kind: ClassifierKind;
  readonly calls: Buffer[] = [];
  private readonly emotions: EmotionScoreMap;

  constructor(emotions: EmotionScoreMap, kind: ClassifierKind = 'model') {
    this.emotions = emotions;
    this.kind = kind;
  }

  async classify(image: Buffer): Promise<ClassificationResult> {
    this.calls.push(image);
    return {
      success: true,
      emotions: { ...this.emotions },
      dominantEmotion: selectDominantEmotion(this.emotions)
    };
  }
}

/**
 * Small deterministic PRNG (mulberry32) for property-style tests
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
