/**
 * Emotion - The fixed label set and score maps shared across the pipeline
 *
 * The label order below is canonical: classifiers emit scores in this order
 * and every dominant-emotion tie-break walks it front to back.
 */

export const EMOTION_LABELS = [
  'angry',
  'disgust',
  'fear',
  'happy',
  'sad',
  'surprise',
  'neutral'
] as const;

export type EmotionLabel = (typeof EMOTION_LABELS)[number];

/**
 * Percentage score (0-100) for each supported emotion
 */
export type EmotionScoreMap = Record<EmotionLabel, number>;

/** Label used when there is no usable signal */
export const FALLBACK_EMOTION: EmotionLabel = 'neutral';

export function isEmotionLabel(value: unknown): value is EmotionLabel {
  return EMOTION_LABELS.some(label => label === value);
}

/**
 * Create a map with every label set to zero
 */
export function createEmptyEmotionMap(): EmotionScoreMap {
  return {
    angry: 0,
    disgust: 0,
    fear: 0,
    happy: 0,
    sad: 0,
    surprise: 0,
    neutral: 0
  };
}

/**
 * Round to the nearest integer, ties to even (2.5 -> 2, 3.5 -> 4)
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Round to a fixed number of decimal places, ties to even
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return roundHalfEven(value * factor) / factor;
}
