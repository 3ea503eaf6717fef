import { describe, expect, it } from 'vitest';
import { aggregateAnalyses, selectDominantEmotion } from './EmotionAggregator';
import { createEmptyEmotionMap } from '../models/Emotion';
import type { FrameAnalysis } from '../models/FrameAnalysis';
import { scores } from '../../test-utils/fixtures';

function analysis(frameId: number, emotions: FrameAnalysis['emotions'], success = true): FrameAnalysis {
  return {
    frameId,
    capturedAt: `2024-05-01T10:00:0${frameId}.000Z`,
    filename: `frame_0${frameId}.jpg`,
    emotions,
    dominantEmotion: selectDominantEmotion(emotions),
    success,
    ...(success ? {} : { error: 'Could not load image' })
  };
}

describe('selectDominantEmotion', () => {
  it('returns the label with the highest score', () => {
    expect(selectDominantEmotion(scores({ sad: 70, happy: 20, neutral: 10 }))).toBe('sad');
  });

  it('breaks ties by canonical label order', () => {
    expect(selectDominantEmotion(scores({ happy: 40, sad: 40, neutral: 20 }))).toBe('happy');
    expect(selectDominantEmotion(scores({ neutral: 30, angry: 30, disgust: 30 }))).toBe('angry');
  });

  it('falls back to neutral when nothing scores above zero', () => {
    expect(selectDominantEmotion(createEmptyEmotionMap())).toBe('neutral');
  });
});

describe('aggregateAnalyses', () => {
  it('averages only the successful analyses', () => {
    const result = aggregateAnalyses([
      analysis(1, scores({ happy: 60, neutral: 40 })),
      analysis(2, createEmptyEmotionMap(), false),
      analysis(3, scores({ happy: 30, neutral: 50, sad: 20 }))
    ]);

    expect(result.averageEmotions).toEqual(scores({ happy: 45, neutral: 45, sad: 10 }));
    expect(result.dominantEmotion).toBe('happy');
    expect(result.totalFrames).toBe(3);
    expect(result.successfulAnalyses).toBe(2);
  });

  it('rounds averages to two decimals', () => {
    const result = aggregateAnalyses([
      analysis(1, scores({ fear: 10 })),
      analysis(2, scores({ fear: 10 })),
      analysis(3, scores({ fear: 11 }))
    ]);

    expect(result.averageEmotions.fear).toBe(10.33);
    expect(result.dominantEmotion).toBe('fear');
  });

  it('returns zeros and neutral when nothing succeeded', () => {
    const result = aggregateAnalyses([
      analysis(1, createEmptyEmotionMap(), false),
      analysis(2, createEmptyEmotionMap(), false)
    ]);

    expect(result.averageEmotions).toEqual(createEmptyEmotionMap());
    expect(result.dominantEmotion).toBe('neutral');
    expect(result.successfulAnalyses).toBe(0);
    expect(result.totalFrames).toBe(2);
  });
});
