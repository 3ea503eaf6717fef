import { describe, expect, it } from 'vitest';
import { isEmotionLabel, roundHalfEven, roundTo } from './Emotion';

describe('roundHalfEven', () => {
  it('rounds ties to the even neighbour', () => {
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(roundHalfEven(-2.5)).toBe(-2);
  });

  it('rounds everything else to the nearest integer', () => {
    expect(roundHalfEven(2.4)).toBe(2);
    expect(roundHalfEven(2.6)).toBe(3);
    expect(roundHalfEven(-2.6)).toBe(-3);
  });
});

describe('roundTo', () => {
  it('rounds to the given decimals with ties to even', () => {
    expect(roundTo(0.125, 2)).toBe(0.12);
    expect(roundTo(0.375, 2)).toBe(0.38);
    expect(roundTo(31 / 3, 2)).toBe(10.33);
  });
});

describe('isEmotionLabel', () => {
  it('accepts only canonical labels', () => {
    expect(isEmotionLabel('happy')).toBe(true);
    expect(isEmotionLabel('Happy')).toBe(false);
    expect(isEmotionLabel(3)).toBe(false);
  });
});
