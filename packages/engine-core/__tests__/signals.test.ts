import { describe, expect, it } from 'vitest';
import { emotionValence, isEmotionLabel, scoreIntensity } from '../src/signals/emotion.js';
import { detectTopic, parseNumericClaim } from '../src/signals/claims.js';

describe('scoreIntensity', () => {
  it('plain statement scores the base', () => {
    expect(scoreIntensity('The price is fine.')).toBeCloseTo(0.4, 10);
  });

  it('exclamation and emphasis raise intensity', () => {
    expect(scoreIntensity('This offer is completely unacceptable and insulting!')).toBeCloseTo(0.65, 10);
  });

  it('caps at 1.0', () => {
    expect(scoreIntensity('This is the WORST deal EVER!!!')).toBe(1);
  });

  it('counts at most three exclamation marks', () => {
    expect(scoreIntensity('no!!!!!!')).toBeCloseTo(0.85, 10);
  });
});

describe('emotion labels', () => {
  it('recognizes enumerated labels only', () => {
    expect(isEmotionLabel('frustrated')).toBe(true);
    expect(isEmotionLabel('bored')).toBe(false);
  });

  it('valence is the baseline scaled by intensity', () => {
    expect(emotionValence('frustrated', 0.5)).toBeCloseTo(-0.3, 10);
    expect(emotionValence('happy', 1)).toBeCloseTo(0.8, 10);
    expect(emotionValence('neutral', 1)).toBe(0);
  });
});

describe('parseNumericClaim', () => {
  it('parses a currency claim as price', () => {
    expect(parseNumericClaim('I can pay up to $500')).toEqual({ topic: 'price', value: 500 });
  });

  it('strips thousands separators', () => {
    expect(parseNumericClaim('We need 1,200 units')).toEqual({ topic: 'quantity', value: 1200 });
  });

  it('applies k suffix', () => {
    expect(parseNumericClaim('Our budget is 2.5k')).toEqual({ topic: 'price', value: 2500 });
  });

  it('detects timeline claims', () => {
    expect(parseNumericClaim('Delivery in 14 days')).toEqual({ topic: 'timeline', value: 14 });
  });

  it('detects percentages', () => {
    expect(parseNumericClaim('A 15% discount is our limit')).toEqual({ topic: 'percentage', value: 15 });
  });

  it('returns null without a number', () => {
    expect(parseNumericClaim('No numbers here')).toBeNull();
  });
});

describe('detectTopic', () => {
  it('falls back to general', () => {
    expect(detectTopic('The answer is 42')).toBe('general');
  });

  it('treats a bare currency sign as price', () => {
    expect(detectTopic('$300 then')).toBe('price');
  });
});
