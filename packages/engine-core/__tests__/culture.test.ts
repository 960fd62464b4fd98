import { describe, expect, it } from 'vitest';
import {
  CULTURAL_PROFILES,
  culturalDistance,
  distanceTier,
  getCulturalProfile,
  isCultureKey,
} from '../src/culture/profiles.js';
import { directnessTolerance, scoreDirectness } from '../src/culture/directness.js';

const profiles = Object.values(CULTURAL_PROFILES);

describe('culturalDistance', () => {
  it('is symmetric for every catalogued pair', () => {
    for (const a of profiles) {
      for (const b of profiles) {
        expect(culturalDistance(a, b)).toBe(culturalDistance(b, a));
      }
    }
  });

  it('is zero from a profile to itself', () => {
    for (const p of profiles) {
      expect(culturalDistance(p, p)).toBe(0);
    }
  });

  it('western business vs east asian is high', () => {
    const d = culturalDistance(CULTURAL_PROFILES.western_business, CULTURAL_PROFILES.east_asian);
    // sqrt(0.6^2 + 0.7^2 + 0.6^2) / sqrt(3)
    expect(d).toBeCloseTo(Math.sqrt(1.21 / 3), 10);
    expect(distanceTier(d)).toBe('high');
  });

  it('western business vs latin american is low', () => {
    const d = culturalDistance(CULTURAL_PROFILES.western_business, CULTURAL_PROFILES.latin_american);
    expect(distanceTier(d)).toBe('low');
  });

  it('stays within [0, 1]', () => {
    for (const a of profiles) {
      for (const b of profiles) {
        const d = culturalDistance(a, b);
        expect(d).toBeGreaterThanOrEqual(0);
        expect(d).toBeLessThanOrEqual(1);
      }
    }
  });
});

describe('distanceTier', () => {
  it.each([
    [0, 'low'],
    [0.29, 'low'],
    [0.3, 'medium'],
    [0.59, 'medium'],
    [0.6, 'high'],
    [1, 'high'],
  ] as const)('%s → %s', (distance, tier) => {
    expect(distanceTier(distance)).toBe(tier);
  });
});

describe('catalogue lookup', () => {
  it('resolves known keys', () => {
    expect(getCulturalProfile('east_asian')?.name).toBe('East Asian (Japan/China)');
    expect(isCultureKey('south_asian')).toBe(true);
  });

  it('returns null for unknown keys', () => {
    expect(getCulturalProfile('martian')).toBeNull();
    expect(isCultureKey('toString')).toBe(false);
  });

  it('profiles are frozen', () => {
    expect(Object.isFrozen(CULTURAL_PROFILES.western_business)).toBe(true);
  });
});

describe('scoreDirectness', () => {
  it('neutral statement scores the base', () => {
    expect(scoreDirectness('The delivery is scheduled for next week')).toBeCloseTo(0.3, 10);
  });

  it('direct markers raise the score', () => {
    expect(scoreDirectness('You are wrong about this pricing')).toBeCloseTo(0.5, 10);
  });

  it('softeners lower the score, floored at 0', () => {
    expect(scoreDirectness('Perhaps you could consider this')).toBe(0);
  });
});

describe('directnessTolerance', () => {
  it('formal, indirect listeners tolerate little', () => {
    expect(directnessTolerance(CULTURAL_PROFILES.east_asian)).toBeCloseTo(0.4, 10);
  });

  it('informal, direct listeners tolerate a lot', () => {
    expect(directnessTolerance(CULTURAL_PROFILES.western_business)).toBeCloseTo(0.86, 10);
  });
});
