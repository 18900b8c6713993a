import { DEFAULT_K_FACTOR, expectedScore, ratingDelta } from '../src/elo.js';

describe('Elo calculations', () => {
  it('computes expected score correctly', () => {
    expect(expectedScore(1500, 1500)).toBe(0.5);
    expect(expectedScore(1600, 1500)).toBeCloseTo(0.6401, 4);
    expect(expectedScore(1500, 1600)).toBeCloseTo(0.3599, 4);
  });

  it('keeps both sides of a pairing summing to one', () => {
    const ratings = [-800, 0, 350.5, 1200, 1500, 1873.25, 2400, 3500];
    for (const a of ratings) {
      for (const b of ratings) {
        expect(expectedScore(a, b) + expectedScore(b, a)).toBeCloseTo(1, 12);
      }
    }
  });

  it('stays strictly inside (0, 1) for a 2000 point gap', () => {
    const favourite = expectedScore(3500, 1500);
    const underdog = expectedScore(1500, 3500);
    expect(favourite).toBeLessThan(1);
    expect(favourite).toBeGreaterThan(0.9999);
    expect(underdog).toBeGreaterThan(0);
    expect(underdog).toBeLessThan(0.0001);
  });

  it('scales the rating delta by the K-factor', () => {
    expect(DEFAULT_K_FACTOR).toBe(32);
    expect(ratingDelta(0.5, 1)).toBe(16);
    expect(ratingDelta(0.5, 0)).toBe(-16);
    expect(ratingDelta(0.25, 1, 16)).toBe(12);
    expect(ratingDelta(0.75, 0, 40)).toBe(-30);
  });
});
