import { pdf, cdf } from './normal.js';

describe('pdf', () => {
  test('densities', () => {
    expect(pdf(0, 0, 1)).toBeCloseTo(0.398942, 6);
    expect(pdf(1, 0, 1)).toBeCloseTo(0.241971, 6);
    expect(pdf(-1, 0, 1)).toBeCloseTo(0.241971, 6);
    expect(pdf(1, 1, 2)).toBeCloseTo(0.199471, 6);
  });

  test('defaults to the standard normal', () => {
    expect(pdf(0.5)).toBe(pdf(0.5, 0, 1));
  });
});

describe('cdf', () => {
  test('probabilities', () => {
    expect(cdf(0, 0, 1)).toBeCloseTo(0.5, 6);
    expect(cdf(0.5, 0, 1)).toBeCloseTo(0.6914625, 6);
    expect(cdf(0.5, 3, 1)).toBeCloseTo(0.00621, 5);
    expect(cdf(0.99, 0, 1)).toBeCloseTo(0.838913, 6);
    expect(cdf(-1.96)).toBeCloseTo(0.024998, 6);
  });

  test('is one half at the mean', () => {
    expect(cdf(0)).toBe(0.5);
    expect(cdf(3, 3, 2)).toBe(0.5);
  });

  test('is symmetric about the mean', () => {
    for (const x of [0.1, 0.7, 1.3, 2.9]) {
      expect(cdf(3 + x, 3, 2) + cdf(3 - x, 3, 2)).toBeCloseTo(1, 12);
    }
  });
});
