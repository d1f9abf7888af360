import { erf } from '../math.js';

const INV_SQRT_2PI = 1 / Math.sqrt(2 * Math.PI);

/** Probability density of a normal random variable with given location/scale */
export function pdf(x: number, mean = 0, std = 1) {
  const z = (x - mean) / std;
  return (INV_SQRT_2PI / std) * Math.exp(-0.5 * z * z);
}

/**
 * Cumulative distribution function of a normal random variable,
 * Φ((x - mean) / std)
 */
export function cdf(x: number, mean = 0, std = 1) {
  const z = (x - mean) / std;
  return 0.5 * (1 + erf(z / Math.SQRT2));
}
