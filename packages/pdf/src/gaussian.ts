import { assert, normal } from '@kernelpdf/base';

/**
 * Samples the Gaussian PDF `N(x | mean, std)` at `positions[lo..hi)`.
 * `std` must be positive.
 */
export function evaluate(
  mean: number,
  std: number,
  positions: ArrayLike<number>,
  lo = 0,
  hi = positions.length,
): Float64Array {
  assert.gt(std, 0);

  const out = new Float64Array(Math.max(hi - lo, 0));

  for (let i = lo; i < hi; i++) {
    out[i - lo] = normal.pdf(positions[i], mean, std);
  }

  return out;
}

/**
 * Integrates the Gaussian `N(x | mean, std)` over the bins delimited by
 * consecutive `edges`, yielding `edges.length - 1` amplitudes.
 */
export function evaluateBinned(mean: number, std: number, edges: ArrayLike<number>): Float64Array {
  const n = Math.max(edges.length - 1, 0);
  const out = new Float64Array(n);

  let lower = n > 0 ? normal.cdf(edges[0], mean, std) : 0;
  for (let k = 0; k < n; k++) {
    const upper = normal.cdf(edges[k + 1], mean, std);
    out[k] = upper - lower;
    lower = upper;
  }

  return out;
}
