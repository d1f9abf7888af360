import { debug } from 'util';
import { array, math } from '@kernelpdf/base';
import * as defaults from './defaults.js';
import * as gaussian from './gaussian.js';
import * as selection from './selection.js';
import { InvalidGridError, InvalidInputError } from './errors.js';

const dbg = debug('kernelpdf:kde');

export type KdeOptions = {
  /** Per-observation weights, defaults to 1 */
  weights?: ArrayLike<number>;
  /** Number of standard deviations evaluated either side of each value */
  sigThresh?: number;
  selection?: selection.SelectionPolicy;
  /** Grid spacing, defaults to `grid[1] - grid[0]` */
  dx?: number;
};

/**
 * Kernel density estimate over `grid` which evaluates every Gaussian
 * directly rather than through a `KernelDictionary`.
 *
 * Each selected observation is evaluated over the grid points within
 * `round(sigThresh * sigma / dx)` cells of its nearest grid point (a
 * symmetric, inclusive window; both are rounded half to even), and the
 * clipped samples are divided by their sum so that the observation adds its
 * weight to the total. This discrete-sum normalization differs slightly from
 * the cumulative-kernel one used by `stack`.
 *
 * @throws InvalidGridError when the grid is not evenly spaced and increasing
 * @throws InvalidInputError on mismatched lengths or a non-positive `sigThresh`
 */
export function kde(
  values: ArrayLike<number>,
  sigmas: ArrayLike<number>,
  grid: ArrayLike<number>,
  opts: KdeOptions = {},
): Float64Array {
  const n = values.length;
  const nx = grid.length;

  if (sigmas.length !== n) {
    throw new InvalidInputError(`Expected as many sigmas as values (${sigmas.length} vs. ${n})`);
  }

  const weights = opts.weights ?? new Float64Array(n).fill(1);
  if (weights.length !== n) {
    throw new InvalidInputError(`Expected ${n} weights, got ${weights.length}`);
  }

  if (!array.isUniform(grid)) {
    throw new InvalidGridError('Expected an evenly spaced grid of at least 2 points');
  }

  const dx = opts.dx ?? grid[1] - grid[0];
  if (!(dx > 0) || !Number.isFinite(dx)) {
    throw new InvalidGridError(`Expected a positive grid spacing, got ${dx}`);
  }

  const sigThresh = opts.sigThresh ?? defaults.DIRECT.sigThresh;
  if (!(sigThresh > 0) || !Number.isFinite(sigThresh)) {
    throw new InvalidInputError(`Invalid 'sigThresh' (${sigThresh}), expected a positive number`);
  }

  const selected = selection.select(weights, opts.selection ?? selection.DEFAULT_POLICY);
  const pdf = new Float64Array(nx);

  let skipped = 0;
  for (let s = 0; s < selected.length; s++) {
    const j = selected[s];
    const value = values[j];
    const sigma = sigmas[j];

    const center = math.roundHalfEven((value - grid[0]) / dx);
    const offset = math.roundHalfEven((sigThresh * sigma) / dx);
    const lo = Math.max(center - offset, 0);
    const hi = Math.min(center + offset + 1, nx);

    // NaN bounds fail this test too
    if (!(lo < hi) || !(sigma > 0)) {
      skipped++;
      continue;
    }

    const kernel = gaussian.evaluate(value, sigma, grid, lo, hi);
    const norm = array.sum(kernel);

    if (!(norm > 0)) {
      skipped++;
      continue;
    }

    const scale = weights[j] / norm;
    for (let k = 0; k < kernel.length; k++) {
      pdf[lo + k] += scale * kernel[k];
    }
  }

  dbg('Stacked %d of %d observations (%d skipped)', selected.length - skipped, n, skipped);
  return pdf;
}
