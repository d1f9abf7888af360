import { array } from '@kernelpdf/base';
import { InvalidInputError } from './errors.js';
import * as defaults from './defaults.js';

/**
 * Which observations of a batch contribute to a stacked PDF.
 *
 * - `amplitude`: keep observations with `weight > threshold * max(weights)`
 * - `cumulative-mass`: order observations by ascending weight and keep those
 *   whose normalized cumulative weight is at most `1 - threshold`
 * - `none`: keep every observation
 */
export type SelectionPolicy =
  | { kind: 'amplitude'; threshold: number }
  | { kind: 'cumulative-mass'; threshold: number }
  | { kind: 'none' };

/** The nullable threshold pair in which the first non-null value wins */
export type Thresholds = {
  wtThresh?: number | null;
  cdfThresh?: number | null;
};

export const amplitude = (threshold: number = defaults.SELECTION.wtThresh): SelectionPolicy =>
  ({ kind: 'amplitude', threshold });

export const cumulativeMass = (threshold: number = defaults.SELECTION.cdfThresh): SelectionPolicy =>
  ({ kind: 'cumulative-mass', threshold });

export const none = (): SelectionPolicy => ({ kind: 'none' });

/** The default policy: amplitude thresholding at `wtThresh` */
export const DEFAULT_POLICY: SelectionPolicy = Object.freeze(amplitude());

/**
 * Maps a (wtThresh, cdfThresh) pair to a policy. `wtThresh` takes precedence,
 * then `cdfThresh`; when both are null or absent, nothing is trimmed.
 */
export function fromThresholds(t: Thresholds): SelectionPolicy {
  if (t.wtThresh !== undefined && t.wtThresh !== null) return amplitude(t.wtThresh);
  if (t.cdfThresh !== undefined && t.cdfThresh !== null) return cumulativeMass(t.cdfThresh);
  return none();
}

/**
 * @returns The indices of the observations to keep. Amplitude and no-threshold
 * selections are in index order; cumulative-mass selections are in ascending
 * order of weight.
 */
export function select(weights: ArrayLike<number>, policy: SelectionPolicy): Uint32Array {
  const n = weights.length;

  switch (policy.kind) {
    case 'none':
      return array.iota(new Uint32Array(n), 0);

    case 'amplitude': {
      checkThreshold(policy.threshold);

      const cutoff = policy.threshold * array.max(weights);
      const keep: number[] = [];

      for (let i = 0; i < n; i++) {
        if (weights[i] > cutoff) keep.push(i);
      }

      return Uint32Array.from(keep);
    }

    case 'cumulative-mass': {
      checkThreshold(policy.threshold);
      if (n === 0) return new Uint32Array(0);

      const order = array.argsort(weights);
      const limit = 1 - policy.threshold;
      const keep: number[] = [];

      let total = 0;
      for (let i = 0; i < n; i++) total += weights[order[i]];

      let acc = 0;
      for (let i = 0; i < n; i++) {
        acc += weights[order[i]];
        if (acc / total <= limit) keep.push(order[i]);
      }

      return Uint32Array.from(keep);
    }
  }
}

function checkThreshold(threshold: number) {
  if (!(threshold >= 0) || !Number.isFinite(threshold)) {
    throw new InvalidInputError(`Expected a non-negative selection threshold, got ${threshold}`);
  }
}
