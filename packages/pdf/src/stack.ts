import { debug } from 'util';
import type { KernelDictionary } from './dictionary.js';
import { InvalidInputError, MissingInputError } from './errors.js';
import * as selection from './selection.js';

const dbg = debug('kernelpdf:stack');

/**
 * A batch of observations, given either as raw `(values, sigmas)` or as
 * indices already quantized by `KernelDictionary.fit`. Indices take
 * precedence when both are present. Weights default to 1.
 */
export type StackInput = {
  values?: ArrayLike<number>;
  sigmas?: ArrayLike<number>;
  gridIndices?: ArrayLike<number>;
  dictIndices?: ArrayLike<number>;
  weights?: ArrayLike<number>;
};

export type StackOptions = {
  /** Which observations contribute, defaults to amplitude thresholding at 1e-3 */
  selection?: selection.SelectionPolicy;
};

/**
 * Computes a smoothed PDF over `dict.grid` by pasting the dictionary kernel of
 * each selected observation at its grid position.
 *
 * Kernels running off either end of the grid are clipped, and the remainder
 * is rescaled by its retained mass so that every observation contributes
 * exactly its weight. Observations which fall entirely outside the grid, or
 * whose grid index is not finite, contribute nothing.
 *
 * @throws MissingInputError when neither values/sigmas nor indices are given
 * @throws InvalidInputError on mismatched lengths or invalid indices
 */
export function stack(
  dict: KernelDictionary,
  input: StackInput,
  opts: StackOptions = {},
): Float64Array {
  let gridIndices: ArrayLike<number>;
  let dictIndices: ArrayLike<number>;

  if (input.gridIndices !== undefined && input.dictIndices !== undefined) {
    gridIndices = input.gridIndices;
    dictIndices = input.dictIndices;
  } else if (input.values !== undefined && input.sigmas !== undefined) {
    ({ gridIndices, dictIndices } = dict.fit(input.values, input.sigmas));
  } else {
    throw new MissingInputError(
      'At least one pair of (values, sigmas) or (gridIndices, dictIndices) must be specified',
    );
  }

  const n = gridIndices.length;
  if (dictIndices.length !== n) {
    throw new InvalidInputError(
      `Expected as many dictionary indices as grid indices (${dictIndices.length} vs. ${n})`,
    );
  }

  const weights = input.weights ?? new Float64Array(n).fill(1);
  if (weights.length !== n) {
    throw new InvalidInputError(`Expected ${n} weights, got ${weights.length}`);
  }

  const selected = selection.select(weights, opts.selection ?? selection.DEFAULT_POLICY);
  const pdf = new Float64Array(dict.Ngrid);

  let skipped = 0;
  for (let s = 0; s < selected.length; s++) {
    const j = selected[s];

    if (!accumulate(pdf, dict, gridIndices[j], dictIndices[j], weights[j])) {
      skipped++;
    }
  }

  dbg('Stacked %d of %d observations (%d off-grid)', selected.length - skipped, n, skipped);
  return pdf;
}

/**
 * Adds `w` times the kernel `idx`, centered on grid index `pos`, to `pdf`.
 *
 * @returns false when no part of the kernel lands on the grid, or `pos` is
 * not finite
 * @throws InvalidInputError when `idx` is not a kernel of `dict` or `pos` is
 * a fractional index
 */
export function accumulate(
  pdf: Float64Array,
  dict: KernelDictionary,
  pos: number,
  idx: number,
  w: number,
): boolean {
  if (!Number.isInteger(idx) || idx < 0 || idx >= dict.Ndict) {
    throw new InvalidInputError(`Dictionary index ${idx} is out of range`);
  }

  if (!Number.isFinite(pos)) return false;

  if (!Number.isInteger(pos)) {
    throw new InvalidInputError(`Grid index ${pos} is not an integer`);
  }

  if (pdf.length !== dict.Ngrid) {
    throw new InvalidInputError(`Expected an output of ${dict.Ngrid} grid points, got ${pdf.length}`);
  }

  const width = dict.width[idx];
  const kernel = dict.kernel[idx];
  const kcdf = dict.kernelCdf[idx];

  // the kernel spans [first, end) on the grid
  const first = pos - width;
  const end = pos + width + 1;

  const low = Math.max(first, 0);
  const high = Math.min(end, dict.Ngrid);
  if (low >= high) return false;

  // samples clipped from the low end (>= 0) and high end (<= 0)
  const lpad = low - first;
  const hpad = high - end;

  // mass of kernel[lpad .. 2 * width + hpad], inclusive
  const upper = kcdf[2 * width + hpad];
  const norm = lpad > 0 ? upper - kcdf[lpad - 1] : upper;
  if (!(norm > 0) || !Number.isFinite(norm)) return false;

  const scale = w / norm;
  const n = high - low;

  for (let k = 0; k < n; k++) {
    pdf[low + k] += scale * kernel[lpad + k];
  }

  return true;
}
