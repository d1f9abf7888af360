import { debug } from 'util';
import { array, isObject, json, math, Status } from '@kernelpdf/base';
import * as gaussian from './gaussian.js';
import * as defaults from './defaults.js';
import {
  InvalidGridError,
  InvalidInputError,
  InvalidSigmaGridError,
  KernelPdfError,
} from './errors.js';

const dbg = debug('kernelpdf:dictionary');

export type Options = {
  /** Number of standard deviations after which each kernel is truncated */
  sigmaTrunc: number;
};

/** Everything needed to rebuild a dictionary; kernels are derived from these */
export type DictionaryJson = {
  grid: number[];
  sigmaGrid: number[];
  sigmaTrunc: number;
};

/** Positions of a batch of observations on the grid and in the dictionary */
export type Quantized = {
  /**
   * Nearest grid point of each value. Not clamped to the grid, and NaN for an
   * observation whose value is not finite or whose sigma is NaN.
   */
  gridIndices: Float64Array;
  /** Nearest kernel of each sigma, clamped to [0, Ndict) */
  dictIndices: Int32Array;
};

type Layout = {
  grid: Float64Array;
  delta: number;
  sigmaGrid: Float64Array;
  dsigma: number;
  sigmaTrunc: number;
};

function validate(
  grid: ArrayLike<number>,
  sigmaGrid: ArrayLike<number>,
  sigmaTrunc: number,
): Status<Layout> {
  if (grid.length < 2) {
    return Status.err(new InvalidGridError(`Expected at least 2 grid points, got ${grid.length}`));
  }

  const delta = grid[1] - grid[0];
  if (!(delta > 0) || !array.isUniform(grid)) {
    return Status.err(new InvalidGridError('Expected an increasing, evenly spaced grid'));
  }

  if (sigmaGrid.length < 2) {
    return Status.err(
      new InvalidSigmaGridError(`Expected at least 2 sigma grid points, got ${sigmaGrid.length}`),
    );
  }

  const dsigma = sigmaGrid[1] - sigmaGrid[0];
  if (!(dsigma > 0) || !array.isUniform(sigmaGrid)) {
    return Status.err(new InvalidSigmaGridError('Expected an increasing, evenly spaced sigma grid'));
  }

  if (!(sigmaGrid[0] > 0)) {
    return Status.err(
      new InvalidSigmaGridError(`Expected strictly positive sigmas, got ${sigmaGrid[0]}`),
    );
  }

  if (!(sigmaTrunc > 0) || !Number.isFinite(sigmaTrunc)) {
    return Status.err(
      new InvalidSigmaGridError(`Expected a positive truncation factor, got ${sigmaTrunc}`),
    );
  }

  return Status.value({
    grid: Float64Array.from(grid),
    delta,
    sigmaGrid: Float64Array.from(sigmaGrid),
    dsigma,
    sigmaTrunc,
  });
}

/**
 * A catalog of truncated Gaussian kernels over an evenly spaced grid, one per
 * discretized standard deviation. PDFs are built by sliding, clipping and
 * stacking these kernels along the grid (see `stack`).
 *
 * Kernel `i` holds `2 * width[i] + 1` samples of `N(x | 0, sigmaGrid[i])` at
 * the grid offsets `-width[i] .. width[i]`, where
 * `width[i] = ceil(sigmaGrid[i] * sigmaTrunc / delta)`. The shape is the same
 * wherever a kernel is pasted, so it is computed once. A kernel may be wider
 * than the grid; stacking clips it.
 */
export class KernelDictionary implements json.Serializable<DictionaryJson> {
  /** The output grid */
  readonly grid: ArrayLike<number>;
  readonly Ngrid: number;
  /** Grid spacing */
  readonly delta: number;
  readonly min: number;
  readonly max: number;

  /** The standard deviation of each kernel */
  readonly sigmaGrid: ArrayLike<number>;
  readonly Ndict: number;
  /** Sigma grid spacing */
  readonly dsigma: number;
  readonly sigmaTrunc: number;

  /** Half-width of each kernel, in grid cells */
  readonly width: ArrayLike<number>;
  readonly kernel: readonly ArrayLike<number>[];
  /** Running sum of each kernel */
  readonly kernelCdf: readonly ArrayLike<number>[];

  /**
   * Builds a dictionary, or returns an `InvalidGridError` /
   * `InvalidSigmaGridError` status when the grids are unusable.
   */
  static create(
    grid: ArrayLike<number>,
    sigmaGrid: ArrayLike<number>,
    opts?: Partial<Options>,
  ): Status<KernelDictionary> {
    try {
      return Status.value(new KernelDictionary(grid, sigmaGrid, opts));
    } catch (e) {
      if (e instanceof KernelPdfError) return Status.err(e);
      throw e;
    }
  }

  static fromJson(obj: json.Value): Status<KernelDictionary> {
    if (
      !isObject(obj) ||
      !json.isNumberArray(obj.grid) ||
      !json.isNumberArray(obj.sigmaGrid) ||
      typeof obj.sigmaTrunc !== 'number'
    ) {
      return Status.err(new InvalidInputError('Malformed kernel dictionary document'));
    }

    return KernelDictionary.create(obj.grid, obj.sigmaGrid, { sigmaTrunc: obj.sigmaTrunc });
  }

  /** @throws InvalidGridError, InvalidSigmaGridError */
  constructor(grid: ArrayLike<number>, sigmaGrid: ArrayLike<number>, opts?: Partial<Options>) {
    const layout = Status.get(
      validate(grid, sigmaGrid, opts?.sigmaTrunc ?? defaults.DICTIONARY.sigmaTrunc),
    );

    this.grid = layout.grid;
    this.Ngrid = layout.grid.length;
    this.delta = layout.delta;
    this.min = layout.grid[0];
    this.max = layout.grid[this.Ngrid - 1];

    this.sigmaGrid = layout.sigmaGrid;
    this.Ndict = layout.sigmaGrid.length;
    this.dsigma = layout.dsigma;
    this.sigmaTrunc = layout.sigmaTrunc;

    const width = new Int32Array(this.Ndict);
    const kernel: Float64Array[] = [];
    const kernelCdf: Float64Array[] = [];

    for (let i = 0; i < this.Ndict; i++) {
      const sigma = layout.sigmaGrid[i];
      const w = Math.ceil((sigma * this.sigmaTrunc) / this.delta);

      const offsets = new Float64Array(2 * w + 1);
      for (let k = 0; k < offsets.length; k++) {
        offsets[k] = (k - w) * this.delta;
      }

      const k = gaussian.evaluate(0, sigma, offsets);

      width[i] = w;
      kernel.push(k);
      kernelCdf.push(array.cumsum(k));
    }

    this.width = width;
    this.kernel = Object.freeze(kernel);
    this.kernelCdf = Object.freeze(kernelCdf);

    dbg(
      'Built %d kernels over %d grid points (half-widths %d..%d)',
      this.Ndict,
      this.Ngrid,
      width[0],
      width[this.Ndict - 1],
    );
  }

  /**
   * Maps Gaussian observations onto the dictionary: each value to its nearest
   * grid point and each sigma to its nearest kernel. Sigmas outside the
   * dictionary snap to the first or last kernel.
   *
   * @throws InvalidInputError when values and sigmas differ in length
   */
  fit(values: ArrayLike<number>, sigmas: ArrayLike<number>): Quantized {
    if (values.length !== sigmas.length) {
      throw new InvalidInputError(
        `Expected as many sigmas as values (${sigmas.length} vs. ${values.length})`,
      );
    }

    const n = values.length;
    const gridIndices = new Float64Array(n);
    const dictIndices = new Int32Array(n);

    const x0 = this.grid[0];
    const s0 = this.sigmaGrid[0];
    const last = this.Ndict - 1;

    for (let i = 0; i < n; i++) {
      const x = values[i];
      const s = sigmas[i];

      // NaN stores as 0 in the Int32Array; the grid index below marks it
      const d = math.roundHalfEven((s - s0) / this.dsigma);
      dictIndices[i] = Math.min(Math.max(d, 0), last);

      gridIndices[i] = Number.isFinite(x) && !Number.isNaN(s)
        ? math.roundHalfEven((x - x0) / this.delta)
        : NaN;
    }

    return { gridIndices, dictIndices };
  }

  toJson(): DictionaryJson {
    return {
      grid: Array.from(this.grid),
      sigmaGrid: Array.from(this.sigmaGrid),
      sigmaTrunc: this.sigmaTrunc,
    };
  }
}
