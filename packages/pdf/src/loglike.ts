import { math } from '@kernelpdf/base';
import { InvalidInputError } from './errors.js';

const LN_2PI = Math.log(2 * Math.PI);

export type LogLikeOptions = {
  /** Fit a free factor scaling each model onto the data */
  freeScale?: boolean;
  /** Use only the data errors in the variance */
  ignoreModelErr?: boolean;
  /**
   * Replace the Gaussian log-likelihood by the log-density of the chi-square
   * statistic given the number of observed dimensions
   */
  dimPrior?: boolean;
  /**
   * Fractional change of the log-likelihood at which the free-scale fit is
   * considered converged (only iterated when model errors are used)
   */
  ltol?: number;
  /** Upper bound on the free-scale fit iterations */
  maxIter?: number;
};

export type LogLikeResult = {
  lnl: Float64Array;
  /** Number of dimensions observed in both the data and each model */
  ndim: Float64Array;
  chi2: Float64Array;
  /** The fitted scale factor of each model (free-scale fits only) */
  scale?: Float64Array;
};

/**
 * Log-likelihood of noisy data (Nfilt values) under each of Nmodel noisy
 * models. Masks are 0/1 flags of which dimensions were observed; only the
 * dimensions observed in both the data and a model enter its statistics.
 */
export function loglike(
  data: ArrayLike<number>,
  dataErr: ArrayLike<number>,
  dataMask: ArrayLike<number>,
  models: ArrayLike<ArrayLike<number>>,
  modelsErr: ArrayLike<ArrayLike<number>>,
  modelsMask: ArrayLike<ArrayLike<number>>,
  opts: LogLikeOptions = {},
): LogLikeResult {
  const nfilt = data.length;
  const nmodel = models.length;

  if (dataErr.length !== nfilt || dataMask.length !== nfilt) {
    throw new InvalidInputError('Expected data, errors and mask of the same length');
  }

  if (modelsErr.length !== nmodel || modelsMask.length !== nmodel) {
    throw new InvalidInputError('Expected models, errors and masks of the same length');
  }

  for (let m = 0; m < nmodel; m++) {
    if (
      models[m].length !== nfilt ||
      modelsErr[m].length !== nfilt ||
      modelsMask[m].length !== nfilt
    ) {
      throw new InvalidInputError(`Model ${m} does not have ${nfilt} dimensions`);
    }
  }

  const ctx: Context = { data, dataErr, dataMask, models, modelsErr, modelsMask, nfilt };

  return opts.freeScale ? fitScaled(ctx, opts) : fit(ctx, opts);
}

type Context = {
  data: ArrayLike<number>;
  dataErr: ArrayLike<number>;
  dataMask: ArrayLike<number>;
  models: ArrayLike<ArrayLike<number>>;
  modelsErr: ArrayLike<ArrayLike<number>>;
  modelsMask: ArrayLike<ArrayLike<number>>;
  nfilt: number;
};

/** log-pdf of the chi-square statistic with 2a degrees of freedom */
function chi2LogPdf(chi2: number, a: number) {
  return math.xlogy(a - 1, chi2) - chi2 / 2 - math.gammaln(a) - Math.LN2 * a;
}

function fit(ctx: Context, opts: LogLikeOptions): LogLikeResult {
  const { data, dataErr, dataMask, models, modelsErr, modelsMask, nfilt } = ctx;
  const nmodel = models.length;

  const lnl = new Float64Array(nmodel);
  const ndim = new Float64Array(nmodel);
  const chi2 = new Float64Array(nmodel);

  for (let m = 0; m < nmodel; m++) {
    const model = models[m];

    let dims = 0, x2 = 0, lnVar = 0;
    for (let f = 0; f < nfilt; f++) {
      const mask = dataMask[f] * modelsMask[m][f];
      if (mask === 0) continue;

      const mErr = opts.ignoreModelErr ? 0 : modelsErr[m][f];
      const variance = dataErr[f] * dataErr[f] + mErr * mErr;
      const resid = data[f] - model[f];

      dims += mask;
      x2 += (mask * resid * resid) / variance;
      lnVar += Math.log(variance);
    }

    ndim[m] = dims;
    chi2[m] = x2;
    lnl[m] = (opts.dimPrior ?? true)
      ? chi2LogPdf(x2, 0.5 * dims)
      : -0.5 * x2 - 0.5 * (dims * LN_2PI + lnVar);
  }

  return { lnl, ndim, chi2 };
}

/**
 * Fits `scale` minimizing chi2 of `data - scale * model`. With model errors,
 * the variance depends on the scale, so the fit is iterated until the
 * log-likelihood of every model changes by at most `ltol` (relative).
 */
function fitScaled(ctx: Context, opts: LogLikeOptions): LogLikeResult {
  const { data, dataErr, dataMask, models, modelsErr, modelsMask, nfilt } = ctx;
  const nmodel = models.length;
  const ltol = opts.ltol ?? 1e-4;
  const maxIter = opts.maxIter ?? 100;

  const lnl = new Float64Array(nmodel);
  const ndim = new Float64Array(nmodel);
  const chi2 = new Float64Array(nmodel);
  const scale = new Float64Array(nmodel).fill(1);

  const varianceOf = (f: number, m: number, s: number) => {
    const mErr = opts.ignoreModelErr ? 0 : s * modelsErr[m][f];
    return dataErr[f] * dataErr[f] + mErr * mErr;
  };

  // one pass over every model with the variance derived from `scale`
  const pass = (scaleErrors: boolean) => {
    let lerr = 0;

    for (let m = 0; m < nmodel; m++) {
      const model = models[m];
      const s = scale[m];

      let dims = 0, inter = 0, shape = 0;
      for (let f = 0; f < nfilt; f++) {
        const mask = dataMask[f] * modelsMask[m][f];
        if (mask === 0) continue;

        const variance = varianceOf(f, m, scaleErrors ? s : 1);
        dims += mask;
        inter += (mask * model[f] * data[f]) / variance;
        shape += (mask * model[f] * model[f]) / variance;
      }

      const sNew = inter / shape;

      let x2 = 0, lnVar = 0;
      for (let f = 0; f < nfilt; f++) {
        const mask = dataMask[f] * modelsMask[m][f];
        if (mask === 0) continue;

        const variance = varianceOf(f, m, scaleErrors ? s : 1);
        const resid = data[f] - sNew * model[f];
        x2 += (mask * resid * resid) / variance;
        lnVar += Math.log(variance);
      }

      const lnlNew = -0.5 * x2 - 0.5 * (dims * LN_2PI + lnVar);
      if (scaleErrors) {
        lerr = Math.max(lerr, Math.abs((lnlNew - lnl[m]) / lnl[m]));
      }

      ndim[m] = dims;
      chi2[m] = x2;
      lnl[m] = lnlNew;
      scale[m] = sNew;
    }

    return lerr;
  };

  pass(false);

  if (!opts.ignoreModelErr) {
    for (let i = 0; i < maxIter; i++) {
      // NaN (e.g. a zero log-likelihood) also ends the fit
      if (!(pass(true) > ltol)) break;
    }
  }

  if (opts.dimPrior ?? true) {
    for (let m = 0; m < nmodel; m++) {
      lnl[m] = chi2LogPdf(chi2[m], 0.5 * (ndim[m] - 1));
    }
  }

  return { lnl, ndim, chi2, scale };
}
