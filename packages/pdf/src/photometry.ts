import { InvalidInputError } from './errors.js';

/** A per-element parameter: one value for all elements, or one per element */
export type Param = number | ArrayLike<number>;

export type Converted = {
  values: Float64Array;
  errors: Float64Array;
};

const at = (p: Param, i: number) => (typeof p === 'number' ? p : p[i]);

/** Flux densities to AB magnitudes relative to the zero-points */
export function magnitude(
  flux: ArrayLike<number>,
  err: ArrayLike<number>,
  zeropoints: Param = 1,
): Converted {
  return convert(flux, err, (f, e, i) => [
    -2.5 * Math.log10(f / at(zeropoints, i)),
    ((2.5 / Math.LN10) * e) / f,
  ]);
}

/** AB magnitudes to flux densities */
export function invMagnitude(
  mag: ArrayLike<number>,
  err: ArrayLike<number>,
  zeropoints: Param = 1,
): Converted {
  return convert(mag, err, (m, e, i) => {
    const flux = 10 ** (-0.4 * m) * at(zeropoints, i);
    return [flux, e * 0.4 * Math.LN10 * flux];
  });
}

/**
 * Flux densities to asinh magnitudes ("luptitudes"), which stay finite for
 * faint and negative fluxes. See Lupton, Gunn & Szalay (1999).
 *
 * @param skynoise Softening parameter, usually the background sky noise
 */
export function luptitude(
  flux: ArrayLike<number>,
  err: ArrayLike<number>,
  skynoise: Param = 1,
  zeropoints: Param = 1,
): Converted {
  return convert(flux, err, (f, e, i) => {
    const b = at(skynoise, i);
    return [
      (-2.5 / Math.LN10) * (Math.asinh(f / (2 * b)) + Math.log(b / at(zeropoints, i))),
      Math.sqrt((2.5 * Math.LOG10E * e) ** 2 / ((2 * b) ** 2 + f * f)),
    ];
  });
}

/** Asinh magnitudes ("luptitudes") to flux densities */
export function invLuptitude(
  mag: ArrayLike<number>,
  err: ArrayLike<number>,
  skynoise: Param = 1,
  zeropoints: Param = 1,
): Converted {
  return convert(mag, err, (m, e, i) => {
    const b = at(skynoise, i);
    const flux = 2 * b * Math.sinh((Math.LN10 / -2.5) * m - Math.log(b / at(zeropoints, i)));
    return [flux, Math.sqrt(((2 * b) ** 2 + flux * flux) * e * e) / (2.5 * Math.LOG10E)];
  });
}

function convert(
  xs: ArrayLike<number>,
  errs: ArrayLike<number>,
  fn: (x: number, err: number, i: number) => [value: number, error: number],
): Converted {
  const n = xs.length;
  if (errs.length !== n) {
    throw new InvalidInputError(`Expected ${n} errors, got ${errs.length}`);
  }

  const values = new Float64Array(n);
  const errors = new Float64Array(n);

  for (let i = 0; i < n; i++) {
    [values[i], errors[i]] = fn(xs[i], errs[i], i);
  }

  return { values, errors };
}
