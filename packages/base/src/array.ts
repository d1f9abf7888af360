import * as assert from './assert.js';

/* A mutable view over an array */
export interface ArrayView<T> {
  readonly length: number;
  [n: number]: T;
}

/**
 * Sets all values in arr in increments of 1.
 * See also: c++ std::iota
 */
export function iota<T extends ArrayView<number>>(arr: T, initial: number): T {
  for (let i = 0; i < arr.length; i++) {
    arr[i] = initial++;
  }
  return arr;
}

/** Running (inclusive) sum of xs */
export function cumsum(xs: ArrayLike<number>): Float64Array {
  const out = new Float64Array(xs.length);

  let acc = 0;
  for (let i = 0; i < xs.length; i++) {
    acc += xs[i];
    out[i] = acc;
  }

  return out;
}

export function sum(xs: ArrayLike<number>, lo = 0, hi = xs.length): number {
  assert.inRange(lo, 0, hi);
  assert.le(hi, xs.length);

  let acc = 0;
  for (let i = lo; i < hi; i++) {
    acc += xs[i];
  }
  return acc;
}

/** Largest value in xs, or -Infinity when xs is empty */
export function max(xs: ArrayLike<number>): number {
  let m = -Infinity;
  for (let i = 0; i < xs.length; i++) {
    if (xs[i] > m) m = xs[i];
  }
  return m;
}

/**
 * Indices which sort xs in ascending order. Equal values keep their
 * original relative order.
 */
export function argsort(xs: ArrayLike<number>): Uint32Array {
  return iota(new Uint32Array(xs.length), 0).sort((a, b) => xs[a] - xs[b]);
}

/**
 * `n` evenly spaced values over [start, stop] inclusive.
 */
export function linspace(start: number, stop: number, n: number): Float64Array {
  assert.gte(n, 0);

  const out = new Float64Array(n);
  if (n === 1) {
    out[0] = start;
    return out;
  }

  const step = (stop - start) / (n - 1);
  for (let i = 0; i < n; i++) {
    out[i] = start + i * step;
  }

  return out;
}

/**
 * @returns true if every consecutive difference of xs equals the first one
 * to within `rtol * |xs[1] - xs[0]|`. Arrays shorter than 2 have no spacing
 * and are never uniform.
 */
export function isUniform(xs: ArrayLike<number>, rtol = 1e-6): boolean {
  if (xs.length < 2) return false;

  const step = xs[1] - xs[0];
  const tol = Math.abs(step) * rtol;

  for (let i = 2; i < xs.length; i++) {
    if (!(Math.abs(xs[i] - xs[i - 1] - step) <= tol)) {
      return false;
    }
  }

  return Number.isFinite(step);
}
