/**
 * Round to the nearest integer, with ties going to the even neighbour
 * (banker's rounding, IEEE 754 roundTiesToEven).
 *
 * ```
 * roundHalfEven(0.5);  // 0
 * roundHalfEven(1.5);  // 2
 * roundHalfEven(-2.5); // -2
 * ```
 */
export function roundHalfEven(x: number): number {
  if (!Number.isFinite(x)) return x;

  const r = Math.round(x);
  // Math.round sends ties toward +Infinity
  if (r - x === 0.5 && r % 2 !== 0) {
    return r - 1;
  }

  return r;
}

const TWO_OVER_SQRT_PI = 2 / Math.sqrt(Math.PI);

/**
 * Error function, accurate to ~1e-13 with `erf(0) === 0` and `erf(-x) === -erf(x)`.
 * Uses the Maclaurin series for |x| < 3 and the continued fraction of erfc
 * beyond that.
 */
export function erf(x: number): number {
  if (Number.isNaN(x)) return x;

  const ax = Math.abs(x);
  if (ax < 3) return TWO_OVER_SQRT_PI * erfSeries(x);

  return Math.sign(x) * (1 - erfcFraction(ax));
}

/** sum of (-1)^n x^(2n+1) / (n! (2n+1)) */
function erfSeries(x: number) {
  const x2 = x * x;
  let term = x, sum = x;

  for (let n = 1; ; n++) {
    term *= -x2 / n;
    const c = term / (2 * n + 1);
    sum += c;
    if (Math.abs(c) <= Math.abs(sum) * 1e-17) break;
  }

  return sum;
}

/**
 * erfc(x) for x >= 3 via the continued fraction
 * `exp(-x^2) / sqrt(pi) / (x + (1/2) / (x + 1 / (x + (3/2) / (x + ...))))`,
 * evaluated with the modified Lentz method
 */
function erfcFraction(x: number) {
  if (!Number.isFinite(x)) return 0;

  let f = x, C = x, D = 0;

  for (let n = 1; n <= 200; n++) {
    const a = n / 2;
    D = 1 / (x + a * D);
    C = x + a / C;

    const delta = C * D;
    f *= delta;
    if (Math.abs(delta - 1) <= 1e-16) break;
  }

  return Math.exp(-x * x) / (Math.sqrt(Math.PI) * f);
}

/**
 * Returns the Log-Gamma function evaluated at x (x > 0).
 * Lanczos approximation, Numerical Recipes (2nd ed.) 6.1
 */
export function gammaln(x: number): number {
  const cof = [
     76.18009172947146,
    -86.50532032941677,
     24.01409824083091,
    -1.231739572450155,
     0.1208650973866179e-2,
    -0.5395239384953e-5,
  ];

  let ser = 1.000000000190015;
  let y = x;

  let tmp = x + 5.5;
  tmp -= (x + 0.5) * Math.log(tmp);

  for (let j = 0; j < 6; j++) ser += cof[j] / ++y;

  return Math.log((2.5066282746310005 * ser) / x) - tmp;
}

/** x * log(y), taking 0 * log(y) as 0 for every y that is not NaN */
export function xlogy(x: number, y: number): number {
  if (x === 0 && !Number.isNaN(y)) return 0;
  return x * Math.log(y);
}
