export type NormalDistribution = {
  cdf: (x: number) => number;
  pdf: (x: number) => number;
};

const TWO_OVER_SQRT_PI = 2 / Math.sqrt(Math.PI);
const SQRT_TWO_PI = Math.sqrt(2 * Math.PI);

// Below this |z| the series is used; above it the continued fraction for erfc.
const SERIES_CUTOFF = 2.5;
const EPS = 1e-16;
const TINY = 1e-300;

// erf(z) = 2/√π · e^(−z²) · Σ 2^n z^(2n+1) / (1·3·…·(2n+1)), all terms positive.
function erfSeries(z: number): number {
  let term = z;
  let sum = z;
  for (let n = 1; n < 200; n++) {
    term *= (2 * z * z) / (2 * n + 1);
    sum += term;
    if (term < sum * EPS) break;
  }
  return TWO_OVER_SQRT_PI * Math.exp(-z * z) * sum;
}

// erfc(z) = e^(−z²)/√π · 1/(z + (1/2)/(z + 1/(z + (3/2)/(z + …)))), modified Lentz.
function erfcContinuedFraction(z: number): number {
  let f = z;
  let c = z;
  let d = 0;
  for (let n = 1; n < 500; n++) {
    const a = n / 2;
    d = z + a * d;
    if (d === 0) d = TINY;
    c = z + a / c;
    if (c === 0) c = TINY;
    d = 1 / d;
    const delta = c * d;
    f *= delta;
    if (Math.abs(delta - 1) < EPS) break;
  }
  return Math.exp(-z * z) / (Math.sqrt(Math.PI) * f);
}

export function erf(z: number): number {
  if (Number.isNaN(z)) return NaN;
  if (!Number.isFinite(z)) return z > 0 ? 1 : -1;
  const a = Math.abs(z);
  const v = a < SERIES_CUTOFF ? erfSeries(a) : 1 - erfcContinuedFraction(a);
  return z < 0 ? -v : v;
}

export function erfc(z: number): number {
  if (Number.isNaN(z)) return NaN;
  if (z === Infinity) return 0;
  if (z < 0) return 2 - erfc(-z);
  return z < SERIES_CUTOFF ? 1 - erfSeries(z) : erfcContinuedFraction(z);
}

/**
 * Standard normal CDF, Φ(x) = (1 + erf(x/√2)) / 2.
 * The lower tail goes through erfc so small probabilities keep their digits.
 */
export function normalCdf(x: number): number {
  const z = x / Math.SQRT2;
  return z < 0 ? 0.5 * erfc(-z) : 0.5 * (1 + erf(z));
}

export function normalPdf(x: number): number {
  return Math.exp(-0.5 * x * x) / SQRT_TWO_PI;
}

export const standardNormal: NormalDistribution = {
  cdf: normalCdf,
  pdf: normalPdf,
};
