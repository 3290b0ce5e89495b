export const FALLBACK_VOLATILITY = 0.25;
export const ROLLING_WINDOW = 21;
export const TRADING_DAYS_PER_YEAR = 252;

export type VolatilityMethod = "rolling_21d" | "full_sample" | "fallback";

export type VolatilityEstimate = {
  volatility: number;
  method: VolatilityMethod;
  observations: number;
};

export function percentReturns(closes: number[]): number[] {
  const clean = closes.filter((c) => Number.isFinite(c));
  const out: number[] = [];
  for (let i = 1; i < clean.length; i++) {
    out.push(clean[i] / clean[i - 1] - 1);
  }
  return out;
}

// Sample standard deviation (n - 1); NaN below two observations.
export function sampleStdDev(xs: number[]): number {
  if (xs.length < 2) return NaN;
  const mean = xs.reduce((a, b) => a + b, 0) / xs.length;
  const ss = xs.reduce((a, x) => a + (x - mean) * (x - mean), 0);
  return Math.sqrt(ss / (xs.length - 1));
}

export function describeVolatility(closes: number[]): VolatilityEstimate {
  const returns = percentReturns(closes);

  const rolling = returns.length > ROLLING_WINDOW;
  const sample = rolling ? returns.slice(returns.length - ROLLING_WINDOW) : returns;
  const vol = sampleStdDev(sample) * Math.sqrt(TRADING_DAYS_PER_YEAR);

  if (!Number.isFinite(vol)) {
    return { volatility: FALLBACK_VOLATILITY, method: "fallback", observations: returns.length };
  }
  return { volatility: vol, method: rolling ? "rolling_21d" : "full_sample", observations: sample.length };
}

/** Annualized volatility of close-to-close returns, or 0.25 when the history can't support one. */
export function estimateVolatility(closes: number[]): number {
  return describeVolatility(closes).volatility;
}
