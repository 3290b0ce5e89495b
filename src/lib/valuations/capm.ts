import { isFiniteNumber, type SeriesPoint } from "./types";

export type CapmInputs = {
  riskFreeRate: number; // decimal
  beta: number;
  marketReturn: number; // decimal, trailing one year
};

// ke = rf + beta * (Rm - rf)
export function capmCostOfEquity(inputs: CapmInputs): number | null {
  const { riskFreeRate, beta, marketReturn } = inputs;
  if (![riskFreeRate, beta, marketReturn].every(isFiniteNumber)) return null;
  return riskFreeRate + beta * (marketReturn - riskFreeRate);
}

// Growth between the last two points by date, e.g. latest annual revenue vs the year before.
export function trailingGrowth(series: SeriesPoint[]): number | null {
  const s = series
    .filter((p) => p && typeof p.end === "string" && isFiniteNumber(p.val))
    .slice()
    .sort((a, b) => a.end.localeCompare(b.end));
  if (s.length < 2) return null;

  const prev = s[s.length - 2].val;
  const last = s[s.length - 1].val;
  if (prev === 0) return null;
  return (last - prev) / prev;
}

// Simple return from the close one trading year back to the latest close.
export function trailingReturn(closes: number[], lookback = 252): number | null {
  const clean = closes.filter(isFiniteNumber);
  if (clean.length <= lookback) return null;

  const start = clean[clean.length - 1 - lookback];
  const end = clean[clean.length - 1];
  if (start <= 0) return null;
  return end / start - 1;
}
