import { describe, expect, it } from "vitest";

import { describeVolatility, estimateVolatility, FALLBACK_VOLATILITY, percentReturns, sampleStdDev } from "./volatility";

function closesFromReturns(start: number, returns: number[]): number[] {
  const out = [start];
  for (const r of returns) out.push(out[out.length - 1] * (1 + r));
  return out;
}

describe("estimateVolatility", () => {
  it("falls back to 0.25 without history", () => {
    expect(estimateVolatility([])).toBe(0.25);
    expect(FALLBACK_VOLATILITY).toBe(0.25);
  });

  it("falls back when there are too few returns for a standard deviation", () => {
    expect(describeVolatility([100])).toEqual({ volatility: 0.25, method: "fallback", observations: 0 });
    expect(describeVolatility([100, 110])).toEqual({ volatility: 0.25, method: "fallback", observations: 1 });
  });

  it("annualizes the whole sample when the history is short", () => {
    const est = describeVolatility([100, 110, 99]);
    expect(est.method).toBe("full_sample");
    expect(est.observations).toBe(2);
    expect(est.volatility).toBeCloseTo(2.244994432064365, 9);
  });

  it("uses the latest 21 returns once more than 21 are available", () => {
    const calm = Array.from({ length: 21 }, (_, i) => (i % 2 === 0 ? 0.01 : -0.01));
    const closes = closesFromReturns(100, [0.5, -0.4, 0.3, -0.25, 0.6, ...calm]);
    const est = describeVolatility(closes);
    expect(est.method).toBe("rolling_21d");
    expect(est.observations).toBe(21);
    expect(est.volatility).toBeCloseTo(0.16248076809271922, 9);
  });

  it("treats exactly 21 returns as the whole sample", () => {
    const calm = Array.from({ length: 21 }, (_, i) => (i % 2 === 0 ? 0.01 : -0.01));
    const est = describeVolatility(closesFromReturns(100, calm));
    expect(est.method).toBe("full_sample");
    expect(est.volatility).toBeCloseTo(0.16248076809271922, 9);
  });

  it("skips non-finite closes", () => {
    expect(estimateVolatility([100, NaN, 110, Infinity, 99])).toBeCloseTo(2.244994432064365, 9);
  });

  it("falls back when a zero close makes the returns non-finite", () => {
    expect(describeVolatility([100, 0, 50, 60]).method).toBe("fallback");
  });

  it("reports zero for a flat series", () => {
    expect(estimateVolatility([50, 50, 50, 50])).toBe(0);
  });
});

describe("helpers", () => {
  it("computes percentage returns between consecutive closes", () => {
    const r = percentReturns([100, 125, 100]);
    expect(r[0]).toBeCloseTo(0.25, 12);
    expect(r[1]).toBeCloseTo(-0.2, 12);
  });

  it("uses the n - 1 denominator", () => {
    expect(sampleStdDev([1, 2, 3, 4])).toBeCloseTo(Math.sqrt(5 / 3), 12);
    expect(Number.isNaN(sampleStdDev([1]))).toBe(true);
  });
});
