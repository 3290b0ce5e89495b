import { describe, expect, it } from "vitest";

import { capmCostOfEquity, trailingGrowth, trailingReturn } from "./capm";

describe("capmCostOfEquity", () => {
  it("adds the beta-scaled market premium to the risk-free rate", () => {
    expect(capmCostOfEquity({ riskFreeRate: 0.04, beta: 1.5, marketReturn: 0.1 })).toBeCloseTo(0.13, 12);
  });

  it("is null when an input is missing", () => {
    expect(capmCostOfEquity({ riskFreeRate: NaN, beta: 1, marketReturn: 0.1 })).toBeNull();
  });
});

describe("trailingGrowth", () => {
  it("compares the last two points by date", () => {
    const g = trailingGrowth([
      { end: "2024-09-30", val: 391 },
      { end: "2022-09-30", val: 394 },
      { end: "2023-09-30", val: 383 },
    ]);
    expect(g).toBeCloseTo((391 - 383) / 383, 12);
  });

  it("needs two points and a non-zero base", () => {
    expect(trailingGrowth([{ end: "2024-12-31", val: 1 }])).toBeNull();
    expect(
      trailingGrowth([
        { end: "2023-12-31", val: 0 },
        { end: "2024-12-31", val: 5 },
      ])
    ).toBeNull();
  });
});

describe("trailingReturn", () => {
  it("measures the return over the lookback window", () => {
    expect(trailingReturn([100, 105, 110, 120], 3)).toBeCloseTo(0.2, 12);
    expect(trailingReturn([90, 100, 105, 110, 120], 3)).toBeCloseTo(0.2, 12);
  });

  it("is null when the history is too short", () => {
    expect(trailingReturn([100, 120], 3)).toBeNull();
  });
});
