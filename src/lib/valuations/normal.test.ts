import { describe, expect, it } from "vitest";

import { erf, erfc, normalCdf, normalPdf, standardNormal } from "./normal";

describe("normalCdf", () => {
  it("is exactly one half at zero", () => {
    expect(normalCdf(0)).toBe(0.5);
  });

  it("matches reference values", () => {
    expect(normalCdf(1)).toBeCloseTo(0.8413447460685429, 9);
    expect(normalCdf(1.96)).toBeCloseTo(0.9750021048517795, 9);
    expect(normalCdf(2)).toBeCloseTo(0.9772498680518208, 9);
    expect(normalCdf(0.5)).toBeCloseTo(0.6914624612740131, 9);
    expect(normalCdf(-1.5)).toBeCloseTo(0.06680720126885809, 9);
    expect(normalCdf(-3)).toBeCloseTo(0.0013498980316300957, 12);
  });

  it("keeps relative precision deep in the lower tail", () => {
    expect(Math.abs(normalCdf(-5) / 2.866515718791946e-7 - 1)).toBeLessThan(1e-6);
    expect(Math.abs(normalCdf(-8) / 6.220960574271819e-16 - 1)).toBeLessThan(1e-6);
  });

  it("is symmetric: cdf(-x) = 1 - cdf(x)", () => {
    for (const x of [0.1, 0.7, 1.3, 2.2, 3.6, 4.9, 7.5]) {
      expect(normalCdf(-x)).toBeCloseTo(1 - normalCdf(x), 12);
    }
  });

  it("is non-decreasing and stays within [0, 1] on [-10, 10]", () => {
    let prev = -Infinity;
    for (let i = -1000; i <= 1000; i++) {
      const v = normalCdf(i / 100);
      expect(v).toBeGreaterThanOrEqual(prev);
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThanOrEqual(1);
      prev = v;
    }
  });
});

describe("normalPdf", () => {
  it("peaks at 1/sqrt(2π)", () => {
    expect(normalPdf(0)).toBeCloseTo(0.3989422804014327, 15);
    expect(normalPdf(1)).toBeCloseTo(0.24197072451914337, 15);
    expect(normalPdf(-1)).toBe(normalPdf(1));
  });
});

describe("erf / erfc", () => {
  it("agree with reference values across the series and continued fraction ranges", () => {
    expect(erf(0)).toBe(0);
    expect(erf(0.5)).toBeCloseTo(0.5204998778130465, 13);
    expect(erf(2)).toBeCloseTo(0.9953222650189527, 13);
    expect(erf(3)).toBeCloseTo(0.9999779095030014, 13);
    expect(erf(-3)).toBeCloseTo(-0.9999779095030014, 13);
    expect(Math.abs(erfc(4) / 1.541725790028002e-8 - 1)).toBeLessThan(1e-9);
  });

  it("saturates at infinity", () => {
    expect(erf(Infinity)).toBe(1);
    expect(erf(-Infinity)).toBe(-1);
    expect(erfc(Infinity)).toBe(0);
  });
});

describe("standardNormal", () => {
  it("exposes the closed-form functions", () => {
    expect(standardNormal.cdf).toBe(normalCdf);
    expect(standardNormal.pdf).toBe(normalPdf);
  });
});
