import { describe, expect, it } from "vitest";

import { projectLbo } from "./lbo";

describe("projectLbo", () => {
  it("computes exit equity, multiple and IRR", () => {
    const r = projectLbo({ purchasePrice: 10000, debt: 5000, exitMultiple: 10, exitEbitda: 1500, years: 5 });
    expect(r).toEqual({
      equityInvested: 5000,
      exitValue: 15000,
      equityAtExit: 10000,
      moic: 2,
      irr: Math.pow(2, 1 / 5) - 1,
    });
  });

  it("has no IRR when exit equity is wiped out", () => {
    const r = projectLbo({ purchasePrice: 1000, debt: 800, exitMultiple: 5, exitEbitda: 100, years: 3 });
    expect(r).toEqual({ equityInvested: 200, exitValue: 500, equityAtExit: -300, moic: -1.5, irr: null });
  });

  it("has neither multiple nor IRR for a fully debt-funded purchase", () => {
    const r = projectLbo({ purchasePrice: 1000, debt: 1000, exitMultiple: 8, exitEbitda: 200, years: 4 });
    expect(r).toMatchObject({ equityInvested: 0, moic: null, irr: null });
  });

  it("rejects a fractional holding period", () => {
    expect(projectLbo({ purchasePrice: 1000, debt: 0, exitMultiple: 8, exitEbitda: 200, years: 2.5 })).toEqual({
      error: { type: "INVALID_INPUT", field: "years", message: "years must be a positive whole number (got 2.5)" },
    });
  });

  it("rejects negative debt", () => {
    expect(projectLbo({ purchasePrice: 1000, debt: -1, exitMultiple: 8, exitEbitda: 200, years: 2 })).toEqual({
      error: { type: "INVALID_INPUT", field: "debt", message: "debt cannot be negative" },
    });
  });
});
