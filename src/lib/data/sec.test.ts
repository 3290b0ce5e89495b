import { describe, expect, it } from "vitest";

import { deriveFcf } from "@/lib/valuations/fcf";

import { buildCashFlowStatement, CompanyFactsSchema, parseTickerMap, pickAnnualRevenue, pickBalanceSheet } from "./sec";

function fy(end: string, val: number, extra: Record<string, string> = {}) {
  return { end, val, form: "10-K", fp: "FY", ...extra };
}

const facts = CompanyFactsSchema.parse({
  entityName: "Example Corp",
  facts: {
    dei: {
      EntityCommonStockSharesOutstanding: {
        label: "Entity Common Stock, Shares Outstanding",
        units: { shares: [{ end: "2024-10-15", val: 1000, form: "10-K", fp: "FY" }] },
      },
    },
    "us-gaap": {
      NetCashProvidedByUsedInOperatingActivities: {
        label: "Net Cash Provided by (Used in) Operating Activities",
        units: {
          USD: [
            fy("2023-09-30", 110),
            fy("2024-09-30", 120),
            // quarterly frame inside a 10-K is ignored
            fy("2024-09-30", 999, { frame: "CY2024Q3" }),
            { end: "2024-06-30", val: 80, form: "10-Q", fp: "Q3" },
            "not a fact",
          ],
        },
      },
      PaymentsToAcquirePropertyPlantAndEquipment: {
        label: "Payments to Acquire Property, Plant, and Equipment",
        units: { USD: [fy("2023-09-30", 10), fy("2024-09-30", 15)] },
      },
      Revenues: {
        label: "Revenues",
        units: { USD: [fy("2023-09-30", 380), fy("2024-09-30", 400)] },
      },
      LongTermDebtNoncurrent: {
        label: "Long-Term Debt, Excluding Current Maturities",
        units: { USD: [fy("2023-09-30", 90), fy("2024-09-30", 85)] },
      },
      LongTermDebtCurrent: {
        label: "Long-Term Debt, Current Maturities",
        units: { USD: [fy("2024-09-30", 10)] },
      },
      CashAndCashEquivalentsAtCarryingValue: {
        label: "Cash and Cash Equivalents, at Carrying Value",
        units: { USD: [fy("2024-09-30", 30)] },
      },
    },
  },
});

describe("buildCashFlowStatement", () => {
  it("labels rows and carries capex as an outflow", () => {
    expect(buildCashFlowStatement(facts)).toEqual([
      {
        label: "Net Cash Provided by (Used in) Operating Activities",
        values: [
          { end: "2023-09-30", val: 110 },
          { end: "2024-09-30", val: 120 },
        ],
      },
      {
        label: "Capital Expenditure",
        values: [
          { end: "2023-09-30", val: -10 },
          { end: "2024-09-30", val: -15 },
        ],
      },
    ]);
  });

  it("feeds free cash flow derivation", () => {
    expect(deriveFcf(buildCashFlowStatement(facts))).toBe(105);
  });
});

describe("pickBalanceSheet", () => {
  it("sums current and non-current debt and reads shares from dei", () => {
    expect(pickBalanceSheet(facts)).toEqual({ totalDebt: 95, totalCash: 30, sharesOutstanding: 1000 });
  });

  it("reports missing items as null", () => {
    const empty = CompanyFactsSchema.parse({ facts: {} });
    expect(pickBalanceSheet(empty)).toEqual({ totalDebt: null, totalCash: null, sharesOutstanding: null });
    expect(buildCashFlowStatement(empty)).toEqual([]);
  });
});

describe("pickAnnualRevenue", () => {
  it("returns annual points in date order", () => {
    expect(pickAnnualRevenue(facts)).toEqual([
      { end: "2023-09-30", val: 380 },
      { end: "2024-09-30", val: 400 },
    ]);
  });
});

describe("parseTickerMap", () => {
  it("pads CIKs to ten digits", () => {
    expect(
      parseTickerMap({
        "0": { cik_str: 320193, ticker: "aapl", title: "Apple Inc." },
        "1": { cik_str: "789019", ticker: "MSFT", title: "Microsoft" },
      })
    ).toEqual({ AAPL: "0000320193", MSFT: "0000789019" });
  });
});
