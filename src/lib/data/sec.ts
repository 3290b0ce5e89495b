import { z } from "zod";

import { getSecUserAgent } from "@/lib/config";
import type { StatementRow } from "@/lib/valuations/fcf";
import { isFiniteNumber, type SeriesPoint } from "@/lib/valuations/types";

/* ---------------------------
   Company facts shape (SEC EDGAR XBRL)
---------------------------- */

const FactPointSchema = z.object({
  end: z.string(),
  val: z.number(),
  form: z.string().optional(),
  fp: z.string().nullable().optional(),
  frame: z.string().optional(),
});

type FactPoint = z.infer<typeof FactPointSchema>;

const ConceptSchema = z.object({
  label: z.string().nullable().optional(),
  units: z.record(z.string(), z.array(z.unknown())),
});

export const CompanyFactsSchema = z.object({
  entityName: z.string().optional(),
  facts: z.object({
    "us-gaap": z.record(z.string(), ConceptSchema).optional(),
    dei: z.record(z.string(), ConceptSchema).optional(),
  }),
});

export type CompanyFacts = z.infer<typeof CompanyFactsSchema>;

type Taxonomy = "us-gaap" | "dei";

function unitPoints(facts: CompanyFacts, tag: string, unitKey: string, taxonomy: Taxonomy = "us-gaap"): FactPoint[] {
  const raw = facts.facts[taxonomy]?.[tag]?.units[unitKey];
  if (!Array.isArray(raw)) return [];

  const out: FactPoint[] = [];
  for (const x of raw) {
    const parsed = FactPointSchema.safeParse(x);
    if (parsed.success && Number.isFinite(parsed.data.val)) out.push(parsed.data);
  }
  return out;
}

function isAnnual(x: FactPoint): boolean {
  if (x.form !== "10-K") return false;
  if (x.fp !== "FY") return false;
  // exclude frames that look like quarters (CY2023Q1, FY2024Q2, etc.)
  if (typeof x.frame === "string" && /Q[1-4]/.test(x.frame)) return false;
  return true;
}

// Same end date reported more than once: keep the largest absolute value (the annual total).
function dedupeByEnd(points: SeriesPoint[]): SeriesPoint[] {
  const byEnd = new Map<string, number>();
  for (const p of points) {
    const prev = byEnd.get(p.end);
    if (prev === undefined || Math.abs(p.val) > Math.abs(prev)) {
      byEnd.set(p.end, p.val);
    }
  }
  return Array.from(byEnd.entries())
    .map(([end, val]) => ({ end, val }))
    .sort((a, b) => a.end.localeCompare(b.end));
}

export function pickAnnualUSDSeries(facts: CompanyFacts, tagCandidates: string[]): { tag: string; series: SeriesPoint[] } | null {
  for (const tag of tagCandidates) {
    const annual = unitPoints(facts, tag, "USD")
      .filter(isAnnual)
      .map((x) => ({ end: x.end, val: x.val }));
    const series = dedupeByEnd(annual);
    if (series.length) return { tag, series };
  }
  return null;
}

export function mergeAnnualUSDSeries(facts: CompanyFacts, tagCandidates: string[]): SeriesPoint[] {
  const all: SeriesPoint[] = [];
  for (const tag of tagCandidates) {
    for (const x of unitPoints(facts, tag, "USD")) {
      if (isAnnual(x)) all.push({ end: x.end, val: x.val });
    }
  }
  return dedupeByEnd(all);
}

export function pickLatestValue(
  facts: CompanyFacts,
  tagCandidates: string[],
  unitKey: string,
  taxonomy: Taxonomy = "us-gaap"
): SeriesPoint | null {
  for (const tag of tagCandidates) {
    const sorted = unitPoints(facts, tag, unitKey, taxonomy)
      .map((x) => ({ end: x.end, val: x.val }))
      .sort((a, b) => b.end.localeCompare(a.end));
    if (sorted.length) return sorted[0];
  }
  return null;
}

export function lastNYears(series: SeriesPoint[], n: number): SeriesPoint[] {
  if (series.length <= n) return series;
  return series.slice(series.length - n);
}

/* ---------------------------
   Cash flow statement rows
---------------------------- */

const OPERATING_CASH_FLOW_TAGS = [
  "NetCashProvidedByUsedInOperatingActivities",
  "NetCashProvidedByUsedInOperatingActivitiesContinuingOperations",
];

const CAPEX_TAGS = [
  "PaymentsToAcquirePropertyPlantAndEquipment",
  "PaymentsToAcquireProductiveAssets",
];

const DEPRECIATION_TAGS = ["DepreciationDepletionAndAmortization", "DepreciationAndAmortization"];

function conceptLabel(facts: CompanyFacts, tag: string): string {
  return facts.facts["us-gaap"]?.[tag]?.label ?? tag;
}

/**
 * Builds a labeled cash flow statement from company facts. Payments are
 * reported as positive amounts in XBRL; statement rows carry outflows as
 * negative numbers, so capital expenditure is negated here once.
 */
export function buildCashFlowStatement(facts: CompanyFacts, years = 5): StatementRow[] {
  const rows: StatementRow[] = [];

  const ocf = pickAnnualUSDSeries(facts, OPERATING_CASH_FLOW_TAGS);
  if (ocf) {
    rows.push({
      label: conceptLabel(facts, ocf.tag),
      values: lastNYears(ocf.series, years),
    });
  }

  const capex = pickAnnualUSDSeries(facts, CAPEX_TAGS);
  if (capex) {
    rows.push({
      label: "Capital Expenditure",
      values: lastNYears(capex.series, years).map((p) => ({ end: p.end, val: -Math.abs(p.val) })),
    });
  }

  const dna = pickAnnualUSDSeries(facts, DEPRECIATION_TAGS);
  if (dna) {
    rows.push({
      label: conceptLabel(facts, dna.tag),
      values: lastNYears(dna.series, years),
    });
  }

  return rows;
}

export type BalanceSheetSnapshot = {
  totalDebt: number | null;
  totalCash: number | null;
  sharesOutstanding: number | null;
};

export function pickBalanceSheet(facts: CompanyFacts): BalanceSheetSnapshot {
  const longTerm = pickLatestValue(facts, ["LongTermDebtNoncurrent", "LongTermDebt"], "USD");
  const current = pickLatestValue(facts, ["LongTermDebtCurrent", "DebtCurrent"], "USD");
  const cash = pickLatestValue(
    facts,
    ["CashAndCashEquivalentsAtCarryingValue", "CashCashEquivalentsRestrictedCashAndRestrictedCashEquivalents"],
    "USD"
  );
  const shares =
    pickLatestValue(facts, ["EntityCommonStockSharesOutstanding"], "shares", "dei") ??
    pickLatestValue(facts, ["CommonStockSharesOutstanding"], "shares");

  const debtParts = [longTerm?.val, current?.val].filter(isFiniteNumber);

  return {
    totalDebt: debtParts.length ? debtParts.reduce((a, b) => a + b, 0) : null,
    totalCash: cash ? cash.val : null,
    sharesOutstanding: shares ? shares.val : null,
  };
}

export function pickAnnualRevenue(facts: CompanyFacts): SeriesPoint[] {
  return lastNYears(
    mergeAnnualUSDSeries(facts, [
      "Revenues",
      "SalesRevenueNet",
      "RevenueFromContractWithCustomerExcludingAssessedTax",
      "SalesRevenueGoodsNet",
      "SalesRevenueServicesNet",
    ]),
    10
  );
}

/* ---------------------------
   Fetching
---------------------------- */

const TickerMapSchema = z.record(
  z.string(),
  z.object({ cik_str: z.union([z.number(), z.string()]), ticker: z.string() })
);

export class TickerNotFoundError extends Error {
  constructor(readonly ticker: string) {
    super(`No SEC CIK found for ticker ${ticker}`);
    this.name = "TickerNotFoundError";
  }
}

let tickerToCikCache: Record<string, string> | null = null;

export function parseTickerMap(data: unknown): Record<string, string> {
  const rows = TickerMapSchema.parse(data);
  const map: Record<string, string> = {};
  for (const row of Object.values(rows)) {
    const ticker = row.ticker.toUpperCase();
    const cikRaw = String(row.cik_str);
    if (!ticker || !cikRaw) continue;
    map[ticker] = cikRaw.padStart(10, "0");
  }
  return map;
}

async function getTickerToCikMap(): Promise<Record<string, string>> {
  if (tickerToCikCache) return tickerToCikCache;

  const res = await fetch("https://www.sec.gov/files/company_tickers.json", {
    headers: { "User-Agent": getSecUserAgent(), Accept: "application/json" },
  });

  const text = await res.text();
  if (!res.ok) throw new Error(`SEC ticker map failed: status=${res.status}. Body=${text.slice(0, 300)}`);

  tickerToCikCache = parseTickerMap(JSON.parse(text));
  return tickerToCikCache;
}

export async function getCikForTicker(ticker: string): Promise<string> {
  const map = await getTickerToCikMap();
  const cik10 = map[ticker.toUpperCase()];
  if (!cik10) throw new TickerNotFoundError(ticker);
  return cik10;
}

export async function fetchCompanyFacts(cik10: string): Promise<CompanyFacts> {
  const url = `https://data.sec.gov/api/xbrl/companyfacts/CIK${cik10}.json`;

  const res = await fetch(url, {
    headers: { "User-Agent": getSecUserAgent(), Accept: "application/json" },
  });

  const text = await res.text();
  if (!res.ok) throw new Error(`SEC companyfacts failed: status=${res.status}. Body=${text.slice(0, 300)}`);

  return CompanyFactsSchema.parse(JSON.parse(text));
}
