import { NextResponse } from "next/server";
import { z } from "zod";

import { getDefaultDiscountRate, getDefaultTerminalGrowth, getDefaultYears } from "@/lib/config";
import {
  buildCashFlowStatement,
  fetchCompanyFacts,
  getCikForTicker,
  pickAnnualRevenue,
  pickBalanceSheet,
  TickerNotFoundError,
} from "@/lib/data/sec";
import { fetchStooqDailyHistory, latestClose } from "@/lib/data/stooq";
import { trailingGrowth } from "@/lib/valuations/capm";
import { ALLOWED_HORIZONS, composeEquityValue, projectDcf } from "@/lib/valuations/dcf";
import { deriveFcfDetailed } from "@/lib/valuations/fcf";
import { isValuationFailure } from "@/lib/valuations/types";
import { describeVolatility } from "@/lib/valuations/volatility";

export const runtime = "nodejs";

const TickerSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z.\-]{1,10}$/, "Invalid ticker");

// Empty query params count as absent.
const optionalNumber = z.preprocess(
  (v) => (v === null || v === "" ? undefined : v),
  z.coerce.number().finite().optional()
);

const QuerySchema = z.object({
  ticker: TickerSchema,
  growth: optionalNumber,
  discount: optionalNumber,
  terminalGrowth: optionalNumber,
  years: optionalNumber,
  fcf: optionalNumber,
});

class UpstreamError extends Error {}

async function loadCompany(ticker: string) {
  try {
    const cik10 = await getCikForTicker(ticker);
    const [facts, history] = await Promise.all([fetchCompanyFacts(cik10), fetchStooqDailyHistory(ticker)]);
    return { cik10, facts, history };
  } catch (err) {
    if (err instanceof TickerNotFoundError) throw err;
    console.error("valuation upstream fetch failed", { ticker, err });
    throw new UpstreamError(err instanceof Error ? err.message : String(err));
  }
}

export async function GET(req: Request) {
  const url = new URL(req.url);
  const parsed = QuerySchema.safeParse({
    ticker: url.searchParams.get("ticker") ?? "",
    growth: url.searchParams.get("growth"),
    discount: url.searchParams.get("discount"),
    terminalGrowth: url.searchParams.get("terminalGrowth"),
    years: url.searchParams.get("years"),
    fcf: url.searchParams.get("fcf"),
  });
  if (!parsed.success) {
    return NextResponse.json({ ok: false, error: "BAD_REQUEST", issues: parsed.error.issues }, { status: 400 });
  }
  const q = parsed.data;

  try {
    const { cik10, facts, history } = await loadCompany(q.ticker);

    const statement = buildCashFlowStatement(facts);
    const derived = deriveFcfDetailed(statement);
    const lastFcf = q.fcf ?? derived?.fcf ?? null;

    const revenue = pickAnnualRevenue(facts);
    const revenueGrowth = trailingGrowth(revenue);
    const balance = pickBalanceSheet(facts);

    const last = latestClose(history);
    const volatility = describeVolatility(history.map((h) => h.close));

    const assumptions = {
      growthRate: q.growth ?? revenueGrowth ?? 0,
      discountRate: q.discount ?? getDefaultDiscountRate(),
      terminalGrowthRate: q.terminalGrowth ?? getDefaultTerminalGrowth(),
      years: q.years ?? getDefaultYears(),
    };

    const base = {
      ok: true,
      ticker: q.ticker,
      cik: cik10,
      entityName: facts.entityName ?? null,
      latestPriceUSD: last ? last.close : null,
      latestPriceDate: last ? last.date : null,
      volatility,
      revenueUSD: revenue,
      revenueGrowth,
      balanceSheet: balance,
      cashFlowStatement: statement,
      fcfSource: q.fcf !== undefined ? "manual" : derived ? "statement" : null,
      fcfDerivation: derived,
      assumptions: { ...assumptions, allowedYears: ALLOWED_HORIZONS },
    };

    if (lastFcf === null) {
      return NextResponse.json(
        {
          ...base,
          ok: false,
          error: "FCF_UNAVAILABLE",
          message: "Operating cash flow or capital expenditure not found; pass fcf to supply it manually.",
        },
        { status: 422 }
      );
    }

    const dcf = projectDcf({ lastFcf, ...assumptions });
    if (isValuationFailure(dcf)) {
      return NextResponse.json({ ...base, ok: false, error: "INVALID_INPUT", details: dcf.error }, { status: 400 });
    }

    const equity = composeEquityValue({
      enterpriseValue: dcf.enterpriseValue,
      totalDebt: balance.totalDebt,
      totalCash: balance.totalCash,
      sharesOutstanding: balance.sharesOutstanding,
    });

    return NextResponse.json({ ...base, lastFcf, dcf, equity });
  } catch (err) {
    if (err instanceof TickerNotFoundError) {
      return NextResponse.json({ ok: false, error: "TICKER_NOT_FOUND", message: err.message }, { status: 404 });
    }
    if (err instanceof UpstreamError) {
      return NextResponse.json({ ok: false, error: "UPSTREAM_FAILED", message: err.message }, { status: 502 });
    }
    console.error("valuation GET failed", { ticker: q.ticker, err });
    return NextResponse.json({ ok: false, error: "INTERNAL_ERROR" }, { status: 500 });
  }
}
