import { NextResponse } from "next/server";
import { z } from "zod";

import { fetchMarketReturn, fetchRiskFreeRate, fetchYahooProfile, type YahooProfile } from "@/lib/data/yahoo";
import { capmCostOfEquity } from "@/lib/valuations/capm";

export const runtime = "nodejs";

const TickerSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z.\-^]{1,10}$/, "Invalid ticker");

// Each input is optional for the caller; a failed lookup becomes null plus a reason.
async function settle<T>(label: string, ticker: string, p: Promise<T>): Promise<{ value: T | null; reason?: string }> {
  try {
    return { value: await p };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`market-inputs: ${label} lookup failed`, { ticker, reason });
    return { value: null, reason };
  }
}

export async function GET(req: Request) {
  const url = new URL(req.url);
  const parsed = TickerSchema.safeParse(url.searchParams.get("ticker") ?? "");
  if (!parsed.success) {
    return NextResponse.json({ ok: false, error: "BAD_REQUEST", issues: parsed.error.issues }, { status: 400 });
  }
  const ticker = parsed.data;

  const [rf, market, profile] = await Promise.all([
    settle("risk-free rate", ticker, fetchRiskFreeRate()),
    settle("market return", ticker, fetchMarketReturn()),
    settle<YahooProfile>("profile", ticker, fetchYahooProfile(ticker)),
  ]);

  const riskFreeRate = rf.value ?? null;
  const marketReturn = market.value ?? null;
  const beta = profile.value?.beta ?? null;

  const costOfEquity =
    riskFreeRate !== null && marketReturn !== null && beta !== null
      ? capmCostOfEquity({ riskFreeRate, beta, marketReturn })
      : null;

  const reasons = [rf.reason, market.reason, profile.reason].filter((r): r is string => typeof r === "string");

  return NextResponse.json({
    ok: true,
    ticker,
    source: "yahoo-finance2",
    riskFreeRate,
    marketReturn,
    beta,
    costOfEquity,
    analystGrowth: profile.value?.analystGrowth ?? null,
    analystGrowthField: profile.value?.analystGrowthField ?? null,
    reasons,
  });
}
