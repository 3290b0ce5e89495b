import yahooFinance from "yahoo-finance2";

import { trailingReturn } from "@/lib/valuations/capm";
import { isFiniteNumber } from "@/lib/valuations/types";

const RISK_FREE_SYMBOL = "^IRX"; // 13-week T-bill yield, quoted in percent
const MARKET_SYMBOL = "^GSPC";

export async function fetchRiskFreeRate(): Promise<number | null> {
  const quote = await yahooFinance.quote(RISK_FREE_SYMBOL);
  const px: unknown = quote.regularMarketPrice;
  return isFiniteNumber(px) ? px / 100 : null;
}

export async function fetchMarketReturn(): Promise<number | null> {
  const period1 = new Date();
  period1.setDate(period1.getDate() - 400);

  const chart = await yahooFinance.chart(MARKET_SYMBOL, { period1, interval: "1d" });
  const closes = chart.quotes.map((q) => {
    const c: unknown = q.close;
    return isFiniteNumber(c) ? c : NaN;
  });
  return trailingReturn(closes);
}

export type YahooProfile = {
  beta: number | null;
  analystGrowth: number | null;
  analystGrowthField: string | null;
};

export async function fetchYahooProfile(ticker: string): Promise<YahooProfile> {
  const summary = await yahooFinance.quoteSummary(ticker, {
    modules: ["summaryDetail", "financialData", "earningsTrend"],
  });

  const betaRaw: unknown = summary.summaryDetail?.beta;
  const beta = isFiniteNumber(betaRaw) ? betaRaw : null;

  // 1) financialData.earningsGrowth is already a growth rate
  const egRaw: unknown = summary.financialData?.earningsGrowth;
  if (isFiniteNumber(egRaw)) {
    return { beta, analystGrowth: egRaw, analystGrowthField: "financialData.earningsGrowth" };
  }

  // 2) earningsTrend +5y, only present for some tickers
  const plus5 = (summary.earningsTrend?.trend ?? []).find((t) => t.period === "+5y");
  const trendRaw: unknown = plus5?.growth;
  if (isFiniteNumber(trendRaw)) {
    return { beta, analystGrowth: trendRaw, analystGrowthField: "earningsTrend.trend[+5y].growth" };
  }

  return { beta, analystGrowth: null, analystGrowthField: null };
}
