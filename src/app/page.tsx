"use client";

import { useEffect, useMemo, useState, type CSSProperties, type ReactNode } from "react";

import type { PricedOption, OptionKind } from "@/lib/valuations/blackScholes";
import type { CashFlowProjection, EquityBridge } from "@/lib/valuations/dcf";
import { projectLbo } from "@/lib/valuations/lbo";
import { isValuationFailure, type ValuationFailure } from "@/lib/valuations/types";
import type { VolatilityEstimate } from "@/lib/valuations/volatility";

const YEAR_OPTIONS = [3, 5, 7, 10];

type ValuationResponse = {
  ok: boolean;
  ticker?: string;
  entityName?: string | null;
  latestPriceUSD?: number | null;
  latestPriceDate?: string | null;
  volatility?: VolatilityEstimate;
  revenueGrowth?: number | null;
  balanceSheet?: { totalDebt: number | null; totalCash: number | null; sharesOutstanding: number | null };
  fcfSource?: "manual" | "statement" | null;
  lastFcf?: number;
  dcf?: CashFlowProjection;
  equity?: EquityBridge;
  error?: string;
  message?: string;
  details?: ValuationFailure["error"];
};

type OptionResponse = {
  ok: boolean;
  result?: PricedOption;
  error?: string;
  details?: ValuationFailure["error"];
};

type MarketInputsResponse = {
  ok: boolean;
  riskFreeRate: number | null;
  marketReturn: number | null;
  beta: number | null;
  costOfEquity: number | null;
  analystGrowth: number | null;
};

function fmtMoney(x: number | null | undefined): string {
  if (x === null || x === undefined || !Number.isFinite(x)) return "N/A";
  return new Intl.NumberFormat("en-US", { style: "currency", currency: "USD" }).format(x);
}

function fmtBig(x: number | null | undefined): string {
  if (x === null || x === undefined || !Number.isFinite(x)) return "N/A";
  return new Intl.NumberFormat("en-US", { style: "currency", currency: "USD", notation: "compact" }).format(x);
}

function fmtPct(x: number | null | undefined): string {
  if (x === null || x === undefined || !Number.isFinite(x)) return "N/A";
  return (x * 100).toFixed(2) + "%";
}

function fmtNum(x: number | null | undefined, digits = 4): string {
  if (x === null || x === undefined || !Number.isFinite(x)) return "N/A";
  return x.toFixed(digits);
}

const inputStyle: CSSProperties = { width: "100%", padding: 10, marginTop: 6, borderRadius: 10, border: "1px solid #ccc" };
const sectionStyle: CSSProperties = { padding: 16, border: "1px solid #ddd", borderRadius: 12, marginBottom: 16 };
const tileStyle: CSSProperties = { padding: 12, border: "1px solid #eee", borderRadius: 12 };

function Tile({ label, children }: { label: string; children: ReactNode }) {
  return (
    <div style={tileStyle}>
      <div style={{ color: "#666" }}>{label}</div>
      <div style={{ fontSize: 22 }}>{children}</div>
    </div>
  );
}

function NumberField(props: { label: string; value: number; step?: string; onChange: (n: number) => void; hint?: string }) {
  return (
    <label>
      {props.label}
      <input
        type="number"
        step={props.step ?? "0.01"}
        value={props.value}
        onChange={(e) => props.onChange(Number(e.target.value) || 0)}
        style={inputStyle}
      />
      {props.hint && <div style={{ color: "#666", marginTop: 6 }}>{props.hint}</div>}
    </label>
  );
}

function useDebounced<T>(value: T, ms = 300): T {
  const [v, setV] = useState(value);
  useEffect(() => {
    const id = setTimeout(() => setV(value), ms);
    return () => clearTimeout(id);
  }, [value, ms]);
  return v;
}

function useJson<T>(url: string | null): { data: T | null; loading: boolean; err: string | null } {
  const [data, setData] = useState<T | null>(null);
  const [loading, setLoading] = useState(false);
  const [err, setErr] = useState<string | null>(null);

  useEffect(() => {
    if (!url) {
      setData(null);
      setErr(null);
      setLoading(false);
      return;
    }

    let cancelled = false;
    setLoading(true);
    setErr(null);

    fetch(url)
      .then(async (r) => {
        const j = (await r.json()) as T & { error?: string; message?: string };
        if (cancelled) return;
        if (!r.ok) setErr(j.message ?? j.error ?? "Request failed");
        setData(j);
      })
      .catch((e) => {
        if (cancelled) return;
        setErr(String(e));
        setData(null);
      })
      .finally(() => {
        if (cancelled) return;
        setLoading(false);
      });

    return () => {
      cancelled = true;
    };
  }, [url]);

  return { data, loading, err };
}

export default function HomePage() {
  const [ticker, setTicker] = useState("AAPL");

  const [growth, setGrowth] = useState(0.08);
  const [discount, setDiscount] = useState(0.08);
  const [terminalGrowth, setTerminalGrowth] = useState(0.03);
  const [years, setYears] = useState(5);
  const [manualFcf, setManualFcf] = useState("");

  const [strike, setStrike] = useState(200);
  const [expiry, setExpiry] = useState(0.5);
  const [rate, setRate] = useState(0.045);
  const [kind, setKind] = useState<OptionKind>("call");

  const [lbo, setLbo] = useState({ purchasePrice: 10000, debt: 5000, exitMultiple: 10, exitEbitda: 1500, years: 5 });

  const t = ticker.trim().toUpperCase();

  const valuationUrl = useDebounced(
    useMemo(() => {
      if (!t) return null;
      const params = new URLSearchParams();
      params.set("ticker", t);
      params.set("growth", String(growth));
      params.set("discount", String(discount));
      params.set("terminalGrowth", String(terminalGrowth));
      params.set("years", String(years));
      if (manualFcf.trim()) params.set("fcf", manualFcf.trim());
      return "/api/valuation?" + params.toString();
    }, [t, growth, discount, terminalGrowth, years, manualFcf])
  );

  const marketUrl = useDebounced(t ? "/api/market-inputs?ticker=" + encodeURIComponent(t) : null, 600);

  const valuation = useJson<ValuationResponse>(valuationUrl);
  const market = useJson<MarketInputsResponse>(marketUrl);

  const spot = valuation.data?.latestPriceUSD ?? null;
  const sigma = valuation.data?.volatility?.volatility ?? null;

  const optionUrl = useDebounced(
    useMemo(() => {
      if (spot === null || sigma === null) return null;
      const params = new URLSearchParams({
        S: String(spot),
        K: String(strike),
        T: String(expiry),
        r: String(rate),
        sigma: String(sigma),
        kind,
      });
      return "/api/option?" + params.toString();
    }, [spot, sigma, strike, expiry, rate, kind])
  );
  const option = useJson<OptionResponse>(optionUrl);

  const lboResult = useMemo(() => projectLbo(lbo), [lbo]);

  const dcf = valuation.data?.dcf ?? null;
  const equity = valuation.data?.equity ?? null;
  const priced = option.data?.result ?? null;

  return (
    <main style={{ maxWidth: 960, margin: "0 auto", padding: 24, fontFamily: "system-ui" }}>
      <h1 style={{ fontSize: 28, marginBottom: 8 }}>Valuation Desk</h1>
      <div style={{ color: "#555", marginBottom: 24 }}>
        DCF valuation, Black-Scholes pricing and a quick LBO check for one ticker.
      </div>

      <section style={sectionStyle}>
        <h2 style={{ fontSize: 18, marginTop: 0 }}>DCF inputs</h2>

        <div style={{ display: "grid", gridTemplateColumns: "1fr 1fr", gap: 12 }}>
          <label>
            Ticker
            <input value={ticker} onChange={(e) => setTicker(e.target.value)} placeholder="AAPL" style={inputStyle} />
          </label>

          <label>
            Projection years
            <select value={years} onChange={(e) => setYears(Number(e.target.value))} style={inputStyle}>
              {YEAR_OPTIONS.map((y) => (
                <option key={y} value={y}>
                  {y}
                </option>
              ))}
            </select>
          </label>

          <NumberField label="FCF growth (decimal)" value={growth} onChange={setGrowth} hint="Example: 0.08 means 8%" />
          <NumberField label="Discount rate / WACC (decimal)" value={discount} onChange={setDiscount} />
          <NumberField label="Terminal growth (decimal)" value={terminalGrowth} onChange={setTerminalGrowth} />

          <label>
            Last FCF override (USD, optional)
            <input value={manualFcf} onChange={(e) => setManualFcf(e.target.value)} placeholder="from statements" style={inputStyle} />
          </label>
        </div>

        {market.data && (
          <div style={{ marginTop: 12, color: "#666" }}>
            CAPM cost of equity {fmtPct(market.data.costOfEquity)} (rf {fmtPct(market.data.riskFreeRate)}, beta{" "}
            {fmtNum(market.data.beta, 2)}, S&amp;P 1y {fmtPct(market.data.marketReturn)}). Analyst growth{" "}
            {fmtPct(market.data.analystGrowth)}.
          </div>
        )}
      </section>

      <section style={sectionStyle}>
        <h2 style={{ fontSize: 18, marginTop: 0 }}>DCF output</h2>

        {valuation.loading && <div>Loading...</div>}
        {!valuation.loading && valuation.err && <div style={{ color: "crimson" }}>Error: {valuation.err}</div>}

        {!valuation.loading && dcf && (
          <>
            <div style={{ display: "grid", gridTemplateColumns: "1fr 1fr", gap: 12, marginBottom: 12 }}>
              <Tile label="Current price">{fmtMoney(spot)}</Tile>
              <Tile label="Implied share price">{fmtMoney(equity?.impliedSharePrice)}</Tile>
              <Tile label="Enterprise value">{fmtBig(dcf.enterpriseValue)}</Tile>
              <Tile label="Equity value">{fmtBig(equity?.equityValue)}</Tile>
              <Tile label={`Last FCF (${valuation.data?.fcfSource ?? "n/a"})`}>{fmtBig(valuation.data?.lastFcf)}</Tile>
              <Tile label="Terminal value (PV)">
                {dcf.terminalPresentValue === null ? "Undefined (discount ≤ terminal growth)" : fmtBig(dcf.terminalPresentValue)}
              </Tile>
            </div>

            <table style={{ width: "100%", borderCollapse: "collapse" }}>
              <thead>
                <tr>
                  <th style={{ textAlign: "left" }}>Year</th>
                  <th style={{ textAlign: "right" }}>FCF</th>
                  <th style={{ textAlign: "right" }}>Present value</th>
                </tr>
              </thead>
              <tbody>
                {dcf.nominal.map((v, i) => (
                  <tr key={i}>
                    <td>{i + 1}</td>
                    <td style={{ textAlign: "right" }}>{fmtBig(v)}</td>
                    <td style={{ textAlign: "right" }}>{fmtBig(dcf.presentValues[i])}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          </>
        )}
      </section>

      <section style={sectionStyle}>
        <h2 style={{ fontSize: 18, marginTop: 0 }}>Option pricing (Black-Scholes)</h2>

        <div style={{ display: "grid", gridTemplateColumns: "1fr 1fr", gap: 12, marginBottom: 12 }}>
          <NumberField label="Strike" value={strike} step="1" onChange={setStrike} />
          <NumberField label="Years to expiry" value={expiry} onChange={setExpiry} />
          <NumberField label="Risk-free rate (decimal)" value={rate} step="0.001" onChange={setRate} />
          <label>
            Kind
            <select value={kind} onChange={(e) => setKind(e.target.value === "put" ? "put" : "call")} style={inputStyle}>
              <option value="call">Call</option>
              <option value="put">Put</option>
            </select>
          </label>
        </div>

        <div style={{ color: "#666", marginBottom: 12 }}>
          Spot {fmtMoney(spot)}, volatility {fmtPct(sigma)} ({valuation.data?.volatility?.method ?? "n/a"}).
        </div>

        {option.err && <div style={{ color: "crimson" }}>Error: {option.err}</div>}

        {priced && (
          <div style={{ display: "grid", gridTemplateColumns: "1fr 1fr 1fr", gap: 12 }}>
            <Tile label="Price">{fmtMoney(priced.price)}</Tile>
            <Tile label="Delta">{fmtNum(priced.delta)}</Tile>
            <Tile label="Gamma">{fmtNum(priced.gamma)}</Tile>
            <Tile label="Theta (per year)">{fmtNum(priced.theta)}</Tile>
            <Tile label="Vega">{fmtNum(priced.vega)}</Tile>
            <Tile label="Rho">{fmtNum(priced.rho)}</Tile>
          </div>
        )}
        {priced?.degenerate && (
          <div style={{ color: "orange", marginTop: 12 }}>Zero time or volatility: intrinsic value only, Greeks not defined.</div>
        )}
      </section>

      <section style={sectionStyle}>
        <h2 style={{ fontSize: 18, marginTop: 0 }}>LBO returns</h2>

        <div style={{ display: "grid", gridTemplateColumns: "1fr 1fr", gap: 12, marginBottom: 12 }}>
          <NumberField label="Purchase price ($M)" value={lbo.purchasePrice} step="100" onChange={(n) => setLbo({ ...lbo, purchasePrice: n })} />
          <NumberField label="Debt ($M)" value={lbo.debt} step="100" onChange={(n) => setLbo({ ...lbo, debt: n })} />
          <NumberField label="Exit EBITDA multiple" value={lbo.exitMultiple} step="0.5" onChange={(n) => setLbo({ ...lbo, exitMultiple: n })} />
          <NumberField label="Exit EBITDA ($M)" value={lbo.exitEbitda} step="10" onChange={(n) => setLbo({ ...lbo, exitEbitda: n })} />
          <NumberField label="Holding period (years)" value={lbo.years} step="1" onChange={(n) => setLbo({ ...lbo, years: Math.max(1, Math.round(n)) })} />
        </div>

        {isValuationFailure(lboResult) ? (
          <div style={{ color: "orange" }}>{lboResult.error.message}</div>
        ) : (
          <div style={{ display: "grid", gridTemplateColumns: "1fr 1fr 1fr", gap: 12 }}>
            <Tile label="Equity at exit ($M)">{fmtNum(lboResult.equityAtExit, 0)}</Tile>
            <Tile label="MOIC">{lboResult.moic === null ? "N/A" : fmtNum(lboResult.moic, 2) + "x"}</Tile>
            <Tile label="IRR (CAGR)">{fmtPct(lboResult.irr)}</Tile>
          </div>
        )}
      </section>

      <section style={{ marginTop: 16 }}>
        <details>
          <summary style={{ cursor: "pointer" }}>Show raw API response</summary>
          <pre style={{ whiteSpace: "pre-wrap" }}>{valuation.data ? JSON.stringify(valuation.data, null, 2) : ""}</pre>
        </details>
      </section>
    </main>
  );
}
