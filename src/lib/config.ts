import { isHorizon, type Horizon } from "@/lib/valuations/dcf";

function numberFromEnv(name: string, def: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return def;
  const n = Number(raw);
  return Number.isFinite(n) ? n : def;
}

// SEC asks automated clients to identify themselves.
export function getSecUserAgent(): string {
  const ua = (process.env.SEC_USER_AGENT ?? "").trim();
  return ua || "valuation-desk (admin@example.com)";
}

export function getDefaultDiscountRate(): number {
  return numberFromEnv("VALUATION_DEFAULT_DISCOUNT_RATE", 0.08);
}

export function getDefaultTerminalGrowth(): number {
  return numberFromEnv("VALUATION_DEFAULT_TERMINAL_GROWTH", 0.03);
}

export function getDefaultYears(): Horizon {
  const n = numberFromEnv("VALUATION_DEFAULT_YEARS", 5);
  return isHorizon(n) ? n : 5;
}
