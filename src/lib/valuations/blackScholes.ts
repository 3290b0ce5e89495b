import { standardNormal, type NormalDistribution } from "./normal";
import { invalidInput, isFiniteNumber, type ValuationFailure } from "./types";

export type OptionKind = "call" | "put";

export type OptionQuote = {
  S: number;     // underlying price, > 0
  K: number;     // strike, > 0
  T: number;     // years to expiry
  r: number;     // risk-free rate, continuous, decimal
  sigma: number; // annualized volatility, decimal
  kind: OptionKind;
};

/**
 * Price plus the five Greeks. Theta is per year (divide by 365 for a daily
 * figure). Put rho is reported as K·T·e^(−rT)·Φ(−d2), without the negative
 * sign of the textbook sensitivity. In the degenerate branch (T ≤ 0 or σ ≤ 0)
 * the price is intrinsic value and every Greek is null.
 */
export type PricedOption = {
  kind: OptionKind;
  price: number;
  intrinsicValue: number;
  degenerate: boolean;
  delta: number | null;
  gamma: number | null;
  theta: number | null;
  vega: number | null;
  rho: number | null;
  d1: number | null;
  d2: number | null;
};

export type PricedOptionOrFailure = PricedOption | ValuationFailure;

export function intrinsicValue(S: number, K: number, kind: OptionKind): number {
  return kind === "call" ? Math.max(0, S - K) : Math.max(0, K - S);
}

function validate(quote: OptionQuote): ValuationFailure | null {
  const scalars: Array<[keyof OptionQuote, number]> = [
    ["S", quote.S],
    ["K", quote.K],
    ["T", quote.T],
    ["r", quote.r],
    ["sigma", quote.sigma],
  ];
  for (const [field, val] of scalars) {
    if (!isFiniteNumber(val)) return invalidInput(field, `${field} must be a finite number`);
  }
  if (quote.S <= 0) return invalidInput("S", `underlying price must be positive (got ${quote.S})`);
  if (quote.K <= 0) return invalidInput("K", `strike must be positive (got ${quote.K})`);
  if (quote.kind !== "call" && quote.kind !== "put") {
    return invalidInput("kind", `kind must be "call" or "put"`);
  }
  return null;
}

export function priceOption(
  quote: OptionQuote,
  normal: NormalDistribution = standardNormal
): PricedOptionOrFailure {
  const failure = validate(quote);
  if (failure) return failure;

  const { S, K, T, r, sigma, kind } = quote;
  const intrinsic = intrinsicValue(S, K, kind);

  if (T <= 0 || sigma <= 0) {
    return {
      kind,
      price: intrinsic,
      intrinsicValue: intrinsic,
      degenerate: true,
      delta: null,
      gamma: null,
      theta: null,
      vega: null,
      rho: null,
      d1: null,
      d2: null,
    };
  }

  const { cdf, pdf } = normal;
  const sqrtT = Math.sqrt(T);
  const d1 = (Math.log(S / K) + (r + 0.5 * sigma * sigma) * T) / (sigma * sqrtT);
  const d2 = d1 - sigma * sqrtT;
  const discount = Math.exp(-r * T);
  const phiD1 = pdf(d1);

  const gamma = phiD1 / (S * sigma * sqrtT);
  const vega = S * phiD1 * sqrtT;
  const decay = -(S * phiD1 * sigma) / (2 * sqrtT);

  if (kind === "call") {
    return {
      kind,
      price: S * cdf(d1) - K * discount * cdf(d2),
      intrinsicValue: intrinsic,
      degenerate: false,
      delta: cdf(d1),
      gamma,
      theta: decay - r * K * discount * cdf(d2),
      vega,
      rho: K * T * discount * cdf(d2),
      d1,
      d2,
    };
  }

  return {
    kind,
    price: K * discount * cdf(-d2) - S * cdf(-d1),
    intrinsicValue: intrinsic,
    degenerate: false,
    delta: -cdf(-d1),
    gamma,
    theta: decay - r * K * discount * cdf(-d2),
    vega,
    rho: K * T * discount * cdf(-d2),
    d1,
    d2,
  };
}

// call - put - (S - K·e^(−rT)); zero up to rounding when parity holds.
export function putCallParityGap(call: PricedOption, put: PricedOption, quote: Omit<OptionQuote, "kind">): number {
  return call.price - put.price - (quote.S - quote.K * Math.exp(-quote.r * quote.T));
}
