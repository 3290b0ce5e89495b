import { invalidInput, isFiniteNumber, type ValuationFailure } from "./types";

export const ALLOWED_HORIZONS = [3, 5, 7, 10] as const;

// Spreads narrower than this between discount rate and terminal growth leave the terminal value undefined.
export const MIN_TERMINAL_SPREAD = 1e-9;

export type Horizon = (typeof ALLOWED_HORIZONS)[number];

export function isHorizon(n: number): n is Horizon {
  return ALLOWED_HORIZONS.some((h) => h === n);
}

export type ValuationInputs = {
  lastFcf: number;            // last-period free cash flow, any sign
  growthRate: number;         // decimal, e.g. 0.08
  discountRate: number;       // decimal (WACC)
  terminalGrowthRate: number; // decimal
  years: number;              // one of ALLOWED_HORIZONS
};

export type CashFlowProjection = {
  nominal: number[];
  presentValues: number[];
  // null unless discountRate exceeds terminalGrowthRate by more than MIN_TERMINAL_SPREAD
  terminalValue: number | null;
  terminalPresentValue: number | null;
  enterpriseValue: number;
};

export type CashFlowProjectionOrFailure = CashFlowProjection | ValuationFailure;

function validate(inputs: ValuationInputs): ValuationFailure | null {
  const scalars: Array<[keyof ValuationInputs, number]> = [
    ["lastFcf", inputs.lastFcf],
    ["growthRate", inputs.growthRate],
    ["discountRate", inputs.discountRate],
    ["terminalGrowthRate", inputs.terminalGrowthRate],
    ["years", inputs.years],
  ];
  for (const [field, val] of scalars) {
    if (!isFiniteNumber(val)) return invalidInput(field, `${field} must be a finite number`);
  }

  if (!isHorizon(inputs.years)) {
    return invalidInput("years", `years must be one of ${ALLOWED_HORIZONS.join(", ")} (got ${inputs.years})`);
  }
  if (inputs.discountRate <= -1) {
    return invalidInput("discountRate", "discountRate must be greater than -1");
  }
  return null;
}

/**
 * Projects free cash flow over the horizon and discounts it back.
 *
 * Period i (1-indexed) is grown and discounted i full periods, so the first
 * projected year is already one period out. The perpetuity-growth terminal
 * value sits at the end of the horizon and only exists while the discount
 * rate exceeds terminal growth; without it the enterprise value is the sum of
 * the explicit periods.
 */
export function projectDcf(inputs: ValuationInputs): CashFlowProjectionOrFailure {
  const failure = validate(inputs);
  if (failure) return failure;

  const { lastFcf, growthRate, discountRate, terminalGrowthRate, years } = inputs;

  const nominal: number[] = [];
  const presentValues: number[] = [];

  for (let i = 1; i <= years; i++) {
    const fcf = lastFcf * Math.pow(1 + growthRate, i);
    nominal.push(fcf);
    presentValues.push(fcf / Math.pow(1 + discountRate, i));
  }

  let terminalValue: number | null = null;
  let terminalPresentValue: number | null = null;

  if (discountRate - terminalGrowthRate > MIN_TERMINAL_SPREAD) {
    const tv = (nominal[years - 1] * (1 + terminalGrowthRate)) / (discountRate - terminalGrowthRate);
    const pv = tv / Math.pow(1 + discountRate, years);
    if (Number.isFinite(tv) && Number.isFinite(pv)) {
      terminalValue = tv;
      terminalPresentValue = pv;
    }
  }

  const enterpriseValue = presentValues.reduce((a, b) => a + b, 0) + (terminalPresentValue ?? 0);

  return { nominal, presentValues, terminalValue, terminalPresentValue, enterpriseValue };
}

export type EquityBridgeInputs = {
  enterpriseValue: number;
  totalDebt: number | null;
  totalCash: number | null;
  sharesOutstanding: number | null;
};

export type EquityBridge = {
  equityValue: number;
  impliedSharePrice: number | null;
};

// equity = EV - debt + cash; missing debt or cash count as zero.
export function composeEquityValue(inputs: EquityBridgeInputs): EquityBridge {
  const debt = isFiniteNumber(inputs.totalDebt) ? inputs.totalDebt : 0;
  const cash = isFiniteNumber(inputs.totalCash) ? inputs.totalCash : 0;
  const equityValue = inputs.enterpriseValue - debt + cash;

  const shares = inputs.sharesOutstanding;
  const impliedSharePrice = isFiniteNumber(shares) && shares > 0 ? equityValue / shares : null;

  return { equityValue, impliedSharePrice };
}
