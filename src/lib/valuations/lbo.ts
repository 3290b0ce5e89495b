import { invalidInput, isFiniteNumber, type ValuationFailure } from "./types";

export type LboInputs = {
  purchasePrice: number;
  debt: number;
  exitMultiple: number; // EV / EBITDA at exit
  exitEbitda: number;
  years: number;
};

export type LboResult = {
  equityInvested: number;
  exitValue: number;
  equityAtExit: number;
  moic: number | null;
  irr: number | null;
};

export type LboResultOrFailure = LboResult | ValuationFailure;

export function projectLbo(inputs: LboInputs): LboResultOrFailure {
  const { purchasePrice, debt, exitMultiple, exitEbitda, years } = inputs;

  for (const [field, val] of Object.entries(inputs)) {
    if (!isFiniteNumber(val)) return invalidInput(field, `${field} must be a finite number`);
  }
  if (purchasePrice <= 0) return invalidInput("purchasePrice", "purchasePrice must be positive");
  if (debt < 0) return invalidInput("debt", "debt cannot be negative");
  if (!Number.isInteger(years) || years < 1) {
    return invalidInput("years", `years must be a positive whole number (got ${years})`);
  }

  // Debt is repaid in full at exit; no interim paydown.
  const equityInvested = purchasePrice - debt;
  const exitValue = exitMultiple * exitEbitda;
  const equityAtExit = exitValue - debt;

  const bothPositive = equityInvested > 0 && equityAtExit > 0;
  const moic = equityInvested > 0 ? equityAtExit / equityInvested : null;
  const irr = bothPositive ? Math.pow(equityAtExit / equityInvested, 1 / years) - 1 : null;

  return { equityInvested, exitValue, equityAtExit, moic, irr };
}
