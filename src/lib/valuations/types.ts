export type SeriesPoint = { end: string; val: number };

export type ValuationFailure = {
  error: {
    type: "INVALID_INPUT";
    message: string;
    field: string;
  };
};

export function invalidInput(field: string, message: string): ValuationFailure {
  return { error: { type: "INVALID_INPUT", message, field } };
}

export function isValuationFailure<T extends object>(x: T | ValuationFailure): x is ValuationFailure {
  return "error" in x;
}

export function isFiniteNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}
