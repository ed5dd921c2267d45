// Absolute tolerance (one hundredth of a currency unit) used for funded checks,
// zero-balance tests and identity reconciliation.
export const TOLERANCE = 0.01;

export function assertFiniteNumber(value: number, name: string): void {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new TypeError(`${name} must be a finite number`);
  }
}

function assertRate(rate: number, name: string): void {
  assertFiniteNumber(rate, name);
  if (rate <= -1) {
    throw new RangeError(`${name} must be greater than -1`);
  }
}

// Payment function (like Excel PMT)
// Returns the level payment per period for a loan, negative for an outflow
export function pmt(
  rate: number,
  nper: number,
  pv: number,
  fv = 0,
  type: 0 | 1 = 0,
): number {
  assertRate(rate, "rate");
  assertFiniteNumber(pv, "pv");
  assertFiniteNumber(fv, "fv");

  if (!Number.isInteger(nper) || nper <= 0) {
    throw new RangeError("nper must be a positive integer");
  }
  if (type !== 0 && type !== 1) {
    throw new RangeError("type must be 0 or 1");
  }

  if (rate === 0) {
    return -(pv + fv) / nper;
  }

  const pow = Math.pow(1 + rate, nper);
  return -(rate * (fv + pv * pow)) / ((1 + rate * type) * (pow - 1));
}

// Nominal annual rate split across two half-year periods
export function semiAnnualRate(annualRate: number): number {
  assertRate(annualRate, "annualRate");
  return annualRate / 2;
}

export function positive(value: number): number {
  return value > 0 ? value : 0;
}

export function sum(values: readonly number[]): number {
  let total = 0;
  for (const value of values) {
    total += value;
  }
  return total;
}

/**
 * Formats an amount the way diagnostics print it: currency code, thousands
 * separators, no decimals.
 */
export function formatAmount(value: number, currency: string): string {
  const rounded = Math.round(value);
  const formatted = Math.abs(rounded).toLocaleString("en-US");
  return `${rounded < 0 ? "-" : ""}${currency} ${formatted}`;
}
