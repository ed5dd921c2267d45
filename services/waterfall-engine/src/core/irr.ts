import { assertFiniteNumber } from "./math-utils.js";

const MIN_RATE = -0.999999999999;
const SOLVER_TOLERANCE = 1e-10;
const MAX_NEWTON_ITERATIONS = 50;
const MAX_BISECTION_ITERATIONS = 200;

function assertCashflows(cashflows: readonly number[]): void {
  if (cashflows.length < 2) {
    throw new TypeError("cashflows must have at least 2 entries");
  }

  let hasPositive = false;
  let hasNegative = false;
  cashflows.forEach((value, index) => {
    assertFiniteNumber(value, `cashflows[${index}]`);
    if (value > 0) {
      hasPositive = true;
    }
    if (value < 0) {
      hasNegative = true;
    }
  });

  if (!hasPositive || !hasNegative) {
    throw new RangeError("cashflows must include at least one positive and one negative value");
  }
}

function sign(value: number): -1 | 0 | 1 {
  if (Number.isNaN(value)) {
    throw new Error("Computation produced NaN");
  }
  if (value === 0) {
    return 0;
  }
  return value > 0 ? 1 : -1;
}

/**
 * Present value of `cashflows` at a per-period `rate`; the first flow is
 * undiscounted.
 */
export function npv(rate: number, cashflows: readonly number[]): number {
  assertFiniteNumber(rate, "rate");
  if (rate <= -1) {
    throw new RangeError("rate must be greater than -1");
  }

  const r1 = 1 + rate;
  let discount = 1;
  let total = 0;
  cashflows.forEach((value, t) => {
    assertFiniteNumber(value, `cashflows[${t}]`);
    if (t > 0) {
      discount *= r1;
    }
    total += value / discount;
  });
  return total;
}

/**
 * Per-period internal rate of return: Newton-Raphson from `guess`, falling
 * back to bracketing and bisection. Throws when the flows never change sign
 * or no root can be bracketed.
 */
export function irr(cashflows: readonly number[], guess = 0.1): number {
  assertCashflows(cashflows);
  assertFiniteNumber(guess, "guess");

  const f = (rate: number) => npv(rate, cashflows);
  const fPrime = (rate: number) => {
    const r1 = 1 + rate;
    let denom = r1 * r1;
    let total = 0;
    for (let t = 1; t < cashflows.length; t += 1) {
      total += (-t * (cashflows[t] ?? 0)) / denom;
      denom *= r1;
    }
    return total;
  };

  let rate = guess;
  for (let i = 0; i < MAX_NEWTON_ITERATIONS; i += 1) {
    rate = Math.max(rate, MIN_RATE);
    const value = f(rate);
    if (Math.abs(value) < SOLVER_TOLERANCE) {
      return rate;
    }
    const derivative = fPrime(rate);
    if (!Number.isFinite(derivative) || derivative === 0) {
      break;
    }
    const next = rate - value / derivative;
    if (!Number.isFinite(next)) {
      break;
    }
    if (Math.abs(next - rate) < SOLVER_TOLERANCE) {
      return next;
    }
    rate = next;
  }

  // Bracket + bisection fallback
  let low = MIN_RATE;
  let high = Math.max(guess, 0.1);
  const fLow = f(low);
  if (fLow === 0) {
    return low;
  }
  let fHigh = f(high);
  if (fHigh === 0) {
    return high;
  }

  const sLow = sign(fLow);
  let sHigh = sign(fHigh);
  for (let i = 0; i < 60 && sLow === sHigh; i += 1) {
    high = high < 1 ? 1 : high * 2;
    fHigh = f(high);
    if (fHigh === 0) {
      return high;
    }
    sHigh = sign(fHigh);
  }
  if (sLow === sHigh) {
    throw new Error("IRR could not be bracketed");
  }

  for (let i = 0; i < MAX_BISECTION_ITERATIONS; i += 1) {
    const mid = (low + high) / 2;
    const fMid = f(mid);
    if (Math.abs(fMid) < SOLVER_TOLERANCE) {
      return mid;
    }
    const sMid = sign(fMid);
    if (sMid === sLow) {
      low = mid;
    } else {
      high = mid;
    }
  }

  return (low + high) / 2;
}
