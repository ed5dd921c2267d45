import { positive } from "../../core/math-utils.js";
import type { DepreciationInput } from "../../types/inputs.js";

/**
 * Half-year depreciation on capitalised cost (capex plus IDC).
 *
 * straight_line spreads cost over `useful_life_years`; accelerated applies
 * `annual_rates[y]` to cost in the y-th year after depreciation starts. Both
 * split each annual charge equally across the two halves and never take the
 * net book value below zero.
 */
export class DepreciationSchedule {
  private readonly startPeriod: number;
  private accumulated = 0;

  constructor(
    private readonly input: DepreciationInput,
    defaultStartPeriod: number,
  ) {
    this.startPeriod = input.start_period ?? defaultStartPeriod;
  }

  get accumulatedDepreciation(): number {
    return this.accumulated;
  }

  charge(period: number, capitalisedCost: number): number {
    if (period < this.startPeriod) {
      return 0;
    }

    let annual = 0;
    if (this.input.method === "straight_line") {
      const life = this.input.useful_life_years ?? 0;
      annual = life > 0 ? capitalisedCost / life : 0;
    } else {
      const year = Math.floor((period - this.startPeriod) / 2);
      annual = capitalisedCost * (this.input.annual_rates?.[year] ?? 0);
    }

    const amount = Math.min(annual / 2, positive(capitalisedCost - this.accumulated));
    this.accumulated += amount;
    return amount;
  }
}
