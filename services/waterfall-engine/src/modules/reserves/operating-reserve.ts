import { Series } from "../../core/series.js";
import { TOLERANCE } from "../../core/math-utils.js";
import type { OperatingReserveInput } from "../../types/inputs.js";
import type { ReserveAccrual, ReserveMovement } from "../../types/results.js";
import { ReserveAccount } from "./reserve-account.js";

/**
 * Operating-expense reserve sized to cover the coming period's opex.
 */
export class OperatingReserve extends ReserveAccount {
  private readonly coveragePct: number;
  private readonly opex: Series;

  constructor(input: OperatingReserveInput, opex: Series) {
    super("operating_reserve", input.rate, input.opening_balance ?? 0);
    this.coveragePct = input.coverage_pct;
    this.opex = opex;
  }

  accrue(period: number): ReserveAccrual {
    return this.openPeriod(period, this.targetFor(period));
  }

  /**
   * Coverage applied to next period's opex. While that is still near zero
   * (pre-revenue ramp) the first later non-zero opex is used instead; in the
   * final period the current opex is the basis.
   */
  targetFor(period: number): number {
    if (period + 1 >= this.opex.length) {
      return this.coveragePct * this.opex.at(period);
    }
    const next = this.opex.findNext(period + 1, TOLERANCE);
    return next < 0 ? 0 : this.coveragePct * this.opex.get(next);
  }

  protected toMovement(movement: ReserveMovement): ReserveMovement {
    return movement;
  }
}
