import { TOLERANCE } from "../../core/math-utils.js";
import type { DebtServiceReserveInput } from "../../types/inputs.js";
import type { ReserveAccrual, ReserveMovement } from "../../types/results.js";
import { ReserveAccount } from "./reserve-account.js";

/**
 * Senior debt service reserve. Whether it earns interest is a contract term:
 * with `accrues_interest: false` it is a segregated, non-interest cash account.
 */
export class DebtServiceReserve extends ReserveAccount {
  readonly accruesInterest: boolean;
  private target = 0;

  constructor(input: DebtServiceReserveInput) {
    super("dsra", input.accrues_interest ? input.rate ?? 0 : 0, input.opening_balance ?? 0);
    this.accruesInterest = input.accrues_interest;
  }

  /**
   * Sized to the next senior payment, never above the senior balance itself;
   * collapses to zero once the senior facility is repaid.
   */
  setTarget(nextSeniorDebtService: number, seniorBalance: number): number {
    this.target = seniorBalance <= TOLERANCE ? 0 : Math.min(nextSeniorDebtService, seniorBalance);
    return this.target;
  }

  accrue(period: number): ReserveAccrual {
    return this.openPeriod(period, this.target);
  }

  isFunded(): boolean {
    return this.balance >= this.target - TOLERANCE || this.target < TOLERANCE;
  }

  protected toMovement(movement: ReserveMovement): ReserveMovement {
    return movement;
  }
}
