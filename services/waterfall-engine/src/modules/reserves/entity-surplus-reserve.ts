import type { EntityReserveInput } from "../../types/inputs.js";
import type { ReserveAccrual, ReserveMovement } from "../../types/results.js";
import { ReserveAccount } from "./reserve-account.js";

/**
 * Post-debt surplus deposit. Has no target; dividends are drawn from it.
 */
export class EntitySurplusReserve extends ReserveAccount {
  constructor(input: EntityReserveInput) {
    super("entity_reserve", input.rate, input.opening_balance ?? 0);
  }

  accrue(period: number): ReserveAccrual {
    return this.openPeriod(period, 0);
  }

  payDividend(amount: number): number {
    return this.withdraw(amount);
  }

  protected toMovement(movement: ReserveMovement): ReserveMovement {
    return movement;
  }
}
