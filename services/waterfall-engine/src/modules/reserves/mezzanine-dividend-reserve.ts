import { positive, TOLERANCE } from "../../core/math-utils.js";
import type { MezzanineDividendReserveInput } from "../../types/inputs.js";
import type { MezzanineDividendMovement, ReserveAccrual, ReserveMovement } from "../../types/results.js";
import { ReserveAccount } from "./reserve-account.js";

/**
 * Fixed-deposit reserve that carries a separate dividend liability owed to the
 * mezzanine holder. The liability grows with the mezzanine opening balance
 * and is the reserve's target; the deposit itself earns interest.
 */
export class MezzanineDividendReserve extends ReserveAccount<MezzanineDividendMovement> {
  private readonly dividendRate: number;
  private liability = 0;
  private paidOut = false;

  constructor(input: MezzanineDividendReserveInput) {
    super("mezzanine_dividend_reserve", input.rate, input.opening_balance ?? 0);
    this.dividendRate = input.dividend_rate;
  }

  get accruedLiability(): number {
    return this.liability;
  }

  get isPaidOut(): boolean {
    return this.paidOut;
  }

  accrue(period: number, mezzanineOpeningBalance: number): ReserveAccrual {
    if (!this.paidOut && mezzanineOpeningBalance > TOLERANCE) {
      this.liability += (mezzanineOpeningBalance * this.dividendRate) / 2;
    }
    return this.openPeriod(period, this.liability);
  }

  /**
   * Due once the mezzanine facility has been repaid and a liability remains.
   */
  payoutDue(mezzanineOpeningBalance: number): boolean {
    return !this.paidOut && mezzanineOpeningBalance <= TOLERANCE && this.liability > TOLERANCE;
  }

  /**
   * Pays the whole deposit to the mezzanine holder. Whatever the deposit does
   * not cover stays owed and is paid out of later fills.
   */
  payout(): number {
    const amount = this.withdraw(this.balance);
    this.liability = positive(this.liability - amount);
    this.paidOut = this.liability <= TOLERANCE;
    return amount;
  }

  protected toMovement(movement: ReserveMovement): MezzanineDividendMovement {
    return { ...movement, liability: this.liability };
  }
}
