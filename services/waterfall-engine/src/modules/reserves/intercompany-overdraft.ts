import { positive, semiAnnualRate } from "../../core/math-utils.js";
import { SequenceError } from "../../core/errors.js";
import type { OverdraftPeriod, OverdraftSchedule } from "../../types/results.js";

export type OverdraftRole = "lender" | "borrower";

/**
 * One side of an intercompany overdraft: an asset on the lender, a liability
 * on the borrower. Both sides apply the same per-period arithmetic (interest
 * on the opening balance, then advances, then repayments), so two objects fed
 * the same flows hold identical balances.
 */
export class IntercompanyOverdraft {
  readonly periodRate: number;
  private balance = 0;
  private current: OverdraftPeriod | null = null;
  private readonly history: OverdraftPeriod[] = [];

  constructor(
    readonly linkId: string,
    readonly role: OverdraftRole,
    readonly counterparty: string,
    readonly rate: number,
  ) {
    this.periodRate = semiAnnualRate(rate);
  }

  get outstanding(): number {
    return this.balance;
  }

  accrue(period: number): number {
    if (this.current) {
      throw new SequenceError(`${this.linkId}: period ${this.current.period} was not closed`);
    }
    const opening = this.balance;
    const interest = opening * this.periodRate;
    this.balance = opening + interest;
    this.current = {
      period,
      opening_balance: opening,
      interest,
      advanced: 0,
      repaid: 0,
      closing_balance: this.balance,
    };
    return interest;
  }

  /**
   * Lender side: cash lent. Borrower side: cash received.
   */
  advance(amount: number): number {
    const applied = positive(amount);
    this.balance += applied;
    this.active().advanced += applied;
    return applied;
  }

  repay(amount: number): number {
    const applied = Math.min(positive(amount), this.balance);
    this.balance -= applied;
    this.active().repaid += applied;
    return applied;
  }

  closePeriod(): OverdraftPeriod {
    const closed: OverdraftPeriod = { ...this.active(), closing_balance: this.balance };
    this.history.push(closed);
    this.current = null;
    return closed;
  }

  toSchedule(): OverdraftSchedule {
    return {
      link_id: this.linkId,
      role: this.role,
      counterparty: this.counterparty,
      rate: this.rate,
      schedule: [...this.history],
    };
  }

  private active(): OverdraftPeriod {
    if (!this.current) {
      throw new SequenceError(`${this.linkId}: no open period, call accrue() first`);
    }
    return this.current;
  }
}
