import { positive, semiAnnualRate } from "../../core/math-utils.js";
import { SequenceError } from "../../core/errors.js";
import type { ReserveAccrual, ReserveMovement } from "../../types/results.js";

export function buildAccrual(openingBalance: number, interest: number, target: number): ReserveAccrual {
  const balanceAfterInterest = openingBalance + interest;
  return {
    opening_balance: openingBalance,
    interest_earned: interest,
    balance_after_interest: balanceAfterInterest,
    target_balance: target,
    funding_gap: positive(target - balanceAfterInterest),
    releasable_excess: positive(balanceAfterInterest - target),
  };
}

interface OpenPeriod {
  period: number;
  accrual: ReserveAccrual;
  filled: number;
  released: number;
  paidOut: number;
}

/**
 * Interest-bearing cash account held by an entity. A period is opened by the
 * variant's `accrue` (interest credited, target set), mutated by the
 * waterfall's fills and releases, then closed with `closePeriod`.
 */
export abstract class ReserveAccount<M extends ReserveMovement = ReserveMovement> {
  protected balance: number;
  protected readonly periodRate: number;
  protected current: OpenPeriod | null = null;
  protected readonly movements: M[] = [];

  protected constructor(
    readonly name: string,
    annualRate: number,
    openingBalance = 0,
  ) {
    this.periodRate = semiAnnualRate(annualRate);
    this.balance = openingBalance;
  }

  get currentBalance(): number {
    return this.balance;
  }

  get history(): readonly M[] {
    return this.movements;
  }

  fill(amount: number): number {
    const applied = positive(amount);
    this.balance += applied;
    this.activePeriod().filled += applied;
    return applied;
  }

  release(amount: number): number {
    const applied = Math.min(positive(amount), this.balance);
    this.balance -= applied;
    this.activePeriod().released += applied;
    return applied;
  }

  closePeriod(): M {
    const active = this.activePeriod();
    const movement = this.toMovement({
      ...active.accrual,
      period: active.period,
      filled: active.filled,
      released: active.released,
      paid_out: active.paidOut,
      closing_balance: this.balance,
    });
    this.movements.push(movement);
    this.current = null;
    return movement;
  }

  protected openPeriod(period: number, target: number): ReserveAccrual {
    if (this.current) {
      throw new SequenceError(`${this.name}: period ${this.current.period} was not closed`);
    }
    const opening = this.balance;
    const interest = opening * this.periodRate;
    this.balance = opening + interest;
    const accrual = buildAccrual(opening, interest, target);
    this.current = { period, accrual, filled: 0, released: 0, paidOut: 0 };
    return accrual;
  }

  protected withdraw(amount: number): number {
    const applied = Math.min(positive(amount), this.balance);
    this.balance -= applied;
    this.activePeriod().paidOut += applied;
    return applied;
  }

  protected activePeriod(): OpenPeriod {
    if (!this.current) {
      throw new SequenceError(`${this.name}: no open period, call accrue() first`);
    }
    return this.current;
  }

  protected abstract toMovement(movement: ReserveMovement): M;
}
