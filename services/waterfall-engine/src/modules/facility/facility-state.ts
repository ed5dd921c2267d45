import { pmt, semiAnnualRate, TOLERANCE } from "../../core/math-utils.js";
import { SequenceError } from "../../core/errors.js";
import type { AmortizationProfile, FacilityInput, FacilityKind } from "../../types/inputs.js";
import type { FacilityPeriod, FacilityPhase, FacilitySchedule } from "../../types/results.js";

export interface FinalizeResult {
  applied: number;
  excess: number;
  period: FacilityPeriod;
}

/**
 * Amortization state of one debt tranche.
 *
 * Each period is driven in two steps: `computePeriod` produces the scheduled
 * figures (IDC during grace, interest and principal afterwards), then
 * `finalizePeriod` applies any acceleration and re-derives the remaining
 * payment so the balance still reaches zero at `maturityPeriod`.
 */
export class FacilityState {
  readonly id: string;
  readonly kind: FacilityKind;
  readonly rate: number;
  readonly periodRate: number;
  readonly profile: AmortizationProfile;
  readonly accelerable: boolean;
  readonly gracePeriods: number;
  readonly repayments: number;
  readonly maturityPeriod: number;

  private readonly drawDowns: readonly number[];
  private balance: number;
  private nextPeriod = 0;
  // Annuity payment, or constant principal instalment
  private payment: number | null = null;
  private pending: FacilityPeriod | null = null;
  private readonly history: FacilityPeriod[] = [];

  constructor(input: FacilityInput) {
    this.id = input.id;
    this.kind = input.kind;
    this.rate = input.rate;
    this.periodRate = semiAnnualRate(input.rate);
    this.profile = input.profile ?? "annuity";
    this.accelerable = input.accelerable ?? true;
    this.gracePeriods = input.grace_periods;
    this.repayments = input.repayments;
    this.maturityPeriod = input.grace_periods + input.repayments - 1;
    this.drawDowns = input.draw_downs;
    this.balance = input.opening_balance ?? 0;
  }

  get outstanding(): number {
    return this.balance;
  }

  get schedule(): readonly FacilityPeriod[] {
    return this.history;
  }

  computePeriod(period: number): FacilityPeriod {
    if (this.pending) {
      throw new SequenceError(`${this.id}: period ${this.pending.period} was not finalized`);
    }
    if (period !== this.nextPeriod) {
      throw new SequenceError(`${this.id}: expected period ${this.nextPeriod}, received ${period}`);
    }

    const opening = this.balance;
    const drawDown = this.drawDowns[period] ?? 0;
    const interest = opening * this.periodRate;
    const phase = this.phaseOf(period, opening);

    let idc = 0;
    let interestPaid = 0;
    let principal = 0;

    if (phase === "construction") {
      idc = interest;
    } else if (phase === "repayment") {
      if (this.payment === null) {
        this.payment = this.derivePayment(opening, this.maturityPeriod - period + 1);
      }
      interestPaid = interest;
      principal = this.scheduledPrincipal(period, opening);
    }

    const preAcceleration = opening + drawDown + idc - principal;
    this.pending = {
      period,
      phase,
      opening_balance: opening,
      draw_down: drawDown,
      interest_accrued: interest,
      idc,
      interest_paid: interestPaid,
      principal_paid: principal,
      total_debt_service: interestPaid + principal,
      pre_acceleration_closing_balance: preAcceleration,
      acceleration: 0,
      closing_balance: preAcceleration,
    };
    return this.pending;
  }

  finalizePeriod(period: number, acceleration: number): FinalizeResult {
    const pending = this.pending;
    if (!pending || pending.period !== period) {
      throw new SequenceError(`${this.id}: period ${period} was not computed`);
    }

    const requested = Math.max(acceleration, 0);
    const applied = Math.min(requested, pending.pre_acceleration_closing_balance);
    const excess = requested - applied;
    const closing = pending.pre_acceleration_closing_balance - applied;

    const finalized: FacilityPeriod = { ...pending, acceleration: applied, closing_balance: closing };
    this.history.push(finalized);
    this.pending = null;
    this.balance = closing;
    this.nextPeriod = period + 1;

    // Re-amortize over the unchanged maturity
    if (applied > 0 && period >= this.gracePeriods && period < this.maturityPeriod) {
      this.payment = this.derivePayment(closing, this.maturityPeriod - period);
    }

    return { applied, excess, period: finalized };
  }

  /**
   * Scheduled interest + principal for the period after the last finalized
   * one, without advancing state. Zero during grace, after maturity, or once
   * the balance is repaid.
   */
  nextDebtServiceEstimate(): number {
    const period = this.nextPeriod;
    const opening = this.balance;
    if (this.phaseOf(period, opening) !== "repayment") {
      return 0;
    }
    return opening * this.periodRate + this.scheduledPrincipal(period, opening);
  }

  toSchedule(): FacilitySchedule {
    return {
      facility_id: this.id,
      kind: this.kind,
      rate: this.rate,
      maturity_period: this.maturityPeriod,
      schedule: [...this.history],
    };
  }

  private phaseOf(period: number, opening: number): FacilityPhase {
    if (period < this.gracePeriods) {
      return "construction";
    }
    if (period > this.maturityPeriod || opening <= 0) {
      return "retired";
    }
    return "repayment";
  }

  private scheduledPrincipal(period: number, opening: number): number {
    if (period >= this.maturityPeriod || opening <= TOLERANCE) {
      return opening;
    }

    const payment = this.payment ?? this.derivePayment(opening, this.maturityPeriod - period + 1);

    if (this.profile === "constant_principal") {
      return Math.min(payment, opening);
    }
    return Math.min(Math.max(payment - opening * this.periodRate, 0), opening);
  }

  private derivePayment(balance: number, remainingPeriods: number): number {
    if (remainingPeriods <= 0 || balance <= 0) {
      return 0;
    }
    if (this.profile === "constant_principal") {
      return balance / remainingPeriods;
    }
    return -pmt(this.periodRate, remainingPeriods, balance);
  }
}
