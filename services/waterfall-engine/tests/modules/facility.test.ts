import { describe, expect, it } from "vitest";

import { SequenceError } from "../../src/core/errors.js";
import { FacilityState } from "../../src/modules/facility/facility-state.js";
import type { FacilityInput } from "../../src/types/inputs.js";

function facility(overrides: Partial<FacilityInput> = {}): FacilityState {
  return new FacilityState({
    id: "senior",
    kind: "senior",
    rate: 0,
    grace_periods: 1,
    repayments: 4,
    draw_downs: [1000, 0, 0, 0, 0, 0],
    ...overrides,
  });
}

function runPeriods(state: FacilityState, accelerations: number[]): void {
  accelerations.forEach((acceleration, period) => {
    state.computePeriod(period);
    state.finalizePeriod(period, acceleration);
  });
}

function runRange(state: FacilityState, from: number, to: number): void {
  for (let period = from; period <= to; period += 1) {
    state.computePeriod(period);
    state.finalizePeriod(period, 0);
  }
}

describe("FacilityState", () => {
  it("derives maturity from grace and repayments", () => {
    const state = facility();
    expect(state.maturityPeriod).toBe(4);
    expect(state.profile).toBe("annuity");
    expect(state.accelerable).toBe(true);
  });

  describe("construction", () => {
    it("adds draw-downs and capitalises interest as IDC", () => {
      const state = facility({ rate: 0.1, grace_periods: 2, draw_downs: [1000, 500, 0, 0, 0, 0] });
      runPeriods(state, [0]);
      const period = state.computePeriod(1);

      expect(period.phase).toBe("construction");
      expect(period.interest_accrued).toBe(50);
      expect(period.idc).toBe(50);
      expect(period.interest_paid).toBe(0);
      expect(period.total_debt_service).toBe(0);
      expect(period.pre_acceleration_closing_balance).toBe(1550);
    });

    it("has no debt service estimate during grace", () => {
      expect(facility().nextDebtServiceEstimate()).toBe(0);
    });
  });

  describe("repayment", () => {
    it("pays a level annuity and retires at maturity", () => {
      const state = facility();
      runPeriods(state, [0, 0, 0, 0, 0, 0]);
      const schedule = state.schedule;

      expect(schedule.map((p) => p.principal_paid)).toEqual([0, 250, 250, 250, 250, 0]);
      expect(schedule.map((p) => p.closing_balance)).toEqual([1000, 750, 500, 250, 0, 0]);
      expect(schedule[5]?.phase).toBe("retired");
    });

    it("pays interest in cash at the periodic rate", () => {
      const state = facility({ rate: 0.1, grace_periods: 1, repayments: 2, draw_downs: [1000, 0, 0, 0] });
      runPeriods(state, [0]);
      const first = state.computePeriod(1);

      expect(first.interest_paid).toBe(50);
      expect(first.idc).toBe(0);
      expect(first.total_debt_service).toBeCloseTo(537.804878, 6);
      expect(first.principal_paid).toBeCloseTo(487.804878, 6);

      state.finalizePeriod(1, 0);
      const last = state.computePeriod(2);
      expect(last.total_debt_service).toBeCloseTo(537.804878, 6);
      expect(last.pre_acceleration_closing_balance).toBe(0);
    });

    it("amortizes constant principal on a pre-existing balance", () => {
      const state = facility({
        rate: 0.1,
        grace_periods: 0,
        repayments: 4,
        opening_balance: 1000,
        profile: "constant_principal",
        draw_downs: [0, 0, 0, 0],
      });
      const period = state.computePeriod(0);

      expect(period.interest_paid).toBe(50);
      expect(period.principal_paid).toBe(250);
      expect(period.total_debt_service).toBe(300);
    });
  });

  describe("acceleration", () => {
    it("re-amortizes the remaining balance over the unchanged maturity", () => {
      const state = facility();
      runPeriods(state, [0, 150]);

      expect(state.outstanding).toBe(600);
      expect(state.nextDebtServiceEstimate()).toBe(200);

      runRange(state, 2, 5);
      expect(state.schedule.map((p) => p.closing_balance)).toEqual([1000, 600, 400, 200, 0, 0]);
    });

    it("re-derives a constant principal instalment", () => {
      const state = facility({
        rate: 0.1,
        grace_periods: 0,
        repayments: 4,
        opening_balance: 1000,
        profile: "constant_principal",
        draw_downs: [0, 0, 0, 0],
      });
      state.computePeriod(0);
      state.finalizePeriod(0, 150);
      const next = state.computePeriod(1);

      expect(next.opening_balance).toBe(600);
      expect(next.principal_paid).toBe(200);
      expect(next.interest_paid).toBe(30);
    });

    it("clamps to the balance and reports the excess", () => {
      const state = facility();
      runPeriods(state, [0, 0]);
      state.computePeriod(2);
      const result = state.finalizePeriod(2, 10_000);

      expect(result.applied).toBe(500);
      expect(result.excess).toBe(9500);
      expect(result.period.closing_balance).toBe(0);

      const after = state.computePeriod(3);
      expect(after.phase).toBe("retired");
      expect(after.total_debt_service).toBe(0);
    });
  });

  describe("sequencing", () => {
    it("rejects periods out of order", () => {
      expect(() => facility().computePeriod(1)).toThrow(SequenceError);
    });

    it("rejects computing twice without finalizing", () => {
      const state = facility();
      state.computePeriod(0);
      expect(() => state.computePeriod(0)).toThrow("senior: period 0 was not finalized");
    });

    it("rejects finalizing a period that was never computed", () => {
      expect(() => facility().finalizePeriod(0, 0)).toThrow("senior: period 0 was not computed");
    });
  });

  it("exports its schedule", () => {
    const state = facility();
    runPeriods(state, [0, 0]);
    const schedule = state.toSchedule();

    expect(schedule.facility_id).toBe("senior");
    expect(schedule.kind).toBe("senior");
    expect(schedule.maturity_period).toBe(4);
    expect(schedule.schedule).toHaveLength(2);
  });
});
