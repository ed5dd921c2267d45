import { describe, expect, it } from "vitest";

import { consolidate, summarizeDscr } from "../../src/modules/consolidation/holding.js";
import { runEntity } from "../../src/modules/entity/entity-loop.js";
import { runModel } from "../../src/modules/intercompany/orchestrator.js";
import { Timeline } from "../../src/core/timeline.js";
import type { EntityResult, FacilityPeriod } from "../../src/types/results.js";
import { minimalEntity, modelInputs } from "../helpers/entities.js";

const link = { id: "alpha_to_beta", lender: "alpha", borrower: "beta", rate: 0.1 };

function group() {
  return modelInputs(
    4,
    [
      minimalEntity("alpha", 4, {
        revenue: [100, 100, 100, 100],
        intercompany_sales: [{ counterparty: "beta", amounts: [10, 0, 0, 0] }],
      }),
      minimalEntity("beta", 4, { revenue: [0, 0, 50, 0], opex: [30, 0, 0, 0] }),
    ],
    [link],
  );
}

describe("consolidate", () => {
  it("eliminates intercompany sales against the buyer's opex", () => {
    const { holding } = runModel(group());

    expect(holding.periods[0]).toMatchObject({
      revenue: 90,
      opex: 20,
      ebitda: 70,
      intercompany_sales_eliminated: 10,
    });
    expect(holding.periods[1]?.intercompany_sales_eliminated).toBe(0);
  });

  it("eliminates intercompany interest and overdraft balances", () => {
    const { holding } = runModel(group());
    const period = holding.periods[1];

    expect(period?.intercompany_interest).toBe(0);
    expect(period?.intercompany_interest_eliminated).toBe(1.5);
    expect(period?.intercompany_receivable_eliminated).toBe(31.5);
    expect(period?.intercompany_payable_eliminated).toBe(31.5);
    expect(holding.periods.map((row) => row.net_overdraft)).toEqual([0, 0, 0, 0]);
    expect(holding.overdraftNetsToZero).toBe(true);
  });

  it("reports third-party assets and debt only", () => {
    const { holding } = runModel(group());

    expect(holding.periods[0]).toMatchObject({ total_assets: 70, total_debt: 0, equity: 70, reserves: 70 });
  });

  it("rolls flows up by year", () => {
    const { holding } = runModel(group());

    expect(holding.annual.revenue).toEqual([190, 250]);
    expect(holding.annual.intercompany_sales_eliminated).toEqual([10, 0]);
  });

  it("keeps sales to an entity outside the scope", () => {
    const inputs = group();
    const timeline = new Timeline({ startDate: "2026-01-01", periods: 4 });
    const [seller] = inputs.entities;
    if (!seller) {
      throw new Error("fixture has no seller");
    }
    const result = runEntity(seller, { timeline, currency: "EUR" });

    const holding = consolidate([result], { links: [], entities: [seller] });

    expect(holding.periods[0]?.revenue).toBe(100);
    expect(holding.periods[0]?.intercompany_sales_eliminated).toBe(0);
  });

  it("keeps a lender's overdraft when its borrower is out of scope", () => {
    const inputs = group();
    const model = runModel(inputs);
    const lender = model.entities.alpha;
    const [alphaInput] = inputs.entities;
    if (!lender || !alphaInput) {
      throw new Error("fixture has no lender");
    }

    const holding = consolidate([lender], { links: [], entities: [alphaInput] });

    expect(holding.periods[1]).toMatchObject({
      intercompany_interest: 1.5,
      intercompany_interest_eliminated: 0,
      intercompany_receivable_eliminated: 0,
      intercompany_payable_eliminated: 0,
      total_assets: 201.5,
      equity: 201.5,
    });
  });

  it("returns an empty view when no entity succeeded", () => {
    const holding = consolidate([], { links: [], entities: [] });

    expect(holding.periods).toEqual([]);
    expect(holding.facilities).toEqual([]);
    expect(holding.dscr).toEqual({ points: [], minimum: null, weighted_average: null });
  });
});

describe("summarizeDscr", () => {
  function result(ebitda: number[], tax: number[], debtService: number[]): EntityResult {
    const timeline = new Timeline({ startDate: "2026-01-01", periods: ebitda.length });
    const base = runEntity(minimalEntity("solo", ebitda.length), { timeline, currency: "EUR" });
    return {
      ...base,
      pnl: base.pnl.map((row, period) => ({ ...row, ebitda: ebitda[period] ?? 0, tax: tax[period] ?? 0 })),
      facilities: [
        {
          facility_id: "senior",
          kind: "senior",
          rate: 0.05,
          maturity_period: debtService.length - 1,
          schedule: debtService.map((total, period): FacilityPeriod => ({
            period,
            phase: "repayment",
            opening_balance: 0,
            draw_down: 0,
            interest_accrued: 0,
            idc: 0,
            interest_paid: 0,
            principal_paid: total,
            total_debt_service: total,
            pre_acceleration_closing_balance: 0,
            acceleration: 0,
            closing_balance: 0,
          })),
        },
      ],
    };
  }

  it("divides EBITDA less tax by scheduled debt service", () => {
    const summary = summarizeDscr([result([300, 260, 500], [50, 60, 0], [0, 100, 200])]);

    expect(summary.points.map((p) => [p.period, p.cfads, p.debt_service, p.dscr])).toEqual([
      [1, 200, 100, 2],
      [2, 500, 200, 2.5],
    ]);
    expect(summary.minimum).toBe(2);
    expect(summary.weighted_average).toBe(700 / 300);
  });

  it("ignores periods without debt service", () => {
    const summary = summarizeDscr([result([300, 300], [0, 0], [0, 0.005])]);

    expect(summary.points).toEqual([]);
    expect(summary.minimum).toBeNull();
  });
});
