import { describe, expect, it } from "vitest";

import { buildAccrual } from "../../src/modules/reserves/reserve-account.js";
import {
  allocateWaterfall,
  rankInstruments,
  type WaterfallFacilityInput,
  type WaterfallInputs,
} from "../../src/modules/waterfall/waterfall-allocator.js";

function inputs(overrides: Partial<WaterfallInputs> = {}): WaterfallInputs {
  return {
    period: 5,
    ebitda: 0,
    tax: 0,
    openingCash: 0,
    openingShortfall: 0,
    constructionFunding: 0,
    inflows: [],
    facilities: [],
    opsReserve: buildAccrual(0, 0, 0),
    dsra: buildAccrual(0, 0, 0),
    mezzanineDividend: null,
    entityReserve: buildAccrual(0, 0, 0),
    lending: [],
    borrowing: [],
    sweepPct: 1,
    dividendPolicy: { enabled: false, startPeriod: 0, payoutPct: 0, requireDebtFree: false },
    ...overrides,
  };
}

function facility(overrides: Partial<WaterfallFacilityInput> & { facilityId: string }): WaterfallFacilityInput {
  return {
    kind: "senior",
    rate: 0.05,
    scheduledDebtService: 0,
    balance: 0,
    accelerable: true,
    ...overrides,
  };
}

describe("allocateWaterfall", () => {
  describe("special pool", () => {
    it("pays senior debt service then accelerates senior regardless of the DSRA gate", () => {
      const row = allocateWaterfall(
        inputs({
          inflows: [{ source: "capital_grant", amount: 3_000_000, bypassesDsraGate: true }],
          facilities: [facility({ facilityId: "senior", scheduledDebtService: 500_000, balance: 9_000_000 })],
          dsra: buildAccrual(0, 0, 1_000_000),
        }),
      );

      expect(row.special_pool).toBe(3_000_000);
      expect(row.facilities[0]?.paid_from_special).toBe(500_000);
      expect(row.facilities[0]?.paid_from_normal).toBe(0);
      expect(row.special_acceleration).toBe(2_500_000);
      expect(row.debt_service_paid).toBe(500_000);
      expect(row.dsra_fill).toBe(0);
      expect(row.dsra_funded).toBe(false);
      expect(row.unmet.dsra_gap).toBe(1_000_000);
      expect(row.surplus_acceleration).toBe(0);
      expect(row.closing_cash).toBe(0);
    });

    it("returns special cash the senior facility cannot absorb to the normal pool", () => {
      const row = allocateWaterfall(
        inputs({
          inflows: [{ source: "capital_grant", amount: 700, bypassesDsraGate: true }],
          facilities: [facility({ facilityId: "senior", scheduledDebtService: 100, balance: 400, accelerable: false })],
        }),
      );

      expect(row.special_acceleration).toBe(400);
      expect(row.entity_reserve_fill).toBe(200);
      expect(row.closing_cash).toBe(0);
    });

    it("keeps ordinary inflows in the normal pool", () => {
      const row = allocateWaterfall(
        inputs({
          ebitda: 1000,
          tax: 200,
          inflows: [{ source: "vat_refund", amount: 300, bypassesDsraGate: false }],
        }),
      );

      expect(row.normal_inflows).toBe(300);
      expect(row.normal_pool).toBe(1100);
      expect(row.special_pool).toBe(0);
    });
  });

  describe("scheduled debt service", () => {
    it("is always paid and an uncovered part is carried as a shortfall", () => {
      const row = allocateWaterfall(
        inputs({
          ebitda: 100_000,
          facilities: [facility({ facilityId: "senior", scheduledDebtService: 300_000, balance: 1_000_000 })],
        }),
      );

      expect(row.debt_service_paid).toBe(300_000);
      expect(row.unmet.debt_service).toBe(200_000);
      expect(row.deficit).toBe(200_000);
      expect(row.closing_cash).toBe(0);
      expect(row.closing_shortfall).toBe(200_000);
      expect(row.unmet.cash_shortfall).toBe(200_000);
      expect(row.surplus_acceleration).toBe(0);
    });

    it("reports only the incremental deficit when a shortfall is carried in", () => {
      const row = allocateWaterfall(inputs({ ebitda: 100_000, openingShortfall: 200_000 }));

      expect(row.opening_shortfall).toBe(200_000);
      expect(row.closing_cash).toBe(0);
      expect(row.closing_shortfall).toBe(100_000);
      expect(row.deficit).toBe(0);
    });

    it("settles a carried shortfall before filling reserves", () => {
      const row = allocateWaterfall(
        inputs({ ebitda: 300, openingShortfall: 200, opsReserve: buildAccrual(0, 0, 150) }),
      );

      expect(row.closing_shortfall).toBe(0);
      expect(row.ops_reserve_fill).toBe(100);
      expect(row.closing_cash).toBe(0);
    });
  });

  describe("reserves", () => {
    it("fills the operating reserve before the DSRA", () => {
      const row = allocateWaterfall(
        inputs({
          ebitda: 120,
          opsReserve: buildAccrual(0, 0, 100),
          dsra: buildAccrual(0, 0, 50),
        }),
      );

      expect(row.ops_reserve_fill).toBe(100);
      expect(row.dsra_fill).toBe(20);
      expect(row.unmet.dsra_gap).toBe(30);
    });

    it("releases DSRA excess instead of filling", () => {
      const row = allocateWaterfall(inputs({ dsra: buildAccrual(550_000, 0, 500_000) }));

      expect(row.dsra_release).toBe(50_000);
      expect(row.dsra_fill).toBe(0);
      expect(row.dsra_funded).toBe(true);
      expect(row.entity_reserve_fill).toBe(50_000);
    });

    it("sums reserve interest in a fixed order", () => {
      const row = allocateWaterfall(
        inputs({
          opsReserve: buildAccrual(100, 1, 0),
          dsra: buildAccrual(100, 2, 0),
          mezzanineDividend: { accrual: buildAccrual(100, 8, 0), payoutDue: false },
          entityReserve: buildAccrual(100, 4, 0),
        }),
      );

      expect(row.reserve_interest).toBe(15);
    });
  });

  describe("DSRA gate", () => {
    it("holds back discretionary cash while the DSRA is short", () => {
      const row = allocateWaterfall(
        inputs({
          dsra: buildAccrual(0, 0, 150_000),
          borrowing: [{ linkId: "ic", rate: 0.05, balance: 0, received: 80_000 }],
          facilities: [facility({ facilityId: "senior", balance: 1_000_000 })],
        }),
      );

      expect(row.dsra_funded).toBe(false);
      expect(row.accelerations).toEqual([]);
      expect(row.entity_reserve_fill).toBe(0);
      expect(row.closing_cash).toBe(80_000);
    });

    it("releases the same cash to acceleration once funded", () => {
      const row = allocateWaterfall(
        inputs({
          borrowing: [{ linkId: "ic", rate: 0.05, balance: 0, received: 80_000 }],
          facilities: [facility({ facilityId: "senior", rate: 0.06, balance: 1_000_000 })],
        }),
      );

      expect(row.dsra_funded).toBe(true);
      expect(row.accelerations).toEqual([
        { instrument_id: "senior", instrument: "facility", rate: 0.06, amount: 80_000 },
      ]);
      expect(row.closing_cash).toBe(0);
    });
  });

  describe("surplus acceleration", () => {
    it("pays the most expensive instrument first and cascades the remainder", () => {
      const row = allocateWaterfall(
        inputs({
          ebitda: 50_000,
          facilities: [
            facility({ facilityId: "secondary", kind: "secondary_currency", rate: 0.1, balance: 500_000 }),
            facility({ facilityId: "mezz", kind: "mezzanine", rate: 0.12, balance: 30_000 }),
          ],
        }),
      );

      expect(row.accelerations.map((a) => [a.instrument_id, a.amount])).toEqual([
        ["mezz", 30_000],
        ["secondary", 20_000],
      ]);
      expect(row.facilities[1]?.surplus_acceleration).toBe(30_000);
      expect(row.facilities[0]?.surplus_acceleration).toBe(20_000);
      expect(row.entity_reserve_fill).toBe(0);
      expect(row.closing_cash).toBe(0);
    });

    it("applies the sweep percentage to what remains at each instrument", () => {
      const row = allocateWaterfall(
        inputs({
          ebitda: 100_000,
          sweepPct: 0.5,
          facilities: [
            facility({ facilityId: "a", rate: 0.08, balance: 1_000_000 }),
            facility({ facilityId: "b", kind: "mezzanine", rate: 0.05, balance: 1_000_000 }),
          ],
        }),
      );

      expect(row.accelerations.map((a) => a.amount)).toEqual([50_000, 25_000]);
      expect(row.closing_cash).toBe(25_000);
    });

    it("repays the intercompany overdraft as an instrument", () => {
      const row = allocateWaterfall(
        inputs({
          ebitda: 1000,
          borrowing: [{ linkId: "ic", rate: 0.05, balance: 600, received: 0 }],
        }),
      );

      expect(row.accelerations).toEqual([{ instrument_id: "ic", instrument: "overdraft", rate: 0.05, amount: 600 }]);
      expect(row.intercompany).toEqual([
        { link_id: "ic", role: "borrower", lent: 0, received: 0, repaid: 600, repayment_received: 0 },
      ]);
      expect(row.entity_reserve_fill).toBe(400);
      expect(row.closing_cash).toBe(0);
    });
  });

  describe("rankInstruments", () => {
    it("orders by rate with facilities ahead of overdrafts on ties", () => {
      const ranked = rankInstruments({
        facilities: [
          facility({ facilityId: "a", rate: 0.05, balance: 100 }),
          facility({ facilityId: "b", kind: "mezzanine", rate: 0.07, balance: 100 }),
          facility({ facilityId: "locked", kind: "mezzanine", rate: 0.09, balance: 100, accelerable: false }),
        ],
        borrowing: [{ linkId: "ic", rate: 0.05, balance: 100, received: 0 }],
      });

      expect(ranked.map((i) => i.id)).toEqual(["b", "a", "ic"]);
    });

    it("excludes the senior balance already accelerated from the special pool", () => {
      const ranked = rankInstruments(
        { facilities: [facility({ facilityId: "senior", balance: 1000 })], borrowing: [] },
        1000,
      );

      expect(ranked).toEqual([]);
    });
  });

  describe("intercompany", () => {
    it("lends up to the borrower's demand from available cash", () => {
      const row = allocateWaterfall(
        inputs({
          ebitda: 100_000,
          lending: [{ linkId: "ic", demand: 30_000, committed: null, repaymentReceived: 0 }],
        }),
      );

      expect(row.intercompany[0]?.lent).toBe(30_000);
      expect(row.entity_reserve_fill).toBe(70_000);
    });

    it("lends the committed amount when settling and books repayments received", () => {
      const row = allocateWaterfall(
        inputs({
          ebitda: 100_000,
          lending: [{ linkId: "ic", demand: 30_000, committed: 45_000, repaymentReceived: 10_000 }],
        }),
      );

      expect(row.intercompany[0]).toEqual({
        link_id: "ic",
        role: "lender",
        lent: 45_000,
        received: 0,
        repaid: 0,
        repayment_received: 10_000,
      });
      expect(row.entity_reserve_fill).toBe(65_000);
    });
  });

  describe("mezzanine dividend reserve", () => {
    it("funds toward the liability and blocks dividends while short", () => {
      const row = allocateWaterfall(
        inputs({
          ebitda: 3000,
          mezzanineDividend: { accrual: buildAccrual(0, 0, 5000), payoutDue: false },
          entityReserve: buildAccrual(1000, 0, 0),
          dividendPolicy: { enabled: true, startPeriod: 0, payoutPct: 1, requireDebtFree: false },
        }),
      );

      expect(row.mezzanine_dividend_fill).toBe(3000);
      expect(row.unmet.mezzanine_dividend_gap).toBe(2000);
      expect(row.dividend).toBe(0);
    });

    it("fills the gap then pays the whole reserve out once due", () => {
      const row = allocateWaterfall(
        inputs({
          ebitda: 3000,
          mezzanineDividend: { accrual: buildAccrual(4000, 0, 5000), payoutDue: true },
        }),
      );

      expect(row.mezzanine_dividend_fill).toBe(1000);
      expect(row.mezzanine_dividend_payout).toBe(5000);
      expect(row.unmet.mezzanine_dividend_gap).toBe(0);
      expect(row.closing_cash).toBe(0);
      expect(row.entity_reserve_fill).toBe(2000);
    });

    it("keeps an unfunded payout owed and holds back dividends", () => {
      const row = allocateWaterfall(
        inputs({
          ebitda: 500,
          mezzanineDividend: { accrual: buildAccrual(4000, 0, 5000), payoutDue: true },
          entityReserve: buildAccrual(1000, 0, 0),
          dividendPolicy: { enabled: true, startPeriod: 0, payoutPct: 1, requireDebtFree: false },
        }),
      );

      expect(row.mezzanine_dividend_fill).toBe(500);
      expect(row.mezzanine_dividend_payout).toBe(4500);
      expect(row.unmet.mezzanine_dividend_gap).toBe(500);
      expect(row.entity_reserve_fill).toBe(0);
      expect(row.dividend).toBe(0);
    });
  });

  describe("dividends", () => {
    const policy = { enabled: true, startPeriod: 0, payoutPct: 0.5, requireDebtFree: true };

    it("pays a share of the entity reserve once debt free", () => {
      const row = allocateWaterfall(
        inputs({ ebitda: 400, entityReserve: buildAccrual(1000, 0, 0), dividendPolicy: policy }),
      );

      expect(row.entity_reserve_fill).toBe(400);
      expect(row.dividend).toBe(700);
    });

    it("pays nothing while debt is outstanding if required", () => {
      const row = allocateWaterfall(
        inputs({
          entityReserve: buildAccrual(1000, 0, 0),
          facilities: [facility({ facilityId: "senior", balance: 500, accelerable: false })],
          dividendPolicy: policy,
        }),
      );

      expect(row.dividend).toBe(0);
    });

    it("waits for the start period", () => {
      const row = allocateWaterfall(
        inputs({
          period: 2,
          entityReserve: buildAccrual(1000, 0, 0),
          dividendPolicy: { ...policy, startPeriod: 3 },
        }),
      );

      expect(row.dividend).toBe(0);
    });
  });

  it("does not mutate its inputs", () => {
    const frozen = inputs({
      ebitda: 50_000,
      facilities: [facility({ facilityId: "mezz", kind: "mezzanine", rate: 0.12, balance: 30_000 })],
    });
    const copy = structuredClone(frozen);
    allocateWaterfall(frozen);

    expect(frozen).toEqual(copy);
  });
});
