import { describe, expect, it, vi } from "vitest";

import { IntercompanyAsymmetryError } from "../../src/core/errors.js";
import type { Logger } from "../../src/core/log.js";
import { runModel, type ModelResult } from "../../src/modules/intercompany/orchestrator.js";
import type { EntityInput } from "../../src/types/inputs.js";
import { loadFixture, minimalEntity, modelInputs } from "../helpers/entities.js";

const link = { id: "alpha_to_beta", lender: "alpha", borrower: "beta", rate: 0.1 };

function alpha(overrides: Partial<EntityInput> = {}): EntityInput {
  return minimalEntity("alpha", 4, { revenue: [100, 100, 100, 100], ...overrides });
}

// Short of 30 in period 0, able to repay from period 2
function beta(overrides: Partial<EntityInput> = {}): EntityInput {
  return minimalEntity("beta", 4, { revenue: [0, 0, 50, 0], opex: [30, 0, 0, 0], ...overrides });
}

function closingBalances(model: ModelResult, entityId: string): number[] {
  const overdraft = model.entities[entityId]?.overdrafts.find((o) => o.link_id === link.id);
  return overdraft?.schedule.map((row) => row.closing_balance) ?? [];
}

describe("runModel", () => {
  it("runs passes 1 through 4 for a material link that is repaid", () => {
    const model = runModel(modelInputs(4, [alpha(), beta()], [link]));

    expect(model.passes.map((p) => [p.pass, p.entity_id, p.link_id])).toEqual([
      [1, "alpha", null],
      [1, "beta", null],
      [2, "alpha", "alpha_to_beta"],
      [3, "beta", "alpha_to_beta"],
      [4, "alpha", "alpha_to_beta"],
    ]);
    expect(model.failures).toEqual([]);
    expect(model.entityOrder).toEqual(["alpha", "beta"]);

    const correction = model.corrections[0];
    expect(correction).toMatchObject({
      link_id: "alpha_to_beta",
      material: true,
      rerun: ["alpha", "beta", "alpha"],
      total_deficit: 30,
      total_lent: 30,
      settled: true,
    });
    expect(correction?.total_repaid).toBeCloseTo(33.075, 9);
  });

  it("lends the borrower's deficit and accrues interest on both sides", () => {
    const model = runModel(modelInputs(4, [alpha(), beta()], [link]));

    expect(model.entities.alpha?.lent.alpha_to_beta).toEqual([30, 0, 0, 0]);
    expect(model.entities.alpha?.pnl[1]?.intercompany_interest).toBe(1.5);
    expect(model.entities.beta?.pnl[1]?.intercompany_interest).toBe(-1.5);
    expect(model.entities.beta?.waterfall[0]?.closing_cash).toBe(0);
    expect(model.entities.beta?.repaid.alpha_to_beta?.[2]).toBeCloseTo(33.075, 9);
  });

  it("keeps the lender's asset equal to the borrower's liability", () => {
    const model = runModel(modelInputs(4, [alpha(), beta()], [link]));

    const asset = closingBalances(model, "alpha");
    expect(asset).toEqual(closingBalances(model, "beta"));
    expect(asset[0]).toBe(30);
    expect(asset[1]).toBe(31.5);
    expect(asset.slice(2)).toEqual([0, 0]);
    expect(model.holding.overdraftNetsToZero).toBe(true);
  });

  it("skips pass 4 when nothing is repaid", () => {
    const model = runModel(modelInputs(4, [alpha(), beta({ revenue: [0, 0, 0, 0] })], [link]));

    expect(model.passes.map((p) => p.pass)).toEqual([1, 1, 2, 3]);
    expect(model.corrections[0]?.settled).toBe(false);
    expect(model.corrections[0]?.total_repaid).toBe(0);

    const liability = closingBalances(model, "beta");
    expect(liability).toEqual(closingBalances(model, "alpha"));
    expect(liability[2]).toBeCloseTo(33.075, 9);
    expect(liability[3]).toBeCloseTo(34.72875, 9);
  });

  it("leaves immaterial deficits to the borrower", () => {
    const model = runModel(modelInputs(4, [alpha(), beta({ opex: [0.5, 0, 0, 0] })], [link]));

    expect(model.corrections[0]).toMatchObject({ material: false, rerun: [], total_deficit: 0.5 });
    expect(model.passes).toHaveLength(2);
    expect(model.entities.beta?.waterfall[0]?.closing_cash).toBe(0);
    expect(model.entities.beta?.balance_sheet[0]?.cash_shortfall).toBe(0.5);
    expect(model.entities.beta?.overdrafts).toEqual([]);
  });

  it("invalidates the borrower when the lender fails", () => {
    const error = vi.fn();
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error };

    const model = runModel(
      modelInputs(4, [alpha({ revenue: [100, Number.NaN, 100, 100] }), beta()], [link]),
      { logger },
    );

    expect(model.passes).toEqual([
      { pass: 1, entity_id: "alpha", link_id: null, succeeded: false },
      { pass: 1, entity_id: "beta", link_id: null, succeeded: true },
    ]);
    expect(model.failures.map((f) => f.entity_id)).toEqual(["alpha", "beta"]);
    expect(model.failures[1]?.error.message).toBe("lender alpha failed");
    expect(model.entityOrder).toEqual([]);
    expect(model.corrections).toEqual([]);
    expect(model.holding.periods).toEqual([]);
    expect(model.holding.dscr.minimum).toBeNull();
    expect(error).toHaveBeenCalledWith(
      "Entity run failed",
      expect.objectContaining({ entity: "alpha", pass: 1 }),
    );
  });

  describe("entity that borrows on one link and lends on another", () => {
    // x owes y from period 0 and lends to z in period 1; z repays x in period 2
    const chain = () =>
      modelInputs(
        4,
        [
          minimalEntity("y", 4, { revenue: [100, 100, 100, 100] }),
          minimalEntity("x", 4, { revenue: [0, 25, 0, 40], opex: [30, 0, 0, 0] }),
          minimalEntity("z", 4, { revenue: [0, 0, 30, 0], opex: [0, 20, 0, 0] }),
        ],
        [
          { id: "y_to_x", lender: "y", borrower: "x", rate: 0.1 },
          { id: "x_to_z", lender: "x", borrower: "z", rate: 0.1 },
        ],
      );
    const balances = (model: ModelResult, entityId: string, linkId: string) =>
      model.entities[entityId]?.overdrafts
        .find((o) => o.link_id === linkId)
        ?.schedule.map((row) => row.closing_balance) ?? [];

    it("re-settles the upstream lender after the middle entity is re-run", () => {
      const model = runModel(chain());

      expect(model.failures).toEqual([]);
      expect(model.passes.map((p) => [p.pass, p.entity_id, p.link_id])).toEqual([
        [1, "y", null],
        [1, "x", null],
        [1, "z", null],
        [2, "y", "y_to_x"],
        [3, "x", "y_to_x"],
        [2, "x", "x_to_z"],
        [3, "z", "x_to_z"],
        [4, "y", "y_to_x"],
        [4, "x", "x_to_z"],
        [4, "y", "y_to_x"],
      ]);
      expect(model.corrections.map((c) => c.rerun)).toEqual([
        ["y", "x", "y", "y"],
        ["x", "z", "x"],
      ]);
      expect(model.corrections[0]?.total_repaid).toBeCloseTo(33.16625, 9);
      expect(model.corrections[1]?.total_repaid).toBe(21);

      const upstream = balances(model, "y", "y_to_x");
      expect(upstream).toEqual(balances(model, "x", "y_to_x"));
      expect(upstream[1]).toBe(26.5);
      expect(upstream[2]).toBeCloseTo(6.825, 9);
      expect(upstream[3]).toBe(0);
      expect(balances(model, "x", "x_to_z")).toEqual(balances(model, "z", "x_to_z"));
      expect(model.holding.overdraftNetsToZero).toBe(true);
    });

    it("fails the unsettled link's entities instead of the whole run", () => {
      const model = runModel(chain(), { maxSettlementRounds: 1 });

      expect(model.failures.map((f) => f.entity_id)).toEqual(["y", "x", "z"]);
      expect(model.failures[0]?.error).toBeInstanceOf(IntercompanyAsymmetryError);
      expect(model.failures[0]?.error.message).toBe(
        "y_to_x period 2: y asset EUR 28 vs x liability EUR 7 - mismatch EUR 21",
      );
      expect(model.failures[2]?.error.message).toBe("lender x failed");
      expect(model.entityOrder).toEqual([]);
    });

    it("keeps independent entities when a link fails elimination", () => {
      const inputs = chain();
      inputs.entities.push(minimalEntity("w", 4, { revenue: [10, 10, 10, 10] }));

      const model = runModel(inputs, { maxSettlementRounds: 1 });

      expect(model.entityOrder).toEqual(["w"]);
      expect(model.holding.periods[0]?.revenue).toBe(10);
    });
  });

  it("runs the fixture group without failures", () => {
    const model = runModel(loadFixture());

    expect(model.failures).toEqual([]);
    expect(model.entityOrder).toEqual(["water", "solar", "timber"]);
    expect(model.passes.filter((p) => p.pass === 1)).toHaveLength(3);
    expect(model.holding.overdraftNetsToZero).toBe(true);
  });
});
