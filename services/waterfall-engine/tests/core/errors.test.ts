import { describe, expect, it } from "vitest";

import {
  BalanceSheetIdentityError,
  ConfigurationError,
  FdIncomeMismatchError,
  IntercompanyAsymmetryError,
} from "../../src/core/errors.js";

describe("errors", () => {
  it("lists every configuration problem", () => {
    const error = new ConfigurationError([
      { path: "/model/periods", message: "must be >= 1" },
      { path: "entities[0].sweep_pct", message: "must be between 0 and 1" },
    ]);

    expect(error.name).toBe("ConfigurationError");
    expect(error.message).toBe(
      "Invalid model configuration:\n" +
        "  /model/periods: must be >= 1\n" +
        "  entities[0].sweep_pct: must be between 0 and 1",
    );
  });

  it("reports both sides of a broken balance sheet", () => {
    const error = new BalanceSheetIdentityError(
      "solo",
      3,
      {
        assets: 1000,
        debt: 400,
        equity: 500,
        cumulativePat: 90,
        cumulativeGrants: 0,
        cumulativeDistributions: 0,
        gap: 10,
      },
      "EUR",
    );

    expect(error.entityId).toBe("solo");
    expect(error.message).toBe("solo period 3: assets - debt EUR 600 vs equity + retained EUR 590 - gap EUR 10");
  });

  it("names the source that disagrees with the P&L", () => {
    const error = new FdIncomeMismatchError("solo", 2, "reserves", 1500, 1200, "EUR");

    expect(error.message).toBe(
      "solo period 2: fd_income EUR 1,500 (P&L) vs EUR 1,200 (reserves) - mismatch EUR 300",
    );
  });

  it("reports the asymmetric overdraft balances", () => {
    const error = new IntercompanyAsymmetryError("ic", "parent", "child", 4, 2500, 2400, "USD");

    expect(error.lenderAsset).toBe(2500);
    expect(error.message).toBe(
      "ic period 4: parent asset USD 2,500 vs child liability USD 2,400 - mismatch USD 100",
    );
  });
});
