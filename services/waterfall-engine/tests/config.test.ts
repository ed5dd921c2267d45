import { describe, expect, it } from "vitest";

import { contractSchemaPath, loadSettings } from "../src/config.js";
import { ConfigurationError } from "../src/core/errors.js";

describe("loadSettings", () => {
  it("applies defaults", () => {
    const settings = loadSettings({});

    expect(settings.logLevel).toBe("info");
    expect(settings.verify).toBe(true);
    expect(settings.discountRate).toBe(0.052);
    expect(contractSchemaPath(settings)).toMatch(/contracts[\\/]waterfall_engine_v1\.schema\.json$/);
  });

  it("reads overrides from the environment", () => {
    const settings = loadSettings({
      LOG_LEVEL: "warn",
      WATERFALL_VERIFY: "false",
      WATERFALL_DISCOUNT_RATE: "0.08",
      CONTRACTS_DIR: "/srv/contracts",
    });

    expect(settings).toEqual({ logLevel: "warn", verify: false, discountRate: 0.08, contractsDir: "/srv/contracts" });
    expect(contractSchemaPath(settings)).toBe("/srv/contracts/waterfall_engine_v1.schema.json");
  });

  it("rejects unknown values", () => {
    expect(() => loadSettings({ LOG_LEVEL: "loud" })).toThrow(ConfigurationError);
    try {
      loadSettings({ WATERFALL_VERIFY: "yes" });
    } catch (error) {
      expect(error instanceof ConfigurationError ? error.errors[0]?.path : null).toBe("env.WATERFALL_VERIFY");
    }
    expect(() => loadSettings({ WATERFALL_DISCOUNT_RATE: "-0.1" })).toThrow(ConfigurationError);
  });
});
