import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import { readFileSync } from "fs";
import { contractSchemaPath, loadSettings } from "../config.js";
import { ConfigurationError } from "../core/errors.js";
import type { EntityInput, FacilityInput, WaterfallEngineInputs } from "../types/inputs.js";
import type { ValidationError, ValidationResult } from "../types/module.js";

type AjvErrorObject = { instancePath?: string; message?: string };

type AjvValidateFunction = ((data: unknown) => boolean) & {
  errors?: AjvErrorObject[] | null;
};

type AjvValidator = {
  compile: (schema: unknown) => AjvValidateFunction;
};

interface ContractValidator {
  check: (data: unknown) => data is WaterfallEngineInputs;
  errors: () => AjvErrorObject[];
}

const validators = new Map<string, ContractValidator>();

function getValidator(schemaPath: string): ContractValidator {
  const cached = validators.get(schemaPath);
  if (cached) {
    return cached;
  }

  const schema: unknown = JSON.parse(readFileSync(schemaPath, "utf8"));

  const AjvConstructor = Ajv2020 as unknown as new (opts: Record<string, unknown>) => AjvValidator;
  const ajv = new AjvConstructor({ strict: true, allErrors: true });
  const addFormatsPlugin = addFormats as unknown as (instance: AjvValidator) => void;
  addFormatsPlugin(ajv);

  const validate = ajv.compile(schema);
  const validator: ContractValidator = {
    check: (data: unknown): data is WaterfallEngineInputs => Boolean(validate(data)),
    errors: () => validate.errors ?? [],
  };
  validators.set(schemaPath, validator);
  return validator;
}

/**
 * Structural check of a model document against the JSON contract.
 */
export function validateContract(document: unknown, schemaPath?: string): ValidationResult {
  try {
    const validator = getValidator(schemaPath ?? contractSchemaPath(loadSettings()));
    if (validator.check(document)) {
      return { valid: true, errors: [] };
    }
    return {
      valid: false,
      errors: validator.errors().map((error) => ({
        path: error.instancePath && error.instancePath.length > 0 ? error.instancePath : "/",
        message: error.message ?? "invalid",
      })),
    };
  } catch (error) {
    return {
      valid: false,
      errors: [{ path: "/", message: error instanceof Error ? error.message : "Validation failed" }],
    };
  }
}

/**
 * Semantic checks the JSON contract cannot express: vector lengths against
 * the horizon, maturities, cross references between entities and links.
 */
export function validateModelInputs(inputs: WaterfallEngineInputs): ValidationResult {
  const errors: ValidationError[] = [];
  const push = (path: string, message: string) => errors.push({ path, message });

  const { periods, construction_periods: constructionPeriods } = inputs.model;
  if (!Number.isInteger(periods) || periods <= 0) {
    push("model.periods", "periods must be a positive integer");
  }
  if (!Number.isInteger(constructionPeriods) || constructionPeriods < 0 || constructionPeriods >= periods) {
    push("model.construction_periods", "construction_periods must be an integer between 0 and periods - 1");
  }

  const checkRate = (path: string, value: number | undefined) => {
    if (value === undefined || !Number.isFinite(value) || value < 0 || value > 1) {
      push(path, "must be a rate between 0 and 1");
    }
  };
  const checkVector = (path: string, values: readonly number[]) => {
    if (values.length !== periods) {
      push(path, `expected ${periods} values, received ${values.length}`);
    }
    values.forEach((value, index) => {
      if (!Number.isFinite(value)) {
        push(`${path}[${index}]`, "must be a finite number");
      }
    });
  };

  const entityIds = new Set<string>();
  inputs.entities.forEach((entity, index) => {
    const base = `entities[${index}]`;
    if (entityIds.has(entity.id)) {
      push(`${base}.id`, `duplicate entity id ${entity.id}`);
    }
    entityIds.add(entity.id);
  });

  inputs.entities.forEach((entity, index) => {
    validateEntity(entity, `entities[${index}]`);
  });

  const linkIds = new Set<string>();
  (inputs.intercompany ?? []).forEach((link, index) => {
    const base = `intercompany[${index}]`;
    if (linkIds.has(link.id)) {
      push(`${base}.id`, `duplicate link id ${link.id}`);
    }
    linkIds.add(link.id);
    if (!entityIds.has(link.lender)) {
      push(`${base}.lender`, `unknown entity ${link.lender}`);
    }
    if (!entityIds.has(link.borrower)) {
      push(`${base}.borrower`, `unknown entity ${link.borrower}`);
    }
    if (link.lender === link.borrower) {
      push(`${base}.borrower`, "lender and borrower must differ");
    }
    checkRate(`${base}.rate`, link.rate);
  });

  return { valid: errors.length === 0, errors };

  function validateEntity(entity: EntityInput, base: string): void {
    checkVector(`${base}.revenue`, entity.revenue);
    checkVector(`${base}.opex`, entity.opex);
    checkVector(`${base}.capex`, entity.capex);
    checkVector(`${base}.equity_contributions`, entity.equity_contributions);

    const facilityIds = new Set<string>();
    const kindCounts = new Map<string, number>();
    entity.facilities.forEach((facility, index) => {
      const path = `${base}.facilities[${index}]`;
      if (facilityIds.has(facility.id)) {
        push(`${path}.id`, `duplicate facility id ${facility.id}`);
      }
      facilityIds.add(facility.id);
      kindCounts.set(facility.kind, (kindCounts.get(facility.kind) ?? 0) + 1);
      validateFacility(facility, path);
    });
    for (const kind of ["senior", "mezzanine"]) {
      if ((kindCounts.get(kind) ?? 0) > 1) {
        push(`${base}.facilities`, `at most one ${kind} facility is allowed`);
      }
    }

    const { operating, dsra, mezzanine_dividend: mezzanineDividend, entity: entityReserve } = entity.reserves;
    checkRate(`${base}.reserves.operating.rate`, operating.rate);
    if (!Number.isFinite(operating.coverage_pct) || operating.coverage_pct < 0) {
      push(`${base}.reserves.operating.coverage_pct`, "must be zero or positive");
    }
    if (dsra.accrues_interest) {
      if (dsra.rate === undefined) {
        push(`${base}.reserves.dsra.rate`, "rate is required when accrues_interest is true");
      } else {
        checkRate(`${base}.reserves.dsra.rate`, dsra.rate);
      }
    }
    if (mezzanineDividend) {
      checkRate(`${base}.reserves.mezzanine_dividend.rate`, mezzanineDividend.rate);
      checkRate(`${base}.reserves.mezzanine_dividend.dividend_rate`, mezzanineDividend.dividend_rate);
      if ((kindCounts.get("mezzanine") ?? 0) === 0) {
        push(`${base}.reserves.mezzanine_dividend`, "requires a mezzanine facility");
      }
    }
    checkRate(`${base}.reserves.entity.rate`, entityReserve.rate);

    (entity.inflows ?? []).forEach((inflow, index) => {
      checkVector(`${base}.inflows[${index}].amounts`, inflow.amounts);
    });

    checkRate(`${base}.tax.rate`, entity.tax.rate);
    if ((entity.tax.opening_loss_pool ?? 0) > 0) {
      push(`${base}.tax.opening_loss_pool`, "loss pool must be zero or negative");
    }

    const depreciation = entity.depreciation;
    if (depreciation.method === "straight_line") {
      if (depreciation.useful_life_years === undefined || depreciation.useful_life_years <= 0) {
        push(`${base}.depreciation.useful_life_years`, "straight_line requires a positive useful life");
      }
    } else {
      const rates = depreciation.annual_rates ?? [];
      if (rates.length === 0) {
        push(`${base}.depreciation.annual_rates`, "accelerated requires annual rates");
      }
      rates.forEach((rate, index) => checkRate(`${base}.depreciation.annual_rates[${index}]`, rate));
      if (rates.reduce((total, rate) => total + rate, 0) > 1 + 1e-9) {
        push(`${base}.depreciation.annual_rates`, "annual rates must not exceed 100% of cost");
      }
    }
    if (
      depreciation.start_period !== undefined &&
      (!Number.isInteger(depreciation.start_period) || depreciation.start_period < 0)
    ) {
      push(`${base}.depreciation.start_period`, "must be a non-negative integer");
    }

    checkRate(`${base}.dividends.payout_pct`, entity.dividends.payout_pct);
    if (!Number.isInteger(entity.dividends.start_period) || entity.dividends.start_period < 0) {
      push(`${base}.dividends.start_period`, "must be a non-negative integer");
    }
    checkRate(`${base}.sweep_pct`, entity.sweep_pct);

    (entity.intercompany_sales ?? []).forEach((sale, index) => {
      const path = `${base}.intercompany_sales[${index}]`;
      checkVector(`${path}.amounts`, sale.amounts);
      if (!entityIds.has(sale.counterparty)) {
        push(`${path}.counterparty`, `unknown entity ${sale.counterparty}`);
      } else if (sale.counterparty === entity.id) {
        push(`${path}.counterparty`, "an entity cannot sell to itself");
      }
    });
  }

  function validateFacility(facility: FacilityInput, path: string): void {
    checkRate(`${path}.rate`, facility.rate);
    if (!Number.isInteger(facility.grace_periods) || facility.grace_periods < 0) {
      push(`${path}.grace_periods`, "must be a non-negative integer");
    }
    if (!Number.isInteger(facility.repayments) || facility.repayments < 1) {
      push(`${path}.repayments`, "must be a positive integer");
    }
    const maturity = facility.grace_periods + facility.repayments - 1;
    if (maturity > periods - 1) {
      push(`${path}.repayments`, `maturity period ${maturity} is beyond the last period ${periods - 1}`);
    }
    checkVector(`${path}.draw_downs`, facility.draw_downs);
    facility.draw_downs.forEach((amount, period) => {
      if (amount < 0) {
        push(`${path}.draw_downs[${period}]`, "draw-downs must not be negative");
      } else if (amount > 0 && period >= facility.grace_periods) {
        push(`${path}.draw_downs[${period}]`, "draw-downs are only allowed during grace");
      }
    });
    if ((facility.opening_balance ?? 0) < 0) {
      push(`${path}.opening_balance`, "must not be negative");
    }
  }
}

/**
 * Contract plus semantic validation, narrowing an untyped document.
 * Throws ConfigurationError with every path-tagged problem found.
 */
export function parseModelInputs(document: unknown, schemaPath?: string): WaterfallEngineInputs {
  const validator = getValidator(schemaPath ?? contractSchemaPath(loadSettings()));
  if (!validator.check(document)) {
    throw new ConfigurationError(validateContract(document, schemaPath).errors);
  }
  const semantic = validateModelInputs(document);
  if (!semantic.valid) {
    throw new ConfigurationError(semantic.errors);
  }
  return document;
}

export function loadModelInputs(filePath: string, schemaPath?: string): WaterfallEngineInputs {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    throw new ConfigurationError([
      { path: filePath, message: error instanceof Error ? error.message : "unreadable model file" },
    ]);
  }
  return parseModelInputs(document, schemaPath);
}
