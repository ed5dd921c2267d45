import { ConfigurationError } from "../../core/errors.js";
import { silentLogger } from "../../core/log.js";
import type { EntityInput, WaterfallEngineInputs } from "../../types/inputs.js";
import type { ValidationError, ValidationResult } from "../../types/module.js";
import { DEFAULT_DISCOUNT_RATE, extractMetrics, type EntityMetrics } from "../analytics/metrics.js";
import { runModel, type ModelResult, type RunModelOptions } from "../intercompany/orchestrator.js";

export type ScenarioDriver =
  | "revenue_scale" // Multiplies revenue
  | "opex_scale" // Multiplies opex
  | "facility_rate" // Replaces every facility's annual rate
  | "sweep_pct" // Replaces the cash sweep share
  | "tax_rate" // Replaces the tax rate
  | "intercompany_rate"; // Replaces a link's annual rate

export interface ScenarioAdjustment {
  driver: ScenarioDriver;
  value: number;
  target?: string; // Entity id, or link id for intercompany_rate; every one when absent
}

export interface ScenarioOptions extends RunModelOptions {
  discountRate?: number;
}

export interface ScenarioResult {
  adjustments: ScenarioAdjustment[];
  model: ModelResult;
  metrics: Record<string, EntityMetrics>;
}

export interface SweepVariable {
  label: string;
  driver: ScenarioDriver;
  target?: string;
  base: number;
  low: number;
  high: number;
  steps: number;
}

export interface SweepRow {
  value: number;
  is_base: boolean;
  metrics: EntityMetrics | null;
  error: string | null; // Why the entity has no metrics at this value
}

export interface SweepResult {
  variable: SweepVariable;
  entity_id: string;
  rows: SweepRow[];
  warnings: string[];
}

const BASE_MATCH = 1e-9;

function scaled(values: readonly number[], factor: number): number[] {
  return values.map((value) => value * factor);
}

function adjustEntity(entity: EntityInput, driver: ScenarioDriver, value: number): void {
  switch (driver) {
    case "revenue_scale":
      entity.revenue = scaled(entity.revenue, value);
      break;
    case "opex_scale":
      entity.opex = scaled(entity.opex, value);
      break;
    case "facility_rate":
      for (const facility of entity.facilities) {
        facility.rate = value;
      }
      break;
    case "sweep_pct":
      entity.sweep_pct = value;
      break;
    case "tax_rate":
      entity.tax.rate = value;
      break;
    case "intercompany_rate":
      break;
  }
}

export function validateAdjustment(inputs: WaterfallEngineInputs, adjustment: ScenarioAdjustment): ValidationResult {
  const errors: ValidationError[] = [];

  if (!Number.isFinite(adjustment.value)) {
    errors.push({ path: `${adjustment.driver}.value`, message: "value must be a finite number" });
  } else if (adjustment.value < 0) {
    errors.push({ path: `${adjustment.driver}.value`, message: "value must not be negative" });
  } else if (adjustment.driver === "sweep_pct" && adjustment.value > 1) {
    errors.push({ path: "sweep_pct.value", message: "sweep_pct must be between 0 and 1" });
  }

  if (adjustment.target !== undefined) {
    const known =
      adjustment.driver === "intercompany_rate"
        ? (inputs.intercompany ?? []).some((link) => link.id === adjustment.target)
        : inputs.entities.some((entity) => entity.id === adjustment.target);
    if (!known) {
      errors.push({
        path: `${adjustment.driver}.target`,
        message: `unknown ${adjustment.driver === "intercompany_rate" ? "link" : "entity"} ${adjustment.target}`,
      });
    }
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Copy of `inputs` with the adjustment applied; the original is untouched.
 */
export function applyAdjustment(inputs: WaterfallEngineInputs, adjustment: ScenarioAdjustment): WaterfallEngineInputs {
  const validation = validateAdjustment(inputs, adjustment);
  if (!validation.valid) {
    throw new ConfigurationError(validation.errors);
  }

  const adjusted = structuredClone(inputs);
  const { driver, value, target } = adjustment;

  if (driver === "intercompany_rate") {
    for (const link of adjusted.intercompany ?? []) {
      if (target === undefined || link.id === target) {
        link.rate = value;
      }
    }
    return adjusted;
  }

  for (const entity of adjusted.entities) {
    if (target === undefined || entity.id === target) {
      adjustEntity(entity, driver, value);
    }
  }
  return adjusted;
}

/**
 * Re-runs the whole model with the adjustments applied in order and extracts
 * metrics for every entity that completed.
 */
export function runScenario(
  inputs: WaterfallEngineInputs,
  adjustments: readonly ScenarioAdjustment[],
  options: ScenarioOptions = {},
): ScenarioResult {
  const adjusted = adjustments.reduce(applyAdjustment, inputs);
  const { discountRate = DEFAULT_DISCOUNT_RATE, ...runOptions } = options;
  const model = runModel(adjusted, runOptions);

  const metrics: Record<string, EntityMetrics> = {};
  for (const id of model.entityOrder) {
    const result = model.entities[id];
    if (result) {
      metrics[id] = extractMetrics(result, discountRate);
    }
  }

  return { adjustments: [...adjustments], model, metrics };
}

export function validateSweepVariable(variable: SweepVariable): ValidationResult {
  const errors: ValidationError[] = [];
  const path = `sweep.${variable.label}`;

  for (const key of ["base", "low", "high"] as const) {
    if (!Number.isFinite(variable[key])) {
      errors.push({ path: `${path}.${key}`, message: `${key} must be a finite number` });
    }
  }
  if (variable.low > variable.high) {
    errors.push({ path: `${path}.low`, message: "low must not be greater than high" });
  }
  if (!Number.isInteger(variable.steps) || variable.steps < 1) {
    errors.push({ path: `${path}.steps`, message: "steps must be a positive integer" });
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Evenly spaced values from `low` to `high` inclusive; a single step runs the
 * base value alone.
 */
export function buildSweepValues(variable: SweepVariable): number[] {
  if (variable.steps <= 1) {
    return [variable.base];
  }
  const increment = (variable.high - variable.low) / (variable.steps - 1);
  return Array.from({ length: variable.steps }, (_, i) => variable.low + i * increment);
}

/**
 * One model run per sweep value, recording the chosen entity's metrics.
 * A value whose run fails or drops the entity yields a row without metrics
 * and a warning; the sweep carries on.
 */
export function runSweep(
  inputs: WaterfallEngineInputs,
  variable: SweepVariable,
  entityId: string,
  options: ScenarioOptions = {},
): SweepResult {
  const validation = validateSweepVariable(variable);
  if (!inputs.entities.some((entity) => entity.id === entityId)) {
    validation.errors.push({ path: "sweep.entity", message: `unknown entity ${entityId}` });
  }
  if (validation.errors.length > 0) {
    throw new ConfigurationError(validation.errors);
  }

  const logger = options.logger ?? silentLogger;
  const warnings: string[] = [];
  const rows = buildSweepValues(variable).map((value): SweepRow => {
    const adjustment: ScenarioAdjustment = { driver: variable.driver, value, target: variable.target };
    const isBase = Math.abs(value - variable.base) < BASE_MATCH;

    let scenario: ScenarioResult;
    try {
      scenario = runScenario(inputs, [adjustment], options);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn("Sweep run failed", { variable: variable.label, value, error: message });
      warnings.push(`${variable.label} = ${value}: ${message}`);
      return { value, is_base: isBase, metrics: null, error: message };
    }

    const metrics = scenario.metrics[entityId] ?? null;
    if (metrics === null) {
      const failure = scenario.model.failures.find((f) => f.entity_id === entityId);
      const message = failure?.error.message ?? `${entityId} did not complete`;
      warnings.push(`${variable.label} = ${value}: ${message}`);
      return { value, is_base: isBase, metrics: null, error: message };
    }
    return { value, is_base: isBase, metrics, error: null };
  });

  return { variable, entity_id: entityId, rows, warnings };
}

export function runMultiSweep(
  inputs: WaterfallEngineInputs,
  variables: readonly SweepVariable[],
  entityId: string,
  options: ScenarioOptions = {},
): SweepResult[] {
  return variables.map((variable) => runSweep(inputs, variable, entityId, options));
}
