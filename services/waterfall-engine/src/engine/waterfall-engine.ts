import { contractSchemaPath, loadSettings } from "../config.js";
import { ConfigurationError } from "../core/errors.js";
import { createLogger, type Logger } from "../core/log.js";
import { formatAmount, TOLERANCE } from "../core/math-utils.js";
import { extractMetrics, type EntityMetrics } from "../modules/analytics/metrics.js";
import { runModel, type ModelResult } from "../modules/intercompany/orchestrator.js";
import { runMultiSweep, type SweepResult, type SweepVariable } from "../modules/scenario/scenario-runner.js";
import type { WaterfallEngineInputs } from "../types/inputs.js";
import type { ValidationError } from "../types/module.js";
import { parseModelInputs } from "../validate/validate.js";
import { auditModel, type AuditReport } from "../verify/identity.js";

export interface WaterfallEngineResult {
  success: boolean;
  model?: ModelResult;
  audit?: AuditReport;
  metrics?: Record<string, EntityMetrics>;
  errors?: string[];
  warnings: string[];
}

export interface WaterfallEngineValidation {
  valid: boolean;
  errors: ValidationError[];
}

export interface WaterfallEngineOptions {
  logger?: Logger;
  verify?: boolean; // Defaults to WATERFALL_VERIFY
  schemaPath?: string;
  dscrWarningThreshold?: number;
  discountRate?: number; // Defaults to WATERFALL_DISCOUNT_RATE
}

export interface WaterfallEngineSweep {
  success: boolean;
  sweeps: SweepResult[];
  errors?: string[];
}

type ParseOutcome =
  | { ok: true; inputs: WaterfallEngineInputs }
  | { ok: false; errors: ValidationError[] };

export class WaterfallEngine {
  private readonly logger: Logger;
  private readonly verify: boolean;
  private readonly schemaPath: string;
  private readonly dscrWarningThreshold: number;
  private readonly discountRate: number;

  constructor(options: WaterfallEngineOptions = {}) {
    const settings = loadSettings();
    this.logger = options.logger ?? createLogger(settings.logLevel);
    this.verify = options.verify ?? settings.verify;
    this.schemaPath = options.schemaPath ?? contractSchemaPath(settings);
    this.dscrWarningThreshold = options.dscrWarningThreshold ?? 1.2;
    this.discountRate = options.discountRate ?? settings.discountRate;
  }

  /**
   * Validate the model document: JSON contract first, then the semantic checks
   */
  validateAll(inputs: unknown): WaterfallEngineValidation {
    const parsed = this.parse(inputs);
    return parsed.ok ? { valid: true, errors: [] } : { valid: false, errors: parsed.errors };
  }

  /**
   * Run every entity through the intercompany passes, consolidate and audit
   */
  run(inputs: unknown): WaterfallEngineResult {
    const warnings: string[] = [];

    const parsed = this.parse(inputs);
    if (!parsed.ok) {
      return {
        success: false,
        errors: parsed.errors.map((e) => `${e.path}: ${e.message}`),
        warnings,
      };
    }

    let model: ModelResult;
    try {
      model = runModel(parsed.inputs, { verify: this.verify, logger: this.logger });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error("Model run failed", { error: message });
      return { success: false, errors: [`Model run failed: ${message}`], warnings };
    }

    const audit = auditModel(model);
    if (!audit.passed) {
      this.logger.warn("Audit findings", { count: audit.findings.length });
    }

    const metrics: Record<string, EntityMetrics> = {};
    for (const id of model.entityOrder) {
      const entity = model.entities[id];
      if (entity) {
        metrics[id] = extractMetrics(entity, this.discountRate);
      }
    }

    warnings.push(...this.collectWarnings(model));

    const errors = [
      ...model.failures.map((failure) => `${failure.entity_id}: ${failure.error.message}`),
      ...audit.findings.map((finding) => {
        const where = finding.period === null ? "" : ` period ${finding.period}`;
        return `${finding.check} ${finding.subject}${where}: ${finding.message}`;
      }),
    ];

    return {
      success: errors.length === 0,
      model,
      audit,
      metrics,
      errors: errors.length > 0 ? errors : undefined,
      warnings,
    };
  }

  /**
   * Sensitivity sweeps for one entity: each variable is swept on its own,
   * the others held at their base values
   */
  sweep(inputs: unknown, variables: readonly SweepVariable[], entityId: string): WaterfallEngineSweep {
    const parsed = this.parse(inputs);
    if (!parsed.ok) {
      return { success: false, sweeps: [], errors: parsed.errors.map((e) => `${e.path}: ${e.message}`) };
    }

    try {
      const sweeps = runMultiSweep(parsed.inputs, variables, entityId, {
        verify: this.verify,
        logger: this.logger,
        discountRate: this.discountRate,
      });
      return { success: true, sweeps };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return { success: false, sweeps: [], errors: error.errors.map((e) => `${e.path}: ${e.message}`) };
      }
      throw error;
    }
  }

  private parse(inputs: unknown): ParseOutcome {
    try {
      return { ok: true, inputs: parseModelInputs(inputs, this.schemaPath) };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return { ok: false, errors: error.errors };
      }
      throw error;
    }
  }

  private collectWarnings(model: ModelResult): string[] {
    const warnings: string[] = [];

    const { minimum } = model.holding.dscr;
    if (minimum !== null && minimum < this.dscrWarningThreshold) {
      const worst = model.holding.dscr.points.find((point) => point.dscr === minimum);
      warnings.push(
        `Minimum DSCR of ${minimum.toFixed(2)}x (${worst?.entity_id ?? "?"} period ${worst?.period ?? "?"}) ` +
          `is below ${this.dscrWarningThreshold.toFixed(2)}x`,
      );
    }

    for (const id of model.entityOrder) {
      const entity = model.entities[id];
      if (!entity) {
        continue;
      }
      const count = (pick: (period: number) => number) =>
        entity.waterfall.filter((row) => pick(row.period) > TOLERANCE).length;
      const unmet = (period: number) => entity.waterfall[period]?.unmet;

      const shortfalls = count((p) => unmet(p)?.cash_shortfall ?? 0);
      if (shortfalls > 0) {
        warnings.push(`${id}: cash shortfall carried in ${shortfalls} period(s)`);
      }
      const debtService = count((p) => unmet(p)?.debt_service ?? 0);
      if (debtService > 0) {
        warnings.push(`${id}: scheduled debt service not covered by cash in ${debtService} period(s)`);
      }
      const dsraGaps = count((p) => unmet(p)?.dsra_gap ?? 0);
      if (dsraGaps > 0) {
        warnings.push(`${id}: DSRA below target in ${dsraGaps} period(s)`);
      }
    }

    return warnings;
  }
}

/**
 * Create a summary report from waterfall engine results
 */
export function createSummaryReport(result: WaterfallEngineResult): string {
  if (!result.model) {
    return `Waterfall Engine Failed:\n${result.errors?.join("\n") ?? "Unknown error"}`;
  }

  const model = result.model;
  const currency = model.currency;
  const money = (value: number) => formatAmount(value, currency);
  const dscr = model.holding.dscr;

  const lines: string[] = [
    "=".repeat(60),
    `MODEL SUMMARY: ${model.name}`,
    "=".repeat(60),
    "",
    "TIMELINE",
    `  ${model.timeline.periods} half-year periods from ${model.timeline.startDate.toISODate() ?? "?"}`,
    `  Construction periods: ${model.timeline.constructionPeriods}`,
  ];

  for (const id of model.entityOrder) {
    const entity = model.entities[id];
    if (!entity) {
      continue;
    }
    const last = entity.balance_sheet[entity.balance_sheet.length - 1];
    const metrics = result.metrics?.[id];
    const percent = (value: number | null | undefined) =>
      value === null || value === undefined ? "-" : `${(value * 100).toFixed(2)}%`;
    const times = (value: number | null | undefined) =>
      value === null || value === undefined ? "-" : `${value.toFixed(2)}x`;
    const total = (values: number[]) => values.reduce((sum, v) => sum + v, 0);
    lines.push(
      "",
      `ENTITY: ${entity.name} (${entity.entity_id})`,
      `  Revenue: ${money(total(entity.pnl.map((row) => row.revenue)))}`,
      `  Profit After Tax: ${money(total(entity.pnl.map((row) => row.pat)))}`,
      `  Dividends: ${money(total(entity.waterfall.map((row) => row.dividend)))}`,
      `  Closing Cash: ${money(last?.cash ?? 0)}`,
      `  Closing Facility Debt: ${money(last?.facility_debt ?? 0)}`,
      `  Project IRR: ${percent(metrics?.project_irr)}`,
      `  Equity IRR: ${percent(metrics?.equity_irr)}`,
      `  Min LLCR: ${times(metrics?.llcr_min)}`,
    );
  }

  lines.push(
    "",
    "HOLDING",
    `  Min DSCR: ${dscr.minimum === null ? "-" : `${dscr.minimum.toFixed(2)}x`}`,
    `  Weighted DSCR: ${dscr.weighted_average === null ? "-" : `${dscr.weighted_average.toFixed(2)}x`}`,
    `  Intercompany overdraft nets to zero: ${model.holding.overdraftNetsToZero ? "yes" : "no"}`,
  );

  if (model.corrections.length > 0) {
    lines.push("", "INTERCOMPANY");
    for (const correction of model.corrections) {
      lines.push(
        `  ${correction.link_id}: ${correction.lender} -> ${correction.borrower}, ` +
          `deficit ${money(correction.total_deficit)}, lent ${money(correction.total_lent)}, ` +
          `repaid ${money(correction.total_repaid)}${correction.material ? "" : " (immaterial)"}`,
      );
    }
  }

  if (result.audit) {
    lines.push(
      "",
      "AUDIT",
      `  ${result.audit.passed ? "All checks passed" : `${result.audit.findings.length} finding(s)`}`,
    );
  }

  if (result.errors && result.errors.length > 0) {
    lines.push("", "ERRORS");
    for (const error of result.errors) {
      lines.push(`  ${error}`);
    }
  }

  if (result.warnings.length > 0) {
    lines.push("", "WARNINGS");
    for (const warning of result.warnings) {
      lines.push(`  ⚠️ ${warning}`);
    }
  }

  lines.push("");
  lines.push("=".repeat(60));

  return lines.join("\n");
}
