/**
 * Annual Statement Formatter
 *
 * Rolls an entity's half-year P&L, waterfall and balance sheet up to years and
 * lays them out as a statement table. Flows add both halves of a year; balances
 * show the year-end (second half) figure.
 */

import { DateTime } from "luxon";
import { rollupColumns } from "../core/rollup.js";
import type { EntityResult } from "../types/results.js";

export interface AnnualStatementRow {
  label: string;
  key?: string; // Source column, absent on headers and spacers
  values: (number | null)[];
  isHeader?: boolean;
  isSubtotal?: boolean;
  isTotal?: boolean;
  indent?: number;
}

export interface AnnualStatement {
  entityId: string;
  name: string;
  currency: string;
  years: number[];
  yearLabels: string[];
  yearEnding: string[];
  rows: AnnualStatementRow[];
}

export interface AnnualStatementJson {
  entity_id: string;
  currency: string;
  years: number[];
  year_labels: string[];
  year_ending: string[];
  sections: Record<string, Record<string, Record<string, number | null>>>;
}

const STOCK_KEYS: ReadonlySet<string> = new Set([
  "cash",
  "ops_reserve",
  "dsra",
  "mezzanine_dividend_reserve",
  "entity_reserve",
  "intercompany_receivable",
  "total_assets",
  "facility_debt",
  "intercompany_payable",
  "cash_shortfall",
  "total_debt",
  "identity_gap",
]);

function formatValue(value: number | null): string {
  if (value === null || !Number.isFinite(value)) return "-";
  const rounded = Math.round(value) || 0;
  return rounded.toLocaleString("en-US");
}

function yearEndingLabels(result: EntityResult, years: number): string[] {
  const labels: string[] = [];
  for (let year = 0; year < years; year++) {
    const last = result.periods.filter((period) => period.yearIndex === year).pop();
    labels.push(last ? DateTime.fromISO(last.endDate, { zone: "utc" }).toFormat("LLL ''yy") : "-");
  }
  return labels;
}

/**
 * Collects the half-year columns of one entity run into annual rows.
 */
export function buildAnnualStatement(result: EntityResult): AnnualStatement {
  const flow = (pick: (period: number) => number) => result.pnl.map((_, period) => pick(period));
  const intercompany = (field: "lent" | "received" | "repaid" | "repayment_received") =>
    flow((period) =>
      (result.waterfall[period]?.intercompany ?? []).reduce((total, f) => total + f[field], 0),
    );

  const annual = rollupColumns(
    {
      revenue: result.pnl.map((row) => row.revenue),
      opex: result.pnl.map((row) => row.opex),
      ebitda: result.pnl.map((row) => row.ebitda),
      depreciation: result.pnl.map((row) => row.depreciation),
      interest_expense: result.pnl.map((row) => row.interest_expense),
      fd_income: result.pnl.map((row) => row.fd_income),
      intercompany_interest: result.pnl.map((row) => row.intercompany_interest),
      pbt: result.pnl.map((row) => row.pbt),
      tax: result.pnl.map((row) => row.tax),
      pat: result.pnl.map((row) => row.pat),
      inflows: result.waterfall.map((row) => row.normal_inflows + row.special_inflows),
      debt_service_paid: result.waterfall.map((row) => row.debt_service_paid),
      special_acceleration: result.waterfall.map((row) => row.special_acceleration),
      surplus_acceleration: result.waterfall.map((row) => row.surplus_acceleration),
      ops_reserve_fill: result.waterfall.map((row) => row.ops_reserve_fill),
      dsra_fill: result.waterfall.map((row) => row.dsra_fill),
      dsra_release: result.waterfall.map((row) => row.dsra_release),
      mezzanine_dividend_payout: result.waterfall.map((row) => row.mezzanine_dividend_payout),
      dividend: result.waterfall.map((row) => row.dividend),
      intercompany_lent: intercompany("lent"),
      intercompany_received: intercompany("received"),
      intercompany_repaid: intercompany("repaid"),
      cash: result.balance_sheet.map((row) => row.cash),
      ops_reserve: result.balance_sheet.map((row) => row.ops_reserve),
      dsra: result.balance_sheet.map((row) => row.dsra),
      mezzanine_dividend_reserve: result.balance_sheet.map((row) => row.mezzanine_dividend_reserve),
      entity_reserve: result.balance_sheet.map((row) => row.entity_reserve),
      intercompany_receivable: result.balance_sheet.map((row) => row.intercompany_receivable),
      total_assets: result.balance_sheet.map((row) => row.total_assets),
      facility_debt: result.balance_sheet.map((row) => row.facility_debt),
      intercompany_payable: result.balance_sheet.map((row) => row.intercompany_payable),
      cash_shortfall: result.balance_sheet.map((row) => row.cash_shortfall),
      total_debt: result.balance_sheet.map((row) => row.total_debt),
      identity_gap: result.balance_sheet.map((row) => row.identity_gap),
    },
    STOCK_KEYS,
  );

  const numYears = annual.revenue?.length ?? 0;
  const years = Array.from({ length: numYears }, (_, i) => i + 1);
  const line = (label: string, key: string, extra: Partial<AnnualStatementRow> = {}): AnnualStatementRow => ({
    label,
    key,
    values: annual[key] ?? years.map(() => null),
    indent: 1,
    ...extra,
  });
  const header = (label: string): AnnualStatementRow => ({
    label,
    values: years.map(() => null),
    isHeader: true,
  });

  const rows: AnnualStatementRow[] = [
    header("Income Statement"),
    line("Revenue", "revenue"),
    line("Operating Expenses", "opex"),
    line("EBITDA", "ebitda", { isSubtotal: true, indent: 0 }),
    line("Depreciation", "depreciation"),
    line("Interest Expense", "interest_expense"),
    line("FD Income", "fd_income"),
    line("Intercompany Interest", "intercompany_interest"),
    line("Profit Before Tax", "pbt", { isSubtotal: true, indent: 0 }),
    line("Tax", "tax"),
    line("Profit After Tax", "pat", { isTotal: true, indent: 0 }),
    { label: "", values: [] },
    header("Cash Waterfall"),
    line("Grants & Other Inflows", "inflows"),
    line("Debt Service Paid", "debt_service_paid"),
    line("Special Acceleration", "special_acceleration"),
    line("Surplus Acceleration", "surplus_acceleration"),
    line("Ops Reserve Fill", "ops_reserve_fill"),
    line("DSRA Fill", "dsra_fill"),
    line("DSRA Release", "dsra_release"),
    line("Intercompany Lent", "intercompany_lent"),
    line("Intercompany Received", "intercompany_received"),
    line("Intercompany Repaid", "intercompany_repaid"),
    line("Mezzanine Dividend Payout", "mezzanine_dividend_payout"),
    line("Dividends", "dividend"),
    { label: "", values: [] },
    header("Balance Sheet (Year End)"),
    line("Cash", "cash"),
    line("Operating Reserve", "ops_reserve"),
    line("DSRA", "dsra"),
    line("Mezzanine Dividend Reserve", "mezzanine_dividend_reserve"),
    line("Entity Reserve", "entity_reserve"),
    line("Intercompany Receivable", "intercompany_receivable"),
    line("Total Assets", "total_assets", { isSubtotal: true, indent: 0 }),
    line("Facility Debt", "facility_debt"),
    line("Intercompany Payable", "intercompany_payable"),
    line("Cash Shortfall Carried", "cash_shortfall"),
    line("Total Debt", "total_debt", { isSubtotal: true, indent: 0 }),
    line("Identity Gap", "identity_gap"),
  ];

  return {
    entityId: result.entity_id,
    name: result.name,
    currency: result.currency,
    years,
    yearLabels: years.map((y) => `Year ${y}`),
    yearEnding: yearEndingLabels(result, numYears),
    rows,
  };
}

export function formatAnnualStatementAsText(statement: AnnualStatement): string {
  const colWidth = 14;
  const labelWidth = 32;
  const width = labelWidth + statement.yearLabels.length * colWidth;

  let output = `${statement.name} (${statement.currency})\n`;
  output += "".padEnd(labelWidth) + statement.yearLabels.map((l) => l.padStart(colWidth)).join("") + "\n";
  output += "".padEnd(labelWidth) + statement.yearEnding.map((l) => l.padStart(colWidth)).join("") + "\n";
  output += "=".repeat(width) + "\n";

  for (const row of statement.rows) {
    if (row.label === "") {
      output += "\n";
      continue;
    }

    const label = "  ".repeat(row.indent ?? 0) + row.label;
    if (row.isHeader) {
      output += `\n${label.toUpperCase()}\n`;
      output += "-".repeat(width) + "\n";
      continue;
    }

    output += label.padEnd(labelWidth) + row.values.map((v) => formatValue(v).padStart(colWidth)).join("") + "\n";
    if (row.isTotal) {
      output += "=".repeat(width) + "\n";
    } else if (row.isSubtotal) {
      output += "-".repeat(width) + "\n";
    }
  }

  return output;
}

/**
 * JSON-friendly form keyed by section and line, for API responses.
 */
export function formatAnnualStatementAsJson(statement: AnnualStatement): AnnualStatementJson {
  const sections: AnnualStatementJson["sections"] = {};
  let currentSection = "summary";

  for (const row of statement.rows) {
    if (row.isHeader) {
      currentSection = row.label.toLowerCase().replace(/[^a-z0-9]+/g, "_").replace(/_$/, "");
      sections[currentSection] = {};
      continue;
    }
    if (!row.label) {
      continue;
    }

    const key = row.label.toLowerCase().replace(/[^a-z0-9]+/g, "_");
    const values: Record<string, number | null> = {};
    statement.yearLabels.forEach((label, i) => {
      values[label] = row.values[i] ?? null;
    });
    const section = sections[currentSection] ?? {};
    section[key] = values;
    sections[currentSection] = section;
  }

  return {
    entity_id: statement.entityId,
    currency: statement.currency,
    years: statement.years,
    year_labels: statement.yearLabels,
    year_ending: statement.yearEnding,
    sections,
  };
}
