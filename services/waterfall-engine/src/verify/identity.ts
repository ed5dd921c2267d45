import { Series } from "../core/series.js";
import { periodsToAnnual } from "../core/rollup.js";
import { TOLERANCE, formatAmount } from "../core/math-utils.js";
import { buildAnnualStatement, type AnnualStatement } from "../formatters/annual-statement.js";
import type { ModelResult } from "../modules/intercompany/orchestrator.js";
import type { EntityResult, ReserveMovement } from "../types/results.js";

export type AuditCheck =
  | "balance_sheet_identity"
  | "fd_income"
  | "dsra_gate"
  | "gap_excess_exclusivity"
  | "re_amortization"
  | "intercompany_elimination";

export interface AuditFinding {
  check: AuditCheck;
  subject: string; // Entity or link id
  period: number | null; // Year index for annual findings
  message: string;
}

export interface AuditReport {
  passed: boolean;
  checked: AuditCheck[];
  findings: AuditFinding[];
}

export function checkBalanceSheetIdentity(result: EntityResult): AuditFinding[] {
  return result.balance_sheet
    .filter((row) => Math.abs(row.identity_gap) > TOLERANCE)
    .map((row): AuditFinding => ({
      check: "balance_sheet_identity",
      subject: result.entity_id,
      period: row.period,
      message: `identity gap ${formatAmount(row.identity_gap, result.currency)}`,
    }));
}

/**
 * fd_income traced three ways: P&L against the waterfall's reserve interest,
 * P&L against the reserve histories, and the annual P&L roll-up against the
 * annual statement's FD income line. Equality is exact; every path sums the
 * same accruals in the same order.
 */
export function checkFdIncome(
  result: EntityResult,
  statement: AnnualStatement = buildAnnualStatement(result),
): AuditFinding[] {
  const findings: AuditFinding[] = [];
  const mismatch = (period: number | null, source: string, pnl: number, other: number) =>
    findings.push({
      check: "fd_income",
      subject: result.entity_id,
      period,
      message:
        `fd_income ${formatAmount(pnl, result.currency)} (P&L) vs ` +
        `${formatAmount(other, result.currency)} (${source})`,
    });

  const reserveInterest = reserveInterestByPeriod(result);
  result.pnl.forEach((pnl, period) => {
    const waterfall = result.waterfall[period]?.reserve_interest ?? 0;
    if (pnl.fd_income !== waterfall) {
      mismatch(period, "waterfall", pnl.fd_income, waterfall);
    }
    const reserves = reserveInterest[period] ?? 0;
    if (pnl.fd_income !== reserves) {
      mismatch(period, "reserves", pnl.fd_income, reserves);
    }
  });

  const annualPnl = periodsToAnnual(new Series(result.pnl.map((row) => row.fd_income)), "flow");
  const statementLine = statement.rows.find((row) => row.key === "fd_income")?.values ?? [];
  annualPnl.forEach((value, year) => {
    const other = statementLine[year] ?? 0;
    if (value !== other) {
      mismatch(year, "annual statement", value, other);
    }
  });

  return findings;
}

/**
 * With the DSRA unfunded nothing discretionary may leave: no surplus
 * acceleration, no entity reserve fill, no dividend. Special-pool
 * acceleration is exempt. Funding is read from the DSRA's own closing
 * balance, not from the waterfall's flag.
 */
export function checkDsraGate(result: EntityResult): AuditFinding[] {
  const funded = (period: number) => {
    const movement = result.reserves.dsra[period];
    if (!movement) {
      return true;
    }
    return (
      movement.target_balance < TOLERANCE || movement.closing_balance >= movement.target_balance - TOLERANCE
    );
  };
  return result.waterfall
    .filter(
      (row) =>
        !funded(row.period) &&
        (row.surplus_acceleration > 0 || row.entity_reserve_fill > 0 || row.dividend > 0),
    )
    .map((row): AuditFinding => ({
      check: "dsra_gate",
      subject: result.entity_id,
      period: row.period,
      message: "discretionary cash allocated while the DSRA was unfunded",
    }));
}

export function checkGapExcessExclusivity(result: EntityResult): AuditFinding[] {
  const histories: [string, readonly ReserveMovement[]][] = [
    ["operating", result.reserves.operating],
    ["dsra", result.reserves.dsra],
    ["mezzanine_dividend", result.reserves.mezzanine_dividend ?? []],
    ["entity", result.reserves.entity],
  ];
  const findings: AuditFinding[] = [];
  for (const [reserve, movements] of histories) {
    for (const movement of movements) {
      if (movement.funding_gap > 0 && movement.releasable_excess > 0) {
        findings.push({
          check: "gap_excess_exclusivity",
          subject: result.entity_id,
          period: movement.period,
          message: `${reserve} reports both a funding gap and a releasable excess`,
        });
      }
    }
  }
  return findings;
}

export function checkReAmortization(result: EntityResult): AuditFinding[] {
  const findings: AuditFinding[] = [];
  for (const facility of result.facilities) {
    const atMaturity = facility.schedule[facility.maturity_period];
    if (atMaturity && atMaturity.closing_balance > TOLERANCE) {
      findings.push({
        check: "re_amortization",
        subject: result.entity_id,
        period: facility.maturity_period,
        message:
          `${facility.facility_id} closes maturity with ` +
          `${formatAmount(atMaturity.closing_balance, result.currency)} outstanding`,
      });
    }
  }
  return findings;
}

export function checkIntercompanyElimination(model: ModelResult): AuditFinding[] {
  const findings: AuditFinding[] = [];
  for (const correction of model.corrections) {
    const lender = model.entities[correction.lender];
    const borrower = model.entities[correction.borrower];
    if (!lender || !borrower) {
      continue;
    }
    const asset = lender.overdrafts.find((o) => o.link_id === correction.link_id && o.role === "lender");
    const liability = borrower.overdrafts.find(
      (o) => o.link_id === correction.link_id && o.role === "borrower",
    );
    model.timeline.indices.forEach((period) => {
      const assetBalance = asset?.schedule[period]?.closing_balance ?? 0;
      const liabilityBalance = liability?.schedule[period]?.closing_balance ?? 0;
      if (assetBalance !== liabilityBalance) {
        findings.push({
          check: "intercompany_elimination",
          subject: correction.link_id,
          period,
          message:
            `${correction.lender} asset ${formatAmount(assetBalance, model.currency)} vs ` +
            `${correction.borrower} liability ${formatAmount(liabilityBalance, model.currency)}`,
        });
      }
    });
  }
  return findings;
}

export function auditEntity(result: EntityResult): AuditFinding[] {
  return [
    ...checkBalanceSheetIdentity(result),
    ...checkFdIncome(result),
    ...checkDsraGate(result),
    ...checkGapExcessExclusivity(result),
    ...checkReAmortization(result),
  ];
}

export function auditModel(model: ModelResult): AuditReport {
  const findings: AuditFinding[] = [];
  for (const id of model.entityOrder) {
    const result = model.entities[id];
    if (result) {
      findings.push(...auditEntity(result));
    }
  }
  findings.push(...checkIntercompanyElimination(model));

  return {
    passed: findings.length === 0,
    checked: [
      "balance_sheet_identity",
      "fd_income",
      "dsra_gate",
      "gap_excess_exclusivity",
      "re_amortization",
      "intercompany_elimination",
    ],
    findings,
  };
}

function reserveInterestByPeriod(result: EntityResult): number[] {
  const { operating, dsra, mezzanine_dividend: mezzanine, entity } = result.reserves;
  return operating.map((movement, period) => {
    let total = movement.interest_earned + (dsra[period]?.interest_earned ?? 0);
    if (mezzanine) {
      total += mezzanine[period]?.interest_earned ?? 0;
    }
    total += entity[period]?.interest_earned ?? 0;
    return total;
  });
}
