import { TOLERANCE } from "../../core/math-utils.js";
import { rollupColumns } from "../../core/rollup.js";
import type { EntityInput, IntercompanyLinkInput } from "../../types/inputs.js";
import type { EntityResult, FacilitySchedule } from "../../types/results.js";

export interface TaggedFacilitySchedule extends FacilitySchedule {
  entity_id: string;
}

export interface DscrPoint {
  entity_id: string;
  period: number;
  cfads: number;
  debt_service: number;
  dscr: number;
}

export interface DscrSummary {
  points: DscrPoint[];
  minimum: number | null;
  weighted_average: number | null; // Debt-service weighted
}

export interface ConsolidatedPeriod {
  period: number;
  revenue: number;
  opex: number;
  ebitda: number;
  depreciation: number;
  interest_expense: number;
  fd_income: number;
  intercompany_interest: number;
  pbt: number;
  tax: number;
  pat: number;
  intercompany_sales_eliminated: number;
  intercompany_interest_eliminated: number;
  cash: number;
  reserves: number;
  total_assets: number;
  total_debt: number;
  equity: number;
  intercompany_receivable_eliminated: number;
  intercompany_payable_eliminated: number;
  net_overdraft: number;
}

export interface HoldingResult {
  facilities: TaggedFacilitySchedule[];
  dscr: DscrSummary;
  periods: ConsolidatedPeriod[];
  annual: Record<string, number[]>;
  overdraftNetsToZero: boolean;
}

export interface ConsolidationScope {
  links: readonly IntercompanyLinkInput[];
  entities: readonly EntityInput[];
}

const ANNUAL_KEYS = [
  "revenue",
  "opex",
  "ebitda",
  "depreciation",
  "interest_expense",
  "fd_income",
  "intercompany_interest",
  "pbt",
  "tax",
  "pat",
  "intercompany_sales_eliminated",
  "intercompany_interest_eliminated",
  "cash",
  "reserves",
  "total_assets",
  "total_debt",
  "equity",
  "intercompany_receivable_eliminated",
  "intercompany_payable_eliminated",
  "net_overdraft",
] as const satisfies readonly (keyof ConsolidatedPeriod)[];

const STOCK_KEYS: ReadonlySet<string> = new Set([
  "cash",
  "reserves",
  "total_assets",
  "total_debt",
  "equity",
  "intercompany_receivable_eliminated",
  "intercompany_payable_eliminated",
  "net_overdraft",
]);

/**
 * Group view over finished entity runs. Read-only: no state of its own and no
 * holding-level tax. Intercompany sales are eliminated, and so are interest
 * and balances on the overdrafts of `scope.links`. An overdraft on any other
 * link stays in the group figures.
 */
export function consolidate(results: readonly EntityResult[], scope: ConsolidationScope): HoldingResult {
  const periodCount = results[0]?.pnl.length ?? 0;
  const inScope = new Set(results.map((result) => result.entity_id));
  const linksInScope = new Set(scope.links.map((link) => link.id));

  const facilities: TaggedFacilitySchedule[] = results.flatMap((result) =>
    result.facilities.map((facility) => ({ ...facility, entity_id: result.entity_id })),
  );

  const periods: ConsolidatedPeriod[] = [];
  let overdraftNetsToZero = true;
  for (let period = 0; period < periodCount; period += 1) {
    const row: ConsolidatedPeriod = {
      period,
      revenue: 0,
      opex: 0,
      ebitda: 0,
      depreciation: 0,
      interest_expense: 0,
      fd_income: 0,
      intercompany_interest: 0,
      pbt: 0,
      tax: 0,
      pat: 0,
      intercompany_sales_eliminated: 0,
      intercompany_interest_eliminated: 0,
      cash: 0,
      reserves: 0,
      total_assets: 0,
      total_debt: 0,
      equity: 0,
      intercompany_receivable_eliminated: 0,
      intercompany_payable_eliminated: 0,
      net_overdraft: 0,
    };

    for (const result of results) {
      const pnl = result.pnl[period];
      const bs = result.balance_sheet[period];
      if (!pnl || !bs) {
        continue;
      }
      row.revenue += pnl.revenue;
      row.opex += pnl.opex;
      row.depreciation += pnl.depreciation;
      row.interest_expense += pnl.interest_expense;
      row.fd_income += pnl.fd_income;
      row.intercompany_interest += pnl.intercompany_interest;
      row.pbt += pnl.pbt;
      row.tax += pnl.tax;
      row.pat += pnl.pat;
      row.cash += bs.cash;
      row.reserves += bs.ops_reserve + bs.dsra + bs.mezzanine_dividend_reserve + bs.entity_reserve;
      row.total_assets += bs.total_assets;
      row.total_debt += bs.total_debt;

      for (const overdraft of result.overdrafts) {
        const entry = overdraft.schedule[period];
        if (!entry || !linksInScope.has(overdraft.link_id)) {
          continue;
        }
        if (overdraft.role === "lender") {
          row.intercompany_receivable_eliminated += entry.closing_balance;
          row.intercompany_interest_eliminated += entry.interest;
        } else {
          row.intercompany_payable_eliminated += entry.closing_balance;
        }
      }
    }
    row.total_assets -= row.intercompany_receivable_eliminated;
    row.total_debt -= row.intercompany_payable_eliminated;

    for (const entity of scope.entities) {
      for (const sale of entity.intercompany_sales ?? []) {
        if (inScope.has(sale.counterparty)) {
          row.intercompany_sales_eliminated += sale.amounts[period] ?? 0;
        }
      }
    }
    row.revenue -= row.intercompany_sales_eliminated;
    row.opex -= row.intercompany_sales_eliminated;
    row.ebitda = row.revenue - row.opex;
    row.equity = row.total_assets - row.total_debt;

    for (const link of scope.links) {
      const lender = results.find((r) => r.entity_id === link.lender);
      const borrower = results.find((r) => r.entity_id === link.borrower);
      const asset = lender?.overdrafts.find((o) => o.link_id === link.id && o.role === "lender");
      const liability = borrower?.overdrafts.find((o) => o.link_id === link.id && o.role === "borrower");
      row.net_overdraft +=
        (asset?.schedule[period]?.closing_balance ?? 0) - (liability?.schedule[period]?.closing_balance ?? 0);
    }
    if (row.net_overdraft !== 0) {
      overdraftNetsToZero = false;
    }

    periods.push(row);
  }

  const columns: Record<string, number[]> = {};
  for (const key of ANNUAL_KEYS) {
    columns[key] = periods.map((row) => row[key]);
  }

  return {
    facilities,
    dscr: summarizeDscr(results),
    periods,
    annual: rollupColumns(columns, STOCK_KEYS),
    overdraftNetsToZero,
  };
}

/**
 * Cash flow available for debt service (EBITDA less tax) over scheduled
 * facility debt service, for every entity-period that has debt service due.
 */
export function summarizeDscr(results: readonly EntityResult[]): DscrSummary {
  const points: DscrPoint[] = [];
  for (const result of results) {
    result.pnl.forEach((pnl, period) => {
      const debtService = result.facilities.reduce(
        (total, facility) => total + (facility.schedule[period]?.total_debt_service ?? 0),
        0,
      );
      if (debtService <= TOLERANCE) {
        return;
      }
      const cfads = pnl.ebitda - pnl.tax;
      points.push({
        entity_id: result.entity_id,
        period,
        cfads,
        debt_service: debtService,
        dscr: cfads / debtService,
      });
    });
  }

  if (points.length === 0) {
    return { points, minimum: null, weighted_average: null };
  }

  let minimum = Number.POSITIVE_INFINITY;
  let totalCfads = 0;
  let totalDebtService = 0;
  for (const point of points) {
    minimum = Math.min(minimum, point.dscr);
    totalCfads += point.cfads;
    totalDebtService += point.debt_service;
  }
  return { points, minimum, weighted_average: totalCfads / totalDebtService };
}
