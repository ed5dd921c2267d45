import { irr, npv } from "../../core/irr.js";
import { sum, TOLERANCE } from "../../core/math-utils.js";
import { periodsToAnnual } from "../../core/rollup.js";
import { Series } from "../../core/series.js";
import type { EntityResult } from "../../types/results.js";

export const DEFAULT_DISCOUNT_RATE = 0.052;

/** Year-by-year flows the metrics are computed on. */
export interface AnnualCashflows {
  revenue: number[];
  ebitda: number[];
  pat: number[];
  cfads: number[]; // EBITDA less tax
  debt_service: number[]; // Scheduled facility debt service
  capex: number[];
  equity_contributions: number[];
  grants: number[]; // Normal and special inflows
  facility_debt: number[]; // Year-end
}

export interface EntityMetrics {
  entity_id: string;
  discount_rate: number;
  total_revenue: number;
  total_ebitda: number;
  total_pat: number;
  ebitda_margin: number | null;
  pat_margin: number | null;
  dscr: (number | null)[];
  dscr_min: number | null;
  dscr_average: number | null;
  project_irr: number | null;
  equity_irr: number | null;
  llcr: (number | null)[];
  llcr_min: number | null;
  plcr: (number | null)[];
  plcr_min: number | null;
}

function flow(values: readonly number[]): number[] {
  return periodsToAnnual(new Series(values), "flow");
}

function ratio(numerator: number, denominator: number): number | null {
  return Math.abs(denominator) > TOLERANCE ? numerator / denominator : null;
}

function present(values: readonly (number | null)[]): number[] {
  return values.filter((value): value is number => value !== null);
}

function minimum(values: readonly (number | null)[]): number | null {
  const defined = present(values);
  return defined.length > 0 ? Math.min(...defined) : null;
}

/**
 * Annual IRR of the flows, or null when they have none (no sign change, or
 * no root the solver can bracket).
 */
export function rateOfReturn(cashflows: readonly number[]): number | null {
  try {
    return irr(cashflows);
  } catch {
    return null;
  }
}

export function annualCashflows(result: EntityResult): AnnualCashflows {
  const debtService = result.pnl.map((_, period) =>
    sum(result.facilities.map((facility) => facility.schedule[period]?.total_debt_service ?? 0)),
  );

  return {
    revenue: flow(result.pnl.map((row) => row.revenue)),
    ebitda: flow(result.pnl.map((row) => row.ebitda)),
    pat: flow(result.pnl.map((row) => row.pat)),
    cfads: flow(result.pnl.map((row) => row.ebitda - row.tax)),
    debt_service: flow(debtService),
    capex: flow(result.capex),
    equity_contributions: flow(result.equity_contributions),
    grants: flow(result.waterfall.map((row) => row.normal_inflows + row.special_inflows)),
    facility_debt: periodsToAnnual(new Series(result.balance_sheet.map((row) => row.facility_debt)), "stock"),
  };
}

export function dscrSeries(annual: AnnualCashflows): (number | null)[] {
  return annual.cfads.map((cfads, year) => {
    const debtService = annual.debt_service[year] ?? 0;
    return debtService > TOLERANCE ? cfads / debtService : null;
  });
}

export function projectIrr(annual: AnnualCashflows): number | null {
  return rateOfReturn(annual.cfads.map((cfads, year) => cfads - (annual.capex[year] ?? 0)));
}

export function equityIrr(annual: AnnualCashflows): number | null {
  return rateOfReturn(
    annual.cfads.map(
      (cfads, year) =>
        cfads -
        (annual.debt_service[year] ?? 0) +
        (annual.grants[year] ?? 0) -
        (annual.equity_contributions[year] ?? 0),
    ),
  );
}

/**
 * Present value of CFADS from each year through `lastYear`, each year's flow
 * discounted to the start of the year, over that year's closing debt. Null
 * where no debt is outstanding or the window has closed.
 */
export function coverageRatios(
  cfads: readonly number[],
  debt: readonly number[],
  discountRate: number,
  lastYear: number,
): (number | null)[] {
  return cfads.map((_, year) => {
    const outstanding = debt[year] ?? 0;
    if (outstanding <= TOLERANCE || year > lastYear) {
      return null;
    }
    return npv(discountRate, [0, ...cfads.slice(year, lastYear + 1)]) / outstanding;
  });
}

/** Loan life coverage, through the year the last facility matures. */
export function llcrSeries(result: EntityResult, annual: AnnualCashflows, discountRate: number): (number | null)[] {
  const lastPeriod = result.periods.length - 1;
  const maturities = result.facilities.map((facility) => Math.min(facility.maturity_period, lastPeriod));
  if (maturities.length === 0) {
    return annual.cfads.map(() => null);
  }
  const lastYear = result.periods[Math.max(...maturities)]?.yearIndex ?? annual.cfads.length - 1;
  return coverageRatios(annual.cfads, annual.facility_debt, discountRate, lastYear);
}

/** Project life coverage, through the last modelled year. */
export function plcrSeries(annual: AnnualCashflows, discountRate: number): (number | null)[] {
  return coverageRatios(annual.cfads, annual.facility_debt, discountRate, annual.cfads.length - 1);
}

export function extractMetrics(result: EntityResult, discountRate = DEFAULT_DISCOUNT_RATE): EntityMetrics {
  const annual = annualCashflows(result);
  const totalRevenue = sum(annual.revenue);
  const totalEbitda = sum(annual.ebitda);
  const totalPat = sum(annual.pat);

  const dscr = dscrSeries(annual);
  const covered = present(dscr);
  const llcr = llcrSeries(result, annual, discountRate);
  const plcr = plcrSeries(annual, discountRate);

  return {
    entity_id: result.entity_id,
    discount_rate: discountRate,
    total_revenue: totalRevenue,
    total_ebitda: totalEbitda,
    total_pat: totalPat,
    ebitda_margin: ratio(totalEbitda, totalRevenue),
    pat_margin: ratio(totalPat, totalRevenue),
    dscr,
    dscr_min: minimum(dscr),
    dscr_average: covered.length > 0 ? sum(covered) / covered.length : null,
    project_irr: projectIrr(annual),
    equity_irr: equityIrr(annual),
    llcr,
    llcr_min: minimum(llcr),
    plcr,
    plcr_min: minimum(plcr),
  };
}
