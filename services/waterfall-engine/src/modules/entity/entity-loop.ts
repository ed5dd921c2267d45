import { Series } from "../../core/series.js";
import type { Timeline } from "../../core/timeline.js";
import { positive, TOLERANCE } from "../../core/math-utils.js";
import { BalanceSheetIdentityError, FdIncomeMismatchError } from "../../core/errors.js";
import type { EntityInput } from "../../types/inputs.js";
import type { BalanceSheetRow, EntityResult, PeriodPnl, WaterfallRow } from "../../types/results.js";
import { FacilityState } from "../facility/facility-state.js";
import { OperatingReserve } from "../reserves/operating-reserve.js";
import { DebtServiceReserve } from "../reserves/debt-service-reserve.js";
import { MezzanineDividendReserve } from "../reserves/mezzanine-dividend-reserve.js";
import { EntitySurplusReserve } from "../reserves/entity-surplus-reserve.js";
import { IntercompanyOverdraft } from "../reserves/intercompany-overdraft.js";
import { computePeriodPnl } from "../pnl/period-pnl.js";
import { DepreciationSchedule } from "../pnl/depreciation.js";
import { allocateWaterfall } from "../waterfall/waterfall-allocator.js";

export interface IntercompanyLendingPlan {
  linkId: string;
  counterparty: string;
  rate: number;
  demand?: readonly number[]; // Borrower deficit vector
  committed?: readonly number[]; // Lent vector fixed by an earlier pass
  repayments?: readonly number[]; // Borrower repayments to receive
}

export interface IntercompanyBorrowingPlan {
  linkId: string;
  counterparty: string;
  rate: number;
  received: readonly number[];
}

export interface EntityRunOptions {
  lending?: readonly IntercompanyLendingPlan[];
  borrowing?: readonly IntercompanyBorrowingPlan[];
  verify?: boolean; // Defaults to true
}

export interface EntityRunContext {
  timeline: Timeline;
  currency: string;
}

interface LendingPosition {
  plan: IntercompanyLendingPlan;
  overdraft: IntercompanyOverdraft;
}

interface BorrowingPosition {
  plan: IntercompanyBorrowingPlan;
  overdraft: IntercompanyOverdraft;
}

/**
 * Simulates one entity across every period of the timeline. All facility,
 * reserve and overdraft objects are created here, so each call starts from
 * the configured opening state.
 *
 * Per period: facilities compute, reserves accrue, the P&L takes the
 * accruals as fd_income, the waterfall allocates, allocations are applied,
 * facilities finalize with their acceleration and the DSRA target resets
 * from the finalized senior facility.
 */
export function runEntity(
  entity: EntityInput,
  context: EntityRunContext,
  options: EntityRunOptions = {},
): EntityResult {
  const { timeline, currency } = context;
  const periods = timeline.periods;
  const verify = options.verify ?? true;

  const revenue = Series.fromArray(entity.revenue);
  const opex = Series.fromArray(entity.opex);
  const capex = Series.fromArray(entity.capex);
  const equity = Series.fromArray(entity.equity_contributions);
  const inflows = (entity.inflows ?? []).map((inflow) => ({
    source: inflow.source,
    bypassesDsraGate: inflow.bypasses_dsra_gate,
    amounts: Series.fromOptional(inflow.amounts, periods),
  }));

  const facilities = entity.facilities.map((input) => new FacilityState(input));
  const senior = facilities.find((facility) => facility.kind === "senior");
  const mezzanine = facilities.find((facility) => facility.kind === "mezzanine");

  const opsReserve = new OperatingReserve(entity.reserves.operating, opex);
  const dsra = new DebtServiceReserve(entity.reserves.dsra);
  const mezzanineReserve = entity.reserves.mezzanine_dividend
    ? new MezzanineDividendReserve(entity.reserves.mezzanine_dividend)
    : null;
  const entityReserve = new EntitySurplusReserve(entity.reserves.entity);

  const lending: LendingPosition[] = (options.lending ?? []).map((plan) => ({
    plan,
    overdraft: new IntercompanyOverdraft(plan.linkId, "lender", plan.counterparty, plan.rate),
  }));
  const borrowing: BorrowingPosition[] = (options.borrowing ?? []).map((plan) => ({
    plan,
    overdraft: new IntercompanyOverdraft(plan.linkId, "borrower", plan.counterparty, plan.rate),
  }));

  const depreciation = new DepreciationSchedule(entity.depreciation, timeline.constructionPeriods);

  const pnlRows: PeriodPnl[] = [];
  const waterfallRows: WaterfallRow[] = [];
  const balanceSheet: BalanceSheetRow[] = [];
  const deficit: number[] = [];
  const lent: Record<string, number[]> = {};
  const repaid: Record<string, number[]> = {};
  for (const position of lending) {
    lent[position.plan.linkId] = [];
  }
  for (const position of borrowing) {
    repaid[position.plan.linkId] = [];
  }

  dsra.setTarget(senior?.nextDebtServiceEstimate() ?? 0, senior?.outstanding ?? 0);

  let cash = 0;
  let shortfall = 0;
  let taxLossPool = entity.tax.opening_loss_pool ?? 0;
  let cumulativeCapex = 0;
  let cumulativeIdc = 0;
  // Opening reserve deposits net of pre-existing facility debt count as paid-in equity
  let paidInEquity =
    opsReserve.currentBalance +
    dsra.currentBalance +
    (mezzanineReserve?.currentBalance ?? 0) +
    entityReserve.currentBalance -
    facilities.reduce((total, f) => total + f.outstanding, 0);
  let cumulativePat = 0;
  let cumulativeGrants = 0;
  let cumulativeDistributions = 0;

  for (const period of timeline.periodIterator()) {
    // 1. Facilities
    const facilityPeriods = facilities.map((facility) => facility.computePeriod(period));
    const mezzanineOpening =
      mezzanine ? facilityPeriods[facilities.indexOf(mezzanine)]?.opening_balance ?? 0 : 0;

    // 2. Reserves and overdrafts accrue
    const opsAccrual = opsReserve.accrue(period);
    const dsraAccrual = dsra.accrue(period);
    const mezzanineAccrual = mezzanineReserve?.accrue(period, mezzanineOpening) ?? null;
    const mezzaninePayoutDue = mezzanineReserve?.payoutDue(mezzanineOpening) ?? false;
    const entityAccrual = entityReserve.accrue(period);

    let intercompanyInterest = 0;
    for (const position of lending) {
      intercompanyInterest += position.overdraft.accrue(period);
    }
    for (const position of borrowing) {
      intercompanyInterest -= position.overdraft.accrue(period);
    }

    // 3. fd_income from the accruals
    let fdIncome = opsAccrual.interest_earned + dsraAccrual.interest_earned;
    if (mezzanineAccrual) {
      fdIncome += mezzanineAccrual.interest_earned;
    }
    fdIncome += entityAccrual.interest_earned;

    // 4. P&L
    const drawDowns = facilityPeriods.reduce((total, fp) => total + fp.draw_down, 0);
    cumulativeCapex += capex.get(period);
    cumulativeIdc += facilityPeriods.reduce((total, fp) => total + fp.idc, 0);
    const pnl = computePeriodPnl({
      period,
      revenue: revenue.get(period),
      opex: opex.get(period),
      depreciation: depreciation.charge(period, cumulativeCapex + cumulativeIdc),
      interestExpense: facilityPeriods.reduce((total, fp) => total + fp.interest_paid, 0),
      fdIncome,
      intercompanyInterest,
      taxRate: entity.tax.rate,
      taxLossPool,
    });
    taxLossPool = pnl.tax_loss_pool;
    pnlRows.push(pnl);

    // 5. Waterfall
    const row = allocateWaterfall({
      period,
      ebitda: pnl.ebitda,
      tax: pnl.tax,
      openingCash: cash,
      openingShortfall: shortfall,
      constructionFunding: equity.get(period) + drawDowns - capex.get(period),
      inflows: inflows.map((inflow) => ({
        source: inflow.source,
        amount: inflow.amounts.get(period),
        bypassesDsraGate: inflow.bypassesDsraGate,
      })),
      facilities: facilities.map((facility, index) => ({
        facilityId: facility.id,
        kind: facility.kind,
        rate: facility.rate,
        scheduledDebtService: facilityPeriods[index]?.total_debt_service ?? 0,
        balance: facilityPeriods[index]?.pre_acceleration_closing_balance ?? 0,
        accelerable: facility.accelerable,
      })),
      opsReserve: opsAccrual,
      dsra: dsraAccrual,
      mezzanineDividend: mezzanineAccrual
        ? { accrual: mezzanineAccrual, payoutDue: mezzaninePayoutDue }
        : null,
      entityReserve: entityAccrual,
      lending: lending.map(({ plan }) => ({
        linkId: plan.linkId,
        demand: plan.demand?.[period] ?? 0,
        committed: plan.committed ? plan.committed[period] ?? 0 : null,
        repaymentReceived: plan.repayments?.[period] ?? 0,
      })),
      borrowing: borrowing.map(({ plan, overdraft }) => ({
        linkId: plan.linkId,
        rate: plan.rate,
        balance: overdraft.outstanding,
        received: plan.received[period] ?? 0,
      })),
      sweepPct: entity.sweep_pct,
      dividendPolicy: {
        enabled: entity.dividends.enabled,
        startPeriod: entity.dividends.start_period,
        payoutPct: entity.dividends.payout_pct,
        requireDebtFree: entity.dividends.require_debt_free,
      },
    });

    // 6. Apply allocations
    opsReserve.fill(row.ops_reserve_fill);
    dsra.release(row.dsra_release);
    dsra.fill(row.dsra_fill);
    if (mezzanineReserve) {
      mezzanineReserve.fill(row.mezzanine_dividend_fill);
      if (mezzaninePayoutDue) {
        row.mezzanine_dividend_payout = mezzanineReserve.payout();
      }
    }
    entityReserve.fill(row.entity_reserve_fill);
    row.dividend = entityReserve.payDividend(row.dividend);

    for (const position of lending) {
      const flow = row.intercompany.find((f) => f.role === "lender" && f.link_id === position.plan.linkId);
      position.overdraft.advance(flow?.lent ?? 0);
      position.overdraft.repay(flow?.repayment_received ?? 0);
      position.overdraft.closePeriod();
      lent[position.plan.linkId]?.push(flow?.lent ?? 0);
    }
    for (const position of borrowing) {
      const flow = row.intercompany.find((f) => f.role === "borrower" && f.link_id === position.plan.linkId);
      position.overdraft.advance(flow?.received ?? 0);
      position.overdraft.repay(flow?.repaid ?? 0);
      position.overdraft.closePeriod();
      repaid[position.plan.linkId]?.push(flow?.repaid ?? 0);
    }

    // 7. Finalize facilities; any clamp excess returns to cash
    let excess = 0;
    facilities.forEach((facility, index) => {
      const allocation = row.facilities[index];
      const acceleration = allocation
        ? allocation.special_acceleration + allocation.surplus_acceleration
        : 0;
      excess += facility.finalizePeriod(period, acceleration).excess;
    });
    row.acceleration_excess = excess;
    const net = row.closing_cash - row.closing_shortfall + excess;
    row.closing_cash = positive(net);
    row.closing_shortfall = positive(-net);
    row.unmet.cash_shortfall = row.closing_shortfall;
    cash = row.closing_cash;
    shortfall = row.closing_shortfall;

    // 8. Next period's DSRA target from the finalized senior facility
    dsra.setTarget(senior?.nextDebtServiceEstimate() ?? 0, senior?.outstanding ?? 0);

    const opsMovement = opsReserve.closePeriod();
    const dsraMovement = dsra.closePeriod();
    const mezzanineMovement = mezzanineReserve?.closePeriod() ?? null;
    const entityMovement = entityReserve.closePeriod();

    waterfallRows.push(row);
    deficit.push(row.deficit);

    // Balance sheet
    paidInEquity += equity.get(period);
    cumulativePat += pnl.pat;
    cumulativeGrants += row.special_inflows + row.normal_inflows;
    cumulativeDistributions += row.mezzanine_dividend_payout + row.dividend;

    const fixedAssets = cumulativeCapex + cumulativeIdc - depreciation.accumulatedDepreciation;
    const receivable = lending.reduce((total, p) => total + p.overdraft.outstanding, 0);
    const payable = borrowing.reduce((total, p) => total + p.overdraft.outstanding, 0);
    const facilityDebt = facilities.reduce((total, f) => total + f.outstanding, 0);
    const totalAssets =
      fixedAssets +
      opsMovement.closing_balance +
      dsraMovement.closing_balance +
      (mezzanineMovement?.closing_balance ?? 0) +
      entityMovement.closing_balance +
      receivable +
      cash;
    const totalDebt = facilityDebt + payable + shortfall;
    const identityGap =
      totalAssets - totalDebt - (paidInEquity + cumulativePat + cumulativeGrants - cumulativeDistributions);

    balanceSheet.push({
      period,
      fixed_assets: fixedAssets,
      ops_reserve: opsMovement.closing_balance,
      dsra: dsraMovement.closing_balance,
      mezzanine_dividend_reserve: mezzanineMovement?.closing_balance ?? 0,
      entity_reserve: entityMovement.closing_balance,
      intercompany_receivable: receivable,
      cash,
      total_assets: totalAssets,
      facility_debt: facilityDebt,
      intercompany_payable: payable,
      cash_shortfall: shortfall,
      total_debt: totalDebt,
      paid_in_equity: paidInEquity,
      cumulative_pat: cumulativePat,
      cumulative_grants: cumulativeGrants,
      cumulative_distributions: cumulativeDistributions,
      identity_gap: identityGap,
    });

    if (verify) {
      if (pnl.fd_income !== row.reserve_interest) {
        throw new FdIncomeMismatchError(entity.id, period, "waterfall", pnl.fd_income, row.reserve_interest, currency);
      }
      if (Math.abs(identityGap) > TOLERANCE) {
        throw new BalanceSheetIdentityError(
          entity.id,
          period,
          {
            assets: totalAssets,
            debt: totalDebt,
            equity: paidInEquity,
            cumulativePat,
            cumulativeGrants,
            cumulativeDistributions,
            gap: identityGap,
          },
          currency,
        );
      }
    }
  }

  return {
    entity_id: entity.id,
    name: entity.name,
    currency,
    periods: timeline.indices.map((index) => timeline.describe(index)),
    facilities: facilities.map((facility) => facility.toSchedule()),
    reserves: {
      operating: [...opsReserve.history],
      dsra: [...dsra.history],
      mezzanine_dividend: mezzanineReserve ? [...mezzanineReserve.history] : null,
      entity: [...entityReserve.history],
    },
    pnl: pnlRows,
    waterfall: waterfallRows,
    balance_sheet: balanceSheet,
    overdrafts: [
      ...lending.map((position) => position.overdraft.toSchedule()),
      ...borrowing.map((position) => position.overdraft.toSchedule()),
    ],
    capex: capex.toArray(),
    equity_contributions: equity.toArray(),
    deficit,
    lent,
    repaid,
  };
}
