import { positive, TOLERANCE } from "../../core/math-utils.js";
import type { FacilityKind } from "../../types/inputs.js";
import type {
  AccelerationAllocation,
  FacilityAllocation,
  IntercompanyFlow,
  ReserveAccrual,
  WaterfallRow,
} from "../../types/results.js";

export interface WaterfallCashInflow {
  source: string;
  amount: number;
  bypassesDsraGate: boolean;
}

export interface WaterfallFacilityInput {
  facilityId: string;
  kind: FacilityKind;
  rate: number;
  scheduledDebtService: number;
  balance: number; // Pre-acceleration closing balance
  accelerable: boolean;
}

export interface WaterfallLendingInput {
  linkId: string;
  demand: number; // Counterparty deficit for this period
  committed: number | null; // Fixed advance when settling a previous pass
  repaymentReceived: number;
}

export interface WaterfallBorrowingInput {
  linkId: string;
  rate: number;
  balance: number; // After this period's interest, before flows
  received: number;
}

export interface WaterfallMezzanineInput {
  accrual: ReserveAccrual;
  payoutDue: boolean;
}

export interface DividendPolicy {
  enabled: boolean;
  startPeriod: number;
  payoutPct: number;
  requireDebtFree: boolean;
}

export interface WaterfallInputs {
  period: number;
  ebitda: number;
  tax: number;
  openingCash: number;
  openingShortfall: number; // Uncovered need carried in, settled ahead of every step
  constructionFunding: number;
  inflows: readonly WaterfallCashInflow[];
  facilities: readonly WaterfallFacilityInput[];
  opsReserve: ReserveAccrual;
  dsra: ReserveAccrual;
  mezzanineDividend: WaterfallMezzanineInput | null;
  entityReserve: ReserveAccrual;
  lending: readonly WaterfallLendingInput[];
  borrowing: readonly WaterfallBorrowingInput[];
  sweepPct: number;
  dividendPolicy: DividendPolicy;
}

interface RankedInstrument {
  id: string;
  instrument: "facility" | "overdraft";
  rate: number;
  outstanding: number;
  order: number;
}

/**
 * Allocates one period's cash through the fixed priority cascade:
 *
 *  1. split inflows into the special (gate-exempt) and normal pools
 *  2. special pool: senior scheduled debt service, then senior acceleration
 *  3. remaining scheduled debt service on every facility
 *  4. operating reserve gap
 *  5. DSRA gap, or release of its excess
 *  6. intercompany receipts, repayments received and advances
 *  7. mezzanine dividend reserve toward its liability (payout when due;
 *     an unfunded part stays owed and blocks dividends)
 *  8. gate: stop discretionary use unless the DSRA is funded
 *  9. surplus acceleration by rate, highest first, including overdrafts
 * 10. entity surplus reserve, once every interest-bearing balance is zero
 * 11. dividends out of the entity surplus reserve
 *
 * Pure: inputs are read-only and the caller applies the returned row to its
 * facilities and reserves. Scheduled debt service is always paid. Cash never
 * closes below zero: what it cannot cover closes as `closing_shortfall`, an
 * explicit carried liability, and is recorded in `unmet`. Discretionary steps
 * only draw on positive cash.
 */
export function allocateWaterfall(inputs: WaterfallInputs): WaterfallRow {
  // 1. Pools
  let specialInflows = 0;
  let normalInflows = 0;
  for (const inflow of inputs.inflows) {
    if (inflow.bypassesDsraGate) {
      specialInflows += inflow.amount;
    } else {
      normalInflows += inflow.amount;
    }
  }
  const normalPool = inputs.ebitda - inputs.tax + normalInflows;
  const specialPool = specialInflows;
  let remaining = inputs.openingCash - inputs.openingShortfall + inputs.constructionFunding + normalPool;
  const available = () => positive(remaining);

  const allocations: FacilityAllocation[] = inputs.facilities.map((facility) => ({
    facility_id: facility.facilityId,
    kind: facility.kind,
    scheduled_debt_service: facility.scheduledDebtService,
    paid_from_special: 0,
    paid_from_normal: 0,
    special_acceleration: 0,
    surplus_acceleration: 0,
  }));

  // 2. Special pool, not gated
  let special = specialPool;
  let specialAcceleration = 0;
  const seniorIndex = inputs.facilities.findIndex((facility) => facility.kind === "senior");
  const senior = inputs.facilities[seniorIndex];
  const seniorAllocation = allocations[seniorIndex];
  if (senior && seniorAllocation) {
    const toDebtService = Math.min(positive(special), senior.scheduledDebtService);
    seniorAllocation.paid_from_special = toDebtService;
    special -= toDebtService;

    specialAcceleration = Math.min(positive(special), senior.balance);
    seniorAllocation.special_acceleration = specialAcceleration;
    special -= specialAcceleration;
  }
  remaining += special;

  // 3. Scheduled debt service
  let normalDebtService = 0;
  for (const allocation of allocations) {
    const due = allocation.scheduled_debt_service - allocation.paid_from_special;
    allocation.paid_from_normal = due;
    normalDebtService += due;
  }
  remaining -= normalDebtService;
  const unmetDebtService = Math.min(normalDebtService, positive(-remaining));
  const debtServicePaid = allocations.reduce((total, a) => total + a.scheduled_debt_service, 0);

  // 4. Operating reserve
  const opsFill = Math.min(available(), inputs.opsReserve.funding_gap);
  remaining -= opsFill;

  // 5. DSRA
  const dsraRelease = inputs.dsra.releasable_excess;
  remaining += dsraRelease;
  const dsraFill = Math.min(available(), inputs.dsra.funding_gap);
  remaining -= dsraFill;

  const deficit = positive(positive(-remaining) - inputs.openingShortfall);

  // 6. Intercompany
  const intercompany: IntercompanyFlow[] = [];
  for (const borrowing of inputs.borrowing) {
    remaining += borrowing.received;
    intercompany.push({
      link_id: borrowing.linkId,
      role: "borrower",
      lent: 0,
      received: borrowing.received,
      repaid: 0,
      repayment_received: 0,
    });
  }
  for (const lending of inputs.lending) {
    remaining += lending.repaymentReceived;
    const lent = lending.committed ?? Math.min(available(), positive(lending.demand));
    remaining -= lent;
    intercompany.push({
      link_id: lending.linkId,
      role: "lender",
      lent,
      received: 0,
      repaid: 0,
      repayment_received: lending.repaymentReceived,
    });
  }

  // 7. Mezzanine dividend reserve
  let mezzanineFill = 0;
  let mezzaninePayout = 0;
  let mezzanineGapLeft = 0;
  const mezzanine = inputs.mezzanineDividend;
  if (mezzanine) {
    mezzanineFill = Math.min(available(), mezzanine.accrual.funding_gap);
    remaining -= mezzanineFill;
    mezzanineGapLeft = mezzanine.accrual.funding_gap - mezzanineFill;
    if (mezzanine.payoutDue) {
      mezzaninePayout = mezzanine.accrual.balance_after_interest + mezzanineFill;
    }
  }

  // 8. Gate
  const dsraBalance = inputs.dsra.balance_after_interest + dsraFill - dsraRelease;
  const dsraFunded =
    dsraBalance >= inputs.dsra.target_balance - TOLERANCE || inputs.dsra.target_balance < TOLERANCE;

  // 9. Surplus acceleration
  const accelerations: AccelerationAllocation[] = [];
  const repaidByLink = new Map<string, number>();
  if (dsraFunded) {
    for (const instrument of rankInstruments(inputs, specialAcceleration)) {
      const amount = Math.min(available() * inputs.sweepPct, instrument.outstanding);
      if (amount <= 0) {
        continue;
      }
      remaining -= amount;
      accelerations.push({
        instrument_id: instrument.id,
        instrument: instrument.instrument,
        rate: instrument.rate,
        amount,
      });
      if (instrument.instrument === "facility") {
        const allocation = allocations[instrument.order];
        if (allocation) {
          allocation.surplus_acceleration += amount;
        }
      } else {
        repaidByLink.set(instrument.id, (repaidByLink.get(instrument.id) ?? 0) + amount);
      }
    }
  }
  for (const flow of intercompany) {
    if (flow.role === "borrower") {
      flow.repaid = repaidByLink.get(flow.link_id) ?? 0;
    }
  }
  const surplusAcceleration = accelerations.reduce((total, a) => total + a.amount, 0);

  // 10. Entity surplus reserve
  const debtFree = isDebtFree(inputs, allocations, intercompany);
  const entityReserveFill = dsraFunded && debtFree ? available() : 0;
  remaining -= entityReserveFill;

  // 11. Dividends
  const policy = inputs.dividendPolicy;
  const mezzanineSettled = mezzanineGapLeft <= TOLERANCE;
  const eligible =
    policy.enabled &&
    dsraFunded &&
    inputs.period >= policy.startPeriod &&
    (!policy.requireDebtFree || debtFree) &&
    mezzanineSettled;
  const dividend = eligible
    ? (inputs.entityReserve.balance_after_interest + entityReserveFill) * policy.payoutPct
    : 0;

  return {
    period: inputs.period,
    ebitda: inputs.ebitda,
    tax: inputs.tax,
    opening_cash: inputs.openingCash,
    opening_shortfall: inputs.openingShortfall,
    construction_funding: inputs.constructionFunding,
    normal_inflows: normalInflows,
    special_inflows: specialInflows,
    normal_pool: normalPool,
    special_pool: specialPool,
    reserve_interest: reserveInterest(inputs),
    facilities: allocations,
    debt_service_paid: debtServicePaid,
    ops_reserve_fill: opsFill,
    dsra_fill: dsraFill,
    dsra_release: dsraRelease,
    intercompany,
    mezzanine_dividend_fill: mezzanineFill,
    mezzanine_dividend_payout: mezzaninePayout,
    dsra_funded: dsraFunded,
    accelerations,
    special_acceleration: specialAcceleration,
    surplus_acceleration: surplusAcceleration,
    acceleration_excess: 0,
    entity_reserve_fill: entityReserveFill,
    dividend,
    closing_cash: positive(remaining),
    closing_shortfall: positive(-remaining),
    deficit,
    unmet: {
      debt_service: unmetDebtService,
      ops_reserve_gap: inputs.opsReserve.funding_gap - opsFill,
      dsra_gap: inputs.dsra.funding_gap - dsraFill,
      mezzanine_dividend_gap: mezzanineGapLeft,
      cash_shortfall: positive(-remaining),
    },
  };
}

/**
 * Interest-bearing instruments open to voluntary prepayment, highest rate
 * first. Equal rates keep declaration order, facilities before overdrafts.
 */
export function rankInstruments(
  inputs: Pick<WaterfallInputs, "facilities" | "borrowing">,
  specialAcceleration = 0,
): RankedInstrument[] {
  const instruments: RankedInstrument[] = [];
  inputs.facilities.forEach((facility, index) => {
    const outstanding =
      facility.balance - (facility.kind === "senior" ? specialAcceleration : 0);
    if (facility.accelerable && outstanding > TOLERANCE) {
      instruments.push({
        id: facility.facilityId,
        instrument: "facility",
        rate: facility.rate,
        outstanding,
        order: index,
      });
    }
  });
  inputs.borrowing.forEach((borrowing, index) => {
    const outstanding = borrowing.balance + borrowing.received;
    if (outstanding > TOLERANCE) {
      instruments.push({
        id: borrowing.linkId,
        instrument: "overdraft",
        rate: borrowing.rate,
        outstanding,
        order: index,
      });
    }
  });

  return instruments
    .map((instrument, position) => ({ instrument, position }))
    .sort((a, b) => b.instrument.rate - a.instrument.rate || a.position - b.position)
    .map(({ instrument }) => instrument);
}

function isDebtFree(
  inputs: WaterfallInputs,
  allocations: readonly FacilityAllocation[],
  intercompany: readonly IntercompanyFlow[],
): boolean {
  const facilitiesClear = inputs.facilities.every((facility, index) => {
    const allocation = allocations[index];
    const accelerated = allocation
      ? allocation.special_acceleration + allocation.surplus_acceleration
      : 0;
    return facility.balance - accelerated <= TOLERANCE;
  });
  const overdraftsClear = inputs.borrowing.every((borrowing) => {
    const flow = intercompany.find((f) => f.role === "borrower" && f.link_id === borrowing.linkId);
    const repaid = flow?.repaid ?? 0;
    return borrowing.balance + borrowing.received - repaid <= TOLERANCE;
  });
  return facilitiesClear && overdraftsClear;
}

function reserveInterest(inputs: WaterfallInputs): number {
  let total = inputs.opsReserve.interest_earned + inputs.dsra.interest_earned;
  if (inputs.mezzanineDividend) {
    total += inputs.mezzanineDividend.accrual.interest_earned;
  }
  total += inputs.entityReserve.interest_earned;
  return total;
}
