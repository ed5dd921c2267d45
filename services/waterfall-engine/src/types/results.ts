import type { PeriodInfo } from "../core/timeline.js";
import type { FacilityKind } from "./inputs.js";

export type FacilityPhase = "construction" | "repayment" | "retired";

export interface FacilityPeriod {
  period: number;
  phase: FacilityPhase;
  opening_balance: number;
  draw_down: number;
  interest_accrued: number;
  idc: number; // Capitalised, construction only
  interest_paid: number;
  principal_paid: number;
  total_debt_service: number; // interest_paid + principal_paid
  pre_acceleration_closing_balance: number;
  acceleration: number;
  closing_balance: number;
}

export interface FacilitySchedule {
  facility_id: string;
  kind: FacilityKind;
  rate: number;
  maturity_period: number;
  schedule: FacilityPeriod[];
}

export interface ReserveAccrual {
  opening_balance: number;
  interest_earned: number;
  balance_after_interest: number;
  target_balance: number;
  funding_gap: number;
  releasable_excess: number;
}

export interface ReserveMovement extends ReserveAccrual {
  period: number;
  filled: number;
  released: number;
  paid_out: number; // Mezzanine payout or dividend withdrawal
  closing_balance: number;
}

export interface MezzanineDividendMovement extends ReserveMovement {
  liability: number;
}

export interface ReserveHistory {
  operating: ReserveMovement[];
  dsra: ReserveMovement[];
  mezzanine_dividend: MezzanineDividendMovement[] | null;
  entity: ReserveMovement[];
}

export interface PeriodPnl {
  period: number;
  revenue: number;
  opex: number;
  ebitda: number;
  depreciation: number;
  ebit: number;
  interest_expense: number;
  fd_income: number;
  intercompany_interest: number; // Income for a lender, expense (negative) for a borrower
  pbt: number;
  tax: number;
  pat: number;
  tax_loss_pool: number;
}

export interface FacilityAllocation {
  facility_id: string;
  kind: FacilityKind;
  scheduled_debt_service: number;
  paid_from_special: number;
  paid_from_normal: number;
  special_acceleration: number;
  surplus_acceleration: number;
}

export type InstrumentType = "facility" | "overdraft";

export interface AccelerationAllocation {
  instrument_id: string;
  instrument: InstrumentType;
  rate: number;
  amount: number;
}

export interface IntercompanyFlow {
  link_id: string;
  role: "lender" | "borrower";
  lent: number;
  received: number;
  repaid: number;
  repayment_received: number;
}

export interface UnmetNeeds {
  debt_service: number;
  ops_reserve_gap: number;
  dsra_gap: number;
  mezzanine_dividend_gap: number;
  cash_shortfall: number; // Same as the row's closing_shortfall
}

export interface WaterfallRow {
  period: number;
  ebitda: number;
  tax: number;
  opening_cash: number;
  opening_shortfall: number;
  construction_funding: number; // Equity + draw-downs - capex
  normal_inflows: number;
  special_inflows: number;
  normal_pool: number;
  special_pool: number;
  reserve_interest: number;
  facilities: FacilityAllocation[];
  debt_service_paid: number;
  ops_reserve_fill: number;
  dsra_fill: number;
  dsra_release: number;
  intercompany: IntercompanyFlow[];
  mezzanine_dividend_fill: number;
  mezzanine_dividend_payout: number;
  dsra_funded: boolean;
  accelerations: AccelerationAllocation[];
  special_acceleration: number;
  surplus_acceleration: number;
  acceleration_excess: number; // Clamp excess routed back to cash
  entity_reserve_fill: number;
  dividend: number;
  closing_cash: number;
  closing_shortfall: number; // Uncovered need carried to the next period
  deficit: number;
  unmet: UnmetNeeds;
}

export interface BalanceSheetRow {
  period: number;
  fixed_assets: number;
  ops_reserve: number;
  dsra: number;
  mezzanine_dividend_reserve: number;
  entity_reserve: number;
  intercompany_receivable: number;
  cash: number;
  total_assets: number;
  facility_debt: number;
  intercompany_payable: number;
  cash_shortfall: number;
  total_debt: number; // Facilities, intercompany payable and any carried shortfall
  paid_in_equity: number;
  cumulative_pat: number;
  cumulative_grants: number;
  cumulative_distributions: number;
  identity_gap: number;
}

export interface OverdraftPeriod {
  period: number;
  opening_balance: number;
  interest: number;
  advanced: number; // Lent (lender) or received (borrower)
  repaid: number;
  closing_balance: number;
}

export interface OverdraftSchedule {
  link_id: string;
  role: "lender" | "borrower";
  counterparty: string;
  rate: number;
  schedule: OverdraftPeriod[];
}

export interface EntityResult {
  entity_id: string;
  name: string;
  currency: string;
  periods: PeriodInfo[];
  facilities: FacilitySchedule[];
  reserves: ReserveHistory;
  pnl: PeriodPnl[];
  waterfall: WaterfallRow[];
  balance_sheet: BalanceSheetRow[];
  overdrafts: OverdraftSchedule[];
  capex: number[];
  equity_contributions: number[];
  deficit: number[];
  lent: Record<string, number[]>;
  repaid: Record<string, number[]>;
}
