// Waterfall Engine V1 input types (snake_case, matching the JSON contract)

export interface ContractInput {
  contract_version: "WATERFALL_ENGINE_V1";
  engine_version: string;
}

export interface ModelInput {
  name: string;
  currency: string;
  start_date: string; // ISO date
  periods: number; // Half-year periods
  construction_periods: number;
}

export type FacilityKind = "senior" | "mezzanine" | "secondary_currency";
export type AmortizationProfile = "annuity" | "constant_principal";

export interface FacilityInput {
  id: string;
  kind: FacilityKind;
  rate: number; // Annual, nominal
  grace_periods: number; // Interest capitalised (IDC), no principal
  repayments: number; // Scheduled repayment periods after grace
  draw_downs: number[]; // Per period, grace periods only
  opening_balance?: number;
  profile?: AmortizationProfile; // Defaults to annuity
  accelerable?: boolean; // Defaults to true
}

export interface OperatingReserveInput {
  coverage_pct: number;
  rate: number;
  opening_balance?: number;
}

export interface DebtServiceReserveInput {
  accrues_interest: boolean;
  rate?: number; // Required when accrues_interest is true
  opening_balance?: number;
}

export interface MezzanineDividendReserveInput {
  rate: number;
  dividend_rate: number;
  opening_balance?: number;
}

export interface EntityReserveInput {
  rate: number;
  opening_balance?: number;
}

export interface ReservesInput {
  operating: OperatingReserveInput;
  dsra: DebtServiceReserveInput;
  mezzanine_dividend?: MezzanineDividendReserveInput;
  entity: EntityReserveInput;
}

export interface CashInflowInput {
  source: string;
  bypasses_dsra_gate: boolean;
  amounts: number[];
}

export interface DividendPolicyInput {
  enabled: boolean;
  start_period: number;
  payout_pct: number;
  require_debt_free: boolean;
}

export type DepreciationMethod = "straight_line" | "accelerated";

export interface DepreciationInput {
  method: DepreciationMethod;
  useful_life_years?: number; // straight_line
  annual_rates?: number[]; // accelerated, fractions of cost per year
  start_period?: number; // Defaults to the first operations period
}

export interface TaxInput {
  rate: number;
  opening_loss_pool?: number; // Non-positive
}

export interface IntercompanySaleInput {
  counterparty: string;
  amounts: number[]; // Portion of revenue billed to the counterparty
}

export interface EntityInput {
  id: string;
  name: string;
  revenue: number[];
  opex: number[];
  capex: number[];
  equity_contributions: number[];
  facilities: FacilityInput[];
  reserves: ReservesInput;
  inflows?: CashInflowInput[];
  tax: TaxInput;
  depreciation: DepreciationInput;
  dividends: DividendPolicyInput;
  sweep_pct: number;
  intercompany_sales?: IntercompanySaleInput[];
}

export interface IntercompanyLinkInput {
  id: string;
  lender: string;
  borrower: string;
  rate: number;
}

export interface WaterfallEngineInputs {
  contract: ContractInput;
  model: ModelInput;
  entities: EntityInput[];
  intercompany?: IntercompanyLinkInput[];
}
