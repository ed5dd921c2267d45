import type { PeriodPnl } from "../../types/results.js";

export interface PeriodPnlInputs {
  period: number;
  revenue: number;
  opex: number;
  depreciation: number;
  interestExpense: number; // Cash facility interest, senior + mezzanine + secondary
  fdIncome: number; // Sum of this period's reserve interest accruals
  intercompanyInterest: number;
  taxRate: number;
  taxLossPool: number; // Carried losses, zero or negative
}

export interface TaxResult {
  tax: number;
  taxLossPool: number;
}

// Losses carry forward without expiry and are used up before any tax is due
export function calcTax(pbt: number, rate: number, lossPool: number): TaxResult {
  const taxable = pbt + lossPool;
  if (taxable > 0) {
    return { tax: taxable * rate, taxLossPool: 0 };
  }
  return { tax: 0, taxLossPool: taxable };
}

/**
 * Income statement for one period. fd_income is taken as given: it is never
 * re-derived from balances or rates here.
 */
export function computePeriodPnl(inputs: PeriodPnlInputs): PeriodPnl {
  const ebitda = inputs.revenue - inputs.opex;
  const ebit = ebitda - inputs.depreciation;
  const pbt = ebit - inputs.interestExpense + inputs.fdIncome + inputs.intercompanyInterest;
  const { tax, taxLossPool } = calcTax(pbt, inputs.taxRate, inputs.taxLossPool);

  return {
    period: inputs.period,
    revenue: inputs.revenue,
    opex: inputs.opex,
    ebitda,
    depreciation: inputs.depreciation,
    ebit,
    interest_expense: inputs.interestExpense,
    fd_income: inputs.fdIncome,
    intercompany_interest: inputs.intercompanyInterest,
    pbt,
    tax,
    pat: pbt - tax,
    tax_loss_pool: taxLossPool,
  };
}
