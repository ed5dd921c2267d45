import { formatAmount } from "./math-utils.js";
import type { ValidationError } from "../types/module.js";

/**
 * Malformed or missing model parameters. Raised before any period is
 * simulated.
 */
export class ConfigurationError extends Error {
  constructor(public readonly errors: ValidationError[]) {
    super(
      `Invalid model configuration:\n${errors.map((e) => `  ${e.path}: ${e.message}`).join("\n")}`,
    );
    this.name = "ConfigurationError";
  }
}

export interface IdentityQuantities {
  assets: number;
  debt: number;
  equity: number;
  cumulativePat: number;
  cumulativeGrants: number;
  cumulativeDistributions: number;
  gap: number;
}

export class BalanceSheetIdentityError extends Error {
  constructor(
    public readonly entityId: string,
    public readonly period: number,
    public readonly quantities: IdentityQuantities,
    currency: string,
  ) {
    const q = quantities;
    super(
      `${entityId} period ${period}: assets - debt ${formatAmount(q.assets - q.debt, currency)} vs ` +
        `equity + retained ${formatAmount(
          q.equity + q.cumulativePat + q.cumulativeGrants - q.cumulativeDistributions,
          currency,
        )} - gap ${formatAmount(q.gap, currency)}`,
    );
    this.name = "BalanceSheetIdentityError";
  }
}

export class FdIncomeMismatchError extends Error {
  constructor(
    public readonly entityId: string,
    public readonly period: number,
    public readonly source: string,
    public readonly pnlFdIncome: number,
    public readonly otherFdIncome: number,
    currency: string,
  ) {
    super(
      `${entityId} period ${period}: fd_income ${formatAmount(pnlFdIncome, currency)} (P&L) vs ` +
        `${formatAmount(otherFdIncome, currency)} (${source}) - mismatch ` +
        `${formatAmount(Math.abs(pnlFdIncome - otherFdIncome), currency)}`,
    );
    this.name = "FdIncomeMismatchError";
  }
}

export class IntercompanyAsymmetryError extends Error {
  constructor(
    public readonly linkId: string,
    public readonly lenderId: string,
    public readonly borrowerId: string,
    public readonly period: number,
    public readonly lenderAsset: number,
    public readonly borrowerLiability: number,
    currency: string,
  ) {
    super(
      `${linkId} period ${period}: ${lenderId} asset ${formatAmount(lenderAsset, currency)} vs ` +
        `${borrowerId} liability ${formatAmount(borrowerLiability, currency)} - mismatch ` +
        `${formatAmount(Math.abs(lenderAsset - borrowerLiability), currency)}`,
    );
    this.name = "IntercompanyAsymmetryError";
  }
}

/**
 * A facility or reserve object was driven out of its per-period order
 * (e.g. finalizing a period that was never computed).
 */
export class SequenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SequenceError";
  }
}
