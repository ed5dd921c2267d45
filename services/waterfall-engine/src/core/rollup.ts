import { Series } from "./series.js";

/**
 * How a half-year line aggregates into a year: flows add both halves, stocks
 * take the closing (second-half) value.
 */
export type RollupMode = "flow" | "stock";

export function periodsToAnnual(series: Series, mode: RollupMode): number[] {
  const totals: number[] = [];
  for (let period = 0; period < series.length; period += 2) {
    const end = Math.min(series.length, period + 2);
    totals.push(mode === "flow" ? series.sumRange(period, end) : series.get(end - 1));
  }
  return totals;
}

export function rollupColumns(
  columns: Readonly<Record<string, readonly number[]>>,
  stockKeys: ReadonlySet<string>,
): Record<string, number[]> {
  const annual: Record<string, number[]> = {};
  for (const [key, values] of Object.entries(columns)) {
    annual[key] = periodsToAnnual(new Series(values), stockKeys.has(key) ? "stock" : "flow");
  }
  return annual;
}
