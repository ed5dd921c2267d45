import { DateTime } from "luxon";

export type PeriodPhase = "construction" | "operations";

export interface TimelineConfig {
  startDate: string; // ISO date string (e.g., '2025-01-01')
  periods: number; // Total half-year periods in the model
  constructionPeriods?: number; // Optional, defaults to 0
}

export interface PeriodInfo {
  index: number;
  label: string;
  phase: PeriodPhase;
  yearIndex: number;
  startDate: string;
  endDate: string;
}

const MONTHS_PER_PERIOD = 6;

export class Timeline {
  readonly startDate: DateTime;
  readonly periods: number;
  readonly constructionPeriods: number;
  readonly endDate: DateTime;
  readonly indices: number[];

  constructor(config: TimelineConfig) {
    if (!Number.isInteger(config.periods) || config.periods <= 0) {
      throw new Error("periods must be a positive integer");
    }

    const startDate = DateTime.fromISO(config.startDate, { zone: "utc" }).startOf("month");
    if (!startDate.isValid) {
      throw new Error(`Invalid startDate: ${config.startDate}`);
    }

    const constructionPeriods = config.constructionPeriods ?? 0;
    if (
      !Number.isInteger(constructionPeriods) ||
      constructionPeriods < 0 ||
      constructionPeriods >= config.periods
    ) {
      throw new Error("constructionPeriods must be an integer between 0 and periods - 1");
    }

    this.startDate = startDate;
    this.periods = config.periods;
    this.constructionPeriods = constructionPeriods;
    this.endDate = this.startDate.plus({ months: this.periods * MONTHS_PER_PERIOD });
    this.indices = Array.from({ length: this.periods }, (_, i) => i);
  }

  dateAt(index: number): DateTime {
    this.assertIndex(index);
    return this.startDate.plus({ months: index * MONTHS_PER_PERIOD });
  }

  periodEnd(index: number): DateTime {
    this.assertIndex(index);
    return this.startDate.plus({ months: (index + 1) * MONTHS_PER_PERIOD }).minus({ days: 1 });
  }

  phase(index: number): PeriodPhase {
    this.assertIndex(index);
    return index < this.constructionPeriods ? "construction" : "operations";
  }

  label(index: number): string {
    this.assertIndex(index);
    return index < this.constructionPeriods
      ? `C${index + 1}`
      : `R${index - this.constructionPeriods + 1}`;
  }

  yearIndex(index: number): number {
    this.assertIndex(index);
    return Math.floor(index / 2);
  }

  describe(index: number): PeriodInfo {
    return {
      index,
      label: this.label(index),
      phase: this.phase(index),
      yearIndex: this.yearIndex(index),
      startDate: this.dateAt(index).toISODate() ?? "",
      endDate: this.periodEnd(index).toISODate() ?? "",
    };
  }

  *periodIterator(): Generator<number> {
    for (let i = 0; i < this.periods; i += 1) {
      yield i;
    }
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index)) {
      throw new Error("period index must be an integer");
    }
    if (index < 0 || index >= this.periods) {
      throw new RangeError(`period index must be between 0 and ${this.periods - 1}`);
    }
  }
}
