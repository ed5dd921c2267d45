/**
 * Immutable per-period vector. Revenue, opex, capex and inflow projections
 * enter the engine as plain arrays and are wrapped here once, so every
 * consumer reads a validated, fixed-length copy.
 */
export class Series {
  readonly values: readonly number[];
  readonly length: number;

  constructor(values: number[] | readonly number[]);
  constructor(length: number, initialValue?: number);
  constructor(valuesOrLength: number[] | readonly number[] | number, initialValue = 0) {
    const values =
      typeof valuesOrLength === "number"
        ? Series.fromLength(valuesOrLength, initialValue)
        : valuesOrLength;

    if (!Array.isArray(values)) {
      throw new TypeError("values must be an array");
    }

    const copied = Array.from(values, (value, index) => {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new TypeError(`values[${index}] must be a finite number`);
      }
      return value;
    });

    this.values = Object.freeze(copied);
    this.length = copied.length;
  }

  static zeros(length: number): Series {
    return new Series(Series.fromLength(length, 0));
  }

  static fromArray(arr: readonly number[]): Series {
    return new Series(arr);
  }

  /**
   * Wraps an optional projection, treating a missing vector as all zeros.
   */
  static fromOptional(arr: readonly number[] | undefined, length: number): Series {
    if (arr === undefined) {
      return Series.zeros(length);
    }
    if (arr.length !== length) {
      throw new Error(`Series length mismatch: expected ${length}, received ${arr.length}`);
    }
    return new Series(arr);
  }

  get(index: number): number {
    if (!Number.isInteger(index)) {
      throw new TypeError("index must be an integer");
    }
    if (index < 0 || index >= this.length) {
      throw new RangeError(`index must be between 0 and ${Math.max(0, this.length - 1)}`);
    }
    return this.values[index] ?? 0;
  }

  /**
   * Value at index, or 0 beyond either end. Used for look-ahead reads.
   */
  at(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      return 0;
    }
    return this.values[index] ?? 0;
  }

  sumRange(start: number, end: number): number {
    Series.assertIndex(start, "start");
    Series.assertIndex(end, "end");
    if (start < 0 || end < 0 || start > end || start > this.length || end > this.length) {
      throw new RangeError(`Range must satisfy 0 <= start <= end <= ${this.length}`);
    }

    let total = 0;
    for (let i = start; i < end; i += 1) {
      total += this.values[i] ?? 0;
    }
    return total;
  }

  /**
   * First index at or after `from` whose absolute value is at least
   * `threshold`, or -1.
   */
  findNext(from: number, threshold: number): number {
    for (let i = Math.max(0, from); i < this.length; i += 1) {
      if (Math.abs(this.values[i] ?? 0) >= threshold) {
        return i;
      }
    }
    return -1;
  }

  toArray(): number[] {
    return Array.from(this.values);
  }

  private static assertIndex(value: number, name: string): void {
    if (!Number.isInteger(value)) {
      throw new TypeError(`${name} must be an integer`);
    }
  }

  private static assertFiniteNumber(value: number, name: string): void {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new TypeError(`${name} must be a finite number`);
    }
  }

  private static fromLength(length: number, initialValue: number): number[] {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError("length must be a non-negative integer");
    }
    Series.assertFiniteNumber(initialValue, "initialValue");
    return Array.from({ length }, () => initialValue);
  }
}
