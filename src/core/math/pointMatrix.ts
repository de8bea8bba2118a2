import { Matrix } from "ml-matrix";

import { LengthMismatchError, ValidationError } from "../errors.js";
import type { NestedArray } from "../types.js";

/**
 * Anything the estimator accepts as a point set: an adapter instance or
 * row-major nested rows.
 */
export type PointSetInput<R extends number = number, C extends number = number> =
  | PointMatrix<R, C>
  | readonly (readonly number[])[];

function assertShape(rows: number, columns: number): void {
  const errors: string[] = [];
  if (!Number.isInteger(rows) || rows < 1) {
    errors.push(`rows must be a positive integer, got ${rows}`);
  }
  if (!Number.isInteger(columns) || columns < 1) {
    errors.push(`columns must be a positive integer, got ${columns}`);
  }
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
}

/**
 * Dense row-major R x C point set of 64-bit floats. Row i is one point,
 * column j one coordinate. Immutable once built.
 *
 * When R and C are literal types (`PointMatrix.fromFlat(4, 3, data)`), two
 * point sets of different shape are rejected by the compiler.
 */
export class PointMatrix<R extends number = number, C extends number = number> {
  readonly rows: R;
  readonly columns: C;
  private readonly values: Float64Array;

  private constructor(rows: R, columns: C, values: Float64Array) {
    this.rows = rows;
    this.columns = columns;
    this.values = values;
  }

  /**
   * Build from a flat row-major sequence, or a fixed-size array such as a
   * tuple or Float64Array. Index i lands on row floor(i / C), column i % C.
   */
  static fromFlat<R extends number, C extends number>(
    rows: R,
    columns: C,
    data: ArrayLike<number>
  ): PointMatrix<R, C> {
    assertShape(rows, columns);
    const expected = rows * columns;
    if (data.length !== expected) {
      throw new LengthMismatchError(
        `Expected ${expected} values for a ${rows}x${columns} point set, got ${data.length}`,
        expected,
        data.length
      );
    }

    const values = Float64Array.from(data);
    const bad = values.findIndex((v) => !Number.isFinite(v));
    if (bad >= 0) {
      throw new ValidationError([
        `value at row ${Math.floor(bad / columns)}, column ${bad % columns} is not a finite number`
      ]);
    }
    return new PointMatrix(rows, columns, values);
  }

  /**
   * Build from nested rows. Every row must have the length of the first.
   */
  static fromNested(nested: readonly (readonly number[])[]): PointMatrix {
    if (nested.length === 0) {
      throw new ValidationError(["point set must contain at least one row"]);
    }
    const columns = nested[0].length;
    nested.forEach((row, index) => {
      if (row.length !== columns) {
        throw new LengthMismatchError(
          `Row ${index} has ${row.length} values, expected ${columns}`,
          columns,
          row.length
        );
      }
    });
    return PointMatrix.fromFlat(nested.length, columns, nested.flat());
  }

  get(row: number, column: number): number {
    if (row < 0 || row >= this.rows || column < 0 || column >= this.columns) {
      throw new RangeError(`Index (${row}, ${column}) outside ${this.rows}x${this.columns} point set`);
    }
    return this.values[row * this.columns + column];
  }

  row(index: number): number[] {
    if (index < 0 || index >= this.rows) {
      throw new RangeError(`Row ${index} outside ${this.rows}x${this.columns} point set`);
    }
    const start = index * this.columns;
    return Array.from(this.values.subarray(start, start + this.columns));
  }

  toNested(): NestedArray {
    return Array.from({ length: this.rows }, (_, i) => this.row(i));
  }

  toFlat(): number[] {
    return Array.from(this.values);
  }

  /** Fresh ml-matrix copy; callers may mutate it freely. */
  toMatrix(): Matrix {
    return Matrix.from1DArray(this.rows, this.columns, this.toFlat());
  }
}

export function toPointMatrix(input: PointSetInput): PointMatrix {
  return input instanceof PointMatrix ? input : PointMatrix.fromNested(input);
}
