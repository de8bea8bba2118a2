import { describe, it, expect } from "vitest";
import { LengthMismatchError, PointMatrix, ValidationError, toPointMatrix } from "../core/index.js";

describe("PointMatrix.fromFlat", () => {
  it("reads values row-major", () => {
    const m = PointMatrix.fromFlat(2, 3, [1, 2, 3, 4, 5, 6]);
    expect(m.rows).toBe(2);
    expect(m.columns).toBe(3);
    expect(m.get(0, 2)).toBe(3);
    expect(m.get(1, 0)).toBe(4);
    expect(m.row(1)).toEqual([4, 5, 6]);
    expect(m.toNested()).toEqual([
      [1, 2, 3],
      [4, 5, 6]
    ]);
  });

  it("accepts fixed-size arrays", () => {
    const fixed = new Float64Array([0.5, -1, 2, 8]);
    const m = PointMatrix.fromFlat(2, 2, fixed);
    expect(m.toFlat()).toEqual([0.5, -1, 2, 8]);

    const tuple: [number, number, number] = [7, 8, 9];
    expect(PointMatrix.fromFlat(3, 1, tuple).toNested()).toEqual([[7], [8], [9]]);
  });

  it("throws LengthMismatchError for every length other than rows x columns", () => {
    for (const length of [0, 1, 5, 7, 12]) {
      const data = Array.from({ length }, (_, i) => i);
      expect(() => PointMatrix.fromFlat(2, 3, data)).toThrow(LengthMismatchError);
    }
  });

  it("reports expected and actual lengths", () => {
    try {
      PointMatrix.fromFlat(2, 3, []);
      expect.unreachable("fromFlat should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(LengthMismatchError);
      if (err instanceof LengthMismatchError) {
        expect(err.expected).toBe(6);
        expect(err.actual).toBe(0);
        expect(err.message).toBe("Expected 6 values for a 2x3 point set, got 0");
      }
    }
  });

  it("rejects non-positive shapes", () => {
    expect(() => PointMatrix.fromFlat(0, 3, [])).toThrow(ValidationError);
    expect(() => PointMatrix.fromFlat(2, 1.5, [1, 2, 3])).toThrow(
      "Validation failed: columns must be a positive integer, got 1.5"
    );
  });

  it("rejects non-finite values", () => {
    expect(() => PointMatrix.fromFlat(2, 2, [1, 2, Number.NaN, 4])).toThrow(
      "Validation failed: value at row 1, column 0 is not a finite number"
    );
  });
});

describe("PointMatrix.fromNested", () => {
  it("takes its shape from the rows", () => {
    const m = PointMatrix.fromNested([
      [1, 2],
      [3, 4],
      [5, 6]
    ]);
    expect(m.rows).toBe(3);
    expect(m.columns).toBe(2);
    expect(m.get(2, 1)).toBe(6);
  });

  it("throws LengthMismatchError for ragged rows", () => {
    expect(() => PointMatrix.fromNested([[1, 2], [3]])).toThrow(
      new LengthMismatchError("Row 1 has 1 values, expected 2", 2, 1)
    );
  });

  it("throws ValidationError for an empty point set", () => {
    expect(() => PointMatrix.fromNested([])).toThrow(ValidationError);
  });
});

describe("PointMatrix accessors", () => {
  it("returns copies that do not alias the stored values", () => {
    const m = PointMatrix.fromFlat(1, 2, [1, 2]);
    const nested = m.toNested();
    nested[0][0] = 99;
    const copy = m.toMatrix();
    copy.set(0, 1, -1);
    expect(m.toNested()).toEqual([[1, 2]]);
  });

  it("throws RangeError outside the matrix", () => {
    const m = PointMatrix.fromFlat(1, 2, [1, 2]);
    expect(() => m.get(1, 0)).toThrow(RangeError);
    expect(() => m.row(-1)).toThrow(RangeError);
  });

  it("converts to an ml-matrix copy", () => {
    const m = PointMatrix.fromFlat(2, 2, [1, 2, 3, 4]);
    expect(m.toMatrix().to2DArray()).toEqual([
      [1, 2],
      [3, 4]
    ]);
  });
});

describe("toPointMatrix", () => {
  it("passes adapter instances through and wraps nested rows", () => {
    const m = PointMatrix.fromFlat(1, 3, [1, 2, 3]);
    expect(toPointMatrix(m)).toBe(m);
    expect(toPointMatrix([[1, 2, 3]]).toFlat()).toEqual([1, 2, 3]);
  });
});
