import assert from "node:assert/strict";
import { describe, it } from "vitest";
import {
  applyTransformToPoint,
  applyTransformToPoints,
  composeTransforms,
  decomposeTransform,
  DimensionMismatchError,
  invertTransform,
  type HomogeneousTransform,
  type Point
} from "../core/index.js";

const EPS = 1e-9;

function close(a: number, b: number, eps = EPS) {
  assert.ok(Math.abs(a - b) <= eps, `Expected ${a} ~ ${b}`);
}

function closeVec(a: Point, b: Point, eps = EPS) {
  assert.equal(a.length, b.length);
  a.forEach((value, i) => close(value, b[i], eps));
}

// 90 degrees about z, scale 2, translation (5, -1, 2).
const T: HomogeneousTransform = [
  [0, -2, 0, 5],
  [2, 0, 0, -1],
  [0, 0, 2, 2],
  [0, 0, 0, 1]
];

describe("applyTransform helpers", () => {
  it("applies scale, rotation and translation to a point", () => {
    closeVec(applyTransformToPoint(T, [1, 0, 0]), [5, 1, 2]);
    closeVec(applyTransformToPoint(T, [0, 1, 1]), [3, -1, 4]);
  });

  it("applies the same transform to every row of a point set", () => {
    const mapped = applyTransformToPoints(T, [
      [1, 0, 0],
      [0, 1, 1]
    ]);
    assert.equal(mapped.length, 2);
    closeVec(mapped[0], [5, 1, 2]);
    closeVec(mapped[1], [3, -1, 4]);
  });

  it("rejects points of the wrong dimension", () => {
    assert.throws(() => applyTransformToPoint(T, [1, 2]), DimensionMismatchError);
  });

  it("rejects matrices that are not square", () => {
    assert.throws(
      () =>
        applyTransformToPoint(
          [
            [1, 0, 0],
            [0, 1, 0]
          ],
          [1, 2]
        ),
      DimensionMismatchError
    );
  });
});

describe("composeTransforms", () => {
  it("applies the first transform, then the second", () => {
    const shift: HomogeneousTransform = [
      [1, 0, 1],
      [0, 1, 0],
      [0, 0, 1]
    ];
    const double: HomogeneousTransform = [
      [2, 0, 0],
      [0, 2, 0],
      [0, 0, 1]
    ];

    closeVec(applyTransformToPoint(composeTransforms(shift, double), [0, 0]), [2, 0]);
    closeVec(applyTransformToPoint(composeTransforms(double, shift), [0, 0]), [1, 0]);
  });

  it("rejects transforms of different dimension", () => {
    assert.throws(
      () =>
        composeTransforms(T, [
          [1, 0],
          [0, 1]
        ]),
      DimensionMismatchError
    );
  });
});

describe("invertTransform", () => {
  it("undoes the transform", () => {
    const inverse = invertTransform(T);
    const point: Point = [0.5, -3, 7];
    closeVec(applyTransformToPoint(inverse, applyTransformToPoint(T, point)), point);

    const identity = composeTransforms(T, inverse);
    identity.forEach((row, i) => row.forEach((value, j) => close(value, i === j ? 1 : 0)));
  });
});

describe("decomposeTransform", () => {
  it("splits a similarity into scale, rotation and translation", () => {
    const { scale, rotation, translation } = decomposeTransform(T);
    close(scale, 2);
    rotation.forEach((row, i) =>
      closeVec(row, [
        [0, -1, 0],
        [1, 0, 0],
        [0, 0, 1]
      ][i])
    );
    closeVec(translation, [5, -1, 2]);
  });

  it("leaves a zero block untouched", () => {
    const { scale, rotation } = decomposeTransform([
      [0, 0, 3],
      [0, 0, 4],
      [0, 0, 1]
    ]);
    assert.equal(scale, 0);
    assert.deepEqual(rotation, [
      [0, 0],
      [0, 0]
    ]);
  });
});
