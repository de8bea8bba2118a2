import { Matrix, inverse } from "ml-matrix";

import { DimensionMismatchError } from "../errors.js";
import { toPointMatrix, type PointSetInput } from "../math/pointMatrix.js";
import type { HomogeneousTransform, Point, SimilarityComponents } from "../types.js";

function dimensionOf(transform: HomogeneousTransform): number {
  const size = transform.length;
  if (size < 2 || transform.some((row) => row.length !== size)) {
    throw new DimensionMismatchError(
      `Expected a square homogeneous transform, got ${size}x${transform[0]?.length ?? 0}`,
      [size, transform[0]?.length ?? 0],
      [size, size]
    );
  }
  return size - 1;
}

export function applyTransformToPoint(transform: HomogeneousTransform, point: Point): Point {
  const dim = dimensionOf(transform);
  if (point.length !== dim) {
    throw new DimensionMismatchError(
      `Point has ${point.length} coordinates, transform expects ${dim}`,
      [1, point.length],
      [dim + 1, dim + 1]
    );
  }
  return transform
    .slice(0, dim)
    .map((row) => row.slice(0, dim).reduce((acc, value, j) => acc + value * point[j], row[dim]));
}

export function applyTransformToPoints(
  transform: HomogeneousTransform,
  points: PointSetInput
): number[][] {
  return toPointMatrix(points)
    .toNested()
    .map((point) => applyTransformToPoint(transform, point));
}

// Applies `first` then `second`.
export function composeTransforms(
  first: HomogeneousTransform,
  second: HomogeneousTransform
): HomogeneousTransform {
  const dim = dimensionOf(first);
  if (dimensionOf(second) !== dim) {
    throw new DimensionMismatchError(
      "Cannot compose transforms of different dimension",
      [first.length, first.length],
      [second.length, second.length]
    );
  }
  return new Matrix(second).mmul(new Matrix(first)).to2DArray();
}

export function invertTransform(transform: HomogeneousTransform): HomogeneousTransform {
  dimensionOf(transform);
  return inverse(new Matrix(transform)).to2DArray();
}

/**
 * Split a similarity transform into scale, rotation and translation. The
 * scale is the Frobenius norm of the linear block over sqrt(C), which is
 * exact for `scale * R` with R orthonormal.
 */
export function decomposeTransform(transform: HomogeneousTransform): SimilarityComponents {
  const dim = dimensionOf(transform);
  const block = transform.slice(0, dim).map((row) => row.slice(0, dim));
  const frobenius = Math.sqrt(block.flat().reduce((acc, value) => acc + value * value, 0));
  const scale = frobenius / Math.sqrt(dim);
  const rotation = scale === 0 ? block : block.map((row) => row.map((value) => value / scale));
  const translation = transform.slice(0, dim).map((row) => row[dim]);
  return { scale, rotation, translation };
}
