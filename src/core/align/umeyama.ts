import { Matrix, determinant } from "ml-matrix";

import { DimensionMismatchError } from "../errors.js";
import { decompose } from "../math/svd.js";
import { toPointMatrix, type PointSetInput } from "../math/pointMatrix.js";
import { noopTracer, type TraceContext } from "../trace.js";
import type { HomogeneousTransform, RotationBranch } from "../types.js";

export interface EstimateOptions {
  tracer?: TraceContext;
}

/**
 * Estimate the similarity transform mapping `src` onto `dst` (Kabsch-Umeyama).
 *
 * Row i of `src` is paired with row i of `dst`. Returns a (C+1)x(C+1)
 * homogeneous matrix whose rotation block is proper whenever the point
 * geometry determines one, or null when the problem is not well-conditioned
 * (zero-rank covariance, or a factorization that is not finite).
 *
 * @param estimateScale when false the scale is fixed at 1 and only a rigid
 *   transform is fitted.
 *
 * @example
 * ```ts
 * const src = PointMatrix.fromNested([[1, 2, 3], [4, 5, 6]]);
 * const dst = PointMatrix.fromFlat(2, 3, [1, 2, 3, 4, 5, 6]);
 * estimateTransform(src, dst, true); // 4x4 identity
 * ```
 */
export function estimateTransform<R extends number, C extends number>(
  src: PointSetInput<R, C>,
  dst: PointSetInput<R, C>,
  estimateScale: boolean,
  options: EstimateOptions = {}
): HomogeneousTransform | null {
  const tracer = options.tracer ?? noopTracer;
  const source = toPointMatrix(src);
  const target = toPointMatrix(dst);
  if (source.rows !== target.rows || source.columns !== target.columns) {
    throw new DimensionMismatchError(
      `Source is ${source.rows}x${source.columns} but destination is ${target.rows}x${target.columns}`,
      [source.rows, source.columns],
      [target.rows, target.columns]
    );
  }

  const dim = source.columns;
  const num = source.rows;

  const srcMean = source.toMatrix().mean("column");
  const dstMean = target.toMatrix().mean("column");
  const srcDemean = source.toMatrix().subRowVector(srcMean);
  const dstDemean = target.toMatrix().subRowVector(dstMean);
  tracer.onCentered?.(srcMean, dstMean);

  const a = dstDemean.transpose().mmul(srcDemean).div(num);
  const detA = determinant(a);
  const d = new Array<number>(dim).fill(1);
  if (detA < 0) {
    d[dim - 1] = -1;
  }
  tracer.onCovariance?.(a.to2DArray(), detA);

  const svd = decompose(a);
  if (!svd) {
    tracer.onNoSolution?.("decomposition_failed");
    return null;
  }
  const { u, singularValues, vt, rank } = svd;
  tracer.onDecomposition?.(singularValues, rank);

  if (rank === 0) {
    tracer.onNoSolution?.("zero_rank");
    return null;
  }

  let rotation: Matrix;
  let branch: RotationBranch;
  if (rank === dim - 1) {
    if (determinant(u) * determinant(vt) > 0) {
      rotation = u.mmul(vt);
      branch = "rank_deficient_direct";
    } else {
      const flipped = [...d];
      flipped[dim - 1] = -1;
      rotation = u.mmul(Matrix.diag(flipped)).mmul(vt);
      branch = "rank_deficient_flipped";
    }
  } else {
    rotation = u.mmul(Matrix.diag(d)).mmul(vt);
    branch = "reflection_guard";
  }
  tracer.onRotationBranch?.(branch);

  let scale = 1;
  if (estimateScale) {
    const variance = srcDemean
      .variance("column", { unbiased: false })
      .reduce((acc, value) => acc + value, 0);
    if (!(variance > 0)) {
      tracer.onNoSolution?.("zero_variance");
      return null;
    }
    scale = singularValues.reduce((acc, s, i) => acc + s * d[i], 0) / variance;
  }
  tracer.onScale?.(scale, estimateScale);

  const rotatedMean = rotation.mmul(Matrix.columnVector(srcMean)).getColumn(0);
  const translation = dstMean.map((value, i) => value - scale * rotatedMean[i]);

  const transform = Matrix.eye(dim + 1);
  transform.setSubMatrix(rotation.mul(scale), 0, 0);
  for (let i = 0; i < dim; i++) {
    transform.set(i, dim, translation[i]);
  }

  const result = transform.to2DArray();
  tracer.onComplete?.(result);
  return result;
}
