import { Matrix, SingularValueDecomposition, determinant } from "ml-matrix";

import { NULL_BASIS_EPS, RANK_TOLERANCE } from "../constants.js";

export interface Decomposition {
  /** Left singular vectors, square. */
  u: Matrix;
  /** Singular values in descending order. */
  singularValues: number[];
  /** Transposed right singular vectors, square. */
  vt: Matrix;
  /** Number of singular values above the rank tolerance. */
  rank: number;
}

function dot(a: number[], b: number[]): number {
  return a.reduce((acc, value, index) => acc + value * b[index], 0);
}

function isFiniteMatrix(matrix: Matrix): boolean {
  return matrix.to1DArray().every((v) => Number.isFinite(v));
}

// Removes the components along each basis vector; returns the residual and its norm.
function orthogonalize(vector: number[], basis: number[][]): { residual: number[]; norm: number } {
  const residual = [...vector];
  for (const b of basis) {
    const projection = dot(residual, b);
    for (let i = 0; i < residual.length; i++) {
      residual[i] -= projection * b[i];
    }
  }
  return { residual, norm: Math.sqrt(dot(residual, residual)) };
}

function standardBasis(size: number, index: number): number[] {
  return Array.from({ length: size }, (_, i) => (i === index ? 1 : 0));
}

/**
 * Rebuilds the left singular vectors past `rank` from the matching right
 * singular vectors, so that a symmetric covariance gets U = V. When the
 * null space has more than one dimension, the last column is oriented for
 * det(U) * det(V) > 0.
 */
function completeLeftNullBasis(u: Matrix, v: Matrix, rank: number): Matrix {
  const size = u.rows;
  const basis: number[][] = [];
  for (let j = 0; j < rank; j++) {
    basis.push(u.getColumn(j));
  }

  for (let j = rank; j < size; j++) {
    let { residual, norm } = orthogonalize(v.getColumn(j), basis);
    if (norm <= NULL_BASIS_EPS) {
      for (let k = 0; k < size; k++) {
        const candidate = orthogonalize(standardBasis(size, k), basis);
        if (candidate.norm > norm) {
          ({ residual, norm } = candidate);
        }
      }
    }
    basis.push(residual.map((value) => value / norm));
  }

  const completed = new Matrix(size, size);
  basis.forEach((column, j) => completed.setColumn(j, column));
  if (size - rank > 1 && determinant(completed) * determinant(v) < 0) {
    completed.setColumn(size - 1, basis[size - 1].map((value) => -value));
  }
  return completed;
}

/**
 * Singular value decomposition of a square matrix, `a = u * diag(s) * vt`.
 * Returns null when the matrix or its factors are not finite.
 */
export function decompose(a: Matrix, rankTolerance = RANK_TOLERANCE): Decomposition | null {
  if (!a.isSquare()) {
    throw new RangeError(`Expected a square matrix, got ${a.rows}x${a.columns}`);
  }
  if (!isFiniteMatrix(a)) {
    return null;
  }

  const svd = new SingularValueDecomposition(a, { autoTranspose: false });
  const singularValues = svd.diagonal;
  const left = svd.leftSingularVectors;
  const right = svd.rightSingularVectors;
  if (!singularValues.every((s) => Number.isFinite(s)) || !isFiniteMatrix(left) || !isFiniteMatrix(right)) {
    return null;
  }

  const rank = matrixRank(singularValues, rankTolerance);
  const u = rank < a.rows ? completeLeftNullBasis(left, right, rank) : left;
  return { u, singularValues, vt: right.transpose(), rank };
}

export function matrixRank(singularValues: number[], tolerance = RANK_TOLERANCE): number {
  return singularValues.filter((s) => s > tolerance).length;
}
