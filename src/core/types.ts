/** A point with one coordinate per dimension. */
export type Point = number[];

/** Row-major nested rows, one row per point. */
export type NestedArray = number[][];

/**
 * Row-major (C+1)x(C+1) homogeneous matrix. The top-left CxC block holds the
 * scaled rotation, column C holds the translation, the last row is [0, ..., 0, 1].
 */
export type HomogeneousTransform = number[][];

export interface SimilarityComponents {
  scale: number;
  rotation: number[][];
  translation: Point;
}

export type RotationBranch =
  | "reflection_guard"
  | "rank_deficient_direct"
  | "rank_deficient_flipped";

export type NoSolutionReason = "decomposition_failed" | "zero_rank" | "zero_variance";
