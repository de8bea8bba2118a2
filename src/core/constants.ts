/**
 * Centralized numerical constants for similarity estimation.
 */

/**
 * Singular values at or below this value do not count towards the rank of
 * the cross-covariance matrix.
 */
export const RANK_TOLERANCE = 1e-5;

/**
 * Minimum residual norm for a candidate vector when completing an
 * orthonormal null-space basis.
 */
export const NULL_BASIS_EPS = 1e-8;

/**
 * Schema version accepted by the request pipeline.
 */
export const REQUEST_SCHEMA_VERSION = "v0.1";
