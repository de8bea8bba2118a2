export { estimateTransform } from "./align/umeyama.js";
export { alignAnchors } from "./align/anchors.js";
export {
  applyTransformToPoint,
  applyTransformToPoints,
  composeTransforms,
  decomposeTransform,
  invertTransform
} from "./align/apply.js";
export { PointMatrix, toPointMatrix } from "./math/pointMatrix.js";
export { decompose, matrixRank } from "./math/svd.js";
export { validateAlignmentRequest, validatePointSet } from "./validate.js";
export { createCollectorTracer, createTracer, mergeTracers, noopTracer } from "./trace.js";
export {
  AlignmentError,
  AnchorMatchError,
  DimensionMismatchError,
  LengthMismatchError,
  ValidationError
} from "./errors.js";
export { NULL_BASIS_EPS, RANK_TOLERANCE, REQUEST_SCHEMA_VERSION } from "./constants.js";
export { runAlignmentRequest } from "../pipelines/alignRequest.js";
export type {
  HomogeneousTransform,
  NestedArray,
  NoSolutionReason,
  Point,
  RotationBranch,
  SimilarityComponents
} from "./types.js";
export type { EstimateOptions } from "./align/umeyama.js";
export type {
  AnchorAlignmentOptions,
  AnchorAlignmentResult,
  AnchorPoint,
  AnchorResidual
} from "./align/anchors.js";
export type { PointSetInput } from "./math/pointMatrix.js";
export type { Decomposition } from "./math/svd.js";
export type { AlignmentRequest } from "./validate.js";
export type { TraceContext, TraceEvent } from "./trace.js";
export type { AlignmentResponse } from "../pipelines/alignRequest.js";
