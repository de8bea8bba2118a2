import { applyTransformToPoints } from "../core/align/apply.js";
import { estimateTransform } from "../core/align/umeyama.js";
import { REQUEST_SCHEMA_VERSION } from "../core/constants.js";
import { noopTracer, type TraceContext } from "../core/trace.js";
import type { HomogeneousTransform } from "../core/types.js";
import { validateAlignmentRequest } from "../core/validate.js";

export type AlignmentResponse =
  | {
      schema_version: typeof REQUEST_SCHEMA_VERSION;
      status: "ok";
      transform: HomogeneousTransform;
      /** Root-mean-square distance between transformed src and dst. */
      rms: number;
    }
  | {
      schema_version: typeof REQUEST_SCHEMA_VERSION;
      status: "no_solution";
      transform: null;
      rms: null;
    };

/**
 * Validate a parsed request, estimate the transform and score it.
 * Throws ValidationError for malformed input; degenerate geometry is a
 * "no_solution" response.
 */
export function runAlignmentRequest(data: unknown, tracer: TraceContext = noopTracer): AlignmentResponse {
  const request = validateAlignmentRequest(data);
  const transform = estimateTransform(request.src, request.dst, request.estimate_scale, { tracer });
  if (!transform) {
    return { schema_version: REQUEST_SCHEMA_VERSION, status: "no_solution", transform: null, rms: null };
  }

  const mapped = applyTransformToPoints(transform, request.src);
  const sumSquares = mapped.reduce(
    (sum, point, i) => sum + point.reduce((acc, value, j) => acc + (value - request.dst[i][j]) ** 2, 0),
    0
  );

  return {
    schema_version: REQUEST_SCHEMA_VERSION,
    status: "ok",
    transform,
    rms: Math.sqrt(sumSquares / mapped.length)
  };
}
