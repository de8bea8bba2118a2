import type { HomogeneousTransform, Point } from "../types.js";

import { AnchorMatchError } from "../errors.js";
import type { TraceContext } from "../trace.js";
import { applyTransformToPoint, decomposeTransform } from "./apply.js";
import { estimateTransform } from "./umeyama.js";

export interface AnchorPoint {
  anchor_id: string;
  point: Point;
}

export interface AnchorResidual {
  anchor_id: string;
  residual: number;
  residual_vec: Point;
}

export interface AnchorAlignmentResult {
  /** Maps source anchors onto destination anchors. */
  T_dst_src: HomogeneousTransform;
  scale: number;
  rms: number;
  residuals: AnchorResidual[];
}

export interface AnchorAlignmentOptions {
  /** Defaults to true. */
  estimateScale?: boolean;
  tracer?: TraceContext;
}

function norm(v: Point): number {
  return Math.sqrt(v.reduce((acc, value) => acc + value * value, 0));
}

/**
 * Align two labeled point sets, pairing anchors by id. The order of
 * `dstAnchors` does not matter. Returns null for degenerate geometry.
 */
export function alignAnchors(
  srcAnchors: AnchorPoint[],
  dstAnchors: AnchorPoint[],
  options: AnchorAlignmentOptions = {}
): AnchorAlignmentResult | null {
  if (srcAnchors.length !== dstAnchors.length) {
    throw new AnchorMatchError(
      `Source and destination anchor lists must have the same length (${srcAnchors.length} vs ${dstAnchors.length}).`,
      "count_mismatch"
    );
  }

  const dstById = new Map<string, Point>();
  for (const { anchor_id, point } of dstAnchors) {
    if (dstById.has(anchor_id)) {
      throw new AnchorMatchError(`Duplicate destination anchor id: ${anchor_id}`, "duplicate_anchor", anchor_id);
    }
    dstById.set(anchor_id, point);
  }

  const pairs: Array<{ anchor_id: string; src: Point; dst: Point }> = [];
  for (const { anchor_id, point } of srcAnchors) {
    const dstPoint = dstById.get(anchor_id);
    if (!dstPoint) {
      throw new AnchorMatchError(`Missing destination anchor for id: ${anchor_id}`, "missing_anchor", anchor_id);
    }
    pairs.push({ anchor_id, src: point, dst: dstPoint });
  }

  const T_dst_src = estimateTransform(
    pairs.map((pair) => pair.src),
    pairs.map((pair) => pair.dst),
    options.estimateScale ?? true,
    { tracer: options.tracer }
  );
  if (!T_dst_src) {
    return null;
  }

  const residuals: AnchorResidual[] = pairs.map(({ anchor_id, src, dst }) => {
    const predicted = applyTransformToPoint(T_dst_src, src);
    const residual_vec = dst.map((value, i) => value - predicted[i]);
    return {
      anchor_id,
      residual: norm(residual_vec),
      residual_vec
    };
  });

  const rms = Math.sqrt(
    residuals.reduce((sum, residual) => sum + residual.residual * residual.residual, 0) / residuals.length
  );

  return { T_dst_src, scale: decomposeTransform(T_dst_src).scale, rms, residuals };
}
