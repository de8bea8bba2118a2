/**
 * Lightweight tracing infrastructure for debugging transform estimation.
 *
 * Usage:
 * ```typescript
 * import { createTracer, noopTracer } from "./trace.js";
 *
 * // For debugging:
 * const tracer = createTracer(console.log);
 *
 * // For production (no overhead):
 * const tracer = noopTracer;
 * ```
 */

import type { HomogeneousTransform, NoSolutionReason, RotationBranch } from "./types.js";

export interface TraceContext {
  /** Called once both point sets have been centered */
  onCentered?(srcMean: number[], dstMean: number[]): void;

  /** Called when the cross-covariance matrix is built */
  onCovariance?(covariance: number[][], determinant: number): void;

  /** Called after the singular value decomposition */
  onDecomposition?(singularValues: number[], rank: number): void;

  /** Called when the rotation has been assembled */
  onRotationBranch?(branch: RotationBranch): void;

  /** Called when the scale is fixed */
  onScale?(scale: number, estimated: boolean): void;

  /** Called when estimation gives up */
  onNoSolution?(reason: NoSolutionReason): void;

  /** Called with the assembled transform */
  onComplete?(transform: HomogeneousTransform): void;
}

/**
 * No-op tracer that has zero overhead when tracing is disabled.
 */
export const noopTracer: TraceContext = {};

function formatVector(values: number[]): string {
  return `[${values.map((v) => v.toFixed(4)).join(", ")}]`;
}

/**
 * Create a tracer that logs to a provided log function.
 */
export function createTracer(log: (message: string) => void): TraceContext {
  return {
    onCentered(srcMean, dstMean) {
      log(`[TRACE] centered: src_mean=${formatVector(srcMean)}, dst_mean=${formatVector(dstMean)}`);
    },

    onCovariance(covariance, determinant) {
      log(`[TRACE] covariance ${covariance.length}x${covariance.length}: det=${determinant.toExponential(3)}`);
    },

    onDecomposition(singularValues, rank) {
      log(`[TRACE] svd: singular_values=${formatVector(singularValues)}, rank=${rank}`);
    },

    onRotationBranch(branch) {
      log(`[TRACE] rotation: ${branch}`);
    },

    onScale(scale, estimated) {
      log(`[TRACE] scale=${scale.toFixed(6)} (${estimated ? "estimated" : "fixed"})`);
    },

    onNoSolution(reason) {
      log(`[TRACE] no solution: ${reason}`);
    },

    onComplete(transform) {
      log(`[TRACE] Complete: ${transform.length}x${transform.length} transform`);
    }
  };
}

/**
 * Create a tracer that collects events into an array for later inspection.
 */
export interface TraceEvent {
  type: string;
  timestamp: number;
  data: Record<string, unknown>;
}

export function createCollectorTracer(): {
  tracer: TraceContext;
  getEvents: () => TraceEvent[];
  clear: () => void;
} {
  const events: TraceEvent[] = [];

  const addEvent = (type: string, data: Record<string, unknown>) => {
    events.push({ type, timestamp: Date.now(), data });
  };

  const tracer: TraceContext = {
    onCentered(srcMean, dstMean) {
      addEvent("centered", { srcMean, dstMean });
    },

    onCovariance(covariance, determinant) {
      addEvent("covariance", { covariance, determinant });
    },

    onDecomposition(singularValues, rank) {
      addEvent("decomposition", { singularValues, rank });
    },

    onRotationBranch(branch) {
      addEvent("rotation_branch", { branch });
    },

    onScale(scale, estimated) {
      addEvent("scale", { scale, estimated });
    },

    onNoSolution(reason) {
      addEvent("no_solution", { reason });
    },

    onComplete(transform) {
      addEvent("complete", { transform });
    }
  };

  return {
    tracer,
    getEvents: () => [...events],
    clear: () => {
      events.length = 0;
    }
  };
}

/**
 * Merge multiple tracers into one. Each event triggers all tracers.
 */
export function mergeTracers(...tracers: TraceContext[]): TraceContext {
  return {
    onCentered(srcMean, dstMean) {
      for (const t of tracers) t.onCentered?.(srcMean, dstMean);
    },
    onCovariance(covariance, determinant) {
      for (const t of tracers) t.onCovariance?.(covariance, determinant);
    },
    onDecomposition(singularValues, rank) {
      for (const t of tracers) t.onDecomposition?.(singularValues, rank);
    },
    onRotationBranch(branch) {
      for (const t of tracers) t.onRotationBranch?.(branch);
    },
    onScale(scale, estimated) {
      for (const t of tracers) t.onScale?.(scale, estimated);
    },
    onNoSolution(reason) {
      for (const t of tracers) t.onNoSolution?.(reason);
    },
    onComplete(transform) {
      for (const t of tracers) t.onComplete?.(transform);
    }
  };
}
