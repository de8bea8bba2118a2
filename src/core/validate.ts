/**
 * Runtime validation for untyped alignment input (parsed JSON and the like).
 */

import { REQUEST_SCHEMA_VERSION } from "./constants.js";
import { ValidationError } from "./errors.js";
import type { NestedArray } from "./types.js";

export { ValidationError };

export interface AlignmentRequest {
  schema_version: typeof REQUEST_SCHEMA_VERSION;
  src: NestedArray;
  dst: NestedArray;
  estimate_scale: boolean;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Appends problems to `errors`; returns the rows when the shape is usable.
function collectPointSet(value: unknown, label: string, errors: string[]): NestedArray | undefined {
  if (!Array.isArray(value)) {
    errors.push(`${label} must be an array of points`);
    return undefined;
  }
  if (value.length === 0) {
    errors.push(`${label} must contain at least one point`);
    return undefined;
  }

  const before = errors.length;
  const rows: NestedArray = [];
  let columns: number | undefined;
  value.forEach((row: unknown, i) => {
    const prefix = `${label}[${i}]`;
    if (!Array.isArray(row) || row.length === 0) {
      errors.push(`${prefix} must be a non-empty array of numbers`);
      return;
    }
    if (columns === undefined) {
      columns = row.length;
    } else if (row.length !== columns) {
      errors.push(`${prefix} has ${row.length} coordinates, expected ${columns}`);
    }
    const coords: number[] = [];
    row.forEach((coordinate: unknown, j) => {
      if (isFiniteNumber(coordinate)) {
        coords.push(coordinate);
      } else {
        errors.push(`${prefix}[${j}] must be a finite number`);
      }
    });
    rows.push(coords);
  });

  return errors.length === before ? rows : undefined;
}

/**
 * Validate a point set: a non-empty array of equally sized, non-empty
 * rows of finite numbers.
 */
export function validatePointSet(data: unknown, label = "points"): NestedArray {
  const errors: string[] = [];
  const rows = collectPointSet(data, label, errors);
  if (!rows || errors.length > 0) {
    throw new ValidationError(errors);
  }
  return rows;
}

/**
 * Validate an AlignmentRequest. `estimate_scale` defaults to true.
 */
export function validateAlignmentRequest(data: unknown): AlignmentRequest {
  if (!isRecord(data)) {
    throw new ValidationError(["Input must be an object"]);
  }

  const errors: string[] = [];

  // Check schema version
  if (data.schema_version !== REQUEST_SCHEMA_VERSION) {
    errors.push(`Expected schema_version "${REQUEST_SCHEMA_VERSION}", got "${String(data.schema_version)}"`);
  }

  const src = collectPointSet(data.src, "src", errors);
  const dst = collectPointSet(data.dst, "dst", errors);

  if (src && dst) {
    if (src.length !== dst.length) {
      errors.push(`src has ${src.length} points but dst has ${dst.length}`);
    }
    if (src[0].length !== dst[0].length) {
      errors.push(`src points have ${src[0].length} coordinates but dst points have ${dst[0].length}`);
    }
  }

  if (data.estimate_scale !== undefined && typeof data.estimate_scale !== "boolean") {
    errors.push("estimate_scale must be a boolean");
  }

  if (errors.length > 0 || !src || !dst) {
    throw new ValidationError(errors);
  }

  return {
    schema_version: REQUEST_SCHEMA_VERSION,
    src,
    dst,
    estimate_scale: typeof data.estimate_scale === "boolean" ? data.estimate_scale : true
  };
}
