/**
 * Constructors for transformer results.
 */

import type { DropResult, KeepResult, Row, TransformResult } from "../types/index.js";

/** The drop signal. Shared since it carries no data. */
export const DROP: DropResult = Object.freeze({ kind: "drop" });

export function keep(row: Row): KeepResult {
  return { kind: "keep", row };
}

export function isDrop(result: TransformResult): result is DropResult {
  return result.kind === "drop";
}
