import type { Transformer } from "../types/index.js";
import { DROP, keep } from "./result.js";
import { PredicateSchema, parseTransformConfig, type RowPredicate } from "./schema.js";

/**
 * Keep rows for which `predicate` is true, drop the rest.
 *
 * The row is passed through unchanged. Keys the predicate reads are not
 * checked; a predicate that may see sparse rows should default them itself.
 */
export function filterRows(predicate: RowPredicate): Transformer {
  const test = parseTransformConfig("filterRows", PredicateSchema, predicate);
  return (row) => (test(row) ? keep(row) : DROP);
}
