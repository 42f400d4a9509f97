import type { Transformer } from "../types/index.js";
import { keep } from "./result.js";
import { MapperSchema, parseTransformConfig, type RowMapper } from "./schema.js";

/** Lift a row-to-row function into a transformer that never drops. */
export function mapRows(fn: RowMapper): Transformer {
  const mapper = parseTransformConfig("mapRows", MapperSchema, fn);
  return (row) => keep(mapper(row));
}
