import type { Transformer } from "../types/index.js";
import { keep } from "./result.js";
import { KeyListSchema, parseTransformConfig } from "./schema.js";

/**
 * Project each row onto `keys`, in the order given.
 * Keys missing from a row come out as null so every output row has the
 * same shape.
 */
export function selectKeys(keys: readonly string[]): Transformer {
  const selected = parseTransformConfig("selectKeys", KeyListSchema, keys);

  return (row) =>
    keep(
      Object.fromEntries(
        selected.map((key) => [key, Object.hasOwn(row, key) ? row[key] : null])
      )
    );
}
