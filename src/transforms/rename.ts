import type { Transformer } from "../types/index.js";
import { keep } from "./result.js";
import { RenameMappingSchema, parseTransformConfig } from "./schema.js";

/**
 * Rename row keys according to `mapping` (old key -> new key).
 *
 * Keys absent from the mapping are copied through. When two keys end up
 * with the same name, the one later in the row's key order wins; the
 * property keeps the position where that name first appeared.
 *
 * @example
 * renameKeys({ order_id: "id" })({ order_id: "A1", customer: "Alice" })
 * // keeps { id: "A1", customer: "Alice" }
 */
export function renameKeys(mapping: Readonly<Record<string, string>>): Transformer {
  parseTransformConfig("renameKeys", RenameMappingSchema, mapping);
  // zod's parsed copy leaves out a "__proto__" key, so read the caller's object
  const targets = new Map(Object.entries(mapping));

  return (row) =>
    keep(
      Object.fromEntries(
        Object.entries(row).map(([key, value]) => [targets.get(key) ?? key, value])
      )
    );
}
