/**
 * Helper transformers.
 *
 * Each factory validates its configuration once, then returns a plain
 * transformer closed over it:
 *
 *   const pipeline = createPipeline({
 *     producer: () => orders,
 *     transformers: [
 *       filterRows((row) => Number(row.total_price ?? 0) >= 20),
 *       renameKeys({ order_id: "id", total_price: "price" }),
 *     ],
 *     consumer: (rows) => { for (const row of rows) out.push(row); },
 *   });
 */

export { DROP, keep, isDrop } from "./result.js";
export { filterRows } from "./filter.js";
export { renameKeys } from "./rename.js";
export { selectKeys } from "./select.js";
export { mapRows } from "./map.js";
export { TransformConfigError } from "./errors.js";
export type { RowPredicate, RowMapper } from "./schema.js";
