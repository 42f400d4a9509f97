/**
 * Pipeline runners.
 *
 * Usage:
 *   import { createPipeline } from "./pipeline/index.js";
 *
 *   createPipeline({
 *     name: "orders",
 *     producer: () => readOrders(),
 *     transformers: [filterRows(isLarge), renameKeys({ order_id: "id" })],
 *     consumer: (rows) => writeOrders(rows),
 *   }).run();
 */

export { Pipeline, createPipeline } from "./pipeline.js";
export { AsyncPipeline, createAsyncPipeline } from "./async-pipeline.js";
export { applyTransformers, transformRows, transformRowsAsync } from "./stream.js";
export { PipelineConfigError } from "./errors.js";
export {
  DEFAULT_PIPELINE_NAME,
  PipelineOptionsSchema,
  parsePipelineOptions,
  type PipelineOptions,
  type ParsedPipelineOptions,
} from "./schema.js";
