/**
 * Lazy row streams.
 *
 * Both generators pull one row from the source per row requested, so a
 * consumer that stops early leaves the rest of the source unread. Leaving
 * the generator (break, return or throw in the consumer's loop) closes the
 * source iterator as well.
 */

import { isDrop, keep } from "../transforms/result.js";
import type { Row, TransformResult, Transformer } from "../types/index.js";

/**
 * Run one row through the chain. Stops at the first drop.
 */
export function applyTransformers(
  row: Row,
  transformers: readonly Transformer[]
): TransformResult {
  let current = row;
  for (const transform of transformers) {
    const result = transform(current);
    if (isDrop(result)) {
      return result;
    }
    current = result.row;
  }
  return keep(current);
}

export function* transformRows(
  rows: Iterable<Row>,
  transformers: readonly Transformer[]
): Generator<Row, void, undefined> {
  for (const row of rows) {
    const result = applyTransformers(row, transformers);
    if (!isDrop(result)) {
      yield result.row;
    }
  }
}

export async function* transformRowsAsync(
  rows: Iterable<Row> | AsyncIterable<Row>,
  transformers: readonly Transformer[]
): AsyncGenerator<Row, void, undefined> {
  for await (const row of rows) {
    const result = applyTransformers(row, transformers);
    if (!isDrop(result)) {
      yield result.row;
    }
  }
}
