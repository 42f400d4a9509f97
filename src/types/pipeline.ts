/**
 * Pipeline role definitions.
 * A pipeline composes one producer, ordered transformers and one consumer.
 */

import type { Row, Transformer } from "./row.js";

export type Producer = () => Iterable<Row>;

export type Consumer = (rows: Iterable<Row>) => void;

export type AsyncProducer = () => Iterable<Row> | AsyncIterable<Row>;

export type AsyncConsumer = (rows: AsyncIterable<Row>) => void | Promise<void>;

export interface PipelineMetadata {
  readonly name: string;
}

export interface PipelineDefinition<P, C> extends PipelineMetadata {
  readonly producer: P;
  readonly transformers: readonly Transformer[];
  readonly consumer: C;
}
