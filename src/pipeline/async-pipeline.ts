/**
 * Asynchronous pipeline runner.
 *
 * Same row semantics as Pipeline, for producers that read from streams.
 * The producer may return a sync or async iterable; the consumer receives
 * an async iterable and may return a promise, which run() awaits.
 * Transformers stay synchronous, so one transformer list serves both runners.
 */

import type { Logger } from "../logging/index.js";
import type {
  AsyncConsumer,
  AsyncProducer,
  PipelineDefinition,
  Transformer,
} from "../types/index.js";
import { parsePipelineOptions, type PipelineOptions } from "./schema.js";
import { transformRowsAsync } from "./stream.js";
import { startRun } from "./trace.js";

export class AsyncPipeline implements PipelineDefinition<AsyncProducer, AsyncConsumer> {
  readonly name: string;
  readonly producer: AsyncProducer;
  readonly transformers: readonly Transformer[];
  readonly consumer: AsyncConsumer;
  private readonly logger?: Logger;

  constructor(options: PipelineOptions<AsyncProducer, AsyncConsumer>) {
    const parsed = parsePipelineOptions(options);
    this.name = parsed.name;
    this.producer = parsed.producer;
    this.transformers = parsed.transformers;
    this.consumer = parsed.consumer;
    this.logger = parsed.logger;
  }

  withTransform(transformer: Transformer): AsyncPipeline {
    return new AsyncPipeline({
      name: this.name,
      producer: this.producer,
      transformers: [...this.transformers, transformer],
      consumer: this.consumer,
      logger: this.logger,
    });
  }

  async run(): Promise<void> {
    const trace = startRun(this.logger, this.name, this.transformers.length);
    try {
      await this.consumer(transformRowsAsync(this.producer(), this.transformers));
    } catch (err) {
      trace.fail(err);
      throw err;
    }
    trace.succeed();
  }
}

export function createAsyncPipeline(
  options: PipelineOptions<AsyncProducer, AsyncConsumer>
): AsyncPipeline {
  return new AsyncPipeline(options);
}
