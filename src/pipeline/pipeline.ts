/**
 * Synchronous pipeline runner.
 *
 * ```
 * producer() ──► transformer 1 ──► … ──► transformer N ──► consumer(rows)
 *                     │                        │
 *                     └──── drop ──────────────┴──► (row discarded)
 * ```
 *
 * The consumer drives execution: each row it pulls is read from the
 * producer and pushed through the chain on demand.
 */

import type { Logger } from "../logging/index.js";
import type { Consumer, PipelineDefinition, Producer, Transformer } from "../types/index.js";
import { parsePipelineOptions, type PipelineOptions } from "./schema.js";
import { transformRows } from "./stream.js";
import { startRun } from "./trace.js";

export class Pipeline implements PipelineDefinition<Producer, Consumer> {
  readonly name: string;
  readonly producer: Producer;
  readonly transformers: readonly Transformer[];
  readonly consumer: Consumer;
  private readonly logger?: Logger;

  /**
   * @throws PipelineConfigError if the options are invalid
   */
  constructor(options: PipelineOptions<Producer, Consumer>) {
    const parsed = parsePipelineOptions(options);
    this.name = parsed.name;
    this.producer = parsed.producer;
    this.transformers = parsed.transformers;
    this.consumer = parsed.consumer;
    this.logger = parsed.logger;
  }

  /**
   * Return a copy of this pipeline with `transformer` appended.
   */
  withTransform(transformer: Transformer): Pipeline {
    return new Pipeline({
      name: this.name,
      producer: this.producer,
      transformers: [...this.transformers, transformer],
      consumer: this.consumer,
      logger: this.logger,
    });
  }

  /**
   * Run the pipeline once. Errors from the producer, a transformer or the
   * consumer are rethrown unchanged.
   */
  run(): void {
    const trace = startRun(this.logger, this.name, this.transformers.length);
    try {
      this.consumer(transformRows(this.producer(), this.transformers));
    } catch (err) {
      trace.fail(err);
      throw err;
    }
    trace.succeed();
  }
}

export function createPipeline(options: PipelineOptions<Producer, Consumer>): Pipeline {
  return new Pipeline(options);
}
