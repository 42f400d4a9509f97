/**
 * Pipeline option validation.
 *
 * Options are checked once, at construction, so a pipeline missing its
 * producer or consumer fails before anything runs.
 */

import { z } from "zod";
import { formatZodIssues } from "../config/validation.js";
import type { Logger } from "../logging/index.js";
import type { PipelineDefinition, Transformer } from "../types/index.js";
import { PipelineConfigError } from "./errors.js";

export const DEFAULT_PIPELINE_NAME = "default";

export interface PipelineOptions<P, C> {
  /** Label used in log entries */
  readonly name?: string;
  /** Called once per run for a fresh row sequence */
  readonly producer: P;
  /** Applied to each row in order */
  readonly transformers?: readonly Transformer[];
  /** Called once per run with the lazy output sequence */
  readonly consumer: C;
  /** Receives run start, completion and failure entries */
  readonly logger?: Logger;
}

export interface ParsedPipelineOptions<P, C> extends PipelineDefinition<P, C> {
  readonly logger?: Logger;
}

const LOGGER_METHODS = ["debug", "info", "warn", "error"] as const;

function isFunction(value: unknown): boolean {
  return typeof value === "function";
}

function isLogger(value: unknown): boolean {
  return (
    typeof value === "object" &&
    value !== null &&
    LOGGER_METHODS.every((method) => typeof Reflect.get(value, method) === "function")
  );
}

export const PipelineOptionsSchema = z
  .object({
    name: z.string().min(1, "name must be non-empty").default(DEFAULT_PIPELINE_NAME),
    producer: z.custom<unknown>(isFunction, { message: "producer must be a function" }),
    transformers: z
      .array(z.custom<Transformer>(isFunction, { message: "transformer must be a function" }))
      .default([]),
    consumer: z.custom<unknown>(isFunction, { message: "consumer must be a function" }),
    logger: z
      .custom<Logger>(isLogger, {
        message: "logger must implement debug, info, warn and error",
      })
      .optional(),
  })
  .strict();

/**
 * Validate pipeline options and fill in defaults.
 *
 * @throws PipelineConfigError if validation fails
 */
export function parsePipelineOptions<P, C>(
  options: PipelineOptions<P, C>
): ParsedPipelineOptions<P, C> {
  const result = PipelineOptionsSchema.safeParse(options);

  if (!result.success) {
    throw new PipelineConfigError(formatZodIssues(result.error.issues));
  }

  return {
    name: result.data.name,
    producer: options.producer,
    transformers: Object.freeze([...result.data.transformers]),
    consumer: options.consumer,
    logger: result.data.logger,
  };
}
