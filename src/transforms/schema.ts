/**
 * Schemas for helper transformer configuration.
 */

import { z } from "zod";
import { formatZodIssues } from "../config/validation.js";
import type { Row } from "../types/index.js";
import { TransformConfigError } from "./errors.js";

export type RowPredicate = (row: Row) => boolean;

export type RowMapper = (row: Row) => Row;

function isFunction(value: unknown): boolean {
  return typeof value === "function";
}

/** Any string is a valid row key, the empty string included */
export const RenameMappingSchema = z.record(z.string(), z.string());

export const KeyListSchema = z.array(z.string());

export const PredicateSchema = z.custom<RowPredicate>(isFunction, {
  message: "predicate must be a function",
});

export const MapperSchema = z.custom<RowMapper>(isFunction, {
  message: "mapper must be a function",
});

/**
 * Parse a factory argument, throwing TransformConfigError on failure.
 */
export function parseTransformConfig<T>(
  transform: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new TransformConfigError(transform, formatZodIssues(result.error.issues));
  }
  return result.data;
}
