/**
 * Row and transform result definitions.
 * A row is a single record keyed by column name.
 */

export type Row = Readonly<Record<string, unknown>>;

export interface KeepResult {
  readonly kind: "keep";
  readonly row: Row;
}

export interface DropResult {
  readonly kind: "drop";
}

/**
 * Outcome of applying one transformer to one row.
 * A drop is its own variant; a kept row may hold any value, null included.
 */
export type TransformResult = KeepResult | DropResult;

export type Transformer = (row: Row) => TransformResult;
