import type { FieldMap, RecordType } from './RecordType.js';

/** One annotated field and the column it maps to. */
export interface SchemaEntry {
  readonly field: string;
  readonly column: string;
}

/**
 * Field-to-column mapping derived from a record type's annotations.
 * `entries` follow field declaration order and double as the output header.
 */
export interface Schema<F extends FieldMap = FieldMap> {
  readonly recordType: RecordType<F>;
  readonly entries: readonly SchemaEntry[];
}

/** A schema entry resolved to a position in one header row. */
export interface BindingEntry extends SchemaEntry {
  /** Zero-based index of the column in the header row. */
  readonly index: number;
}

/** File-specific field-to-index mapping. Valid only for the header row it was bound to. */
export interface Binding<F extends FieldMap = FieldMap> {
  readonly schema: Schema<F>;
  readonly entries: readonly BindingEntry[];
}

/** An ordered sequence of text cells. */
export type Row = readonly string[];

/** Header plus data rows produced by encoding a record set. */
export interface EncodedTable {
  readonly header: Row;
  readonly rows: readonly Row[];
}
