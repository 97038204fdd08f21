import type { FieldMap } from '../model/RecordType.js';
import type { Binding, BindingEntry, Row, Schema } from '../model/Schema.js';
import { columnNotFound } from '../model/RowbindError.js';

/**
 * Resolve every schema column against a header row.
 *
 * Column order in the header is irrelevant and extra columns are ignored. When
 * a header name repeats, its last position wins.
 *
 * @throws {RowbindError} `COLUMN_NOT_FOUND` for the first schema column missing from the header.
 */
export function bindHeader<F extends FieldMap>(schema: Schema<F>, headerRow: Row): Binding<F> {
  const positions = new Map<string, number>();
  headerRow.forEach((name, index) => {
    positions.set(name, index);
  });

  const entries: BindingEntry[] = [];
  for (const { field, column } of schema.entries) {
    const index = positions.get(column);
    if (index === undefined) {
      throw columnNotFound(field, column);
    }
    entries.push({ field, column, index });
  }

  return { schema, entries };
}
