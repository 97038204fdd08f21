import { isRecordType } from '../model/RecordType.js';
import type { FieldMap, RecordType } from '../model/RecordType.js';
import type { Schema, SchemaEntry } from '../model/Schema.js';
import { notARecordType } from '../model/RowbindError.js';

/**
 * Extract the field-to-column mapping declared on a record type.
 *
 * Unannotated fields are skipped. Duplicate column names are kept as declared;
 * use `findDuplicateColumns()` to detect them.
 *
 * @throws {RowbindError} `NOT_A_RECORD_TYPE` when `recordType` was not built by `defineRecord()`.
 */
export function resolveSchema<F extends FieldMap>(recordType: RecordType<F>): Schema<F> {
  if (!isRecordType(recordType)) {
    throw notARecordType(recordType);
  }

  const entries: SchemaEntry[] = [];
  for (const declared of recordType.fields) {
    if (declared.column) {
      entries.push({ field: declared.name, column: declared.column });
    }
  }

  return { recordType, entries };
}

/** Column names claimed by more than one field, with the fields claiming each, in declaration order. */
export function findDuplicateColumns(schema: Schema): ReadonlyMap<string, readonly string[]> {
  const byColumn = new Map<string, string[]>();
  for (const entry of schema.entries) {
    const fields = byColumn.get(entry.column) ?? [];
    fields.push(entry.field);
    byColumn.set(entry.column, fields);
  }

  const duplicates = new Map<string, readonly string[]>();
  for (const [column, fields] of byColumn) {
    if (fields.length > 1) duplicates.set(column, fields);
  }
  return duplicates;
}
