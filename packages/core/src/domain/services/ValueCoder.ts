import { isRecordType } from '../model/RecordType.js';
import type { FieldMap, RecordOf, RecordType } from '../model/RecordType.js';
import type { FieldKind, KindValueMap } from '../model/FieldKind.js';
import { zeroValue } from '../model/FieldKind.js';
import type { Binding, EncodedTable, Row, Schema } from '../model/Schema.js';
import { invalidOption, isRowbindError, notARecordType, rowTooShort } from '../model/RowbindError.js';
import { codecFor } from './KindCodec.js';
import type { FormatOptions, KindCodec } from './KindCodec.js';

/** Options for `encodeRecords()`. */
export interface EncodeOptions {
  /**
   * Fractional digits written for `float32`/`float64` fields. Default: `0`, so
   * `3.7` is written as `4`. Raise it to keep the fractional part.
   */
  readonly floatDigits?: number;
}

const MAX_FLOAT_DIGITS = 100;

function kindsOf(recordType: RecordType): ReadonlyMap<string, FieldKind> {
  return new Map(recordType.fields.map((f) => [f.name, f.kind]));
}

/**
 * Decode one data row into a fresh record.
 *
 * Fields without a column annotation keep the zero value of their kind.
 *
 * @throws {RowbindError} `ROW_TOO_SHORT`, `INVALID_BOOL`, `INVALID_INT`, `INVALID_FLOAT`
 * or `UNSUPPORTED_FIELD_KIND` for the first field that cannot be decoded.
 */
export function decodeRow<F extends FieldMap>(binding: Binding, row: Row, recordType: RecordType<F>): RecordOf<F> {
  if (!isRecordType(recordType)) {
    throw notARecordType(recordType);
  }

  const record: Record<string, KindValueMap[FieldKind]> = {};
  for (const declared of recordType.fields) {
    record[declared.name] = zeroValue(declared.kind);
  }

  const kinds = kindsOf(recordType);
  for (const { field, index } of binding.entries) {
    const codec = codecFor(kinds.get(field), field);
    const cell = row[index];
    if (cell === undefined) {
      throw rowTooShort(field, index, row.length);
    }
    record[field] = codec.decode(cell, field);
  }

  return record as RecordOf<F>;
}

/**
 * Decode every data row in order. A failure carries the one-based number of
 * the data row it came from.
 */
export function decodeRows<F extends FieldMap>(
  binding: Binding,
  rows: readonly Row[],
  recordType: RecordType<F>,
): RecordOf<F>[] {
  return rows.map((row, i) => {
    try {
      return decodeRow(binding, row, recordType);
    } catch (error) {
      if (isRowbindError(error)) throw error.atRow(i + 1);
      throw error;
    }
  });
}

/**
 * Encode a record set into a header row and data rows.
 *
 * The header lists the schema's columns in field declaration order; cell `i`
 * of every row belongs to header cell `i`. Nothing is returned unless every
 * record encodes.
 *
 * @throws {RowbindError} `INVALID_OPTION` for a bad `floatDigits`, otherwise
 * `UNSUPPORTED_FIELD_KIND` or `INVALID_VALUE`.
 */
export function encodeRecords<F extends FieldMap>(
  schema: Schema<F>,
  records: readonly RecordOf<F>[],
  options?: EncodeOptions,
): EncodedTable {
  const format: FormatOptions = { floatDigits: options?.floatDigits ?? 0 };
  if (!Number.isInteger(format.floatDigits) || format.floatDigits < 0 || format.floatDigits > MAX_FLOAT_DIGITS) {
    throw invalidOption('floatDigits', format.floatDigits, `an integer between 0 and ${String(MAX_FLOAT_DIGITS)}`);
  }

  const kinds = kindsOf(schema.recordType);
  const columns: { readonly field: string; readonly codec: KindCodec<unknown> }[] = schema.entries.map((entry) => ({
    field: entry.field,
    codec: codecFor(kinds.get(entry.field), entry.field),
  }));

  const header = schema.entries.map((entry) => entry.column);
  const rows = records.map((record): Row =>
    columns.map(({ field, codec }) => {
      const value: unknown = Reflect.get(record, field);
      return codec.encode(value, field, format);
    }),
  );

  return { header, rows };
}
