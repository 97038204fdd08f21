/** Machine-readable codes for every failure the mapper reports. */
export type RowbindErrorCode =
  | 'NOT_A_RECORD_TYPE'
  | 'COLUMN_NOT_FOUND'
  | 'ROW_TOO_SHORT'
  | 'INVALID_BOOL'
  | 'INVALID_INT'
  | 'INVALID_FLOAT'
  | 'UNSUPPORTED_FIELD_KIND'
  | 'SOURCE_READ_ERROR'
  | 'SINK_WRITE_ERROR'
  | 'DUPLICATE_COLUMN_MAPPING'
  | 'INVALID_VALUE'
  | 'INVALID_OPTION';

/** Context attached to an error. Only the keys relevant to the code are set. */
export interface RowbindErrorDetails {
  /** Field identifier on the record type. */
  readonly field?: string;
  /** Column name from an annotation or header row. */
  readonly column?: string;
  /** Zero-based index into a row. */
  readonly columnIndex?: number;
  /** The offending cell text or field value. */
  readonly value?: unknown;
  /** Declared kind of the field. */
  readonly kind?: string;
  /** One-based index of the data row (header excluded). */
  readonly row?: number;
  /** Fields involved in a duplicate column mapping. */
  readonly fields?: readonly string[];
  /** Underlying failure from an I/O collaborator. */
  readonly cause?: unknown;
}

/**
 * Error thrown by every mapping operation. All failures are terminal for the
 * read or write that raised them.
 */
export class RowbindError extends Error {
  readonly code: RowbindErrorCode;
  readonly field?: string;
  readonly column?: string;
  readonly columnIndex?: number;
  readonly value?: unknown;
  readonly kind?: string;
  readonly row?: number;
  readonly fields?: readonly string[];

  constructor(code: RowbindErrorCode, message: string, details: RowbindErrorDetails = {}) {
    super(message, details.cause !== undefined ? { cause: details.cause } : undefined);
    this.name = 'RowbindError';
    this.code = code;
    this.field = details.field;
    this.column = details.column;
    this.columnIndex = details.columnIndex;
    this.value = details.value;
    this.kind = details.kind;
    this.row = details.row;
    this.fields = details.fields;
  }

  /** Copy of this error tagged with the data row it came from. */
  atRow(row: number): RowbindError {
    return new RowbindError(this.code, `row ${String(row)}: ${this.message}`, {
      field: this.field,
      column: this.column,
      columnIndex: this.columnIndex,
      value: this.value,
      kind: this.kind,
      row,
      fields: this.fields,
      cause: this.cause,
    });
  }
}

/** Narrow `error` to a `RowbindError`, optionally with a specific code. */
export function isRowbindError(error: unknown, code?: RowbindErrorCode): error is RowbindError {
  return error instanceof RowbindError && (code === undefined || error.code === code);
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export function notARecordType(value: unknown): RowbindError {
  const label = value === null ? 'null' : typeof value;
  return new RowbindError('NOT_A_RECORD_TYPE', `${label} is not a record type`, { value });
}

export function columnNotFound(field: string, column: string): RowbindError {
  return new RowbindError('COLUMN_NOT_FOUND', `column '${column}' does not exist`, { field, column });
}

export function rowTooShort(field: string, columnIndex: number, length: number): RowbindError {
  return new RowbindError(
    'ROW_TOO_SHORT',
    `field '${field}' reads column ${String(columnIndex)} but the row has ${String(length)} cells`,
    { field, columnIndex },
  );
}

export function invalidBool(field: string, value: string): RowbindError {
  return new RowbindError('INVALID_BOOL', `field bool '${field}' invalid: '${value}'`, { field, value, kind: 'bool' });
}

export function invalidInt(field: string, kind: string, value: string): RowbindError {
  return new RowbindError('INVALID_INT', `field ${kind} '${field}' invalid: '${value}'`, { field, value, kind });
}

export function invalidFloat(field: string, kind: string, value: string): RowbindError {
  return new RowbindError('INVALID_FLOAT', `field ${kind} '${field}' invalid: '${value}'`, { field, value, kind });
}

export function unsupportedFieldKind(field: string, kind: unknown): RowbindError {
  const label = String(kind);
  return new RowbindError('UNSUPPORTED_FIELD_KIND', `field '${field}' has unsupported kind '${label}'`, {
    field,
    kind: label,
  });
}

export function invalidValue(field: string, kind: string, value: unknown): RowbindError {
  const label = typeof value === 'bigint' ? `${String(value)}n` : String(value);
  return new RowbindError('INVALID_VALUE', `field ${kind} '${field}' cannot hold ${typeof value} value ${label}`, {
    field,
    value,
    kind,
  });
}

export function invalidOption(option: string, value: unknown, requirement: string): RowbindError {
  return new RowbindError('INVALID_OPTION', `${option} must be ${requirement}, got ${String(value)}`, { value });
}

export function duplicateColumnMapping(column: string, fields: readonly string[]): RowbindError {
  return new RowbindError(
    'DUPLICATE_COLUMN_MAPPING',
    `column '${column}' is mapped by more than one field: ${fields.join(', ')}`,
    { column, fields },
  );
}

export function sourceReadError(cause: unknown): RowbindError {
  return new RowbindError('SOURCE_READ_ERROR', `unable to read source: ${describe(cause)}`, { cause });
}

export function sinkWriteError(cause: unknown): RowbindError {
  return new RowbindError('SINK_WRITE_ERROR', `unable to write sink: ${describe(cause)}`, { cause });
}
