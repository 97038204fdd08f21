import type { FieldKind, KindValueMap } from './FieldKind.js';

/** Brand carried by every record type descriptor. */
export const RECORD_TYPE: unique symbol = Symbol.for('rowbind.recordType');

/** Declaration of one field: its scalar kind and, when annotated, the column it maps to. */
export interface FieldDescriptor<K extends FieldKind = FieldKind> {
  readonly kind: K;
  /** Column annotation. Absent or empty means the field is never read or written. */
  readonly column?: string;
}

/** Field identifiers mapped to their descriptors. */
export type FieldMap = Readonly<Record<string, FieldDescriptor>>;

/** A field descriptor together with its identifier, as listed in declaration order. */
export interface DeclaredField {
  readonly name: string;
  readonly kind: FieldKind;
  readonly column?: string;
}

/** Immutable descriptor of a record type. Create with `defineRecord()`. */
export interface RecordType<F extends FieldMap = FieldMap> {
  readonly [RECORD_TYPE]: true;
  /** Name used in error messages. */
  readonly name: string;
  /** Fields keyed by identifier. */
  readonly shape: F;
  /** Fields in declaration order. */
  readonly fields: readonly DeclaredField[];
}

/** Plain object type produced by decoding a row of a record type with field map `F`. */
export type RecordOf<F extends FieldMap> = {
  -readonly [K in keyof F]: KindValueMap[F[K]['kind']];
};

/** Extract the record object type from a record type descriptor. */
export type InferRecord<R> = R extends RecordType<infer F> ? RecordOf<F> : never;

function descriptor<K extends FieldKind>(kind: K) {
  return (column?: string): FieldDescriptor<K> => (column ? { kind, column } : { kind });
}

/**
 * Field builders. Pass the column name to annotate the field; call without
 * arguments for a field the mapper must leave alone.
 *
 * @example
 * ```typescript
 * const Person = defineRecord('Person', {
 *   name: field.string('name'),
 *   active: field.bool('active'),
 *   notes: field.string(),
 * });
 * type Person = InferRecord<typeof Person>;
 * ```
 */
export const field = {
  bool: descriptor('bool'),
  int8: descriptor('int8'),
  int16: descriptor('int16'),
  int32: descriptor('int32'),
  int: descriptor('int'),
  int64: descriptor('int64'),
  float32: descriptor('float32'),
  float64: descriptor('float64'),
  string: descriptor('string'),
} as const;

/**
 * Declare a record type. Declaration order is the property order of `fields`
 * and decides the header order on write.
 */
export function defineRecord<F extends FieldMap>(name: string, fields: F): RecordType<F> {
  const entries: [string, FieldDescriptor][] = Object.entries(fields);
  const declared = entries.map(
    ([fieldName, desc]): DeclaredField =>
      Object.freeze(desc.column ? { name: fieldName, kind: desc.kind, column: desc.column } : { name: fieldName, kind: desc.kind }),
  );

  return Object.freeze({
    [RECORD_TYPE]: true as const,
    name,
    shape: fields,
    fields: Object.freeze(declared),
  });
}

/** Check whether `value` is a descriptor created by `defineRecord()`. */
export function isRecordType(value: unknown): value is RecordType {
  return (
    typeof value === 'object' && value !== null && RECORD_TYPE in value && Array.isArray(Reflect.get(value, 'fields'))
  );
}
