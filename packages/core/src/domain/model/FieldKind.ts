/**
 * Scalar kinds a record field may declare.
 *
 * - `bool` → `boolean`
 * - `int8`, `int16`, `int32` → `number`, range-checked to the declared width
 * - `int` → `number`, limited to the safe-integer range
 * - `int64` → `bigint`
 * - `float32`, `float64` → `number`
 * - `string` → `string`
 */
export const FieldKind = {
  BOOL: 'bool',
  INT8: 'int8',
  INT16: 'int16',
  INT32: 'int32',
  INT: 'int',
  INT64: 'int64',
  FLOAT32: 'float32',
  FLOAT64: 'float64',
  STRING: 'string',
} as const;

export type FieldKind = (typeof FieldKind)[keyof typeof FieldKind];

/** TypeScript value carried by each kind. */
export interface KindValueMap {
  bool: boolean;
  int8: number;
  int16: number;
  int32: number;
  int: number;
  int64: bigint;
  float32: number;
  float64: number;
  string: string;
}

export type IntegerKind = 'int8' | 'int16' | 'int32' | 'int' | 'int64';
export type FloatKind = 'float32' | 'float64';

/** Inclusive bounds of each integer kind. */
export const INTEGER_BOUNDS: Readonly<Record<IntegerKind, readonly [bigint, bigint]>> = {
  int8: [-128n, 127n],
  int16: [-32768n, 32767n],
  int32: [-2147483648n, 2147483647n],
  int: [BigInt(Number.MIN_SAFE_INTEGER), BigInt(Number.MAX_SAFE_INTEGER)],
  int64: [-9223372036854775808n, 9223372036854775807n],
};

const KINDS: ReadonlySet<string> = new Set(Object.values(FieldKind));

export function isFieldKind(value: unknown): value is FieldKind {
  return typeof value === 'string' && KINDS.has(value);
}

/** Value a field holds before anything is assigned to it. */
export function zeroValue(kind: FieldKind): KindValueMap[FieldKind] {
  switch (kind) {
    case 'bool':
      return false;
    case 'int64':
      return 0n;
    case 'string':
      return '';
    case 'int8':
    case 'int16':
    case 'int32':
    case 'int':
    case 'float32':
    case 'float64':
      return 0;
  }
}
