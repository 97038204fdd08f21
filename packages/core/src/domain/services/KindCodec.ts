import { INTEGER_BOUNDS, isFieldKind } from '../model/FieldKind.js';
import type { FieldKind, FloatKind, IntegerKind, KindValueMap } from '../model/FieldKind.js';
import { invalidBool, invalidFloat, invalidInt, invalidValue, unsupportedFieldKind } from '../model/RowbindError.js';

/** Options that affect how values are rendered as text. */
export interface FormatOptions {
  /** Fractional digits for floating point kinds. */
  readonly floatDigits: number;
}

/** Text conversion for one kind. `field` is only used to label errors. */
export interface KindCodec<V> {
  decode(text: string, field: string): V;
  encode(value: unknown, field: string, options: FormatOptions): string;
}

const TRUE_TOKENS: ReadonlySet<string> = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_TOKENS: ReadonlySet<string> = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-]?)inf(?:inity)?$/i;
const NAN_PATTERN = /^nan$/i;

// toFixed() switches to exponent notation from here on
const FIXED_NOTATION_LIMIT = 1e21;

const boolCodec: KindCodec<boolean> = {
  decode(text, field) {
    if (TRUE_TOKENS.has(text)) return true;
    if (FALSE_TOKENS.has(text)) return false;
    throw invalidBool(field, text);
  },
  encode(value, field) {
    if (typeof value !== 'boolean') throw invalidValue(field, 'bool', value);
    return value ? 'true' : 'false';
  },
};

function inRange(kind: IntegerKind, value: bigint): boolean {
  const [min, max] = INTEGER_BOUNDS[kind];
  return value >= min && value <= max;
}

function numberCodec(kind: Exclude<IntegerKind, 'int64'>): KindCodec<number> {
  return {
    decode(text, field) {
      if (!INTEGER_PATTERN.test(text)) throw invalidInt(field, kind, text);
      const parsed = BigInt(text);
      if (!inRange(kind, parsed)) throw invalidInt(field, kind, text);
      return Number(parsed);
    },
    encode(value, field) {
      if (typeof value !== 'number' || !Number.isInteger(value) || !inRange(kind, BigInt(value))) {
        throw invalidValue(field, kind, value);
      }
      return BigInt(value).toString();
    },
  };
}

const int64Codec: KindCodec<bigint> = {
  decode(text, field) {
    if (!INTEGER_PATTERN.test(text)) throw invalidInt(field, 'int64', text);
    const parsed = BigInt(text);
    if (!inRange('int64', parsed)) throw invalidInt(field, 'int64', text);
    return parsed;
  },
  encode(value, field) {
    if (typeof value !== 'bigint' || !inRange('int64', value)) {
      throw invalidValue(field, 'int64', value);
    }
    return value.toString();
  },
};

// A double lies exactly halfway between two `digits`-place decimals iff
// |value| * 2^(digits + 1) is an odd integer. Multiplying by a power of two is exact.
function isExactTie(value: number, digits: number): boolean {
  const scaled = Math.abs(value) * 2 ** (digits + 1);
  return Number.isInteger(scaled) && scaled % 2 === 1;
}

// toFixed() rounds ties away from zero; ties go to the even neighbour instead.
function roundHalfEven(value: number, digits: number): string {
  const awayFromZero = Math.abs(value).toFixed(digits);
  let units = BigInt(awayFromZero.replace('.', ''));
  if (units % 2n === 1n) units -= 1n;

  const text = units.toString().padStart(digits + 1, '0');
  const integral = text.slice(0, text.length - digits);
  const sign = value < 0 ? '-' : '';
  return digits > 0 ? `${sign}${integral}.${text.slice(text.length - digits)}` : `${sign}${integral}`;
}

function toFixedNotation(value: number, digits: number): string {
  if (Math.abs(value) < FIXED_NOTATION_LIMIT) {
    return isExactTie(value, digits) ? roundHalfEven(value, digits) : value.toFixed(digits);
  }
  // Doubles this large have no fractional part.
  const integral = BigInt(value).toString();
  return digits > 0 ? `${integral}.${'0'.repeat(digits)}` : integral;
}

function floatCodec(kind: FloatKind): KindCodec<number> {
  const narrow = kind === 'float32' ? Math.fround : (value: number) => value;

  return {
    decode(text, field) {
      if (NAN_PATTERN.test(text)) return Number.NaN;

      const infinity = INFINITY_PATTERN.exec(text);
      if (infinity) return infinity[1] === '-' ? -Infinity : Infinity;

      if (!DECIMAL_PATTERN.test(text)) throw invalidFloat(field, kind, text);
      const parsed = narrow(Number(text));
      if (!Number.isFinite(parsed)) throw invalidFloat(field, kind, text);
      return parsed;
    },
    encode(value, field, options) {
      if (typeof value !== 'number') throw invalidValue(field, kind, value);
      if (Number.isNaN(value)) return 'NaN';
      if (value === Infinity) return '+Inf';
      if (value === -Infinity) return '-Inf';
      return toFixedNotation(narrow(value), options.floatDigits);
    },
  };
}

const stringCodec: KindCodec<string> = {
  decode(text) {
    return text;
  },
  encode(value, field) {
    if (typeof value !== 'string') throw invalidValue(field, 'string', value);
    return value;
  },
};

/** One codec per kind. Adding a kind without a codec fails to compile. */
const CODECS: { readonly [K in FieldKind]: KindCodec<KindValueMap[K]> } = {
  bool: boolCodec,
  int8: numberCodec('int8'),
  int16: numberCodec('int16'),
  int32: numberCodec('int32'),
  int: numberCodec('int'),
  int64: int64Codec,
  float32: floatCodec('float32'),
  float64: floatCodec('float64'),
  string: stringCodec,
};

/**
 * Look up the codec for a declared kind.
 *
 * @throws {RowbindError} `UNSUPPORTED_FIELD_KIND` when `kind` is not a known kind.
 */
export function codecFor(kind: unknown, field: string): KindCodec<KindValueMap[FieldKind]> {
  if (!isFieldKind(kind)) {
    throw unsupportedFieldKind(field, kind);
  }
  return CODECS[kind];
}
