import { TypeConversionError } from './errors.js';
import type { IntegerType, JsonValue, ScalarType } from './field-types.js';
import { INTEGER_RANGES, isIntegerType, isUuidString } from './field-types.js';

export type KeyKind = Exclude<ScalarType, 'opaque'>;

export interface KeyValueMap {
  i8: number;
  i16: number;
  i32: number;
  i64: bigint;
  u8: number;
  u16: number;
  u32: number;
  u64: bigint;
  f32: number;
  f64: number;
  string: string;
  uuid: string;
  bool: boolean;
  datetime: Date;
  date: string;
  time: string;
  json: JsonValue;
}

export type KeyVariant = { [K in KeyKind]: { kind: K; value: KeyValueMap[K] } }[KeyKind];

export type KeyPrimitive = number | bigint | string | boolean | Date;

export type KeyInput = Key | KeyPrimitive;

/**
 * Answers "what type does this entity's key, or this field, expect". The
 * entity registry implements it; keys never hold entity knowledge themselves.
 */
export interface KeyTypeRegistry {
  primaryKeyType(entity: string): ScalarType | null;
  fieldType(entity: string, field: string): ScalarType | null;
}

export const KEY_KINDS: readonly KeyKind[] = Object.freeze([
  'i8',
  'i16',
  'i32',
  'i64',
  'u8',
  'u16',
  'u32',
  'u64',
  'f32',
  'f64',
  'string',
  'uuid',
  'bool',
  'datetime',
  'date',
  'time',
  'json',
]);

const KIND_LABELS: Readonly<Record<KeyKind, string>> = {
  i8: 'I8',
  i16: 'I16',
  i32: 'I32',
  i64: 'I64',
  u8: 'U8',
  u16: 'U16',
  u32: 'U32',
  u64: 'U64',
  f32: 'F32',
  f64: 'F64',
  string: 'String',
  uuid: 'Uuid',
  bool: 'Bool',
  datetime: 'DateTime',
  date: 'Date',
  time: 'Time',
  json: 'Json',
};

const LABEL_KINDS: ReadonlyMap<string, KeyKind> = new Map(KEY_KINDS.map(kind => [KIND_LABELS[kind], kind] as const));

const PARSE_INTEGER_ORDER: readonly IntegerType[] = ['i8', 'i16', 'i32', 'i64', 'u8', 'u16', 'u32', 'u64'];

const INTEGER_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const WRAPPED_TEXT = /^([A-Za-z0-9]+)\(([\s\S]*)\)$/;

function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .map(key => `${JSON.stringify(key)}:${canonicalJson(value[key] ?? null)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

const inRange = (value: bigint, type: IntegerType): boolean => {
  const [min, max] = INTEGER_RANGES[type];
  return value >= min && value <= max;
};

/** Shortest decimal text that reads back as the same f32. */
const formatF32 = (value: number): string => {
  if (!Number.isFinite(value)) return String(value);
  for (let precision = 1; precision <= 9; precision++) {
    const text = Number(value.toPrecision(precision));
    if (Math.fround(text) === value) {
      return String(text);
    }
  }
  return String(value);
};

const conversionError = (from: string, to: string, detail?: string): TypeConversionError =>
  new TypeConversionError(`Cannot convert ${from} key to ${to}${detail ? `: ${detail}` : ''}`);

/**
 * Primary/foreign-key value whose concrete type is only known once it meets
 * entity metadata.
 *
 * Keys compare structurally, serialize one-to-one to backend values, and
 * parse from text through a fixed chain: integer widths (narrowest first),
 * f32 when exact, f64, boolean, UUID, then string. Integer text too wide for
 * every width stays a string key instead of losing precision.
 */
export class Key {
  readonly variant: KeyVariant;

  private constructor(variant: KeyVariant) {
    this.variant = variant;
  }

  get kind(): KeyKind {
    return this.variant.kind;
  }

  get value(): KeyValueMap[KeyKind] {
    return this.variant.value;
  }

  /**
   * Build a key of an explicit kind, checking integer ranges and UUID shape.
   */
  static of<K extends KeyKind>(kind: K, value: KeyValueMap[K]): Key {
    if (kind === 'json') {
      if (!isJsonValue(value)) throw conversionError(typeof value, kind);
      return new Key({ kind: 'json', value });
    }
    return Key.fromBackendValue(value, kind);
  }

  /**
   * Infer the key kind from a JavaScript value.
   */
  static from(value: KeyInput): Key {
    if (value instanceof Key) return value;
    if (value instanceof Date) return new Key({ kind: 'datetime', value: new Date(value.getTime()) });

    switch (typeof value) {
      case 'boolean':
        return new Key({ kind: 'bool', value });
      case 'string':
        return new Key({ kind: 'string', value });
      case 'bigint':
        if (inRange(value, 'i64')) return new Key({ kind: 'i64', value });
        if (inRange(value, 'u64')) return new Key({ kind: 'u64', value });
        throw conversionError('bigint', 'i64/u64', 'out of range');
      case 'number':
        if (Number.isInteger(value)) {
          if (inRange(BigInt(value), 'i32')) return new Key({ kind: 'i32', value });
          if (Number.isSafeInteger(value)) return new Key({ kind: 'i64', value: BigInt(value) });
        }
        return new Key({ kind: 'f64', value });
    }
    throw conversionError(typeof value, 'key');
  }

  /**
   * Parse display text back into a key. `I32(42)`-style wrapped text keeps
   * its kind; anything else goes through the inference chain.
   */
  static parse(text: string): Key {
    const wrapped = WRAPPED_TEXT.exec(text);
    const wrappedKind = wrapped?.[1] === undefined ? undefined : LABEL_KINDS.get(wrapped[1]);
    if (wrapped?.[2] !== undefined && wrappedKind) {
      const inner = Key.fromText(wrapped[2], wrappedKind);
      if (inner) return inner;
    }

    const trimmed = text.trim();
    if (INTEGER_TEXT.test(trimmed)) {
      const integer = BigInt(trimmed);
      const width = PARSE_INTEGER_ORDER.find(type => inRange(integer, type));
      if (!width) {
        return new Key({ kind: 'string', value: text });
      }
      return Key.integer(width, integer);
    }

    if (FLOAT_TEXT.test(trimmed)) {
      const numeric = Number(trimmed);
      if (Number.isFinite(numeric)) {
        return Math.fround(numeric) === numeric
          ? new Key({ kind: 'f32', value: numeric })
          : new Key({ kind: 'f64', value: numeric });
      }
      return new Key({ kind: 'string', value: text });
    }

    if (text === 'true' || text === 'false') {
      return new Key({ kind: 'bool', value: text === 'true' });
    }

    if (isUuidString(text)) {
      return new Key({ kind: 'uuid', value: text.toLowerCase() });
    }

    return new Key({ kind: 'string', value: text });
  }

  /**
   * Rebuild a key from a backend value of a known kind; the inverse of
   * {@link Key.toBackendValue}.
   */
  static fromBackendValue(raw: unknown, kind: KeyKind): Key {
    if (isIntegerType(kind)) {
      const integer =
        typeof raw === 'bigint'
          ? raw
          : typeof raw === 'number' && Number.isInteger(raw)
            ? BigInt(raw)
            : typeof raw === 'string' && INTEGER_TEXT.test(raw.trim())
              ? BigInt(raw.trim())
              : null;
      if (integer === null || !inRange(integer, kind)) {
        throw conversionError(typeof raw, kind, `${String(raw)} does not fit`);
      }
      return Key.integer(kind, integer);
    }

    switch (kind) {
      case 'f32':
      case 'f64': {
        const numeric =
          typeof raw === 'number' ? raw : typeof raw === 'string' && FLOAT_TEXT.test(raw.trim()) ? Number(raw) : null;
        if (numeric === null) {
          throw conversionError(typeof raw, kind);
        }
        return kind === 'f32'
          ? new Key({ kind: 'f32', value: Math.fround(numeric) })
          : new Key({ kind: 'f64', value: numeric });
      }
      case 'string':
      case 'date':
      case 'time':
        if (typeof raw !== 'string') throw conversionError(typeof raw, kind);
        return kind === 'string'
          ? new Key({ kind: 'string', value: raw })
          : kind === 'date'
            ? new Key({ kind: 'date', value: raw })
            : new Key({ kind: 'time', value: raw });
      case 'uuid':
        if (typeof raw !== 'string' || !isUuidString(raw)) throw conversionError(typeof raw, kind);
        return new Key({ kind: 'uuid', value: raw.toLowerCase() });
      case 'bool':
        if (typeof raw === 'boolean') return new Key({ kind: 'bool', value: raw });
        if (raw === 'true' || raw === 'false') return new Key({ kind: 'bool', value: raw === 'true' });
        throw conversionError(typeof raw, kind);
      case 'datetime': {
        const date =
          raw instanceof Date ? new Date(raw.getTime()) : typeof raw === 'string' ? new Date(raw) : null;
        if (!date || Number.isNaN(date.getTime())) throw conversionError(typeof raw, kind);
        return new Key({ kind: 'datetime', value: date });
      }
      case 'json': {
        const parsed: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw;
        if (!isJsonValue(parsed)) throw conversionError(typeof raw, kind);
        return new Key({ kind: 'json', value: parsed });
      }
      default:
        throw conversionError(typeof raw, kind);
    }
  }

  /**
   * Infer a key from a value read out of the database. UUID-shaped strings
   * become UUID keys.
   */
  static fromDbValue(raw: unknown): Key {
    if (typeof raw === 'string') {
      return isUuidString(raw)
        ? new Key({ kind: 'uuid', value: raw.toLowerCase() })
        : new Key({ kind: 'string', value: raw });
    }
    if (
      typeof raw === 'number' ||
      typeof raw === 'bigint' ||
      typeof raw === 'boolean' ||
      raw instanceof Date
    ) {
      return Key.from(raw);
    }
    if (isJsonValue(raw)) {
      return new Key({ kind: 'json', value: raw });
    }
    throw conversionError(typeof raw, 'key');
  }

  private static integer(kind: IntegerType, value: bigint): Key {
    switch (kind) {
      case 'i64':
        return new Key({ kind: 'i64', value });
      case 'u64':
        return new Key({ kind: 'u64', value });
      case 'i8':
        return new Key({ kind: 'i8', value: Number(value) });
      case 'i16':
        return new Key({ kind: 'i16', value: Number(value) });
      case 'i32':
        return new Key({ kind: 'i32', value: Number(value) });
      case 'u8':
        return new Key({ kind: 'u8', value: Number(value) });
      case 'u16':
        return new Key({ kind: 'u16', value: Number(value) });
      case 'u32':
        return new Key({ kind: 'u32', value: Number(value) });
    }
  }

  private static fromText(text: string, kind: KeyKind): Key | null {
    try {
      return Key.fromBackendValue(text, kind);
    } catch (error) {
      if (error instanceof TypeConversionError || error instanceof SyntaxError) {
        return null;
      }
      throw error;
    }
  }

  equals(other: Key): boolean {
    return this.hash() === other.hash();
  }

  /**
   * Stable text usable as a map key; equal keys hash equally.
   */
  hash(): string {
    const { variant } = this;
    switch (variant.kind) {
      case 'datetime':
        return `${variant.kind}:${variant.value.getTime()}`;
      case 'json':
        return `${variant.kind}:${canonicalJson(variant.value)}`;
      case 'f32':
      case 'f64':
        return `${variant.kind}:${Object.is(variant.value, -0) ? '-0' : String(variant.value)}`;
      default:
        return `${variant.kind}:${String(variant.value)}`;
    }
  }

  /**
   * Backend-native value for this key, one distinct form per kind.
   */
  toBackendValue(): unknown {
    const { variant } = this;
    switch (variant.kind) {
      case 'datetime':
        return new Date(variant.value.getTime());
      case 'json':
        return JSON.stringify(variant.value);
      default:
        return variant.value;
    }
  }

  /**
   * Display text: plain values, RFC 3339 for datetimes.
   */
  toString(): string {
    const { variant } = this;
    switch (variant.kind) {
      case 'datetime':
        return variant.value.toISOString();
      case 'json':
        return JSON.stringify(variant.value);
      case 'f32':
        return formatF32(variant.value);
      default:
        return String(variant.value);
    }
  }

  /**
   * Display text tagged with the kind, e.g. `I32(42)`; {@link Key.parse}
   * reads it back to the same kind.
   */
  toWrappedString(): string {
    return `${KIND_LABELS[this.kind]}(${this.toString()})`;
  }

  /**
   * Convert to the backend value of another scalar type, e.g. a string key
   * bound for an integer column.
   */
  convertTo(type: ScalarType): unknown {
    const { variant } = this;
    if (type === 'opaque') {
      return this.toBackendValue();
    }
    if (variant.kind === type) {
      return this.toBackendValue();
    }

    if (isIntegerType(type)) {
      let integer: bigint | null = null;
      if (typeof variant.value === 'bigint') {
        integer = variant.value;
      } else if (typeof variant.value === 'number' && Number.isInteger(variant.value)) {
        integer = BigInt(variant.value);
      } else if (typeof variant.value === 'string' && INTEGER_TEXT.test(variant.value.trim())) {
        integer = BigInt(variant.value.trim());
      }
      if (integer === null || !inRange(integer, type)) {
        throw conversionError(variant.kind, type, this.toString());
      }
      return type === 'i64' || type === 'u64' ? integer : Number(integer);
    }

    switch (type) {
      case 'f32':
      case 'f64': {
        const numeric =
          typeof variant.value === 'number' || typeof variant.value === 'bigint'
            ? Number(variant.value)
            : typeof variant.value === 'string' && FLOAT_TEXT.test(variant.value.trim())
              ? Number(variant.value)
              : Number.NaN;
        if (Number.isNaN(numeric)) throw conversionError(variant.kind, type, this.toString());
        return type === 'f32' ? Math.fround(numeric) : numeric;
      }
      case 'string':
      case 'date':
      case 'time':
        return this.toString();
      case 'uuid':
        if (typeof variant.value === 'string' && isUuidString(variant.value)) {
          return variant.value.toLowerCase();
        }
        throw conversionError(variant.kind, type, this.toString());
      case 'bool':
        if (variant.kind === 'string' && (variant.value === 'true' || variant.value === 'false')) {
          return variant.value === 'true';
        }
        throw conversionError(variant.kind, type, this.toString());
      case 'datetime': {
        const date = typeof variant.value === 'string' ? new Date(variant.value) : null;
        if (!date || Number.isNaN(date.getTime())) throw conversionError(variant.kind, type, this.toString());
        return date;
      }
      case 'json':
        if (typeof variant.value === 'bigint') return JSON.stringify(variant.value.toString());
        if (variant.value instanceof Date) return JSON.stringify(variant.value.toISOString());
        return JSON.stringify(variant.value);
      default:
        throw conversionError(variant.kind, type);
    }
  }

  /**
   * Convert to the type the registry reports for the entity's primary key,
   * or to the generic backend value when the registry does not know it.
   */
  toValueForEntity(registry: KeyTypeRegistry, entity: string): unknown {
    const type = registry.primaryKeyType(entity);
    return type === null ? this.toBackendValue() : this.convertTo(type);
  }

  toValueForField(registry: KeyTypeRegistry, entity: string, field: string): unknown {
    const type = registry.fieldType(entity, field);
    return type === null ? this.toBackendValue() : this.convertTo(type);
  }
}
