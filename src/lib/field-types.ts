import isUUID from 'is-uuid';
import { InvalidFieldTypeError, InvalidUUIDError, ValidationError } from './errors.js';
import { lastSegment } from './naming.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type IntegerType = 'i8' | 'i16' | 'i32' | 'i64' | 'u8' | 'u16' | 'u32' | 'u64';
export type FloatType = 'f32' | 'f64';

export type ScalarType =
  | IntegerType
  | FloatType
  | 'string'
  | 'bool'
  | 'datetime'
  | 'date'
  | 'time'
  | 'uuid'
  | 'json'
  | 'opaque';

export type TypeClass =
  | 'integer'
  | 'float'
  | 'string'
  | 'boolean'
  | 'datetime'
  | 'uuid'
  | 'json'
  | 'opaque';

/**
 * Declared type names understood by the analyzer, keyed by lowercase name.
 * Anything else is opaque.
 */
export const PRIMITIVE_TYPES = {
  i8: 'i8',
  i16: 'i16',
  i32: 'i32',
  i64: 'i64',
  isize: 'i64',
  u8: 'u8',
  u16: 'u16',
  u32: 'u32',
  u64: 'u64',
  usize: 'u64',
  f32: 'f32',
  f64: 'f64',
  string: 'string',
  str: 'string',
  text: 'string',
  bool: 'bool',
  boolean: 'bool',
  datetime: 'datetime',
  datetimeutc: 'datetime',
  datetimewithtimezone: 'datetime',
  naivedatetime: 'datetime',
  timestamp: 'datetime',
  date: 'date',
  naivedate: 'date',
  time: 'time',
  naivetime: 'time',
  uuid: 'uuid',
  json: 'json',
  jsonvalue: 'json',
  value: 'json',
} as const satisfies Record<string, ScalarType>;

const PRIMITIVE_LOOKUP: ReadonlyMap<string, ScalarType> = new Map(Object.entries(PRIMITIVE_TYPES));

export const TYPE_CLASSES = {
  i8: 'integer',
  i16: 'integer',
  i32: 'integer',
  i64: 'integer',
  u8: 'integer',
  u16: 'integer',
  u32: 'integer',
  u64: 'integer',
  f32: 'float',
  f64: 'float',
  string: 'string',
  bool: 'boolean',
  datetime: 'datetime',
  date: 'datetime',
  time: 'datetime',
  uuid: 'uuid',
  json: 'json',
  opaque: 'opaque',
} as const satisfies Record<ScalarType, TypeClass>;

export const INTEGER_RANGES: Readonly<Record<IntegerType, readonly [bigint, bigint]>> = {
  i8: [-(2n ** 7n), 2n ** 7n - 1n],
  i16: [-(2n ** 15n), 2n ** 15n - 1n],
  i32: [-(2n ** 31n), 2n ** 31n - 1n],
  i64: [-(2n ** 63n), 2n ** 63n - 1n],
  u8: [0n, 2n ** 8n - 1n],
  u16: [0n, 2n ** 16n - 1n],
  u32: [0n, 2n ** 32n - 1n],
  u64: [0n, 2n ** 64n - 1n],
};

export const isIntegerType = (type: ScalarType): type is IntegerType => type in INTEGER_RANGES;

/** Integer widths that do not fit a JavaScript number and travel as bigint. */
export const isWideInteger = (type: ScalarType): type is 'i64' | 'u64' =>
  type === 'i64' || type === 'u64';

export const isUuidString = (value: string): boolean => isUUID.anyNonNil(value) || isUUID.nil(value);

/**
 * Writes JSON `null` into a json column; plain `null` writes SQL NULL.
 */
export const JsonNull: unique symbol = Symbol('relgen.jsonNull');
export type JsonNullMarker = typeof JsonNull;

/**
 * Moves values of an opaque (custom) field type in and out of the backend.
 */
export interface ValueConverter<TValue = unknown> {
  toBackend(value: TValue): unknown;
  fromBackend(raw: unknown): TValue;
}

export interface ResolvedTypeName {
  type: ScalarType;
  nullable: boolean;
}

const OPTION_PATTERN = /^Option\s*<([\s\S]*)>$/;

/**
 * Map a declared type name to its scalar tag. `Option<T>` unwraps to `T` and
 * marks the field nullable; namespaces and generic arguments are ignored, so
 * `chrono::DateTime<Utc>` resolves like `DateTime`.
 */
export function resolveTypeName(declared: string): ResolvedTypeName {
  let name = declared.trim();
  let nullable = false;

  const option = OPTION_PATTERN.exec(name);
  if (option?.[1] !== undefined) {
    nullable = true;
    name = option[1].trim();
  }

  const genericStart = name.indexOf('<');
  if (genericStart !== -1) {
    name = name.slice(0, genericStart);
  }

  const key = lastSegment(name).toLowerCase();
  return { type: PRIMITIVE_LOOKUP.get(key) ?? 'opaque', nullable };
}

/**
 * The parts of field metadata that value coercion depends on.
 */
export interface FieldTypeInfo {
  name: string;
  type: ScalarType;
  nullable: boolean;
  converter?: ValueConverter | null;
}

const toBigInt = (value: unknown, field: string): bigint => {
  if (typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^[+-]?\d+$/.test(value.trim())) {
    return BigInt(value.trim());
  }
  throw new ValidationError(`${field} must be an integer`, field);
};

const checkIntegerRange = (value: bigint, type: IntegerType, field: string): bigint => {
  const [min, max] = INTEGER_RANGES[type];
  if (value < min || value > max) {
    throw new ValidationError(`${field} is out of range for ${type}`, field);
  }
  return value;
};

const toDate = (value: unknown, field: string): Date => {
  const date =
    value instanceof Date ? value : typeof value === 'string' || typeof value === 'number' ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new ValidationError(`${field} must be a valid date`, field);
  }
  return date;
};

/**
 * Convert an application value into the parameter bound for a column.
 * Integers are range-checked for their declared width, UUIDs are validated,
 * and JSON values are serialized so array values are not mistaken for
 * PostgreSQL arrays.
 */
export function encodeValue(field: FieldTypeInfo, value: unknown): unknown {
  if (value === null || value === undefined) {
    if (!field.nullable) {
      throw new ValidationError(`${field.name} is required`, field.name);
    }
    return null;
  }

  switch (field.type) {
    case 'i8':
    case 'i16':
    case 'i32':
    case 'u8':
    case 'u16':
    case 'u32':
      return Number(checkIntegerRange(toBigInt(value, field.name), field.type, field.name));
    case 'i64':
    case 'u64':
      return checkIntegerRange(toBigInt(value, field.name), field.type, field.name);
    case 'f32':
    case 'f64': {
      const numeric = typeof value === 'number' ? value : typeof value === 'bigint' ? Number(value) : Number.NaN;
      if (Number.isNaN(numeric)) {
        throw new ValidationError(`${field.name} must be a number`, field.name);
      }
      return field.type === 'f32' ? Math.fround(numeric) : numeric;
    }
    case 'string':
      if (typeof value !== 'string') {
        throw new ValidationError(`${field.name} must be a string`, field.name);
      }
      return value;
    case 'bool':
      if (typeof value !== 'boolean') {
        throw new ValidationError(`${field.name} must be a boolean`, field.name);
      }
      return value;
    case 'datetime':
      return toDate(value, field.name);
    case 'date':
      return value instanceof Date ? value.toISOString().slice(0, 10) : String(value);
    case 'time':
      return String(value);
    case 'uuid':
      if (typeof value !== 'string' || !isUuidString(value)) {
        throw new InvalidUUIDError(`${field.name} must be a UUID`);
      }
      return value.toLowerCase();
    case 'json':
      return value === JsonNull ? 'null' : JSON.stringify(value, bigintReplacer);
    case 'opaque':
      if (!field.converter) {
        throw new InvalidFieldTypeError(
          `${field.name} has a custom type and needs a converter to be written or filtered`,
          field.name
        );
      }
      return field.converter.toBackend(value);
  }
}

/**
 * Convert a column value read from the backend into the application value.
 */
export function decodeValue(field: FieldTypeInfo, raw: unknown): unknown {
  if (raw === null || raw === undefined) {
    return null;
  }

  switch (field.type) {
    case 'i64':
    case 'u64':
      return toBigInt(raw, field.name);
    case 'i8':
    case 'i16':
    case 'i32':
    case 'u8':
    case 'u16':
    case 'u32':
    case 'f32':
    case 'f64':
      return typeof raw === 'number' ? raw : Number(raw);
    case 'datetime':
      return toDate(raw, field.name);
    case 'date':
      // pg parses DATE columns as local midnight
      return raw instanceof Date
        ? [
            raw.getFullYear(),
            String(raw.getMonth() + 1).padStart(2, '0'),
            String(raw.getDate()).padStart(2, '0'),
          ].join('-')
        : String(raw);
    case 'opaque':
      return field.converter ? field.converter.fromBackend(raw) : raw;
    default:
      return raw;
  }
}

const bigintReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? value.toString() : value;
