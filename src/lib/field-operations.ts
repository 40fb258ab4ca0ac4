import type { EntityMetadata, FieldMetadata } from './entity-metadata.js';
import { QueryValidationError } from './errors.js';
import type { JsonNullMarker, JsonValue, TypeClass } from './field-types.js';
import { encodeValue, isWideInteger, TYPE_CLASSES } from './field-types.js';
import type { KeyInput, KeyTypeRegistry } from './polymorphic-key.js';
import { Key } from './polymorphic-key.js';
import type {
  ArithmeticOperator,
  FieldMutation,
  FieldOperation,
  FieldPredicate,
  JsonNullKind,
  JsonPath,
  QueryMode,
  UniqueFilter,
} from './predicates.js';
import { fieldMutation, fieldPredicate, uniqueFilter } from './predicates.js';
import type { FieldInput, FieldScalar, IsNullableField } from './schema.js';

/**
 * Per-field operation surfaces.
 *
 * One generic factory builds every field's namespace from
 * {@link OPERATORS_BY_TYPE_CLASS}; a field only exposes the operators its type
 * class supports, plus `isNull`/`isNotNull` when it is nullable and `set`
 * always.
 */

const EQUALITY = ['equals', 'notEquals', 'in', 'notIn'] as const;
const ORDERING = ['gt', 'gte', 'lt', 'lte'] as const;
const ARITHMETIC = ['increment', 'decrement', 'multiply', 'divide'] as const;
const TEXT = ['contains', 'startsWith', 'endsWith', 'mode'] as const;
const JSON_FAMILY = [
  'jsonPath',
  'jsonStringContains',
  'jsonStringStartsWith',
  'jsonStringEndsWith',
  'jsonArrayContains',
  'jsonArrayStartsWith',
  'jsonArrayEndsWith',
  'jsonObjectContains',
  'jsonNull',
] as const;
const NULL_CHECKS = ['isNull', 'isNotNull'] as const;

export type FieldOperatorName =
  | (typeof EQUALITY)[number]
  | (typeof ORDERING)[number]
  | (typeof ARITHMETIC)[number]
  | (typeof TEXT)[number]
  | (typeof JSON_FAMILY)[number]
  | (typeof NULL_CHECKS)[number]
  | 'set';

export const OPERATORS_BY_TYPE_CLASS: Readonly<Record<TypeClass, readonly FieldOperatorName[]>> = {
  integer: [...EQUALITY, ...ORDERING, ...ARITHMETIC],
  float: [...EQUALITY, ...ORDERING, ...ARITHMETIC],
  datetime: [...EQUALITY, ...ORDERING],
  string: [...EQUALITY, ...ORDERING, ...TEXT],
  boolean: [...EQUALITY],
  uuid: [...EQUALITY],
  json: [...EQUALITY, ...JSON_FAMILY],
  opaque: [...EQUALITY],
};

/**
 * Every operator a field exposes.
 */
export function operatorsFor(field: FieldMetadata): FieldOperatorName[] {
  const operators: FieldOperatorName[] = [...OPERATORS_BY_TYPE_CLASS[field.typeClass]];
  if (field.nullable) {
    operators.push(...NULL_CHECKS);
  }
  operators.push('set');
  return operators;
}

export function isOperatorAllowed(field: FieldMetadata, operator: FieldOperatorName): boolean {
  return operatorsFor(field).includes(operator);
}

/**
 * Untyped view of a field namespace. Only the members listed by
 * {@link operatorsFor} are present.
 */
export interface RuntimeFieldOperations {
  equals(value: unknown): FieldPredicate;
  notEquals(value: unknown): FieldPredicate;
  in(values: readonly unknown[]): FieldPredicate;
  notIn(values: readonly unknown[]): FieldPredicate;
  gt(value: unknown): FieldPredicate;
  gte(value: unknown): FieldPredicate;
  lt(value: unknown): FieldPredicate;
  lte(value: unknown): FieldPredicate;
  contains(value: string): FieldPredicate;
  startsWith(value: string): FieldPredicate;
  endsWith(value: string): FieldPredicate;
  mode(mode: QueryMode): FieldPredicate;
  isNull(): FieldPredicate;
  isNotNull(): FieldPredicate;
  jsonPath(path: JsonPath): FieldPredicate;
  jsonStringContains(value: string, path?: JsonPath): FieldPredicate;
  jsonStringStartsWith(value: string, path?: JsonPath): FieldPredicate;
  jsonStringEndsWith(value: string, path?: JsonPath): FieldPredicate;
  jsonArrayContains(value: JsonValue, path?: JsonPath): FieldPredicate;
  jsonArrayStartsWith(value: JsonValue, path?: JsonPath): FieldPredicate;
  jsonArrayEndsWith(value: JsonValue, path?: JsonPath): FieldPredicate;
  jsonObjectContains(key: string, path?: JsonPath): FieldPredicate;
  jsonNull(kind: JsonNullKind, path?: JsonPath): FieldPredicate;
  set(value: unknown): FieldMutation;
  increment(value: number | bigint): FieldMutation;
  decrement(value: number | bigint): FieldMutation;
  multiply(value: number | bigint): FieldMutation;
  divide(value: number | bigint): FieldMutation;
}

export type FieldOperationSet = Partial<RuntimeFieldOperations>;

export interface FieldOperationContext {
  entity: EntityMetadata;
  field: FieldMetadata;
  registry: KeyTypeRegistry;
}

const isKeyInput = (value: unknown): value is KeyInput =>
  value instanceof Key ||
  value instanceof Date ||
  typeof value === 'number' ||
  typeof value === 'bigint' ||
  typeof value === 'string' ||
  typeof value === 'boolean';

/**
 * Encode an operand for the field. Primary-key operands go through
 * {@link Key} so any key primitive (or a Key) is accepted; null stays null and
 * is checked when the predicate is compiled.
 */
export function encodeOperand(context: FieldOperationContext, value: unknown): unknown {
  const { entity, field, registry } = context;
  if (value === null || value === undefined) {
    return null;
  }
  if (field.primaryKey && isKeyInput(value)) {
    const converted = Key.from(value).toValueForField(registry, entity.name, field.name);
    return encodeValue(field, converted);
  }
  return encodeValue(field, value);
}

const normalizeArithmetic = (field: FieldMetadata, operator: ArithmeticOperator, value: number | bigint) => {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new QueryValidationError(`${operator} on ${field.name} requires a finite number`);
  }
  if (operator === 'divide' && (value === 0 || value === 0n)) {
    throw new QueryValidationError(`Cannot divide ${field.name} by zero`);
  }
  if (isWideInteger(field.type)) {
    if (typeof value === 'number' && !Number.isInteger(value)) {
      throw new QueryValidationError(`${operator} on ${field.name} requires an integer`);
    }
    return BigInt(value);
  }
  return Number(value);
};

/**
 * Build the operation namespace of one field.
 */
export function createFieldOperations(context: FieldOperationContext): FieldOperationSet {
  const { entity, field } = context;
  const predicate = (operation: FieldOperation) => fieldPredicate(entity.name, field.name, operation);
  const encode = (value: unknown) => encodeOperand(context, value);
  const arithmetic = (operator: ArithmeticOperator) => (value: number | bigint) =>
    fieldMutation(entity.name, field.name, {
      op: operator,
      value: normalizeArithmetic(field, operator, value),
    });

  const all: RuntimeFieldOperations = {
    equals(value) {
      const encoded = encode(value);
      if (encoded !== null && field.unique) {
        return uniqueFilter(entity.name, field.name, encoded);
      }
      return predicate({ op: 'equals', value: encoded });
    },
    notEquals: value => predicate({ op: 'notEquals', value: encode(value) }),
    in: values => predicate({ op: 'in', values: values.map(encode) }),
    notIn: values => predicate({ op: 'notIn', values: values.map(encode) }),
    gt: value => predicate({ op: 'gt', value: encode(value) }),
    gte: value => predicate({ op: 'gte', value: encode(value) }),
    lt: value => predicate({ op: 'lt', value: encode(value) }),
    lte: value => predicate({ op: 'lte', value: encode(value) }),
    contains: value => predicate({ op: 'contains', value }),
    startsWith: value => predicate({ op: 'startsWith', value }),
    endsWith: value => predicate({ op: 'endsWith', value }),
    mode: mode => predicate({ op: 'mode', mode }),
    isNull: () => predicate({ op: 'isNull' }),
    isNotNull: () => predicate({ op: 'isNotNull' }),
    jsonPath: path => predicate({ op: 'jsonPath', path: [...path] }),
    jsonStringContains: (value, path = []) => predicate({ op: 'jsonStringContains', path: [...path], value }),
    jsonStringStartsWith: (value, path = []) =>
      predicate({ op: 'jsonStringStartsWith', path: [...path], value }),
    jsonStringEndsWith: (value, path = []) => predicate({ op: 'jsonStringEndsWith', path: [...path], value }),
    jsonArrayContains: (value, path = []) => predicate({ op: 'jsonArrayContains', path: [...path], value }),
    jsonArrayStartsWith: (value, path = []) =>
      predicate({ op: 'jsonArrayStartsWith', path: [...path], value }),
    jsonArrayEndsWith: (value, path = []) => predicate({ op: 'jsonArrayEndsWith', path: [...path], value }),
    jsonObjectContains: (key, path = []) => predicate({ op: 'jsonObjectContains', path: [...path], key }),
    jsonNull: (kind, path = []) => predicate({ op: 'jsonNull', path: [...path], kind }),
    set: value =>
      fieldMutation(entity.name, field.name, {
        op: 'set',
        value: encodeValue(field, setOperand(context, value)),
      }),
    increment: arithmetic('increment'),
    decrement: arithmetic('decrement'),
    multiply: arithmetic('multiply'),
    divide: arithmetic('divide'),
  };

  const operations: FieldOperationSet = {};
  for (const operator of operatorsFor(field)) {
    Object.defineProperty(operations, operator, {
      value: all[operator],
      enumerable: true,
    });
  }
  return Object.freeze(operations);
}

const setOperand = (context: FieldOperationContext, value: unknown): unknown => {
  const { entity, field, registry } = context;
  if (field.primaryKey && value instanceof Key) {
    return value.toValueForField(registry, entity.name, field.name);
  }
  return value;
};

// ----- Typed surface -----

export type TypeClassOf<F> = (typeof TYPE_CLASSES)[FieldScalar<F>];

type IsUnique<F> = F extends { primaryKey: true } ? true : F extends { unique: true } ? true : false;

type Operand<F> = F extends { primaryKey: true } ? KeyInput : FieldInput<F>;

type NonNullOperand<F> = Exclude<Operand<F>, null | JsonNullMarker>;

/** Ordering against null is only meaningful on nullable fields. */
type OrderingOperand<F> = IsNullableField<F> extends true ? NonNullOperand<F> | null : NonNullOperand<F>;

export interface EqualityOperations<E extends string, F> {
  equals(value: NonNullOperand<F>): IsUnique<F> extends true ? UniqueFilter<E> : FieldPredicate<E>;
  equals(value: null): FieldPredicate<E>;
  notEquals(value: Operand<F>): FieldPredicate<E>;
  in(values: readonly NonNullOperand<F>[]): FieldPredicate<E>;
  notIn(values: readonly NonNullOperand<F>[]): FieldPredicate<E>;
  set(value: Operand<F>): FieldMutation<E>;
}

export interface OrderingOperations<E extends string, F> {
  gt(value: OrderingOperand<F>): FieldPredicate<E>;
  gte(value: OrderingOperand<F>): FieldPredicate<E>;
  lt(value: OrderingOperand<F>): FieldPredicate<E>;
  lte(value: OrderingOperand<F>): FieldPredicate<E>;
}

export interface ArithmeticOperations<E extends string> {
  increment(value: number | bigint): FieldMutation<E>;
  decrement(value: number | bigint): FieldMutation<E>;
  multiply(value: number | bigint): FieldMutation<E>;
  divide(value: number | bigint): FieldMutation<E>;
}

export interface TextOperations<E extends string> {
  contains(value: string): FieldPredicate<E>;
  startsWith(value: string): FieldPredicate<E>;
  endsWith(value: string): FieldPredicate<E>;
  mode(mode: QueryMode): FieldPredicate<E>;
}

export interface JsonOperations<E extends string> {
  jsonPath(path: JsonPath): FieldPredicate<E>;
  jsonStringContains(value: string, path?: JsonPath): FieldPredicate<E>;
  jsonStringStartsWith(value: string, path?: JsonPath): FieldPredicate<E>;
  jsonStringEndsWith(value: string, path?: JsonPath): FieldPredicate<E>;
  jsonArrayContains(value: JsonValue, path?: JsonPath): FieldPredicate<E>;
  jsonArrayStartsWith(value: JsonValue, path?: JsonPath): FieldPredicate<E>;
  jsonArrayEndsWith(value: JsonValue, path?: JsonPath): FieldPredicate<E>;
  jsonObjectContains(key: string, path?: JsonPath): FieldPredicate<E>;
  jsonNull(kind: JsonNullKind, path?: JsonPath): FieldPredicate<E>;
}

export interface NullOperations<E extends string> {
  isNull(): FieldPredicate<E>;
  isNotNull(): FieldPredicate<E>;
}

type Empty = Record<never, never>;

/**
 * Operation namespace of field declaration `F` on entity `E`.
 */
export type FieldOperations<E extends string, F> = EqualityOperations<E, F> &
  (TypeClassOf<F> extends 'integer' | 'float' | 'datetime' | 'string' ? OrderingOperations<E, F> : Empty) &
  (TypeClassOf<F> extends 'integer' | 'float' ? ArithmeticOperations<E> : Empty) &
  (TypeClassOf<F> extends 'string' ? TextOperations<E> : Empty) &
  (TypeClassOf<F> extends 'json' ? JsonOperations<E> : Empty) &
  (IsNullableField<F> extends true ? NullOperations<E> : Empty);
