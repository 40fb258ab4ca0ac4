import type { JsonValue } from './field-types.js';

export type QueryMode = 'default' | 'insensitive';

/** `db`: SQL NULL, `json`: a JSON `null` value, `any`: either. */
export type JsonNullKind = 'db' | 'json' | 'any';

export type JsonPath = readonly string[];

export type ComparisonOperation =
  | { op: 'equals'; value: unknown }
  | { op: 'notEquals'; value: unknown }
  | { op: 'gt'; value: unknown }
  | { op: 'gte'; value: unknown }
  | { op: 'lt'; value: unknown }
  | { op: 'lte'; value: unknown };

export type TextOperation =
  | { op: 'contains'; value: string }
  | { op: 'startsWith'; value: string }
  | { op: 'endsWith'; value: string };

export type JsonOperation =
  | { op: 'jsonPath'; path: JsonPath }
  | { op: 'jsonStringContains'; path: JsonPath; value: string }
  | { op: 'jsonStringStartsWith'; path: JsonPath; value: string }
  | { op: 'jsonStringEndsWith'; path: JsonPath; value: string }
  | { op: 'jsonArrayContains'; path: JsonPath; value: JsonValue }
  | { op: 'jsonArrayStartsWith'; path: JsonPath; value: JsonValue }
  | { op: 'jsonArrayEndsWith'; path: JsonPath; value: JsonValue }
  | { op: 'jsonObjectContains'; path: JsonPath; key: string }
  | { op: 'jsonNull'; path: JsonPath; kind: JsonNullKind };

export type FieldOperation =
  | ComparisonOperation
  | TextOperation
  | JsonOperation
  | { op: 'in'; values: readonly unknown[] }
  | { op: 'notIn'; values: readonly unknown[] }
  | { op: 'isNull' }
  | { op: 'isNotNull' }
  | { op: 'mode'; mode: QueryMode };

export type FieldOperationName = FieldOperation['op'];

/**
 * A test against one column of entity `E`. Values are already encoded for
 * the backend.
 */
export interface FieldPredicate<E extends string = string> {
  readonly kind: 'field';
  readonly entity: E;
  readonly field: string;
  readonly operation: FieldOperation;
}

/**
 * Equality on the primary key or a unique field: selects at most one row.
 */
export interface UniqueFilter<E extends string = string> extends FieldPredicate<E> {
  readonly unique: true;
  readonly operation: { op: 'equals'; value: unknown };
}

export interface LogicalPredicate<E extends string = string> {
  readonly kind: 'and' | 'or' | 'not';
  readonly entity: E;
  readonly predicates: readonly Predicate<E>[];
}

export type RelationQuantifier = 'some' | 'every' | 'none';

/**
 * Quantified test over the rows of a relation. The nested predicates belong
 * to the relation's target entity.
 */
export interface RelationPredicate<E extends string = string> {
  readonly kind: 'relation';
  readonly entity: E;
  readonly relation: string;
  readonly quantifier: RelationQuantifier;
  readonly predicates: readonly Predicate[];
}

export type Predicate<E extends string = string> =
  | FieldPredicate<E>
  | LogicalPredicate<E>
  | RelationPredicate<E>;

export const isUniqueFilter = (predicate: Predicate): predicate is UniqueFilter =>
  predicate.kind === 'field' &&
  'unique' in predicate &&
  predicate.unique === true &&
  predicate.operation.op === 'equals';

/**
 * Recognize a unique filter passed where any value is accepted, such as a
 * relation entry of create data.
 */
export const isUniqueSelector = (value: unknown): value is UniqueFilter =>
  typeof value === 'object' &&
  value !== null &&
  'kind' in value &&
  value.kind === 'field' &&
  'unique' in value &&
  value.unique === true &&
  'operation' in value &&
  typeof value.operation === 'object' &&
  value.operation !== null &&
  'op' in value.operation &&
  value.operation.op === 'equals';

export function fieldPredicate<E extends string>(
  entity: E,
  field: string,
  operation: FieldOperation
): FieldPredicate<E> {
  const predicate: FieldPredicate<E> = { kind: 'field', entity, field, operation: Object.freeze(operation) };
  return Object.freeze(predicate);
}

export function uniqueFilter<E extends string>(entity: E, field: string, value: unknown): UniqueFilter<E> {
  const filter: UniqueFilter<E> = { kind: 'field', entity, field, unique: true, operation: { op: 'equals', value } };
  Object.freeze(filter.operation);
  return Object.freeze(filter);
}

export function logicalPredicate<E extends string>(
  kind: LogicalPredicate['kind'],
  entity: E,
  predicates: readonly Predicate<E>[]
): LogicalPredicate<E> {
  const predicate: LogicalPredicate<E> = { kind, entity, predicates: Object.freeze([...predicates]) };
  return Object.freeze(predicate);
}

export function relationPredicate<E extends string>(
  entity: E,
  relation: string,
  quantifier: RelationQuantifier,
  predicates: readonly Predicate[]
): RelationPredicate<E> {
  const predicate: RelationPredicate<E> = {
    kind: 'relation',
    entity,
    relation,
    quantifier,
    predicates: Object.freeze([...predicates]),
  };
  return Object.freeze(predicate);
}

// ----- Mutations -----

export type ArithmeticOperator = 'increment' | 'decrement' | 'multiply' | 'divide';

export type FieldMutationOperation =
  | { op: 'set'; value: unknown }
  | { op: ArithmeticOperator; value: number | bigint };

export interface FieldMutation<E extends string = string> {
  readonly kind: 'field';
  readonly entity: E;
  readonly field: string;
  readonly operation: FieldMutationOperation;
}

export type RelationMutationOperation =
  | { op: 'connect'; selector: UniqueFilter }
  | { op: 'disconnect'; selector: UniqueFilter | null }
  | { op: 'set'; selectors: readonly UniqueFilter[] }
  | { op: 'create'; data: Readonly<Record<string, unknown>> };

export interface RelationMutation<E extends string = string> {
  readonly kind: 'relation';
  readonly entity: E;
  readonly relation: string;
  readonly operation: RelationMutationOperation;
}

export type Mutation<E extends string = string> = FieldMutation<E> | RelationMutation<E>;

export function fieldMutation<E extends string>(
  entity: E,
  field: string,
  operation: FieldMutationOperation
): FieldMutation<E> {
  const mutation: FieldMutation<E> = { kind: 'field', entity, field, operation: Object.freeze(operation) };
  return Object.freeze(mutation);
}

export function relationMutation<E extends string>(
  entity: E,
  relation: string,
  operation: RelationMutationOperation
): RelationMutation<E> {
  const mutation: RelationMutation<E> = { kind: 'relation', entity, relation, operation: Object.freeze(operation) };
  return Object.freeze(mutation);
}
