import type { JsonValue } from './field-types.js';
import type { JsonNullKind, JsonPath } from './predicates.js';

/**
 * Backend-neutral condition tree. Predicates compile into it; the SQL
 * renderer and other backends evaluate it.
 */

export interface ColumnRef {
  /** Table alias the column is read through. */
  table: string;
  column: string;
}

export type CompareOperator = '=' | '<>' | '>' | '>=' | '<' | '<=';

export type TextMatch = 'equals' | 'contains' | 'startsWith' | 'endsWith';

export type JsonTest =
  | { kind: 'path'; path: JsonPath }
  | { kind: 'string'; match: Exclude<TextMatch, 'equals'>; path: JsonPath; value: string }
  | { kind: 'arrayContains' | 'arrayStartsWith' | 'arrayEndsWith'; path: JsonPath; value: JsonValue }
  | { kind: 'objectKey'; path: JsonPath; key: string }
  | { kind: 'null'; path: JsonPath; nullKind: JsonNullKind };

export interface ExistsJoin {
  /** Column of the enclosing row. */
  outer: ColumnRef;
  /** Column of the subquery row that must equal it. */
  inner: ColumnRef;
}

export type Condition =
  | { type: 'constant'; value: boolean }
  | { type: 'compare'; column: ColumnRef; operator: CompareOperator; value: unknown }
  | { type: 'text'; column: ColumnRef; match: TextMatch; value: string; caseInsensitive: boolean }
  | { type: 'in'; column: ColumnRef; values: readonly unknown[]; negated: boolean }
  | { type: 'null'; column: ColumnRef; negated: boolean }
  | { type: 'json'; column: ColumnRef; test: JsonTest }
  | { type: 'all'; conditions: readonly Condition[] }
  | { type: 'any'; conditions: readonly Condition[] }
  | { type: 'not'; condition: Condition }
  | {
      type: 'exists';
      table: string;
      alias: string;
      join: ExistsJoin;
      condition: Condition;
      negated: boolean;
    };

export type ConditionType = Condition['type'];

export const TRUE: Condition = Object.freeze({ type: 'constant', value: true });
export const FALSE: Condition = Object.freeze({ type: 'constant', value: false });

export const column = (table: string, name: string): ColumnRef => ({ table, column: name });

export const compare = (ref: ColumnRef, operator: CompareOperator, value: unknown): Condition => ({
  type: 'compare',
  column: ref,
  operator,
  value,
});

/**
 * `IN` over a list; an empty list matches nothing (or everything, negated).
 */
export const inList = (ref: ColumnRef, values: readonly unknown[], negated = false): Condition =>
  values.length === 0 ? (negated ? TRUE : FALSE) : { type: 'in', column: ref, values, negated };

export const isNull = (ref: ColumnRef, negated = false): Condition => ({ type: 'null', column: ref, negated });

/**
 * Conjunction that drops `TRUE` members and collapses to a single member or
 * to `TRUE` when nothing is left.
 */
export function all(conditions: readonly Condition[]): Condition {
  const members = conditions.filter(condition => !(condition.type === 'constant' && condition.value));
  if (members.some(condition => condition.type === 'constant' && !condition.value)) {
    return FALSE;
  }
  if (members.length === 0) return TRUE;
  if (members.length === 1 && members[0]) return members[0];
  return { type: 'all', conditions: members };
}

export function any(conditions: readonly Condition[]): Condition {
  const members = conditions.filter(condition => !(condition.type === 'constant' && !condition.value));
  if (members.some(condition => condition.type === 'constant' && condition.value)) {
    return TRUE;
  }
  if (members.length === 0) return FALSE;
  if (members.length === 1 && members[0]) return members[0];
  return { type: 'any', conditions: members };
}

export function not(condition: Condition): Condition {
  if (condition.type === 'constant') {
    return condition.value ? FALSE : TRUE;
  }
  return { type: 'not', condition };
}
