import type { CompareOperator, Condition } from './condition.js';

/**
 * Statements the runtime hands to a backend. Tables and columns are physical
 * names; values are already encoded for the backend. The root table of every
 * statement is read through its own name, so conditions compiled against
 * `entity.tableName` apply directly.
 */

export type BackendRow = Record<string, unknown>;

export type SortDirection = 'asc' | 'desc';

export interface OrderTerm {
  column: string;
  direction: SortDirection;
  nulls?: 'first' | 'last';
}

export interface SelectStatement {
  table: string;
  columns: readonly string[];
  where: Condition;
  orderBy: readonly OrderTerm[];
  limit: number | null;
  offset: number | null;
}

export interface InsertStatement {
  table: string;
  /** Column-keyed rows; a column missing from a row takes its default. */
  rows: readonly BackendRow[];
  returning: readonly string[];
}

export type AssignmentOperator = 'set' | 'increment' | 'decrement' | 'multiply' | 'divide';

export interface Assignment {
  column: string;
  op: AssignmentOperator;
  value: unknown;
}

export interface UpdateStatement {
  table: string;
  assignments: readonly Assignment[];
  where: Condition;
  returning: readonly string[];
}

export interface DeleteStatement {
  table: string;
  where: Condition;
  returning: readonly string[];
}

export interface CountStatement {
  table: string;
  where: Condition;
}

export type AggregateFunction = 'count' | 'sum' | 'avg' | 'min' | 'max';

export interface AggregateSelection {
  fn: AggregateFunction;
  /** `null` counts rows. */
  column: string | null;
  alias: string;
}

export interface HavingClause {
  aggregate: AggregateSelection;
  operator: CompareOperator;
  value: number;
}

export interface AggregateStatement {
  table: string;
  where: Condition;
  groupBy: readonly string[];
  aggregates: readonly AggregateSelection[];
  having: HavingClause | null;
  orderBy: readonly OrderTerm[];
  limit: number | null;
  offset: number | null;
}

export interface WriteResult {
  rowCount: number;
  rows: BackendRow[];
}

/**
 * Execution seam between the query builders and a database.
 */
export interface QueryBackend {
  readonly inTransaction: boolean;
  select(statement: SelectStatement): Promise<BackendRow[]>;
  insert(statement: InsertStatement): Promise<WriteResult>;
  update(statement: UpdateStatement): Promise<WriteResult>;
  delete(statement: DeleteStatement): Promise<WriteResult>;
  count(statement: CountStatement): Promise<number>;
  /** One row per group: the group columns plus each aggregate alias. */
  aggregate(statement: AggregateStatement): Promise<BackendRow[]>;
  /**
   * Run `work` against a transaction-bound backend. Inside a transaction the
   * same backend is reused, so nested calls join the outer transaction.
   */
  transaction<T>(work: (backend: QueryBackend) => Promise<T>): Promise<T>;
  raw(sql: string, params?: readonly unknown[]): Promise<BackendRow[]>;
}
