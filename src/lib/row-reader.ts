import type { OrderTerm, QueryBackend, SortDirection } from './backend.js';
import type { Condition } from './condition.js';
import { all, column, compare } from './condition.js';
import type { EntityMetadata } from './entity-metadata.js';
import { getField, getPrimaryKeyField } from './entity-metadata.js';
import type { EntityRegistry } from './entity-registry.js';
import type { EntityRow } from './entity-rows.js';
import { groupingKey, selectColumns, toEntityRow } from './entity-rows.js';
import { QueryValidationError } from './errors.js';
import { compilePredicates } from './predicate-compiler.js';
import type { UniqueFilter } from './predicates.js';
import { debug } from './runtime.js';

export interface OrderSpec {
  field: string;
  direction: SortDirection;
  nulls?: 'first' | 'last';
}

/**
 * Ordering and paging of a read. A negative `take` pages backwards from the
 * end of the ordering (or from the cursor); the result keeps the requested
 * order.
 */
export interface ReadWindow {
  orderBy: readonly OrderSpec[];
  take: number | null;
  skip: number | null;
  cursor: UniqueFilter | null;
  distinct: readonly string[];
}

export const EMPTY_WINDOW: ReadWindow = Object.freeze({
  orderBy: Object.freeze([]),
  take: null,
  skip: null,
  cursor: null,
  distinct: Object.freeze([]),
});

export function validateWindow(entity: EntityMetadata, window: ReadWindow): void {
  if (window.skip !== null && (!Number.isInteger(window.skip) || window.skip < 0)) {
    throw new QueryValidationError(`skip must be a non-negative integer, got ${window.skip}`);
  }
  if (window.take !== null && !Number.isInteger(window.take)) {
    throw new QueryValidationError(`take must be an integer, got ${window.take}`);
  }
  for (const order of window.orderBy) {
    getField(entity, order.field);
  }
  for (const name of window.distinct) {
    getField(entity, name);
  }
  if (window.cursor) {
    if (window.cursor.entity !== entity.name) {
      throw new QueryValidationError(
        `Cursor for ${window.cursor.entity} cannot page a query on ${entity.name}`
      );
    }
    const primary = entity.primaryKey.field;
    const foreign = window.orderBy.find(order => order.field !== primary);
    if (foreign) {
      throw new QueryValidationError(
        `Cursor pagination on ${entity.name} orders by the primary key only; cannot order by '${foreign.field}'`
      );
    }
  }
}

const flip = (order: OrderSpec): OrderSpec => {
  const flipped: OrderSpec = { field: order.field, direction: order.direction === 'asc' ? 'desc' : 'asc' };
  if (order.nulls) {
    flipped.nulls = order.nulls === 'first' ? 'last' : 'first';
  }
  return flipped;
};

/**
 * The effective ordering: cursor and backwards reads need a deterministic
 * one, so they fall back to the primary key.
 */
export function effectiveOrder(entity: EntityMetadata, window: ReadWindow): OrderSpec[] {
  let order = [...window.orderBy];
  const backwards = isBackwards(window);
  if (order.length === 0 && (window.cursor || backwards)) {
    order = [{ field: entity.primaryKey.field, direction: 'asc' }];
  }
  return backwards ? order.map(flip) : order;
}

export const toOrderTerms = (entity: EntityMetadata, order: readonly OrderSpec[]): OrderTerm[] =>
  order.map(spec => {
    const term: OrderTerm = { column: getField(entity, spec.field).column, direction: spec.direction };
    if (spec.nulls) {
      term.nulls = spec.nulls;
    }
    return term;
  });

/**
 * Resolve a cursor selector to its row's primary-key value, or null when no
 * row matches.
 */
async function resolveCursor(
  entity: EntityMetadata,
  registry: EntityRegistry,
  backend: QueryBackend,
  cursor: UniqueFilter
): Promise<unknown> {
  const primary = getPrimaryKeyField(entity);
  // Primary-key cursors are looked up too, so a deleted row ends the paging
  const rows = await backend.select({
    table: entity.tableName,
    columns: [primary.column],
    where: compilePredicates([cursor], entity, registry),
    orderBy: [],
    limit: 1,
    offset: null,
  });
  const [row] = rows;
  return row ? row[primary.column] : null;
}

/**
 * Exclusive cursor condition: rows after (or, when the effective order is
 * descending, before) the cursor row. `null` means no row matches the
 * cursor, so the page is empty.
 */
export async function cursorCondition(
  backend: QueryBackend,
  entity: EntityMetadata,
  registry: EntityRegistry,
  cursor: UniqueFilter,
  order: readonly OrderSpec[]
): Promise<Condition | null> {
  const cursorValue = await resolveCursor(entity, registry, backend, cursor);
  if (cursorValue === null || cursorValue === undefined) {
    debug.db(`Cursor on ${entity.name} matched no row; returning an empty page`);
    return null;
  }
  const direction = order[0]?.direction ?? 'asc';
  const primary = getPrimaryKeyField(entity);
  return compare(column(entity.tableName, primary.column), direction === 'asc' ? '>' : '<', cursorValue);
}

export interface RowQuery {
  entity: EntityMetadata;
  registry: EntityRegistry;
  where: Condition;
  window: ReadWindow;
}

/**
 * Run a read against the backend and decode the rows.
 */
export async function selectRows(backend: QueryBackend, query: RowQuery): Promise<EntityRow[]> {
  const { entity, registry, window } = query;
  validateWindow(entity, window);

  const order = effectiveOrder(entity, window);
  const conditions: Condition[] = [query.where];

  if (window.cursor) {
    const condition = await cursorCondition(backend, entity, registry, window.cursor, order);
    if (!condition) {
      return [];
    }
    conditions.push(condition);
  }

  // Distinct keeps the first row of each value in the requested order, so
  // paging has to wait until the duplicates are gone
  const paged = window.distinct.length === 0;
  const rows = await backend.select({
    table: entity.tableName,
    columns: selectColumns(entity),
    where: all(conditions),
    orderBy: toOrderTerms(entity, order),
    limit: paged && window.take !== null ? Math.abs(window.take) : null,
    offset: paged ? window.skip : null,
  });

  const decoded = rows.map(row => toEntityRow(entity, row));
  if (!paged) {
    return applyWindow(decoded, window);
  }
  return isBackwards(window) ? decoded.reverse() : decoded;
}

export const isBackwards = (window: ReadWindow): boolean => window.take !== null && window.take < 0;

/**
 * Apply distinct, skip and take in memory to rows that arrive filtered and
 * in the effective order of {@link effectiveOrder}, then restore the
 * requested order for backwards reads. Includes window each parent's
 * related rows this way.
 */
export function applyWindow(rows: readonly EntityRow[], window: ReadWindow): EntityRow[] {
  let result = [...rows];

  if (window.distinct.length > 0) {
    const seen = new Set<string>();
    result = result.filter(row => {
      const key = window.distinct.map(name => groupingKey(row[name])).join('|');
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    });
  }

  if (window.skip !== null) {
    result = result.slice(window.skip);
  }
  if (window.take !== null) {
    result = result.slice(0, Math.abs(window.take));
  }

  return isBackwards(window) ? result.reverse() : result;
}
