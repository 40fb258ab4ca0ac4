import type { QueryBackend } from './backend.js';
import type { Condition } from './condition.js';
import { all, column, inList } from './condition.js';
import type { EntityMetadata, RelationMetadata } from './entity-metadata.js';
import { getField } from './entity-metadata.js';
import type { EntityRegistry } from './entity-registry.js';
import type { EntityRow } from './entity-rows.js';
import { groupingKey, selectColumns, toEntityRow } from './entity-rows.js';
import { encodeValue } from './field-types.js';
import type { IncludeSpec } from './include.js';
import { includeWindow } from './include.js';
import { compilePredicates } from './predicate-compiler.js';
import { cursorCondition, effectiveOrder, toOrderTerms, validateWindow } from './row-reader.js';
import { debug } from './runtime.js';

export interface RelationFetchRequest {
  relation: RelationMetadata;
  /** Decoded values of the parents' `relation.localField`. */
  values: readonly unknown[];
  include: IncludeSpec;
  backend: QueryBackend;
}

/**
 * Loads the target rows of a relation for a set of parents. Rows come back
 * filtered by the include's `where` and cursor and sorted in its effective
 * order; per-parent windowing is left to the caller.
 */
export interface RelationFetcher {
  readonly entity: string;
  fetch(request: RelationFetchRequest): Promise<EntityRow[]>;
}

const distinctValues = (values: readonly unknown[]): unknown[] => {
  const seen = new Map<string, unknown>();
  for (const value of values) {
    if (value === null || value === undefined) continue;
    seen.set(groupingKey(value), value);
  }
  return [...seen.values()];
};

/**
 * Default fetcher for an entity: one `IN` query over the relation's remote
 * column per call.
 */
export function createRelationFetcher(entity: EntityMetadata, registry: EntityRegistry): RelationFetcher {
  return {
    entity: entity.name,
    async fetch({ relation, values, include, backend }) {
      const keys = distinctValues(values);
      if (keys.length === 0) {
        return [];
      }

      const remote = getField(entity, relation.remoteField);
      const window = includeWindow(include);
      validateWindow(entity, window);
      const order = effectiveOrder(entity, window);

      const conditions: Condition[] = [
        inList(
          column(entity.tableName, remote.column),
          keys.map(value => encodeValue(remote, value))
        ),
        compilePredicates(include.where, entity, registry),
      ];

      if (include.cursor) {
        const condition = await cursorCondition(backend, entity, registry, include.cursor, order);
        if (!condition) {
          return [];
        }
        conditions.push(condition);
      }

      debug.db(`Fetching ${entity.name} rows for ${keys.length} parent key(s) of '${relation.name}'`);
      const rows = await backend.select({
        table: entity.tableName,
        columns: selectColumns(entity),
        where: all(conditions),
        orderBy: toOrderTerms(entity, order),
        limit: null,
        offset: null,
      });
      return rows.map(row => toEntityRow(entity, row));
    },
  };
}
