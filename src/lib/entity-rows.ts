import type { BackendRow, QueryBackend } from './backend.js';
import type { ColumnRef, Condition } from './condition.js';
import { column, compare } from './condition.js';
import type { EntityMetadata } from './entity-metadata.js';
import { findField, getField, getPrimaryKeyField } from './entity-metadata.js';
import type { EntityRegistry } from './entity-registry.js';
import { InternalContractError, QueryValidationError } from './errors.js';
import { decodeValue, encodeValue } from './field-types.js';

/** A decoded row keyed by field name. */
export type EntityRow = Record<string, unknown>;

/**
 * What a builder needs to run against one entity.
 */
export interface EntityRuntime {
  entity: EntityMetadata;
  registry: EntityRegistry;
  backend: QueryBackend;
}

export const selectColumns = (entity: EntityMetadata): string[] => entity.fields.map(field => field.column);

export const fieldColumn = (entity: EntityMetadata, fieldName: string): ColumnRef =>
  column(entity.tableName, getField(entity, fieldName).column);

/**
 * Decode a column-keyed backend row into a field-keyed entity row.
 */
export function toEntityRow(entity: EntityMetadata, row: BackendRow): EntityRow {
  const decoded: EntityRow = {};
  for (const field of entity.fields) {
    decoded[field.name] = decodeValue(field, row[field.column]);
  }
  return decoded;
}

/**
 * Encode field-keyed data into a column-keyed row. `undefined` values are
 * left out so the column keeps its default.
 */
export function toColumnValues(entity: EntityMetadata, data: object): BackendRow {
  const encoded: BackendRow = {};
  const entries: [string, unknown][] = Object.entries(data);
  for (const [name, value] of entries) {
    if (value === undefined) continue;
    const field = findField(entity, name);
    if (!field) {
      throw new QueryValidationError(`Unknown field '${name}' on ${entity.name}`);
    }
    encoded[field.column] = encodeValue(field, value);
  }
  return encoded;
}

/**
 * Fail when a non-generated, non-nullable field has no value.
 */
export function assertRequiredFields(entity: EntityMetadata, row: BackendRow): void {
  for (const field of entity.fields) {
    if (field.generated || field.nullable) continue;
    if (row[field.column] === undefined) {
      throw new QueryValidationError(`Missing required field ${entity.name}.${field.name}`);
    }
  }
}

/**
 * Insert one row from field-keyed data and return the stored row, with
 * generated values filled in.
 */
export async function insertRow(
  entity: EntityMetadata,
  backend: QueryBackend,
  data: Readonly<Record<string, unknown>>
): Promise<EntityRow> {
  const values = toColumnValues(entity, data);
  assertRequiredFields(entity, values);
  const { rows } = await backend.insert({ table: entity.tableName, rows: [values], returning: selectColumns(entity) });
  const [row] = rows;
  if (!row) {
    throw new InternalContractError(`Insert into ${entity.tableName} returned no row`);
  }
  return toEntityRow(entity, row);
}

export function primaryKeyValue(entity: EntityMetadata, row: EntityRow): unknown {
  return row[entity.primaryKey.field];
}

/**
 * Condition selecting one row by its (decoded) primary-key value.
 */
export function primaryKeyCondition(entity: EntityMetadata, value: unknown): Condition {
  const field = getPrimaryKeyField(entity);
  return compare(column(entity.tableName, field.column), '=', encodeValue(field, value));
}

/**
 * Grouping key for a decoded key value. A number and a bigint of the same
 * value share a key, so keys of different integer widths still match.
 */
export function groupingKey(value: unknown): string {
  if (typeof value === 'number' || typeof value === 'bigint') {
    return `n:${String(value)}`;
  }
  if (value instanceof Date) {
    return `d:${value.getTime()}`;
  }
  if (typeof value === 'string') {
    return `s:${value}`;
  }
  if (typeof value === 'boolean') {
    return `b:${String(value)}`;
  }
  return `j:${JSON.stringify(value)}`;
}

/**
 * Decoded rows are built from the same declaration the row type is inferred
 * from, so this is where the typed view is taken.
 */
export const asRow = <TRow>(row: EntityRow): TRow => row as unknown as TRow;

export const asRows = <TRow>(rows: EntityRow[]): TRow[] => rows.map(row => asRow<TRow>(row));
