import type { QueryBackend } from './backend.js';
import type { Condition } from './condition.js';
import { all, column, compare, inList, not } from './condition.js';
import type { EntityMetadata, RelationMetadata } from './entity-metadata.js';
import { getField, getPrimaryKeyField } from './entity-metadata.js';
import type { EntityRegistry } from './entity-registry.js';
import type { EntityRow } from './entity-rows.js';
import { insertRow, primaryKeyValue } from './entity-rows.js';
import { QueryValidationError, RecordNotFoundError } from './errors.js';
import { encodeValue } from './field-types.js';
import { lookupUnique, relationSelectorTarget } from './deferred-lookup.js';
import { relationTarget } from './include.js';
import type { RelationMutationOperation, UniqueFilter } from './predicates.js';
import { debug } from './runtime.js';

/**
 * A parent row whose target-owned relations are being written, on the
 * write's transaction.
 */
export interface RelationWriteContext {
  entity: EntityMetadata;
  registry: EntityRegistry;
  backend: QueryBackend;
  parent: EntityRow;
}

interface TargetRelation {
  relation: RelationMetadata;
  target: EntityMetadata;
}

function targetOwned(context: RelationWriteContext, relationName: string, selector?: UniqueFilter): TargetRelation {
  const { entity, registry } = context;
  const resolved = selector
    ? relationSelectorTarget(entity, relationName, selector, registry)
    : relationTarget(entity, relationName, registry);
  if (resolved.relation.keyOwner !== 'target') {
    throw new QueryValidationError(
      `${entity.name}.${relationName} is a belongs_to relation; its key is written with the row itself`
    );
  }
  return resolved;
}

const parentKey = (context: RelationWriteContext, relation: RelationMetadata): unknown => {
  const value = context.parent[relation.localField];
  if (value === null || value === undefined) {
    throw new QueryValidationError(
      `${context.entity.name}.${relation.localField} is null; cannot relate rows through '${relation.name}'`
    );
  }
  return value;
};

const foreignKeyColumn = ({ relation, target }: TargetRelation) =>
  column(target.tableName, getField(target, relation.remoteField).column);

async function assignForeignKey(
  { relation, target }: TargetRelation,
  backend: QueryBackend,
  where: Condition,
  value: unknown
): Promise<number> {
  const field = getField(target, relation.remoteField);
  const { rowCount } = await backend.update({
    table: target.tableName,
    assignments: [{ column: field.column, op: 'set', value: encodeValue(field, value) }],
    where,
    returning: [],
  });
  return rowCount;
}

async function requireTarget(
  context: RelationWriteContext,
  { relation, target }: TargetRelation,
  selector: UniqueFilter
): Promise<EntityRow> {
  const row = await lookupUnique(context.registry, context.backend, selector);
  if (!row) {
    throw new RecordNotFoundError(
      `No ${target.name} matches ${selector.field} for ${context.entity.name}.${relation.name}`,
      target.name
    );
  }
  return row;
}

const primaryKeyIn = (target: EntityMetadata, rows: readonly EntityRow[]): Condition => {
  const primary = getPrimaryKeyField(target);
  return inList(
    column(target.tableName, primary.column),
    rows.map(row => encodeValue(primary, primaryKeyValue(target, row)))
  );
};

/**
 * A has_one parent holds at most one related row, so the current one is
 * detached before another takes its place. `keep` is left attached.
 */
async function detachCurrent(context: RelationWriteContext, resolved: TargetRelation, keep?: EntityRow): Promise<void> {
  const { relation, target } = resolved;
  if (relation.kind !== 'has_one') {
    return;
  }
  const foreignKey = getField(target, relation.remoteField);
  const owned = compare(foreignKeyColumn(resolved), '=', encodeValue(foreignKey, parentKey(context, relation)));
  const current = keep ? all([owned, not(primaryKeyIn(target, [keep]))]) : owned;

  if (!relation.foreignKeyNullable) {
    const attached = await context.backend.count({ table: target.tableName, where: current });
    if (attached > 0) {
      throw new QueryValidationError(
        `Cannot replace ${context.entity.name}.${relation.name}: ` +
          `${target.name}.${relation.remoteField} is not nullable`
      );
    }
    return;
  }
  const detached = await assignForeignKey(resolved, context.backend, current, null);
  debug.db(`Detached ${detached} ${target.name} row(s) from ${context.entity.name}.${relation.name}`);
}

/**
 * Point the row `selector` finds at the parent.
 */
export async function connectRelated(
  context: RelationWriteContext,
  relationName: string,
  selector: UniqueFilter
): Promise<void> {
  const resolved = targetOwned(context, relationName, selector);
  const row = await requireTarget(context, resolved, selector);
  await detachCurrent(context, resolved, row);
  const where = primaryKeyIn(resolved.target, [row]);
  await assignForeignKey(resolved, context.backend, where, parentKey(context, resolved.relation));
}

/**
 * Detach related rows from the parent by nulling their foreign key. Without
 * a selector every row related to the parent is detached.
 */
export async function disconnectRelated(
  context: RelationWriteContext,
  relationName: string,
  selector: UniqueFilter | null
): Promise<void> {
  const resolved = targetOwned(context, relationName, selector ?? undefined);
  const { relation, target } = resolved;
  if (!relation.foreignKeyNullable) {
    throw new QueryValidationError(
      `Cannot disconnect ${context.entity.name}.${relation.name}: ` +
        `${target.name}.${relation.remoteField} is not nullable`
    );
  }

  const foreignKey = getField(target, relation.remoteField);
  const owned = compare(foreignKeyColumn(resolved), '=', encodeValue(foreignKey, parentKey(context, relation)));
  if (!selector) {
    await assignForeignKey(resolved, context.backend, owned, null);
    return;
  }
  const row = await requireTarget(context, resolved, selector);
  await assignForeignKey(resolved, context.backend, all([owned, primaryKeyIn(target, [row])]), null);
}

/**
 * Insert a related row whose foreign key points at the parent.
 */
export async function createRelated(
  context: RelationWriteContext,
  relationName: string,
  data: Readonly<Record<string, unknown>>
): Promise<EntityRow> {
  const resolved = targetOwned(context, relationName);
  const { relation, target } = resolved;
  await detachCurrent(context, resolved);
  return insertRow(target, context.backend, { ...data, [relation.remoteField]: parentKey(context, relation) });
}

/**
 * Make the selected rows exactly the parent's related rows. Rows that no
 * longer belong are detached when the foreign key is nullable and deleted
 * otherwise. Running the same set twice changes nothing the second time.
 */
export async function setRelated(
  context: RelationWriteContext,
  relationName: string,
  selectors: readonly UniqueFilter[]
): Promise<void> {
  const resolved = targetOwned(context, relationName);
  const { relation, target } = resolved;
  if (relation.kind !== 'has_many') {
    throw new QueryValidationError(
      `set is only available on has_many relations; ${context.entity.name}.${relation.name} is ${relation.kind}`
    );
  }

  const rows: EntityRow[] = [];
  for (const selector of selectors) {
    relationSelectorTarget(context.entity, relationName, selector, context.registry);
    rows.push(await requireTarget(context, resolved, selector));
  }

  const key = parentKey(context, relation);
  const foreignKey = getField(target, relation.remoteField);
  const owned = compare(foreignKeyColumn(resolved), '=', encodeValue(foreignKey, key));
  const leaving = rows.length > 0 ? all([owned, not(primaryKeyIn(target, rows))]) : owned;

  if (relation.foreignKeyNullable) {
    const detached = await assignForeignKey(resolved, context.backend, leaving, null);
    debug.db(`Detached ${detached} ${target.name} row(s) from ${context.entity.name}.${relation.name}`);
  } else {
    const { rowCount } = await context.backend.delete({ table: target.tableName, where: leaving, returning: [] });
    debug.db(`Deleted ${rowCount} ${target.name} row(s) leaving ${context.entity.name}.${relation.name}`);
  }

  if (rows.length > 0) {
    await assignForeignKey(resolved, context.backend, primaryKeyIn(target, rows), key);
  }
}

/**
 * Apply one relation mutation of an update or nested create.
 */
export async function applyRelationOperation(
  context: RelationWriteContext,
  relationName: string,
  operation: RelationMutationOperation
): Promise<void> {
  switch (operation.op) {
    case 'connect':
      return connectRelated(context, relationName, operation.selector);
    case 'disconnect':
      return disconnectRelated(context, relationName, operation.selector);
    case 'set':
      return setRelated(context, relationName, operation.selectors);
    case 'create':
      await createRelated(context, relationName, operation.data);
      return;
  }
}
