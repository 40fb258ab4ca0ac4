import type { Assignment, BackendRow, QueryBackend } from './backend.js';
import type { DeferredLookup } from './deferred-lookup.js';
import { belongsToLookup, DeferredLookupQueue, lookupUnique, relationSelectorTarget } from './deferred-lookup.js';
import type { EntityMetadata, RelationMetadata } from './entity-metadata.js';
import { findField, getField, getRelation } from './entity-metadata.js';
import type { EntityRow, EntityRuntime } from './entity-rows.js';
import {
  asRow,
  assertRequiredFields,
  insertRow,
  primaryKeyCondition,
  primaryKeyValue,
  selectColumns,
  toColumnValues,
  toEntityRow,
} from './entity-rows.js';
import { DeferredLookupError, QueryValidationError, RecordNotFoundError } from './errors.js';
import { isOperatorAllowed } from './field-operations.js';
import { encodeValue } from './field-types.js';
import { Operation } from './operation.js';
import { compilePredicates } from './predicate-compiler.js';
import type {
  FieldMutation,
  Mutation,
  Predicate,
  RelationMutation,
  RelationMutationOperation,
  UniqueFilter,
} from './predicates.js';
import { isUniqueSelector } from './predicates.js';
import { applyRelationOperation } from './relation-operations.js';
import { debug } from './runtime.js';
import type {
  BelongsToRelationNames,
  EntityDeclaration,
  FieldInput,
  InferRow,
  OptionalCreateKeys,
  RelationNames,
  RelationsOf,
  RequiredCreateKeys,
  SchemaDeclaration,
  TargetDeclaration,
  TargetName,
} from './schema.js';

// ----- Typed data -----

/**
 * Field values accepted when creating a row of `D`. Generated, nullable and
 * belongs-to key fields may be left out.
 */
export type FieldData<D extends EntityDeclaration> = {
  [K in RequiredCreateKeys<D>]: FieldInput<D['fields'][K]>;
} & {
  [K in OptionalCreateKeys<D>]?: FieldInput<D['fields'][K]>;
};

/** Nested writes of a relation whose key lives on the target. */
export interface RelatedWrites<T extends EntityDeclaration> {
  create?: readonly FieldData<T>[];
  connect?: readonly UniqueFilter<T['name']>[];
}

type RelationCreateData<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  R extends RelationNames<D>,
> = RelationsOf<D>[R] extends { kind: 'belongs_to' }
  ? UniqueFilter<TargetName<S, D, R>>
  : RelatedWrites<TargetDeclaration<S, D, R>>;

/**
 * Create input: field values plus, per relation, either the unique filter of
 * the row to connect (belongs-to) or nested creates and connects.
 */
export type CreateData<S extends SchemaDeclaration, D extends EntityDeclaration> = FieldData<D> & {
  [R in RelationNames<D>]?: RelationCreateData<S, D, R>;
};

// ----- Shared write steps -----

interface RelatedWrite {
  relation: string;
  operation: RelationMutationOperation;
}

/**
 * A create split into the pending row, the lookups that complete it and the
 * relation writes that follow the insert.
 */
interface PendingCreate {
  fields: EntityRow;
  lookups: DeferredLookupQueue;
  related: RelatedWrite[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const listOf = (value: unknown): readonly unknown[] | null => (Array.isArray(value) ? value : null);

function parseRelatedWrites(entity: EntityMetadata, relation: RelationMetadata, value: unknown): RelatedWrite[] {
  const where = `${entity.name}.${relation.name}`;
  if (!isRecord(value)) {
    throw new QueryValidationError(`${where} expects { create?, connect? }`);
  }

  const writes: RelatedWrite[] = [];
  if (value.create !== undefined) {
    const items = listOf(value.create);
    if (!items) {
      throw new QueryValidationError(`${where}.create must be a list of rows`);
    }
    for (const item of items) {
      if (!isRecord(item)) {
        throw new QueryValidationError(`${where}.create must be a list of rows`);
      }
      writes.push({ relation: relation.name, operation: { op: 'create', data: item } });
    }
  }
  if (value.connect !== undefined) {
    const selectors = listOf(value.connect);
    if (!selectors) {
      throw new QueryValidationError(`${where}.connect must be a list of unique filters`);
    }
    for (const selector of selectors) {
      if (!isUniqueSelector(selector)) {
        throw new QueryValidationError(`${where}.connect must be a list of unique filters`);
      }
      writes.push({ relation: relation.name, operation: { op: 'connect', selector } });
    }
  }
  return writes;
}

function parseCreate(runtime: EntityRuntime, data: object): PendingCreate {
  const { entity, registry } = runtime;
  const pending: PendingCreate = { fields: {}, lookups: new DeferredLookupQueue(entity.name), related: [] };

  const entries: [string, unknown][] = Object.entries(data);
  for (const [name, value] of entries) {
    if (value === undefined) continue;
    if (findField(entity, name)) {
      pending.fields[name] = value;
      continue;
    }

    const relation = entity.relations.find(candidate => candidate.name === name);
    if (!relation) {
      throw new QueryValidationError(`Unknown field or relation '${name}' on ${entity.name}`);
    }
    if (relation.kind === 'belongs_to') {
      if (!isUniqueSelector(value)) {
        throw new QueryValidationError(`${entity.name}.${name} expects a unique filter of ${relation.targetEntity}`);
      }
      pending.lookups.enqueue(belongsToLookup(entity, name, value, registry, pending.fields));
      continue;
    }
    pending.related.push(...parseRelatedWrites(entity, relation, value));
  }
  return pending;
}

/**
 * Resolve the queued lookups, insert the row, then run its nested relation
 * writes. Runs on the caller's transaction.
 */
async function performCreate(
  runtime: EntityRuntime,
  backend: QueryBackend,
  pending: PendingCreate
): Promise<EntityRow> {
  const { entity, registry } = runtime;
  await pending.lookups.drain(backend);
  const row = await insertRow(entity, backend, pending.fields);
  for (const { relation, operation } of pending.related) {
    await applyRelationOperation({ entity, registry, backend, parent: row }, relation, operation);
  }
  return row;
}

function assertOwnSelector(runtime: EntityRuntime, selector: UniqueFilter): void {
  if (runtime.registry.get(selector.entity) !== runtime.entity) {
    throw new QueryValidationError(`A ${selector.entity} filter cannot select ${runtime.entity.name} rows`);
  }
}

function assertOwnMutation(entity: EntityMetadata, mutation: Mutation): void {
  if (mutation.entity !== entity.name) {
    throw new QueryValidationError(`A ${mutation.entity} mutation cannot apply to ${entity.name}`);
  }
}

function fieldAssignment(entity: EntityMetadata, mutation: FieldMutation): Assignment {
  const field = getField(entity, mutation.field);
  const { op, value } = mutation.operation;
  if (op !== 'set' && !isOperatorAllowed(field, op)) {
    throw new QueryValidationError(`Cannot ${op} ${entity.name}.${field.name} (${field.type})`);
  }
  return { column: field.column, op, value };
}

async function belongsToAssignment(
  runtime: EntityRuntime,
  backend: QueryBackend,
  relation: RelationMetadata,
  operation: RelationMutationOperation
): Promise<Assignment> {
  const { entity, registry } = runtime;
  const foreignKey = getField(entity, relation.localField);

  switch (operation.op) {
    case 'connect': {
      relationSelectorTarget(entity, relation.name, operation.selector, registry);
      const target = await lookupUnique(registry, backend, operation.selector);
      if (!target) {
        throw new DeferredLookupError(
          `No ${relation.targetEntity} matches ${operation.selector.field} for ${entity.name}.${relation.name}`,
          entity.name,
          relation.name
        );
      }
      return { column: foreignKey.column, op: 'set', value: encodeValue(foreignKey, target[relation.remoteField]) };
    }
    case 'disconnect':
      if (!relation.foreignKeyNullable) {
        throw new QueryValidationError(
          `Cannot disconnect ${entity.name}.${relation.name}: ${foreignKey.name} is not nullable`
        );
      }
      return { column: foreignKey.column, op: 'set', value: null };
    default:
      throw new QueryValidationError(
        `${operation.op} is not available on belongs_to relation ${entity.name}.${relation.name}`
      );
  }
}

/**
 * Apply mutations to a fetched row in order. Field and belongs-to changes
 * gather into one UPDATE by primary key until a column repeats or a
 * target-owned relation write needs the row as it stands.
 */
async function performUpdate(
  runtime: EntityRuntime,
  backend: QueryBackend,
  row: EntityRow,
  mutations: readonly Mutation[]
): Promise<EntityRow> {
  const { entity, registry } = runtime;
  let current = row;
  let batch: Assignment[] = [];

  const flush = async () => {
    if (batch.length === 0) return;
    const { rows } = await backend.update({
      table: entity.tableName,
      assignments: batch,
      where: primaryKeyCondition(entity, primaryKeyValue(entity, current)),
      returning: selectColumns(entity),
    });
    const [updated] = rows;
    if (!updated) {
      throw new RecordNotFoundError(`${entity.name} row was removed during the update`, entity.name);
    }
    current = toEntityRow(entity, updated);
    batch = [];
  };

  const assign = async (assignment: Assignment) => {
    if (batch.some(pending => pending.column === assignment.column)) {
      await flush();
    }
    batch.push(assignment);
  };

  for (const mutation of mutations) {
    assertOwnMutation(entity, mutation);
    if (mutation.kind === 'field') {
      await assign(fieldAssignment(entity, mutation));
      continue;
    }

    const relation = getRelation(entity, mutation.relation);
    if (relation.kind === 'belongs_to') {
      await assign(await belongsToAssignment(runtime, backend, relation, mutation.operation));
      continue;
    }

    await flush();
    await applyRelationOperation({ entity, registry, backend, parent: current }, mutation.relation, mutation.operation);
  }

  await flush();
  return current;
}

async function requireRow(runtime: EntityRuntime, backend: QueryBackend, selector: UniqueFilter): Promise<EntityRow> {
  const row = await lookupUnique(runtime.registry, backend, selector);
  if (!row) {
    throw new RecordNotFoundError(
      `No ${runtime.entity.name} matches ${selector.field} = ${String(selector.operation.value)}`,
      runtime.entity.name
    );
  }
  return row;
}

// ----- Builders -----

/**
 * Insert one row. Belongs-to connects are queued as lookups and resolved in
 * order on the write's transaction right before the insert; nested creates
 * and connects of target-owned relations follow it.
 */
export class CreateBuilder<S extends SchemaDeclaration, D extends EntityDeclaration> extends Operation<InferRow<D>> {
  override readonly kind = 'insert';
  private readonly pending: PendingCreate;

  constructor(runtime: EntityRuntime, data: CreateData<S, D>) {
    super(runtime);
    this.pending = parseCreate(runtime, data);
  }

  /**
   * Queue a lookup that sets the foreign key of a belongs-to relation.
   */
  connect<R extends BelongsToRelationNames<D>>(relation: R, selector: UniqueFilter<TargetName<S, D, R>>): this {
    const { entity, registry } = this.runtime;
    this.enqueue(belongsToLookup(entity, relation, selector, registry, this.pending.fields));
    return this;
  }

  get pendingLookups(): number {
    return this.pending.lookups.size;
  }

  private enqueue(lookup: DeferredLookup): void {
    this.assertOpen();
    this.pending.lookups.enqueue(lookup);
  }

  protected override async run(backend: QueryBackend): Promise<InferRow<D>> {
    const row = await backend.transaction(tx => performCreate(this.runtime, tx, this.pending));
    return asRow<InferRow<D>>(row);
  }
}

/**
 * Fetch one row, apply the mutations in order and return the new row. With
 * no mutations the fetched row comes back unchanged.
 */
export class UpdateBuilder<D extends EntityDeclaration> extends Operation<InferRow<D>> {
  override readonly kind = 'update';
  private readonly selector: UniqueFilter;
  private readonly mutations: Mutation[];

  constructor(runtime: EntityRuntime, selector: UniqueFilter, mutations: readonly Mutation[]) {
    super(runtime);
    assertOwnSelector(runtime, selector);
    this.selector = selector;
    this.mutations = [...mutations];
  }

  /** Append mutations after the ones already given. */
  apply(...mutations: Mutation<D['name']>[]): this {
    this.assertOpen();
    this.mutations.push(...mutations);
    return this;
  }

  protected override async run(backend: QueryBackend): Promise<InferRow<D>> {
    const row = await backend.transaction(async tx => {
      const existing = await requireRow(this.runtime, tx, this.selector);
      return this.mutations.length === 0 ? existing : performUpdate(this.runtime, tx, existing, this.mutations);
    });
    return asRow<InferRow<D>>(row);
  }
}

/**
 * Delete one row and return it.
 */
export class DeleteBuilder<D extends EntityDeclaration> extends Operation<InferRow<D>> {
  override readonly kind = 'delete';
  private readonly selector: UniqueFilter;

  constructor(runtime: EntityRuntime, selector: UniqueFilter) {
    super(runtime);
    assertOwnSelector(runtime, selector);
    this.selector = selector;
  }

  protected override async run(backend: QueryBackend): Promise<InferRow<D>> {
    const { entity, registry } = this.runtime;
    const { rows } = await backend.delete({
      table: entity.tableName,
      where: compilePredicates([this.selector], entity, registry),
      returning: selectColumns(entity),
    });
    const [row] = rows;
    if (!row) {
      throw new RecordNotFoundError(
        `No ${entity.name} matches ${this.selector.field} = ${String(this.selector.operation.value)}`,
        entity.name
      );
    }
    return asRow<InferRow<D>>(toEntityRow(entity, row));
  }
}

/**
 * Update the row the selector finds, or create one from the create data
 * alone when there is none.
 */
export class UpsertBuilder<S extends SchemaDeclaration, D extends EntityDeclaration> extends Operation<InferRow<D>> {
  override readonly kind = 'upsert';
  private readonly selector: UniqueFilter;
  private readonly pending: PendingCreate;
  private readonly mutations: readonly Mutation[];

  constructor(runtime: EntityRuntime, selector: UniqueFilter, create: CreateData<S, D>, update: readonly Mutation[]) {
    super(runtime);
    assertOwnSelector(runtime, selector);
    this.selector = selector;
    this.pending = parseCreate(runtime, create);
    this.mutations = [...update];
  }

  protected override async run(backend: QueryBackend): Promise<InferRow<D>> {
    const row = await backend.transaction(async tx => {
      const existing = await lookupUnique(this.runtime.registry, tx, this.selector);
      if (!existing) {
        debug.db(`Upsert on ${this.entityName} found no row; creating`);
        return performCreate(this.runtime, tx, this.pending);
      }
      return this.mutations.length === 0 ? existing : performUpdate(this.runtime, tx, existing, this.mutations);
    });
    return asRow<InferRow<D>>(row);
  }
}

/**
 * Insert many rows in one statement. Only field values are accepted.
 */
export class CreateManyBuilder<D extends EntityDeclaration> extends Operation<number> {
  override readonly kind = 'insert';
  private readonly rows: BackendRow[];

  constructor(runtime: EntityRuntime, rows: readonly FieldData<D>[]) {
    super(runtime);
    this.rows = rows.map(data => {
      const values = toColumnValues(runtime.entity, data);
      assertRequiredFields(runtime.entity, values);
      return values;
    });
  }

  protected override async run(backend: QueryBackend): Promise<number> {
    if (this.rows.length === 0) {
      return 0;
    }
    const { rowCount } = await backend.insert({ table: this.runtime.entity.tableName, rows: this.rows, returning: [] });
    return rowCount;
  }
}

/**
 * Apply field mutations to every matching row; returns the number of rows
 * changed. Relation mutations need a single row and are rejected.
 */
export class UpdateManyBuilder<D extends EntityDeclaration> extends Operation<number> {
  override readonly kind = 'update';
  private readonly predicates: Predicate[];
  private readonly assignments: Assignment[];

  constructor(runtime: EntityRuntime, where: readonly Predicate[], mutations: readonly Mutation[]) {
    super(runtime);
    this.predicates = [...where];
    this.assignments = [];
    for (const mutation of mutations) {
      this.add(mutation);
    }
  }

  where(...predicates: Predicate<D['name']>[]): this {
    this.assertOpen();
    this.predicates.push(...predicates);
    return this;
  }

  private add(mutation: Mutation): void {
    const { entity } = this.runtime;
    assertOwnMutation(entity, mutation);
    if (mutation.kind === 'relation') {
      throw relationInBulk(entity, mutation);
    }
    const assignment = fieldAssignment(entity, mutation);
    if (this.assignments.some(existing => existing.column === assignment.column)) {
      throw new QueryValidationError(`updateMany on ${entity.name} changes ${mutation.field} more than once`);
    }
    this.assignments.push(assignment);
  }

  protected override async run(backend: QueryBackend): Promise<number> {
    const { entity, registry } = this.runtime;
    const where = compilePredicates(this.predicates, entity, registry);
    if (this.assignments.length === 0) {
      return backend.count({ table: entity.tableName, where });
    }
    const { rowCount } = await backend.update({
      table: entity.tableName,
      assignments: this.assignments,
      where,
      returning: [],
    });
    return rowCount;
  }
}

const relationInBulk = (entity: EntityMetadata, mutation: RelationMutation) =>
  new QueryValidationError(
    `updateMany on ${entity.name} cannot ${mutation.operation.op} relation '${mutation.relation}'`
  );

export class DeleteManyBuilder<D extends EntityDeclaration> extends Operation<number> {
  override readonly kind = 'delete';
  private readonly predicates: Predicate[];

  constructor(runtime: EntityRuntime, where: readonly Predicate[]) {
    super(runtime);
    this.predicates = [...where];
  }

  where(...predicates: Predicate<D['name']>[]): this {
    this.assertOpen();
    this.predicates.push(...predicates);
    return this;
  }

  protected override async run(backend: QueryBackend): Promise<number> {
    const { entity, registry } = this.runtime;
    const { rowCount } = await backend.delete({
      table: entity.tableName,
      where: compilePredicates(this.predicates, entity, registry),
      returning: [],
    });
    return rowCount;
  }
}
