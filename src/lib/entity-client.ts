import type { EntityMetadata } from './entity-metadata.js';
import type { EntityRuntime } from './entity-rows.js';
import { QueryValidationError } from './errors.js';
import type { FieldOperations, FieldOperationSet } from './field-operations.js';
import { createFieldOperations } from './field-operations.js';
import type { LogicalPredicate, Mutation, Predicate, UniqueFilter } from './predicates.js';
import { isUniqueFilter, logicalPredicate } from './predicates.js';
import { AggregateBuilder, CountBuilder, GroupByBuilder } from './aggregate-builders.js';
import { createReadDraft, FindFirstBuilder, FindManyBuilder, FindUniqueBuilder } from './read-builders.js';
import type { RelationNamespace, RuntimeRelationOperations } from './relation-namespace.js';
import { createRelationOperations } from './relation-namespace.js';
import type { EntityDeclaration, FieldNames, SchemaDeclaration } from './schema.js';
import type { CreateData, FieldData } from './write-builders.js';
import {
  CreateBuilder,
  CreateManyBuilder,
  DeleteBuilder,
  DeleteManyBuilder,
  UpdateBuilder,
  UpdateManyBuilder,
  UpsertBuilder,
} from './write-builders.js';

export type FieldNamespace<D extends EntityDeclaration> = {
  readonly [K in FieldNames<D>]: FieldOperations<D['name'], D['fields'][K]>;
};

function buildFieldNamespace(runtime: EntityRuntime): Readonly<Record<string, FieldOperationSet>> {
  const { entity, registry } = runtime;
  const namespace: Record<string, FieldOperationSet> = {};
  for (const field of entity.fields) {
    Object.defineProperty(namespace, field.name, {
      value: createFieldOperations({ entity, field, registry }),
      enumerable: true,
    });
  }
  return Object.freeze(namespace);
}

function buildRelationNamespace(
  entity: EntityMetadata
): Readonly<Record<string, Partial<RuntimeRelationOperations>>> {
  const namespace: Record<string, Partial<RuntimeRelationOperations>> = {};
  for (const relation of entity.relations) {
    Object.defineProperty(namespace, relation.name, {
      value: createRelationOperations(entity, relation),
      enumerable: true,
    });
  }
  return Object.freeze(namespace);
}

/**
 * Query surface of one entity.
 *
 * Predicates and mutations come from the `fields` and `relations`
 * namespaces; every read and write method returns a builder that runs when
 * it is awaited (or passed to a batch).
 *
 * @example
 * const { fields } = client.user;
 * const adults = await client.user.findMany(fields.age.gte(18)).orderBy('name').take(10);
 */
export class EntityClient<S extends SchemaDeclaration, D extends EntityDeclaration> {
  readonly fields: FieldNamespace<D>;
  readonly relations: RelationNamespace<S, D>;
  readonly name: D['name'];
  private readonly runtime: EntityRuntime;

  constructor(declaration: D, runtime: EntityRuntime) {
    this.name = declaration.name;
    this.runtime = runtime;
    // Namespaces are built member by member from the same metadata the
    // declaration types are inferred from
    this.fields = buildFieldNamespace(runtime) as unknown as FieldNamespace<D>;
    this.relations = buildRelationNamespace(runtime.entity) as unknown as RelationNamespace<S, D>;
  }

  get metadata(): EntityMetadata {
    return this.runtime.entity;
  }

  // ----- Logical combinators -----

  and(...predicates: Predicate<D['name']>[]): LogicalPredicate<D['name']> {
    return logicalPredicate('and', this.name, predicates);
  }

  or(...predicates: Predicate<D['name']>[]): LogicalPredicate<D['name']> {
    return logicalPredicate('or', this.name, predicates);
  }

  /** Negates the conjunction of the predicates. */
  not(...predicates: Predicate<D['name']>[]): LogicalPredicate<D['name']> {
    return logicalPredicate('not', this.name, predicates);
  }

  // ----- Reads -----

  findUnique(filter: UniqueFilter<D['name']>): FindUniqueBuilder<S, D> {
    if (!isUniqueFilter(filter)) {
      throw new QueryValidationError(`findUnique on ${this.name} needs equality on a unique field`);
    }
    if (this.runtime.registry.get(filter.entity) !== this.runtime.entity) {
      throw new QueryValidationError(`findUnique on ${this.name} was given a ${filter.entity} filter`);
    }
    return new FindUniqueBuilder<S, D>(this.runtime, createReadDraft([filter]));
  }

  findFirst(...where: Predicate<D['name']>[]): FindFirstBuilder<S, D> {
    return new FindFirstBuilder<S, D>(this.runtime, createReadDraft(where));
  }

  findMany(...where: Predicate<D['name']>[]): FindManyBuilder<S, D> {
    return new FindManyBuilder<S, D>(this.runtime, createReadDraft(where));
  }

  count(...where: Predicate<D['name']>[]): CountBuilder<D> {
    return new CountBuilder<D>(this.runtime, where);
  }

  aggregate(...where: Predicate<D['name']>[]): AggregateBuilder<D> {
    return new AggregateBuilder<D>(this.runtime, where);
  }

  groupBy<K extends FieldNames<D>>(by: readonly K[], ...where: Predicate<D['name']>[]): GroupByBuilder<D, K> {
    return new GroupByBuilder<D, K>(this.runtime, by, where);
  }

  // ----- Writes -----

  create(data: CreateData<S, D>): CreateBuilder<S, D> {
    return new CreateBuilder<S, D>(this.runtime, data);
  }

  createMany(rows: readonly FieldData<D>[]): CreateManyBuilder<D> {
    return new CreateManyBuilder<D>(this.runtime, rows);
  }

  /**
   * Update the row the selector finds. Mutations apply in order; relation
   * mutations run once the row's own columns are written.
   */
  update(selector: UniqueFilter<D['name']>, ...mutations: Mutation<D['name']>[]): UpdateBuilder<D> {
    return new UpdateBuilder<D>(this.runtime, selector, mutations);
  }

  updateMany(where: readonly Predicate<D['name']>[], ...mutations: Mutation<D['name']>[]): UpdateManyBuilder<D> {
    return new UpdateManyBuilder<D>(this.runtime, where, mutations);
  }

  upsert(
    selector: UniqueFilter<D['name']>,
    create: CreateData<S, D>,
    ...update: Mutation<D['name']>[]
  ): UpsertBuilder<S, D> {
    return new UpsertBuilder<S, D>(this.runtime, selector, create, update);
  }

  delete(selector: UniqueFilter<D['name']>): DeleteBuilder<D> {
    return new DeleteBuilder<D>(this.runtime, selector);
  }

  deleteMany(...where: Predicate<D['name']>[]): DeleteManyBuilder<D> {
    return new DeleteManyBuilder<D>(this.runtime, where);
  }
}

export default EntityClient;
