import type { EntityMetadata, RelationMetadata } from './entity-metadata.js';
import type {
  Predicate,
  RelationMutation,
  RelationPredicate,
  RelationQuantifier,
  UniqueFilter,
} from './predicates.js';
import { relationMutation, relationPredicate } from './predicates.js';
import type {
  EntityDeclaration,
  RelationNames,
  RelationsOf,
  SchemaDeclaration,
  TargetDeclaration,
  TargetName,
} from './schema.js';
import type { FieldData } from './write-builders.js';

/**
 * Untyped view of a relation namespace. Which members exist depends on the
 * relation kind, see {@link createRelationOperations}.
 */
export interface RuntimeRelationOperations {
  some(...predicates: Predicate[]): RelationPredicate;
  every(...predicates: Predicate[]): RelationPredicate;
  none(...predicates: Predicate[]): RelationPredicate;
  connect(selector: UniqueFilter): RelationMutation;
  disconnect(selector?: UniqueFilter): RelationMutation;
  set(selectors: readonly UniqueFilter[]): RelationMutation;
  create(data: object): RelationMutation;
}

const MEMBERS_BY_KIND: Readonly<Record<RelationMetadata['kind'], readonly (keyof RuntimeRelationOperations)[]>> = {
  belongs_to: ['some', 'every', 'none', 'connect', 'disconnect'],
  has_many: ['some', 'every', 'none', 'connect', 'disconnect', 'set', 'create'],
  has_one: ['some', 'every', 'none', 'connect', 'disconnect', 'create'],
};

/**
 * Build the namespace of one relation: quantified filters over its rows plus
 * the mutations an update can apply through it.
 */
export function createRelationOperations(
  entity: EntityMetadata,
  relation: RelationMetadata
): Partial<RuntimeRelationOperations> {
  const quantified = (quantifier: RelationQuantifier) => (...predicates: Predicate[]) =>
    relationPredicate(entity.name, relation.name, quantifier, predicates);

  const all: RuntimeRelationOperations = {
    some: quantified('some'),
    every: quantified('every'),
    none: quantified('none'),
    connect: selector => relationMutation(entity.name, relation.name, { op: 'connect', selector }),
    disconnect: selector =>
      relationMutation(entity.name, relation.name, { op: 'disconnect', selector: selector ?? null }),
    set: selectors => relationMutation(entity.name, relation.name, { op: 'set', selectors: [...selectors] }),
    create: data => relationMutation(entity.name, relation.name, { op: 'create', data: { ...data } }),
  };

  const operations: Partial<RuntimeRelationOperations> = {};
  for (const member of MEMBERS_BY_KIND[relation.kind]) {
    Object.defineProperty(operations, member, { value: all[member], enumerable: true });
  }
  return Object.freeze(operations);
}

// ----- Typed surface -----

export interface QuantifierOperations<E extends string, T extends string> {
  /** At least one related row matches. */
  some(...predicates: Predicate<T>[]): RelationPredicate<E>;
  /** Every related row matches; true when there are none. */
  every(...predicates: Predicate<T>[]): RelationPredicate<E>;
  /** No related row matches; true when there are none. */
  none(...predicates: Predicate<T>[]): RelationPredicate<E>;
}

export interface BelongsToOperations<E extends string, T extends string> extends QuantifierOperations<E, T> {
  connect(selector: UniqueFilter<T>): RelationMutation<E>;
  disconnect(): RelationMutation<E>;
}

export interface HasOneOperations<E extends string, T extends EntityDeclaration>
  extends QuantifierOperations<E, T['name']> {
  connect(selector: UniqueFilter<T['name']>): RelationMutation<E>;
  disconnect(selector?: UniqueFilter<T['name']>): RelationMutation<E>;
  create(data: FieldData<T>): RelationMutation<E>;
}

export interface HasManyOperations<E extends string, T extends EntityDeclaration> extends HasOneOperations<E, T> {
  /** Make exactly the selected rows related; see {@link setRelated}. */
  set(selectors: readonly UniqueFilter<T['name']>[]): RelationMutation<E>;
}

export type RelationOperations<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  R extends RelationNames<D>,
> = RelationsOf<D>[R] extends { kind: 'belongs_to' }
  ? BelongsToOperations<D['name'], TargetName<S, D, R>>
  : RelationsOf<D>[R] extends { kind: 'has_many' }
    ? HasManyOperations<D['name'], TargetDeclaration<S, D, R>>
    : HasOneOperations<D['name'], TargetDeclaration<S, D, R>>;

export type RelationNamespace<S extends SchemaDeclaration, D extends EntityDeclaration> = {
  readonly [R in RelationNames<D>]: RelationOperations<S, D, R>;
};
