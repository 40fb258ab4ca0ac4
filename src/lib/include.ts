import type { QueryBackend, SortDirection } from './backend.js';
import type { EntityMetadata, RelationMetadata } from './entity-metadata.js';
import { getField, getRelation } from './entity-metadata.js';
import type { EntityRegistry } from './entity-registry.js';
import type { EntityRow } from './entity-rows.js';
import { groupingKey } from './entity-rows.js';
import { QueryValidationError } from './errors.js';
import type { Predicate, UniqueFilter } from './predicates.js';
import type { OrderSpec, ReadWindow } from './row-reader.js';
import { applyWindow } from './row-reader.js';
import type {
  EntityDeclaration,
  FieldNames,
  InferRow,
  RelationNames,
  RelationValue,
  SchemaDeclaration,
  TargetDeclaration,
} from './schema.js';

/**
 * A relation to load alongside parent rows. `where`, ordering and paging
 * apply per parent; `count` adds the number of matching related rows to the
 * parent's `_count`.
 */
export interface IncludeSpec {
  relation: string;
  where: readonly Predicate[];
  include: readonly IncludeSpec[];
  orderBy: readonly OrderSpec[];
  take: number | null;
  skip: number | null;
  cursor: UniqueFilter | null;
  select: readonly string[];
  count: boolean;
  distinct: readonly string[];
}

export const includeWindow = (spec: IncludeSpec): ReadWindow => ({
  orderBy: spec.orderBy,
  take: spec.take,
  skip: spec.skip,
  cursor: spec.cursor,
  distinct: spec.distinct,
});

// ----- Typed surface -----

/** Row of `D` narrowed to `Fields`, plus what its own includes add. */
export type IncludeShape<D extends EntityDeclaration, Fields extends FieldNames<D>, Included> = Pick<
  InferRow<D>,
  Fields
> &
  Included;

/**
 * Keys an include of relation `R` adds to the parent row.
 */
export type Included<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  R extends RelationNames<D>,
  Shape,
  Counted extends boolean,
> = { [K in R]: RelationValue<S, D, K, Shape> } & (Counted extends true ? { _count: { [K in R]: number } } : unknown);

/** Callback that configures the include of relation `R` on `D`. */
export type IncludeConfigurator<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  R extends RelationNames<D>,
  F extends FieldNames<TargetDeclaration<S, D, R>>,
  I,
  C extends boolean,
> = (
  builder: IncludeBuilder<S, TargetDeclaration<S, D, R>>
) => IncludeBuilder<S, TargetDeclaration<S, D, R>, F, I, C>;

/** `TRow` once the include of `R` has been attached. */
export type IncludedRow<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  TRow,
  R extends RelationNames<D>,
  F extends FieldNames<TargetDeclaration<S, D, R>>,
  I,
  C extends boolean,
> = TRow & Included<S, D, R, IncludeShape<TargetDeclaration<S, D, R>, F, I>, C>;

export interface IncludeDraft {
  where: Predicate[];
  include: IncludeSpec[];
  orderBy: OrderSpec[];
  take: number | null;
  skip: number | null;
  cursor: UniqueFilter | null;
  select: string[];
  count: boolean;
  distinct: string[];
  built: boolean;
}

const emptyDraft = (): IncludeDraft => ({
  where: [],
  include: [],
  orderBy: [],
  take: null,
  skip: null,
  cursor: null,
  select: [],
  count: false,
  distinct: [],
  built: false,
});

/**
 * Resolve a relation and its target metadata. Targets declared outside the
 * schema have no metadata, so they cannot be loaded or written through.
 */
export function relationTarget(
  entity: EntityMetadata,
  relationName: string,
  registry: EntityRegistry
): { relation: RelationMetadata; target: EntityMetadata } {
  const relation = getRelation(entity, relationName);
  const target = registry.get(relation.targetEntity);
  if (!target) {
    throw new QueryValidationError(
      `${entity.name}.${relation.name} targets ${relation.targetEntity}, which is not part of this schema`
    );
  }
  return { relation, target };
}

/**
 * Accumulates one include. Chain methods that change the row type hand back
 * a builder over the same draft.
 */
export class IncludeBuilder<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  TFields extends FieldNames<D> = FieldNames<D>,
  TIncluded = unknown,
  TCounted extends boolean = false,
> {
  private readonly entity: EntityMetadata;
  private readonly registry: EntityRegistry;
  private readonly relation: string;
  private readonly draft: IncludeDraft;

  constructor(entity: EntityMetadata, registry: EntityRegistry, relation: string, draft: IncludeDraft = emptyDraft()) {
    this.entity = entity;
    this.registry = registry;
    this.relation = relation;
    this.draft = draft;
  }

  where(...predicates: Predicate<D['name']>[]): this {
    this.draft.where.push(...predicates);
    return this;
  }

  orderBy(field: FieldNames<D>, direction: SortDirection = 'asc', nulls?: 'first' | 'last'): this {
    getField(this.entity, field);
    const order: OrderSpec = { field, direction };
    if (nulls) {
      order.nulls = nulls;
    }
    this.draft.orderBy.push(order);
    return this;
  }

  take(count: number): this {
    this.draft.take = count;
    return this;
  }

  skip(count: number): this {
    this.draft.skip = count;
    return this;
  }

  cursor(filter: UniqueFilter<D['name']>): this {
    this.draft.cursor = filter;
    return this;
  }

  distinct(...fields: FieldNames<D>[]): this {
    for (const field of fields) getField(this.entity, field);
    this.draft.distinct.push(...fields);
    return this;
  }

  select<K extends FieldNames<D>>(...fields: K[]): IncludeBuilder<S, D, K, TIncluded, TCounted> {
    for (const field of fields) getField(this.entity, field);
    this.draft.select = [...fields];
    return this.successor<K, TIncluded, TCounted>();
  }

  count(): IncludeBuilder<S, D, TFields, TIncluded, true> {
    this.draft.count = true;
    return this.successor<TFields, TIncluded, true>();
  }

  include<
    R extends RelationNames<D>,
    F extends FieldNames<TargetDeclaration<S, D, R>> = FieldNames<TargetDeclaration<S, D, R>>,
    I = unknown,
    C extends boolean = false,
  >(
    relation: R,
    configure?: IncludeConfigurator<S, D, R, F, I, C>
  ): IncludeBuilder<S, D, TFields, IncludedRow<S, D, TIncluded, R, F, I, C>, TCounted> {
    this.draft.include.push(buildInclude(this.entity, this.registry, relation, configure));
    return this.successor<TFields, IncludedRow<S, D, TIncluded, R, F, I, C>, TCounted>();
  }

  /**
   * Freeze the accumulated include. A builder builds once.
   */
  build(): IncludeSpec {
    if (this.draft.built) {
      throw new QueryValidationError(`Include '${this.relation}' on ${this.entity.name} has already been built`);
    }
    this.draft.built = true;
    const { where, include, orderBy, take, skip, cursor, select, count, distinct } = this.draft;
    return Object.freeze({
      relation: this.relation,
      where: Object.freeze([...where]),
      include: Object.freeze([...include]),
      orderBy: Object.freeze([...orderBy]),
      take,
      skip,
      cursor,
      select: Object.freeze([...select]),
      count,
      distinct: Object.freeze([...distinct]),
    });
  }

  private successor<F extends FieldNames<D>, I, C extends boolean>(): IncludeBuilder<S, D, F, I, C> {
    return new IncludeBuilder<S, D, F, I, C>(this.entity, this.registry, this.relation, this.draft);
  }
}

/**
 * Build the spec of one include of `relation` on `entity`, letting
 * `configure` shape it first.
 */
export function buildInclude<
  S extends SchemaDeclaration,
  T extends EntityDeclaration,
  F extends FieldNames<T>,
  I,
  C extends boolean,
>(
  entity: EntityMetadata,
  registry: EntityRegistry,
  relation: string,
  configure?: (builder: IncludeBuilder<S, T>) => IncludeBuilder<S, T, F, I, C>
): IncludeSpec {
  const { target } = relationTarget(entity, relation, registry);
  const builder = new IncludeBuilder<S, T>(target, registry, relation);
  return configure ? configure(builder).build() : builder.build();
}

const project = (row: EntityRow, spec: IncludeSpec): EntityRow => {
  if (spec.select.length === 0) {
    return row;
  }
  const projected: EntityRow = {};
  for (const key of [...spec.select, ...spec.include.map(nested => nested.relation), '_count']) {
    if (key in row) {
      projected[key] = row[key];
    }
  }
  return projected;
};

/**
 * Attach every include to `rows`. Each include costs one fetch per level,
 * whatever the number of parents.
 */
export async function loadIncludes(
  rows: readonly EntityRow[],
  entity: EntityMetadata,
  specs: readonly IncludeSpec[],
  registry: EntityRegistry,
  backend: QueryBackend
): Promise<EntityRow[]> {
  const result = rows.map(row => ({ ...row }));
  if (result.length === 0 || specs.length === 0) {
    return result;
  }

  const counts = new Map<EntityRow, Record<string, number>>();

  for (const spec of specs) {
    const { relation, target } = relationTarget(entity, spec.relation, registry);
    const fetcher = registry.getFetcher(target.name);

    const related = await fetcher.fetch({
      relation,
      values: result.map(row => row[relation.localField]),
      include: spec,
      backend,
    });

    const groups = new Map<string, EntityRow[]>();
    for (const row of related) {
      const key = groupingKey(row[relation.remoteField]);
      const group = groups.get(key);
      if (group) {
        group.push(row);
      } else {
        groups.set(key, [row]);
      }
    }

    const window = includeWindow(spec);
    const matched = result.map(parent => {
      const local = parent[relation.localField];
      return local === null || local === undefined ? [] : (groups.get(groupingKey(local)) ?? []);
    });
    const windowed = matched.map(group => applyWindow(group, window));

    const loaded = await loadIncludes(windowed.flat(), target, spec.include, registry, backend);

    let offset = 0;
    result.forEach((parent, index) => {
      const size = windowed[index]?.length ?? 0;
      const children = loaded.slice(offset, offset + size).map(child => project(child, spec));
      offset += size;

      parent[spec.relation] = relation.kind === 'has_many' ? children : (children[0] ?? null);

      if (spec.count) {
        const parentCounts = counts.get(parent) ?? {};
        parentCounts[spec.relation] = matched[index]?.length ?? 0;
        counts.set(parent, parentCounts);
      }
    });
  }

  for (const [parent, parentCounts] of counts) {
    parent._count = parentCounts;
  }
  return result;
}
