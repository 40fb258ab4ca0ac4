import type { QueryBackend, SortDirection } from './backend.js';
import { getField } from './entity-metadata.js';
import type { EntityRow, EntityRuntime } from './entity-rows.js';
import { asRow, asRows } from './entity-rows.js';
import type { IncludeConfigurator, IncludedRow, IncludeSpec } from './include.js';
import { buildInclude, loadIncludes } from './include.js';
import type { OperationState } from './operation.js';
import { Operation } from './operation.js';
import { compilePredicates } from './predicate-compiler.js';
import type { Predicate, UniqueFilter } from './predicates.js';
import type { OrderSpec } from './row-reader.js';
import { selectRows } from './row-reader.js';
import type {
  EntityDeclaration,
  FieldNames,
  InferRow,
  RelationNames,
  SchemaDeclaration,
  TargetDeclaration,
} from './schema.js';

/**
 * Accumulated state of a read, shared by a builder and the builders its
 * `include` calls hand back.
 */
export interface ReadDraft {
  where: Predicate[];
  orderBy: OrderSpec[];
  take: number | null;
  skip: number | null;
  cursor: UniqueFilter | null;
  distinct: string[];
  include: IncludeSpec[];
}

export const createReadDraft = (where: readonly Predicate[] = []): ReadDraft => ({
  where: [...where],
  orderBy: [],
  take: null,
  skip: null,
  cursor: null,
  distinct: [],
  include: [],
});

/**
 * Shared chain of the find builders: filtering, ordering, paging and
 * includes over one entity.
 */
abstract class ReadBuilder<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  TResult,
> extends Operation<TResult> {
  override readonly kind = 'read';
  protected readonly draft: ReadDraft;

  constructor(runtime: EntityRuntime, draft: ReadDraft, state?: OperationState) {
    super(runtime, state);
    this.draft = draft;
  }

  where(...predicates: Predicate<D['name']>[]): this {
    this.assertOpen();
    this.draft.where.push(...predicates);
    return this;
  }

  /**
   * Add an ordering term. Terms apply in the order they were added.
   */
  orderBy(field: FieldNames<D>, direction: SortDirection = 'asc', nulls?: 'first' | 'last'): this {
    this.assertOpen();
    getField(this.runtime.entity, field);
    const order: OrderSpec = { field, direction };
    if (nulls) {
      order.nulls = nulls;
    }
    this.draft.orderBy.push(order);
    return this;
  }

  /**
   * Limit the number of rows. A negative count reads backwards from the end
   * of the ordering (or from the cursor) and keeps the requested order.
   */
  take(count: number): this {
    this.assertOpen();
    this.draft.take = count;
    return this;
  }

  skip(count: number): this {
    this.assertOpen();
    this.draft.skip = count;
    return this;
  }

  /**
   * Start after the row the filter selects, exclusive. Ordering defaults to
   * the primary key.
   */
  cursor(filter: UniqueFilter<D['name']>): this {
    this.assertOpen();
    this.draft.cursor = filter;
    return this;
  }

  distinct(...fields: FieldNames<D>[]): this {
    this.assertOpen();
    for (const field of fields) getField(this.runtime.entity, field);
    this.draft.distinct.push(...fields);
    return this;
  }

  protected addInclude<
    R extends RelationNames<D>,
    F extends FieldNames<TargetDeclaration<S, D, R>>,
    I,
    C extends boolean,
  >(relation: R, configure?: IncludeConfigurator<S, D, R, F, I, C>): void {
    this.assertOpen();
    const { entity, registry } = this.runtime;
    this.draft.include.push(buildInclude(entity, registry, relation, configure));
  }

  protected async readRows(backend: QueryBackend, take: number | null): Promise<EntityRow[]> {
    const { entity, registry } = this.runtime;
    const { where, orderBy, skip, cursor, distinct, include } = this.draft;
    const rows = await selectRows(backend, {
      entity,
      registry,
      where: compilePredicates(where, entity, registry),
      window: { orderBy, take, skip, cursor, distinct },
    });
    return loadIncludes(rows, entity, include, registry, backend);
  }
}

export class FindManyBuilder<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  TRow = InferRow<D>,
> extends ReadBuilder<S, D, TRow[]> {
  include<
    R extends RelationNames<D>,
    F extends FieldNames<TargetDeclaration<S, D, R>> = FieldNames<TargetDeclaration<S, D, R>>,
    I = unknown,
    C extends boolean = false,
  >(
    relation: R,
    configure?: IncludeConfigurator<S, D, R, F, I, C>
  ): FindManyBuilder<S, D, IncludedRow<S, D, TRow, R, F, I, C>> {
    this.addInclude(relation, configure);
    return new FindManyBuilder<S, D, IncludedRow<S, D, TRow, R, F, I, C>>(this.runtime, this.draft, this.state);
  }

  protected override async run(backend: QueryBackend): Promise<TRow[]> {
    return asRows<TRow>(await this.readRows(backend, this.draft.take));
  }
}

/**
 * First row of the ordering, or the last one when `take` is negative.
 */
export class FindFirstBuilder<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  TRow = InferRow<D>,
> extends ReadBuilder<S, D, TRow | null> {
  include<
    R extends RelationNames<D>,
    F extends FieldNames<TargetDeclaration<S, D, R>> = FieldNames<TargetDeclaration<S, D, R>>,
    I = unknown,
    C extends boolean = false,
  >(
    relation: R,
    configure?: IncludeConfigurator<S, D, R, F, I, C>
  ): FindFirstBuilder<S, D, IncludedRow<S, D, TRow, R, F, I, C>> {
    this.addInclude(relation, configure);
    return new FindFirstBuilder<S, D, IncludedRow<S, D, TRow, R, F, I, C>>(this.runtime, this.draft, this.state);
  }

  protected override async run(backend: QueryBackend): Promise<TRow | null> {
    const backwards = this.draft.take !== null && this.draft.take < 0;
    const [row] = await this.readRows(backend, backwards ? -1 : 1);
    return row ? asRow<TRow>(row) : null;
  }
}

export class FindUniqueBuilder<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  TRow = InferRow<D>,
> extends ReadBuilder<S, D, TRow | null> {
  include<
    R extends RelationNames<D>,
    F extends FieldNames<TargetDeclaration<S, D, R>> = FieldNames<TargetDeclaration<S, D, R>>,
    I = unknown,
    C extends boolean = false,
  >(
    relation: R,
    configure?: IncludeConfigurator<S, D, R, F, I, C>
  ): FindUniqueBuilder<S, D, IncludedRow<S, D, TRow, R, F, I, C>> {
    this.addInclude(relation, configure);
    return new FindUniqueBuilder<S, D, IncludedRow<S, D, TRow, R, F, I, C>>(this.runtime, this.draft, this.state);
  }

  protected override async run(backend: QueryBackend): Promise<TRow | null> {
    const [row] = await this.readRows(backend, 1);
    return row ? asRow<TRow>(row) : null;
  }
}
