import type { AggregateSelection, BackendRow, OrderTerm, QueryBackend, SortDirection } from './backend.js';
import type { CompareOperator } from './condition.js';
import type { EntityMetadata, FieldMetadata } from './entity-metadata.js';
import { getField } from './entity-metadata.js';
import type { EntityRuntime } from './entity-rows.js';
import { asRows } from './entity-rows.js';
import { QueryValidationError } from './errors.js';
import type { TypeClass } from './field-types.js';
import { decodeValue } from './field-types.js';
import type { TypeClassOf } from './field-operations.js';
import { Operation } from './operation.js';
import { compilePredicates } from './predicate-compiler.js';
import type { Predicate } from './predicates.js';
import type { EntityDeclaration, FieldNames, InferRow } from './schema.js';

export type AggregateKind = 'sum' | 'avg' | 'min' | 'max';

interface AggregateRequest {
  fn: AggregateKind;
  field: FieldMetadata;
}

/**
 * Aggregates of a set of rows. `_count` counts every row of the set; the
 * other maps hold one entry per requested field. Sums and averages are
 * numbers, and are null over an empty set.
 */
export interface AggregateResult {
  _count: number;
  _sum: Record<string, number | null>;
  _avg: Record<string, number | null>;
  _min: Record<string, unknown>;
  _max: Record<string, unknown>;
}

type FieldsOfClass<D extends EntityDeclaration, C extends TypeClass> = {
  [K in FieldNames<D>]: TypeClassOf<D['fields'][K]> extends C ? K : never;
}[FieldNames<D>] &
  string;

export type NumericFieldNames<D extends EntityDeclaration> = FieldsOfClass<D, 'integer' | 'float'>;

export type OrderableFieldNames<D extends EntityDeclaration> = FieldsOfClass<
  D,
  'integer' | 'float' | 'datetime' | 'string'
>;

const AGGREGATE_TYPE_CLASSES: Readonly<Record<AggregateKind, readonly TypeClass[]>> = {
  sum: ['integer', 'float'],
  avg: ['integer', 'float'],
  min: ['integer', 'float', 'datetime', 'string'],
  max: ['integer', 'float', 'datetime', 'string'],
};

const COUNT_SELECTION: AggregateSelection = { fn: 'count', column: null, alias: '_count' };

const aggregateAlias = (fn: AggregateKind, field: string) => `_${fn}_${field}`;

function aggregateRequest(entity: EntityMetadata, fn: AggregateKind, fieldName: string): AggregateRequest {
  const field = getField(entity, fieldName);
  if (!AGGREGATE_TYPE_CLASSES[fn].includes(field.typeClass)) {
    throw new QueryValidationError(`Cannot ${fn} ${entity.name}.${field.name} (${field.type})`);
  }
  return { fn, field };
}

const toSelections = (requests: readonly AggregateRequest[]): AggregateSelection[] => [
  COUNT_SELECTION,
  ...requests.map(({ fn, field }) => ({ fn, column: field.column, alias: aggregateAlias(fn, field.name) })),
];

const toNumber = (raw: unknown): number | null => {
  if (raw === null || raw === undefined) {
    return null;
  }
  return typeof raw === 'number' ? raw : Number(raw);
};

function readAggregates(row: BackendRow, requests: readonly AggregateRequest[]): AggregateResult {
  const result: AggregateResult = { _count: toNumber(row._count) ?? 0, _sum: {}, _avg: {}, _min: {}, _max: {} };
  for (const { fn, field } of requests) {
    const raw = row[aggregateAlias(fn, field.name)];
    switch (fn) {
      case 'sum':
        result._sum[field.name] = toNumber(raw);
        break;
      case 'avg':
        result._avg[field.name] = toNumber(raw);
        break;
      case 'min':
        result._min[field.name] = decodeValue(field, raw);
        break;
      case 'max':
        result._max[field.name] = decodeValue(field, raw);
        break;
    }
  }
  return result;
}

export class CountBuilder<D extends EntityDeclaration> extends Operation<number> {
  override readonly kind = 'read';
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
    return backend.count({ table: entity.tableName, where: compilePredicates(this.predicates, entity, registry) });
  }
}

/**
 * Shared request list of the aggregate and group-by builders.
 */
abstract class AggregatingBuilder<D extends EntityDeclaration, TResult> extends Operation<TResult> {
  override readonly kind = 'read';
  protected readonly predicates: Predicate[];
  protected readonly requests: AggregateRequest[];

  constructor(runtime: EntityRuntime, where: readonly Predicate[]) {
    super(runtime);
    this.predicates = [...where];
    this.requests = [];
  }

  where(...predicates: Predicate<D['name']>[]): this {
    this.assertOpen();
    this.predicates.push(...predicates);
    return this;
  }

  sum(...fields: NumericFieldNames<D>[]): this {
    return this.request('sum', fields);
  }

  avg(...fields: NumericFieldNames<D>[]): this {
    return this.request('avg', fields);
  }

  min(...fields: OrderableFieldNames<D>[]): this {
    return this.request('min', fields);
  }

  max(...fields: OrderableFieldNames<D>[]): this {
    return this.request('max', fields);
  }

  private request(fn: AggregateKind, fields: readonly string[]): this {
    this.assertOpen();
    for (const field of fields) {
      this.requests.push(aggregateRequest(this.runtime.entity, fn, field));
    }
    return this;
  }
}

export class AggregateBuilder<D extends EntityDeclaration> extends AggregatingBuilder<D, AggregateResult> {
  protected override async run(backend: QueryBackend): Promise<AggregateResult> {
    const { entity, registry } = this.runtime;
    const [row] = await backend.aggregate({
      table: entity.tableName,
      where: compilePredicates(this.predicates, entity, registry),
      groupBy: [],
      aggregates: toSelections(this.requests),
      having: null,
      orderBy: [],
      limit: null,
      offset: null,
    });
    return readAggregates(row ?? {}, this.requests);
  }
}

export type GroupByRow<D extends EntityDeclaration, K extends FieldNames<D>> = Pick<InferRow<D>, K> &
  AggregateResult;

/**
 * One row per distinct combination of the grouped fields, with that
 * group's aggregates.
 */
export class GroupByBuilder<D extends EntityDeclaration, K extends FieldNames<D>> extends AggregatingBuilder<
  D,
  GroupByRow<D, K>[]
> {
  private readonly by: FieldMetadata[];
  private readonly orderTerms: OrderTerm[];
  private havingCount: { operator: CompareOperator; value: number } | null;
  private limit: number | null;
  private offset: number | null;

  constructor(runtime: EntityRuntime, by: readonly K[], where: readonly Predicate[]) {
    super(runtime, where);
    if (by.length === 0) {
      throw new QueryValidationError(`groupBy on ${runtime.entity.name} needs at least one field`);
    }
    this.by = by.map(name => getField(runtime.entity, name));
    this.orderTerms = [];
    this.havingCount = null;
    this.limit = null;
    this.offset = null;
  }

  /**
   * Keep only groups whose row count satisfies the comparison.
   */
  having(operator: CompareOperator, count: number): this {
    this.assertOpen();
    this.havingCount = { operator, value: count };
    return this;
  }

  /**
   * Order by a grouped field or by the group's row count.
   */
  orderBy(field: K | '_count', direction: SortDirection = 'asc'): this {
    this.assertOpen();
    if (field === '_count') {
      this.orderTerms.push({ column: COUNT_SELECTION.alias, direction });
      return this;
    }
    const grouped = this.by.find(candidate => candidate.name === field);
    if (!grouped) {
      throw new QueryValidationError(`groupBy on ${this.entityName} can only order by grouped fields or _count`);
    }
    this.orderTerms.push({ column: grouped.column, direction });
    return this;
  }

  take(count: number): this {
    this.assertOpen();
    if (!Number.isInteger(count) || count < 0) {
      throw new QueryValidationError(`groupBy take must be a non-negative integer, got ${count}`);
    }
    this.limit = count;
    return this;
  }

  skip(count: number): this {
    this.assertOpen();
    if (!Number.isInteger(count) || count < 0) {
      throw new QueryValidationError(`groupBy skip must be a non-negative integer, got ${count}`);
    }
    this.offset = count;
    return this;
  }

  protected override async run(backend: QueryBackend): Promise<GroupByRow<D, K>[]> {
    const { entity, registry } = this.runtime;
    const rows = await backend.aggregate({
      table: entity.tableName,
      where: compilePredicates(this.predicates, entity, registry),
      groupBy: this.by.map(field => field.column),
      aggregates: toSelections(this.requests),
      having: this.havingCount && { aggregate: COUNT_SELECTION, ...this.havingCount },
      orderBy: this.orderTerms,
      limit: this.limit,
      offset: this.offset,
    });

    const groups = rows.map(row => {
      const group: Record<string, unknown> = {};
      for (const field of this.by) {
        group[field.name] = decodeValue(field, row[field.column]);
      }
      return { ...group, ...readAggregates(row, this.requests) };
    });
    return asRows<GroupByRow<D, K>>(groups);
  }
}
