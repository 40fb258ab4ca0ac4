import type { QueryBackend } from './backend.js';
import type { EntityMetadata, RelationMetadata } from './entity-metadata.js';
import type { EntityRegistry } from './entity-registry.js';
import type { EntityRow } from './entity-rows.js';
import { DeferredLookupError, QueryValidationError } from './errors.js';
import { relationTarget } from './include.js';
import { compilePredicates } from './predicate-compiler.js';
import type { UniqueFilter } from './predicates.js';
import { EMPTY_WINDOW, selectRows } from './row-reader.js';
import { debug } from './runtime.js';

/**
 * Find the single row a unique filter selects.
 */
export async function lookupUnique(
  registry: EntityRegistry,
  backend: QueryBackend,
  filter: UniqueFilter
): Promise<EntityRow | null> {
  const entity = registry.require(filter.entity);
  const [row] = await selectRows(backend, {
    entity,
    registry,
    where: compilePredicates([filter], entity, registry),
    window: { ...EMPTY_WINDOW, take: 1 },
  });
  return row ?? null;
}

/**
 * A key that is only known once another row has been looked up: `resolve`
 * finds that row, `assign` copies its key into the pending write.
 */
export interface DeferredLookup {
  relation: RelationMetadata;
  selector: UniqueFilter;
  resolve: (backend: QueryBackend) => Promise<EntityRow | null>;
  assign: (resolved: EntityRow) => void;
}

/**
 * Check that a selector targets the relation's entity and resolve it.
 */
export function relationSelectorTarget(
  entity: EntityMetadata,
  relationName: string,
  selector: UniqueFilter,
  registry: EntityRegistry
): { relation: RelationMetadata; target: EntityMetadata } {
  const { relation, target } = relationTarget(entity, relationName, registry);
  if (registry.get(selector.entity) !== target) {
    throw new QueryValidationError(
      `${entity.name}.${relation.name} connects ${target.name} rows, not ${selector.entity}`
    );
  }
  return { relation, target };
}

/**
 * Lookup that fills the local foreign key of a belongs-to relation on
 * `pending` from the row `selector` finds.
 */
export function belongsToLookup(
  entity: EntityMetadata,
  relationName: string,
  selector: UniqueFilter,
  registry: EntityRegistry,
  pending: EntityRow
): DeferredLookup {
  const { relation } = relationSelectorTarget(entity, relationName, selector, registry);
  if (relation.kind !== 'belongs_to') {
    throw new QueryValidationError(`${entity.name}.${relation.name} does not hold a foreign key to connect`);
  }
  return {
    relation,
    selector,
    resolve: backend => lookupUnique(registry, backend, selector),
    assign: resolved => {
      pending[relation.localField] = resolved[relation.remoteField];
    },
  };
}

/**
 * Lookups queued by a write. They run one after another in enqueue order,
 * on the write's transaction, right before the write itself.
 */
export class DeferredLookupQueue {
  private readonly entity: string;
  private readonly lookups: DeferredLookup[];

  constructor(entity: string) {
    this.entity = entity;
    this.lookups = [];
  }

  get size(): number {
    return this.lookups.length;
  }

  enqueue(lookup: DeferredLookup): void {
    this.lookups.push(lookup);
  }

  async drain(backend: QueryBackend): Promise<void> {
    for (const lookup of this.lookups.splice(0)) {
      const resolved = await lookup.resolve(backend);
      if (!resolved) {
        const { relation, selector } = lookup;
        throw new DeferredLookupError(
          `No ${relation.targetEntity} matches ${selector.field} for ${this.entity}.${relation.name}`,
          this.entity,
          lookup.relation.name
        );
      }
      debug.db(`Resolved ${this.entity}.${lookup.relation.name} through ${lookup.selector.field}`);
      lookup.assign(resolved);
    }
  }
}
