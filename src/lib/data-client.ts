import type { BackendRow, QueryBackend } from './backend.js';
import type { BatchOperation, BatchResults } from './batch.js';
import { runBatch } from './batch.js';
import type { SqlExecutor } from './data-access-layer.js';
import { EntityClient } from './entity-client.js';
import { EntityRegistry } from './entity-registry.js';
import { SchemaError } from './errors.js';
import { PostgresBackend } from './postgres-backend.js';
import type { RelationFetcher } from './relation-fetcher.js';
import { createRelationFetcher } from './relation-fetcher.js';
import type { CompiledSchema } from './relation-resolver.js';
import { compileSchema } from './relation-resolver.js';
import { debug } from './runtime.js';
import type { EntityDeclaration, SchemaDeclaration } from './schema.js';

export type DataClientOptions = ({ backend: QueryBackend } | { executor: SqlExecutor }) & {
  /** Fetchers used for includes, keyed by entity name, in place of the default. */
  fetchers?: Readonly<Record<string, RelationFetcher>>;
};

export interface DataClientMethods<S extends SchemaDeclaration> {
  readonly $schema: CompiledSchema;
  readonly $registry: EntityRegistry;
  readonly $backend: QueryBackend;
  /**
   * Run `work` with a client bound to one transaction. Builders created from
   * that client run on it; the transaction commits when `work` resolves and
   * rolls back when it throws.
   */
  $transaction<T>(work: (client: DataClient<S>) => Promise<T>): Promise<T>;
  /** Run writes atomically and in order; see {@link runBatch}. */
  $batch<T extends readonly BatchOperation[] | []>(operations: T): Promise<BatchResults<T>>;
  $raw(sql: string, params?: readonly unknown[]): Promise<BackendRow[]>;
}

export type DataClient<S extends SchemaDeclaration> = {
  readonly [K in keyof S]: EntityClient<S, S[K]>;
} & DataClientMethods<S>;

const resolveBackend = (options: DataClientOptions): QueryBackend =>
  'backend' in options ? options.backend : new PostgresBackend(options.executor);

function bindClient<S extends SchemaDeclaration>(
  schema: S,
  compiled: CompiledSchema,
  registry: EntityRegistry,
  backend: QueryBackend
): DataClient<S> {
  const client: Record<string, unknown> = {};
  const declarations: [string, EntityDeclaration][] = Object.entries(schema);

  for (const [key, declaration] of declarations) {
    const entity = registry.require(declaration.name);
    client[key] = new EntityClient(declaration, { entity, registry, backend });
  }

  const methods: DataClientMethods<S> = {
    $schema: compiled,
    $registry: registry,
    $backend: backend,
    $transaction: work => backend.transaction(tx => work(bindClient(schema, compiled, registry, tx))),
    $batch: operations => runBatch(backend, operations),
    $raw: (sql, params = []) => backend.raw(sql, params),
  };
  Object.assign(client, methods);

  // One EntityClient per schema key, built from that key's declaration
  return Object.freeze(client) as unknown as DataClient<S>;
}

/**
 * Compile a schema and return a client with one query surface per entity.
 *
 * @example
 * const db = createDataClient(schema, { executor: new DataAccessLayer(config) });
 * const post = await db.post.findUnique(db.post.fields.id.equals(1)).include('author');
 */
export function createDataClient<S extends SchemaDeclaration>(schema: S, options: DataClientOptions): DataClient<S> {
  for (const key of Object.keys(schema)) {
    if (key.startsWith('$')) {
      throw new SchemaError(`Schema key '${key}' is reserved; entity keys cannot start with '$'`, key);
    }
  }

  const compiled = compileSchema(schema);
  const registry = new EntityRegistry(compiled);
  for (const entity of compiled.entities) {
    registry.registerFetcher(entity.name, options.fetchers?.[entity.name] ?? createRelationFetcher(entity, registry));
  }

  debug.db(`Data client ready for ${compiled.entities.length} entities`);
  return bindClient(schema, compiled, registry, resolveBackend(options));
}

export default createDataClient;
