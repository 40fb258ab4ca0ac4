import type { QueryBackend } from './lib/backend.js';
import type { BatchOperation, BatchResult, BatchResults } from './lib/batch.js';
import type { DataClient, DataClientMethods, DataClientOptions } from './lib/data-client.js';
import { createDataClient } from './lib/data-client.js';
import DataAccessLayer from './lib/data-access-layer.js';
import type { SqlExecutor } from './lib/data-access-layer.js';
import type { FieldNamespace } from './lib/entity-client.js';
import { EntityClient } from './lib/entity-client.js';
import type { EntityMetadata, FieldMetadata, RelationMetadata } from './lib/entity-metadata.js';
import { EntityRegistry } from './lib/entity-registry.js';
import Errors from './lib/errors.js';
import type { JsonValue, ScalarType, ValueConverter } from './lib/field-types.js';
import { JsonNull } from './lib/field-types.js';
import type { KeyInput, KeyKind } from './lib/polymorphic-key.js';
import { Key } from './lib/polymorphic-key.js';
import { PostgresBackend } from './lib/postgres-backend.js';
import type { PostgresConfig } from './lib/postgres-config.js';
import { resolvePostgresConfig } from './lib/postgres-config.js';
import type { Mutation, Predicate, UniqueFilter } from './lib/predicates.js';
import type { RelationFetcher, RelationFetchRequest } from './lib/relation-fetcher.js';
import type { CompiledSchema } from './lib/relation-resolver.js';
import { compileSchema } from './lib/relation-resolver.js';
import type { DalDebugLogger } from './lib/runtime.js';
import { setDebugLogger } from './lib/runtime.js';
import type {
  EntityDeclaration,
  FieldDeclaration,
  InferRow,
  RelationDeclaration,
  SchemaDeclaration,
} from './lib/schema.js';
import type { CreateData, FieldData } from './lib/write-builders.js';

/**
 * relgen
 *
 * Entry point: compile entity declarations into metadata and query them
 * through a typed data client backed by PostgreSQL (or any other
 * {@link QueryBackend}).
 */

type CreateDataAccessLayer = ((config?: Partial<PostgresConfig>) => DataAccessLayer) & {
  DataAccessLayer: typeof DataAccessLayer;
  PostgresBackend: typeof PostgresBackend;
  Key: typeof Key;
  Errors: typeof Errors;
  createDataClient: typeof createDataClient;
  compileSchema: typeof compileSchema;
  resolvePostgresConfig: typeof resolvePostgresConfig;
};

/**
 * Create a PostgreSQL Data Access Layer (DAL) instance.
 *
 * @param config Optional PostgreSQL configuration overrides; settings from
 *   `DATABASE_URL` or the `PG*` variables fill in the rest.
 * @returns A DAL instance to pass to {@link createDataClient} as its executor.
 */
const createDataAccessLayer: CreateDataAccessLayer = Object.assign(
  (config: Partial<PostgresConfig> = {}) => new DataAccessLayer({ ...resolvePostgresConfig(), ...config }),
  {
    DataAccessLayer,
    PostgresBackend,
    Key,
    Errors,
    createDataClient,
    compileSchema,
    resolvePostgresConfig,
  }
);

export {
  DataAccessLayer,
  PostgresBackend,
  EntityClient,
  EntityRegistry,
  Key,
  JsonNull,
  Errors,
  compileSchema,
  createDataClient,
  createDataAccessLayer,
  resolvePostgresConfig,
  setDebugLogger,
};

export type {
  BatchOperation,
  BatchResult,
  BatchResults,
  CompiledSchema,
  CreateData,
  DalDebugLogger,
  DataClient,
  DataClientMethods,
  DataClientOptions,
  EntityDeclaration,
  EntityMetadata,
  FieldData,
  FieldDeclaration,
  FieldMetadata,
  FieldNamespace,
  InferRow,
  JsonValue,
  KeyInput,
  KeyKind,
  Mutation,
  PostgresConfig,
  Predicate,
  QueryBackend,
  RelationDeclaration,
  RelationFetchRequest,
  RelationFetcher,
  RelationMetadata,
  ScalarType,
  SchemaDeclaration,
  SqlExecutor,
  UniqueFilter,
  ValueConverter,
};

export default createDataAccessLayer;
