import type { EntityMetadata } from './entity-metadata.js';
import { findField } from './entity-metadata.js';
import { FetcherMissingError, SchemaError } from './errors.js';
import type { ScalarType } from './field-types.js';
import { lastSegment, toPascalCase } from './naming.js';
import type { KeyTypeRegistry } from './polymorphic-key.js';
import type { RelationFetcher } from './relation-fetcher.js';
import type { CompiledSchema } from './relation-resolver.js';

/**
 * Track entity metadata and relation fetchers for one data client. Names are
 * matched tolerantly so `blog::Post`, `post` and `Post` all find the same
 * entity.
 */
export class EntityRegistry implements KeyTypeRegistry {
  private entitiesByName: Map<string, EntityMetadata>;
  private entitiesByLowerName: Map<string, EntityMetadata>;
  private fetchersByName: Map<string, RelationFetcher>;

  constructor(schema?: CompiledSchema) {
    this.entitiesByName = new Map();
    this.entitiesByLowerName = new Map();
    this.fetchersByName = new Map();

    for (const entity of schema?.entities ?? []) {
      this.register(entity);
    }
  }

  /**
   * Register entity metadata under its name.
   * @returns The registered metadata.
   */
  register(entity: EntityMetadata): EntityMetadata {
    const existing = this.entitiesByLowerName.get(entity.name.toLowerCase());
    if (existing && existing !== entity) {
      throw new SchemaError(`Entity '${entity.name}' already registered.`, entity.name);
    }

    this.entitiesByName.set(entity.name, entity);
    this.entitiesByLowerName.set(entity.name.toLowerCase(), entity);
    return entity;
  }

  /**
   * Resolve a possibly namespaced or differently cased name to a registered
   * entity. Tries the exact name, the name after the last namespace
   * separator, its PascalCase form, then a case-insensitive match.
   */
  get(identifier: string): EntityMetadata | null {
    if (!identifier) {
      return null;
    }

    const segment = lastSegment(identifier);
    return (
      this.entitiesByName.get(identifier) ??
      this.entitiesByName.get(segment) ??
      this.entitiesByName.get(toPascalCase(segment)) ??
      this.entitiesByLowerName.get(segment.toLowerCase()) ??
      null
    );
  }

  require(identifier: string): EntityMetadata {
    const entity = this.get(identifier);
    if (!entity) {
      throw new SchemaError(`Unknown entity '${identifier}'`, identifier);
    }
    return entity;
  }

  has(identifier: string): boolean {
    return this.get(identifier) !== null;
  }

  list(): EntityMetadata[] {
    return [...this.entitiesByName.values()];
  }

  /**
   * Register the fetcher that loads rows of an entity for includes.
   */
  registerFetcher(entityName: string, fetcher: RelationFetcher): void {
    const name = this.get(entityName)?.name ?? entityName;
    this.fetchersByName.set(name.toLowerCase(), fetcher);
  }

  getFetcher(entityName: string): RelationFetcher {
    const name = this.get(entityName)?.name ?? lastSegment(entityName);
    const fetcher = this.fetchersByName.get(name.toLowerCase());
    if (!fetcher) {
      throw new FetcherMissingError(name);
    }
    return fetcher;
  }

  hasFetcher(entityName: string): boolean {
    const name = this.get(entityName)?.name ?? lastSegment(entityName);
    return this.fetchersByName.has(name.toLowerCase());
  }

  primaryKeyType(entityName: string): ScalarType | null {
    return this.get(entityName)?.primaryKey.type ?? null;
  }

  fieldType(entityName: string, fieldName: string): ScalarType | null {
    const entity = this.get(entityName);
    if (!entity) {
      return null;
    }
    return findField(entity, fieldName)?.type ?? null;
  }
}

export default EntityRegistry;
