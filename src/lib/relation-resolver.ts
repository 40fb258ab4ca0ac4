import type { EntityMetadata, RelationMetadata } from './entity-metadata.js';
import { freezeEntity } from './entity-metadata.js';
import { SchemaError } from './errors.js';
import { defaultTableName } from './naming.js';
import type { AnalyzedEntity, RelationDraft } from './schema-analyzer.js';
import { analyzeEntity } from './schema-analyzer.js';
import type { EntityDeclaration, SchemaDeclaration } from './schema.js';
import { debug } from './runtime.js';

export interface CompiledSchema {
  entities: readonly EntityMetadata[];
  byName: ReadonlyMap<string, EntityMetadata>;
}

/** `blog_post`, `BlogPost` and `blogpost` all name the same entity. */
const normalizeEntityName = (name: string): string => name.replace(/_/g, '').toLowerCase();

function resolveRelation(
  owner: AnalyzedEntity,
  draft: RelationDraft,
  lookup: ReadonlyMap<string, AnalyzedEntity>
): RelationMetadata {
  const target = lookup.get(normalizeEntityName(draft.targetEntity));

  if (!target) {
    // Declared outside this schema: only the naming convention is known
    debug.db(
      `Relation ${owner.name}.${draft.name} targets ${draft.targetEntity}, which is not in this schema`
    );
    return {
      name: draft.name,
      kind: draft.kind,
      targetEntity: draft.targetEntity,
      targetTable: defaultTableName(draft.targetEntity),
      keyOwner: draft.keyOwner,
      localField: draft.localField,
      localColumn: draft.localColumn,
      remoteField: draft.remoteField,
      remoteColumn: draft.remoteField,
      foreignKeyField: draft.foreignKeyField,
      foreignKeyColumn: draft.keyOwner === 'current' ? draft.localColumn : draft.remoteField,
      foreignKeyType: draft.foreignKeyType,
      foreignKeyNullable: draft.foreignKeyNullable ?? false,
    };
  }

  const remote = target.fields.find(field => field.name === draft.remoteField);
  if (!remote) {
    throw new SchemaError(
      `Relation '${draft.name}' on ${owner.name} references missing column '${draft.remoteField}' on ${target.name}`,
      owner.name
    );
  }

  const targetOwnsKey = draft.keyOwner === 'target';

  return {
    name: draft.name,
    kind: draft.kind,
    targetEntity: target.name,
    targetTable: target.tableName,
    keyOwner: draft.keyOwner,
    localField: draft.localField,
    localColumn: draft.localColumn,
    remoteField: remote.name,
    remoteColumn: remote.column,
    foreignKeyField: draft.foreignKeyField,
    foreignKeyColumn: targetOwnsKey ? remote.column : draft.localColumn,
    foreignKeyType: targetOwnsKey ? remote.type : draft.foreignKeyType,
    foreignKeyNullable: targetOwnsKey ? remote.nullable : (draft.foreignKeyNullable ?? false),
  };
}

/**
 * Second schema pass: resolve every relation against the full entity set.
 * Forward and self references work because all entities are analyzed before
 * any relation is resolved.
 */
export function resolveRelations(analyzed: readonly AnalyzedEntity[]): EntityMetadata[] {
  const lookup = new Map<string, AnalyzedEntity>();
  for (const entity of analyzed) {
    const key = normalizeEntityName(entity.name);
    if (lookup.has(key)) {
      throw new SchemaError(`Entity ${entity.name} is declared more than once`, entity.name);
    }
    lookup.set(key, entity);
  }

  return analyzed.map(entity =>
    freezeEntity({
      name: entity.name,
      tableName: entity.tableName,
      primaryKey: entity.primaryKey,
      fields: entity.fields,
      relations: entity.relations.map(draft => resolveRelation(entity, draft, lookup)),
      foreignKeyFields: entity.foreignKeyFields,
      foreignKeyTypes: entity.foreignKeyTypes,
    })
  );
}

const isDeclarationList = (
  value: SchemaDeclaration | readonly EntityDeclaration[]
): value is readonly EntityDeclaration[] => Array.isArray(value);

/**
 * Run both schema passes over a set of declarations.
 */
export function compileSchema(
  declarations: SchemaDeclaration | readonly EntityDeclaration[]
): CompiledSchema {
  const list = isDeclarationList(declarations) ? declarations : Object.values(declarations);

  const entities = resolveRelations(list.map(declaration => analyzeEntity(declaration)));
  const byName = new Map(entities.map(entity => [entity.name, entity] as const));

  debug.db(`Compiled schema with ${entities.length} entities`);
  return Object.freeze({ entities: Object.freeze(entities), byName });
}
