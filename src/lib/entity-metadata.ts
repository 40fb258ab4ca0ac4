import { QueryValidationError, RelationNotFoundError } from './errors.js';
import type { FieldTypeInfo, ScalarType, TypeClass, ValueConverter } from './field-types.js';
import type { RelationKind } from './schema.js';

export interface FieldMetadata extends FieldTypeInfo {
  name: string;
  column: string;
  declaredType: string;
  type: ScalarType;
  typeClass: TypeClass;
  nullable: boolean;
  unique: boolean;
  primaryKey: boolean;
  generated: boolean;
  converter: ValueConverter | null;
}

/** Which side of a relation stores the foreign key. */
export type KeyOwner = 'current' | 'target';

/**
 * A relation as the runtime sees it. Rows of the target match a parent row
 * when `target.remoteColumn = parent.localColumn`.
 */
export interface RelationMetadata {
  name: string;
  kind: RelationKind;
  targetEntity: string;
  targetTable: string;
  keyOwner: KeyOwner;
  localField: string;
  localColumn: string;
  remoteField: string;
  remoteColumn: string;
  foreignKeyField: string;
  foreignKeyColumn: string;
  foreignKeyType: ScalarType | null;
  foreignKeyNullable: boolean;
}

export interface PrimaryKeyMetadata {
  field: string;
  column: string;
  type: ScalarType;
}

export interface EntityMetadata {
  name: string;
  tableName: string;
  primaryKey: PrimaryKeyMetadata;
  fields: readonly FieldMetadata[];
  relations: readonly RelationMetadata[];
  /** Foreign keys this entity stores itself (belongs_to relations only). */
  foreignKeyFields: readonly string[];
  foreignKeyTypes: Readonly<Record<string, ScalarType>>;
}

export function findField(entity: EntityMetadata, name: string): FieldMetadata | undefined {
  return entity.fields.find(field => field.name === name);
}

export function getField(entity: EntityMetadata, name: string): FieldMetadata {
  const field = findField(entity, name);
  if (!field) {
    throw new QueryValidationError(`Unknown field '${name}' on ${entity.name}`);
  }
  return field;
}

export function getPrimaryKeyField(entity: EntityMetadata): FieldMetadata {
  return getField(entity, entity.primaryKey.field);
}

export function getRelation(entity: EntityMetadata, name: string): RelationMetadata {
  const relation = entity.relations.find(candidate => candidate.name === name);
  if (!relation) {
    throw new RelationNotFoundError(entity.name, name);
  }
  return relation;
}

/**
 * Deep-freeze entity metadata once both schema passes are done.
 */
export function freezeEntity(entity: EntityMetadata): EntityMetadata {
  for (const field of entity.fields) Object.freeze(field);
  for (const relation of entity.relations) Object.freeze(relation);
  Object.freeze(entity.fields);
  Object.freeze(entity.relations);
  Object.freeze(entity.foreignKeyFields);
  Object.freeze(entity.foreignKeyTypes);
  Object.freeze(entity.primaryKey);
  return Object.freeze(entity);
}
