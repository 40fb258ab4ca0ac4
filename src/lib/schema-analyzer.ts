import type { FieldMetadata, KeyOwner, PrimaryKeyMetadata } from './entity-metadata.js';
import { SchemaError } from './errors.js';
import type { ScalarType } from './field-types.js';
import { resolveTypeName, TYPE_CLASSES } from './field-types.js';
import { lastSegment, targetSegment, toPascalCase, toSnakeCase } from './naming.js';
import type {
  EntityDeclaration,
  FieldDeclaration,
  FieldSpec,
  RelationDeclaration,
  RelationKind,
} from './schema.js';

/**
 * A relation after the first pass: the target table and anything that needs
 * the target's own fields are still open.
 */
export interface RelationDraft {
  name: string;
  kind: RelationKind;
  targetReference: string;
  targetEntity: string;
  keyOwner: KeyOwner;
  localField: string;
  localColumn: string;
  remoteField: string;
  foreignKeyField: string;
  foreignKeyType: ScalarType | null;
  foreignKeyNullable: boolean | null;
}

export interface AnalyzedEntity {
  name: string;
  tableName: string;
  primaryKey: PrimaryKeyMetadata;
  fields: FieldMetadata[];
  relations: RelationDraft[];
  foreignKeyFields: string[];
  foreignKeyTypes: Record<string, ScalarType>;
}

const RELATION_KINDS: ReadonlySet<string> = new Set<RelationKind>(['has_many', 'belongs_to', 'has_one']);

/**
 * Build field metadata from one field declaration.
 */
export function analyzeField(name: string, spec: FieldSpec): FieldMetadata {
  const declaration: FieldDeclaration = typeof spec === 'string' ? { type: spec } : spec;
  const resolved = resolveTypeName(declaration.type);
  const primaryKey = declaration.primaryKey === true;

  return {
    name,
    column: declaration.columnName ?? name,
    declaredType: declaration.type,
    type: resolved.type,
    typeClass: TYPE_CLASSES[resolved.type],
    nullable: resolved.nullable || declaration.nullable === true,
    unique: primaryKey || declaration.unique === true,
    primaryKey,
    generated: declaration.generated === true,
    converter: declaration.converter ?? null,
  };
}

const columnReference = (reference: string, entity: string, relation: string, side: string): string => {
  const field = toSnakeCase(lastSegment(reference));
  if (!field) {
    throw new SchemaError(`Relation '${relation}' on ${entity} is missing its '${side}' column`, entity);
  }
  return field;
};

/**
 * Build the first-pass view of one relation. Only the local side can be
 * checked here; the target's columns are resolved in the second pass.
 */
export function analyzeRelation(
  entityName: string,
  name: string,
  declaration: RelationDeclaration,
  fields: readonly FieldMetadata[]
): RelationDraft {
  if (!RELATION_KINDS.has(declaration.kind)) {
    throw new SchemaError(
      `Relation '${name}' on ${entityName} has unknown kind '${String(declaration.kind)}'`,
      entityName
    );
  }
  if (!declaration.target) {
    throw new SchemaError(`Relation '${name}' on ${entityName} is missing its target`, entityName);
  }

  const fromField = columnReference(declaration.from, entityName, name, 'from');
  const toField = columnReference(declaration.to, entityName, name, 'to');
  const ownsKey = declaration.kind === 'belongs_to';
  // `from` always names the local side
  const local = fields.find(field => field.name === fromField);

  if (!local) {
    throw new SchemaError(
      `Relation '${name}' on ${entityName} references missing column '${fromField}'`,
      entityName
    );
  }

  return {
    name,
    kind: declaration.kind,
    targetReference: declaration.target,
    targetEntity: toPascalCase(targetSegment(declaration.target)),
    keyOwner: ownsKey ? 'current' : 'target',
    localField: local.name,
    localColumn: local.column,
    remoteField: toField,
    foreignKeyField: ownsKey ? local.name : toField,
    foreignKeyType: ownsKey ? local.type : null,
    foreignKeyNullable: ownsKey ? local.nullable : null,
  };
}

/**
 * First schema pass: turn one entity declaration into metadata. Fails when
 * the table name or the primary key is missing.
 */
export function analyzeEntity(declaration: EntityDeclaration): AnalyzedEntity {
  const entityName = declaration.name;
  if (!entityName) {
    throw new SchemaError('Entity declarations require a name');
  }

  const tableName = declaration.tableName?.trim();
  if (!tableName) {
    throw new SchemaError(`Entity ${entityName} must declare a table name`, entityName);
  }

  const fields = Object.entries(declaration.fields).map(([name, spec]) => analyzeField(name, spec));
  const primaryKeys = fields.filter(field => field.primaryKey);

  if (primaryKeys.length === 0) {
    throw new SchemaError(`Entity ${entityName} must declare a primary key`, entityName);
  }
  if (primaryKeys.length > 1) {
    throw new SchemaError(
      `Entity ${entityName} declares more than one primary key (${primaryKeys.map(f => f.name).join(', ')})`,
      entityName
    );
  }

  const [primary] = primaryKeys;
  if (!primary) {
    throw new SchemaError(`Entity ${entityName} must declare a primary key`, entityName);
  }
  if (primary.nullable) {
    throw new SchemaError(`Primary key ${entityName}.${primary.name} cannot be nullable`, entityName);
  }

  const relations = Object.entries(declaration.relations ?? {}).map(([name, relation]) =>
    analyzeRelation(entityName, name, relation, fields)
  );

  // Only keys the entity stores itself are its foreign keys
  const foreignKeyFields: string[] = [];
  const foreignKeyTypes: Record<string, ScalarType> = {};
  for (const relation of relations) {
    if (relation.keyOwner !== 'current' || relation.foreignKeyType === null) continue;
    if (!foreignKeyFields.includes(relation.foreignKeyField)) {
      foreignKeyFields.push(relation.foreignKeyField);
    }
    foreignKeyTypes[relation.foreignKeyField] = relation.foreignKeyType;
  }

  return {
    name: entityName,
    tableName,
    primaryKey: { field: primary.name, column: primary.column, type: primary.type },
    fields,
    relations,
    foreignKeyFields,
    foreignKeyTypes,
  };
}
