import type { ColumnRef, Condition, TextMatch } from './condition.js';
import { all, any, column, compare, inList, isNull, not, TRUE } from './condition.js';
import type { EntityMetadata, FieldMetadata } from './entity-metadata.js';
import { getField, getRelation } from './entity-metadata.js';
import type { EntityRegistry } from './entity-registry.js';
import { InternalContractError, QueryValidationError } from './errors.js';
import type { FieldOperatorName } from './field-operations.js';
import { isOperatorAllowed } from './field-operations.js';
import type { FieldPredicate, Predicate, RelationPredicate } from './predicates.js';

/**
 * Where a predicate list is compiled: the entity its fields belong to, the
 * alias its table is read through and how deep in relation subqueries it is.
 */
export interface CompileScope {
  entity: EntityMetadata;
  alias: string;
  depth: number;
}

interface CompileContext {
  registry: EntityRegistry;
}

type InsensitiveFields = ReadonlySet<string>;

const unreachable = (value: never, what: string): never => {
  throw new InternalContractError(`Unrecognized ${what}: ${JSON.stringify(value)}`);
};

/**
 * Insensitive mode is set per list: every `mode` predicate in the list (not
 * in nested relation lists) applies to its field's text comparisons,
 * starting from the modes the enclosing list set.
 */
function collectModes(predicates: readonly Predicate[], inherited: InsensitiveFields): InsensitiveFields {
  let modes: Set<string> | null = null;
  for (const predicate of predicates) {
    if (predicate.kind !== 'field' || predicate.operation.op !== 'mode') continue;
    modes ??= new Set(inherited);
    if (predicate.operation.mode === 'insensitive') {
      modes.add(predicate.field);
    } else {
      modes.delete(predicate.field);
    }
  }
  return modes ?? inherited;
}

function assertOperator(field: FieldMetadata, entity: EntityMetadata, operator: FieldOperatorName) {
  if (!isOperatorAllowed(field, operator)) {
    throw new QueryValidationError(
      `Operator '${operator}' is not available on ${entity.name}.${field.name} (${field.type})`
    );
  }
}

function compileField(
  predicate: FieldPredicate,
  scope: CompileScope,
  insensitive: InsensitiveFields
): Condition | null {
  const { entity } = scope;
  const field = getField(entity, predicate.field);
  const { operation } = predicate;
  const ref: ColumnRef = column(scope.alias, field.column);
  const caseInsensitive = insensitive.has(field.name) && field.typeClass === 'string';

  assertOperator(field, entity, operation.op);

  const requireNullable = (operator: string) => {
    if (!field.nullable) {
      throw new QueryValidationError(
        `Cannot compare non-nullable ${entity.name}.${field.name} with null using ${operator}`
      );
    }
  };

  const text = (match: TextMatch, value: string): Condition => ({
    type: 'text',
    column: ref,
    match,
    value,
    caseInsensitive,
  });

  switch (operation.op) {
    case 'equals':
      if (operation.value === null) {
        requireNullable('equals');
        return isNull(ref);
      }
      return caseInsensitive && typeof operation.value === 'string'
        ? text('equals', operation.value)
        : compare(ref, '=', operation.value);
    case 'notEquals':
      if (operation.value === null) {
        requireNullable('notEquals');
        return isNull(ref, true);
      }
      return caseInsensitive && typeof operation.value === 'string'
        ? not(text('equals', operation.value))
        : compare(ref, '<>', operation.value);
    case 'gt':
    case 'gte':
      if (operation.value === null) {
        requireNullable(operation.op);
        return isNull(ref, true);
      }
      return compare(ref, operation.op === 'gt' ? '>' : '>=', operation.value);
    case 'lt':
    case 'lte':
      if (operation.value === null) {
        requireNullable(operation.op);
        return isNull(ref);
      }
      return compare(ref, operation.op === 'lt' ? '<' : '<=', operation.value);
    case 'contains':
    case 'startsWith':
    case 'endsWith':
      return text(operation.op, operation.value);
    case 'in':
      return inList(ref, operation.values);
    case 'notIn':
      return inList(ref, operation.values, true);
    case 'isNull':
      return isNull(ref);
    case 'isNotNull':
      return isNull(ref, true);
    case 'mode':
      return null;
    case 'jsonPath':
      return { type: 'json', column: ref, test: { kind: 'path', path: operation.path } };
    case 'jsonStringContains':
      return {
        type: 'json',
        column: ref,
        test: { kind: 'string', match: 'contains', path: operation.path, value: operation.value },
      };
    case 'jsonStringStartsWith':
      return {
        type: 'json',
        column: ref,
        test: { kind: 'string', match: 'startsWith', path: operation.path, value: operation.value },
      };
    case 'jsonStringEndsWith':
      return {
        type: 'json',
        column: ref,
        test: { kind: 'string', match: 'endsWith', path: operation.path, value: operation.value },
      };
    case 'jsonArrayContains':
      return {
        type: 'json',
        column: ref,
        test: { kind: 'arrayContains', path: operation.path, value: operation.value },
      };
    case 'jsonArrayStartsWith':
      return {
        type: 'json',
        column: ref,
        test: { kind: 'arrayStartsWith', path: operation.path, value: operation.value },
      };
    case 'jsonArrayEndsWith':
      return {
        type: 'json',
        column: ref,
        test: { kind: 'arrayEndsWith', path: operation.path, value: operation.value },
      };
    case 'jsonObjectContains':
      return { type: 'json', column: ref, test: { kind: 'objectKey', path: operation.path, key: operation.key } };
    case 'jsonNull':
      return { type: 'json', column: ref, test: { kind: 'null', path: operation.path, nullKind: operation.kind } };
    default:
      return unreachable(operation, 'field operation');
  }
}

function compileRelation(
  predicate: RelationPredicate,
  scope: CompileScope,
  context: CompileContext
): Condition {
  const relation = getRelation(scope.entity, predicate.relation);
  const target = context.registry.get(relation.targetEntity);
  if (!target) {
    throw new QueryValidationError(
      `Relation ${scope.entity.name}.${relation.name} targets ${relation.targetEntity}, which is not registered`
    );
  }

  const depth = scope.depth + 1;
  const alias = `r${depth}`;
  const inner = compileList(predicate.predicates, { entity: target, alias, depth }, context, new Set());
  const join = {
    outer: column(scope.alias, relation.localColumn),
    inner: column(alias, relation.remoteColumn),
  };

  // A parent without related rows satisfies `every` and `none`
  switch (predicate.quantifier) {
    case 'some':
      return { type: 'exists', table: target.tableName, alias, join, condition: inner, negated: false };
    case 'every':
      return { type: 'exists', table: target.tableName, alias, join, condition: not(inner), negated: true };
    case 'none':
      return { type: 'exists', table: target.tableName, alias, join, condition: inner, negated: true };
    default:
      return unreachable(predicate.quantifier, 'relation quantifier');
  }
}

function compilePredicate(
  predicate: Predicate,
  scope: CompileScope,
  context: CompileContext,
  insensitive: InsensitiveFields
): Condition | null {
  if (predicate.entity !== scope.entity.name) {
    throw new QueryValidationError(
      `Predicate for ${predicate.entity} cannot be used in a query on ${scope.entity.name}`
    );
  }

  switch (predicate.kind) {
    case 'field':
      return compileField(predicate, scope, insensitive);
    case 'and':
      return compileList(predicate.predicates, scope, context, insensitive);
    case 'or':
      return any(compileMembers(predicate.predicates, scope, context, insensitive));
    case 'not':
      return not(compileList(predicate.predicates, scope, context, insensitive));
    case 'relation':
      return compileRelation(predicate, scope, context);
    default:
      return unreachable(predicate, 'predicate');
  }
}

function compileMembers(
  predicates: readonly Predicate[],
  scope: CompileScope,
  context: CompileContext,
  inherited: InsensitiveFields
): Condition[] {
  const insensitive = collectModes(predicates, inherited);
  const conditions: Condition[] = [];
  for (const predicate of predicates) {
    const condition = compilePredicate(predicate, scope, context, insensitive);
    if (condition) {
      conditions.push(condition);
    }
  }
  return conditions;
}

function compileList(
  predicates: readonly Predicate[],
  scope: CompileScope,
  context: CompileContext,
  inherited: InsensitiveFields
): Condition {
  if (predicates.length === 0) {
    return TRUE;
  }
  return all(compileMembers(predicates, scope, context, inherited));
}

/**
 * Resolve an ordered predicate list (implicitly AND-ed) into a condition tree
 * over `entity`, read through the table name unless another alias is given.
 *
 * @throws QueryValidationError for predicates of another entity, operators
 * the field does not support, or null comparisons on non-nullable fields.
 */
export function compilePredicates(
  predicates: readonly Predicate[],
  entity: EntityMetadata,
  registry: EntityRegistry,
  alias: string = entity.tableName
): Condition {
  return compileList(predicates, { entity, alias, depth: 0 }, { registry }, new Set());
}
