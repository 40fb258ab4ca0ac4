import type {
  AggregateSelection,
  AggregateStatement,
  Assignment,
  CountStatement,
  DeleteStatement,
  InsertStatement,
  OrderTerm,
  SelectStatement,
  UpdateStatement,
} from './backend.js';
import type { ColumnRef, Condition, JsonTest, TextMatch } from './condition.js';
import { InternalContractError } from './errors.js';
import type { JsonPath } from './predicates.js';

/**
 * PostgreSQL rendering of condition trees and statements, with `$n`
 * placeholders numbered in rendering order.
 */

export interface SqlStatement {
  sql: string;
  params: unknown[];
}

export interface RenderContext {
  params: unknown[];
  getNextPlaceholder(): string;
}

export function createRenderContext(): RenderContext {
  const params: unknown[] = [];
  let nextIndex = 1;
  return {
    params,
    getNextPlaceholder: () => `$${nextIndex++}`,
  };
}

export const quoteIdentifier = (name: string): string => `"${name.replace(/"/g, '""')}"`;

const renderColumn = (ref: ColumnRef): string => `${quoteIdentifier(ref.table)}.${quoteIdentifier(ref.column)}`;

/**
 * Escape `\`, `%` and `_` so a value matches literally inside a LIKE pattern.
 */
export const escapeLikePattern = (value: string): string => value.replace(/[\\%_]/g, match => `\\${match}`);

const bind = (context: RenderContext, value: unknown, cast?: string): string => {
  const placeholder = context.getNextPlaceholder();
  context.params.push(value);
  return cast ? `${placeholder}::${cast}` : placeholder;
};

const likePattern = (match: TextMatch, value: string): string => {
  const escaped = escapeLikePattern(value);
  switch (match) {
    case 'equals':
      return escaped;
    case 'contains':
      return `%${escaped}%`;
    case 'startsWith':
      return `${escaped}%`;
    case 'endsWith':
      return `%${escaped}`;
  }
};

const jsonTarget = (columnSql: string, path: JsonPath, context: RenderContext): string =>
  path.length === 0 ? columnSql : `(${columnSql} #> ${bind(context, [...path], 'text[]')})`;

const jsonText = (columnSql: string, path: JsonPath, context: RenderContext): string =>
  path.length === 0 ? `(${columnSql} #>> '{}')` : `(${columnSql} #>> ${bind(context, [...path], 'text[]')})`;

function renderJsonTest(columnSql: string, test: JsonTest, context: RenderContext): string {
  switch (test.kind) {
    case 'path':
      return `${jsonTarget(columnSql, test.path, context)} IS NOT NULL`;
    case 'string':
      return `${jsonText(columnSql, test.path, context)} LIKE ${bind(context, likePattern(test.match, test.value))}`;
    case 'arrayContains':
      return `${jsonTarget(columnSql, test.path, context)} @> ${bind(context, JSON.stringify([test.value]), 'jsonb')}`;
    case 'arrayStartsWith':
    case 'arrayEndsWith': {
      const index = test.kind === 'arrayStartsWith' ? '0' : '-1';
      const target = jsonTarget(columnSql, test.path, context);
      return `${target} -> ${index} = ${bind(context, JSON.stringify(test.value), 'jsonb')}`;
    }
    case 'objectKey':
      return `${jsonTarget(columnSql, test.path, context)} ? ${bind(context, test.key)}`;
    case 'null': {
      const target = jsonTarget(columnSql, test.path, context);
      switch (test.nullKind) {
        case 'db':
          return `${target} IS NULL`;
        case 'json':
          return `${target} = 'null'::jsonb`;
        case 'any':
          return `(${target} IS NULL OR ${target} = 'null'::jsonb)`;
      }
    }
  }
}

/**
 * Render a condition tree as a WHERE fragment, pushing bound values onto the
 * context.
 */
export function renderCondition(condition: Condition, context: RenderContext): string {
  switch (condition.type) {
    case 'constant':
      return condition.value ? 'TRUE' : 'FALSE';
    case 'compare':
      return `${renderColumn(condition.column)} ${condition.operator} ${bind(context, condition.value)}`;
    case 'text': {
      const columnSql = renderColumn(condition.column);
      if (condition.match === 'equals' && !condition.caseInsensitive) {
        return `${columnSql} = ${bind(context, condition.value)}`;
      }
      const operator = condition.caseInsensitive ? 'ILIKE' : 'LIKE';
      return `${columnSql} ${operator} ${bind(context, likePattern(condition.match, condition.value))}`;
    }
    case 'in': {
      const placeholders = condition.values.map(value => bind(context, value));
      return `${renderColumn(condition.column)} ${condition.negated ? 'NOT IN' : 'IN'} (${placeholders.join(', ')})`;
    }
    case 'null':
      return `${renderColumn(condition.column)} ${condition.negated ? 'IS NOT NULL' : 'IS NULL'}`;
    case 'json':
      return renderJsonTest(renderColumn(condition.column), condition.test, context);
    case 'all':
    case 'any': {
      if (condition.conditions.length === 0) {
        return condition.type === 'all' ? 'TRUE' : 'FALSE';
      }
      const parts = condition.conditions.map(member => renderCondition(member, context));
      return `(${parts.join(condition.type === 'all' ? ' AND ' : ' OR ')})`;
    }
    case 'not':
      return `NOT (${renderCondition(condition.condition, context)})`;
    case 'exists': {
      const join = `${renderColumn(condition.join.inner)} = ${renderColumn(condition.join.outer)}`;
      const inner =
        condition.condition.type === 'constant' && condition.condition.value
          ? join
          : `${join} AND ${renderCondition(condition.condition, context)}`;
      const subquery = `EXISTS (SELECT 1 FROM ${quoteIdentifier(condition.table)} AS ${quoteIdentifier(
        condition.alias
      )} WHERE ${inner})`;
      return condition.negated ? `NOT ${subquery}` : subquery;
    }
    default:
      throw new InternalContractError(`Unrecognized condition: ${JSON.stringify(condition)}`);
  }
}

const isTrue = (condition: Condition) => condition.type === 'constant' && condition.value;

const whereClause = (condition: Condition, context: RenderContext): string =>
  isTrue(condition) ? '' : ` WHERE ${renderCondition(condition, context)}`;

const qualify = (table: string, columnName: string) => `${quoteIdentifier(table)}.${quoteIdentifier(columnName)}`;

const returningClause = (columns: readonly string[]): string =>
  columns.length === 0 ? '' : ` RETURNING ${columns.map(quoteIdentifier).join(', ')}`;

/** `table` null orders by an output alias. */
const renderOrderTerm = (table: string | null, term: OrderTerm): string => {
  const target = table === null ? quoteIdentifier(term.column) : qualify(table, term.column);
  let sql = `${target} ${term.direction === 'desc' ? 'DESC' : 'ASC'}`;
  if (term.nulls) {
    sql += term.nulls === 'first' ? ' NULLS FIRST' : ' NULLS LAST';
  }
  return sql;
};

const limitClause = (limit: number | null, offset: number | null): string => {
  let sql = '';
  if (limit !== null) {
    sql += ` LIMIT ${limit}`;
  }
  if (offset !== null && offset > 0) {
    sql += ` OFFSET ${offset}`;
  }
  return sql;
};

export function renderSelect(statement: SelectStatement): SqlStatement {
  const context = createRenderContext();
  const { table } = statement;
  const columns = statement.columns.map(columnName => qualify(table, columnName)).join(', ');

  let sql = `SELECT ${columns} FROM ${quoteIdentifier(table)}`;
  sql += whereClause(statement.where, context);
  if (statement.orderBy.length > 0) {
    sql += ` ORDER BY ${statement.orderBy.map(term => renderOrderTerm(table, term)).join(', ')}`;
  }

  sql += limitClause(statement.limit, statement.offset);
  return { sql, params: context.params };
}

/**
 * Render a multi-row insert. Columns are the union of the rows' columns in
 * order of first appearance; a row without a value for one uses DEFAULT.
 */
export function renderInsert(statement: InsertStatement): SqlStatement {
  const context = createRenderContext();
  const columns: string[] = [];
  for (const row of statement.rows) {
    for (const columnName of Object.keys(row)) {
      if (!columns.includes(columnName)) {
        columns.push(columnName);
      }
    }
  }

  const table = quoteIdentifier(statement.table);
  if (columns.length === 0) {
    if (statement.rows.length > 1) {
      throw new InternalContractError('A multi-row insert needs at least one column');
    }
    return { sql: `INSERT INTO ${table} DEFAULT VALUES${returningClause(statement.returning)}`, params: [] };
  }

  const tuples = statement.rows.map(row => {
    const values = columns.map(columnName =>
      Object.prototype.hasOwnProperty.call(row, columnName) ? bind(context, row[columnName]) : 'DEFAULT'
    );
    return `(${values.join(', ')})`;
  });

  const sql =
    `INSERT INTO ${table} (${columns.map(quoteIdentifier).join(', ')}) VALUES ${tuples.join(', ')}` +
    returningClause(statement.returning);
  return { sql, params: context.params };
}

const ARITHMETIC_SQL: Readonly<Record<Exclude<Assignment['op'], 'set'>, string>> = {
  increment: '+',
  decrement: '-',
  multiply: '*',
  divide: '/',
};

export function renderUpdate(statement: UpdateStatement): SqlStatement {
  const context = createRenderContext();
  const assignments = statement.assignments.map(assignment => {
    const target = quoteIdentifier(assignment.column);
    if (assignment.op === 'set') {
      return `${target} = ${bind(context, assignment.value)}`;
    }
    return `${target} = ${target} ${ARITHMETIC_SQL[assignment.op]} ${bind(context, assignment.value)}`;
  });
  if (assignments.length === 0) {
    throw new InternalContractError('An update needs at least one assignment');
  }

  let sql = `UPDATE ${quoteIdentifier(statement.table)} SET ${assignments.join(', ')}`;
  sql += whereClause(statement.where, context);
  sql += returningClause(statement.returning);
  return { sql, params: context.params };
}

export function renderDelete(statement: DeleteStatement): SqlStatement {
  const context = createRenderContext();
  let sql = `DELETE FROM ${quoteIdentifier(statement.table)}`;
  sql += whereClause(statement.where, context);
  sql += returningClause(statement.returning);
  return { sql, params: context.params };
}

export function renderCount(statement: CountStatement): SqlStatement {
  const context = createRenderContext();
  let sql = `SELECT COUNT(*) AS "count" FROM ${quoteIdentifier(statement.table)}`;
  sql += whereClause(statement.where, context);
  return { sql, params: context.params };
}

const renderAggregateExpression = (table: string, selection: AggregateSelection): string => {
  const argument = selection.column === null ? '*' : qualify(table, selection.column);
  return `${selection.fn.toUpperCase()}(${argument})`;
};

export function renderAggregate(statement: AggregateStatement): SqlStatement {
  const context = createRenderContext();
  const { table } = statement;
  const selections = [
    ...statement.groupBy.map(columnName => `${qualify(table, columnName)} AS ${quoteIdentifier(columnName)}`),
    ...statement.aggregates.map(
      selection => `${renderAggregateExpression(table, selection)} AS ${quoteIdentifier(selection.alias)}`
    ),
  ];

  let sql = `SELECT ${selections.join(', ')} FROM ${quoteIdentifier(table)}`;
  sql += whereClause(statement.where, context);

  if (statement.groupBy.length > 0) {
    sql += ` GROUP BY ${statement.groupBy.map(columnName => qualify(table, columnName)).join(', ')}`;
  }
  if (statement.having) {
    const { aggregate, operator, value } = statement.having;
    sql += ` HAVING ${renderAggregateExpression(table, aggregate)} ${operator} ${bind(context, value)}`;
  }
  if (statement.orderBy.length > 0) {
    const aliases = new Set(statement.aggregates.map(selection => selection.alias));
    const terms = statement.orderBy.map(term => renderOrderTerm(aliases.has(term.column) ? null : table, term));
    sql += ` ORDER BY ${terms.join(', ')}`;
  }
  sql += limitClause(statement.limit, statement.offset);
  return { sql, params: context.params };
}
