import assert from 'node:assert/strict';
import test from 'node:test';

import {
  ConnectionError,
  ConstraintError,
  convertPostgreSQLError,
  DALError,
  DeferredLookupError,
  QueryError,
  RecordNotFoundError,
  ValidationError,
} from '../src/lib/errors.js';

const pgError = (code: string, extra: Record<string, string> = {}) =>
  Object.assign(new Error(`pg failure ${code}`), { code, ...extra });

test('unique and foreign key violations become constraint errors', () => {
  const duplicate = pgError('23505', {
    detail: 'Key (email)=(ada@example.com) already exists.',
    constraint: 'u_email',
  });
  const unique = convertPostgreSQLError(duplicate);
  assert.ok(unique instanceof ConstraintError);
  assert.strictEqual(unique.message, 'Unique constraint violation: Key (email)=(ada@example.com) already exists.');
  assert.strictEqual(unique.constraint, 'u_email');
  assert.strictEqual(unique.originalError, duplicate);

  const foreign = convertPostgreSQLError(pgError('23503'));
  assert.ok(foreign instanceof ConstraintError);
  assert.strictEqual(foreign.message, 'Foreign key constraint violation: pg failure 23503');
  assert.strictEqual(foreign.constraint, null);
});

test('not null and check violations become validation errors', () => {
  const notNull = convertPostgreSQLError(pgError('23502', { column: 'title' }));
  assert.ok(notNull instanceof ValidationError);
  assert.strictEqual(notNull.message, 'Not null constraint violation: title');
  assert.strictEqual(notNull.field, 'title');

  const check = convertPostgreSQLError(pgError('23514', { constraint: 'views_positive' }));
  assert.ok(check instanceof ValidationError);
  assert.strictEqual(check.message, 'Check constraint violation: pg failure 23514');
  assert.strictEqual(check.field, 'views_positive');
});

test('connection and schema failures keep their message', () => {
  for (const code of ['08000', '08003', '08006']) {
    const error = convertPostgreSQLError(pgError(code));
    assert.ok(error instanceof ConnectionError);
    assert.strictEqual(error.message, `pg failure ${code}`);
  }
  assert.strictEqual(convertPostgreSQLError(pgError('42P01')).message, 'Table does not exist: pg failure 42P01');
  assert.strictEqual(convertPostgreSQLError(pgError('42703')).message, 'Column does not exist: pg failure 42703');
});

test('other failures become query errors carrying the original', () => {
  const original = pgError('40001');
  const error = convertPostgreSQLError(original);
  assert.ok(error instanceof QueryError);
  assert.strictEqual(error.message, 'pg failure 40001');
  assert.strictEqual(error.originalError, original);
  assert.strictEqual(error.code, 'QUERY_ERROR');
});

test('errors that are already converted pass through', () => {
  const notFound = new RecordNotFoundError('No User matches id = 9', 'User');
  assert.strictEqual(convertPostgreSQLError(notFound), notFound);

  const unknown = convertPostgreSQLError('boom');
  assert.ok(unknown instanceof DALError);
  assert.strictEqual(unknown.message, 'Unknown error');
});

test('deferred lookup failures are not-found errors with their relation', () => {
  const error = new DeferredLookupError('No User matches id for Post.author', 'Post', 'author');
  assert.ok(error instanceof RecordNotFoundError);
  assert.strictEqual(error.name, 'DeferredLookupError');
  assert.strictEqual(error.code, 'DEFERRED_LOOKUP_FAILED');
  assert.deepStrictEqual([error.entity, error.relation], ['Post', 'author']);
});
