import assert from 'node:assert/strict';
import test from 'node:test';

import { FALSE, TRUE } from '../src/lib/condition.js';
import { QueryValidationError } from '../src/lib/errors.js';
import { compilePredicates } from '../src/lib/predicate-compiler.js';
import type { Predicate } from '../src/lib/predicates.js';
import { fieldPredicate } from '../src/lib/predicates.js';
import { createBlogHarness } from './helpers/blog-schema.js';

const { db } = createBlogHarness();
const { fields: user } = db.user;
const { fields: post } = db.post;

const compileUser = (...predicates: Predicate[]) => compilePredicates(predicates, db.user.metadata, db.$registry);

const usersColumn = (name: string) => ({ table: 'users', column: name });

test('an empty predicate list matches every row', () => {
  assert.deepStrictEqual(compileUser(), TRUE);
});

test('a single predicate compiles without a wrapping conjunction', () => {
  assert.deepStrictEqual(compileUser(user.age.gte(18)), {
    type: 'compare',
    column: usersColumn('age'),
    operator: '>=',
    value: 18,
  });
});

test('a predicate list compiles to a conjunction in order', () => {
  assert.deepStrictEqual(compileUser(user.age.lt(65), user.email.notEquals('root@example.com')), {
    type: 'all',
    conditions: [
      { type: 'compare', column: usersColumn('age'), operator: '<', value: 65 },
      { type: 'compare', column: usersColumn('email'), operator: '<>', value: 'root@example.com' },
    ],
  });
});

test('equality on a unique field compiles like any other equality', () => {
  assert.deepStrictEqual(compileUser(user.email.equals('ada@example.com')), {
    type: 'compare',
    column: usersColumn('email'),
    operator: '=',
    value: 'ada@example.com',
  });
});

test('mode applies to every text comparison of its field in the same list', () => {
  assert.deepStrictEqual(compileUser(user.name.contains('ad'), user.name.mode('insensitive')), {
    type: 'text',
    column: usersColumn('name'),
    match: 'contains',
    value: 'ad',
    caseInsensitive: true,
  });
});

test('nested logical lists inherit the enclosing mode', () => {
  const condition = compileUser(
    db.user.or(user.name.startsWith('a'), user.name.endsWith('E')),
    user.name.mode('insensitive')
  );
  assert.deepStrictEqual(condition, {
    type: 'any',
    conditions: [
      { type: 'text', column: usersColumn('name'), match: 'startsWith', value: 'a', caseInsensitive: true },
      { type: 'text', column: usersColumn('name'), match: 'endsWith', value: 'E', caseInsensitive: true },
    ],
  });
});

test('a nested list can switch the inherited mode back off', () => {
  const condition = compileUser(
    user.name.mode('insensitive'),
    db.user.and(user.name.mode('default'), user.name.equals('Ada'))
  );
  assert.deepStrictEqual(condition, {
    type: 'compare',
    column: usersColumn('name'),
    operator: '=',
    value: 'Ada',
  });
});

test('relation predicates compile to correlated subqueries with fresh modes', () => {
  const condition = compileUser(
    db.user.relations.posts.some(post.title.contains('x')),
    user.name.mode('insensitive')
  );
  assert.deepStrictEqual(condition, {
    type: 'exists',
    table: 'posts',
    alias: 'r1',
    join: { outer: usersColumn('id'), inner: { table: 'r1', column: 'author_id' } },
    condition: {
      type: 'text',
      column: { table: 'r1', column: 'title' },
      match: 'contains',
      value: 'x',
      caseInsensitive: false,
    },
    negated: false,
  });
});

test('every negates its predicates inside a negated subquery', () => {
  const condition = compileUser(db.user.relations.posts.every(post.published.equals(true)));
  assert.deepStrictEqual(condition, {
    type: 'exists',
    table: 'posts',
    alias: 'r1',
    join: { outer: usersColumn('id'), inner: { table: 'r1', column: 'author_id' } },
    condition: {
      type: 'not',
      condition: { type: 'compare', column: { table: 'r1', column: 'published' }, operator: '=', value: true },
    },
    negated: true,
  });
});

test('nested relation predicates use one alias per depth', () => {
  const lowScores = db.post.relations.comments.none(db.comment.fields.score.lt(1));
  const condition = compileUser(db.user.relations.posts.some(lowScores));
  assert.deepStrictEqual(condition, {
    type: 'exists',
    table: 'posts',
    alias: 'r1',
    join: { outer: usersColumn('id'), inner: { table: 'r1', column: 'author_id' } },
    condition: {
      type: 'exists',
      table: 'comments',
      alias: 'r2',
      join: { outer: { table: 'r1', column: 'id' }, inner: { table: 'r2', column: 'post_id' } },
      condition: { type: 'compare', column: { table: 'r2', column: 'score' }, operator: '<', value: 1 },
      negated: true,
    },
    negated: false,
  });
});

test('not negates the conjunction of its predicates', () => {
  assert.deepStrictEqual(compileUser(db.user.not(user.age.gt(30), user.name.equals('Ada'))), {
    type: 'not',
    condition: {
      type: 'all',
      conditions: [
        { type: 'compare', column: usersColumn('age'), operator: '>', value: 30 },
        { type: 'compare', column: usersColumn('name'), operator: '=', value: 'Ada' },
      ],
    },
  });
});

test('null checks compile to IS NULL tests on nullable fields', () => {
  assert.deepStrictEqual(compileUser(user.age.isNull()), { type: 'null', column: usersColumn('age'), negated: false });
  assert.deepStrictEqual(compileUser(user.age.equals(null)), {
    type: 'null',
    column: usersColumn('age'),
    negated: false,
  });
  assert.deepStrictEqual(compileUser(user.age.notEquals(null)), {
    type: 'null',
    column: usersColumn('age'),
    negated: true,
  });
});

test('comparing a non-nullable field with null is rejected', () => {
  assert.throws(() => compileUser(user.name.equals(null)), {
    name: 'QueryValidationError',
    message: 'Cannot compare non-nullable User.name with null using equals',
  });
});

test('empty IN lists collapse to constants', () => {
  assert.deepStrictEqual(compileUser(user.id.in([])), FALSE);
  assert.deepStrictEqual(compileUser(user.id.notIn([])), TRUE);
  assert.deepStrictEqual(compileUser(user.id.in([1, 2])), {
    type: 'in',
    column: usersColumn('id'),
    values: [1, 2],
    negated: false,
  });
});

test('predicates of another entity are rejected', () => {
  assert.throws(() => compileUser(post.title.equals('Engines')), {
    name: 'QueryValidationError',
    message: 'Predicate for Post cannot be used in a query on User',
  });
});

test('operators outside the field type class are rejected', () => {
  const forged = fieldPredicate('Post', 'published', { op: 'contains', value: 'x' });
  assert.throws(
    () => compilePredicates([forged], db.post.metadata, db.$registry),
    (error: unknown) =>
      error instanceof QueryValidationError &&
      error.message === "Operator 'contains' is not available on Post.published (bool)"
  );
});

test('a custom alias replaces the table name in column references', () => {
  assert.deepStrictEqual(compilePredicates([user.age.gt(1)], db.user.metadata, db.$registry, 'u'), {
    type: 'compare',
    column: { table: 'u', column: 'age' },
    operator: '>',
    value: 1,
  });
});
