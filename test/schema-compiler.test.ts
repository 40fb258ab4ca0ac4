import assert from 'node:assert/strict';
import test from 'node:test';

import { EntityRegistry } from '../src/lib/entity-registry.js';
import { FetcherMissingError, SchemaError } from '../src/lib/errors.js';
import { resolveTypeName } from '../src/lib/field-types.js';
import { targetSegment, toPascalCase, toSnakeCase } from '../src/lib/naming.js';
import { compileSchema } from '../src/lib/relation-resolver.js';
import { analyzeField } from '../src/lib/schema-analyzer.js';
import type { EntityDeclaration } from '../src/lib/schema.js';
import { blogSchema } from './helpers/blog-schema.js';

const entityNamed = (name: string, declarations: readonly EntityDeclaration[]) => {
  const entity = compileSchema(declarations).byName.get(name);
  if (!entity) {
    assert.fail(`Expected ${name} to be compiled`);
  }
  return entity;
};

const relationNamed = (entityName: string, relation: string, declarations: readonly EntityDeclaration[]) => {
  const found = entityNamed(entityName, declarations).relations.find(candidate => candidate.name === relation);
  if (!found) {
    assert.fail(`Expected ${entityName}.${relation} to be compiled`);
  }
  return found;
};

test('naming helpers convert between declaration and metadata names', () => {
  assert.strictEqual(toSnakeCase('AuthorId'), 'author_id');
  assert.strictEqual(toSnakeCase('HTTPServer'), 'http_server');
  assert.strictEqual(toSnakeCase('author_id'), 'author_id');
  assert.strictEqual(toPascalCase('blog_post'), 'BlogPost');
  assert.strictEqual(targetSegment('post.Entity'), 'post');
  assert.strictEqual(targetSegment('blog::post::Entity'), 'post');
  assert.strictEqual(targetSegment('Post'), 'Post');
});

test('resolveTypeName unwraps Option and ignores namespaces and generics', () => {
  assert.deepStrictEqual(resolveTypeName('Option<i32>'), { type: 'i32', nullable: true });
  assert.deepStrictEqual(resolveTypeName('chrono::DateTime<Utc>'), { type: 'datetime', nullable: false });
  assert.deepStrictEqual(resolveTypeName('Option<serde_json::Value>'), { type: 'json', nullable: true });
  assert.deepStrictEqual(resolveTypeName('uuid::Uuid'), { type: 'uuid', nullable: false });
  assert.deepStrictEqual(resolveTypeName('Option<Vec<u8>>'), { type: 'opaque', nullable: true });
});

test('analyzeField builds field metadata from shorthand and full declarations', () => {
  assert.deepStrictEqual(analyzeField('age', 'Option<i32>'), {
    name: 'age',
    column: 'age',
    declaredType: 'Option<i32>',
    type: 'i32',
    typeClass: 'integer',
    nullable: true,
    unique: false,
    primaryKey: false,
    generated: false,
    converter: null,
  });

  const id = analyzeField('id', { type: 'i64', primaryKey: true, generated: true, columnName: 'post_id' });
  assert.strictEqual(id.column, 'post_id');
  assert.strictEqual(id.unique, true);
  assert.strictEqual(id.generated, true);
  assert.strictEqual(analyzeField('note', { type: 'String', nullable: true }).nullable, true);
});

test('compileSchema resolves belongs_to and has_many relations in both directions', () => {
  const declarations = Object.values(blogSchema);

  assert.deepStrictEqual(relationNamed('Post', 'author', declarations), {
    name: 'author',
    kind: 'belongs_to',
    targetEntity: 'User',
    targetTable: 'users',
    keyOwner: 'current',
    localField: 'author_id',
    localColumn: 'author_id',
    remoteField: 'id',
    remoteColumn: 'id',
    foreignKeyField: 'author_id',
    foreignKeyColumn: 'author_id',
    foreignKeyType: 'i32',
    foreignKeyNullable: false,
  });

  assert.deepStrictEqual(relationNamed('User', 'posts', declarations), {
    name: 'posts',
    kind: 'has_many',
    targetEntity: 'Post',
    targetTable: 'posts',
    keyOwner: 'target',
    localField: 'id',
    localColumn: 'id',
    remoteField: 'author_id',
    remoteColumn: 'author_id',
    foreignKeyField: 'author_id',
    foreignKeyColumn: 'author_id',
    foreignKeyType: 'i32',
    foreignKeyNullable: false,
  });

  assert.strictEqual(relationNamed('Post', 'comments', declarations).foreignKeyNullable, true);
});

test('only belongs_to relations contribute foreign keys to their entity', () => {
  const declarations = Object.values(blogSchema);
  const post = entityNamed('Post', declarations);
  const user = entityNamed('User', declarations);

  assert.deepStrictEqual(post.foreignKeyFields, ['author_id']);
  assert.deepStrictEqual(post.foreignKeyTypes, { author_id: 'i32' });
  assert.deepStrictEqual(user.foreignKeyFields, []);
  assert.deepStrictEqual(user.primaryKey, { field: 'id', column: 'id', type: 'i32' });
  assert.ok(Object.isFrozen(post));
  assert.ok(Object.isFrozen(post.relations[0]));
});

test('relations may point forward and at their own entity', () => {
  const reply: EntityDeclaration = {
    name: 'Reply',
    tableName: 'replies',
    fields: { id: { type: 'i32', primaryKey: true }, thread_id: 'i32' },
    relations: {
      thread: { kind: 'belongs_to', target: 'thread.Entity', from: 'Column.ThreadId', to: 'thread.Column.Id' },
    },
  };
  const thread: EntityDeclaration = {
    name: 'Thread',
    tableName: 'threads',
    fields: { id: { type: 'i32', primaryKey: true }, parent_id: 'Option<i32>' },
    relations: {
      parent: { kind: 'belongs_to', target: 'thread.Entity', from: 'Column.ParentId', to: 'thread.Column.Id' },
      children: { kind: 'has_many', target: 'thread.Entity', from: 'Column.Id', to: 'thread.Column.ParentId' },
    },
  };

  const declarations = [reply, thread];
  assert.strictEqual(relationNamed('Reply', 'thread', declarations).targetTable, 'threads');

  const parent = relationNamed('Thread', 'parent', declarations);
  assert.strictEqual(parent.targetEntity, 'Thread');
  assert.strictEqual(parent.foreignKeyNullable, true);

  const children = relationNamed('Thread', 'children', declarations);
  assert.strictEqual(children.remoteColumn, 'parent_id');
  assert.strictEqual(children.foreignKeyType, 'i32');
});

test('relations use declared column names on both sides', () => {
  const account: EntityDeclaration = {
    name: 'Account',
    tableName: 'accounts',
    fields: { id: { type: 'i32', primaryKey: true, columnName: 'account_id' } },
    relations: {
      invoices: { kind: 'has_many', target: 'invoice.Entity', from: 'Column.Id', to: 'invoice.Column.AccountId' },
    },
  };
  const invoice: EntityDeclaration = {
    name: 'Invoice',
    tableName: 'invoices',
    fields: { id: { type: 'i32', primaryKey: true }, account_id: { type: 'i32', columnName: 'acct' } },
  };

  const invoices = relationNamed('Account', 'invoices', [account, invoice]);
  assert.strictEqual(invoices.localColumn, 'account_id');
  assert.strictEqual(invoices.remoteColumn, 'acct');
  assert.strictEqual(invoices.foreignKeyColumn, 'acct');
});

test('targets outside the schema fall back to naming conventions', () => {
  const invoice: EntityDeclaration = {
    name: 'Invoice',
    tableName: 'invoices',
    fields: { id: { type: 'i32', primaryKey: true }, customer_id: 'i32' },
    relations: {
      lines: { kind: 'has_many', target: 'billing::invoice_line::Entity', from: 'Column.Id', to: 'Column.InvoiceId' },
    },
  };

  const lines = relationNamed('Invoice', 'lines', [invoice]);
  assert.strictEqual(lines.targetEntity, 'InvoiceLine');
  assert.strictEqual(lines.targetTable, 'invoice_lines');
  assert.strictEqual(lines.remoteColumn, 'invoice_id');
  assert.strictEqual(lines.foreignKeyNullable, false);
});

test('compileSchema rejects an entity without a table name', () => {
  const tag: EntityDeclaration = { name: 'Tag', fields: { id: { type: 'i32', primaryKey: true } } };
  assert.throws(
    () => compileSchema([tag]),
    (error: unknown) =>
      error instanceof SchemaError &&
      error.entity === 'Tag' &&
      error.message === 'Entity Tag must declare a table name'
  );
});

test('compileSchema rejects missing, repeated and nullable primary keys', () => {
  assert.throws(
    () => compileSchema([{ name: 'Tag', tableName: 'tags', fields: { label: 'String' } }]),
    { name: 'SchemaError', message: 'Entity Tag must declare a primary key' }
  );
  assert.throws(
    () =>
      compileSchema([
        {
          name: 'Tag',
          tableName: 'tags',
          fields: { id: { type: 'i32', primaryKey: true }, slug: { type: 'String', primaryKey: true } },
        },
      ]),
    { name: 'SchemaError', message: 'Entity Tag declares more than one primary key (id, slug)' }
  );
  assert.throws(
    () =>
      compileSchema([{ name: 'Tag', tableName: 'tags', fields: { id: { type: 'Option<i32>', primaryKey: true } } }]),
    { name: 'SchemaError', message: 'Primary key Tag.id cannot be nullable' }
  );
});

test('compileSchema rejects relations over missing columns', () => {
  const post: EntityDeclaration = {
    name: 'Post',
    tableName: 'posts',
    fields: { id: { type: 'i32', primaryKey: true } },
    relations: {
      author: { kind: 'belongs_to', target: 'user.Entity', from: 'Column.WriterId', to: 'user.Column.Id' },
    },
  };
  assert.throws(() => compileSchema([post]), {
    name: 'SchemaError',
    message: "Relation 'author' on Post references missing column 'writer_id'",
  });

  const user: EntityDeclaration = {
    name: 'User',
    tableName: 'users',
    fields: { id: { type: 'i32', primaryKey: true } },
    relations: {
      posts: { kind: 'has_many', target: 'post.Entity', from: 'Column.Id', to: 'post.Column.OwnerId' },
    },
  };
  const target: EntityDeclaration = {
    name: 'Post',
    tableName: 'posts',
    fields: { id: { type: 'i32', primaryKey: true } },
  };
  assert.throws(() => compileSchema([user, target]), {
    name: 'SchemaError',
    message: "Relation 'posts' on User references missing column 'owner_id' on Post",
  });
});

test('compileSchema rejects two declarations of the same entity', () => {
  const fields = { id: { type: 'i32', primaryKey: true } };
  assert.throws(
    () =>
      compileSchema([
        { name: 'BlogPost', tableName: 'blog_posts', fields },
        { name: 'blog_post', tableName: 'posts', fields },
      ]),
    { name: 'SchemaError', message: 'Entity blog_post is declared more than once' }
  );
});

test('EntityRegistry finds entities by namespaced, cased and snake names', () => {
  const registry = new EntityRegistry(compileSchema(blogSchema));
  const post = registry.require('Post');

  assert.strictEqual(registry.get('blog::Post'), post);
  assert.strictEqual(registry.get('post'), post);
  assert.strictEqual(registry.get('POST'), post);
  assert.strictEqual(registry.get('Nope'), null);
  assert.throws(() => registry.require('Nope'), SchemaError);

  assert.strictEqual(registry.primaryKeyType('Comment'), 'i64');
  assert.strictEqual(registry.fieldType('Post', 'views'), 'i64');
  assert.strictEqual(registry.fieldType('Post', 'missing'), null);
  assert.throws(() => registry.getFetcher('Post'), FetcherMissingError);
});
