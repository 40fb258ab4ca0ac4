import assert from 'node:assert/strict';
import test from 'node:test';

import { createDataClient } from '../src/lib/data-client.js';
import { DeferredLookupError } from '../src/lib/errors.js';
import { compileSchema } from '../src/lib/relation-resolver.js';
import type { SchemaDeclaration } from '../src/lib/schema.js';
import { createBlogHarness, seedBlog } from './helpers/blog-schema.js';
import { MemoryBackend } from './helpers/memory-backend.js';

const setup = async () => {
  const harness = createBlogHarness();
  const seeded = await seedBlog(harness);
  return { ...harness, ...seeded };
};

test('create fills generated and omitted nullable fields', async () => {
  const { db } = await setup();

  assert.deepStrictEqual(await db.user.create({ email: 'alan@example.com', name: 'Alan' }), {
    id: 3,
    email: 'alan@example.com',
    name: 'Alan',
    age: null,
    profile: null,
  });
});

test('create resolves a belongs_to filter into the foreign key', async () => {
  const { db } = await setup();
  const { email } = db.user.fields;

  const post = await db.post.create({
    title: 'Hello',
    views: 0n,
    published: false,
    author: email.equals('grace@example.com'),
  });
  assert.strictEqual(post.author_id, 2);

  const connected = db.post.create({ title: 'Queued', views: 1n, published: true }).connect(
    'author',
    db.user.fields.id.equals(1)
  );
  assert.strictEqual(connected.pendingLookups, 1);
  assert.strictEqual((await connected).author_id, 1);
});

test('a failed lookup aborts the create and rolls it back', async () => {
  const { db, backend } = await setup();
  const rollbacks = backend.rollbacks;
  const inserts = backend.statementsFor('posts', 'insert').length;

  await assert.rejects(
    db.post
      .create({ title: 'Orphan', views: 0n, published: false, author: db.user.fields.email.equals('a@x.com') })
      .execute(),
    (error: unknown) =>
      error instanceof DeferredLookupError &&
      error.entity === 'Post' &&
      error.relation === 'author' &&
      error.message === 'No User matches email for Post.author'
  );

  assert.strictEqual(backend.rows('posts').length, 2);
  assert.strictEqual(backend.statementsFor('posts', 'insert').length, inserts);
  assert.strictEqual(backend.rollbacks, rollbacks + 1);
});

test('create writes nested creates and connects after the row', async () => {
  const { db, first } = await setup();

  const cleo = await db.user.create({
    email: 'cleo@example.com',
    name: 'Cleo',
    posts: {
      create: [{ title: 'Intro', views: 0n, published: true }],
      connect: [db.post.fields.id.equals(first.id)],
    },
  });

  const owned = await db.post.findMany(db.post.fields.author_id.equals(cleo.id)).orderBy('id');
  assert.deepStrictEqual(
    owned.map(post => post.title),
    ['Engines', 'Intro']
  );
});

test('an update without mutations returns the row untouched', async () => {
  const { db, backend, ada } = await setup();

  assert.deepStrictEqual(await db.user.update(db.user.fields.id.equals(1)), ada);
  assert.deepStrictEqual(backend.statementsFor('users', 'update'), []);
});

test('update gathers assignments into one statement until a column repeats', async () => {
  const { db, backend } = await setup();
  const { fields } = db.post;

  const renamed = await db.post.update(fields.id.equals(1), fields.views.increment(5), fields.title.set('Engines II'));
  assert.deepStrictEqual([renamed.title, renamed.views], ['Engines II', 15n]);
  assert.strictEqual(backend.statementsFor('posts', 'update').length, 1);

  const doubled = await db.post.update(fields.id.equals(1), fields.views.increment(1), fields.views.multiply(2));
  assert.strictEqual(doubled.views, 32n);
  assert.strictEqual(backend.statementsFor('posts', 'update').length, 3);
});

test('update arithmetic on floats and narrow integers', async () => {
  const { db } = await setup();

  const comment = await db.comment.update(db.comment.fields.id.equals(1n), db.comment.fields.score.divide(2));
  assert.strictEqual(comment.score, 2.25);

  const user = await db.user.update(db.user.fields.id.equals(1), db.user.fields.age.decrement(6));
  assert.strictEqual(user.age, 30);
});

test('update connects and disconnects belongs_to relations', async () => {
  const { db } = await setup();
  const { relations } = db.post;

  const toGrace = relations.author.connect(db.user.fields.id.equals(2));
  const moved = await db.post.update(db.post.fields.id.equals(2), toGrace);
  assert.strictEqual(moved.author_id, 2);

  await assert.rejects(db.post.update(db.post.fields.id.equals(2), relations.author.disconnect()).execute(), {
    name: 'QueryValidationError',
    message: 'Cannot disconnect Post.author: author_id is not nullable',
  });

  const loose = await db.comment.update(db.comment.fields.id.equals(1n), db.comment.relations.post.disconnect());
  assert.strictEqual(loose.post_id, null);
});

test('update rejects a connect whose target is missing', async () => {
  const { db } = await setup();
  const toNobody = db.post.relations.author.connect(db.user.fields.id.equals(9));
  await assert.rejects(db.post.update(db.post.fields.id.equals(2), toNobody).execute(), {
    name: 'DeferredLookupError',
    message: 'No User matches id for Post.author',
  });
});

test('has_many mutations connect, create and disconnect related rows', async () => {
  const { db, backend } = await setup();
  const { comments } = db.post.relations;
  const { fields: comment } = db.comment;

  await db.post.update(db.post.fields.id.equals(2), comments.connect(comment.id.equals(1n)));
  await db.post.update(db.post.fields.id.equals(2), comments.create({ body: 'Nice', score: 5 }));
  assert.deepStrictEqual(
    backend.rows('comments').map(row => [row.id, row.post_id]),
    [
      [1n, 2],
      [2n, 1],
      [3n, 2],
    ]
  );

  await db.post.update(db.post.fields.id.equals(2), comments.disconnect(comment.id.equals(3n)));
  await db.post.update(db.post.fields.id.equals(1), comments.disconnect());
  assert.deepStrictEqual(
    backend.rows('comments').map(row => [row.id, row.post_id]),
    [
      [1n, 2],
      [2n, null],
      [3n, null],
    ]
  );
});

test('has_one connect and create replace the current related row', async () => {
  const { db, backend, ada } = await setup();
  const { settings } = db.user.relations;
  const byAda = db.user.fields.id.equals(ada.id);
  await db.setting.create({ user_id: ada.id, theme: 'dark' });
  await db.setting.create({ user_id: null, theme: 'light' });

  await db.user.update(byAda, settings.connect(db.setting.fields.id.equals(2)));
  assert.deepStrictEqual(
    backend.rows('settings').map(row => [row.id, row.user_id]),
    [
      [1, null],
      [2, 1],
    ]
  );

  await db.user.update(byAda, settings.create({ theme: 'solar' }));
  await db.user.update(byAda, settings.connect(db.setting.fields.id.equals(3)));
  assert.deepStrictEqual(
    backend.rows('settings').map(row => [row.id, row.user_id, row.theme]),
    [
      [1, null, 'dark'],
      [2, null, 'light'],
      [3, 1, 'solar'],
    ]
  );
});

const walletSchema = {
  account: {
    name: 'Account',
    tableName: 'accounts',
    fields: { id: { type: 'i32', primaryKey: true, generated: true }, name: 'String' },
    relations: {
      wallet: { kind: 'has_one', target: 'wallet.Entity', from: 'Column.Id', to: 'wallet.Column.AccountId' },
    },
  },
  wallet: {
    name: 'Wallet',
    tableName: 'wallets',
    fields: {
      id: { type: 'i32', primaryKey: true, generated: true },
      account_id: { type: 'i32', unique: true },
      label: 'String',
    },
    relations: {
      account: { kind: 'belongs_to', target: 'account.Entity', from: 'Column.AccountId', to: 'account.Column.Id' },
    },
  },
} as const satisfies SchemaDeclaration;

test('has_one replacement is rejected when the key cannot be null', async () => {
  const backend = new MemoryBackend(compileSchema(walletSchema));
  const db = createDataClient(walletSchema, { backend });
  const account = await db.account.create({ name: 'Main' });
  await db.wallet.create({ account_id: account.id, label: 'cash' });
  const byId = db.account.fields.id.equals(account.id);

  await assert.rejects(db.account.update(byId, db.account.relations.wallet.create({ label: 'spare' })).execute(), {
    name: 'QueryValidationError',
    message: 'Cannot replace Account.wallet: Wallet.account_id is not nullable',
  });
  await db.account.update(byId, db.account.relations.wallet.connect(db.wallet.fields.id.equals(1)));
  assert.deepStrictEqual(
    backend.rows('wallets').map(row => [row.id, row.account_id, row.label]),
    [[1, 1, 'cash']]
  );
});

test('set detaches rows when the foreign key is nullable and is idempotent', async () => {
  const { db, backend } = await setup();
  const keep = db.post.relations.comments.set([db.comment.fields.id.equals(1n)]);

  await db.post.update(db.post.fields.id.equals(1), keep);
  const once = backend.rows('comments');
  assert.deepStrictEqual(
    once.map(row => [row.id, row.post_id]),
    [
      [1n, 1],
      [2n, null],
    ]
  );

  await db.post.update(db.post.fields.id.equals(1), keep);
  assert.deepStrictEqual(backend.rows('comments'), once);
});

test('set deletes rows whose foreign key cannot be null', async () => {
  const { db } = await setup();

  await db.user.update(db.user.fields.id.equals(1), db.user.relations.posts.set([db.post.fields.id.equals(2)]));
  const remaining = await db.post.findMany();
  assert.deepStrictEqual(
    remaining.map(post => post.title),
    ['Notes']
  );

  await assert.rejects(db.user.update(db.user.fields.id.equals(1), db.user.relations.posts.disconnect()).execute(), {
    name: 'QueryValidationError',
    message: 'Cannot disconnect User.posts: Post.author_id is not nullable',
  });
});

test('upsert updates a matching row and creates from the create data otherwise', async () => {
  const { db } = await setup();
  const { fields } = db.user;

  const updated = await db.user.upsert(
    fields.email.equals('ada@example.com'),
    { email: 'ada@example.com', name: 'Ada L' },
    fields.age.set(37)
  );
  assert.deepStrictEqual([updated.name, updated.age], ['Ada', 37]);

  const created = await db.user.upsert(
    fields.email.equals('new@example.com'),
    { email: 'new@example.com', name: 'New', age: 1 },
    fields.age.set(99)
  );
  assert.deepStrictEqual([created.id, created.name, created.age], [3, 'New', 1]);
});

test('updateMany assigns to every match and counts them', async () => {
  const { db, backend } = await setup();
  const { fields } = db.post;

  assert.strictEqual(await db.post.updateMany([fields.author_id.equals(1)], fields.published.set(true)), 2);
  assert.strictEqual(await db.post.count(fields.published.equals(true)), 2);

  const updates = backend.statementsFor('posts', 'update').length;
  assert.strictEqual(await db.post.updateMany([fields.views.gt(5)]), 1);
  assert.strictEqual(backend.statementsFor('posts', 'update').length, updates);
});

test('updateMany rejects relation mutations and repeated columns', () => {
  const { db } = createBlogHarness();
  const { fields } = db.post;

  assert.throws(() => db.user.updateMany([], db.user.relations.posts.disconnect()), {
    name: 'QueryValidationError',
    message: "updateMany on User cannot disconnect relation 'posts'",
  });
  assert.throws(() => db.post.updateMany([], fields.views.increment(1), fields.views.increment(2)), {
    name: 'QueryValidationError',
    message: 'updateMany on Post changes views more than once',
  });
});

test('createMany, deleteMany and delete report what they changed', async () => {
  const { db } = await setup();
  const { fields } = db.comment;

  assert.strictEqual(
    await db.comment.createMany([
      { body: 'a', score: 1 },
      { body: 'b', score: 2, post_id: 2 },
    ]),
    2
  );
  assert.strictEqual(await db.comment.createMany([]), 0);
  assert.strictEqual(await db.comment.deleteMany(fields.score.lt(2)), 1);

  const removed = await db.comment.delete(fields.id.equals(1n));
  assert.strictEqual(removed.body, 'Great read');
  await assert.rejects(db.comment.delete(fields.id.equals(1n)).execute(), {
    name: 'RecordNotFoundError',
    message: 'No Comment matches id = 1',
  });
  assert.strictEqual(await db.comment.count(), 2);
});

test('update of a missing row fails with RecordNotFoundError', async () => {
  const { db } = await setup();
  await assert.rejects(db.user.update(db.user.fields.id.equals(99), db.user.fields.name.set('Nobody')).execute(), {
    name: 'RecordNotFoundError',
    message: 'No User matches id = 99',
  });
});

test('a unique violation leaves the table as it was', async () => {
  const { db, backend } = await setup();
  await assert.rejects(db.user.create({ email: 'ada@example.com', name: 'Twin' }).execute(), {
    name: 'ConstraintError',
  });
  assert.strictEqual(backend.rows('users').length, 2);
});

test('$transaction commits the work of its client and rolls back on error', async () => {
  const { db, backend } = await setup();

  const post = await db.$transaction(async tx => {
    const author = await tx.user.create({ email: 'tx@example.com', name: 'Tx' });
    return tx.post.create({ title: 'Inside', views: 0n, published: true, author_id: author.id });
  });
  assert.strictEqual(post.author_id, 3);
  assert.strictEqual(backend.rows('users').length, 3);

  await assert.rejects(
    db.$transaction(async tx => {
      await tx.user.create({ email: 'gone@example.com', name: 'Gone' });
      throw new Error('abort');
    }),
    { message: 'abort' }
  );
  assert.strictEqual(await db.user.count(), 3);
  assert.strictEqual(await db.user.findUnique(db.user.fields.email.equals('gone@example.com')), null);
});
