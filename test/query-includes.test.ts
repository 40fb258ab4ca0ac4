import assert from 'node:assert/strict';
import test from 'node:test';

import { createBlogHarness, seedBlog } from './helpers/blog-schema.js';
import type { MemoryBackend } from './helpers/memory-backend.js';

const setup = async () => {
  const harness = createBlogHarness();
  const seeded = await seedBlog(harness);
  return { ...harness, ...seeded };
};

/** Tables selected from since `mark`, in order. */
const selectsSince = (backend: MemoryBackend, mark: number) =>
  backend.statements
    .slice(mark)
    .filter(entry => entry.kind === 'select')
    .map(entry => entry.table);

test('has_many includes attach ordered lists, empty for parents without rows', async () => {
  const { db, backend } = await setup();
  const mark = backend.statements.length;

  const users = await db.user.findMany().orderBy('id').include('posts', posts => posts.orderBy('id'));
  assert.deepStrictEqual(
    users.map(user => [user.name, user.posts.map(post => post.title)]),
    [
      ['Ada', ['Engines', 'Notes']],
      ['Grace', []],
    ]
  );
  assert.deepStrictEqual(selectsSince(backend, mark), ['users', 'posts']);
});

test('belongs_to and has_one includes attach a row or null', async () => {
  const { db, ada } = await setup();
  await db.setting.create({ user_id: ada.id, theme: 'dark' });

  const posts = await db.post.findMany().orderBy('id').include('author');
  assert.deepStrictEqual(
    posts.map(post => post.author?.name),
    ['Ada', 'Ada']
  );

  const users = await db.user.findMany().orderBy('id').include('settings');
  assert.deepStrictEqual(
    users.map(user => user.settings),
    [{ id: 1, user_id: 1, theme: 'dark' }, null]
  );
});

test('nested includes cost one select per level', async () => {
  const { db, backend } = await setup();
  const mark = backend.statements.length;

  const [ada] = await db.user
    .findMany(db.user.fields.id.equals(1))
    .include('posts', posts => posts.orderBy('id').include('comments', comments => comments.orderBy('id')));

  assert.ok(ada);
  assert.deepStrictEqual(
    ada.posts.map(post => post.comments),
    [
      [
        { id: 1n, post_id: 1, body: 'Great read', score: 4.5 },
        { id: 2n, post_id: 1, body: 'Too long', score: 2 },
      ],
      [],
    ]
  );
  assert.deepStrictEqual(selectsSince(backend, mark), ['users', 'posts', 'comments']);
});

test('include filters and windows apply per parent', async () => {
  const { db, grace } = await setup();
  const { fields: post } = db.post;
  await db.post.createMany([
    { title: 'Compilers', views: 7n, published: true, author_id: grace.id },
    { title: 'Languages', views: 2n, published: true, author_id: grace.id },
  ]);

  const published = await db.user
    .findMany()
    .orderBy('id')
    .include('posts', posts => posts.where(post.published.equals(true)).orderBy('id'));
  assert.deepStrictEqual(
    published.map(user => user.posts.map(row => row.title)),
    [['Engines'], ['Compilers', 'Languages']]
  );

  const latest = await db.user
    .findMany()
    .orderBy('id')
    .include('posts', posts => posts.orderBy('id', 'desc').take(1));
  assert.deepStrictEqual(
    latest.map(user => user.posts.map(row => row.title)),
    [['Notes'], ['Languages']]
  );

  const second = await db.user
    .findMany()
    .orderBy('id')
    .include('posts', posts => posts.orderBy('views').skip(1));
  assert.deepStrictEqual(
    second.map(user => user.posts.map(row => row.title)),
    [['Engines'], ['Compilers']]
  );
});

test('counted includes report matches before paging', async () => {
  const { db } = await setup();

  const users = await db.user
    .findMany()
    .orderBy('id')
    .include('posts', posts => posts.orderBy('id').take(1).count());
  assert.deepStrictEqual(
    users.map(user => [user.posts.length, user._count.posts]),
    [
      [1, 2],
      [0, 0],
    ]
  );
});

test('selected includes keep only the chosen fields', async () => {
  const { db } = await setup();

  const users = await db.user
    .findMany(db.user.fields.id.equals(1))
    .include('posts', posts => posts.select('title', 'views').orderBy('id'));
  assert.deepStrictEqual(
    users.map(user => user.posts),
    [
      [
        { title: 'Engines', views: 10n },
        { title: 'Notes', views: 3n },
      ],
    ]
  );

  const posts = await db.post
    .findMany()
    .orderBy('id')
    .take(1)
    .include('author', author => author.select('name'))
    .include('comments', comments => comments.select('body').count().orderBy('id'));
  assert.deepStrictEqual(posts, [
    {
      id: 1,
      title: 'Engines',
      views: 10n,
      published: true,
      author_id: 1,
      author: { name: 'Ada' },
      comments: [{ body: 'Great read' }, { body: 'Too long' }],
      _count: { comments: 2 },
    },
  ]);
});

test('findUnique and findFirst take includes', async () => {
  const { db } = await setup();

  const post = await db.post.findUnique(db.post.fields.id.equals(2)).include('comments');
  assert.deepStrictEqual(post?.comments, []);

  const first = await db.comment.findFirst().orderBy('score', 'desc').include('post', row => row.select('title'));
  assert.deepStrictEqual(first?.post, { title: 'Engines' });
});

test('include cursors page each parent after the cursor row', async () => {
  const { db } = await setup();

  const posts = await db.post
    .findMany(db.post.fields.id.equals(1))
    .include('comments', comments => comments.cursor(db.comment.fields.id.equals(1n)));
  assert.deepStrictEqual(
    posts.map(post => post.comments.map(comment => comment.body)),
    [['Too long']]
  );
});

test('includes do not query when there are no parents', async () => {
  const { db, backend } = await setup();
  const mark = backend.statements.length;

  const none = await db.user.findMany(db.user.fields.id.equals(99)).include('posts');
  assert.deepStrictEqual(none, []);
  assert.deepStrictEqual(selectsSince(backend, mark), ['users']);
});

test('an include builder builds once', async () => {
  const { db } = await setup();
  const builder = db.user.findMany();

  assert.throws(
    () =>
      builder.include('posts', posts => {
        posts.build();
        return posts;
      }),
    { name: 'QueryValidationError', message: "Include 'posts' on Post has already been built" }
  );
});
