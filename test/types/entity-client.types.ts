import type { InferRow } from '../../src/lib/schema.js';
import type { BlogSchema, BlogHarness } from '../helpers/blog-schema.js';
import type { Equal, Expect, IsAssignable, Not } from './type-helpers.js';

type Same<A, B> = [A] extends [B] ? ([B] extends [A] ? true : false) : false;

type UserRow = InferRow<BlogSchema['user']>;
type PostRow = InferRow<BlogSchema['post']>;
type CommentRow = InferRow<BlogSchema['comment']>;

type _UserId = Expect<Equal<UserRow['id'], number>>;
type _UserAge = Expect<Equal<UserRow['age'], number | null>>;
type _PostViews = Expect<Equal<PostRow['views'], bigint>>;
type _CommentId = Expect<Equal<CommentRow['id'], bigint>>;
type _CommentPost = Expect<Equal<CommentRow['post_id'], number | null>>;
type _NoExtraKeys = Expect<Equal<keyof PostRow, 'id' | 'title' | 'views' | 'published' | 'author_id'>>;

export async function readShapes({ db }: BlogHarness) {
  const { fields: user } = db.user;

  const found = await db.user.findUnique(user.email.equals('ada@example.com'));
  type _Found = Expect<Same<typeof found, UserRow | null>>;

  const users = await db.user.findMany(user.age.gte(18)).include('posts').include('settings');
  type _Posts = Expect<Same<(typeof users)[number]['posts'], PostRow[]>>;
  type _Settings = Expect<Same<(typeof users)[number]['settings'], InferRow<BlogSchema['setting']> | null>>;

  const posts = await db.post
    .findMany()
    .include('author', author => author.select('name'))
    .include('comments', comments => comments.select('body', 'score').count());
  type _Author = Expect<Same<(typeof posts)[number]['author'], { name: string } | null>>;
  type _Comments = Expect<Same<(typeof posts)[number]['comments'], { body: string; score: number }[]>>;
  type _Count = Expect<Same<(typeof posts)[number]['_count'], { comments: number }>>;

  const count = await db.post.count();
  type _CountResult = Expect<Equal<typeof count, number>>;

  return { found, users, posts, count };
}

export async function circularIncludes({ db }: BlogHarness) {
  const users = await db.user.findMany().include('posts', posts => posts.include('author'));
  type Nested = (typeof users)[number]['posts'][number]['author'];
  type _Nested = Expect<Same<Nested, UserRow | null>>;

  const comments = await db.comment
    .findMany()
    .include('post', post => post.include('author', author => author.include('posts')));
  type Deep = NonNullable<NonNullable<(typeof comments)[number]['post']>['author']>['posts'];
  type _Deep = Expect<Same<Deep, PostRow[]>>;

  return { users, comments };
}

export function operatorSurface({ db }: BlogHarness) {
  const { fields } = db.post;

  type _PublishedHasNoOrdering = Expect<Not<IsAssignable<'gt', keyof typeof fields.published>>>;
  type _ViewsHasArithmetic = Expect<IsAssignable<'increment', keyof typeof fields.views>>;
  type _NameHasNoNullCheck = Expect<Not<IsAssignable<'isNull', keyof typeof db.user.fields.name>>>;
  type _ProfileHasJson = Expect<IsAssignable<'jsonPath', keyof typeof db.user.fields.profile>>;

  // @ts-expect-error booleans are not ordered
  fields.published.gt(true);

  // @ts-expect-error a title is not nullable
  fields.title.isNull();

  // @ts-expect-error views take integers
  fields.views.equals('ten');
}

export function misuse({ db }: BlogHarness) {
  // @ts-expect-error findUnique needs a unique field
  db.user.findUnique(db.user.fields.name.equals('Ada'));

  // @ts-expect-error a Post predicate cannot filter users
  db.user.findMany(db.post.fields.id.equals(1));

  // @ts-expect-error name is required on create
  db.user.create({ email: 'alan@example.com' });

  // @ts-expect-error users have no comments relation
  db.user.findMany().include('comments');

  // @ts-expect-error posts cannot order by an unknown field
  db.post.findMany().orderBy('rating');
}
