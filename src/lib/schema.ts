import type {
  JsonNullMarker,
  JsonValue,
  PRIMITIVE_TYPES,
  ScalarType,
  ValueConverter,
} from './field-types.js';

export type RelationKind = 'has_many' | 'belongs_to' | 'has_one';

/**
 * Field declaration. A bare string is shorthand for `{ type }`.
 */
export interface FieldDeclaration {
  type: string;
  primaryKey?: boolean;
  unique?: boolean;
  /** Same effect as wrapping the type in `Option<...>`. */
  nullable?: boolean;
  /** Filled in by the database (serial, default expression); optional on create. */
  generated?: boolean;
  columnName?: string;
  converter?: ValueConverter;
}

export type FieldSpec = string | FieldDeclaration;

/**
 * Relation declaration.
 *
 * `from` and `to` name columns with path-like references. For `belongs_to`,
 * `from` is the local foreign key and `to` the referenced target column; for
 * `has_many` and `has_one`, `from` is the local referenced column and `to` the
 * foreign key on the target.
 *
 * @example
 * posts: { kind: 'has_many', target: 'post.Entity', from: 'Column.Id', to: 'post.Column.AuthorId' }
 */
export interface RelationDeclaration {
  kind: RelationKind;
  target: string;
  from: string;
  to: string;
}

/**
 * Declarative entity definition, usually written `as const satisfies
 * EntityDeclaration` so field and relation types can be inferred.
 */
export interface EntityDeclaration {
  name: string;
  tableName?: string;
  fields: Readonly<Record<string, FieldSpec>>;
  relations?: Readonly<Record<string, RelationDeclaration>>;
}

export type SchemaDeclaration = Readonly<Record<string, EntityDeclaration>>;

// ----- Type-level inference -----

type Segments<S extends string> = S extends `${infer Head}::${infer Tail}`
  ? [...Segments<Head>, ...Segments<Tail>]
  : S extends `${infer Head}.${infer Tail}`
    ? [Head, ...Segments<Tail>]
    : [S];

type LastOf<T extends string[]> = T extends [...string[], infer Last extends string] ? Last : never;

type SecondToLastOf<T extends string[]> = T extends [...string[], infer Item extends string, string]
  ? Item
  : T extends [infer Only extends string]
    ? Only
    : never;

type UnwrapOption<T extends string> = T extends `Option<${infer Inner}>` ? Inner : T;

type StripGeneric<T extends string> = T extends `${infer Base}<${string}` ? Base : T;

type SnakeCaseChars<S extends string> = S extends `${infer Char}${infer Rest}`
  ? `${Char extends Lowercase<Char> ? Char : `_${Lowercase<Char>}`}${SnakeCaseChars<Rest>}`
  : '';

/** `AuthorId` -> `author_id`. */
export type SnakeCase<S extends string> =
  SnakeCaseChars<S> extends `_${infer Trimmed}` ? Trimmed : SnakeCaseChars<S>;

type RemoveUnderscores<S extends string> = S extends `${infer Head}_${infer Tail}`
  ? `${Head}${RemoveUnderscores<Tail>}`
  : S;

type NormalizeName<S extends string> = Lowercase<RemoveUnderscores<S>>;

type PrimitiveName = keyof typeof PRIMITIVE_TYPES;

/**
 * Scalar tag for a declared type name, mirroring `resolveTypeName`.
 */
export type ScalarTypeOf<Declared extends string> = string extends Declared
  ? ScalarType
  : Lowercase<LastOf<Segments<StripGeneric<UnwrapOption<Declared>>>>> extends infer Name
    ? Name extends PrimitiveName
      ? (typeof PRIMITIVE_TYPES)[Name]
      : 'opaque'
    : never;

export interface ScalarValueMap {
  i8: number;
  i16: number;
  i32: number;
  i64: bigint;
  u8: number;
  u16: number;
  u32: number;
  u64: bigint;
  f32: number;
  f64: number;
  string: string;
  bool: boolean;
  datetime: Date;
  date: string;
  time: string;
  uuid: string;
  json: JsonValue;
  opaque: unknown;
}

export interface ScalarInputMap {
  i8: number;
  i16: number;
  i32: number;
  i64: bigint | number;
  u8: number;
  u16: number;
  u32: number;
  u64: bigint | number;
  f32: number;
  f64: number;
  string: string;
  bool: boolean;
  datetime: Date | string;
  date: string | Date;
  time: string;
  uuid: string;
  json: JsonValue | JsonNullMarker;
  opaque: unknown;
}

type DeclaredTypeOf<F> = F extends string ? F : F extends { type: infer T extends string } ? T : never;

export type FieldScalar<F> = ScalarTypeOf<DeclaredTypeOf<F>>;

export type IsNullableField<F> = F extends { nullable: true }
  ? true
  : UnwrapOption<DeclaredTypeOf<F>> extends DeclaredTypeOf<F>
    ? false
    : true;

type NullIfNullable<F> = IsNullableField<F> extends true ? null : never;

export type FieldValue<F> =
  | (FieldScalar<F> extends infer T extends keyof ScalarValueMap ? ScalarValueMap[T] : unknown)
  | NullIfNullable<F>;

export type FieldInput<F> =
  | (FieldScalar<F> extends infer T extends keyof ScalarInputMap ? ScalarInputMap[T] : unknown)
  | NullIfNullable<F>;

export type FieldNames<D extends EntityDeclaration> = keyof D['fields'] & string;

export type RelationsOf<D extends EntityDeclaration> = D extends {
  relations: infer R extends Readonly<Record<string, RelationDeclaration>>;
}
  ? R
  : Record<never, never>;

export type RelationNames<D extends EntityDeclaration> = keyof RelationsOf<D> & string;

/**
 * Local foreign-key fields of the entity's `belongs_to` relations.
 */
export type BelongsToKeys<D extends EntityDeclaration> = {
  [K in keyof RelationsOf<D>]: RelationsOf<D>[K] extends {
    kind: 'belongs_to';
    from: infer From extends string;
  }
    ? SnakeCase<LastOf<Segments<From>>>
    : never;
}[keyof RelationsOf<D>];

/**
 * Row shape returned by reads.
 */
export type InferRow<D extends EntityDeclaration> = {
  -readonly [K in FieldNames<D>]: FieldValue<D['fields'][K]>;
};

type OptionalOnCreate<F, K, ForeignKeys> = F extends { generated: true }
  ? true
  : IsNullableField<F> extends true
    ? true
    : K extends ForeignKeys
      ? true
      : false;

export type RequiredCreateKeys<D extends EntityDeclaration> = {
  [K in FieldNames<D>]: OptionalOnCreate<D['fields'][K], K, BelongsToKeys<D>> extends true ? never : K;
}[FieldNames<D>];

export type OptionalCreateKeys<D extends EntityDeclaration> = Exclude<
  FieldNames<D>,
  RequiredCreateKeys<D>
>;

/**
 * Entity a relation target reference names, e.g. `post.Entity` finds the
 * declaration whose `name` is `Post`.
 */
export type ResolveEntity<S extends SchemaDeclaration, Reference extends string> = {
  [K in keyof S]: NormalizeName<S[K]['name']> extends NormalizeName<
    SecondToLastOf<Segments<Reference>>
  >
    ? S[K]
    : never;
}[keyof S];

export type RelationTarget<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  R extends RelationNames<D>,
> = RelationsOf<D>[R] extends { target: infer T extends string } ? ResolveEntity<S, T> : never;

/** Row type of a relation's target; untyped when the target is outside the schema. */
export type RelationRow<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  R extends RelationNames<D>,
> = [RelationTarget<S, D, R>] extends [never]
  ? Record<string, unknown>
  : RelationTarget<S, D, R> extends infer Target extends EntityDeclaration
    ? InferRow<Target>
    : never;

/**
 * Value an include of relation `R` attaches to each parent row. `Shape`
 * replaces the target row type when the include projects or nests.
 */
export type RelationValue<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  R extends RelationNames<D>,
  Shape = RelationRow<S, D, R>,
> = RelationsOf<D>[R] extends { kind: 'has_many' } ? Shape[] : Shape | null;

/**
 * Declaration of a relation's target, or the open declaration type when the
 * target is outside the schema.
 */
export type TargetDeclaration<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  R extends RelationNames<D>,
> = [RelationTarget<S, D, R>] extends [never]
  ? EntityDeclaration
  : RelationTarget<S, D, R> extends infer Target extends EntityDeclaration
    ? Target
    : EntityDeclaration;

/** Entity name of a relation's target. */
export type TargetName<
  S extends SchemaDeclaration,
  D extends EntityDeclaration,
  R extends RelationNames<D>,
> = TargetDeclaration<S, D, R> extends { name: infer N extends string } ? N : string;

/** Relations of `D` whose foreign key `D` stores itself. */
export type BelongsToRelationNames<D extends EntityDeclaration> = {
  [K in RelationNames<D>]: RelationsOf<D>[K] extends { kind: 'belongs_to' } ? K : never;
}[RelationNames<D>] &
  RelationNames<D>;

/** Relations of `D` whose foreign key lives on the target. */
export type TargetOwnedRelationNames<D extends EntityDeclaration> = Exclude<
  RelationNames<D>,
  BelongsToRelationNames<D>
>;
