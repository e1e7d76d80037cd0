import type { Decimal128, ObjectId, UUID } from "mongodb";
import type { BaseDocument, DocumentClass } from "./document";
import type { Geometry } from "./geometry";

/**
 * Named key for a scalar type.
 * The mapper registry binds each token to a mapper builder.
 */
export class TypeToken<V> {
  readonly __TOKEN__: true = true;
  /** Type-level only; carries the value type. */
  declare readonly __value?: V;

  constructor(readonly name: string) {}

  toString(): string {
    return this.name;
  }
}

/** Built-in type tokens. */
export const t = {
  str: new TypeToken<string>("str"),
  int: new TypeToken<number>("int"),
  float: new TypeToken<number>("float"),
  decimal: new TypeToken<Decimal128>("decimal"),
  bool: new TypeToken<boolean>("bool"),
  datetime: new TypeToken<Date>("datetime"),
  date: new TypeToken<Date>("date"),
  time: new TypeToken<Date>("time"),
  datetimeMs: new TypeToken<number>("datetimeMs"),
  binary: new TypeToken<Uint8Array>("binary"),
  uuid: new TypeToken<UUID>("uuid"),
  objectId: new TypeToken<ObjectId>("objectId"),
  json: new TypeToken<Record<string, unknown>>("json"),
  email: new TypeToken<string>("email"),
  url: new TypeToken<string>("url"),
  ipv4: new TypeToken<string>("ipv4"),
  ipv6: new TypeToken<string>("ipv6"),
  port: new TypeToken<string>("port"),
  mac: new TypeToken<string>("mac"),
  phone: new TypeToken<string>("phone"),
  card: new TypeToken<string>("card"),
  ssn: new TypeToken<string>("ssn"),
  hashtag: new TypeToken<string>("hashtag"),
  doi: new TypeToken<string>("doi"),
  version: new TypeToken<string>("version"),
  point: new TypeToken<Geometry<"Point">>("Point"),
  multiPoint: new TypeToken<Geometry<"MultiPoint">>("MultiPoint"),
  lineString: new TypeToken<Geometry<"LineString">>("LineString"),
  multiLineString: new TypeToken<Geometry<"MultiLineString">>("MultiLineString"),
  polygon: new TypeToken<Geometry<"Polygon">>("Polygon"),
  multiPolygon: new TypeToken<Geometry<"MultiPolygon">>("MultiPolygon"),
} as const;

/** Native constructors that resolve to built-in mappers. */
export type NativeKey =
  | StringConstructor
  | NumberConstructor
  | BooleanConstructor
  | DateConstructor;

export class OptionalShape<A> {
  readonly shape = "optional";
  constructor(readonly inner: A) {}
}

export class ListShape<A> {
  readonly shape = "list";
  constructor(readonly inner: A) {}
}

export class UnionShape<A extends readonly unknown[]> {
  readonly shape = "union";
  constructor(readonly arms: A) {}
}

export class RecordShape<A> {
  readonly shape = "record";
  constructor(readonly value: A) {}
}

/**
 * Anything a field can be declared with: a type token, a native constructor,
 * a document class or its registered name, or a generic shape over those.
 */
export type Annotation =
  | TypeToken<unknown>
  | NativeKey
  | DocumentClass
  | string
  | null
  | OptionalShape<Annotation>
  | ListShape<Annotation>
  | UnionShape<readonly Annotation[]>
  | RecordShape<Annotation>;

/** The annotation may also be null. */
export function optional<A extends Annotation>(inner: A): OptionalShape<A> {
  return new OptionalShape(inner);
}

/** Ordered list of the annotation. */
export function list<A extends Annotation>(inner: A): ListShape<A> {
  return new ListShape(inner);
}

/** Union of annotations; only `union(X, null)` is supported by the schema builder. */
export function union<const A extends readonly Annotation[]>(...arms: A): UnionShape<A> {
  return new UnionShape(arms);
}

/** String-keyed map of the annotation; rejected by the schema builder. */
export function record<A extends Annotation>(value: A): RecordShape<A> {
  return new RecordShape(value);
}

type UnionValue<A extends readonly unknown[]> = {
  [K in keyof A]: A[K] extends null ? null : ValueOf<A[K]>;
}[number];

/** Runtime value type produced by an annotation. */
export type ValueOf<A> =
  A extends TypeToken<infer V>
    ? V
    : A extends OptionalShape<infer I>
      ? ValueOf<I> | null
      : A extends ListShape<infer I>
        ? ValueOf<I>[]
        : A extends UnionShape<infer Arms>
          ? UnionValue<Arms>
          : A extends StringConstructor
            ? string
            : A extends NumberConstructor
              ? number
              : A extends BooleanConstructor
                ? boolean
                : A extends DateConstructor
                  ? Date
                  : A extends DocumentClass<infer D>
                    ? D
                    : A extends string
                      ? BaseDocument
                      : unknown;
