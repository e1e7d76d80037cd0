import type { IndexDirection } from "mongodb";
import type { Mapper, MapperParams, ValidateOptions } from "./mapper";
import type { Annotation } from "./types";

export type IndexKind = "asc" | "desc" | "2d" | "2dsphere" | "hashed" | "text";

/** Index declared on a single field, optionally compound through `uniqueWith`. */
export type IndexSpec = {
  kind: IndexKind;
  unique: boolean;
  sparse: boolean;
  /** Names of further fields that join this one in a compound unique index. */
  uniqueWith: string[];
};

/** Store index definition, keyed by wire (alias) paths. */
export type IndexModel = {
  key: Record<string, IndexDirection>;
  unique?: boolean;
  sparse?: boolean;
};

export const INDEX_DIRECTIONS: Record<IndexKind, IndexDirection> = {
  asc: 1,
  desc: -1,
  "2d": "2d",
  "2dsphere": "2dsphere",
  hashed: "hashed",
  text: "text",
};

/** Options shared by field and reference descriptors. */
export type FieldOptions = Omit<MapperParams, "nullable" | "defaultFactory"> & {
  /** Wire name; defaults to the field name. */
  alias?: string;
  /** Literal default; mutually exclusive with `defaultFactory`. */
  default?: unknown;
  /** Called lazily each time a default is needed. */
  defaultFactory?: () => unknown;
  index?: IndexKind;
  unique?: boolean;
  sparse?: boolean;
  uniqueWith?: string | string[];
  /** Marks the identity field; forces the alias to `_id`. */
  idField?: boolean;
};

export type ReferenceOptions = FieldOptions & {
  /** Join key on the referenced document; defaults to `id`. */
  refField?: string;
  /** Key the reference is stored under; defaults to `{alias}_ref`. */
  keyName?: string;
};

export type FieldDescriptor<A extends Annotation = Annotation> = {
  readonly kind: "field";
  readonly annotation: A;
  readonly options: FieldOptions;
};

export type ReferenceDescriptor<A extends Annotation = Annotation> = {
  readonly kind: "reference";
  readonly annotation: A;
  readonly options: ReferenceOptions;
};

export type Descriptor<A extends Annotation = Annotation> =
  | FieldDescriptor<A>
  | ReferenceDescriptor<A>;

/**
 * Declare a field.
 * Next: pass it in the field map of `tessera.document(...)`.
 */
export function field<const A extends Annotation>(
  annotation: A,
  options: FieldOptions = {},
): FieldDescriptor<A> {
  return { kind: "field", annotation, options };
}

/**
 * Declare a reference to another document (or a list of them).
 * The annotation must resolve to a document class, optionally wrapped in `optional`/`list`.
 */
export function reference<const A extends Annotation>(
  annotation: A,
  options: ReferenceOptions = {},
): ReferenceDescriptor<A> {
  return { kind: "reference", annotation, options };
}

/** A built field of an assembled document schema. */
export class Field {
  readonly name: string;
  readonly alias: string;
  readonly mapper: Mapper<unknown>;
  readonly idField: boolean;
  readonly index: IndexSpec | undefined;

  constructor(params: {
    name: string;
    mapper: Mapper<unknown>;
    alias?: string;
    idField?: boolean;
    index?: IndexSpec;
  }) {
    this.name = params.name;
    this.idField = params.idField ?? false;
    this.alias = this.idField ? "_id" : (params.alias ?? params.name);
    this.mapper = params.mapper;
    this.index = params.index;
  }

  get nullable(): boolean {
    return this.mapper.nullable;
  }

  /** Validated value, `null` or EMPTY. */
  validate(raw: unknown, options?: ValidateOptions): unknown {
    return this.mapper.validate(raw, options);
  }
}
