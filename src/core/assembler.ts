import type { Result } from "@fkws/klonk-result";
import { ObjectId } from "mongodb";
import {
  BaseDocument,
  RESERVED_FIELD_NAMES,
  collectIndexes,
  parseDocument,
  type DocumentClass,
  type DocumentInput,
  type DocumentSchema,
  type FieldValidator,
} from "./document";
import { isEmpty } from "./empty";
import { SchemaError } from "./errors";
import { Field, type Descriptor, type IndexModel } from "./field";
import { ReferencedDocumentMapper, unwrapSequence, type ValidateOptions } from "./mapper";
import { Reference } from "./references";
import type { DocumentRegistry, MapperRegistry } from "./registry";
import { defaultDocuments, defaultMappers } from "./defaults";
import { buildField } from "./schemaBuilder";
import { ObjectIdMapper } from "./scalars";
import type { ValueOf } from "./types";

export type FieldsSpec = Record<string, Descriptor>;

export type DocumentOptions = {
  /** Collection name; defaults to the pluralised lowercase document name. */
  collection?: string;
  registry?: DocumentRegistry;
  mappers?: MapperRegistry;
  /** Documents whose fields are merged in before the declared ones, in order. */
  extends?: readonly DocumentClass[];
  /** Extra checks run after a field's mapper; throw to reject. */
  validators?: Record<string, FieldValidator>;
};

export type EmbeddedOptions = Omit<DocumentOptions, "collection">;

type UnionToIntersection<U> = (U extends unknown ? (x: U) => void : never) extends (
  x: infer I,
) => void
  ? I
  : never;

type InstanceOf<C> = C extends DocumentClass<infer D> ? D : never;

/** Field accessors of a declared field map; unset fields read as undefined. */
export type DocumentValues<F extends FieldsSpec> = {
  -readonly [K in keyof F]: ValueOf<F[K]["annotation"]> | undefined;
};

/** Instance type of a generated document class. */
export type DocumentOf<
  F extends FieldsSpec,
  B extends readonly DocumentClass[] = [],
> = BaseDocument &
  DocumentValues<F> &
  ([B[number]] extends [never] ? unknown : UnionToIntersection<InstanceOf<B[number]>>);

/** Full documents also carry the synthetic `id` unless a field takes its place. */
export type FullDocumentOf<
  F extends FieldsSpec,
  B extends readonly DocumentClass[] = [],
> = DocumentOf<F, B> & Omit<{ id: ObjectId | undefined }, keyof F>;

type AssemblyState =
  | "collecting"
  | "validating-identity"
  | "building-references"
  | "registering"
  | "assembled";

/** Lowercase plural collection name for a document name. */
export function pluralize(name: string): string {
  const lower = name.toLowerCase();
  if (lower.endsWith("y")) {
    return lower.slice(0, -1) + "ies";
  }
  if (lower.endsWith("s") || lower.endsWith("x") || lower.endsWith("ch") || lower.endsWith("sh")) {
    return lower + "es";
  }
  return lower + "s";
}

function syntheticIdField(): Field {
  return new Field({
    name: "id",
    idField: true,
    mapper: new ObjectIdMapper({ defaultFactory: () => new ObjectId() }),
  });
}

/**
 * Builds one document schema and registers its class.
 * Walks `collecting → validating-identity → building-references → registering → assembled`;
 * a second `assemble()` is refused.
 */
export class SchemaAssembler {
  private _state: AssemblyState = "collecting";
  private _started = false;
  private _fields = new Map<string, Field>();
  private _references = new Map<string, Reference>();
  private _validators = new Map<string, FieldValidator>();
  private readonly _registry: DocumentRegistry;
  private readonly _mappers: MapperRegistry;

  constructor(
    readonly name: string,
    readonly embedded: boolean,
    private readonly _options: DocumentOptions,
  ) {
    this._registry = _options.registry ?? defaultDocuments;
    this._mappers = _options.mappers ?? defaultMappers;
  }

  get state(): AssemblyState {
    return this._state;
  }

  private _advance(from: AssemblyState, to: AssemblyState): void {
    if (this._state !== from) {
      throw new SchemaError(
        `Schema assembly of \`${this.name}\` expected state ${from}, found ${this._state}`,
      );
    }
    this._state = to;
  }

  /** Run every assembly step and return the registered class. */
  assemble(fields: FieldsSpec): DocumentClass {
    if (this._started) {
      throw new SchemaError(`Schema of \`${this.name}\` is already assembled`);
    }
    this._started = true;

    this._collect(fields);
    this._advance("collecting", "validating-identity");
    const idField = this._validateIdentity();
    this._advance("validating-identity", "building-references");
    this._buildReferences();
    this._advance("building-references", "registering");
    const schema: DocumentSchema = {
      name: this.name,
      embedded: this.embedded,
      collectionName: this.embedded
        ? undefined
        : (this._options.collection ?? pluralize(this.name)),
      fields: this._fields,
      references: this._references,
      idField,
      validators: this._validators,
      registry: this._registry,
    };
    const cls = createDocumentClass(schema);
    this._registry.register(this.name, cls);
    this._advance("registering", "assembled");
    return cls;
  }

  private _collect(fields: FieldsSpec): void {
    for (const base of this._options.extends ?? []) {
      for (const field of base.schema.fields.values()) {
        this._fields.set(field.name, field);
      }
      for (const [name, validator] of base.schema.validators) {
        this._validators.set(name, validator);
      }
    }
    for (const [name, descriptor] of Object.entries(fields)) {
      if (RESERVED_FIELD_NAMES.has(name)) {
        throw new SchemaError(
          `Field name \`${name}\` is reserved in document \`${this.name}\``,
        );
      }
      this._fields.set(name, buildField(name, descriptor, {
        mappers: this._mappers,
        documents: this._registry,
      }));
    }
    for (const [name, validator] of Object.entries(this._options.validators ?? {})) {
      if (!this._fields.has(name)) {
        throw new SchemaError(
          `Validator for unknown field \`${name}\` in document \`${this.name}\``,
        );
      }
      this._validators.set(name, validator);
    }
  }

  private _validateIdentity(): Field | undefined {
    if (this.embedded) return undefined;
    const ids = Array.from(this._fields.values()).filter((field) => field.idField);
    if (ids.length > 1) {
      throw new SchemaError(
        `Document \`${this.name}\` declares multiple identity fields: ${ids.map((field) => field.name).join(", ")}`,
      );
    }
    const [declared] = ids;
    if (declared) return declared;

    if (this._fields.has("id")) {
      throw new SchemaError(
        `Field \`id\` of document \`${this.name}\` must be the identity field`,
      );
    }
    const synthetic = syntheticIdField();
    this._fields = new Map([["id", synthetic], ...this._fields]);
    return synthetic;
  }

  private _buildReferences(): void {
    for (const field of this._fields.values()) {
      const { mapper, isMany } = unwrapSequence(field.mapper);
      if (!(mapper instanceof ReferencedDocumentMapper)) continue;
      const ref = new Reference(field, mapper, isMany);
      this._references.set(field.name, ref);
      const check = (): void => {
        void ref.documentType;
        void ref.refField;
      };
      if (mapper.handle.isResolved) {
        check();
      } else {
        this._registry.track({ check });
      }
    }
  }
}

function createDocumentClass(schema: DocumentSchema): DocumentClass {
  class GeneratedDocument extends BaseDocument {
    static readonly schema = schema;

    constructor(data: DocumentInput = {}, options: ValidateOptions = {}) {
      super(schema, data, options);
    }

    static fromData(data: DocumentInput, options?: ValidateOptions): GeneratedDocument {
      return new GeneratedDocument(data, options);
    }

    static parse(data: DocumentInput): Result<GeneratedDocument> {
      return parseDocument(() => new GeneratedDocument(data, { strict: false }));
    }

    static empty(options: { useDefaults?: boolean } = {}): GeneratedDocument {
      return new GeneratedDocument({}, {
        strict: false,
        useDefaults: options.useDefaults ?? false,
      });
    }

    static indexes(): IndexModel[] {
      return collectIndexes(schema);
    }
  }

  Object.defineProperty(GeneratedDocument, "name", { value: schema.name });
  for (const field of schema.fields.values()) {
    Object.defineProperty(GeneratedDocument.prototype, field.name, {
      get(this: BaseDocument): unknown {
        const value = this.get(field.name);
        return isEmpty(value) ? undefined : value;
      },
      set(this: BaseDocument, value: unknown): void {
        this.set(field.name, value);
      },
      enumerable: true,
      configurable: true,
    });
  }
  return GeneratedDocument;
}

/**
 * Declare a full document stored in its own collection.
 * Next: save instances with `engine.save(...)` and query them with `engine.objects(...)`.
 */
export function defineDocument<
  const F extends FieldsSpec,
  const B extends readonly DocumentClass[] = [],
>(
  name: string,
  fields: F,
  options: DocumentOptions & { extends?: B } = {},
): DocumentClass<FullDocumentOf<F, B>> {
  const cls = new SchemaAssembler(name, false, options).assemble(fields);
  // Field accessors are installed on the prototype by createDocumentClass.
  return cls as DocumentClass<FullDocumentOf<F, B>>;
}

/** Declare an embedded document, stored inline in its container. */
export function defineEmbedded<
  const F extends FieldsSpec,
  const B extends readonly DocumentClass[] = [],
>(
  name: string,
  fields: F,
  options: EmbeddedOptions & { extends?: B } = {},
): DocumentClass<DocumentOf<F, B>> {
  const cls = new SchemaAssembler(name, true, options).assemble(fields);
  // Field accessors are installed on the prototype by createDocumentClass.
  return cls as DocumentClass<DocumentOf<F, B>>;
}
