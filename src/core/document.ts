import { Result } from "@fkws/klonk-result";
import { EMPTY, isEmpty } from "./empty";
import {
  DocumentValidationError,
  SchemaError,
  ValidationError,
  locateError,
} from "./errors";
import { INDEX_DIRECTIONS, type Field, type IndexModel } from "./field";
import {
  EmbeddedDocumentMapper,
  ReferencedDocumentMapper,
  unwrapSequence,
  type ValidateOptions,
} from "./mapper";
import type { Reference } from "./references";
import type { DocumentRegistry } from "./registry";
import { readOwn, safeAssign } from "./safeObject";

export type DocumentInput = Record<string, unknown>;

/** Extra per-field check run after the mapper; throw to reject the value. */
export type FieldValidator = (value: unknown) => void;

/** Assembled, immutable description of a document type. */
export type DocumentSchema = {
  readonly name: string;
  readonly embedded: boolean;
  /** Store collection; undefined for embedded documents. */
  readonly collectionName: string | undefined;
  readonly fields: ReadonlyMap<string, Field>;
  readonly references: ReadonlyMap<string, Reference>;
  readonly idField: Field | undefined;
  readonly validators: ReadonlyMap<string, FieldValidator>;
  readonly registry: DocumentRegistry;
};

/** Constructor and statics of a generated document class. */
export interface DocumentClass<D extends BaseDocument = BaseDocument> {
  new (data?: DocumentInput, options?: ValidateOptions): D;
  readonly schema: DocumentSchema;
  /** Build an instance; throws DocumentValidationError. */
  fromData(data: DocumentInput, options?: ValidateOptions): D;
  /** Tolerant parse of stored or JSON data. */
  parse(data: DocumentInput): Result<D>;
  /** Instance with no values; defaults only when `useDefaults` is set. */
  empty(options?: { useDefaults?: boolean }): D;
  indexes(): IndexModel[];
}

/** Instance members generated classes must not shadow with field accessors. */
export const RESERVED_FIELD_NAMES = new Set([
  "schema",
  "get",
  "set",
  "unset",
  "has",
  "toPlain",
  "toJSON",
  "toBson",
  "constructor",
  "_schema",
  "_data",
  "_field",
  "_validateField",
  "_entries",
]);

/**
 * Base of every generated document class.
 * Holds one validated value, `null` or EMPTY per declared field.
 */
export abstract class BaseDocument {
  private readonly _schema: DocumentSchema;
  private readonly _data = new Map<string, unknown>();

  protected constructor(
    schema: DocumentSchema,
    data: DocumentInput,
    options: ValidateOptions,
  ) {
    this._schema = schema;
    const errors: ValidationError[] = [];
    for (const field of schema.fields.values()) {
      let raw = readOwn(data, field.alias);
      if (raw === undefined) raw = readOwn(data, field.name);
      try {
        this._data.set(field.name, this._validateField(field, raw, options));
      } catch (error) {
        errors.push(locateError(field.name, error));
      }
    }
    if (errors.length > 0) {
      throw new DocumentValidationError(errors, schema.name);
    }
  }

  get schema(): DocumentSchema {
    return this._schema;
  }

  private _field(name: string): Field {
    const field = this._schema.fields.get(name);
    if (!field) {
      throw new Error(
        `Field \`${name}\` not found in document \`${this._schema.name}\``,
      );
    }
    return field;
  }

  private _validateField(
    field: Field,
    raw: unknown,
    options: ValidateOptions,
  ): unknown {
    const value = field.validate(raw, options);
    const validator = this._schema.validators.get(field.name);
    if (validator && value !== null && !isEmpty(value)) {
      validator(value);
    }
    return value;
  }

  /** Stored value, `null`, or EMPTY when never provided. */
  get(name: string): unknown {
    this._field(name);
    return this._data.has(name) ? this._data.get(name) : EMPTY;
  }

  /** Validate and assign one field; throws DocumentValidationError. */
  set(name: string, value: unknown): void {
    const field = this._field(name);
    try {
      this._data.set(name, this._validateField(field, value, {}));
    } catch (error) {
      throw new DocumentValidationError(
        [locateError(name, error)],
        this._schema.name,
      );
    }
  }

  unset(name: string): void {
    this._field(name);
    this._data.set(name, EMPTY);
  }

  /** True when the field holds a value or `null`. */
  has(name: string): boolean {
    return !isEmpty(this.get(name));
  }

  /** Field-name keyed object of native values. */
  toPlain(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [name, value] of this._entries()) {
      const field = this._field(name);
      safeAssign(out, name, field.mapper.dumpPlain(value));
    }
    return out;
  }

  /** Field-name keyed JSON-safe object. */
  toJSON(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [name, value] of this._entries()) {
      const field = this._field(name);
      safeAssign(out, name, field.mapper.dumpJson(value));
    }
    return out;
  }

  /**
   * Alias keyed BSON document.
   * References are stored under their key name as the target's ref field value.
   */
  toBson(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [name, value] of this._entries()) {
      const field = this._field(name);
      const ref = this._schema.references.get(name);
      safeAssign(out, ref ? ref.keyName : field.alias, field.mapper.dumpBson(value));
    }
    return out;
  }

  private *_entries(): Generator<[string, unknown]> {
    for (const name of this._schema.fields.keys()) {
      const value = this._data.get(name);
      if (value === undefined || isEmpty(value)) continue;
      yield [name, value];
    }
  }
}

/** Run `build`, turning validation failures into an error Result. */
export function parseDocument<D>(build: () => D): Result<D> {
  try {
    return new Result({ success: true, data: build() });
  } catch (error) {
    if (error instanceof ValidationError) {
      return new Result({ success: false, error });
    }
    throw error;
  }
}

/**
 * Index definitions of a schema, including embedded documents' indexes
 * prefixed with the embedding field's alias.
 */
export function collectIndexes(schema: DocumentSchema): IndexModel[] {
  const indexes: IndexModel[] = [];
  for (const field of schema.fields.values()) {
    if (field.index) {
      const key: IndexModel["key"] = {
        [field.alias]: INDEX_DIRECTIONS[field.index.kind],
      };
      for (const name of field.index.uniqueWith) {
        const other = schema.fields.get(name);
        if (!other) {
          throw new SchemaError(
            `Field \`${name}\` in uniqueWith of \`${field.name}\` not found in document \`${schema.name}\``,
          );
        }
        key[other.alias] = 1;
      }
      const model: IndexModel = { key };
      if (field.index.unique) model.unique = true;
      if (field.index.sparse) model.sparse = true;
      indexes.push(model);
    }

    const { mapper } = unwrapSequence(field.mapper);
    if (
      mapper instanceof EmbeddedDocumentMapper &&
      !(mapper instanceof ReferencedDocumentMapper)
    ) {
      for (const nested of collectIndexes(mapper.handle.documentType.schema)) {
        const key: IndexModel["key"] = {};
        for (const [path, direction] of Object.entries(nested.key)) {
          key[`${field.alias}.${path}`] = direction;
        }
        indexes.push({ ...nested, key });
      }
    }
  }
  return indexes;
}
