import { EMPTY, isEmpty, type Empty } from "./empty";
import {
  ErrorWrapper,
  MapperError,
  SchemaError,
  ValidationError,
  locateError,
} from "./errors";
import type { DocumentHandle } from "./registry";
import type { BaseDocument } from "./document";
import type { Field } from "./field";
import { isRecord } from "./safeObject";

/**
 * Options accepted by mapper builders.
 * Each mapper reads the keys it understands and ignores the rest.
 */
export type MapperParams = {
  nullable?: boolean;
  defaultFactory?: () => unknown;
  gt?: unknown;
  gte?: unknown;
  lt?: unknown;
  lte?: unknown;
  /** Int: value must be a multiple of this. */
  mul?: number;
  minLen?: number;
  maxLen?: number;
  choices?: readonly unknown[];
  regex?: RegExp;
  /** Int: accept `"0x1f"` style strings. */
  parseHex?: boolean;
  /** Int: dump to JSON as a hex string. */
  dumpHex?: boolean;
  /** Int: store as a BSON Long. */
  int64?: boolean;
  /** Binary: accept base64 strings. */
  parseBase64?: boolean;
  /** UUID: required RFC 4122 version. */
  uuidVersion?: number;
  /** UUID: accept canonical strings. */
  parseStr?: boolean;
};

/** `strict: false` is used for stored and JSON data; defaults to strict. */
export type ValidateOptions = {
  strict?: boolean;
  /** Run default factories for missing values; on by default. */
  useDefaults?: boolean;
};

/**
 * Validator and codec for one declared type.
 * Subclasses implement `coerce` (type conversion) and optionally `check`
 * (constraints) and the `encode*` serializers.
 */
export abstract class Mapper<V> {
  readonly nullable: boolean;
  readonly defaultFactory: (() => unknown) | undefined;

  constructor(params: MapperParams = {}) {
    this.nullable = params.nullable ?? false;
    this.defaultFactory = params.defaultFactory;
  }

  /** Human-readable type name used in error messages. */
  abstract get typeName(): string;

  /** Convert `value` (never null/EMPTY) into the mapper's value type. */
  protected abstract coerce(value: unknown, strict: boolean): V;

  /** Constraint checks on a coerced value. */
  protected check(_value: V): void {}

  protected encodePlain(value: V): unknown {
    return value;
  }

  protected encodeJson(value: V): unknown {
    return this.encodePlain(value);
  }

  protected encodeBson(value: V): unknown {
    return this.encodePlain(value);
  }

  /**
   * Validate a raw value.
   * `undefined` and EMPTY run the default factory, which may itself yield EMPTY.
   * `null` passes only on nullable mappers.
   */
  validate(raw: unknown, options: ValidateOptions = {}): V | null | Empty {
    let value: unknown = raw === undefined ? EMPTY : raw;
    if (isEmpty(value) && this.defaultFactory && options.useDefaults !== false) {
      value = this.defaultFactory();
    }
    if (value === undefined || isEmpty(value)) return EMPTY;
    if (value === null) {
      if (this.nullable) return null;
      throw new MapperError("Null value not allowed");
    }
    const parsed = this.coerce(value, options.strict ?? true);
    this.check(parsed);
    return parsed;
  }

  /** Convert a constraint parameter the same way values are converted. */
  protected bound(raw: unknown): V | undefined {
    if (raw === undefined) return undefined;
    return this.coerce(raw, false);
  }

  dumpPlain(value: V | null): unknown {
    return value === null ? null : this.encodePlain(value);
  }

  dumpJson(value: V | null): unknown {
    return value === null ? null : this.encodeJson(value);
  }

  dumpBson(value: V | null): unknown {
    return value === null ? null : this.encodeBson(value);
  }
}

export type Bounds<B> = {
  gt?: B;
  gte?: B;
  lt?: B;
  lte?: B;
};

/** Throw a MapperError when `value` falls outside `bounds`. */
export function checkBounds<B>(
  value: B,
  bounds: Bounds<B>,
  compare: (a: B, b: B) => number,
  show: (bound: B) => string = String,
): void {
  if (bounds.gt !== undefined && compare(value, bounds.gt) <= 0) {
    throw new MapperError(`Value must be greater than ${show(bounds.gt)}`);
  }
  if (bounds.gte !== undefined && compare(value, bounds.gte) < 0) {
    throw new MapperError(
      `Value must be greater than or equal to ${show(bounds.gte)}`,
    );
  }
  if (bounds.lt !== undefined && compare(value, bounds.lt) >= 0) {
    throw new MapperError(`Value must be less than ${show(bounds.lt)}`);
  }
  if (bounds.lte !== undefined && compare(value, bounds.lte) > 0) {
    throw new MapperError(
      `Value must be less than or equal to ${show(bounds.lte)}`,
    );
  }
}

/** Throw a MapperError when a length falls outside `minLen`/`maxLen`. */
export function checkLength(
  length: number,
  minLen: number | undefined,
  maxLen: number | undefined,
  unit: string,
): void {
  if (minLen !== undefined && length < minLen) {
    throw new MapperError(`At least ${minLen} ${unit} required`);
  }
  if (maxLen !== undefined && length > maxLen) {
    throw new MapperError(`At most ${maxLen} ${unit} allowed`);
  }
}

/**
 * Ordered list of values validated by one inner mapper.
 * Every element error is collected, located at its index.
 */
export class SequenceMapper<V> extends Mapper<(V | null)[]> {
  readonly inner: Mapper<V>;
  private readonly _minLen?: number;
  private readonly _maxLen?: number;

  constructor(inner: Mapper<V>, params: MapperParams = {}) {
    super(params);
    if (inner instanceof SequenceMapper) {
      throw new SchemaError("Nested sequences are not supported");
    }
    this.inner = inner;
    this._minLen = params.minLen;
    this._maxLen = params.maxLen;
  }

  get typeName(): string {
    return `list[${this.inner.typeName}]`;
  }

  protected coerce(value: unknown, strict: boolean): (V | null)[] {
    let items: unknown[];
    if (Array.isArray(value)) {
      items = value;
    } else if (!strict && value instanceof Set) {
      items = Array.from(value);
    } else {
      throw new MapperError(
        `Invalid value type, expected a list, got ${describeType(value)}`,
      );
    }

    const out: (V | null)[] = [];
    const errors: ErrorWrapper[] = [];
    items.forEach((item, index) => {
      try {
        const parsed = this.inner.validate(item === undefined ? null : item, {
          strict,
          useDefaults: false,
        });
        if (!isEmpty(parsed)) out.push(parsed);
      } catch (error) {
        errors.push(...locateError(String(index), error).errors);
      }
    });
    if (errors.length > 0) {
      throw new ValidationError(errors);
    }
    return out;
  }

  protected override check(value: (V | null)[]): void {
    checkLength(value.length, this._minLen, this._maxLen, "item(s)");
  }

  protected override encodePlain(value: (V | null)[]): unknown {
    return value.map((item) => this.inner.dumpPlain(item));
  }

  protected override encodeJson(value: (V | null)[]): unknown {
    return value.map((item) => this.inner.dumpJson(item));
  }

  protected override encodeBson(value: (V | null)[]): unknown {
    return value.map((item) => this.inner.dumpBson(item));
  }
}

/** Document owned by its container, stored inline. */
export class EmbeddedDocumentMapper extends Mapper<BaseDocument> {
  readonly handle: DocumentHandle;

  constructor(handle: DocumentHandle, params: MapperParams = {}) {
    super(params);
    this.handle = handle;
  }

  get typeName(): string {
    return this.handle.name;
  }

  protected coerce(value: unknown, strict: boolean): BaseDocument {
    const cls = this.handle.documentType;
    if (value instanceof cls) return value;
    if (isRecord(value)) return cls.fromData(value, { strict });
    throw new MapperError(
      `Invalid value type, expected ${cls.schema.name} or a plain object, got ${describeType(value)}`,
    );
  }

  protected override encodePlain(value: BaseDocument): unknown {
    return value.toPlain();
  }

  protected override encodeJson(value: BaseDocument): unknown {
    return value.toJSON();
  }

  protected override encodeBson(value: BaseDocument): unknown {
    return value.toBson();
  }
}

/**
 * Weak reference to a document in another collection.
 * Stored as the raw BSON value of the target's `refField`.
 */
export class ReferencedDocumentMapper extends EmbeddedDocumentMapper {
  readonly refField: string;
  readonly keyName: string | undefined;

  constructor(
    handle: DocumentHandle,
    refField: string = "id",
    keyName?: string,
    params: MapperParams = {},
  ) {
    super(handle, params);
    this.refField = refField;
    this.keyName = keyName;
  }

  /** The target's ref field; a SchemaError when the target has no such field. */
  get refFieldDef(): Field {
    const cls = this.handle.documentType;
    const field = cls.schema.fields.get(this.refField);
    if (!field) {
      throw new SchemaError(
        `Field \`${this.refField}\` not found in document \`${cls.schema.name}\``,
      );
    }
    return field;
  }

  protected override check(value: BaseDocument): void {
    const refValue = value.get(this.refFieldDef.name);
    if (refValue === null || isEmpty(refValue)) {
      throw new MapperError(
        `Referenced document field \`${this.refField}\` is empty`,
      );
    }
  }

  protected override encodeBson(value: BaseDocument): unknown {
    const field = this.refFieldDef;
    return field.mapper.dumpBson(value.get(field.name));
  }
}

/** Innermost mapper of a (possibly sequence-wrapped) mapper. */
export function unwrapSequence(mapper: Mapper<unknown>): {
  mapper: Mapper<unknown>;
  isMany: boolean;
} {
  if (mapper instanceof SequenceMapper) {
    return { mapper: mapper.inner, isMany: true };
  }
  return { mapper, isMany: false };
}

export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Date) return "Date";
  if (typeof value === "object") {
    return value.constructor?.name ?? "object";
  }
  return typeof value;
}
