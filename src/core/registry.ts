import { SchemaError, TypeResolutionError } from "./errors";
import type { DocumentClass } from "./document";
import type { Mapper, MapperParams } from "./mapper";

/**
 * Ordered name → value registry.
 * Resolving an unknown name throws a TypeResolutionError carrying that name.
 */
export class TypeRegistry<V> {
  private _entries = new Map<string, V>();

  constructor(readonly kind: string) {}

  /** Register `value` under `name`; a second registration of the same name is a SchemaError. */
  register(name: string, value: V): void {
    if (this._entries.has(name)) {
      throw new SchemaError(
        `${this.kind} \`${name}\` already defined, please use a different name`,
      );
    }
    this._entries.set(name, value);
  }

  has(name: string): boolean {
    return this._entries.has(name);
  }

  get(name: string): V | undefined {
    return this._entries.get(name);
  }

  resolve(name: string): V {
    const value = this._entries.get(name);
    if (value === undefined) {
      throw new TypeResolutionError(name);
    }
    return value;
  }

  /** Registered values in insertion order. */
  all(): V[] {
    return Array.from(this._entries.values());
  }

  names(): string[] {
    return Array.from(this._entries.keys());
  }

  /** Drop every registration. Meant for tests. */
  reset(): void {
    this._entries.clear();
  }
}

/** Hooks a pending handle exposes so `finalize()` can resolve it eagerly. */
export interface PendingResolution {
  /** Resolve the handle now; throws TypeResolutionError when it cannot. */
  check(): void;
}

/**
 * Registry of document and embedded document classes keyed by declared name.
 * Next: pass it to `tessera.document(...)` and `tessera.engine(...)` to keep tests isolated.
 */
export class DocumentRegistry extends TypeRegistry<DocumentClass> {
  private _pending: PendingResolution[] = [];

  constructor() {
    super("Document");
  }

  /** Track a forward reference that must resolve before `finalize()` returns. */
  track(pending: PendingResolution): void {
    this._pending.push(pending);
  }

  /** Full (non-embedded) documents, in registration order. */
  documents(): DocumentClass[] {
    return this.all().filter((cls) => !cls.schema.embedded);
  }

  /**
   * Resolve every pending forward reference and check every reference's ref field.
   * Throws the first TypeResolutionError found.
   */
  finalize(): void {
    for (const pending of this._pending) {
      pending.check();
    }
    this._pending = [];
  }

  override reset(): void {
    super.reset();
    this._pending = [];
  }
}

/** Builds a mapper for one scalar type key from the field's mapper parameters. */
export type MapperBuilder = (params: MapperParams) => Mapper<unknown>;

/** Anything a mapper builder can be registered under: a type token or a constructor. */
export type MapperKey = { readonly name: string };

/**
 * Registry of mapper builders keyed by the type token or constructor they bind to.
 */
export class MapperRegistry {
  private _builders = new Map<MapperKey, MapperBuilder>();

  register(key: MapperKey, builder: MapperBuilder): void {
    if (this._builders.has(key)) {
      throw new SchemaError(`Mapper for \`${key.name}\` already registered`);
    }
    this._builders.set(key, builder);
  }

  has(key: MapperKey): boolean {
    return this._builders.has(key);
  }

  resolve(key: MapperKey): MapperBuilder {
    const builder = this._builders.get(key);
    if (!builder) {
      throw new TypeResolutionError(
        key.name,
        `No mapper registered for type \`${key.name}\``,
      );
    }
    return builder;
  }

  all(): MapperKey[] {
    return Array.from(this._builders.keys());
  }

  reset(): void {
    this._builders.clear();
  }
}

/**
 * Handle to a document class that may be declared later.
 * Holds either the class itself or its name; the name is resolved through the
 * registry the first time `documentType` is read.
 */
export class DocumentHandle implements PendingResolution {
  readonly name: string;
  private _resolved?: DocumentClass;

  constructor(
    target: DocumentClass | string,
    private readonly _registry: DocumentRegistry,
  ) {
    if (typeof target === "string") {
      this.name = target;
      _registry.track(this);
    } else {
      this.name = target.schema.name;
      this._resolved = target;
    }
  }

  get isResolved(): boolean {
    return this._resolved !== undefined;
  }

  get documentType(): DocumentClass {
    if (!this._resolved) {
      this._resolved = this._registry.resolve(this.name);
    }
    return this._resolved;
  }

  check(): void {
    void this.documentType;
  }
}
