import { Result } from "@fkws/klonk-result";
import { settleConcurrent, rejections } from "../core/concurrency";
import { BaseDocument, collectIndexes, type DocumentClass, type DocumentSchema } from "../core/document";
import { defaultDocuments } from "../core/defaults";
import { isEmpty } from "../core/empty";
import { CascadeError, DocumentTypeError, EngineError, toError } from "../core/errors";
import { QueryBuilder, bsonKey } from "../core/query";
import { eq, or } from "../core/queryFns";
import { reverseReferences, type Reference } from "../core/references";
import type { DocumentRegistry } from "../core/registry";
import { FileStorage } from "../depot/fileStorage";
import type { BlobStore } from "../depot/blobStore";
import { readConfig, type TesseraConfig } from "../runtime/config";
import type { DocumentStore, StoreSession } from "./documentStore";
import { KeyedLocker } from "./locker";

export type EngineOptions = {
  /** Cascade branches persisted at once. */
  cascadeConcurrency?: number;
  /** Wait limit for the per-collection materialisation lock. */
  lockTimeoutMs?: number;
  /** Run every cascading save/delete inside one store transaction. */
  atomicCascade?: boolean;
  debug?: boolean;
  /** Blob store backing `files()`. */
  blobs?: BlobStore;
  /** Registry the `FsFile` document of `files()` is declared in. */
  registry?: DocumentRegistry;
  /** Base settings; defaults to `readConfig()`. Explicit options win. */
  config?: TesseraConfig;
};

export type MutationOptions = {
  /** Follow references: children first on save, referencing documents first on delete. */
  cascade?: boolean;
  /** Session of an enclosing `engine.transaction(...)`. */
  session?: StoreSession;
};

type Operation = "save" | "delete";

/**
 * Binds document classes to a document store.
 * Use `tessera.engine(store, options)` to create one.
 * Next: call `save(...)`, `delete(...)` or `objects(...)`.
 */
export class Engine {
  readonly __ENGINE__: true = true;
  private readonly _locker: KeyedLocker;
  private readonly _materialised = new Set<string>();
  private readonly _concurrency: number;
  private readonly _atomic: boolean;
  private readonly _debug: boolean;
  private readonly _blobs?: BlobStore;
  private readonly _lockTimeoutMs: number;
  private readonly _registry: DocumentRegistry;

  constructor(
    private readonly _store: DocumentStore,
    options: EngineOptions = {},
  ) {
    const config = options.config ?? readConfig();
    this._concurrency = options.cascadeConcurrency ?? config.cascadeConcurrency;
    if (!Number.isInteger(this._concurrency) || this._concurrency < 1) {
      throw new EngineError(
        `cascadeConcurrency must be a positive integer, got ${this._concurrency}`,
      );
    }
    this._lockTimeoutMs = options.lockTimeoutMs ?? config.lockTimeoutMs;
    this._atomic = options.atomicCascade ?? config.atomicCascade;
    this._debug = options.debug ?? config.debug;
    this._blobs = options.blobs;
    this._registry = options.registry ?? defaultDocuments;
    this._locker = new KeyedLocker(this._lockTimeoutMs);
  }

  get store(): DocumentStore {
    return this._store;
  }

  /**
   * Start a query over a full document type.
   * Next: chain `.filter(...)` and call `.fetch()`.
   */
  objects<D extends BaseDocument>(cls: DocumentClass<D>): QueryBuilder<D> {
    this._collectionOf(cls.schema);
    return new QueryBuilder(cls, this._store);
  }

  /**
   * Upsert `doc`; with `cascade`, referenced documents are saved first.
   * Throws DocumentTypeError synchronously for embedded or foreign instances.
   */
  save<D extends BaseDocument>(doc: D, options: MutationOptions = {}): Promise<Result<D>> {
    this._checkDocument(doc);
    return this._mutate("save", doc, false, options, (session) =>
      this._save(doc, options.cascade ?? false, session, new Set()),
    );
  }

  /**
   * Delete `doc`; with `cascade`, documents referencing it are deleted or
   * shrunk first.
   */
  delete<D extends BaseDocument>(doc: D, options: MutationOptions = {}): Promise<Result<D>> {
    this._checkDocument(doc);
    return this._mutate("delete", doc, false, options, (session) =>
      this._delete(doc, options.cascade ?? false, session, new Set()),
    );
  }

  /** Save several documents concurrently; one failure fails the whole call. */
  saveAll<D extends BaseDocument>(docs: D[], options: MutationOptions = {}): Promise<Result<D[]>> {
    for (const doc of docs) this._checkDocument(doc);
    return this._mutate("save", docs, true, options, (session) => {
      const visited = new Set<string>();
      return this._fanOut("save", docs, (doc) =>
        this._save(doc, options.cascade ?? false, session, visited),
      );
    });
  }

  deleteAll<D extends BaseDocument>(docs: D[], options: MutationOptions = {}): Promise<Result<D[]>> {
    for (const doc of docs) this._checkDocument(doc);
    return this._mutate("delete", docs, true, options, (session) => {
      const visited = new Set<string>();
      return this._fanOut("delete", docs, (doc) =>
        this._delete(doc, options.cascade ?? false, session, visited),
      );
    });
  }

  /**
   * Run `fn` inside a store transaction.
   * Next: pass the session to `save`, `delete` and `objects(...).session(...)`.
   */
  async transaction<T>(fn: (session: StoreSession) => Promise<T>): Promise<Result<T>> {
    try {
      const data = await this._store.withTransaction(fn);
      return new Result({ success: true, data });
    } catch (error) {
      return new Result({ success: false, error: toError(error) });
    }
  }

  /** Create the collection and its indexes once per engine. */
  async ensureCollection(cls: DocumentClass): Promise<string> {
    return this._materialise(cls.schema);
  }

  /**
   * File storage over the configured blob store.
   * Throws EngineError when the engine was built without `blobs`.
   */
  files(): FileStorage {
    if (!this._blobs) {
      throw new EngineError("No blob store configured, pass `blobs` to the engine");
    }
    return new FileStorage(this._blobs, this._registry);
  }

  async close(): Promise<void> {
    await this._store.close?.();
  }

  private _checkDocument(doc: unknown): asserts doc is BaseDocument {
    if (!(doc instanceof BaseDocument)) {
      throw new DocumentTypeError(
        `Expected a document instance, got ${doc === null ? "null" : typeof doc}`,
      );
    }
    if (doc.schema.embedded) {
      throw new DocumentTypeError(
        `Embedded document \`${doc.schema.name}\` cannot be saved or deleted on its own`,
      );
    }
  }

  private _collectionOf(schema: DocumentSchema): string {
    if (schema.embedded || schema.collectionName === undefined) {
      throw new DocumentTypeError(
        `Embedded document \`${schema.name}\` has no collection`,
      );
    }
    return schema.collectionName;
  }

  private _log(message: string): void {
    if (this._debug) {
      console.debug(`[tessera] ${message}`);
    }
  }

  private async _mutate<T>(
    operation: Operation,
    data: T,
    bulk: boolean,
    options: MutationOptions,
    work: (session: StoreSession | undefined) => Promise<void>,
  ): Promise<Result<T>> {
    const cascading = options.cascade === true || bulk;
    const atomic = this._atomic && cascading && options.session === undefined;
    try {
      if (atomic) {
        await this._store.withTransaction((session) => work(session));
      } else {
        await work(options.session);
      }
      return new Result({ success: true, data });
    } catch (error) {
      if (error instanceof CascadeError && !atomic && options.session === undefined) {
        console.warn(
          `[tessera] cascade ${operation} failed in ${error.errors.length} branch(es); completed writes were kept.`,
        );
      }
      return new Result({ success: false, error: toError(error) });
    }
  }

  private async _fanOut<D>(
    operation: Operation,
    items: readonly D[],
    fn: (item: D) => Promise<void>,
  ): Promise<void> {
    const results = await settleConcurrent(items, this._concurrency, fn);
    const failed = rejections(results).flatMap((error) =>
      error instanceof CascadeError ? error.errors : [error],
    );
    if (failed.length > 0) {
      throw new CascadeError(operation, failed);
    }
  }

  private async _materialise(schema: DocumentSchema): Promise<string> {
    const name = this._collectionOf(schema);
    if (this._materialised.has(name)) return name;
    await this._locker.run(
      `collection:${name}`,
      async () => {
        if (this._materialised.has(name)) return;
        const existing = await this._store.listCollectionNames();
        if (!existing.includes(name)) {
          await this._store.createCollection(name);
          this._log(`created collection ${name}`);
        }
        const indexes = collectIndexes(schema);
        if (indexes.length > 0) {
          await this._store.createIndexes(name, indexes);
          this._log(`created ${indexes.length} index(es) on ${name}`);
        }
        this._materialised.add(name);
      },
      this._lockTimeoutMs,
    );
    return name;
  }

  private _identity(doc: BaseDocument): unknown {
    const idField = doc.schema.idField;
    const value = idField ? doc.get(idField.name) : undefined;
    if (!idField || value === null || value === undefined || isEmpty(value)) {
      throw new EngineError(`Document \`${doc.schema.name}\` has no identity value`);
    }
    return idField.mapper.dumpBson(value);
  }

  private _visitKey(doc: BaseDocument): string {
    return `${this._collectionOf(doc.schema)}:${bsonKey(this._identity(doc))}`;
  }

  private async _save(
    doc: BaseDocument,
    cascade: boolean,
    session: StoreSession | undefined,
    visited: Set<string>,
  ): Promise<void> {
    const key = this._visitKey(doc);
    if (visited.has(key)) return;
    visited.add(key);

    if (cascade) {
      await this._fanOut("save", referencedDocuments(doc), (child) =>
        this._save(child, true, session, visited),
      );
    }

    const collection = await this._materialise(doc.schema);
    const { _id, ...fields } = doc.toBson();
    this._log(`save ${key}`);
    await this._store.upsertOne(collection, { _id }, fields, session);
  }

  private async _delete(
    doc: BaseDocument,
    cascade: boolean,
    session: StoreSession | undefined,
    visited: Set<string>,
  ): Promise<void> {
    const key = this._visitKey(doc);
    if (visited.has(key)) return;
    visited.add(key);

    if (cascade) {
      const tasks: (() => Promise<void>)[] = [];
      const target = doc.schema.registry.resolve(doc.schema.name);
      for (const [cls, refs] of reverseReferences(target, doc.schema.registry)) {
        const edges = refs.flatMap((ref) => {
          const value = doc.get(ref.refField.name);
          if (value === null || isEmpty(value)) return [];
          return [{ ref, stored: ref.refField.mapper.dumpBson(value) }];
        });
        if (edges.length === 0) continue;
        const found = await this.objects(cls)
          .filter(or(...edges.map((edge) => eq(edge.ref.keyName, edge.stored))))
          .dereference(1)
          .session(session)
          .fetch();
        if (found.isErr()) {
          throw found.error;
        }
        for (const other of found.unwrap()) {
          tasks.push(() => this._detach(other, edges, session, visited));
        }
      }
      await this._fanOut("delete", tasks, (task) => task());
    }

    const collection = this._collectionOf(doc.schema);
    this._log(`delete ${key}`);
    await this._store.deleteOne(collection, { _id: this._identity(doc) }, session);
  }

  /**
   * Drop the deleted target from a referencing document. A matching single
   * edge deletes it; list edges are pulled in the store and a list left
   * empty deletes it.
   */
  private async _detach(
    other: BaseDocument,
    edges: { ref: Reference; stored: unknown }[],
    session: StoreSession | undefined,
    visited: Set<string>,
  ): Promise<void> {
    const held = edges.filter(({ ref, stored }) => {
      const target = bsonKey(stored);
      const value = other.get(ref.name);
      const items = ref.isMany && Array.isArray(value) ? value : [value];
      return items.some((item) => item instanceof BaseDocument && refKey(ref, item) === target);
    });
    let condemned = held.some(({ ref }) => !ref.isMany);
    if (!condemned) {
      const collection = this._collectionOf(other.schema);
      const filter = { _id: this._identity(other) };
      for (const { ref, stored } of held) {
        this._log(`pull ${bsonKey(stored)} from ${this._visitKey(other)} ${ref.keyName}`);
        const updated = await this._store.pullOne(collection, filter, ref.keyName, stored, session);
        if (!updated) return;
        const left: unknown = updated[ref.keyName];
        if (Array.isArray(left) && left.length === 0) condemned = true;
      }
    }
    if (condemned) {
      await this._delete(other, true, session, visited);
    }
  }
}

/** Live referenced instances of `doc`, across fields and list elements. */
function referencedDocuments(doc: BaseDocument): BaseDocument[] {
  const children: BaseDocument[] = [];
  for (const ref of doc.schema.references.values()) {
    const value = doc.get(ref.name);
    const items = Array.isArray(value) ? value : [value];
    for (const item of items) {
      if (item instanceof BaseDocument) children.push(item);
    }
  }
  return children;
}

function refKey(ref: Reference, doc: BaseDocument): string | undefined {
  const value = doc.get(ref.refField.name);
  if (value === null || isEmpty(value)) return undefined;
  return bsonKey(ref.refField.mapper.dumpBson(value));
}
