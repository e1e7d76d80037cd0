import { Result } from "@fkws/klonk-result";
import { BSON, type Document } from "mongodb";
import type { BaseDocument, DocumentClass } from "./document";
import { isEmpty } from "./empty";
import { toError } from "./errors";
import { compileDereferencePipeline } from "./references";
import { isRecord } from "./safeObject";
import type { DocumentStore, StoreSession } from "../sources/documentStore";
import {
  and,
  toFilter,
  toSort,
  type QueryComponent,
  type SortComponent,
} from "./queryFns";

/** Canonical string of a BSON value, used to compare stored keys. */
export function bsonKey(value: unknown): string {
  return BSON.EJSON.stringify({ v: value }, { relaxed: false });
}

/**
 * Builds and executes a query against one document collection.
 * Use `filter(...)` to add filters and `fetch()` to execute.
 */
export class QueryBuilder<D extends BaseDocument> {
  private _components: QueryComponent[] = [];
  private _sort: SortComponent[] = [];
  private _skip?: number;
  private _limit?: number;
  private _depth = 0;
  private _session?: StoreSession;

  constructor(
    private readonly _cls: DocumentClass<D>,
    private readonly _store: DocumentStore,
  ) {}

  /**
   * Add filter components; several calls are combined with AND.
   * Next: call `.fetch()`, `.first()` or `.count()` to execute.
   */
  filter(...components: QueryComponent[]): QueryBuilder<D> {
    this._components.push(...components);
    return this;
  }

  /** Sort by the given components, earlier ones first. */
  sort(...components: SortComponent[]): QueryBuilder<D> {
    this._sort.push(...components);
    return this;
  }

  skip(count: number): QueryBuilder<D> {
    this._skip = count;
    return this;
  }

  limit(count: number): QueryBuilder<D> {
    this._limit = count;
    return this;
  }

  /** Join referenced documents up to `depth` levels deep. */
  dereference(depth: number = 1): QueryBuilder<D> {
    this._depth = depth;
    return this;
  }

  /** Run inside a store session (see `engine.transaction(...)`). */
  session(session: StoreSession | undefined): QueryBuilder<D> {
    this._session = session;
    return this;
  }

  private get _collection(): string {
    const { collectionName, name } = this._cls.schema;
    if (collectionName === undefined) {
      throw new Error(`Embedded document \`${name}\` has no collection`);
    }
    return collectionName;
  }

  /** Store filter document of the current components. */
  toFilter(): Document {
    const [only] = this._components;
    if (this._components.length === 1 && only) return toFilter(only);
    if (this._components.length === 0) return {};
    return toFilter(and(...this._components));
  }

  /** Aggregation pipeline: match, sort, skip, limit, then the reference lookups. */
  pipeline(): Document[] {
    const stages: Document[] = [];
    const filter = this.toFilter();
    if (Object.keys(filter).length > 0) stages.push({ $match: filter });
    if (this._sort.length > 0) stages.push({ $sort: toSort(this._sort) });
    if (this._skip !== undefined) stages.push({ $skip: this._skip });
    if (this._limit !== undefined) stages.push({ $limit: this._limit });
    stages.push(
      ...compileDereferencePipeline(this._cls.schema.references.values(), this._depth),
    );
    return stages;
  }

  /** Stream matching documents; validation failures are thrown. */
  async *stream(): AsyncGenerator<D> {
    const raws = this._store.aggregate(this._collection, this.pipeline(), this._session);
    for await (const raw of raws) {
      yield this._materialize(raw);
    }
  }

  /** Execute the query and return every matching document. */
  async fetch(): Promise<Result<D[]>> {
    try {
      const docs: D[] = [];
      for await (const doc of this.stream()) {
        docs.push(doc);
      }
      return new Result({ success: true, data: docs });
    } catch (error) {
      return new Result({ success: false, error: toError(error) });
    }
  }

  /** Execute with `limit(1)`; fails when nothing matches. */
  async first(): Promise<Result<D>> {
    this._limit = 1;
    const result = await this.fetch();
    if (result.isErr()) {
      return new Result({ success: false, error: result.error });
    }
    const [doc] = result.unwrap();
    if (!doc) {
      return new Result({
        success: false,
        error: new Error(
          `first() expected one ${this._cls.schema.name} but query returned 0.`,
        ),
      });
    }
    return new Result({ success: true, data: doc });
  }

  /** Fetch the document with the given identity value. */
  async get(id: unknown): Promise<Result<D>> {
    const idField = this._cls.schema.idField;
    if (!idField) {
      return new Result({
        success: false,
        error: new Error(`Document \`${this._cls.schema.name}\` has no identity field`),
      });
    }
    let key: unknown;
    try {
      const value = idField.validate(id, { strict: false, useDefaults: false });
      key = isEmpty(value) ? null : idField.mapper.dumpBson(value);
    } catch (error) {
      return new Result({ success: false, error: toError(error) });
    }
    this._components = [{ type: "comparison", operator: "=", property: idField.alias, value: key }];
    return this.first();
  }

  /** Count matching documents; skip, limit and dereference are ignored. */
  async count(): Promise<Result<number>> {
    try {
      const total = await this._store.count(this._collection, this.toFilter(), this._session);
      return new Result({ success: true, data: total });
    } catch (error) {
      return new Result({ success: false, error: toError(error) });
    }
  }

  private _materialize(raw: Document): D {
    for (const ref of this._cls.schema.references.values()) {
      if (!ref.isMany) continue;
      const keys = raw[ref.keyName];
      const joined = raw[ref.alias];
      if (!Array.isArray(keys) || !Array.isArray(joined)) continue;
      raw[ref.alias] = orderByKeys(joined, keys, ref.refField.alias);
    }
    return this._cls.fromData(raw, { strict: false });
  }
}

/** Reorder joined documents to follow the stored key order; unmatched keys are dropped. */
function orderByKeys(joined: unknown[], keys: unknown[], refAlias: string): unknown[] {
  const byKey = new Map<string, unknown>();
  for (const doc of joined) {
    if (isRecord(doc)) byKey.set(bsonKey(doc[refAlias]), doc);
  }
  const ordered: unknown[] = [];
  for (const key of keys) {
    const doc = byKey.get(bsonKey(key));
    if (doc !== undefined) ordered.push(doc);
  }
  return ordered;
}
