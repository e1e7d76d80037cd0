import {
  BSON,
  Decimal128,
  Double,
  Int32,
  Long,
  ObjectId,
  type Document,
} from "mongodb";
import type { IndexModel } from "../core/field";
import { isRecord } from "../core/safeObject";
import type { DocumentStore, StoreSession } from "../sources/documentStore";

export type StoreOperation = {
  op: "upsert" | "pull" | "delete";
  collection: string;
  filter: Document;
};

type Vars = Record<string, unknown>;

/** Copy through the BSON codec, the way a real store returns documents. */
function clone(doc: Document): Document {
  return BSON.deserialize(BSON.serialize(doc));
}

function canonical(value: unknown): string {
  return BSON.EJSON.stringify({ v: value }, { relaxed: false });
}

function numeric(value: unknown): number | undefined {
  if (typeof value === "number") return value;
  if (value instanceof Int32 || value instanceof Double) return value.valueOf();
  if (value instanceof Long) return value.toNumber();
  if (value instanceof Decimal128) return Number(value.toString());
  return undefined;
}

/** BSON value equality, numbers compared across numeric types. */
export function bsonEquals(a: unknown, b: unknown): boolean {
  const left = numeric(a);
  const right = numeric(b);
  if (left !== undefined && right !== undefined) return left === right;
  if ((a === undefined || a === null) && (b === undefined || b === null)) return true;
  return canonical(a) === canonical(b);
}

function orderKey(value: unknown): number | string | undefined {
  const num = numeric(value);
  if (num !== undefined) return num;
  if (typeof value === "string") return value;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (value instanceof Date) return value.getTime();
  if (value instanceof ObjectId) return value.toHexString();
  return undefined;
}

/** Ordering of comparable BSON values; undefined when the types do not compare. */
function compareBson(a: unknown, b: unknown): number | undefined {
  const left = orderKey(a);
  const right = orderKey(b);
  if (left === undefined || right === undefined || typeof left !== typeof right) {
    return undefined;
  }
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function getPath(doc: unknown, path: string): unknown {
  let current: unknown = doc;
  for (const segment of path.split(".")) {
    if (Array.isArray(current)) {
      current = current.flatMap((item) => {
        const value = isRecord(item) ? item[segment] : undefined;
        return value === undefined ? [] : [value];
      });
      continue;
    }
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

function candidates(value: unknown): unknown[] {
  return Array.isArray(value) ? [value, ...value] : [value];
}

function matchesOperator(value: unknown, op: string, operand: unknown): boolean {
  switch (op) {
    case "$eq":
      return candidates(value).some((item) => bsonEquals(item, operand));
    case "$ne":
      return !matchesOperator(value, "$eq", operand);
    case "$in":
      return (
        Array.isArray(operand) &&
        operand.some((option) => matchesOperator(value, "$eq", option))
      );
    case "$nin":
      return !matchesOperator(value, "$in", operand);
    case "$gt":
    case "$gte":
    case "$lt":
    case "$lte":
      return candidates(value).some((item) => {
        const order = compareBson(item, operand);
        if (order === undefined) return false;
        if (op === "$gt") return order > 0;
        if (op === "$gte") return order >= 0;
        if (op === "$lt") return order < 0;
        return order <= 0;
      });
    case "$exists":
      return operand ? value !== undefined : value === undefined;
    case "$regex": {
      const pattern = operand instanceof RegExp ? operand : new RegExp(String(operand));
      return candidates(value).some((item) => typeof item === "string" && pattern.test(item));
    }
    default:
      throw new Error(`MemoryStore does not support query operator ${op}`);
  }
}

function evaluate(expr: unknown, doc: Document, vars: Vars): unknown {
  if (typeof expr === "string") {
    if (expr.startsWith("$$")) return vars[expr.slice(2)];
    if (expr.startsWith("$")) return getPath(doc, expr.slice(1));
    return expr;
  }
  if (Array.isArray(expr)) {
    return expr.map((item) => evaluate(item, doc, vars));
  }
  if (!isRecord(expr)) return expr;
  const [op] = Object.keys(expr);
  if (op === undefined || !op.startsWith("$")) return expr;
  const args = evaluate(expr[op], doc, vars);
  const list = Array.isArray(args) ? args : [args];
  switch (op) {
    case "$eq":
      return bsonEquals(list[0], list[1]);
    case "$in": {
      const [needle, haystack] = list;
      if (!Array.isArray(haystack)) {
        throw new Error("$in requires an array as its second argument");
      }
      return haystack.some((item) => bsonEquals(item, needle));
    }
    case "$ifNull":
      return list[0] === null || list[0] === undefined ? list[1] : list[0];
    case "$and":
      return list.every(Boolean);
    case "$or":
      return list.some(Boolean);
    default:
      throw new Error(`MemoryStore does not support expression operator ${op}`);
  }
}

/** Mongo-style filter match, with `$expr` evaluated against `vars`. */
export function matchesFilter(doc: Document, filter: Document, vars: Vars = {}): boolean {
  for (const [key, condition] of Object.entries(filter)) {
    switch (key) {
      case "$and":
        if (!asFilters(condition).every((sub) => matchesFilter(doc, sub, vars))) return false;
        continue;
      case "$or":
        if (!asFilters(condition).some((sub) => matchesFilter(doc, sub, vars))) return false;
        continue;
      case "$nor":
        if (asFilters(condition).some((sub) => matchesFilter(doc, sub, vars))) return false;
        continue;
      case "$expr":
        if (!evaluate(condition, doc, vars)) return false;
        continue;
    }
    const value = getPath(doc, key);
    if (isOperatorObject(condition)) {
      for (const [op, operand] of Object.entries(condition)) {
        if (!matchesOperator(value, op, operand)) return false;
      }
    } else if (!matchesOperator(value, "$eq", condition)) {
      return false;
    }
  }
  return true;
}

function asFilters(value: unknown): Document[] {
  if (!Array.isArray(value)) {
    throw new Error("Logical query operators take an array of filters");
  }
  return value.filter(isRecord);
}

function isOperatorObject(value: unknown): value is Document {
  if (!isRecord(value)) return false;
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every((key) => key.startsWith("$"));
}

function sortDocuments(docs: Document[], spec: Document): Document[] {
  const keys = Object.entries(spec);
  return [...docs].sort((a, b) => {
    for (const [path, direction] of keys) {
      const left = getPath(a, path);
      const right = getPath(b, path);
      let order = compareBson(left, right);
      if (order === undefined) {
        const leftMissing = left === undefined || left === null;
        const rightMissing = right === undefined || right === null;
        order = leftMissing === rightMissing ? 0 : leftMissing ? -1 : 1;
      }
      if (order !== 0) return direction === -1 ? -order : order;
    }
    return 0;
  });
}

function unwind(docs: Document[], spec: unknown): Document[] {
  const options = typeof spec === "string" ? { path: spec } : isRecord(spec) ? spec : {};
  const path = String(options.path ?? "").replace(/^\$/, "");
  const preserve = options.preserveNullAndEmptyArrays === true;
  return docs.flatMap((doc) => {
    const value = doc[path];
    if (Array.isArray(value) && value.length > 0) {
      return value.map((item) => ({ ...doc, [path]: item }));
    }
    if (Array.isArray(value) || value === undefined || value === null) {
      if (!preserve) return [];
      if (Array.isArray(value)) {
        const rest = { ...doc };
        delete rest[path];
        return [rest];
      }
      return [doc];
    }
    return [doc];
  });
}

/**
 * In-process document store for tests.
 * Executes the aggregation subset the query builder emits; transactions snapshot and restore.
 */
export class MemoryStore implements DocumentStore {
  readonly __STORE__: true = true;
  readonly identifier: string;
  readonly operations: StoreOperation[] = [];
  readonly indexes = new Map<string, IndexModel[]>();
  private _collections = new Map<string, Document[]>();
  private _failures = new Set<string>();
  private _transactions = 0;

  constructor(identifier: string = "memory") {
    this.identifier = identifier;
  }

  /** Make every later `op` on `collection` reject. */
  failOn(collection: string, op: StoreOperation["op"]): void {
    this._failures.add(`${op}:${collection}`);
  }

  get transactionCount(): number {
    return this._transactions;
  }

  /** Stored documents of `collection`, as copies. */
  documents(collection: string): Document[] {
    return (this._collections.get(collection) ?? []).map(clone);
  }

  /** Insert raw documents directly, bypassing the engine. */
  seed(collection: string, docs: Document[]): void {
    this._rows(collection).push(...docs.map(clone));
  }

  private _rows(collection: string): Document[] {
    let rows = this._collections.get(collection);
    if (!rows) {
      rows = [];
      this._collections.set(collection, rows);
    }
    return rows;
  }

  private _record(op: StoreOperation["op"], collection: string, filter: Document): void {
    if (this._failures.has(`${op}:${collection}`)) {
      throw new Error(`Injected ${op} failure on ${collection}`);
    }
    this.operations.push({ op, collection, filter });
  }

  async upsertOne(
    collection: string,
    filter: Document,
    fields: Document,
    _session?: StoreSession,
  ): Promise<void> {
    this._record("upsert", collection, filter);
    const rows = this._rows(collection);
    const index = rows.findIndex((row) => matchesFilter(row, filter));
    if (index === -1) {
      const seed: Document = {};
      for (const [key, value] of Object.entries(filter)) {
        if (!key.startsWith("$") && !isOperatorObject(value)) seed[key] = value;
      }
      rows.push(clone({ ...seed, ...fields }));
      return;
    }
    const row = rows[index];
    if (row) rows[index] = clone({ ...row, ...fields });
  }

  async pullOne(
    collection: string,
    filter: Document,
    key: string,
    value: unknown,
    _session?: StoreSession,
  ): Promise<Document | undefined> {
    this._record("pull", collection, filter);
    const rows = this._rows(collection);
    const index = rows.findIndex((row) => matchesFilter(row, filter));
    const row = rows[index];
    if (!row) return undefined;
    const items: unknown = row[key];
    if (Array.isArray(items)) {
      row[key] = items.filter((item) => !bsonEquals(item, value));
    }
    return clone(row);
  }

  async deleteOne(
    collection: string,
    filter: Document,
    _session?: StoreSession,
  ): Promise<number> {
    this._record("delete", collection, filter);
    const rows = this._rows(collection);
    const index = rows.findIndex((row) => matchesFilter(row, filter));
    if (index === -1) return 0;
    rows.splice(index, 1);
    return 1;
  }

  async deleteMany(
    collection: string,
    filter: Document,
    _session?: StoreSession,
  ): Promise<number> {
    this._record("delete", collection, filter);
    const rows = this._rows(collection);
    const kept = rows.filter((row) => !matchesFilter(row, filter));
    this._collections.set(collection, kept);
    return rows.length - kept.length;
  }

  async count(
    collection: string,
    filter: Document,
    _session?: StoreSession,
  ): Promise<number> {
    return this._rows(collection).filter((row) => matchesFilter(row, filter)).length;
  }

  async *aggregate(
    collection: string,
    pipeline: Document[],
    _session?: StoreSession,
  ): AsyncIterable<Document> {
    const docs = this._run(this._rows(collection).map(clone), pipeline, {});
    for (const doc of docs) {
      yield doc;
    }
  }

  private _run(docs: Document[], pipeline: Document[], vars: Vars): Document[] {
    let current = docs;
    for (const stage of pipeline) {
      const [name] = Object.keys(stage);
      const spec: unknown = name === undefined ? undefined : stage[name];
      switch (name) {
        case "$match":
          current = current.filter((doc) => isRecord(spec) && matchesFilter(doc, spec, vars));
          break;
        case "$sort":
          current = isRecord(spec) ? sortDocuments(current, spec) : current;
          break;
        case "$skip":
          current = current.slice(Number(spec));
          break;
        case "$limit":
          current = current.slice(0, Number(spec));
          break;
        case "$unwind":
          current = unwind(current, spec);
          break;
        case "$lookup":
          current = current.map((doc) => this._lookup(doc, spec));
          break;
        default:
          throw new Error(`MemoryStore does not support pipeline stage ${name}`);
      }
    }
    return current;
  }

  private _lookup(doc: Document, spec: unknown): Document {
    if (!isRecord(spec) || typeof spec.from !== "string" || typeof spec.as !== "string") {
      throw new Error("$lookup requires `from` and `as`");
    }
    const vars: Vars = {};
    if (isRecord(spec.let)) {
      for (const [name, expr] of Object.entries(spec.let)) {
        vars[name] = evaluate(expr, doc, {});
      }
    }
    const inner = Array.isArray(spec.pipeline) ? spec.pipeline.filter(isRecord) : [];
    const rows = this._collections.get(spec.from) ?? [];
    const joined = this._run(rows.map(clone), inner, vars);
    return { ...doc, [spec.as]: joined };
  }

  async listCollectionNames(): Promise<string[]> {
    return Array.from(this._collections.keys());
  }

  async createCollection(name: string, _options?: Document): Promise<void> {
    if (this._collections.has(name)) {
      throw new Error(`Collection ${name} already exists`);
    }
    this._collections.set(name, []);
  }

  async createIndexes(collection: string, indexes: IndexModel[]): Promise<void> {
    this.indexes.set(collection, [...(this.indexes.get(collection) ?? []), ...indexes]);
  }

  async withTransaction<T>(fn: (session: StoreSession) => Promise<T>): Promise<T> {
    this._transactions += 1;
    const snapshot = new Map<string, Document[]>();
    for (const [name, rows] of this._collections) {
      snapshot.set(name, rows.map(clone));
    }
    try {
      return await fn({ transaction: this._transactions });
    } catch (error) {
      this._collections = snapshot;
      throw error;
    }
  }
}
