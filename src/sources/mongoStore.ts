import {
  ClientSession,
  MongoClient,
  type Db,
  type Document,
  type MongoClientOptions,
} from "mongodb";
import { EngineError } from "../core/errors";
import type { IndexModel } from "../core/field";
import type { DocumentStore, StoreSession } from "./documentStore";

const FORBIDDEN_DATABASE_CHARS = ["/", "\\", ".", '"', "$"];

/** Reject database names the server refuses. */
export function checkDatabaseName(database: string): void {
  const forbidden = FORBIDDEN_DATABASE_CHARS.filter((char) => database.includes(char));
  if (forbidden.length > 0) {
    throw new EngineError(`Database name cannot contain: ${forbidden.join(" ")}`);
  }
  if (database.length === 0) {
    throw new EngineError("Database name cannot be empty");
  }
}

function clientSession(session: StoreSession | undefined): ClientSession | undefined {
  if (session === undefined) return undefined;
  if (!(session instanceof ClientSession)) {
    throw new EngineError(
      "MongoStore sessions must come from its own withTransaction(...)",
    );
  }
  return session;
}

/**
 * Document store over the official MongoDB driver.
 * Use `tessera.stores.mongo(uri, database)` to create one.
 */
export class MongoStore implements DocumentStore {
  readonly __STORE__: true = true;
  readonly identifier: string;
  private _client: MongoClient;
  private _db: Db;

  constructor(uri: string, database: string, options?: MongoClientOptions) {
    checkDatabaseName(database);
    this._client = new MongoClient(uri, options);
    this._db = this._client.db(database);
    this.identifier = `mongo::${database}`;
  }

  /** Underlying database handle, for blob stores and raw access. */
  get database(): Db {
    return this._db;
  }

  async upsertOne(
    collection: string,
    filter: Document,
    fields: Document,
    session?: StoreSession,
  ): Promise<void> {
    const update =
      Object.keys(fields).length > 0 ? { $set: fields } : { $setOnInsert: filter };
    await this._db.collection(collection).updateOne(filter, update, {
      upsert: true,
      session: clientSession(session),
    });
  }

  async pullOne(
    collection: string,
    filter: Document,
    key: string,
    value: unknown,
    session?: StoreSession,
  ): Promise<Document | undefined> {
    const pull: Document = { [key]: value };
    const updated = await this._db
      .collection(collection)
      .findOneAndUpdate(filter, { $pull: pull }, {
        returnDocument: "after",
        session: clientSession(session),
      });
    return updated ?? undefined;
  }

  async deleteOne(
    collection: string,
    filter: Document,
    session?: StoreSession,
  ): Promise<number> {
    const result = await this._db
      .collection(collection)
      .deleteOne(filter, { session: clientSession(session) });
    return result.deletedCount;
  }

  async deleteMany(
    collection: string,
    filter: Document,
    session?: StoreSession,
  ): Promise<number> {
    const result = await this._db
      .collection(collection)
      .deleteMany(filter, { session: clientSession(session) });
    return result.deletedCount;
  }

  async count(
    collection: string,
    filter: Document,
    session?: StoreSession,
  ): Promise<number> {
    return this._db
      .collection(collection)
      .countDocuments(filter, { session: clientSession(session) });
  }

  aggregate(
    collection: string,
    pipeline: Document[],
    session?: StoreSession,
  ): AsyncIterable<Document> {
    return this._db
      .collection(collection)
      .aggregate(pipeline, { session: clientSession(session) });
  }

  async listCollectionNames(): Promise<string[]> {
    const collections = await this._db
      .listCollections({}, { nameOnly: true })
      .toArray();
    return collections.map((info) => info.name);
  }

  async createCollection(name: string, options?: Document): Promise<void> {
    await this._db.createCollection(name, options);
  }

  async createIndexes(collection: string, indexes: IndexModel[]): Promise<void> {
    if (indexes.length === 0) return;
    await this._db.collection(collection).createIndexes(
      indexes.map((model) => ({
        key: model.key,
        unique: model.unique,
        sparse: model.sparse,
      })),
    );
  }

  async withTransaction<T>(fn: (session: StoreSession) => Promise<T>): Promise<T> {
    const session = this._client.startSession();
    try {
      return await session.withTransaction(() => fn(session));
    } finally {
      await session.endSession();
    }
  }

  async close(): Promise<void> {
    await this._client.close();
  }
}
