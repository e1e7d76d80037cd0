import type { Document } from "mongodb";
import type { IndexModel } from "../core/field";

/** Store transaction handle; passed through to every data call unchanged. */
export type StoreSession = object;

/**
 * Document store backend consumed by the engine.
 * Implementers own connections, transactions and aggregation execution.
 */
export interface DocumentStore {
  readonly __STORE__: true;
  readonly identifier: string;

  /**
   * `$set` the given fields on the document matching `filter`, inserting it when missing.
   * Never unsets absent fields.
   */
  upsertOne(
    collection: string,
    filter: Document,
    fields: Document,
    session?: StoreSession,
  ): Promise<void>;
  /**
   * `$pull` every element equal to `value` from the array at `key` of the document matching `filter`.
   * Resolves to the updated document, or undefined when none matched.
   */
  pullOne(
    collection: string,
    filter: Document,
    key: string,
    value: unknown,
    session?: StoreSession,
  ): Promise<Document | undefined>;
  /** Delete at most one document; resolves to the deleted count. */
  deleteOne(
    collection: string,
    filter: Document,
    session?: StoreSession,
  ): Promise<number>;
  deleteMany(
    collection: string,
    filter: Document,
    session?: StoreSession,
  ): Promise<number>;
  count(
    collection: string,
    filter: Document,
    session?: StoreSession,
  ): Promise<number>;
  /** Run an aggregation pipeline and stream its output. */
  aggregate(
    collection: string,
    pipeline: Document[],
    session?: StoreSession,
  ): AsyncIterable<Document>;
  listCollectionNames(): Promise<string[]>;
  createCollection(name: string, options?: Document): Promise<void>;
  createIndexes(collection: string, indexes: IndexModel[]): Promise<void>;
  /**
   * Run `fn` inside a transaction; commits when it resolves, aborts when it rejects.
   * Next: pass the session to the engine calls made inside `fn`.
   */
  withTransaction<T>(fn: (session: StoreSession) => Promise<T>): Promise<T>;
  close?: () => Promise<void>;
}
