import type { MongoClientOptions } from "mongodb";
import {
  defineDocument,
  defineEmbedded,
  type DocumentOf,
  type FieldsSpec,
  type FullDocumentOf,
} from "./core/assembler";
import { createMapperRegistry, defaultDocuments, defaultMappers } from "./core/defaults";
import type { DocumentClass } from "./core/document";
import { field, reference } from "./core/field";
import {
  and,
  asc,
  desc,
  eq,
  exists,
  fieldPath,
  gt,
  gte,
  inList,
  lt,
  lte,
  ne,
  nor,
  not,
  notIn,
  or,
  regex,
} from "./core/queryFns";
import { DocumentRegistry } from "./core/registry";
import { list, optional, record, t, union } from "./core/types";
import { GridFsBlobStore } from "./depot/gridFsBlobStore";
import { readConfig } from "./runtime/config";
import { Engine, type EngineOptions } from "./sources/engine";
import type { DocumentStore } from "./sources/documentStore";
import { MongoStore } from "./sources/mongoStore";
import { ConfigError } from "./core/errors";

/**
 * Main tessera entry point.
 * Start here to declare documents, build an engine over a store, and run queries.
 */
const tessera = {
  /**
   * Declare a full document stored in its own collection.
   * Next: pass instances to `engine.save(...)` or query with `engine.objects(...)`.
   */
  document: defineDocument,

  /**
   * Declare an embedded document, stored inline in its container.
   * Next: use it as a field annotation of another document.
   */
  embedded: defineEmbedded,

  field: field,
  reference: reference,
  optional: optional,
  list: list,
  union: union,
  record: record,

  /** Built-in scalar type tokens. */
  t: t,

  /** Query helper functions for `QueryBuilder.filter(...)` and `.sort(...)`. */
  qfns: { eq, ne, gt, gte, lt, lte, inList, notIn, regex, exists, and, or, not, nor, asc, desc },

  /** Resolve a dotted field-name path into the stored alias path. */
  fieldPath: fieldPath,

  /**
   * Create an engine over a document store.
   * Next: call `save(...)`, `delete(...)` or `objects(...)`.
   */
  engine(store: DocumentStore, options?: EngineOptions): Engine {
    return new Engine(store, options);
  },

  /** Document store factories. */
  stores: {
    /**
     * MongoDB store; `uri` and `database` default to `TESSERA_MONGO_URI` and `TESSERA_DATABASE`.
     * Next: pass it to `tessera.engine(...)`.
     */
    mongo(uri?: string, database?: string, options?: MongoClientOptions): MongoStore {
      const config = uri && database ? undefined : readConfig();
      const resolvedUri = uri ?? config?.mongoUri;
      const resolvedDatabase = database ?? config?.database;
      if (!resolvedUri || !resolvedDatabase) {
        throw new ConfigError(
          "MongoDB store needs a uri and database, pass them or set TESSERA_MONGO_URI and TESSERA_DATABASE",
        );
      }
      return new MongoStore(resolvedUri, resolvedDatabase, options);
    },
  },

  /** Blob store factories. Use with `tessera.engine(store, { blobs })`. */
  blobs: {
    gridfs: (store: MongoStore, bucketName?: string) => new GridFsBlobStore(store, bucketName),
  },

  /** Default registries and factories for isolated ones. */
  registries: {
    documents: defaultDocuments,
    mappers: defaultMappers,
    createDocuments: () => new DocumentRegistry(),
    createMappers: createMapperRegistry,
  },

  readConfig: readConfig,
};

export { tessera };

/**
 * Type-only namespace for public tessera types.
 * Next: reference these as `tessera.types.*` in type positions.
 */
export namespace tessera {
  export namespace types {
    /** Instance type of a document class. */
    export type Instance<C> = C extends DocumentClass<infer D> ? D : never;
    export type Document<F extends FieldsSpec> = FullDocumentOf<F>;
    export type Embedded<F extends FieldsSpec> = DocumentOf<F>;
  }
}
