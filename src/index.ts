import * as qfns from "./core/queryFns";

export { tessera } from "./tessera";
export { qfns };

export {
    defineDocument,
    defineEmbedded,
    pluralize,
    SchemaAssembler,
} from "./core/assembler";
export type {
    DocumentOf,
    DocumentOptions,
    DocumentValues,
    EmbeddedOptions,
    FieldsSpec,
    FullDocumentOf,
} from "./core/assembler";
export { BaseDocument, RESERVED_FIELD_NAMES } from "./core/document";
export type { DocumentClass, DocumentInput, DocumentSchema, FieldValidator } from "./core/document";
export { EMPTY, isEmpty } from "./core/empty";
export type { Empty } from "./core/empty";
export {
    CascadeError,
    ConfigError,
    DocumentTypeError,
    DocumentValidationError,
    EngineError,
    ErrorWrapper,
    MapperError,
    SchemaError,
    TypeResolutionError,
    ValidationError,
} from "./core/errors";
export type { ErrorEntry, ErrorLoc } from "./core/errors";
export { Field, field, reference } from "./core/field";
export type { FieldOptions, IndexKind, IndexModel, ReferenceOptions } from "./core/field";
export { Mapper, SequenceMapper, EmbeddedDocumentMapper, ReferencedDocumentMapper } from "./core/mapper";
export type { MapperParams, ValidateOptions } from "./core/mapper";
export * from "./core/scalars";
export { GeometryMapper } from "./core/geometry";
export type { Geometry, GeometryType, Position } from "./core/geometry";
export { TypeToken, t, optional, list, union, record } from "./core/types";
export type { Annotation, ValueOf } from "./core/types";
export { DocumentHandle, DocumentRegistry, MapperRegistry, TypeRegistry } from "./core/registry";
export { createMapperRegistry, defaultDocuments, defaultMappers } from "./core/defaults";
export { Reference, compileDereferencePipeline, reverseReferences } from "./core/references";
export { QueryBuilder } from "./core/query";

export { Engine } from "./sources/engine";
export type { EngineOptions, MutationOptions } from "./sources/engine";
export type { DocumentStore, StoreSession } from "./sources/documentStore";
export { MongoStore } from "./sources/mongoStore";
export { KeyedLocker, LockTimeoutError } from "./sources/locker";

export type { BlobInfo, BlobSource, BlobStore, BlobUpload } from "./depot/blobStore";
export { GridFsBlobStore } from "./depot/gridFsBlobStore";
export { FileStorage, fsFileDocument } from "./depot/fileStorage";
export type { FsFile, FileUpload, CreateFileOptions } from "./depot/fileStorage";

export { readConfig } from "./runtime/config";
export type { TesseraConfig } from "./runtime/config";
