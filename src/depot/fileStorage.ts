import type { Readable, Writable } from "node:stream";
import { Result } from "@fkws/klonk-result";
import { ObjectId } from "mongodb";
import { defineDocument, type FullDocumentOf } from "../core/assembler";
import { defaultDocuments } from "../core/defaults";
import type { DocumentClass } from "../core/document";
import { EngineError, toError } from "../core/errors";
import { field } from "../core/field";
import type { DocumentRegistry } from "../core/registry";
import { optional, t } from "../core/types";
import type { BlobInfo, BlobSource, BlobStore } from "./blobStore";

/** Collection GridFS keeps its file documents in. */
export const FS_FILES_COLLECTION = "fs.files";

const FS_FILE_FIELDS = {
  id: field(t.objectId, { idField: true }),
  filename: field(t.str),
  metadata: field(optional(t.json)),
  chunkSize: field(t.int),
  length: field(t.int),
  uploadDate: field(t.datetime),
};

export type FsFile = FullDocumentOf<typeof FS_FILE_FIELDS>;

const fsFileClasses = new WeakMap<DocumentRegistry, DocumentClass<FsFile>>();

/**
 * The `FsFile` document class of a registry, declared on first use.
 * Next: query stored files with `engine.objects(fsFileDocument())`.
 */
export function fsFileDocument(
  registry: DocumentRegistry = defaultDocuments,
): DocumentClass<FsFile> {
  const existing = fsFileClasses.get(registry);
  if (existing) return existing;
  const cls = defineDocument("FsFile", FS_FILE_FIELDS, {
    collection: FS_FILES_COLLECTION,
    registry,
  });
  fsFileClasses.set(registry, cls);
  return cls;
}

export type CreateFileOptions = {
  metadata?: Record<string, unknown>;
  id?: ObjectId;
};

/** Pending streamed upload; `done` resolves to the stored file document. */
export type FileUpload = {
  stream: Writable;
  done: Promise<Result<FsFile>>;
};

/**
 * File operations over a blob store, returning `FsFile` documents.
 * Use `engine.files()` to get one.
 */
export class FileStorage {
  private readonly _cls: DocumentClass<FsFile>;

  constructor(
    private readonly _blobs: BlobStore,
    registry: DocumentRegistry = defaultDocuments,
  ) {
    this._cls = fsFileDocument(registry);
  }

  get documentType(): DocumentClass<FsFile> {
    return this._cls;
  }

  /**
   * Upload `source` as a new file.
   * Next: store the returned file in a `t.objectId` field or a reference to `FsFile`.
   */
  async create(
    filename: string,
    source: BlobSource,
    options: CreateFileOptions = {},
  ): Promise<Result<FsFile>> {
    try {
      const info = await this._blobs.upload(
        options.id ?? new ObjectId(),
        filename,
        source,
        options.metadata,
      );
      return new Result({ success: true, data: this._fromInfo(info) });
    } catch (error) {
      return new Result({ success: false, error: toError(error) });
    }
  }

  /** Copy the file's bytes into `destination`. */
  async download(file: FsFile, destination: Writable): Promise<Result<FsFile>> {
    try {
      await this._blobs.download(this._idOf(file), destination);
      return new Result({ success: true, data: file });
    } catch (error) {
      return new Result({ success: false, error: toError(error) });
    }
  }

  openDownload(file: FsFile): Readable {
    return this._blobs.openDownloadStream(this._idOf(file));
  }

  /** Start a streamed upload; write to `stream` and end it. */
  openUpload(filename: string, options: CreateFileOptions = {}): FileUpload {
    const upload = this._blobs.openUploadStream(
      options.id ?? new ObjectId(),
      filename,
      options.metadata,
    );
    const settle = async (): Promise<Result<FsFile>> => {
      try {
        const info = await upload.done;
        return new Result({ success: true, data: this._fromInfo(info) });
      } catch (error) {
        return new Result({ success: false, error: toError(error) });
      }
    };
    return { stream: upload.stream, done: settle() };
  }

  /** Remove the file's bytes and document. */
  async delete(file: FsFile): Promise<Result<FsFile>> {
    try {
      await this._blobs.delete(this._idOf(file));
      return new Result({ success: true, data: file });
    } catch (error) {
      return new Result({ success: false, error: toError(error) });
    }
  }

  private _idOf(file: FsFile): ObjectId {
    if (!file.id) {
      throw new EngineError("File document has no id");
    }
    return file.id;
  }

  private _fromInfo(info: BlobInfo): FsFile {
    return this._cls.fromData(
      {
        _id: info.id,
        filename: info.filename,
        metadata: info.metadata,
        chunkSize: info.chunkSize,
        length: info.length,
        uploadDate: info.uploadDate,
      },
      { strict: false },
    );
  }
}
