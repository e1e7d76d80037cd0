import type { Readable, Writable } from "node:stream";
import type { ObjectId } from "mongodb";

/** Bytes accepted by `upload(...)`. */
export type BlobSource = Readable | Uint8Array | string;

/** Stored blob description, as written by the blob store. */
export type BlobInfo = {
  id: ObjectId;
  filename: string;
  length: number;
  chunkSize: number;
  uploadDate: Date;
  metadata?: Record<string, unknown>;
};

/** Writable returned by `openUploadStream(...)`; `done` settles once the blob is stored. */
export type BlobUpload = {
  stream: Writable;
  done: Promise<BlobInfo>;
};

/**
 * Chunked binary storage for file documents.
 * Use via `tessera.blobs.*` and `engine.files()`.
 */
export interface BlobStore {
  readonly __BLOBS__: true;
  readonly identifier: string;

  /**
   * Store `source` under `id`.
   * Next: the returned info backs an `FsFile` document.
   */
  upload(
    id: ObjectId,
    filename: string,
    source: BlobSource,
    metadata?: Record<string, unknown>,
  ): Promise<BlobInfo>;
  /** Copy the stored bytes into `destination`. */
  download(id: ObjectId, destination: Writable): Promise<void>;
  openUploadStream(
    id: ObjectId,
    filename: string,
    metadata?: Record<string, unknown>,
  ): BlobUpload;
  openDownloadStream(id: ObjectId): Readable;
  /** Remove the blob and its file document. */
  delete(id: ObjectId): Promise<void>;
}
