import { Readable, type Writable } from "node:stream";
import { finished, pipeline } from "node:stream/promises";
import {
  GridFSBucket,
  type GridFSBucketWriteStream,
  type GridFSFile,
  type ObjectId,
} from "mongodb";
import { EngineError } from "../core/errors";
import type { MongoStore } from "../sources/mongoStore";
import type { BlobInfo, BlobSource, BlobStore, BlobUpload } from "./blobStore";

/** Readable over any accepted blob source. */
export function toReadable(source: BlobSource): Readable {
  if (typeof source === "string" || source instanceof Uint8Array) {
    return Readable.from([source]);
  }
  return source;
}

function blobInfo(file: GridFSFile): BlobInfo {
  const info: BlobInfo = {
    id: file._id,
    filename: file.filename,
    length: file.length,
    chunkSize: file.chunkSize,
    uploadDate: file.uploadDate,
  };
  if (file.metadata) info.metadata = file.metadata;
  return info;
}

function storedInfo(upload: GridFSBucketWriteStream): BlobInfo {
  if (!upload.gridFSFile) {
    throw new EngineError(`Upload of \`${upload.filename}\` finished without a file document`);
  }
  return blobInfo(upload.gridFSFile);
}

/**
 * GridFS-backed blob store.
 * Use `tessera.blobs.gridfs(store)` and pass it to the engine as `blobs`.
 */
export class GridFsBlobStore implements BlobStore {
  readonly __BLOBS__: true = true;
  readonly identifier: string;
  private _bucket: GridFSBucket;

  constructor(store: MongoStore, bucketName: string = "fs") {
    this._bucket = new GridFSBucket(store.database, { bucketName });
    this.identifier = `${store.identifier}::${bucketName}`;
  }

  async upload(
    id: ObjectId,
    filename: string,
    source: BlobSource,
    metadata?: Record<string, unknown>,
  ): Promise<BlobInfo> {
    const upload = this._bucket.openUploadStreamWithId(id, filename, { metadata });
    await pipeline(toReadable(source), upload);
    return storedInfo(upload);
  }

  async download(id: ObjectId, destination: Writable): Promise<void> {
    await pipeline(this._bucket.openDownloadStream(id), destination);
  }

  openUploadStream(
    id: ObjectId,
    filename: string,
    metadata?: Record<string, unknown>,
  ): BlobUpload {
    const stream = this._bucket.openUploadStreamWithId(id, filename, { metadata });
    const done = finished(stream).then(() => storedInfo(stream));
    return { stream, done };
  }

  openDownloadStream(id: ObjectId): Readable {
    return this._bucket.openDownloadStream(id);
  }

  async delete(id: ObjectId): Promise<void> {
    await this._bucket.delete(id);
  }
}
