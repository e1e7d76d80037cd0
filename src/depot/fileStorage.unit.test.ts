import { describe, expect, test } from "vitest";
import { Writable, type Readable } from "node:stream";
import { DocumentRegistry } from "../core/registry";
import { readConfig } from "../runtime/config";
import { Engine } from "../sources/engine";
import { MemoryBlobStore } from "../testing/memoryBlobStore";
import { MemoryStore } from "../testing/memoryStore";
import { FS_FILES_COLLECTION, fsFileDocument } from "./fileStorage";

function setup() {
  const registry = new DocumentRegistry();
  const blobs = new MemoryBlobStore();
  const engine = new Engine(new MemoryStore(), { config: readConfig({}), registry, blobs });
  return { registry, blobs, files: engine.files() };
}

async function readAll(source: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of source) {
    chunks.push(Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf8");
}

describe("fsFileDocument", () => {
  test("declares one FsFile class per registry", () => {
    const registry = new DocumentRegistry();
    const FsFile = fsFileDocument(registry);
    expect(fsFileDocument(registry)).toBe(FsFile);
    expect(FsFile.schema.collectionName).toBe(FS_FILES_COLLECTION);
    expect(FsFile.schema.idField?.name).toBe("id");
    expect(registry.names()).toEqual(["FsFile"]);
  });
});

describe("FileStorage", () => {
  test("creates files and describes them", async () => {
    const { files, blobs } = setup();
    const created = await files.create("hello.txt", "hello", { metadata: { kind: "greeting" } });
    const file = created.unwrap();
    expect(file.filename).toBe("hello.txt");
    expect(file.length).toBe(5);
    expect(file.chunkSize).toBe(255 * 1024);
    expect(file.metadata).toEqual({ kind: "greeting" });
    expect(file.uploadDate).toBeInstanceOf(Date);
    expect(file.id && blobs.bytes(file.id)?.toString("utf8")).toBe("hello");
  });

  test("downloads into a writable and as a stream", async () => {
    const { files } = setup();
    const file = (await files.create("data.bin", new Uint8Array([104, 105]))).unwrap();

    const chunks: Buffer[] = [];
    const sink = new Writable({
      write(chunk, _encoding, callback) {
        chunks.push(Buffer.from(chunk));
        callback();
      },
    });
    const downloaded = await files.download(file, sink);
    expect(downloaded.isOk()).toBe(true);
    expect(Buffer.concat(chunks).toString("utf8")).toBe("hi");

    expect(await readAll(files.openDownload(file))).toBe("hi");
  });

  test("streams uploads", async () => {
    const { files } = setup();
    const upload = files.openUpload("notes.txt");
    upload.stream.end("abc");
    const file = (await upload.done).unwrap();
    expect(file.filename).toBe("notes.txt");
    expect(file.length).toBe(3);
    expect(file.has("metadata")).toBe(false);
  });

  test("deletes files once", async () => {
    const { files, blobs } = setup();
    const file = (await files.create("gone.txt", "x")).unwrap();
    const deleted = await files.delete(file);
    expect(deleted.isOk()).toBe(true);
    expect(file.id && blobs.bytes(file.id)).toBeUndefined();

    const again = await files.delete(file);
    expect(again.isErr()).toBe(true);
    if (again.isErr()) {
      expect(again.error.message).toBe(`File not found for id ${file.id?.toHexString()}`);
    }
  });
});
