import { describe, expect, test } from "vitest";
import { tessera } from "./tessera";
import { MemoryStore } from "./testing/memoryStore";

describe("tessera", () => {
  test("declares, saves and queries documents", async () => {
    const registry = tessera.registries.createDocuments();
    const Author = tessera.document(
      "Author",
      { name: tessera.field(tessera.t.str, { minLen: 1 }) },
      { registry },
    );
    const Book = tessera.document(
      "Book",
      {
        title: tessera.field(tessera.t.str),
        tags: tessera.field(tessera.list(tessera.t.str), { default: [] }),
        author: tessera.reference(Author),
      },
      { registry },
    );
    registry.finalize();

    const engine = tessera.engine(new MemoryStore(), {
      registry,
      config: tessera.readConfig({}),
    });
    const ada = new Author({ name: "Ada" });
    const saved = await engine.save(new Book({ title: "Notes", author: ada }), { cascade: true });
    expect(saved.isOk()).toBe(true);

    const { eq } = tessera.qfns;
    const found = await engine
      .objects(Book)
      .filter(eq(tessera.fieldPath(Book, "author"), ada.id))
      .dereference()
      .first();
    const book: tessera.types.Instance<typeof Book> = found.unwrap();
    expect(book.title).toBe("Notes");
    expect(book.tags).toEqual([]);
    expect(book.author?.name).toBe("Ada");
  });

  test("mongo stores check the database name", () => {
    expect(() => tessera.stores.mongo("mongodb://localhost:27017", "bad.name")).toThrow(
      "Database name cannot contain: .",
    );
  });
});
