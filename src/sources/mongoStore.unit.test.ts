import { describe, expect, test } from "vitest";
import { EngineError } from "../core/errors";
import { MongoStore, checkDatabaseName } from "./mongoStore";

describe("checkDatabaseName", () => {
  test("rejects forbidden characters and empty names", () => {
    expect(() => checkDatabaseName("my.db")).toThrow("Database name cannot contain: .");
    expect(() => checkDatabaseName("a/b$c")).toThrow("Database name cannot contain: / $");
    expect(() => checkDatabaseName("")).toThrow("Database name cannot be empty");
    expect(() => checkDatabaseName("library")).not.toThrow();
  });
});

describe("MongoStore", () => {
  test("names itself after the database without connecting", () => {
    const store = new MongoStore("mongodb://localhost:27017", "library");
    expect(store.identifier).toBe("mongo::library");
    expect(store.database.databaseName).toBe("library");
  });

  test("refuses sessions it did not start", async () => {
    const store = new MongoStore("mongodb://localhost:27017", "library");
    await expect(store.deleteOne("books", {}, { transaction: 1 })).rejects.toThrow(EngineError);
  });
});
