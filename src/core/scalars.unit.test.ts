import { describe, expect, test } from "vitest";
import { Binary, Decimal128, Long, ObjectId, UUID } from "mongodb";
import { EMPTY } from "./empty";
import { MapperError } from "./errors";
import {
  BinaryMapper,
  BoolMapper,
  DateMapper,
  DatetimeMapper,
  DatetimeMsMapper,
  DecimalMapper,
  FloatMapper,
  IntMapper,
  JsonMapper,
  ObjectIdMapper,
  STRING_PATTERNS,
  StrMapper,
  TimeMapper,
  UuidMapper,
} from "./scalars";

const SAMPLE_UUID = "123e4567-e89b-42d3-a456-426614174000";
const SAMPLE_OID = "507f1f77bcf86cd799439011";

describe("Mapper.validate", () => {
  test("missing values are EMPTY unless a default applies", () => {
    expect(new IntMapper().validate(undefined)).toBe(EMPTY);
    expect(new IntMapper({ defaultFactory: () => 3 }).validate(undefined)).toBe(3);
    expect(
      new IntMapper({ defaultFactory: () => 3 }).validate(undefined, { useDefaults: false }),
    ).toBe(EMPTY);
  });

  test("null passes only on nullable mappers", () => {
    expect(() => new StrMapper().validate(null)).toThrow("Null value not allowed");
    expect(new StrMapper({ nullable: true }).validate(null)).toBeNull();
  });
});

describe("StrMapper", () => {
  test("rejects other types", () => {
    expect(() => new StrMapper().validate(5)).toThrow(
      "Invalid value type, expected a string, got number",
    );
  });

  test("checks length, choices and patterns", () => {
    expect(() => new StrMapper({ minLen: 2 }).validate("a")).toThrow(
      "At least 2 character(s) required",
    );
    expect(() => new StrMapper({ maxLen: 1 }).validate("ab")).toThrow(
      "At most 1 character(s) allowed",
    );
    expect(() => new StrMapper({ choices: ["a", "b"] }).validate("c")).toThrow(
      "Value `c` is not one of a, b",
    );
    expect(() => new StrMapper({ regex: /\d+/ }).validate("12a")).toThrow(
      "Value `12a` is not a valid str",
    );
  });

  test("constrained strings match the whole value", () => {
    const email = new StrMapper({}, "email", STRING_PATTERNS.email);
    expect(email.validate("user@example.com")).toBe("user@example.com");
    expect(() => email.validate("nope")).toThrow("Value `nope` is not a valid email");
    expect(() => email.validate("x user@example.com")).toThrow(MapperError);

    const version = new StrMapper({}, "version", STRING_PATTERNS.version);
    expect(version.validate("1.2.3-beta.1")).toBe("1.2.3-beta.1");
    expect(() => version.validate("1.2")).toThrow("Value `1.2` is not a valid version");
  });
});

describe("IntMapper", () => {
  test("strict mode accepts integers only", () => {
    expect(new IntMapper().validate(42)).toBe(42);
    expect(() => new IntMapper().validate("42")).toThrow(
      "Invalid value type, expected an integer, got string",
    );
    expect(() => new IntMapper().validate(1.5)).toThrow(
      "Invalid value type, expected an integer, got number",
    );
  });

  test("tolerant mode converts strings and BSON numbers", () => {
    const mapper = new IntMapper();
    expect(mapper.validate("42", { strict: false })).toBe(42);
    expect(mapper.validate(Long.fromNumber(7), { strict: false })).toBe(7);
    expect(new IntMapper({ parseHex: true }).validate("0x1f", { strict: false })).toBe(31);
    expect(new IntMapper({ parseHex: true }).validate("-0x10", { strict: false })).toBe(-16);
  });

  test("checks bounds and multiples", () => {
    expect(() => new IntMapper({ gte: 1 }).validate(0)).toThrow(
      "Value must be greater than or equal to 1",
    );
    expect(() => new IntMapper({ gt: 1 }).validate(1)).toThrow("Value must be greater than 1");
    expect(() => new IntMapper({ lt: 10 }).validate(10)).toThrow("Value must be less than 10");
    expect(() => new IntMapper({ lte: 10 }).validate(11)).toThrow(
      "Value must be less than or equal to 10",
    );
    expect(() => new IntMapper({ mul: 5 }).validate(12)).toThrow(
      "Value 12 is not a multiple of 5",
    );
  });

  test("rejects integers outside the safe range", () => {
    const big = new IntMapper({ int64: true });
    expect(() => big.validate(Long.fromString("9007199254740993"), { strict: false })).toThrow(
      "Integer 9007199254740993 is outside the safe integer range",
    );
    expect(() => big.validate("9007199254740993", { strict: false })).toThrow(
      "Integer 9007199254740993 is outside the safe integer range",
    );
    expect(() => big.validate(2 ** 53)).toThrow(
      "Integer 9007199254740992 is outside the safe integer range",
    );
    const max = Long.fromNumber(Number.MAX_SAFE_INTEGER);
    expect(big.validate(max, { strict: false })).toBe(Number.MAX_SAFE_INTEGER);
    expect(big.dumpBson(Number.MAX_SAFE_INTEGER)).toEqual(max);
  });

  test("dumps hex and 64-bit values", () => {
    expect(new IntMapper({ dumpHex: true }).dumpJson(255)).toBe("0xff");
    expect(new IntMapper({ dumpHex: true }).dumpJson(-31)).toBe("-0x1f");
    const long = new IntMapper({ int64: true }).dumpBson(5);
    expect(long).toBeInstanceOf(Long);
    expect(long).toEqual(Long.fromNumber(5));
    expect(new IntMapper().dumpBson(5)).toBe(5);
  });
});

describe("FloatMapper", () => {
  test("requires a finite number", () => {
    expect(() => new FloatMapper().validate(Number.NaN)).toThrow(
      "Invalid value type, expected a finite number, got number",
    );
    expect(new FloatMapper().validate("2.5", { strict: false })).toBe(2.5);
  });
});

describe("DecimalMapper", () => {
  test("keeps the written scale", () => {
    const value = new DecimalMapper().validate("1.50");
    expect(value).toBeInstanceOf(Decimal128);
    expect(String(value)).toBe("1.50");
  });

  test("rounds to 34 significant digits", () => {
    const value = new DecimalMapper().validate("1.2345678901234567890123456789012345");
    expect(String(value)).toBe("1.234567890123456789012345678901234");
  });

  test("compares bounds numerically", () => {
    expect(() => new DecimalMapper({ gt: "0" }).validate("-1")).toThrow(
      "Value must be greater than 0",
    );
    expect(() => new DecimalMapper().validate("ten")).toThrow(
      "Value `ten` is not a finite decimal",
    );
  });

  test("dumps JSON as a number", () => {
    expect(new DecimalMapper().dumpJson(Decimal128.fromString("2.25"))).toBe(2.25);
  });
});

describe("BoolMapper", () => {
  test("tolerant mode reads words and 0/1", () => {
    const mapper = new BoolMapper();
    expect(mapper.validate("Yes", { strict: false })).toBe(true);
    expect(mapper.validate("off", { strict: false })).toBe(false);
    expect(mapper.validate(1, { strict: false })).toBe(true);
    expect(() => mapper.validate("maybe", { strict: false })).toThrow(
      "Unable to decode boolean from string `maybe`",
    );
    expect(() => mapper.validate(1)).toThrow(
      "Invalid value type, expected a boolean, got number",
    );
  });
});

describe("date and time mappers", () => {
  test("datetime parses ISO strings in tolerant mode", () => {
    const mapper = new DatetimeMapper();
    const value = mapper.validate("2024-03-01T10:00:00.000Z", { strict: false });
    expect(value).toEqual(new Date("2024-03-01T10:00:00.000Z"));
    expect(() => mapper.validate("2024-03-01T10:00:00.000Z")).toThrow(
      "Invalid value type, expected a Date, got string",
    );
    expect(() => mapper.validate("nope", { strict: false })).toThrow(
      "Value `nope` is not a valid date",
    );
  });

  test("date truncates to UTC midnight", () => {
    const mapper = new DateMapper();
    const value = mapper.validate(new Date("2024-03-01T10:30:00Z"));
    expect(value).toEqual(new Date("2024-03-01T00:00:00Z"));
    expect(mapper.dumpJson(new Date("2024-03-01T00:00:00Z"))).toBe("2024-03-01");
  });

  test("time keeps the time of day", () => {
    const mapper = new TimeMapper();
    const value = mapper.validate("08:30:15.5", { strict: false });
    expect(value).toEqual(new Date(Date.UTC(1970, 0, 1, 8, 30, 15, 500)));
    expect(mapper.dumpJson(new Date(Date.UTC(1970, 0, 1, 8, 30, 15, 500)))).toBe("08:30:15.500");
    expect(mapper.validate(new Date("2024-03-01T23:59:00Z"))).toEqual(
      new Date(Date.UTC(1970, 0, 1, 23, 59)),
    );
  });

  test("datetimeMs holds epoch milliseconds and stores a date", () => {
    const mapper = new DatetimeMsMapper();
    expect(mapper.validate(new Date(1000))).toBe(1000);
    expect(mapper.dumpBson(1000)).toEqual(new Date(1000));
  });
});

describe("BinaryMapper", () => {
  test("decodes base64 and stores BSON binary", () => {
    const mapper = new BinaryMapper({ parseBase64: true });
    const value = mapper.validate("AQID", { strict: false });
    expect(value).toEqual(new Uint8Array([1, 2, 3]));
    expect(mapper.dumpJson(new Uint8Array([1, 2, 3]))).toBe("AQID");
    expect(mapper.dumpBson(new Uint8Array([1, 2, 3]))).toBeInstanceOf(Binary);
    expect(() => mapper.validate("AQID")).toThrow("Invalid value type, expected bytes, got string");
  });

  test("reads only the written bytes of a BSON binary", () => {
    const stored = new Binary();
    stored.put(1);
    stored.put(2);
    const value = new BinaryMapper().validate(stored, { strict: false });
    expect(value instanceof Uint8Array && Array.from(value)).toEqual([1, 2]);
  });
});

describe("UuidMapper", () => {
  test("checks the version", () => {
    const uuid = new UUID(SAMPLE_UUID);
    expect(new UuidMapper({ uuidVersion: 4 }).validate(uuid)).toBe(uuid);
    expect(() => new UuidMapper({ uuidVersion: 1 }).validate(uuid)).toThrow(
      "Invalid UUID version 4, required is 1",
    );
  });

  test("parses strings only when asked", () => {
    const value = new UuidMapper({ parseStr: true }).validate(SAMPLE_UUID, { strict: false });
    expect(value).toBeInstanceOf(UUID);
    expect(new UuidMapper().dumpJson(new UUID(SAMPLE_UUID))).toBe(SAMPLE_UUID);
    expect(() => new UuidMapper().validate(SAMPLE_UUID)).toThrow(
      "Invalid value type, expected a UUID, got string",
    );
  });
});

describe("ObjectIdMapper", () => {
  test("accepts hex strings", () => {
    const value = new ObjectIdMapper().validate(SAMPLE_OID);
    expect(value).toBeInstanceOf(ObjectId);
    expect(new ObjectIdMapper().dumpJson(new ObjectId(SAMPLE_OID))).toBe(SAMPLE_OID);
    expect(() => new ObjectIdMapper().validate("xyz")).toThrow(
      "Value `xyz` is not a valid ObjectId",
    );
  });
});

describe("JsonMapper", () => {
  test("accepts objects and tolerant JSON strings", () => {
    const mapper = new JsonMapper();
    expect(mapper.validate({ a: 1 })).toEqual({ a: 1 });
    expect(mapper.validate('{"a":1}', { strict: false })).toEqual({ a: 1 });
    expect(() => mapper.validate("{", { strict: false })).toThrow("Value is not valid JSON");
    expect(() => mapper.validate("[1]", { strict: false })).toThrow(
      "Invalid value type, expected a JSON object, got string",
    );
  });
});

describe("BSON round trip", () => {
  test("stored values validate back to the same value", () => {
    const decimal = new DecimalMapper();
    const price = decimal.validate("1.50");
    if (!(price instanceof Decimal128)) throw new Error("expected a decimal");
    expect(String(decimal.validate(decimal.dumpBson(price), { strict: false }))).toBe("1.50");

    const date = new DateMapper();
    const day = date.validate(new Date("2024-03-01T10:30:00Z"));
    if (!(day instanceof Date)) throw new Error("expected a date");
    expect(date.validate(date.dumpBson(day), { strict: false })).toEqual(day);

    const big = new IntMapper({ int64: true });
    expect(big.validate(big.dumpBson(5), { strict: false })).toBe(5);

    const ms = new DatetimeMsMapper();
    expect(ms.validate(ms.dumpBson(1234))).toBe(1234);

    const bytes = new BinaryMapper();
    const back = bytes.validate(bytes.dumpBson(new Uint8Array([1, 2, 3])), { strict: false });
    expect(back instanceof Uint8Array && Array.from(back)).toEqual([1, 2, 3]);
  });
});
