import { Binary, Decimal128, Double, Int32, Long, ObjectId, UUID } from "mongodb";
import { MapperError } from "./errors";
import {
  Mapper,
  checkBounds,
  checkLength,
  describeType,
  type Bounds,
  type MapperParams,
} from "./mapper";
import {
  compareDecimal,
  formatDecimal,
  parseDecimal,
  roundDecimal,
  type DecimalParts,
} from "./decimal";
import { isRecord } from "./safeObject";

const DAY_MS = 86_400_000;

function typeError(expected: string, value: unknown): MapperError {
  return new MapperError(
    `Invalid value type, expected ${expected}, got ${describeType(value)}`,
  );
}

function fullMatch(pattern: RegExp): RegExp {
  return new RegExp(`^(?:${pattern.source})$`, pattern.flags.replace("g", ""));
}

/** String with optional length, choices and full-match pattern constraints. */
export class StrMapper extends Mapper<string> {
  private readonly _minLen?: number;
  private readonly _maxLen?: number;
  private readonly _choices?: readonly unknown[];
  private readonly _patterns: RegExp[];

  constructor(
    params: MapperParams = {},
    private readonly _typeName: string = "str",
    pattern?: RegExp,
  ) {
    super(params);
    this._minLen = params.minLen;
    this._maxLen = params.maxLen;
    this._choices = params.choices;
    this._patterns = [pattern, params.regex]
      .filter((re): re is RegExp => re !== undefined)
      .map(fullMatch);
  }

  get typeName(): string {
    return this._typeName;
  }

  protected coerce(value: unknown): string {
    if (typeof value !== "string") throw typeError("a string", value);
    return value;
  }

  protected override check(value: string): void {
    checkLength(value.length, this._minLen, this._maxLen, "character(s)");
    if (this._choices && !this._choices.includes(value)) {
      throw new MapperError(
        `Value \`${value}\` is not one of ${this._choices.map(String).join(", ")}`,
      );
    }
    for (const pattern of this._patterns) {
      if (!pattern.test(value)) {
        throw new MapperError(
          `Value \`${value}\` is not a valid ${this._typeName}`,
        );
      }
    }
  }
}

/** Integer stored as a BSON int, or a Long with `int64`. */
export class IntMapper extends Mapper<number> {
  private readonly _bounds: Bounds<number>;
  private readonly _mul?: number;
  private readonly _parseHex: boolean;
  private readonly _dumpHex: boolean;
  private readonly _int64: boolean;

  constructor(params: MapperParams = {}) {
    super(params);
    this._parseHex = params.parseHex ?? false;
    this._dumpHex = params.dumpHex ?? false;
    this._int64 = params.int64 ?? false;
    this._mul = params.mul;
    this._bounds = {
      gt: this.bound(params.gt),
      gte: this.bound(params.gte),
      lt: this.bound(params.lt),
      lte: this.bound(params.lte),
    };
  }

  get typeName(): string {
    return "int";
  }

  protected coerce(value: unknown, strict: boolean): number {
    let out: unknown = value;
    if (!strict) {
      if (value instanceof Long) out = value.toNumber();
      else if (value instanceof Int32 || value instanceof Double) out = value.value;
      else if (typeof value === "string") {
        const text = value.trim();
        out = this._parseHex && /^-?0x[0-9a-f]+$/i.test(text)
          ? parseHex(text)
          : /^[+-]?\d+$/.test(text)
            ? Number(text)
            : value;
      }
    }
    if (typeof out !== "number" || !Number.isInteger(out)) {
      throw typeError("an integer", value);
    }
    if (!Number.isSafeInteger(out)) {
      const shown = typeof value === "string" ? value.trim() : String(value);
      throw new MapperError(`Integer ${shown} is outside the safe integer range`);
    }
    return out;
  }

  protected override check(value: number): void {
    checkBounds(value, this._bounds, (a, b) => a - b);
    if (this._mul !== undefined && value % this._mul !== 0) {
      throw new MapperError(`Value ${value} is not a multiple of ${this._mul}`);
    }
  }

  protected override encodeJson(value: number): unknown {
    if (!this._dumpHex) return value;
    return value < 0 ? `-0x${(-value).toString(16)}` : `0x${value.toString(16)}`;
  }

  protected override encodeBson(value: number): unknown {
    return this._int64 ? Long.fromNumber(value) : value;
  }
}

function parseHex(text: string): number {
  const negative = text.startsWith("-");
  const parsed = Number.parseInt(text.replace(/^-?0x/i, ""), 16);
  return negative ? -parsed : parsed;
}

/** Finite JS number. */
export class FloatMapper extends Mapper<number> {
  private readonly _bounds: Bounds<number>;

  constructor(params: MapperParams = {}) {
    super(params);
    this._bounds = {
      gt: this.bound(params.gt),
      gte: this.bound(params.gte),
      lt: this.bound(params.lt),
      lte: this.bound(params.lte),
    };
  }

  get typeName(): string {
    return "float";
  }

  protected coerce(value: unknown, strict: boolean): number {
    let out: unknown = value;
    if (!strict) {
      if (value instanceof Double || value instanceof Int32) out = value.value;
      else if (value instanceof Long) out = value.toNumber();
      else if (typeof value === "string" && value.trim() !== "") out = Number(value);
    }
    if (typeof out !== "number" || !Number.isFinite(out)) {
      throw typeError("a finite number", value);
    }
    return out;
  }

  protected override check(value: number): void {
    checkBounds(value, this._bounds, (a, b) => a - b);
  }
}

function decimalParts(value: Decimal128): DecimalParts {
  const parts = parseDecimal(value.toString());
  if (!parts) {
    throw new MapperError(`Value ${value.toString()} is not a finite decimal`);
  }
  return parts;
}

/**
 * Decimal stored as BSON Decimal128.
 * Values with more than 34 significant digits are rounded half-even.
 */
export class DecimalMapper extends Mapper<Decimal128> {
  private readonly _bounds: Bounds<Decimal128>;

  constructor(params: MapperParams = {}) {
    super(params);
    this._bounds = {
      gt: this.bound(params.gt),
      gte: this.bound(params.gte),
      lt: this.bound(params.lt),
      lte: this.bound(params.lte),
    };
  }

  get typeName(): string {
    return "decimal";
  }

  protected coerce(value: unknown): Decimal128 {
    let text: string;
    if (value instanceof Decimal128) {
      text = value.toString();
    } else if (typeof value === "number" && Number.isFinite(value)) {
      text = String(value);
    } else if (typeof value === "bigint" || typeof value === "string") {
      text = value.toString();
    } else {
      throw typeError("a decimal", value);
    }
    const parts = parseDecimal(text);
    if (!parts) {
      throw new MapperError(`Value \`${text}\` is not a finite decimal`);
    }
    return Decimal128.fromString(formatDecimal(roundDecimal(parts)));
  }

  protected override check(value: Decimal128): void {
    checkBounds(
      value,
      this._bounds,
      (a, b) => compareDecimal(decimalParts(a), decimalParts(b)),
      (bound) => bound.toString(),
    );
  }

  protected override encodeJson(value: Decimal128): unknown {
    return Number(value.toString());
  }
}

const TRUE_WORDS = new Set(["true", "1", "yes", "on"]);
const FALSE_WORDS = new Set(["false", "0", "no", "off"]);

export class BoolMapper extends Mapper<boolean> {
  get typeName(): string {
    return "bool";
  }

  protected coerce(value: unknown, strict: boolean): boolean {
    if (typeof value === "boolean") return value;
    if (!strict) {
      if (value === 0 || value === 1) return value === 1;
      if (typeof value === "string") {
        const word = value.trim().toLowerCase();
        if (TRUE_WORDS.has(word)) return true;
        if (FALSE_WORDS.has(word)) return false;
        throw new MapperError(`Unable to decode boolean from string \`${value}\``);
      }
    }
    throw typeError("a boolean", value);
  }
}

/** Timestamp as a JS Date; tolerant parse accepts ISO strings and epoch milliseconds. */
export class DatetimeMapper extends Mapper<Date> {
  private readonly _bounds: Bounds<Date>;

  constructor(params: MapperParams = {}) {
    super(params);
    this._bounds = {
      gt: this.bound(params.gt),
      gte: this.bound(params.gte),
      lt: this.bound(params.lt),
      lte: this.bound(params.lte),
    };
  }

  get typeName(): string {
    return "datetime";
  }

  protected toDate(value: unknown, strict: boolean): Date {
    let out: unknown = value;
    if (!strict && (typeof value === "string" || typeof value === "number")) {
      out = new Date(value);
    }
    if (!(out instanceof Date)) throw typeError("a Date", value);
    if (Number.isNaN(out.getTime())) {
      throw new MapperError(`Value \`${String(value)}\` is not a valid date`);
    }
    return out;
  }

  protected coerce(value: unknown, strict: boolean): Date {
    return this.toDate(value, strict);
  }

  protected override check(value: Date): void {
    checkBounds(
      value,
      this._bounds,
      (a, b) => a.getTime() - b.getTime(),
      (bound) => bound.toISOString(),
    );
  }

  protected override encodeJson(value: Date): unknown {
    return value.toISOString();
  }
}

/** Calendar date, held as UTC midnight. */
export class DateMapper extends DatetimeMapper {
  override get typeName(): string {
    return "date";
  }

  protected override coerce(value: unknown, strict: boolean): Date {
    const date = this.toDate(value, strict);
    return new Date(date.getTime() - mod(date.getTime(), DAY_MS));
  }

  protected override encodeJson(value: Date): unknown {
    return value.toISOString().slice(0, 10);
  }
}

const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?$/;

/** Time of day, held on the epoch day (1970-01-01, UTC). */
export class TimeMapper extends DatetimeMapper {
  override get typeName(): string {
    return "time";
  }

  protected override coerce(value: unknown, strict: boolean): Date {
    if (!strict && typeof value === "string") {
      const match = TIME_PATTERN.exec(value.trim());
      if (match) {
        const ms = (match[4] ?? "0").padEnd(3, "0");
        return new Date(
          Date.UTC(1970, 0, 1, Number(match[1]), Number(match[2]), Number(match[3] ?? 0), Number(ms)),
        );
      }
    }
    const date = this.toDate(value, strict);
    return new Date(mod(date.getTime(), DAY_MS));
  }

  protected override encodeJson(value: Date): unknown {
    return value.toISOString().slice(11, 23);
  }
}

function mod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

/** Integer epoch milliseconds, stored as a BSON date. */
export class DatetimeMsMapper extends Mapper<number> {
  private readonly _bounds: Bounds<number>;

  constructor(params: MapperParams = {}) {
    super(params);
    this._bounds = {
      gt: this.bound(params.gt),
      gte: this.bound(params.gte),
      lt: this.bound(params.lt),
      lte: this.bound(params.lte),
    };
  }

  get typeName(): string {
    return "datetimeMs";
  }

  protected coerce(value: unknown): number {
    if (value instanceof Date && !Number.isNaN(value.getTime())) {
      return value.getTime();
    }
    if (typeof value === "number" && Number.isInteger(value)) return value;
    throw typeError("epoch milliseconds or a Date", value);
  }

  protected override check(value: number): void {
    checkBounds(value, this._bounds, (a, b) => a - b, (bound) => new Date(bound).toISOString());
  }

  protected override encodeBson(value: number): unknown {
    return new Date(value);
  }
}

/** Raw bytes, stored as BSON Binary and dumped to JSON as base64. */
export class BinaryMapper extends Mapper<Uint8Array> {
  private readonly _parseBase64: boolean;

  constructor(params: MapperParams = {}) {
    super(params);
    this._parseBase64 = params.parseBase64 ?? false;
  }

  get typeName(): string {
    return "binary";
  }

  protected coerce(value: unknown, strict: boolean): Uint8Array {
    if (value instanceof Uint8Array) return value;
    if (!strict) {
      if (value instanceof Binary) return value.value();
      if (typeof value === "string" && this._parseBase64) {
        return new Uint8Array(Buffer.from(value, "base64"));
      }
    }
    throw typeError("bytes", value);
  }

  protected override encodeJson(value: Uint8Array): unknown {
    return Buffer.from(value).toString("base64");
  }

  protected override encodeBson(value: Uint8Array): unknown {
    return new Binary(value);
  }
}

/** RFC 4122 UUID as a BSON UUID (binary subtype 4). */
export class UuidMapper extends Mapper<UUID> {
  private readonly _version?: number;
  private readonly _parseStr: boolean;

  constructor(params: MapperParams = {}) {
    super(params);
    this._version = params.uuidVersion;
    this._parseStr = params.parseStr ?? false;
  }

  get typeName(): string {
    return "uuid";
  }

  protected coerce(value: unknown, strict: boolean): UUID {
    if (value instanceof UUID) return value;
    if (!strict) {
      if (value instanceof Binary && value.sub_type === Binary.SUBTYPE_UUID) {
        return value.toUUID();
      }
      if (typeof value === "string" && this._parseStr) {
        if (!UUID.isValid(value)) {
          throw new MapperError(`Value \`${value}\` is not a valid UUID`);
        }
        return new UUID(value);
      }
    }
    throw typeError("a UUID", value);
  }

  protected override check(value: UUID): void {
    if (this._version === undefined) return;
    const version = Number.parseInt(value.toHexString(false).charAt(12), 16);
    if (version !== this._version) {
      throw new MapperError(
        `Invalid UUID version ${version}, required is ${this._version}`,
      );
    }
  }

  protected override encodeJson(value: UUID): unknown {
    return value.toHexString();
  }
}

const OBJECT_ID_PATTERN = /^[0-9a-f]{24}$/i;

/** BSON ObjectId; 24-character hex strings are accepted. */
export class ObjectIdMapper extends Mapper<ObjectId> {
  get typeName(): string {
    return "objectId";
  }

  protected coerce(value: unknown): ObjectId {
    if (value instanceof ObjectId) return value;
    if (typeof value === "string") {
      if (!OBJECT_ID_PATTERN.test(value)) {
        throw new MapperError(`Value \`${value}\` is not a valid ObjectId`);
      }
      return new ObjectId(value);
    }
    throw typeError("an ObjectId", value);
  }

  protected override encodeJson(value: ObjectId): unknown {
    return value.toHexString();
  }
}

/** Arbitrary JSON object. */
export class JsonMapper extends Mapper<Record<string, unknown>> {
  get typeName(): string {
    return "json";
  }

  protected coerce(value: unknown, strict: boolean): Record<string, unknown> {
    let out: unknown = value;
    if (!strict && typeof value === "string") {
      try {
        out = JSON.parse(value);
      } catch {
        throw new MapperError("Value is not valid JSON");
      }
    }
    if (!isRecord(out)) throw typeError("a JSON object", value);
    return out;
  }
}

/** Patterns for the constrained string types, keyed by type name. */
export const STRING_PATTERNS = {
  email: /[^\s@"<>()[\]\\,;:]+(?:\.[^\s@"<>()[\]\\,;:]+)*@(?:[a-zA-Z0-9-]+\.)+[a-zA-Z]{2,}/,
  url: /https?:\/\/[\w.-]+(?:\.[\w-]+)+(?::\d{1,5})?(?:[/?#][^\s]*)?/,
  ipv4: /(?:(?:25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)\.){3}(?:25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)/,
  ipv6: /(?:[0-9a-fA-F]{1,4}:){7}[0-9a-fA-F]{1,4}|(?:[0-9a-fA-F]{1,4}:){1,7}:|(?:[0-9a-fA-F]{1,4}:){1,6}(?::[0-9a-fA-F]{1,4}){1}|(?:[0-9a-fA-F]{1,4}:){1,5}(?::[0-9a-fA-F]{1,4}){1,2}|(?:[0-9a-fA-F]{1,4}:){1,4}(?::[0-9a-fA-F]{1,4}){1,3}|(?:[0-9a-fA-F]{1,4}:){1,3}(?::[0-9a-fA-F]{1,4}){1,4}|(?:[0-9a-fA-F]{1,4}:){1,2}(?::[0-9a-fA-F]{1,4}){1,5}|[0-9a-fA-F]{1,4}:(?::[0-9a-fA-F]{1,4}){1,6}|:(?:(?::[0-9a-fA-F]{1,4}){1,7}|:)/,
  port: /6553[0-5]|655[0-2]\d|65[0-4]\d{2}|6[0-4]\d{3}|[1-5]\d{4}|[1-9]\d{0,3}|0/,
  mac: /[a-fA-F0-9]{2}(?::[a-fA-F0-9]{2}){5}/,
  phone: /\+?\(?\d{3}\)?[-\s.]?\d{3}[-\s.]?\d{4,6}/,
  card: /4\d{12}(?:\d{3})?|(?:5[1-5]\d{2}|222[1-9]|22[3-9]\d|2[3-6]\d{2}|27[01]\d|2720)\d{12}|3[47]\d{13}|3(?:0[0-5]|[68]\d)\d{11}|6(?:011|5\d{2})\d{12}|(?:2131|1800|35\d{3})\d{11}/,
  ssn: /(?!000|666)[0-8]\d{2}-(?!00)\d{2}-(?!0000)\d{4}/,
  hashtag: /#[^\s!@#$%^&*(),.?":{}|<>]+/,
  doi: /10\.\d{4,9}\/[-._;()/:a-zA-Z0-9]+/,
  version: /(?:0|[1-9]\d*)\.(?:0|[1-9]\d*)\.(?:0|[1-9]\d*)(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?/,
} as const;

export type ConstrainedStringName = keyof typeof STRING_PATTERNS;
