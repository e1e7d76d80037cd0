import { MapperError } from "./errors";
import { Mapper, describeType, type MapperParams } from "./mapper";
import { isRecord } from "./safeObject";

/** `[longitude, latitude]`. */
export type Position = [number, number];

type CoordinatesOf = {
  Point: Position;
  MultiPoint: Position[];
  LineString: Position[];
  MultiLineString: Position[][];
  Polygon: Position[][];
  MultiPolygon: Position[][][];
};

export type GeometryType = keyof CoordinatesOf;

/** GeoJSON geometry object. */
export type Geometry<K extends GeometryType = GeometryType> = {
  type: K;
  coordinates: CoordinatesOf[K];
};

function listOf<T>(raw: unknown, what: string, item: (value: unknown) => T): T[] {
  if (!Array.isArray(raw)) {
    throw new MapperError(`Invalid ${what}, expected an array, got ${describeType(raw)}`);
  }
  return raw.map(item);
}

function parsePosition(raw: unknown): Position {
  if (!Array.isArray(raw) || raw.length !== 2) {
    throw new MapperError("Invalid position, expected [longitude, latitude]");
  }
  const [lng, lat] = raw;
  if (typeof lng !== "number" || typeof lat !== "number" || !Number.isFinite(lng) || !Number.isFinite(lat)) {
    throw new MapperError("Invalid position, coordinates must be finite numbers");
  }
  return [lng, lat];
}

function parseLine(raw: unknown): Position[] {
  const line = listOf(raw, "line", parsePosition);
  if (line.length < 2) {
    throw new MapperError("A line requires at least 2 positions");
  }
  return line;
}

function parseRing(raw: unknown): Position[] {
  const ring = listOf(raw, "linear ring", parsePosition);
  if (ring.length < 4) {
    throw new MapperError("A linear ring requires at least 4 positions");
  }
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (!first || !last || first[0] !== last[0] || first[1] !== last[1]) {
    throw new MapperError("A linear ring must start and end at the same position");
  }
  return ring;
}

function parsePolygon(raw: unknown): Position[][] {
  const rings = listOf(raw, "polygon", parseRing);
  if (rings.length === 0) {
    throw new MapperError("A polygon requires at least 1 linear ring");
  }
  return rings;
}

const PARSERS: { [K in GeometryType]: (raw: unknown) => CoordinatesOf[K] } = {
  Point: parsePosition,
  MultiPoint: (raw) => listOf(raw, "multi point", parsePosition),
  LineString: parseLine,
  MultiLineString: (raw) => listOf(raw, "multi line", parseLine),
  Polygon: parsePolygon,
  MultiPolygon: (raw) => listOf(raw, "multi polygon", parsePolygon),
};

/**
 * GeoJSON geometry of one fixed type.
 * Accepts a GeoJSON object of that type or its bare coordinates.
 */
export class GeometryMapper<K extends GeometryType> extends Mapper<Geometry<K>> {
  constructor(
    readonly kind: K,
    params: MapperParams = {},
  ) {
    super(params);
  }

  get typeName(): string {
    return this.kind;
  }

  protected coerce(value: unknown): Geometry<K> {
    let coordinates: unknown = value;
    if (isRecord(value)) {
      if (value.type !== this.kind) {
        throw new MapperError(
          `Invalid geometry type \`${String(value.type)}\`, expected ${this.kind}`,
        );
      }
      coordinates = value.coordinates;
    }
    const parse = PARSERS[this.kind];
    return { type: this.kind, coordinates: parse(coordinates) };
  }

  protected override encodePlain(value: Geometry<K>): unknown {
    return { type: value.type, coordinates: value.coordinates };
  }
}
