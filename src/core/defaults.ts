import { GeometryMapper } from "./geometry";
import { DocumentRegistry, MapperRegistry } from "./registry";
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
  type ConstrainedStringName,
} from "./scalars";
import { t } from "./types";

/** Bind every built-in type token and native constructor to its mapper. */
export function registerBuiltinMappers(registry: MapperRegistry): void {
  registry.register(t.str, (params) => new StrMapper(params));
  registry.register(t.int, (params) => new IntMapper(params));
  registry.register(t.float, (params) => new FloatMapper(params));
  registry.register(t.decimal, (params) => new DecimalMapper(params));
  registry.register(t.bool, (params) => new BoolMapper(params));
  registry.register(t.datetime, (params) => new DatetimeMapper(params));
  registry.register(t.date, (params) => new DateMapper(params));
  registry.register(t.time, (params) => new TimeMapper(params));
  registry.register(t.datetimeMs, (params) => new DatetimeMsMapper(params));
  registry.register(t.binary, (params) => new BinaryMapper(params));
  registry.register(t.uuid, (params) => new UuidMapper(params));
  registry.register(t.objectId, (params) => new ObjectIdMapper(params));
  registry.register(t.json, (params) => new JsonMapper(params));

  const constrained: ConstrainedStringName[] = [
    "email", "url", "ipv4", "ipv6", "port", "mac", "phone",
    "card", "ssn", "hashtag", "doi", "version",
  ];
  for (const name of constrained) {
    registry.register(t[name], (params) => new StrMapper(params, name, STRING_PATTERNS[name]));
  }

  registry.register(t.point, (params) => new GeometryMapper("Point", params));
  registry.register(t.multiPoint, (params) => new GeometryMapper("MultiPoint", params));
  registry.register(t.lineString, (params) => new GeometryMapper("LineString", params));
  registry.register(t.multiLineString, (params) => new GeometryMapper("MultiLineString", params));
  registry.register(t.polygon, (params) => new GeometryMapper("Polygon", params));
  registry.register(t.multiPolygon, (params) => new GeometryMapper("MultiPolygon", params));

  registry.register(String, (params) => new StrMapper(params));
  registry.register(Number, (params) => new FloatMapper(params));
  registry.register(Boolean, (params) => new BoolMapper(params));
  registry.register(Date, (params) => new DatetimeMapper(params));
}

/** Fresh mapper registry holding the built-in mappers. */
export function createMapperRegistry(): MapperRegistry {
  const registry = new MapperRegistry();
  registerBuiltinMappers(registry);
  return registry;
}

/** Process-wide registries used when none is injected. */
export const defaultMappers = createMapperRegistry();
export const defaultDocuments = new DocumentRegistry();
