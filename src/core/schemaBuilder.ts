import { SchemaError } from "./errors";
import {
  Field,
  type Descriptor,
  type FieldOptions,
  type IndexSpec,
  type ReferenceOptions,
} from "./field";
import {
  EmbeddedDocumentMapper,
  ReferencedDocumentMapper,
  SequenceMapper,
  type Mapper,
  type MapperParams,
} from "./mapper";
import { DocumentHandle, type DocumentRegistry, type MapperRegistry } from "./registry";
import { copyPlain } from "./safeObject";
import type { DocumentClass } from "./document";
import {
  ListShape,
  OptionalShape,
  RecordShape,
  TypeToken,
  UnionShape,
  type Annotation,
} from "./types";

/** Registries a field is resolved against. */
export type BuildContext = {
  mappers: MapperRegistry;
  documents: DocumentRegistry;
};

export function isDocumentClass(value: unknown): value is DocumentClass {
  return typeof value === "function" && "schema" in value;
}

/** Readable form of an annotation, for error messages. */
export function describeAnnotation(annotation: Annotation): string {
  if (annotation === null) return "null";
  if (typeof annotation === "string") return annotation;
  if (annotation instanceof TypeToken) return annotation.name;
  if (annotation instanceof OptionalShape) return `optional(${describeAnnotation(annotation.inner)})`;
  if (annotation instanceof ListShape) return `list(${describeAnnotation(annotation.inner)})`;
  if (annotation instanceof UnionShape) {
    return `union(${annotation.arms.map(describeAnnotation).join(", ")})`;
  }
  if (annotation instanceof RecordShape) return `record(${describeAnnotation(annotation.value)})`;
  if (isDocumentClass(annotation)) return annotation.schema.name;
  return annotation.name;
}

function indexSpec(options: FieldOptions): IndexSpec | undefined {
  const uniqueWith =
    options.uniqueWith === undefined
      ? []
      : typeof options.uniqueWith === "string"
        ? [options.uniqueWith]
        : [...options.uniqueWith];
  if (!options.index && !options.unique && !options.sparse && uniqueWith.length === 0) {
    return undefined;
  }
  return {
    kind: options.index ?? "asc",
    unique: options.unique ?? uniqueWith.length > 0,
    sparse: options.sparse ?? false,
    uniqueWith,
  };
}

function buildMapper(
  name: string,
  annotation: Annotation,
  params: MapperParams,
  ctx: BuildContext,
  ref: ReferenceOptions | undefined,
): Mapper<unknown> {
  if (annotation instanceof OptionalShape) {
    return buildMapper(name, annotation.inner, { ...params, nullable: true }, ctx, ref);
  }
  if (annotation instanceof UnionShape) {
    const arms = annotation.arms.filter((arm) => arm !== null);
    const [only] = arms;
    if (annotation.arms.length === 2 && arms.length === 1 && only !== undefined) {
      return buildMapper(name, only, { ...params, nullable: true }, ctx, ref);
    }
    throw new SchemaError(
      `Unsupported annotation \`${describeAnnotation(annotation)}\` on field \`${name}\``,
    );
  }
  if (annotation instanceof ListShape) {
    const { nullable, defaultFactory, minLen, maxLen, ...innerParams } = params;
    const inner = buildMapper(name, annotation.inner, innerParams, ctx, ref);
    return new SequenceMapper(inner, { nullable, defaultFactory, minLen, maxLen });
  }
  if (annotation instanceof RecordShape || annotation === null) {
    throw new SchemaError(
      `Unsupported annotation \`${describeAnnotation(annotation)}\` on field \`${name}\``,
    );
  }
  if (typeof annotation === "string" || isDocumentClass(annotation)) {
    const handle = new DocumentHandle(annotation, ctx.documents);
    if (ref) {
      return new ReferencedDocumentMapper(handle, ref.refField, ref.keyName, params);
    }
    return new EmbeddedDocumentMapper(handle, params);
  }
  if (ref) {
    throw new SchemaError(
      `Reference field \`${name}\` must be declared with a document type, got \`${describeAnnotation(annotation)}\``,
    );
  }
  return ctx.mappers.resolve(annotation)(params);
}

/**
 * Turn a declared descriptor into a Field with a concrete mapper.
 * Throws SchemaError for unsupported shapes and conflicting options.
 */
export function buildField(name: string, descriptor: Descriptor, ctx: BuildContext): Field {
  const { options } = descriptor;
  if (options.default !== undefined && options.defaultFactory !== undefined) {
    throw new SchemaError(
      `Field \`${name}\` declares both default and defaultFactory`,
    );
  }
  const fixed = options.default;
  const defaultFactory =
    options.defaultFactory ?? (fixed !== undefined ? () => copyPlain(fixed) : undefined);
  const params: MapperParams = { ...options, defaultFactory };
  const mapper = buildMapper(
    name,
    descriptor.annotation,
    params,
    ctx,
    descriptor.kind === "reference" ? descriptor.options : undefined,
  );
  return new Field({
    name,
    mapper,
    alias: options.alias,
    idField: options.idField,
    index: indexSpec(options),
  });
}
