import type { Document } from "mongodb";
import type { DocumentClass } from "./document";
import { SchemaError } from "./errors";
import type { Field } from "./field";
import type { ReferencedDocumentMapper } from "./mapper";
import type { DocumentRegistry } from "./registry";

/** Outgoing edge from a document field to another document type. */
export class Reference {
  /** Owning field name. */
  readonly name: string;
  /** Owning field alias; the dereferenced value lands under it. */
  readonly alias: string;
  readonly isMany: boolean;
  /** Key the reference value is stored under on the owning document. */
  readonly keyName: string;
  readonly mapper: ReferencedDocumentMapper;

  constructor(field: Field, mapper: ReferencedDocumentMapper, isMany: boolean) {
    this.name = field.name;
    this.alias = field.alias;
    this.isMany = isMany;
    this.mapper = mapper;
    this.keyName = mapper.keyName ?? `${field.alias}_ref`;
  }

  /** Target document class, resolved on first read. */
  get documentType(): DocumentClass {
    const cls = this.mapper.handle.documentType;
    if (cls.schema.embedded) {
      throw new SchemaError(
        `Document \`${cls.schema.name}\` is embedded and cannot be referenced`,
      );
    }
    return cls;
  }

  /** Join key field on the target. */
  get refField(): Field {
    return this.mapper.refFieldDef;
  }
}

/**
 * Compile references into `$lookup` stages, recursing into each target's own
 * references until `depth` runs out.
 */
export function compileDereferencePipeline(
    references: Iterable<Reference>,
    depth: number,
): Document[] {
    if (depth <= 0) return [];
    const pipeline: Document[] = [];
    for (const ref of references) {
        const target = ref.documentType.schema;
        const refAlias = `$${ref.refField.alias}`;
        const match = ref.isMany
            ? { $in: [refAlias, { $ifNull: ["$$fk", []] }] }
            : { $eq: [refAlias, "$$fk"] };
        const inner: Document[] = [
            { $match: { $expr: match } },
            ...compileDereferencePipeline(target.references.values(), depth - 1),
        ];
        if (!ref.isMany) {
            inner.push({ $limit: 1 });
        }
        pipeline.push({
            $lookup: {
                from: target.collectionName,
                let: { fk: `$${ref.keyName}` },
                pipeline: inner,
                as: ref.alias,
            },
        });
        if (!ref.isMany) {
            pipeline.push({
                $unwind: {
                    path: `$${ref.alias}`,
                    preserveNullAndEmptyArrays: true,
                },
            });
        }
    }
    return pipeline;
}

/**
 * Every registered full document type holding references to `target`,
 * mapped to those references. Recomputed on each call.
 */
export function reverseReferences(
    target: DocumentClass,
    registry: DocumentRegistry,
): Map<DocumentClass, Reference[]> {
    const out = new Map<DocumentClass, Reference[]>();
    for (const cls of registry.documents()) {
        const refs = Array.from(cls.schema.references.values()).filter(
            (ref) => ref.documentType === target,
        );
        if (refs.length > 0) {
            out.set(cls, refs);
        }
    }
    return out;
}
