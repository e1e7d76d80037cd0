import type { Document } from "mongodb";
import type { DocumentClass } from "./document";
import { unwrapSequence, EmbeddedDocumentMapper, ReferencedDocumentMapper } from "./mapper";

export type ComparisonOperator =
    | "="
    | "!="
    | ">"
    | ">="
    | "<"
    | "<="
    | "IN"
    | "NOT IN"
    | "REGEX"
    | "EXISTS";

export type QueryComparison = {
    type: "comparison";
    operator: ComparisonOperator;
    property: string;
    value: unknown;
};

export type QueryGroup = {
    type: "group";
    method: "AND" | "OR" | "NOT" | "NOR";
    components: QueryComponent[];
};

export type QueryComponent = QueryComparison | QueryGroup;

export type SortComponent = {
    type: "sort";
    property: string;
    direction: 1 | -1;
};

/**
 * Equality comparison on a stored (alias) path.
 * Use with `QueryBuilder.filter(...)`.
 */
export function eq(prop: string, val: unknown): QueryComparison {
    return {
        type: "comparison",
        operator: "=",
        property: prop,
        value: val,
    };
}

export function ne(prop: string, val: unknown): QueryComparison {
    return {
        type: "comparison",
        operator: "!=",
        property: prop,
        value: val,
    };
}

/**
 * Group components with logical AND.
 */
export function and(...components: QueryComponent[]): QueryGroup {
    return {
        type: "group",
        method: "AND",
        components: components,
    };
}

/**
 * Group components with logical OR.
 */
export function or(...components: QueryComponent[]): QueryGroup {
    return {
        type: "group",
        method: "OR",
        components: components,
    };
}

/**
 * Negate a component.
 */
export function not(component: QueryComponent): QueryGroup {
    return {
        type: "group",
        method: "NOT",
        components: [component],
    };
}

/** Match when none of the components match. */
export function nor(...components: QueryComponent[]): QueryGroup {
    return {
        type: "group",
        method: "NOR",
        components: components,
    };
}

export function gt(prop: string, val: unknown): QueryComparison {
    return {
        type: "comparison",
        operator: ">",
        property: prop,
        value: val,
    };
}

export function gte(prop: string, val: unknown): QueryComparison {
    return {
        type: "comparison",
        operator: ">=",
        property: prop,
        value: val,
    };
}

export function lt(prop: string, val: unknown): QueryComparison {
    return {
        type: "comparison",
        operator: "<",
        property: prop,
        value: val,
    };
}

export function lte(prop: string, val: unknown): QueryComparison {
    return {
        type: "comparison",
        operator: "<=",
        property: prop,
        value: val,
    };
}

/**
 * Membership comparison; matches when the stored value (or any array element) is in `values`.
 */
export function inList(prop: string, values: readonly unknown[]): QueryComparison {
    return {
        type: "comparison",
        operator: "IN",
        property: prop,
        value: [...values],
    };
}

export function notIn(prop: string, values: readonly unknown[]): QueryComparison {
    return {
        type: "comparison",
        operator: "NOT IN",
        property: prop,
        value: [...values],
    };
}

/** Regular expression match on a string path. */
export function regex(prop: string, pattern: RegExp): QueryComparison {
    return {
        type: "comparison",
        operator: "REGEX",
        property: prop,
        value: pattern,
    };
}

/** Presence (or absence, with `false`) of a path. */
export function exists(prop: string, present: boolean = true): QueryComparison {
    return {
        type: "comparison",
        operator: "EXISTS",
        property: prop,
        value: present,
    };
}

export function asc(prop: string): SortComponent {
    return { type: "sort", property: prop, direction: 1 };
}

export function desc(prop: string): SortComponent {
    return { type: "sort", property: prop, direction: -1 };
}

const COMPARISON_OPERATORS: Record<Exclude<ComparisonOperator, "=">, string> = {
    "!=": "$ne",
    ">": "$gt",
    ">=": "$gte",
    "<": "$lt",
    "<=": "$lte",
    IN: "$in",
    "NOT IN": "$nin",
    REGEX: "$regex",
    EXISTS: "$exists",
};

/** Compile a component tree into a store filter document. */
export function toFilter(component: QueryComponent): Document {
    if (component.type === "comparison") {
        if (component.operator === "=") {
            return { [component.property]: { $eq: component.value } };
        }
        const op = COMPARISON_OPERATORS[component.operator];
        return { [component.property]: { [op]: component.value } };
    }
    const parts = component.components.map(toFilter);
    switch (component.method) {
        case "AND":
            return { $and: parts };
        case "OR":
            return { $or: parts };
        case "NOR":
            return { $nor: parts };
        case "NOT":
            return { $nor: parts };
    }
}

/** Compile sort components into a store sort document, in call order. */
export function toSort(components: readonly SortComponent[]): Document {
    const sort: Document = {};
    for (const component of components) {
        sort[component.property] = component.direction;
    }
    return sort;
}

/**
 * Resolve a dotted field-name path (`"address.city"`) into the stored alias path.
 * References resolve to their key name and cannot be traversed.
 */
export function fieldPath(cls: DocumentClass, path: string): string {
    const out: string[] = [];
    let schema = cls.schema;
    const segments = path.split(".");
    segments.forEach((segment, index) => {
        const field = schema.fields.get(segment);
        if (!field) {
            throw new Error(
                `Field \`${segment}\` not found in document \`${schema.name}\``,
            );
        }
        const ref = schema.references.get(segment);
        if (ref) {
            if (index < segments.length - 1) {
                throw new Error(
                    `Reference \`${segment}\` cannot be traversed in a field path`,
                );
            }
            out.push(ref.keyName);
            return;
        }
        out.push(field.alias);
        const { mapper } = unwrapSequence(field.mapper);
        if (
            mapper instanceof EmbeddedDocumentMapper &&
            !(mapper instanceof ReferencedDocumentMapper)
        ) {
            schema = mapper.handle.documentType.schema;
        } else if (index < segments.length - 1) {
            throw new Error(
                `Field \`${segment}\` of document \`${schema.name}\` has no nested fields`,
            );
        }
    });
    return out.join(".");
}
