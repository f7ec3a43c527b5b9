import {UnknownTypeError} from "./errors";
import {AnyProperty, PROPERTY_TAGS, PropertyTag, codecFor} from "./properties";

export interface TypeEntry {
    tag: PropertyTag;
    /** Composite payloads nest further properties or items. */
    kind: "leaf" | "composite";
    /** Exact payload size, for scalars. */
    fixedSize?: number;
    codec: AnyProperty;
}

const FIXED_SIZES: Partial<Record<PropertyTag, number>> = {
    Int8Property: 1,
    Int16Property: 2,
    IntProperty: 4,
    Int64Property: 8,
    UInt16Property: 2,
    UInt32Property: 4,
    UInt64Property: 8,
    FloatProperty: 4,
    DoubleProperty: 8,
    BoolProperty: 0,
};

const COMPOSITES: readonly PropertyTag[] = ["StructProperty", "ArrayProperty", "SetProperty", "MapProperty"];

function entry(tag: PropertyTag): TypeEntry | undefined {
    const codec = codecFor(tag);
    if (!codec) return undefined;
    return {
        tag,
        kind: COMPOSITES.includes(tag) ? "composite" : "leaf",
        fixedSize: FIXED_SIZES[tag],
        codec,
    };
}

const REGISTRY: ReadonlyMap<string, TypeEntry> = new Map(
    PROPERTY_TAGS.flatMap(tag => {
        const found = entry(tag);
        return found ? [[tag, found] as const] : [];
    }),
);

export function isKnownType(tag: string) {
    return REGISTRY.has(tag);
}

/** Registry entry for a type tag read at `offset`. */
export function lookupType(tag: string, offset = -1): TypeEntry {
    const found = REGISTRY.get(tag);
    if (!found) {
        throw new UnknownTypeError(tag, offset);
    }
    return found;
}
