import _ from "lodash";
import type {StringForm} from "./context";
import {TypeMismatchError, shapeOf} from "./errors";

/**
 * Property type name as written by UE5: a name followed by its parameters,
 * e.g. `StructProperty(ArkItem(/Script/ShooterGame))` or `ArrayProperty(IntProperty)`.
 */
export interface PropertyTypeName {
    name: string;
    params: PropertyTypeName[];
}

/** Bits of the tag flag byte. Unlisted bits are carried through untouched. */
export const TagFlags = {
    HasArrayIndex: 0x01,
    HasPropertyGuid: 0x02,
    HasPropertyExtensions: 0x04,
    HasBinaryOrNativeSerialize: 0x08,
    BoolTrue: 0x10,
    SkippedSerialize: 0x20,
} as const;

/** Overridable-information bit of the extension byte. */
export const EXTENSION_OVERRIDABLE = 0x02;

export interface TagExtensions {
    flags: number;
    operation?: number;
    experimental?: number;
}

export interface ObjectRef {
    kind: number;
    /** `null` for the plain 4-byte index form. */
    path: string | null;
}

export interface SoftObjectPath {
    packageName: string;
    assetName: string;
    subPath: string;
}

export type TextValue =
    | { kind: "none"; flags: number; invariant: string | null }
    | { kind: "base"; flags: number; namespace: string; key: string; source: string }
    | { kind: "raw"; flags: number; history: number; raw: Buffer };

/** Decoded native struct, e.g. `{ x, y, z }` for a Vector. */
export interface NativeValue {
    [field: string]: number | bigint | string;
}

/** One element of an array or set, or one side of a map entry. */
export type Item =
    | number
    | bigint
    | boolean
    | string
    | ObjectRef
    | SoftObjectPath
    | NativeValue
    | PropertyNode[];

export interface MapEntry {
    key: Item;
    value: Item;
}

export type PropertyValue =
    | Item
    | Item[]
    | MapEntry[]
    | TextValue
    | Buffer
    | null;

export interface PropertyMeta {
    /** Parameters of the type name: struct name and package, element, key and value types, enum name. */
    typeParams: PropertyTypeName[];
    /** Raw tag flag byte. */
    flags: number;
    arrayIndex?: number;
    /** Hex of the 16-byte property guid block. */
    guid?: string;
    extensions?: TagExtensions;
    /** Struct arrays whose elements are separated by a zero int32. */
    separated?: boolean;
    /** Items listed for removal ahead of a set's or map's elements. */
    removed?: Item[];
    /** Wire form of a Str, Name, Enum or enum Byte value the writer would not pick itself. */
    stringForm?: StringForm;
    /** Exact bits of a NaN float, hex. */
    bits?: string;
    /** Payload kept verbatim: unknown type, or recovered from a size mismatch. */
    opaque?: boolean;
}

export interface PropertyNode {
    name: string;
    type: string;
    declaredSize: number;
    value: PropertyValue;
    meta: PropertyMeta;
}

export const NONE = "None";

export function isPropertyList(value: unknown): value is PropertyNode[] {
    return Array.isArray(value) && value.every(isPropertyNode);
}

export function isPropertyNode(value: unknown): value is PropertyNode {
    return _.isPlainObject(value)
        && typeof _.get(value, "name") === "string"
        && typeof _.get(value, "type") === "string"
        && _.isPlainObject(_.get(value, "meta"));
}

export function isMapEntry(value: unknown): value is MapEntry {
    return _.isPlainObject(value) && _.has(value, "key") && _.has(value, "value");
}

/** The `index`th property named `name` in a sequence. */
export function findProperty(properties: PropertyNode[], name: string, index = 0): PropertyNode | undefined {
    return properties.filter(p => p.name === name)[index];
}

/**
 * Resolve a path such as `MyArkData.ArkItems` or `MyArkData.ArkItems[0].ItemQuantity`.
 * Named segments step into struct values, numeric segments into struct items of an array.
 */
export function getPropertyAt(properties: PropertyNode[], path: string): PropertyNode | undefined {
    const segments = _.toPath(path);
    let scope: PropertyValue = properties;
    let found: PropertyNode | undefined;

    for (const segment of segments) {
        if (/^\d+$/.test(segment)) {
            if (!found || !Array.isArray(found.value)) return undefined;
            const item: unknown = found.value[Number(segment)];
            if (!isPropertyList(item)) return undefined;
            scope = item;
            found = undefined;
            continue;
        }
        if (!isPropertyList(scope)) return undefined;
        found = findProperty(scope, segment);
        if (!found) return undefined;
        scope = found.value;
    }
    return found;
}

export const COLLECTION_TYPES: readonly string[] = ["ArrayProperty", "SetProperty", "MapProperty"];

/**
 * Empty an array, set or map in place. The declared size becomes that of the
 * count words alone: 4 for an array, 8 for a set or map.
 */
export function clearCollection(node: PropertyNode): number {
    if (!_.includes(COLLECTION_TYPES, node.type)) {
        throw new TypeMismatchError(node.name, "ArrayProperty, SetProperty or MapProperty", node.type);
    }
    const previous = Array.isArray(node.value) ? node.value.length : 0;
    if (!Array.isArray(node.value) && !Buffer.isBuffer(node.value)) {
        throw new TypeMismatchError(node.name, "array", shapeOf(node.value));
    }
    node.value = [];
    if (node.type === "ArrayProperty") {
        node.declaredSize = 4;
    } else {
        node.meta.removed = [];
        node.declaredSize = 8;
    }
    delete node.meta.separated;
    delete node.meta.opaque;
    return previous;
}
