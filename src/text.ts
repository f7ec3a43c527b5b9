import _ from "lodash";
import {STRING_FORMS} from "./context";
import {ProfileError, TypeMismatchError, shapeOf} from "./errors";
import {HEADER_STRINGS, HeaderStringForms, Profile, ProfileHeader} from "./profile";
import {codecFor} from "./properties";
import {PropertyMeta, PropertyNode, PropertyTypeName, PropertyValue, TagExtensions, isPropertyNode} from "./tree";

/*
 * JSON form of a property tree. Each node is an object:
 *
 *   { "name": "Level", "type": "IntProperty", "_size": 4, "_typeParams": [], "_flags": 0, "value": 12 }
 *
 * Metadata sits under "_"-prefixed keys and must be kept when editing.
 * Values JSON cannot hold are tagged: {"_bigint": "..."}, {"_hex": "..."} and
 * {"_float": "NaN" | "Infinity" | "-Infinity" | "-0"}.
 */

export type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

const META_PREFIX = "_";
const SIZE_KEY = "_size";
const META_KEYS = ["typeParams", "flags", "arrayIndex", "guid", "extensions", "separated", "removed", "stringForm", "bits", "opaque"];

const FLOATS: Record<string, number> = {
    "NaN": NaN,
    "Infinity": Infinity,
    "-Infinity": -Infinity,
    "-0": -0,
};

function fromEntries(entries: [string, Json][]): { [key: string]: Json } {
    const result: { [key: string]: Json } = {};
    for (const [key, value] of entries) {
        result[key] = value;
    }
    return result;
}

export function toJson(value: unknown): Json {
    if (value === null || value === undefined) return null;
    if (typeof value === "bigint") return {_bigint: value.toString()};
    if (Buffer.isBuffer(value)) return {_hex: value.toString("hex")};
    if (typeof value === "number") {
        if (Object.is(value, -0)) return {_float: "-0"};
        return Number.isFinite(value) ? value : {_float: String(value)};
    }
    if (typeof value === "string" || typeof value === "boolean") return value;
    if (Array.isArray(value)) {
        return value.map(item => isPropertyNode(item) ? nodeToJson(item) : toJson(item));
    }
    if (typeof value === "object" && _.isPlainObject(value)) {
        return fromEntries(Object.entries(value).map(([key, v]): [string, Json] => [key, toJson(v)]));
    }
    throw new TypeMismatchError("(text)", "JSON-representable value", shapeOf(value));
}

export function nodeToJson(node: PropertyNode): Json {
    const meta = _.mapValues(_.mapKeys(node.meta, (v, key) => META_PREFIX + key), toJson);
    return {
        name: node.name,
        type: node.type,
        [SIZE_KEY]: node.declaredSize,
        ...meta,
        value: toJson(node.value),
    };
}

export function treeToJson(properties: PropertyNode[]): Json[] {
    return properties.map(nodeToJson);
}

function isNodeJson(json: object) {
    return typeof _.get(json, "name") === "string"
        && typeof _.get(json, "type") === "string"
        && _.has(json, SIZE_KEY)
        && _.has(json, "value");
}

function tagged(json: object, key: string): string | undefined {
    const keys = Object.keys(json);
    const value = _.get(json, key);
    return keys.length === 1 && keys[0] === key && typeof value === "string" ? value : undefined;
}

/** Inverse of `toJson`: tagged values and node objects come back as they were. */
export function fromJson(json: unknown, where = "(text)"): unknown {
    if (json === null || typeof json === "string" || typeof json === "boolean" || typeof json === "number") {
        return json;
    }
    if (Array.isArray(json)) {
        return json.map((item, i) => fromJson(item, `${where}[${i}]`));
    }
    if (typeof json !== "object" || !_.isPlainObject(json)) {
        throw new TypeMismatchError(where, "JSON value", shapeOf(json));
    }

    const bigint = tagged(json, "_bigint");
    if (bigint !== undefined) {
        if (!/^-?\d+$/.test(bigint)) throw new TypeMismatchError(where, "decimal integer", JSON.stringify(bigint));
        return BigInt(bigint);
    }
    const hex = tagged(json, "_hex");
    if (hex !== undefined) {
        if (!/^([0-9a-fA-F]{2})*$/.test(hex)) throw new TypeMismatchError(where, "hex bytes", JSON.stringify(hex));
        return Buffer.from(hex, "hex");
    }
    const float = tagged(json, "_float");
    if (float !== undefined) {
        if (!_.has(FLOATS, float)) throw new TypeMismatchError(where, "NaN, Infinity, -Infinity or -0", JSON.stringify(float));
        return FLOATS[float];
    }
    if (isNodeJson(json)) {
        return nodeFromJson(json);
    }
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(json)) {
        result[key] = fromJson(value, `${where}.${key}`);
    }
    return result;
}

function typeNameFromJson(json: unknown, where: string): PropertyTypeName {
    const name = _.get(json, "name");
    const params: unknown = _.get(json, "params");
    if (typeof name !== "string" || !Array.isArray(params)) {
        throw new TypeMismatchError(where, "type name { name, params }", shapeOf(json));
    }
    return {name, params: params.map(param => typeNameFromJson(param, where))};
}

function extensionsFromJson(json: unknown, where: string): TagExtensions {
    const flags = _.get(json, "flags");
    const operation = _.get(json, "operation");
    const experimental = _.get(json, "experimental");
    if (typeof flags !== "number"
        || (operation !== undefined && typeof operation !== "number")
        || (experimental !== undefined && typeof experimental !== "number")) {
        throw new TypeMismatchError(where, "extensions { flags, operation?, experimental? }", shapeOf(json));
    }
    const extensions: TagExtensions = {flags};
    if (operation !== undefined) extensions.operation = operation;
    if (experimental !== undefined) extensions.experimental = experimental;
    return extensions;
}

function metaFromJson(json: object, name: string): PropertyMeta {
    const unknownKeys = _.difference(
        Object.keys(json).filter(key => key.startsWith(META_PREFIX) && key !== SIZE_KEY),
        META_KEYS.map(key => META_PREFIX + key),
    );
    if (unknownKeys.length > 0) {
        throw new TypeMismatchError(name, "known metadata keys", unknownKeys.join(", "));
    }

    const field = (key: string) => _.get(json, META_PREFIX + key);
    const expect = (key: string, expected: string): never => {
        throw new TypeMismatchError(`${name}.${META_PREFIX}${key}`, expected, shapeOf(field(key)));
    };

    const typeParams = field("typeParams");
    const flags = field("flags");
    if (!Array.isArray(typeParams)) return expect("typeParams", "array");
    if (typeof flags !== "number") return expect("flags", "number");
    const meta: PropertyMeta = {
        typeParams: typeParams.map(param => typeNameFromJson(param, `${name}._typeParams`)),
        flags,
    };

    const arrayIndex = field("arrayIndex");
    if (arrayIndex !== undefined) {
        if (typeof arrayIndex !== "number") return expect("arrayIndex", "number");
        meta.arrayIndex = arrayIndex;
    }
    const guid = field("guid");
    if (guid !== undefined) {
        if (typeof guid !== "string") return expect("guid", "hex string");
        meta.guid = guid;
    }
    const extensions = field("extensions");
    if (extensions !== undefined) {
        meta.extensions = extensionsFromJson(extensions, `${name}._extensions`);
    }
    const separated = field("separated");
    if (separated !== undefined) {
        if (typeof separated !== "boolean") return expect("separated", "boolean");
        meta.separated = separated;
    }
    const removed = field("removed");
    if (removed !== undefined) {
        const items = fromJson(removed, `${name}._removed`);
        if (!Array.isArray(items)) return expect("removed", "array");
        meta.removed = items;
    }
    const stringForm = field("stringForm");
    if (stringForm !== undefined) {
        const form = STRING_FORMS.find(f => f === stringForm);
        if (form === undefined) return expect("stringForm", STRING_FORMS.join(", "));
        meta.stringForm = form;
    }
    const bits = field("bits");
    if (bits !== undefined) {
        if (typeof bits !== "string") return expect("bits", "hex string");
        meta.bits = bits;
    }
    const opaque = field("opaque");
    if (opaque !== undefined) {
        if (typeof opaque !== "boolean") return expect("opaque", "boolean");
        meta.opaque = opaque;
    }
    return meta;
}

function valueOf(name: string, type: string, meta: PropertyMeta, value: unknown): PropertyValue {
    const codec = codecFor(type);
    if (meta.opaque || !codec) {
        if (Buffer.isBuffer(value)) return value;
        throw new TypeMismatchError(name, `raw bytes for ${type}`, shapeOf(value));
    }
    if (codec.is(value)) return value;
    throw new TypeMismatchError(name, `${codec.shape} for ${type}`, shapeOf(value));
}

export function nodeFromJson(json: unknown): PropertyNode {
    if (typeof json !== "object" || json === null || !isNodeJson(json)) {
        throw new TypeMismatchError("(text)", "property { name, type, _size, value }", shapeOf(json));
    }
    const name = String(_.get(json, "name"));
    const type = String(_.get(json, "type"));
    const declaredSize = _.get(json, SIZE_KEY);
    if (typeof declaredSize !== "number") {
        throw new TypeMismatchError(`${name}.${SIZE_KEY}`, "number", shapeOf(declaredSize));
    }
    const meta = metaFromJson(json, name);
    const value = valueOf(name, type, meta, fromJson(_.get(json, "value"), name));
    return {name, type, declaredSize, value, meta};
}

export function treeFromJson(json: unknown): PropertyNode[] {
    if (!Array.isArray(json)) {
        throw new TypeMismatchError("(text)", "array of properties", shapeOf(json));
    }
    return json.map(nodeFromJson);
}

/**
 * Whole profiles
 */

export function toText(profile: Profile, indent = 2): string {
    return JSON.stringify({
        header: profile.header,
        properties: treeToJson(profile.properties),
        trailer: profile.trailer.toString("hex"),
    }, null, indent);
}

function headerFromJson(json: unknown): ProfileHeader {
    const text = (key: string) => {
        const value = _.get(json, key);
        if (typeof value !== "string") throw new ProfileError(`header.${key} must be a string`);
        return value;
    };
    const int = (key: string) => {
        const value = _.get(json, key);
        if (!Number.isInteger(value)) throw new ProfileError(`header.${key} must be an integer`);
        return Number(value);
    };
    const ints = (key: string) => {
        const value = _.get(json, key);
        if (!Array.isArray(value) || !value.every(Number.isInteger)) {
            throw new ProfileError(`header.${key} must be an array of integers`);
        }
        return value.map(Number);
    };
    const header: ProfileHeader = {
        versions: ints("versions"),
        version: int("version"),
        guid: text("guid"),
        fileType: text("fileType"),
        reserved: ints("reserved"),
        name: text("name"),
        controller: text("controller"),
        gameMode: text("gameMode"),
        mapName: text("mapName"),
        mapPath: text("mapPath"),
        padding: text("padding"),
        headerSize: int("headerSize"),
        headerTail: int("headerTail"),
        separator: int("separator"),
    };
    const stringForms = _.get(json, "stringForms");
    if (stringForms !== undefined) header.stringForms = stringFormsFromJson(stringForms);
    return header;
}

function stringFormsFromJson(json: unknown): HeaderStringForms {
    if (typeof json !== "object" || json === null || !_.isPlainObject(json)) {
        throw new ProfileError("header.stringForms must be an object");
    }
    const forms: HeaderStringForms = {};
    for (const field of HEADER_STRINGS) {
        const value: unknown = _.get(json, field);
        if (value === undefined) continue;
        const form = STRING_FORMS.find(f => f === value);
        if (form === undefined) {
            throw new ProfileError(`header.stringForms.${field} must be one of ${STRING_FORMS.join(", ")}`);
        }
        forms[field] = form;
    }
    const unknownKeys = _.difference(Object.keys(json), [...HEADER_STRINGS]);
    if (unknownKeys.length > 0) {
        throw new ProfileError(`header.stringForms has unknown fields: ${unknownKeys.join(", ")}`);
    }
    return forms;
}

export function fromText(text: string): Profile {
    const json: unknown = JSON.parse(text);
    const trailer = _.get(json, "trailer");
    if (typeof trailer !== "string" || !/^([0-9a-fA-F]{2})*$/.test(trailer)) {
        throw new ProfileError("trailer must be a hex string");
    }
    return {
        header: headerFromJson(_.get(json, "header")),
        properties: treeFromJson(_.get(json, "properties")),
        trailer: Buffer.from(trailer, "hex"),
    };
}
