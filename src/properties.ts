import _ from "lodash";
import {Context, WriteContext, checkInt32, hexString} from "./context";
import {CodecError, TypeMismatchError, UnknownTypeError, shapeOf} from "./errors";
import {nativeStruct, readNative, writeNative} from "./native";
import {
    Item,
    MapEntry,
    NONE,
    NativeValue,
    ObjectRef,
    PropertyMeta,
    PropertyNode,
    PropertyTypeName,
    PropertyValue,
    SoftObjectPath,
    TagFlags,
    TextValue,
    isMapEntry,
    isPropertyList,
} from "./tree";

/** Everything the tag told us about a property before its payload. */
export interface PropertyHeader {
    name: string;
    type: PropertyTypeName;
    size: number;
    flags: number;
    /** Absolute offset of the property's name. */
    offset: number;
}

export type ReadNested = (ctx: Context) => PropertyNode[];
export type WriteNested = (ctx: WriteContext, properties: PropertyNode[]) => void;

interface PropertyMethods<T> {
    read(ctx: Context, header: PropertyHeader, meta: PropertyMeta, nested: ReadNested): T;
    write(ctx: WriteContext, value: T, node: PropertyNode, nested: WriteNested): void;
}

/** Reading and writing one element of an array, set or map, which carries no tag of its own. */
export interface ItemMethods {
    readItem(ctx: Context, type: PropertyTypeName, nested: ReadNested): Item;
    writeItem(ctx: WriteContext, item: Item, type: PropertyTypeName, nested: WriteNested, where: string): void;
}

export abstract class Property<T extends PropertyValue> implements PropertyMethods<T> {
    /** Runtime shape `is` accepts, for TypeMismatch messages. */
    abstract readonly shape: string;

    abstract is(value: unknown): value is T;

    abstract read(ctx: Context, header: PropertyHeader, meta: PropertyMeta, nested: ReadNested): T;

    abstract write(ctx: WriteContext, value: T, node: PropertyNode, nested: WriteNested): void;

    /** The tag flag byte to write for `value`. Only BoolProperty keeps data there. */
    flags(value: T, flags: number) {
        return flags;
    }
}

export type AnyProperty = Property<PropertyValue>;

function mismatch(where: string, expected: string, value: unknown): never {
    throw new TypeMismatchError(where, expected, shapeOf(value));
}

/**
 * Integer and float scalars: the payload and an array item are the same bytes.
 */
abstract class NumberProperty extends Property<number> implements ItemMethods {
    readonly shape: string = "number";
    protected readonly range: [number, number] | null = null;

    protected abstract readNumber(ctx: Context): number;

    protected abstract writeNumber(ctx: WriteContext, value: number): void;

    is(value: unknown): value is number {
        return typeof value === "number";
    }

    read(ctx: Context, header: PropertyHeader, meta: PropertyMeta) {
        return this.readNumber(ctx);
    }

    write(ctx: WriteContext, value: number, node: PropertyNode) {
        this.checked(ctx, value, node.name);
    }

    readItem(ctx: Context) {
        return this.readNumber(ctx);
    }

    writeItem(ctx: WriteContext, item: Item, type: PropertyTypeName, nested: WriteNested, where: string) {
        if (typeof item !== "number") mismatch(where, this.shape, item);
        this.checked(ctx, item, where);
    }

    private checked(ctx: WriteContext, value: number, where: string) {
        if (this.range) {
            const [min, max] = this.range;
            if (!Number.isInteger(value) || value < min || value > max) {
                throw new TypeMismatchError(where, `integer in [${min}, ${max}]`, String(value));
            }
        }
        this.writeNumber(ctx, value);
    }
}

class Int8Property extends NumberProperty {
    protected readonly range: [number, number] = [-0x80, 0x7f];
    protected readNumber(ctx: Context) { return ctx.readInt8(); }
    protected writeNumber(ctx: WriteContext, value: number) { ctx.writeInt8(value); }
}

class Int16Property extends NumberProperty {
    protected readonly range: [number, number] = [-0x8000, 0x7fff];
    protected readNumber(ctx: Context) { return ctx.readInt16(); }
    protected writeNumber(ctx: WriteContext, value: number) { ctx.writeInt16(value); }
}

class UInt16Property extends NumberProperty {
    protected readonly range: [number, number] = [0, 0xffff];
    protected readNumber(ctx: Context) { return ctx.readUInt16(); }
    protected writeNumber(ctx: WriteContext, value: number) { ctx.writeUInt16(value); }
}

class IntProperty extends NumberProperty {
    protected readonly range: [number, number] = [-0x80000000, 0x7fffffff];
    protected readNumber(ctx: Context) { return ctx.readInt32(); }
    protected writeNumber(ctx: WriteContext, value: number) { ctx.writeInt32(value); }
}

class UInt32Property extends NumberProperty {
    protected readonly range: [number, number] = [0, 0xffffffff];
    protected readNumber(ctx: Context) { return ctx.readUInt32(); }
    protected writeNumber(ctx: WriteContext, value: number) { ctx.writeUInt32(value); }
}

/**
 * Floats keep the exact bits of a NaN in `meta.bits`, since JavaScript
 * collapses every NaN into one.
 */
class FloatProperty extends NumberProperty {
    protected readonly width: number = 4;

    protected readNumber(ctx: Context) { return ctx.readFloat(); }
    protected writeNumber(ctx: WriteContext, value: number) { ctx.writeFloat(value); }

    read(ctx: Context, header: PropertyHeader, meta: PropertyMeta) {
        const value = this.readNumber(ctx);
        if (Number.isNaN(value)) {
            meta.bits = ctx.buffer.subarray(ctx.offset - this.width, ctx.offset).toString("hex");
        }
        return value;
    }

    write(ctx: WriteContext, value: number, node: PropertyNode) {
        const bits = node.meta.bits === undefined ? null : Buffer.from(node.meta.bits, "hex");
        if (Number.isNaN(value) && bits && bits.length === this.width) {
            ctx.writeBytes(bits);
            return;
        }
        this.writeNumber(ctx, value);
    }
}

class DoubleProperty extends FloatProperty {
    protected readonly width: number = 8;
    protected readNumber(ctx: Context) { return ctx.readDouble(); }
    protected writeNumber(ctx: WriteContext, value: number) { ctx.writeDouble(value); }
}

abstract class BigIntProperty extends Property<bigint> implements ItemMethods {
    readonly shape = "bigint";
    protected abstract readonly bits: number;
    protected abstract readonly signed: boolean;

    is(value: unknown): value is bigint {
        return typeof value === "bigint";
    }

    read(ctx: Context) {
        return this.signed ? ctx.readInt64() : ctx.readUInt64();
    }

    write(ctx: WriteContext, value: bigint, node: PropertyNode) {
        this.checked(ctx, value, node.name);
    }

    readItem(ctx: Context) {
        return this.read(ctx);
    }

    writeItem(ctx: WriteContext, item: Item, type: PropertyTypeName, nested: WriteNested, where: string) {
        if (typeof item !== "bigint") mismatch(where, this.shape, item);
        this.checked(ctx, item, where);
    }

    private checked(ctx: WriteContext, value: bigint, where: string) {
        const wrapped = this.signed ? BigInt.asIntN(this.bits, value) : BigInt.asUintN(this.bits, value);
        if (wrapped !== value) {
            throw new TypeMismatchError(where, `${this.signed ? "" : "u"}int${this.bits}`, value.toString());
        }
        if (this.signed) ctx.writeInt64(value);
        else ctx.writeUInt64(value);
    }
}

class Int64Property extends BigIntProperty {
    protected readonly bits = 64;
    protected readonly signed = true;
}

class UInt64Property extends BigIntProperty {
    protected readonly bits = 64;
    protected readonly signed = false;
}

/**
 * The value lives in the tag's flag byte; the payload is empty.
 */
class BoolProperty extends Property<boolean> implements ItemMethods {
    readonly shape = "boolean";

    is(value: unknown): value is boolean {
        return typeof value === "boolean";
    }

    read(ctx: Context, header: PropertyHeader) {
        return (header.flags & TagFlags.BoolTrue) !== 0;
    }

    write() {
        //
    }

    flags(value: boolean, flags: number) {
        return value ? flags | TagFlags.BoolTrue : flags & ~TagFlags.BoolTrue;
    }

    readItem(ctx: Context) {
        return ctx.readUInt8() !== 0;
    }

    writeItem(ctx: WriteContext, item: Item, type: PropertyTypeName, nested: WriteNested, where: string) {
        if (typeof item !== "boolean") mismatch(where, this.shape, item);
        ctx.writeUInt8(item ? 1 : 0);
    }
}

/** `ByteProperty(SomeEnum)` stores enumerator names; a `None` enum means plain bytes. */
function isEnumByte(type: PropertyTypeName) {
    const [enumName] = type.params;
    return enumName !== undefined && enumName.name !== NONE;
}

/** A property-level string, keeping a wire form the writer would not choose in `meta`. */
function readStored(ctx: Context, meta: PropertyMeta) {
    const {value, form} = ctx.readStoredString();
    if (form !== null) meta.stringForm = form;
    return value;
}

/**
 * A single byte, or the enumerator name when the type names an enum.
 * Anything else is kept as raw bytes.
 */
class ByteProperty extends Property<number | string | Buffer> implements ItemMethods {
    readonly shape = "number, string or bytes";

    is(value: unknown): value is number | string | Buffer {
        return typeof value === "number" || typeof value === "string" || Buffer.isBuffer(value);
    }

    read(ctx: Context, header: PropertyHeader, meta: PropertyMeta) {
        if (ctx.remaining === 1) return ctx.readUInt8();
        if (isEnumByte(header.type)) return readStored(ctx, meta);
        return ctx.readBytes(ctx.remaining);
    }

    write(ctx: WriteContext, value: number | string | Buffer, node: PropertyNode) {
        if (typeof value === "string") ctx.writeString(value, node.meta.stringForm ?? null);
        else if (Buffer.isBuffer(value)) ctx.writeBytes(value);
        else this.writeByte(ctx, value, node.name);
    }

    readItem(ctx: Context, type: PropertyTypeName) {
        return isEnumByte(type) ? ctx.readString() : ctx.readUInt8();
    }

    writeItem(ctx: WriteContext, item: Item, type: PropertyTypeName, nested: WriteNested, where: string) {
        if (isEnumByte(type)) {
            if (typeof item !== "string") mismatch(where, "string", item);
            ctx.writeString(item);
            return;
        }
        if (typeof item !== "number") mismatch(where, "number", item);
        this.writeByte(ctx, item, where);
    }

    private writeByte(ctx: WriteContext, value: number, where: string) {
        if (!Number.isInteger(value) || value < 0 || value > 0xff) {
            throw new TypeMismatchError(where, "integer in [0, 255]", String(value));
        }
        ctx.writeUInt8(value);
    }
}

abstract class StringLikeProperty<T extends string | null> extends Property<T> implements ItemMethods {
    readItem(ctx: Context) {
        return ctx.readString();
    }

    writeItem(ctx: WriteContext, item: Item, type: PropertyTypeName, nested: WriteNested, where: string) {
        if (typeof item !== "string") mismatch(where, "string", item);
        ctx.writeString(item);
    }
}

class EnumProperty extends StringLikeProperty<string> {
    readonly shape = "string";

    is(value: unknown): value is string {
        return typeof value === "string";
    }

    read(ctx: Context, header: PropertyHeader, meta: PropertyMeta) {
        return readStored(ctx, meta);
    }

    write(ctx: WriteContext, value: string, node: PropertyNode) {
        ctx.writeString(value, node.meta.stringForm ?? null);
    }
}

/** Str and Name payloads; a zero declared size decodes to `null`. */
class StrProperty extends StringLikeProperty<string | null> {
    readonly shape = "string or null";

    is(value: unknown): value is string | null {
        return value === null || typeof value === "string";
    }

    read(ctx: Context, header: PropertyHeader, meta: PropertyMeta) {
        return ctx.remaining === 0 ? null : readStored(ctx, meta);
    }

    write(ctx: WriteContext, value: string | null, node: PropertyNode) {
        if (value !== null) ctx.writeString(value, node.meta.stringForm ?? null);
    }
}

class NameProperty extends StrProperty {}

export function isObjectRef(value: unknown): value is ObjectRef {
    return _.isPlainObject(value)
        && typeof _.get(value, "kind") === "number"
        && (_.get(value, "path") === null || typeof _.get(value, "path") === "string");
}

/**
 * Either a bare int32 (`{ kind, path: null }`) or an int32 followed by an
 * object path. Payloads fitting neither are kept as raw bytes.
 */
class ObjectProperty extends Property<ObjectRef | Buffer> implements ItemMethods {
    readonly shape = "object reference or bytes";

    is(value: unknown): value is ObjectRef | Buffer {
        return Buffer.isBuffer(value) || isObjectRef(value);
    }

    read(ctx: Context) {
        if (ctx.remaining === 4) {
            return {kind: ctx.readInt32(), path: null};
        }
        if (ctx.remaining >= 8) {
            const length = ctx.buffer.readInt32LE(ctx.offset + 4);
            const bytes = length > 0 ? length : -length * 2;
            if (length !== 0 && length !== 1 && length !== -1 && 8 + bytes === ctx.remaining) {
                const kind = ctx.readInt32();
                return {kind, path: ctx.readString()};
            }
        }
        return ctx.readBytes(ctx.remaining);
    }

    write(ctx: WriteContext, value: ObjectRef | Buffer) {
        if (Buffer.isBuffer(value)) {
            ctx.writeBytes(value);
            return;
        }
        ctx.writeInt32(value.kind);
        if (value.path !== null) ctx.writeString(value.path);
    }

    readItem(ctx: Context): ObjectRef {
        const kind = ctx.readInt32();
        return {kind, path: ctx.readString()};
    }

    writeItem(ctx: WriteContext, item: Item, type: PropertyTypeName, nested: WriteNested, where: string) {
        if (!isObjectRef(item)) mismatch(where, "object reference", item);
        ctx.writeInt32(item.kind);
        ctx.writeString(item.path ?? "");
    }
}

export function isSoftObjectPath(value: unknown): value is SoftObjectPath {
    return _.isPlainObject(value)
        && typeof _.get(value, "packageName") === "string"
        && typeof _.get(value, "assetName") === "string"
        && typeof _.get(value, "subPath") === "string";
}

class SoftObjectProperty extends Property<SoftObjectPath> implements ItemMethods {
    readonly shape = "soft object path";

    is(value: unknown): value is SoftObjectPath {
        return isSoftObjectPath(value);
    }

    read(ctx: Context): SoftObjectPath {
        const packageName = ctx.readString();
        const assetName = ctx.readString();
        const subPath = ctx.readString();
        return {packageName, assetName, subPath};
    }

    write(ctx: WriteContext, value: SoftObjectPath) {
        ctx.writeString(value.packageName);
        ctx.writeString(value.assetName);
        ctx.writeString(value.subPath);
    }

    readItem(ctx: Context) {
        return this.read(ctx);
    }

    writeItem(ctx: WriteContext, item: Item, type: PropertyTypeName, nested: WriteNested, where: string) {
        if (!isSoftObjectPath(item)) mismatch(where, this.shape, item);
        this.write(ctx, item);
    }
}

const HISTORY_NONE = -1;
const HISTORY_BASE = 0;

function isTextValue(value: unknown): value is TextValue {
    if (!_.isPlainObject(value) || typeof _.get(value, "flags") !== "number") return false;
    const kind: unknown = _.get(value, "kind");
    switch (kind) {
        case "none":
            return _.get(value, "invariant") === null || typeof _.get(value, "invariant") === "string";
        case "base":
            return ["namespace", "key", "source"].every(key => typeof _.get(value, key) === "string");
        case "raw":
            return typeof _.get(value, "history") === "number" && Buffer.isBuffer(_.get(value, "raw"));
        default:
            return false;
    }
}

/**
 * Localized text: a flag word, a history type byte, then the history.
 * Culture-invariant and base histories are decoded; other histories are
 * kept as raw bytes.
 */
class TextProperty extends Property<TextValue> {
    readonly shape = "text";

    is(value: unknown): value is TextValue {
        return isTextValue(value);
    }

    read(ctx: Context): TextValue {
        const flags = ctx.readInt32();
        const history = ctx.readInt8();
        if (history === HISTORY_NONE) {
            const hasInvariant = ctx.readInt32() !== 0;
            return {kind: "none", flags, invariant: hasInvariant ? ctx.readString() : null};
        }
        if (history === HISTORY_BASE) {
            const namespace = ctx.readString();
            const key = ctx.readString();
            const source = ctx.readString();
            return {kind: "base", flags, namespace, key, source};
        }
        return {kind: "raw", flags, history, raw: ctx.readBytes(ctx.remaining)};
    }

    write(ctx: WriteContext, value: TextValue) {
        ctx.writeInt32(value.flags);
        switch (value.kind) {
            case "none":
                ctx.writeInt8(HISTORY_NONE);
                ctx.writeInt32(value.invariant === null ? 0 : 1);
                if (value.invariant !== null) ctx.writeString(value.invariant);
                break;
            case "base":
                ctx.writeInt8(HISTORY_BASE);
                ctx.writeString(value.namespace);
                ctx.writeString(value.key);
                ctx.writeString(value.source);
                break;
            case "raw":
                ctx.writeInt8(value.history);
                ctx.writeBytes(value.raw);
                break;
        }
    }
}

function isNativeValue(value: unknown): value is NativeValue {
    return typeof value === "object" && value !== null && _.isPlainObject(value)
        && Object.values(value).every(v => typeof v === "number" || typeof v === "bigint" || typeof v === "string");
}

/**
 * A nested property list up to its own `None`, or the binary layout of a
 * native struct such as Vector. Natively serialized structs of unknown
 * layout are kept as raw bytes.
 */
class StructProperty extends Property<PropertyNode[] | NativeValue | Buffer> implements ItemMethods {
    readonly shape = "property list, native struct or bytes";

    is(value: unknown): value is PropertyNode[] | NativeValue | Buffer {
        return Buffer.isBuffer(value) || isPropertyList(value) || isNativeValue(value);
    }

    read(ctx: Context, header: PropertyHeader, meta: PropertyMeta, nested: ReadNested) {
        const layout = nativeStruct(header.type.params[0]?.name);
        if (layout) {
            return ctx.remaining === layout.size ? readNative(ctx, layout) : ctx.readBytes(ctx.remaining);
        }
        if (header.flags & TagFlags.HasBinaryOrNativeSerialize) {
            return ctx.readBytes(ctx.remaining);
        }
        return nested(ctx);
    }

    write(ctx: WriteContext, value: PropertyNode[] | NativeValue | Buffer, node: PropertyNode, nested: WriteNested) {
        if (Buffer.isBuffer(value)) {
            ctx.writeBytes(value);
        } else {
            this.writeItem(ctx, value, {name: node.type, params: node.meta.typeParams}, nested, node.name);
        }
    }

    readItem(ctx: Context, type: PropertyTypeName, nested: ReadNested) {
        const layout = nativeStruct(type.params[0]?.name);
        return layout ? readNative(ctx, layout) : nested(ctx);
    }

    writeItem(ctx: WriteContext, item: Item, type: PropertyTypeName, nested: WriteNested, where: string) {
        if (isPropertyList(item)) {
            nested(ctx, item);
            return;
        }
        const structName = type.params[0]?.name;
        const layout = nativeStruct(structName);
        if (!layout || !isNativeValue(item)) {
            mismatch(where, layout ? `native ${layout.name}` : `property list for ${structName ?? "struct"}`, item);
        }
        writeNative(ctx, item, layout, where);
    }
}

export function itemCodec(tag: string): (AnyProperty & ItemMethods) | undefined {
    const codec = codecFor(tag);
    return codec && isItemCodec(codec) ? codec : undefined;
}

function isItemCodec(codec: AnyProperty): codec is AnyProperty & ItemMethods {
    return "readItem" in codec && "writeItem" in codec;
}

/**
 * Element type of a collection with an item codec, or `null` when the
 * collection has to stay raw. Element types nobody knows are reported.
 */
function elementCodec(ctx: Context, header: PropertyHeader, type: PropertyTypeName | undefined) {
    const codec = type && itemCodec(type.name);
    if (type && !codecFor(type.name)) {
        const error = new UnknownTypeError(type.name, header.offset);
        ctx.warn({code: error.code, name: header.name, type: type.name, offset: header.offset, message: error.message});
    }
    return codec ?? null;
}

function readItems(ctx: Context, count: number, codec: ItemMethods, type: PropertyTypeName, nested: ReadNested) {
    const items: Item[] = [];
    for (let i = 0; i < count; i++) {
        items.push(codec.readItem(ctx, type, nested));
    }
    return items;
}

function writeItems(
    ctx: WriteContext,
    items: Item[],
    type: PropertyTypeName | undefined,
    nested: WriteNested,
    where: string,
    separated = false,
) {
    ctx.writeInt32(checkInt32(where, "element count", items.length));
    if (items.length === 0) return;
    const codec = type && itemCodec(type.name);
    if (!type || !codec) {
        throw new TypeMismatchError(where, `raw bytes for element type ${type?.name ?? "(none)"}`, "array");
    }
    for (let i = 0; i < items.length; i++) {
        if (i > 0 && separated) ctx.writeInt32(0);
        codec.writeItem(ctx, items[i], type, nested, `${where}[${i}]`);
    }
}

function isItemList(value: unknown): value is Item[] {
    return Array.isArray(value);
}

/**
 * The first element of a struct array, or `null` when it does not read as a
 * tagged property list: a natively serialized struct with no known layout.
 * Warnings raised while trying are withdrawn.
 */
function firstStruct(ctx: Context, nested: ReadNested): PropertyNode[] | null {
    const warned = ctx.warnings.length;
    try {
        return nested(ctx);
    } catch (e) {
        if (!(e instanceof CodecError)) throw e;
        ctx.warnings.splice(warned);
        return null;
    }
}

/**
 * Element count followed by the elements, positionally, with no per-item tag.
 * Tagged struct elements may be separated by a zero int32; whether they are
 * is decided at the first gap and kept in `meta.separated`.
 */
class ArrayProperty extends Property<Item[] | Buffer> {
    readonly shape = "array or bytes";

    is(value: unknown): value is Item[] | Buffer {
        return Buffer.isBuffer(value) || isItemList(value);
    }

    read(ctx: Context, header: PropertyHeader, meta: PropertyMeta, nested: ReadNested) {
        const type = header.type.params[0];
        const codec = elementCodec(ctx, header, type);
        if (!type || !codec) {
            return ctx.readBytes(ctx.remaining);
        }
        const start = ctx.offset;
        const count = ctx.readCount("array elements");
        if (type.name !== "StructProperty") {
            return readItems(ctx, count, codec, type, nested);
        }
        const layout = nativeStruct(type.params[0]?.name);
        if (layout) {
            if (ctx.remaining !== count * layout.size) {
                ctx.offset = start;
                return ctx.readBytes(ctx.remaining);
            }
            return readItems(ctx, count, codec, type, nested);
        }

        const items: Item[] = [];
        let separated = false;
        for (let i = 0; i < count; i++) {
            if (i === 0) {
                const first = firstStruct(ctx, nested);
                if (first === null) {
                    ctx.trace(`[Read] ${header.type.name} '${header.name}' holds untagged ${type.params[0]?.name ?? "struct"} elements, kept raw`);
                    ctx.offset = start;
                    return ctx.readBytes(ctx.remaining);
                }
                items.push(first);
                continue;
            }
            if (i === 1) {
                separated = ctx.peekInt32() === 0;
                if (separated) meta.separated = true;
            }
            if (separated) ctx.skip(4);
            items.push(nested(ctx));
        }
        return items;
    }

    write(ctx: WriteContext, value: Item[] | Buffer, node: PropertyNode, nested: WriteNested) {
        if (Buffer.isBuffer(value)) {
            ctx.writeBytes(value);
            return;
        }
        writeItems(ctx, value, node.meta.typeParams[0], nested, node.name, node.meta.separated === true);
    }
}

/**
 * Elements to remove, then the elements themselves, each list count-prefixed.
 */
class SetProperty extends Property<Item[] | Buffer> {
    readonly shape = "array or bytes";

    is(value: unknown): value is Item[] | Buffer {
        return Buffer.isBuffer(value) || isItemList(value);
    }

    read(ctx: Context, header: PropertyHeader, meta: PropertyMeta, nested: ReadNested) {
        const type = header.type.params[0];
        const codec = elementCodec(ctx, header, type);
        if (!type || !codec) {
            return ctx.readBytes(ctx.remaining);
        }
        const removed = readItems(ctx, ctx.readCount("removed set elements"), codec, type, nested);
        if (removed.length > 0) meta.removed = removed;
        return readItems(ctx, ctx.readCount("set elements"), codec, type, nested);
    }

    write(ctx: WriteContext, value: Item[] | Buffer, node: PropertyNode, nested: WriteNested) {
        if (Buffer.isBuffer(value)) {
            ctx.writeBytes(value);
            return;
        }
        const type = node.meta.typeParams[0];
        writeItems(ctx, node.meta.removed ?? [], type, nested, `${node.name}.removed`);
        writeItems(ctx, value, type, nested, node.name);
    }
}

function isMapEntries(value: unknown): value is MapEntry[] {
    return Array.isArray(value) && value.every(isMapEntry);
}

/**
 * Keys to remove, then key/value pairs, each list count-prefixed.
 */
class MapProperty extends Property<MapEntry[] | Buffer> {
    readonly shape = "array of { key, value } or bytes";

    is(value: unknown): value is MapEntry[] | Buffer {
        return Buffer.isBuffer(value) || isMapEntries(value);
    }

    read(ctx: Context, header: PropertyHeader, meta: PropertyMeta, nested: ReadNested) {
        const [keyType, valueType] = header.type.params;
        const keyCodec = elementCodec(ctx, header, keyType);
        const valueCodec = elementCodec(ctx, header, valueType);
        if (!keyType || !valueType || !keyCodec || !valueCodec) {
            return ctx.readBytes(ctx.remaining);
        }
        const removed = readItems(ctx, ctx.readCount("removed map keys"), keyCodec, keyType, nested);
        if (removed.length > 0) meta.removed = removed;
        const count = ctx.readCount("map entries");
        const entries: MapEntry[] = [];
        for (let i = 0; i < count; i++) {
            const key = keyCodec.readItem(ctx, keyType, nested);
            const value = valueCodec.readItem(ctx, valueType, nested);
            entries.push({key, value});
        }
        return entries;
    }

    write(ctx: WriteContext, value: MapEntry[] | Buffer, node: PropertyNode, nested: WriteNested) {
        if (Buffer.isBuffer(value)) {
            ctx.writeBytes(value);
            return;
        }
        const [keyType, valueType] = node.meta.typeParams;
        writeItems(ctx, node.meta.removed ?? [], keyType, nested, `${node.name}.removed`);
        ctx.writeInt32(checkInt32(node.name, "entry count", value.length));
        if (value.length === 0) return;
        const keyCodec = keyType && itemCodec(keyType.name);
        const valueCodec = valueType && itemCodec(valueType.name);
        if (!keyType || !valueType || !keyCodec || !valueCodec) {
            throw new TypeMismatchError(node.name, `raw bytes for ${keyType?.name ?? "(none)"} -> ${valueType?.name ?? "(none)"}`, "array");
        }
        value.forEach((entry, i) => {
            keyCodec.writeItem(ctx, entry.key, keyType, nested, `${node.name}[${i}].key`);
            valueCodec.writeItem(ctx, entry.value, valueType, nested, `${node.name}[${i}].value`);
        });
    }
}

const CODECS = {
    Int8Property: new Int8Property(),
    Int16Property: new Int16Property(),
    IntProperty: new IntProperty(),
    Int64Property: new Int64Property(),
    UInt16Property: new UInt16Property(),
    UInt32Property: new UInt32Property(),
    UInt64Property: new UInt64Property(),
    FloatProperty: new FloatProperty(),
    DoubleProperty: new DoubleProperty(),
    BoolProperty: new BoolProperty(),
    ByteProperty: new ByteProperty(),
    EnumProperty: new EnumProperty(),
    StrProperty: new StrProperty(),
    NameProperty: new NameProperty(),
    ObjectProperty: new ObjectProperty(),
    SoftObjectProperty: new SoftObjectProperty(),
    TextProperty: new TextProperty(),
    StructProperty: new StructProperty(),
    ArrayProperty: new ArrayProperty(),
    SetProperty: new SetProperty(),
    MapProperty: new MapProperty(),
};

export type PropertyTag = keyof typeof CODECS;

export function isPropertyType(tag: string): tag is PropertyTag {
    return _.has(CODECS, tag);
}

export const PROPERTY_TAGS: readonly PropertyTag[] = Object.keys(CODECS).filter(isPropertyType);

export function codecFor(tag: string): AnyProperty | undefined {
    return isPropertyType(tag) ? CODECS[tag] : undefined;
}

/** Up to 16 bytes of a payload as hex, for log lines. */
export function preview(bytes: Uint8Array) {
    const head = hexString(bytes.subarray(0, 16));
    return bytes.length > 16 ? `${head} ...` : head;
}
