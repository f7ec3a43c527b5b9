import {WriteContext, checkInt32} from "./context";
import {TypeMismatchError, shapeOf} from "./errors";
import {codecFor} from "./properties";
import {EXTENSION_OVERRIDABLE, NONE, PropertyNode, PropertyTypeName, TagFlags, isMapEntry, isPropertyList} from "./tree";

/** Encode a property sequence followed by its `None` terminator. */
export function encode(properties: PropertyNode[]): Buffer {
    const ctx = new WriteContext();
    encodeProperties(ctx, properties);
    return ctx.toBuffer();
}

export function encodeProperties(ctx: WriteContext, properties: PropertyNode[]) {
    for (const property of properties) {
        encodeProperty(ctx, property);
    }
    ctx.writeString(NONE);
}

export function writeTypeName(ctx: WriteContext, type: PropertyTypeName) {
    ctx.writeString(type.name);
    ctx.writeInt32(type.params.length);
    for (const param of type.params) {
        writeTypeName(ctx, param);
    }
}

function writeTag(ctx: WriteContext, property: PropertyNode, flags: number) {
    const {meta} = property;
    ctx.writeUInt8(flags);
    if (flags & TagFlags.HasArrayIndex) {
        ctx.writeInt32(meta.arrayIndex ?? 0);
    }
    if (flags & TagFlags.HasPropertyGuid) {
        const guid = Buffer.from(meta.guid ?? "", "hex");
        if (guid.length !== 16) {
            throw new TypeMismatchError(property.name, "16-byte property guid", `${guid.length} bytes`);
        }
        ctx.writeBytes(guid);
    }
    if (flags & TagFlags.HasPropertyExtensions) {
        const extensions = meta.extensions ?? {flags: 0};
        ctx.writeUInt8(extensions.flags);
        if (extensions.flags & EXTENSION_OVERRIDABLE) {
            ctx.writeUInt8(extensions.operation ?? 0);
            ctx.writeUInt32(extensions.experimental ?? 0);
        }
    }
}

/**
 * Write one property: name, type, a size placeholder, the tag as stored,
 * then the payload, and back-patch the size. Returns the payload size.
 */
export function encodeProperty(ctx: WriteContext, property: PropertyNode): number {
    const {name, type, value, meta} = property;
    ctx.writeString(name);
    writeTypeName(ctx, {name: type, params: meta.typeParams});
    const sizeAt = ctx.placeholder();

    const codec = codecFor(type);
    let start: number;
    if (meta.opaque || !codec) {
        if (!Buffer.isBuffer(value)) {
            throw new TypeMismatchError(name, `raw bytes for ${type}`, shapeOf(value));
        }
        writeTag(ctx, property, meta.flags);
        start = ctx.offset;
        ctx.writeBytes(value);
    } else {
        if (!codec.is(value)) {
            throw new TypeMismatchError(name, `${codec.shape} for ${type}`, shapeOf(value));
        }
        writeTag(ctx, property, codec.flags(value, meta.flags));
        start = ctx.offset;
        codec.write(ctx, value, property, encodeProperties);
    }

    const size = checkInt32(name, "size", ctx.offset - start);
    ctx.patchInt32(sizeAt, size);
    return size;
}

/**
 * Refresh every `declaredSize` in the tree from the current values, children
 * first. Encoding does not need this; it makes an edited tree read true.
 */
export function recalculateSizes(properties: PropertyNode[]) {
    for (const property of properties) {
        for (const child of nestedLists(property)) {
            recalculateSizes(child);
        }
        property.declaredSize = encodeProperty(new WriteContext(256), property);
    }
}

function nestedLists(property: PropertyNode): PropertyNode[][] {
    const {value} = property;
    if (property.meta.opaque || !Array.isArray(value)) return [];
    if (isPropertyList(value)) return [value];
    const lists: PropertyNode[][] = [];
    for (const item of value) {
        if (isPropertyList(item)) {
            lists.push(item);
        } else if (isMapEntry(item)) {
            if (isPropertyList(item.key)) lists.push(item.key);
            if (isPropertyList(item.value)) lists.push(item.value);
        }
    }
    return lists;
}
