import {Context, DecodeOptions, DecodeWarning} from "./context";
import {CodecError, SizeMismatchError, StringFormError, TruncatedInputError, UnknownTypeError} from "./errors";
import {PropertyHeader, preview} from "./properties";
import {TypeEntry, lookupType} from "./registry";
import {EXTENSION_OVERRIDABLE, NONE, PropertyMeta, PropertyNode, PropertyTypeName, TagExtensions, TagFlags} from "./tree";

export interface DecodeResult {
    properties: PropertyNode[];
    warnings: DecodeWarning[];
    /** Offset just past the top-level `None`. */
    end: number;
}

/**
 * Decode a property sequence from the start of `buffer` up to and including
 * its `None` terminator. Bytes after the terminator are left alone.
 */
export function decode(buffer: Buffer, options: DecodeOptions = {}): DecodeResult {
    const ctx = Context.of(buffer, options);
    const properties = decodeProperties(ctx);
    return {properties, warnings: ctx.warnings, end: ctx.offset};
}

export function decodeProperties(ctx: Context): PropertyNode[] {
    const properties: PropertyNode[] = [];
    for (;;) {
        const offset = ctx.position;
        if (ctx.remaining === 0) {
            throw new TruncatedInputError(`'${NONE}' terminator`, offset, 4, 0);
        }
        const name = ctx.readString();
        if (name === NONE) {
            return properties;
        }
        properties.push(readProperty(ctx, name, offset));
    }
}

export function readTypeName(ctx: Context): PropertyTypeName {
    const name = ctx.readString();
    // every parameter is at least a string length and a count
    const count = ctx.readCount(`parameters of '${name}'`, 8);
    const params: PropertyTypeName[] = [];
    for (let i = 0; i < count; i++) {
        params.push(readTypeName(ctx));
    }
    return {name, params};
}

function readExtensions(ctx: Context): TagExtensions {
    const extensions: TagExtensions = {flags: ctx.readUInt8()};
    if (extensions.flags & EXTENSION_OVERRIDABLE) {
        extensions.operation = ctx.readUInt8();
        extensions.experimental = ctx.readUInt32();
    }
    return extensions;
}

function readProperty(ctx: Context, name: string, offset: number): PropertyNode {
    const type = readTypeName(ctx);
    const size = ctx.readInt32();
    const flags = ctx.readUInt8();

    const tag: PropertyMeta = {typeParams: type.params, flags};
    if (flags & TagFlags.HasArrayIndex) {
        tag.arrayIndex = ctx.readInt32();
    }
    if (flags & TagFlags.HasPropertyGuid) {
        tag.guid = ctx.readBytes(16, "property guid").toString("hex");
    }
    if (flags & TagFlags.HasPropertyExtensions) {
        tag.extensions = readExtensions(ctx);
    }

    ctx.trace(`[Read] ${type.name} '${name}' (${size})`);

    const window = ctx.window(size, `payload of '${name}'`);
    ctx.skip(size);

    let entry: TypeEntry;
    try {
        entry = lookupType(type.name, offset);
    } catch (e) {
        if (!(e instanceof UnknownTypeError)) throw e;
        warn(ctx, e, name, type.name);
        return opaque(ctx, name, type.name, size, window.buffer, tag);
    }

    const header: PropertyHeader = {name, type, size, flags, offset};
    const meta: PropertyMeta = {...tag};
    try {
        if (entry.fixedSize !== undefined && entry.fixedSize !== size) {
            throw new SizeMismatchError(name, size, entry.fixedSize, offset);
        }
        const value = entry.codec.read(window, header, meta, decodeProperties);
        if (window.remaining !== 0) {
            throw new SizeMismatchError(name, size, window.offset, offset);
        }
        return {name, type: type.name, declaredSize: size, value, meta};
    } catch (e) {
        if (e instanceof StringFormError) {
            return opaque(ctx, name, type.name, size, window.buffer, tag);
        }
        // running off the end of the payload window means the declared size is too small
        const error = e instanceof TruncatedInputError
            ? new SizeMismatchError(name, size, size + e.needed - e.available, offset)
            : e;
        if (!(error instanceof SizeMismatchError) || !ctx.options.lenient) throw error;
        warn(ctx, error, name, type.name);
        return opaque(ctx, name, type.name, size, window.buffer, tag);
    }
}

function warn(ctx: Context, error: CodecError, name: string, type: string) {
    ctx.warn({code: error.code, name, type, offset: error.offset ?? ctx.position, message: error.message});
}

function opaque(ctx: Context, name: string, type: string, size: number, payload: Buffer, tag: PropertyMeta): PropertyNode {
    ctx.trace(`[Read] ${type} '${name}' kept raw: ${preview(payload)}`);
    return {name, type, declaredSize: size, value: Buffer.from(payload), meta: {...tag, opaque: true}};
}
