import {EncodeOverflowError, StringFormError, TruncatedInputError} from "./errors";

/**
 * How a string was stored when `writeString` would store it differently:
 * non-ASCII text in single bytes, ASCII text in UTF-16, or an empty string
 * written as a lone terminator.
 */
export type StringForm = "ansi" | "wide" | "ansi-empty" | "wide-empty";

export const STRING_FORMS: readonly StringForm[] = ["ansi", "wide", "ansi-empty", "wide-empty"];

export interface StoredString {
    value: string;
    /** `null` when `writeString` reproduces the bytes on its own. */
    form: StringForm | null;
}

const ASCII = /^[\x00-\x7f]*$/;

function fitsForm(value: string, form: StringForm | null) {
    switch (form) {
        case "ansi-empty":
        case "wide-empty":
            return value === "";
        case "ansi":
            return /^[\x00-\xff]+$/.test(value);
        case "wide":
            return value !== "";
        default:
            return false;
    }
}

export type Logger = Pick<Console, "debug" | "info" | "warn" | "error">;

export interface DecodeWarning {
    code: string;
    name: string;
    type: string;
    offset: number;
    message: string;
}

export interface DecodeOptions {
    /** Log every property read at debug level. */
    trace?: boolean;
    /** Recover from a size mismatch by keeping the property's bytes opaque and carrying on. */
    lenient?: boolean;
    logger?: Logger;
}

/** State shared by a context and every window cut from it. */
interface DecodeState {
    readonly options: DecodeOptions;
    readonly logger: Logger;
    readonly warnings: DecodeWarning[];
}

const INT32_MAX = 0x7fffffff;

export class Context {

    public offset = 0;

    private constructor(
        public readonly buffer: Buffer,
        /** Absolute offset of `buffer[0]` in the outermost input. */
        public readonly base: number,
        private readonly state: DecodeState,
    ) {
        //
    }

    public static of(buffer: Buffer, options: DecodeOptions = {}) {
        return new Context(buffer, 0, {options, logger: options.logger ?? console, warnings: []});
    }

    get options(): DecodeOptions {
        return this.state.options;
    }

    get warnings(): DecodeWarning[] {
        return this.state.warnings;
    }

    get remaining() {
        return this.buffer.length - this.offset;
    }

    /** Absolute offset of the cursor. */
    get position() {
        return this.base + this.offset;
    }

    public trace(message: string) {
        if (this.state.options.trace) {
            this.state.logger.debug(message);
        }
    }

    public warn(warning: DecodeWarning) {
        this.state.warnings.push(warning);
        this.state.logger.warn(warning.message);
    }

    public ensure(length: number, what: string) {
        if (length < 0 || length > this.remaining) {
            throw new TruncatedInputError(what, this.position, length, this.remaining);
        }
    }

    /**
     * A context over the next `length` bytes. The parent cursor does not move;
     * call `skip` once the window has been consumed.
     */
    public window(length: number, what: string) {
        this.ensure(length, what);
        return new Context(this.buffer.subarray(this.offset, this.offset + length), this.position, this.state);
    }

    public skip(length: number) {
        this.ensure(length, "padding");
        this.offset += length;
    }

    public readUInt8() {
        this.ensure(1, "uint8");
        return this.buffer.readUInt8(this.offset++);
    }

    public readInt8() {
        this.ensure(1, "int8");
        return this.buffer.readInt8(this.offset++);
    }

    public readInt16() {
        this.ensure(2, "int16");
        const value = this.buffer.readInt16LE(this.offset);
        this.offset += 2;
        return value;
    }

    public readUInt16() {
        this.ensure(2, "uint16");
        const value = this.buffer.readUInt16LE(this.offset);
        this.offset += 2;
        return value;
    }

    public readInt32() {
        this.ensure(4, "int32");
        const value = this.buffer.readInt32LE(this.offset);
        this.offset += 4;
        return value;
    }

    public peekInt32() {
        this.ensure(4, "int32");
        return this.buffer.readInt32LE(this.offset);
    }

    public readUInt32() {
        this.ensure(4, "uint32");
        const value = this.buffer.readUInt32LE(this.offset);
        this.offset += 4;
        return value;
    }

    public readInt64() {
        this.ensure(8, "int64");
        const value = this.buffer.readBigInt64LE(this.offset);
        this.offset += 8;
        return value;
    }

    public readUInt64() {
        this.ensure(8, "uint64");
        const value = this.buffer.readBigUInt64LE(this.offset);
        this.offset += 8;
        return value;
    }

    public readFloat() {
        this.ensure(4, "float");
        const value = this.buffer.readFloatLE(this.offset);
        this.offset += 4;
        return value;
    }

    public readDouble() {
        this.ensure(8, "double");
        const value = this.buffer.readDoubleLE(this.offset);
        this.offset += 8;
        return value;
    }

    /** Copy of the next `length` bytes. */
    public readBytes(length: number, what = "bytes") {
        this.ensure(length, what);
        const value = Buffer.from(this.buffer.subarray(this.offset, this.offset + length));
        this.offset += length;
        return value;
    }

    /**
     * Element or entry count. Each element takes at least `minItemSize` bytes,
     * so a count the remaining input cannot hold is reported as truncation.
     */
    public readCount(what: string, minItemSize = 1) {
        const at = this.position;
        const count = this.readInt32();
        if (count < 0 || count * minItemSize > this.remaining) {
            throw new TruncatedInputError(`${what} of ${count}`, at, Math.max(count, 0) * minItemSize, this.remaining);
        }
        return count;
    }

    /**
     * Length-prefixed, null-terminated string. A positive length counts single
     * bytes, a negative one UTF-16 code units; both include the terminator.
     * Throws `StringFormError` for a string `writeString` would store differently.
     */
    public readString() {
        const at = this.position;
        const {value, form} = this.readStoredString();
        if (form !== null) {
            throw new StringFormError(form, at);
        }
        return value;
    }

    /** `readString` that also reports a non-canonical wire form instead of rejecting it. */
    public readStoredString(): StoredString {
        const at = this.position;
        const length = this.readInt32();
        if (length === 0) {
            return {value: "", form: null};
        }
        if (length > 0) {
            if (length > this.remaining) {
                throw new TruncatedInputError("string", at, length, this.remaining);
            }
            const value = this.buffer.toString("latin1", this.offset, this.offset + length - 1);
            this.offset += length;
            if (length === 1) return {value, form: "ansi-empty"};
            return {value, form: ASCII.test(value) ? null : "ansi"};
        }
        const bytes = -length * 2;
        if (bytes > this.remaining) {
            throw new TruncatedInputError("string", at, bytes, this.remaining);
        }
        const value = this.buffer.toString("utf16le", this.offset, this.offset + bytes - 2);
        this.offset += bytes;
        if (length === -1) return {value, form: "wide-empty"};
        return {value, form: ASCII.test(value) ? "wide" : null};
    }
}

export class WriteContext {

    private buffer: Buffer;
    private length = 0;

    constructor(initialSize = 4096) {
        this.buffer = Buffer.alloc(initialSize);
    }

    get offset() {
        return this.length;
    }

    private reserve(size: number) {
        if (this.length + size <= this.buffer.length) return;
        let capacity = this.buffer.length * 2;
        while (capacity < this.length + size) {
            capacity *= 2;
        }
        const next = Buffer.alloc(capacity);
        this.buffer.copy(next, 0, 0, this.length);
        this.buffer = next;
    }

    public writeUInt8(value: number) {
        this.reserve(1);
        this.length = this.buffer.writeUInt8(value, this.length);
    }

    public writeInt8(value: number) {
        this.reserve(1);
        this.length = this.buffer.writeInt8(value, this.length);
    }

    public writeInt16(value: number) {
        this.reserve(2);
        this.length = this.buffer.writeInt16LE(value, this.length);
    }

    public writeUInt16(value: number) {
        this.reserve(2);
        this.length = this.buffer.writeUInt16LE(value, this.length);
    }

    public writeInt32(value: number) {
        this.reserve(4);
        this.length = this.buffer.writeInt32LE(value, this.length);
    }

    public writeUInt32(value: number) {
        this.reserve(4);
        this.length = this.buffer.writeUInt32LE(value, this.length);
    }

    public writeInt64(value: bigint) {
        this.reserve(8);
        this.length = this.buffer.writeBigInt64LE(value, this.length);
    }

    public writeUInt64(value: bigint) {
        this.reserve(8);
        this.length = this.buffer.writeBigUInt64LE(value, this.length);
    }

    public writeFloat(value: number) {
        this.reserve(4);
        this.length = this.buffer.writeFloatLE(value, this.length);
    }

    public writeDouble(value: number) {
        this.reserve(8);
        this.length = this.buffer.writeDoubleLE(value, this.length);
    }

    public writeBytes(value: Uint8Array) {
        this.reserve(value.length);
        this.buffer.set(value, this.length);
        this.length += value.length;
    }

    /**
     * Inverse of `Context.readString`: pure ASCII as single bytes, anything else
     * as UTF-16. A stored `form` is followed while the value still fits it.
     */
    public writeString(value: string, form: StringForm | null = null) {
        switch (fitsForm(value, form) ? form : null) {
            case "ansi-empty":
                this.writeInt32(1);
                this.writeUInt8(0);
                return;
            case "wide-empty":
                this.writeInt32(-1);
                this.writeUInt16(0);
                return;
            case "ansi":
                this.writeAnsi(value);
                return;
            case "wide":
                this.writeWide(value);
                return;
        }
        if (value.length === 0) {
            this.writeInt32(0);
        } else if (ASCII.test(value)) {
            this.writeAnsi(value);
        } else {
            this.writeWide(value);
        }
    }

    private writeAnsi(value: string) {
        this.writeInt32(value.length + 1);
        this.writeBytes(Buffer.from(value, "latin1"));
        this.writeUInt8(0);
    }

    private writeWide(value: string) {
        this.writeInt32(-(value.length + 1));
        this.writeBytes(Buffer.from(value, "utf16le"));
        this.writeUInt16(0);
    }

    /** Leave room for an int32 to be filled in by `patchInt32`. */
    public placeholder() {
        const at = this.length;
        this.writeInt32(0);
        return at;
    }

    public patchInt32(at: number, value: number) {
        this.buffer.writeInt32LE(value, at);
    }

    public toBuffer() {
        return Buffer.from(this.buffer.subarray(0, this.length));
    }
}

/** Reject sizes and counts the int32 fields of the format cannot hold. */
export function checkInt32(property: string, field: string, value: number) {
    if (value > INT32_MAX) {
        throw new EncodeOverflowError(property, field, value);
    }
    return value;
}

export function hexString(val: Uint8Array) {
    return Buffer.from(val).toString('hex')
        .split('')
        .reduce<string[]>((acc, curr, idx) => {
            if (idx % 2 === 0) {
                acc.push(curr)
            } else {
                acc[acc.length - 1] += curr;
            }
            return acc;
        }, []).join(' ')
}
