// Codec error codes and the CodecError family

export const ERR_UNKNOWN_TYPE    = "ERR_UNKNOWN_TYPE";
export const ERR_SIZE_MISMATCH   = "ERR_SIZE_MISMATCH";
export const ERR_TRUNCATED       = "ERR_TRUNCATED";
export const ERR_TYPE_MISMATCH   = "ERR_TYPE_MISMATCH";
export const ERR_ENCODE_OVERFLOW = "ERR_ENCODE_OVERFLOW";
export const ERR_PROFILE         = "ERR_PROFILE";
export const ERR_STRING_FORM     = "ERR_STRING_FORM";

export type CodecErrorCode =
    | typeof ERR_UNKNOWN_TYPE
    | typeof ERR_SIZE_MISMATCH
    | typeof ERR_TRUNCATED
    | typeof ERR_TYPE_MISMATCH
    | typeof ERR_ENCODE_OVERFLOW
    | typeof ERR_PROFILE
    | typeof ERR_STRING_FORM;

export class CodecError extends Error {
    readonly code: CodecErrorCode;
    /** Absolute byte offset the condition refers to, when there is one. */
    readonly offset: number | null;

    constructor(code: CodecErrorCode, msg: string, offset: number | null = null) {
        super(msg);
        this.code = code;
        this.offset = offset;
        this.name = "CodecError";
    }
}

/** A type tag the registry does not know. Recoverable while a declared size is present. */
export class UnknownTypeError extends CodecError {
    constructor(readonly tag: string, offset: number) {
        super(ERR_UNKNOWN_TYPE, `unknown property type '${tag}' at offset ${offset}`, offset);
        this.name = "UnknownTypeError";
    }
}

export class SizeMismatchError extends CodecError {
    constructor(
        readonly property: string,
        readonly declared: number,
        readonly actual: number,
        offset: number,
    ) {
        super(
            ERR_SIZE_MISMATCH,
            `property '${property}' at offset ${offset}: declared size ${declared}, actual ${actual}`,
            offset,
        );
        this.name = "SizeMismatchError";
    }
}

export class TruncatedInputError extends CodecError {
    constructor(
        readonly what: string,
        offset: number,
        readonly needed: number,
        readonly available: number,
    ) {
        super(
            ERR_TRUNCATED,
            `truncated input reading ${what} at offset ${offset}: needed ${needed} bytes, ${available} available`,
            offset,
        );
        this.name = "TruncatedInputError";
    }
}

export class TypeMismatchError extends CodecError {
    constructor(
        readonly property: string,
        readonly expected: string,
        readonly actual: string,
    ) {
        super(ERR_TYPE_MISMATCH, `property '${property}': expected ${expected}, got ${actual}`);
        this.name = "TypeMismatchError";
    }
}

export class EncodeOverflowError extends CodecError {
    constructor(
        readonly property: string,
        readonly field: string,
        readonly value: number,
    ) {
        super(ERR_ENCODE_OVERFLOW, `property '${property}': ${field} ${value} does not fit in an int32`);
        this.name = "EncodeOverflowError";
    }
}

export class ProfileError extends CodecError {
    constructor(msg: string, offset: number | null = null) {
        super(ERR_PROFILE, msg, offset);
        this.name = "ProfileError";
    }
}

/**
 * A string stored in a form the writer would not reproduce, read where there
 * is nowhere to keep the form. The enclosing property is kept raw.
 */
export class StringFormError extends CodecError {
    constructor(readonly form: string, offset: number) {
        super(ERR_STRING_FORM, `string at offset ${offset} is stored as ${form}`, offset);
        this.name = "StringFormError";
    }
}

/** Short description of a runtime value's shape, for TypeMismatch messages. */
export function shapeOf(value: unknown): string {
    if (value === null) return "null";
    if (Buffer.isBuffer(value)) return "bytes";
    if (Array.isArray(value)) return "array";
    return typeof value;
}
