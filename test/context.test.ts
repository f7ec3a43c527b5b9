import {describe, expect, it} from "vitest";
import {Context, WriteContext, checkInt32, hexString} from "../src/context";
import {EncodeOverflowError, StringFormError, TruncatedInputError} from "../src/errors";
import {bytes, quiet, thrown} from "./builder";

describe("Context", () => {
    it("reads little-endian scalars", () => {
        const ctx = Context.of(bytes().i8(-2).u16(513).i32(-7).u32(0xfffffffe).i64(-9n).f32(1.5).f64(-2.25).build());
        expect(ctx.readInt8()).toBe(-2);
        expect(ctx.readUInt16()).toBe(513);
        expect(ctx.readInt32()).toBe(-7);
        expect(ctx.readUInt32()).toBe(0xfffffffe);
        expect(ctx.readInt64()).toBe(-9n);
        expect(ctx.readFloat()).toBe(1.5);
        expect(ctx.readDouble()).toBe(-2.25);
        expect(ctx.remaining).toBe(0);
    });

    it("peeks without moving", () => {
        const ctx = Context.of(bytes().i32(42).build());
        expect(ctx.peekInt32()).toBe(42);
        expect(ctx.offset).toBe(0);
    });

    it("reads single-byte, UTF-16 and empty strings", () => {
        const ctx = Context.of(bytes().str("Rex").wstr("Dodø").i32(0).build());
        expect(ctx.readString()).toBe("Rex");
        expect(ctx.readString()).toBe("Dodø");
        expect(ctx.readString()).toBe("");
        expect(ctx.remaining).toBe(0);
    });

    it("reports string forms the writer would not choose", () => {
        const ctx = Context.of(bytes().i32(1).u8(0).i32(-1).u16(0).str("José").wstr("Rex").str("Rex").build());
        expect(ctx.readStoredString()).toEqual({value: "", form: "ansi-empty"});
        expect(ctx.readStoredString()).toEqual({value: "", form: "wide-empty"});
        expect(ctx.readStoredString()).toEqual({value: "José", form: "ansi"});
        expect(ctx.readStoredString()).toEqual({value: "Rex", form: "wide"});
        expect(ctx.readStoredString()).toEqual({value: "Rex", form: null});
        expect(ctx.remaining).toBe(0);
    });

    it("rejects such a string where its form cannot be kept", () => {
        const error = thrown(() => Context.of(bytes().str("José").build()).readString());
        expect(error).toBeInstanceOf(StringFormError);
        expect(error).toMatchObject({code: "ERR_STRING_FORM", form: "ansi", offset: 0, message: "string at offset 0 is stored as ansi"});
    });

    it("reports where input runs out", () => {
        const error = thrown(() => Context.of(Buffer.from("0102", "hex")).readInt32());
        expect(error).toBeInstanceOf(TruncatedInputError);
        expect(error).toMatchObject({code: "ERR_TRUNCATED", what: "int32", offset: 0, needed: 4, available: 2});
    });

    it("reports a string longer than the input", () => {
        const error = thrown(() => Context.of(bytes().i32(10).raw("4142").build()).readString());
        expect(error).toMatchObject({what: "string", offset: 0, needed: 10, available: 2});
    });

    it("rejects negative and oversized counts", () => {
        expect(thrown(() => Context.of(bytes().i32(-1).build()).readCount("elements")))
            .toMatchObject({what: "elements of -1", offset: 0, needed: 0, available: 0});
        expect(thrown(() => Context.of(bytes().i32(3).zeros(8).build()).readCount("elements", 4)))
            .toMatchObject({what: "elements of 3", offset: 0, needed: 12, available: 8});
    });

    describe("window", () => {
        it("reports absolute offsets and leaves the parent cursor alone", () => {
            const ctx = Context.of(bytes().i16(1).i16(2).i32(3).i16(4).build());
            ctx.readInt16();
            const window = ctx.window(4, "payload");
            expect(window.position).toBe(2);
            expect(window.readInt16()).toBe(2);
            expect(window.position).toBe(4);
            expect(thrown(() => window.readInt32())).toMatchObject({offset: 4, needed: 4, available: 2});
            expect(ctx.offset).toBe(2);
        });

        it("cannot reach past the parent", () => {
            const ctx = Context.of(Buffer.alloc(3));
            expect(thrown(() => ctx.window(4, "payload of 'X'")))
                .toMatchObject({what: "payload of 'X'", offset: 0, needed: 4, available: 3});
        });
    });

    it("traces only when asked to", () => {
        const logger = quiet();
        Context.of(Buffer.alloc(0), {logger}).trace("hidden");
        Context.of(Buffer.alloc(0), {logger, trace: true}).trace("shown");
        expect(logger.debug).toHaveBeenCalledTimes(1);
        expect(logger.debug).toHaveBeenCalledWith("shown");
    });

    it("shares warnings with its windows", () => {
        const logger = quiet();
        const ctx = Context.of(Buffer.alloc(4), {logger});
        const warning = {code: "ERR_UNKNOWN_TYPE", name: "X", type: "FooProperty", offset: 0, message: "unknown"};
        ctx.window(4, "payload").warn(warning);
        expect(ctx.warnings).toEqual([warning]);
        expect(logger.warn).toHaveBeenCalledWith("unknown");
    });
});

describe("WriteContext", () => {
    it("writes strings the way they are read", () => {
        const ctx = new WriteContext();
        ctx.writeString("Rex");
        ctx.writeString("Dodø");
        ctx.writeString("");
        expect(ctx.toBuffer()).toEqual(bytes().str("Rex").wstr("Dodø").i32(0).build());
    });

    it("follows a stored form while the value still fits it", () => {
        const ctx = new WriteContext();
        ctx.writeString("", "ansi-empty");
        ctx.writeString("", "wide-empty");
        ctx.writeString("José", "ansi");
        ctx.writeString("Rex", "wide");
        ctx.writeString("Rex", "ansi-empty");
        ctx.writeString("Дино", "ansi");
        expect(ctx.toBuffer()).toEqual(
            bytes().i32(1).u8(0).i32(-1).u16(0).str("José").wstr("Rex").str("Rex").wstr("Дино").build(),
        );
    });

    it("back-patches placeholders and grows as needed", () => {
        const ctx = new WriteContext(2);
        const at = ctx.placeholder();
        ctx.writeUInt8(7);
        ctx.patchInt32(at, 1);
        expect(ctx.offset).toBe(5);
        expect(ctx.toBuffer().toString("hex")).toBe("0100000007");
    });
});

describe("checkInt32", () => {
    it("passes values that fit", () => {
        expect(checkInt32("Level", "size", 5)).toBe(5);
    });

    it("rejects values that do not", () => {
        const error = thrown(() => checkInt32("Level", "size", 2 ** 31));
        expect(error).toBeInstanceOf(EncodeOverflowError);
        expect(error).toMatchObject({property: "Level", field: "size", value: 2147483648});
    });
});

it("hexString spaces out bytes", () => {
    expect(hexString(Uint8Array.from([0, 255, 16]))).toBe("00 ff 10");
});
