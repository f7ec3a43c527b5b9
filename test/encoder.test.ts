import {describe, expect, it} from "vitest";
import {decode} from "../src/decoder";
import {encode, recalculateSizes} from "../src/encoder";
import {TypeMismatchError} from "../src/errors";
import {ARK_ITEMS, TAMED_DINOS} from "../src/profile";
import {PropertyNode, clearCollection, findProperty, getPropertyAt} from "../src/tree";
import {bytes, int, offsetOf, prop, quiet, seq, str, structType, t, thrown} from "./builder";
import {ARK_DATA_TYPE, ARK_ITEMS_TYPE, DINOS_TYPE, arkProfileProperties, everything, structArray} from "./fixtures";

function decoded(input: Buffer) {
    return decode(input, {logger: quiet()}).properties;
}

function node(properties: PropertyNode[], name: string): PropertyNode {
    const found = getPropertyAt(properties, name);
    if (!found) throw new Error(`no property '${name}'`);
    return found;
}

describe("encode", () => {
    it("reproduces unedited input byte for byte", () => {
        const input = everything();
        expect(encode(decoded(input))).toEqual(input);
    });

    it("reproduces an opaque property recovered by a lenient decode", () => {
        const input = seq(prop("Nick", t("StrProperty"), bytes().str("Rex").u8(0xff).build()), int("Level", 3));
        expect(encode(decode(input, {lenient: true, logger: quiet()}).properties)).toEqual(input);
    });

    it("reproduces strings stored in a form it would not choose", () => {
        const input = seq(
            prop("Nick", t("StrProperty"), bytes().i32(1).u8(0).build()),
            prop("Blank", t("NameProperty"), bytes().i32(-1).u16(0).build()),
            str("Name", "José"),
            prop("Tag", t("StrProperty"), bytes().wstr("Rex").build()),
            prop("Names", t("ArrayProperty", t("StrProperty")), bytes().i32(2).str("Rex").str("José").build()),
            prop("Data", structType("PrimalPlayerDataStruct"), seq(str("Tribe", "Zoë"))),
        );
        expect(encode(decoded(input))).toEqual(input);
    });

    it("drops a stored string form the edited value no longer fits", () => {
        const properties = decoded(seq(prop("Nick", t("StrProperty"), bytes().i32(1).u8(0).build()), str("Name", "José")));
        node(properties, "Nick").value = "Rex";
        node(properties, "Name").value = "Дино";
        expect(encode(properties)).toEqual(seq(str("Nick", "Rex"), prop("Name", t("StrProperty"), bytes().wstr("Дино").build())));
    });

    it("reproduces collections of enum bytes and of untagged structs", () => {
        const input = seq(
            prop("Modes", t("ArrayProperty", t("ByteProperty", t("EDinoMode"))), bytes().i32(2).str("EDinoMode::Follow").str("EDinoMode::Stay").build()),
            prop("Boxes", t("ArrayProperty", structType("Box", "/Script/CoreUObject")), bytes().i32(1).f64(1).f64(2).f64(3).f64(4).f64(5).f64(6).u8(1).build()),
        );
        expect(encode(decoded(input))).toEqual(input);
    });

    it("writes enum bytes in collections by name", () => {
        const modes = t("ArrayProperty", t("ByteProperty", t("EDinoMode")));
        const properties = decoded(seq(prop("Modes", modes, bytes().i32(0).build())));
        properties[0].value = ["EDinoMode::Wander"];
        expect(encode(properties)).toEqual(seq(prop("Modes", modes, bytes().i32(1).str("EDinoMode::Wander").build())));

        properties[0].value = [3];
        expect(thrown(() => encode(properties)))
            .toMatchObject({property: "Modes[0]", expected: "string", actual: "number"});
    });

    it("moves booleans into the flag byte", () => {
        const properties = decoded(seq(prop("Alive", t("BoolProperty"), Buffer.alloc(0), {flags: 0x10})));
        properties[0].value = false;
        expect(encode(properties)).toEqual(seq(prop("Alive", t("BoolProperty"), Buffer.alloc(0))));
    });

    it("recomputes sizes and counts from edited values", () => {
        const properties = decoded(seq(str("Name", "Survivor"), prop("Ids", t("ArrayProperty", t("IntProperty")), bytes().i32(1).i32(7).build())));
        node(properties, "Name").value = "Rex";
        node(properties, "Ids").value = [7, 8];
        expect(encode(properties)).toEqual(seq(
            str("Name", "Rex"),
            prop("Ids", t("ArrayProperty", t("IntProperty")), bytes().i32(2).i32(7).i32(8).build()),
        ));
    });

    it("writes a NaN without stored bits as the canonical NaN", () => {
        const properties = decoded(seq(prop("Weight", t("FloatProperty"), bytes().f32(1).build())));
        properties[0].value = NaN;
        expect(encode(properties)).toEqual(seq(prop("Weight", t("FloatProperty"), bytes().f32(NaN).build())));
    });
});

describe("type mismatches", () => {
    const properties = () => decoded(everything());

    function mismatch(edit: (properties: PropertyNode[]) => void) {
        const tree = properties();
        edit(tree);
        const error = thrown(() => encode(tree));
        expect(error).toBeInstanceOf(TypeMismatchError);
        return error;
    }

    it("rejects a value of the wrong shape", () => {
        expect(mismatch(tree => { node(tree, "Level").value = "twelve"; }))
            .toMatchObject({code: "ERR_TYPE_MISMATCH", property: "Level", expected: "number for IntProperty", actual: "string"});
    });

    it("rejects an integer out of range", () => {
        expect(mismatch(tree => { node(tree, "Level").value = 2 ** 31; }))
            .toMatchObject({property: "Level", expected: "integer in [-2147483648, 2147483647]", actual: "2147483648"});
        expect(mismatch(tree => { node(tree, "Byte").value = 256; }))
            .toMatchObject({property: "Byte", expected: "integer in [0, 255]", actual: "256"});
        expect(mismatch(tree => { node(tree, "SteamId").value = -1n; }))
            .toMatchObject({property: "SteamId", expected: "uint64", actual: "-1"});
    });

    it("names the offending element", () => {
        expect(mismatch(tree => { node(tree, "Ids").value = [7, "8", 9]; }))
            .toMatchObject({property: "Ids[1]", expected: "number", actual: "string"});
    });

    it("names the offending struct field", () => {
        expect(mismatch(tree => { node(tree, "Pos").value = {x: 1, y: "2", z: 3}; }))
            .toMatchObject({property: "Pos.y", expected: "number", actual: "string"});
    });

    it("rejects a scalar for a struct", () => {
        expect(mismatch(tree => { node(tree, "Data").value = 5; }))
            .toMatchObject({property: "Data", expected: "property list, native struct or bytes for StructProperty", actual: "number"});
    });

    it("wants raw bytes for opaque properties", () => {
        expect(mismatch(tree => { node(tree, "Callback").value = "x"; }))
            .toMatchObject({property: "Callback", expected: "raw bytes for DelegateProperty", actual: "string"});
    });
});

describe("clearCollection", () => {
    const ids = t("ArrayProperty", t("IntProperty"));

    it("empties an array and leaves its neighbours alone", () => {
        const properties = decoded(seq(
            int("Before", 1),
            prop("Ids", ids, bytes().i32(3).i32(7).i32(8).i32(9).build()),
            int("After", 2),
        ));
        const array = node(properties, "Ids");
        expect(clearCollection(array)).toBe(3);
        expect(array.declaredSize).toBe(4);

        const output = encode(properties);
        expect(output).toEqual(seq(int("Before", 1), prop("Ids", ids, bytes().i32(0).build()), int("After", 2)));
        expect(findProperty(decoded(output), "Ids")).toMatchObject({value: [], declaredSize: 4});
    });

    it("empties sets and maps along with their removal lists", () => {
        const properties = decoded(everything());
        const names = node(properties, "Names");
        expect(clearCollection(names)).toBe(2);
        expect(names.declaredSize).toBe(8);
        expect(names.meta.removed).toEqual([]);

        const output = encode(properties);
        expect(offsetOf(output, prop("Names", t("SetProperty", t("NameProperty")), bytes().i32(0).i32(0).build()))).toBeGreaterThan(0);
    });

    it("only clears collections", () => {
        const properties = decoded(seq(int("Level", 1)));
        expect(thrown(() => clearCollection(properties[0])))
            .toMatchObject({property: "Level", expected: "ArrayProperty, SetProperty or MapProperty", actual: "IntProperty"});
    });

    it("clears one struct array without touching another", () => {
        const properties = decoded(arkProfileProperties(3, 4));
        expect(clearCollection(node(properties, ARK_ITEMS))).toBe(3);

        const output = encode(properties);
        expect(output).toEqual(seq(
            prop("MyArkData", ARK_DATA_TYPE, seq(
                prop("ArkItems", ARK_ITEMS_TYPE, bytes().i32(0).build()),
                prop("ArkTamedDinosData", DINOS_TYPE, structArray(4)),
            )),
            prop("UnlockedAchievements", t("ArrayProperty", t("StrProperty")), bytes().i32(2).str("A1").str("A2").build()),
        ));

        const again = decoded(output);
        expect(node(again, ARK_ITEMS)).toMatchObject({value: [], declaredSize: 4});
        expect(node(again, TAMED_DINOS).value).toHaveLength(4);
        expect(getPropertyAt(again, `${TAMED_DINOS}[3].ItemName`)?.value).toBe("Item4");
    });
});

describe("recalculateSizes", () => {
    it("refreshes nested sizes, children first", () => {
        const properties = decoded(seq(prop("Data", structType("PrimalPlayerDataStruct"), seq(str("Nick", "Rex")))));
        node(properties, "Data.Nick").value = "Rexy";
        recalculateSizes(properties);
        expect(node(properties, "Data.Nick").declaredSize).toBe(9);
        expect(node(properties, "Data").declaredSize).toBe(seq(str("Nick", "Rexy")).length);
    });

    it("agrees with a fresh decode of the encoded tree", () => {
        const properties = decoded(everything());
        node(properties, "Ids").value = [];
        node(properties, "Name").value = "Dodø";
        recalculateSizes(properties);
        const sizes = (tree: PropertyNode[]) => tree.map(p => [p.name, p.declaredSize]);
        expect(sizes(properties)).toEqual(sizes(decoded(encode(properties))));
    });
});
