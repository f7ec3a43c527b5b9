import {bytes, int, prop, seq, str, structType, t} from "./builder";

export const GUID = "00112233445566778899aabbccddeeff";

export const CALLBACK = prop("Callback", t("DelegateProperty"), bytes().raw("0102030405").build());

export const VECTOR = structType("Vector", "/Script/CoreUObject");

/** A property sequence using every type tag and tag flag. */
export function everything() {
    return seq(
        int("Level", 12),
        int("Slot", 4, {flags: 0x01, arrayIndex: 2}),
        int("Tracked", 7, {flags: 0x02, guid: GUID}),
        int("Overridden", 8, {flags: 0x04, extensions: "020100000000"}),
        prop("Alive", t("BoolProperty"), Buffer.alloc(0), {flags: 0x10}),
        prop("Dead", t("BoolProperty"), Buffer.alloc(0)),
        prop("Tiny", t("Int8Property"), bytes().i8(-4).build()),
        prop("Short", t("Int16Property"), bytes().i16(-300).build()),
        prop("Port", t("UInt16Property"), bytes().u16(7777).build()),
        prop("Mask", t("UInt32Property"), bytes().u32(0xdeadbeef).build()),
        prop("Id", t("Int64Property"), bytes().i64(-3n).build()),
        prop("SteamId", t("UInt64Property"), bytes().u64(18446744073709551615n).build()),
        prop("Weight", t("FloatProperty"), bytes().f32(0.25).build()),
        prop("Odd", t("FloatProperty"), bytes().raw("0100c07f").build()),
        prop("Zero", t("DoubleProperty"), bytes().f64(-0).build()),
        prop("Ratio", t("DoubleProperty"), bytes().f64(0.1).build()),
        prop("Byte", t("ByteProperty"), bytes().u8(200).build()),
        prop("Mode", t("ByteProperty", t("EDinoMode")), bytes().str("EDinoMode::Follow").build()),
        prop("Team", t("EnumProperty", t("ETeam"), t("ByteProperty")), bytes().str("ETeam::Blue").build()),
        prop("Empty", t("StrProperty"), Buffer.alloc(0)),
        str("Name", "Survivor"),
        prop("Wide", t("StrProperty"), bytes().wstr("Dodø").build()),
        prop("Tag", t("NameProperty"), bytes().str("Tamed").build()),
        prop("Owner", t("ObjectProperty"), bytes().i32(3).build()),
        prop("Class", t("ObjectProperty"), bytes().i32(1).str("/Game/Dinos/Rex.Rex_C").build()),
        prop("Icon", t("SoftObjectProperty"), bytes().str("/Game/UI/Icon").str("Icon").str("").build()),
        prop("Title", t("TextProperty"), bytes().i32(0).i8(0).str("NS").str("Key").str("Hello").build()),
        prop("Motto", t("TextProperty"), bytes().i32(2).i8(-1).i32(1).str("Hi").build()),
        prop("Fancy", t("TextProperty"), bytes().i32(0).i8(3).raw("aabbcc").build()),
        prop("Data", structType("PrimalPlayerDataStruct"), seq(int("Level", 5), str("Tribe", "Alpha"))),
        prop("Pos", VECTOR, bytes().f64(1).f64(2).f64(3).build(), {flags: 0x08}),
        prop("PlayerId", structType("Guid", "/Script/CoreUObject"), bytes().raw("0f".repeat(16)).build(), {flags: 0x08}),
        prop("Blob", structType("MysteryStruct"), bytes().raw("deadbeef").build(), {flags: 0x08}),
        prop("Ids", t("ArrayProperty", t("IntProperty")), bytes().i32(3).i32(7).i32(8).i32(9).build()),
        prop("Flags", t("ArrayProperty", t("BoolProperty")), bytes().i32(2).u8(1).u8(0).build()),
        prop("Paths", t("ArrayProperty", t("ObjectProperty")), bytes().i32(1).i32(1).str("/Game/A.A").build()),
        prop("Points", t("ArrayProperty", VECTOR), bytes().i32(1).f64(4).f64(5).f64(6).build()),
        prop("Items", t("ArrayProperty", structType("ArkInventoryData")),
            bytes().i32(2).raw(seq(int("Q", 1))).i32(0).raw(seq(int("Q", 2))).build()),
        prop("Names", t("SetProperty", t("NameProperty")), bytes().i32(1).str("Old").i32(2).str("A").str("B").build()),
        prop("Scores", t("MapProperty", t("StrProperty"), t("IntProperty")),
            bytes().i32(0).i32(2).str("k1").i32(5).str("k2").i32(6).build()),
        CALLBACK,
        prop("Texts", t("ArrayProperty", t("TextProperty")), bytes().i32(0).build()),
    );
}

function item(i: number) {
    return seq(int("ItemQuantity", i), str("ItemName", `Item${i}`));
}

/** `count` tagged struct elements, count-prefixed. */
export function structArray(count: number) {
    const b = bytes().i32(count);
    for (let i = 1; i <= count; i++) {
        b.raw(item(i));
    }
    return b.build();
}

export const ARK_ITEMS_TYPE = t("ArrayProperty", structType("ArkInventoryData"));
export const DINOS_TYPE = t("ArrayProperty", structType("ARKDinoData"));
export const ARK_DATA_TYPE = structType("PrimalPlayerDataStruct");

/** `MyArkData` holding `ArkItems` and `ArkTamedDinosData`, followed by `None`. */
export function arkProfileProperties(items: number, dinos: number) {
    return seq(
        prop("MyArkData", ARK_DATA_TYPE, seq(
            prop("ArkItems", ARK_ITEMS_TYPE, structArray(items)),
            prop("ArkTamedDinosData", DINOS_TYPE, structArray(dinos)),
        )),
        prop("UnlockedAchievements", t("ArrayProperty", t("StrProperty")), bytes().i32(2).str("A1").str("A2").build()),
    );
}

export const HEADER_GUID = "ab".repeat(16);

export function profileHeader(version = 1, name = "Survivor") {
    return bytes()
        .i32(5).i32(6).i32(7).i32(version)
        .raw(HEADER_GUID)
        .str("PrimalLocalProfile")
        .i32(0).i32(5)
        .str(name)
        .str("PlayerController")
        .str("PersistentLevel")
        .str("TheIsland_WP")
        .str("/Game/Maps/TheIsland")
        .zeros(12)
        .i32(123).i32(0)
        .u8(0)
        .build();
}

export function trailer() {
    return bytes().i32(0).raw("cd".repeat(16)).build();
}

export function profileFile(items = 2, dinos = 3) {
    return Buffer.concat([profileHeader(), arkProfileProperties(items, dinos), trailer()]);
}
