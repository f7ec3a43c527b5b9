import * as fs from "fs/promises";
import {Context, DecodeOptions, StringForm, WriteContext} from "./context";
import {decodeProperties} from "./decoder";
import {encodeProperties, recalculateSizes} from "./encoder";
import {CodecError, ProfileError} from "./errors";
import {PropertyNode, getPropertyAt, isPropertyList} from "./tree";

/**
 * Envelope of a `PlayerLocalData.arkprofile` file. Every field is kept as
 * read so that an unedited profile serializes to the same bytes.
 */
export interface ProfileHeader {
    /** Three leading int32 words. */
    versions: number[];
    /** Always 1. */
    version: number;
    /** 16 bytes, hex. */
    guid: string;
    fileType: string;
    /** Two int32 words, normally 0 and 5. */
    reserved: number[];
    name: string;
    controller: string;
    gameMode: string;
    mapName: string;
    mapPath: string;
    /** 12 bytes, hex. Normally zero. */
    padding: string;
    headerSize: number;
    headerTail: number;
    separator: number;
    /** Wire forms of header strings the writer would not pick itself. */
    stringForms?: HeaderStringForms;
}

export const HEADER_STRINGS = ["fileType", "name", "controller", "gameMode", "mapName", "mapPath"] as const;

export type HeaderString = typeof HEADER_STRINGS[number];

export type HeaderStringForms = Partial<Record<HeaderString, StringForm>>;

export interface Profile {
    header: ProfileHeader;
    properties: PropertyNode[];
    /** Bytes after the top-level `None`; normally an int32 and a guid. */
    trailer: Buffer;
}

export interface Finding {
    code: string;
    name: string;
    offset: number | null;
    message: string;
}

export const PROFILE_VERSION = 1;
export const TRAILER_SIZE = 20;
export const ERR_TRAILER = "ERR_TRAILER";

const GUID_SIZE = 16;
const PADDING_SIZE = 12;

function readHeader(ctx: Context): ProfileHeader {
    const versions = [ctx.readInt32(), ctx.readInt32(), ctx.readInt32()];
    const at = ctx.position;
    const version = ctx.readInt32();
    if (version !== PROFILE_VERSION) {
        throw new ProfileError(`unexpected profile version ${version} at offset ${at}, expected ${PROFILE_VERSION}`, at);
    }
    const guid = ctx.readBytes(GUID_SIZE, "profile guid").toString("hex");
    const stringForms: HeaderStringForms = {};
    const text = (field: HeaderString) => {
        const {value, form} = ctx.readStoredString();
        if (form !== null) stringForms[field] = form;
        return value;
    };
    const fileType = text("fileType");
    const reserved = [ctx.readInt32(), ctx.readInt32()];
    const name = text("name");
    const controller = text("controller");
    const gameMode = text("gameMode");
    const mapName = text("mapName");
    const mapPath = text("mapPath");
    const padding = ctx.readBytes(PADDING_SIZE, "header padding").toString("hex");
    const headerSize = ctx.readInt32();
    const headerTail = ctx.readInt32();
    const separator = ctx.readUInt8();
    const header: ProfileHeader = {
        versions, version, guid, fileType, reserved,
        name, controller, gameMode, mapName, mapPath,
        padding, headerSize, headerTail, separator,
    };
    if (Object.keys(stringForms).length > 0) header.stringForms = stringForms;
    return header;
}

function fixedHex(field: string, hex: string, size: number) {
    const bytes = Buffer.from(hex, "hex");
    if (bytes.length !== size || bytes.toString("hex") !== hex.toLowerCase()) {
        throw new ProfileError(`header ${field} must be ${size} bytes of hex`);
    }
    return bytes;
}

function words(field: string, values: number[], count: number) {
    if (values.length !== count) {
        throw new ProfileError(`header ${field} must hold ${count} int32 words, got ${values.length}`);
    }
    return values;
}

function writeHeader(ctx: WriteContext, header: ProfileHeader) {
    for (const word of words("versions", header.versions, 3)) {
        ctx.writeInt32(word);
    }
    ctx.writeInt32(header.version);
    ctx.writeBytes(fixedHex("guid", header.guid, GUID_SIZE));
    const text = (field: HeaderString) => ctx.writeString(header[field], header.stringForms?.[field] ?? null);
    text("fileType");
    for (const word of words("reserved", header.reserved, 2)) {
        ctx.writeInt32(word);
    }
    text("name");
    text("controller");
    text("gameMode");
    text("mapName");
    text("mapPath");
    ctx.writeBytes(fixedHex("padding", header.padding, PADDING_SIZE));
    ctx.writeInt32(header.headerSize);
    ctx.writeInt32(header.headerTail);
    ctx.writeUInt8(header.separator);
}

function readProfile(ctx: Context): Profile {
    const header = readHeader(ctx);
    const properties = decodeProperties(ctx);
    const trailer = ctx.readBytes(ctx.remaining, "trailer");
    return {header, properties, trailer};
}

export function parseProfile(buffer: Buffer, options: DecodeOptions = {}): Profile {
    return readProfile(Context.of(buffer, options));
}

export function serializeProfile(profile: Profile): Buffer {
    const ctx = new WriteContext();
    writeHeader(ctx, profile.header);
    encodeProperties(ctx, profile.properties);
    ctx.writeBytes(profile.trailer);
    return ctx.toBuffer();
}

async function readFile(path: string) {
    const handle = await fs.open(path, "r");
    try {
        return await handle.readFile();
    } finally {
        await handle.close();
    }
}

export async function open(path: string, options: DecodeOptions = {}): Promise<Profile> {
    return parseProfile(await readFile(path), options);
}

/** Refresh declared sizes, then write the profile to `path`. */
export async function save(profile: Profile, path: string) {
    recalculateSizes(profile.properties);
    const bytes = serializeProfile(profile);
    const handle = await fs.open(path, "w");
    try {
        await handle.writeFile(bytes);
    } finally {
        await handle.close();
    }
}

function findingName(error: CodecError) {
    if (error instanceof ProfileError) return "(header)";
    return "(input)";
}

/**
 * Decode a profile without stopping at the first problem and list every
 * size mismatch, unknown type, truncation and trailer anomaly found.
 */
export async function verify(source: string | Buffer, options: DecodeOptions = {}): Promise<Finding[]> {
    const buffer = typeof source === "string" ? await readFile(source) : source;
    const ctx = Context.of(buffer, {...options, lenient: true});
    const findings: Finding[] = [];
    try {
        const {trailer} = readProfile(ctx);
        if (trailer.length !== TRAILER_SIZE) {
            findings.push({
                code: ERR_TRAILER,
                name: "(trailer)",
                offset: buffer.length - trailer.length,
                message: `trailer is ${trailer.length} bytes, expected ${TRAILER_SIZE}`,
            });
        }
    } catch (e) {
        if (!(e instanceof CodecError)) throw e;
        findings.push({code: e.code, name: findingName(e), offset: e.offset, message: e.message});
    }
    return [
        ...ctx.warnings.map(({code, name, offset, message}) => ({code, name, offset, message})),
        ...findings,
    ];
}

/**
 * Accessors for well-known profile properties
 */

export const ARK_DATA = "MyArkData";
export const ARK_ITEMS = "MyArkData.ArkItems";
export const TAMED_DINOS = "MyArkData.ArkTamedDinosData";
export const ACHIEVEMENTS = "UnlockedAchievements";
export const CLUB_ARK_TOKENS = "MyArkData.ClubArkTokens";
export const CUSTOM_CLOUD_DATA = "MyArkData.CustomCloudDatas";
export const PERSISTENT_ITEM_UNLOCKS = "MyArkData.PersistentItemUnlocks";
export const ACHIEVEMENT_ITEMS = "AchievementItemsCollectedList";
export const EXPLORER_NOTE_UNLOCKS = "GlobalExplorerNoteUnlocks";
export const NAMED_EXPLORER_NOTE_UNLOCKS = "GlobalNamedExplorerNoteUnlocks";
export const TAMED_DINO_TAGS = "TamedDinoTags";
export const FOG_OF_WARS = "PerMapFogOfWars";
export const MAP_MARKERS = "MapMarkersPerMaps";
export const SAVED_FAVORITES_VERSION = "SavedFavoritesVersion";

/** Properties of the `MyArkData` struct, or an empty list. */
export function arkData(profile: Profile): PropertyNode[] {
    const node = getPropertyAt(profile.properties, ARK_DATA);
    return node && isPropertyList(node.value) ? node.value : [];
}

export function arkItems(profile: Profile) {
    return getPropertyAt(profile.properties, ARK_ITEMS);
}

export function tamedDinos(profile: Profile) {
    return getPropertyAt(profile.properties, TAMED_DINOS);
}

export function achievements(profile: Profile) {
    return getPropertyAt(profile.properties, ACHIEVEMENTS);
}

export function clubArkTokens(profile: Profile) {
    return getPropertyAt(profile.properties, CLUB_ARK_TOKENS);
}

export function customCloudData(profile: Profile) {
    return getPropertyAt(profile.properties, CUSTOM_CLOUD_DATA);
}

export function persistentItemUnlocks(profile: Profile) {
    return getPropertyAt(profile.properties, PERSISTENT_ITEM_UNLOCKS);
}

export function achievementItems(profile: Profile) {
    return getPropertyAt(profile.properties, ACHIEVEMENT_ITEMS);
}

export function explorerNoteUnlocks(profile: Profile) {
    return getPropertyAt(profile.properties, EXPLORER_NOTE_UNLOCKS);
}

export function namedExplorerNoteUnlocks(profile: Profile) {
    return getPropertyAt(profile.properties, NAMED_EXPLORER_NOTE_UNLOCKS);
}

export function tamedDinoTags(profile: Profile) {
    return getPropertyAt(profile.properties, TAMED_DINO_TAGS);
}

export function fogOfWars(profile: Profile) {
    return getPropertyAt(profile.properties, FOG_OF_WARS);
}

export function mapMarkers(profile: Profile) {
    return getPropertyAt(profile.properties, MAP_MARKERS);
}

export function savedFavoritesVersion(profile: Profile) {
    return getPropertyAt(profile.properties, SAVED_FAVORITES_VERSION);
}

/** Number of elements of a collection property, 0 when absent or kept raw. */
export function countOf(node: PropertyNode | undefined) {
    return node && Array.isArray(node.value) ? node.value.length : 0;
}

/** The integer value of a scalar property such as `ClubArkTokens`, 0 when absent. */
export function numberOf(node: PropertyNode | undefined) {
    return node && typeof node.value === "number" ? node.value : 0;
}

export function summary(profile: Profile) {
    const {name, mapName} = profile.header;
    return `${name || "(unnamed)"} map=${mapName} items=${countOf(arkItems(profile))} dinos=${countOf(tamedDinos(profile))}`;
}
