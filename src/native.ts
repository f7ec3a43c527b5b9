import {Context, WriteContext} from "./context";
import {TypeMismatchError, shapeOf} from "./errors";
import type {NativeValue} from "./tree";

type FieldKind = "u8" | "i32" | "f32" | "f64" | "i64" | "guid";

interface NativeField {
    name: string;
    kind: FieldKind;
}

export interface NativeLayout {
    name: string;
    size: number;
    fields: NativeField[];
}

const FIELD_SIZES: Record<FieldKind, number> = {u8: 1, i32: 4, f32: 4, f64: 8, i64: 8, guid: 16};

function layout(name: string, kind: FieldKind, ...fields: string[]): NativeLayout {
    return {
        name,
        size: FIELD_SIZES[kind] * fields.length,
        fields: fields.map(field => ({name: field, kind})),
    };
}

// Structs that serialize as plain binary instead of a tagged property list.
// Vectors and rotators use doubles since UE5's large world coordinates.
const LAYOUTS: ReadonlyMap<string, NativeLayout> = new Map([
    layout("Vector", "f64", "x", "y", "z"),
    layout("Vector2D", "f64", "x", "y"),
    layout("Vector4", "f64", "x", "y", "z", "w"),
    layout("Rotator", "f64", "pitch", "yaw", "roll"),
    layout("Quat", "f64", "x", "y", "z", "w"),
    layout("LinearColor", "f32", "r", "g", "b", "a"),
    layout("Color", "u8", "b", "g", "r", "a"),
    layout("IntPoint", "i32", "x", "y"),
    layout("IntVector", "i32", "x", "y", "z"),
    layout("Guid", "guid", "value"),
    layout("DateTime", "i64", "ticks"),
    layout("Timespan", "i64", "ticks"),
].map(entry => [entry.name, entry] as const));

export function nativeStruct(name: string | undefined): NativeLayout | undefined {
    return name === undefined ? undefined : LAYOUTS.get(name);
}

export function readNative(ctx: Context, layout: NativeLayout): NativeValue {
    const value: NativeValue = {};
    for (const field of layout.fields) {
        switch (field.kind) {
            case "u8":
                value[field.name] = ctx.readUInt8();
                break;
            case "i32":
                value[field.name] = ctx.readInt32();
                break;
            case "f32":
                value[field.name] = ctx.readFloat();
                break;
            case "f64":
                value[field.name] = ctx.readDouble();
                break;
            case "i64":
                value[field.name] = ctx.readInt64();
                break;
            case "guid":
                value[field.name] = ctx.readBytes(16, "guid").toString("hex");
                break;
        }
    }
    return value;
}

export function writeNative(ctx: WriteContext, value: NativeValue, layout: NativeLayout, property: string) {
    for (const field of layout.fields) {
        const v = value[field.name];
        const where = `${property}.${field.name}`;
        switch (field.kind) {
            case "u8":
            case "i32":
            case "f32":
            case "f64":
                if (typeof v !== "number") throw new TypeMismatchError(where, "number", shapeOf(v));
                if (field.kind === "u8") ctx.writeUInt8(v);
                else if (field.kind === "i32") ctx.writeInt32(v);
                else if (field.kind === "f32") ctx.writeFloat(v);
                else ctx.writeDouble(v);
                break;
            case "i64":
                if (typeof v !== "bigint") throw new TypeMismatchError(where, "bigint", shapeOf(v));
                ctx.writeInt64(v);
                break;
            case "guid": {
                const bytes = typeof v === "string" ? Buffer.from(v, "hex") : null;
                if (!bytes || bytes.length !== 16) throw new TypeMismatchError(where, "32 hex digits", shapeOf(v));
                ctx.writeBytes(bytes);
                break;
            }
        }
    }
}
