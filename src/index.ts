export * from "./errors";
export * from "./tree";
export {Context, STRING_FORMS, WriteContext, checkInt32} from "./context";
export type {DecodeOptions, DecodeWarning, Logger, StoredString, StringForm} from "./context";
export {nativeStruct} from "./native";
export type {NativeLayout} from "./native";
export {codecFor, isPropertyType, PROPERTY_TAGS} from "./properties";
export type {PropertyTag} from "./properties";
export {isKnownType, lookupType} from "./registry";
export type {TypeEntry} from "./registry";
export {decode, decodeProperties, readTypeName} from "./decoder";
export type {DecodeResult} from "./decoder";
export {encode, encodeProperties, encodeProperty, recalculateSizes} from "./encoder";
export * from "./profile";
export {fromText, toText, treeFromJson, treeToJson} from "./text";
