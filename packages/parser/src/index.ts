// @ras-format/parser — RAS parsing engine, accessor and converter
export type {
	ValueKind,
	Value,
	BooleanValue,
	IntegerValue,
	FloatValue,
	StringValue,
	Scalar,
	RasRecord,
	ParsedStore,
	PlainStore,
} from "./types.js";
export { coerce, unwrap } from "./coerce.js";
export { tokenizeRecord, tokenizeBody } from "./tokenizer.js";
export { parse, classifyLine, stripInlineComment } from "./parser.js";
export type { LineKind } from "./parser.js";
export { get, getValue, getList, listNames } from "./accessor.js";
export type { StoreSource } from "./accessor.js";
export { serialize, formatValue } from "./serializer.js";
export { readDocument, writeDocument, load } from "./io.js";
export { convert, toJson, toPlain, resolveFormat, SUPPORTED_FORMATS } from "./converter.js";
export type { ConvertFormat, ConvertOptions } from "./converter.js";
