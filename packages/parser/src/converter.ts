/**
 * Converter — RAS to JSON through the platform JSON serializer.
 */

import { DEFAULT_SETTINGS, UnsupportedFormatError, createLogger } from "@ras-format/core";
import { unwrap } from "./coerce.js";
import { readDocument, writeDocument } from "./io.js";
import { parse } from "./parser.js";
import type { ParsedStore, PlainStore } from "./types.js";

const log = createLogger("parser:convert");

/** Target formats `convert` accepts. */
export const SUPPORTED_FORMATS = ["json"] as const;
export type ConvertFormat = (typeof SUPPORTED_FORMATS)[number];

export interface ConvertOptions {
	/** JSON indentation. Default: {@link DEFAULT_SETTINGS}.json.indent. */
	indent?: number;
}

/**
 * Normalize a requested format name.
 *
 * @throws {UnsupportedFormatError} For anything but `json` (any case).
 */
export function resolveFormat(format: string): ConvertFormat {
	const lower = format.toLowerCase();
	for (const supported of SUPPORTED_FORMATS) {
		if (supported === lower) return supported;
	}
	throw new UnsupportedFormatError(
		`Unsupported data type for conversion: '${format}'. Currently only 'json' is supported.`,
		format,
	);
}

/** Drop the kind tags: list name → rows of bare scalars. */
export function toPlain(store: ParsedStore): PlainStore {
	const plain: PlainStore = {};
	for (const [name, records] of store) {
		plain[name] = records.map((record) => record.map(unwrap));
	}
	return plain;
}

/**
 * JSON text for a store, or for RAS document text.
 */
export function toJson(source: ParsedStore | string, indent: number = DEFAULT_SETTINGS.json.indent): string {
	const store = typeof source === "string" ? parse(source) : source;
	return JSON.stringify(toPlain(store), null, indent);
}

/**
 * Convert the RAS file at `inputPath` and write the result to `outputPath`.
 *
 * The format is checked before anything is read or written.
 *
 * @throws {UnsupportedFormatError} If `format` is not JSON.
 * @throws {NotFoundError} If `inputPath` does not exist.
 * @throws {IOFailureError} If reading or writing fails.
 */
export function convert(inputPath: string, format: string, outputPath: string, options: ConvertOptions = {}): void {
	const target = resolveFormat(format);
	const started = Date.now();

	const store = parse(readDocument(inputPath));
	writeDocument(outputPath, toJson(store, options.indent));

	log.info(`Converted ${inputPath} to ${target.toUpperCase()}`, {
		input: inputPath,
		output: outputPath,
		lists: store.size,
		duration: Date.now() - started,
	});
}
