/**
 * Bounds-checked positional lookups into a parsed store.
 */

import { IndexOutOfRangeError, NotFoundError } from "@ras-format/core";
import type { IndexAxis } from "@ras-format/core";
import { unwrap } from "./coerce.js";
import { load } from "./io.js";
import type { ParsedStore, RasRecord, Scalar, Value } from "./types.js";

/** A parsed store, or the path of a RAS file to load. */
export type StoreSource = ParsedStore | string;

function resolveStore(source: StoreSource): ParsedStore {
	return typeof source === "string" ? load(source) : source;
}

function checkIndex(index: number, length: number, axis: IndexAxis, where: string): void {
	if (!Number.isInteger(index) || index < 0 || index >= length) {
		throw new IndexOutOfRangeError(
			`${axis === "record" ? "Record" : "Field"} index ${index} out of bounds for ${where} (length ${length})`,
			axis,
			index,
			length,
		);
	}
}

/** Names of all lists in the store, in document order. */
export function listNames(store: ParsedStore): string[] {
	return [...store.keys()];
}

/**
 * All records of one list.
 *
 * @throws {NotFoundError} If the list is absent.
 */
export function getList(store: ParsedStore, listName: string): readonly RasRecord[] {
	const records = store.get(listName);
	if (records === undefined) {
		throw new NotFoundError(`List '${listName}' not found in data store`, "list", listName);
	}
	return records;
}

/**
 * Look up one field.
 *
 * A string `source` is read and parsed on every call; parse once and pass
 * the store when doing repeated lookups.
 *
 * @throws {NotFoundError} If the file (for a path source) or the list is absent.
 * @throws {IndexOutOfRangeError} If either index is negative, fractional or past the end.
 *
 * @example
 * ```ts
 * const store = parse('products-\nproduct1,"The first item",1,"tbh"\n+');
 * get(store, "products", 0, 2); // { kind: "integer", value: 1 }
 * ```
 */
export function get(source: StoreSource, listName: string, recordIndex: number, fieldIndex: number): Value {
	const records = getList(resolveStore(source), listName);
	checkIndex(recordIndex, records.length, "record", `list '${listName}'`);

	const record = records[recordIndex];
	checkIndex(fieldIndex, record.length, "field", `record ${recordIndex} of list '${listName}'`);

	return record[fieldIndex];
}

/** Like {@link get}, but returns the bare scalar. */
export function getValue(source: StoreSource, listName: string, recordIndex: number, fieldIndex: number): Scalar {
	return unwrap(get(source, listName, recordIndex, fieldIndex));
}
