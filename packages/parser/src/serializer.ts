/**
 * Serialize a {@link ParsedStore} back to RAS text.
 *
 * For stores produced by {@link parse}, `parse(serialize(store))` gives an
 * equal store as long as no string field contains a `#` or a line break
 * (neither survives the parser).
 */

import type { ParsedStore, RasRecord, Value } from "./types.js";

/** Float text that still reads back as a float (always has a `.`). */
function formatFloat(value: number): string {
	const text = String(value);
	if (text.includes(".") || !Number.isFinite(value)) return text;
	const exp = text.indexOf("e");
	return exp === -1 ? `${text}.0` : `${text.slice(0, exp)}.0${text.slice(exp)}`;
}

/** Render one value as a RAS field. */
export function formatValue(value: Value): string {
	switch (value.kind) {
		case "boolean":
			return value.value ? "True" : "False";
		case "integer":
			return String(value.value);
		case "float":
			return formatFloat(value.value);
		case "string":
			return `"${value.value}"`;
	}
}

function formatRecord(record: RasRecord): string {
	return record.map(formatValue).join(",");
}

export function serialize(store: ParsedStore): string {
	const blocks: string[] = [];
	for (const [name, records] of store) {
		blocks.push([`${name}-`, ...records.map(formatRecord), "+"].join("\n"));
	}
	return blocks.length > 0 ? blocks.join("\n\n") + "\n" : "";
}
