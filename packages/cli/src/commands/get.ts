/**
 * @ras-format/cli — `ras get <file> <list> <record> <field>`.
 */

import { get, formatValue } from "@ras-format/parser";
import type { Value } from "@ras-format/parser";
import type { CliIO } from "../io.js";

export interface GetOptions {
	typed?: boolean;
}

/** Strings print bare; every other kind prints in its RAS literal form. */
export function renderValue(value: Value, typed = false): string {
	const text = value.kind === "string" ? value.value : formatValue(value);
	return typed ? `${value.kind} ${text}` : text;
}

export function run(
	io: CliIO,
	file: string,
	listName: string,
	recordIndex: number,
	fieldIndex: number,
	opts: GetOptions = {},
): void {
	const value = get(file, listName, recordIndex, fieldIndex);
	io.stdout(renderValue(value, opts.typed) + "\n");
}
