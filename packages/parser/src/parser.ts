/**
 * @module parser
 * @description Parse RAS documents into a {@link ParsedStore}.
 *
 * A RAS document is a sequence of named lists:
 *
 * ```text
 * # comment
 * products-
 * product1,"The first item",1,"tbh" # inline comment
 * item_2,"Another Item, with a comma",42,"done"
 * +
 * ```
 *
 * The parser is a line-oriented state machine. A line ending in `-` opens a
 * list, a lone `+` closes it, and every other non-empty line inside a list is
 * one record. A list left open at the end of the document, or when another
 * list opens, is closed implicitly.
 *
 * Inline comments are cut at the first `#` on a record line, quoted or not.
 *
 * @packageDocumentation
 */

import { coerce } from "./coerce.js";
import { tokenizeBody } from "./tokenizer.js";
import type { ParsedStore, RasRecord } from "./types.js";

const COMMENT = "#";
const OPEN_SUFFIX = "-";
const CLOSE_MARKER = "+";

// ─── Line Classification ────────────────────────────────────────────────────

/** What a trimmed document line means to the state machine. */
export type LineKind = "blank" | "comment" | "open" | "close" | "data";

/**
 * Classify a single trimmed line.
 */
export function classifyLine(trimmed: string): LineKind {
	if (trimmed === "") return "blank";
	if (trimmed.startsWith(COMMENT)) return "comment";
	if (trimmed.length > 1 && trimmed.endsWith(OPEN_SUFFIX) && !trimmed.startsWith(CLOSE_MARKER)) return "open";
	if (trimmed === CLOSE_MARKER) return "close";
	return "data";
}

/**
 * Cut a record line at its first `#` and trim what is left.
 */
export function stripInlineComment(line: string): string {
	const idx = line.indexOf(COMMENT);
	return idx === -1 ? line : line.slice(0, idx).trim();
}

// ─── Parsing ────────────────────────────────────────────────────────────────

function buildRecords(body: string[]): RasRecord[] {
	return tokenizeBody(body.join("\n")).map((fields) => Object.freeze(fields.map(coerce)));
}

/**
 * Parse a whole RAS document.
 *
 * Pure: the result shares nothing with `document` and is frozen. A list
 * with no records is not stored. A repeated list name replaces the earlier
 * list.
 *
 * @param document - Full document text.
 * @returns List name → records.
 */
export function parse(document: string): ParsedStore {
	const store = new Map<string, readonly RasRecord[]>();
	let currentList: string | null = null;
	let body: string[] = [];

	const finalize = (): void => {
		if (currentList !== null && body.length > 0) {
			store.set(currentList, Object.freeze(buildRecords(body)));
		}
		currentList = null;
		body = [];
	};

	for (const raw of document.split("\n")) {
		const line = raw.trim();

		switch (classifyLine(line)) {
			case "blank":
			case "comment":
				break;
			case "open":
				finalize();
				currentList = line.slice(0, -OPEN_SUFFIX.length);
				break;
			case "close":
				finalize();
				break;
			case "data": {
				if (currentList === null) break;
				const content = stripInlineComment(line);
				if (content) body.push(content);
				break;
			}
		}
	}

	finalize();
	return store;
}
