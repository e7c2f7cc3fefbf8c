/**
 * Record tokenizer — splits list bodies into records and records into raw fields.
 *
 * Fields keep their quote characters; {@link coerce} decides what a
 * quoted field means. Only a `"` at the start of a field opens a quoted
 * segment, and inside it `""` does not close the segment.
 */

const QUOTE = '"';
const DELIMITER = ",";

function isInlineSpace(ch: string): boolean {
	return ch === " " || ch === "\t";
}

/**
 * Split one record line into raw field strings.
 *
 * Commas inside a quoted segment are literal. Spaces and tabs directly
 * after a delimiter are skipped; all other whitespace is kept.
 *
 * @example
 * ```ts
 * tokenizeRecord('item_2, "a, b",42'); // ['item_2', '"a, b"', '42']
 * ```
 */
export function tokenizeRecord(line: string): string[] {
	const fields: string[] = [];
	let current = "";
	let atFieldStart = true;
	let inQuotes = false;

	for (let i = 0; i < line.length; i++) {
		const ch = line[i];

		if (inQuotes) {
			current += ch;
			if (ch === QUOTE) {
				if (line[i + 1] === QUOTE) {
					current += QUOTE;
					i++;
				} else {
					inQuotes = false;
				}
			}
			continue;
		}

		if (ch === DELIMITER) {
			fields.push(current);
			current = "";
			atFieldStart = true;
			// Skip whitespace that directly follows the delimiter
			while (i + 1 < line.length && isInlineSpace(line[i + 1])) i++;
			continue;
		}

		if (atFieldStart && ch === QUOTE) {
			inQuotes = true;
		}
		atFieldStart = false;
		current += ch;
	}

	fields.push(current);
	return fields;
}

/**
 * Split a list body (one record per line) into raw field arrays.
 * Blank lines produce no record.
 */
export function tokenizeBody(body: string): string[][] {
	const records: string[][] = [];
	for (const line of body.split("\n")) {
		if (line.trim() === "") continue;
		records.push(tokenizeRecord(line));
	}
	return records;
}
