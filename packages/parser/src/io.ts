/**
 * File boundary for the parser: the only module that touches the file system.
 */

import fs from "fs";
import { IOFailureError, NotFoundError, createLogger } from "@ras-format/core";
import { parse } from "./parser.js";
import type { ParsedStore } from "./types.js";

const log = createLogger("parser:io");

function asError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

/**
 * Read a RAS document as UTF-8 text.
 *
 * @throws {NotFoundError} If `filePath` does not exist.
 * @throws {IOFailureError} If the file exists but cannot be read.
 */
export function readDocument(filePath: string): string {
	if (!fs.existsSync(filePath)) {
		throw new NotFoundError(`File not found at '${filePath}'`, "file", filePath);
	}
	try {
		const text = fs.readFileSync(filePath, "utf-8");
		log.debug("Read document", { path: filePath, bytes: Buffer.byteLength(text, "utf-8") });
		return text;
	} catch (err) {
		throw new IOFailureError(`Could not read '${filePath}'`, filePath, "read", asError(err));
	}
}

/**
 * Write text to `filePath`, replacing any existing file.
 *
 * @throws {IOFailureError} If the write fails.
 */
export function writeDocument(filePath: string, text: string): void {
	try {
		fs.writeFileSync(filePath, text, "utf-8");
	} catch (err) {
		throw new IOFailureError(`Could not write to output file '${filePath}'`, filePath, "write", asError(err));
	}
	log.debug("Wrote document", { path: filePath, bytes: Buffer.byteLength(text, "utf-8") });
}

/** Read and parse a RAS file. */
export function load(filePath: string): ParsedStore {
	return parse(readDocument(filePath));
}
