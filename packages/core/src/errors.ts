/**
 * Typed error hierarchy for RAS.
 *
 * All RAS errors extend {@link RasError} with a machine-readable
 * `code` string for programmatic error handling.
 */

/**
 * Base error class for all RAS errors.
 *
 * Carries a machine-readable `code` field (e.g. `"NOT_FOUND"`) for
 * programmatic error detection in addition to the human-readable `message`.
 */
export class RasError extends Error {
	readonly code: string;

	constructor(message: string, code: string, cause?: Error) {
		super(message, { cause });
		this.name = "RasError";
		this.code = code;
	}
}

/** What a {@link NotFoundError} failed to find. */
export type NotFoundResource = "file" | "list";

/**
 * A file path that does not exist, or a list name absent from a parsed store.
 */
export class NotFoundError extends RasError {
	readonly resource: NotFoundResource;
	readonly target: string;

	constructor(message: string, resource: NotFoundResource, target: string) {
		super(message, "NOT_FOUND");
		this.name = "NotFoundError";
		this.resource = resource;
		this.target = target;
	}
}

/** Which index of a lookup was out of bounds. */
export type IndexAxis = "record" | "field";

/**
 * A record or field index outside `[0, length)`.
 */
export class IndexOutOfRangeError extends RasError {
	readonly axis: IndexAxis;
	readonly index: number;
	readonly length: number;

	constructor(message: string, axis: IndexAxis, index: number, length: number) {
		super(message, "INDEX_OUT_OF_RANGE");
		this.name = "IndexOutOfRangeError";
		this.axis = axis;
		this.index = index;
		this.length = length;
	}
}

/**
 * Conversion requested to a format other than JSON.
 */
export class UnsupportedFormatError extends RasError {
	readonly format: string;

	constructor(message: string, format: string) {
		super(message, "UNSUPPORTED_FORMAT");
		this.name = "UnsupportedFormatError";
		this.format = format;
	}
}

/** The file operation that failed. */
export type IOOperation = "read" | "write";

/**
 * Read or write failure surfaced from the file layer.
 */
export class IOFailureError extends RasError {
	readonly path: string;
	readonly operation: IOOperation;

	constructor(message: string, path: string, operation: IOOperation, cause?: Error) {
		super(message, "IO_FAILURE", cause);
		this.name = "IOFailureError";
		this.path = path;
		this.operation = operation;
	}
}

/**
 * Configuration error (unparsable file, invalid value, etc.).
 */
export class ConfigError extends RasError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_ERROR", cause);
		this.name = "ConfigError";
	}
}
