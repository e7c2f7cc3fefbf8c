/**
 * @ras-format/parser — Value and store types.
 */

// ─── Values ──────────────────────────────────────────────────────────────────

/** The four kinds a field can coerce to. */
export type ValueKind = "boolean" | "integer" | "float" | "string";

export interface BooleanValue {
	readonly kind: "boolean";
	readonly value: boolean;
}

export interface IntegerValue {
	readonly kind: "integer";
	readonly value: number;
}

export interface FloatValue {
	readonly kind: "float";
	readonly value: number;
}

export interface StringValue {
	readonly kind: "string";
	readonly value: string;
}

/** A coerced field. Switch on `kind`; there is no null variant. */
export type Value = BooleanValue | IntegerValue | FloatValue | StringValue;

/** The bare scalar behind a {@link Value}. */
export type Scalar = boolean | number | string;

// ─── Store ───────────────────────────────────────────────────────────────────

/** One data line of a list, field order preserved. */
export type RasRecord = readonly Value[];

/** List name → records, in order of first appearance. */
export type ParsedStore = ReadonlyMap<string, readonly RasRecord[]>;

/** The plain JSON-ready projection of a store. */
export type PlainStore = Record<string, Scalar[][]>;
