import { describe, it, expect } from "vitest";
import { coerce, unwrap } from "../src/coerce.js";

describe("coerce", () => {
	describe("quoted strings", () => {
		it("should strip one quote from each end", () => {
			expect(coerce('"The first item"')).toEqual({ kind: "string", value: "The first item" });
		});

		it("should not coerce quoted booleans or numbers", () => {
			expect(coerce('"True"')).toEqual({ kind: "string", value: "True" });
			expect(coerce('"42"')).toEqual({ kind: "string", value: "42" });
			expect(coerce('"3.14"')).toEqual({ kind: "string", value: "3.14" });
		});

		it("should keep interior quotes and commas untouched", () => {
			expect(coerce('"a, ""b"""')).toEqual({ kind: "string", value: 'a, ""b""' });
		});

		it("should return an empty string for a pair of quotes", () => {
			expect(coerce('""')).toEqual({ kind: "string", value: "" });
		});

		it("should treat a lone quote as raw text", () => {
			expect(coerce('"')).toEqual({ kind: "string", value: '"' });
		});
	});

	describe("booleans", () => {
		it("should map True and False", () => {
			expect(coerce("True")).toEqual({ kind: "boolean", value: true });
			expect(coerce("False")).toEqual({ kind: "boolean", value: false });
		});

		it("should be case-sensitive", () => {
			expect(coerce("true")).toEqual({ kind: "string", value: "true" });
			expect(coerce("FALSE")).toEqual({ kind: "string", value: "FALSE" });
		});
	});

	describe("integers", () => {
		it("should parse plain, signed and zero-padded integers", () => {
			expect(coerce("42")).toEqual({ kind: "integer", value: 42 });
			expect(coerce("-17")).toEqual({ kind: "integer", value: -17 });
			expect(coerce("+5")).toEqual({ kind: "integer", value: 5 });
			expect(coerce("007")).toEqual({ kind: "integer", value: 7 });
		});

		it("should ignore surrounding whitespace when parsing", () => {
			expect(coerce("100 ")).toEqual({ kind: "integer", value: 100 });
		});

		it("should read negative zero as zero", () => {
			expect(Object.is(coerce("-0").value, 0)).toBe(true);
		});

		it("should keep integers beyond the safe range as their digits", () => {
			expect(coerce("12345678901234567891")).toEqual({ kind: "string", value: "12345678901234567891" });
			expect(coerce("-9007199254740993")).toEqual({ kind: "string", value: "-9007199254740993" });
			expect(coerce("9007199254740991")).toEqual({ kind: "integer", value: 9007199254740991 });
		});

		it("should not accept exponent notation without a decimal point", () => {
			expect(coerce("1e5")).toEqual({ kind: "string", value: "1e5" });
		});
	});

	describe("floats", () => {
		it("should parse decimals", () => {
			expect(coerce("3.14")).toEqual({ kind: "float", value: 3.14 });
			expect(coerce("3.50")).toEqual({ kind: "float", value: 3.5 });
			expect(coerce("-0.25")).toEqual({ kind: "float", value: -0.25 });
		});

		it("should accept a bare leading or trailing point", () => {
			expect(coerce(".5")).toEqual({ kind: "float", value: 0.5 });
			expect(coerce("5.")).toEqual({ kind: "float", value: 5 });
		});

		it("should accept an exponent after a decimal", () => {
			expect(coerce("1.5e3")).toEqual({ kind: "float", value: 1500 });
		});

		it("should keep floats that overflow as their text", () => {
			expect(coerce("1.0e999")).toEqual({ kind: "string", value: "1.0e999" });
			expect(coerce("-1.5E400")).toEqual({ kind: "string", value: "-1.5E400" });
		});

		it("should keep integral floats as the float kind", () => {
			expect(coerce("2.0")).toEqual({ kind: "float", value: 2 });
		});
	});

	describe("fallback", () => {
		it("should return unquoted identifiers as strings", () => {
			expect(coerce("product1")).toEqual({ kind: "string", value: "product1" });
			expect(coerce("abc")).toEqual({ kind: "string", value: "abc" });
		});

		it("should fall back for malformed numbers", () => {
			expect(coerce("1.2.3")).toEqual({ kind: "string", value: "1.2.3" });
			expect(coerce("12abc")).toEqual({ kind: "string", value: "12abc" });
			expect(coerce("-")).toEqual({ kind: "string", value: "-" });
			expect(coerce(".")).toEqual({ kind: "string", value: "." });
		});

		it("should return the empty field as an empty string", () => {
			expect(coerce("")).toEqual({ kind: "string", value: "" });
		});

		it("should keep whitespace in the raw fallback", () => {
			expect(coerce("milk ")).toEqual({ kind: "string", value: "milk " });
		});

		it("should never throw", () => {
			for (const field of ["", " ", '"', '""x', "NaN", "Infinity", "0x1F", "1_000"]) {
				expect(() => coerce(field)).not.toThrow();
				expect(coerce(field).kind).toBe("string");
			}
		});
	});

	it("should return frozen values", () => {
		expect(Object.isFrozen(coerce("42"))).toBe(true);
	});
});

describe("unwrap", () => {
	it("should return the bare scalar", () => {
		expect(unwrap(coerce("True"))).toBe(true);
		expect(unwrap(coerce("2.99"))).toBe(2.99);
		expect(unwrap(coerce('"x"'))).toBe("x");
	});
});
