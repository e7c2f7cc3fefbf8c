import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { IndexOutOfRangeError, NotFoundError } from "@ras-format/core";
import { get, getValue, getList, listNames } from "../src/accessor.js";
import { parse } from "../src/parser.js";

const DOCUMENT = `products-
product1,"The first item",1,"tbh"
item_2,"Another Item, with a comma",42,"done"
+
status-
product1,True,45
+
prices-
milk,2.99
+
`;

describe("accessor", () => {
	const store = parse(DOCUMENT);
	let dir: string;
	let file: string;

	beforeAll(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "ras-accessor-"));
		file = path.join(dir, "data.ras");
		fs.writeFileSync(file, DOCUMENT, "utf-8");
	});

	afterAll(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	describe("get", () => {
		it("should return the typed value at a position", () => {
			expect(get(store, "products", 0, 2)).toEqual({ kind: "integer", value: 1 });
			expect(get(store, "products", 1, 1)).toEqual({ kind: "string", value: "Another Item, with a comma" });
			expect(get(store, "status", 0, 1)).toEqual({ kind: "boolean", value: true });
			expect(get(store, "prices", 0, 1)).toEqual({ kind: "float", value: 2.99 });
		});

		it("should read and parse a file path source", () => {
			expect(get(file, "products", 0, 0)).toEqual({ kind: "string", value: "product1" });
			expect(get(file, "products", 0, 3)).toEqual({ kind: "string", value: "tbh" });
		});

		it("should resolve the single-record worked example", () => {
			const single = parse('products-\nproduct1,"The first item",1,"tbh"\n+');
			expect(get(single, "products", 0, 2)).toEqual({ kind: "integer", value: 1 });
		});

		it("should throw NotFoundError for an absent list", () => {
			expect(() => get(store, "missing", 0, 0)).toThrow(NotFoundError);
			expect(() => get(store, "missing", 0, 0)).toThrow("List 'missing' not found in data store");
		});

		it("should throw NotFoundError for a missing file", () => {
			const missing = path.join(dir, "nope.ras");
			try {
				get(missing, "products", 0, 0);
				expect.unreachable("get should have thrown");
			} catch (err) {
				expect(err).toBeInstanceOf(NotFoundError);
				expect(err).toMatchObject({ resource: "file", target: missing });
			}
		});

		it("should throw IndexOutOfRangeError for a record index past the end", () => {
			try {
				get(store, "products", 99, 0);
				expect.unreachable("get should have thrown");
			} catch (err) {
				expect(err).toBeInstanceOf(IndexOutOfRangeError);
				expect(err).toMatchObject({ axis: "record", index: 99, length: 2 });
			}
		});

		it("should throw IndexOutOfRangeError for negative indices", () => {
			expect(() => get(store, "products", -1, 0)).toThrow(IndexOutOfRangeError);
			expect(() => get(store, "products", 0, -1)).toThrow(IndexOutOfRangeError);
		});

		it("should throw IndexOutOfRangeError for a field index past the end", () => {
			expect(() => get(store, "products", 0, 4)).toThrow(
				"Field index 4 out of bounds for record 0 of list 'products' (length 4)",
			);
		});

		it("should reject fractional indices", () => {
			expect(() => get(store, "products", 0.5, 0)).toThrow(IndexOutOfRangeError);
		});
	});

	describe("getValue", () => {
		it("should return the bare scalar", () => {
			expect(getValue(store, "status", 0, 2)).toBe(45);
			expect(getValue(file, "prices", 0, 0)).toBe("milk");
		});
	});

	describe("getList / listNames", () => {
		it("should list names in document order", () => {
			expect(listNames(store)).toEqual(["products", "status", "prices"]);
		});

		it("should return all records of a list", () => {
			expect(getList(store, "products")).toHaveLength(2);
		});

		it("should throw NotFoundError for an absent list", () => {
			expect(() => getList(store, "nope")).toThrow(NotFoundError);
		});
	});
});
