import { RecordLayout, RecordVector } from "@xmlmap/core";
import { describe, expect, it } from "vitest";
import { XmlFields } from "../src";
import { chair, Furniture } from "./fixtures/models";

describe("XmlFields", () => {
	const fields = new XmlFields([
		["count", 3],
		["title", "Plan"],
		["visible", false],
		["sizes", [1, 2]],
		["tags", ["a", "b"]],
		["item", chair],
		["samples", Int16Array.from([-1, 1])],
		["points", RecordVector.fromRecords(new RecordLayout([["x", "u8"]]), [{ x: 1 }])],
		["missing", undefined],
	]);

	it("keeps field order", () => {
		expect(fields.names).toEqual([
			"count",
			"title",
			"visible",
			"sizes",
			"tags",
			"item",
			"samples",
			"points",
			"missing",
		]);
		expect(fields.size).toBe(9);
		expect(fields.has("missing")).toBe(true);
		expect(fields.has("other")).toBe(false);
	});

	it("returns typed values", () => {
		expect(fields.number("count")).toBe(3);
		expect(fields.string("title")).toBe("Plan");
		expect(fields.boolean("visible")).toBe(false);
		expect(fields.numbers("sizes")).toEqual([1, 2]);
		expect(fields.strings("tags")).toEqual(["a", "b"]);
		expect(fields.instance("item", Furniture)).toBe(chair);
		expect(fields.vector("samples")).toEqual(Int16Array.from([-1, 1]));
		expect(fields.records("points").length).toBe(1);
		expect(fields.get("missing")).toBeUndefined();
	});

	it("copies arrays", () => {
		const sizes = fields.numbers("sizes");
		sizes.push(3);
		expect(fields.numbers("sizes")).toEqual([1, 2]);
	});

	it("names the field on a type mismatch", () => {
		expect(() => fields.number("title")).toThrow(
			new TypeError('Field "title" holds string, expected number'),
		);
		expect(() => fields.strings("sizes")).toThrow(
			'Field "sizes" holds number, expected array of string',
		);
		expect(() => fields.array("count")).toThrow('Field "count" holds number, expected array');
		expect(() => fields.instance("title", Furniture)).toThrow(
			'Field "title" holds string, expected Furniture',
		);
	});

	it("rejects unknown names", () => {
		expect(() => fields.get("nope")).toThrow('No decoded field "nope"');
	});

	it("converts to a plain object", () => {
		expect(new XmlFields([["a", 1]]).toObject()).toEqual({ a: 1 });
	});
});
