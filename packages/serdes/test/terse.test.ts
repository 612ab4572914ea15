import { RecordLayout } from "@xmlmap/core";
import { describe, expect, it } from "vitest";
import {
	atomic,
	ConfigurationError,
	deriveItemTag,
	describeType,
	fromTerse,
	intCodec,
	lazy,
	list,
	numericVector,
} from "../src";
import { Furniture, Room } from "./fixtures/models";

enum Mode {
	Idle,
	Active,
}

describe("fromTerse", () => {
	it("resolves built-in type names", () => {
		expect(describeType(fromTerse("int"))).toBe("int");
		expect(describeType(fromTerse("float"))).toBe("float");
		expect(describeType(fromTerse("str"))).toBe("str");
		expect(describeType(fromTerse("bool"))).toBe("bool");
	});

	it("resolves scalar type codes to range-checked atomics", () => {
		expect(describeType(fromTerse("u16"))).toBe("u16");
		expect(describeType(fromTerse("i2"))).toBe("i16");
		expect(describeType(fromTerse("f4"))).toBe("f32");
	});

	it("resolves lists with and without item tags", () => {
		expect(fromTerse(["float"])).toMatchObject({ kind: "list", item: { kind: "atomic" } });
		expect(fromTerse(["int", "ans"])).toMatchObject({ kind: "list", itemTag: "ans" });
		expect(describeType(fromTerse([["int"]]))).toBe("list<list<int>>");
	});

	it("resolves mapped classes to instances", () => {
		const descriptor = fromTerse(Furniture);
		expect(descriptor.kind).toBe("instance");
		expect(describeType(descriptor)).toBe("Furniture");
		expect(describeType(fromTerse([Room]))).toBe("list<Room>");
	});

	it("defers lazy targets until they are used", () => {
		let resolved = false;
		const descriptor = fromTerse(
			lazy(() => {
				resolved = true;
				return Furniture;
			}),
		);
		expect(resolved).toBe(false);
		expect(describeType(descriptor)).toBe("Furniture");
		expect(resolved).toBe(true);
	});

	it("passes explicit descriptors through", () => {
		const descriptor = list(atomic(intCodec), "n");
		expect(fromTerse(descriptor)).toBe(descriptor);
	});

	it("wraps bare codecs", () => {
		expect(fromTerse(intCodec)).toEqual(atomic(intCodec));
	});

	it("resolves vector specifications", () => {
		expect(fromTerse({ vector: "u2", encoding: "binary", endian: "be" })).toEqual(
			numericVector("u16", "binary", "be"),
		);
		expect(fromTerse({ vector: "f64" })).toEqual(numericVector("f64", "text", "le"));
	});

	it("resolves record specifications", () => {
		const descriptor = fromTerse({
			records: [
				["x", "f4"],
				["y", "f4"],
			],
			tag: "point",
		});
		expect(descriptor).toMatchObject({
			kind: "record-vector",
			itemTag: "point",
			encoding: "elements",
			endian: "le",
		});
		expect(describeType(descriptor)).toBe("records{x: f32, y: f32}");
	});

	it("accepts record layouts", () => {
		const layout = new RecordLayout([["id", "u32"]]);
		expect(fromTerse({ records: layout })).toMatchObject({ layout });
	});

	it("resolves enumerations", () => {
		const descriptor = fromTerse({ enum: Mode, name: "Mode" });
		expect(describeType(descriptor)).toBe('member of enumeration "Mode"');
	});

	it("rejects unknown scalar names", () => {
		expect(() => fromTerse("decimal")).toThrow(
			new ConfigurationError('unknown scalar type "decimal" in type specification'),
		);
		expect(() => fromTerse({ vector: "u64" })).toThrow(
			'unknown scalar type "u64" in vector specification',
		);
		expect(() => fromTerse({ records: [["a", "int"]] })).toThrow(
			'unknown scalar type "int" in record field "a"',
		);
	});

	it("rejects invalid list item tags", () => {
		expect(() => fromTerse(["int", "bad tag"])).toThrow('invalid list item tag "bad tag"');
	});

	it("rejects malformed record layouts", () => {
		expect(() =>
			fromTerse({
				records: [
					["a", "u8"],
					["a", "u8"],
				],
			}),
		).toThrow('invalid record layout: Duplicate record field "a"');
		expect(() => fromTerse({ records: [["x y", "u8"]] })).toThrow(
			'record field "x y" is not a valid XML name',
		);
	});

	it("rejects empty enumerations", () => {
		expect(() => fromTerse({ enum: {}, name: "Nothing" })).toThrow(ConfigurationError);
	});
});

describe("deriveItemTag", () => {
	it("singularizes plural group tags", () => {
		expect(deriveItemTag("dimensions")).toBe("dimension");
		expect(deriveItemTag("categories")).toBe("category");
		expect(deriveItemTag("rooms")).toBe("room");
	});

	it("appends -item otherwise", () => {
		expect(deriveItemTag("data")).toBe("data-item");
		expect(deriveItemTag("class")).toBe("class-item");
		expect(deriveItemTag("s")).toBe("s-item");
	});
});
