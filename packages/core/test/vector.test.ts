import { describe, expect, it } from "vitest";
import {
	createScalarArray,
	isScalarArray,
	packScalars,
	RecordLayout,
	RecordVector,
	scalarArrayName,
	scalarTypeOf,
	unpackScalars,
} from "../src/vector";

describe("Scalar vectors", () => {
	it("creates the typed array for each scalar type", () => {
		expect(createScalarArray("u16", [1, 2, 3])).toBeInstanceOf(Uint16Array);
		expect(createScalarArray("i8", [-1])).toBeInstanceOf(Int8Array);
		expect(createScalarArray("f64", [0.5])).toBeInstanceOf(Float64Array);
	});

	it("reports the scalar type of a typed array", () => {
		expect(scalarTypeOf(new Int32Array(2))).toBe("i32");
		expect(scalarTypeOf(new Float32Array(2))).toBe("f32");
		expect(scalarTypeOf([1, 2])).toBeUndefined();
		expect(isScalarArray(new Uint8Array(1))).toBe(true);
		expect(isScalarArray("abc")).toBe(false);
	});

	it("names typed array classes", () => {
		expect(scalarArrayName("u32")).toBe("Uint32Array");
		expect(scalarArrayName("f64")).toBe("Float64Array");
	});

	it("packs little-endian by default", () => {
		const bytes = packScalars(Uint16Array.from([1, 0x0203]), "u16");
		expect(Array.from(bytes)).toEqual([0x01, 0x00, 0x03, 0x02]);
	});

	it("packs big-endian on request", () => {
		const bytes = packScalars(Int16Array.from([-2]), "i16", "be");
		expect(Array.from(bytes)).toEqual([0xff, 0xfe]);
	});

	it("unpacks into the matching typed array", () => {
		const values = unpackScalars(new Uint8Array([0x00, 0x01, 0x00, 0x02]), "u16", "be");
		expect(values).toBeInstanceOf(Uint16Array);
		expect(Array.from(values)).toEqual([1, 2]);
	});

	it("unpacks from a view into a larger buffer", () => {
		const backing = new Uint8Array([0xaa, 0x05, 0x00, 0xbb]);
		const values = unpackScalars(backing.subarray(1, 3), "u16");
		expect(Array.from(values)).toEqual([5]);
	});

	it("rejects byte counts that are not a whole number of elements", () => {
		expect(() => unpackScalars(new Uint8Array(5), "i32")).toThrow(
			"Buffer of length 5 is not a whole number of i32 elements",
		);
	});
});

describe("RecordLayout", () => {
	const rect = new RecordLayout([
		["width", "u16"],
		["height", "u16"],
	]);

	it("computes packed offsets and stride", () => {
		expect(rect.stride).toBe(4);
		expect(rect.fields.map((f) => f.offset)).toEqual([0, 2]);
	});

	it("nests layouts", () => {
		const placed = new RecordLayout([
			["id", "u8"],
			["size", rect],
			["weight", "f64"],
		]);
		expect(placed.stride).toBe(13);
		expect(placed.fields.map((f) => f.offset)).toEqual([0, 1, 5]);
		expect(placed.describe()).toBe("{id: u8, size: {width: u16, height: u16}, weight: f64}");
	});

	it("rejects empty and duplicate field lists", () => {
		expect(() => new RecordLayout([])).toThrow("Record layout needs at least one field");
		expect(
			() =>
				new RecordLayout([
					["a", "u8"],
					["a", "i8"],
				]),
		).toThrow('Duplicate record field "a"');
		expect(() => new RecordLayout([["", "u8"]])).toThrow("Record field names cannot be empty");
	});

	it("compares structurally", () => {
		const same = new RecordLayout([
			["width", "u16"],
			["height", "u16"],
		]);
		const swapped = new RecordLayout([
			["height", "u16"],
			["width", "u16"],
		]);
		expect(rect.equals(same)).toBe(true);
		expect(rect.equals(swapped)).toBe(false);
	});

	it("rejects values the field type cannot hold on write", () => {
		const view = new DataView(new ArrayBuffer(4));
		expect(() => rect.write(view, 0, { width: 70000, height: 1 }, "le")).toThrow(
			'Record field "width": Value 70000 out of range for u16 type',
		);
		expect(() => rect.write(view, 0, { width: 1, height: Number.NaN }, "le")).toThrow(
			'Record field "height": Value NaN is not a valid number',
		);
	});

	it("rejects records with a missing field on write", () => {
		const view = new DataView(new ArrayBuffer(4));
		expect(() => rect.write(view, 0, { width: 1 }, "le")).toThrow(
			'Record field "height" must be a number',
		);
	});
});

describe("RecordVector", () => {
	const rect = new RecordLayout([
		["width", "u16"],
		["height", "u16"],
	]);

	it("holds records and reads them back", () => {
		const vector = RecordVector.fromRecords(rect, [
			{ width: 10, height: 20 },
			{ width: 3, height: 4 },
		]);
		expect(vector.length).toBe(2);
		expect(vector.at(1)).toEqual({ width: 3, height: 4 });
		expect(vector.toArray()).toEqual([
			{ width: 10, height: 20 },
			{ width: 3, height: 4 },
		]);
	});

	it("stores little-endian and converts on output", () => {
		const vector = RecordVector.fromRecords(rect, [{ width: 1, height: 2 }]);
		expect(Array.from(vector.toBytes())).toEqual([1, 0, 2, 0]);
		expect(Array.from(vector.toBytes("be"))).toEqual([0, 1, 0, 2]);
	});

	it("reads big-endian bytes", () => {
		const vector = RecordVector.fromBytes(rect, new Uint8Array([0, 7, 1, 0]), "be");
		expect(vector.at(0)).toEqual({ width: 7, height: 256 });
	});

	it("rejects byte counts that are not a whole number of records", () => {
		expect(() => RecordVector.fromBytes(rect, new Uint8Array(6))).toThrow(
			"Buffer of length 6 is not a whole number of 4-byte records",
		);
	});

	it("throws RangeError for out of bounds indices", () => {
		const vector = RecordVector.fromRecords(rect, []);
		expect(() => vector.at(0)).toThrow(RangeError);
	});

	it("returns frozen records", () => {
		const vector = RecordVector.fromRecords(rect, [{ width: 1, height: 2 }]);
		expect(Object.isFrozen(vector.at(0))).toBe(true);
	});
});
