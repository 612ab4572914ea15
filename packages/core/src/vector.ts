/**
 * Fixed-stride numeric buffers
 *
 * Two shapes of bulk numeric payload are supported:
 * - scalar vectors, held as the platform typed array for their scalar type
 * - record vectors, where every element is a packed record of named fields
 *   (each a scalar or a nested record), stored back to back without padding
 */

import type { Endianness, ScalarType } from "./binary";
import { readScalar, sizeOf, writeScalar } from "./binary";
import { checkScalar } from "./validation";

/** Typed array backing a scalar vector */
export type ScalarArray =
	| Uint8Array
	| Int8Array
	| Uint16Array
	| Int16Array
	| Uint32Array
	| Int32Array
	| Float32Array
	| Float64Array;

/**
 * Create the typed array for a scalar type
 *
 * @example
 * createScalarArray("u16", [1, 2, 3]); // Uint16Array [1, 2, 3]
 */
export function createScalarArray(
	dtype: ScalarType,
	values: ArrayLike<number>,
): ScalarArray {
	switch (dtype) {
		case "u8":
			return Uint8Array.from(values);
		case "i8":
			return Int8Array.from(values);
		case "u16":
			return Uint16Array.from(values);
		case "i16":
			return Int16Array.from(values);
		case "u32":
			return Uint32Array.from(values);
		case "i32":
			return Int32Array.from(values);
		case "f32":
			return Float32Array.from(values);
		case "f64":
			return Float64Array.from(values);
		default: {
			const _exhaustive: never = dtype;
			throw new Error(`Unknown scalar type: ${_exhaustive}`);
		}
	}
}

/**
 * Scalar type held by a typed array, or undefined for anything else
 */
export function scalarTypeOf(value: unknown): ScalarType | undefined {
	if (value instanceof Uint8Array) return "u8";
	if (value instanceof Int8Array) return "i8";
	if (value instanceof Uint16Array) return "u16";
	if (value instanceof Int16Array) return "i16";
	if (value instanceof Uint32Array) return "u32";
	if (value instanceof Int32Array) return "i32";
	if (value instanceof Float32Array) return "f32";
	if (value instanceof Float64Array) return "f64";
	return undefined;
}

export function isScalarArray(value: unknown): value is ScalarArray {
	return scalarTypeOf(value) !== undefined;
}

/** Name of the typed array class for a scalar type, for messages */
export function scalarArrayName(dtype: ScalarType): string {
	switch (dtype) {
		case "u8":
			return "Uint8Array";
		case "i8":
			return "Int8Array";
		case "u16":
			return "Uint16Array";
		case "i16":
			return "Int16Array";
		case "u32":
			return "Uint32Array";
		case "i32":
			return "Int32Array";
		case "f32":
			return "Float32Array";
		case "f64":
			return "Float64Array";
	}
}

/**
 * Pack a scalar vector into bytes with an explicit byte order
 */
export function packScalars(
	values: ScalarArray,
	dtype: ScalarType,
	endianness: Endianness = "le",
): Uint8Array {
	const size = sizeOf(dtype);
	const numbers: number[] = Array.from(values);
	const bytes = new Uint8Array(numbers.length * size);
	const view = new DataView(bytes.buffer);
	numbers.forEach((value, i) => {
		writeScalar(view, i * size, value, dtype, endianness);
	});
	return bytes;
}

/**
 * Unpack bytes into a scalar vector
 *
 * @throws Error if the byte count is not a multiple of the element size
 */
export function unpackScalars(
	bytes: Uint8Array,
	dtype: ScalarType,
	endianness: Endianness = "le",
): ScalarArray {
	const size = sizeOf(dtype);
	if (bytes.length % size !== 0) {
		throw new Error(
			`Buffer of length ${bytes.length} is not a whole number of ${dtype} elements`,
		);
	}
	const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
	const values: number[] = [];
	for (let offset = 0; offset < bytes.length; offset += size) {
		values.push(readScalar(view, offset, dtype, endianness));
	}
	return createScalarArray(dtype, values);
}

// --- Records ---

export type RecordFieldType = ScalarType | RecordLayout;

/** Field specification: name and scalar type or nested layout */
export type RecordFieldSpec = readonly [name: string, type: RecordFieldType];

export interface RecordField {
	readonly name: string;
	readonly type: RecordFieldType;
	/** Byte offset of the field inside one record */
	readonly offset: number;
}

/** One decoded record: field name to number or nested record */
export interface RecordValue {
	readonly [field: string]: number | RecordValue;
}

function fieldSize(type: RecordFieldType): number {
	return typeof type === "string" ? sizeOf(type) : type.stride;
}

/**
 * Layout of one packed record
 *
 * @example
 * const rect = new RecordLayout([["width", "u16"], ["height", "u16"]]);
 * rect.stride; // 4
 */
export class RecordLayout {
	readonly fields: readonly RecordField[];
	readonly stride: number;

	constructor(specs: readonly RecordFieldSpec[]) {
		if (specs.length === 0) {
			throw new Error("Record layout needs at least one field");
		}
		const seen = new Set<string>();
		const fields: RecordField[] = [];
		let offset = 0;
		for (const [name, type] of specs) {
			if (!name) throw new Error("Record field names cannot be empty");
			if (seen.has(name)) {
				throw new Error(`Duplicate record field "${name}"`);
			}
			seen.add(name);
			fields.push({ name, type, offset });
			offset += fieldSize(type);
		}
		this.fields = fields;
		this.stride = offset;
	}

	/** Read one record starting at a byte offset */
	read(view: DataView, offset: number, endianness: Endianness): RecordValue {
		const record: Record<string, number | RecordValue> = {};
		for (const field of this.fields) {
			const at = offset + field.offset;
			record[field.name] =
				typeof field.type === "string"
					? readScalar(view, at, field.type, endianness)
					: field.type.read(view, at, endianness);
		}
		return Object.freeze(record);
	}

	/**
	 * Write one record starting at a byte offset
	 *
	 * @throws Error if a field is missing, has the wrong shape, or holds a value
	 * its scalar type cannot store
	 */
	write(
		view: DataView,
		offset: number,
		value: RecordValue,
		endianness: Endianness,
	): void {
		for (const field of this.fields) {
			const fieldValue = value[field.name];
			const at = offset + field.offset;
			if (typeof field.type === "string") {
				if (typeof fieldValue !== "number") {
					throw new Error(`Record field "${field.name}" must be a number`);
				}
				const check = checkScalar(fieldValue, field.type);
				if (!check.valid) {
					throw new Error(`Record field "${field.name}": ${check.error}`);
				}
				writeScalar(view, at, fieldValue, field.type, endianness);
			} else {
				if (typeof fieldValue !== "object") {
					throw new Error(`Record field "${field.name}" must be a record`);
				}
				field.type.write(view, at, fieldValue, endianness);
			}
		}
	}

	/** Structural comparison: same field names, order and types */
	equals(other: RecordLayout): boolean {
		if (other === this) return true;
		if (other.fields.length !== this.fields.length) return false;
		return this.fields.every((field, i) => {
			const theirs = other.fields[i];
			if (!theirs || theirs.name !== field.name) return false;
			if (typeof field.type === "string" || typeof theirs.type === "string") {
				return field.type === theirs.type;
			}
			return field.type.equals(theirs.type);
		});
	}

	/** Compact description, e.g. `{width: u16, height: u16}` */
	describe(): string {
		const parts = this.fields.map(
			(f) =>
				`${f.name}: ${typeof f.type === "string" ? f.type : f.type.describe()}`,
		);
		return `{${parts.join(", ")}}`;
	}
}

function packRecords(
	layout: RecordLayout,
	records: readonly RecordValue[],
	endianness: Endianness,
): Uint8Array {
	const bytes = new Uint8Array(records.length * layout.stride);
	const view = new DataView(bytes.buffer);
	records.forEach((record, i) => {
		layout.write(view, i * layout.stride, record, endianness);
	});
	return bytes;
}

/**
 * Vector of packed records sharing one layout
 *
 * Storage is little-endian; other byte orders are produced on demand by
 * {@link RecordVector.toBytes}.
 */
export class RecordVector {
	private constructor(
		readonly layout: RecordLayout,
		private readonly bytes: Uint8Array,
	) {}

	static fromRecords(
		layout: RecordLayout,
		records: readonly RecordValue[],
	): RecordVector {
		return new RecordVector(layout, packRecords(layout, records, "le"));
	}

	/**
	 * @throws Error if the byte count is not a multiple of the record stride
	 */
	static fromBytes(
		layout: RecordLayout,
		bytes: Uint8Array,
		endianness: Endianness = "le",
	): RecordVector {
		if (bytes.length % layout.stride !== 0) {
			throw new Error(
				`Buffer of length ${bytes.length} is not a whole number of ${layout.stride}-byte records`,
			);
		}
		if (endianness === "le") {
			return new RecordVector(layout, bytes.slice());
		}
		const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
		const records: RecordValue[] = [];
		for (let offset = 0; offset < bytes.length; offset += layout.stride) {
			records.push(layout.read(view, offset, endianness));
		}
		return RecordVector.fromRecords(layout, records);
	}

	get length(): number {
		return this.bytes.length / this.layout.stride;
	}

	at(index: number): RecordValue {
		if (!Number.isInteger(index) || index < 0 || index >= this.length) {
			throw new RangeError(
				`Record index ${index} out of bounds for vector of length ${this.length}`,
			);
		}
		const view = new DataView(
			this.bytes.buffer,
			this.bytes.byteOffset,
			this.bytes.byteLength,
		);
		return this.layout.read(view, index * this.layout.stride, "le");
	}

	toArray(): RecordValue[] {
		const records: RecordValue[] = [];
		for (let i = 0; i < this.length; i++) {
			records.push(this.at(i));
		}
		return records;
	}

	toBytes(endianness: Endianness = "le"): Uint8Array {
		if (endianness === "le") return this.bytes.slice();
		return packRecords(this.layout, this.toArray(), endianness);
	}
}
