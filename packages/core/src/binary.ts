/**
 * Endianness for multi-byte values
 * - "le" = little-endian (least significant byte first)
 * - "be" = big-endian (most significant byte first)
 */
export type Endianness = "le" | "be";

/**
 * Scalar data types supported for numeric payloads
 * - "u8" = unsigned 8-bit integer (0-255)
 * - "i8" = signed 8-bit integer (-128 to 127)
 * - "u16" = unsigned 16-bit integer (0-65535)
 * - "i16" = signed 16-bit integer (-32768 to 32767)
 * - "u32" = unsigned 32-bit integer (0-4294967295)
 * - "i32" = signed 32-bit integer (-2147483648 to 2147483647)
 * - "f32" = 32-bit floating point
 * - "f64" = 64-bit floating point
 */
export type ScalarType = "u8" | "i8" | "u16" | "i16" | "u32" | "i32" | "f32" | "f64";

export const SCALAR_TYPES: readonly ScalarType[] = [
	"u8",
	"i8",
	"u16",
	"i16",
	"u32",
	"i32",
	"f32",
	"f64",
];

export function isScalarType(value: string): value is ScalarType {
	return SCALAR_TYPES.some((t) => t === value);
}

/**
 * Resolve a scalar type from one of its spellings
 *
 * Accepts the canonical names ("u16"), dtype-style codes ("u2", "f8") and
 * long names ("uint16", "float64"). Matching is case-insensitive.
 *
 * @returns The scalar type, or undefined for an unknown code
 *
 * @example
 * scalarTypeFromCode("i2"); // "i16"
 * scalarTypeFromCode("double"); // "f64"
 */
export function scalarTypeFromCode(code: string): ScalarType | undefined {
	const normalized = code.trim().toLowerCase();
	if (isScalarType(normalized)) return normalized;

	switch (normalized) {
		case "u1":
		case "uint8":
			return "u8";
		case "i1":
		case "int8":
			return "i8";
		case "u2":
		case "uint16":
			return "u16";
		case "i2":
		case "int16":
			return "i16";
		case "u4":
		case "uint32":
			return "u32";
		case "i4":
		case "int32":
			return "i32";
		case "f4":
		case "float32":
		case "float":
			return "f32";
		case "f8":
		case "float64":
		case "double":
			return "f64";
		default:
			return undefined;
	}
}

export function isIntegerType(dtype: ScalarType): boolean {
	return dtype !== "f32" && dtype !== "f64";
}

/**
 * Get the byte size of a scalar type
 *
 * @example
 * sizeOf("u16"); // 2
 * sizeOf("f64"); // 8
 */
export function sizeOf(dtype: ScalarType): number {
	switch (dtype) {
		case "u8":
		case "i8":
			return 1;
		case "u16":
		case "i16":
			return 2;
		case "u32":
		case "i32":
		case "f32":
			return 4;
		case "f64":
			return 8;
	}
}

/**
 * Read one scalar from a view at the given byte offset
 *
 * @throws Error if the value would extend past the end of the view
 */
export function readScalar(
	view: DataView,
	offset: number,
	type: ScalarType,
	endianness: Endianness = "le",
): number {
	if (offset < 0 || offset + sizeOf(type) > view.byteLength) {
		throw new Error(
			`Offset ${offset} out of bounds for buffer of length ${view.byteLength}`,
		);
	}
	const littleEndian = endianness === "le";

	switch (type) {
		case "u8":
			return view.getUint8(offset);
		case "i8":
			return view.getInt8(offset);
		case "u16":
			return view.getUint16(offset, littleEndian);
		case "i16":
			return view.getInt16(offset, littleEndian);
		case "u32":
			return view.getUint32(offset, littleEndian);
		case "i32":
			return view.getInt32(offset, littleEndian);
		case "f32":
			return view.getFloat32(offset, littleEndian);
		case "f64":
			return view.getFloat64(offset, littleEndian);
		default: {
			const _exhaustive: never = type;
			throw new Error(`Unknown scalar type: ${_exhaustive}`);
		}
	}
}

/**
 * Write one scalar into a view at the given byte offset
 *
 * Integer values are rounded and clamped to the valid range for the data
 * type before writing. Floating-point values are written as-is.
 */
export function writeScalar(
	view: DataView,
	offset: number,
	value: number,
	type: ScalarType,
	endianness: Endianness = "le",
): void {
	if (offset < 0 || offset + sizeOf(type) > view.byteLength) {
		throw new Error(
			`Offset ${offset} out of bounds for buffer of length ${view.byteLength}`,
		);
	}
	const littleEndian = endianness === "le";

	switch (type) {
		case "u8":
			view.setUint8(offset, Math.max(0, Math.min(0xff, Math.round(value))));
			break;
		case "i8":
			view.setInt8(offset, Math.max(-0x80, Math.min(0x7f, Math.round(value))));
			break;
		case "u16":
			view.setUint16(
				offset,
				Math.max(0, Math.min(0xffff, Math.round(value))),
				littleEndian,
			);
			break;
		case "i16":
			view.setInt16(
				offset,
				Math.max(-0x8000, Math.min(0x7fff, Math.round(value))),
				littleEndian,
			);
			break;
		case "u32":
			view.setUint32(
				offset,
				Math.max(0, Math.min(0xffffffff, Math.round(value))),
				littleEndian,
			);
			break;
		case "i32":
			view.setInt32(
				offset,
				Math.max(-0x80000000, Math.min(0x7fffffff, Math.round(value))),
				littleEndian,
			);
			break;
		case "f32":
			view.setFloat32(offset, value, littleEndian);
			break;
		case "f64":
			view.setFloat64(offset, value, littleEndian);
			break;
	}
}
