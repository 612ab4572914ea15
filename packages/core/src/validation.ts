import type { ScalarType } from "./binary";
import { isIntegerType } from "./binary";

export type ScalarCheckCode = "TYPE_OUT_OF_RANGE" | "NOT_AN_INTEGER" | "INVALID_NUMBER";

/** Outcome of checking a number against a scalar type */
export type ScalarCheck =
	| { readonly valid: true }
	| { readonly valid: false; readonly error: string; readonly code: ScalarCheckCode };

const VALID: ScalarCheck = Object.freeze({ valid: true });

function invalid(code: ScalarCheckCode, error: string): ScalarCheck {
	return { valid: false, error, code };
}

/**
 * Inclusive range of finite values a scalar type holds
 *
 * @example
 * scalarRange("u8"); // { min: 0, max: 255 }
 */
export function scalarRange(dtype: ScalarType): { min: number; max: number } {
	switch (dtype) {
		case "u8":
			return { min: 0, max: 0xff };
		case "i8":
			return { min: -0x80, max: 0x7f };
		case "u16":
			return { min: 0, max: 0xffff };
		case "i16":
			return { min: -0x8000, max: 0x7fff };
		case "u32":
			return { min: 0, max: 0xffffffff };
		case "i32":
			return { min: -0x80000000, max: 0x7fffffff };
		case "f32":
			return { min: -3.4028234663852886e38, max: 3.4028234663852886e38 };
		case "f64":
			return { min: -Number.MAX_VALUE, max: Number.MAX_VALUE };
		default: {
			const _exhaustive: never = dtype;
			throw new Error(`Unknown scalar type: ${_exhaustive}`);
		}
	}
}

/**
 * Check that a number can be stored in a scalar type
 *
 * Integer types reject fractional and non-finite values and anything outside
 * their range. Float types accept NaN and infinities, which their binary
 * forms can hold, and reject finite values beyond their range.
 *
 * @example
 * checkScalar(300, "u8");
 * // { valid: false, error: "Value 300 out of range for u8 type", code: "TYPE_OUT_OF_RANGE" }
 */
export function checkScalar(value: number, dtype: ScalarType): ScalarCheck {
	if (isIntegerType(dtype)) {
		if (!Number.isFinite(value)) {
			return invalid("INVALID_NUMBER", `Value ${value} is not a valid number`);
		}
		if (!Number.isInteger(value)) {
			return invalid("NOT_AN_INTEGER", `Value ${value} is not an integer`);
		}
	} else if (!Number.isFinite(value)) {
		return VALID;
	}

	const { min, max } = scalarRange(dtype);
	if (value < min || value > max) {
		return invalid("TYPE_OUT_OF_RANGE", `Value ${value} out of range for ${dtype} type`);
	}
	return VALID;
}
