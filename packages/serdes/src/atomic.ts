/**
 * Scalar text codecs used by atomic type descriptors
 *
 * A codec turns one leaf text value into a value and back. Codecs throw a
 * plain Error describing the problem; the conversion engine adds the
 * location and wraps it into a ParseError or EncodeError.
 */

import type { ScalarType } from "@xmlmap/core";
import { checkScalar, isIntegerType } from "@xmlmap/core";

export interface AtomicCodec<T = unknown> {
	/** Type name used in error messages, e.g. "int" or "u16" */
	readonly name: string;
	parse(text: string): T;
	format(value: unknown): string;
}

const INTEGER_TEXT = /^[+-]?\d+$/;
const FLOAT_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function describe(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value === "string" ? `string "${value}"` : typeof value;
}

function parseInteger(text: string): number {
	const trimmed = text.trim();
	if (!INTEGER_TEXT.test(trimmed)) throw new Error("not an integer");
	const value = Number(trimmed);
	if (!Number.isSafeInteger(value)) {
		throw new Error("outside the safe integer range");
	}
	return value;
}

function parseFloatText(text: string): number {
	const trimmed = text.trim();
	switch (trimmed.toLowerCase()) {
		case "inf":
		case "+inf":
		case "infinity":
		case "+infinity":
			return Number.POSITIVE_INFINITY;
		case "-inf":
		case "-infinity":
			return Number.NEGATIVE_INFINITY;
		case "nan":
			return Number.NaN;
	}
	if (!FLOAT_TEXT.test(trimmed)) throw new Error("not a number");
	return Number(trimmed);
}

/**
 * Canonical float text: shortest round-trip form, integral values keep a
 * trailing ".0", non-finite values use inf/-inf/nan.
 *
 * @example
 * formatFloat(2); // "2.0"
 * formatFloat(0.1); // "0.1"
 */
export function formatFloat(value: number): string {
	if (Number.isNaN(value)) return "nan";
	if (value === Number.POSITIVE_INFINITY) return "inf";
	if (value === Number.NEGATIVE_INFINITY) return "-inf";
	if (Object.is(value, -0)) return "-0.0";
	const text = String(value);
	return /^-?\d+$/.test(text) ? `${text}.0` : text;
}

export const intCodec: AtomicCodec<number> = {
	name: "int",
	parse: parseInteger,
	format(value) {
		if (typeof value !== "number" || !Number.isSafeInteger(value)) {
			throw new Error(`expected an integer but got ${describe(value)}`);
		}
		return String(value);
	},
};

export const floatCodec: AtomicCodec<number> = {
	name: "float",
	parse: parseFloatText,
	format(value) {
		if (typeof value !== "number") {
			throw new Error(`expected a number but got ${describe(value)}`);
		}
		return formatFloat(value);
	},
};

export const strCodec: AtomicCodec<string> = {
	name: "str",
	parse: (text) => text,
	format(value) {
		if (typeof value !== "string") {
			throw new Error(`expected a string but got ${describe(value)}`);
		}
		return value;
	},
};

/** Booleans are written and read as exactly "true" and "false". */
export const boolCodec: AtomicCodec<boolean> = {
	name: "bool",
	parse(text) {
		const trimmed = text.trim();
		if (trimmed === "true") return true;
		if (trimmed === "false") return false;
		throw new Error('expected "true" or "false"');
	},
	format(value) {
		if (value === true) return "true";
		if (value === false) return "false";
		throw new Error(`expected true or false but got ${describe(value)}`);
	},
};

/**
 * Range-checked codec for a fixed-width scalar type
 */
export function scalarCodec(dtype: ScalarType): AtomicCodec<number> {
	const integer = isIntegerType(dtype);
	return {
		name: dtype,
		parse(text) {
			const value = integer ? parseInteger(text) : parseFloatText(text);
			const check = checkScalar(value, dtype);
			if (!check.valid) throw new Error(check.error);
			return value;
		},
		format(value) {
			if (typeof value !== "number") {
				throw new Error(`expected a number but got ${describe(value)}`);
			}
			const check = checkScalar(value, dtype);
			if (!check.valid) throw new Error(check.error);
			return integer ? String(value) : formatFloat(value);
		},
	};
}

/** Enumeration object: a TypeScript enum or a const object of members */
export type EnumLike = Readonly<Record<string, string | number>>;

/**
 * Codec writing enumeration members by name
 *
 * Numeric enums carry reverse mappings (value to name); those keys are not
 * members and are skipped.
 *
 * @example
 * enum Animal { Cat, Dog }
 * enumCodec(Animal, "Animal").format(Animal.Dog); // "Dog"
 */
export function enumCodec<E extends EnumLike>(
	enumObject: E,
	name = "enumeration",
): AtomicCodec<E[keyof E]> {
	const members = new Map<string, E[keyof E]>();
	for (const key of Object.keys(enumObject)) {
		if (!Number.isNaN(Number(key))) continue;
		const value = enumObject[key];
		if (value !== undefined) members.set(key, value);
	}
	if (members.size === 0) {
		throw new Error(`enumeration "${name}" has no members`);
	}

	return {
		name: `member of enumeration "${name}"`,
		parse(text) {
			const value = members.get(text.trim());
			if (value === undefined) throw new Error("unknown member");
			return value;
		},
		format(value) {
			for (const [memberName, memberValue] of members) {
				if (memberValue === value) return memberName;
			}
			throw new Error(
				`expected a member of enumeration "${name}" but got ${describe(value)}`,
			);
		},
	};
}

export interface CustomAtomicOptions<T> {
	name: string;
	parse(text: string): T;
	format(value: T): string;
	/** Guard run before format; values it rejects raise an EncodeError */
	is(value: unknown): value is T;
}

/**
 * Codec for an application-defined scalar
 *
 * @example
 * const isoDate = customCodec({
 *   name: "date",
 *   parse: (text) => new Date(text),
 *   format: (value) => value.toISOString(),
 *   is: (value): value is Date => value instanceof Date,
 * });
 */
export function customCodec<T>(options: CustomAtomicOptions<T>): AtomicCodec<T> {
	return {
		name: options.name,
		parse: (text) => options.parse(text),
		format(value) {
			if (!options.is(value)) {
				throw new Error(`expected ${options.name} but got ${describe(value)}`);
			}
			return options.format(value);
		},
	};
}
