/**
 * Error codes for programmatic handling
 */
export type SerDesErrorCode =
	| "CONFIGURATION"
	| "MISSING_FIELD"
	| "MISSING_ATTRIBUTE"
	| "MISSING_ELEMENT"
	| "UNEXPECTED_ELEMENT"
	| "PARSE"
	| "SHAPE"
	| "ENCODE";

/**
 * Base class of every error raised while declaring or applying a mapping
 */
export class SerDesError extends Error {
	readonly code: SerDesErrorCode;

	constructor(code: SerDesErrorCode, message: string) {
		super(message);
		this.name = "SerDesError";
		this.code = code;
	}
}

/**
 * Malformed schema: duplicate tag, attribute holding a non-atomic type,
 * unresolvable type specification. Raised while the schema is resolved.
 */
export class ConfigurationError extends SerDesError {
	constructor(message: string, code: SerDesErrorCode = "CONFIGURATION") {
		super(code, message);
		this.name = "ConfigurationError";
	}
}

/**
 * The object being serialized lacks a field its schema declares
 */
export class MissingFieldError extends ConfigurationError {
	readonly field: string;

	constructor(field: string, owner: string) {
		super(`${owner} has no field "${field}"`, "MISSING_FIELD");
		this.name = "MissingFieldError";
		this.field = field;
	}
}

export function formatPath(path: readonly string[]): string {
	return `/${path.join("/")}`;
}

/**
 * Failure while converting a value, located by an XPath-like path
 * such as `/building/rooms/room[2]/name`
 */
export class ConversionError extends SerDesError {
	readonly path: readonly string[];
	/** Message without the location suffix */
	readonly reason: string;

	constructor(code: SerDesErrorCode, reason: string, path: readonly string[]) {
		super(code, `${reason} at ${formatPath(path)}`);
		this.name = "ConversionError";
		this.path = [...path];
		this.reason = reason;
	}
}

export class MissingAttributeError extends ConversionError {
	readonly attribute: string;

	constructor(attribute: string, path: readonly string[]) {
		super("MISSING_ATTRIBUTE", `missing attribute "${attribute}"`, path);
		this.name = "MissingAttributeError";
		this.attribute = attribute;
	}
}

export class MissingElementError extends ConversionError {
	readonly tag: string;

	constructor(tag: string, path: readonly string[]) {
		super("MISSING_ELEMENT", `missing element <${tag}>`, path);
		this.name = "MissingElementError";
		this.tag = tag;
	}
}

/**
 * Wrong root tag, a repeated singular element, or (in strict mode) a child
 * list that differs from the declared one
 */
export class UnexpectedElementError extends ConversionError {
	constructor(reason: string, path: readonly string[]) {
		super("UNEXPECTED_ELEMENT", reason, path);
		this.name = "UnexpectedElementError";
	}
}

export class ParseError extends ConversionError {
	readonly text: string;

	constructor(text: string, typeName: string, detail: string, path: readonly string[]) {
		const shown = text.length > 100 ? `${text.slice(0, 100)}...` : text;
		super("PARSE", `could not parse "${shown}" as ${typeName}: ${detail}`, path);
		this.name = "ParseError";
		this.text = text;
	}
}

/**
 * Packed payload whose length is not a whole number of elements
 */
export class ShapeError extends ConversionError {
	constructor(byteLength: number, stride: number, path: readonly string[]) {
		super(
			"SHAPE",
			`payload of ${byteLength} bytes is not a multiple of the ${stride}-byte element stride`,
			path,
		);
		this.name = "ShapeError";
	}
}

/**
 * Value handed to a descriptor is not of the type it serializes
 */
export class EncodeError extends ConversionError {
	constructor(reason: string, path: readonly string[]) {
		super("ENCODE", reason, path);
		this.name = "EncodeError";
	}
}

/**
 * Difference between an expected and an actual list of child tags
 *
 * @example
 * String(new TagListComparison(["width"], ["wdth"]));
 * // "[missing: width, unexpected: wdth]"
 */
export class TagListComparison {
	readonly lines: readonly string[];

	constructor(expected: readonly string[], actual: readonly string[]) {
		const lines: string[] = [];
		const length = Math.max(expected.length, actual.length);
		for (let i = 0; i < length; i++) {
			const want = expected[i];
			const got = actual[i];
			if (want === got) continue;
			if (want !== undefined) lines.push(`missing: ${want}`);
			if (got !== undefined) lines.push(`unexpected: ${got}`);
		}
		this.lines = lines;
	}

	get length(): number {
		return this.lines.length;
	}

	toString(): string {
		return `[${this.lines.join(", ")}]`;
	}
}
