/**
 * Recursive conversion engine
 *
 * `path` arguments are the location of the element being produced or read,
 * root first, with list items written as `tag[n]` (1-based). Errors raised
 * below carry that path.
 */

import type { RecordLayout, RecordValue, ScalarArray, XmlElement } from "@xmlmap/core";
import {
	checkScalar,
	createElement,
	createLogger,
	createScalarArray,
	findChildren,
	isIntegerType,
	isScalarArray,
	packScalars,
	RecordVector,
	scalarArrayName,
	scalarTypeOf,
	sizeOf,
	unpackScalars,
} from "@xmlmap/core";
import { formatFloat, scalarCodec } from "./atomic";
import type { DeserializeOptions } from "./descriptor";
import {
	EncodeError,
	MissingElementError,
	ParseError,
	ShapeError,
	UnexpectedElementError,
} from "./errors";
import type {
	AtomicDescriptor,
	NumericVectorDescriptor,
	RecordVectorDescriptor,
	TypeDescriptor,
	XmlMapped,
} from "./type-descriptor";
import { deriveItemTag, listItemTag, targetName } from "./type-descriptor";

const log = createLogger("convert");

const BASE64_TEXT = /^[A-Za-z0-9+/]*={0,2}$/;

function reasonOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function describeValue(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	const dtype = scalarTypeOf(value);
	if (dtype) return scalarArrayName(dtype);
	return typeof value;
}

function itemPath(path: readonly string[], tag: string, index: number): string[] {
	return [...path, `${tag}[${index + 1}]`];
}

// --- Encoding ---

/** Text of an atomic value, as written to an element or attribute */
export function formatAtomic(
	descriptor: AtomicDescriptor,
	value: unknown,
	path: readonly string[],
): string {
	try {
		return descriptor.codec.format(value);
	} catch (error) {
		throw new EncodeError(reasonOf(error), path);
	}
}

function toScalarArray(
	descriptor: NumericVectorDescriptor,
	value: unknown,
	path: readonly string[],
): ScalarArray {
	const { dtype } = descriptor;
	if (isScalarArray(value)) {
		if (scalarTypeOf(value) !== dtype) {
			throw new EncodeError(
				`expected a ${scalarArrayName(dtype)} but got ${describeValue(value)}`,
				path,
			);
		}
		return value;
	}
	if (!Array.isArray(value)) {
		throw new EncodeError(
			`expected a ${scalarArrayName(dtype)} or an array of numbers but got ${describeValue(value)}`,
			path,
		);
	}
	const numbers: number[] = [];
	value.forEach((item: unknown, i) => {
		if (typeof item !== "number") {
			throw new EncodeError(`vector item ${i + 1} is ${describeValue(item)}, not a number`, path);
		}
		const check = checkScalar(item, dtype);
		if (!check.valid) {
			throw new EncodeError(`vector item ${i + 1}: ${check.error}`, path);
		}
		numbers.push(item);
	});
	return createScalarArray(dtype, numbers);
}

function encodeNumericVector(
	descriptor: NumericVectorDescriptor,
	value: unknown,
	tag: string,
	path: readonly string[],
): XmlElement {
	const array = toScalarArray(descriptor, value, path);
	if (descriptor.encoding === "binary") {
		const bytes = packScalars(array, descriptor.dtype, descriptor.endian);
		return createElement(tag, { text: Buffer.from(bytes).toString("base64") });
	}
	const format = isIntegerType(descriptor.dtype) ? String : formatFloat;
	return createElement(tag, { text: Array.from(array, (v) => format(v)).join(",") });
}

function isRecordArray(value: unknown): value is RecordValue[] {
	return (
		Array.isArray(value) &&
		value.every((item: unknown) => typeof item === "object" && item !== null)
	);
}

function toRecordVector(
	layout: RecordLayout,
	value: unknown,
	path: readonly string[],
): RecordVector {
	if (value instanceof RecordVector) {
		if (!value.layout.equals(layout)) {
			throw new EncodeError(
				`expected records ${layout.describe()} but got records ${value.layout.describe()}`,
				path,
			);
		}
		return value;
	}
	if (!isRecordArray(value)) {
		throw new EncodeError(
			`expected a RecordVector or an array of records but got ${describeValue(value)}`,
			path,
		);
	}
	try {
		return RecordVector.fromRecords(layout, value);
	} catch (error) {
		throw new EncodeError(reasonOf(error), path);
	}
}

function encodeRecord(
	layout: RecordLayout,
	record: RecordValue,
	tag: string,
	path: readonly string[],
): XmlElement {
	const children = layout.fields.map((field) => {
		const fieldValue = record[field.name];
		if (typeof field.type === "string") {
			if (typeof fieldValue !== "number") {
				throw new EncodeError(`record field "${field.name}" is not a number`, path);
			}
			const text = isIntegerType(field.type) ? String(fieldValue) : formatFloat(fieldValue);
			return createElement(field.name, { text });
		}
		if (fieldValue === undefined || typeof fieldValue === "number") {
			throw new EncodeError(`record field "${field.name}" is not a record`, path);
		}
		return encodeRecord(field.type, fieldValue, field.name, [...path, field.name]);
	});
	return createElement(tag, { children });
}

function encodeRecordVector(
	descriptor: RecordVectorDescriptor,
	value: unknown,
	tag: string,
	path: readonly string[],
): XmlElement {
	const records = toRecordVector(descriptor.layout, value, path);
	if (descriptor.encoding === "binary") {
		const bytes = records.toBytes(descriptor.endian);
		return createElement(tag, { text: Buffer.from(bytes).toString("base64") });
	}
	const itemTag = descriptor.itemTag ?? deriveItemTag(tag);
	const children = records
		.toArray()
		.map((record, i) => encodeRecord(descriptor.layout, record, itemTag, itemPath(path, itemTag, i)));
	return createElement(tag, { children });
}

/**
 * Serialize one value as an element with the given tag
 *
 * @throws EncodeError if the value is not of the type the descriptor expects
 */
export function encodeValue(
	descriptor: TypeDescriptor,
	value: unknown,
	tag: string,
	path: readonly string[] = [tag],
): XmlElement {
	switch (descriptor.kind) {
		case "atomic":
			return createElement(tag, { text: formatAtomic(descriptor, value, path) });
		case "list": {
			if (!Array.isArray(value)) {
				throw new EncodeError(`expected an array but got ${describeValue(value)}`, path);
			}
			const itemTag = listItemTag(descriptor, tag);
			const children = value.map((item: unknown, i) =>
				encodeValue(descriptor.item, item, itemTag, itemPath(path, itemTag, i)),
			);
			return createElement(tag, { children });
		}
		case "instance": {
			const target = descriptor.target();
			if (typeof value !== "object" || value === null) {
				throw new EncodeError(
					`expected an instance of ${targetName(target)} but got ${describeValue(value)}`,
					path,
				);
			}
			return target.xmlDescriptor.serialize(value, tag, path);
		}
		case "numeric-vector":
			return encodeNumericVector(descriptor, value, tag, path);
		case "record-vector":
			return encodeRecordVector(descriptor, value, tag, path);
		default: {
			const _exhaustive: never = descriptor;
			throw new Error(`Unknown type descriptor: ${JSON.stringify(_exhaustive)}`);
		}
	}
}

// --- Decoding ---

/** Parse the text of an element or attribute with an atomic descriptor */
export function parseAtomic(
	descriptor: AtomicDescriptor,
	text: string,
	path: readonly string[],
): unknown {
	try {
		return descriptor.codec.parse(text);
	} catch (error) {
		throw new ParseError(text, descriptor.codec.name, reasonOf(error), path);
	}
}

function decodeBase64(text: string, stride: number, path: readonly string[]): Uint8Array {
	const compact = text.replace(/\s+/g, "");
	if (!BASE64_TEXT.test(compact) || compact.length % 4 !== 0) {
		throw new ParseError(text, "base64", "invalid base64 text", path);
	}
	const bytes = new Uint8Array(Buffer.from(compact, "base64"));
	if (bytes.length % stride !== 0) {
		throw new ShapeError(bytes.length, stride, path);
	}
	return bytes;
}

function decodeNumericVector(
	descriptor: NumericVectorDescriptor,
	element: XmlElement,
	path: readonly string[],
): ScalarArray {
	const { dtype } = descriptor;
	const text = element.text ?? "";
	if (descriptor.encoding === "binary") {
		const bytes = decodeBase64(text, sizeOf(dtype), path);
		return unpackScalars(bytes, dtype, descriptor.endian);
	}
	const trimmed = text.trim();
	if (!trimmed) return createScalarArray(dtype, []);
	const codec = scalarCodec(dtype);
	const values = trimmed.split(/\s*,\s*|\s+/).map((token) => {
		try {
			return codec.parse(token);
		} catch (error) {
			throw new ParseError(token, dtype, reasonOf(error), path);
		}
	});
	return createScalarArray(dtype, values);
}

function decodeRecord(
	layout: RecordLayout,
	element: XmlElement,
	path: readonly string[],
): RecordValue {
	const record: Record<string, number | RecordValue> = {};
	for (const field of layout.fields) {
		const matches = findChildren(element, field.name);
		const child = matches[0];
		if (!child) throw new MissingElementError(field.name, path);
		if (matches.length > 1) {
			throw new UnexpectedElementError(
				`element <${field.name}> appears ${matches.length} times`,
				path,
			);
		}
		const fieldPath = [...path, field.name];
		if (typeof field.type === "string") {
			const text = child.text ?? "";
			try {
				record[field.name] = scalarCodec(field.type).parse(text);
			} catch (error) {
				throw new ParseError(text, field.type, reasonOf(error), fieldPath);
			}
		} else {
			record[field.name] = decodeRecord(field.type, child, fieldPath);
		}
	}
	return record;
}

function decodeRecordVector(
	descriptor: RecordVectorDescriptor,
	element: XmlElement,
	path: readonly string[],
	options: DeserializeOptions,
): RecordVector {
	const { layout } = descriptor;
	if (descriptor.encoding === "binary") {
		const bytes = decodeBase64(element.text ?? "", layout.stride, path);
		return RecordVector.fromBytes(layout, bytes, descriptor.endian);
	}
	const itemTag = descriptor.itemTag ?? deriveItemTag(element.tag);
	rejectForeignChildren(element, itemTag, path, options);
	const records = findChildren(element, itemTag).map((child, i) =>
		decodeRecord(layout, child, itemPath(path, itemTag, i)),
	);
	return RecordVector.fromRecords(layout, records);
}

function rejectForeignChildren(
	element: XmlElement,
	itemTag: string,
	path: readonly string[],
	options: DeserializeOptions,
): void {
	if (!options.strict) return;
	const foreign = element.children.find((child) => child.tag !== itemTag);
	if (foreign) {
		throw new UnexpectedElementError(
			`expected only <${itemTag}> items but got <${foreign.tag}>`,
			path,
		);
	}
}

/**
 * Deserialize one value from an element
 *
 * @throws ConversionError subclasses for missing, unparseable or
 * misshapen content
 */
export function decodeValue(
	descriptor: TypeDescriptor,
	element: XmlElement,
	path: readonly string[] = [element.tag],
	options: DeserializeOptions = {},
): unknown {
	switch (descriptor.kind) {
		case "atomic":
			return parseAtomic(descriptor, element.text ?? "", path);
		case "list": {
			const itemTag = listItemTag(descriptor, element.tag);
			rejectForeignChildren(element, itemTag, path, options);
			return findChildren(element, itemTag).map((child, i) =>
				decodeValue(descriptor.item, child, itemPath(path, itemTag, i), options),
			);
		}
		case "instance": {
			const target = descriptor.target();
			const fields = target.xmlDescriptor.deserialize(element, options, path);
			return target.fromXmlFields(fields);
		}
		case "numeric-vector":
			return decodeNumericVector(descriptor, element, path);
		case "record-vector":
			return decodeRecordVector(descriptor, element, path, options);
		default: {
			const _exhaustive: never = descriptor;
			throw new Error(`Unknown type descriptor: ${JSON.stringify(_exhaustive)}`);
		}
	}
}

/** Value of a field whose grouping element is absent, if it has one */
export function emptyValue(descriptor: TypeDescriptor): { value: unknown } | undefined {
	if (descriptor.kind === "list") return { value: [] };
	if (descriptor.kind === "record-vector" && descriptor.encoding === "elements") {
		return { value: RecordVector.fromRecords(descriptor.layout, []) };
	}
	return undefined;
}

// --- Entry points ---

/**
 * Serialize an object of a mapped type into an element
 *
 * @example
 * const element = serialize(Furniture, chair, "furniture");
 * serializeXml(element);
 * // <furniture type="chair"><name>Armchair</name>...</furniture>
 */
export function serialize(target: XmlMapped, value: object, tag: string): XmlElement {
	log.trace({ target: targetName(target), tag }, "serialize");
	return target.xmlDescriptor.serialize(value, tag);
}

/**
 * Deserialize an element into a value of a mapped type
 *
 * @param expectedTag - When given, the element's tag must match
 * @throws UnexpectedElementError if the tag does not match
 */
export function deserialize<T>(
	target: XmlMapped<T>,
	element: XmlElement,
	expectedTag?: string,
	options: DeserializeOptions = {},
): T {
	log.trace({ target: targetName(target), tag: element.tag }, "deserialize");
	if (expectedTag !== undefined && element.tag !== expectedTag) {
		throw new UnexpectedElementError(
			`expected tag "${expectedTag}" but got "${element.tag}"`,
			[element.tag],
		);
	}
	const fields = target.xmlDescriptor.deserialize(element, options);
	return target.fromXmlFields(fields);
}
