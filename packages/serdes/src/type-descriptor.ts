/**
 * Type descriptors
 *
 * A type descriptor says how one field value converts to and from an XML
 * fragment. The set of kinds is closed; the conversion engine dispatches on
 * `kind`. Descriptors hold configuration only and never touch instance data.
 */

import type { Endianness, RecordLayout, ScalarType } from "@xmlmap/core";
import type { AtomicCodec } from "./atomic";
import type { DescriptorTable } from "./descriptor";
import type { XmlFields } from "./fields";

/** Leaf value held as element text or attribute value */
export interface AtomicDescriptor {
	readonly kind: "atomic";
	readonly codec: AtomicCodec;
}

/** Repeated items under one grouping element */
export interface ListDescriptor {
	readonly kind: "list";
	readonly item: TypeDescriptor;
	/** Item tag; derived from the grouping tag when absent */
	readonly itemTag?: string;
}

/** Nested object converted through its target's descriptor table */
export interface InstanceDescriptor {
	readonly kind: "instance";
	/** Resolved on use, so targets may refer to themselves or to later declarations */
	readonly target: () => XmlMapped;
}

export type VectorEncoding = "text" | "binary";

/** Typed array of one scalar type held in a single element */
export interface NumericVectorDescriptor {
	readonly kind: "numeric-vector";
	readonly dtype: ScalarType;
	readonly encoding: VectorEncoding;
	readonly endian: Endianness;
}

export type RecordEncoding = "elements" | "binary";

/** Packed records, written one child element per record or as one blob */
export interface RecordVectorDescriptor {
	readonly kind: "record-vector";
	readonly layout: RecordLayout;
	readonly itemTag?: string;
	readonly encoding: RecordEncoding;
	readonly endian: Endianness;
}

export type TypeDescriptor =
	| AtomicDescriptor
	| ListDescriptor
	| InstanceDescriptor
	| NumericVectorDescriptor
	| RecordVectorDescriptor;

export type TypeDescriptorKind = TypeDescriptor["kind"];

/**
 * Anything that can be converted as a nested instance: a class with static
 * members or a plain object, exposing a descriptor table and a factory
 * building a value from decoded fields.
 *
 * @example
 * class Point {
 *   static xmlDescriptor = serdesDescriptor([["@x", "float"], ["@y", "float"]]);
 *   static fromXmlFields(fields: XmlFields): Point {
 *     return new Point(fields.number("x"), fields.number("y"));
 *   }
 *   constructor(readonly x: number, readonly y: number) {}
 * }
 */
export interface XmlMapped<T = unknown> {
	readonly name?: string;
	readonly xmlDescriptor: DescriptorTable;
	/** Tag used when none is given, and for items of `[Target]` lists */
	readonly xmlDefaultTag?: string;
	fromXmlFields(fields: XmlFields): T;
}

export function isDescriptorTable(value: unknown): value is DescriptorTable {
	return (
		typeof value === "object" &&
		value !== null &&
		"kind" in value &&
		value.kind === "descriptor-table"
	);
}

/** Objects and functions: both can carry static mapping members */
export function isObjectLike(value: unknown): value is object {
	return typeof value === "function" || (typeof value === "object" && value !== null);
}

export function isXmlMapped(value: unknown): value is XmlMapped {
	return (
		isObjectLike(value) &&
		"xmlDescriptor" in value &&
		isDescriptorTable(value.xmlDescriptor) &&
		"fromXmlFields" in value &&
		typeof value.fromXmlFields === "function"
	);
}

export function targetName(target: XmlMapped): string {
	return target.name || "anonymous target";
}

// --- Constructors ---

export function atomic(codec: AtomicCodec): AtomicDescriptor {
	return Object.freeze({ kind: "atomic", codec });
}

export function list(item: TypeDescriptor, itemTag?: string): ListDescriptor {
	return Object.freeze(
		itemTag === undefined ? { kind: "list", item } : { kind: "list", item, itemTag },
	);
}

export function instance(target: () => XmlMapped): InstanceDescriptor {
	return Object.freeze({ kind: "instance", target });
}

export function numericVector(
	dtype: ScalarType,
	encoding: VectorEncoding = "text",
	endian: Endianness = "le",
): NumericVectorDescriptor {
	return Object.freeze({ kind: "numeric-vector", dtype, encoding, endian });
}

export function recordVector(
	layout: RecordLayout,
	options: { itemTag?: string; encoding?: RecordEncoding; endian?: Endianness } = {},
): RecordVectorDescriptor {
	const { itemTag, encoding = "elements", endian = "le" } = options;
	return Object.freeze(
		itemTag === undefined
			? { kind: "record-vector", layout, encoding, endian }
			: { kind: "record-vector", layout, itemTag, encoding, endian },
	);
}

// --- Tags ---

const XML_NAME = /^[A-Za-z_][A-Za-z0-9._-]*$/;

/** Namespaces are not supported, so names carry no colon. */
export function isXmlName(name: string): boolean {
	return XML_NAME.test(name);
}

/**
 * Item tag derived from a grouping tag
 *
 * @example
 * deriveItemTag("dimensions"); // "dimension"
 * deriveItemTag("categories"); // "category"
 * deriveItemTag("data"); // "data-item"
 */
export function deriveItemTag(groupTag: string): string {
	if (groupTag.length > 3 && groupTag.endsWith("ies")) {
		return `${groupTag.slice(0, -3)}y`;
	}
	if (groupTag.length > 1 && groupTag.endsWith("s") && !groupTag.endsWith("ss")) {
		return groupTag.slice(0, -1);
	}
	return `${groupTag}-item`;
}

/**
 * Tag of each list item: the explicit item tag, else the default tag of an
 * instance item's target, else one derived from the grouping tag
 */
export function listItemTag(descriptor: ListDescriptor, groupTag: string): string {
	if (descriptor.itemTag !== undefined) return descriptor.itemTag;
	if (descriptor.item.kind === "instance") {
		const defaultTag = descriptor.item.target().xmlDefaultTag;
		if (defaultTag !== undefined) return defaultTag;
	}
	return deriveItemTag(groupTag);
}

/** Short human-readable form, e.g. `list<float>` or `vector<u16>` */
export function describeType(descriptor: TypeDescriptor): string {
	switch (descriptor.kind) {
		case "atomic":
			return descriptor.codec.name;
		case "list":
			return `list<${describeType(descriptor.item)}>`;
		case "instance":
			return targetName(descriptor.target());
		case "numeric-vector":
			return `vector<${descriptor.dtype}>`;
		case "record-vector":
			return `records${descriptor.layout.describe()}`;
		default: {
			const _exhaustive: never = descriptor;
			throw new Error(`Unknown type descriptor: ${JSON.stringify(_exhaustive)}`);
		}
	}
}
