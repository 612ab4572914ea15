/**
 * Terse type specifications
 *
 * Schemas name field types compactly: a type name, a mapped class, a one-
 * or two-item array for lists, or a small options object for vectors and
 * enumerations. {@link fromTerse} resolves these once, when the schema is
 * declared, so mistakes surface before any conversion runs.
 */

import type { Endianness, RecordFieldSpec, ScalarType } from "@xmlmap/core";
import { RecordLayout, scalarTypeFromCode } from "@xmlmap/core";
import type { AtomicCodec, EnumLike } from "./atomic";
import { boolCodec, enumCodec, floatCodec, intCodec, scalarCodec, strCodec } from "./atomic";
import { ConfigurationError } from "./errors";
import type {
	RecordEncoding,
	TypeDescriptor,
	TypeDescriptorKind,
	VectorEncoding,
	XmlMapped,
} from "./type-descriptor";
import {
	atomic,
	instance,
	isObjectLike,
	isXmlMapped,
	isXmlName,
	list,
	numericVector,
	recordVector,
} from "./type-descriptor";

/**
 * Deferred reference to a mapped target, for self references and targets
 * declared later in the module
 */
export class LazyTarget {
	constructor(readonly resolve: () => XmlMapped) {}
}

/**
 * @example
 * class TreeNode {
 *   static xmlDescriptor = serdesDescriptor([
 *     ["@label", "str"],
 *     ["children", [lazy(() => TreeNode), "node"]],
 *   ]);
 * }
 */
export function lazy(resolve: () => XmlMapped): LazyTarget {
	return new LazyTarget(resolve);
}

export interface VectorSpec {
	/** Scalar type name or code, e.g. "f64", "u2", "int16" */
	vector: string;
	encoding?: VectorEncoding;
	endian?: Endianness;
}

/** Record field given as a tuple; nested records as a layout or a tuple list */
export type TerseRecordField = readonly [
	name: string,
	type: string | RecordLayout | readonly TerseRecordField[],
];

export interface RecordsSpec {
	records: RecordLayout | readonly TerseRecordField[];
	/** Tag of each record element; derived from the grouping tag when absent */
	tag?: string;
	encoding?: RecordEncoding;
	endian?: Endianness;
}

export interface EnumSpec {
	enum: EnumLike;
	/** Name used in error messages */
	name?: string;
}

export type TerseList = readonly [item: TerseType] | readonly [item: TerseType, itemTag: string];

export type TerseType =
	| TypeDescriptor
	| AtomicCodec
	| string
	| XmlMapped
	| LazyTarget
	| TerseList
	| VectorSpec
	| RecordsSpec
	| EnumSpec;

const BUILTIN_CODECS: ReadonlyMap<string, AtomicCodec> = new Map<string, AtomicCodec>([
	["int", intCodec],
	["float", floatCodec],
	["str", strCodec],
	["bool", boolCodec],
]);

const DESCRIPTOR_KINDS: readonly TypeDescriptorKind[] = [
	"atomic",
	"list",
	"instance",
	"numeric-vector",
	"record-vector",
];

function describeSpec(spec: unknown): string {
	if (typeof spec === "function") return spec.name ? `class ${spec.name}` : "anonymous function";
	if (typeof spec === "string") return `"${spec}"`;
	if (spec === null || typeof spec !== "object") return String(spec);
	if (Array.isArray(spec)) return `array of length ${spec.length}`;
	return `object with keys {${Object.keys(spec).join(", ")}}`;
}

function isTerseList(spec: TerseType): spec is TerseList {
	return Array.isArray(spec);
}

function resolveScalar(code: string, context: string): ScalarType {
	const dtype = scalarTypeFromCode(code);
	if (dtype === undefined) {
		throw new ConfigurationError(`unknown scalar type "${code}" in ${context}`);
	}
	return dtype;
}

function fromTypeName(name: string): TypeDescriptor {
	const builtin = BUILTIN_CODECS.get(name);
	if (builtin) return atomic(builtin);
	return atomic(scalarCodec(resolveScalar(name, "type specification")));
}

function fromTerseList(spec: TerseList): TypeDescriptor {
	const length: number = spec.length;
	if (length !== 1 && length !== 2) {
		throw new ConfigurationError(
			`list specification must be [item] or [item, itemTag], got ${describeSpec(spec)}`,
		);
	}
	const [item, itemTag] = spec;
	if (itemTag !== undefined && (typeof itemTag !== "string" || !isXmlName(itemTag))) {
		throw new ConfigurationError(`invalid list item tag ${describeSpec(itemTag)}`);
	}
	return list(fromTerse(item), itemTag);
}

function toRecordFieldSpec(field: TerseRecordField): RecordFieldSpec {
	const [name, type] = field;
	if (typeof type === "string") return [name, resolveScalar(type, `record field "${name}"`)];
	if (type instanceof RecordLayout) return [name, type];
	return [name, toRecordLayout(type)];
}

function toRecordLayout(fields: readonly TerseRecordField[]): RecordLayout {
	const specs = fields.map(toRecordFieldSpec);
	try {
		return new RecordLayout(specs);
	} catch (error) {
		const detail = error instanceof Error ? error.message : String(error);
		throw new ConfigurationError(`invalid record layout: ${detail}`);
	}
}

function fromRecordsSpec(spec: RecordsSpec): TypeDescriptor {
	const layout = spec.records instanceof RecordLayout ? spec.records : toRecordLayout(spec.records);
	for (const field of layout.fields) {
		if (!isXmlName(field.name)) {
			throw new ConfigurationError(`record field "${field.name}" is not a valid XML name`);
		}
	}
	if (spec.tag !== undefined && !isXmlName(spec.tag)) {
		throw new ConfigurationError(`invalid record tag ${describeSpec(spec.tag)}`);
	}
	return recordVector(layout, {
		itemTag: spec.tag,
		encoding: spec.encoding,
		endian: spec.endian,
	});
}

/**
 * Resolve a terse type specification into a type descriptor
 *
 * @throws ConfigurationError if the specification cannot be resolved
 *
 * @example
 * fromTerse("float"); // atomic float
 * fromTerse(["float"]); // list of floats
 * fromTerse({ vector: "u16", encoding: "binary" }); // base64-packed Uint16Array
 */
export function fromTerse(spec: TerseType): TypeDescriptor {
	if (typeof spec === "string") return fromTypeName(spec);
	if (isTerseList(spec)) return fromTerseList(spec);
	if (spec instanceof LazyTarget) return instance(spec.resolve);
	if (isXmlMapped(spec)) {
		const target = spec;
		return instance(() => target);
	}
	if (!isObjectLike(spec) || typeof spec === "function") {
		throw new ConfigurationError(
			`${describeSpec(spec)} is not a mapped type: it needs a static xmlDescriptor table and fromXmlFields`,
		);
	}
	if ("kind" in spec) {
		if (!DESCRIPTOR_KINDS.includes(spec.kind)) {
			throw new ConfigurationError(`unknown type descriptor kind "${String(spec.kind)}"`);
		}
		return spec;
	}
	if ("vector" in spec) {
		return numericVector(
			resolveScalar(spec.vector, "vector specification"),
			spec.encoding,
			spec.endian,
		);
	}
	if ("records" in spec) return fromRecordsSpec(spec);
	if ("enum" in spec) {
		try {
			return atomic(enumCodec(spec.enum, spec.name));
		} catch (error) {
			const detail = error instanceof Error ? error.message : String(error);
			throw new ConfigurationError(detail);
		}
	}
	if ("parse" in spec && typeof spec.parse === "function" && typeof spec.format === "function") {
		return atomic(spec);
	}
	throw new ConfigurationError(`cannot resolve ${describeSpec(spec)} into a type descriptor`);
}
