/**
 * Element descriptors: one field mapped to one attribute or child element
 */

import { ConfigurationError } from "./errors";
import type { TerseType } from "./terse";
import { fromTerse } from "./terse";
import type { TypeDescriptor } from "./type-descriptor";
import { describeType, isXmlName } from "./type-descriptor";

/** Leading marker of attribute tags in schema entries */
export const ATTRIBUTE_MARKER = "@";

/**
 * Value read from a source object. Method syntax keeps the parameter
 * bivariant, so getters typed for a specific class are accepted.
 */
export type FieldGetter = { bivarianceHack(source: object): unknown }["bivarianceHack"];

/** Fallback used when an attribute or element is absent */
export class DefaultValue {
	constructor(readonly value: unknown) {}
}

/**
 * Mark a schema entry as optional
 *
 * @example
 * ["@units", "str", defaultsTo("mm")]
 */
export function defaultsTo(value: unknown): DefaultValue {
	return new DefaultValue(value);
}

type FieldRef = string | FieldGetter;

type PairEntry = readonly [tag: string, type: TerseType];
type DefaultedPairEntry = readonly [tag: string, type: TerseType, defaults: DefaultValue];
type FieldEntry = readonly [tag: string, field: FieldRef, type: TerseType];
type DefaultedFieldEntry = readonly [
	tag: string,
	field: FieldRef,
	type: TerseType,
	defaults: DefaultValue,
];

/**
 * One schema entry:
 * - `[tag, type]`
 * - `[tag, field, type]`, where field is a field name or a getter
 * - either of the above followed by `defaultsTo(value)`
 *
 * A tag starting with "@" maps an attribute.
 */
export type SchemaEntry = PairEntry | DefaultedPairEntry | FieldEntry | DefaultedFieldEntry;

export interface ElementDescriptor {
	/** Attribute or element name, without the "@" marker */
	readonly tag: string;
	readonly isAttribute: boolean;
	/** Key of the value in source objects and decoded fields */
	readonly field: string;
	/** Reads the value when serializing; the field is read by name otherwise */
	readonly getter?: FieldGetter;
	readonly type: TypeDescriptor;
	readonly defaults?: DefaultValue;
}

/** Field name derived from a tag: hyphens become underscores */
export function fieldNameFromTag(tag: string): string {
	return tag.replaceAll("-", "_");
}

function hasTrailingDefault(entry: DefaultedPairEntry | FieldEntry): entry is DefaultedPairEntry {
	return entry[2] instanceof DefaultValue;
}

interface EntryParts {
	rawTag: string;
	field?: FieldRef;
	type: TerseType;
	defaults?: DefaultValue;
}

function splitEntry(entry: SchemaEntry): EntryParts {
	const length: number = entry.length;
	if (length < 2 || length > 4) {
		throw new ConfigurationError(
			`schema entry must have 2 to 4 items, got ${length}`,
		);
	}

	switch (entry.length) {
		case 2:
			return { rawTag: entry[0], type: entry[1] };
		case 3:
			if (hasTrailingDefault(entry)) {
				return { rawTag: entry[0], type: entry[1], defaults: entry[2] };
			}
			return { rawTag: entry[0], field: entry[1], type: entry[2] };
		case 4:
			if (!(entry[3] instanceof DefaultValue)) {
				throw new ConfigurationError(
					`fourth item of schema entry "${entry[0]}" must be defaultsTo(value)`,
				);
			}
			return { rawTag: entry[0], field: entry[1], type: entry[2], defaults: entry[3] };
	}
}

/**
 * Resolve one schema entry
 *
 * @throws ConfigurationError for an invalid tag or field, an unresolvable
 * type, or an attribute whose type is not atomic
 *
 * @example
 * parseElementDescriptor(["@shape-kind", "str"]);
 * // { tag: "shape-kind", isAttribute: true, field: "shape_kind", type: atomic str }
 */
export function parseElementDescriptor(entry: SchemaEntry): ElementDescriptor {
	const { rawTag, field, type, defaults } = splitEntry(entry);
	if (typeof rawTag !== "string") {
		throw new ConfigurationError("schema entry tag must be a string");
	}

	const isAttribute = rawTag.startsWith(ATTRIBUTE_MARKER);
	const tag = isAttribute ? rawTag.slice(ATTRIBUTE_MARKER.length) : rawTag;
	if (!isXmlName(tag)) {
		throw new ConfigurationError(`"${rawTag}" is not a valid XML name`);
	}

	let resolved: TypeDescriptor;
	try {
		resolved = fromTerse(type);
	} catch (error) {
		if (error instanceof ConfigurationError) {
			throw new ConfigurationError(`${error.message} (for "${rawTag}")`, error.code);
		}
		throw error;
	}

	if (isAttribute && resolved.kind !== "atomic") {
		throw new ConfigurationError(
			`attribute "${rawTag}" must have an atomic type, not ${describeType(resolved)}`,
		);
	}

	let fieldName = fieldNameFromTag(tag);
	let getter: FieldGetter | undefined;
	if (typeof field === "string") {
		if (!field) throw new ConfigurationError(`empty field name for "${rawTag}"`);
		fieldName = field;
	} else if (typeof field === "function") {
		getter = field;
	}

	return Object.freeze({
		tag,
		isAttribute,
		field: fieldName,
		type: resolved,
		...(getter ? { getter } : {}),
		...(defaults ? { defaults } : {}),
	});
}
