/**
 * Descriptor tables: the resolved mapping of one class
 */

import type { XmlElement } from "@xmlmap/core";
import { attributeNames, createElement, createLogger, findChildren, getAttribute } from "@xmlmap/core";
import { decodeValue, emptyValue, encodeValue, formatAtomic, parseAtomic } from "./convert";
import type { ElementDescriptor, SchemaEntry } from "./element-descriptor";
import { ATTRIBUTE_MARKER, parseElementDescriptor } from "./element-descriptor";
import {
	ConfigurationError,
	MissingAttributeError,
	MissingElementError,
	MissingFieldError,
	TagListComparison,
	UnexpectedElementError,
} from "./errors";
import { XmlFields } from "./fields";
import type { AtomicDescriptor } from "./type-descriptor";

const log = createLogger("descriptor");

export interface DeserializeOptions {
	/**
	 * Reject attributes the schema does not declare and any child element
	 * list other than the declared elements in declared order
	 * @default false
	 */
	strict?: boolean;
}

function ownerName(value: object): string {
	const constructor: unknown = Reflect.get(value, "constructor");
	return typeof constructor === "function" && constructor.name ? constructor.name : "object";
}

/**
 * Immutable, ordered set of element descriptors for one class
 *
 * Attribute descriptors come first, then element descriptors, each group in
 * declaration order. Build one per class with {@link serdesDescriptor} and
 * keep it as a static member.
 */
export class DescriptorTable {
	readonly kind = "descriptor-table";
	readonly attributes: readonly ElementDescriptor[];
	readonly elements: readonly ElementDescriptor[];

	constructor(descriptors: readonly ElementDescriptor[]) {
		const tags = new Set<string>();
		const fields = new Set<string>();
		for (const descriptor of descriptors) {
			if (tags.has(descriptor.tag)) {
				throw new ConfigurationError(`duplicate tag "${descriptor.tag}"`);
			}
			if (fields.has(descriptor.field)) {
				throw new ConfigurationError(`duplicate field "${descriptor.field}"`);
			}
			tags.add(descriptor.tag);
			fields.add(descriptor.field);
		}
		this.attributes = Object.freeze(descriptors.filter((d) => d.isAttribute));
		this.elements = Object.freeze(descriptors.filter((d) => !d.isAttribute));
		Object.freeze(this);
	}

	/** All descriptors, attributes first */
	get descriptors(): readonly ElementDescriptor[] {
		return [...this.attributes, ...this.elements];
	}

	get fieldNames(): string[] {
		return this.descriptors.map((d) => d.field);
	}

	/**
	 * Serialize an object into a new element
	 *
	 * @throws MissingFieldError if the object lacks a declared field
	 * @throws EncodeError if a field value does not match its type
	 */
	serialize(value: object, tag: string, path: readonly string[] = [tag]): XmlElement {
		const attributes: Record<string, string> = {};
		for (const descriptor of this.attributes) {
			const fieldValue = readField(descriptor, value);
			if (fieldValue === undefined && descriptor.defaults) continue;
			attributes[descriptor.tag] = formatAtomic(attributeType(descriptor), fieldValue, [
				...path,
				`${ATTRIBUTE_MARKER}${descriptor.tag}`,
			]);
		}

		const children: XmlElement[] = [];
		for (const descriptor of this.elements) {
			const fieldValue = readField(descriptor, value);
			if (fieldValue === undefined && descriptor.defaults) continue;
			children.push(
				encodeValue(descriptor.type, fieldValue, descriptor.tag, [...path, descriptor.tag]),
			);
		}

		return createElement(tag, { attributes, children });
	}

	/**
	 * Decode the declared fields of an element
	 *
	 * The element's own tag is not checked here.
	 *
	 * @throws MissingAttributeError, MissingElementError for absent required data
	 * @throws UnexpectedElementError for repeated singular elements, and in
	 * strict mode for undeclared attributes or an unexpected child list
	 */
	deserialize(
		element: XmlElement,
		options: DeserializeOptions = {},
		path: readonly string[] = [element.tag],
	): XmlFields {
		if (options.strict) this.checkLayout(element, path);

		const entries: [string, unknown][] = [];
		for (const descriptor of this.attributes) {
			const text = getAttribute(element, descriptor.tag);
			if (text === undefined) {
				if (!descriptor.defaults) throw new MissingAttributeError(descriptor.tag, path);
				entries.push([descriptor.field, descriptor.defaults.value]);
				continue;
			}
			entries.push([
				descriptor.field,
				parseAtomic(attributeType(descriptor), text, [...path, `${ATTRIBUTE_MARKER}${descriptor.tag}`]),
			]);
		}

		for (const descriptor of this.elements) {
			const matches = findChildren(element, descriptor.tag);
			const child = matches[0];
			if (matches.length > 1) {
				throw new UnexpectedElementError(
					`element <${descriptor.tag}> appears ${matches.length} times`,
					path,
				);
			}
			if (!child) {
				const empty = descriptor.defaults ?? emptyValue(descriptor.type);
				if (!empty) throw new MissingElementError(descriptor.tag, path);
				entries.push([descriptor.field, empty.value]);
				continue;
			}
			entries.push([
				descriptor.field,
				decodeValue(descriptor.type, child, [...path, descriptor.tag], options),
			]);
		}

		return new XmlFields(entries);
	}

	private checkLayout(element: XmlElement, path: readonly string[]): void {
		const declared = new Set(this.attributes.map((d) => d.tag));
		const undeclared = attributeNames(element).find((name) => !declared.has(name));
		if (undeclared !== undefined) {
			throw new UnexpectedElementError(`unexpected attribute "${undeclared}"`, path);
		}

		const present = new Set(element.children.map((child) => child.tag));
		const expected = this.elements
			.filter((d) => !d.defaults || present.has(d.tag))
			.map((d) => d.tag);
		const actual = element.children.map((child) => child.tag);
		const comparison = new TagListComparison(expected, actual);
		if (comparison.length > 0) {
			throw new UnexpectedElementError(`unexpected child elements ${comparison}`, path);
		}
	}
}

function attributeType(descriptor: ElementDescriptor): AtomicDescriptor {
	if (descriptor.type.kind !== "atomic") {
		throw new ConfigurationError(`attribute "${descriptor.tag}" must have an atomic type`);
	}
	return descriptor.type;
}

function readField(descriptor: ElementDescriptor, value: object): unknown {
	if (descriptor.getter) return descriptor.getter(value);
	if (!(descriptor.field in value)) {
		throw new MissingFieldError(descriptor.field, ownerName(value));
	}
	return Reflect.get(value, descriptor.field);
}

/**
 * Resolve a schema into a descriptor table
 *
 * @throws ConfigurationError for malformed entries or duplicate tags
 *
 * @example
 * class Furniture {
 *   static xmlDefaultTag = "furniture";
 *   static xmlDescriptor = serdesDescriptor([
 *     ["@type", "str"],
 *     ["name", "str"],
 *     ["dimensions", ["float"]],
 *   ]);
 * }
 */
export function serdesDescriptor(schema: readonly SchemaEntry[]): DescriptorTable {
	const table = new DescriptorTable(schema.map(parseElementDescriptor));
	log.debug(
		{ attributes: table.attributes.length, elements: table.elements.length },
		"resolved descriptor table",
	);
	return table;
}
