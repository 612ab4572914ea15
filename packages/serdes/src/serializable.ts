/**
 * Class integration
 *
 * Two ways for a type to carry its own conversion: extend
 * {@link XmlSerializable}, or describe a plain record type with
 * {@link defineRecord}.
 */

import type { XmlElement } from "@xmlmap/core";
import { parseXml, serializeXml } from "@xmlmap/core";
import { deserialize, serialize } from "./convert";
import type { DescriptorTable, DeserializeOptions } from "./descriptor";
import { serdesDescriptor } from "./descriptor";
import type { SchemaEntry } from "./element-descriptor";
import { ConfigurationError, MissingFieldError } from "./errors";
import type { XmlFields } from "./fields";
import type { XmlMapped } from "./type-descriptor";
import { isDescriptorTable } from "./type-descriptor";

function defaultTagOf(owner: object, ownerName: string): string {
	const tag: unknown = Reflect.get(owner, "xmlDefaultTag");
	if (typeof tag !== "string") {
		throw new ConfigurationError(`no tag given and ${ownerName} has no xmlDefaultTag`);
	}
	return tag;
}

/**
 * Base class for types that convert themselves
 *
 * Subclasses declare static `xmlDescriptor` and `fromXmlFields` members and
 * optionally a static `xmlDefaultTag`.
 *
 * @example
 * class Furniture extends XmlSerializable {
 *   static xmlDefaultTag = "furniture";
 *   static xmlDescriptor = serdesDescriptor([["@type", "str"], ["name", "str"]]);
 *   static fromXmlFields(fields: XmlFields): Furniture {
 *     return new Furniture(fields.string("type"), fields.string("name"));
 *   }
 *   constructor(readonly type: string, readonly name: string) {
 *     super();
 *   }
 * }
 *
 * new Furniture("chair", "Armchair").toXmlString();
 * // <furniture type="chair"><name>Armchair</name></furniture>
 */
export abstract class XmlSerializable {
	/** Serialize, using the class's default tag when none is given */
	toXml(tag?: string): XmlElement {
		const owner = this.constructor;
		const table: unknown = Reflect.get(owner, "xmlDescriptor");
		if (!isDescriptorTable(table)) {
			throw new ConfigurationError(`${owner.name} has no static xmlDescriptor`);
		}
		const resolvedTag = tag ?? defaultTagOf(owner, owner.name);
		return table.serialize(this, resolvedTag);
	}

	toXmlString(tag?: string): string {
		return serializeXml(this.toXml(tag));
	}

	static fromXml<T>(
		this: XmlMapped<T>,
		element: XmlElement,
		expectedTag?: string,
		options?: DeserializeOptions,
	): T {
		return deserialize(this, element, expectedTag, options);
	}

	static fromXmlString<T>(
		this: XmlMapped<T>,
		text: string,
		expectedTag?: string,
		options?: DeserializeOptions,
	): T {
		return deserialize(this, parseXml(text), expectedTag, options);
	}
}

/** Value of a record type: a frozen object holding exactly the declared fields */
export type RecordObject = Readonly<Record<string, unknown>>;

export interface RecordType extends XmlMapped<RecordObject> {
	readonly name: string;
	readonly fieldNames: readonly string[];
	/** Tag used by toXml when none is given */
	readonly xmlDefaultTag?: string;
	/**
	 * Absent fields take their `defaultsTo` value
	 *
	 * @throws MissingFieldError if a field without a default is absent
	 * @throws TypeError for fields the record does not declare
	 */
	create(values: Readonly<Record<string, unknown>>): RecordObject;
	toXml(value: RecordObject, tag?: string): XmlElement;
	fromXml(element: XmlElement, expectedTag?: string, options?: DeserializeOptions): RecordObject;
}

export interface DefineRecordOptions {
	defaultTag?: string;
}

/**
 * Define a record type from a schema
 *
 * Fields are the schema's field names, in schema order.
 *
 * @example
 * const Rectangle = defineRecord("Rectangle", [["width", "int"], ["height", "int"]], {
 *   defaultTag: "rect",
 * });
 * const rect = Rectangle.create({ width: 3, height: 4 });
 * serializeXml(Rectangle.toXml(rect));
 * // <rect><width>3</width><height>4</height></rect>
 */
export function defineRecord(
	name: string,
	schema: readonly SchemaEntry[],
	options: DefineRecordOptions = {},
): RecordType {
	const xmlDescriptor: DescriptorTable = serdesDescriptor(schema);
	const fieldNames = Object.freeze(xmlDescriptor.fieldNames);
	const declared = new Set(fieldNames);
	const defaults = new Map<string, unknown>(
		xmlDescriptor.descriptors.flatMap((d) =>
			d.defaults ? [[d.field, d.defaults.value] as const] : [],
		),
	);

	const create = (values: Readonly<Record<string, unknown>>): RecordObject => {
		const unknownField = Object.keys(values).find((key) => !declared.has(key));
		if (unknownField !== undefined) {
			throw new TypeError(`${name} has no field "${unknownField}"`);
		}
		const record: Record<string, unknown> = {};
		for (const field of fieldNames) {
			if (Object.hasOwn(values, field)) {
				record[field] = values[field];
			} else if (defaults.has(field)) {
				record[field] = defaults.get(field);
			} else {
				throw new MissingFieldError(field, name);
			}
		}
		return Object.freeze(record);
	};

	const recordType: RecordType = {
		name,
		fieldNames,
		xmlDescriptor,
		...(options.defaultTag !== undefined ? { xmlDefaultTag: options.defaultTag } : {}),
		create,
		fromXmlFields: (fields: XmlFields) => create(fields.toObject()),
		toXml: (value, tag) =>
			serialize(recordType, value, tag ?? defaultTagOf(recordType, name)),
		fromXml: (element, expectedTag, deserializeOptions) =>
			deserialize(recordType, element, expectedTag, deserializeOptions),
	};
	return Object.freeze(recordType);
}
