/**
 * XML text <-> element tree
 *
 * Parsing and building both go through fast-xml-parser in order-preserving
 * mode, where every node is a single-key object `{ [tag]: children }` with
 * attributes under ":@" and text nodes as `{ "#text": value }`.
 */

import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import type { XmlElement } from "./element";
import { createElement } from "./element";

const ATTRIBUTES_KEY = ":@";
const ATTRIBUTE_PREFIX = "@_";
const TEXT_KEY = "#text";

const parser = new XMLParser({
	preserveOrder: true,
	ignoreAttributes: false,
	attributeNamePrefix: ATTRIBUTE_PREFIX,
	textNodeName: TEXT_KEY,
	// Keep every value as text: the mapping layer owns scalar parsing.
	parseTagValue: false,
	parseAttributeValue: false,
	trimValues: false,
	// Decodes character references (&#65; &#x42;) as well as named entities.
	htmlEntities: true,
	ignoreDeclaration: true,
	ignorePiTags: true,
});

const builder = new XMLBuilder({
	preserveOrder: true,
	ignoreAttributes: false,
	attributeNamePrefix: ATTRIBUTE_PREFIX,
	textNodeName: TEXT_KEY,
	suppressEmptyNode: true,
	format: false,
});

type OrderedNode = Record<string, unknown>;

/**
 * Raised for input that is not well-formed XML
 */
export class XmlSyntaxError extends Error {
	readonly line: number;
	readonly column: number;

	constructor(message: string, line: number, column: number) {
		super(`Invalid XML at line ${line}, column ${column}: ${message}`);
		this.name = "XmlSyntaxError";
		this.line = line;
		this.column = column;
	}
}

function isOrderedNode(value: unknown): value is OrderedNode {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nodeTag(node: OrderedNode): string | undefined {
	return Object.keys(node).find((key) => key !== ATTRIBUTES_KEY);
}

function toElement(node: OrderedNode): XmlElement | undefined {
	const tag = nodeTag(node);
	if (tag === undefined || tag === TEXT_KEY || tag.startsWith("?")) {
		return undefined;
	}

	const attributes: Record<string, string> = {};
	const rawAttributes = node[ATTRIBUTES_KEY];
	if (isOrderedNode(rawAttributes)) {
		for (const [name, value] of Object.entries(rawAttributes)) {
			attributes[name.slice(ATTRIBUTE_PREFIX.length)] = String(value);
		}
	}

	const children: XmlElement[] = [];
	const textParts: string[] = [];
	const rawChildren = node[tag];
	if (Array.isArray(rawChildren)) {
		for (const child of rawChildren) {
			if (!isOrderedNode(child)) continue;
			if (TEXT_KEY in child) {
				textParts.push(String(child[TEXT_KEY]));
				continue;
			}
			const element = toElement(child);
			if (element) children.push(element);
		}
	}

	let text: string | undefined = textParts.join("");
	// Indentation between child elements is not content.
	if (textParts.length === 0 || (children.length > 0 && !text.trim())) {
		text = undefined;
	}

	return createElement(tag, { attributes, children, text });
}

function toOrderedNode(element: XmlElement): OrderedNode {
	const content: OrderedNode[] = [];
	if (element.text) {
		content.push({ [TEXT_KEY]: element.text });
	}
	for (const child of element.children) {
		content.push(toOrderedNode(child));
	}

	const node: OrderedNode = { [element.tag]: content };
	const names = Object.keys(element.attributes);
	if (names.length > 0) {
		const attributes: Record<string, string> = {};
		for (const name of names) {
			const value = element.attributes[name];
			if (value !== undefined) attributes[`${ATTRIBUTE_PREFIX}${name}`] = value;
		}
		node[ATTRIBUTES_KEY] = attributes;
	}
	return node;
}

/**
 * Parse an XML document and return its root element
 *
 * Text is kept verbatim, except that whitespace-only text of an element that
 * has child elements is dropped as indentation.
 *
 * @throws XmlSyntaxError if the text is not well-formed or has no element
 *
 * @example
 * const root = parseXml('<rect units="mm"><width>210</width></rect>');
 * root.attributes.units; // "mm"
 */
export function parseXml(text: string): XmlElement {
	const validation = XMLValidator.validate(text);
	if (validation !== true) {
		const { msg, line, col } = validation.err;
		throw new XmlSyntaxError(msg, line, col);
	}

	const parsed: unknown = parser.parse(text);
	if (Array.isArray(parsed)) {
		for (const node of parsed) {
			if (!isOrderedNode(node)) continue;
			const element = toElement(node);
			if (element) return element;
		}
	}
	throw new XmlSyntaxError("document has no root element", 1, 1);
}

export interface SerializeOptions {
	/** Prefix the output with an XML declaration @default false */
	declaration?: boolean;
}

/**
 * Serialize an element tree to compact XML text
 *
 * @example
 * serializeXml(createElement("width", { text: "210" })); // "<width>210</width>"
 */
export function serializeXml(
	element: XmlElement,
	options: SerializeOptions = {},
): string {
	const body: string = builder.build([toOrderedNode(element)]);
	return options.declaration
		? `<?xml version="1.0" encoding="UTF-8"?>${body}`
		: body;
}
