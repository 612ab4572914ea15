/**
 * In-memory XML element tree
 *
 * Elements are immutable values. Only element children and text content are
 * modelled: comments, processing instructions and namespaces are not.
 */

export interface XmlElement {
	readonly tag: string;
	/** Attribute values in document (or construction) order */
	readonly attributes: Readonly<Record<string, string>>;
	readonly children: readonly XmlElement[];
	/** Concatenated direct text content, if any */
	readonly text?: string;
}

export interface ElementInit {
	attributes?: Readonly<Record<string, string>>;
	children?: readonly XmlElement[];
	text?: string;
}

/**
 * Construct a new element
 *
 * @example
 * const el = createElement("rect", {
 *   attributes: { units: "mm" },
 *   children: [createElement("width", { text: "210" })],
 * });
 */
export function createElement(tag: string, init: ElementInit = {}): XmlElement {
	const element: XmlElement = {
		tag,
		attributes: Object.freeze({ ...init.attributes }),
		children: Object.freeze([...(init.children ?? [])]),
		...(init.text !== undefined ? { text: init.text } : {}),
	};
	return Object.freeze(element);
}

export function getAttribute(
	element: XmlElement,
	name: string,
): string | undefined {
	return Object.hasOwn(element.attributes, name)
		? element.attributes[name]
		: undefined;
}

export function attributeNames(element: XmlElement): string[] {
	return Object.keys(element.attributes);
}

/** All direct children with the given tag, in document order */
export function findChildren(element: XmlElement, tag: string): XmlElement[] {
	return element.children.filter((child) => child.tag === tag);
}

/** First direct child with the given tag */
export function findChild(
	element: XmlElement,
	tag: string,
): XmlElement | undefined {
	return element.children.find((child) => child.tag === tag);
}

export function getText(element: XmlElement): string | undefined {
	return element.text;
}
