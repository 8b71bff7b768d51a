/**
 * Minimal element model over fast-xml-parser's order-preserving representation.
 * Entries of different kinds are siblings, so document order must survive a round trip.
 */

import { XMLBuilder, XMLParser } from "fast-xml-parser";

export interface XmlElement {
	tag: string;
	attributes: Record<string, string>;
	children: XmlElement[];
	text: string;
}

const ATTRIBUTE_PREFIX = "@_";
const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

const builder = new XMLBuilder({
	preserveOrder: true,
	ignoreAttributes: false,
	attributeNamePrefix: ATTRIBUTE_PREFIX,
	format: true,
	indentBy: "  ",
	suppressEmptyNode: true,
});

const parser = new XMLParser({
	preserveOrder: true,
	ignoreAttributes: false,
	attributeNamePrefix: ATTRIBUTE_PREFIX,
	parseTagValue: false,
	parseAttributeValue: false,
	ignoreDeclaration: true,
	trimValues: false,
});

export function element(
	tag: string,
	options: { attributes?: Record<string, string>; children?: XmlElement[]; text?: string } = {},
): XmlElement {
	return {
		tag,
		attributes: options.attributes ?? {},
		children: options.children ?? [],
		text: options.text ?? "",
	};
}

type OrderedNode = Record<string, unknown>;

function toOrdered(el: XmlElement): OrderedNode {
	const body: OrderedNode[] =
		el.children.length > 0 ? el.children.map(toOrdered) : el.text !== "" ? [{ [TEXT_KEY]: el.text }] : [];
	const node: OrderedNode = { [el.tag]: body };
	const attributes = Object.entries(el.attributes);
	if (attributes.length > 0) {
		node[ATTRIBUTES_KEY] = Object.fromEntries(attributes.map(([key, value]) => [ATTRIBUTE_PREFIX + key, value]));
	}
	return node;
}

export function buildXml(root: XmlElement): string {
	const declaration = { "?xml": [{ [TEXT_KEY]: "" }], [ATTRIBUTES_KEY]: { "@_version": "1.0", "@_encoding": "UTF-8" } };
	return `${builder.build([declaration, toOrdered(root)])}\n`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readAttributes(raw: unknown): Record<string, string> {
	const attributes: Record<string, string> = {};
	if (!isRecord(raw)) return attributes;
	for (const [key, value] of Object.entries(raw)) {
		if (key.startsWith(ATTRIBUTE_PREFIX)) {
			attributes[key.slice(ATTRIBUTE_PREFIX.length)] = String(value);
		}
	}
	return attributes;
}

function fromOrdered(node: Record<string, unknown>): XmlElement | undefined {
	const tag = Object.keys(node).find((key) => key !== ATTRIBUTES_KEY);
	if (tag === undefined || tag === TEXT_KEY || tag.startsWith("?")) return undefined;

	const el = element(tag, { attributes: readAttributes(node[ATTRIBUTES_KEY]) });
	const body = node[tag];
	if (!Array.isArray(body)) return el;
	for (const child of body) {
		if (!isRecord(child)) continue;
		if (TEXT_KEY in child) {
			el.text += String(child[TEXT_KEY]);
			continue;
		}
		const childElement = fromOrdered(child);
		if (childElement) el.children.push(childElement);
	}
	// Text beside child elements is the builder's indentation.
	if (el.children.length > 0 && el.text.trim() === "") {
		el.text = "";
	}
	return el;
}

/**
 * Parse a document and return its root element.
 * @throws Error if the document is not well-formed or has no root element
 */
export function parseXml(xml: string): XmlElement {
	const raw: unknown = parser.parse(xml, true);
	if (Array.isArray(raw)) {
		for (const node of raw) {
			const root = isRecord(node) ? fromOrdered(node) : undefined;
			if (root) return root;
		}
	}
	throw new Error("XML document has no root element");
}
