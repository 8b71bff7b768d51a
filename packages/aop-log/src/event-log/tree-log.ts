/**
 * Tree-structured persistence: a single `<id>.xml` document.
 *
 *   <aop version="1">
 *     <metadata>
 *       <field name="observer" type="string">...</field>
 *       <field name="listOfGear" type="list"><item type="string">...</item></field>
 *     </metadata>
 *     <comment time="2460371.3333333333" id="...">Seeing improves</comment>
 *     <pointing time="..." id="..."><ra>5.5</ra><dec>-5.39</dec></pointing>
 *   </aop>
 *
 * The metadata subtree is rewritten on every call so the document describes
 * the session on its own.
 */

import { join } from "node:path";
import { z } from "zod";
import { AlreadyExistsError, IOError, SnapshotNotFoundError } from "../errors.js";
import { type MetadataScalar, type MetadataValue, metadataValueSchema } from "../metadata.js";
import { readFileOrThrow, type SessionFs, writeFileAtomic } from "../storage/fs.js";
import { formatSerial } from "../time.js";
import { toRecord } from "./render.js";
import { flatSnapshotSchema, flattenSnapshot } from "./snapshot.js";
import type { EventLogBackend, LogRecord, SessionEntry, SessionSnapshot } from "./types.js";
import { buildXml, element, parseXml, type XmlElement } from "./xml.js";

export const TREE_DOCUMENT_VERSION = "1";

/** Entry fields stored as repeated child elements, keyed by the element name. */
const LIST_FIELDS: Partial<Record<string, string>> = { target: "targets", code: "codes" };
const LIST_ITEM_TAGS: Partial<Record<string, string>> = { targets: "target", codes: "code" };

/** Entry fields stored as the element's text instead of a child element. */
const TEXT_FIELDS: Partial<Record<string, string>> = {
	comment: "text",
	condition_description: "description",
};

const id = z.string().min(1);
const time = z.coerce.number();
const num = z.coerce.number().finite();

const entrySchema = z.union([
	z.object({ type: z.literal("session_started"), id, time, sessionId: z.string() }),
	z.object({ type: z.literal("session_interrupted"), id, time }),
	z.object({ type: z.literal("session_resumed"), id, time }),
	z.object({ type: z.literal("session_aborted"), id, time, sessionId: z.string(), reason: z.string() }),
	z.object({ type: z.literal("session_ended"), id, time, sessionId: z.string() }),
	z.object({ type: z.literal("comment"), id, time, text: z.string() }),
	z.object({
		type: z.literal("issue"),
		id,
		time,
		severity: z.enum(["potential", "normal", "major"]),
		message: z.string(),
	}),
	z.object({ type: z.literal("pointing"), id, time, targets: z.array(z.string()).min(1) }),
	z.object({ type: z.literal("pointing"), id, time, ra: num, dec: num }),
	z.object({
		type: z.literal("frame"),
		id,
		time,
		count: num,
		frameType: z.enum(["science", "dark", "flat", "bias", "pointing"]),
		iso: num,
		exposureTime: num,
		aperture: num,
	}),
	z.object({ type: z.literal("condition_description"), id, time, description: z.string() }),
	z.object({
		type: z.literal("condition_measurement"),
		id,
		time,
		measurement: z.enum(["temp", "pressure", "humidity"]),
		value: num,
	}),
	z.object({
		type: z.literal("variable_star_observation"),
		id,
		time,
		starId: z.string(),
		chartId: z.string(),
		magnitude: num,
		comp1: z.string(),
		comp2: z.string().optional(),
		codes: z.array(z.string()).optional(),
	}),
]);

export function treeLogFile(sessionDir: string, sessionId: string): string {
	return join(sessionDir, `${sessionId}.xml`);
}

function scalarType(value: MetadataScalar): string {
	return value === null ? "null" : typeof value;
}

function encodeScalar(tag: string, value: MetadataScalar, attributes: Record<string, string> = {}): XmlElement {
	return element(tag, {
		attributes: { ...attributes, type: scalarType(value) },
		text: value === null ? "" : String(value),
	});
}

function encodeField(name: string, value: MetadataValue): XmlElement {
	if (Array.isArray(value)) {
		return element("field", {
			attributes: { name, type: "list" },
			children: value.map((item) => encodeScalar("item", item)),
		});
	}
	return encodeScalar("field", value, { name });
}

function decodeScalar(el: XmlElement): MetadataScalar {
	switch (el.attributes.type) {
		case "null":
			return null;
		case "number":
			return Number(el.text);
		case "boolean":
			return el.text === "true";
		default:
			return el.text;
	}
}

function decodeField(el: XmlElement): MetadataValue {
	if (el.attributes.type === "list") {
		return el.children.filter((child) => child.tag === "item").map(decodeScalar);
	}
	return decodeScalar(el);
}

export function encodeMetadata(snapshot: SessionSnapshot): XmlElement {
	const fields = Object.entries(flattenSnapshot(snapshot)).map(([name, value]) => encodeField(name, value));
	return element("metadata", { children: fields });
}

export function decodeMetadata(el: XmlElement): Record<string, MetadataValue> {
	const result: Record<string, MetadataValue> = {};
	for (const field of el.children) {
		const name = field.attributes.name;
		if (field.tag !== "field" || name === undefined) continue;
		const value = metadataValueSchema.safeParse(decodeField(field));
		if (value.success) {
			result[name] = value.data;
		}
	}
	return result;
}

export function encodeEntry(entry: SessionEntry): XmlElement {
	const { type, id: entryId, time: serial, ...fields } = entry;
	const el = element(type, { attributes: { time: formatSerial(serial), id: entryId } });
	const textField = TEXT_FIELDS[type];
	const values: [string, unknown][] = Object.entries(fields);
	for (const [key, value] of values) {
		if (value === undefined) continue;
		if (key === textField) {
			el.text = String(value);
		} else if (Array.isArray(value)) {
			const itemTag = LIST_ITEM_TAGS[key] ?? key;
			for (const item of value) {
				el.children.push(element(itemTag, { text: String(item) }));
			}
		} else {
			el.children.push(element(key, { text: String(value) }));
		}
	}
	return el;
}

/** @throws Error when the element is not a valid entry */
export function decodeEntry(el: XmlElement): SessionEntry {
	const fields: Record<string, unknown> = { type: el.tag, id: el.attributes.id, time: el.attributes.time };
	const textField = TEXT_FIELDS[el.tag];
	if (textField) {
		fields[textField] = el.text;
	}
	for (const child of el.children) {
		const listField = LIST_FIELDS[child.tag];
		if (listField) {
			const existing = fields[listField];
			fields[listField] = Array.isArray(existing) ? [...existing, child.text] : [child.text];
		} else {
			fields[child.tag] = child.text;
		}
	}
	const parsed = entrySchema.safeParse(fields);
	if (!parsed.success) {
		throw new Error(`Invalid <${el.tag}> entry ${el.attributes.id ?? "(no id)"}: ${parsed.error.issues[0]?.message}`);
	}
	return parsed.data;
}

export class TreeEventLog implements EventLogBackend {
	readonly format = "tree";
	readonly documentPath: string;

	constructor(
		private fs: SessionFs,
		sessionDir: string,
		private sessionId: string,
	) {
		this.documentPath = treeLogFile(sessionDir, sessionId);
	}

	files(): string[] {
		return [this.documentPath];
	}

	create(snapshot: SessionSnapshot, first: SessionEntry): void {
		if (this.fs.exists(this.documentPath)) {
			throw new AlreadyExistsError(this.documentPath);
		}
		const root = element("aop", {
			attributes: { version: TREE_DOCUMENT_VERSION },
			children: [encodeMetadata(snapshot), encodeEntry(first)],
		});
		writeFileAtomic(this.fs, this.documentPath, buildXml(root));
	}

	append(entry: SessionEntry, snapshot: SessionSnapshot): void {
		const root = this.readRoot();
		root.children = [encodeMetadata(snapshot), ...this.entryElements(root), encodeEntry(entry)];
		writeFileAtomic(this.fs, this.documentPath, buildXml(root));
	}

	persist(snapshot: SessionSnapshot): void {
		const root = this.readRoot();
		root.children = [encodeMetadata(snapshot), ...this.entryElements(root)];
		writeFileAtomic(this.fs, this.documentPath, buildXml(root));
	}

	readSnapshot(): SessionSnapshot {
		if (!this.fs.exists(this.documentPath)) {
			throw new SnapshotNotFoundError(this.sessionId, `${this.documentPath} does not exist`);
		}
		let root: XmlElement;
		try {
			root = parseXml(this.fs.readFile(this.documentPath));
		} catch (error) {
			throw new SnapshotNotFoundError(this.sessionId, `${this.documentPath} is unreadable (${String(error)})`);
		}
		const metadata = root.children.find((child) => child.tag === "metadata");
		const parsed = flatSnapshotSchema.safeParse(metadata ? decodeMetadata(metadata) : undefined);
		if (!parsed.success) {
			throw new SnapshotNotFoundError(this.sessionId, `${this.documentPath} has no valid metadata`);
		}
		return parsed.data;
	}

	/** All entries in document order, with times as stored (10 decimals). */
	readEntries(): SessionEntry[] {
		return this.entryElements(this.readRoot()).map(decodeEntry);
	}

	readRecords(): LogRecord[] {
		return this.readEntries().map(toRecord);
	}

	private entryElements(root: XmlElement): XmlElement[] {
		return root.children.filter((child) => child.tag !== "metadata");
	}

	private readRoot(): XmlElement {
		const content = readFileOrThrow(this.fs, this.documentPath);
		try {
			return parseXml(content);
		} catch (error) {
			throw new IOError("read", this.documentPath, error);
		}
	}
}
