/**
 * Line-oriented persistence: `<id>.aop` protocol plus `<id>.aol` JSON snapshot.
 *
 * The protocol opens with a `key: value` preamble describing the session as it
 * was started, a blank line, then one line per entry:
 *
 *   (<entry id>) <serial time, 10 decimals> -> <CODE> <text>
 */

import { join } from "node:path";
import { AlreadyExistsError, SnapshotNotFoundError } from "../errors.js";
import type { MetadataValue } from "../metadata.js";
import { readFileOrThrow, type SessionFs, writeFileAtomic } from "../storage/fs.js";
import { formatSerial } from "../time.js";
import { foldLineBreaks, renderEntry } from "./render.js";
import { flatSnapshotSchema, flattenSnapshot } from "./snapshot.js";
import type { EntryCode, EventLogBackend, LogRecord, SessionEntry, SessionSnapshot } from "./types.js";

const ENTRY_CODES: ReadonlySet<string> = new Set<EntryCode>([
	"SEEV",
	"OBSC",
	"ISSU",
	"POIN",
	"FRAM",
	"CDES",
	"CMES",
	"VSOB",
]);

const LINE_PATTERN = /^\(([^)\s]+)\) (-?\d+\.\d+) -> ([A-Z]{4})(?: (.*))?$/;

function isEntryCode(code: string): code is EntryCode {
	return ENTRY_CODES.has(code);
}

export function lineLogFiles(sessionDir: string, sessionId: string): { protocol: string; snapshot: string } {
	return {
		protocol: join(sessionDir, `${sessionId}.aop`),
		snapshot: join(sessionDir, `${sessionId}.aol`),
	};
}

export function formatEntryLine(entry: SessionEntry): string {
	const { code, text } = renderEntry(entry);
	return `(${entry.id}) ${formatSerial(entry.time)} -> ${code} ${foldLineBreaks(text)}\n`;
}

function formatPreambleValue(value: MetadataValue): string {
	return typeof value === "string" ? foldLineBreaks(value) : JSON.stringify(value);
}

/** Session id and metadata, without the lifecycle flags. */
export function formatPreamble(snapshot: SessionSnapshot): string {
	const lines = [`sessionId: ${snapshot.sessionId}`];
	for (const [key, value] of Object.entries(snapshot.metadata)) {
		lines.push(`${key}: ${formatPreambleValue(value)}`);
	}
	return `${lines.join("\n")}\n\n`;
}

/** Parse the entry lines of a protocol document. Malformed lines are skipped. */
export function parseProtocol(content: string): LogRecord[] {
	const records: LogRecord[] = [];
	const separator = content.indexOf("\n\n");
	const body = separator === -1 ? content : content.slice(separator + 2);

	for (const line of body.split("\n")) {
		const match = LINE_PATTERN.exec(line);
		if (!match) continue;
		const [, id, time, code, text = ""] = match;
		if (!isEntryCode(code)) continue;
		records.push({ id, time: Number(time), code, text });
	}
	return records;
}

export class LineEventLog implements EventLogBackend {
	readonly format = "line";
	readonly protocolPath: string;
	readonly snapshotPath: string;

	constructor(
		private fs: SessionFs,
		sessionDir: string,
		private sessionId: string,
	) {
		const files = lineLogFiles(sessionDir, sessionId);
		this.protocolPath = files.protocol;
		this.snapshotPath = files.snapshot;
	}

	files(): string[] {
		return [this.protocolPath, this.snapshotPath];
	}

	create(snapshot: SessionSnapshot, first: SessionEntry): void {
		for (const file of this.files()) {
			if (this.fs.exists(file)) {
				throw new AlreadyExistsError(file);
			}
		}
		writeFileAtomic(this.fs, this.protocolPath, formatPreamble(snapshot) + formatEntryLine(first));
		this.persist(snapshot);
	}

	append(entry: SessionEntry, snapshot: SessionSnapshot): void {
		const current = readFileOrThrow(this.fs, this.protocolPath);
		writeFileAtomic(this.fs, this.protocolPath, current + formatEntryLine(entry));
		this.persist(snapshot);
	}

	persist(snapshot: SessionSnapshot): void {
		writeFileAtomic(this.fs, this.snapshotPath, `${JSON.stringify(flattenSnapshot(snapshot), null, 4)}\n`);
	}

	readSnapshot(): SessionSnapshot {
		if (!this.fs.exists(this.snapshotPath)) {
			throw new SnapshotNotFoundError(this.sessionId, `${this.snapshotPath} does not exist`);
		}
		let raw: unknown;
		try {
			raw = JSON.parse(this.fs.readFile(this.snapshotPath));
		} catch (error) {
			throw new SnapshotNotFoundError(this.sessionId, `${this.snapshotPath} is unreadable (${String(error)})`);
		}
		const parsed = flatSnapshotSchema.safeParse(raw);
		if (!parsed.success) {
			throw new SnapshotNotFoundError(this.sessionId, `${this.snapshotPath} is malformed`);
		}
		return parsed.data;
	}

	readRecords(): LogRecord[] {
		return parseProtocol(readFileOrThrow(this.fs, this.protocolPath));
	}
}
