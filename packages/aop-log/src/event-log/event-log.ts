import { join } from "node:path";
import { AlreadyExistsError } from "../errors.js";
import { nodeSessionFs, type SessionFs } from "../storage/fs.js";
import { LineEventLog, lineLogFiles } from "./line-log.js";
import { TreeEventLog, treeLogFile } from "./tree-log.js";
import type { EventLogBackend, LogFormat, LogRecord, SessionEntry, SessionSnapshot } from "./types.js";

export function sessionDirectory(storageRoot: string, sessionId: string): string {
	return join(storageRoot, sessionId);
}

/** Which formats have a snapshot on disk for this session, if any. */
export function detectFormat(fs: SessionFs, sessionDir: string, sessionId: string): LogFormat | undefined {
	const line = fs.exists(lineLogFiles(sessionDir, sessionId).snapshot);
	const tree = fs.exists(treeLogFile(sessionDir, sessionId));
	if (line && tree) return "both";
	if (line) return "line";
	if (tree) return "tree";
	return undefined;
}

/**
 * The event log of one session, written through one or both backends.
 * Every call goes to each backend in turn; the line backend, when present, comes first
 * and is the one read back.
 */
export class EventLog {
	readonly backends: readonly EventLogBackend[];
	private fs: SessionFs;

	constructor(backends: EventLogBackend[], fs: SessionFs = nodeSessionFs) {
		if (backends.length === 0) {
			throw new Error("EventLog needs at least one backend");
		}
		this.backends = backends;
		this.fs = fs;
	}

	static open(
		storageRoot: string,
		sessionId: string,
		format: LogFormat = "line",
		fs: SessionFs = nodeSessionFs,
	): EventLog {
		const dir = sessionDirectory(storageRoot, sessionId);
		const backends: EventLogBackend[] = [];
		if (format === "line" || format === "both") {
			backends.push(new LineEventLog(fs, dir, sessionId));
		}
		if (format === "tree" || format === "both") {
			backends.push(new TreeEventLog(fs, dir, sessionId));
		}
		return new EventLog(backends, fs);
	}

	get format(): LogFormat {
		return this.backends.length > 1 ? "both" : this.backends[0].format;
	}

	files(): string[] {
		return this.backends.flatMap((backend) => backend.files());
	}

	/** Checks every target file before writing any, so a clash leaves nothing behind. */
	create(snapshot: SessionSnapshot, first: SessionEntry): void {
		for (const file of this.files()) {
			if (this.fs.exists(file)) {
				throw new AlreadyExistsError(file);
			}
		}
		for (const backend of this.backends) {
			backend.create(snapshot, first);
		}
	}

	append(entry: SessionEntry, snapshot: SessionSnapshot): void {
		for (const backend of this.backends) {
			backend.append(entry, snapshot);
		}
	}

	/** Rewrite only the snapshot; used for metadata changes that carry no entry. */
	persist(snapshot: SessionSnapshot): void {
		for (const backend of this.backends) {
			backend.persist(snapshot);
		}
	}

	readSnapshot(): SessionSnapshot {
		return this.backends[0].readSnapshot();
	}

	readRecords(): LogRecord[] {
		return this.backends[0].readRecords();
	}

	/** The tree backend, when this log writes one. It is the only one that reads entries back fully typed. */
	get tree(): TreeEventLog | undefined {
		return this.backends.find((backend): backend is TreeEventLog => backend instanceof TreeEventLog);
	}
}
