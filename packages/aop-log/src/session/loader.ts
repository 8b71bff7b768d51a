import {
	InvalidArgumentError,
	NotADirectoryError,
	SessionNotFoundError,
	SnapshotNotFoundError,
} from "../errors.js";
import { detectFormat, EventLog, sessionDirectory } from "../event-log/event-log.js";
import { MetadataStore } from "../metadata.js";
import { nodeSessionFs } from "../storage/fs.js";
import { Session, type SessionOptions } from "./session.js";

export type LoadOptions = Omit<SessionOptions, "format" | "metadata">;

/**
 * Reopen a persisted session so it can keep logging.
 * The format is detected from the files present; with both, the line snapshot is read.
 *
 * @throws NotADirectoryError if `storageRoot` is not a directory
 * @throws SessionNotFoundError if there is no directory for `sessionId`
 * @throws SnapshotNotFoundError if the snapshot is missing or unreadable
 */
export function loadSession(storageRoot: string, sessionId: string, options: LoadOptions = {}): Session {
	const fs = options.fs ?? nodeSessionFs;
	if (!fs.isDirectory(storageRoot)) {
		throw new NotADirectoryError(storageRoot);
	}
	const dir = sessionDirectory(storageRoot, sessionId);
	if (!fs.isDirectory(dir)) {
		throw new SessionNotFoundError(sessionId, storageRoot);
	}
	const format = detectFormat(fs, dir, sessionId);
	if (!format) {
		throw new SnapshotNotFoundError(sessionId, `no session files in ${dir}`);
	}

	const log = EventLog.open(storageRoot, sessionId, format, fs);
	const snapshot = log.readSnapshot();
	if (snapshot.sessionId !== sessionId) {
		throw new SnapshotNotFoundError(sessionId, `snapshot belongs to session ${snapshot.sessionId}`);
	}

	let metadata: MetadataStore;
	try {
		metadata = MetadataStore.loadFrom(snapshot.metadata);
	} catch (error) {
		if (error instanceof InvalidArgumentError) {
			throw new SnapshotNotFoundError(sessionId, error.message);
		}
		throw error;
	}
	return Session.restore(storageRoot, snapshot, metadata, log, { ...options, fs });
}

/** Ids of the sessions under `storageRoot` that have a snapshot, oldest first. */
export function listSessions(storageRoot: string, fs = nodeSessionFs): string[] {
	if (!fs.isDirectory(storageRoot)) {
		throw new NotADirectoryError(storageRoot);
	}
	return fs
		.readdir(storageRoot)
		.filter((name) => {
			const dir = sessionDirectory(storageRoot, name);
			return fs.isDirectory(dir) && detectFormat(fs, dir, name) !== undefined;
		});
}
