/**
 * Entry types for the session event log.
 * Every entry carries an id and a serial (Julian Date) time; the rest depends on its type.
 */

import type { MetadataValue } from "../metadata.js";

export type LifecycleState = "unstarted" | "running" | "aborted" | "ended";

/** States a persisted session can be in. A session is only written once started. */
export type PersistedState = Exclude<LifecycleState, "unstarted">;

export interface EntryBase {
	type: string;
	id: string;
	time: number;
}

export interface SessionStartedEntry extends EntryBase {
	type: "session_started";
	sessionId: string;
}

export interface SessionInterruptedEntry extends EntryBase {
	type: "session_interrupted";
}

export interface SessionResumedEntry extends EntryBase {
	type: "session_resumed";
}

export interface SessionAbortedEntry extends EntryBase {
	type: "session_aborted";
	sessionId: string;
	reason: string;
}

export interface SessionEndedEntry extends EntryBase {
	type: "session_ended";
	sessionId: string;
}

export interface CommentEntry extends EntryBase {
	type: "comment";
	text: string;
}

export type IssueSeverity = "potential" | "normal" | "major";

export interface IssueEntry extends EntryBase {
	type: "issue";
	severity: IssueSeverity;
	message: string;
}

/** Pointing either at named targets or at equatorial coordinates (R.A. in hours, Dec. in degrees). */
export type PointingEntry = EntryBase & { type: "pointing" } & ({ targets: string[] } | { ra: number; dec: number });

export type FrameType = "science" | "dark" | "flat" | "bias" | "pointing";

export interface FrameEntry extends EntryBase {
	type: "frame";
	count: number;
	frameType: FrameType;
	iso: number;
	exposureTime: number;
	aperture: number;
}

export interface ConditionDescriptionEntry extends EntryBase {
	type: "condition_description";
	description: string;
}

export type Measurement = "temp" | "pressure" | "humidity";

export interface ConditionMeasurementEntry extends EntryBase {
	type: "condition_measurement";
	measurement: Measurement;
	value: number;
}

export interface VariableStarObservationEntry extends EntryBase {
	type: "variable_star_observation";
	starId: string;
	chartId: string;
	magnitude: number;
	comp1: string;
	comp2?: string;
	codes?: string[];
}

export type SessionEntry =
	| SessionStartedEntry
	| SessionInterruptedEntry
	| SessionResumedEntry
	| SessionAbortedEntry
	| SessionEndedEntry
	| CommentEntry
	| IssueEntry
	| PointingEntry
	| FrameEntry
	| ConditionDescriptionEntry
	| ConditionMeasurementEntry
	| VariableStarObservationEntry;

export type EntryType = SessionEntry["type"];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An entry before it has been stamped with id and time. */
export type EntryDraft = DistributiveOmit<SessionEntry, "id" | "time">;

/** Four-letter codes of the line-oriented format. */
export type EntryCode = "SEEV" | "OBSC" | "ISSU" | "POIN" | "FRAM" | "CDES" | "CMES" | "VSOB";

/** Format-neutral view of a stored entry, as either backend can read it back. */
export interface LogRecord {
	id: string;
	time: number;
	code: EntryCode;
	text: string;
}

/** Everything persisted about a session besides its entries. */
export interface SessionSnapshot {
	sessionId: string;
	state: PersistedState;
	interrupted: boolean;
	metadata: Record<string, MetadataValue>;
}

export type LogFormat = "line" | "tree" | "both";

/**
 * A persistence format for one session. Each write replaces its target file
 * atomically; a failure leaves the previous file as it was.
 */
export interface EventLogBackend {
	readonly format: Exclude<LogFormat, "both">;
	/** Files this backend owns, absolute. */
	files(): string[];
	/** Write the initial document(s). Fails if any of them already exists. */
	create(snapshot: SessionSnapshot, first: SessionEntry): void;
	append(entry: SessionEntry, snapshot: SessionSnapshot): void;
	persist(snapshot: SessionSnapshot): void;
	readSnapshot(): SessionSnapshot;
	readRecords(): LogRecord[];
}
