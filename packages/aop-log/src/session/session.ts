/**
 * The observation session: a lifecycle state machine over the event log.
 *
 *   unstarted --start--> running --abort--> aborted
 *                          |  ^   --end----> ended
 *               interrupt  v  |  resume
 *                       (interrupted)
 *
 * Every operation checks state, arguments and time before touching disk, so a
 * rejected call leaves no trace. In-memory state changes only after the event
 * log has been written.
 */

import { IOError, InvalidStateError, NotADirectoryError } from "../errors.js";
import { EventLog, sessionDirectory } from "../event-log/event-log.js";
import type {
	EntryDraft,
	LifecycleState,
	LogFormat,
	LogRecord,
	Measurement,
	PersistedState,
	SessionEntry,
	SessionSnapshot,
} from "../event-log/types.js";
import { IdGenerator } from "../ids.js";
import { type MetadataInput, MetadataStore, type MetadataSnapshot } from "../metadata.js";
import { nodeSessionFs, type SessionFs } from "../storage/fs.js";
import { type Clock, type Instant, instantToSerial, resolveInstant, type TimeInput } from "../time.js";
import {
	apertureSchema,
	codesSchema,
	decSchema,
	exposureTimeSchema,
	frameCountSchema,
	frameTypeSchema,
	isoSchema,
	labelSchema,
	magnitudeSchema,
	measurementSchema,
	parseArgument,
	raSchema,
	severitySchema,
	targetsSchema,
	textSchema,
} from "./arguments.js";

export interface SessionOptions {
	/** Persistence format for new sessions. Defaults to "line". */
	format?: LogFormat;
	/** Initial metadata, recorded in the protocol preamble on start. */
	metadata?: MetadataInput;
	ids?: IdGenerator;
	/** Source of "now" for entry times. Defaults to the id generator's clock. */
	clock?: Clock;
	fs?: SessionFs;
}

export interface ConditionReport {
	description?: string | null;
	temp?: number | null;
	pressure?: number | null;
	humidity?: number | null;
}

export interface VariableStarReport {
	starId: string;
	chartId: string;
	magnitude: number;
	comp1: string;
	comp2?: string;
	codes?: string[];
}

/** What a running session needs to append: the open log and its id. */
interface Active {
	log: EventLog;
	sessionId: string;
}

interface Transition {
	state?: PersistedState;
	interrupted?: boolean;
	metadata?: MetadataStore;
}

const MEASUREMENTS: Measurement[] = ["temp", "pressure", "humidity"];

export class Session {
	readonly storageRoot: string;
	private state: LifecycleState = "unstarted";
	private interrupted = false;
	private sessionId: string | undefined;
	private metadata: MetadataStore;
	private log: EventLog | undefined;
	private entries: SessionEntry[] = [];
	private format: LogFormat;
	private ids: IdGenerator;
	private clock: Clock;
	private fs: SessionFs;

	/** @throws NotADirectoryError if `storageRoot` is not an existing directory */
	constructor(storageRoot: string, options: SessionOptions = {}) {
		this.fs = options.fs ?? nodeSessionFs;
		if (!this.fs.isDirectory(storageRoot)) {
			throw new NotADirectoryError(storageRoot);
		}
		this.storageRoot = storageRoot;
		this.format = options.format ?? "line";
		this.ids = options.ids ?? new IdGenerator({ clock: options.clock });
		this.clock = options.clock ?? this.ids.clock;
		this.metadata = new MetadataStore(options.metadata);
	}

	/** Rebuild a started session from its persisted snapshot. Used by `loadSession`. */
	static restore(
		storageRoot: string,
		snapshot: SessionSnapshot,
		metadata: MetadataStore,
		log: EventLog,
		options: Omit<SessionOptions, "format" | "metadata"> = {},
	): Session {
		const session = new Session(storageRoot, { ...options, format: log.format });
		session.sessionId = snapshot.sessionId;
		session.state = snapshot.state;
		session.interrupted = snapshot.interrupted;
		session.metadata = metadata;
		session.log = log;
		return session;
	}

	// =========================================================================
	// Accessors
	// =========================================================================

	getSessionId(): string | undefined {
		return this.sessionId;
	}

	getState(): LifecycleState {
		return this.state;
	}

	isStarted(): boolean {
		return this.state !== "unstarted";
	}

	isInterrupted(): boolean {
		return this.interrupted;
	}

	getFormat(): LogFormat {
		return this.format;
	}

	getSessionDir(): string | undefined {
		return this.sessionId ? sessionDirectory(this.storageRoot, this.sessionId) : undefined;
	}

	getMetadata(): MetadataSnapshot {
		return this.metadata.snapshot();
	}

	/** Lifecycle flags plus metadata, exactly as last persisted. */
	getSnapshot(): SessionSnapshot {
		const state = this.state;
		if (state === "unstarted" || this.sessionId === undefined) {
			throw new InvalidStateError("read snapshot", "not started");
		}
		return { sessionId: this.sessionId, state, interrupted: this.interrupted, metadata: this.metadata.snapshot() };
	}

	/** Entries appended through this handle. */
	getEntries(): SessionEntry[] {
		return [...this.entries];
	}

	/** The whole stored log, including entries written before this handle was loaded. */
	readRecords(): LogRecord[] {
		if (!this.log) return [];
		return this.log.readRecords();
	}

	getEventLog(): EventLog | undefined {
		return this.log;
	}

	// =========================================================================
	// Lifecycle
	// =========================================================================

	/**
	 * Assign the session id, create its directory and write the first entry.
	 * @returns the new session id
	 * @throws AlreadyExistsError if the session files already exist
	 */
	start(time?: TimeInput): string {
		if (this.state !== "unstarted") {
			throw new InvalidStateError("start session", "already started");
		}
		const at = this.resolve(time);
		const sessionId = this.ids.newSessionId();
		const dir = sessionDirectory(this.storageRoot, sessionId);
		try {
			this.fs.mkdir(dir);
		} catch (error) {
			throw new IOError("create", dir, error);
		}

		const log = EventLog.open(this.storageRoot, sessionId, this.format, this.fs);
		const entry: SessionEntry = {
			type: "session_started",
			id: this.ids.entryIdAt(at),
			time: instantToSerial(at),
			sessionId,
		};
		log.create({ sessionId, state: "running", interrupted: false, metadata: this.metadata.snapshot() }, entry);

		this.sessionId = sessionId;
		this.log = log;
		this.state = "running";
		this.interrupted = false;
		this.entries.push(entry);
		return sessionId;
	}

	interrupt(time?: TimeInput): string {
		const active = this.requireRunning("interrupt session");
		if (this.interrupted) {
			throw new InvalidStateError("interrupt session", "interrupted");
		}
		return this.record(active, { type: "session_interrupted" }, this.resolve(time), { interrupted: true });
	}

	resume(time?: TimeInput): string {
		const active = this.requireRunning("resume session");
		if (!this.interrupted) {
			throw new InvalidStateError("resume session", "not interrupted");
		}
		return this.record(active, { type: "session_resumed" }, this.resolve(time), { interrupted: false });
	}

	abort(reason: string, time?: TimeInput): string {
		const active = this.requireRunning("abort session");
		const checkedReason = parseArgument(textSchema, reason, "reason");
		return this.record(
			active,
			{ type: "session_aborted", sessionId: active.sessionId, reason: checkedReason },
			this.resolve(time),
			{ state: "aborted", interrupted: false },
		);
	}

	end(time?: TimeInput): string {
		const active = this.requireRunning("end session");
		return this.record(active, { type: "session_ended", sessionId: active.sessionId }, this.resolve(time), {
			state: "ended",
			interrupted: false,
		});
	}

	// =========================================================================
	// Observations
	// =========================================================================

	comment(text: string, time?: TimeInput): string {
		const active = this.requireRunning("comment");
		const checked = parseArgument(textSchema, text, "comment");
		return this.record(active, { type: "comment", text: checked }, this.resolve(time));
	}

	/** @param severity potential, normal or major (or p, n, m) */
	issue(severity: string, message: string, time?: TimeInput): string {
		const active = this.requireRunning("log issue");
		const checkedSeverity = parseArgument(severitySchema, severity, "severity");
		const checkedMessage = parseArgument(textSchema, message, "message");
		return this.record(
			active,
			{ type: "issue", severity: checkedSeverity, message: checkedMessage },
			this.resolve(time),
		);
	}

	pointToName(targets: string[], time?: TimeInput): string {
		const active = this.requireRunning("point telescope");
		const checked = parseArgument(targetsSchema, targets, "targets");
		return this.record(active, { type: "pointing", targets: checked }, this.resolve(time));
	}

	/**
	 * @param ra right ascension in hours, [0, 24)
	 * @param dec declination in degrees, [-90, 90]
	 */
	pointToCoords(ra: number, dec: number, time?: TimeInput): string {
		const active = this.requireRunning("point telescope");
		const checkedRa = parseArgument(raSchema, ra, "ra");
		const checkedDec = parseArgument(decSchema, dec, "dec");
		return this.record(active, { type: "pointing", ra: checkedRa, dec: checkedDec }, this.resolve(time));
	}

	/**
	 * @param n number of frames taken
	 * @param frameType science, dark, flat, bias or pointing; also "<type> frame", the first letter, or "<letter>f"
	 * @param expTime exposure time in seconds
	 * @param aperture f-number
	 */
	takeFrame(n: number, frameType: string, iso: number, expTime: number, aperture: number, time?: TimeInput): string {
		const active = this.requireRunning("take frame");
		const draft: EntryDraft = {
			type: "frame",
			count: parseArgument(frameCountSchema, n, "n"),
			frameType: parseArgument(frameTypeSchema, frameType, "frameType"),
			iso: parseArgument(isoSchema, iso, "iso"),
			exposureTime: parseArgument(exposureTimeSchema, expTime, "expTime"),
			aperture: parseArgument(apertureSchema, aperture, "aperture"),
		};
		return this.record(active, draft, this.resolve(time));
	}

	/**
	 * Record whichever condition fields are given: each one updates the metadata
	 * and appends its own entry, in the order description, temp, pressure, humidity.
	 * Allowed while interrupted.
	 * @returns ids of the appended entries; empty when no field was given
	 */
	conditionReport(report: ConditionReport, time?: TimeInput): string[] {
		const active = this.requireRunning("report conditions");
		const description =
			report.description == null ? undefined : parseArgument(textSchema, report.description, "description");
		const measurements: [Measurement, number][] = [];
		for (const measurement of MEASUREMENTS) {
			const value = report[measurement];
			if (value != null) {
				measurements.push([measurement, parseArgument(measurementSchema, value, measurement)]);
			}
		}
		if (description === undefined && measurements.length === 0) {
			return [];
		}

		const at = this.resolve(time);
		const ids: string[] = [];
		if (description !== undefined) {
			const metadata = this.metadata.clone();
			metadata.set("conditionDescription", description);
			ids.push(this.record(active, { type: "condition_description", description }, at, { metadata }));
		}
		for (const [measurement, value] of measurements) {
			const metadata = this.metadata.clone();
			metadata.set(measurement, value);
			ids.push(this.record(active, { type: "condition_measurement", measurement, value }, at, { metadata }));
		}
		return ids;
	}

	variableStarObservation(report: VariableStarReport, time?: TimeInput): string {
		const active = this.requireRunning("log variable star observation");
		const starId = parseArgument(labelSchema, report.starId, "starId");
		const chartId = parseArgument(labelSchema, report.chartId, "chartId");
		const magnitude = parseArgument(magnitudeSchema, report.magnitude, "magnitude");
		const comp1 = parseArgument(labelSchema, report.comp1, "comp1");
		const comp2 = report.comp2 === undefined ? undefined : parseArgument(labelSchema, report.comp2, "comp2");
		const codes = parseArgument(codesSchema, report.codes, "codes");
		const draft: EntryDraft = {
			type: "variable_star_observation",
			starId,
			chartId,
			magnitude,
			comp1,
			...(comp2 === undefined ? {} : { comp2 }),
			...(codes && codes.length > 0 ? { codes } : {}),
		};
		return this.record(active, draft, this.resolve(time));
	}

	/** Change metadata mid-session. Persists the snapshot without appending an entry. */
	updateMetadata(fields: MetadataInput): void {
		const active = this.requireRunning("update metadata");
		const metadata = this.metadata.clone();
		for (const [key, value] of Object.entries(fields)) {
			if (value !== undefined) {
				metadata.set(key, value);
			}
		}
		active.log.persist(this.nextSnapshot(active, { metadata }));
		this.metadata = metadata;
	}

	// =========================================================================
	// Internals
	// =========================================================================

	private resolve(time: TimeInput | undefined): Instant {
		return resolveInstant(time, this.clock);
	}

	private describeState(): string {
		switch (this.state) {
			case "unstarted":
				return "not started";
			case "running":
				return this.interrupted ? "interrupted" : "running";
			default:
				return this.state;
		}
	}

	/** @throws InvalidStateError unless the session is running */
	private requireRunning(operation: string): Active {
		if (this.state !== "running" || !this.log || this.sessionId === undefined) {
			throw new InvalidStateError(operation, this.describeState());
		}
		return { log: this.log, sessionId: this.sessionId };
	}

	private nextSnapshot(active: Active, next: Transition): SessionSnapshot {
		return {
			sessionId: active.sessionId,
			state: next.state ?? "running",
			interrupted: next.interrupted ?? this.interrupted,
			metadata: (next.metadata ?? this.metadata).snapshot(),
		};
	}

	/** Stamp, persist, then commit. */
	private record(active: Active, draft: EntryDraft, at: Instant, next: Transition = {}): string {
		const entry: SessionEntry = { ...draft, id: this.ids.entryIdAt(at), time: instantToSerial(at) };
		const snapshot = this.nextSnapshot(active, next);
		active.log.append(entry, snapshot);

		this.state = snapshot.state;
		this.interrupted = snapshot.interrupted;
		if (next.metadata) {
			this.metadata = next.metadata;
		}
		this.entries.push(entry);
		return entry.id;
	}
}
