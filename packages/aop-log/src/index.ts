/**
 * aop-log - event logging for astronomical observation sessions.
 */

// Errors
export {
	AOP_ERROR_CODES,
	AlreadyExistsError,
	AopError,
	type AopErrorCode,
	InvalidArgumentError,
	InvalidStateError,
	InvalidTimeFormatError,
	IOError,
	isAopError,
	NotADirectoryError,
	NotFoundError,
	SessionNotFoundError,
	SnapshotNotFoundError,
} from "./errors.js";
// Event log
export { detectFormat, EventLog, sessionDirectory } from "./event-log/event-log.js";
export { formatEntryLine, formatPreamble, LineEventLog, lineLogFiles, parseProtocol } from "./event-log/line-log.js";
export { renderEntry, toRecord } from "./event-log/render.js";
export { TREE_DOCUMENT_VERSION, TreeEventLog, treeLogFile } from "./event-log/tree-log.js";
export type {
	EntryCode,
	EntryDraft,
	EntryType,
	EventLogBackend,
	FrameType,
	IssueSeverity,
	LifecycleState,
	LogFormat,
	LogRecord,
	Measurement,
	PersistedState,
	SessionEntry,
	SessionSnapshot,
} from "./event-log/types.js";
// Identifiers and time
export {
	cryptoRandomHex,
	DEFAULT_ENTRY_ID_DIGITS,
	DEFAULT_SESSION_ID_DIGITS,
	IdGenerator,
	type IdGeneratorOptions,
	type RandomHex,
} from "./ids.js";
// Metadata
export {
	KNOWN_METADATA_KEYS,
	type KnownMetadata,
	type KnownMetadataKey,
	type MetadataInput,
	type MetadataSnapshot,
	MetadataStore,
	type MetadataValue,
} from "./metadata.js";
export { type LoadOptions, listSessions, loadSession } from "./session/loader.js";
// Session
export { type ConditionReport, Session, type SessionOptions, type VariableStarReport } from "./session/session.js";
export { nodeSessionFs, type SessionFs } from "./storage/fs.js";
export {
	type Clock,
	formatSerial,
	type Instant,
	instantToSerial,
	parseIsoTimestamp,
	resolveInstant,
	systemClock,
	type TimeInput,
	timeToSerial,
} from "./time.js";
