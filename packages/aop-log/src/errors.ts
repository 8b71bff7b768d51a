export const AOP_ERROR_CODES = Object.freeze({
	INVALID_STATE: "INVALID_STATE",
	INVALID_ARGUMENT: "INVALID_ARGUMENT",
	ALREADY_EXISTS: "ALREADY_EXISTS",
	NOT_FOUND: "NOT_FOUND",
	NOT_A_DIRECTORY: "NOT_A_DIRECTORY",
	IO_ERROR: "IO_ERROR",
	INVALID_TIME_FORMAT: "INVALID_TIME_FORMAT",
} as const);

export type AopErrorCode = (typeof AOP_ERROR_CODES)[keyof typeof AOP_ERROR_CODES];

/**
 * Base class for every error raised by the logger.
 * `code` is stable and meant for programmatic handling; `message` is for humans.
 */
export class AopError extends Error {
	readonly code: AopErrorCode;

	constructor(code: AopErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "AopError";
		this.code = code;
	}
}

/** The requested operation is not legal in the session's current lifecycle state. */
export class InvalidStateError extends AopError {
	readonly operation: string;
	readonly state: string;

	constructor(operation: string, state: string) {
		super(AOP_ERROR_CODES.INVALID_STATE, `Not able to ${operation}: session currently ${state}.`);
		this.name = "InvalidStateError";
		this.operation = operation;
		this.state = state;
	}
}

export class InvalidArgumentError extends AopError {
	readonly argument?: string;

	constructor(message: string, argument?: string) {
		super(AOP_ERROR_CODES.INVALID_ARGUMENT, message);
		this.name = "InvalidArgumentError";
		this.argument = argument;
	}
}

/** Session files are already present where `start()` wants to create them. */
export class AlreadyExistsError extends AopError {
	readonly path: string;

	constructor(path: string) {
		super(AOP_ERROR_CODES.ALREADY_EXISTS, `Session file already exists: ${path}`);
		this.name = "AlreadyExistsError";
		this.path = path;
	}
}

export class NotFoundError extends AopError {
	constructor(message: string) {
		super(AOP_ERROR_CODES.NOT_FOUND, message);
		this.name = "NotFoundError";
	}
}

export class SessionNotFoundError extends NotFoundError {
	readonly sessionId: string;
	readonly storageRoot: string;

	constructor(sessionId: string, storageRoot: string) {
		super(`Session ${sessionId} not found in ${storageRoot}`);
		this.name = "SessionNotFoundError";
		this.sessionId = sessionId;
		this.storageRoot = storageRoot;
	}
}

export class SnapshotNotFoundError extends NotFoundError {
	readonly sessionId: string;
	readonly reason: string;

	constructor(sessionId: string, reason: string) {
		super(`No readable snapshot for session ${sessionId}: ${reason}`);
		this.name = "SnapshotNotFoundError";
		this.sessionId = sessionId;
		this.reason = reason;
	}
}

export class NotADirectoryError extends AopError {
	readonly path: string;

	constructor(path: string) {
		super(AOP_ERROR_CODES.NOT_A_DIRECTORY, `Not a directory: ${path}`);
		this.name = "NotADirectoryError";
		this.path = path;
	}
}

/** A read or write against the session files failed. The underlying error is kept as `cause`. */
export class IOError extends AopError {
	readonly path: string;

	constructor(action: "read" | "write" | "create", path: string, cause: unknown) {
		super(AOP_ERROR_CODES.IO_ERROR, `Could not ${action} ${path}: ${describeCause(cause)}`, { cause });
		this.name = "IOError";
		this.path = path;
	}
}

export class InvalidTimeFormatError extends AopError {
	readonly input: string;

	constructor(input: string) {
		super(
			AOP_ERROR_CODES.INVALID_TIME_FORMAT,
			`"${input}" is not an ISO 8601 UTC timestamp (expected e.g. 2024-03-01T20:15:00Z)`,
		);
		this.name = "InvalidTimeFormatError";
		this.input = input;
	}
}

function describeCause(cause: unknown): string {
	if (cause instanceof Error) {
		return cause.message;
	}
	return String(cause);
}

export function isAopError(error: unknown): error is AopError {
	return error instanceof AopError;
}
