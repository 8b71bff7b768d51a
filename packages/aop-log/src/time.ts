/**
 * UTC instants with microsecond resolution and their Julian Date ("serial time") form.
 *
 * An instant is stored as whole microseconds since the Unix epoch. Current time
 * follows `Date.now()`; `performance` only supplies the digits below the millisecond.
 */

import { InvalidTimeFormatError } from "./errors.js";

export interface Instant {
	epochMicros: number;
}

/** Either "now" or an ISO 8601 timestamp. Missing offsets are read as UTC. */
export type TimeInput = "now" | (string & {});

export type Clock = () => Instant;

const MICROS_PER_SECOND = 1_000_000;
const MICROS_PER_DAY = 86_400 * MICROS_PER_SECOND;
/** Julian Date of 1970-01-01T00:00:00Z */
const UNIX_EPOCH_JD = 2_440_587.5;

const ISO_PATTERN =
	/^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

export const systemClock: Clock = () => {
	const wall = Date.now();
	const precise = performance.timeOrigin + performance.now();
	// The monotonic clock misses clock steps and host suspends, so it never sets the millisecond.
	const millis = Math.floor(precise) === wall ? precise : wall + (precise % 1);
	return { epochMicros: Math.floor(millis * 1000) };
};

export function parseIsoTimestamp(input: string): Instant {
	const match = ISO_PATTERN.exec(input.trim());
	if (!match) {
		throw new InvalidTimeFormatError(input);
	}
	const [, year, month, day, hour = "0", minute = "0", second = "0", fraction = "", offset] = match;

	const date = new Date(0);
	date.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
	date.setUTCHours(Number(hour), Number(minute), Number(second), 0);
	// Date rolls 2023-02-30 over into March; reject instead of guessing.
	if (
		date.getUTCFullYear() !== Number(year) ||
		date.getUTCMonth() !== Number(month) - 1 ||
		date.getUTCDate() !== Number(day) ||
		date.getUTCHours() !== Number(hour) ||
		date.getUTCMinutes() !== Number(minute) ||
		date.getUTCSeconds() !== Number(second)
	) {
		throw new InvalidTimeFormatError(input);
	}

	const micros = Number(fraction.padEnd(6, "0").slice(0, 6));
	const offsetMinutes = parseOffset(offset, input);
	return {
		epochMicros: date.getTime() * 1000 + micros - offsetMinutes * 60 * MICROS_PER_SECOND,
	};
}

function parseOffset(offset: string | undefined, input: string): number {
	if (!offset || offset === "Z") return 0;
	const digits = offset.slice(1).replace(":", "");
	const hours = Number(digits.slice(0, 2));
	const minutes = Number(digits.slice(2));
	if (hours > 23 || minutes > 59) {
		throw new InvalidTimeFormatError(input);
	}
	const sign = offset.startsWith("-") ? -1 : 1;
	return sign * (hours * 60 + minutes);
}

/** Resolve an optional time argument against a clock. */
export function resolveInstant(time: TimeInput | undefined, clock: Clock = systemClock): Instant {
	if (time === undefined || time === "now") {
		return clock();
	}
	return parseIsoTimestamp(time);
}

export function instantToSerial(instant: Instant): number {
	return instant.epochMicros / MICROS_PER_DAY + UNIX_EPOCH_JD;
}

/** Julian Date for the given ISO 8601 UTC timestamp, or for the current time. */
export function timeToSerial(time: TimeInput = "now", clock: Clock = systemClock): number {
	return instantToSerial(resolveInstant(time, clock));
}

/** Serial time as written to the session documents. */
export function formatSerial(serial: number): string {
	return serial.toFixed(10);
}

export interface InstantParts {
	year: string;
	month: string;
	day: string;
	hour: string;
	minute: string;
	second: string;
	microsecond: string;
}

export function instantParts(instant: Instant): InstantParts {
	const micros = ((instant.epochMicros % MICROS_PER_SECOND) + MICROS_PER_SECOND) % MICROS_PER_SECOND;
	const date = new Date((instant.epochMicros - micros) / 1000);
	const pad = (value: number, width = 2) => String(value).padStart(width, "0");
	return {
		year: pad(date.getUTCFullYear(), 4),
		month: pad(date.getUTCMonth() + 1),
		day: pad(date.getUTCDate()),
		hour: pad(date.getUTCHours()),
		minute: pad(date.getUTCMinutes()),
		second: pad(date.getUTCSeconds()),
		microsecond: pad(micros, 6),
	};
}
