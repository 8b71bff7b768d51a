/**
 * Session and entry identifiers.
 *
 * Session ids: `YYYY-mm-dd-HH-MM-SS-<hex>` (UTC, second resolution).
 * Entry ids:   `YYYYMMDDhhmmssffffff-<hex>` (UTC, microsecond resolution).
 *
 * Both sort by creation time; the random suffix keeps them apart within the same tick.
 */

import { randomBytes } from "node:crypto";
import { type Clock, type Instant, instantParts, resolveInstant, systemClock, type TimeInput } from "./time.js";

export const DEFAULT_SESSION_ID_DIGITS = 10;
export const DEFAULT_ENTRY_ID_DIGITS = 30;

const MAX_ATTEMPTS = 100;

export type RandomHex = (digits: number) => string;

export const cryptoRandomHex: RandomHex = (digits) => randomBytes(Math.ceil(digits / 2)).toString("hex").slice(0, digits);

/** Suffixes drawn for the most recent timestamp prefix of one id kind. */
interface Tick {
	prefix: string;
	suffixes: Set<string>;
}

type IdKind = "session" | "entry";

export interface IdGeneratorOptions {
	sessionIdDigits?: number;
	entryIdDigits?: number;
	clock?: Clock;
	randomHex?: RandomHex;
}

export class IdGenerator {
	readonly sessionIdDigits: number;
	readonly entryIdDigits: number;
	readonly clock: Clock;
	private randomHex: RandomHex;
	private ticks: Partial<Record<IdKind, Tick>> = {};

	constructor(options: IdGeneratorOptions = {}) {
		this.sessionIdDigits = options.sessionIdDigits ?? DEFAULT_SESSION_ID_DIGITS;
		this.entryIdDigits = options.entryIdDigits ?? DEFAULT_ENTRY_ID_DIGITS;
		this.clock = options.clock ?? systemClock;
		this.randomHex = options.randomHex ?? cryptoRandomHex;
	}

	newSessionId(): string {
		const p = instantParts(this.clock());
		const prefix = `${p.year}-${p.month}-${p.day}-${p.hour}-${p.minute}-${p.second}`;
		return this.unique("session", prefix, this.sessionIdDigits);
	}

	/** @throws InvalidTimeFormatError if `time` is not a parsable ISO 8601 timestamp */
	newEntryId(time?: TimeInput): string {
		return this.entryIdAt(resolveInstant(time, this.clock));
	}

	entryIdAt(instant: Instant): string {
		const p = instantParts(instant);
		const prefix = `${p.year}${p.month}${p.day}${p.hour}${p.minute}${p.second}${p.microsecond}`;
		return this.unique("entry", prefix, this.entryIdDigits);
	}

	/** Draw suffixes until one is new for the current prefix. Only the latest prefix of each kind is remembered. */
	private unique(kind: IdKind, prefix: string, digits: number): string {
		const current = this.ticks[kind];
		const tick = current && current.prefix === prefix ? current : { prefix, suffixes: new Set<string>() };
		this.ticks[kind] = tick;
		let suffix = this.randomHex(digits);
		for (let i = 1; i < MAX_ATTEMPTS && tick.suffixes.has(suffix); i++) {
			suffix = this.randomHex(digits);
		}
		while (tick.suffixes.has(suffix)) {
			suffix = cryptoRandomHex(digits);
		}
		tick.suffixes.add(suffix);
		return `${prefix}-${suffix}`;
	}
}
