/**
 * Session attributes: a fixed set of known, type-checked fields plus an open
 * extension mapping for anything else the caller wants on record.
 */

import { z } from "zod";
import { InvalidArgumentError } from "./errors.js";

export type MetadataScalar = string | number | boolean | null;
export type MetadataValue = MetadataScalar | MetadataScalar[];

const scalarSchema = z.union([z.string(), z.number().finite(), z.boolean(), z.null()]);
export const metadataValueSchema = z.union([scalarSchema, z.array(scalarSchema)]);

const knownFieldSchemas = {
	name: z.string(),
	observer: z.string(),
	locationDescription: z.string(),
	longitude: z.number().finite(),
	latitude: z.number().finite(),
	transcription: z.string(),
	listOfGear: z.array(z.string()),
	project: z.string(),
	target: z.string(),
	commentary: z.string(),
	digitized: z.boolean(),
	objective: z.string(),
	digitizer: z.string(),
	conditionDescription: z.string().nullable(),
	temp: z.number().finite().nullable(),
	pressure: z.number().finite().nullable(),
	humidity: z.number().finite().nullable(),
} satisfies Record<string, z.ZodType<MetadataValue>>;

type KnownSchemas = typeof knownFieldSchemas;

export type KnownMetadataKey = keyof KnownSchemas;

export type KnownMetadata = { [K in KnownMetadataKey]: z.infer<KnownSchemas[K]> };

/** Known fields are optional on input; anything else goes to the extension mapping. */
export type MetadataInput = Partial<KnownMetadata> & { [key: string]: MetadataValue | undefined };

export type MetadataSnapshot = Record<string, MetadataValue>;

/** Fixed serialization order of the known fields. */
export const KNOWN_METADATA_KEYS = [
	"name",
	"observer",
	"locationDescription",
	"longitude",
	"latitude",
	"transcription",
	"listOfGear",
	"project",
	"target",
	"commentary",
	"digitized",
	"objective",
	"digitizer",
	"conditionDescription",
	"temp",
	"pressure",
	"humidity",
] as const satisfies readonly KnownMetadataKey[];

/** Condition fields are always present, starting out empty. */
export const CONDITION_KEYS = ["conditionDescription", "temp", "pressure", "humidity"] as const;

export type ConditionKey = (typeof CONDITION_KEYS)[number];

/** Keys owned by the session lifecycle; they live beside the metadata in the snapshot, never inside it. */
export const LIFECYCLE_KEYS = ["sessionId", "state", "interrupted"] as const;

export function isKnownMetadataKey(key: string): key is KnownMetadataKey {
	return Object.hasOwn(knownFieldSchemas, key);
}

function isConditionKey(key: string): key is ConditionKey {
	return CONDITION_KEYS.some((k) => k === key);
}

function isLifecycleKey(key: string): boolean {
	return LIFECYCLE_KEYS.some((k) => k === key);
}

function validate(key: string, value: unknown): MetadataValue {
	if (isLifecycleKey(key)) {
		throw new InvalidArgumentError(`"${key}" is managed by the session and cannot be set as metadata`, key);
	}
	if (key === "__proto__") {
		throw new InvalidArgumentError(`"${key}" cannot be used as a metadata key`, key);
	}
	const schema: z.ZodType<MetadataValue> = isKnownMetadataKey(key) ? knownFieldSchemas[key] : metadataValueSchema;
	const result = schema.safeParse(value);
	if (!result.success) {
		const expected = result.error.issues[0]?.message ?? "invalid value";
		throw new InvalidArgumentError(`Invalid value for metadata field "${key}": ${expected}`, key);
	}
	return result.data;
}

export class MetadataStore {
	private known = new Map<KnownMetadataKey, MetadataValue>();
	private extra = new Map<string, MetadataValue>();

	constructor(initial: MetadataInput = {}) {
		for (const key of CONDITION_KEYS) {
			this.known.set(key, null);
		}
		for (const [key, value] of Object.entries(initial)) {
			if (value !== undefined) {
				this.set(key, value);
			}
		}
	}

	/** @throws InvalidArgumentError when a known field gets a value of the wrong type category */
	set<K extends KnownMetadataKey>(key: K, value: KnownMetadata[K]): void;
	set(key: string, value: MetadataValue): void;
	set(key: string, value: unknown): void {
		this.assign(key, validate(key, value));
	}

	private assign(key: string, value: MetadataValue): void {
		if (isKnownMetadataKey(key)) {
			this.known.set(key, value);
		} else {
			this.extra.set(key, value);
		}
	}

	get<K extends KnownMetadataKey>(key: K): KnownMetadata[K] | undefined;
	get(key: string): MetadataValue | undefined;
	get(key: string): MetadataValue | undefined {
		return isKnownMetadataKey(key) ? this.known.get(key) : this.extra.get(key);
	}

	has(key: string): boolean {
		return isKnownMetadataKey(key) ? this.known.has(key) : this.extra.has(key);
	}

	delete(key: string): boolean {
		if (isConditionKey(key)) {
			this.known.set(key, null);
			return true;
		}
		return isKnownMetadataKey(key) ? this.known.delete(key) : this.extra.delete(key);
	}

	/** Known fields in their fixed order, then extension fields sorted by key. */
	snapshot(): MetadataSnapshot {
		const result: MetadataSnapshot = {};
		for (const key of KNOWN_METADATA_KEYS) {
			const value = this.known.get(key);
			if (value !== undefined) {
				result[key] = copyValue(value);
			}
		}
		for (const key of [...this.extra.keys()].sort()) {
			const value = this.extra.get(key);
			if (value !== undefined) {
				result[key] = copyValue(value);
			}
		}
		return result;
	}

	clone(): MetadataStore {
		return MetadataStore.loadFrom(this.snapshot());
	}

	/**
	 * Rebuild a store from a persisted snapshot. Lifecycle keys are skipped.
	 * @throws InvalidArgumentError if the snapshot is not an object or a value has the wrong type
	 */
	static loadFrom(serialized: unknown): MetadataStore {
		const parsed = z.record(z.unknown()).safeParse(serialized);
		if (!parsed.success) {
			throw new InvalidArgumentError("Metadata snapshot must be an object");
		}
		const store = new MetadataStore();
		for (const [key, value] of Object.entries(parsed.data)) {
			if (isLifecycleKey(key)) continue;
			store.assign(key, validate(key, value));
		}
		return store;
	}
}

function copyValue(value: MetadataValue): MetadataValue {
	return Array.isArray(value) ? [...value] : value;
}
