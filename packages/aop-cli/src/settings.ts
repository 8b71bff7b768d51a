/**
 * Settings persistence for aop.
 *
 * Stores user preferences (storage root, default format, observer details) and
 * the current session in ~/.aop/settings.json: load in constructor, save on
 * mutation, create dir if needed.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { z } from "zod";

const settingsSchema = z.object({
	storageRoot: z.string().min(1).optional(),
	format: z.enum(["line", "tree", "both"]).optional(),
	observer: z.string().optional(),
	locationDescription: z.string().optional(),
	currentSession: z.string().min(1).optional(),
});

export type SettingsData = z.infer<typeof settingsSchema>;

/** Settings a user may change with `aop config`. */
export const EDITABLE_SETTINGS = ["storageRoot", "format", "observer", "locationDescription"] as const;

export type EditableSetting = (typeof EDITABLE_SETTINGS)[number];

export function isEditableSetting(key: string): key is EditableSetting {
	return EDITABLE_SETTINGS.some((setting) => setting === key);
}

export class SettingsManager {
	private data: SettingsData = {};
	private loadError: string | undefined;

	private constructor(private settingsPath: string) {
		this.reload();
	}

	static create(configDir: string): SettingsManager {
		return new SettingsManager(join(configDir, "settings.json"));
	}

	getPath(): string {
		return this.settingsPath;
	}

	/** Why the settings file was ignored, if it was. */
	getLoadError(): string | undefined {
		return this.loadError;
	}

	private reload(): void {
		this.data = {};
		this.loadError = undefined;
		if (!existsSync(this.settingsPath)) {
			return;
		}
		let raw: unknown;
		try {
			raw = JSON.parse(readFileSync(this.settingsPath, "utf-8"));
		} catch (error) {
			this.loadError = `${this.settingsPath} is not valid JSON (${error instanceof Error ? error.message : String(error)})`;
			return;
		}
		const parsed = settingsSchema.safeParse(raw);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			this.loadError = `${this.settingsPath}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid settings"}`;
			return;
		}
		this.data = parsed.data;
	}

	private save(): void {
		const dir = dirname(this.settingsPath);
		if (!existsSync(dir)) {
			mkdirSync(dir, { recursive: true, mode: 0o700 });
		}
		writeFileSync(this.settingsPath, JSON.stringify(this.data, null, 2), "utf-8");
	}

	getAll(): SettingsData {
		return { ...this.data };
	}

	getStorageRoot(): string | undefined {
		return this.data.storageRoot;
	}

	getFormat(): SettingsData["format"] {
		return this.data.format;
	}

	getObserver(): string | undefined {
		return this.data.observer;
	}

	getLocationDescription(): string | undefined {
		return this.data.locationDescription;
	}

	getCurrentSession(): string | undefined {
		return this.data.currentSession;
	}

	setCurrentSession(sessionId: string | undefined): void {
		this.data.currentSession = sessionId;
		this.save();
	}

	/**
	 * Change one editable setting from its command-line text; an empty value clears it.
	 * @throws Error naming the setting when the value is not valid for it
	 */
	set(key: EditableSetting, value: string): void {
		const next = { ...this.data, [key]: value === "" ? undefined : value };
		const parsed = settingsSchema.safeParse(next);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			throw new Error(`Invalid value for ${key}: ${issue?.message ?? "invalid"}`);
		}
		this.data = parsed.data;
		this.save();
	}
}
