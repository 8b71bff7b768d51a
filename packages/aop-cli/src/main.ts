/**
 * Main entry point for the aop CLI.
 *
 * Resolves settings and the storage root, then dispatches one command against
 * the current session. Each invocation loads the session, appends and exits.
 */

import { existsSync, mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import chalk from "chalk";
import {
	formatEntryLine,
	formatSerial,
	isAopError,
	type LogRecord,
	listSessions,
	loadSession,
	type MetadataInput,
	type MetadataValue,
	Session,
} from "aop-log";
import { type Args, parseArgs, printHelp } from "./cli/args.js";
import { EDITABLE_SETTINGS, isEditableSetting, SettingsManager } from "./settings.js";

export const VERSION = "0.1.0";
const CONFIG_DIR_NAME = ".aop";

function expandHome(path: string): string {
	if (path === "~") return homedir();
	if (path.startsWith("~/")) return homedir() + path.slice(1);
	return path;
}

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
	const envDir = env.AOP_DIR;
	if (envDir) {
		return expandHome(envDir);
	}
	return join(homedir(), CONFIG_DIR_NAME);
}

interface Context {
	parsed: Args;
	settings: SettingsManager;
	storageRoot: string;
}

function usage(text: string): Error {
	return new Error(`Usage: aop ${text}`);
}

function requireOption<T>(value: T | undefined, flag: string, command: string): T {
	if (value === undefined) {
		throw new Error(`${command} needs ${flag}`);
	}
	return value;
}

function numberArgument(value: string | undefined, name: string, usageText: string): number {
	if (value === undefined) {
		throw usage(usageText);
	}
	const number = Number(value);
	if (value.trim() === "" || !Number.isFinite(number)) {
		throw new Error(`${name} must be a number, got "${value}"`);
	}
	return number;
}

function currentSessionId(ctx: Context): string {
	const sessionId = ctx.parsed.session ?? ctx.settings.getCurrentSession();
	if (!sessionId) {
		throw new Error("No current session. Start one with `aop start` or pass --session <id>.");
	}
	return sessionId;
}

function formatValue(value: MetadataValue): string {
	return typeof value === "string" ? value : JSON.stringify(value);
}

function formatRecord(record: LogRecord): string {
	return `(${record.id}) ${formatSerial(record.time)} -> ${record.code} ${record.text}`;
}

/** Print what the command wrote: entry ids, or full lines with --verbose. */
function printWritten(ctx: Context, session: Session): void {
	for (const entry of session.getEntries()) {
		console.log(ctx.parsed.verbose ? formatEntryLine(entry).trimEnd() : entry.id);
	}
}

function assignDefined(target: MetadataInput, fields: Record<string, MetadataValue | undefined>): void {
	for (const [key, value] of Object.entries(fields)) {
		if (value !== undefined) {
			target[key] = value;
		}
	}
}

/** Settings defaults, then `--meta` pairs, then the dedicated flags. */
function startMetadata(parsed: Args, settings: SettingsManager): MetadataInput {
	const metadata: MetadataInput = {};
	assignDefined(metadata, {
		observer: settings.getObserver(),
		locationDescription: settings.getLocationDescription(),
	});
	assignDefined(metadata, parsed.meta);
	assignDefined(metadata, {
		name: parsed.name,
		observer: parsed.observer,
		locationDescription: parsed.location,
		longitude: parsed.longitude,
		latitude: parsed.latitude,
		project: parsed.project,
		target: parsed.target,
		objective: parsed.objective,
		listOfGear: parsed.gear,
	});
	return metadata;
}

function startSession(ctx: Context): void {
	const { parsed, settings } = ctx;
	mkdirSync(ctx.storageRoot, { recursive: true });
	const metadata = startMetadata(parsed, settings);
	const session = new Session(ctx.storageRoot, {
		format: parsed.format ?? settings.getFormat() ?? "line",
		metadata,
	});
	const sessionId = session.start(parsed.time);
	settings.setCurrentSession(sessionId);
	if (parsed.verbose) {
		console.log(chalk.dim(`Session directory: ${session.getSessionDir()}`));
		printWritten(ctx, session);
	}
	console.log(sessionId);
}

function runLogCommand(ctx: Context): void {
	const { parsed } = ctx;
	const { positionals, time } = parsed;
	const session = loadSession(ctx.storageRoot, currentSessionId(ctx));

	switch (parsed.command) {
		case "interrupt":
			session.interrupt(time);
			break;
		case "resume":
			session.resume(time);
			break;
		case "end":
			session.end(time);
			break;
		case "abort":
			if (positionals.length === 0) throw usage("abort <reason>");
			session.abort(positionals.join(" "), time);
			break;
		case "comment":
			if (positionals.length === 0) throw usage("comment <text>");
			session.comment(positionals.join(" "), time);
			break;
		case "issue": {
			const [severity, ...message] = positionals;
			if (severity === undefined || message.length === 0) throw usage("issue <severity> <message>");
			session.issue(severity, message.join(" "), time);
			break;
		}
		case "point":
			if (parsed.ra !== undefined || parsed.dec !== undefined) {
				session.pointToCoords(
					requireOption(parsed.ra, "--ra", "point"),
					requireOption(parsed.dec, "--dec", "point"),
					time,
				);
			} else {
				if (positionals.length === 0) throw usage("point <target...> | point --ra <h> --dec <deg>");
				session.pointToName(positionals, time);
			}
			break;
		case "frame": {
			const frameUsage = "frame <count> <type> --iso <n> --exp <s> --aperture <f>";
			const count = numberArgument(positionals[0], "count", frameUsage);
			const frameType = positionals[1];
			if (frameType === undefined) throw usage(frameUsage);
			session.takeFrame(
				count,
				frameType,
				requireOption(parsed.iso, "--iso", "frame"),
				requireOption(parsed.exposure, "--exp", "frame"),
				requireOption(parsed.aperture, "--aperture", "frame"),
				time,
			);
			break;
		}
		case "condition": {
			const ids = session.conditionReport(
				{
					description: parsed.description,
					temp: parsed.temp,
					pressure: parsed.pressure,
					humidity: parsed.humidity,
				},
				time,
			);
			if (ids.length === 0) {
				console.error(chalk.yellow("Warning: Nothing to report. Use --description, --temp, --pressure or --humidity."));
			}
			break;
		}
		case "vso": {
			const vsoUsage = "vso <star> <magnitude> --chart <id> --comp1 <label>";
			const starId = positionals[0];
			if (starId === undefined) throw usage(vsoUsage);
			session.variableStarObservation(
				{
					starId,
					magnitude: numberArgument(positionals[1], "magnitude", vsoUsage),
					chartId: requireOption(parsed.chart, "--chart", "vso"),
					comp1: requireOption(parsed.comp1, "--comp1", "vso"),
					comp2: parsed.comp2,
					codes: parsed.codes,
				},
				time,
			);
			break;
		}
		default:
			throw new Error(`Unhandled command: ${parsed.command}`);
	}
	printWritten(ctx, session);
}

function showSession(ctx: Context): void {
	const sessionId = ctx.parsed.positionals[0] ?? currentSessionId(ctx);
	const session = loadSession(ctx.storageRoot, sessionId);
	const state = session.isInterrupted() ? `${session.getState()} (interrupted)` : session.getState();

	console.log(`${chalk.bold("Session:")} ${sessionId}`);
	console.log(`${chalk.bold("State:")} ${state}`);
	console.log(`${chalk.bold("Format:")} ${session.getFormat()}`);
	console.log(`${chalk.bold("Directory:")} ${session.getSessionDir()}`);
	console.log();
	for (const [key, value] of Object.entries(session.getMetadata())) {
		console.log(`${key}: ${formatValue(value)}`);
	}
	console.log();
	for (const record of session.readRecords()) {
		console.log(formatRecord(record));
	}
}

function listAll(ctx: Context): void {
	const sessions = existsSync(ctx.storageRoot) ? listSessions(ctx.storageRoot) : [];
	if (sessions.length === 0) {
		console.log(`No sessions in ${ctx.storageRoot}`);
		return;
	}
	const current = ctx.settings.getCurrentSession();
	for (const sessionId of sessions) {
		const marker = sessionId === current ? "*" : " ";
		try {
			const session = loadSession(ctx.storageRoot, sessionId);
			const state = session.isInterrupted() ? "interrupted" : session.getState();
			console.log(`${marker} ${sessionId}  ${state}`);
		} catch (error) {
			if (!isAopError(error)) throw error;
			console.error(chalk.yellow(`Warning: ${error.message}`));
		}
	}
}

function configure(ctx: Context): void {
	const { settings } = ctx;
	const [key, value] = ctx.parsed.positionals;
	if (key === undefined) {
		const all = settings.getAll();
		for (const setting of EDITABLE_SETTINGS) {
			console.log(`${setting}: ${all[setting] ?? ""}`);
		}
		console.log(`currentSession: ${all.currentSession ?? ""}`);
		if (ctx.parsed.verbose) {
			console.log(chalk.dim(`Settings file: ${settings.getPath()}`));
		}
		return;
	}
	if (!isEditableSetting(key)) {
		throw new Error(`Unknown setting "${key}". Valid settings: ${EDITABLE_SETTINGS.join(", ")}`);
	}
	if (value === undefined) {
		console.log(settings.getAll()[key] ?? "");
		return;
	}
	settings.set(key, value);
}

function run(parsed: Args, env: NodeJS.ProcessEnv): number {
	const configDir = getConfigDir(env);
	const settings = SettingsManager.create(configDir);
	const loadError = settings.getLoadError();
	if (loadError) {
		console.error(chalk.yellow(`Warning: Ignoring settings. ${loadError}`));
	}
	const ctx: Context = {
		parsed,
		settings,
		storageRoot: expandHome(parsed.root ?? settings.getStorageRoot() ?? join(configDir, "sessions")),
	};

	switch (parsed.command) {
		case "start":
			startSession(ctx);
			break;
		case "show":
			showSession(ctx);
			break;
		case "list":
			listAll(ctx);
			break;
		case "config":
			configure(ctx);
			break;
		default:
			runLogCommand(ctx);
	}
	return 0;
}

export function main(args: string[], env: NodeJS.ProcessEnv = process.env): number {
	const parsed = parseArgs(args);

	if (parsed.version) {
		console.log(VERSION);
		return 0;
	}

	if (parsed.help) {
		printHelp();
		return 0;
	}

	if (parsed.command === undefined) {
		if (parsed.positionals.length > 0) {
			console.error(chalk.red(`Unknown command: ${parsed.positionals[0]}`));
			console.error("Run aop --help for usage.");
		} else {
			printHelp();
		}
		return 1;
	}

	try {
		return run(parsed, env);
	} catch (error) {
		if (isAopError(error)) {
			console.error(chalk.red(`${error.code}: ${error.message}`));
		} else {
			console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
		}
		return 1;
	}
}
