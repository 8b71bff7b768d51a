import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AlreadyExistsError, IOError } from "../src/errors.js";
import { detectFormat, EventLog } from "../src/event-log/event-log.js";
import type { SessionEntry, SessionSnapshot } from "../src/event-log/types.js";
import { nodeSessionFs } from "../src/storage/fs.js";
import { createTempRoot, failingFs, removeTempRoot } from "./utilities.js";

const snapshot: SessionSnapshot = { sessionId: "s1", state: "running", interrupted: false, metadata: { temp: null } };
const started: SessionEntry = { type: "session_started", id: "e1", time: 2451545, sessionId: "s1" };

describe("EventLog", () => {
	let root: string;
	let dir: string;

	beforeEach(() => {
		root = createTempRoot();
		dir = join(root, "s1");
		mkdirSync(dir);
	});

	afterEach(() => {
		removeTempRoot(root);
	});

	it("opens the backends for a format", () => {
		expect(EventLog.open(root, "s1").format).toBe("line");
		expect(EventLog.open(root, "s1", "tree").format).toBe("tree");
		const both = EventLog.open(root, "s1", "both");
		expect(both.format).toBe("both");
		expect(both.files()).toEqual([join(dir, "s1.aop"), join(dir, "s1.aol"), join(dir, "s1.xml")]);
		expect(both.tree).toBeDefined();
		expect(EventLog.open(root, "s1").tree).toBeUndefined();
	});

	it("writes both documents and detects them", () => {
		expect(detectFormat(nodeSessionFs, dir, "s1")).toBeUndefined();
		const log = EventLog.open(root, "s1", "both");
		log.create(snapshot, started);
		expect(detectFormat(nodeSessionFs, dir, "s1")).toBe("both");
		expect(log.readRecords()).toEqual([{ id: "e1", time: 2451545, code: "SEEV", text: "SESSION s1 STARTED" }]);
		expect(log.tree?.readEntries()).toEqual([started]);
	});

	it("checks every file before creating any", () => {
		writeFileSync(join(dir, "s1.xml"), "<aop/>");
		expect(() => EventLog.open(root, "s1", "both").create(snapshot, started)).toThrow(AlreadyExistsError);
		expect(existsSync(join(dir, "s1.aop"))).toBe(false);
		expect(existsSync(join(dir, "s1.aol"))).toBe(false);
	});

	it("surfaces write failures as IOError", () => {
		const fs = failingFs((path) => path.endsWith(".tmp"));
		const log = EventLog.open(root, "s1", "line", fs);
		log.create(snapshot, started);
		const before = readFileSync(join(dir, "s1.aol"), "utf-8");

		fs.failWrites = true;
		expect(() => log.persist({ ...snapshot, state: "ended" })).toThrow(IOError);
		expect(readFileSync(join(dir, "s1.aol"), "utf-8")).toBe(before);
	});
});
