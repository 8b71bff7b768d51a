import { readdirSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	AlreadyExistsError,
	InvalidArgumentError,
	InvalidStateError,
	InvalidTimeFormatError,
	IOError,
	NotADirectoryError,
} from "../src/errors.js";
import { Session } from "../src/session/session.js";
import { createTempRoot, failingFs, manualClock, removeTempRoot, testIds } from "./utilities.js";

const SESSION_ID = "2024-03-01-20-00-00-0000000001";

function readSessionFiles(root: string, sessionId = SESSION_ID): Record<string, string> {
	const dir = join(root, sessionId);
	return Object.fromEntries(readdirSync(dir).map((name) => [name, readFileSync(join(dir, name), "utf-8")]));
}

describe("Session", () => {
	let root: string;
	let clock: ReturnType<typeof manualClock>;

	beforeEach(() => {
		root = createTempRoot();
		clock = manualClock("2024-03-01T20:00:00Z");
	});

	afterEach(() => {
		removeTempRoot(root);
	});

	function newSession(options: ConstructorParameters<typeof Session>[1] = {}): Session {
		return new Session(root, { ids: testIds(clock), ...options });
	}

	describe("construction", () => {
		it("requires an existing directory", () => {
			expect(() => new Session(join(root, "missing"))).toThrow(NotADirectoryError);
			writeFileSync(join(root, "file"), "");
			expect(() => new Session(join(root, "file"))).toThrow(NotADirectoryError);
		});

		it("starts out unstarted", () => {
			const session = newSession();
			expect(session.getState()).toBe("unstarted");
			expect(session.isStarted()).toBe(false);
			expect(session.getSessionId()).toBeUndefined();
			expect(session.getSessionDir()).toBeUndefined();
			expect(session.readRecords()).toEqual([]);
			expect(() => session.getSnapshot()).toThrow(InvalidStateError);
		});
	});

	describe("start", () => {
		it("creates the session directory and its documents", () => {
			const session = newSession({ metadata: { observer: "Jane Doe" } });
			const sessionId = session.start();

			expect(sessionId).toBe(SESSION_ID);
			expect(session.getState()).toBe("running");
			expect(session.getSessionDir()).toBe(join(root, SESSION_ID));
			const files = readSessionFiles(root);
			expect(Object.keys(files).sort()).toEqual([`${SESSION_ID}.aol`, `${SESSION_ID}.aop`]);
			expect(files[`${SESSION_ID}.aop`]).toBe(
				`sessionId: ${SESSION_ID}\nobserver: Jane Doe\nconditionDescription: null\ntemp: null\npressure: null\nhumidity: null\n\n` +
					`(20240301200000000000-${"2".padStart(30, "0")}) 2460371.3333333335 -> SEEV SESSION ${SESSION_ID} STARTED\n`,
			);
			expect(JSON.parse(files[`${SESSION_ID}.aol`])).toEqual({
				sessionId: SESSION_ID,
				state: "running",
				interrupted: false,
				observer: "Jane Doe",
				conditionDescription: null,
				temp: null,
				pressure: null,
				humidity: null,
			});
		});

		it("uses an explicit time for the first entry but not for the id", () => {
			const session = newSession();
			session.start("2024-03-01T22:30:00Z");
			expect(session.getSessionId()).toBe(SESSION_ID);
			expect(session.getEntries()[0].time).toBe(2460371.4375);
		});

		it("cannot start twice", () => {
			const session = newSession();
			session.start();
			expect(() => session.start()).toThrow("Not able to start session: session currently already started.");
		});

		it("fails with AlreadyExists when the session files are present and leaves them untouched", () => {
			const first = newSession();
			first.start();
			first.comment("first session");
			const before = readSessionFiles(root);

			const second = newSession();
			expect(() => second.start()).toThrow(AlreadyExistsError);
			expect(second.isStarted()).toBe(false);
			expect(readSessionFiles(root)).toEqual(before);
		});

		it("writes every format requested", () => {
			clock.set("2024-03-01T22:30:00Z");
			const session = newSession({ format: "both" });
			const sessionId = session.start();
			session.comment("Orion rising");

			expect(Object.keys(readSessionFiles(root, sessionId)).sort()).toEqual([
				`${sessionId}.aol`,
				`${sessionId}.aop`,
				`${sessionId}.xml`,
			]);
			expect(session.getEventLog()?.tree?.readEntries()).toEqual(session.getEntries());
		});
	});

	describe("lifecycle", () => {
		it("records interrupt, resume, interrupt again and end", () => {
			const session = newSession();
			session.start();
			session.interrupt();
			session.resume();
			session.interrupt();
			session.end();

			expect(session.getEntries().map((entry) => entry.type)).toEqual([
				"session_started",
				"session_interrupted",
				"session_resumed",
				"session_interrupted",
				"session_ended",
			]);
			expect(session.readRecords().map((record) => record.text)).toEqual([
				`SESSION ${SESSION_ID} STARTED`,
				"SESSION INTERRUPTED",
				"SESSION RESUMED",
				"SESSION INTERRUPTED",
				`SESSION ${SESSION_ID} ENDED`,
			]);
			expect(session.getState()).toBe("ended");
			expect(session.isInterrupted()).toBe(false);
			expect(session.getSnapshot()).toMatchObject({ state: "ended", interrupted: false });
		});

		it("aborts with a reason", () => {
			const session = newSession();
			session.start();
			session.abort("Clouds");
			expect(session.getState()).toBe("aborted");
			expect(session.readRecords()[1]).toMatchObject({ code: "SEEV", text: `Clouds: SESSION ${SESSION_ID} ABORTED` });
		});

		it("allows logging while interrupted", () => {
			const session = newSession();
			session.start();
			session.interrupt();
			session.comment("waiting for clouds to pass");
			expect(session.conditionReport({ description: "Overcast" })).toHaveLength(1);
			expect(session.isInterrupted()).toBe(true);
		});

		it.each<[string, (session: Session) => void, string]>([
			["interrupt before start", (s) => s.interrupt(), "Not able to interrupt session: session currently not started."],
			[
				"resume when not interrupted",
				(s) => {
					s.start();
					s.resume();
				},
				"Not able to resume session: session currently not interrupted.",
			],
			[
				"interrupt twice",
				(s) => {
					s.start();
					s.interrupt();
					s.interrupt();
				},
				"Not able to interrupt session: session currently interrupted.",
			],
			[
				"comment after end",
				(s) => {
					s.start();
					s.end();
					s.comment("late");
				},
				"Not able to comment: session currently ended.",
			],
			[
				"end after abort",
				(s) => {
					s.start();
					s.abort("wind");
					s.end();
				},
				"Not able to end session: session currently aborted.",
			],
			[
				"frame before start",
				(s) => s.takeFrame(1, "science", 800, 30, 5.6),
				"Not able to take frame: session currently not started.",
			],
		])("rejects %s", (_name, act, message) => {
			const session = newSession();
			expect(() => act(session)).toThrow(message);
			expect(() => act(session)).toThrow(InvalidStateError);
		});

		it("leaves no persisted trace when rejecting an operation", () => {
			const session = newSession();
			session.start();
			session.end();
			const before = readSessionFiles(root);

			expect(() => session.comment("late")).toThrow(InvalidStateError);
			expect(() => session.interrupt()).toThrow(InvalidStateError);
			expect(() => session.conditionReport({ temp: 3 })).toThrow(InvalidStateError);
			expect(() => session.updateMetadata({ observer: "someone" })).toThrow(InvalidStateError);
			expect(readSessionFiles(root)).toEqual(before);
			expect(session.getEntries()).toHaveLength(2);
		});
	});

	describe("observations", () => {
		let session: Session;

		beforeEach(() => {
			session = newSession();
			session.start();
		});

		it("logs comments at an explicit time", () => {
			const id = session.comment("Seeing\nimproves", "2024-03-01T22:30:00Z");
			expect(id).toMatch(/^20240301223000000000-[0-9a-f]{30}$/);
			expect(session.readRecords()[1]).toEqual({ id, time: 2460371.4375, code: "OBSC", text: "Seeing improves" });
		});

		it("rejects unparsable times without writing", () => {
			expect(() => session.comment("x", "after dinner")).toThrow(InvalidTimeFormatError);
			expect(session.readRecords()).toHaveLength(1);
		});

		it("resolves issue severity aliases", () => {
			session.issue("n", "Dew on the corrector");
			session.issue("MAJOR", "Mount stalled");
			expect(session.readRecords().slice(1).map((record) => record.text)).toEqual([
				"Normal Issue: Dew on the corrector",
				"Major Issue: Mount stalled",
			]);
			expect(() => session.issue("critical", "x")).toThrow(InvalidArgumentError);
		});

		it("points at named targets", () => {
			session.pointToName(["M42", "M43"]);
			expect(session.readRecords()[1].text).toBe("Pointing at target(s): M42, M43");
			expect(() => session.pointToName([])).toThrow(InvalidArgumentError);
			expect(() => session.pointToName(["  "])).toThrow(InvalidArgumentError);
		});

		it.each([
			[-0.1, 0],
			[24, 0],
			[12, -90.1],
			[12, 90.1],
			[Number.NaN, 0],
		])("rejects coordinates ra=%s dec=%s", (ra, dec) => {
			expect(() => session.pointToCoords(ra, dec)).toThrow(InvalidArgumentError);
		});

		it.each([
			[0, -90],
			[23.999, 90],
			[5.5, -5.39],
		])("accepts coordinates ra=%s dec=%s", (ra, dec) => {
			session.pointToCoords(ra, dec);
			expect(session.readRecords()[1].text).toBe(`Pointing at coordinates: R.A.: ${ra} Dec.: ${dec}`);
		});

		it.each([
			["science", "science"],
			["sc", "science"],
			["Dark Frame", "dark"],
			["ff", "flat"],
			["b", "bias"],
			["pf", "pointing"],
		])("takes frames of type %s", (alias, frameType) => {
			session.takeFrame(10, alias, 800, 30, 5.6);
			expect(session.getEntries()[1]).toMatchObject({ type: "frame", frameType, count: 10, iso: 800 });
			expect(session.readRecords()[1].text).toBe(
				`10 ${frameType} frame(s) taken with settings: Exp.t.: 30s, Ap.: f/5.6, ISO: 800`,
			);
		});

		it.each<[string, () => unknown, RegExp]>([
			["frame type", () => session.takeFrame(1, "twilight", 800, 30, 5.6), /Invalid frameType/],
			["frame count", () => session.takeFrame(0, "science", 800, 30, 5.6), /Invalid n/],
			["fractional ISO", () => session.takeFrame(1, "science", 800.5, 30, 5.6), /Invalid iso/],
			["exposure", () => session.takeFrame(1, "science", 800, -1, 5.6), /Invalid expTime/],
			["aperture", () => session.takeFrame(1, "science", 800, 30, 0), /Invalid aperture/],
		])("rejects a bad %s", (_name, act, message) => {
			expect(act).toThrow(message);
			expect(session.getEntries()).toHaveLength(1);
		});

		it("reports only the supplied condition fields", () => {
			const ids = session.conditionReport({ temp: 15.5, humidity: 60 });
			expect(ids).toHaveLength(2);
			expect(session.getEntries().slice(1)).toMatchObject([
				{ type: "condition_measurement", measurement: "temp", value: 15.5 },
				{ type: "condition_measurement", measurement: "humidity", value: 60 },
			]);
			expect(session.getMetadata()).toMatchObject({ conditionDescription: null, temp: 15.5, pressure: null, humidity: 60 });
			expect(JSON.parse(readSessionFiles(root)[`${SESSION_ID}.aol`])).toMatchObject({ temp: 15.5, humidity: 60 });
		});

		it("writes description before measurements", () => {
			session.conditionReport({ pressure: 1013, description: "Clear, light wind" });
			expect(session.readRecords().slice(1).map((record) => `${record.code} ${record.text}`)).toEqual([
				"CDES Clear, light wind",
				"CMES Air Pressure: 1013 hPa",
			]);
		});

		it("does nothing for an empty condition report", () => {
			expect(session.conditionReport({})).toEqual([]);
			expect(session.conditionReport({ temp: null, description: null })).toEqual([]);
			expect(session.getEntries()).toHaveLength(1);
		});

		it("logs variable star observations", () => {
			session.variableStarObservation({ starId: "SS Cyg", chartId: "X12345", magnitude: 11.2, comp1: "110", codes: [] });
			session.variableStarObservation({
				starId: "R Leo",
				chartId: "X1",
				magnitude: 6,
				comp1: "60",
				comp2: "64",
				codes: ["B"],
			});
			expect(session.getEntries()[1]).toEqual({
				type: "variable_star_observation",
				id: expect.any(String),
				time: 2460371.3333333335,
				starId: "SS Cyg",
				chartId: "X12345",
				magnitude: 11.2,
				comp1: "110",
			});
			expect(session.readRecords()[2].text).toBe("R Leo mag. 6 (comp. 60, 64; chart X1, codes: B)");
			expect(() =>
				session.variableStarObservation({ starId: "", chartId: "X1", magnitude: 6, comp1: "60" }),
			).toThrow(/Invalid starId/);
		});

		it("updates metadata without appending an entry", () => {
			session.updateMetadata({ target: "M42", seeing: 3 });
			expect(session.getEntries()).toHaveLength(1);
			expect(JSON.parse(readSessionFiles(root)[`${SESSION_ID}.aol`])).toMatchObject({ target: "M42", seeing: 3 });
			expect(() => session.updateMetadata({ interrupted: true })).toThrow(InvalidArgumentError);
			expect(session.getMetadata().target).toBe("M42");
		});
	});

	describe("write failures", () => {
		it("surfaces IOError and keeps the in-memory state", () => {
			const fs = failingFs();
			const session = newSession({ fs });
			session.start();

			fs.failWrites = true;
			expect(() => session.interrupt()).toThrow(IOError);
			expect(session.isInterrupted()).toBe(false);
			expect(session.getEntries()).toHaveLength(1);
			expect(() => session.conditionReport({ temp: 2 })).toThrow(IOError);
			expect(session.getMetadata().temp).toBeNull();

			fs.failWrites = false;
			session.interrupt();
			expect(session.isInterrupted()).toBe(true);
		});
	});
});
