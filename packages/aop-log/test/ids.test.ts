import { describe, expect, it } from "vitest";
import { DEFAULT_ENTRY_ID_DIGITS, IdGenerator } from "../src/ids.js";
import { InvalidTimeFormatError } from "../src/errors.js";
import { manualClock, sequentialHex } from "./utilities.js";

describe("IdGenerator", () => {
	it("builds session ids from the clock at second resolution", () => {
		const ids = new IdGenerator({ clock: manualClock("2024-03-01T20:00:00.5Z"), randomHex: sequentialHex() });
		expect(ids.newSessionId()).toBe("2024-03-01-20-00-00-0000000001");
	});

	it("builds entry ids at microsecond resolution", () => {
		const ids = new IdGenerator({ clock: manualClock("2024-03-01T20:00:00.000042Z"), randomHex: sequentialHex() });
		expect(ids.newEntryId()).toBe(`20240301200000000042-${"1".padStart(30, "0")}`);
	});

	it("stamps entry ids with an explicit time", () => {
		const ids = new IdGenerator({ clock: manualClock("2024-03-01T20:00:00Z"), randomHex: sequentialHex() });
		expect(ids.newEntryId("2023-12-31T23:59:59.999999Z")).toMatch(/^20231231235959999999-0{29}1$/);
	});

	it("rejects unparsable times", () => {
		const ids = new IdGenerator();
		expect(() => ids.newEntryId("tonight")).toThrow(InvalidTimeFormatError);
	});

	it("honours configured suffix lengths", () => {
		const ids = new IdGenerator({ sessionIdDigits: 4, entryIdDigits: 6 });
		expect(ids.newSessionId()).toMatch(/^\d{4}-\d{2}-\d{2}-\d{2}-\d{2}-\d{2}-[0-9a-f]{4}$/);
		expect(ids.newEntryId()).toMatch(/^\d{20}-[0-9a-f]{6}$/);
	});

	it("redraws a suffix it has already issued", () => {
		const draws = ["aaaa", "aaaa", "bbbb"];
		let i = 0;
		const ids = new IdGenerator({
			clock: manualClock("2024-03-01T20:00:00Z"),
			sessionIdDigits: 4,
			randomHex: () => draws[i++ % draws.length],
		});
		expect(ids.newSessionId()).toBe("2024-03-01-20-00-00-aaaa");
		expect(ids.newSessionId()).toBe("2024-03-01-20-00-00-bbbb");
	});

	it("issues 10000 distinct entry ids within the same microsecond", () => {
		const ids = new IdGenerator({ clock: manualClock("2024-03-01T20:00:00Z") });
		const seen = new Set<string>();
		for (let n = 0; n < 10_000; n++) {
			seen.add(ids.newEntryId());
		}
		expect(seen.size).toBe(10_000);
		expect(DEFAULT_ENTRY_ID_DIGITS).toBe(30);
	});

	it("issues 10000 distinct session ids within the same second", () => {
		const ids = new IdGenerator({ clock: manualClock("2024-03-01T20:00:00Z") });
		const seen = new Set<string>();
		for (let n = 0; n < 10_000; n++) {
			seen.add(ids.newSessionId());
		}
		expect(seen.size).toBe(10_000);
		expect([...seen].every((id) => id.startsWith("2024-03-01-20-00-00-"))).toBe(true);
	});

	it("forgets drawn suffixes once the timestamp moves on", () => {
		const clock = manualClock("2024-03-01T20:00:00Z");
		const ids = new IdGenerator({ clock, sessionIdDigits: 4, randomHex: () => "aaaa" });
		expect(ids.newSessionId()).toBe("2024-03-01-20-00-00-aaaa");
		clock.set("2024-03-01T20:00:01Z");
		expect(ids.newSessionId()).toBe("2024-03-01-20-00-01-aaaa");
		expect(ids.newSessionId()).toMatch(/^2024-03-01-20-00-01-(?!aaaa)[0-9a-f]{4}$/);
	});
});
