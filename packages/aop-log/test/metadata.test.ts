import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../src/errors.js";
import { MetadataStore } from "../src/metadata.js";

describe("MetadataStore", () => {
	it("starts with the condition fields empty", () => {
		expect(new MetadataStore().snapshot()).toEqual({
			conditionDescription: null,
			temp: null,
			pressure: null,
			humidity: null,
		});
	});

	it("orders known fields first, then extensions by key", () => {
		const store = new MetadataStore({ zeta: 1, observer: "Jane Doe", alpha: "x", name: "M42 night" });
		expect(Object.keys(store.snapshot())).toEqual([
			"name",
			"observer",
			"conditionDescription",
			"temp",
			"pressure",
			"humidity",
			"alpha",
			"zeta",
		]);
	});

	it("type-checks known fields", () => {
		const store = new MetadataStore();
		expect(() => store.set("longitude", "east")).toThrow(InvalidArgumentError);
		expect(() => store.set("listOfGear", "telescope")).toThrow(/listOfGear/);
		expect(() => MetadataStore.loadFrom({ digitized: "yes" })).toThrow(InvalidArgumentError);
	});

	it("accepts any scalar or list in extension fields", () => {
		const store = new MetadataStore({ seeing: 3, moon: false, filters: ["L", "R"], note: null });
		expect(store.get("filters")).toEqual(["L", "R"]);
		expect(store.get("moon")).toBe(false);
	});

	it("refuses lifecycle keys", () => {
		expect(() => new MetadataStore({ state: "ended" })).toThrow(/managed by the session/);
		expect(() => new MetadataStore().set("sessionId", "x")).toThrow(InvalidArgumentError);
	});

	it("refuses keys a snapshot object could not hold", () => {
		const store = new MetadataStore();
		expect(() => store.set("__proto__", "x")).toThrow(InvalidArgumentError);
		expect(store.has("__proto__")).toBe(false);
		store.set("constructor", "x");
		expect(Object.entries(store.snapshot())).toContainEqual(["constructor", "x"]);
	});

	it("resets condition fields to null on delete", () => {
		const store = new MetadataStore({ temp: 12, target: "M42" });
		expect(store.delete("temp")).toBe(true);
		expect(store.get("temp")).toBeNull();
		expect(store.delete("target")).toBe(true);
		expect(store.has("target")).toBe(false);
	});

	it("hands out copies", () => {
		const store = new MetadataStore({ listOfGear: ["8in Dobsonian"] });
		const snapshot = store.snapshot();
		const gear = snapshot.listOfGear;
		if (Array.isArray(gear)) gear.push("changed");
		expect(store.get("listOfGear")).toEqual(["8in Dobsonian"]);

		const copy = store.clone();
		copy.set("observer", "someone else");
		expect(store.has("observer")).toBe(false);
	});

	it("restores from a snapshot, skipping lifecycle keys", () => {
		const store = MetadataStore.loadFrom({
			sessionId: "2024-03-01-20-00-00-0000000001",
			state: "running",
			interrupted: false,
			observer: "Jane Doe",
			temp: 4.5,
			seeing: 2,
		});
		expect(store.snapshot()).toEqual({
			observer: "Jane Doe",
			conditionDescription: null,
			temp: 4.5,
			pressure: null,
			humidity: null,
			seeing: 2,
		});
	});

	it("rejects snapshots that are not objects or carry wrong types", () => {
		expect(() => MetadataStore.loadFrom([1, 2])).toThrow(InvalidArgumentError);
		expect(() => MetadataStore.loadFrom({ latitude: "north" })).toThrow(InvalidArgumentError);
	});
});
