/**
 * Human-readable rendering of entries: the `<CODE> <text>` part of a protocol line.
 */

import type { EntryCode, LogRecord, Measurement, SessionEntry } from "./types.js";

const MEASUREMENT_TEXT: Record<Measurement, (value: number) => string> = {
	temp: (value) => `Temperature: ${value}°C`,
	pressure: (value) => `Air Pressure: ${value} hPa`,
	humidity: (value) => `Air Humidity: ${value}%`,
};

/** Protocol lines are one per entry; embedded line breaks become spaces. */
export function foldLineBreaks(text: string): string {
	return text.replace(/\r\n|\r|\n/g, " ");
}

export function renderEntry(entry: SessionEntry): { code: EntryCode; text: string } {
	switch (entry.type) {
		case "session_started":
			return { code: "SEEV", text: `SESSION ${entry.sessionId} STARTED` };
		case "session_interrupted":
			return { code: "SEEV", text: "SESSION INTERRUPTED" };
		case "session_resumed":
			return { code: "SEEV", text: "SESSION RESUMED" };
		case "session_aborted":
			return { code: "SEEV", text: `${entry.reason}: SESSION ${entry.sessionId} ABORTED` };
		case "session_ended":
			return { code: "SEEV", text: `SESSION ${entry.sessionId} ENDED` };
		case "comment":
			return { code: "OBSC", text: entry.text };
		case "issue": {
			const severity = entry.severity.charAt(0).toUpperCase() + entry.severity.slice(1);
			return { code: "ISSU", text: `${severity} Issue: ${entry.message}` };
		}
		case "pointing":
			if ("targets" in entry) {
				return { code: "POIN", text: `Pointing at target(s): ${entry.targets.join(", ")}` };
			}
			return { code: "POIN", text: `Pointing at coordinates: R.A.: ${entry.ra} Dec.: ${entry.dec}` };
		case "frame":
			return {
				code: "FRAM",
				text:
					`${entry.count} ${entry.frameType} frame(s) taken with settings: ` +
					`Exp.t.: ${entry.exposureTime}s, Ap.: f/${entry.aperture}, ISO: ${entry.iso}`,
			};
		case "condition_description":
			return { code: "CDES", text: entry.description };
		case "condition_measurement":
			return { code: "CMES", text: MEASUREMENT_TEXT[entry.measurement](entry.value) };
		case "variable_star_observation": {
			const comps = entry.comp2 ? `${entry.comp1}, ${entry.comp2}` : entry.comp1;
			const codes = entry.codes?.length ? `, codes: ${entry.codes.join(" ")}` : "";
			return {
				code: "VSOB",
				text: `${entry.starId} mag. ${entry.magnitude} (comp. ${comps}; chart ${entry.chartId}${codes})`,
			};
		}
	}
}

export function toRecord(entry: SessionEntry): LogRecord {
	const { code, text } = renderEntry(entry);
	return { id: entry.id, time: entry.time, code, text: foldLineBreaks(text) };
}
