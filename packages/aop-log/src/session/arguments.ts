/**
 * Argument schemas for session operations. Callers outside TypeScript (the CLI,
 * JSON input) can hand over anything, so every operation re-checks its arguments.
 */

import { z } from "zod";
import { InvalidArgumentError } from "../errors.js";
import type { FrameType, IssueSeverity } from "../event-log/types.js";

const SEVERITY_ALIASES = new Map<string, IssueSeverity>([
	["potential", "potential"],
	["p", "potential"],
	["normal", "normal"],
	["n", "normal"],
	["major", "major"],
	["m", "major"],
]);

const FRAME_TYPE_ALIASES = new Map<string, FrameType>([
	["science", "science"],
	["science frame", "science"],
	["s", "science"],
	["sc", "science"],
	["dark", "dark"],
	["dark frame", "dark"],
	["d", "dark"],
	["df", "dark"],
	["flat", "flat"],
	["flat frame", "flat"],
	["f", "flat"],
	["ff", "flat"],
	["bias", "bias"],
	["bias frame", "bias"],
	["b", "bias"],
	["bf", "bias"],
	["pointing", "pointing"],
	["pointing frame", "pointing"],
	["p", "pointing"],
	["pf", "pointing"],
]);

function aliasSchema<T>(aliases: Map<string, T>, label: string, canonical: string[]) {
	return z.string({ invalid_type_error: `${label} must be a string` }).transform((value, ctx) => {
		const resolved = aliases.get(value.trim().toLowerCase());
		if (resolved === undefined) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `invalid ${label} "${value}", expected one of ${canonical.join(", ")}`,
			});
			return z.NEVER;
		}
		return resolved;
	});
}

export const severitySchema = aliasSchema(SEVERITY_ALIASES, "issue severity", ["potential", "normal", "major"]);

export const frameTypeSchema = aliasSchema(FRAME_TYPE_ALIASES, "frame type", [
	"science",
	"dark",
	"flat",
	"bias",
	"pointing",
]);

const finite = (label: string) => z.number({ invalid_type_error: `${label} must be a number` }).finite();

export const raSchema = finite("R.A.")
	.min(0, "R.A. must be >= 0h")
	.lt(24, "R.A. must be < 24h; convert degrees to hours by dividing by 15");

export const decSchema = finite("Dec.").min(-90, "Dec. must be >= -90°").max(90, "Dec. must be <= 90°");

export const targetsSchema = z
	.array(z.string().trim().min(1, "target names must not be empty"), {
		invalid_type_error: "targets must be a list, even for a single target",
	})
	.min(1, "at least one target is required");

export const frameCountSchema = finite("frame count").int("frame count must be an integer").positive();
export const isoSchema = finite("ISO").int("ISO must be an integer").positive();
export const exposureTimeSchema = finite("exposure time").nonnegative();
export const apertureSchema = finite("aperture").positive();
export const measurementSchema = finite("measurement");
export const magnitudeSchema = finite("magnitude");

export const textSchema = z.string({ invalid_type_error: "expected a string" });
export const labelSchema = textSchema.trim().min(1, "must not be empty");
export const codesSchema = z.array(labelSchema).optional();

/**
 * Parse one argument against its schema.
 * @throws InvalidArgumentError naming the argument and the first failed check
 */
export function parseArgument<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, name: string): T {
	const result = schema.safeParse(value);
	if (!result.success) {
		const reason = result.error.issues[0]?.message ?? "invalid value";
		throw new InvalidArgumentError(`Invalid ${name}: ${reason}`, name);
	}
	return result.data;
}
