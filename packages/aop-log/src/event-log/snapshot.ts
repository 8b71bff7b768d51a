import { z } from "zod";
import { type MetadataValue, metadataValueSchema } from "../metadata.js";
import type { SessionSnapshot } from "./types.js";

/**
 * Flat snapshot as written to `<id>.aol`: lifecycle keys first, then metadata.
 * Unknown keys are metadata extensions and must hold metadata values.
 */
export const flatSnapshotSchema = z
	.object({
		sessionId: z.string().min(1),
		state: z.enum(["running", "aborted", "ended"]),
		interrupted: z.boolean(),
	})
	.catchall(metadataValueSchema)
	.transform(
		({ sessionId, state, interrupted, ...metadata }): SessionSnapshot => ({
			sessionId,
			state,
			interrupted,
			metadata,
		}),
	);

export function flattenSnapshot(snapshot: SessionSnapshot): Record<string, MetadataValue> {
	return {
		sessionId: snapshot.sessionId,
		state: snapshot.state,
		interrupted: snapshot.interrupted,
		...snapshot.metadata,
	};
}
