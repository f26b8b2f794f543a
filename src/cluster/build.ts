import { z } from "zod";
import type { BuildResult, Cluster, IngestWarning } from "../types";
import { addSession, refineSessionEnd } from "./computer";
import { createCluster, ensureComputer } from "./cluster";
import { parseHost } from "./host";
import { createSession, normalizeEnd } from "./session";

const isInstant = (t: number): boolean => Number.isInteger(t) && !Number.isNaN(new Date(t).getTime());

/**
 * Record schema. Anything failing it is a schema violation and is dropped
 * without a warning. An end that is not a representable instant is read as
 * "no end".
 */
export const RawSessionRecordSchema = z.object({
	host: z.string(),
	start_time: z
		.number()
		.int()
		.refine((t) => t !== 0, "start_time must not be the epoch")
		.refine(isInstant, "start_time is outside the representable date range"),
	end_time: z
		.unknown()
		.optional()
		.transform((v) => (typeof v === "number" && isInstant(v) ? normalizeEnd(v) : undefined)),
});

export interface BuildOptions {
	/** Close an accepted open session when a later record repeats its host and start with an end. */
	readonly refineOpenSessions?: boolean;
}

type Counters = {
	accepted: number;
	refined: number;
	schema: number;
	host: number;
	interval: number;
	overlap: number;
};

/**
 * Build a cluster from raw records in one pass. Malformed and conflicting
 * records are skipped and reported through `warnings`; nothing here throws on
 * bad data.
 */
export const buildCluster = (
	records: readonly unknown[],
	options: BuildOptions = {},
): BuildResult => {
	const cluster: Cluster = createCluster();
	const warnings: IngestWarning[] = [];
	const counters: Counters = { accepted: 0, refined: 0, schema: 0, host: 0, interval: 0, overlap: 0 };

	for (const raw of records) {
		const parsed = RawSessionRecordSchema.safeParse(raw);
		if (!parsed.success) {
			counters.schema += 1;
			continue;
		}
		const { host, start_time, end_time } = parsed.data;

		const address = parseHost(host);
		if (!address.ok) {
			counters.host += 1;
			warnings.push({ kind: "unparseable_host", host, reason: address.reason });
			continue;
		}

		if (end_time !== undefined && end_time < start_time) {
			counters.interval += 1;
			warnings.push({ kind: "invalid_interval", host, start_ms: start_time, end_ms: end_time });
			continue;
		}

		const computer = ensureComputer(cluster, address.address);

		if (options.refineOpenSessions && end_time !== undefined) {
			const open = computer.sessions.find((s) => s.start_ms === start_time && s.end_ms === undefined);
			if (open) {
				const refined = refineSessionEnd(computer, start_time, end_time);
				if (refined.ok) {
					counters.refined += 1;
					continue;
				}
				if (refined.reason === "overlap") {
					counters.overlap += 1;
					warnings.push({
						kind: "overlap",
						host,
						existing: refined.conflict,
						rejected: createSession(host, start_time, end_time),
					});
					continue;
				}
			}
		}

		const session = createSession(host, start_time, end_time);
		const result = addSession(computer, session);
		if (result.ok) {
			counters.accepted += 1;
		} else {
			counters.overlap += 1;
			warnings.push({ kind: "overlap", host, existing: result.conflict, rejected: session });
		}
	}

	return {
		cluster,
		warnings,
		accepted: counters.accepted,
		refined: counters.refined,
		skipped: {
			schema: counters.schema,
			host: counters.host,
			interval: counters.interval,
			overlap: counters.overlap,
		},
	};
};
