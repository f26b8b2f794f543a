import { buildCluster } from "../cluster/build";
import { describeSession } from "../cluster/session";
import type { Config } from "../config";
import { fetchSessions } from "../feed/fetch";
import { readSessionFile } from "../feed/read";
import type { BuildResult, IngestWarning } from "../types";

export type Flags = {
	readonly json: boolean;
	readonly help: boolean;
	readonly version: boolean;
	readonly quiet: boolean;
	readonly refine: boolean;
};

// ANSI color helpers
export const dim = (s: string) => `\x1b[2m${s}\x1b[0m`;
export const bold = (s: string) => `\x1b[1m${s}\x1b[0m`;
export const red = (s: string) => `\x1b[31m${s}\x1b[0m`;
export const green = (s: string) => `\x1b[32m${s}\x1b[0m`;
export const yellow = (s: string) => `\x1b[33m${s}\x1b[0m`;
export const cyan = (s: string) => `\x1b[36m${s}\x1b[0m`;

export const formatWarning = (warning: IngestWarning): string => {
	switch (warning.kind) {
		case "unparseable_host":
			return `Skipping host with unexpected format (${warning.reason}): ${warning.host}`;
		case "invalid_interval":
			return `Skipping session on ${warning.host} ending before it starts (${new Date(warning.start_ms).toISOString()} > ${new Date(warning.end_ms).toISOString()})`;
		case "overlap":
			return `Overlapping sessions on ${warning.host}: kept ${describeSession(warning.existing)}, rejected ${describeSession(warning.rejected)}`;
	}
};

/** Load records from the configured source and build the cluster, reporting warnings on stderr. */
export const loadCluster = async (config: Config): Promise<BuildResult> => {
	if (config.input && config.url) {
		throw new Error("Use either --input or --url, not both.");
	}
	const records = config.input
		? readSessionFile(config.input)
		: config.url
			? await fetchSessions(config.url)
			: undefined;
	if (!records) {
		throw new Error("No session source. Pass --input <file> or --url <url> (or set CLUSTERSTAT_INPUT / CLUSTERSTAT_URL).");
	}

	const result = buildCluster(records, { refineOpenSessions: config.refineOpenSessions });
	if (!config.quiet) {
		result.warnings.forEach((w) => console.error(yellow(`Warning: ${formatWarning(w)}`)));
		const { schema } = result.skipped;
		if (schema > 0) console.error(dim(`${schema} malformed record(s) ignored.`));
	}
	return result;
};
