import { flattenComputers } from "../cluster/cluster";
import type { Config } from "../config";
import { computeWindowStats } from "../stats/computer-stats";
import { summarizeCluster } from "../stats/occupancy";
import { formatDuration } from "../utils";
import { colorUsage, fmtInstant, fmtSeconds } from "./format-helpers";
import { bold, dim, loadCluster } from "./shared";

const windowLabel = (windowMs: number): string => (windowMs === 0 ? "all time" : formatDuration(windowMs));

export const summaryCommand = async (args: { config: Config; json: boolean }): Promise<void> => {
	const { config } = args;
	const { cluster } = await loadCluster(config);
	const rows = flattenComputers(cluster).map((c) => ({
		name: c.name,
		...computeWindowStats(c, config.windowMs, config.now),
	}));
	const summary = summarizeCluster(cluster, config.now);

	if (args.json) {
		console.log(JSON.stringify({ window_ms: config.windowMs, computers: rows, summary }, null, 2));
		return;
	}

	if (rows.length === 0) {
		console.log("No sessions found.");
		return;
	}

	console.log(bold(`Usage over ${windowLabel(config.windowMs)}`));
	console.log(bold("Computer".padEnd(14) + "Sessions".padEnd(10) + "Usage".padEnd(10) + "Avg session"));
	console.log(dim("─".repeat(46)));
	console.log(
		rows
			.map(
				(r) =>
					`${r.name.padEnd(14)}${String(r.session_count).padEnd(10)}${colorUsage(r.usage_percentage).padEnd(19)}${fmtSeconds(r.average_session_duration)}`,
			)
			.join("\n"),
	);

	const range =
		summary.first_start_ms !== undefined && summary.last_start_ms !== undefined
			? `${fmtInstant(summary.first_start_ms, config.timeZone)} to ${fmtInstant(summary.last_start_ms, config.timeZone)}`
			: "-";
	console.log(
		dim(
			`\n${summary.total_sessions} session(s) on ${summary.unique_hosts} computer(s), ${summary.open_sessions} open, ` +
				`avg ${fmtSeconds(summary.average_session_seconds)}, ${summary.total_usage_hours}h total, starts ${range}`,
		),
	);
};
