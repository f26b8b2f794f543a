import { earliestStart, flattenSessions, listComputers, listRows, listZones } from "../cluster/cluster";
import { totalUsageSeconds } from "../cluster/computer";
import { sessionDurationMs } from "../cluster/session";
import type { Cluster, ClusterReport, Computer, ComputerReport, Session, SessionReport } from "../types";
import { mapWeekdays } from "./calendar";
import { computeComputerStats } from "./computer-stats";
import { computeWeeklyConcurrency } from "./concurrency";
import { computeWeekdayTotals } from "./weekday";

export interface ReportOptions {
	readonly now: number;
	readonly timeZone: string;
	/** Defaults to the earliest session start in the cluster. */
	readonly observedSince?: number;
}

export const toSessionReport = (session: Session, now: number): SessionReport => ({
	host: session.host,
	start_time: new Date(session.start_ms).toISOString(),
	end_time: session.end_ms === undefined ? null : new Date(session.end_ms).toISOString(),
	duration: Math.round(sessionDurationMs(session, now) / 1000),
});

const toComputerReport = (computer: Computer, now: number, observedSince?: number): ComputerReport => {
	const stats = computeComputerStats(computer, now, { observedSince });
	return {
		name: computer.name,
		position: computer.position,
		sessions: computer.sessions.map((s) => toSessionReport(s, now)),
		"1d_stats": stats["1d"],
		"7d_stats": stats["7d"],
		"30d_stats": stats["30d"],
		all_time_stats: stats.all_time,
		total_usage_seconds: totalUsageSeconds(computer, now),
	};
};

/** Full statistics document for renderers: per-computer stats plus the weekly profile. */
export const buildClusterReport = (cluster: Cluster, options: ReportOptions): ClusterReport => {
	const { now, timeZone } = options;
	const observedSince = options.observedSince ?? earliestStart(flattenSessions(cluster));
	const totals = computeWeekdayTotals(cluster, now, timeZone);
	const graphs = computeWeeklyConcurrency(cluster, now, timeZone);

	return {
		zones: listZones(cluster).map((zone) => ({
			zone_name: zone.zone_id,
			rows: listRows(zone).map((row) => ({
				row_number: row.row_number,
				computers: listComputers(row).map((c) => toComputerReport(c, now, observedSince)),
			})),
		})),
		weeks_stats: mapWeekdays((day) => ({ ...totals[day], sessions_graph: graphs[day] })),
		last_update: new Date(now).toISOString(),
		time_zone: timeZone,
	};
};
