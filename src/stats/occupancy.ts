import { flattenComputers, flattenSessions } from "../cluster/cluster";
import { hasActiveSession } from "../cluster/computer";
import { isOpen, sessionDurationMs } from "../cluster/session";
import type { Cluster, ClusterSummary, Computer, WeekdayWeekendProfile, WeeklyConcurrency } from "../types";
import { roundTo } from "../utils";
import { BUCKET_LABELS } from "./concurrency";
import { usagePercentage } from "./window";

/** Computers with a session active at `at`. */
export const occupancyAt = (cluster: Cluster, at: number): readonly Computer[] =>
	flattenComputers(cluster).filter((c) => hasActiveSession(c, at));

/** Highest per-computer usage percentage, used as the scale of a usage heatmap. */
export const maxUsagePercentage = (cluster: Cluster, windowMs: number, now: number): number =>
	flattenComputers(cluster).reduce((max, c) => Math.max(max, usagePercentage(c, windowMs, now)), 0);

const WORKDAYS = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday"] as const;
const WEEKEND = ["Saturday", "Sunday"] as const;

const meanGraph = (graphs: readonly Readonly<Record<string, number>>[]): Record<string, number> =>
	Object.fromEntries(
		BUCKET_LABELS.map((label) => {
			const values = graphs.map((g) => g[label] ?? 0);
			return [label, values.length === 0 ? 0 : roundTo(values.reduce((a, b) => a + b, 0) / values.length, 2)];
		}),
	);

/** Per-bucket mean of the Monday–Friday and Saturday–Sunday profiles. Days without data count as zero. */
export const compareWeekdayWeekend = (profile: WeeklyConcurrency): WeekdayWeekendProfile => ({
	weekday: meanGraph(WORKDAYS.map((d) => profile[d])),
	weekend: meanGraph(WEEKEND.map((d) => profile[d])),
});

export const summarizeCluster = (cluster: Cluster, now: number): ClusterSummary => {
	const sessions = flattenSessions(cluster);
	if (sessions.length === 0) {
		return {
			total_sessions: 0,
			unique_hosts: 0,
			open_sessions: 0,
			average_session_seconds: null,
			total_usage_hours: 0,
		};
	}

	const totalMs = sessions.reduce((acc, s) => acc + sessionDurationMs(s, now), 0);

	return {
		total_sessions: sessions.length,
		unique_hosts: new Set(sessions.map((s) => s.host)).size,
		open_sessions: sessions.filter(isOpen).length,
		average_session_seconds: Math.round(totalMs / sessions.length / 1000),
		total_usage_hours: roundTo(totalMs / 3_600_000, 2),
		first_start_ms: sessions.reduce((min, s) => Math.min(min, s.start_ms), Number.POSITIVE_INFINITY),
		last_start_ms: sessions.reduce((max, s) => Math.max(max, s.start_ms), Number.NEGATIVE_INFINITY),
	};
};
