import type { Computer, ComputerWindowStats, Row, WindowName, WindowStats } from "../types";
import { DAY_MS } from "./calendar";
import { ALL_TIME, averageSessionDuration, sessionCount, usagePercentage } from "./window";

export const WINDOW_MS: Readonly<Record<WindowName, number>> = {
	"1d": DAY_MS,
	"7d": 7 * DAY_MS,
	"30d": 30 * DAY_MS,
	all_time: ALL_TIME,
};

export interface ComputerStatsOptions {
	/**
	 * Earliest start across the whole dataset. When set, trailing windows longer
	 * than the observed span shrink to it.
	 */
	readonly observedSince?: number;
}

/** Trailing window actually evaluated for `name`, after clamping to the observed span. */
export const effectiveWindow = (name: WindowName, now: number, observedSince?: number): number => {
	const windowMs = WINDOW_MS[name];
	if (windowMs === ALL_TIME || observedSince === undefined) return windowMs;
	const observedMs = now - observedSince;
	return observedMs > 0 && observedMs < windowMs ? observedMs : windowMs;
};

export const computeWindowStats = (computer: Computer, windowMs: number, now: number): WindowStats => ({
	session_count: sessionCount(computer, windowMs, now),
	usage_percentage: usagePercentage(computer, windowMs, now),
	average_session_duration: averageSessionDuration(computer, windowMs, now) ?? null,
});

export const computeComputerStats = (
	computer: Computer,
	now: number,
	options: ComputerStatsOptions = {},
): ComputerWindowStats => {
	const stats = (name: WindowName) =>
		computeWindowStats(computer, effectiveWindow(name, now, options.observedSince), now);
	return {
		"1d": stats("1d"),
		"7d": stats("7d"),
		"30d": stats("30d"),
		all_time: stats("all_time"),
	};
};

/** Usage percentage per position in a row. */
export const rowUsage = (row: Row, windowMs: number, now: number): ReadonlyMap<number, number> =>
	new Map([...row.computers].map(([position, computer]) => [position, usagePercentage(computer, windowMs, now)]));
