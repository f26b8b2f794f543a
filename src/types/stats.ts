// Weekday names, Monday first
export const WEEKDAY_VALUES = [
	"Monday",
	"Tuesday",
	"Wednesday",
	"Thursday",
	"Friday",
	"Saturday",
	"Sunday",
] as const;

export type Weekday = (typeof WEEKDAY_VALUES)[number];

export const WINDOW_VALUES = ["1d", "7d", "30d", "all_time"] as const;

export type WindowName = (typeof WINDOW_VALUES)[number];

export interface WindowStats {
	readonly session_count: number;
	readonly usage_percentage: number;
	/** Whole seconds; null when no session qualifies. */
	readonly average_session_duration: number | null;
}

export type ComputerWindowStats = Readonly<Record<WindowName, WindowStats>>;

export interface SessionCount {
	readonly session_count: number;
	readonly usage_seconds: number;
}

export interface WeekdayTotals {
	readonly total: SessionCount;
	readonly average: SessionCount;
}

/** "HH:MM" bucket label → average concurrent sessions. */
export type ConcurrencyGraph = Readonly<Record<string, number>>;

export type WeeklyConcurrency = Readonly<Record<Weekday, ConcurrencyGraph>>;

export interface WeekdayWeekendProfile {
	readonly weekday: Readonly<Record<string, number>>;
	readonly weekend: Readonly<Record<string, number>>;
}

export interface ClusterSummary {
	readonly total_sessions: number;
	readonly unique_hosts: number;
	readonly open_sessions: number;
	readonly average_session_seconds: number | null;
	readonly total_usage_hours: number;
	readonly first_start_ms?: number;
	readonly last_start_ms?: number;
}
