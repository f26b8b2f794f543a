import type { ComputerWindowStats, ConcurrencyGraph, Weekday, WeekdayTotals } from "./stats";

export interface SessionReport {
	readonly host: string;
	readonly start_time: string;
	readonly end_time: string | null;
	/** Whole seconds, open sessions measured to the report instant. */
	readonly duration: number;
}

export interface ComputerReport {
	readonly name: string;
	readonly position: number;
	readonly sessions: readonly SessionReport[];
	readonly "1d_stats": ComputerWindowStats["1d"];
	readonly "7d_stats": ComputerWindowStats["7d"];
	readonly "30d_stats": ComputerWindowStats["30d"];
	readonly all_time_stats: ComputerWindowStats["all_time"];
	readonly total_usage_seconds: number;
}

export interface RowReport {
	readonly row_number: number;
	readonly computers: readonly ComputerReport[];
}

export interface ZoneReport {
	readonly zone_name: string;
	readonly rows: readonly RowReport[];
}

export interface WeekdayReport extends WeekdayTotals {
	readonly sessions_graph: ConcurrencyGraph;
}

export interface ClusterReport {
	readonly zones: readonly ZoneReport[];
	readonly weeks_stats: Readonly<Record<Weekday, WeekdayReport>>;
	readonly last_update: string;
	readonly time_zone: string;
}
