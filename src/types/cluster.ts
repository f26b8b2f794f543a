export interface HostAddress {
	readonly zone: string;
	readonly row: number;
	readonly position: number;
}

/**
 * One occupancy interval on a host. `end_ms` is undefined while the session is
 * open, and is the only field refined after creation.
 */
export interface Session {
	readonly host: string;
	readonly start_ms: number;
	end_ms: number | undefined;
}

export interface Computer extends HostAddress {
	readonly name: string;
	/** Arrival order; pairwise non-overlapping. */
	readonly sessions: Session[];
}

export interface Row {
	readonly row_number: number;
	readonly computers: Map<number, Computer>;
}

export interface Zone {
	readonly zone_id: string;
	readonly rows: Map<number, Row>;
}

export interface Cluster {
	readonly zones: Map<string, Zone>;
}

export type AddSessionResult =
	| { readonly ok: true }
	| { readonly ok: false; readonly conflict: Session };

// Ingestion warnings: returned to the caller, never thrown
export interface UnparseableHostWarning {
	readonly kind: "unparseable_host";
	readonly host: string;
	readonly reason: string;
}

export interface InvalidIntervalWarning {
	readonly kind: "invalid_interval";
	readonly host: string;
	readonly start_ms: number;
	readonly end_ms: number;
}

export interface OverlapWarning {
	readonly kind: "overlap";
	readonly host: string;
	readonly existing: Session;
	readonly rejected: Session;
}

export type IngestWarning = UnparseableHostWarning | InvalidIntervalWarning | OverlapWarning;

export interface BuildResult {
	readonly cluster: Cluster;
	readonly warnings: readonly IngestWarning[];
	readonly accepted: number;
	readonly refined: number;
	readonly skipped: {
		readonly schema: number;
		readonly host: number;
		readonly interval: number;
		readonly overlap: number;
	};
}
