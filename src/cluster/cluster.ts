import type { Cluster, Computer, HostAddress, Row, Session, Zone } from "../types";
import { createComputer } from "./computer";
import { parseHost } from "./host";

export const createCluster = (): Cluster => ({ zones: new Map() });

// --- lazy lookups (construction only) ---

export const ensureZone = (cluster: Cluster, zoneId: string): Zone => {
	const existing = cluster.zones.get(zoneId);
	if (existing) return existing;
	const zone: Zone = { zone_id: zoneId, rows: new Map() };
	cluster.zones.set(zoneId, zone);
	return zone;
};

export const ensureRow = (zone: Zone, rowNumber: number): Row => {
	const existing = zone.rows.get(rowNumber);
	if (existing) return existing;
	const row: Row = { row_number: rowNumber, computers: new Map() };
	zone.rows.set(rowNumber, row);
	return row;
};

export const ensureComputer = (cluster: Cluster, address: HostAddress): Computer => {
	const row = ensureRow(ensureZone(cluster, address.zone), address.row);
	const existing = row.computers.get(address.position);
	if (existing) return existing;
	const computer = createComputer(address);
	row.computers.set(address.position, computer);
	return computer;
};

// --- read-only queries ---

export const getZone = (cluster: Cluster, zoneId: string): Zone | undefined =>
	cluster.zones.get(zoneId);

export const getRow = (cluster: Cluster, zoneId: string, rowNumber: number): Row | undefined =>
	cluster.zones.get(zoneId)?.rows.get(rowNumber);

export const getComputer = (cluster: Cluster, address: HostAddress): Computer | undefined =>
	getRow(cluster, address.zone, address.row)?.computers.get(address.position);

export const findComputerByHost = (cluster: Cluster, host: string): Computer | undefined => {
	const parsed = parseHost(host);
	return parsed.ok ? getComputer(cluster, parsed.address) : undefined;
};

export const listZones = (cluster: Cluster): readonly Zone[] => [...cluster.zones.values()];

export const listRows = (zone: Zone): readonly Row[] => [...zone.rows.values()];

export const listComputers = (row: Row): readonly Computer[] => [...row.computers.values()];

/** Every computer, zone by zone then row by row, in first-reference order. */
export const flattenComputers = (cluster: Cluster): readonly Computer[] =>
	listZones(cluster).flatMap((zone) => listRows(zone).flatMap(listComputers));

export const flattenSessions = (cluster: Cluster): readonly Session[] =>
	flattenComputers(cluster).flatMap((c) => c.sessions);

export const earliestStart = (sessions: readonly Session[]): number | undefined =>
	sessions.length === 0
		? undefined
		: sessions.reduce((min, s) => Math.min(min, s.start_ms), Number.POSITIVE_INFINITY);
