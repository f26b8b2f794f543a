import type { HostAddress } from "../types";

// <zone>r<row>p<position>, e.g. "z1r12p1"
const HOST_PATTERN = /^([^r]+)r([1-9]\d*)p([1-9]\d*)$/;

export type HostParseResult =
	| { readonly ok: true; readonly address: HostAddress }
	| { readonly ok: false; readonly reason: string };

/** Split a host name into zone, row and position. */
export const parseHost = (host: string): HostParseResult => {
	if (!host.includes("r")) return { ok: false, reason: "missing 'r'" };
	if (!host.includes("p")) return { ok: false, reason: "missing 'p'" };

	const match = HOST_PATTERN.exec(host);
	if (!match) return { ok: false, reason: "expected <zone>r<row>p<position>" };

	const [, zone, row, position] = match;
	if (/^\d+$/.test(zone)) return { ok: false, reason: "zone must not be numeric" };

	return { ok: true, address: { zone, row: Number(row), position: Number(position) } };
};

export const formatHost = (address: HostAddress): string =>
	`${address.zone}r${address.row}p${address.position}`;
