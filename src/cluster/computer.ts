import type { AddSessionResult, Computer, HostAddress, Session } from "../types";
import { formatHost } from "./host";
import { isSessionActive, sessionDurationMs, sessionsOverlap, updateSessionEnd } from "./session";

export const createComputer = (address: HostAddress): Computer => ({
	...address,
	name: formatHost(address),
	sessions: [],
});

const findConflict = (
	sessions: readonly Session[],
	candidate: Session,
	ignore?: Session,
): Session | undefined =>
	sessions.find((existing) => existing !== ignore && sessionsOverlap(existing, candidate));

/**
 * Append a session unless it overlaps one already present. The session already
 * on the computer always wins; the rejected one is not stored.
 */
export const addSession = (computer: Computer, session: Session): AddSessionResult => {
	const conflict = findConflict(computer.sessions, session);
	if (conflict) return { ok: false, conflict };
	computer.sessions.push(session);
	return { ok: true };
};

export type RefineResult =
	| { readonly ok: true; readonly session: Session }
	| { readonly ok: false; readonly reason: "not_found" | "invalid_end" }
	| { readonly ok: false; readonly reason: "overlap"; readonly conflict: Session };

/**
 * Set the end of the session starting at `startMs`, keeping the non-overlap
 * invariant against every other session on the computer.
 */
export const refineSessionEnd = (computer: Computer, startMs: number, endMs: number): RefineResult => {
	const session = computer.sessions.find((s) => s.start_ms === startMs);
	if (!session) return { ok: false, reason: "not_found" };
	if (endMs === 0 || endMs < startMs) return { ok: false, reason: "invalid_end" };

	const conflict = findConflict(computer.sessions, { ...session, end_ms: endMs }, session);
	if (conflict) return { ok: false, reason: "overlap", conflict };

	updateSessionEnd(session, endMs);
	return { ok: true, session };
};

export const hasActiveSession = (computer: Computer, at: number): boolean =>
	computer.sessions.some((s) => isSessionActive(s, at));

/** Share of this computer's sessions that are active at `at` (0 without sessions). */
export const activeShareAt = (computer: Computer, at: number): number =>
	computer.sessions.length === 0
		? 0
		: computer.sessions.filter((s) => isSessionActive(s, at)).length / computer.sessions.length;

export const totalUsageSeconds = (computer: Computer, now: number): number =>
	Math.round(computer.sessions.reduce((acc, s) => acc + sessionDurationMs(s, now), 0) / 1000);
