import type { Session } from "../types";

/** Raw end values of 0 (epoch) mean the session has not ended. */
export const normalizeEnd = (raw: number | null | undefined): number | undefined =>
	raw === undefined || raw === null || raw === 0 ? undefined : raw;

export const createSession = (host: string, startMs: number, endMs?: number | null): Session => ({
	host,
	start_ms: startMs,
	end_ms: normalizeEnd(endMs),
});

export const isOpen = (session: Session): boolean => session.end_ms === undefined;

/** End instant, or `now` for an open session. */
export const effectiveEnd = (session: Session, now: number): number => session.end_ms ?? now;

export const sessionDurationMs = (session: Session, now: number): number =>
	Math.max(0, effectiveEnd(session, now) - session.start_ms);

export const isSessionActive = (session: Session, at: number): boolean =>
	session.start_ms <= at && (session.end_ms === undefined || session.end_ms >= at);

/** Intervals are [start, end), open sessions extend to +∞. */
export const sessionsOverlap = (a: Session, b: Session): boolean =>
	a.start_ms < (b.end_ms ?? Number.POSITIVE_INFINITY) &&
	b.start_ms < (a.end_ms ?? Number.POSITIVE_INFINITY);

/**
 * Refine the end of a session in place. Absent or zero values and ends before
 * the start are ignored. Returns whether the session changed.
 */
export const updateSessionEnd = (session: Session, rawEnd: number | null | undefined): boolean => {
	const end = normalizeEnd(rawEnd);
	if (end === undefined || end < session.start_ms) return false;
	session.end_ms = end;
	return true;
};

export const describeSession = (session: Session): string =>
	`${session.host} [${new Date(session.start_ms).toISOString()} → ${
		session.end_ms === undefined ? "open" : new Date(session.end_ms).toISOString()
	}]`;
