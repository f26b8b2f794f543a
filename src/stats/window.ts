import { effectiveEnd, sessionDurationMs } from "../cluster/session";
import type { Computer, Session } from "../types";
import { roundTo } from "../utils";

/** Window of 0 ms means "since the computer's first session". */
export const ALL_TIME = 0;

const assertWindow = (windowMs: number): void => {
	if (!Number.isFinite(windowMs) || windowMs < 0) {
		throw new RangeError(`Window must be a non-negative duration, got ${windowMs}`);
	}
};

const firstStart = (sessions: readonly Session[]): number =>
	sessions.reduce((min, s) => Math.min(min, s.start_ms), Number.POSITIVE_INFINITY);

/** Sessions counted by a trailing window: those that started inside it. */
const startedWithin = (sessions: readonly Session[], windowMs: number, now: number): readonly Session[] =>
	windowMs === ALL_TIME ? sessions : sessions.filter((s) => s.start_ms >= now - windowMs);

/**
 * Percentage of `[now - window, now]` during which the computer had a session,
 * rounded to 2 decimals.
 */
export const usagePercentage = (computer: Computer, windowMs: number, now: number): number => {
	assertWindow(windowMs);
	const { sessions } = computer;
	if (sessions.length === 0) return 0;

	const windowStart = windowMs === ALL_TIME ? firstStart(sessions) : now - windowMs;
	const totalMs = now - windowStart;
	if (totalMs <= 0) return 0;

	const usedMs = sessions.reduce((acc, s) => {
		const overlap = Math.min(effectiveEnd(s, now), now) - Math.max(s.start_ms, windowStart);
		return overlap > 0 ? acc + overlap : acc;
	}, 0);

	return Math.max(0, roundTo((usedMs / totalMs) * 100, 2));
};

/** Mean duration in whole seconds, undefined when no session qualifies. */
export const averageSessionDuration = (
	computer: Computer,
	windowMs: number,
	now: number,
): number | undefined => {
	assertWindow(windowMs);
	const qualifying = startedWithin(computer.sessions, windowMs, now);
	if (qualifying.length === 0) return undefined;
	const totalMs = qualifying.reduce((acc, s) => acc + sessionDurationMs(s, now), 0);
	return Math.round(totalMs / qualifying.length / 1000);
};

export const sessionCount = (computer: Computer, windowMs: number, now: number): number => {
	assertWindow(windowMs);
	return startedWithin(computer.sessions, windowMs, now).length;
};
