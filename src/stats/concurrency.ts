import { flattenSessions } from "../cluster/cluster";
import { effectiveEnd } from "../cluster/session";
import type { Cluster, ConcurrencyGraph, Session, Weekday, WeeklyConcurrency } from "../types";
import { roundHalfEven } from "../utils";
import {
	DAY_MS,
	MINUTE_MS,
	type DateKey,
	dateKeyOf,
	eachDateKey,
	mapWeekdays,
	startOfDateKey,
	weekdayOfKey,
	zonedInstant,
} from "./calendar";

export const BUCKET_MINUTES = 10;
const BUCKET_MS = BUCKET_MINUTES * MINUTE_MS;

/** "00:00", "00:10", … "23:50" */
export const BUCKET_LABELS: readonly string[] = Array.from({ length: (24 * 60) / BUCKET_MINUTES }, (_, i) => {
	const minutes = i * BUCKET_MINUTES;
	const h = String(Math.floor(minutes / 60)).padStart(2, "0");
	const m = String(minutes % 60).padStart(2, "0");
	return `${h}:${m}`;
});

/** Dates in the observed range that fall on `weekday`. */
export const weekdayOccurrences = (
	sessions: readonly Session[],
	weekday: Weekday,
	now: number,
	timeZone: string,
): readonly DateKey[] => {
	if (sessions.length === 0) return [];
	const first = sessions.reduce((min, s) => Math.min(min, s.start_ms), Number.POSITIVE_INFINITY);
	const last = sessions.reduce((max, s) => Math.max(max, effectiveEnd(s, now)), Number.NEGATIVE_INFINITY);
	return eachDateKey(dateKeyOf(first, timeZone), dateKeyOf(last, timeZone)).filter(
		(key) => weekdayOfKey(key) === weekday,
	);
};

const overlaps = (session: Session, from: number, to: number, now: number): boolean =>
	session.start_ms < to && effectiveEnd(session, now) > from;

/**
 * Average number of sessions active in each 10-minute bucket of `weekday`,
 * over every occurrence of that weekday in the observed range. Sessions are
 * counted on every date they cover, not only the date they started.
 */
export const computeWeekdayConcurrency = (
	sessions: readonly Session[],
	weekday: Weekday,
	now: number,
	timeZone: string,
): ConcurrencyGraph => {
	const occurrences = weekdayOccurrences(sessions, weekday, now, timeZone);
	if (occurrences.length === 0) return {};

	const sums = BUCKET_LABELS.map(() => 0);

	for (const key of occurrences) {
		// Generous bounds cover DST days longer than 24h
		const dayStart = startOfDateKey(key, timeZone);
		const daySessions = sessions.filter((s) => overlaps(s, dayStart - DAY_MS, dayStart + 2 * DAY_MS, now));

		BUCKET_LABELS.forEach((label, i) => {
			const bucketStart = zonedInstant(key, label, timeZone);
			const bucketEnd = bucketStart + BUCKET_MS;
			sums[i] += daySessions.filter((s) => overlaps(s, bucketStart, bucketEnd, now)).length;
		});
	}

	return Object.fromEntries(BUCKET_LABELS.map((label, i) => [label, roundHalfEven(sums[i] / occurrences.length)]));
};

export const computeWeeklyConcurrency = (cluster: Cluster, now: number, timeZone: string): WeeklyConcurrency => {
	const sessions = flattenSessions(cluster);
	return mapWeekdays((day) => computeWeekdayConcurrency(sessions, day, now, timeZone));
};
