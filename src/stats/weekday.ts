import { earliestStart, flattenSessions } from "../cluster/cluster";
import { effectiveEnd, sessionDurationMs } from "../cluster/session";
import type { Cluster, SessionCount, Weekday, WeekdayTotals } from "../types";
import { roundTo } from "../utils";
import { DAY_MS, dateKeyOf, mapWeekdays, nextMidnight, weekdayOf } from "./calendar";

type MutableTotals = { session_count: number; usage_ms: number };

const emptyTotals = (): Record<Weekday, MutableTotals> =>
	mapWeekdays(() => ({ session_count: 0, usage_ms: 0 }));

/** Whole weeks between the first session and `now`, never less than one. */
export const weeksObserved = (firstStart: number | undefined, now: number): number =>
	firstStart === undefined ? 1 : Math.max(1, Math.floor(Math.floor((now - firstStart) / DAY_MS) / 7));

/**
 * Session count and occupied time per weekday of the session start. A session
 * running past midnight gives the part after midnight (and one more count) to
 * the following day; days after that one are not credited.
 */
export const computeWeekdayTotals = (
	cluster: Cluster,
	now: number,
	timeZone: string,
): Readonly<Record<Weekday, WeekdayTotals>> => {
	const sessions = flattenSessions(cluster);
	const totals = emptyTotals();

	for (const session of sessions) {
		const startDay = weekdayOf(session.start_ms, timeZone);
		totals[startDay].session_count += 1;

		const durationMs = sessionDurationMs(session, now);
		if (durationMs <= 0) continue;

		const end = effectiveEnd(session, now);
		if (dateKeyOf(end, timeZone) === dateKeyOf(session.start_ms, timeZone)) {
			totals[startDay].usage_ms += durationMs;
			continue;
		}

		const midnight = nextMidnight(session.start_ms, timeZone);
		const nextDay = weekdayOf(midnight, timeZone);
		totals[startDay].usage_ms += Math.max(0, midnight - session.start_ms);
		totals[nextDay].session_count += 1;
		totals[nextDay].usage_ms += Math.max(0, end - midnight);
	}

	const weeks = weeksObserved(earliestStart(sessions), now);
	const toCount = (t: MutableTotals): SessionCount => ({
		session_count: t.session_count,
		usage_seconds: t.usage_ms / 1000,
	});

	return mapWeekdays((day) => {
		const total = toCount(totals[day]);
		return {
			total,
			average: {
				session_count: roundTo(total.session_count / weeks, 2),
				usage_seconds: roundTo(total.usage_seconds / weeks, 2),
			},
		};
	});
};
