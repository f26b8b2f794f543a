import { describe, expect, test } from "vitest";
import { buildCluster } from "../src/cluster/build";
import { flattenSessions } from "../src/cluster/cluster";
import {
	BUCKET_LABELS,
	computeWeekdayConcurrency,
	computeWeeklyConcurrency,
	weekdayOccurrences,
} from "../src/stats/concurrency";

const makeSessions = (...sessions: ReadonlyArray<readonly [string, number, number?]>) =>
	flattenSessions(buildCluster(sessions.map(([host, start, end]) => ({ host, start_time: start, end_time: end }))).cluster);

// One 09:00–10:00 session every day from Monday 2024-01-01 to Monday 2024-01-08
const dailyMornings = () =>
	makeSessions(
		...Array.from({ length: 8 }, (_, i): readonly [string, number, number] => [
			"z1r1p1",
			Date.UTC(2024, 0, 1 + i, 9),
			Date.UTC(2024, 0, 1 + i, 10),
		]),
	);

describe("BUCKET_LABELS", () => {
	test("144 ten-minute buckets", () => {
		expect(BUCKET_LABELS).toHaveLength(144);
		expect(BUCKET_LABELS[0]).toBe("00:00");
		expect(BUCKET_LABELS[1]).toBe("00:10");
		expect(BUCKET_LABELS[143]).toBe("23:50");
	});
});

describe("weekdayOccurrences", () => {
	test("dates between the first start and the last end", () => {
		const sessions = dailyMornings();
		const now = Date.UTC(2024, 0, 8, 12);
		expect(weekdayOccurrences(sessions, "Monday", now, "UTC")).toEqual(["2024-01-01", "2024-01-08"]);
		expect(weekdayOccurrences(sessions, "Tuesday", now, "UTC")).toEqual(["2024-01-02"]);
	});

	test("none without sessions", () => {
		expect(weekdayOccurrences([], "Monday", 0, "UTC")).toEqual([]);
	});
});

describe("computeWeekdayConcurrency", () => {
	test("averages over every occurrence of the weekday", () => {
		const graph = computeWeekdayConcurrency(dailyMornings(), "Monday", Date.UTC(2024, 0, 8, 12), "UTC");
		expect(Object.keys(graph)).toHaveLength(144);
		expect(graph["08:50"]).toBe(0);
		expect(["09:00", "09:10", "09:20", "09:30", "09:40", "09:50"].map((label) => graph[label])).toEqual([
			1, 1, 1, 1, 1, 1,
		]);
		expect(graph["10:00"]).toBe(0);
		expect(Object.values(graph).reduce((a, b) => a + b, 0)).toBe(6);
	});

	test("averages round ties to even", () => {
		const sessions = makeSessions(
			["z1r1p1", Date.UTC(2024, 0, 1, 12), Date.UTC(2024, 0, 1, 12, 30)],
			["z1r1p2", Date.UTC(2024, 0, 1, 12), Date.UTC(2024, 0, 1, 12, 10)],
			["z1r1p1", Date.UTC(2024, 0, 8, 12), Date.UTC(2024, 0, 8, 12, 10)],
		);
		const graph = computeWeekdayConcurrency(sessions, "Monday", Date.UTC(2024, 0, 8, 13), "UTC");
		// 3 / 2 occurrences
		expect(graph["12:00"]).toBe(2);
		// 1 / 2 occurrences
		expect(graph["12:10"]).toBe(0);
		expect(graph["12:20"]).toBe(0);
		expect(graph["12:30"]).toBe(0);
	});

	test("a bucket busy on one of two dates averages to 0", () => {
		const sessions = makeSessions(
			["z1r1p1", Date.UTC(2024, 0, 1, 9), Date.UTC(2024, 0, 1, 10)],
			["z1r1p1", Date.UTC(2024, 0, 8, 15), Date.UTC(2024, 0, 8, 16)],
		);
		const graph = computeWeekdayConcurrency(sessions, "Monday", Date.UTC(2024, 0, 8, 17), "UTC");
		expect(graph["09:00"]).toBe(0);
		expect(graph["15:00"]).toBe(0);
		expect(Object.values(graph).every((v) => v === 0)).toBe(true);
	});

	test("an open session past midnight shows on the next day up to now", () => {
		const sessions = makeSessions(["z1r1p1", Date.UTC(2024, 0, 1, 22), 0]);
		const now = Date.UTC(2024, 0, 2, 3);
		const tuesday = computeWeekdayConcurrency(sessions, "Tuesday", now, "UTC");
		expect(tuesday["00:00"]).toBe(1);
		expect(tuesday["02:50"]).toBe(1);
		expect(tuesday["03:00"]).toBe(0);
		const monday = computeWeekdayConcurrency(sessions, "Monday", now, "UTC");
		expect(monday["21:50"]).toBe(0);
		expect(monday["22:00"]).toBe(1);
		expect(monday["23:50"]).toBe(1);
	});

	test("buckets follow local wall-clock time", () => {
		// 08:00–09:00 UTC is 09:00–10:00 in Paris in January
		const sessions = makeSessions(["z1r1p1", Date.UTC(2024, 0, 1, 8), Date.UTC(2024, 0, 1, 9)]);
		const graph = computeWeekdayConcurrency(sessions, "Monday", Date.UTC(2024, 0, 1, 12), "Europe/Paris");
		expect(graph["08:50"]).toBe(0);
		expect(graph["09:00"]).toBe(1);
		expect(graph["09:50"]).toBe(1);
		expect(graph["10:00"]).toBe(0);
	});

	test("weekday never observed gives an empty graph", () => {
		const sessions = makeSessions(["z1r1p1", Date.UTC(2024, 0, 1, 9), Date.UTC(2024, 0, 3, 10)]);
		expect(computeWeekdayConcurrency(sessions, "Thursday", Date.UTC(2024, 0, 3, 12), "UTC")).toEqual({});
	});
});

describe("computeWeeklyConcurrency", () => {
	test("one graph per weekday", () => {
		const { cluster } = buildCluster([
			{ host: "z1r1p1", start_time: Date.UTC(2024, 0, 1, 9), end_time: Date.UTC(2024, 0, 1, 10) },
		]);
		const weekly = computeWeeklyConcurrency(cluster, Date.UTC(2024, 0, 1, 12), "UTC");
		expect(Object.keys(weekly)).toEqual([
			"Monday",
			"Tuesday",
			"Wednesday",
			"Thursday",
			"Friday",
			"Saturday",
			"Sunday",
		]);
		expect(weekly.Monday["09:30"]).toBe(1);
		expect(weekly.Tuesday).toEqual({});
	});
});
