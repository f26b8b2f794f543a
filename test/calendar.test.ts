import { describe, expect, test } from "vitest";
import {
	dateKeyOf,
	eachDateKey,
	isValidTimeZone,
	mapWeekdays,
	nextDateKey,
	nextMidnight,
	parseWeekday,
	startOfDateKey,
	weekdayOf,
	weekdayOfKey,
	zonedInstant,
} from "../src/stats/calendar";

describe("dateKeyOf", () => {
	test("depends on the time zone, not the host", () => {
		const t = Date.UTC(2024, 0, 1, 23, 30);
		expect(dateKeyOf(t, "UTC")).toBe("2024-01-01");
		expect(dateKeyOf(t, "Europe/Paris")).toBe("2024-01-02");
		expect(dateKeyOf(Date.UTC(2024, 0, 1, 3, 0), "America/New_York")).toBe("2023-12-31");
	});
});

describe("nextDateKey", () => {
	test("leap day and year end", () => {
		expect(nextDateKey("2024-02-28")).toBe("2024-02-29");
		expect(nextDateKey("2024-12-31")).toBe("2025-01-01");
	});
});

describe("weekdays", () => {
	test("weekdayOfKey", () => {
		expect(weekdayOfKey("2024-01-01")).toBe("Monday");
		expect(weekdayOfKey("2024-01-07")).toBe("Sunday");
	});

	test("weekdayOf follows the zone", () => {
		const t = Date.UTC(2024, 0, 1, 23, 30);
		expect(weekdayOf(t, "UTC")).toBe("Monday");
		expect(weekdayOf(t, "Europe/Paris")).toBe("Tuesday");
	});

	test("parseWeekday is case-insensitive", () => {
		expect(parseWeekday("monday")).toBe("Monday");
		expect(parseWeekday("SUNDAY")).toBe("Sunday");
	});

	test("parseWeekday rejects unknown names", () => {
		expect(() => parseWeekday("Funday")).toThrow(RangeError);
		expect(() => parseWeekday("Funday")).toThrow('Unknown weekday "Funday"');
	});

	test("mapWeekdays is Monday first", () => {
		expect(Object.keys(mapWeekdays(() => 0))).toEqual([
			"Monday",
			"Tuesday",
			"Wednesday",
			"Thursday",
			"Friday",
			"Saturday",
			"Sunday",
		]);
	});
});

describe("zoned instants", () => {
	test("wall-clock time after the spring DST change", () => {
		expect(zonedInstant("2024-03-31", "03:00", "Europe/Paris")).toBe(Date.UTC(2024, 2, 31, 1));
		expect(startOfDateKey("2024-03-31", "Europe/Paris")).toBe(Date.UTC(2024, 2, 30, 23));
	});

	test("the autumn DST day lasts 25 hours", () => {
		const start = startOfDateKey("2024-10-27", "Europe/Paris");
		expect(start).toBe(Date.UTC(2024, 9, 26, 22));
		expect(nextMidnight(start, "Europe/Paris")).toBe(Date.UTC(2024, 9, 27, 23));
	});

	test("nextMidnight in UTC", () => {
		expect(nextMidnight(Date.UTC(2024, 0, 1, 10), "UTC")).toBe(Date.UTC(2024, 0, 2));
	});
});

describe("eachDateKey", () => {
	test("inclusive range across a leap day", () => {
		expect(eachDateKey("2024-02-27", "2024-03-01")).toEqual(["2024-02-27", "2024-02-28", "2024-02-29", "2024-03-01"]);
	});

	test("empty when reversed", () => {
		expect(eachDateKey("2024-03-02", "2024-03-01")).toEqual([]);
	});
});

describe("isValidTimeZone", () => {
	test("IANA names", () => {
		expect(isValidTimeZone("Europe/Paris")).toBe(true);
		expect(isValidTimeZone("UTC")).toBe(true);
		expect(isValidTimeZone("Mars/Olympus")).toBe(false);
	});
});
