import { describe, expect, test } from "vitest";
import { fmtInstant, fmtSeconds, renderBar } from "../src/commands/format-helpers";
import { hourlyPeaks } from "../src/commands/profile";

describe("fmtSeconds", () => {
	test("null → dash", () => {
		expect(fmtSeconds(null)).toBe("-");
	});

	test("seconds, minutes, hours", () => {
		expect(fmtSeconds(40)).toBe("40s");
		expect(fmtSeconds(720)).toBe("12m");
		expect(fmtSeconds(3900)).toBe("1h05m");
	});
});

describe("fmtInstant", () => {
	test("formats in the given zone", () => {
		const t = Date.UTC(2024, 0, 1, 23, 30);
		expect(fmtInstant(t, "UTC")).toBe("2024-01-01 23:30");
		expect(fmtInstant(t, "Europe/Paris")).toBe("2024-01-02 00:30");
	});
});

describe("renderBar", () => {
	test("scales against max", () => {
		expect(renderBar(1, 2, 4)).toBe("██··");
		expect(renderBar(5, 2, 4)).toBe("████");
	});

	test("empty when max is 0", () => {
		expect(renderBar(0, 0, 3)).toBe("···");
	});
});

describe("hourlyPeaks", () => {
	test("peak of each hour's buckets", () => {
		const peaks = hourlyPeaks({ "09:00": 1, "09:30": 3, "10:50": 2 });
		expect(peaks).toHaveLength(24);
		expect(peaks[9]).toBe(3);
		expect(peaks[10]).toBe(2);
		expect(peaks[0]).toBe(0);
	});
});
