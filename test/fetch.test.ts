import { beforeEach, describe, expect, test, vi } from "vitest";
import { DEFAULT_TIMEOUT_MS, fetchSessions } from "../src/feed/fetch";

const { get } = vi.hoisted(() => ({ get: vi.fn() }));

vi.mock("axios", () => ({ default: { get } }));

const FEED_URL = "http://localhost:8080/sessions";

beforeEach(() => {
	get.mockReset();
});

describe("fetchSessions", () => {
	test("returns normalized records", async () => {
		get.mockResolvedValue({ status: 200, data: { sessions: [{ host: "z1r1p1", startTime: 1, endTime: 0 }] } });
		await expect(fetchSessions(FEED_URL)).resolves.toEqual([{ host: "z1r1p1", start_time: 1, end_time: 0 }]);
		expect(get).toHaveBeenCalledWith(FEED_URL, expect.objectContaining({ timeout: DEFAULT_TIMEOUT_MS }));
	});

	test("passes the timeout through", async () => {
		get.mockResolvedValue({ status: 200, data: [] });
		await fetchSessions(FEED_URL, 500);
		expect(get).toHaveBeenCalledWith(FEED_URL, expect.objectContaining({ timeout: 500 }));
	});

	test("non-200 status", async () => {
		get.mockResolvedValue({ status: 503, data: "" });
		await expect(fetchSessions(FEED_URL)).rejects.toThrow(`Fetching ${FEED_URL} failed with status 503`);
	});

	test("network error", async () => {
		get.mockRejectedValue(new Error("connect ECONNREFUSED"));
		await expect(fetchSessions(FEED_URL)).rejects.toThrow(`Fetching ${FEED_URL} failed: connect ECONNREFUSED`);
	});

	test("body without a session list", async () => {
		get.mockResolvedValue({ status: 200, data: { ok: true } });
		await expect(fetchSessions(FEED_URL)).rejects.toThrow(`No session list in response from ${FEED_URL}`);
	});
});
