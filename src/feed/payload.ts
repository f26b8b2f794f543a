const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Map one entry of the upstream payload to the record shape. The endpoint
 * spells timestamps `startTime`/`endTime`; snake_case entries pass through.
 * Values are not validated here: the cluster builder owns the schema.
 */
const normalizeEntry = (entry: unknown): unknown => {
	if (!isRecord(entry)) return entry;
	if (!("startTime" in entry) && !("endTime" in entry)) return entry;
	const { startTime, endTime, ...rest } = entry;
	return {
		...rest,
		start_time: entry.start_time ?? startTime,
		end_time: entry.end_time ?? endTime,
	};
};

/**
 * Extract the session list from a decoded payload: either `{ sessions: [...] }`
 * or a bare array. Returns undefined for any other shape.
 */
export const extractRecords = (payload: unknown): readonly unknown[] | undefined => {
	const list = Array.isArray(payload)
		? payload
		: isRecord(payload) && Array.isArray(payload.sessions)
			? payload.sessions
			: undefined;
	return list?.map(normalizeEntry);
};

/** Parse payload text; throws with `source` in the message when it is not a session list. */
export const parsePayload = (text: string, source: string): readonly unknown[] => {
	const decoded: unknown = (() => {
		try {
			return JSON.parse(text);
		} catch (err) {
			const msg = err instanceof Error ? err.message : String(err);
			throw new Error(`Invalid JSON in ${source}: ${msg}`);
		}
	})();
	const records = extractRecords(decoded);
	if (!records) throw new Error(`No session list in ${source}: expected an array or { "sessions": [...] }`);
	return records;
};

