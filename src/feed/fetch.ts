import axios from "axios";
import { extractRecords } from "./payload";

export const DEFAULT_TIMEOUT_MS = 60_000;

/** GET the session payload from `url`. Network errors, non-200 replies and unexpected bodies throw. */
export const fetchSessions = async (
	url: string,
	timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<readonly unknown[]> => {
	const response = await axios
		.get<unknown>(url, {
			timeout: timeoutMs,
			validateStatus: () => true,
		})
		.catch((err: unknown) => {
			const msg = err instanceof Error ? err.message : String(err);
			throw new Error(`Fetching ${url} failed: ${msg}`);
		});
	if (response.status !== 200) {
		throw new Error(`Fetching ${url} failed with status ${response.status}`);
	}
	const records = extractRecords(response.data);
	if (!records) throw new Error(`No session list in response from ${url}`);
	return records;
};
