import { readFileSync } from "node:fs";
import { parsePayload } from "./payload";

export const readSessionFile = (path: string): readonly unknown[] => {
	const text = (() => {
		try {
			return readFileSync(path, "utf-8");
		} catch (err) {
			const msg = err instanceof Error ? err.message : String(err);
			throw new Error(`Cannot read ${path}: ${msg}`);
		}
	})();
	return parsePayload(text, path);
};
