import { formatInTimeZone } from "date-fns-tz";
import { green, red, yellow } from "./shared";

/** Format whole seconds as "1h05m", "12m" or "40s". */
export const fmtSeconds = (seconds: number | null): string => {
	if (seconds === null) return "-";
	if (seconds < 60) return `${seconds}s`;
	const minutes = Math.floor(seconds / 60);
	if (minutes < 60) return `${minutes}m`;
	return `${Math.floor(minutes / 60)}h${String(minutes % 60).padStart(2, "0")}m`;
};

/** Format epoch ms as "yyyy-MM-dd HH:mm" in the configured zone. */
export const fmtInstant = (t: number, timeZone: string): string => formatInTimeZone(t, timeZone, "yyyy-MM-dd HH:mm");

/**
 * Color a usage percentage: green (<30), yellow (<70), red (>=70).
 */
export const colorUsage = (pct: number): string => {
	const formatted = `${pct.toFixed(2)}%`;
	if (pct < 30) return green(formatted);
	if (pct < 70) return yellow(formatted);
	return red(formatted);
};

/** Horizontal bar of `width` cells, `value` scaled against `max`. */
export const renderBar = (value: number, max: number, width: number): string => {
	const filled = max <= 0 ? 0 : Math.round((Math.min(value, max) / max) * width);
	return "█".repeat(filled) + "·".repeat(width - filled);
};
