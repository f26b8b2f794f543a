import { addDays } from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";
import type { Weekday } from "../types";
import { WEEKDAY_VALUES } from "../types";

export const MINUTE_MS = 60_000;
export const DAY_MS = 86_400_000;

/**
 * Calendar date in a time zone, as "yyyy-MM-dd". All calendar arithmetic goes
 * through these keys so that results do not depend on the process time zone.
 */
export type DateKey = string;

export const isValidTimeZone = (timeZone: string): boolean => {
	try {
		new Intl.DateTimeFormat("en-US", { timeZone });
		return true;
	} catch {
		return false;
	}
};

export const dateKeyOf = (ms: number, timeZone: string): DateKey =>
	formatInTimeZone(ms, timeZone, "yyyy-MM-dd");

// Noon UTC keeps the date stable under any host DST shift in addDays
const keyToUtcNoon = (key: DateKey): Date => new Date(`${key}T12:00:00Z`);

export const nextDateKey = (key: DateKey): DateKey =>
	formatInTimeZone(addDays(keyToUtcNoon(key), 1), "UTC", "yyyy-MM-dd");

export const weekdayOfKey = (key: DateKey): Weekday => {
	const index = (keyToUtcNoon(key).getUTCDay() + 6) % 7;
	return WEEKDAY_VALUES[index];
};

export const weekdayOf = (ms: number, timeZone: string): Weekday =>
	weekdayOfKey(dateKeyOf(ms, timeZone));

/** Instant of a wall-clock time ("HH:mm") on a calendar date in `timeZone`. */
export const zonedInstant = (key: DateKey, time: string, timeZone: string): number =>
	fromZonedTime(`${key}T${time}:00`, timeZone).getTime();

export const startOfDateKey = (key: DateKey, timeZone: string): number =>
	zonedInstant(key, "00:00", timeZone);

/** Midnight that ends the calendar day containing `ms`. */
export const nextMidnight = (ms: number, timeZone: string): number =>
	startOfDateKey(nextDateKey(dateKeyOf(ms, timeZone)), timeZone);

/** Every calendar date from `from` to `to`, both included. */
export const eachDateKey = (from: DateKey, to: DateKey): readonly DateKey[] => {
	const keys: DateKey[] = [];
	for (let key = from; key <= to; key = nextDateKey(key)) keys.push(key);
	return keys;
};

export const parseWeekday = (name: string): Weekday => {
	const match = WEEKDAY_VALUES.find((d) => d.toLowerCase() === name.toLowerCase());
	if (!match) throw new RangeError(`Unknown weekday "${name}". Expected one of: ${WEEKDAY_VALUES.join(", ")}`);
	return match;
};

/** Build a record with one entry per weekday, Monday first. */
export const mapWeekdays = <T>(make: (day: Weekday) => T): Record<Weekday, T> => ({
	Monday: make("Monday"),
	Tuesday: make("Tuesday"),
	Wednesday: make("Wednesday"),
	Thursday: make("Thursday"),
	Friday: make("Friday"),
	Saturday: make("Saturday"),
	Sunday: make("Sunday"),
});
