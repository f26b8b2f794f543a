// Shift the decimal point through the exponent so 1.005 stays 1.005, not 1.00499…
const shiftDecimal = (value: number, places: number): number => {
	const [mantissa, exponent = "0"] = String(value).split("e");
	return Number(`${mantissa}e${Number(exponent) + places}`);
};

/** Round to `digits` decimals (halves round up). */
export const roundTo = (value: number, digits: number): number =>
	shiftDecimal(Math.round(shiftDecimal(value, digits)), -digits);

/** Round to the nearest integer, ties to the even neighbour (0.5 → 0, 1.5 → 2). */
export const roundHalfEven = (value: number): number => {
	const floor = Math.floor(value);
	const diff = value - floor;
	if (diff < 0.5) return floor;
	if (diff > 0.5) return floor + 1;
	return floor % 2 === 0 ? floor : floor + 1;
};

export const formatDuration = (ms: number): string => {
	if (ms < 1000) return `${ms}ms`;
	const seconds = Math.floor(ms / 1000);
	if (seconds < 60) return `${seconds}s`;
	const minutes = Math.floor(seconds / 60);
	if (minutes < 60) return `${minutes}m`;
	const hours = Math.floor(minutes / 60);
	const remainMin = minutes % 60;
	return `${hours}h${remainMin}m`;
};

const WINDOW_UNIT_MS: Readonly<Record<string, number>> = {
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000,
	w: 604_800_000,
};

/** Parse a window name ("1d", "12h", "all") into milliseconds; 0 for all time. */
export const parseWindow = (input: string): number => {
	if (input === "all" || input === "all_time") return 0;
	const match = /^(\d+)([mhdw])$/.exec(input);
	if (!match) throw new Error(`Invalid window "${input}". Use e.g. 1d, 7d, 12h or all.`);
	return Number(match[1]) * WINDOW_UNIT_MS[match[2]];
};
