import { z } from "zod";
import { isValidTimeZone } from "./stats/calendar";
import { parseWindow } from "./utils";

export const DEFAULT_OUTPUT = "cluster.json";

const ConfigSchema = z.object({
	input: z.string().min(1).optional(),
	url: z.string().url().optional(),
	output: z.string().min(1),
	timeZone: z.string().refine(isValidTimeZone, (tz) => ({ message: `Unknown time zone "${tz}"` })),
	now: z.number().int(),
	windowMs: z.number().int().nonnegative(),
	refineOpenSessions: z.boolean(),
	quiet: z.boolean(),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface ConfigInput {
	readonly input?: string;
	readonly url?: string;
	readonly output?: string;
	readonly tz?: string;
	readonly now?: string;
	readonly window?: string;
	readonly refine?: boolean;
	readonly quiet?: boolean;
}

/** Accepts epoch milliseconds or an ISO-8601 instant. */
export const parseInstant = (value: string): number => {
	const ms = /^\d+$/.test(value) ? Number(value) : Date.parse(value);
	if (Number.isNaN(ms)) throw new Error(`Invalid instant "${value}". Use epoch milliseconds or ISO-8601.`);
	return ms;
};

const systemTimeZone = (): string => Intl.DateTimeFormat().resolvedOptions().timeZone;

/** Merge flag values over environment variables and defaults, then validate. */
export const resolveConfig = (
	flags: ConfigInput,
	env: NodeJS.ProcessEnv = process.env,
	clock: () => number = Date.now,
): Config => {
	const result = ConfigSchema.safeParse({
		input: flags.input ?? env.CLUSTERSTAT_INPUT,
		url: flags.url ?? env.CLUSTERSTAT_URL,
		output: flags.output ?? DEFAULT_OUTPUT,
		timeZone: flags.tz ?? env.CLUSTERSTAT_TZ ?? systemTimeZone(),
		now: flags.now !== undefined ? parseInstant(flags.now) : clock(),
		windowMs: parseWindow(flags.window ?? "7d"),
		refineOpenSessions: flags.refine ?? false,
		quiet: flags.quiet ?? false,
	});
	if (!result.success) {
		const issue = result.error.issues[0];
		throw new Error(`Invalid configuration: ${issue.path.join(".")}: ${issue.message}`);
	}
	return result.data;
};
